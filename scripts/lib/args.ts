import { ArgsException } from "./errors.js";

/** Command-line flags after the command name, read through typed accessors. */
export class CliFlags {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: ReadonlyMap<string, string>) {
    this.values = values;
  }

  string(key: string): string | undefined {
    return this.values.get(key) || undefined;
  }

  require(key: string): string {
    const value = this.string(key);
    if (value === undefined) {
      throw new ArgsException(`Missing required argument --${key}.`);
    }
    return value;
  }

  int(key: string): number | undefined {
    const value = this.string(key);
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isSafeInteger(n)) {
      throw new ArgsException(`--${key} must be an integer: ${value}`);
    }
    return n;
  }

  requireInt(key: string): number {
    const n = this.int(key);
    if (n === undefined) throw new ArgsException(`Missing required argument --${key}.`);
    return n;
  }

  /** "false" and "0" are false; any other value, or a bare flag, is true. */
  bool(key: string, fallback: boolean): boolean {
    const value = this.values.get(key);
    if (value === undefined) return fallback;
    return value !== "false" && value !== "0";
  }

  json(key: string): unknown {
    const value = this.string(key);
    if (value === undefined) return undefined;
    try {
      return JSON.parse(value);
    } catch (error) {
      throw new ArgsException(`--${key} is not valid JSON: ${value}`, { cause: error });
    }
  }
}

/**
 * Reads `--key value`, `--key=value` and bare `--key` (which reads as "true").
 * Anything that is not a flag or a flag's value is rejected.
 */
export function parseFlags(argv: readonly string[]): CliFlags {
  const values = new Map<string, string>();
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (!arg.startsWith("--") || arg.length === 2) {
      throw new ArgsException(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf("=");
    if (eq > 2) {
      values.set(arg.slice(2, eq), arg.slice(eq + 1));
      i += 1;
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      values.set(arg.slice(2), next);
      i += 2;
    } else {
      values.set(arg.slice(2), "true");
      i += 1;
    }
  }
  return new CliFlags(values);
}
