import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ArgsException } from "./errors.js";

const endpointSchema = z.object({
  url: z.string().url(),
  method: z.enum(["GET", "POST"]),
  comment: z.string().optional(),
});

export type Endpoint = z.infer<typeof endpointSchema>;

const dynamicApiSchema = z.object({
  info: z.object({
    detail: endpointSchema,
    repost: endpointSchema,
    likes: endpointSchema,
    attention_new_dynamic: endpointSchema,
    attention_live: endpointSchema,
    dynamic_page_ups_info: endpointSchema,
    dynamic_page_info: endpointSchema,
  }),
  operate: z.object({
    like: endpointSchema,
    delete: endpointSchema,
    repost: endpointSchema,
  }),
  send: z.object({
    upload_img: endpointSchema,
    instant: endpointSchema,
  }),
  schedule: z.object({
    list: endpointSchema,
    publish_now: endpointSchema,
    delete: endpointSchema,
  }),
});

const userApiSchema = z.object({
  info: z.object({
    name_to_uid: endpointSchema,
    info: endpointSchema,
    my_info: endpointSchema,
  }),
});

const voteApiSchema = z.object({
  info: z.object({
    vote_info: endpointSchema,
  }),
});

const endpointTableSchema = z.object({
  dynamic: dynamicApiSchema,
  user: userApiSchema,
  vote: voteApiSchema,
});

export type EndpointTable = z.infer<typeof endpointTableSchema>;
type ApiModule = keyof EndpointTable;

const MODULES: readonly ApiModule[] = ["dynamic", "user", "vote"];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** Validates a raw `{ dynamic, user, vote }` object and freezes it. */
export function parseEndpointTable(raw: unknown): EndpointTable {
  const parsed = endpointTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ArgsException(`Invalid endpoint table at ${issue.path.join(".")}: ${issue.message}`);
  }
  return deepFreeze(parsed.data);
}

/** Finds `data/api` from the source tree or from the build output. */
function findApiDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, "data", "api");
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new ArgsException("Endpoint data directory data/api not found.");
    }
    dir = parent;
  }
}

export function loadEndpointTable(apiDir: string = findApiDir()): EndpointTable {
  const raw: Record<string, unknown> = {};
  for (const name of MODULES) {
    raw[name] = JSON.parse(readFileSync(join(apiDir, `${name}.json`), "utf-8"));
  }
  return parseEndpointTable(raw);
}
