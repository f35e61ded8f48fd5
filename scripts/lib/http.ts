import { z } from "zod";
import { Credential } from "./credential.js";
import { type Endpoint, type EndpointTable, loadEndpointTable } from "./endpoints.js";
import { type ClientConfig, getClientConfig } from "./env.js";
import { NetworkException, ResponseCodeException, ResponseException } from "./errors.js";
import { logger, setLogLevel } from "./logger.js";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface FilePart {
  content: Uint8Array | Blob;
  filename?: string;
}

export interface RequestOptions {
  params?: QueryParams;
  /** Form fields, or the JSON body when `jsonBody` is set */
  data?: object;
  jsonBody?: boolean;
  files?: Record<string, FilePart>;
  credential?: Credential;
}

export interface HttpClientOptions {
  config?: ClientConfig;
  endpoints?: EndpointTable;
  fetch?: typeof fetch;
}

const envelopeSchema = z
  .object({
    code: z.number(),
    message: z.string().optional(),
    msg: z.string().optional(),
    data: z.unknown(),
  })
  .passthrough();

function toField(value: unknown): string {
  return typeof value === "object" ? JSON.stringify(value) : String(value);
}

/** Form fields with `csrf`/`csrf_token` filled from the credential's bili_jct. */
function formFields(data: object, credential: Credential): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    if (value === undefined || value === null) continue;
    fields[key] = toField(value);
  }
  if (credential.hasBiliJct()) {
    fields.csrf = credential.biliJct;
    fields.csrf_token = credential.biliJct;
  }
  return fields;
}

function cookieHeader(credential: Credential): string {
  return Object.entries(credential.getCookies())
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

/**
 * Dispatches endpoint calls. Unwraps the `{ code, message, data }` envelope
 * and throws on anything but `code === 0`. Constructing one applies its
 * config's log level to the shared logger.
 */
export class HttpClient {
  readonly config: ClientConfig;
  readonly endpoints: EndpointTable;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpClientOptions = {}) {
    this.config = options.config ?? getClientConfig();
    this.endpoints = options.endpoints ?? loadEndpointTable();
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    setLogLevel(this.config.logLevel);
  }

  request(endpoint: Endpoint, options?: RequestOptions): Promise<unknown>;
  request<S extends z.ZodTypeAny>(
    endpoint: Endpoint,
    options: RequestOptions,
    schema: S,
  ): Promise<z.output<S>>;
  async request(
    endpoint: Endpoint,
    options: RequestOptions = {},
    schema?: z.ZodTypeAny,
  ): Promise<unknown> {
    const credential = options.credential ?? new Credential();

    const url = new URL(endpoint.url);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    const headers = new Headers({
      "User-Agent": this.config.userAgent,
      Referer: this.config.referer,
    });
    const cookie = cookieHeader(credential);
    if (cookie) headers.set("Cookie", cookie);

    let body: string | FormData | undefined;
    if (endpoint.method === "POST") {
      if (options.jsonBody) {
        headers.set("Content-Type", "application/json");
        body = JSON.stringify(options.data ?? {});
      } else if (options.files) {
        const form = new FormData();
        for (const [key, value] of Object.entries(formFields(options.data ?? {}, credential))) {
          form.append(key, value);
        }
        for (const [key, file] of Object.entries(options.files)) {
          const blob = file.content instanceof Blob ? file.content : new Blob([file.content]);
          form.append(key, blob, file.filename ?? key);
        }
        body = form;
      } else {
        headers.set("Content-Type", "application/x-www-form-urlencoded");
        body = new URLSearchParams(formFields(options.data ?? {}, credential)).toString();
      }
    }

    logger.debug("request", { method: endpoint.method, url: url.toString() });

    let res: Response;
    try {
      res = await this.fetchImpl(url.toString(), {
        method: endpoint.method,
        headers,
        body,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new NetworkException(0, `Request to ${endpoint.url} failed: ${msg}`, { cause: error });
    }

    if (!res.ok) {
      throw new NetworkException(res.status, `HTTP ${res.status} from ${endpoint.url}`);
    }

    const text = await res.text();
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ResponseException(`Response from ${endpoint.url} is not JSON.`, { cause: error });
    }

    const envelope = envelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new ResponseException(`Response from ${endpoint.url} has no status code.`);
    }

    const { code, message, msg } = envelope.data;
    if (code !== 0) {
      logger.warn("api error", { url: endpoint.url, code, message: message || msg });
      throw new ResponseCodeException(code, message || msg || "unknown error", json);
    }

    if (!schema) return envelope.data.data;

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      const issue = data.error.issues[0];
      throw new ResponseException(
        `Unexpected response from ${endpoint.url} at ${issue.path.join(".")}: ${issue.message}`,
      );
    }
    return data.data;
  }
}

/** Response data handed back as-is; `null` becomes `{}`. */
export const rawData = z
  .record(z.string(), z.unknown())
  .nullable()
  .transform((value) => value ?? {});

export type RawData = z.output<typeof rawData>;

let defaultClient: HttpClient | undefined;

/** Shared client built from the process environment on first use. */
export function getDefaultClient(): HttpClient {
  defaultClient ??= new HttpClient();
  return defaultClient;
}
