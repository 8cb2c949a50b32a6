import http from "node:http";
import https from "node:https";
import axios, { type AxiosInstance } from "axios";
import type { AccessRoute } from "../schemas/index.js";
import type { Retrieval, RouteClient } from "./route-client.js";

export const DEFAULT_HTTP_TIMEOUT_MS = 100_000;

const USER_AGENT = "paper-corpus-ingest/0.1 (+mailto:corpus@example.org)";

/**
 * Shared axios instance with keep-alive agents. Bodies are read as raw
 * bytes and every status is returned to the caller for classification.
 */
export function createHttpClient(): AxiosInstance {
  return axios.create({
    timeout: DEFAULT_HTTP_TIMEOUT_MS,
    httpAgent: new http.Agent({ keepAlive: true, maxSockets: 16 }),
    httpsAgent: new https.Agent({ keepAlive: true, maxSockets: 16 }),
    responseType: "arraybuffer",
    maxRedirects: 10,
    headers: { "User-Agent": USER_AGENT },
  });
}

export function expandTemplate(template: string, identifier: string): string {
  return template
    .replaceAll("{identifier_encoded}", encodeURIComponent(identifier))
    .replaceAll("{identifier}", identifier);
}

const CREDENTIAL_PATTERN = /\{credential:([A-Za-z0-9_-]+)\}/g;

type HeaderResolution =
  | { ok: true; headers: Record<string, string> }
  | { ok: false; missing: string };

function resolveHeaders(
  headers: Record<string, string> | undefined,
  credentials: Readonly<Record<string, string>>,
): HeaderResolution {
  const resolved: Record<string, string> = {};
  for (const [name, template] of Object.entries(headers ?? {})) {
    const missing: string[] = [];
    const value = template.replace(CREDENTIAL_PATTERN, (_match, key: string) => {
      const credential = credentials[key];
      if (credential === undefined || credential === "") {
        missing.push(key);
        return "";
      }
      return credential;
    });
    if (missing.length > 0) return { ok: false, missing: missing[0] };
    resolved[name] = value;
  }
  return { ok: true, headers: resolved };
}

function headerString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === "string") return Buffer.from(data, "utf8");
  return new Uint8Array(0);
}

function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export function classifyStatus(
  status: number,
): "artifact" | "unavailable" | "denied" | "not_found" {
  if (status >= 200 && status < 300) return "artifact";
  if (status === 404 || status === 410) return "not_found";
  if (status === 408 || status === 425 || status === 429 || status >= 500) {
    return "unavailable";
  }
  return "denied";
}

export interface HttpRouteClientOptions {
  client?: AxiosInstance;
  credentials?: Readonly<Record<string, string>>;
  defaultTimeoutMs?: number;
}

export class HttpRouteClient implements RouteClient {
  private readonly client: AxiosInstance;
  private readonly credentials: Readonly<Record<string, string>>;
  private readonly defaultTimeoutMs: number;

  constructor(options: HttpRouteClientOptions = {}) {
    this.client = options.client ?? createHttpClient();
    this.credentials = options.credentials ?? {};
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  }

  async retrieve(
    identifier: string,
    route: AccessRoute,
    signal: AbortSignal,
  ): Promise<Retrieval> {
    if (!route.url) {
      return { kind: "denied", detail: `route ${route.name} has no url` };
    }
    const headers = resolveHeaders(route.headers, this.credentials);
    if (!headers.ok) {
      return {
        kind: "denied",
        detail: `missing credential "${headers.missing}"`,
      };
    }

    const url = expandTemplate(route.url, identifier);
    try {
      const response = await this.client.get<unknown>(url, {
        headers: headers.headers,
        responseType: "arraybuffer",
        timeout: route.timeout_ms ?? this.defaultTimeoutMs,
        signal,
        validateStatus: () => true,
      });

      const outcome = classifyStatus(response.status);
      if (outcome !== "artifact") {
        return { kind: outcome, detail: `HTTP ${response.status} from ${url}` };
      }

      const contentLength = headerString(response.headers["content-length"]);
      const declared =
        contentLength !== undefined ? Number.parseInt(contentLength, 10) : NaN;
      return {
        kind: "artifact",
        bytes: toBytes(response.data),
        content_type: headerString(response.headers["content-type"]),
        declared_length: Number.isFinite(declared) ? declared : undefined,
      };
    } catch (err) {
      return { kind: "unavailable", detail: describeError(err) };
    }
  }
}
