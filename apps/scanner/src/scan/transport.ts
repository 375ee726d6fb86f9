import http from "node:http";
import https from "node:https";
import { performance } from "node:perf_hooks";
import got, { type Got } from "got";
import { noopLogger, type Logger } from "../logger";
import { normalizeHeaders } from "../utils";
import { ACCEPT_LANGUAGE_POOL, DEFAULT_REQUEST_HEADERS, MAX_REDIRECTS, USER_AGENT_POOL } from "./constants";
import { describeError, TransportError } from "./errors";
import type { FetchOptions, ProbeResponse, ScanConfig, Transport, TransportErrorKind } from "./types";

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT"]);
const REFUSED_CODES = new Set(["ECONNREFUSED"]);
const REDIRECT_CODES = new Set(["ERR_TOO_MANY_REDIRECTS"]);
const TLS_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "CERT_UNTRUSTED",
  "EPROTO",
]);

const readString = (value: unknown, key: "code" | "name"): string | undefined => {
  if (typeof value !== "object" || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
};

const readCause = (value: unknown): unknown =>
  typeof value === "object" && value !== null && "cause" in value ? value.cause : undefined;

const kindFromCode = (code: string | undefined): TransportErrorKind | null => {
  if (!code) return null;
  if (TIMEOUT_CODES.has(code)) return "Timeout";
  if (REFUSED_CODES.has(code)) return "ConnectionRefused";
  if (REDIRECT_CODES.has(code)) return "TooManyRedirects";
  if (TLS_CODES.has(code) || code.startsWith("ERR_SSL_") || code.startsWith("ERR_TLS_")) return "TLSError";
  return null;
};

const kindFromName = (name: string | undefined): TransportErrorKind | null => {
  if (name === "TimeoutError") return "Timeout";
  if (name === "MaxRedirectsError") return "TooManyRedirects";
  return null;
};

/** Maps whatever the HTTP stack threw onto the transport error taxonomy. */
export const classifyTransportError = (error: unknown, url: string): TransportError => {
  if (error instanceof TransportError) return error;

  let current: unknown = error;
  for (let depth = 0; depth < 3 && current !== undefined; depth += 1) {
    const kind = kindFromName(readString(current, "name")) ?? kindFromCode(readString(current, "code"));
    if (kind) {
      return new TransportError(kind, describeError(error), url, { cause: error });
    }
    current = readCause(current);
  }

  return new TransportError("Other", describeError(error), url, { cause: error });
};

export const pickFrom = <T>(pool: readonly T[], random: () => number): T | undefined =>
  pool[Math.floor(random() * pool.length) % pool.length];

export const pickUserAgent = (config: Pick<ScanConfig, "userAgent">, random: () => number = Math.random) =>
  config.userAgent ?? pickFrom(USER_AGENT_POOL, random) ?? USER_AGENT_POOL[0];

/** Request headers for one attempt. Later sources win: defaults, rotation, config, call site. */
export const buildRequestHeaders = (
  config: Pick<ScanConfig, "userAgent" | "headers">,
  extra: Record<string, string> = {},
  random: () => number = Math.random,
): Record<string, string> => {
  const headers: Record<string, string> = {
    ...DEFAULT_REQUEST_HEADERS,
    "User-Agent": pickUserAgent(config, random),
    "Accept-Language": pickFrom(ACCEPT_LANGUAGE_POOL, random) ?? "en-US,en;q=0.9",
  };
  for (const [key, value] of Object.entries({ ...config.headers, ...extra })) {
    const existing = Object.keys(headers).find((name) => name.toLowerCase() === key.toLowerCase());
    if (existing) delete headers[existing];
    headers[key] = value;
  }
  return headers;
};

export interface HttpTransportOptions {
  logger?: Logger;
  random?: () => number;
}

/**
 * got-backed transport. Owns one keep-alive agent pair for the lifetime of a
 * scan; `close()` tears the pool down.
 */
export class HttpTransport implements Transport {
  private readonly agents = {
    http: new http.Agent({ keepAlive: true }),
    https: new https.Agent({ keepAlive: true }),
  };

  private readonly client: Got;

  private readonly logger: Logger;

  private readonly random: () => number;

  constructor(
    private readonly config: Readonly<ScanConfig>,
    options: HttpTransportOptions = {},
  ) {
    this.logger = (options.logger ?? noopLogger).child("transport");
    this.random = options.random ?? Math.random;
    this.client = got.extend({
      agent: this.agents,
      timeout: {
        request: config.timeoutMs,
      },
      https: {
        rejectUnauthorized: !config.ignoreSsl,
      },
      followRedirect: config.followRedirects,
      maxRedirects: MAX_REDIRECTS,
      throwHttpErrors: false,
      retry: {
        limit: 0,
      },
      decompress: true,
    });
  }

  fetch(url: string, options: FetchOptions = {}): Promise<ProbeResponse> {
    const limit = this.config.maxBodyBytes;
    const startedAt = performance.now();
    const method = options.method ?? "GET";
    this.logger.debug(`${method} ${url}`);

    return new Promise<ProbeResponse>((resolve, reject) => {
      const stream = this.client.stream(url, {
        method,
        headers: buildRequestHeaders(this.config, options.headers, this.random),
        followRedirect: options.followRedirects ?? this.config.followRedirects,
        signal: options.signal,
      });

      const chunks: Buffer[] = [];
      let size = 0;
      let truncated = false;
      let settled = false;
      let meta: { statusCode: number; url: string; headers: Record<string, string>; redirectUrls: string[] } | null =
        null;

      const finish = () => {
        if (settled) return;
        settled = true;
        if (!meta) {
          reject(new TransportError("Other", "Connection closed before a response arrived", url));
          return;
        }
        const body = Buffer.concat(chunks);
        const finalUrl = meta.url || url;
        resolve({
          url,
          finalUrl,
          scheme: finalUrl.startsWith("http://") ? "http" : "https",
          statusCode: meta.statusCode,
          headers: meta.headers,
          body,
          bodyText: body.toString("utf8"),
          truncated,
          elapsedMs: Math.round(performance.now() - startedAt),
          redirectUrls: meta.redirectUrls,
        });
      };

      stream.on("response", (response) => {
        meta = {
          statusCode: response.statusCode,
          url: response.url,
          headers: normalizeHeaders(response.headers),
          redirectUrls: response.redirectUrls.map((redirect: URL) => redirect.toString()),
        };
      });

      stream.on("data", (chunk: Buffer) => {
        if (settled) return;
        if (size + chunk.length > limit) {
          chunks.push(chunk.subarray(0, limit - size));
          size = limit;
          truncated = true;
          finish();
          stream.destroy();
          return;
        }
        chunks.push(chunk);
        size += chunk.length;
      });

      stream.once("end", finish);

      stream.on("error", (error: unknown) => {
        if (settled) return;
        settled = true;
        const classified = classifyTransportError(error, url);
        this.logger.debug(`${method} ${url} failed (${classified.kind}): ${classified.message}`);
        reject(classified);
      });
    });
  }

  close() {
    this.agents.http.destroy();
    this.agents.https.destroy();
  }
}
