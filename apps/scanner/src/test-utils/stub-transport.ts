import { setTimeout as delay } from "node:timers/promises";
import { TransportError } from "../scan/errors";
import type { FetchOptions, ProbeResponse, Transport, TransportErrorKind } from "../scan/types";

export interface ProbeResponseInit {
  statusCode?: number;
  headers?: Record<string, string>;
  body?: string | Buffer;
  finalUrl?: string;
  redirectUrls?: string[];
  elapsedMs?: number;
  truncated?: boolean;
}

export type StubOutcome = ProbeResponseInit | Error;

export type StubRoute = StubOutcome | ((url: string, options: FetchOptions) => StubOutcome | Promise<StubOutcome>);

export interface StubTransportOptions {
  /** Keyed by exact URL. An array is replayed call by call, its last entry repeating. */
  routes?: Record<string, StubRoute | StubRoute[]>;
  /** Used for URLs without a route. Defaults to an empty 200. */
  fallback?: StubRoute;
  latencyMs?: number;
}

export const makeResponse = (url: string, init: ProbeResponseInit = {}): ProbeResponse => {
  const body = typeof init.body === "string" ? Buffer.from(init.body, "utf8") : (init.body ?? Buffer.alloc(0));
  const finalUrl = init.finalUrl ?? url;
  return {
    url,
    finalUrl,
    scheme: finalUrl.startsWith("http://") ? "http" : "https",
    statusCode: init.statusCode ?? 200,
    headers: init.headers ?? {},
    body,
    bodyText: body.toString("utf8"),
    truncated: init.truncated ?? false,
    elapsedMs: init.elapsedMs ?? 5,
    redirectUrls: init.redirectUrls ?? [],
  };
};

export const transportError = (kind: TransportErrorKind, url: string) =>
  new TransportError(kind, `${kind} for ${url}`, url);

/** In-process Transport that records calls and the peak number of concurrent fetches. */
export class StubTransport implements Transport {
  readonly calls: Array<{ url: string; options: FetchOptions }> = [];

  inFlight = 0;

  maxInFlight = 0;

  closed = false;

  private readonly counts = new Map<string, number>();

  constructor(private readonly options: StubTransportOptions = {}) {}

  callsFor(url: string) {
    return this.counts.get(url) ?? 0;
  }

  private pickRoute(url: string, call: number): StubRoute {
    const route = this.options.routes?.[url];
    if (Array.isArray(route)) {
      return route[Math.min(call, route.length - 1)] ?? {};
    }
    return route ?? this.options.fallback ?? {};
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<ProbeResponse> {
    const call = this.callsFor(url);
    this.counts.set(url, call + 1);
    this.calls.push({ url, options });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.options.latencyMs) {
        await delay(this.options.latencyMs);
      }
      const route = this.pickRoute(url, call);
      const outcome = typeof route === "function" ? await route(url, options) : route;
      if (outcome instanceof Error) throw outcome;
      return makeResponse(url, outcome);
    } finally {
      this.inFlight -= 1;
    }
  }

  close() {
    this.closed = true;
  }
}
