import type { Logger } from "../logger";

export type TransportErrorKind = "Timeout" | "ConnectionRefused" | "TLSError" | "TooManyRedirects" | "Other";

export type FieldValue = string | number | boolean | null | FieldValue[] | { [key: string]: FieldValue };

export type PartialRecord = Record<string, FieldValue>;

export interface Host {
  /** Position in the caller's host list. */
  index: number;
  input: string;
  hostname: string;
  url: string;
  schemeInferred: boolean;
}

export interface ScanConfig {
  concurrency: number;
  timeoutMs: number;
  maxRetries: number;
  delayMs: number;
  ignoreSsl: boolean;
  followRedirects: boolean;
  userAgent: string | null;
  headers: Record<string, string>;
  modules: string[];
  httpFallback: boolean;
  maxBodyBytes: number;
  backoffBaseMs: number;
  backoffMultiplier: number;
  backoffMaxMs: number;
  moduleTimeoutMs: number;
}

export interface ProbeResponse {
  url: string;
  finalUrl: string;
  scheme: "http" | "https";
  statusCode: number;
  /** Lower-cased header names. */
  headers: Record<string, string>;
  body: Buffer;
  bodyText: string;
  truncated: boolean;
  elapsedMs: number;
  redirectUrls: string[];
}

export interface FetchOptions {
  method?: "GET" | "HEAD";
  headers?: Record<string, string>;
  signal?: AbortSignal;
  followRedirects?: boolean;
}

export interface Transport {
  fetch(url: string, options?: FetchOptions): Promise<ProbeResponse>;
  close?(): void | Promise<void>;
}

export interface ModuleContext {
  host: Host;
  config: Readonly<ScanConfig>;
  transport: Transport;
  signal: AbortSignal;
  logger: Logger;
}

export interface AnalysisModule {
  name: string;
  label: string;
  description: string;
  /** Lower runs first. Core modules use 10/20/30, extended modules 100 and up. */
  priority: number;
  fields: readonly string[];
  analyze(response: ProbeResponse, context: ModuleContext): PartialRecord | Promise<PartialRecord>;
}

export interface RecordError {
  kind: TransportErrorKind;
  message: string;
}

export interface ScanRecord {
  host: string;
  url: string;
  accessible: boolean;
  error: RecordError | null;
  attempts: number;
  fields: PartialRecord;
  moduleErrors: Record<string, string>;
}

export interface ScanStats {
  total: number;
  completed: number;
  accessible: number;
  failed: number;
}

export interface ScanResult {
  scanId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  cancelled: boolean;
  modules: string[];
  records: ScanRecord[];
  stats: ScanStats;
}

export interface ProgressEvent {
  completed: number;
  total: number;
  host: string;
  record: ScanRecord;
}

export type ProgressSink = (event: ProgressEvent) => void;
