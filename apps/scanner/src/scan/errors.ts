import type { TransportErrorKind } from "./types";

/** Fatal misconfiguration. Raised before any host is scheduled. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TransportError extends Error {
  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class ModuleError extends Error {
  constructor(
    readonly module: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${module}: ${message}`, options);
    this.name = "ModuleError";
  }
}

/** Terminal per-host failure once the attempt sequence is exhausted. */
export class HostError extends Error {
  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    readonly attempts: number,
  ) {
    super(message);
    this.name = "HostError";
  }
}

export class ScanCancelledError extends Error {
  constructor(message = "Scan cancelled") {
    super(message);
    this.name = "ScanCancelledError";
  }
}

export class ModuleTimeoutError extends Error {
  constructor(module: string, timeoutMs: number) {
    super(`${module} timed out after ${timeoutMs}ms`);
    this.name = "ModuleTimeoutError";
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
