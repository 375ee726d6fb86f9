import { z } from "zod";
import {
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_BACKOFF_MULTIPLIER,
  DEFAULT_CONCURRENCY,
  DEFAULT_DELAY_MS,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MODULES,
  DEFAULT_RETRIES,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  MAX_CONCURRENCY,
  MIN_CONCURRENCY,
} from "./constants";
import { ConfigError } from "./errors";
import type { ScanConfig } from "./types";

const scanConfigSchema = z
  .object({
    concurrency: z.number().int().min(MIN_CONCURRENCY).max(MAX_CONCURRENCY),
    timeoutMs: z.number().positive().finite(),
    maxRetries: z.number().int().min(0),
    delayMs: z.number().min(0).finite(),
    ignoreSsl: z.boolean(),
    followRedirects: z.boolean(),
    userAgent: z.string().trim().min(1).nullable(),
    headers: z.record(z.string()),
    modules: z.array(z.string().trim().toLowerCase().min(1)),
    httpFallback: z.boolean(),
    maxBodyBytes: z.number().int().positive(),
    backoffBaseMs: z.number().min(0).finite(),
    backoffMultiplier: z.number().min(1).finite(),
    backoffMaxMs: z.number().min(0).finite(),
    moduleTimeoutMs: z.number().positive().finite(),
  })
  .strict();

export type ScanConfigInput = Partial<ScanConfig>;

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);

const parseConfig = (candidate: unknown): ScanConfig => {
  const parsed = scanConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid scan configuration (${issues.join("; ")})`, issues);
  }
  return parsed.data;
};

const freeze = (config: ScanConfig): Readonly<ScanConfig> =>
  Object.freeze({
    ...config,
    headers: Object.freeze({ ...config.headers }),
    modules: [...new Set(config.modules)],
  });

/**
 * Fills unset values from the environment-backed defaults and validates the
 * result. The returned object is frozen for the lifetime of the scan.
 */
export const resolveScanConfig = (input: ScanConfigInput = {}): Readonly<ScanConfig> => {
  const timeoutMs = input.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const candidate: ScanConfig = {
    concurrency: input.concurrency ?? DEFAULT_CONCURRENCY,
    timeoutMs,
    maxRetries: input.maxRetries ?? DEFAULT_RETRIES,
    delayMs: input.delayMs ?? DEFAULT_DELAY_MS,
    ignoreSsl: input.ignoreSsl ?? false,
    followRedirects: input.followRedirects ?? true,
    userAgent: input.userAgent ?? DEFAULT_USER_AGENT,
    headers: input.headers ?? {},
    modules: input.modules ?? DEFAULT_MODULES,
    httpFallback: input.httpFallback ?? true,
    maxBodyBytes: input.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
    backoffBaseMs: input.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS,
    backoffMultiplier: input.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER,
    backoffMaxMs: input.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS,
    moduleTimeoutMs: input.moduleTimeoutMs ?? timeoutMs * 2,
  };
  return freeze(parseConfig(candidate));
};

/** Re-checks a config that may have been assembled by hand. */
export const validateScanConfig = (config: ScanConfig): Readonly<ScanConfig> => {
  if (Object.isFrozen(config)) {
    parseConfig(config);
    return config;
  }
  return freeze(parseConfig(config));
};
