import { nanoid } from "nanoid";
import { noopLogger, type Logger } from "../logger";
import { prepareModules, resolveModules } from "../modules/registry";
import { buildScanResult, mergePartials, type HostOutcome, type ModulePartial } from "./aggregator";
import { validateScanConfig } from "./config";
import { describeError, HostError, ModuleError, ModuleTimeoutError, ScanCancelledError } from "./errors";
import { initialHostTaskState, isTerminal, transition, type TerminalHostTaskState } from "./host-task";
import { normalizeHost, toHttpUrl } from "./hosts";
import { createRetryPolicy, type RetryPolicy } from "./retry";
import { runWithTimeout, sleep } from "./timing";
import { classifyTransportError, HttpTransport } from "./transport";
import type {
  AnalysisModule,
  Host,
  ProbeResponse,
  ProgressSink,
  ScanConfig,
  ScanRecord,
  ScanResult,
  Transport,
} from "./types";

export interface RunScanOptions {
  /** Explicit module instances; defaults to the registry entries named in `config.modules`. */
  modules?: readonly AnalysisModule[];
  transport?: Transport;
  retryPolicy?: RetryPolicy;
  onProgress?: ProgressSink;
  signal?: AbortSignal;
  logger?: Logger;
}

interface TaskEnv {
  config: Readonly<ScanConfig>;
  modules: readonly AnalysisModule[];
  transport: Transport;
  retryPolicy: RetryPolicy;
  signal: AbortSignal;
  logger: Logger;
}

type Entry = { input: string; host: Host | null };

const toEntry = (item: string | Host, index: number): Entry => {
  if (typeof item === "string") {
    return { input: item, host: normalizeHost(item, index) };
  }
  return { input: item.input, host: item.index === index ? item : Object.freeze({ ...item, index }) };
};

/** False when the scan was cancelled during the wait. */
const pause = async (ms: number, signal: AbortSignal) => {
  try {
    await sleep(ms, signal);
    return true;
  } catch (error) {
    if (error instanceof ScanCancelledError) return false;
    throw error;
  }
};

/**
 * Drives one attempt sequence against `url` through the host task state
 * machine. Resolves with a terminal state; never rejects on transport errors.
 */
const runAttempts = async (url: string, env: TaskEnv): Promise<TerminalHostTaskState> => {
  const { config, transport, retryPolicy, signal, logger } = env;
  let state = transition(initialHostTaskState(), { type: "start" }, retryPolicy);

  while (!isTerminal(state)) {
    if (signal.aborted) {
      state = transition(state, { type: "cancel" }, retryPolicy);
      continue;
    }

    if (state.status === "retry_wait") {
      logger.debug(`${url} attempt ${state.attempt} failed (${state.lastError.kind}), retrying in ${state.retryAfterMs}ms`);
      const waited = await pause(state.retryAfterMs, signal);
      state = transition(state, waited ? { type: "wait_elapsed" } : { type: "cancel" }, retryPolicy);
      continue;
    }

    if (config.delayMs > 0 && !(await pause(config.delayMs, signal))) {
      state = transition(state, { type: "cancel" }, retryPolicy);
      continue;
    }

    try {
      const response = await transport.fetch(url, { signal });
      state = transition(state, { type: "fetch_succeeded", response }, retryPolicy);
    } catch (error) {
      state = signal.aborted
        ? transition(state, { type: "cancel" }, retryPolicy)
        : transition(state, { type: "fetch_failed", error: classifyTransportError(error, url) }, retryPolicy);
    }
  }

  return state;
};

const runModule = async (
  module: AnalysisModule,
  response: ProbeResponse,
  host: Host,
  env: TaskEnv,
): Promise<ModulePartial> => {
  const logger = env.logger.child(module.name);
  try {
    const values = await runWithTimeout(
      (signal) =>
        Promise.resolve(module.analyze(response, { host, config: env.config, transport: env.transport, signal, logger })),
      env.config.moduleTimeoutMs,
      () => new ModuleTimeoutError(module.name, env.config.moduleTimeoutMs),
      env.signal,
    );
    const undeclared = Object.keys(values).filter((key) => !module.fields.includes(key));
    if (undeclared.length) {
      throw new ModuleError(module.name, `returned undeclared field(s) ${undeclared.join(", ")}`);
    }
    return { module: module.name, fields: module.fields, values, error: null };
  } catch (error) {
    if (!(error instanceof ScanCancelledError)) {
      logger.warn(`${host.hostname}: module failed`, error);
    }
    return { module: module.name, fields: module.fields, values: null, error: describeError(error) };
  }
};

/** Fetch with retries (and the optional plain-http fallback), then run every module. */
const scanHost = async (host: Host, env: TaskEnv): Promise<ScanRecord | undefined> => {
  let url = host.url;
  let attempts = 0;
  let state = await runAttempts(url, env);
  attempts += state.attempt;

  if (
    state.status === "failed" &&
    state.error.kind !== "Timeout" &&
    host.schemeInferred &&
    env.config.httpFallback &&
    host.url.startsWith("https:")
  ) {
    url = toHttpUrl(host);
    env.logger.debug(`${host.hostname}: https failed (${state.error.kind}), falling back to ${url}`);
    state = await runAttempts(url, env);
    attempts += state.attempt;
  }

  if (state.status === "cancelled") return undefined;

  if (state.status === "failed") {
    const failure = new HostError(state.error.kind, state.error.message, attempts);
    env.logger.debug(`${host.hostname}: giving up after ${failure.attempts} attempt(s) (${failure.kind})`);
    const outcome: HostOutcome = {
      ok: false,
      url,
      attempts: failure.attempts,
      error: { kind: failure.kind, message: failure.message },
    };
    return mergePartials(host, outcome, []);
  }

  // A host interrupted mid-analysis is dropped rather than reported with cancelled modules.
  const partials: ModulePartial[] = [];
  for (const module of env.modules) {
    if (env.signal.aborted) return undefined;
    partials.push(await runModule(module, state.response, host, env));
  }
  if (env.signal.aborted) return undefined;
  return mergePartials(host, { ok: true, url, attempts, response: state.response }, partials);
};

const invalidHostRecord = (input: string): ScanRecord => ({
  host: input.trim(),
  url: input.trim(),
  accessible: false,
  error: { kind: "Other", message: `Invalid host: ${input.trim() || "(empty)"}` },
  attempts: 0,
  fields: {},
  moduleErrors: {},
});

/**
 * Scans `hosts` with at most `config.concurrency` pipelines in flight. Records
 * come back in input order. Aborting `signal` stops new dispatches and cuts
 * in-flight fetches and modules short; hosts that never finished are left out
 * and the result is marked cancelled.
 */
export const runScan = async (
  hosts: ReadonlyArray<string | Host>,
  config: ScanConfig,
  options: RunScanOptions = {},
): Promise<ScanResult> => {
  const validated = validateScanConfig(config);
  const modules = prepareModules(options.modules ?? resolveModules(validated.modules));
  const logger = (options.logger ?? noopLogger).child("scheduler");
  const signal = options.signal ?? new AbortController().signal;
  const startedAt = new Date();
  const scanId = nanoid(12);

  const entries = hosts.map(toEntry);
  const slots = new Array<ScanRecord | undefined>(entries.length);
  const ownsTransport = !options.transport;
  const transport = options.transport ?? new HttpTransport(validated, { logger });
  const env: TaskEnv = {
    config: validated,
    modules,
    transport,
    retryPolicy: options.retryPolicy ?? createRetryPolicy(validated),
    signal,
    logger,
  };

  logger.info(
    `scan ${scanId}: ${entries.length} host(s), concurrency ${validated.concurrency}, modules ${modules.map((m) => m.name).join(", ") || "(none)"}`,
  );

  const queue = entries.map((_, index) => index);
  let completed = 0;

  const report = (record: ScanRecord) => {
    completed += 1;
    if (!options.onProgress) return;
    try {
      options.onProgress({ completed, total: entries.length, host: record.host, record });
    } catch (error) {
      logger.warn("progress listener threw", error);
    }
  };

  const processEntry = async (index: number) => {
    const entry = entries[index];
    if (!entry.host) {
      logger.warn(`skipping invalid host "${entry.input}"`);
      return invalidHostRecord(entry.input);
    }
    try {
      return await scanHost(entry.host, env);
    } catch (error) {
      logger.error(`${entry.host.hostname}: unexpected failure`, error);
      const outcome: HostOutcome = {
        ok: false,
        url: entry.host.url,
        attempts: 0,
        error: { kind: "Other", message: describeError(error) },
      };
      return mergePartials(entry.host, outcome, []);
    }
  };

  const workers = Array.from({ length: Math.min(validated.concurrency, queue.length) }, async () => {
    while (queue.length && !signal.aborted) {
      const index = queue.shift();
      if (index === undefined) break;
      const record = await processEntry(index);
      if (record) {
        slots[index] = record;
        report(record);
      }
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    if (ownsTransport) {
      await transport.close?.();
    }
  }

  const result = buildScanResult({
    scanId,
    startedAt,
    finishedAt: new Date(),
    cancelled: signal.aborted,
    modules: modules.map((module) => module.name),
    slots,
  });

  logger.info(
    `scan ${scanId} ${result.cancelled ? "cancelled" : "finished"}: ${result.stats.completed}/${result.stats.total} host(s), ${result.stats.accessible} accessible, ${result.stats.failed} failed`,
  );
  return result;
};
