import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs, type ParseArgsConfig } from "node:util";
import fs from "fs-extra";
import { createLogger, type Logger } from "./logger";
import { listModules, MODULE_REGISTRY } from "./modules/registry";
import { isOutputFormat, renderCsv, renderJson, renderTable, type OutputFormat } from "./output/render";
import { writeScanResult } from "./output/write";
import { resolveScanConfig, type ScanConfigInput } from "./scan/config";
import { MAX_CONCURRENCY } from "./scan/constants";
import { ConfigError, describeError } from "./scan/errors";
import { normalizeHosts, parseHostList } from "./scan/hosts";
import { runScan } from "./scan/scheduler";
import type { ProgressEvent, Transport } from "./scan/types";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

const MODULE_NAMES = MODULE_REGISTRY.map((module) => module.name);

const CLI_OPTIONS: NonNullable<ParseArgsConfig["options"]> = {
  input: { type: "string", short: "i" },
  output: { type: "string", short: "o" },
  format: { type: "string", short: "f" },
  modules: { type: "string", short: "m" },
  concurrency: { type: "string" },
  threads: { type: "string", short: "t" },
  timeout: { type: "string" },
  retries: { type: "string" },
  delay: { type: "string" },
  "user-agent": { type: "string" },
  header: { type: "string", short: "H", multiple: true },
  "no-follow-redirects": { type: "boolean" },
  "ignore-ssl": { type: "boolean" },
  "no-http-fallback": { type: "boolean" },
  verbose: { type: "boolean", short: "v" },
  silent: { type: "boolean", short: "s" },
  "log-file": { type: "string" },
  "list-modules": { type: "boolean" },
  help: { type: "boolean", short: "h" },
  ...Object.fromEntries(MODULE_NAMES.map((name) => [name, { type: "boolean" as const }])),
};

export const HELP_TEXT = `Usage: hostsweep [options] -i hosts.txt

Input and output:
  -i, --input FILE          host list, one per line (default: stdin)
  -o, --output FILE         write results to FILE instead of printing a table
  -f, --format FORMAT       txt, json or csv (default: from the output extension)

Modules:
  -m, --modules a,b,c       comma separated module names
  ${MODULE_NAMES.map((name) => `--${name}`).join(" ")}
  --list-modules            describe every module and exit
                            (status runs when no module is chosen)

Scanning:
  -t, --threads, --concurrency N   parallel hosts, at most ${MAX_CONCURRENCY}
  --timeout SECONDS         per request timeout
  --retries N               retries after a timeout or refused connection
  --delay SECONDS           pause before every request
  --user-agent UA           fixed user agent (default: rotate)
  -H, --header "Name: value" extra request header, repeatable
  --no-follow-redirects     keep the first response
  --ignore-ssl              skip certificate verification
  --no-http-fallback        never retry a bare host over plain http

Logging:
  -v, --verbose             debug output
  -s, --silent              no progress or log output
  --log-file FILE           append every log line to FILE
  -h, --help                show this help
`;

export interface CliOptions {
  input: string | null;
  output: string | null;
  format: OutputFormat | null;
  config: ScanConfigInput;
  verbose: boolean;
  silent: boolean;
  logFile: string | null;
  listModules: boolean;
  help: boolean;
  /** Non-fatal adjustments made while parsing, reported once a logger exists. */
  warnings: string[];
}

const readString = (values: Record<string, unknown>, key: string) => {
  const value = values[key];
  return typeof value === "string" ? value : null;
};

const readStrings = (values: Record<string, unknown>, key: string) => {
  const value = values[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
};

const readFlag = (values: Record<string, unknown>, key: string) => values[key] === true;

const readNumber = (values: Record<string, unknown>, key: string) => {
  const raw = readString(values, key);
  if (raw === null) return undefined;
  const parsed = Number(raw);
  if (!raw.trim() || !Number.isFinite(parsed)) {
    throw new ConfigError(`--${key} expects a number, got "${raw}"`);
  }
  return parsed;
};

const secondsToMs = (seconds: number | undefined) => (seconds === undefined ? undefined : Math.round(seconds * 1000));

const parseHeaders = (raw: readonly string[]) => {
  const headers: Record<string, string> = {};
  raw.forEach((entry) => {
    const separator = entry.indexOf(":");
    if (separator <= 0) {
      throw new ConfigError(`--header expects "Name: value", got "${entry}"`);
    }
    headers[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
  });
  return headers;
};

/** Parses argv into scan settings. Throws ConfigError on malformed flags. */
export const parseCliArgs = (argv: readonly string[]): CliOptions => {
  let values: Record<string, unknown>;
  try {
    ({ values } = parseArgs({ args: [...argv], options: CLI_OPTIONS, strict: true, allowPositionals: false }));
  } catch (error) {
    throw new ConfigError(describeError(error));
  }

  const warnings: string[] = [];
  const format = readString(values, "format");
  if (format !== null && !isOutputFormat(format)) {
    throw new ConfigError(`--format must be txt, json or csv, got "${format}"`);
  }

  const modules = [
    ...(readString(values, "modules") ?? "")
      .split(",")
      .map((name) => name.trim().toLowerCase())
      .filter(Boolean),
    ...MODULE_NAMES.filter((name) => readFlag(values, name)),
  ];

  let concurrency = readNumber(values, "concurrency") ?? readNumber(values, "threads");
  if (concurrency !== undefined && concurrency > MAX_CONCURRENCY) {
    warnings.push(`Concurrency ${concurrency} exceeds ${MAX_CONCURRENCY}, using ${MAX_CONCURRENCY}`);
    concurrency = MAX_CONCURRENCY;
  }

  const config: ScanConfigInput = {
    concurrency,
    timeoutMs: secondsToMs(readNumber(values, "timeout")),
    maxRetries: readNumber(values, "retries"),
    delayMs: secondsToMs(readNumber(values, "delay")),
    userAgent: readString(values, "user-agent") ?? undefined,
    headers: parseHeaders(readStrings(values, "header")),
    followRedirects: !readFlag(values, "no-follow-redirects"),
    ignoreSsl: readFlag(values, "ignore-ssl"),
    httpFallback: !readFlag(values, "no-http-fallback"),
    modules: modules.length ? [...new Set(modules)] : undefined,
  };

  return {
    input: readString(values, "input"),
    output: readString(values, "output"),
    format: format !== null && isOutputFormat(format) ? format : null,
    config,
    verbose: readFlag(values, "verbose"),
    silent: readFlag(values, "silent"),
    logFile: readString(values, "log-file"),
    listModules: readFlag(values, "list-modules"),
    help: readFlag(values, "help"),
    warnings,
  };
};

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  stdinIsTTY: boolean;
  /** Registers an interrupt handler and returns its disposer. */
  onInterrupt(handler: () => void): () => void;
  createLogger?: (options: { verbose: boolean; silent: boolean; logFile: string | null }) => Logger;
  /** Replaces the HTTP client, mainly for tests. */
  transport?: Transport;
}

const readProcessStdin = async () => {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  readStdin: readProcessStdin,
  stdinIsTTY: Boolean(process.stdin.isTTY),
  onInterrupt: (handler) => {
    process.once("SIGINT", handler);
    return () => {
      process.off("SIGINT", handler);
    };
  },
};

export const formatModuleList = () =>
  listModules()
    .map((module) => `${module.name.padEnd(12)} ${module.label}: ${module.description}`)
    .join("\n");

export const formatProgressLine = ({ completed, total, record }: ProgressEvent) => {
  const status = record.fields.status_code;
  let outcome: string;
  if (record.error) {
    outcome = `DOWN (${record.error.kind})`;
  } else if (typeof status === "number") {
    outcome = String(status);
  } else {
    outcome = record.accessible ? "UP" : "DOWN";
  }
  return `[${completed}/${total}] ${record.host} ${outcome}`;
};

const loadInput = async (options: CliOptions, io: CliIo) => {
  if (options.input) {
    try {
      return await fs.readFile(options.input, "utf8");
    } catch (error) {
      throw new ConfigError(`Unable to read input file ${options.input}: ${describeError(error)}`);
    }
  }
  if (io.stdinIsTTY) {
    throw new ConfigError("No hosts given: pass -i FILE or pipe a host list on stdin");
  }
  return io.readStdin();
};

/** Runs one scan from argv. Resolves with the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`${describeError(error)}\nRun with --help for usage.\n`);
    return EXIT_FAILURE;
  }

  if (options.help) {
    io.stdout(HELP_TEXT);
    return EXIT_OK;
  }
  if (options.listModules) {
    io.stdout(`${formatModuleList()}\n`);
    return EXIT_OK;
  }

  const loggerOptions = { verbose: options.verbose, silent: options.silent, logFile: options.logFile };
  const logger = (io.createLogger ?? createLogger)(loggerOptions).child("cli");
  options.warnings.forEach((warning) => logger.warn(warning));

  const controller = new AbortController();
  let interrupted = false;
  const dispose = io.onInterrupt(() => {
    interrupted = true;
    logger.warn("Interrupted, finishing in-flight hosts and writing partial results");
    controller.abort();
  });

  try {
    const config = resolveScanConfig(options.config);
    const { hosts, invalid } = normalizeHosts(parseHostList(await loadInput(options, io)));
    invalid.forEach((entry) => logger.warn(`Skipping invalid host "${entry}"`));
    if (!hosts.length) {
      throw new ConfigError("No valid hosts to scan");
    }

    const result = await runScan(hosts, config, {
      signal: controller.signal,
      logger,
      transport: io.transport,
      onProgress: (event) => {
        if (!options.silent) io.stderr(`${formatProgressLine(event)}\n`);
      },
    });

    if (options.output) {
      const target = await writeScanResult(result, { file: options.output, format: options.format ?? undefined });
      if (!options.silent) io.stderr(`Results written to ${target}\n`);
    } else if (options.format === "json") {
      io.stdout(renderJson(result));
    } else if (options.format === "csv") {
      io.stdout(renderCsv(result));
    } else {
      io.stdout(`${renderTable(result.records)}\n`);
    }

    if (!options.silent) {
      const { stats } = result;
      io.stderr(
        `Scanned ${stats.completed}/${stats.total} hosts in ${(result.durationMs / 1000).toFixed(1)}s: ${stats.accessible} accessible, ${stats.failed} failed\n`,
      );
    }
    return interrupted ? EXIT_INTERRUPTED : EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    dispose();
  }
}

const isEntryPoint = () => {
  const entry = process.argv[1];
  return Boolean(entry) && path.resolve(entry) === fileURLToPath(import.meta.url);
};

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("hostsweep failed", error);
      process.exitCode = EXIT_FAILURE;
    });
}
