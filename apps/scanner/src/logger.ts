import path from "node:path";
import fs from "fs-extra";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  logFile?: string | null;
  scope?: string;
  now?: () => Date;
}

export const formatLogLine = (timestamp: Date, level: LogLevel, scope: string, message: string) =>
  `[${timestamp.toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;

const describe = (error: unknown) => {
  if (error === undefined) return "";
  if (error instanceof Error) return `: ${error.message}`;
  return `: ${String(error)}`;
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const { verbose = false, silent = false, logFile = null, now = () => new Date() } = options;
  const scope = options.scope ?? "hostsweep";

  if (logFile) {
    fs.ensureDirSync(path.dirname(path.resolve(logFile)));
  }

  const emit = (level: LogLevel, message: string, error?: unknown) => {
    const line = formatLogLine(now(), level, scope, `${message}${describe(error)}`);
    if (logFile) {
      fs.appendFileSync(logFile, `${line}\n`);
    }
    if (silent) return;
    if (level === "debug" && !verbose) return;
    if (level === "info" && !verbose) return;
    if (level === "error") {
      console.error(line);
    } else {
      console.warn(line);
    }
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message, error) => emit("warn", message, error),
    error: (message, error) => emit("error", message, error),
    child: (childScope) => createLogger({ ...options, scope: `${scope}:${childScope}` }),
  };
};

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => noopLogger,
};
