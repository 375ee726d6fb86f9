import "./env";

export { runScan, type RunScanOptions } from "./scan/scheduler";
export { resolveScanConfig, validateScanConfig, type ScanConfigInput } from "./scan/config";
export { HttpTransport, classifyTransportError, buildRequestHeaders, type HttpTransportOptions } from "./scan/transport";
export { createRetryPolicy, computeBackoff, RETRYABLE_KINDS, type RetryPolicy, type RetryDecision } from "./scan/retry";
export {
  transition,
  initialHostTaskState,
  isTerminal,
  InvalidTransitionError,
  type HostTaskState,
  type HostTaskEvent,
} from "./scan/host-task";
export { mergePartials, buildScanResult, type HostOutcome, type ModulePartial } from "./scan/aggregator";
export { parseHostList, normalizeHost, normalizeHosts, isValidHostname } from "./scan/hosts";
export {
  ConfigError,
  TransportError,
  ModuleError,
  HostError,
  ScanCancelledError,
  ModuleTimeoutError,
} from "./scan/errors";
export { MODULE_REGISTRY, listModules, getModule, resolveModules, prepareModules } from "./modules/registry";
export { renderText, renderJson, renderCsv, renderTable, type OutputFormat } from "./output/render";
export { writeScanResult, inferFormat, type WriteOptions } from "./output/write";
export { createLogger, noopLogger, type Logger, type LoggerOptions } from "./logger";
export type * from "./scan/types";
