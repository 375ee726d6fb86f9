import { noopLogger } from "../logger";
import { resolveScanConfig } from "../scan/config";
import type { Host, ModuleContext } from "../scan/types";
import { StubTransport } from "./stub-transport";

export const testHost = (hostname = "www.example.com"): Host => ({
  index: 0,
  input: hostname,
  hostname,
  url: `https://${hostname}/`,
  schemeInferred: true,
});

export const createModuleContext = (overrides: Partial<ModuleContext> = {}): ModuleContext => ({
  host: testHost(),
  config: resolveScanConfig({ timeoutMs: 1000, userAgent: "hostsweep-test" }),
  transport: new StubTransport(),
  signal: new AbortController().signal,
  logger: noopLogger,
  ...overrides,
});
