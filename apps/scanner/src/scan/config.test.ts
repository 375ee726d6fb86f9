import { describe, expect, it } from "vitest";
import { resolveScanConfig, validateScanConfig } from "./config";
import { DEFAULT_CONCURRENCY, DEFAULT_RETRIES, DEFAULT_TIMEOUT_MS } from "./constants";
import { ConfigError } from "./errors";

describe("resolveScanConfig", () => {
  it("fills defaults and derives the module timeout", () => {
    const config = resolveScanConfig();
    expect(config.concurrency).toBe(DEFAULT_CONCURRENCY);
    expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.maxRetries).toBe(DEFAULT_RETRIES);
    expect(config.moduleTimeoutMs).toBe(DEFAULT_TIMEOUT_MS * 2);
    expect(config.modules).toEqual(["status"]);
    expect(config.followRedirects).toBe(true);
    expect(config.httpFallback).toBe(true);
    expect(config.maxBodyBytes).toBe(1024 * 1024);
  });

  it("freezes the result", () => {
    const config = resolveScanConfig({ headers: { "X-Team": "red" } });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.headers)).toBe(true);
  });

  it("normalizes and dedupes module names", () => {
    const config = resolveScanConfig({ modules: [" Status", "status", "TITLE"] });
    expect(config.modules).toEqual(["status", "title"]);
  });

  it("uses an explicit module timeout over the derived one", () => {
    expect(resolveScanConfig({ timeoutMs: 1500 }).moduleTimeoutMs).toBe(3000);
    expect(resolveScanConfig({ timeoutMs: 1500, moduleTimeoutMs: 200 }).moduleTimeoutMs).toBe(200);
  });

  it.each([
    [{ concurrency: 0 }, "concurrency: Number must be greater than or equal to 1"],
    [{ concurrency: 201 }, "concurrency: Number must be less than or equal to 200"],
    [{ concurrency: 2.5 }, "concurrency: Expected integer, received float"],
    [{ timeoutMs: 0, moduleTimeoutMs: 10 }, "timeoutMs: Number must be greater than 0"],
    [{ maxRetries: -1 }, "maxRetries: Number must be greater than or equal to 0"],
  ])("rejects %o", (input, issue) => {
    expect(() => resolveScanConfig(input)).toThrow(ConfigError);
    try {
      resolveScanConfig(input);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual([issue]);
        expect(error.message).toBe(`Invalid scan configuration (${issue})`);
      }
    }
  });

  it("rejects a blank user agent", () => {
    expect(() => resolveScanConfig({ userAgent: "   " })).toThrow(ConfigError);
  });
});

describe("validateScanConfig", () => {
  it("returns a frozen copy of a hand-built config", () => {
    const draft = { ...resolveScanConfig({ concurrency: 3 }) };
    const validated = validateScanConfig(draft);
    expect(validated).not.toBe(draft);
    expect(Object.isFrozen(validated)).toBe(true);
    expect(validated.concurrency).toBe(3);
  });

  it("re-checks frozen configs", () => {
    const config = resolveScanConfig();
    expect(validateScanConfig(config)).toBe(config);
    expect(() => validateScanConfig({ ...config, concurrency: 500 })).toThrow(ConfigError);
  });
});
