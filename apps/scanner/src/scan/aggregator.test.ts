import { describe, expect, it } from "vitest";
import { makeResponse } from "../test-utils/stub-transport";
import { buildScanResult, mergePartials, type HostOutcome, type ModulePartial } from "./aggregator";
import { ConfigError } from "./errors";
import type { ScanRecord } from "./types";

const host = { hostname: "www.example.com" };
const url = "https://www.example.com/";
const ok: HostOutcome = { ok: true, url, attempts: 1, response: makeResponse(url) };

const partial = (module: string, fields: string[], values: ModulePartial["values"], error: string | null = null) => ({
  module,
  fields,
  values,
  error,
});

describe("mergePartials", () => {
  it("unions module fields and fills the missing ones with null", () => {
    const record = mergePartials(host, ok, [
      partial("status", ["status_code", "accessible"], { status_code: 200, accessible: true }),
      partial("server", ["server", "powered_by"], { server: "nginx" }),
    ]);
    expect(record).toEqual({
      host: "www.example.com",
      url,
      accessible: true,
      error: null,
      attempts: 1,
      fields: { status_code: 200, accessible: true, server: "nginx", powered_by: null },
      moduleErrors: {},
    });
  });

  it("takes record accessibility from the status module", () => {
    const record = mergePartials(host, ok, [partial("status", ["status_code", "accessible"], { status_code: 503, accessible: false })]);
    expect(record.accessible).toBe(false);
  });

  it("nulls a failed module's fields and records its error", () => {
    const record = mergePartials(host, ok, [partial("title", ["title", "has_title"], null, "title timed out after 10ms")]);
    expect(record.fields).toEqual({ title: null, has_title: null });
    expect(record.moduleErrors).toEqual({ title: "title timed out after 10ms" });
    expect(record.accessible).toBe(true);
  });

  it("builds an error record for a failed host", () => {
    const failed: HostOutcome = { ok: false, url, attempts: 4, error: { kind: "Timeout", message: "timed out" } };
    expect(mergePartials(host, failed, [])).toEqual({
      host: "www.example.com",
      url,
      accessible: false,
      error: { kind: "Timeout", message: "timed out" },
      attempts: 4,
      fields: {},
      moduleErrors: {},
    });
  });

  it("refuses duplicate field owners", () => {
    expect(() =>
      mergePartials(host, ok, [partial("a", ["shared"], { shared: 1 }), partial("b", ["shared"], { shared: 2 })]),
    ).toThrow(ConfigError);
  });
});

describe("buildScanResult", () => {
  const record = (name: string, accessible: boolean, failed = false): ScanRecord => ({
    host: name,
    url: `https://${name}/`,
    accessible,
    error: failed ? { kind: "Other", message: "boom" } : null,
    attempts: 1,
    fields: {},
    moduleErrors: {},
  });

  it("keeps input order, skips unfinished slots and counts stats", () => {
    const startedAt = new Date("2026-01-01T00:00:00.000Z");
    const finishedAt = new Date("2026-01-01T00:00:02.500Z");
    const result = buildScanResult({
      scanId: "scan-1",
      startedAt,
      finishedAt,
      cancelled: true,
      modules: ["status"],
      slots: [record("a.example.com", true), undefined, record("c.example.com", false, true), record("d.example.com", false)],
    });

    expect(result.records.map((entry) => entry.host)).toEqual(["a.example.com", "c.example.com", "d.example.com"]);
    expect(result.stats).toEqual({ total: 4, completed: 3, accessible: 1, failed: 1 });
    expect(result.startedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(result.durationMs).toBe(2500);
    expect(result.cancelled).toBe(true);
  });
});
