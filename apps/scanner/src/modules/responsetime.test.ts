import { describe, expect, it } from "vitest";
import { createModuleContext } from "../test-utils/module-context";
import { makeResponse, StubTransport, transportError } from "../test-utils/stub-transport";
import { categorizeLatency, responseTimeModule } from "./responsetime";

const url = "https://www.example.com/";

describe("categorizeLatency", () => {
  it.each([
    [40, "excellent"],
    [250, "good"],
    [700, "fair"],
    [2000, "slow"],
    [4500, "very_slow"],
  ] as const)("buckets %ims as %s", (ms, category) => {
    expect(categorizeLatency(ms)).toBe(category);
  });
});

describe("responseTimeModule", () => {
  it("averages the probe with two follow-up samples", async () => {
    const transport = new StubTransport({ fallback: { elapsedMs: 5 } });
    const response = makeResponse(url, { elapsedMs: 40, finalUrl: "https://www.example.com/home" });

    const fields = await responseTimeModule.analyze(response, createModuleContext({ transport }));

    expect(fields).toEqual({
      response_time_ms: 40,
      latency_category: "excellent",
      response_times_ms: [40, 5, 5],
      average_response_time_ms: 16.67,
    });
    expect(transport.calls.map((call) => call.url)).toEqual([
      "https://www.example.com/home",
      "https://www.example.com/home",
    ]);
  });

  it("keeps the probe timing when samples fail", async () => {
    const transport = new StubTransport({ fallback: transportError("Timeout", url) });
    const response = makeResponse(url, { elapsedMs: 1500 });

    const fields = await responseTimeModule.analyze(response, createModuleContext({ transport }));

    expect(fields.response_times_ms).toEqual([1500]);
    expect(fields.latency_category).toBe("slow");
    expect(fields.average_response_time_ms).toBe(1500);
  });
});
