import { describe, expect, it } from "vitest";
import { ModuleTimeoutError, ScanCancelledError } from "./errors";
import { runWithTimeout, sleep } from "./timing";

describe("sleep", () => {
  it("resolves after the delay", async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it("rejects straight away on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(ScanCancelledError);
  });

  it("rejects when aborted mid-wait", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow("Scan cancelled");
  });
});

describe("runWithTimeout", () => {
  it("passes the task's value through", async () => {
    await expect(runWithTimeout(async () => 42, 100, () => new Error("late"))).resolves.toBe(42);
  });

  it("passes the task's error through", async () => {
    await expect(
      runWithTimeout(
        async () => {
          throw new Error("broken");
        },
        100,
        () => new Error("late"),
      ),
    ).rejects.toThrow("broken");
  });

  it("rejects with the timeout error and aborts the task's signal", async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = runWithTimeout(
      (signal) => {
        seen.signal = signal;
        return new Promise<number>(() => undefined);
      },
      10,
      () => new ModuleTimeoutError("slow", 10),
    );

    await expect(pending).rejects.toThrow("slow timed out after 10ms");
    expect(seen.signal?.aborted).toBe(true);
  });

  it("rejects with ScanCancelledError when the parent signal aborts", async () => {
    const parent = new AbortController();
    const seen: { signal?: AbortSignal } = {};
    const pending = runWithTimeout(
      (signal) => {
        seen.signal = signal;
        return new Promise<number>(() => undefined);
      },
      10_000,
      () => new ModuleTimeoutError("slow", 10_000),
      parent.signal,
    );
    setTimeout(() => parent.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(ScanCancelledError);
    expect(seen.signal?.aborted).toBe(true);
  });

  it("never starts the task under an aborted parent", async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;

    await expect(
      runWithTimeout(
        async () => {
          started = true;
          return 1;
        },
        10_000,
        () => new Error("late"),
        parent.signal,
      ),
    ).rejects.toThrow("Scan cancelled");
    expect(started).toBe(false);
  });
});
