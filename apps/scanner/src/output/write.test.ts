import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { sampleResult } from "../test-utils/sample-result";
import { renderCsv, renderText } from "./render";
import { inferFormat, writeScanResult } from "./write";

describe("inferFormat", () => {
  it.each([
    ["scan.json", "json"],
    ["results/scan.CSV", "csv"],
    ["scan.txt", "txt"],
    ["scan.log", "txt"],
    ["scan", "txt"],
  ])("maps %s to %s", (file, format) => {
    expect(inferFormat(file)).toBe(format);
  });
});

describe("writeScanResult", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "hostsweep-write-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("writes JSON into directories it creates", async () => {
    const target = await writeScanResult(sampleResult, { file: path.join(dir, "nested", "scan.json") });
    expect(target).toBe(path.join(dir, "nested", "scan.json"));
    expect(await fs.readJSON(target)).toEqual(sampleResult);
  });

  it("writes CSV by extension", async () => {
    const target = await writeScanResult(sampleResult, { file: path.join(dir, "scan.csv") });
    expect(await fs.readFile(target, "utf8")).toBe(renderCsv(sampleResult));
  });

  it("lets an explicit format win over the extension", async () => {
    const target = await writeScanResult(sampleResult, { file: path.join(dir, "scan.json"), format: "txt" });
    expect(await fs.readFile(target, "utf8")).toBe(renderText(sampleResult));
  });
});
