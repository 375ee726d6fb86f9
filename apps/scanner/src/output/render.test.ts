import { describe, expect, it } from "vitest";
import type { FieldValue } from "../scan/types";
import { sampleResult } from "../test-utils/sample-result";
import { escapeCsvCell, formatFieldValue, renderCsv, renderJson, renderTable, renderText } from "./render";

const FIELD_CASES: Array<[FieldValue, string]> = [
  [null, "-"],
  ["nginx", "nginx"],
  [false, "false"],
  [[], "-"],
  [[1, "a", true], "1, a, true"],
  [{ a: 1 }, '{"a":1}'],
  [[{ a: 1 }], '[{"a":1}]'],
];

describe("formatFieldValue", () => {
  it.each(FIELD_CASES)("renders %j as %s", (value, expected) => {
    expect(formatFieldValue(value)).toBe(expected);
  });
});

describe("escapeCsvCell", () => {
  it("quotes only when needed", () => {
    expect(escapeCsvCell("plain")).toBe("plain");
    expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvCell("two\nlines")).toBe('"two\nlines"');
  });
});

describe("renderText", () => {
  it("prints a summary header and one block per record", () => {
    expect(renderText(sampleResult)).toBe(
      [
        "# hostsweep scan scan-0001",
        "# started 2026-01-02T03:04:05.000Z, finished 2026-01-02T03:04:06.500Z (1500ms)",
        "# modules: status, server, title, techstack",
        "# hosts: 3/3 completed, 2 accessible, 1 failed",
        "",
        "https://www.example.com/ [UP]",
        "  status_code: 200",
        "  server: nginx",
        "  title: Welcome, friends",
        "  technologies: nginx, php",
        "",
        "https://down.example.com/ [DOWN]",
        "  error: Timeout: timed out after 1000ms",
        "",
        "https://api.example.com/ [UP]",
        "  status_code: 404",
        "  server: -",
        "  title: -",
        "  technologies: -",
        "  module_error.robots: robots timed out after 20ms",
        "",
      ].join("\n"),
    );
  });

  it("marks cancelled scans", () => {
    const text = renderText({ ...sampleResult, cancelled: true, records: [] });
    expect(text.split("\n")[3]).toBe("# hosts: 3/3 completed, 2 accessible, 1 failed (cancelled)");
  });
});

describe("renderCsv", () => {
  it("uses the union of fields as columns", () => {
    expect(renderCsv(sampleResult).split("\n")).toEqual([
      "host,url,accessible,attempts,error_kind,error_message,status_code,server,title,technologies,module_errors",
      'www.example.com,https://www.example.com/,true,1,,,200,nginx,"Welcome, friends","[""nginx"",""php""]",',
      "down.example.com,https://down.example.com/,false,3,Timeout,timed out after 1000ms,,,,,",
      'api.example.com,https://api.example.com/,true,1,,,404,,,[],"{""robots"":""robots timed out after 20ms""}"',
      "",
    ]);
  });
});

describe("renderJson", () => {
  it("round-trips the result", () => {
    expect(JSON.parse(renderJson(sampleResult))).toEqual(sampleResult);
  });
});

describe("renderTable", () => {
  it("pads columns to the widest cell", () => {
    expect(renderTable(sampleResult.records).split("\n")).toEqual([
      "HOST              STATUS   SERVER  TITLE",
      "----------------  -------  ------  ----------------",
      "www.example.com   200      nginx   Welcome, friends",
      "down.example.com  Timeout  -       -",
      "api.example.com   404      -       -",
    ]);
  });
});
