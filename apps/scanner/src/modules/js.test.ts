import { describe, expect, it } from "vitest";
import { createModuleContext } from "../test-utils/module-context";
import { makeResponse } from "../test-utils/stub-transport";
import { identifyLibrary, jsModule } from "./js";
import { checkInlineScript, checkScriptUrl, jsVulnModule } from "./jsvuln";

const page = makeResponse("https://www.example.com/shop/", {
  headers: { "content-type": "text/html" },
  body: [
    "<html><head>",
    '<script src="../static/jquery-1.8.3.min.js"></script>',
    '<script defer src="https://cdn.example.net/bootstrap/3.1.1/js/bootstrap.min.js"></script>',
    "<script>window.dataLayer = [];</script>",
    '<script async src="app.js"></script>',
    "</head><body></body></html>",
  ].join(""),
});

describe("identifyLibrary", () => {
  it("reads the version from the file name", () => {
    expect(identifyLibrary("https://www.example.com/js/vue-2.6.14.js")).toEqual({
      library: "vue",
      version: "2.6.14",
      url: "https://www.example.com/js/vue-2.6.14.js",
    });
    expect(identifyLibrary("https://www.example.com/js/main.js")).toBeNull();
  });
});

describe("jsModule", () => {
  it("inventories external and inline scripts", async () => {
    expect(await jsModule.analyze(page, createModuleContext())).toEqual({
      js_files: [
        { url: "https://www.example.com/static/jquery-1.8.3.min.js", async: false, defer: false },
        { url: "https://cdn.example.net/bootstrap/3.1.1/js/bootstrap.min.js", async: false, defer: true },
        { url: "https://www.example.com/shop/app.js", async: true, defer: false },
      ],
      inline_js_count: 1,
      external_js_count: 3,
      js_libraries: [
        { library: "jquery", version: "1.8.3", url: "https://www.example.com/static/jquery-1.8.3.min.js" },
        { library: "bootstrap", version: null, url: "https://cdn.example.net/bootstrap/3.1.1/js/bootstrap.min.js" },
      ],
    });
  });

  it("ignores non-HTML responses", async () => {
    const response = makeResponse("https://www.example.com/api", {
      headers: { "content-type": "application/json" },
      body: '{"script":"<script src=x.js></script>"}',
    });
    const fields = await jsModule.analyze(response, createModuleContext());
    expect(fields.external_js_count).toBe(0);
    expect(fields.inline_js_count).toBe(0);
  });
});

describe("checkScriptUrl", () => {
  it("reads versions from paths as well as file names", () => {
    expect(checkScriptUrl("https://cdn.example.net/bootstrap/3.1.1/js/bootstrap.min.js")).toEqual({
      library: "bootstrap",
      version: "3.1.1",
      url: "https://cdn.example.net/bootstrap/3.1.1/js/bootstrap.min.js",
      vulnerabilities: ["XSS in tooltip/popover"],
      severity: "medium",
    });
  });

  it("passes current releases", () => {
    expect(checkScriptUrl("https://www.example.com/js/jquery-3.7.1.min.js")).toBeNull();
  });
});

describe("checkInlineScript", () => {
  it("matches whole version prefixes only", () => {
    expect(checkInlineScript("/*! jQuery v1.12.4 | (c) jQuery Foundation */")).toEqual([]);
    expect(checkInlineScript("/*! jQuery v1.7.2 */")).toEqual([
      {
        library: "jquery",
        version: "1.7.2",
        url: "inline",
        vulnerabilities: ["XSS", "DOM manipulation"],
        severity: "high",
      },
    ]);
  });

  it("spots AngularJS version assignments", () => {
    const [finding] = checkInlineScript('angular.version = "1.5.8";');
    expect(finding?.library).toBe("angular");
    expect(finding?.vulnerabilities).toEqual(["XSS", "Template injection"]);
  });
});

describe("jsVulnModule", () => {
  it("totals vulnerabilities into a risk score", async () => {
    const fields = await jsVulnModule.analyze(page, createModuleContext());
    expect(fields.vulnerable_libraries).toEqual([
      {
        library: "jquery",
        version: "1.8.3",
        url: "https://www.example.com/static/jquery-1.8.3.min.js",
        vulnerabilities: ["XSS", "DOM manipulation"],
        severity: "high",
      },
      {
        library: "bootstrap",
        version: "3.1.1",
        url: "https://cdn.example.net/bootstrap/3.1.1/js/bootstrap.min.js",
        vulnerabilities: ["XSS in tooltip/popover"],
        severity: "medium",
      },
    ]);
    expect(fields.total_vulnerabilities).toBe(3);
    expect(fields.js_risk_score).toBe(30);
  });
});
