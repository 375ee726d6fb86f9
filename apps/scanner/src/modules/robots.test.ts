import { describe, expect, it } from "vitest";
import { createModuleContext } from "../test-utils/module-context";
import { makeResponse, StubTransport } from "../test-utils/stub-transport";
import { countSitemapEntries, findInterestingPaths, parseRobotsTxt, robotsModule } from "./robots";

const ROBOTS = [
  "User-agent: *",
  "Disallow: /admin/",
  "Disallow: /search",
  "Allow: /public/",
  "Crawl-delay: 5",
  "Sitemap: https://www.example.com/sitemap.xml",
  "# staging mirror",
].join("\n");

const SITEMAP =
  '<?xml version="1.0"?><urlset><url><loc>https://www.example.com/a</loc></url><url><loc>https://www.example.com/b</loc></url></urlset>';

describe("parseRobotsTxt", () => {
  it("collects directives and ignores comments", () => {
    expect(parseRobotsTxt(`${ROBOTS}\nDisallow: /admin/ # again`)).toEqual({
      userAgents: ["*"],
      disallowed: ["/admin/", "/search"],
      allowed: ["/public/"],
      crawlDelay: 5,
      sitemaps: ["https://www.example.com/sitemap.xml"],
    });
  });
});

describe("findInterestingPaths", () => {
  it("keeps paths with sensitive keywords", () => {
    expect(findInterestingPaths(["/admin/", "/search", "/backup.zip", "/Admin/"])).toEqual([
      "/admin/",
      "/backup.zip",
      "/Admin/",
    ]);
  });
});

describe("countSitemapEntries", () => {
  it("counts urls and nested sitemaps", () => {
    expect(countSitemapEntries(SITEMAP)).toEqual({ urlCount: 2, sitemapCount: 0 });
    expect(
      countSitemapEntries("<sitemapindex><sitemap><loc>https://www.example.com/s1.xml</loc></sitemap></sitemapindex>"),
    ).toEqual({ urlCount: 0, sitemapCount: 1 });
  });
});

describe("robotsModule", () => {
  it("reports robots.txt contents and reachable sitemaps", async () => {
    const transport = new StubTransport({
      routes: {
        "https://www.example.com/robots.txt": { body: ROBOTS },
        "https://www.example.com/sitemap.xml": { body: SITEMAP },
      },
      fallback: { statusCode: 404 },
    });

    const fields = await robotsModule.analyze(makeResponse("https://www.example.com/"), createModuleContext({ transport }));

    expect(fields).toEqual({
      robots_accessible: true,
      disallowed_paths: ["/admin/", "/search"],
      allowed_paths: ["/public/"],
      crawl_delay: 5,
      sitemap_urls: ["https://www.example.com/sitemap.xml"],
      interesting_paths: ["/admin/"],
      robots_user_agents: ["*"],
      sitemaps_found: [
        { url: "https://www.example.com/sitemap.xml", type: "xml", size: SITEMAP.length, url_count: 2, sitemap_count: 0 },
      ],
    });
    expect(transport.calls).toHaveLength(6);
  });

  it("handles a missing robots.txt", async () => {
    const transport = new StubTransport({ fallback: { statusCode: 404 } });
    const fields = await robotsModule.analyze(makeResponse("https://www.example.com/"), createModuleContext({ transport }));
    expect(fields.robots_accessible).toBe(false);
    expect(fields.crawl_delay).toBeNull();
    expect(fields.sitemaps_found).toEqual([]);
  });
});
