import { XMLParser } from "fast-xml-parser";
import { describeError } from "../scan/errors";
import type { AnalysisModule, FieldValue, ModuleContext } from "../scan/types";
import { unique } from "../utils";

export const INTERESTING_KEYWORDS = [
  "admin",
  "login",
  "api",
  "private",
  "internal",
  "backup",
  "config",
  "test",
  "dev",
  "staging",
  "tmp",
  "temp",
  "secret",
  "hidden",
  "upload",
  "download",
  "logs",
  "phpmyadmin",
  "wp-admin",
  "wp-content",
  "database",
];

export const SITEMAP_PATHS = ["/sitemap.xml", "/sitemap_index.xml", "/sitemaps.xml", "/sitemap1.xml", "/sitemap.txt"];

const MAX_SITEMAP_CHECKS = 6;

export interface RobotsDirectives {
  userAgents: string[];
  disallowed: string[];
  allowed: string[];
  crawlDelay: number | null;
  sitemaps: string[];
}

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
});

export const parseRobotsTxt = (text: string): RobotsDirectives => {
  const directives: RobotsDirectives = { userAgents: [], disallowed: [], allowed: [], crawlDelay: null, sitemaps: [] };
  const add = (list: string[], value: string) => {
    if (value && !list.includes(value)) list.push(value);
  };

  text.split(/\r?\n/).forEach((raw) => {
    const line = raw.replace(/#.*$/, "").trim();
    const separator = line.indexOf(":");
    if (separator <= 0) return;
    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    switch (key) {
      case "user-agent":
        add(directives.userAgents, value);
        break;
      case "disallow":
        add(directives.disallowed, value);
        break;
      case "allow":
        add(directives.allowed, value);
        break;
      case "crawl-delay": {
        const delay = Number.parseFloat(value);
        if (Number.isFinite(delay)) directives.crawlDelay = delay;
        break;
      }
      case "sitemap":
        add(directives.sitemaps, value);
        break;
      default:
        break;
    }
  });

  return directives;
};

export const findInterestingPaths = (paths: readonly string[]) =>
  unique(paths.filter((path) => INTERESTING_KEYWORDS.some((keyword) => path.toLowerCase().includes(keyword))));

const asList = (value: unknown): unknown[] => {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null || value === "" ? [] : [value];
};

const readChild = (value: unknown, key: string): unknown =>
  typeof value === "object" && value !== null && key in value ? Reflect.get(value, key) : undefined;

/** Counts `<url>` and `<sitemap>` entries of an XML sitemap or sitemap index. */
export const countSitemapEntries = (xml: string) => {
  const parsed: unknown = xmlParser.parse(xml);
  return {
    urlCount: asList(readChild(readChild(parsed, "urlset"), "url")).length,
    sitemapCount: asList(readChild(readChild(parsed, "sitemapindex"), "sitemap")).length,
  };
};

const fetchText = async (url: string, { transport, signal, logger }: ModuleContext) => {
  try {
    const response = await transport.fetch(url, { signal });
    if (response.statusCode !== 200 || !response.bodyText.trim()) return null;
    return response.bodyText;
  } catch (error) {
    if (signal.aborted) throw error;
    logger.debug(`${url} unavailable: ${describeError(error)}`);
    return null;
  }
};

const describeSitemap = (url: string, text: string): FieldValue => {
  const isXml = /\.xml(?:$|\?)/i.test(url) || text.trimStart().startsWith("<");
  if (!isXml) {
    return { url, type: "txt", size: text.length, url_count: text.split(/\r?\n/).filter((line) => line.trim()).length };
  }
  const { urlCount, sitemapCount } = countSitemapEntries(text);
  return { url, type: "xml", size: text.length, url_count: urlCount, sitemap_count: sitemapCount };
};

export const robotsModule: AnalysisModule = {
  name: "robots",
  label: "robots.txt & Sitemaps",
  description: "Parses robots.txt directives and probes common sitemap locations.",
  priority: 130,
  fields: [
    "robots_accessible",
    "disallowed_paths",
    "allowed_paths",
    "crawl_delay",
    "sitemap_urls",
    "interesting_paths",
    "robots_user_agents",
    "sitemaps_found",
  ],
  analyze: async (response, context) => {
    const origin = new URL(response.finalUrl).origin;
    const robotsText = await fetchText(new URL("/robots.txt", origin).toString(), context);
    const directives = parseRobotsTxt(robotsText ?? "");

    const candidates = unique([
      ...directives.sitemaps.filter((url) => /^https?:\/\//i.test(url)),
      ...SITEMAP_PATHS.map((path) => new URL(path, origin).toString()),
    ]).slice(0, MAX_SITEMAP_CHECKS);

    const sitemapsFound: FieldValue[] = [];
    for (const url of candidates) {
      const text = await fetchText(url, context);
      if (text) sitemapsFound.push(describeSitemap(url, text));
    }

    return {
      robots_accessible: robotsText !== null,
      disallowed_paths: directives.disallowed,
      allowed_paths: directives.allowed,
      crawl_delay: directives.crawlDelay,
      sitemap_urls: directives.sitemaps,
      interesting_paths: findInterestingPaths([...directives.disallowed, ...directives.allowed]),
      robots_user_agents: directives.userAgents,
      sitemaps_found: sitemapsFound,
    };
  },
};
