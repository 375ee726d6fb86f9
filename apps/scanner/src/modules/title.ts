import { load, type CheerioAPI } from "cheerio";
import type { AnalysisModule, ProbeResponse } from "../scan/types";
import { cleanText, isHtmlContentType } from "../utils";

type FrameworkMarker = { name: string; body?: RegExp; header?: [string, RegExp] };

const FRAMEWORK_MARKERS: FrameworkMarker[] = [
  { name: "Next.js", body: /__NEXT_DATA__|\/_next\/static\//, header: ["x-powered-by", /next\.js/i] },
  { name: "Nuxt", body: /__NUXT__|\/_nuxt\// },
  { name: "Gatsby", body: /___gatsby/ },
  { name: "React", body: /data-reactroot|react-dom/i },
  { name: "Angular", body: /ng-version=|ng-app/ },
  { name: "Vue.js", body: /data-v-[0-9a-f]{6,}|vue(?:\.min)?\.js/i },
  { name: "Svelte", body: /svelte-[a-z0-9]{5,}/ },
  { name: "WordPress", body: /wp-content|wp-includes/ },
  { name: "Drupal", body: /Drupal\.settings|\/sites\/default\/files/, header: ["x-generator", /drupal/i] },
  { name: "Laravel", header: ["set-cookie", /laravel_session/i] },
  { name: "Django", body: /csrfmiddlewaretoken/, header: ["set-cookie", /csrftoken/i] },
  { name: "Express", header: ["x-powered-by", /express/i] },
  { name: "ASP.NET", body: /__VIEWSTATE/, header: ["x-aspnet-version", /./] },
  { name: "Ruby on Rails", body: /csrf-param[^>]*authenticity_token/ },
];

const metaContent = ($: CheerioAPI, selector: string) => cleanText($(selector).first().attr("content"));

export const extractTitle = ($: CheerioAPI) =>
  cleanText($("title").first().text()) ||
  metaContent($, 'meta[property="og:title"]') ||
  metaContent($, 'meta[name="twitter:title"]');

export const extractDescription = ($: CheerioAPI) =>
  metaContent($, 'meta[name="description"]') ||
  metaContent($, 'meta[property="og:description"]') ||
  metaContent($, 'meta[name="twitter:description"]');

export const detectFrameworks = (body: string, headers: Record<string, string>) =>
  FRAMEWORK_MARKERS.filter((marker) => {
    if (marker.body?.test(body)) return true;
    if (marker.header) {
      const [name, pattern] = marker.header;
      const value = headers[name];
      return value !== undefined && pattern.test(value);
    }
    return false;
  }).map((marker) => marker.name);

const readContentLength = (response: ProbeResponse) => {
  const declared = Number.parseInt(response.headers["content-length"] ?? "", 10);
  return Number.isFinite(declared) ? declared : response.body.length;
};

export const titleModule: AnalysisModule = {
  name: "title",
  label: "Page Title & Content",
  description: "HTML title and description, content metadata and framework markers.",
  priority: 30,
  fields: ["title", "title_length", "has_title", "description", "content_type", "content_length", "frameworks"],
  analyze: (response) => {
    const contentType = response.headers["content-type"];
    const base = {
      content_type: contentType ?? null,
      content_length: readContentLength(response),
      frameworks: detectFrameworks(response.bodyText, response.headers),
    };

    if (!isHtmlContentType(contentType) || !response.bodyText.trim()) {
      return { ...base, title: null, title_length: 0, has_title: false, description: null };
    }

    const $ = load(response.bodyText);
    const title = extractTitle($);
    const description = extractDescription($);
    return {
      ...base,
      title: title || null,
      title_length: title.length,
      has_title: title.length > 0,
      description: description || null,
    };
  },
};
