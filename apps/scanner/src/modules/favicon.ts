import { parseHTML } from "linkedom";
import { faviconHash, md5Hex } from "../hash";
import { describeError } from "../scan/errors";
import type { AnalysisModule, ModuleContext, ProbeResponse } from "../scan/types";
import { absoluteUrl, isHtmlContentType, unique } from "../utils";

export const FALLBACK_FAVICON_PATHS = [
  "/favicon.ico",
  "/favicon.png",
  "/apple-touch-icon.png",
  "/android-chrome-192x192.png",
  "/mstile-150x150.png",
];

/** Fingerprints for a handful of well-known default icons. */
export const KNOWN_FAVICON_HASHES: Record<string, string> = {
  "-1588080585": "Apache HTTP Server",
  "1404073852": "nginx",
  "708578229": "Microsoft IIS",
  "-235893395": "WordPress",
  "1942532096": "Django",
  "-343656283": "Flask",
  "81166609": "Amazon S3",
  "-1152842768": "Google Cloud",
  "1379923932": "Microsoft Azure",
  "-1194133913": "Cloudflare",
  "1011053026": "Drupal",
  "-1506969290": "Joomla",
  "1335392324": "Magento",
  "-1278104634": "Shopify",
  "566218143": "Splunk",
  "-1025300011": "Kibana",
  "394490493": "Grafana",
  "-1347968860": "pfSense",
};

const ICON_SELECTOR = 'link[rel~="icon"], link[rel="shortcut icon"], link[rel="apple-touch-icon"]';

export const collectFaviconCandidates = (response: ProbeResponse) => {
  const declared: string[] = [];
  if (isHtmlContentType(response.headers["content-type"]) && response.bodyText.trim()) {
    const { document } = parseHTML(response.bodyText);
    Array.from(document.querySelectorAll(ICON_SELECTOR)).forEach((node) => {
      const href = absoluteUrl(node.getAttribute("href"), response.finalUrl);
      if (href && /^https?:/.test(href)) declared.push(href);
    });
  }
  const fallbacks = FALLBACK_FAVICON_PATHS.map((path) => new URL(path, response.finalUrl).toString());
  return unique([...declared, ...fallbacks]);
};

const EMPTY = {
  favicon_url: null,
  favicon_hash: null,
  favicon_md5: null,
  favicon_size: null,
  favicon_match: null,
};

const fetchIcon = async (url: string, { transport, signal, logger }: ModuleContext) => {
  try {
    const icon = await transport.fetch(url, { signal });
    if (icon.statusCode !== 200 || icon.body.length === 0) return null;
    return icon;
  } catch (error) {
    if (signal.aborted) throw error;
    logger.debug(`favicon candidate ${url} failed: ${describeError(error)}`);
    return null;
  }
};

export const faviconModule: AnalysisModule = {
  name: "favicon",
  label: "Favicon Hash",
  description: "Fetches the site icon and computes MurmurHash3/MD5 fingerprints.",
  priority: 120,
  fields: ["favicon_url", "favicon_hash", "favicon_md5", "favicon_size", "favicon_match"],
  analyze: async (response, context) => {
    for (const candidate of collectFaviconCandidates(response)) {
      const icon = await fetchIcon(candidate, context);
      if (!icon) continue;
      const hash = faviconHash(icon.body);
      return {
        favicon_url: candidate,
        favicon_hash: hash,
        favicon_md5: md5Hex(icon.body),
        favicon_size: icon.body.length,
        favicon_match: KNOWN_FAVICON_HASHES[String(hash)] ?? null,
      };
    }
    return EMPTY;
  },
};
