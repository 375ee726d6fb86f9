import { load } from "cheerio";
import { describeError } from "../scan/errors";
import type { AnalysisModule, ModuleContext, ProbeResponse } from "../scan/types";
import { cleanText, isHtmlContentType, unique } from "../utils";

export const VHOST_PATTERNS = ["virtual host", "vhost", "shared hosting", "multiple domains", "domain parking"];

const SHARED_HOSTING_MARKERS = ["cpanel", "plesk", "shared hosting", "hosting provider"];
const PROXY_SERVERS = ["cloudflare", "nginx-proxy", "haproxy"];
const DOMAIN_PATTERN = /\b(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}\b/gi;
const LENGTH_TOLERANCE = 100;

export type VhostAlternative = {
  host: string;
  status: number;
  title: string;
  content_length: number;
};

export const alternateHostsFor = (hostname: string) => [
  "example.com",
  "test.local",
  "nonexistent.domain.com",
  `${hostname.replace(/\./g, "-")}.test`,
];

const pageTitle = (response: ProbeResponse) => {
  if (!isHtmlContentType(response.headers["content-type"]) || !response.bodyText.trim()) return "";
  return cleanText(load(response.bodyText)("title").first().text(), 100);
};

export const findVhostIndicators = (content: string) => {
  const lowered = content.toLowerCase();
  const indicators = VHOST_PATTERNS.filter((pattern) => lowered.includes(pattern));
  const domains = unique((content.match(DOMAIN_PATTERN) ?? []).map((domain) => domain.toLowerCase()));
  if (domains.length > 3) indicators.push("multiple_domains_in_content");
  return indicators;
};

export const classifyVhost = (response: ProbeResponse, alternatives: readonly VhostAlternative[]) => {
  if (alternatives.length > 2) return "wildcard_vhost";
  const lowered = response.bodyText.toLowerCase();
  if (SHARED_HOSTING_MARKERS.some((marker) => lowered.includes(marker))) return "shared_hosting";
  const server = (response.headers.server ?? "").toLowerCase();
  if (PROXY_SERVERS.some((proxy) => server.includes(proxy))) return "cdn_proxy_vhost";
  return "name_based_vhost";
};

const probeAlternate = async (
  response: ProbeResponse,
  baseline: { title: string; length: number },
  alternateHost: string,
  { transport, signal, logger }: ModuleContext,
): Promise<VhostAlternative | null> => {
  try {
    const probe = await transport.fetch(response.url, { headers: { Host: alternateHost }, signal });
    const title = pageTitle(probe);
    const differs =
      probe.statusCode !== response.statusCode ||
      Math.abs(probe.body.length - baseline.length) > LENGTH_TOLERANCE ||
      title !== baseline.title;
    return differs ? { host: alternateHost, status: probe.statusCode, title, content_length: probe.body.length } : null;
  } catch (error) {
    if (signal.aborted) throw error;
    logger.debug(`Host: ${alternateHost} probe failed: ${describeError(error)}`);
    return null;
  }
};

export const vhostModule: AnalysisModule = {
  name: "vhost",
  label: "Virtual Hosts",
  description: "Replays the probe with alternate Host headers to spot name-based virtual hosting.",
  priority: 200,
  fields: ["is_vhost", "vhost_type", "vhost_alternatives", "vhost_indicators"],
  analyze: async (response, context) => {
    const baseline = { title: pageTitle(response), length: response.body.length };
    const alternatives: VhostAlternative[] = [];
    for (const alternateHost of alternateHostsFor(context.host.hostname)) {
      const alternative = await probeAlternate(response, baseline, alternateHost, context);
      if (alternative) alternatives.push(alternative);
    }
    const isVhost = alternatives.length > 0;
    return {
      is_vhost: isVhost,
      vhost_type: isVhost ? classifyVhost(response, alternatives) : null,
      vhost_alternatives: alternatives,
      vhost_indicators: findVhostIndicators(response.bodyText),
    };
  },
};
