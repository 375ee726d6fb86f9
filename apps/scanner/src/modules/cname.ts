import { Resolver } from "node:dns/promises";
import { TtlCache } from "../cache";
import type { AnalysisModule, ScanConfig } from "../scan/types";

const MAX_CHAIN_DEPTH = 10;
const DNS_CACHE_TTL_MS = 5 * 60 * 1000;

export const TAKEOVER_SERVICES: Record<string, string> = {
  "amazonaws.com": "AWS S3/ELB",
  "cloudfront.net": "AWS CloudFront",
  "azurewebsites.net": "Azure Websites",
  "cloudapp.net": "Azure Cloud Services",
  "trafficmanager.net": "Azure Traffic Manager",
  "herokuapp.com": "Heroku",
  "herokudns.com": "Heroku",
  "github.io": "GitHub Pages",
  "netlify.com": "Netlify",
  "netlify.app": "Netlify",
  "vercel.app": "Vercel",
  "surge.sh": "Surge.sh",
  "bitbucket.io": "Bitbucket",
  "fastly.net": "Fastly CDN",
  "unbounce.com": "Unbounce",
  "helpjuice.com": "HelpJuice",
  "desk.com": "Salesforce Desk",
  "teamwork.com": "Teamwork",
  "zendesk.com": "Zendesk",
  "ghost.io": "Ghost",
  "myshopify.com": "Shopify",
  "wpengine.com": "WP Engine",
  "pantheonsite.io": "Pantheon",
};

/** DNS calls the module needs. */
export interface DnsLookup {
  resolveCname(hostname: string): Promise<string[]>;
  resolve4(hostname: string): Promise<string[]>;
}

export type CnameLink = {
  domain: string;
  cname: string;
  depth: number;
  resolved_ips: string[] | null;
  nxdomain: boolean;
  resolution_failed: boolean;
};

const errorCode = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && typeof error.code === "string" ? error.code : null;

const NO_RECORD_CODES = new Set(["ENODATA"]);
const NXDOMAIN_CODES = new Set(["ENOTFOUND", "NXDOMAIN"]);

export const resolveCnameChain = async (hostname: string, dns: DnsLookup): Promise<CnameLink[]> => {
  const chain: CnameLink[] = [];
  let current = hostname;

  while (chain.length < MAX_CHAIN_DEPTH) {
    let targets: string[];
    try {
      targets = await dns.resolveCname(current);
    } catch (error) {
      const code = errorCode(error);
      const last = chain.at(-1);
      if (!last) return chain;
      if (code && NO_RECORD_CODES.has(code)) {
        try {
          last.resolved_ips = await dns.resolve4(current);
        } catch (lookupError) {
          const lookupCode = errorCode(lookupError);
          last.nxdomain = lookupCode !== null && NXDOMAIN_CODES.has(lookupCode);
          last.resolution_failed = !last.nxdomain;
        }
      } else if (code && NXDOMAIN_CODES.has(code)) {
        last.nxdomain = true;
      } else {
        last.resolution_failed = true;
      }
      return chain;
    }

    const target = targets[0]?.replace(/\.$/, "");
    if (!target || chain.some((link) => link.domain === target)) return chain;
    chain.push({
      domain: current,
      cname: target,
      depth: chain.length,
      resolved_ips: null,
      nxdomain: false,
      resolution_failed: false,
    });
    current = target;
  }

  return chain;
};

export const assessTakeover = (chain: readonly CnameLink[]) => {
  for (const link of chain) {
    const entry = Object.entries(TAKEOVER_SERVICES).find(([suffix]) => link.cname === suffix || link.cname.endsWith(`.${suffix}`));
    if (!entry) continue;
    const dangling = link.nxdomain || link.resolution_failed;
    return {
      takeover_service: entry[1],
      takeover_possible: dangling,
      takeover_risk: dangling ? "high" : "medium",
    };
  }
  return { takeover_service: null, takeover_possible: false, takeover_risk: "low" };
};

/** Memoizes lookups so hosts sharing a CNAME target resolve it once. */
export const createCachedLookup = (dns: DnsLookup, ttlMs = DNS_CACHE_TTL_MS): DnsLookup => {
  const cache = new TtlCache<string[]>(ttlMs);
  return {
    resolveCname: (hostname) => cache.getOrLoad(`cname:${hostname}`, () => dns.resolveCname(hostname)),
    resolve4: (hostname) => cache.getOrLoad(`a:${hostname}`, () => dns.resolve4(hostname)),
  };
};

/** Builds the lookup one scan uses; tests swap the system resolver out here. */
export type DnsLookupFactory = (config: Readonly<ScanConfig>) => DnsLookup;

const systemLookup: DnsLookupFactory = (config) =>
  createCachedLookup(new Resolver({ timeout: config.timeoutMs, tries: 1 }));

export const createCnameModule = (createLookup: DnsLookupFactory = systemLookup): AnalysisModule => {
  // Keyed on the frozen config runScan hands every module, so each scan gets its own resolver and cache.
  const lookups = new WeakMap<Readonly<ScanConfig>, DnsLookup>();
  const lookupFor = (config: Readonly<ScanConfig>) => {
    const existing = lookups.get(config);
    if (existing) return existing;
    const lookup = createLookup(config);
    lookups.set(config, lookup);
    return lookup;
  };

  return {
    name: "cname",
    label: "CNAME Takeover",
    description: "Follows the CNAME chain and flags dangling records on takeover-prone services.",
    priority: 190,
    fields: ["cname_chain", "takeover_service", "takeover_possible", "takeover_risk"],
    analyze: async (_response, { host, config }) => {
      const chain = await resolveCnameChain(host.hostname, lookupFor(config));
      return { cname_chain: chain, ...assessTakeover(chain) };
    },
  };
};

export const cnameModule = createCnameModule();
