import type { AnalysisModule } from "../scan/types";

export const SECURITY_HEADERS = [
  "strict-transport-security",
  "content-security-policy",
  "x-frame-options",
  "x-content-type-options",
  "referrer-policy",
  "permissions-policy",
  "x-xss-protection",
] as const;

const SERVER_TYPES: Array<[RegExp, string]> = [
  [/openresty/i, "openresty"],
  [/nginx/i, "nginx"],
  [/apache-coyote|tomcat/i, "tomcat"],
  [/apache/i, "apache"],
  [/microsoft-iis/i, "iis"],
  [/litespeed/i, "litespeed"],
  [/cloudflare/i, "cloudflare"],
  [/caddy/i, "caddy"],
  [/gunicorn/i, "gunicorn"],
  [/envoy/i, "envoy"],
  [/akamaighost/i, "akamai"],
  [/^gws$|google frontend/i, "google"],
  [/amazons3/i, "amazon-s3"],
  [/awselb/i, "aws-elb"],
  [/jetty/i, "jetty"],
  [/lighttpd/i, "lighttpd"],
  [/cowboy/i, "cowboy"],
];

type CdnRule = { label: string; match: (headers: Record<string, string>) => boolean };

const CDN_WAF_RULES: CdnRule[] = [
  { label: "Cloudflare", match: (h) => "cf-ray" in h || /cloudflare/i.test(h.server ?? "") },
  { label: "Amazon CloudFront", match: (h) => "x-amz-cf-id" in h || /cloudfront/i.test(h.via ?? "") },
  { label: "Akamai", match: (h) => /akamai/i.test(h.server ?? "") || Object.keys(h).some((k) => k.startsWith("x-akamai")) },
  { label: "Fastly", match: (h) => "x-fastly-request-id" in h || /fastly/i.test(h["x-served-by"] ?? "") },
  { label: "Sucuri", match: (h) => "x-sucuri-id" in h },
  { label: "Imperva Incapsula", match: (h) => "x-iinfo" in h || /incap_ses/i.test(h["set-cookie"] ?? "") },
  { label: "Azure Front Door", match: (h) => "x-azure-ref" in h },
  { label: "Varnish", match: (h) => "x-varnish" in h },
];

export const classifyServer = (server: string | undefined) => {
  if (!server) return null;
  const match = SERVER_TYPES.find(([pattern]) => pattern.test(server));
  return match ? match[1] : "unknown";
};

export const detectCdnWaf = (headers: Record<string, string>) =>
  CDN_WAF_RULES.find((rule) => rule.match(headers))?.label ?? null;

export const serverModule: AnalysisModule = {
  name: "server",
  label: "Server & Security Headers",
  description: "Server header fingerprint, security header coverage and CDN/WAF hints.",
  priority: 20,
  fields: [
    "server",
    "server_type",
    "powered_by",
    "security_headers",
    "missing_security_headers",
    "security_score",
    "cdn_waf",
  ],
  analyze: ({ headers }) => {
    const present: Record<string, string> = {};
    const missing: string[] = [];
    SECURITY_HEADERS.forEach((name) => {
      const value = headers[name];
      if (value) {
        present[name] = value;
      } else {
        missing.push(name);
      }
    });

    return {
      server: headers.server ?? null,
      server_type: classifyServer(headers.server),
      powered_by: headers["x-powered-by"] ?? null,
      security_headers: present,
      missing_security_headers: missing,
      security_score: Math.round((Object.keys(present).length / SECURITY_HEADERS.length) * 100),
      cdn_waf: detectCdnWaf(headers),
    };
  },
};
