import type { AnalysisModule, FieldValue } from "../scan/types";
import { toFieldValue, unique } from "../utils";

export const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

const HMAC_ALGORITHMS = new Set(["HS256", "HS384", "HS512"]);

export type DecodedJwt = {
  token: string;
  source: string;
  header: { [key: string]: FieldValue };
  payload: { [key: string]: FieldValue };
  signature: string;
};

const shorten = (value: string, length: number) => (value.length > length ? `${value.slice(0, length)}...` : value);

const decodeSegment = (segment: string): { [key: string]: FieldValue } | null => {
  try {
    const parsed = toFieldValue(JSON.parse(Buffer.from(segment, "base64url").toString("utf8")));
    return parsed !== null && typeof parsed === "object" && !Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

export const decodeJwt = (token: string, source: string): DecodedJwt | null => {
  const [headerPart, payloadPart, signature] = token.split(".");
  if (!headerPart || !payloadPart || signature === undefined) return null;
  const header = decodeSegment(headerPart);
  const payload = decodeSegment(payloadPart);
  if (!header || !payload) return null;
  return {
    token: shorten(token, 50),
    source,
    header,
    payload,
    signature: shorten(signature, 20),
  };
};

export const findJwtIssues = ({ header, payload }: Pick<DecodedJwt, "header" | "payload">) => {
  const issues: string[] = [];
  const algorithm = typeof header.alg === "string" ? header.alg.toUpperCase() : "";
  if (algorithm === "NONE") {
    issues.push("No signature algorithm (alg: none)");
  } else if (HMAC_ALGORITHMS.has(algorithm)) {
    issues.push("HMAC algorithm detected (shared secret)");
  }
  if (!payload.exp) issues.push("No expiration time (exp) claim");
  if (!payload.iat) issues.push("No issued at (iat) claim");
  if (!payload.aud) issues.push("No audience (aud) claim");
  if (!payload.iss) issues.push("No issuer (iss) claim");
  return issues;
};

export const collectJwts = (headers: Record<string, string>, body: string) => {
  const seen = new Set<string>();
  const decoded: DecodedJwt[] = [];
  const scan = (text: string, source: string) => {
    for (const match of text.matchAll(JWT_PATTERN)) {
      const token = match[0];
      if (seen.has(token)) continue;
      seen.add(token);
      const jwt = decodeJwt(token, source);
      if (jwt) decoded.push(jwt);
    }
  };

  Object.entries(headers).forEach(([name, value]) => {
    if (/authorization|token|cookie/.test(name)) scan(value, `header:${name}`);
  });
  scan(body, "html_content");
  return decoded;
};

export const jwtModule: AnalysisModule = {
  name: "jwt",
  label: "JWT Tokens",
  description: "Finds JSON Web Tokens in headers and markup and flags weak claims.",
  priority: 180,
  fields: ["jwt_tokens", "jwt_count", "jwt_algorithms", "jwt_issues"],
  analyze: (response) => {
    const tokens = collectJwts(response.headers, response.bodyText);
    return {
      jwt_tokens: tokens,
      jwt_count: tokens.length,
      jwt_algorithms: unique(tokens.map((token) => (typeof token.header.alg === "string" ? token.header.alg : "unknown"))),
      jwt_issues: unique(tokens.flatMap(findJwtIssues)),
    };
  },
};
