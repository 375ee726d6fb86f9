import { load } from "cheerio";
import type { AnalysisModule } from "../scan/types";
import { isHtmlContentType, unique } from "../utils";
import { findLoginForms } from "./forms";

export const AUTH_HEADERS: Record<string, string> = {
  "www-authenticate": "HTTP Basic/Digest",
  authorization: "Bearer/API Key",
  "x-auth-token": "Token Authentication",
  "set-cookie": "Session Authentication",
};

const SSO_PATTERNS = [/oauth/, /\bsaml\b/, /\bsso\b/, /login[^<]{0,40}google/, /login[^<]{0,40}facebook/, /login[^<]{0,40}microsoft/];

export const authModule: AnalysisModule = {
  name: "auth",
  label: "Authentication",
  description: "Detects login forms, auth challenge headers and SSO hints.",
  priority: 160,
  fields: ["has_auth", "auth_types", "login_forms", "auth_headers", "requires_auth"],
  analyze: (response) => {
    const authTypes: string[] = [];
    const authHeaders = Object.keys(AUTH_HEADERS).filter((header) => header in response.headers);
    authHeaders.forEach((header) => authTypes.push(AUTH_HEADERS[header]));

    let loginForms = 0;
    if (isHtmlContentType(response.headers["content-type"]) && response.bodyText.trim()) {
      loginForms = findLoginForms(load(response.bodyText)).length;
      if (loginForms > 0) authTypes.push("Form Authentication");
      const lowered = response.bodyText.toLowerCase();
      if (SSO_PATTERNS.some((pattern) => pattern.test(lowered))) authTypes.push("OAuth/SSO");
    }

    const requiresAuth = response.statusCode === 401;
    return {
      has_auth: requiresAuth || authTypes.length > 0,
      auth_types: unique(authTypes),
      login_forms: loginForms,
      auth_headers: authHeaders,
      requires_auth: requiresAuth,
    };
  },
};
