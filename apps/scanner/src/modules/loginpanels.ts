import { load } from "cheerio";
import { describeError } from "../scan/errors";
import type { AnalysisModule, ModuleContext } from "../scan/types";
import { cleanText, isHtmlContentType, unique } from "../utils";
import { describeLoginForm, findLoginForms, type LoginForm } from "./forms";

export const ADMIN_PATHS = [
  "/admin",
  "/admin/login",
  "/admin/login.php",
  "/wp-admin",
  "/wp-login.php",
  "/administrator",
  "/login",
  "/login.php",
  "/signin",
  "/auth",
  "/panel",
  "/cpanel",
  "/control",
  "/dashboard",
];

const LOGIN_INDICATORS = [
  "login",
  "signin",
  "sign in",
  "log in",
  "authentication",
  "admin panel",
  "administrator",
  "control panel",
  "dashboard",
  "password",
  "username",
];

const PANEL_RESPONSE_CODES = new Set([200, 401, 403]);

export type LoginPanel = {
  url: string;
  type: string;
  title: string;
  forms: LoginForm[];
  form_count: number;
  requires_auth: boolean;
  discovered_path: string | null;
  status_code: number;
};

export const determinePanelType = (title: string, text: string, url: string) => {
  const lowerTitle = title.toLowerCase();
  const lowerUrl = url.toLowerCase();
  const has = (haystacks: string[], needles: string[]) =>
    needles.some((needle) => haystacks.some((haystack) => haystack.includes(needle)));

  if (has([lowerTitle, lowerUrl], ["wordpress", "wp-admin", "wp-login"])) return "WordPress Admin";
  if (has([lowerTitle, text], ["admin panel", "administrator", "control panel"])) return "Admin Panel";
  if (has([lowerTitle, lowerUrl], ["cpanel", "whm", "webhost"])) return "Hosting Panel";
  if (has([lowerTitle], ["phpmyadmin", "adminer", "database"])) return "Database Admin";
  if (has([lowerTitle], ["login", "sign in", "authentication"])) return "Login Page";
  return "Unknown Panel";
};

/** Returns a panel when the page reads like a login screen, otherwise null. */
export const analyzeLoginPage = (
  html: string,
  url: string,
  statusCode: number,
  discoveredPath: string | null,
): LoginPanel | null => {
  const $ = load(html);
  const title = cleanText($("title").first().text()) || "No Title";
  const text = $("body").text().toLowerCase();
  const forms = findLoginForms($).map((form) => describeLoginForm($, form));
  if (!forms.length && !LOGIN_INDICATORS.some((indicator) => text.includes(indicator))) return null;
  return {
    url,
    type: determinePanelType(title, text, url),
    title,
    forms,
    form_count: forms.length,
    requires_auth: statusCode === 401,
    discovered_path: discoveredPath,
    status_code: statusCode,
  };
};

const probePath = async (origin: string, path: string, { transport, signal, logger }: ModuleContext) => {
  const url = new URL(path, origin).toString();
  try {
    const response = await transport.fetch(url, { signal });
    if (!PANEL_RESPONSE_CODES.has(response.statusCode)) return null;
    const panel = isHtmlContentType(response.headers["content-type"])
      ? analyzeLoginPage(response.bodyText, response.finalUrl, response.statusCode, path)
      : null;
    if (panel) return panel;
    if (response.statusCode !== 401) return null;
    return {
      url: response.finalUrl,
      type: "HTTP Basic Auth",
      title: "Authentication Required",
      forms: [],
      form_count: 0,
      requires_auth: true,
      discovered_path: path,
      status_code: 401,
    } satisfies LoginPanel;
  } catch (error) {
    if (signal.aborted) throw error;
    logger.debug(`${url} unavailable: ${describeError(error)}`);
    return null;
  }
};

export const loginPanelsModule: AnalysisModule = {
  name: "loginpanels",
  label: "Login Panels",
  description: "Looks for login and admin panels on the landing page and common admin paths.",
  priority: 170,
  fields: ["login_panels", "admin_paths_found", "panel_types"],
  analyze: async (response, context) => {
    const panels: LoginPanel[] = [];
    if (response.statusCode === 200 && isHtmlContentType(response.headers["content-type"])) {
      const landing = analyzeLoginPage(response.bodyText, response.finalUrl, response.statusCode, null);
      if (landing) panels.push(landing);
    }

    const origin = new URL(response.finalUrl).origin;
    const discovered: LoginPanel[] = [];
    for (const path of ADMIN_PATHS) {
      const panel = await probePath(origin, path, context);
      if (panel) discovered.push(panel);
    }

    const all = [...panels, ...discovered];
    return {
      login_panels: all,
      admin_paths_found: discovered.flatMap((panel) => (panel.discovered_path ? [panel.discovered_path] : [])),
      panel_types: unique(all.map((panel) => panel.type)),
    };
  },
};
