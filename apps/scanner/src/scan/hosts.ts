import { isIP } from "node:net";
import type { Host } from "./types";

const LABEL_PATTERN = /^[a-z0-9_](?:[a-z0-9_-]{0,61}[a-z0-9_])?$/;

/** Splits raw input into candidate host strings, skipping blanks and `#` comments. */
export const parseHostList = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));

export const isValidHostname = (hostname: string) => {
  if (!hostname || hostname.length > 253) return false;
  if (isIP(hostname)) return true;
  if (hostname.startsWith("[") && hostname.endsWith("]")) {
    return isIP(hostname.slice(1, -1)) === 6;
  }
  const labels = hostname.split(".");
  if (labels.length < 2) return false;
  return labels.every((label) => LABEL_PATTERN.test(label));
};

/**
 * Turns a bare domain or URL into a Host. `https://` is assumed when no scheme
 * is given. Returns null for anything that is not an http(s) target.
 */
export const normalizeHost = (input: string, index: number): Host | null => {
  const trimmed = input.trim();
  if (!trimmed) return null;

  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed);
  if (hasScheme && !/^https?:\/\//i.test(trimmed)) return null;

  let parsed: URL;
  try {
    parsed = new URL(hasScheme ? trimmed : `https://${trimmed}`);
  } catch {
    return null;
  }

  const hostname = parsed.hostname.toLowerCase().replace(/\.+$/, "");
  if (!isValidHostname(hostname)) return null;

  parsed.hostname = hostname;
  parsed.hash = "";
  parsed.username = "";
  parsed.password = "";

  return Object.freeze({
    index,
    input: trimmed,
    hostname,
    url: parsed.toString(),
    schemeInferred: !hasScheme,
  });
};

/** Normalizes a list, keeping valid hosts densely indexed and reporting the rest. */
export const normalizeHosts = (inputs: readonly string[]) => {
  const hosts: Host[] = [];
  const invalid: string[] = [];
  inputs.forEach((input) => {
    const host = normalizeHost(input, hosts.length);
    if (host) {
      hosts.push(host);
    } else {
      invalid.push(input);
    }
  });
  return { hosts, invalid };
};

/** Same host with the scheme forced to plain http. */
export const toHttpUrl = (host: Host) => {
  const url = new URL(host.url);
  url.protocol = "http:";
  return url.toString();
};
