import { readEnvNumber, readEnvString } from "../env";

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 200;
export const MAX_REDIRECTS = 10;
export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export const DEFAULT_CONCURRENCY = readEnvNumber("HOSTSWEEP_CONCURRENCY") ?? 50;
export const DEFAULT_TIMEOUT_MS = readEnvNumber("HOSTSWEEP_TIMEOUT_MS") ?? 5000;
export const DEFAULT_RETRIES = readEnvNumber("HOSTSWEEP_RETRIES") ?? 3;
export const DEFAULT_DELAY_MS = readEnvNumber("HOSTSWEEP_DELAY_MS") ?? 0;
export const DEFAULT_USER_AGENT = readEnvString("HOSTSWEEP_USER_AGENT") ?? null;

export const DEFAULT_BACKOFF_BASE_MS = 1000;
export const DEFAULT_BACKOFF_MULTIPLIER = 2;
export const DEFAULT_BACKOFF_MAX_MS = 30_000;

export const DEFAULT_MODULES = ["status"];

export const USER_AGENT_POOL = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14.5; rv:127.0) Gecko/20100101 Firefox/127.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15",
];

export const ACCEPT_LANGUAGE_POOL = ["en-US,en;q=0.9", "en-GB,en;q=0.9", "en-US,en;q=0.8,es;q=0.6"];

export const DEFAULT_REQUEST_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "Accept-Encoding": "gzip, deflate, br",
  DNT: "1",
  "Upgrade-Insecure-Requests": "1",
};
