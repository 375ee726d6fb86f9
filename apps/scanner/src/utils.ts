import type { FieldValue } from "./scan/types";

export const clampScore = (value: number, min = 0, max = 100) => {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
};

export const normalizeHeaders = (headers: Record<string, string | string[] | undefined>): Record<string, string> => {
  const normalized: Record<string, string> = {};
  Object.entries(headers || {}).forEach(([key, value]) => {
    if (!key) return;
    const headerKey = key.toLowerCase();
    if (Array.isArray(value)) {
      normalized[headerKey] = value.join(", ");
    } else if (typeof value === "string") {
      normalized[headerKey] = value;
    }
  });
  return normalized;
};

export const formatNumber = (value: number | null | undefined, digits = 2) => {
  if (value == null || Number.isNaN(value)) return null;
  return Number(value.toFixed(digits));
};

export function absoluteUrl(rawHref: string | null | undefined, base: URL | string): string | null {
  if (!rawHref) {
    return null;
  }

  try {
    return new URL(rawHref, base).toString();
  } catch {
    return null;
  }
}

/** Collapses whitespace and caps the length, marking cut text with "...". */
export const cleanText = (text: string | null | undefined, maxLength = 200) => {
  if (!text) return "";
  const collapsed = text.replace(/\s+/g, " ").trim();
  if (collapsed.length <= maxLength) return collapsed;
  return `${collapsed.slice(0, maxLength - 3)}...`;
};

export const unique = <T>(values: Iterable<T>): T[] => Array.from(new Set(values));

export const isHtmlContentType = (contentType: string | undefined) => {
  if (!contentType) return true;
  const lowered = contentType.toLowerCase();
  return lowered.includes("html") || lowered.includes("xml") || lowered.includes("text/plain");
};

/** Narrows parsed JSON (or anything else) to a record-safe value. */
export const toFieldValue = (value: unknown): FieldValue => {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toFieldValue);
  if (typeof value === "object") {
    const result: { [key: string]: FieldValue } = {};
    Object.entries(value).forEach(([key, entry]) => {
      result[key] = toFieldValue(entry);
    });
    return result;
  }
  return null;
};
