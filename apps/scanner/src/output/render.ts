import { cleanText } from "../utils";
import type { FieldValue, ScanRecord, ScanResult } from "../scan/types";

export type OutputFormat = "txt" | "json" | "csv";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["txt", "json", "csv"];

const BASE_COLUMNS = ["host", "url", "accessible", "attempts", "error_kind", "error_message"];

export const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

/** Flat, human readable rendering of one field value. Null becomes "-". */
export const formatFieldValue = (value: FieldValue): string => {
  if (value === null) return "-";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value) && value.every((item) => item === null || typeof item !== "object")) {
    return value.length ? value.map(formatFieldValue).join(", ") : "-";
  }
  return JSON.stringify(value);
};

/** Union of field names across records, in order of first appearance. */
export const collectFieldNames = (records: readonly ScanRecord[]) => {
  const names = new Set<string>();
  records.forEach((record) => {
    Object.keys(record.fields).forEach((name) => names.add(name));
  });
  return [...names];
};

const summaryLines = (result: ScanResult) => [
  `# hostsweep scan ${result.scanId}`,
  `# started ${result.startedAt}, finished ${result.finishedAt} (${result.durationMs}ms)`,
  `# modules: ${result.modules.join(", ") || "(none)"}`,
  `# hosts: ${result.stats.completed}/${result.stats.total} completed, ${result.stats.accessible} accessible, ${result.stats.failed} failed${result.cancelled ? " (cancelled)" : ""}`,
];

const recordLines = (record: ScanRecord) => {
  const lines = [`${record.url} [${record.accessible ? "UP" : "DOWN"}]`];
  if (record.error) {
    lines.push(`  error: ${record.error.kind}: ${record.error.message}`);
  }
  Object.entries(record.fields).forEach(([name, value]) => {
    lines.push(`  ${name}: ${formatFieldValue(value)}`);
  });
  Object.entries(record.moduleErrors).forEach(([module, message]) => {
    lines.push(`  module_error.${module}: ${message}`);
  });
  return lines;
};

export const renderText = (result: ScanResult) => {
  const blocks = [summaryLines(result).join("\n"), ...result.records.map((record) => recordLines(record).join("\n"))];
  return `${blocks.join("\n\n")}\n`;
};

export const renderJson = (result: ScanResult) => `${JSON.stringify(result, null, 2)}\n`;

export const escapeCsvCell = (value: string) => {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
};

const csvValue = (value: FieldValue | undefined): string => {
  if (value === undefined || value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
};

/** One row per record. Columns: record basics, every field seen, then module errors as JSON. */
export const renderCsv = (result: ScanResult) => {
  const fieldNames = collectFieldNames(result.records);
  const header = [...BASE_COLUMNS, ...fieldNames, "module_errors"];
  const rows = result.records.map((record) => [
    record.host,
    record.url,
    String(record.accessible),
    String(record.attempts),
    record.error?.kind ?? "",
    record.error?.message ?? "",
    ...fieldNames.map((name) => csvValue(record.fields[name])),
    Object.keys(record.moduleErrors).length ? JSON.stringify(record.moduleErrors) : "",
  ]);
  return `${[header, ...rows].map((row) => row.map(escapeCsvCell).join(",")).join("\n")}\n`;
};

const TABLE_HEADERS = ["HOST", "STATUS", "SERVER", "TITLE"];
const TITLE_WIDTH = 40;

const tableRow = (record: ScanRecord) => {
  const status = record.fields.status_code;
  const server = record.fields.server;
  const title = record.fields.title;
  return [
    record.host,
    typeof status === "number" ? String(status) : (record.error?.kind ?? "-"),
    typeof server === "string" ? server : "-",
    typeof title === "string" ? cleanText(title, TITLE_WIDTH) : "-",
  ];
};

/** Fixed-width console table for runs without an output file. */
export const renderTable = (records: readonly ScanRecord[]) => {
  const rows = [TABLE_HEADERS, ...records.map(tableRow)];
  const widths = TABLE_HEADERS.map((_, column) => Math.max(...rows.map((row) => row[column].length)));
  const format = (row: string[]) =>
    row
      .map((cell, column) => cell.padEnd(widths[column]))
      .join("  ")
      .trimEnd();
  const separator = widths.map((width) => "-".repeat(width)).join("  ");
  return [format(TABLE_HEADERS), separator, ...records.map((record) => format(tableRow(record)))].join("\n");
};
