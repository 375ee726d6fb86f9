import path from "node:path";
import fs from "fs-extra";
import type { ScanResult } from "../scan/types";
import { isOutputFormat, renderCsv, renderText, type OutputFormat } from "./render";

export interface WriteOptions {
  file: string;
  format?: OutputFormat;
}

/** Picks the format from the file extension, falling back to plain text. */
export const inferFormat = (file: string): OutputFormat => {
  const extension = path.extname(file).slice(1).toLowerCase();
  return isOutputFormat(extension) ? extension : "txt";
};

export async function writeScanResult(result: ScanResult, options: WriteOptions): Promise<string> {
  const target = path.resolve(options.file);
  const format = options.format ?? inferFormat(target);
  await fs.ensureDir(path.dirname(target));

  switch (format) {
    case "json":
      await fs.writeJSON(target, result, { spaces: 2 });
      break;
    case "csv":
      await fs.writeFile(target, renderCsv(result), "utf8");
      break;
    case "txt":
    default:
      await fs.writeFile(target, renderText(result), "utf8");
      break;
  }

  return target;
}
