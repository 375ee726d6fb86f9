import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));
export const scannerRoot = path.resolve(moduleDir, "..");

const envFiles = [path.join(scannerRoot, ".env"), path.resolve(process.cwd(), ".env")];

envFiles.forEach((envPath) => {
  if (fs.existsSync(envPath)) {
    loadEnv({ path: envPath, override: false });
  }
});

export const readEnvNumber = (name: string): number | undefined => {
  const raw = process.env[name]?.trim();
  if (!raw) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
};

export const readEnvString = (name: string): string | undefined => {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
};
