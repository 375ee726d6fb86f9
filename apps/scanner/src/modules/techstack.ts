import path from "node:path";
import fs from "fs-extra";
import { z } from "zod";
import { scannerRoot } from "../env";
import type { AnalysisModule } from "../scan/types";

const CATEGORIES = ["web_server", "language", "framework", "cms", "cdn", "security", "analytics", "frontend"] as const;

export type TechCategory = (typeof CATEGORIES)[number];

const signatureFileSchema = z.record(
  z.object({
    categories: z.array(z.enum(CATEGORIES)).min(1),
    patterns: z.array(z.string().min(1)).min(1),
  }),
);

export interface TechSignature {
  name: string;
  categories: TechCategory[];
  patterns: RegExp[];
}

export const TECH_SIGNATURES_PATH = path.join(scannerRoot, "data", "tech-signatures.json");

export const loadTechSignatures = (file = TECH_SIGNATURES_PATH): TechSignature[] => {
  const parsed = signatureFileSchema.parse(fs.readJSONSync(file));
  return Object.entries(parsed).map(([name, entry]) => ({
    name,
    categories: entry.categories,
    patterns: entry.patterns.map((pattern) => new RegExp(pattern, "i")),
  }));
};

let cachedSignatures: TechSignature[] | null = null;

const getSignatures = () => {
  cachedSignatures ??= loadTechSignatures();
  return cachedSignatures;
};

export const detectTechnologies = (
  headers: Record<string, string>,
  body: string,
  signatures: readonly TechSignature[] = getSignatures(),
) => {
  const headerText = Object.entries(headers)
    .map(([name, value]) => `${name}: ${value}`)
    .join("\n");
  const haystack = `${headerText}\n\n${body}`;

  const detected = signatures.filter((signature) => signature.patterns.some((pattern) => pattern.test(haystack)));
  const inCategory = (category: TechCategory) =>
    detected.filter((signature) => signature.categories.includes(category)).map((signature) => signature.name);
  const firstIn = (category: TechCategory) => inCategory(category)[0] ?? null;

  return {
    technologies: detected.map((signature) => signature.name),
    web_server: firstIn("web_server"),
    programming_language: firstIn("language"),
    framework: firstIn("framework"),
    cms: firstIn("cms"),
    cdn: firstIn("cdn"),
    security_products: inCategory("security"),
    analytics: inCategory("analytics"),
    frontend: inCategory("frontend"),
  };
};

export const techstackModule: AnalysisModule = {
  name: "techstack",
  label: "Technology Stack",
  description: "Signature matching over headers and body to group hosts by stack.",
  priority: 100,
  fields: [
    "technologies",
    "web_server",
    "programming_language",
    "framework",
    "cms",
    "cdn",
    "security_products",
    "analytics",
    "frontend",
  ],
  analyze: (response) => detectTechnologies(response.headers, response.bodyText),
};
