import type { AnalysisModule } from "../scan/types";
import { clampScore } from "../utils";
import { extractScripts } from "./scripts";

interface VulnerableRange {
  /** Version prefixes considered outdated. */
  versions: string[];
  issues: string[];
}

export const VULNERABLE_VERSIONS: Record<string, VulnerableRange> = {
  jquery: {
    versions: ["1.0", "1.1", "1.2", "1.3", "1.4", "1.5", "1.6", "1.7", "1.8", "1.9", "2.0", "2.1"],
    issues: ["XSS", "DOM manipulation"],
  },
  angular: {
    versions: ["1.0", "1.1", "1.2", "1.3", "1.4", "1.5"],
    issues: ["XSS", "Template injection"],
  },
  bootstrap: {
    versions: ["2.0", "2.1", "2.2", "2.3", "3.0", "3.1", "3.2"],
    issues: ["XSS in tooltip/popover"],
  },
};

export type VulnerableLibrary = {
  library: string;
  version: string;
  url: string;
  vulnerabilities: string[];
  severity: "high" | "medium";
};

const matchesPrefix = (version: string, prefix: string) => version === prefix || version.startsWith(`${prefix}.`);

const toFinding = (library: string, version: string, url: string): VulnerableLibrary | null => {
  const range = VULNERABLE_VERSIONS[library];
  if (!range || !range.versions.some((prefix) => matchesPrefix(version, prefix))) return null;
  return {
    library,
    version,
    url,
    vulnerabilities: range.issues,
    severity: range.issues.length > 1 ? "high" : "medium",
  };
};

export const checkScriptUrl = (url: string): VulnerableLibrary | null => {
  const lowered = url.toLowerCase();
  for (const library of Object.keys(VULNERABLE_VERSIONS)) {
    if (!lowered.includes(library)) continue;
    const patterns = [
      new RegExp(`${library}[.-]?(\\d+(?:\\.\\d+)*)`),
      new RegExp(`${library}[/@-]v?(\\d+(?:\\.\\d+)*)`),
      new RegExp(`(\\d+(?:\\.\\d+)*)[.-]${library}`),
    ];
    for (const pattern of patterns) {
      const version = pattern.exec(lowered)?.[1];
      if (version) return toFinding(library, version, url);
    }
  }
  return null;
};

export const checkInlineScript = (source: string): VulnerableLibrary[] => {
  const findings: VulnerableLibrary[] = [];
  const jquery = /jQuery\s*v?(\d+(?:\.\d+)*)/i.exec(source)?.[1];
  if (jquery) {
    const finding = toFinding("jquery", jquery, "inline");
    if (finding) findings.push(finding);
  }
  const angular = /angular\.version\s*[=:]\s*["'](\d+(?:\.\d+)*)["']/.exec(source)?.[1];
  if (angular) {
    const finding = toFinding("angular", angular, "inline");
    if (finding) findings.push(finding);
  }
  return findings;
};

export const jsVulnModule: AnalysisModule = {
  name: "jsvuln",
  label: "Vulnerable JavaScript",
  description: "Flags outdated jQuery, AngularJS and Bootstrap builds referenced by the page.",
  priority: 150,
  fields: ["vulnerable_libraries", "total_vulnerabilities", "js_risk_score"],
  analyze: (response) => {
    const findings = extractScripts(response).flatMap((script) => {
      if (script.src) {
        const finding = checkScriptUrl(script.src);
        return finding ? [finding] : [];
      }
      return script.inline ? checkInlineScript(script.inline) : [];
    });
    const total = findings.reduce((sum, finding) => sum + finding.vulnerabilities.length, 0);
    return {
      vulnerable_libraries: findings,
      total_vulnerabilities: total,
      js_risk_score: clampScore(total * 10),
    };
  },
};
