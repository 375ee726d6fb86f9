import { ConfigError } from "../scan/errors";
import type { AnalysisModule } from "../scan/types";
import { authModule } from "./auth";
import { cnameModule } from "./cname";
import { faviconModule } from "./favicon";
import { jsModule } from "./js";
import { jsVulnModule } from "./jsvuln";
import { jwtModule } from "./jwt";
import { loginPanelsModule } from "./loginpanels";
import { portsModule } from "./ports";
import { responseTimeModule } from "./responsetime";
import { robotsModule } from "./robots";
import { serverModule } from "./server";
import { statusModule } from "./status";
import { techstackModule } from "./techstack";
import { titleModule } from "./title";
import { vhostModule } from "./vhost";

/** Every built-in module, in tie-break order. */
export const MODULE_REGISTRY: readonly AnalysisModule[] = [
  statusModule,
  serverModule,
  titleModule,
  techstackModule,
  responseTimeModule,
  faviconModule,
  robotsModule,
  jsModule,
  jsVulnModule,
  authModule,
  loginPanelsModule,
  jwtModule,
  cnameModule,
  vhostModule,
  portsModule,
];

export const listModules = () =>
  MODULE_REGISTRY.map(({ name, label, description, fields }) => ({ name, label, description, fields: [...fields] }));

export const getModule = (name: string) => MODULE_REGISTRY.find((module) => module.name === name.trim().toLowerCase());

export const resolveModules = (names: readonly string[]): AnalysisModule[] => {
  const unknown = names.filter((name) => !getModule(name));
  if (unknown.length) {
    throw new ConfigError(`Unknown module(s): ${unknown.join(", ")}`, unknown.map((name) => `modules: unknown module "${name}"`));
  }
  return names.flatMap((name) => {
    const module = getModule(name);
    return module ? [module] : [];
  });
};

/**
 * Orders modules by priority (stable, so equal priorities keep the order they
 * were given) and rejects duplicate names or colliding field names.
 */
export const prepareModules = (modules: readonly AnalysisModule[]): AnalysisModule[] => {
  const issues: string[] = [];
  const names = new Set<string>();
  const owners = new Map<string, string>();

  modules.forEach((module) => {
    if (names.has(module.name)) {
      issues.push(`module "${module.name}" is enabled more than once`);
      return;
    }
    names.add(module.name);
    module.fields.forEach((field) => {
      const owner = owners.get(field);
      if (owner) {
        issues.push(`field "${field}" is declared by both ${owner} and ${module.name}`);
      } else {
        owners.set(field, module.name);
      }
    });
  });

  if (issues.length) {
    throw new ConfigError(`Module configuration is invalid (${issues.join("; ")})`, issues);
  }

  return modules
    .map((module, index) => ({ module, index }))
    .sort((a, b) => a.module.priority - b.module.priority || a.index - b.index)
    .map(({ module }) => module);
};
