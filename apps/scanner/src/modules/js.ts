import type { AnalysisModule } from "../scan/types";
import { extractScripts } from "./scripts";

export const KNOWN_LIBRARIES = ["jquery", "angular", "react", "vue", "bootstrap"] as const;

export const identifyLibrary = (url: string) => {
  const filename = new URL(url).pathname.split("/").pop()?.toLowerCase() ?? "";
  const lowered = url.toLowerCase();
  const library = KNOWN_LIBRARIES.find((name) => lowered.includes(name));
  if (!library) return null;
  const version = new RegExp(`${library}[.-]?v?(\\d+(?:\\.\\d+)*)`).exec(filename)?.[1] ?? null;
  return { library, version, url };
};

export const jsModule: AnalysisModule = {
  name: "js",
  label: "JavaScript Files",
  description: "External and inline script inventory with well-known library detection.",
  priority: 140,
  fields: ["js_files", "inline_js_count", "external_js_count", "js_libraries"],
  analyze: (response) => {
    const scripts = extractScripts(response);
    const external = scripts.flatMap((script) =>
      script.src ? [{ url: script.src, async: script.async, defer: script.defer }] : [],
    );
    const libraries = external.flatMap((file) => {
      const library = identifyLibrary(file.url);
      return library ? [library] : [];
    });
    return {
      js_files: external,
      inline_js_count: scripts.filter((script) => script.inline !== null).length,
      external_js_count: external.length,
      js_libraries: libraries,
    };
  },
};
