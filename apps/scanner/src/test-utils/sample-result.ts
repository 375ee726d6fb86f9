import type { ScanResult } from "../scan/types";

export const sampleResult: ScanResult = {
  scanId: "scan-0001",
  startedAt: "2026-01-02T03:04:05.000Z",
  finishedAt: "2026-01-02T03:04:06.500Z",
  durationMs: 1500,
  cancelled: false,
  modules: ["status", "server", "title", "techstack"],
  records: [
    {
      host: "www.example.com",
      url: "https://www.example.com/",
      accessible: true,
      error: null,
      attempts: 1,
      fields: { status_code: 200, server: "nginx", title: "Welcome, friends", technologies: ["nginx", "php"] },
      moduleErrors: {},
    },
    {
      host: "down.example.com",
      url: "https://down.example.com/",
      accessible: false,
      error: { kind: "Timeout", message: "timed out after 1000ms" },
      attempts: 3,
      fields: {},
      moduleErrors: {},
    },
    {
      host: "api.example.com",
      url: "https://api.example.com/",
      accessible: true,
      error: null,
      attempts: 1,
      fields: { status_code: 404, server: null, title: null, technologies: [] },
      moduleErrors: { robots: "robots timed out after 20ms" },
    },
  ],
  stats: { total: 3, completed: 3, accessible: 2, failed: 1 },
};
