import type { AnalysisModule } from "../scan/types";

export type StatusCategory = "informational" | "success" | "redirect" | "client_error" | "server_error";

export const categorizeStatus = (statusCode: number): StatusCategory => {
  if (statusCode < 200) return "informational";
  if (statusCode < 300) return "success";
  if (statusCode < 400) return "redirect";
  if (statusCode < 500) return "client_error";
  return "server_error";
};

export const statusModule: AnalysisModule = {
  name: "status",
  label: "HTTP Status",
  description: "Status code, coarse category, scheme and final URL of the probe.",
  priority: 10,
  fields: ["status_code", "status_category", "accessible", "scheme", "ssl_enabled", "final_url", "response_size"],
  analyze: (response) => ({
    status_code: response.statusCode,
    status_category: categorizeStatus(response.statusCode),
    accessible: response.statusCode < 400,
    scheme: response.scheme,
    ssl_enabled: response.scheme === "https",
    final_url: response.finalUrl,
    response_size: response.body.length,
  }),
};
