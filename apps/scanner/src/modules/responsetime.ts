import type { AnalysisModule } from "../scan/types";
import { describeError } from "../scan/errors";
import { formatNumber } from "../utils";

export type LatencyCategory = "excellent" | "good" | "fair" | "slow" | "very_slow";

/** Extra GETs on top of the scheduler's probe. */
export const EXTRA_SAMPLES = 2;

export const categorizeLatency = (ms: number): LatencyCategory => {
  if (ms < 100) return "excellent";
  if (ms < 300) return "good";
  if (ms < 1000) return "fair";
  if (ms < 3000) return "slow";
  return "very_slow";
};

export const responseTimeModule: AnalysisModule = {
  name: "responsetime",
  label: "Response Time",
  description: "Probe latency plus a couple of follow-up samples, bucketed into latency categories.",
  priority: 110,
  fields: ["response_time_ms", "latency_category", "response_times_ms", "average_response_time_ms"],
  analyze: async (response, { transport, signal, logger }) => {
    const samples = [response.elapsedMs];
    for (let index = 0; index < EXTRA_SAMPLES; index += 1) {
      try {
        const sample = await transport.fetch(response.finalUrl, { signal });
        samples.push(sample.elapsedMs);
      } catch (error) {
        if (signal.aborted) throw error;
        logger.debug(`sample ${index + 1} for ${response.finalUrl} failed: ${describeError(error)}`);
      }
    }
    const average = samples.reduce((sum, value) => sum + value, 0) / samples.length;
    return {
      response_time_ms: response.elapsedMs,
      latency_category: categorizeLatency(average),
      response_times_ms: samples,
      average_response_time_ms: formatNumber(average),
    };
  },
};
