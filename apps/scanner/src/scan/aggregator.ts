import { ConfigError } from "./errors";
import type { FieldValue, Host, PartialRecord, ProbeResponse, RecordError, ScanRecord, ScanResult } from "./types";

export type HostOutcome =
  | { ok: true; url: string; attempts: number; response: ProbeResponse }
  | { ok: false; url: string; attempts: number; error: RecordError };

/** One module's contribution for one host. `values` is null when the module failed. */
export interface ModulePartial {
  module: string;
  fields: readonly string[];
  values: PartialRecord | null;
  error: string | null;
}

const STATUS_MODULE = "status";

const resolveAccessible = (outcome: HostOutcome, partials: readonly ModulePartial[]) => {
  if (!outcome.ok) return false;
  const status = partials.find((partial) => partial.module === STATUS_MODULE);
  const flag = status?.values?.accessible;
  return typeof flag === "boolean" ? flag : true;
};

/**
 * Folds module partials into one record. Declared fields a module left out (or
 * could not compute) are present as null so every record of a scan carries the
 * same keys.
 */
export const mergePartials = (
  host: Pick<Host, "hostname">,
  outcome: HostOutcome,
  partials: readonly ModulePartial[],
): ScanRecord => {
  const fields: Record<string, FieldValue> = {};
  const moduleErrors: Record<string, string> = {};

  if (outcome.ok) {
    const owners = new Map<string, string>();
    for (const partial of partials) {
      for (const field of partial.fields) {
        const owner = owners.get(field);
        if (owner) {
          throw new ConfigError(`Field "${field}" is declared by both ${owner} and ${partial.module}`);
        }
        owners.set(field, partial.module);
        fields[field] = partial.values?.[field] ?? null;
      }
      if (partial.error) {
        moduleErrors[partial.module] = partial.error;
      }
    }
  }

  return {
    host: host.hostname,
    url: outcome.url,
    accessible: resolveAccessible(outcome, partials),
    error: outcome.ok ? null : outcome.error,
    attempts: outcome.attempts,
    fields,
    moduleErrors,
  };
};

export interface ScanResultInput {
  scanId: string;
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
  modules: readonly string[];
  /** Indexed by input position; holes are hosts that never finished. */
  slots: ReadonlyArray<ScanRecord | undefined>;
}

export const buildScanResult = (input: ScanResultInput): ScanResult => {
  const records = input.slots.filter((record): record is ScanRecord => record !== undefined);
  return {
    scanId: input.scanId,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    durationMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    cancelled: input.cancelled,
    modules: [...input.modules],
    records,
    stats: {
      total: input.slots.length,
      completed: records.length,
      accessible: records.filter((record) => record.accessible).length,
      failed: records.filter((record) => record.error !== null).length,
    },
  };
};
