import type { BuildRecord, SyncFlags, SyncPlan } from "./types.js";

export interface PlanInput {
  record: BuildRecord | null;
  /** Current fingerprint of every in-scope unit. */
  fingerprints: ReadonlyMap<string, string>;
  configFingerprint: string;
  embeddingVersion: string;
  flags: SyncFlags;
  now: Date;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Decide what a sync has to do. Pure: the same input always yields the same
 * plan and nothing is read or written. `dryRun` does not change the decision,
 * only whether the caller acts on it.
 */
export function planSync(input: PlanInput): SyncPlan {
  const { record, fingerprints, flags, now } = input;
  const allUnits = [...fingerprints.keys()].sort();
  const builtAt = record?.builtAt ?? null;
  const plan = (
    action: SyncPlan["action"],
    reason: SyncPlan["reason"],
    affectedUnits: string[],
  ): SyncPlan => ({ action, reason, affectedUnits, flags, builtAt });

  if (flags.force) return plan("rebuild", "force", allUnits);
  if (!record) return plan("rebuild", "no_record", allUnits);
  if (record.configFingerprint !== input.configFingerprint) {
    return plan("rebuild", "config_changed", allUnits);
  }
  if (record.embeddingVersion !== input.embeddingVersion) {
    return plan("rebuild", "embedding_changed", allUnits);
  }

  if (flags.maxAgeHours !== undefined) {
    const ageMs = now.getTime() - new Date(record.builtAt).getTime();
    if (ageMs > flags.maxAgeHours * HOUR_MS) return plan("incremental", "stale", allUnits);
  }

  const changed = allUnits.filter(
    (unitId) => record.unitFingerprints[unitId] !== fingerprints.get(unitId),
  );
  if (changed.length > 0) return plan("incremental", "content_changed", changed);

  return plan("skip", "up_to_date", []);
}
