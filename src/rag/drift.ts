import { DriftError } from "./errors.js";
import type { LocalPersistence } from "./local-store.js";
import { getLogger } from "./logger.js";
import type { VectorIndex } from "./vector-store.js";

const log = getLogger("drift");

export interface DriftReport {
  localCount: number;
  remoteCount: number;
  /** remote minus local */
  drift: number;
  withinTolerance: boolean;
}

/** Compare the local source of truth with the index. Reports only; nothing is repaired. */
export async function checkDrift(
  store: LocalPersistence,
  index: VectorIndex,
  tolerance = 0,
): Promise<DriftReport> {
  const [localCount, remoteCount] = await Promise.all([store.countChunks(), index.count()]);
  const drift = remoteCount - localCount;
  const report = { localCount, remoteCount, drift, withinTolerance: Math.abs(drift) <= tolerance };
  if (!report.withinTolerance) {
    log.warn(report, "vector index has drifted from local state");
  }
  return report;
}

export async function assertNoDrift(
  store: LocalPersistence,
  index: VectorIndex,
  tolerance = 0,
): Promise<DriftReport> {
  const report = await checkDrift(store, index, tolerance);
  if (!report.withinTolerance) {
    throw new DriftError(
      `Index holds ${report.remoteCount} chunks, local state ${report.localCount} (tolerance ${tolerance})`,
      { context: { ...report, tolerance } },
    );
  }
  return report;
}

/**
 * Re-upsert every locally stored unit into `index`. This is the explicit
 * repair for drift. Returns the number of chunks written.
 */
export async function restoreIndexFromLocal(
  store: LocalPersistence,
  index: VectorIndex,
): Promise<number> {
  let restored = 0;
  const units = await store.listUnits();
  for (const unitId of units) {
    const chunks = await store.load(unitId);
    if (chunks.length === 0) continue;
    await index.upsert(chunks);
    restored += chunks.length;
  }
  log.info({ units: units.length, chunks: restored }, "restored index from local state");
  return restored;
}
