import { configFingerprint, fingerprintUnit, type BuildStateStore } from "./build-state.js";
import { mapWithConcurrency } from "./concurrency.js";
import type { IndexingConfig } from "./config.js";
import { extractEntries, type ExtractionResult } from "./entries.js";
import { SyncFailedError, toUnitFailure, ValidationError, type UnitFailure } from "./errors.js";
import { getLogger } from "./logger.js";
import { unitIdFor, type PageIndexer } from "./page-indexer.js";
import { planSync } from "./sync-planner.js";
import type {
  BuildRecord,
  PageRef,
  SourceEntry,
  SourceUnit,
  SyncAction,
  SyncFlags,
  SyncPlan,
  SyncReason,
} from "./types.js";

const log = getLogger("sync");

/** Read side of the notebook service. */
export interface ContentSource {
  listPages(collectionId: string): Promise<PageRef[]>;
  /** Entries of one page in display order. */
  listEntries(page: PageRef): Promise<SourceEntry[]>;
}

export interface SyncScope {
  collectionIds?: string[];
  /** Restrict to these units (`<collectionId>_<pageId>`) within the collections. */
  unitIds?: string[];
}

export interface SyncRequest {
  force?: boolean;
  dryRun?: boolean;
  maxAgeHours?: number;
  scope?: SyncScope;
}

export interface SyncResponse {
  plan: SyncAction;
  reason: SyncReason;
  affectedUnits: string[];
  executed: boolean;
  processedCount: number;
  skippedCount: number;
  failedCount: number;
  failures: UnitFailure[];
}

export interface SyncServiceDeps {
  source: ContentSource;
  indexer: PageIndexer;
  state: BuildStateStore;
  config: IndexingConfig;
  /** Collections synced when a request names none. */
  collectionIds: string[];
  now?: () => Date;
}

interface ScannedUnit {
  unit: SourceUnit;
  extracted: ExtractionResult;
  fingerprint: string;
}

/**
 * Entry point for index synchronisation: enumerates the in-scope units,
 * plans against the last {@link BuildRecord}, and runs the page indexer for
 * the units the plan names.
 */
export class SyncService {
  private readonly now: () => Date;

  constructor(private readonly deps: SyncServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async sync(request: SyncRequest = {}): Promise<SyncResponse> {
    const { config, state } = this.deps;
    const flags: SyncFlags = {
      force: request.force ?? false,
      dryRun: request.dryRun ?? false,
      maxAgeHours: request.maxAgeHours,
    };
    if (flags.maxAgeHours !== undefined && !(flags.maxAgeHours >= 0)) {
      throw new ValidationError("maxAgeHours must be a non-negative number");
    }

    const scanned = await this.scan(request.scope);
    const record = await state.load();
    const fingerprint = configFingerprint(config);
    const plan = planSync({
      record,
      fingerprints: new Map(
        [...scanned.values()].map((s): [string, string] => [s.unit.unitId, s.fingerprint]),
      ),
      configFingerprint: fingerprint,
      embeddingVersion: config.embedding.version,
      flags,
      now: this.now(),
    });

    log.info(
      {
        action: plan.action,
        reason: plan.reason,
        units: plan.affectedUnits.length,
        dryRun: flags.dryRun,
      },
      "sync planned",
    );

    if (flags.dryRun || plan.action === "skip") {
      return this.respond(plan, false, 0, scanned.size - plan.affectedUnits.length, []);
    }

    const succeeded = new Map<string, string>();
    const failures: UnitFailure[] = [];
    await mapWithConcurrency(plan.affectedUnits, config.sync.unitConcurrency, async (unitId) => {
      const target = scanned.get(unitId);
      if (!target) return;
      try {
        await this.deps.indexer.indexUnit(target.unit, target.extracted);
        succeeded.set(unitId, target.fingerprint);
      } catch (error) {
        const failure = toUnitFailure(unitId, error);
        log.error({ unitId, code: failure.code, err: error }, `unit failed: ${failure.message}`);
        failures.push(failure);
      }
    });

    failures.sort((a, b) => a.unitId.localeCompare(b.unitId));
    if (succeeded.size === 0 && failures.length > 0) {
      throw new SyncFailedError(failures);
    }

    const skippedCount = scanned.size - plan.affectedUnits.length;
    await state.save(this.nextRecord(record, plan, succeeded, failures, skippedCount, fingerprint));
    return this.respond(plan, true, succeeded.size, skippedCount, failures);
  }

  private async scan(scope: SyncScope = {}): Promise<Map<string, ScannedUnit>> {
    const { source, config } = this.deps;
    const collectionIds = scope.collectionIds ?? this.deps.collectionIds;
    if (collectionIds.length === 0) {
      throw new ValidationError("No collections to sync");
    }
    const wanted = scope.unitIds ? new Set(scope.unitIds) : null;

    const pages: PageRef[] = [];
    for (const collectionId of collectionIds) {
      for (const page of await source.listPages(collectionId)) {
        if (!wanted || wanted.has(unitIdFor(page))) pages.push(page);
      }
    }

    const units = await mapWithConcurrency(
      pages,
      config.sync.unitConcurrency,
      async (page): Promise<ScannedUnit> => {
        const unit: SourceUnit = {
          unitId: unitIdFor(page),
          page,
          entries: await source.listEntries(page),
        };
        const extracted = extractEntries(unit.entries);
        return { unit, extracted, fingerprint: fingerprintUnit(extracted.entries) };
      },
    );

    return new Map(units.map((u): [string, ScannedUnit] => [u.unit.unitId, u]));
  }

  private nextRecord(
    previous: BuildRecord | null,
    plan: SyncPlan,
    succeeded: Map<string, string>,
    failures: UnitFailure[],
    skippedCount: number,
    fingerprint: string,
  ): BuildRecord {
    const { config } = this.deps;
    // A rebuild invalidates every earlier fingerprint.
    const unitFingerprints: Record<string, string> =
      plan.action === "rebuild" || !previous ? {} : { ...previous.unitFingerprints };
    for (const [unitId, fp] of succeeded) unitFingerprints[unitId] = fp;
    // Failed units lose their fingerprint so the next sync retries them.
    for (const { unitId } of failures) delete unitFingerprints[unitId];

    return {
      builtAt: this.now().toISOString(),
      embeddingVersion: config.embedding.version,
      configFingerprint: fingerprint,
      backend: config.index.backend,
      indexName: config.index.indexName,
      namespace: config.index.namespace,
      unitFingerprints,
      processedCount: succeeded.size,
      skippedCount,
      failedCount: failures.length,
      failedUnits: failures.map((f) => f.unitId),
    };
  }

  private respond(
    plan: SyncPlan,
    executed: boolean,
    processedCount: number,
    skippedCount: number,
    failures: UnitFailure[],
  ): SyncResponse {
    return {
      plan: plan.action,
      reason: plan.reason,
      affectedUnits: plan.affectedUnits,
      executed,
      processedCount,
      skippedCount,
      failedCount: failures.length,
      failures,
    };
  }
}
