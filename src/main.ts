import "dotenv/config";
import { createIndexingSystem } from "./index.js";
import { loadConfig } from "./rag/config.js";
import { IndexingError, toError } from "./rag/errors.js";
import { JsonDirectorySource } from "./rag/json-source.js";
import { getLogger } from "./rag/logger.js";

const log = getLogger("main");

function flag(name: string): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true";
}

async function main(): Promise<void> {
  const config = loadConfig();
  const system = createIndexingSystem(config, new JsonDirectorySource(config.source.exportDir));

  const maxAge = process.env["SYNC_MAX_AGE_HOURS"];
  const result = await system.sync.sync({
    force: flag("SYNC_FORCE"),
    dryRun: flag("SYNC_DRY_RUN"),
    maxAgeHours: maxAge ? Number(maxAge) : undefined,
  });
  log.info(result, `sync ${result.plan} (${result.reason})`);

  if (result.executed) {
    const drift = await system.checkDrift();
    log.info(drift, "drift check");
  }
}

main().catch((error: unknown) => {
  const err = toError(error);
  log.fatal(err instanceof IndexingError ? err.toJSON() : { err }, err.message);
  process.exitCode = 1;
});
