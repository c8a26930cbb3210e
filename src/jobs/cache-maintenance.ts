/**
 * Cache maintenance job - one action per run, chosen by CACHE_MAINTENANCE_ACTION
 */

import { fileURLToPath } from "url";
import { env } from "../config/env.ts";
import { createLogger } from "../core/logger.ts";
import { closeDatabase, initDatabase } from "../db/migrations.ts";
import { countResponsesByKindStatusAndErrorCode, replaceCacheTotalMetrics } from "../db/repository.ts";

const log = createLogger("cache-maintenance");

export const MAINTENANCE_ACTIONS = ["collect-cache-metrics", "skip"] as const;
export type MaintenanceAction = (typeof MAINTENANCE_ACTIONS)[number];

function isMaintenanceAction(value: string): value is MaintenanceAction {
  return MAINTENANCE_ACTIONS.some((action) => action === value);
}

/**
 * Replaces the cache_total_metric snapshot with fresh counts of the cache store.
 * Returns the number of (kind, status, error code) groups written.
 */
export function collectCacheMetrics(): number {
  const counts = countResponsesByKindStatusAndErrorCode();
  replaceCacheTotalMetrics(counts);
  log.info(`Collected cache metrics for ${counts.length} (kind, status, error code) group(s)`);
  return counts.length;
}

/**
 * Runs the configured action. Returns the action run, or null when none was.
 */
export function runCacheMaintenance(action: string | undefined): MaintenanceAction | null {
  if (!action) {
    log.warn("No action mode was selected, skipping tasks.");
    return null;
  }
  if (!isMaintenanceAction(action)) {
    log.warn(`Action ${action} is not supported, skipping tasks.`);
    return null;
  }

  const started = Date.now();
  log.info(`Starting action ${action}`);

  switch (action) {
    case "collect-cache-metrics":
      collectCacheMetrics();
      break;
    case "skip":
      log.info("Skipping maintenance tasks");
      break;
  }

  const durationSeconds = (Date.now() - started) / 1000;
  log.info(`Action ${action} finished in ${durationSeconds.toFixed(3)} seconds`);
  return action;
}

/**
 * Entry point: returns the process exit code
 */
export function main(action: string | undefined = env.cacheMaintenanceAction): number {
  try {
    initDatabase();
    runCacheMaintenance(action);
    return 0;
  } catch (error) {
    log.error("Cache maintenance failed", error);
    return 1;
  } finally {
    closeDatabase();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  process.exit(main());
}
