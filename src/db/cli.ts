/**
 * Database migration CLI
 */

import { fileURLToPath } from "url";
import {
  closeDatabase,
  getDatabase,
  getMigrationStatus,
  initDatabase,
  rollbackLastMigration,
} from "./migrations.ts";
import { createLogger } from "../core/logger.ts";

const log = createLogger("migrations");

/**
 * Shows the current migration status
 */
function showMigrationStatus(): void {
  const statuses = getMigrationStatus(getDatabase());

  console.log("\nMigration Status");
  console.log("================\n");

  console.log("Version        | Description                    | Status   | Applied At");
  console.log("---------------|--------------------------------|----------|--------------------------");

  for (const status of statuses) {
    const description = status.description.padEnd(30);
    const statusPadded = (status.applied ? "Applied" : "Pending").padEnd(8);
    console.log(`${status.version} | ${description} | ${statusPadded} | ${status.appliedAt ?? "-"}`);
  }

  const appliedCount = statuses.filter((s) => s.applied).length;
  console.log("");
  console.log(`${appliedCount} of ${statuses.length} migrations applied`);
}

/**
 * Runs pending migrations
 */
function runMigrations(): void {
  initDatabase();
}

/**
 * Rolls back the most recent migration
 */
function rollbackMigration(): void {
  const version = rollbackLastMigration(getDatabase());
  console.log(version ? `Rolled back migration ${version}` : "No migration to roll back");
}

/**
 * Shows usage help
 */
function showHelp(): void {
  console.log(`
Database Migration CLI

Usage: tsx src/db/cli.ts <command>

Commands:
  status    Show migration status (default)
  run       Run pending migrations
  rollback  Roll back the most recent migration
  help      Show this help

Examples:
  npm run db:status
  npm run db:migrate
  npm run db:rollback
`);
}

/**
 * Runs one command and returns the process exit code
 */
export function main(args: readonly string[]): number {
  const command = args[0];

  try {
    switch (command) {
      case "status":
      case undefined:
        showMigrationStatus();
        return 0;
      case "run":
        runMigrations();
        return 0;
      case "rollback":
        rollbackMigration();
        return 0;
      case "help":
        showHelp();
        return 0;
      default:
        console.error(`Unknown command: ${command}`);
        showHelp();
        return 1;
    }
  } catch (error) {
    log.error(`Migration command "${command ?? "status"}" failed`, error);
    return 1;
  } finally {
    closeDatabase();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  process.exit(main(process.argv.slice(2)));
}
