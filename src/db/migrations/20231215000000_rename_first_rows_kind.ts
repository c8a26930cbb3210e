/**
 * Renames the first-rows cache kind now that first rows no longer depend on streaming
 */

import type { Database } from "better-sqlite3";
import type { Migration } from "./types.ts";

const OLD_KIND = "split-first-rows-from-streaming";
const NEW_KIND = "split-first-rows";

export const migration: Migration = {
  version: "20231215000000",
  description: `rename cache kind ${OLD_KIND} to ${NEW_KIND}`,
  up: (db: Database) => {
    // An entry already under the new kind wins over the legacy one
    db.prepare(`
      DELETE FROM cached_responses
      WHERE kind = ? AND EXISTS (
        SELECT 1 FROM cached_responses AS other
        WHERE other.kind = ? AND other.dataset = cached_responses.dataset
          AND other.config = cached_responses.config AND other.split = cached_responses.split
      )
    `).run(OLD_KIND, NEW_KIND);
    db.prepare("UPDATE cached_responses SET kind = ? WHERE kind = ?").run(NEW_KIND, OLD_KIND);
  },
  down: (db: Database) => {
    db.prepare("UPDATE cached_responses SET kind = ? WHERE kind = ?").run(OLD_KIND, NEW_KIND);
  },
};
