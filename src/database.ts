// ============================================================================
// Cash Logistics MCP Server — Database Layer (better-sqlite3)
// ============================================================================

import * as fs from "fs";
import * as path from "path";
import { FatalStartupError } from "./errors.js";
import { log } from "./logger.js";
import { QueryExecutor } from "./services/query-executor.service.js";

export interface StoreOptions {
  dbPath: string;
  maxResultRows: number;
  queryTimeoutMs: number;
}

/**
 * Open the backing store and hand it to a QueryExecutor, whose worker holds
 * a read-write connection and a second connection opened readonly.
 * Both run a trial query before this returns, so an unreadable file fails here.
 * The schema is owned by the seeding process; nothing here creates tables.
 */
export function openStore(options: StoreOptions): QueryExecutor {
  const dbPath = path.resolve(options.dbPath);
  if (!fs.existsSync(dbPath)) {
    throw new FatalStartupError(`Database not found at ${dbPath}`, { dbPath });
  }

  let executor: QueryExecutor;
  try {
    executor = new QueryExecutor({
      dbPath,
      maxResultRows: options.maxResultRows,
      queryTimeoutMs: options.queryTimeoutMs,
    });
  } catch (err) {
    throw new FatalStartupError(`Cannot open database at ${dbPath}: ${errorMessage(err)}`, { dbPath });
  }

  log.debug("Store opened", { dbPath });
  return executor;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
