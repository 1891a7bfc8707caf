// ============================================================================
// Test Helper — Temporary Cash-Logistics Store
// ============================================================================

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { fileURLToPath } from "url";
import { defaultRuleConfig } from "../../src/config.js";
import { openStore } from "../../src/database.js";
import { createRepositories, type Repositories } from "../../src/repositories/index.js";
import { createRuleServices, type RuleServices } from "../../src/services/index.js";
import type { QueryExecutor } from "../../src/services/query-executor.service.js";
import { ToolDispatcher } from "../../src/tools/dispatcher.js";
import type { RuleConfig } from "../../src/types.js";

const SCHEMA_SQL = fs.readFileSync(fileURLToPath(new URL("../fixtures/schema.sql", import.meta.url)), "utf-8");

export interface TestStore {
  /** Seeding connection on the same file the executor's worker reads. */
  db: Database.Database;
  dbPath: string;
  executor: QueryExecutor;
  repos: Repositories;
  rules: RuleServices;
  config: RuleConfig;
  dispatcher: ToolDispatcher;
  cleanup: () => void;
}

export interface TestStoreOptions {
  maxResultRows?: number;
  queryTimeoutMs?: number;
  today?: string;
}

/**
 * Fresh file-backed store in a temp directory, fixture schema applied, with
 * the full executor → repositories → rules → dispatcher stack on top of it.
 * The executor runs statements on a worker thread, so the store must be a
 * file both threads can open.
 */
export function createTestStore(options: TestStoreOptions = {}): TestStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cash-logistics-test-"));
  const dbPath = path.join(dir, "store.db");
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);

  const executor = openStore({
    dbPath,
    maxResultRows: options.maxResultRows ?? 10_000,
    queryTimeoutMs: options.queryTimeoutMs ?? 5_000,
  });
  const repos = createRepositories(executor);
  const rules = createRuleServices(repos);
  const config = defaultRuleConfig();
  const today = options.today ?? "2025-03-12";
  const dispatcher = new ToolDispatcher({ executor, repos, rules, config, today: () => today });

  return {
    db,
    dbPath,
    executor,
    repos,
    rules,
    config,
    dispatcher,
    cleanup: () => {
      executor.close();
      if (db.open) db.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

// ─── Seed Helpers ────────────────────────────────────────────────────

export interface StoreSeed {
  storeId: string;
  name?: string;
  region?: string;
  avgDailyDeposit?: number | null;
  currentPickupFrequency?: number;
}

export function insertStore(db: Database.Database, s: StoreSeed): void {
  db.prepare(
    `INSERT INTO stores (store_id, name, region, current_pickup_frequency, avg_daily_deposit)
     VALUES (?, ?, ?, ?, ?)`
  ).run(s.storeId, s.name ?? `Store ${s.storeId}`, s.region ?? "North", s.currentPickupFrequency ?? 7, s.avgDailyDeposit ?? null);
}

export function insertCarrier(db: Database.Database, carrierId: number, name: string, basePickupCost = 50): void {
  db.prepare(
    "INSERT INTO carriers (carrier_id, name, base_pickup_cost, per_mile_cost, max_daily_stops) VALUES (?, ?, ?, 2.5, 40)"
  ).run(carrierId, name, basePickupCost);
}

export function insertSchedule(
  db: Database.Database,
  storeId: string,
  carrierId: number,
  dayOfWeek: number,
  scheduledTime = "10:00",
  active = 1
): void {
  db.prepare(
    "INSERT INTO pickup_schedules (store_id, carrier_id, day_of_week, scheduled_time, active) VALUES (?, ?, ?, ?, ?)"
  ).run(storeId, carrierId, dayOfWeek, scheduledTime, active);
}

/** One schedule row per weekday (Monday … Sunday). */
export function insertDailySchedule(db: Database.Database, storeId: string, carrierId: number, scheduledTime = "10:00"): void {
  for (let day = 0; day < 7; day++) insertSchedule(db, storeId, carrierId, day, scheduledTime);
}

export function insertDeposit(db: Database.Database, storeId: string, depositDate: string, amount: number): void {
  db.prepare(
    "INSERT INTO deposits (store_id, deposit_date, deposit_time, amount) VALUES (?, ?, '18:00', ?)"
  ).run(storeId, depositDate, amount);
}

export function insertPickup(
  db: Database.Database,
  storeId: string,
  scheduledDate: string,
  status: "completed" | "missed" | "late"
): void {
  db.prepare(
    `INSERT INTO scheduled_pickups (store_id, scheduled_date, scheduled_time, status, base_cost, total_cost)
     VALUES (?, ?, '10:00', ?, 50, 50)`
  ).run(storeId, scheduledDate, status);
}

export interface CostedPickupSeed {
  storeId: string;
  scheduledDate: string;
  /** pickup_schedules.id naming the carrier; omitted leaves the pickup unattributed. */
  scheduleId?: number;
  status?: "completed" | "missed" | "late";
  baseCost: number;
  fuelSurcharge?: number;
  overtimeCost?: number;
  /** Defaults to the sum of the components; null records an unbilled pickup. */
  totalCost?: number | null;
}

export function insertCostedPickup(db: Database.Database, p: CostedPickupSeed): void {
  const fuel = p.fuelSurcharge ?? 0;
  const overtime = p.overtimeCost ?? 0;
  const total = p.totalCost === undefined ? p.baseCost + fuel + overtime : p.totalCost;
  db.prepare(
    `INSERT INTO scheduled_pickups
       (store_id, schedule_id, scheduled_date, scheduled_time, status, base_cost, fuel_surcharge, overtime_cost, total_cost)
     VALUES (?, ?, ?, '10:00', ?, ?, ?, ?, ?)`
  ).run(p.storeId, p.scheduleId ?? null, p.scheduledDate, p.status ?? "completed", p.baseCost, fuel, overtime, total);
}

export function insertInvoice(
  db: Database.Database,
  carrierId: number,
  month: string,
  totalStops: number | null,
  totalAmount: number | null
): void {
  db.prepare(
    "INSERT INTO carrier_invoices (carrier_id, month, total_stops, total_amount) VALUES (?, ?, ?, ?)"
  ).run(carrierId, month, totalStops, totalAmount);
}

/** Parse the JSON payload of a tool result. */
export function payloadOf(result: CallToolResult): unknown {
  const first = result.content[0];
  if (first?.type !== "text") throw new Error("Tool result carries no text content");
  return JSON.parse(first.text);
}
