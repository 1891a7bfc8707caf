// ============================================================================
// Cash Logistics MCP Server — Constants
// ============================================================================

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import path from "path";

const _pkgPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../package.json");
const _pkg: unknown = JSON.parse(readFileSync(_pkgPath, "utf-8"));

function readVersion(pkg: unknown): string {
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const SERVER_NAME = "cash-logistics-mcp";
export const SERVER_VERSION: string = readVersion(_pkg);

// Environment
export const ENV_PREFIX = "CASH_LOGISTICS_";

// Executor limits
export const DEFAULT_MAX_RESULT_ROWS = 10_000;
export const DEFAULT_QUERY_TIMEOUT_MS = 5_000;
export const WORKER_STARTUP_TIMEOUT_MS = 15_000;
export const WORKER_CLOSE_TIMEOUT_MS = 1_000;

// Rule defaults
export const DEFAULT_HIGH_VOLUME_THRESHOLD = 30_000;  // $/day
export const DEFAULT_HIGH_VOLUME_MAX_DAYS = 1;
export const DEFAULT_CASH_SITTING_HOURS = 48;
export const DEFAULT_TRAILING_DEPOSIT_DAYS = 30;
export const DEFAULT_PEAK_DAY_TOLERANCE = 1;
export const DEFAULT_LOW_VOLUME_THRESHOLD = 3_000;
export const DEFAULT_OVER_SERVICED_MIN_PICKUPS = 4;
export const DEFAULT_UNDER_SERVICED_VOLUME_THRESHOLD = 6_000;
export const DEFAULT_UNDER_SERVICED_MAX_PICKUPS = 2;
export const DEFAULT_CONSOLIDATION_MAX_DISTANCE_KM = 10;
export const DEFAULT_OVERTIME_SHARE_THRESHOLD = 0.1;  // overtime / total cost

// Calendar — 0 = Monday … 6 = Sunday, as stored in pickup_schedules.day_of_week
export const DAY_NAMES = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export const PICKUP_STATUSES = ["completed", "missed", "late"] as const;
