// ============================================================================
// Cash Logistics MCP Server — Configuration
// ============================================================================
//
// Precedence: CLI flag > environment variable > default.

import { z } from "zod";
import {
  DEFAULT_CASH_SITTING_HOURS,
  DEFAULT_CONSOLIDATION_MAX_DISTANCE_KM,
  DEFAULT_HIGH_VOLUME_MAX_DAYS,
  DEFAULT_HIGH_VOLUME_THRESHOLD,
  DEFAULT_LOW_VOLUME_THRESHOLD,
  DEFAULT_MAX_RESULT_ROWS,
  DEFAULT_OVER_SERVICED_MIN_PICKUPS,
  DEFAULT_OVERTIME_SHARE_THRESHOLD,
  DEFAULT_PEAK_DAY_TOLERANCE,
  DEFAULT_QUERY_TIMEOUT_MS,
  DEFAULT_TRAILING_DEPOSIT_DAYS,
  DEFAULT_UNDER_SERVICED_MAX_PICKUPS,
  DEFAULT_UNDER_SERVICED_VOLUME_THRESHOLD,
  ENV_PREFIX,
} from "./constants.js";
import { FatalStartupError } from "./errors.js";
import { LogLevelSchema, type LogLevel } from "./logger.js";
import type { RuleConfig } from "./types.js";

export interface ServerConfig {
  dbPath: string;
  maxResultRows: number;
  queryTimeoutMs: number;
  logLevel: LogLevel;
  rules: RuleConfig;
}

/** Flag → environment variable suffix. */
const OPTIONS = {
  "--db": "DB_PATH",
  "--max-rows": "MAX_ROWS",
  "--query-timeout-ms": "QUERY_TIMEOUT_MS",
  "--high-volume-threshold": "HIGH_VOLUME_THRESHOLD",
  "--cash-sitting-hours": "CASH_SITTING_HOURS",
  "--log-level": "LOG_LEVEL",
} as const;

type OptionFlag = keyof typeof OPTIONS;

function isOptionFlag(value: string): value is OptionFlag {
  return Object.prototype.hasOwnProperty.call(OPTIONS, value);
}

const RawConfigSchema = z.object({
  dbPath: z.string({ required_error: "a database path is required (--db or CASH_LOGISTICS_DB_PATH)" }).min(1),
  maxResultRows: z.coerce.number().int().positive().default(DEFAULT_MAX_RESULT_ROWS),
  queryTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_QUERY_TIMEOUT_MS),
  highVolumeThreshold: z.coerce.number().nonnegative().default(DEFAULT_HIGH_VOLUME_THRESHOLD),
  cashSittingHours: z.coerce.number().positive().default(DEFAULT_CASH_SITTING_HOURS),
  logLevel: LogLevelSchema.default("info"),
});

/**
 * Collect `--flag value` and `--flag=value` pairs. Unknown flags are rejected.
 */
export function parseArgs(argv: readonly string[]): Partial<Record<OptionFlag, string>> {
  const out: Partial<Record<OptionFlag, string>> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!isOptionFlag(flag)) {
      throw new FatalStartupError(`Unknown argument: ${arg}`);
    }
    if (eq !== -1) {
      out[flag] = arg.slice(eq + 1);
      continue;
    }
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new FatalStartupError(`Missing value for ${flag}`);
    }
    out[flag] = value;
    i++;
  }
  return out;
}

export function defaultRuleConfig(): RuleConfig {
  return {
    risk: {
      highVolumeThreshold: DEFAULT_HIGH_VOLUME_THRESHOLD,
      highVolumeMaxDays: DEFAULT_HIGH_VOLUME_MAX_DAYS,
      cashSittingHours: DEFAULT_CASH_SITTING_HOURS,
    },
    missed: { trailingDepositDays: DEFAULT_TRAILING_DEPOSIT_DAYS },
    mismatch: {
      peakDayTolerance: DEFAULT_PEAK_DAY_TOLERANCE,
      lowVolumeThreshold: DEFAULT_LOW_VOLUME_THRESHOLD,
      overServicedMinPickups: DEFAULT_OVER_SERVICED_MIN_PICKUPS,
      highVolumeThreshold: DEFAULT_UNDER_SERVICED_VOLUME_THRESHOLD,
      underServicedMaxPickups: DEFAULT_UNDER_SERVICED_MAX_PICKUPS,
    },
    consolidation: { maxDistanceKm: DEFAULT_CONSOLIDATION_MAX_DISTANCE_KM },
    cost: { overtimeShareThreshold: DEFAULT_OVERTIME_SHARE_THRESHOLD },
  };
}

/**
 * Build the server configuration. Any invalid input is fatal at startup.
 */
export function loadConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const flags = parseArgs(argv);
  const pick = (flag: OptionFlag): string | undefined => flags[flag] ?? env[`${ENV_PREFIX}${OPTIONS[flag]}`];

  const parsed = RawConfigSchema.safeParse({
    dbPath: pick("--db"),
    maxResultRows: pick("--max-rows"),
    queryTimeoutMs: pick("--query-timeout-ms"),
    highVolumeThreshold: pick("--high-volume-threshold"),
    cashSittingHours: pick("--cash-sitting-hours"),
    logLevel: pick("--log-level"),
  });

  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new FatalStartupError(`Invalid configuration: ${detail}`);
  }

  const raw = parsed.data;
  const rules = defaultRuleConfig();
  rules.risk.highVolumeThreshold = raw.highVolumeThreshold;
  rules.risk.cashSittingHours = raw.cashSittingHours;

  return {
    dbPath: raw.dbPath,
    maxResultRows: raw.maxResultRows,
    queryTimeoutMs: raw.queryTimeoutMs,
    logLevel: raw.logLevel,
    rules,
  };
}
