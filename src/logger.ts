// ============================================================================
// Cash Logistics MCP Server — Structured Logger
// ============================================================================
//
// stdout carries protocol frames, so every level writes to stderr.

import { z } from "zod";
import type { CashLogisticsError } from "./errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LogLevelSchema = z.enum(LOG_LEVELS);

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
    debug: "DEBUG",
    info: "INFO",
    warn: "WARN",
    error: "ERROR",
};

function levelFromEnv(): LogLevel {
    const parsed = LogLevelSchema.safeParse(process.env.CASH_LOGISTICS_LOG_LEVEL);
    return parsed.success ? parsed.data : "info";
}

let currentLevel: LogLevel = levelFromEnv();

function shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMessage(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    scope?: string
): string {
    const tag = scope ? ` [${scope}]` : "";
    const parts = [`[CashLogistics] [${LEVEL_LABELS[level]}]${tag} ${message}`];
    if (context && Object.keys(context).length > 0) {
        parts.push(JSON.stringify(context));
    }
    return parts.join(" ");
}

/**
 * Log fields for a failure: its kind and message, then its own context
 * (table, tool, timeout …).
 */
export function errorContext(err: CashLogisticsError): Record<string, unknown> {
    return { kind: err.kind, message: err.message, ...err.context };
}

export interface Logger {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;
    /** Logger tagged with `scope` whose lines always carry `bound`. */
    child(scope: string, bound?: Record<string, unknown>): Logger;
}

function createLogger(scope?: string, bound: Record<string, unknown> = {}): Logger {
    const emit = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
        if (shouldLog(level)) console.error(formatMessage(level, message, { ...bound, ...context }, scope));
    };
    return {
        debug: (message, context) => emit("debug", message, context),
        info: (message, context) => emit("info", message, context),
        warn: (message, context) => emit("warn", message, context),
        error: (message, context) => emit("error", message, context),
        child: (childScope, childBound = {}) =>
            createLogger(scope ? `${scope}:${childScope}` : childScope, { ...bound, ...childBound }),
    };
}

export const log = {
    ...createLogger(),

    setLevel(level: LogLevel): void {
        currentLevel = level;
    },

    getLevel(): LogLevel {
        return currentLevel;
    },
};
