// ============================================================================
// Cash Logistics MCP Server — Executor ⇄ Worker Messages
// ============================================================================
//
// Both sides parse what they receive; nothing crosses the thread boundary
// unchecked.

import { MessagePort } from "worker_threads";
import { z } from "zod";
import { LogLevelSchema } from "../logger.js";

const SqlParamSchema = z.union([z.string(), z.number(), z.bigint(), z.instanceof(Uint8Array), z.null()]);

export const WorkerInitSchema = z.object({
    dbPath: z.string(),
    maxResultRows: z.number().int().positive(),
    busyTimeoutMs: z.number().int().nonnegative(),
    logLevel: LogLevelSchema,
    /** One Int32 slot: 0 while a reply is pending, 1 once it has been posted. */
    signal: z.instanceof(Int32Array),
    port: z.instanceof(MessagePort),
});

export type WorkerInit = z.infer<typeof WorkerInitSchema>;

export const WorkerRequestSchema = z.discriminatedUnion("type", [
    z.object({
        type: z.literal("run"),
        sql: z.string(),
        mode: z.enum(["read", "write"]),
        params: z.array(SqlParamSchema),
    }),
    z.object({ type: z.literal("close") }),
]);

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;

const ExecutionResultSchema = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("rows"),
        columns: z.array(z.string()),
        rows: z.array(z.array(z.unknown())),
        rowCount: z.number(),
    }),
    z.object({
        kind: z.literal("affected"),
        changes: z.number(),
        lastInsertRowid: z.number(),
    }),
]);

export const StatementFailureSchema = z.discriminatedUnion("type", [
    z.object({ type: z.literal("forbidden"), reason: z.string() }),
    z.object({ type: z.literal("too_large") }),
    z.object({ type: z.literal("busy") }),
    z.object({ type: z.literal("engine"), message: z.string(), code: z.string().optional() }),
]);

export type StatementFailure = z.infer<typeof StatementFailureSchema>;

export const StatementOutcomeSchema = z.discriminatedUnion("ok", [
    z.object({ ok: z.literal(true), result: ExecutionResultSchema }),
    z.object({ ok: z.literal(false), failure: StatementFailureSchema }),
]);

export type StatementOutcome = z.infer<typeof StatementOutcomeSchema>;

export const WorkerReplySchema = z.discriminatedUnion("type", [
    z.object({ type: z.literal("ready") }),
    z.object({ type: z.literal("failed"), message: z.string() }),
    z.object({ type: z.literal("done"), outcome: StatementOutcomeSchema }),
    z.object({ type: z.literal("closed") }),
]);

export type WorkerReply = z.infer<typeof WorkerReplySchema>;
