// ============================================================================
// Cash Logistics MCP Server — Query Executor
// ============================================================================

import * as path from "path";
import { fileURLToPath } from "url";
import { MessageChannel, receiveMessageOnPort, Worker, type MessagePort } from "worker_threads";
import type { z } from "zod";
import { WORKER_CLOSE_TIMEOUT_MS, WORKER_STARTUP_TIMEOUT_MS } from "../constants.js";
import {
    ForbiddenOperationError,
    QueryError,
    QueryTimeoutError,
    ResultTooLargeError,
} from "../errors.js";
import { errorContext, log } from "../logger.js";
import type { ExecutionResult, QueryMode, SqlParam } from "../types.js";
import { checkReadStatement } from "./sql-guard.service.js";
import { WorkerReplySchema, type StatementFailure, type WorkerReply, type WorkerRequest } from "./statement-protocol.js";

// Built output loads the compiled worker; sources load it through tsx.
const MODULE_EXT = path.extname(fileURLToPath(import.meta.url));
const WORKER_URL = new URL(`./statement-worker${MODULE_EXT}`, import.meta.url);
const WORKER_EXEC_ARGV = MODULE_EXT === ".ts" ? ["--import", "tsx"] : undefined;

const executorLog = log.child("executor");

export interface QueryExecutorOptions {
    dbPath: string;
    maxResultRows: number;
    queryTimeoutMs: number;
    /** Bound on loading the worker and opening both connections. */
    startupTimeoutMs?: number;
}

interface WorkerHandle {
    worker: Worker;
    port: MessagePort;
    signal: Int32Array;
}

/**
 * Sole owner of the store. The connections live on a worker thread; each
 * call posts one statement and blocks until the reply or the deadline,
 * whichever comes first. At the deadline the worker is terminated, which
 * closes its connections and rolls back the open transaction, and the next
 * call starts a fresh one.
 *
 * Calls block the caller, so statements never overlap and writes are
 * serialized by construction.
 */
export class QueryExecutor {
    private readonly dbPath: string;
    private readonly maxResultRows: number;
    private readonly queryTimeoutMs: number;
    private readonly startupTimeoutMs: number;
    private handle: WorkerHandle | null;
    private closed = false;

    constructor(options: QueryExecutorOptions) {
        this.dbPath = options.dbPath;
        this.maxResultRows = options.maxResultRows;
        this.queryTimeoutMs = options.queryTimeoutMs;
        this.startupTimeoutMs = options.startupTimeoutMs ?? WORKER_STARTUP_TIMEOUT_MS;
        this.handle = this.spawn();
    }

    execute(sql: string, mode: QueryMode, params: readonly SqlParam[] = []): ExecutionResult {
        if (this.closed) throw new QueryError("Query executor is closed.");
        if (mode === "read") {
            const check = checkReadStatement(sql);
            if (!check.ok) throw new ForbiddenOperationError(check.reason);
        }

        const handle = this.handle ?? (this.handle = this.spawn());
        const reply = this.call(handle, { type: "run", sql, mode, params: [...params] }, this.queryTimeoutMs);
        if (reply === null) {
            executorLog.warn("Query exceeded the timeout; worker terminated", { mode, timeoutMs: this.queryTimeoutMs });
            this.discard(handle);
            this.handle = null;
            throw new QueryTimeoutError(this.queryTimeoutMs);
        }
        if (reply.type !== "done") throw new QueryError(`Unexpected executor reply: ${reply.type}`);

        const { outcome } = reply;
        if (outcome.ok) return outcome.result;
        const err = this.toError(outcome.failure);
        executorLog.debug("Query failed", { mode, ...errorContext(err) });
        throw err;
    }

    /**
     * Read-mode helper for repositories: returns rows as objects, each checked
     * against `rowSchema`.
     */
    select<T>(sql: string, params: readonly SqlParam[], rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
        const result = this.execute(sql, "read", params);
        if (result.kind !== "rows") throw new QueryError("Statement did not return rows.");

        return result.rows.map((values, index) => {
            const record = Object.fromEntries(result.columns.map((column, i) => [column, values[i]]));
            const parsed = rowSchema.safeParse(record);
            if (!parsed.success) {
                throw new QueryError(`Unexpected row shape at row ${index}: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
                    columns: result.columns,
                });
            }
            return parsed.data;
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        const handle = this.handle;
        this.handle = null;
        if (!handle) return;
        if (this.call(handle, { type: "close" }, WORKER_CLOSE_TIMEOUT_MS) === null) {
            executorLog.warn("Worker did not close in time; terminating");
        }
        this.discard(handle);
    }

    // ─── Worker Lifecycle ───────────────────────────────────────────────

    private spawn(): WorkerHandle {
        const { port1, port2 } = new MessageChannel();
        const signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
        const worker = new Worker(WORKER_URL, {
            workerData: {
                dbPath: this.dbPath,
                maxResultRows: this.maxResultRows,
                busyTimeoutMs: this.queryTimeoutMs,
                logLevel: log.getLevel(),
                signal,
                port: port2,
            },
            transferList: [port2],
            execArgv: WORKER_EXEC_ARGV,
        });
        worker.on("error", (err: Error) => executorLog.error("Worker crashed", { message: err.message }));
        worker.unref();

        const handle: WorkerHandle = { worker, port: port1, signal };
        const reply = this.awaitReply(handle, this.startupTimeoutMs);
        if (reply?.type === "ready") return handle;

        this.discard(handle);
        if (reply === null) throw new QueryError(`executor worker did not start within ${this.startupTimeoutMs} ms`);
        throw new QueryError(reply.type === "failed" ? reply.message : `unexpected executor reply: ${reply.type}`);
    }

    private call(handle: WorkerHandle, request: WorkerRequest, timeoutMs: number): WorkerReply | null {
        Atomics.store(handle.signal, 0, 0);
        handle.port.postMessage(request);
        return this.awaitReply(handle, timeoutMs);
    }

    /** Null when the worker has not signalled within `timeoutMs`. */
    private awaitReply(handle: WorkerHandle, timeoutMs: number): WorkerReply | null {
        if (Atomics.wait(handle.signal, 0, 0, timeoutMs) === "timed-out") return null;

        const received = receiveMessageOnPort(handle.port);
        if (!received) throw new QueryError("Executor worker signalled without a reply.");
        const parsed = WorkerReplySchema.safeParse(received.message);
        if (!parsed.success) throw new QueryError("Malformed reply from the executor worker.");
        return parsed.data;
    }

    private discard(handle: WorkerHandle): void {
        handle.port.close();
        handle.worker.terminate().catch((err: unknown) => {
            executorLog.warn("Worker did not terminate cleanly", { message: err instanceof Error ? err.message : String(err) });
        });
    }

    private toError(failure: StatementFailure): QueryError | ForbiddenOperationError | ResultTooLargeError | QueryTimeoutError {
        switch (failure.type) {
            case "forbidden":
                return new ForbiddenOperationError(failure.reason);
            case "too_large":
                return new ResultTooLargeError(this.maxResultRows);
            case "busy":
                return new QueryTimeoutError(this.queryTimeoutMs);
            case "engine":
                return new QueryError(failure.message, failure.code ? { code: failure.code } : undefined);
        }
    }
}
