// ============================================================================
// Cash Logistics MCP Server — Statement Runner (worker side)
// ============================================================================

import Database from "better-sqlite3";
import type { Database as DatabaseType, Statement } from "better-sqlite3";
import { ResultTooLargeError } from "../errors.js";
import type { AffectedResult, QueryMode, RowsResult, SqlParam } from "../types.js";
import type { StatementFailure, StatementOutcome } from "./statement-protocol.js";

export interface StatementRunnerOptions {
    dbPath: string;
    maxResultRows: number;
    busyTimeoutMs: number;
}

/**
 * Open one connection and prove it is usable before anything reads from it.
 * busy_timeout is set first so lock waits are bounded by the query timeout.
 */
export function openConnection(dbPath: string, readonly: boolean, busyTimeoutMs: number): DatabaseType {
    const db = new Database(dbPath, { readonly, fileMustExist: true });
    try {
        db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);
        if (!readonly) db.pragma("foreign_keys = ON");
        db.prepare("SELECT count(*) FROM sqlite_master").get();
        return db;
    } catch (err) {
        db.close();
        throw err;
    }
}

function sqliteCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
        return err.code;
    }
    return undefined;
}

function toFailure(err: unknown): StatementFailure {
    if (err instanceof ResultTooLargeError) return { type: "too_large" };
    const code = sqliteCode(err);
    if (code === "SQLITE_BUSY" || code === "SQLITE_LOCKED") return { type: "busy" };
    const message = err instanceof Error ? err.message : String(err);
    return code ? { type: "engine", message, code } : { type: "engine", message };
}

/**
 * Owns both store connections inside the executor worker. Reads go through
 * a connection opened readonly, so the read path cannot mutate the file even
 * if a statement slips past the text guard. Each statement runs in its own
 * transaction; a throw anywhere inside rolls it back.
 */
export class StatementRunner {
    private readonly writer: DatabaseType;
    private readonly reader: DatabaseType;

    private constructor(writer: DatabaseType, reader: DatabaseType, private readonly maxResultRows: number) {
        this.writer = writer;
        this.reader = reader;
    }

    static open(options: StatementRunnerOptions): StatementRunner {
        const writer = openConnection(options.dbPath, false, options.busyTimeoutMs);
        try {
            const reader = openConnection(options.dbPath, true, options.busyTimeoutMs);
            return new StatementRunner(writer, reader, options.maxResultRows);
        } catch (err) {
            writer.close();
            throw err;
        }
    }

    run(sql: string, mode: QueryMode, params: readonly SqlParam[]): StatementOutcome {
        const db = mode === "read" ? this.reader : this.writer;
        try {
            const stmt = db.prepare(sql);
            if (mode === "read" && (!stmt.reader || !stmt.readonly)) {
                return { ok: false, failure: { type: "forbidden", reason: "SQLite reports the statement as mutating" } };
            }
            const run = db.transaction(() =>
                stmt.reader ? this.collectRows(stmt, params) : this.runMutation(stmt, params)
            );
            return { ok: true, result: run() };
        } catch (err) {
            return { ok: false, failure: toFailure(err) };
        }
    }

    close(): void {
        if (this.reader.open) this.reader.close();
        if (this.writer.open) this.writer.close();
    }

    private collectRows(stmt: Statement, params: readonly SqlParam[]): RowsResult {
        const columns = stmt.columns().map((c) => c.name);
        const rows: unknown[][] = [];

        for (const row of stmt.raw(true).iterate(...params)) {
            if (rows.length >= this.maxResultRows) throw new ResultTooLargeError(this.maxResultRows);
            if (!Array.isArray(row)) throw new Error("Store returned a non-tabular row.");
            rows.push(row);
        }

        return { kind: "rows", columns, rows, rowCount: rows.length };
    }

    private runMutation(stmt: Statement, params: readonly SqlParam[]): AffectedResult {
        const info = stmt.run(...params);
        return { kind: "affected", changes: info.changes, lastInsertRowid: Number(info.lastInsertRowid) };
    }
}
