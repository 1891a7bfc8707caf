// ============================================================================
// Store Opening Tests — file-backed stores, startup failures, lock waits
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { openStore } from "../../src/database.js";
import { FatalStartupError, QueryTimeoutError } from "../../src/errors.js";
import type { QueryExecutor } from "../../src/services/query-executor.service.js";

let dir: string;
const opened: Array<{ close: () => void }> = [];

beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "cash-logistics-"));
});

afterEach(() => {
    for (const handle of opened.splice(0)) handle.close();
    fs.rmSync(dir, { recursive: true, force: true });
});

function seedFile(name: string): string {
    const file = path.join(dir, name);
    const db = new Database(file);
    db.exec("CREATE TABLE stores (store_id TEXT PRIMARY KEY, name TEXT NOT NULL, region TEXT)");
    db.prepare("INSERT INTO stores (store_id, name, region) VALUES ('S1', 'Main St', 'North')").run();
    db.close();
    return file;
}

function open(dbPath: string, queryTimeoutMs = 5000): QueryExecutor {
    const executor = openStore({ dbPath, maxResultRows: 100, queryTimeoutMs });
    opened.push(executor);
    return executor;
}

describe("openStore", () => {
    it("fails startup when the file does not exist", () => {
        const missing = path.join(dir, "missing.db");
        expect(() => open(missing)).toThrow(FatalStartupError);
        expect(() => open(missing)).toThrow(`Database not found at ${missing}`);
    });

    it("fails startup when the file is not a database", () => {
        const bogus = path.join(dir, "notes.db");
        fs.writeFileSync(bogus, "this is plain text, not a SQLite file ".repeat(40));

        expect(() => open(bogus)).toThrow(/^Cannot open database at /);
    });

    it("serves reads and writes against the same file", () => {
        const executor = open(seedFile("cash.db"));

        expect(executor.execute("UPDATE stores SET region = 'West' WHERE store_id = 'S1'", "write"))
            .toMatchObject({ kind: "affected", changes: 1 });
        expect(executor.execute("SELECT store_id, region FROM stores", "read"))
            .toEqual({ kind: "rows", columns: ["store_id", "region"], rows: [["S1", "West"]], rowCount: 1 });
    });

    it("reports a lock held past the timeout as QueryTimeout", () => {
        const file = seedFile("locked.db");
        const executor = open(file, 50);

        const other = new Database(file);
        opened.push(other);
        other.exec("BEGIN EXCLUSIVE");
        try {
            expect(() => executor.execute("UPDATE stores SET region = 'East'", "write")).toThrow(QueryTimeoutError);
        } finally {
            other.exec("ROLLBACK");
        }
    });
});
