// ============================================================================
// Catalog Repository Tests — live schema introspection
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { NotFoundError } from "../../src/errors.js";
import { createTestStore, type TestStore } from "../helpers/test-db.js";

let store: TestStore;

beforeEach(() => {
    store = createTestStore();
});

afterEach(() => {
    store.cleanup();
});

describe("CatalogRepo", () => {
    it("lists user tables by name, without SQLite's internal tables", () => {
        expect(store.repos.catalog.listTables()).toEqual([
            "carrier_invoices",
            "carriers",
            "deposits",
            "pickup_schedules",
            "scheduled_pickups",
            "stores",
        ]);
    });

    it("describes every listed table", () => {
        for (const table of store.repos.catalog.listTables()) {
            expect(store.repos.catalog.describeTable(table).length).toBeGreaterThan(0);
        }
    });

    it("reports column metadata", () => {
        const columns = store.repos.catalog.describeTable("stores");

        expect(columns.map((c) => c.name)).toEqual([
            "store_id",
            "name",
            "region",
            "current_pickup_frequency",
            "avg_daily_deposit",
            "smart_safe_enabled",
            "risk_tier",
        ]);
        expect(columns[0]).toMatchObject({ name: "store_id", type: "TEXT", primaryKey: true });
        expect(columns[1]).toEqual({ name: "name", type: "TEXT", nullable: false, primaryKey: false, defaultValue: null });
        expect(columns[5]).toEqual({
            name: "smart_safe_enabled",
            type: "INTEGER",
            nullable: false,
            primaryKey: false,
            defaultValue: "0",
        });
    });

    it("matches table names case-insensitively", () => {
        expect(store.repos.catalog.describeTable("STORES")).toEqual(store.repos.catalog.describeTable("stores"));
    });

    it("fails with NotFound for an unknown table", () => {
        expect(() => store.repos.catalog.describeTable("armored_trucks")).toThrow(NotFoundError);
        expect(() => store.repos.catalog.describeTable("armored_trucks")).toThrow('Table "armored_trucks" not found.');
    });

    it("sees tables created after startup", () => {
        store.executor.execute("CREATE TABLE route_notes (id INTEGER PRIMARY KEY, note TEXT)", "write");

        expect(store.repos.catalog.listTables()).toContain("route_notes");
        expect(store.repos.catalog.describeTable("route_notes").map((c) => c.name)).toEqual(["id", "note"]);
    });

    it("checks for optional columns", () => {
        expect(store.repos.catalog.hasColumns("stores", ["latitude", "longitude"])).toBe(false);
        expect(store.repos.catalog.hasColumns("no_such_table", ["id"])).toBe(false);

        store.db.exec("ALTER TABLE stores ADD COLUMN latitude REAL; ALTER TABLE stores ADD COLUMN longitude REAL;");
        expect(store.repos.catalog.hasColumns("stores", ["Latitude", "longitude"])).toBe(true);
    });
});
