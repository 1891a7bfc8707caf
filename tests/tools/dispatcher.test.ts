// ============================================================================
// Dispatcher Tests — closed tool set, argument validation, in-band errors
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { InvalidArgumentsError, UnknownToolError } from "../../src/errors.js";
import { listTools, parseToolCall } from "../../src/tools/definitions.js";
import {
    createTestStore,
    insertCarrier,
    insertCostedPickup,
    insertDailySchedule,
    insertPickup,
    insertSchedule,
    insertStore,
    payloadOf,
    type TestStore,
} from "../helpers/test-db.js";

// ─── parseToolCall ───────────────────────────────────────────────────

describe("parseToolCall", () => {
    it("rejects names outside the tool set", () => {
        expect(() => parseToolCall("drop_everything", {})).toThrow(UnknownToolError);
        expect(() => parseToolCall("drop_everything", {})).toThrow("Unknown tool: drop_everything");
    });

    it("treats missing arguments as an empty object", () => {
        expect(parseToolCall("list_tables", undefined)).toEqual({ tool: "list_tables", args: {} });
    });

    it.each([
        ["describe_table", {}, "Invalid arguments for describe_table: table_name: Required"],
        ["read_query", { query: 42 }, "Invalid arguments for read_query: query: Expected string, received number"],
        ["list_tables", { verbose: true }, "Invalid arguments for list_tables: Unrecognized key(s) in object: 'verbose'"],
        [
            "detect_missed_pickups",
            { from: "2025-03-12", to: "2025-03-10" },
            "Invalid arguments for detect_missed_pickups: from: from must not be after to",
        ],
        [
            "analyze_costs",
            { from: "2025-03-01", to: "2025-03-31", overtime_share_threshold: 2 },
            "Invalid arguments for analyze_costs: overtime_share_threshold: Number must be less than or equal to 1",
        ],
        [
            "generate_findings",
            { from: "2025-02-30", to: "2025-03-10" },
            "Invalid arguments for generate_findings: from: expected a calendar date in YYYY-MM-DD form",
        ],
    ])("rejects bad arguments for %s", (name, args, message) => {
        expect(() => parseToolCall(name, args)).toThrow(InvalidArgumentsError);
        expect(() => parseToolCall(name, args)).toThrow(message);
    });

    it("keeps optional overrides", () => {
        expect(parseToolCall("score_risk", { as_of: "2025-03-12", cash_sitting_hours: 24 })).toEqual({
            tool: "score_risk",
            args: { as_of: "2025-03-12", cash_sitting_hours: 24 },
        });
    });
});

// ─── listTools ───────────────────────────────────────────────────────

describe("listTools", () => {
    it("describes the closed tool set", () => {
        expect(listTools().map((t) => t.name)).toEqual([
            "list_tables",
            "describe_table",
            "read_query",
            "write_query",
            "detect_missed_pickups",
            "score_risk",
            "detect_schedule_mismatches",
            "find_consolidation_opportunities",
            "analyze_costs",
            "generate_findings",
        ]);
    });

    it("generates input schemas from the argument schemas", () => {
        const byName = new Map(listTools().map((t) => [t.name, t]));

        expect(byName.get("read_query")?.inputSchema).toEqual({
            type: "object",
            properties: { query: { type: "string", minLength: 1, description: "A single SQL statement." } },
            required: ["query"],
            additionalProperties: false,
        });
        expect(byName.get("detect_missed_pickups")?.inputSchema.required).toEqual(["from", "to"]);
        expect(byName.get("write_query")?.annotations?.readOnlyHint).toBe(false);
        expect(byName.get("read_query")?.annotations?.readOnlyHint).toBe(true);
    });
});

// ─── ToolDispatcher.handle ───────────────────────────────────────────

describe("ToolDispatcher", () => {
    let store: TestStore;

    beforeEach(() => {
        store = createTestStore();
        insertCarrier(store.db, 1, "Loomis East");
        insertStore(store.db, { storeId: "S1", avgDailyDeposit: 38000 });
        insertDailySchedule(store.db, "S1", 1);
        insertPickup(store.db, "S1", "2025-03-10", "completed");
    });

    afterEach(() => {
        store.cleanup();
    });

    it("lists tables", () => {
        const result = store.dispatcher.handle("list_tables", {});

        expect(result.isError).toBeUndefined();
        expect(payloadOf(result)).toEqual({
            tables: ["carrier_invoices", "carriers", "deposits", "pickup_schedules", "scheduled_pickups", "stores"],
            count: 6,
        });
    });

    it("reports an unknown table as NotFound in-band", () => {
        const result = store.dispatcher.handle("describe_table", { table_name: "vaults" });

        expect(result.isError).toBe(true);
        expect(payloadOf(result)).toEqual({ error: { kind: "NotFound", message: 'Table "vaults" not found.' } });
    });

    it("reports unknown tools and bad arguments in-band", () => {
        expect(payloadOf(store.dispatcher.handle("nope", {}))).toEqual({
            error: { kind: "UnknownTool", message: "Unknown tool: nope" },
        });
        expect(payloadOf(store.dispatcher.handle("read_query", {}))).toEqual({
            error: { kind: "InvalidArguments", message: "Invalid arguments for read_query: query: Required" },
        });
    });

    it("validates arguments before touching the store", () => {
        store.cleanup();

        const result = store.dispatcher.handle("describe_table", { table: "stores" });
        expect(payloadOf(result)).toMatchObject({ error: { kind: "InvalidArguments" } });
    });

    it("rejects a mutation sent to read_query", () => {
        const result = store.dispatcher.handle("read_query", { query: "DELETE FROM stores" });

        expect(payloadOf(result)).toEqual({
            error: { kind: "ForbiddenOperation", message: "Statement rejected on the read-only path: contains DELETE" },
        });
        expect(store.db.prepare("SELECT count(*) AS n FROM stores").get()).toEqual({ n: 1 });
    });

    it("applies write_query and shows the change to read_query", () => {
        const write = store.dispatcher.handle("write_query", {
            query: "UPDATE stores SET region = 'South' WHERE store_id = 'S1'",
        });
        expect(payloadOf(write)).toMatchObject({ affectedRows: 1 });

        const read = store.dispatcher.handle("read_query", { query: "SELECT store_id, region, risk_tier FROM stores" });
        expect(payloadOf(read)).toEqual({ columns: ["store_id", "region", "risk_tier"], rows: [["S1", "South", null]], rowCount: 1 });
    });

    it("reports an oversized result as ResultTooLarge", () => {
        const small = createTestStore({ maxResultRows: 1 });
        try {
            insertStore(small.db, { storeId: "A" });
            insertStore(small.db, { storeId: "B" });

            const result = small.dispatcher.handle("read_query", { query: "SELECT * FROM stores" });
            expect(payloadOf(result)).toMatchObject({ error: { kind: "ResultTooLarge" } });
        } finally {
            small.cleanup();
        }
    });

    it("detects missed pickups", () => {
        const result = store.dispatcher.handle("detect_missed_pickups", { from: "2025-03-10", to: "2025-03-12" });

        expect(payloadOf(result)).toMatchObject({
            range: { from: "2025-03-10", to: "2025-03-12" },
            missed: [
                { scheduledDate: "2025-03-11", cashAtRisk: 38000 },
                { scheduledDate: "2025-03-12", cashAtRisk: 76000 },
            ],
            count: 2,
            exposureByStore: { S1: 76000 },
            totalCashAtRisk: 76000,
        });
    });

    it("scores risk as of today by default and merges per-call thresholds", () => {
        expect(payloadOf(store.dispatcher.handle("score_risk", {}))).toMatchObject({
            asOf: "2025-03-12",
            highRiskCount: 1,
            stores: [{ storeId: "S1", reasons: ["high_volume_overdue"] }],
        });

        const relaxed = store.dispatcher.handle("score_risk", { high_volume_threshold: 100000 });
        expect(payloadOf(relaxed)).toMatchObject({ highRiskCount: 0, stores: [{ storeId: "S1", highRisk: false }] });
    });

    it("generates findings with as_of defaulting to the end of the range", () => {
        const result = store.dispatcher.handle("generate_findings", { from: "2025-03-10", to: "2025-03-12" });

        expect(payloadOf(result)).toMatchObject({
            range: { from: "2025-03-10", to: "2025-03-12" },
            asOf: "2025-03-12",
            count: 3,
        });
    });

    it("finds consolidation opportunities with a savings total", () => {
        insertStore(store.db, { storeId: "S2", avgDailyDeposit: 1000 });
        store.db.prepare(
            "INSERT INTO pickup_schedules (store_id, carrier_id, day_of_week, scheduled_time) VALUES ('S2', 1, 0, '15:00')"
        ).run();

        expect(payloadOf(store.dispatcher.handle("find_consolidation_opportunities", {}))).toMatchObject({
            count: 1,
            estimatedWeeklySavings: 50,
            opportunities: [{ carrierId: 1, dayName: "Monday", distinctTimes: ["10:00", "15:00"] }],
        });
    });

    it("leaves the savings total unknown when no carrier has a base cost", () => {
        store.db.prepare("INSERT INTO carriers (carrier_id, name) VALUES (2, 'Brink Metro')").run();
        insertStore(store.db, { storeId: "S2", avgDailyDeposit: 1000 });
        insertStore(store.db, { storeId: "S3", avgDailyDeposit: 1000 });
        insertSchedule(store.db, "S2", 2, 0, "09:00");
        insertSchedule(store.db, "S3", 2, 0, "13:00");

        const payload = payloadOf(store.dispatcher.handle("find_consolidation_opportunities", { store_id: "S2" }));

        expect(payload).toEqual({
            opportunities: [
                {
                    carrierId: 2,
                    carrierName: "Brink Metro",
                    dayOfWeek: 0,
                    dayName: "Monday",
                    stores: [
                        { storeId: "S2", scheduledTime: "09:00" },
                        { storeId: "S3", scheduledTime: "13:00" },
                    ],
                    distinctTimes: ["09:00", "13:00"],
                    stopsSaved: 1,
                    proximityChecked: false,
                },
            ],
            count: 1,
            unpricedCount: 1,
        });
    });

    it("sums only the priced groups", () => {
        store.db.prepare("INSERT INTO carriers (carrier_id, name) VALUES (2, 'Brink Metro')").run();
        for (const id of ["S2", "S3", "S4"]) insertStore(store.db, { storeId: id, avgDailyDeposit: 1000 });
        insertSchedule(store.db, "S2", 1, 0, "15:00");
        insertSchedule(store.db, "S3", 2, 2, "09:00");
        insertSchedule(store.db, "S4", 2, 2, "13:00");

        expect(payloadOf(store.dispatcher.handle("find_consolidation_opportunities", {}))).toMatchObject({
            count: 2,
            estimatedWeeklySavings: 50,
            unpricedCount: 1,
        });
    });

    it("analyzes costs with a per-call overtime threshold", () => {
        // schedule 2 is S1's Tuesday row
        insertCostedPickup(store.db, { storeId: "S1", scheduledDate: "2025-03-11", scheduleId: 2, baseCost: 40, overtimeCost: 20 });

        const result = store.dispatcher.handle("analyze_costs", {
            from: "2025-03-01",
            to: "2025-03-31",
            overtime_share_threshold: 0.15,
        });

        expect(result.isError).toBeUndefined();
        expect(payloadOf(result)).toMatchObject({
            range: { from: "2025-03-01", to: "2025-03-31" },
            totals: { stops: 2, overtimeStops: 1, totalCost: 110, overtimeShare: 0.1818 },
            stores: [{ storeId: "S1", highOvertime: true }],
            highOvertimeCount: 1,
            invoices: [{ carrierId: 1, month: "2025-03", recordedStops: 1, status: "missing_invoice" }],
            invoiceDiscrepancyCount: 1,
        });
    });

    it("detects schedule mismatches with per-call thresholds", () => {
        const result = store.dispatcher.handle("detect_schedule_mismatches", {
            from: "2025-03-01",
            to: "2025-03-31",
            over_serviced_min_pickups: 7,
            low_volume_threshold: 50000,
        });

        expect(payloadOf(result)).toMatchObject({
            count: 1,
            mismatches: [{ storeId: "S1", classification: "over_serviced", flags: ["over_serviced"] }],
        });
    });
});
