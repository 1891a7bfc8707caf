// ============================================================================
// Cash Logistics MCP Server — Stores Repository
// ============================================================================

import { z } from "zod";
import type { QueryExecutor } from "../services/query-executor.service.js";
import type { SqlParam, StoreCoordinates, StoreSummary } from "../types.js";

const StoreRow = z.object({
    store_id: z.string(),
    name: z.string(),
    region: z.string().nullable(),
    avg_daily_deposit: z.number().nullable(),
    current_pickup_frequency: z.number().nullable(),
});

const AverageRow = z.object({
    store_id: z.string(),
    avg_daily: z.number(),
});

const DepositTotalRow = z.object({
    store_id: z.string(),
    total: z.number(),
});

const WeekdayTotalRow = z.object({
    store_id: z.string(),
    weekday: z.number().int().min(0).max(6),
    total: z.number(),
});

const CoordinateRow = z.object({
    store_id: z.string(),
    latitude: z.number(),
    longitude: z.number(),
});

// Monday = 0, matching pickup_schedules.day_of_week
const WEEKDAY_SQL = "((CAST(strftime('%w', deposit_date) AS INTEGER) + 6) % 7)";

function storeFilter(storeId: string | undefined, column: string): { clause: string; params: SqlParam[] } {
    return storeId === undefined ? { clause: "", params: [] } : { clause: ` AND ${column} = ?`, params: [storeId] };
}

export class StoresRepo {
    constructor(private executor: QueryExecutor) { }

    list(storeId?: string): StoreSummary[] {
        const filter = storeFilter(storeId, "store_id");
        return this.executor
            .select(
                `SELECT store_id, name, region, avg_daily_deposit, current_pickup_frequency
                 FROM stores WHERE 1 = 1${filter.clause} ORDER BY store_id`,
                filter.params,
                StoreRow
            )
            .map((r) => ({
                storeId: r.store_id,
                name: r.name,
                region: r.region,
                avgDailyDeposit: r.avg_daily_deposit ?? 0,
                currentPickupFrequency: r.current_pickup_frequency,
            }));
    }

    /**
     * Mean of daily deposit totals per store, over days that had deposits,
     * for deposit dates in [from, to].
     */
    averageDailyDeposits(from: string, to: string, storeId?: string): Map<string, number> {
        const filter = storeFilter(storeId, "store_id");
        const rows = this.executor.select(
            `SELECT store_id, SUM(amount) * 1.0 / COUNT(DISTINCT date(deposit_date)) AS avg_daily
             FROM deposits
             WHERE date(deposit_date) BETWEEN ? AND ?${filter.clause}
             GROUP BY store_id`,
            [from, to, ...filter.params],
            AverageRow
        );
        return new Map(rows.map((r) => [r.store_id, r.avg_daily]));
    }

    /** Sum of deposits per store for deposit dates in [from, to]. */
    depositTotals(from: string, to: string, storeId?: string): Map<string, number> {
        const filter = storeFilter(storeId, "store_id");
        const rows = this.executor.select(
            `SELECT store_id, SUM(amount) AS total
             FROM deposits
             WHERE date(deposit_date) BETWEEN ? AND ?${filter.clause}
             GROUP BY store_id`,
            [from, to, ...filter.params],
            DepositTotalRow
        );
        return new Map(rows.map((r) => [r.store_id, r.total]));
    }

    /** Deposit totals per store and weekday for deposit dates in [from, to]. */
    depositTotalsByWeekday(from: string, to: string, storeId?: string): Map<string, number[]> {
        const filter = storeFilter(storeId, "store_id");
        const rows = this.executor.select(
            `SELECT store_id, ${WEEKDAY_SQL} AS weekday, SUM(amount) AS total
             FROM deposits
             WHERE date(deposit_date) BETWEEN ? AND ?${filter.clause}
             GROUP BY store_id, weekday`,
            [from, to, ...filter.params],
            WeekdayTotalRow
        );

        const out = new Map<string, number[]>();
        for (const r of rows) {
            let totals = out.get(r.store_id);
            if (!totals) {
                totals = [0, 0, 0, 0, 0, 0, 0];
                out.set(r.store_id, totals);
            }
            totals[r.weekday] = r.total;
        }
        return out;
    }

    /**
     * Store coordinates. Callers must first check that the optional
     * latitude/longitude columns exist.
     */
    coordinates(): Map<string, StoreCoordinates> {
        const rows = this.executor.select(
            "SELECT store_id, latitude, longitude FROM stores WHERE latitude IS NOT NULL AND longitude IS NOT NULL",
            [],
            CoordinateRow
        );
        return new Map(rows.map((r) => [r.store_id, { storeId: r.store_id, latitude: r.latitude, longitude: r.longitude }]));
    }
}
