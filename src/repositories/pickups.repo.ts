// ============================================================================
// Cash Logistics MCP Server — Pickup Outcomes Repository
// ============================================================================

import { z } from "zod";
import { PICKUP_STATUSES } from "../constants.js";
import type { QueryExecutor } from "../services/query-executor.service.js";
import type { PickupStatus, SqlParam } from "../types.js";

const OutcomeRow = z.object({
    store_id: z.string(),
    pickup_date: z.string(),
    status: z.enum(PICKUP_STATUSES),
});

const LastCompletedRow = z.object({
    store_id: z.string(),
    last_completed: z.string(),
});

export interface PickupOutcome {
    storeId: string;
    date: string;
    status: PickupStatus;
}

export class PickupsRepo {
    constructor(private executor: QueryExecutor) { }

    /** Recorded outcomes for scheduled dates in [from, to]. */
    outcomesBetween(from: string, to: string, storeId?: string): PickupOutcome[] {
        const params: SqlParam[] = [from, to];
        let storeClause = "";
        if (storeId !== undefined) {
            storeClause = " AND store_id = ?";
            params.push(storeId);
        }
        return this.executor
            .select(
                `SELECT store_id, date(scheduled_date) AS pickup_date, status
                 FROM scheduled_pickups
                 WHERE date(scheduled_date) BETWEEN ? AND ?${storeClause}
                 ORDER BY store_id, pickup_date, id`,
                params,
                OutcomeRow
            )
            .map((r) => ({ storeId: r.store_id, date: r.pickup_date, status: r.status }));
    }

    /** Latest completed pickup on or before `asOf`, per store. */
    lastCompleted(asOf: string, storeId?: string): Map<string, string> {
        const params: SqlParam[] = [asOf];
        let storeClause = "";
        if (storeId !== undefined) {
            storeClause = " AND store_id = ?";
            params.push(storeId);
        }
        const rows = this.executor.select(
            `SELECT store_id, MAX(date(scheduled_date)) AS last_completed
             FROM scheduled_pickups
             WHERE status = 'completed' AND date(scheduled_date) <= ?${storeClause}
             GROUP BY store_id`,
            params,
            LastCompletedRow
        );
        return new Map(rows.map((r) => [r.store_id, r.last_completed]));
    }
}
