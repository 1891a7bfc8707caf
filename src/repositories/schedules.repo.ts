// ============================================================================
// Cash Logistics MCP Server — Pickup Schedules Repository
// ============================================================================

import { z } from "zod";
import type { QueryExecutor } from "../services/query-executor.service.js";
import type { ActiveSchedule, SqlParam } from "../types.js";

const ScheduleRow = z.object({
    id: z.number(),
    store_id: z.string(),
    carrier_id: z.number(),
    carrier_name: z.string().nullable(),
    base_pickup_cost: z.number().nullable(),
    day_of_week: z.number().int().min(0).max(6),
    scheduled_time: z.string(),
});

export class SchedulesRepo {
    constructor(private executor: QueryExecutor) { }

    /** Active recurring commitments, joined with their carrier. */
    active(storeId?: string): ActiveSchedule[] {
        const params: SqlParam[] = [];
        let where = "WHERE s.active = 1";
        if (storeId !== undefined) {
            where += " AND s.store_id = ?";
            params.push(storeId);
        }

        return this.executor
            .select(
                `SELECT s.id, s.store_id, s.carrier_id, c.name AS carrier_name, c.base_pickup_cost,
                        s.day_of_week, s.scheduled_time
                 FROM pickup_schedules s
                 LEFT JOIN carriers c ON c.carrier_id = s.carrier_id
                 ${where}
                 ORDER BY s.store_id, s.day_of_week, s.scheduled_time, s.id`,
                params,
                ScheduleRow
            )
            .map((r) => ({
                scheduleId: r.id,
                storeId: r.store_id,
                carrierId: r.carrier_id,
                carrierName: r.carrier_name,
                basePickupCost: r.base_pickup_cost,
                dayOfWeek: r.day_of_week,
                scheduledTime: r.scheduled_time,
            }));
    }
}
