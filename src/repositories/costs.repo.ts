// ============================================================================
// Cash Logistics MCP Server — Pickup Costs Repository
// ============================================================================

import { z } from "zod";
import type { QueryExecutor } from "../services/query-executor.service.js";
import type { SqlParam } from "../types.js";

const PickupCostRow = z.object({
    store_id: z.string(),
    pickup_date: z.string(),
    carrier_id: z.number().int().nullable(),
    carrier_name: z.string().nullable(),
    base_cost: z.number().nullable(),
    fuel_surcharge: z.number().nullable(),
    overtime_cost: z.number().nullable(),
    total_cost: z.number(),
});

const InvoiceRow = z.object({
    carrier_id: z.number().int(),
    carrier_name: z.string().nullable(),
    month: z.string(),
    total_stops: z.number().int().nullable(),
    total_amount: z.number().nullable(),
});

export interface PickupCost {
    storeId: string;
    date: string;
    /** Null when the outcome has no schedule row to name its carrier. */
    carrierId: number | null;
    carrierName: string | null;
    baseCost: number;
    fuelSurcharge: number;
    overtimeCost: number;
    totalCost: number;
}

export interface CarrierInvoice {
    carrierId: number;
    carrierName: string | null;
    month: string;
    totalStops: number | null;
    totalAmount: number | null;
}

export class CostsRepo {
    constructor(private executor: QueryExecutor) { }

    /**
     * Costed pickup outcomes for scheduled dates in [from, to]. Outcomes
     * without a total_cost were never billed and are left out; missing cost
     * components read as 0.
     */
    pickupCosts(from: string, to: string, storeId?: string): PickupCost[] {
        const params: SqlParam[] = [from, to];
        let storeClause = "";
        if (storeId !== undefined) {
            storeClause = " AND sp.store_id = ?";
            params.push(storeId);
        }
        return this.executor
            .select(
                `SELECT sp.store_id, date(sp.scheduled_date) AS pickup_date,
                        ps.carrier_id, c.name AS carrier_name,
                        sp.base_cost, sp.fuel_surcharge, sp.overtime_cost, sp.total_cost
                 FROM scheduled_pickups sp
                 LEFT JOIN pickup_schedules ps ON ps.id = sp.schedule_id
                 LEFT JOIN carriers c ON c.carrier_id = ps.carrier_id
                 WHERE sp.total_cost IS NOT NULL
                   AND date(sp.scheduled_date) BETWEEN ? AND ?${storeClause}
                 ORDER BY sp.store_id, pickup_date, sp.id`,
                params,
                PickupCostRow
            )
            .map((r) => ({
                storeId: r.store_id,
                date: r.pickup_date,
                carrierId: r.carrier_id,
                carrierName: r.carrier_name,
                baseCost: r.base_cost ?? 0,
                fuelSurcharge: r.fuel_surcharge ?? 0,
                overtimeCost: r.overtime_cost ?? 0,
                totalCost: r.total_cost,
            }));
    }

    /** Carrier invoices for `YYYY-MM` months in [fromMonth, toMonth]. */
    invoices(fromMonth: string, toMonth: string): CarrierInvoice[] {
        return this.executor
            .select(
                `SELECT i.carrier_id, c.name AS carrier_name, i.month, i.total_stops, i.total_amount
                 FROM carrier_invoices i
                 LEFT JOIN carriers c ON c.carrier_id = i.carrier_id
                 WHERE i.month BETWEEN ? AND ?
                 ORDER BY i.month, i.carrier_id, i.id`,
                [fromMonth, toMonth],
                InvoiceRow
            )
            .map((r) => ({
                carrierId: r.carrier_id,
                carrierName: r.carrier_name,
                month: r.month,
                totalStops: r.total_stops,
                totalAmount: r.total_amount,
            }));
    }
}
