// ============================================================================
// Cash Logistics MCP Server — Cost Analysis Rule
// ============================================================================

import type { CarrierInvoice, PickupCost, Repositories } from "../repositories/index.js";
import type {
    CarrierCost,
    CostBreakdown,
    CostReport,
    CostRuleConfig,
    InvoiceReconciliation,
    InvoiceStatus,
    MonthlyOvertime,
    StoreCost,
} from "../types.js";
import { monthBounds, roundCurrency, roundRatio } from "../utils.js";

export interface CostQuery {
    from: string;
    to: string;
    storeId?: string;
}

interface CostTally {
    stops: number;
    overtimeStops: number;
    baseCost: number;
    fuelSurcharge: number;
    overtimeCost: number;
    totalCost: number;
}

function emptyTally(): CostTally {
    return { stops: 0, overtimeStops: 0, baseCost: 0, fuelSurcharge: 0, overtimeCost: 0, totalCost: 0 };
}

function addCost(tally: CostTally, cost: PickupCost): void {
    tally.stops++;
    if (cost.overtimeCost > 0) tally.overtimeStops++;
    tally.baseCost += cost.baseCost;
    tally.fuelSurcharge += cost.fuelSurcharge;
    tally.overtimeCost += cost.overtimeCost;
    tally.totalCost += cost.totalCost;
}

export function summarizeCosts(costs: readonly PickupCost[]): CostBreakdown {
    const tally = emptyTally();
    for (const cost of costs) addCost(tally, cost);
    return {
        stops: tally.stops,
        overtimeStops: tally.overtimeStops,
        baseCost: roundCurrency(tally.baseCost),
        fuelSurcharge: roundCurrency(tally.fuelSurcharge),
        overtimeCost: roundCurrency(tally.overtimeCost),
        totalCost: roundCurrency(tally.totalCost),
        costPerStop: tally.stops === 0 ? null : roundCurrency(tally.totalCost / tally.stops),
        overtimeShare: tally.totalCost > 0 ? roundRatio(tally.overtimeCost / tally.totalCost) : null,
    };
}

function costPerDollar(totalCost: number, collected: number): number | null {
    return collected > 0 ? roundRatio(totalCost / collected, 6) : null;
}

/** Compare an invoiced stop count with the stops recorded for the same carrier and month. */
export function invoiceStatus(invoicedStops: number | null, recordedStops: number): InvoiceStatus {
    if (invoicedStops === null) return "unverifiable";
    if (invoicedStops > recordedStops) return "over_invoiced";
    if (invoicedStops < recordedStops) return "under_invoiced";
    return "matched";
}

function groupBy<K, V>(items: readonly V[], keyOf: (item: V) => K): Map<K, V[]> {
    const out = new Map<K, V[]>();
    for (const item of items) {
        const key = keyOf(item);
        const group = out.get(key);
        if (group) group.push(item);
        else out.set(key, [item]);
    }
    return out;
}

const monthOf = (date: string): string => date.slice(0, 7);

/**
 * Pickup cost per store and per carrier, overtime by month, and carrier
 * invoices checked against recorded stops.
 *
 * Invoices cover whole calendar months, so reconciliation reads every month
 * the range touches in full. It is skipped for a single-store query because
 * invoices are per carrier, not per store.
 */
export class CostAnalysisRuleService {
    constructor(private repos: Repositories) { }

    analyze(query: CostQuery, config: CostRuleConfig): CostReport {
        const { from, to, storeId } = query;
        const firstMonth = monthOf(from);
        const lastMonth = monthOf(to);
        const window = { first: monthBounds(firstMonth).first, last: monthBounds(lastMonth).last };

        const windowCosts = this.repos.costs.pickupCosts(window.first, window.last, storeId);
        const costs = windowCosts.filter((c) => c.date >= from && c.date <= to);
        const deposits = this.repos.stores.depositTotals(from, to, storeId);

        const byStore = groupBy(costs, (c) => c.storeId);
        const stores: StoreCost[] = this.repos.stores.list(storeId).map((store) => {
            const breakdown = summarizeCosts(byStore.get(store.storeId) ?? []);
            const collected = roundCurrency(deposits.get(store.storeId) ?? 0);
            return {
                storeId: store.storeId,
                storeName: store.name,
                ...breakdown,
                depositsCollected: collected,
                costPerDollarCollected: costPerDollar(breakdown.totalCost, collected),
                highOvertime: breakdown.overtimeShare !== null && breakdown.overtimeShare > config.overtimeShareThreshold,
            };
        });
        stores.sort((a, b) => b.totalCost - a.totalCost || a.storeId.localeCompare(b.storeId));

        const totals = summarizeCosts(costs);
        const collected = roundCurrency(stores.reduce((sum, s) => sum + s.depositsCollected, 0));

        return {
            range: { from, to },
            totals: { ...totals, depositsCollected: collected, costPerDollarCollected: costPerDollar(totals.totalCost, collected) },
            stores,
            carriers: this.byCarrier(costs),
            overtimeByMonth: this.overtimeByMonth(costs),
            invoices: storeId === undefined
                ? this.reconcileInvoices(this.repos.costs.invoices(firstMonth, lastMonth), windowCosts)
                : [],
        };
    }

    /** Attributed carriers by id, unattributed pickups last. */
    private byCarrier(costs: readonly PickupCost[]): CarrierCost[] {
        const groups = [...groupBy(costs, (c) => c.carrierId).entries()];
        groups.sort(([a], [b]) => (a ?? Number.MAX_SAFE_INTEGER) - (b ?? Number.MAX_SAFE_INTEGER));
        return groups.map(([carrierId, group]) => ({
            carrierId,
            carrierName: group[0]?.carrierName ?? null,
            ...summarizeCosts(group),
        }));
    }

    private overtimeByMonth(costs: readonly PickupCost[]): MonthlyOvertime[] {
        return [...groupBy(costs, (c) => monthOf(c.date)).entries()]
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([month, group]) => {
                const { overtimeCost, totalCost, overtimeShare } = summarizeCosts(group);
                return { month, overtimeCost, totalCost, overtimeShare };
            });
    }

    /**
     * One entry per invoice, plus a `missing_invoice` entry for each carrier
     * and month with recorded stops but no invoice.
     */
    private reconcileInvoices(invoices: readonly CarrierInvoice[], costs: readonly PickupCost[]): InvoiceReconciliation[] {
        const recorded = new Map<string, { carrierId: number; carrierName: string | null; month: string; tally: CostTally }>();
        for (const cost of costs) {
            if (cost.carrierId === null) continue;
            const key = `${cost.carrierId}|${monthOf(cost.date)}`;
            let entry = recorded.get(key);
            if (!entry) {
                entry = { carrierId: cost.carrierId, carrierName: cost.carrierName, month: monthOf(cost.date), tally: emptyTally() };
                recorded.set(key, entry);
            }
            addCost(entry.tally, cost);
        }

        const out: InvoiceReconciliation[] = invoices.map((invoice) => {
            const tally = recorded.get(`${invoice.carrierId}|${invoice.month}`)?.tally ?? emptyTally();
            const recordedCost = roundCurrency(tally.totalCost);
            return {
                carrierId: invoice.carrierId,
                carrierName: invoice.carrierName,
                month: invoice.month,
                invoicedStops: invoice.totalStops,
                recordedStops: tally.stops,
                stopDelta: invoice.totalStops === null ? null : invoice.totalStops - tally.stops,
                invoicedAmount: invoice.totalAmount,
                recordedCost,
                amountDelta: invoice.totalAmount === null ? null : roundCurrency(invoice.totalAmount - recordedCost),
                status: invoiceStatus(invoice.totalStops, tally.stops),
            };
        });

        const invoiced = new Set(invoices.map((i) => `${i.carrierId}|${i.month}`));
        for (const [key, entry] of recorded) {
            if (invoiced.has(key)) continue;
            out.push({
                carrierId: entry.carrierId,
                carrierName: entry.carrierName,
                month: entry.month,
                invoicedStops: null,
                recordedStops: entry.tally.stops,
                stopDelta: null,
                invoicedAmount: null,
                recordedCost: roundCurrency(entry.tally.totalCost),
                amountDelta: null,
                status: "missing_invoice",
            });
        }

        return out.sort((a, b) => a.month.localeCompare(b.month) || a.carrierId - b.carrierId);
    }
}
