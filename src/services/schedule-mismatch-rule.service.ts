// ============================================================================
// Cash Logistics MCP Server — Schedule-Mismatch Rule
// ============================================================================

import { DAY_NAMES } from "../constants.js";
import type { Repositories } from "../repositories/index.js";
import type { DateRange, MismatchFlag, MismatchRuleConfig, ScheduleMismatch, ServiceClassification } from "../types.js";

export interface MismatchQuery extends DateRange {
    storeId?: string;
}

/** Weekday with the largest deposit total; earliest weekday on ties. Null when nothing was deposited. */
export function peakDay(totals: readonly number[]): number | null {
    let best: number | null = null;
    for (let day = 0; day < totals.length; day++) {
        if (totals[day] <= 0) continue;
        if (best === null || totals[day] > totals[best]) best = day;
    }
    return best;
}

/**
 * Days from `peak` forward to the nearest pickup day, wrapping across the week.
 */
export function forwardGap(peak: number, pickupDays: readonly number[]): number | null {
    if (pickupDays.length === 0) return null;
    return Math.min(...pickupDays.map((d) => (d - peak + 7) % 7));
}

export function classifyService(
    avgDailyDeposit: number,
    pickupsPerWeek: number,
    config: MismatchRuleConfig
): ServiceClassification {
    if (avgDailyDeposit < config.lowVolumeThreshold && pickupsPerWeek >= config.overServicedMinPickups) {
        return "over_serviced";
    }
    if (avgDailyDeposit >= config.highVolumeThreshold && pickupsPerWeek <= config.underServicedMaxPickups) {
        return "under_serviced";
    }
    return "balanced";
}

export class ScheduleMismatchRuleService {
    constructor(private repos: Repositories) { }

    /** Only stores with at least one flag are returned. */
    detect(query: MismatchQuery, config: MismatchRuleConfig): ScheduleMismatch[] {
        const { from, to, storeId } = query;
        const totalsByStore = this.repos.stores.depositTotalsByWeekday(from, to, storeId);

        const pickupDaysByStore = new Map<string, Set<number>>();
        for (const s of this.repos.schedules.active(storeId)) {
            const days = pickupDaysByStore.get(s.storeId) ?? new Set<number>();
            days.add(s.dayOfWeek);
            pickupDaysByStore.set(s.storeId, days);
        }

        const out: ScheduleMismatch[] = [];
        for (const store of this.repos.stores.list(storeId)) {
            const totals = totalsByStore.get(store.storeId);
            const peak = totals ? peakDay(totals) : null;
            const pickupDays = [...(pickupDaysByStore.get(store.storeId) ?? [])].sort((a, b) => a - b);
            const gap = peak === null ? null : forwardGap(peak, pickupDays);
            const classification = classifyService(store.avgDailyDeposit, pickupDays.length, config);

            const flags: MismatchFlag[] = [];
            if (peak !== null && (gap === null || gap > config.peakDayTolerance)) flags.push("peak_day_gap");
            if (classification !== "balanced") flags.push(classification);
            if (flags.length === 0) continue;

            out.push({
                storeId: store.storeId,
                storeName: store.name,
                avgDailyDeposit: store.avgDailyDeposit,
                peakDepositDay: peak,
                peakDepositDayName: peak === null ? null : DAY_NAMES[peak],
                pickupDays,
                pickupsPerWeek: pickupDays.length,
                peakGapDays: gap,
                classification,
                flags,
            });
        }
        return out;
    }
}
