// ============================================================================
// Cash Logistics MCP Server — Missed-Pickup Rule
// ============================================================================

import type { Repositories } from "../repositories/index.js";
import type {
    ActiveSchedule,
    DateRange,
    MissedPickup,
    MissedPickupReport,
    MissedPickupRuleConfig,
    PickupStatus,
} from "../types.js";
import { addDays, diffDays, eachDate, roundCurrency, weekdayOf } from "../utils.js";

export interface MissedPickupQuery extends DateRange {
    storeId?: string;
}

/**
 * A scheduled occurrence is missed when no `completed` outcome exists for
 * its store and date. A `missed` or `late` record, or no record at all, all
 * count as missed.
 */
export class MissedPickupRuleService {
    constructor(private repos: Repositories) { }

    detect(query: MissedPickupQuery, config: MissedPickupRuleConfig): MissedPickupReport {
        const { from, to, storeId } = query;

        const stores = new Map(this.repos.stores.list(storeId).map((s) => [s.storeId, s]));
        const trailingFrom = addDays(to, -(config.trailingDepositDays - 1));
        const averages = this.repos.stores.averageDailyDeposits(trailingFrom, to, storeId);

        // Best recorded status per (store, date); completed wins over missed/late.
        const statusByKey = new Map<string, PickupStatus>();
        const completedByStore = new Map<string, string[]>();
        for (const outcome of this.repos.pickups.outcomesBetween(from, to, storeId)) {
            const key = `${outcome.storeId}|${outcome.date}`;
            if (outcome.status === "completed") {
                statusByKey.set(key, "completed");
                const list = completedByStore.get(outcome.storeId) ?? [];
                list.push(outcome.date);
                completedByStore.set(outcome.storeId, list);
            } else if (statusByKey.get(key) !== "completed") {
                statusByKey.set(key, outcome.status);
            }
        }

        const dates = eachDate(from, to);
        const missed: MissedPickup[] = [];

        for (const [sid, byWeekday] of groupByStoreAndWeekday(this.repos.schedules.active(storeId))) {
            const store = stores.get(sid);
            const avg = averages.get(sid) ?? store?.avgDailyDeposit ?? 0;
            const completed = completedByStore.get(sid) ?? [];

            // No completed pickup yet in range: exposure accrues from the range start.
            let lastCompleted = addDays(from, -1);
            let cursor = 0;

            for (const date of dates) {
                while (cursor < completed.length && completed[cursor] < date) {
                    lastCompleted = completed[cursor];
                    cursor++;
                }

                const schedule = byWeekday.get(weekdayOf(date));
                if (!schedule) continue;

                const status = statusByKey.get(`${sid}|${date}`) ?? null;
                if (status === "completed") continue;

                const daysSince = Math.max(1, diffDays(lastCompleted, date));
                missed.push({
                    storeId: sid,
                    storeName: store?.name ?? sid,
                    scheduledDate: date,
                    scheduledTime: schedule.scheduledTime,
                    carrierId: schedule.carrierId,
                    outcomeStatus: status,
                    daysSinceLastPickup: daysSince,
                    trailingAvgDailyDeposit: roundCurrency(avg),
                    cashAtRisk: roundCurrency(avg * daysSince),
                });
            }
        }

        // Exposure accrues until a completed pickup clears it: the store's latest
        // record carries it, unless a completion in range came after that record.
        const latestByStore = new Map<string, MissedPickup>();
        for (const m of missed) latestByStore.set(m.storeId, m);

        const exposureByStore: Record<string, number> = {};
        for (const [sid, latest] of latestByStore) {
            const completed = completedByStore.get(sid) ?? [];
            const lastDone = completed[completed.length - 1];
            exposureByStore[sid] = lastDone !== undefined && lastDone > latest.scheduledDate ? 0 : latest.cashAtRisk;
        }
        const totalCashAtRisk = roundCurrency(Object.values(exposureByStore).reduce((sum, v) => sum + v, 0));

        return { range: { from, to }, missed, exposureByStore, totalCashAtRisk };
    }
}

/**
 * store → weekday → schedule. Schedules arrive ordered, so the first one
 * wins if the one-per-(store, weekday) invariant is ever broken.
 */
function groupByStoreAndWeekday(schedules: ActiveSchedule[]): Map<string, Map<number, ActiveSchedule>> {
    const out = new Map<string, Map<number, ActiveSchedule>>();
    for (const s of schedules) {
        let days = out.get(s.storeId);
        if (!days) {
            days = new Map();
            out.set(s.storeId, days);
        }
        if (!days.has(s.dayOfWeek)) days.set(s.dayOfWeek, s);
    }
    return out;
}
