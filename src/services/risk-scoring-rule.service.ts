// ============================================================================
// Cash Logistics MCP Server — Risk Scoring Rule
// ============================================================================

import type { Repositories } from "../repositories/index.js";
import type { RiskReason, RiskRuleConfig, RiskScore } from "../types.js";
import { diffDays, roundCurrency } from "../utils.js";

export interface RiskQuery {
    asOf: string;
    storeId?: string;
}

/**
 * Reasons a store is high risk. Empty means not high risk.
 * `daysSinceLastPickup` is null when the store has no completed pickup on record.
 */
export function classifyRisk(
    avgDailyDeposit: number,
    daysSinceLastPickup: number | null,
    config: RiskRuleConfig
): RiskReason[] {
    if (daysSinceLastPickup === null) return ["no_completed_pickup"];

    const reasons: RiskReason[] = [];
    if (avgDailyDeposit >= config.highVolumeThreshold && daysSinceLastPickup > config.highVolumeMaxDays) {
        reasons.push("high_volume_overdue");
    }
    if (daysSinceLastPickup * 24 > config.cashSittingHours) {
        reasons.push("cash_sitting_too_long");
    }
    return reasons;
}

export class RiskScoringRuleService {
    constructor(private repos: Repositories) { }

    /** High-risk stores first, then by cash at risk. */
    score(query: RiskQuery, config: RiskRuleConfig): RiskScore[] {
        const { asOf, storeId } = query;
        const lastCompleted = this.repos.pickups.lastCompleted(asOf, storeId);

        const scores = this.repos.stores.list(storeId).map((store): RiskScore => {
            const last = lastCompleted.get(store.storeId) ?? null;
            const days = last === null ? null : diffDays(last, asOf);
            const reasons = classifyRisk(store.avgDailyDeposit, days, config);
            return {
                storeId: store.storeId,
                storeName: store.name,
                avgDailyDeposit: store.avgDailyDeposit,
                lastCompletedPickup: last,
                daysSinceLastPickup: days,
                hoursSinceLastPickup: days === null ? null : days * 24,
                highRisk: reasons.length > 0,
                reasons,
                cashAtRisk: days === null ? null : roundCurrency(store.avgDailyDeposit * days),
            };
        });

        return scores.sort((a, b) =>
            Number(b.highRisk) - Number(a.highRisk) ||
            (b.cashAtRisk ?? 0) - (a.cashAtRisk ?? 0) ||
            a.storeId.localeCompare(b.storeId)
        );
    }
}
