// ============================================================================
// Cash Logistics MCP Server — Findings
// ============================================================================
//
// Maps rule output onto the alert payload consumed by the messaging side.
// Nothing here formats for, or sends to, a channel.

import { DAY_NAMES } from "../constants.js";
import type {
    ConsolidationOpportunity,
    Finding,
    MissedPickup,
    RiskScore,
    RuleConfig,
    ScheduleMismatch,
    Severity,
} from "../types.js";
import { formatUsd, weekdayOf } from "../utils.js";
import type { ConsolidationRuleService } from "./consolidation-rule.service.js";
import type { MissedPickupRuleService } from "./missed-pickup-rule.service.js";
import type { RiskScoringRuleService } from "./risk-scoring-rule.service.js";
import type { ScheduleMismatchRuleService } from "./schedule-mismatch-rule.service.js";

export interface FindingsQuery {
    from: string;
    to: string;
    asOf: string;
}

const SEVERITY_RANK: Record<Severity, number> = { critical: 0, high: 1, medium: 2, low: 3 };

export function missedPickupFinding(m: MissedPickup, config: RuleConfig): Finding {
    const outcome = m.outcomeStatus === null ? "no outcome recorded" : `recorded as ${m.outcomeStatus}`;
    return {
        locationId: m.storeId,
        kind: "missed-pickup",
        severity: m.cashAtRisk >= config.risk.highVolumeThreshold ? "high" : "medium",
        cashAtRisk: m.cashAtRisk,
        summary:
            `${m.storeName}: pickup scheduled ${DAY_NAMES[weekdayOf(m.scheduledDate)]} ${m.scheduledDate} ` +
            `at ${m.scheduledTime} not completed (${outcome}); ` +
            `${m.daysSinceLastPickup} day(s) of cash, ${formatUsd(m.cashAtRisk)} at risk.`,
    };
}

export function riskFinding(r: RiskScore): Finding {
    const both = r.reasons.includes("high_volume_overdue") && r.reasons.includes("cash_sitting_too_long");
    const detail = r.daysSinceLastPickup === null
        ? "no completed pickup on record"
        : `${r.hoursSinceLastPickup} hours since last completed pickup on ${r.lastCompletedPickup}`;
    return {
        locationId: r.storeId,
        kind: "high-risk",
        severity: both ? "critical" : "high",
        cashAtRisk: r.cashAtRisk,
        summary:
            `${r.storeName}: ${detail}; averages ${formatUsd(r.avgDailyDeposit)}/day` +
            (r.cashAtRisk === null ? "." : `, ${formatUsd(r.cashAtRisk)} on hand.`),
    };
}

export function mismatchFinding(m: ScheduleMismatch): Finding {
    const parts: string[] = [];
    if (m.classification === "over_serviced") {
        parts.push(`over-serviced: ${m.pickupsPerWeek} pickups/week for ${formatUsd(m.avgDailyDeposit)}/day`);
    } else if (m.classification === "under_serviced") {
        parts.push(`under-serviced: ${m.pickupsPerWeek} pickups/week for ${formatUsd(m.avgDailyDeposit)}/day`);
    }
    if (m.flags.includes("peak_day_gap")) {
        parts.push(
            m.peakGapDays === null
                ? `deposits peak on ${m.peakDepositDayName} but no pickups are scheduled`
                : `deposits peak on ${m.peakDepositDayName}, next pickup ${m.peakGapDays} day(s) later`
        );
    }
    return {
        locationId: m.storeId,
        kind: "schedule-mismatch",
        severity: m.classification === "under_serviced" ? "medium" : "low",
        cashAtRisk: null,
        summary: `${m.storeName}: ${parts.join("; ")}.`,
    };
}

export function consolidationFindings(o: ConsolidationOpportunity): Finding[] {
    const stops = o.stores.map((s) => `${s.storeId} at ${s.scheduledTime}`).join(", ");
    const carrier = o.carrierName ?? `carrier ${o.carrierId}`;
    const savings = o.estimatedWeeklySavings === null ? "" : ` (~${formatUsd(o.estimatedWeeklySavings)}/week)`;
    const summary = `${carrier} visits ${stops} on ${o.dayName}; merging saves ${o.stopsSaved} stop(s)/week${savings}.`;
    return o.stores.map((s) => ({
        locationId: s.storeId,
        kind: "consolidation-opportunity" as const,
        severity: "low" as const,
        cashAtRisk: null,
        summary,
    }));
}

export class FindingsService {
    constructor(
        private missed: MissedPickupRuleService,
        private risk: RiskScoringRuleService,
        private mismatch: ScheduleMismatchRuleService,
        private consolidation: ConsolidationRuleService
    ) { }

    /** Severity first, then cash at risk, then location. */
    build(query: FindingsQuery, config: RuleConfig): Finding[] {
        const range = { from: query.from, to: query.to };
        const findings: Finding[] = [
            ...this.missed.detect(range, config.missed).missed.map((m) => missedPickupFinding(m, config)),
            ...this.risk.score({ asOf: query.asOf }, config.risk).filter((r) => r.highRisk).map(riskFinding),
            ...this.mismatch.detect(range, config.mismatch).map(mismatchFinding),
            ...this.consolidation.find({}, config.consolidation).flatMap(consolidationFindings),
        ];

        return findings.sort((a, b) =>
            SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
            (b.cashAtRisk ?? 0) - (a.cashAtRisk ?? 0) ||
            a.locationId.localeCompare(b.locationId)
        );
    }
}
