// ============================================================================
// Risk Scoring Rule Tests
// ============================================================================

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { defaultRuleConfig } from "../../src/config.js";
import { classifyRisk } from "../../src/services/risk-scoring-rule.service.js";
import { addDays } from "../../src/utils.js";
import { createTestStore, insertPickup, insertStore, type TestStore } from "../helpers/test-db.js";

const RISK = defaultRuleConfig().risk;

describe("classifyRisk", () => {
    it("flags high-volume stores overdue past the allowed days", () => {
        expect(classifyRisk(50000, 1, RISK)).toEqual([]);
        expect(classifyRisk(50000, 2, RISK)).toEqual(["high_volume_overdue"]);
        expect(classifyRisk(29999, 2, RISK)).toEqual([]);
    });

    it("flags cash sitting longer than the threshold", () => {
        expect(classifyRisk(1000, 2, RISK)).toEqual([]);
        expect(classifyRisk(1000, 3, RISK)).toEqual(["cash_sitting_too_long"]);
        expect(classifyRisk(50000, 3, RISK)).toEqual(["high_volume_overdue", "cash_sitting_too_long"]);
    });

    it("flags stores with no completed pickup", () => {
        expect(classifyRisk(0, null, RISK)).toEqual(["no_completed_pickup"]);
    });

    it("flips to high risk once past 48 hours and stays there, volume held fixed", () => {
        const flags = [0, 1, 2, 3, 4, 5, 6].map((days) => classifyRisk(1000, days, RISK).length > 0);
        expect(flags).toEqual([false, false, false, true, true, true, true]);
    });

    it("honours per-call thresholds", () => {
        expect(classifyRisk(1000, 2, { ...RISK, cashSittingHours: 24 })).toEqual(["cash_sitting_too_long"]);
        expect(classifyRisk(20000, 2, { ...RISK, highVolumeThreshold: 20000 })).toEqual(["high_volume_overdue"]);
    });
});

describe("RiskScoringRuleService", () => {
    let store: TestStore;

    beforeEach(() => {
        store = createTestStore();
        insertStore(store.db, { storeId: "S1", avgDailyDeposit: 40000 });
        insertStore(store.db, { storeId: "S2", avgDailyDeposit: 2000 });
        insertStore(store.db, { storeId: "S3", avgDailyDeposit: 5000 });
        insertStore(store.db, { storeId: "S4", avgDailyDeposit: 1000 });
        insertPickup(store.db, "S1", "2025-03-10", "completed");
        insertPickup(store.db, "S2", "2025-03-11", "completed");
        insertPickup(store.db, "S4", "2025-03-08", "completed");
        insertPickup(store.db, "S4", "2025-03-11", "missed");
    });

    afterEach(() => {
        store.cleanup();
    });

    it("scores every store, high risk first", () => {
        const scores = store.rules.risk.score({ asOf: "2025-03-12" }, RISK);

        expect(scores.map((s) => [s.storeId, s.highRisk])).toEqual([
            ["S1", true],
            ["S4", true],
            ["S3", true],
            ["S2", false],
        ]);
        expect(scores[0]).toEqual({
            storeId: "S1",
            storeName: "Store S1",
            avgDailyDeposit: 40000,
            lastCompletedPickup: "2025-03-10",
            daysSinceLastPickup: 2,
            hoursSinceLastPickup: 48,
            highRisk: true,
            reasons: ["high_volume_overdue"],
            cashAtRisk: 80000,
        });
        expect(scores[1]).toMatchObject({ reasons: ["cash_sitting_too_long"], hoursSinceLastPickup: 96, cashAtRisk: 4000 });
        expect(scores[2]).toMatchObject({ reasons: ["no_completed_pickup"], lastCompletedPickup: null, cashAtRisk: null });
    });

    it("ignores completed pickups after the as-of date", () => {
        insertPickup(store.db, "S2", "2025-03-20", "completed");

        const [s2] = store.rules.risk.score({ asOf: "2025-03-12", storeId: "S2" }, RISK);
        expect(s2).toMatchObject({ storeId: "S2", lastCompletedPickup: "2025-03-11", daysSinceLastPickup: 1 });
    });

    it("becomes high risk as the as-of date moves past 48 hours", () => {
        const highRiskOn = (asOf: string) => store.rules.risk.score({ asOf, storeId: "S2" }, RISK)[0]?.highRisk;

        expect(highRiskOn(addDays("2025-03-11", 2))).toBe(false);
        expect(highRiskOn(addDays("2025-03-11", 3))).toBe(true);
    });
});
