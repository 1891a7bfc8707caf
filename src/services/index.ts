// ============================================================================
// Cash Logistics MCP Server — Services Barrel Export
// ============================================================================

export { QueryExecutor } from "./query-executor.service.js";
export type { QueryExecutorOptions } from "./query-executor.service.js";
export { MissedPickupRuleService } from "./missed-pickup-rule.service.js";
export { RiskScoringRuleService, classifyRisk } from "./risk-scoring-rule.service.js";
export { ScheduleMismatchRuleService } from "./schedule-mismatch-rule.service.js";
export { ConsolidationRuleService } from "./consolidation-rule.service.js";
export { CostAnalysisRuleService } from "./cost-analysis-rule.service.js";
export { FindingsService } from "./findings.service.js";

import type { Repositories } from "../repositories/index.js";
import { ConsolidationRuleService } from "./consolidation-rule.service.js";
import { CostAnalysisRuleService } from "./cost-analysis-rule.service.js";
import { FindingsService } from "./findings.service.js";
import { MissedPickupRuleService } from "./missed-pickup-rule.service.js";
import { RiskScoringRuleService } from "./risk-scoring-rule.service.js";
import { ScheduleMismatchRuleService } from "./schedule-mismatch-rule.service.js";

/** The rule engine: every rule reads through the repositories, never writes. */
export interface RuleServices {
    missed: MissedPickupRuleService;
    risk: RiskScoringRuleService;
    mismatch: ScheduleMismatchRuleService;
    consolidation: ConsolidationRuleService;
    cost: CostAnalysisRuleService;
    findings: FindingsService;
}

export function createRuleServices(repos: Repositories): RuleServices {
    const missed = new MissedPickupRuleService(repos);
    const risk = new RiskScoringRuleService(repos);
    const mismatch = new ScheduleMismatchRuleService(repos);
    const consolidation = new ConsolidationRuleService(repos);
    return {
        missed,
        risk,
        mismatch,
        consolidation,
        cost: new CostAnalysisRuleService(repos),
        findings: new FindingsService(missed, risk, mismatch, consolidation),
    };
}
