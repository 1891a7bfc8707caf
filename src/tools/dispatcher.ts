// ============================================================================
// Cash Logistics MCP Server — Tool Dispatcher
// ============================================================================

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { toCashLogisticsError } from "../errors.js";
import { errorContext, log } from "../logger.js";
import type { Repositories } from "../repositories/index.js";
import { failure, success } from "../response.js";
import type { QueryExecutor } from "../services/query-executor.service.js";
import type { RuleServices } from "../services/index.js";
import type { ExecutionResult, RuleConfig } from "../types.js";
import { roundCurrency, todayIso } from "../utils.js";
import { parseToolCall, type ToolCall } from "./definitions.js";

export interface DispatcherDeps {
  executor: QueryExecutor;
  repos: Repositories;
  rules: RuleServices;
  config: RuleConfig;
  /** Source of "today" for tools whose as_of defaults to the current date. */
  today?: () => string;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled tool call: ${JSON.stringify(value)}`);
}

function executionPayload(result: ExecutionResult): Record<string, unknown> {
  if (result.kind === "rows") {
    return { columns: result.columns, rows: result.rows, rowCount: result.rowCount };
  }
  return { affectedRows: result.changes, lastInsertRowid: result.lastInsertRowid };
}

/**
 * Routes a validated ToolCall to the catalog, the executor or a rule.
 * `handle` is the protocol-facing entry point: it never throws, every call
 * yields exactly one CallToolResult.
 */
export class ToolDispatcher {
  private readonly today: () => string;

  constructor(private deps: DispatcherDeps) {
    this.today = deps.today ?? (() => todayIso());
  }

  handle(name: string, args: unknown): CallToolResult {
    const started = Date.now();
    const toolLog = log.child("dispatcher", { tool: name });
    try {
      const call = parseToolCall(name, args);
      const data = this.dispatch(call);
      toolLog.debug("Tool call ok", { ms: Date.now() - started });
      return success(data);
    } catch (err) {
      const e = toCashLogisticsError(err);
      toolLog.warn("Tool call failed", { ...errorContext(e), ms: Date.now() - started });
      return failure(e);
    }
  }

  dispatch(call: ToolCall): Record<string, unknown> {
    const { executor, repos, rules, config } = this.deps;

    switch (call.tool) {
      case "list_tables": {
        const tables = repos.catalog.listTables();
        return { tables, count: tables.length };
      }

      case "describe_table": {
        return { table: call.args.table_name, columns: repos.catalog.describeTable(call.args.table_name) };
      }

      case "read_query":
        return executionPayload(executor.execute(call.args.query, "read"));

      case "write_query":
        return executionPayload(executor.execute(call.args.query, "write"));

      case "detect_missed_pickups": {
        const { from, to, store_id, trailing_deposit_days } = call.args;
        const report = rules.missed.detect(
          { from, to, storeId: store_id },
          { trailingDepositDays: trailing_deposit_days ?? config.missed.trailingDepositDays }
        );
        return {
          range: report.range,
          missed: report.missed,
          count: report.missed.length,
          exposureByStore: report.exposureByStore,
          totalCashAtRisk: report.totalCashAtRisk,
        };
      }

      case "score_risk": {
        const a = call.args;
        const asOf = a.as_of ?? this.today();
        const scores = rules.risk.score(
          { asOf, storeId: a.store_id },
          {
            highVolumeThreshold: a.high_volume_threshold ?? config.risk.highVolumeThreshold,
            highVolumeMaxDays: a.high_volume_max_days ?? config.risk.highVolumeMaxDays,
            cashSittingHours: a.cash_sitting_hours ?? config.risk.cashSittingHours,
          }
        );
        return { asOf, stores: scores, highRiskCount: scores.filter((s) => s.highRisk).length };
      }

      case "detect_schedule_mismatches": {
        const a = call.args;
        const mismatches = rules.mismatch.detect(
          { from: a.from, to: a.to, storeId: a.store_id },
          {
            peakDayTolerance: a.peak_day_tolerance ?? config.mismatch.peakDayTolerance,
            lowVolumeThreshold: a.low_volume_threshold ?? config.mismatch.lowVolumeThreshold,
            overServicedMinPickups: a.over_serviced_min_pickups ?? config.mismatch.overServicedMinPickups,
            highVolumeThreshold: a.high_volume_threshold ?? config.mismatch.highVolumeThreshold,
            underServicedMaxPickups: a.under_serviced_max_pickups ?? config.mismatch.underServicedMaxPickups,
          }
        );
        return { range: { from: a.from, to: a.to }, mismatches, count: mismatches.length };
      }

      case "find_consolidation_opportunities": {
        const opportunities = rules.consolidation.find(
          { storeId: call.args.store_id },
          { maxDistanceKm: call.args.max_distance_km ?? config.consolidation.maxDistanceKm }
        );
        // Groups whose carrier has no base cost are counted, not priced.
        const priced = opportunities.flatMap((o) => (o.estimatedWeeklySavings === null ? [] : [o.estimatedWeeklySavings]));
        return {
          opportunities,
          count: opportunities.length,
          estimatedWeeklySavings: priced.length === 0 ? null : roundCurrency(priced.reduce((sum, v) => sum + v, 0)),
          unpricedCount: opportunities.length - priced.length,
        };
      }

      case "analyze_costs": {
        const { from, to, store_id, overtime_share_threshold } = call.args;
        const report = rules.cost.analyze(
          { from, to, storeId: store_id },
          { overtimeShareThreshold: overtime_share_threshold ?? config.cost.overtimeShareThreshold }
        );
        return {
          ...report,
          highOvertimeCount: report.stores.filter((s) => s.highOvertime).length,
          invoiceDiscrepancyCount: report.invoices.filter((i) => i.status !== "matched").length,
        };
      }

      case "generate_findings": {
        const { from, to } = call.args;
        const asOf = call.args.as_of ?? to;
        const findings = rules.findings.build({ from, to, asOf }, config);
        return { range: { from, to }, asOf, findings, count: findings.length };
      }

      default:
        return assertNever(call);
    }
  }
}
