// ============================================================================
// Cash Logistics MCP Server — Tool Definitions
// ============================================================================
//
// The tool set is closed: one variant per tool in ToolCallSchema. Adding a
// tool means adding a variant here and a case in the dispatcher's switch,
// which the compiler checks for exhaustiveness.

import type { Tool, ToolAnnotations } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { InvalidArgumentsError, UnknownToolError } from "../errors.js";
import { IsoDateSchema, toEpochDay } from "../utils.js";

// ─── Argument Schemas ────────────────────────────────────────────────────────

const StoreId = z.string().min(1).describe("Restrict to one store (stores.store_id).");

function rangeIsOrdered(v: { from: string; to: string }): boolean {
  const from = toEpochDay(v.from);
  const to = toEpochDay(v.to);
  return from === null || to === null || from <= to;
}

const RANGE_ORDER = { message: "from must not be after to", path: ["from"] };

export const ListTablesArgs = z.object({}).strict();

export const DescribeTableArgs = z.object({
  table_name: z.string().min(1).describe("Name of the table to describe."),
}).strict();

export const QueryArgs = z.object({
  query: z.string().min(1).describe("A single SQL statement."),
}).strict();

export const MissedPickupArgs = z.object({
  from: IsoDateSchema.describe("First scheduled date to check (YYYY-MM-DD)."),
  to: IsoDateSchema.describe("Last scheduled date to check (YYYY-MM-DD), inclusive."),
  store_id: StoreId.optional(),
  trailing_deposit_days: z.number().int().positive().optional()
    .describe("Days of deposits, ending at `to`, behind the trailing daily average."),
}).strict().refine(rangeIsOrdered, RANGE_ORDER);

export const RiskArgs = z.object({
  as_of: IsoDateSchema.optional().describe("Date to score against (YYYY-MM-DD). Defaults to today."),
  store_id: StoreId.optional(),
  high_volume_threshold: z.number().nonnegative().optional(),
  high_volume_max_days: z.number().int().nonnegative().optional(),
  cash_sitting_hours: z.number().positive().optional(),
}).strict();

export const MismatchArgs = z.object({
  from: IsoDateSchema.describe("First deposit date to analyse (YYYY-MM-DD)."),
  to: IsoDateSchema.describe("Last deposit date to analyse (YYYY-MM-DD), inclusive."),
  store_id: StoreId.optional(),
  peak_day_tolerance: z.number().int().min(0).max(6).optional(),
  low_volume_threshold: z.number().nonnegative().optional(),
  over_serviced_min_pickups: z.number().int().min(0).max(7).optional(),
  high_volume_threshold: z.number().nonnegative().optional(),
  under_serviced_max_pickups: z.number().int().min(0).max(7).optional(),
}).strict().refine(rangeIsOrdered, RANGE_ORDER);

export const ConsolidationArgs = z.object({
  store_id: StoreId.optional(),
  max_distance_km: z.number().positive().optional()
    .describe("Only used when stores carry latitude/longitude."),
}).strict();

export const CostArgs = z.object({
  from: IsoDateSchema.describe("First scheduled pickup date to cost (YYYY-MM-DD)."),
  to: IsoDateSchema.describe("Last scheduled pickup date to cost (YYYY-MM-DD), inclusive."),
  store_id: StoreId.optional().describe("Restrict to one store. Invoice reconciliation is skipped."),
  overtime_share_threshold: z.number().min(0).max(1).optional()
    .describe("Flag stores whose overtime share of pickup cost exceeds this fraction."),
}).strict().refine(rangeIsOrdered, RANGE_ORDER);

export const FindingsArgs = z.object({
  from: IsoDateSchema.describe("Start of the analysis window (YYYY-MM-DD)."),
  to: IsoDateSchema.describe("End of the analysis window (YYYY-MM-DD), inclusive."),
  as_of: IsoDateSchema.optional().describe("Date for risk scoring. Defaults to `to`."),
}).strict().refine(rangeIsOrdered, RANGE_ORDER);

// ─── Closed Variant Set ──────────────────────────────────────────────────────

export const ToolCallSchema = z.discriminatedUnion("tool", [
  z.object({ tool: z.literal("list_tables"), args: ListTablesArgs }),
  z.object({ tool: z.literal("describe_table"), args: DescribeTableArgs }),
  z.object({ tool: z.literal("read_query"), args: QueryArgs }),
  z.object({ tool: z.literal("write_query"), args: QueryArgs }),
  z.object({ tool: z.literal("detect_missed_pickups"), args: MissedPickupArgs }),
  z.object({ tool: z.literal("score_risk"), args: RiskArgs }),
  z.object({ tool: z.literal("detect_schedule_mismatches"), args: MismatchArgs }),
  z.object({ tool: z.literal("find_consolidation_opportunities"), args: ConsolidationArgs }),
  z.object({ tool: z.literal("analyze_costs"), args: CostArgs }),
  z.object({ tool: z.literal("generate_findings"), args: FindingsArgs }),
]);

export type ToolCall = z.infer<typeof ToolCallSchema>;
export type ToolName = ToolCall["tool"];

interface ToolInfo {
  title: string;
  description: string;
  args: z.ZodTypeAny;
  annotations: ToolAnnotations;
}

const READ_ONLY: ToolAnnotations = { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false };

export const TOOL_INFO: Record<ToolName, ToolInfo> = {
  list_tables: {
    title: "List Tables",
    description: "List all tables in the cash-logistics database.",
    args: ListTablesArgs,
    annotations: READ_ONLY,
  },
  describe_table: {
    title: "Describe Table",
    description: "Get the columns of one table: name, declared type, nullability, primary key, default.",
    args: DescribeTableArgs,
    annotations: READ_ONLY,
  },
  read_query: {
    title: "Read Query",
    description: "Run a single SELECT (or WITH … SELECT) statement. Statements that modify data are rejected.",
    args: QueryArgs,
    annotations: READ_ONLY,
  },
  write_query: {
    title: "Write Query",
    description: "Run a single INSERT, UPDATE or DELETE statement atomically. Returns the affected row count.",
    args: QueryArgs,
    annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: false, openWorldHint: false },
  },
  detect_missed_pickups: {
    title: "Detect Missed Pickups",
    description:
      "List scheduled pickups in a date range with no completed outcome, with estimated cash at risk " +
      "(trailing average daily deposit × days since the last completed pickup).",
    args: MissedPickupArgs,
    annotations: READ_ONLY,
  },
  score_risk: {
    title: "Score Risk",
    description:
      "Classify stores as high risk: high-volume stores overdue for pickup, or any store whose cash " +
      "has sat longer than the cash-sitting threshold (48 hours by default).",
    args: RiskArgs,
    annotations: READ_ONLY,
  },
  detect_schedule_mismatches: {
    title: "Detect Schedule Mismatches",
    description:
      "Compare each store's peak deposit weekday with its pickup days and flag over- or under-serviced stores.",
    args: MismatchArgs,
    annotations: READ_ONLY,
  },
  find_consolidation_opportunities: {
    title: "Find Consolidation Opportunities",
    description: "Group stores served by the same carrier on the same weekday at different times as merge candidates.",
    args: ConsolidationArgs,
    annotations: READ_ONLY,
  },
  analyze_costs: {
    title: "Analyze Costs",
    description:
      "Pickup cost per stop and per dollar collected, by store and carrier, overtime share by month, " +
      "and carrier invoices reconciled against recorded stops.",
    args: CostArgs,
    annotations: READ_ONLY,
  },
  generate_findings: {
    title: "Generate Findings",
    description:
      "Run every rule and return structured findings (location, kind, severity, cash at risk, summary) for alerting.",
    args: FindingsArgs,
    annotations: READ_ONLY,
  },
};

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INFO, name);
}

/**
 * Validate a tool name and its arguments into a ToolCall. Pure: touches no store.
 */
export function parseToolCall(name: string, args: unknown): ToolCall {
  if (!isToolName(name)) throw new UnknownToolError(name);

  const parsed = ToolCallSchema.safeParse({ tool: name, args: args ?? {} });
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => {
        const field = issue.path.slice(1).join(".");
        return field ? `${field}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new InvalidArgumentsError(name, detail);
  }
  return parsed.data;
}

// ─── Listing ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toInputSchema(schema: z.ZodTypeAny): Tool["inputSchema"] {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: "none" });
  const properties = isRecord(json) && isRecord(json.properties) ? json.properties : {};
  const required = isRecord(json) && Array.isArray(json.required)
    ? json.required.filter((r): r is string => typeof r === "string")
    : [];
  return {
    type: "object",
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false,
  };
}

export function listTools(): Tool[] {
  return Object.entries(TOOL_INFO).map(([name, info]) => ({
    name,
    title: info.title,
    description: info.description,
    inputSchema: toInputSchema(info.args),
    annotations: info.annotations,
  }));
}
