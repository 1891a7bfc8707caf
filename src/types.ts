// ============================================================================
// Cash Logistics MCP Server — Type Definitions
// ============================================================================

import type { PICKUP_STATUSES } from "./constants.js";

// ─── Query Executor ─────────────────────────────────────────────────────────

export type QueryMode = "read" | "write";

export type SqlParam = string | number | bigint | Uint8Array | null;

export interface RowsResult {
  kind: "rows";
  columns: string[];
  rows: unknown[][];
  rowCount: number;
}

export interface AffectedResult {
  kind: "affected";
  changes: number;
  lastInsertRowid: number;
}

export type ExecutionResult = RowsResult | AffectedResult;

// ─── Schema Catalog ─────────────────────────────────────────────────────────

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  primaryKey: boolean;
  defaultValue: string | null;
}

// ─── Domain ─────────────────────────────────────────────────────────────────

export type PickupStatus = (typeof PICKUP_STATUSES)[number];

export interface StoreSummary {
  storeId: string;
  name: string;
  region: string | null;
  avgDailyDeposit: number;
  currentPickupFrequency: number | null;
}

export interface ActiveSchedule {
  scheduleId: number;
  storeId: string;
  carrierId: number;
  carrierName: string | null;
  basePickupCost: number | null;
  dayOfWeek: number;
  scheduledTime: string;
}

export interface StoreCoordinates {
  storeId: string;
  latitude: number;
  longitude: number;
}

// ─── Rule Configuration ─────────────────────────────────────────────────────

export interface RiskRuleConfig {
  /** Average daily volume at or above which a store counts as high volume. */
  highVolumeThreshold: number;
  /** High-volume stores become high risk past this many days without a completed pickup. */
  highVolumeMaxDays: number;
  /** Any store becomes high risk once cash has sat longer than this. */
  cashSittingHours: number;
}

export interface MissedPickupRuleConfig {
  trailingDepositDays: number;
}

export interface MismatchRuleConfig {
  peakDayTolerance: number;
  lowVolumeThreshold: number;
  overServicedMinPickups: number;
  highVolumeThreshold: number;
  underServicedMaxPickups: number;
}

export interface ConsolidationRuleConfig {
  maxDistanceKm: number;
}

export interface CostRuleConfig {
  /** Stores whose overtime share of total pickup cost exceeds this are flagged. */
  overtimeShareThreshold: number;
}

export interface RuleConfig {
  risk: RiskRuleConfig;
  missed: MissedPickupRuleConfig;
  mismatch: MismatchRuleConfig;
  consolidation: ConsolidationRuleConfig;
  cost: CostRuleConfig;
}

// ─── Rule Outputs ───────────────────────────────────────────────────────────

export interface DateRange {
  from: string;
  to: string;
}

export interface MissedPickup {
  storeId: string;
  storeName: string;
  scheduledDate: string;
  scheduledTime: string;
  carrierId: number;
  /** Outcome recorded for the date, or null when no record exists at all. */
  outcomeStatus: PickupStatus | null;
  daysSinceLastPickup: number;
  trailingAvgDailyDeposit: number;
  cashAtRisk: number;
}

export interface MissedPickupReport {
  range: DateRange;
  missed: MissedPickup[];
  exposureByStore: Record<string, number>;
  totalCashAtRisk: number;
}

export type RiskReason = "high_volume_overdue" | "cash_sitting_too_long" | "no_completed_pickup";

export interface RiskScore {
  storeId: string;
  storeName: string;
  avgDailyDeposit: number;
  lastCompletedPickup: string | null;
  daysSinceLastPickup: number | null;
  hoursSinceLastPickup: number | null;
  highRisk: boolean;
  reasons: RiskReason[];
  cashAtRisk: number | null;
}

export type ServiceClassification = "over_serviced" | "under_serviced" | "balanced";

export type MismatchFlag = "peak_day_gap" | "over_serviced" | "under_serviced";

export interface ScheduleMismatch {
  storeId: string;
  storeName: string;
  avgDailyDeposit: number;
  peakDepositDay: number | null;
  peakDepositDayName: string | null;
  pickupDays: number[];
  pickupsPerWeek: number;
  /** Forward distance in days from the peak deposit day to the next pickup day. */
  peakGapDays: number | null;
  classification: ServiceClassification;
  flags: MismatchFlag[];
}

export interface ConsolidationStop {
  storeId: string;
  scheduledTime: string;
}

export interface ConsolidationOpportunity {
  carrierId: number;
  carrierName: string | null;
  dayOfWeek: number;
  dayName: string;
  stores: ConsolidationStop[];
  distinctTimes: string[];
  stopsSaved: number;
  estimatedWeeklySavings: number | null;
  proximityChecked: boolean;
}

export interface CostBreakdown {
  /** Pickups that carry a recorded total cost. */
  stops: number;
  overtimeStops: number;
  baseCost: number;
  fuelSurcharge: number;
  overtimeCost: number;
  totalCost: number;
  costPerStop: number | null;
  overtimeShare: number | null;
}

export interface StoreCost extends CostBreakdown {
  storeId: string;
  storeName: string;
  depositsCollected: number;
  costPerDollarCollected: number | null;
  highOvertime: boolean;
}

export interface CarrierCost extends CostBreakdown {
  /** Null groups pickups with no schedule to attribute them to. */
  carrierId: number | null;
  carrierName: string | null;
}

export interface MonthlyOvertime {
  month: string;
  overtimeCost: number;
  totalCost: number;
  overtimeShare: number | null;
}

export type InvoiceStatus = "matched" | "over_invoiced" | "under_invoiced" | "missing_invoice" | "unverifiable";

export interface InvoiceReconciliation {
  carrierId: number;
  carrierName: string | null;
  month: string;
  invoicedStops: number | null;
  recordedStops: number;
  /** invoicedStops − recordedStops */
  stopDelta: number | null;
  invoicedAmount: number | null;
  recordedCost: number;
  amountDelta: number | null;
  status: InvoiceStatus;
}

export interface CostReport {
  range: DateRange;
  totals: CostBreakdown & { depositsCollected: number; costPerDollarCollected: number | null };
  stores: StoreCost[];
  carriers: CarrierCost[];
  overtimeByMonth: MonthlyOvertime[];
  invoices: InvoiceReconciliation[];
}

// ─── Findings (alert payload) ───────────────────────────────────────────────

export type FindingKind = "missed-pickup" | "high-risk" | "schedule-mismatch" | "consolidation-opportunity";

export type Severity = "critical" | "high" | "medium" | "low";

export interface Finding {
  locationId: string;
  kind: FindingKind;
  severity: Severity;
  cashAtRisk: number | null;
  summary: string;
}
