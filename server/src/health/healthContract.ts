/**
 * PROCESS HEALTH CONTRACT
 *
 * Types and defaults shared by the section extractor, the risk classifier
 * and the template binder. The shapes themselves live in @shared/schema so
 * HTTP clients see the same definitions.
 */

import {
  CATEGORY_BALANCE_STATUSES,
  ENERGY_CONCENTRATION_STATUSES,
  OVERALL_STATUSES,
  type ComponentSummary,
  type HealthRecord,
  type RiskTier,
} from "@shared/schema";

export type { ComponentSummary, HealthRecord, RiskTier };

// ============================================================================
// MARKERS
// ============================================================================

export const HEALTH_SECTION_MARKER = "=== PROCESS_HEALTH ===";
export const SECTION_MARKER_PREFIX = "===";

export type ScalarHealthField =
  | "overall_status"
  | "health_score"
  | "energy_concentration_status"
  | "mode1_energy_pct"
  | "category_balance_status"
  | "recommendation";

export type ListHealthField = "critical_issues" | "warnings";

export type HealthField = ScalarHealthField | ListHealthField;

// ============================================================================
// DEFAULTS
// ============================================================================

/** Freezes a record and its lists in place. */
export function freezeHealthRecord(record: HealthRecord): HealthRecord {
  Object.freeze(record.critical_issues);
  Object.freeze(record.warnings);
  return Object.freeze(record);
}

export function emptyHealthRecord(): HealthRecord {
  return freezeHealthRecord({
    overall_status: "UNKNOWN",
    health_score: 0,
    energy_concentration_status: "UNKNOWN",
    mode1_energy_pct: 0,
    category_balance_status: "UNKNOWN",
    critical_issues: [],
    warnings: [],
    recommendation: "",
  });
}

// ============================================================================
// DIAGNOSTICS
// ============================================================================

export interface UnrecognizedToken {
  field: ScalarHealthField;
  token: string;
}

export interface MalformedNumber {
  field: ScalarHealthField;
  raw: string;
}

export interface ExtractionDiagnostics {
  sectionFound: boolean;
  /** Fields whose value came from the text rather than a default */
  fieldsFound: HealthField[];
  unrecognizedTokens: UnrecognizedToken[];
  malformedNumbers: MalformedNumber[];
}

export interface HealthExtraction {
  record: HealthRecord;
  diagnostics: ExtractionDiagnostics;
}

export interface ComponentSummaryResult {
  summary: ComponentSummary;
  /** True when problematic_count exceeded total_components in the source */
  clamped: boolean;
  /** Raw count before clamping, when one was found */
  reportedProblematicCount?: number;
}

// ============================================================================
// ENUM NORMALIZATION
// ============================================================================

function isMember<T extends string>(values: readonly T[], token: string): token is T {
  return values.some(value => value === token);
}

export function toOverallStatus(token: string): HealthRecord["overall_status"] | null {
  return isMember(OVERALL_STATUSES, token) ? token : null;
}

export function toEnergyConcentrationStatus(
  token: string
): HealthRecord["energy_concentration_status"] | null {
  return isMember(ENERGY_CONCENTRATION_STATUSES, token) ? token : null;
}

export function toCategoryBalanceStatus(
  token: string
): HealthRecord["category_balance_status"] | null {
  return isMember(CATEGORY_BALANCE_STATUSES, token) ? token : null;
}
