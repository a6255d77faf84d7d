/**
 * RISK CLASSIFIER
 *
 * Deterministic traffic-light tiering of a process health record.
 *
 * Boundaries (first match wins):
 *   health_score < 0.60          -> HIGH_RISK
 *   0.60 <= health_score < 0.85  -> MODERATE_RISK
 *   health_score >= 0.85         -> HEALTHY
 *
 * A parsed overall_status other than UNKNOWN is authoritative; the score rule
 * applies only when the status is missing.
 */

import type { HealthRecord, RiskTier } from "./healthContract";

export const HIGH_RISK_BELOW = 0.6;
export const HEALTHY_FROM = 0.85;

export interface TierDisplay {
  label: "healthy" | "caution" | "danger";
  glyph: string;
  color: string;
}

export interface Classification extends TierDisplay {
  tier: RiskTier;
  /** Where the tier came from: the record's own status or the score rule */
  source: "status" | "score";
}

export const TIER_DISPLAY: Readonly<Record<RiskTier, TierDisplay>> = Object.freeze({
  HEALTHY: { label: "healthy", glyph: "🟢", color: "#4CAF50" },
  MODERATE_RISK: { label: "caution", glyph: "🟡", color: "#FF9800" },
  HIGH_RISK: { label: "danger", glyph: "🔴", color: "#f44336" },
});

/**
 * Score-only derivation. Total over every number: negatives and NaN land in
 * HIGH_RISK, anything above 1 in HEALTHY.
 */
export function deriveTier(healthScore: number): RiskTier {
  if (!(healthScore >= HIGH_RISK_BELOW)) return "HIGH_RISK";
  if (healthScore < HEALTHY_FROM) return "MODERATE_RISK";
  return "HEALTHY";
}

export function classify(record: Pick<HealthRecord, "overall_status" | "health_score">): Classification {
  const status = record.overall_status;
  if (status !== "UNKNOWN") {
    return { tier: status, ...TIER_DISPLAY[status], source: "status" };
  }

  const tier = deriveTier(record.health_score);
  return { tier, ...TIER_DISPLAY[tier], source: "score" };
}
