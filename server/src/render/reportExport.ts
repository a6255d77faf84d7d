/**
 * REPORT EXPORT
 *
 * Wraps generated report text for download: a Markdown file with a metadata
 * preamble and a JSON document. Times are written in UTC so the same inputs
 * always give the same bytes.
 */

import {
  MODEL_LABELS,
  type AnalysisType,
  type HealthRecord,
  type ModelKey,
  type ReportDocument,
} from "@shared/schema";
import { classify } from "../health/riskClassifier";

export interface ReportMeta {
  generatedAt: Date;
  modelKey: ModelKey;
  analysisType: AnalysisType;
  processHealth: HealthRecord | null;
}

export const ANALYSIS_TYPE_LABELS: Record<AnalysisType, string> = {
  full: "Full analysis",
  brief: "Brief analysis",
};

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** "YYYY-MM-DD HH:MM:SS" in UTC */
export function formatTimestamp(at: Date): string {
  return (
    `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())} ` +
    `${pad(at.getUTCHours())}:${pad(at.getUTCMinutes())}:${pad(at.getUTCSeconds())}`
  );
}

export function reportFileName(kind: "markdown" | "json", at: Date): string {
  const stamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}_` +
    `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `AM_Report_${stamp}.${kind === "markdown" ? "md" : "json"}`;
}

export function renderReportMarkdown(meta: ReportMeta, report: string): string {
  const lines: string[] = [
    "# AM Process Analysis Report",
    "",
    `**Generated:** ${formatTimestamp(meta.generatedAt)} UTC`,
    `**Model:** ${MODEL_LABELS[meta.modelKey]} (${meta.modelKey})`,
    `**Analysis type:** ${ANALYSIS_TYPE_LABELS[meta.analysisType]}`,
  ];

  if (meta.processHealth) {
    const { tier, glyph } = classify(meta.processHealth);
    lines.push(`**Process status:** ${glyph} ${tier} (score: ${meta.processHealth.health_score.toFixed(2)})`);
  }

  lines.push("", "---", "", report);
  return lines.join("\n");
}

export function buildReportDocument(meta: ReportMeta, report: string): ReportDocument {
  return {
    timestamp: meta.generatedAt.toISOString(),
    model: meta.modelKey,
    analysis_type: meta.analysisType,
    process_health: meta.processHealth,
    report,
  };
}

export function serializeReportDocument(document: ReportDocument): string {
  return JSON.stringify(document, null, 2);
}
