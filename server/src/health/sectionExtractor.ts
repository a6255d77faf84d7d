/**
 * PROCESS_HEALTH SECTION EXTRACTOR
 *
 * Pulls the overall-process diagnostic fields out of an LLM-ready statistics
 * report. The report is plain text; the health block looks like:
 *
 *   === PROCESS_HEALTH ===
 *   overall_status=MODERATE_RISK
 *   health_score=0.72
 *   critical_issues:
 *     - ICA problematic ratio 62%
 *   warnings:
 *     - High CV on O2 sensor
 *   recommendation=Inspect gas purge filter
 *   === NEXT_SECTION ===
 *
 * Missing or malformed input never throws: absent fields keep their
 * defaults and the reason is recorded in the diagnostics.
 */

import {
  HEALTH_SECTION_MARKER,
  SECTION_MARKER_PREFIX,
  emptyHealthRecord,
  freezeHealthRecord,
  toCategoryBalanceStatus,
  toEnergyConcentrationStatus,
  toOverallStatus,
  type ComponentSummaryResult,
  type ExtractionDiagnostics,
  type HealthExtraction,
  type HealthRecord,
  type ListHealthField,
  type ScalarHealthField,
} from "./healthContract";

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extract the health record from raw report text.
 * Returns the all-defaults record when the section marker is absent.
 */
export function extract(rawText: string): HealthRecord {
  return extractWithDiagnostics(rawText).record;
}

export function extractWithDiagnostics(rawText: string): HealthExtraction {
  const diagnostics: ExtractionDiagnostics = {
    sectionFound: false,
    fieldsFound: [],
    unrecognizedTokens: [],
    malformedNumbers: [],
  };

  const sectionLines = findHealthSection(normalizeNewlines(rawText));
  if (sectionLines === null) {
    return { record: emptyHealthRecord(), diagnostics };
  }
  diagnostics.sectionFound = true;

  const section = sectionLines.join("\n");
  const record: HealthRecord = { ...emptyHealthRecord(), critical_issues: [], warnings: [] };

  const overall = readEnum(section, "overall_status", toOverallStatus, diagnostics);
  if (overall !== null) record.overall_status = overall;

  const energy = readEnum(section, "energy_concentration_status", toEnergyConcentrationStatus, diagnostics);
  if (energy !== null) record.energy_concentration_status = energy;

  const balance = readEnum(section, "category_balance_status", toCategoryBalanceStatus, diagnostics);
  if (balance !== null) record.category_balance_status = balance;

  const score = readNumber(section, "health_score", diagnostics);
  if (score !== null) record.health_score = score;

  const mode1 = readNumber(section, "mode1_energy_pct", diagnostics);
  if (mode1 !== null) record.mode1_energy_pct = mode1;

  const recommendation = readRaw(section, "recommendation");
  if (recommendation !== null && recommendation.trim() !== "") {
    record.recommendation = recommendation.trim();
    diagnostics.fieldsFound.push("recommendation");
  }

  const issues = readBulletList(sectionLines, "critical_issues");
  if (issues !== null) {
    record.critical_issues = issues;
    diagnostics.fieldsFound.push("critical_issues");
  }

  const warnings = readBulletList(sectionLines, "warnings");
  if (warnings !== null) {
    record.warnings = warnings;
    diagnostics.fieldsFound.push("warnings");
  }

  return { record: freezeHealthRecord(record), diagnostics };
}

/**
 * Independent component (ICA) summary. Scans the whole text, since these
 * counters are printed outside the health section.
 */
export function extractComponentSummary(rawText: string): ComponentSummaryResult {
  const text = normalizeNewlines(rawText);
  const total = readCount(text, "total_components") ?? 0;
  const reported = readCount(text, "problematic_count");

  let problematic = reported ?? 0;
  let clamped = false;
  if (problematic > total) {
    problematic = total;
    clamped = true;
  }

  const ratio = total > 0 ? (problematic / total) * 100 : 0;

  return {
    summary: Object.freeze({
      total_components: total,
      problematic_count: problematic,
      problematic_ratio: ratio,
    }),
    clamped,
    ...(reported !== null ? { reportedProblematicCount: reported } : {}),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SECTION LOCATION
// ═══════════════════════════════════════════════════════════════════════════════

function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

/** Lines between the start marker and the next marker line (exclusive). */
function findHealthSection(text: string): string[] | null {
  const lines = text.split("\n");
  const start = lines.findIndex(line => line.trim() === HEALTH_SECTION_MARKER);
  if (start === -1) return null;

  const body: string[] = [];
  for (let i = start + 1; i < lines.length; i++) {
    if (lines[i].startsWith(SECTION_MARKER_PREFIX)) break;
    body.push(lines[i]);
  }
  return body;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD READERS
// ═══════════════════════════════════════════════════════════════════════════════

// Leading number of a value; units and suffixes after it are ignored (85.3%, 0.72/1.00)
const NUMERIC_PREFIX = /^[-+]?[\d.]+(?:[eE][-+]?\d+)?/;

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Remainder of the first `name=...` line, or null when the name never appears. */
function readRaw(text: string, name: string): string | null {
  const match = new RegExp(`\\b${escapeRegex(name)}=([^\\n]*)`).exec(text);
  return match ? match[1] : null;
}

function readNumber(
  text: string,
  field: ScalarHealthField,
  diagnostics: ExtractionDiagnostics
): number | null {
  const raw = readRaw(text, field);
  if (raw === null) return null;

  const trimmed = raw.trim();
  if (trimmed === "") return null;

  // "1.2.3" matches the prefix but is not a number
  const prefix = NUMERIC_PREFIX.exec(trimmed)?.[0];
  const value = prefix === undefined ? NaN : Number(prefix);
  if (!Number.isFinite(value)) {
    diagnostics.malformedNumbers.push({ field, raw: trimmed });
    return null;
  }

  diagnostics.fieldsFound.push(field);
  return value;
}

function readEnum<T extends string>(
  text: string,
  field: ScalarHealthField,
  normalize: (token: string) => T | null,
  diagnostics: ExtractionDiagnostics
): T | null {
  const raw = readRaw(text, field);
  if (raw === null) return null;

  const token = /^\s*(\w+)/.exec(raw)?.[1];
  if (!token) return null;

  const value = normalize(token);
  if (value === null) {
    diagnostics.unrecognizedTokens.push({ field, token });
    return null;
  }

  diagnostics.fieldsFound.push(field);
  return value;
}

/**
 * Bullet lines directly under `name:`. Stops at the first line that is not
 * an indented `- item`. Null when the header is missing.
 */
function readBulletList(lines: string[], name: ListHealthField): string[] | null {
  const header = lines.findIndex(line => line.trim() === `${name}:`);
  if (header === -1) return null;

  const items: string[] = [];
  for (let i = header + 1; i < lines.length; i++) {
    const bullet = /^[ \t]+- (.+)$/.exec(lines[i]);
    if (!bullet) break;
    items.push(bullet[1].trimEnd());
  }
  return items;
}

function readCount(text: string, name: string): number | null {
  const match = new RegExp(`\\b${escapeRegex(name)}=(\\d+)`).exec(text);
  return match ? Number.parseInt(match[1], 10) : null;
}
