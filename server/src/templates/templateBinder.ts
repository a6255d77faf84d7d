/**
 * TEMPLATE BINDER
 *
 * Renders a report template to Markdown and fills its {placeholders}.
 *
 * Rules:
 * - Single pass: substituted text is never scanned again for placeholders
 * - Missing names become the fallback sentinel "-"
 * - Values are flattened to one line; table cells escape "\\" and "|"
 * - Heading, table and checklist shape always equals the template's
 * - No clock or random input: same (template, values) -> same output
 */

import type { ReportContext } from "@shared/schema";
import type { ComponentSummaryResult, HealthExtraction, HealthField } from "../health/healthContract";
import { classify, deriveTier, TIER_DISPLAY } from "../health/riskClassifier";
import {
  PLACEHOLDER_PATTERN,
  type ReportTemplate,
  type TableBlock,
  type TemplateBlock,
} from "./templateSchema";

export const FALLBACK_SENTINEL = "-";

export type BindingValues = Readonly<Record<string, string>>;

type FragmentContext = "line" | "item" | "cell";

// ═══════════════════════════════════════════════════════════════════════════════
// BIND
// ═══════════════════════════════════════════════════════════════════════════════

export function bind(template: ReportTemplate, values: BindingValues): string {
  const fill = (fragment: string, context: FragmentContext) =>
    substitute(fragment, values, context);

  return template.blocks.map(block => renderBlock(block, fill)).join("\n\n") + "\n";
}

function substitute(fragment: string, values: BindingValues, context: FragmentContext): string {
  return fragment.replace(PLACEHOLDER_PATTERN, (_token, name: string, offset: number) => {
    const raw = Object.hasOwn(values, name) ? values[name] : FALLBACK_SENTINEL;
    let value = raw.replace(/\r\n|\r|\n/g, " ");
    if (context === "cell") {
      value = value.replace(/\\/g, "\\\\").replace(/\|/g, "\\|");
    } else if (context === "line" && offset === 0) {
      // A value opening a line must not turn into a heading, list item or table row
      value = value.replace(/^(#{1,6}\s|[-*+]\s|>|\||---)/, "\\$1");
    } else if (context === "item" && offset === 0) {
      // "- [ ] " is reserved for checklist items
      value = value.replace(/^\[/, "\\[");
    }
    return value;
  });
}

function renderBlock(
  block: TemplateBlock,
  fill: (fragment: string, context: FragmentContext) => string
): string {
  switch (block.kind) {
    case "heading":
      return `${"#".repeat(block.level)} ${fill(block.text, "item")}`;
    case "text":
      return block.lines.map(line => fill(line, "line")).join("\n");
    case "bullets":
      return block.items.map(item => `- ${fill(item, "item")}`).join("\n");
    case "checklist":
      return block.items.map(item => `- [ ] ${fill(item, "item")}`).join("\n");
    case "table":
      return renderTable(block, text => fill(text, "cell"));
    case "rule":
      return "---";
  }
}

function renderTable(table: TableBlock, fill: (text: string) => string): string {
  const row = (cells: string[]) => `| ${cells.map(fill).join(" | ")} |`;
  const separator = table.columns.map((_, i) => {
    switch (table.align?.[i]) {
      case "right":
        return "---:";
      case "center":
        return ":---:";
      default:
        return "---";
    }
  });

  return [row(table.columns), `|${separator.join("|")}|`, ...table.rows.map(row)].join("\n");
}

// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURE CHECKS
// ═══════════════════════════════════════════════════════════════════════════════

export interface DocumentShape {
  headings: number;
  rules: number;
  checklistItems: number;
  /** Column count and body-row count of each table, in order */
  tables: { columns: number; rows: number }[];
}

export function templateShape(template: ReportTemplate): DocumentShape {
  const shape: DocumentShape = { headings: 0, rules: 0, checklistItems: 0, tables: [] };
  for (const block of template.blocks) {
    if (block.kind === "heading") shape.headings++;
    else if (block.kind === "rule") shape.rules++;
    else if (block.kind === "checklist") shape.checklistItems += block.items.length;
    else if (block.kind === "table") {
      shape.tables.push({ columns: block.columns.length, rows: block.rows.length });
    }
  }
  return shape;
}

/** Measures rendered Markdown the same way templateShape measures a template. */
export function markdownShape(markdown: string): DocumentShape {
  const shape: DocumentShape = { headings: 0, rules: 0, checklistItems: 0, tables: [] };
  const lines = markdown.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (/^#{1,6} /.test(line)) shape.headings++;
    else if (line === "---") shape.rules++;
    else if (line.startsWith("- [ ] ")) shape.checklistItems++;
    else if (line.startsWith("|")) {
      const start = i;
      while (i + 1 < lines.length && lines[i + 1].startsWith("|")) i++;
      // header + separator + body rows
      const columns = countCells(lines[start]);
      const body = lines.slice(start + 2, i + 1);
      const uniform = body.every(row => countCells(row) === columns);
      // -1 marks a table whose body rows disagree with the header
      shape.tables.push({ columns: uniform ? columns : -1, rows: i - start - 1 });
    }
  }
  return shape;
}

/** Cells of a `| a | b |` row; `\x` escape pairs never delimit. */
function countCells(row: string): number {
  let pipes = 0;
  for (let i = 0; i < row.length; i++) {
    if (row[i] === "\\") i++;
    else if (row[i] === "|") pipes++;
  }
  return pipes - 1;
}

export function sameShape(a: DocumentShape, b: DocumentShape): boolean {
  return (
    a.headings === b.headings &&
    a.rules === b.rules &&
    a.checklistItems === b.checklistItems &&
    a.tables.length === b.tables.length &&
    a.tables.every((t, i) => t.columns === b.tables[i].columns && t.rows === b.tables[i].rows)
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export interface BindingInput {
  extraction: HealthExtraction;
  components?: ComponentSummaryResult;
  /** Caller values (process type, machine, material, ...) */
  context?: ReportContext;
}

/**
 * Builds the placeholder map. Values read from the report win over caller
 * context; context fills everything the report did not provide. When the
 * report has no score, a numeric context health_score drives the tier.
 */
export function bindingValuesFor(input: BindingInput): BindingValues {
  const { record, diagnostics } = input.extraction;
  const found = (field: HealthField) => diagnostics.fieldsFound.includes(field);
  const values: Record<string, string> = {};

  for (const [name, value] of Object.entries(input.context ?? {})) {
    values[name] = String(value);
  }

  if (found("overall_status") || found("health_score")) {
    const classification = classify(record);
    values.overall_status = classification.tier;
    values.risk_emoji = classification.glyph;
    values.risk_label = classification.label;
  } else {
    const contextScore = Number(input.context?.health_score);
    if (input.context?.health_score !== undefined && Number.isFinite(contextScore)) {
      const tier = deriveTier(contextScore);
      values.overall_status = tier;
      values.risk_emoji = TIER_DISPLAY[tier].glyph;
      values.risk_label = TIER_DISPLAY[tier].label;
    }
  }

  if (found("health_score")) values.health_score = record.health_score.toFixed(2);
  if (found("mode1_energy_pct")) values.mode1_energy_pct = record.mode1_energy_pct.toFixed(1);
  if (found("energy_concentration_status")) values.energy_status = record.energy_concentration_status;
  if (found("category_balance_status")) values.category_balance = record.category_balance_status;
  if (found("recommendation")) values.recommendation = record.recommendation;
  if (found("critical_issues") && record.critical_issues.length > 0) {
    values.critical_issues = record.critical_issues.join("; ");
  }
  if (found("warnings") && record.warnings.length > 0) {
    values.warnings = record.warnings.join("; ");
  }

  const summary = input.components?.summary;
  if (summary && summary.total_components > 0) {
    values.ica_total_components = String(summary.total_components);
    values.ica_problematic_count = String(summary.problematic_count);
    values.ica_problematic_ratio = summary.problematic_ratio.toFixed(1);
  }

  return Object.freeze(values);
}
