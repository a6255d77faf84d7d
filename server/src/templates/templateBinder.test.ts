/**
 * Template Binder Tests
 *
 * Placeholder substitution, Markdown escaping and structural preservation.
 */

import { describe, it, expect } from "vitest";
import {
  bind,
  bindingValuesFor,
  FALLBACK_SENTINEL,
  markdownShape,
  sameShape,
  templateShape,
} from "./templateBinder";
import { validateTemplate, type ReportTemplate } from "./templateSchema";
import { getTemplateForVariant } from "../templateStore";
import { extractComponentSummary, extractWithDiagnostics } from "../health/sectionExtractor";

function makeTemplate(data: unknown): ReportTemplate {
  const result = validateTemplate(data);
  if (!result.success) throw new Error(result.errors.message);
  return result.data;
}

const RISK_TEMPLATE = makeTemplate({
  template_id: "TEST_RISK",
  name: "Risk table",
  variant: "brief",
  artifact_count: 0,
  blocks: [
    { kind: "heading", level: 2, text: "Risks for {machine}" },
    { kind: "text", lines: ["{summary}", "Status: {overall_status}"] },
    {
      kind: "table",
      columns: ["Rank", "Risk"],
      align: ["right", "left"],
      rows: [
        ["1", "{risk1}"],
        ["2", "{risk2}"],
      ],
    },
    { kind: "checklist", items: ["{action}"] },
    { kind: "rule" },
  ],
});

describe("bind", () => {
  it("renders every block kind", () => {
    const output = bind(RISK_TEMPLATE, {
      machine: "M290",
      summary: "Stable build",
      overall_status: "HEALTHY",
      risk1: "Spatter",
      risk2: "Porosity",
      action: "Check recoater",
    });

    expect(output).toBe(
      [
        "## Risks for M290",
        "",
        "Stable build",
        "Status: HEALTHY",
        "",
        "| Rank | Risk |",
        "|---:|---|",
        "| 1 | Spatter |",
        "| 2 | Porosity |",
        "",
        "- [ ] Check recoater",
        "",
        "---",
        "",
      ].join("\n")
    );
  });

  it("fills a missing name with the sentinel", () => {
    const output = bind(RISK_TEMPLATE, { risk2: "Porosity" });

    expect(FALLBACK_SENTINEL).toBe("-");
    expect(output.split("\n")).toContain("| 1 | - |");
    expect(output.split("\n")).toContain("| 2 | Porosity |");
  });

  it("does not rescan substituted values", () => {
    const output = bind(RISK_TEMPLATE, { risk1: "{risk2}", risk2: "Porosity" });
    expect(output.split("\n")).toContain("| 1 | {risk2} |");
  });

  it("is deterministic", () => {
    const values = { machine: "M290", risk1: "Spatter" };
    expect(bind(RISK_TEMPLATE, values)).toBe(bind(RISK_TEMPLATE, values));
  });

  it("escapes pipes and flattens newlines inside table cells", () => {
    const output = bind(RISK_TEMPLATE, { risk1: "a | b\nc" });
    expect(output.split("\n")).toContain("| 1 | a \\| b c |");
  });

  it("escapes backslashes before pipes inside table cells", () => {
    const output = bind(RISK_TEMPLATE, { risk1: "O2 sensor \\|A" });
    expect(output.split("\n")).toContain("| 1 | O2 sensor \\\\\\|A |");
  });

  it("escapes a value that would open a heading", () => {
    const output = bind(RISK_TEMPLATE, { summary: "# injected" });
    expect(output.split("\n")).toContain("\\# injected");
  });

  it("keeps the template shape whatever the values", () => {
    const hostile = {
      machine: "a\n## b",
      summary: "---",
      overall_status: "| x | y |",
      risk1: "line1\n| extra | row | ends \\",
      risk2: "- [ ] fake \\| split",
      action: "[ ] nested",
    };
    const output = bind(RISK_TEMPLATE, hostile);

    expect(markdownShape(output)).toEqual(templateShape(RISK_TEMPLATE));
  });

  it("reports a table whose rows split on an unescaped pipe", () => {
    const markdown = ["| a | b |", "|---|---|", "| 1 | x \\\\| y |"].join("\n");
    expect(markdownShape(markdown).tables).toEqual([{ columns: -1, rows: 1 }]);
  });

  it("preserves the shape of the shipped templates", () => {
    for (const variant of ["full", "brief"] as const) {
      const template = getTemplateForVariant(variant);
      const output = bind(template, { risk1: "x | y", sensor1: "O2 sensor \\|A", conf: "0.8\n# not a heading" });

      expect(sameShape(markdownShape(output), templateShape(template))).toBe(true);
    }
  });

  it("measures the full template", () => {
    expect(templateShape(getTemplateForVariant("full"))).toEqual({
      headings: 20,
      rules: 1,
      checklistItems: 7,
      tables: [
        { columns: 3, rows: 6 },
        { columns: 4, rows: 9 },
        { columns: 6, rows: 3 },
        { columns: 4, rows: 2 },
      ],
    });
  });
});

describe("bindingValuesFor", () => {
  const report = [
    "=== PROCESS_HEALTH ===",
    "overall_status=HIGH_RISK",
    "health_score=0.95",
    "mode1_energy_pct=87.25",
    "critical_issues:",
    "  - O2 spike",
    "  - Laser drift",
    "warnings:",
    "=== ICA ===",
    "total_components=8",
    "problematic_count=12",
  ].join("\n");

  it("maps the parsed record to placeholder values", () => {
    const values = bindingValuesFor({
      extraction: extractWithDiagnostics(report),
      components: extractComponentSummary(report),
    });

    expect(values).toEqual({
      overall_status: "HIGH_RISK",
      risk_emoji: "🔴",
      risk_label: "danger",
      health_score: "0.95",
      mode1_energy_pct: "87.3",
      critical_issues: "O2 spike; Laser drift",
      ica_total_components: "8",
      ica_problematic_count: "8",
      ica_problematic_ratio: "100.0",
    });
  });

  it("lets report values override context", () => {
    const values = bindingValuesFor({
      extraction: extractWithDiagnostics(report),
      context: { machine: "M290", overall_status: "HEALTHY", dt_sec: 0.5 },
    });

    expect(values.machine).toBe("M290");
    expect(values.dt_sec).toBe("0.5");
    expect(values.overall_status).toBe("HIGH_RISK");
  });

  it("derives the tier from a context score when the report has none", () => {
    const values = bindingValuesFor({
      extraction: extractWithDiagnostics("no health section"),
      context: { health_score: 0.7 },
    });

    expect(values.overall_status).toBe("MODERATE_RISK");
    expect(values.risk_emoji).toBe("🟡");
    expect(values.health_score).toBe("0.7");
  });

  it("leaves absent fields unset so they bind to the sentinel", () => {
    const values = bindingValuesFor({ extraction: extractWithDiagnostics("no health section") });

    expect(values).toEqual({});
    expect(Object.isFrozen(values)).toBe(true);
  });
});
