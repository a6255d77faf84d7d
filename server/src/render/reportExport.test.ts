import { describe, it, expect } from "vitest";
import { ReportDocumentZ, type HealthRecord } from "@shared/schema";
import {
  buildReportDocument,
  formatTimestamp,
  renderReportMarkdown,
  reportFileName,
  serializeReportDocument,
  type ReportMeta,
} from "./reportExport";

const GENERATED_AT = new Date(Date.UTC(2025, 2, 7, 9, 5, 3));

const HEALTH: HealthRecord = {
  overall_status: "MODERATE_RISK",
  health_score: 0.7,
  energy_concentration_status: "STABLE",
  mode1_energy_pct: 81.2,
  category_balance_status: "BALANCED",
  critical_issues: [],
  warnings: ["Minor O2 drift"],
  recommendation: "Monitor",
};

describe("reportFileName", () => {
  it("stamps the generation time in UTC", () => {
    expect(reportFileName("markdown", GENERATED_AT)).toBe("AM_Report_20250307_090503.md");
    expect(reportFileName("json", GENERATED_AT)).toBe("AM_Report_20250307_090503.json");
  });
});

describe("formatTimestamp", () => {
  it("formats as YYYY-MM-DD HH:MM:SS", () => {
    expect(formatTimestamp(GENERATED_AT)).toBe("2025-03-07 09:05:03");
  });
});

describe("renderReportMarkdown", () => {
  it("prepends the metadata block", () => {
    const meta: ReportMeta = {
      generatedAt: GENERATED_AT,
      modelKey: "fast",
      analysisType: "full",
      processHealth: HEALTH,
    };

    expect(renderReportMarkdown(meta, "## Body")).toBe(
      [
        "# AM Process Analysis Report",
        "",
        "**Generated:** 2025-03-07 09:05:03 UTC",
        "**Model:** Simple (fast) (fast)",
        "**Analysis type:** Full analysis",
        "**Process status:** 🟡 MODERATE_RISK (score: 0.70)",
        "",
        "---",
        "",
        "## Body",
      ].join("\n")
    );
  });

  it("omits the status line without health data", () => {
    const output = renderReportMarkdown(
      { generatedAt: GENERATED_AT, modelKey: "default", analysisType: "brief", processHealth: null },
      "text"
    );

    expect(output.split("\n").slice(2, 6)).toEqual([
      "**Generated:** 2025-03-07 09:05:03 UTC",
      "**Model:** Standard (default)",
      "**Analysis type:** Brief analysis",
      "",
    ]);
  });
});

describe("buildReportDocument", () => {
  it("carries exactly the five document fields", () => {
    const document = buildReportDocument(
      { generatedAt: GENERATED_AT, modelKey: "powerful", analysisType: "full", processHealth: HEALTH },
      "REPORT"
    );

    expect(Object.keys(document)).toEqual(["timestamp", "model", "analysis_type", "process_health", "report"]);
    expect(document.timestamp).toBe("2025-03-07T09:05:03.000Z");
    expect(ReportDocumentZ.parse(JSON.parse(serializeReportDocument(document)))).toEqual(document);
  });
});
