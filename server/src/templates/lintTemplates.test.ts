import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { countLintCodes, formatLintResults, lintAllTemplates, lintTemplate } from "./lintTemplates";

let dir: string;

function writeTemplate(fileName: string, data: unknown): string {
  const file = path.join(dir, fileName);
  fs.writeFileSync(file, typeof data === "string" ? data : JSON.stringify(data));
  return file;
}

const BRIEF_BASE = { name: "Lint fixture", variant: "brief", artifact_count: 0 };

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "template-lint-"));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("lintTemplate", () => {
  it("passes the shipped templates", () => {
    const results = lintAllTemplates();

    expect(results.map(r => r.templateId)).toEqual(["AM_BRIEF_REPORT", "AM_FULL_REPORT"]);
    expect(results.every(r => r.valid)).toBe(true);
    expect(results.flatMap(r => r.warnings)).toEqual([]);
  });

  it("reports unparseable JSON", () => {
    const result = lintTemplate(writeTemplate("BROKEN.json", "{ nope"));

    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe("PARSE_ERROR");
  });

  it("flags a template_id that differs from the file name", () => {
    const result = lintTemplate(
      writeTemplate("RENAMED.json", { ...BRIEF_BASE, template_id: "ORIGINAL", blocks: [{ kind: "text", lines: ["{x}"] }] })
    );

    expect(result.templateId).toBe("ORIGINAL");
    expect(result.errors.map(e => e.code)).toEqual(["ID_MISMATCH"]);
  });

  it("flags literal text that renders as extra structure", () => {
    const result = lintTemplate(
      writeTemplate("DRIFT.json", {
        ...BRIEF_BASE,
        template_id: "DRIFT",
        blocks: [{ kind: "text", lines: ["# sneaky heading {x}"] }],
      })
    );

    expect(result.errors.map(e => e.code)).toEqual(["SHAPE_DRIFT"]);
  });

  it("warns about malformed placeholders and empty tables", () => {
    const result = lintTemplate(
      writeTemplate("WARN.json", {
        ...BRIEF_BASE,
        template_id: "WARN",
        blocks: [
          { kind: "text", lines: ["Score {Health_Score} and {ok}"] },
          { kind: "table", columns: ["a", "b"], rows: [] },
        ],
      })
    );

    expect(result.valid).toBe(true);
    expect(result.warnings.map(w => w.code)).toEqual(["MALFORMED_PLACEHOLDER", "EMPTY_TABLE"]);
  });

  it("reports a missing directory", () => {
    const [result] = lintAllTemplates(path.join(dir, "missing"));
    expect(result.errors[0].code).toBe("DIR_NOT_FOUND");
  });
});

describe("formatLintResults", () => {
  it("prints one block per template", () => {
    const output = formatLintResults([{ templateId: "T", valid: true, errors: [], warnings: [] }]);
    expect(output).toBe("\n=== Template: T ===\nStatus: VALID\n  No issues found.");
  });
});

describe("countLintCodes", () => {
  it("tallies errors and warnings by code", () => {
    const counts = countLintCodes([
      {
        templateId: "A",
        valid: false,
        errors: [{ level: "error", code: "SHAPE_DRIFT", message: "x" }],
        warnings: [{ level: "warning", code: "EMPTY_TABLE", message: "y" }],
      },
      {
        templateId: "B",
        valid: false,
        errors: [{ level: "error", code: "SHAPE_DRIFT", message: "z" }],
        warnings: [],
      },
    ]);

    expect(counts).toEqual([
      ["EMPTY_TABLE", 1],
      ["SHAPE_DRIFT", 2],
    ]);
  });
});
