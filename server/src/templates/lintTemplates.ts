import * as fs from "node:fs";
import * as path from "node:path";
import { validateTemplate, formatTemplateErrors, listPlaceholders, templateFragments } from "./templateSchema";
import { bind, markdownShape, sameShape, templateShape } from "./templateBinder";

export interface LintError {
  level: "error" | "warning";
  code: string;
  message: string;
  path?: string;
}

export interface LintResult {
  templateId: string;
  valid: boolean;
  errors: LintError[];
  warnings: LintError[];
}

// Anything in braces that is not a well-formed {name}
const BRACED_TOKEN = /\{[^{}\n]*\}/g;
const WELL_FORMED = /^\{[a-z][a-z0-9_]*\}$/;

function readTemplateId(data: unknown, fallback: string): string {
  if (typeof data === "object" && data !== null && "template_id" in data && typeof data.template_id === "string") {
    return data.template_id;
  }
  return fallback;
}

/**
 * Lint a single template JSON against the schema and the rendering rules
 */
export function lintTemplate(templatePath: string): LintResult {
  const errors: LintError[] = [];
  const warnings: LintError[] = [];
  const fileId = path.basename(templatePath, ".json");
  let templateId = fileId;

  // 1. Read and parse JSON
  let rawData: unknown;
  try {
    rawData = JSON.parse(fs.readFileSync(templatePath, "utf-8"));
    templateId = readTemplateId(rawData, fileId);
  } catch (e) {
    errors.push({
      level: "error",
      code: "PARSE_ERROR",
      message: `Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`,
      path: templatePath,
    });
    return { templateId, valid: false, errors, warnings };
  }

  // 2. Validate against Zod schema
  const validation = validateTemplate(rawData);
  if (!validation.success) {
    for (const err of formatTemplateErrors(validation.errors)) {
      errors.push({ level: "error", code: "SCHEMA_ERROR", message: err, path: templatePath });
    }
    return { templateId, valid: false, errors, warnings };
  }

  const template = validation.data;

  // 3. The store looks templates up by file name
  if (template.template_id !== fileId) {
    errors.push({
      level: "error",
      code: "ID_MISMATCH",
      message: `template_id '${template.template_id}' does not match file name '${fileId}.json'`,
    });
  }

  // 4. Literal text must not change the document structure once rendered
  const rendered = bind(template, {});
  if (!sameShape(markdownShape(rendered), templateShape(template))) {
    errors.push({
      level: "error",
      code: "SHAPE_DRIFT",
      message: "Rendered Markdown has a different heading, table or checklist structure than the blocks declare",
    });
  }

  // 5. Braced tokens the binder will not treat as placeholders
  for (const fragment of templateFragments(template)) {
    for (const match of fragment.matchAll(BRACED_TOKEN)) {
      if (!WELL_FORMED.test(match[0])) {
        warnings.push({
          level: "warning",
          code: "MALFORMED_PLACEHOLDER",
          message: `'${match[0]}' is left verbatim; placeholder names are lower-case [a-z0-9_]`,
          path: fragment,
        });
      }
    }
  }

  template.blocks.forEach((block, i) => {
    if (block.kind === "table" && block.rows.length === 0) {
      warnings.push({
        level: "warning",
        code: "EMPTY_TABLE",
        message: `Table '${block.columns.join(" | ")}' has no rows`,
        path: `blocks[${i}]`,
      });
    }
  });

  if (listPlaceholders(template).length === 0) {
    warnings.push({ level: "warning", code: "NO_PLACEHOLDERS", message: "Template has no placeholders" });
  }

  return {
    templateId,
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Lint all templates in the templates directory
 */
export function lintAllTemplates(templatesDir?: string): LintResult[] {
  const dir = templatesDir || path.join(process.cwd(), "server", "templates");

  if (!fs.existsSync(dir)) {
    return [{
      templateId: "system",
      valid: false,
      errors: [{
        level: "error",
        code: "DIR_NOT_FOUND",
        message: `Templates directory not found: ${dir}`,
      }],
      warnings: [],
    }];
  }

  return fs
    .readdirSync(dir)
    .filter(f => f.endsWith(".json"))
    .sort()
    .map(file => lintTemplate(path.join(dir, file)));
}

/** Number of errors and warnings per lint code, across all results, codes sorted. */
export function countLintCodes(results: LintResult[]): [code: string, count: number][] {
  const counts = new Map<string, number>();
  for (const issue of results.flatMap(r => [...r.errors, ...r.warnings])) {
    counts.set(issue.code, (counts.get(issue.code) ?? 0) + 1);
  }
  return Array.from(counts).sort(([a], [b]) => a.localeCompare(b));
}

/**
 * Format lint results for console output
 */
export function formatLintResults(results: LintResult[]): string {
  const lines: string[] = [];

  for (const result of results) {
    lines.push(`\n=== Template: ${result.templateId} ===`);
    lines.push(`Status: ${result.valid ? "VALID" : "INVALID"}`);

    if (result.errors.length > 0) {
      lines.push(`\nErrors (${result.errors.length}):`);
      for (const err of result.errors) {
        lines.push(`  [${err.code}] ${err.message}${err.path ? ` (${err.path})` : ""}`);
      }
    }

    if (result.warnings.length > 0) {
      lines.push(`\nWarnings (${result.warnings.length}):`);
      for (const warn of result.warnings) {
        lines.push(`  [${warn.code}] ${warn.message}${warn.path ? ` (${warn.path})` : ""}`);
      }
    }

    if (result.errors.length === 0 && result.warnings.length === 0) {
      lines.push("  No issues found.");
    }
  }

  return lines.join("\n");
}
