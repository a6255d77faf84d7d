import { z } from "zod";

/**
 * REPORT TEMPLATE SCHEMA
 *
 * A report template is an ordered list of typed blocks. Structure (headings,
 * table shape, checklist length) is fixed by the blocks; only the text inside
 * a line or cell can change when placeholders are bound.
 *
 * Placeholders are written {name} with name matching [a-z][a-z0-9_]*.
 */

export const PLACEHOLDER_PATTERN = /\{([a-z][a-z0-9_]*)\}/g;

export const FULL_ARTIFACT_COUNT = 10;

export const HeadingBlockZ = z.object({
  kind: z.literal("heading"),
  level: z.number().int().min(1).max(6),
  text: z.string().min(1),
});

export const TextBlockZ = z.object({
  kind: z.literal("text"),
  lines: z.array(z.string()).min(1),
});

export const BulletsBlockZ = z.object({
  kind: z.literal("bullets"),
  items: z.array(z.string()).min(1),
});

export const TableBlockZ = z
  .object({
    kind: z.literal("table"),
    columns: z.array(z.string().min(1)).min(1),
    align: z.array(z.enum(["left", "center", "right"])).optional(),
    rows: z.array(z.array(z.string())).default([]),
  })
  .superRefine((table, ctx) => {
    if (table.align && table.align.length !== table.columns.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["align"],
        message: `align has ${table.align.length} entries for ${table.columns.length} columns`,
      });
    }
    table.rows.forEach((row, i) => {
      if (row.length !== table.columns.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rows", i],
          message: `row has ${row.length} cells, expected ${table.columns.length}`,
        });
      }
    });
  });

export const ChecklistBlockZ = z.object({
  kind: z.literal("checklist"),
  items: z.array(z.string()).min(1),
});

export const RuleBlockZ = z.object({
  kind: z.literal("rule"),
});

export const TemplateBlockZ = z.union([
  HeadingBlockZ,
  TextBlockZ,
  BulletsBlockZ,
  TableBlockZ,
  ChecklistBlockZ,
  RuleBlockZ,
]);

export const ReportTemplateZ = z
  .object({
    template_id: z.string().min(1),
    name: z.string().min(1),
    version: z.string().default("1.0"),
    variant: z.enum(["full", "brief"]),
    artifact_count: z.number().int().min(0),
    blocks: z.array(TemplateBlockZ).min(1),
  })
  .superRefine((template, ctx) => {
    const expected = template.variant === "full" ? FULL_ARTIFACT_COUNT : 0;
    if (template.artifact_count !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["artifact_count"],
        message: `${template.variant} templates take ${expected} artifacts, got ${template.artifact_count}`,
      });
    }
  });

// Type exports
export type HeadingBlock = z.infer<typeof HeadingBlockZ>;
export type TextBlock = z.infer<typeof TextBlockZ>;
export type BulletsBlock = z.infer<typeof BulletsBlockZ>;
export type TableBlock = z.infer<typeof TableBlockZ>;
export type ChecklistBlock = z.infer<typeof ChecklistBlockZ>;
export type TemplateBlock = z.infer<typeof TemplateBlockZ>;
export type ReportTemplate = z.infer<typeof ReportTemplateZ>;
export type TemplateVariant = ReportTemplate["variant"];

// Validation helper
export function validateTemplate(
  data: unknown
): { success: true; data: ReportTemplate } | { success: false; errors: z.ZodError } {
  const result = ReportTemplateZ.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

// Format Zod errors for display
export function formatTemplateErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join(".");
    return `[${path || "root"}] ${err.message}`;
  });
}

/** Every text fragment of a template that may carry placeholders, in order. */
export function templateFragments(template: ReportTemplate): string[] {
  const fragments: string[] = [];
  for (const block of template.blocks) {
    switch (block.kind) {
      case "heading":
        fragments.push(block.text);
        break;
      case "text":
        fragments.push(...block.lines);
        break;
      case "bullets":
      case "checklist":
        fragments.push(...block.items);
        break;
      case "table":
        fragments.push(...block.columns);
        for (const row of block.rows) fragments.push(...row);
        break;
      case "rule":
        break;
    }
  }
  return fragments;
}

/** The closed placeholder set, in first-appearance order. */
export function listPlaceholders(template: ReportTemplate): string[] {
  const seen = new Set<string>();
  for (const fragment of templateFragments(template)) {
    for (const match of fragment.matchAll(PLACEHOLDER_PATTERN)) {
      seen.add(match[1]);
    }
  }
  return Array.from(seen);
}
