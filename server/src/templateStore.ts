/**
 * TEMPLATE STORE
 *
 * Loads the report templates in server/templates, validates them with Zod
 * (templates/templateSchema.ts) and caches them frozen for the life of the
 * process.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import {
  formatTemplateErrors,
  listPlaceholders,
  validateTemplate,
  type ReportTemplate,
  type TemplateVariant,
} from "./templates/templateSchema";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const TEMPLATE_IDS: Readonly<Record<TemplateVariant, string>> = {
  full: "AM_FULL_REPORT",
  brief: "AM_BRIEF_REPORT",
};

export class TemplateLoadError extends Error {
  constructor(
    message: string,
    public templateId: string,
    public details: string[] = []
  ) {
    super(message);
    this.name = "TemplateLoadError";
  }
}

// -----------------------------------------------------------------------------
// TEMPLATE DIRECTORY
// -----------------------------------------------------------------------------

function getTemplatesDir(): string {
  const cwdPath = path.resolve(process.cwd(), "server", "templates");
  if (fs.existsSync(cwdPath)) return cwdPath;

  return path.resolve(__dirname, "..", "templates");
}

// -----------------------------------------------------------------------------
// CACHE
// -----------------------------------------------------------------------------

const templateCache = new Map<string, ReportTemplate>();

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// -----------------------------------------------------------------------------
// PUBLIC API
// -----------------------------------------------------------------------------

export function listTemplates(): string[] {
  const dir = getTemplatesDir();
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter(f => f.endsWith(".json"))
    .map(f => f.replace(/\.json$/, ""))
    .sort();
}

export function loadTemplate(templateId: string): ReportTemplate {
  const cached = templateCache.get(templateId);
  if (cached) return cached;

  const filePath = path.join(getTemplatesDir(), `${templateId}.json`);
  if (!fs.existsSync(filePath)) {
    throw new TemplateLoadError(`Template not found: ${templateId}`, templateId);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TemplateLoadError(`Template ${templateId} is not valid JSON`, templateId, [reason]);
  }

  const result = validateTemplate(parsed);
  if (!result.success) {
    throw new TemplateLoadError(
      `Template ${templateId} failed validation`,
      templateId,
      formatTemplateErrors(result.errors)
    );
  }
  if (result.data.template_id !== templateId) {
    throw new TemplateLoadError(
      `Template file ${templateId}.json declares template_id ${result.data.template_id}`,
      templateId
    );
  }

  const template = deepFreeze(result.data);
  templateCache.set(templateId, template);
  console.log(
    `[TemplateStore] Loaded ${templateId} v${template.version} (${template.variant}, ${listPlaceholders(template).length} placeholders)`
  );
  return template;
}

export function getTemplateForVariant(variant: TemplateVariant): ReportTemplate {
  return loadTemplate(TEMPLATE_IDS[variant]);
}

export function listTemplatesWithMetadata(): {
  templateId: string;
  name: string;
  version: string;
  variant: TemplateVariant;
  artifactCount: number;
  placeholders: string[];
}[] {
  return listTemplates().map(templateId => {
    const template = loadTemplate(templateId);
    return {
      templateId,
      name: template.name,
      version: template.version,
      variant: template.variant,
      artifactCount: template.artifact_count,
      placeholders: listPlaceholders(template),
    };
  });
}
