/**
 * REPORT PIPELINE
 *
 * extract -> classify -> bind -> assemble -> generate
 *
 * All state lives in the caller-owned AnalysisSession. Each step returns a
 * new session instead of mutating the one it was given.
 */

import type { AnalysisType, ModelKey, ReportContext } from "@shared/schema";
import type { ComponentSummaryResult, HealthExtraction } from "../health/healthContract";
import { extractComponentSummary, extractWithDiagnostics } from "../health/sectionExtractor";
import { classify, type Classification } from "../health/riskClassifier";
import { bind, bindingValuesFor } from "../templates/templateBinder";
import type { ReportTemplate, TemplateVariant } from "../templates/templateSchema";
import { getTemplateForVariant } from "../templateStore";
import { assemblePrompt, selectVariant, type ArtifactHandle } from "../agents/promptAssembler";
import type { GenerationBackend, GenerationResult } from "../agents/llmService";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ParsedReport {
  health: HealthExtraction;
  components: ComponentSummaryResult;
  /** Null when the report carries neither a status nor a score */
  classification: Classification | null;
}

export interface GeneratedReport {
  content: string;
  templateId: string;
  variant: TemplateVariant;
  generatedAt: Date;
  provider: GenerationResult["provider"];
  model: string;
}

export interface AnalysisSession {
  readonly modelKey: ModelKey;
  readonly analysisType: AnalysisType;
  readonly parsed?: ParsedReport;
  readonly report?: GeneratedReport;
}

export interface GenerateReportInput {
  rawText: string;
  artifacts?: readonly ArtifactHandle[];
  context?: ReportContext;
}

export interface PipelineDeps {
  backend: GenerationBackend;
  templates?: (variant: TemplateVariant) => ReportTemplate;
  now?: () => Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════════════════════

export function createSession(overrides: Partial<Pick<AnalysisSession, "modelKey" | "analysisType">> = {}): AnalysisSession {
  return Object.freeze({
    modelKey: overrides.modelKey ?? "default",
    analysisType: overrides.analysisType ?? "full",
  });
}

/** Drops parsed data and generated text, keeps the selections. */
export function resetSession(session: AnalysisSession): AnalysisSession {
  return createSession({ modelKey: session.modelKey, analysisType: session.analysisType });
}

// ═══════════════════════════════════════════════════════════════════════════════
// STEPS
// ═══════════════════════════════════════════════════════════════════════════════

export function parseReportText(rawText: string): ParsedReport {
  const health = extractWithDiagnostics(rawText);
  const { fieldsFound } = health.diagnostics;
  const classifiable = fieldsFound.includes("overall_status") || fieldsFound.includes("health_score");

  return {
    health,
    components: extractComponentSummary(rawText),
    classification: classifiable ? classify(health.record) : null,
  };
}

export function parseReport(session: AnalysisSession, rawText: string): AnalysisSession {
  return Object.freeze({ ...session, parsed: parseReportText(rawText), report: undefined });
}

export async function generateReport(
  session: AnalysisSession,
  input: GenerateReportInput,
  deps: PipelineDeps
): Promise<AnalysisSession> {
  const templates = deps.templates ?? getTemplateForVariant;
  const now = deps.now ?? (() => new Date());
  const artifacts = input.artifacts ?? [];

  const parsed = parseReportText(input.rawText);

  const variant = selectVariant(session.analysisType, artifacts.length);
  if (session.analysisType === "brief" && artifacts.length > 0) {
    console.log(`[Pipeline] Brief analysis: ignoring ${artifacts.length} attached graphs`);
  } else if (session.analysisType === "full" && variant === "brief") {
    console.log("[Pipeline] Full analysis requested without graphs, using the brief template");
  }

  const template = templates(variant);
  const values = bindingValuesFor({
    extraction: parsed.health,
    components: parsed.components,
    context: input.context,
  });
  const bound = bind(template, values);
  const request = assemblePrompt(template, bound, input.rawText, variant === "full" ? artifacts : []);

  const result = await deps.backend.generate(request, { modelKey: session.modelKey });

  return Object.freeze({
    ...session,
    parsed,
    report: {
      content: result.text,
      templateId: template.template_id,
      variant,
      generatedAt: now(),
      provider: result.provider,
      model: result.model,
    },
  });
}
