/**
 * PROMPT ASSEMBLER
 *
 * Orders the bound instructions, the raw statistics and the optional graph
 * artifacts into the content parts sent to the generation backend.
 *
 *   [instructions, data-begin, data, data-end, (artifacts-begin, ...artifacts)?]
 */

import type { AnalysisType } from "@shared/schema";
import { FULL_ARTIFACT_COUNT, type ReportTemplate, type TemplateVariant } from "../templates/templateSchema";

export const DATA_BEGIN_MARKER = "\n\n--- ANALYSIS DATA BEGIN ---\n";
export const DATA_END_MARKER = "\n--- ANALYSIS DATA END ---\n";
export const ARTIFACTS_BEGIN_MARKER = `\n--- ATTACHED GRAPHS (${FULL_ARTIFACT_COUNT}) ---\n`;

export type ArtifactMediaType = "image/png" | "image/jpeg";

/** Opaque auxiliary item (a plot image). The core never looks inside. */
export interface ArtifactHandle {
  name: string;
  mediaType: ArtifactMediaType;
  data: Buffer;
}

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "artifact"; artifact: ArtifactHandle };

export interface GenerationRequest {
  templateId: string;
  variant: TemplateVariant;
  parts: ContentPart[];
}

export class ArtifactCountError extends Error {
  constructor(
    public templateId: string,
    public expected: number,
    public received: number
  ) {
    super(`Template ${templateId} requires exactly ${expected} artifacts, received ${received}`);
    this.name = "ArtifactCountError";
  }
}

export function assemblePrompt(
  template: Pick<ReportTemplate, "template_id" | "variant" | "artifact_count">,
  boundTemplate: string,
  supportingData: string,
  artifacts: readonly ArtifactHandle[] = []
): GenerationRequest {
  if (artifacts.length !== template.artifact_count) {
    throw new ArtifactCountError(template.template_id, template.artifact_count, artifacts.length);
  }

  const parts: ContentPart[] = [
    { type: "text", text: boundTemplate },
    { type: "text", text: DATA_BEGIN_MARKER },
    { type: "text", text: supportingData },
    { type: "text", text: DATA_END_MARKER },
  ];

  if (artifacts.length > 0) {
    parts.push({ type: "text", text: ARTIFACTS_BEGIN_MARKER });
    for (const artifact of artifacts) {
      parts.push({ type: "artifact", artifact });
    }
  }

  return { templateId: template.template_id, variant: template.variant, parts };
}

/**
 * Full analysis needs graphs; a full request that arrives without any is
 * served by the brief template. A partial graph set stays "full" so the
 * assembler rejects it.
 */
export function selectVariant(analysisType: AnalysisType, artifactCount: number): TemplateVariant {
  return analysisType === "full" && artifactCount > 0 ? "full" : "brief";
}
