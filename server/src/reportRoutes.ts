/**
 * Report API Routes
 * Upload a statistics report (plus optional graphs), parse its health
 * section, generate the narrative report and export it.
 */

import { Router, type Request, type Response } from "express";
import multer from "multer";
import path from "path";
import { ExportRequestZ, GenerateReportFieldsZ } from "@shared/schema";
import type { SystemConfig } from "./agents/config";
import { ArtifactCountError, type ArtifactHandle } from "./agents/promptAssembler";
import { GenerationBackendError, type GenerationBackend } from "./agents/llmService";
import { createSession, generateReport, parseReportText } from "./pipeline/reportPipeline";
import {
  buildReportDocument,
  renderReportMarkdown,
  reportFileName,
  serializeReportDocument,
  type ReportMeta,
} from "./render/reportExport";

const PREVIEW_CHARS = 2000;

export interface ReportRouterDeps {
  config: SystemConfig;
  backend: GenerationBackend;
}

type UploadedFile = Express.Multer.File;

function hasExtension(file: UploadedFile, allowed: string[]): boolean {
  const ext = path.extname(file.originalname).slice(1).toLowerCase();
  return allowed.includes(ext);
}

function toArtifact(file: UploadedFile): ArtifactHandle | null {
  if (file.mimetype === "image/png" || file.mimetype === "image/jpeg") {
    return { name: file.originalname, mediaType: file.mimetype, data: file.buffer };
  }
  return null;
}

function uploadedFiles(req: Request, field: string): UploadedFile[] {
  const files = req.files;
  if (!files || Array.isArray(files)) return [];
  return files[field] ?? [];
}

function backendErrorStatus(error: GenerationBackendError): number {
  switch (error.kind) {
    case "quota":
      return 429;
    case "auth":
      return 401;
    default:
      return 502;
  }
}

const BACKEND_HINTS: Record<GenerationBackendError["kind"], string> = {
  quota: "API quota exceeded. Try again later.",
  auth: "Check the API key configuration.",
  other: "The generation backend failed.",
};

export function createReportRouter({ config, backend }: ReportRouterDeps): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.ingestion.maxFileSizeMB * 1024 * 1024 },
  });
  const reportUpload = upload.fields([
    { name: "report", maxCount: 1 },
    { name: "graphs", maxCount: 20 },
  ]);

  /**
   * POST /api/reports/parse
   * Parse the PROCESS_HEALTH section and ICA summary of an uploaded report
   */
  router.post("/parse", reportUpload, (req: Request, res: Response) => {
    try {
      const [file] = uploadedFiles(req, "report");
      if (!file) {
        return res.status(400).json({ error: "No report file uploaded" });
      }
      if (!hasExtension(file, config.ingestion.reportFormats)) {
        return res.status(400).json({
          error: `Unsupported report format: ${file.originalname}`,
          details: [`Accepted: ${config.ingestion.reportFormats.join(", ")}`],
        });
      }

      const content = file.buffer.toString("utf-8");
      const parsed = parseReportText(content);
      console.log(
        `[Reports] Parsed ${file.originalname}: section=${parsed.health.diagnostics.sectionFound}, tier=${parsed.classification?.tier ?? "n/a"}`
      );

      res.json({
        filename: file.originalname,
        health: parsed.health.record,
        diagnostics: parsed.health.diagnostics,
        components: parsed.components,
        classification: parsed.classification,
        preview: content.length > PREVIEW_CHARS ? `${content.slice(0, PREVIEW_CHARS)}...` : content,
      });
    } catch (error) {
      console.error("[Reports] Parse error:", error);
      res.status(500).json({ error: error instanceof Error ? error.message : "Failed to parse report" });
    }
  });

  /**
   * POST /api/reports/generate
   * Generate the narrative report. Full analysis takes exactly ten graphs.
   */
  router.post("/generate", reportUpload, async (req: Request, res: Response) => {
    try {
      const [file] = uploadedFiles(req, "report");
      if (!file) {
        return res.status(400).json({ error: "No report file uploaded" });
      }
      if (!hasExtension(file, config.ingestion.reportFormats)) {
        return res.status(400).json({ error: `Unsupported report format: ${file.originalname}` });
      }

      const fields = GenerateReportFieldsZ.safeParse(req.body);
      if (!fields.success) {
        return res.status(400).json({
          error: "Invalid request fields",
          details: fields.error.errors.map(e => `${e.path.join(".") || "body"}: ${e.message}`),
        });
      }

      const graphs = uploadedFiles(req, "graphs");
      const artifacts: ArtifactHandle[] = [];
      for (const graph of graphs) {
        const artifact = hasExtension(graph, config.ingestion.graphFormats) ? toArtifact(graph) : null;
        if (!artifact) {
          return res.status(400).json({ error: `Unsupported graph format: ${graph.originalname}` });
        }
        artifacts.push(artifact);
      }

      const session = createSession({
        modelKey: fields.data.modelKey ?? config.llm.defaultModelKey,
        analysisType: fields.data.analysisType,
      });
      const result = await generateReport(
        session,
        { rawText: file.buffer.toString("utf-8"), artifacts, context: fields.data.context },
        { backend }
      );

      const report = result.report;
      if (!report) {
        return res.status(500).json({ error: "Report generation produced no result" });
      }

      const meta: ReportMeta = {
        generatedAt: report.generatedAt,
        modelKey: result.modelKey,
        analysisType: result.analysisType,
        // No status line for a report that carried neither status nor score
        processHealth: result.parsed?.classification ? result.parsed.health.record : null,
      };

      res.json({
        report: report.content,
        templateId: report.templateId,
        variant: report.variant,
        provider: report.provider,
        model: report.model,
        generatedAt: report.generatedAt.toISOString(),
        processHealth: meta.processHealth,
        classification: result.parsed?.classification ?? null,
        exports: {
          markdown: {
            fileName: reportFileName("markdown", report.generatedAt),
            content: renderReportMarkdown(meta, report.content),
          },
          json: {
            fileName: reportFileName("json", report.generatedAt),
            content: buildReportDocument(meta, report.content),
          },
        },
      });
    } catch (error) {
      if (error instanceof ArtifactCountError) {
        return res.status(400).json({
          error: error.message,
          expected: error.expected,
          received: error.received,
        });
      }
      if (error instanceof GenerationBackendError) {
        return res.status(backendErrorStatus(error)).json({
          error: error.message,
          kind: error.kind,
          hint: BACKEND_HINTS[error.kind],
        });
      }
      console.error("[Reports] Generate error:", error);
      res.status(500).json({ error: error instanceof Error ? error.message : "Failed to generate report" });
    }
  });

  /**
   * POST /api/reports/export
   * Download a generated report as Markdown or JSON
   */
  router.post("/export", (req: Request, res: Response) => {
    const body = ExportRequestZ.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({
        error: "Invalid export request",
        details: body.error.errors.map(e => `${e.path.join(".") || "body"}: ${e.message}`),
      });
    }

    const meta: ReportMeta = {
      generatedAt: body.data.generatedAt ? new Date(body.data.generatedAt) : new Date(),
      modelKey: body.data.modelKey,
      analysisType: body.data.analysisType,
      processHealth: body.data.processHealth,
    };

    if (body.data.format === "markdown") {
      res.setHeader("Content-Disposition", `attachment; filename="${reportFileName("markdown", meta.generatedAt)}"`);
      res.type("text/markdown").send(renderReportMarkdown(meta, body.data.report));
    } else {
      res.setHeader("Content-Disposition", `attachment; filename="${reportFileName("json", meta.generatedAt)}"`);
      res.type("application/json").send(serializeReportDocument(buildReportDocument(meta, body.data.report)));
    }
  });

  return router;
}
