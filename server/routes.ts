import type { Express } from "express";
import { MODEL_KEYS, MODEL_LABELS } from "@shared/schema";
import type { SystemConfig } from "./src/agents/config";
import { describeProviders, type GenerationBackend } from "./src/agents/llmService";
import { createReportRouter } from "./src/reportRoutes";
import { listTemplatesWithMetadata, loadTemplate } from "./src/templateStore";
import { templateShape } from "./src/templates/templateBinder";

export interface RouteDeps {
  config: SystemConfig;
  backend: GenerationBackend;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  // Mount report routes (parse, generate, export)
  app.use("/api/reports", createReportRouter(deps));

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      providers: describeProviders(deps.config),
      uptime: process.uptime(),
    });
  });

  app.get("/api/models", (_req, res) => {
    res.json({
      default: deps.config.llm.defaultModelKey,
      models: MODEL_KEYS.map(key => ({ key, label: MODEL_LABELS[key] })),
    });
  });

  app.get("/api/templates", (_req, res) => {
    try {
      res.json(
        listTemplatesWithMetadata().map(meta => ({
          ...meta,
          shape: templateShape(loadTemplate(meta.templateId)),
        }))
      );
    } catch (error) {
      console.error("[Templates] Failed to list templates:", error);
      res.status(500).json({ error: error instanceof Error ? error.message : "Failed to list templates" });
    }
  });
}
