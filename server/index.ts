import "dotenv/config";
import express, { type Request, type Response, type NextFunction } from "express";
import multer from "multer";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { loadSystemConfig } from "./src/agents/config";
import { createLlmBackend } from "./src/agents/llmService";
import { TemplateLoadError, getTemplateForVariant } from "./src/templateStore";

process.on("unhandledRejection", reason => {
  console.error("[Process] Unhandled Rejection:", reason);
});

process.on("uncaughtException", error => {
  console.error("[Process] Uncaught Exception:", error);
  process.exit(1);
});

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

const config = loadSystemConfig();
const app = express();
const httpServer = createServer(app);

app.use(express.json({ limit: `${config.ingestion.maxFileSizeMB}mb` }));
app.use(express.urlencoded({ extended: false, limit: `${config.ingestion.maxFileSizeMB}mb` }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

function gracefulShutdown(signal: string) {
  log(`Received ${signal}, shutting down`, "process");
  httpServer.close(err => {
    if (err) {
      console.error("[Process] Error during shutdown:", err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

try {
  // Fail fast on a broken template rather than on the first request
  getTemplateForVariant("full");
  getTemplateForVariant("brief");

  registerRoutes(app, { config, backend: createLlmBackend(config) });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.message, code: err.code });
      return;
    }
    console.error("[express] Unhandled route error:", err);
    res.status(500).json({ error: err instanceof Error ? err.message : "Internal Server Error" });
  });

  httpServer.listen(config.server.port, "0.0.0.0", () => {
    log(`serving on port ${config.server.port}`);
  });
} catch (error) {
  if (error instanceof TemplateLoadError) {
    console.error(`[startup] ${error.message}`);
    for (const detail of error.details) console.error(`  ${detail}`);
  } else {
    console.error("[startup] Failed to start server:", error);
  }
  process.exit(1);
}
