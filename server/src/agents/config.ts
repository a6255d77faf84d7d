/**
 * System Configuration
 *
 * Defaults for the generation backend, uploads and the HTTP host, merged
 * with the environment (loaded by dotenv in server/index.ts).
 */

import { z } from "zod";
import { ModelKeyZ, type ModelKey } from "@shared/schema";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type LLMProvider = "openai" | "anthropic";

export interface GenerationOptions {
  temperature: number;
  /** OpenAI only; Claude models reject top_p alongside temperature */
  topP: number;
  /** Honored by Anthropic only; the OpenAI chat API has no top-k */
  topK: number;
  maxOutputTokens: number;
}

export interface SystemConfig {
  llm: {
    defaultProvider: LLMProvider | "auto";
    defaultModelKey: ModelKey;
    openaiApiKey?: string;
    anthropicApiKey?: string;
    generation: GenerationOptions;
  };

  ingestion: {
    maxFileSizeMB: number;
    reportFormats: string[];
    graphFormats: string[];
  };

  server: {
    port: number;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_SYSTEM_CONFIG: SystemConfig = {
  llm: {
    defaultProvider: "auto",
    defaultModelKey: "default",
    generation: {
      temperature: 0.7,
      topP: 0.95,
      topK: 20,
      maxOutputTokens: 16384,
    },
  },

  ingestion: {
    maxFileSizeMB: 50,
    reportFormats: ["txt", "md", "json"],
    graphFormats: ["png", "jpg", "jpeg"],
  },

  server: {
    port: 5000,
  },
};

// Model mappings per provider
export const PROVIDER_MODELS: Record<LLMProvider, Record<ModelKey, string>> = {
  openai: {
    fast: "gpt-4o-mini",
    default: "gpt-4o",
    powerful: "gpt-4o",
  },
  anthropic: {
    fast: "claude-haiku-4-5-20251015",
    default: "claude-sonnet-4-5-20250929",
    powerful: "claude-sonnet-4-5-20250929",
  },
};

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

const optionalSecret = z
  .string()
  .optional()
  .transform(v => (v && v.trim() !== "" ? v.trim() : undefined));

export const EnvZ = z.object({
  PORT: z.coerce.number().int().positive().optional(),
  LLM_PROVIDER: z.enum(["openai", "anthropic", "auto"]).optional(),
  DEFAULT_MODEL_KEY: ModelKeyZ.optional(),
  OPENAI_API_KEY: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
  MAX_UPLOAD_MB: z.coerce.number().positive().optional(),
});

/**
 * Build the configuration from an environment map. Throws with every
 * invalid variable listed.
 */
export function loadSystemConfig(env: NodeJS.ProcessEnv = process.env): SystemConfig {
  const parsed = EnvZ.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map(e => `${e.path.join(".")}: ${e.message}`);
    throw new Error(`Invalid environment: ${problems.join("; ")}`);
  }
  const vars = parsed.data;
  const defaults = DEFAULT_SYSTEM_CONFIG;

  return {
    llm: {
      ...defaults.llm,
      defaultProvider: vars.LLM_PROVIDER ?? defaults.llm.defaultProvider,
      defaultModelKey: vars.DEFAULT_MODEL_KEY ?? defaults.llm.defaultModelKey,
      openaiApiKey: vars.OPENAI_API_KEY,
      anthropicApiKey: vars.ANTHROPIC_API_KEY,
      generation: { ...defaults.llm.generation },
    },
    ingestion: {
      ...defaults.ingestion,
      maxFileSizeMB: vars.MAX_UPLOAD_MB ?? defaults.ingestion.maxFileSizeMB,
    },
    server: {
      port: vars.PORT ?? defaults.server.port,
    },
  };
}

/**
 * Provider to use for a request: the preferred one when its key is set,
 * otherwise whichever has a key (OpenAI first). Null when none is configured.
 */
export function resolveProvider(config: SystemConfig): LLMProvider | null {
  const available: LLMProvider[] = [];
  if (config.llm.openaiApiKey) available.push("openai");
  if (config.llm.anthropicApiKey) available.push("anthropic");

  const preferred = config.llm.defaultProvider;
  if (preferred !== "auto" && available.includes(preferred)) return preferred;
  return available[0] ?? null;
}
