/**
 * LLM Service - Generation backend over OpenAI and Anthropic
 *
 * Turns an assembled prompt (text parts plus optional graph images) into
 * report text. One attempt per call: no retry, no fallback to the other
 * provider. Failures surface as GenerationBackendError.
 */

import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import type { ModelKey } from "@shared/schema";
import type { ContentPart, GenerationRequest } from "./promptAssembler";
import {
  PROVIDER_MODELS,
  resolveProvider,
  type GenerationOptions,
  type LLMProvider,
  type SystemConfig,
} from "./config";

// ═══════════════════════════════════════════════════════════════════════════════
// CONTRACT
// ═══════════════════════════════════════════════════════════════════════════════

export interface GenerateOptions {
  modelKey: ModelKey;
  generation?: Partial<GenerationOptions>;
}

export interface GenerationResult {
  text: string;
  provider: LLMProvider | "custom";
  model: string;
  latencyMs: number;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
}

/** Anything that turns a prompt into prose. Tests plug in a fake. */
export interface GenerationBackend {
  generate(request: GenerationRequest, options: GenerateOptions): Promise<GenerationResult>;
}

export type BackendFailureKind = "quota" | "auth" | "other";

export class GenerationBackendError extends Error {
  constructor(
    message: string,
    public kind: BackendFailureKind,
    public provider: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GenerationBackendError";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FAILURE CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

export function classifyBackendFailure(error: unknown): BackendFailureKind {
  const status =
    typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
      ? error.status
      : undefined;
  if (status === 429) return "quota";
  if (status === 401 || status === 403) return "auth";

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (message.includes("quota") || message.includes("rate limit")) return "quota";
  if (message.includes("api_key") || message.includes("api key") || message.includes("authentication")) {
    return "auth";
  }
  return "other";
}

// ═══════════════════════════════════════════════════════════════════════════════
// BACKEND
// ═══════════════════════════════════════════════════════════════════════════════

export function createLlmBackend(config: SystemConfig): GenerationBackend {
  let openaiClient: OpenAI | null = null;
  let anthropicClient: Anthropic | null = null;

  const getOpenAIClient = (apiKey: string) => (openaiClient ??= new OpenAI({ apiKey }));
  const getAnthropicClient = (apiKey: string) => (anthropicClient ??= new Anthropic({ apiKey }));

  return {
    async generate(request, options) {
      const provider = resolveProvider(config);
      if (!provider) {
        throw new GenerationBackendError(
          "No LLM provider configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY in .env",
          "auth",
          "none"
        );
      }

      const model = PROVIDER_MODELS[provider][options.modelKey];
      const generation: GenerationOptions = { ...config.llm.generation, ...options.generation };
      const startTime = Date.now();
      console.log(
        `[LLM] ${provider}/${model} ${request.templateId}: ${request.parts.length} parts, temperature=${generation.temperature}`
      );

      try {
        const result =
          provider === "openai"
            ? await executeOpenAI(getOpenAIClient(config.llm.openaiApiKey ?? ""), model, request.parts, generation)
            : await executeAnthropic(getAnthropicClient(config.llm.anthropicApiKey ?? ""), model, request.parts, generation);

        const latencyMs = Date.now() - startTime;
        console.log(`[LLM] ${provider}/${model} completed in ${latencyMs}ms (${result.text.length} chars)`);
        return { ...result, provider, latencyMs };
      } catch (error) {
        const kind = classifyBackendFailure(error);
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[LLM] ${provider}/${model} failed (${kind}):`, reason);
        throw new GenerationBackendError(reason, kind, provider, { cause: error });
      }
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════════

type ProviderResult = Omit<GenerationResult, "provider" | "latencyMs">;

async function executeOpenAI(
  client: OpenAI,
  model: string,
  parts: ContentPart[],
  generation: GenerationOptions
): Promise<ProviderResult> {
  const content: OpenAI.Chat.Completions.ChatCompletionContentPart[] = parts.map(part =>
    part.type === "text"
      ? { type: "text" as const, text: part.text }
      : {
          type: "image_url" as const,
          image_url: { url: `data:${part.artifact.mediaType};base64,${part.artifact.data.toString("base64")}` },
        }
  );

  const response = await client.chat.completions.create({
    model,
    messages: [{ role: "user", content }],
    temperature: generation.temperature,
    top_p: generation.topP,
    max_tokens: generation.maxOutputTokens,
  });

  return {
    text: response.choices[0]?.message.content ?? "",
    model: response.model,
    usage: {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
    },
  };
}

type AnthropicContent = Exclude<Anthropic.MessageParam["content"], string>;

async function executeAnthropic(
  client: Anthropic,
  model: string,
  parts: ContentPart[],
  generation: GenerationOptions
): Promise<ProviderResult> {
  const content: AnthropicContent = parts.map(part =>
    part.type === "text"
      ? { type: "text" as const, text: part.text }
      : {
          type: "image" as const,
          source: {
            type: "base64" as const,
            media_type: part.artifact.mediaType,
            data: part.artifact.data.toString("base64"),
          },
        }
  );

  const response = await client.messages.create({
    model,
    max_tokens: generation.maxOutputTokens,
    // temperature and top_p are mutually exclusive on current Claude models
    temperature: generation.temperature,
    top_k: generation.topK,
    messages: [{ role: "user", content }],
  });

  const textContent = response.content.find(c => c.type === "text");

  return {
    text: textContent?.type === "text" ? textContent.text : "",
    model: response.model,
    usage: {
      promptTokens: response.usage.input_tokens,
      completionTokens: response.usage.output_tokens,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH CHECK
// ═══════════════════════════════════════════════════════════════════════════════

export function describeProviders(config: SystemConfig): {
  active: LLMProvider | null;
  openai: { configured: boolean };
  anthropic: { configured: boolean };
} {
  return {
    active: resolveProvider(config),
    openai: { configured: Boolean(config.llm.openaiApiKey) },
    anthropic: { configured: Boolean(config.llm.anthropicApiKey) },
  };
}
