import { describe, it, expect } from "vitest";
import { DEFAULT_SYSTEM_CONFIG, loadSystemConfig, resolveProvider } from "./config";

describe("loadSystemConfig", () => {
  it("uses the defaults for an empty environment", () => {
    const config = loadSystemConfig({});

    expect(config.server.port).toBe(5000);
    expect(config.llm.defaultProvider).toBe("auto");
    expect(config.llm.defaultModelKey).toBe("default");
    expect(config.llm.openaiApiKey).toBeUndefined();
    expect(config.llm.generation).toEqual({ temperature: 0.7, topP: 0.95, topK: 20, maxOutputTokens: 16384 });
    expect(config.ingestion.maxFileSizeMB).toBe(50);
  });

  it("reads overrides from the environment", () => {
    const config = loadSystemConfig({
      PORT: "8080",
      LLM_PROVIDER: "anthropic",
      DEFAULT_MODEL_KEY: "fast",
      ANTHROPIC_API_KEY: "  test-secret  ",
      OPENAI_API_KEY: "",
      MAX_UPLOAD_MB: "10",
    });

    expect(config.server.port).toBe(8080);
    expect(config.llm.defaultProvider).toBe("anthropic");
    expect(config.llm.defaultModelKey).toBe("fast");
    expect(config.llm.anthropicApiKey).toBe("test-secret");
    expect(config.llm.openaiApiKey).toBeUndefined();
    expect(config.ingestion.maxFileSizeMB).toBe(10);
  });

  it("lists every invalid variable", () => {
    expect(() => loadSystemConfig({ PORT: "abc", DEFAULT_MODEL_KEY: "huge" })).toThrow(/Invalid environment: .*PORT.*DEFAULT_MODEL_KEY/);
  });

  it("does not mutate the defaults", () => {
    const config = loadSystemConfig({});
    config.llm.generation.temperature = 0;
    expect(DEFAULT_SYSTEM_CONFIG.llm.generation.temperature).toBe(0.7);
  });
});

describe("resolveProvider", () => {
  it("returns null when no key is set", () => {
    expect(resolveProvider(loadSystemConfig({}))).toBeNull();
  });

  it("honors the preferred provider when its key is set", () => {
    const config = loadSystemConfig({
      LLM_PROVIDER: "anthropic",
      OPENAI_API_KEY: "test-secret",
      ANTHROPIC_API_KEY: "test-secret",
    });
    expect(resolveProvider(config)).toBe("anthropic");
  });

  it("falls back to whichever provider has a key", () => {
    expect(resolveProvider(loadSystemConfig({ LLM_PROVIDER: "openai", ANTHROPIC_API_KEY: "test-secret" }))).toBe(
      "anthropic"
    );
    expect(
      resolveProvider(loadSystemConfig({ OPENAI_API_KEY: "test-secret", ANTHROPIC_API_KEY: "test-secret" }))
    ).toBe("openai");
  });
});
