import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/config";
import { ConfigurationError } from "../../src/errors";

const baseEnv = {
  SPOONACULAR_API_KEY: "test-key",
  KROGER_CLIENT_ID: "test-client",
  KROGER_CLIENT_SECRET: "test-secret",
  OPENAI_API_KEY: "test-openai-key",
};

describe("loadConfig", () => {
  it("fills in defaults", () => {
    const config = loadConfig(baseEnv);

    expect(config.port).toBe(3000);
    expect(config.corsOrigins).toBeNull();
    expect(config.logLevel).toBe("info");
    expect(config.llm).toEqual({
      provider: "openai",
      apiKey: "test-openai-key",
      model: "gpt-4o-mini",
      timeoutMs: 60_000,
    });
    expect(config.recipes).toEqual({
      apiKey: "test-key",
      baseUrl: "https://api.spoonacular.com",
      timeoutMs: 30_000,
      candidateCount: 5,
      rankingMode: 1,
      retryAttempts: 3,
      retryBaseDelayMs: 500,
    });
    expect(config.grocery).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      baseUrl: "https://api.kroger.com/v1",
      locationId: "01400722",
      productLimit: 1,
      timeoutMs: 15_000,
    });
    expect(config.summaryNarration).toBe(true);
    expect(config.sessionTtlMs).toBe(3_600_000);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: "8080",
      CORS_ORIGIN: "http://localhost:5173, https://kitchen.example.com",
      LOG_LEVEL: "debug",
      RECIPE_CANDIDATE_COUNT: "10",
      RECIPE_RANKING_MODE: "2",
      KROGER_LOCATION_ID: "70100023",
      SUMMARY_NARRATION: "false",
    });

    expect(config.port).toBe(8080);
    expect(config.corsOrigins).toEqual(["http://localhost:5173", "https://kitchen.example.com"]);
    expect(config.logLevel).toBe("debug");
    expect(config.recipes.candidateCount).toBe(10);
    expect(config.recipes.rankingMode).toBe(2);
    expect(config.grocery.locationId).toBe("70100023");
    expect(config.summaryNarration).toBe(false);
  });

  it("selects the Groq provider", () => {
    const config = loadConfig({ ...baseEnv, LLM_PROVIDER: "groq", GROQ_API_KEY: "test-groq-key" });

    expect(config.llm.provider).toBe("groq");
    expect(config.llm.model).toBe("llama-3.3-70b-versatile");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ ...baseEnv, LLM_PROVIDER: "", LOG_LEVEL: " ", PORT: "" });

    expect(config.llm.provider).toBe("openai");
    expect(config.logLevel).toBe("info");
    expect(config.port).toBe(3000);
  });

  it.each([
    ["the recipe key", { SPOONACULAR_API_KEY: undefined }, "SPOONACULAR_API_KEY is not set"],
    [
      "grocery credentials",
      { KROGER_CLIENT_SECRET: "" },
      "KROGER_CLIENT_ID and KROGER_CLIENT_SECRET must be set",
    ],
    ["the model key", { OPENAI_API_KEY: undefined }, "OPENAI_API_KEY is not set"],
    ["the Gemini key", { LLM_PROVIDER: "gemini" }, "AI_KEY is not set"],
  ])("fails without %s", (_label, overrides, message) => {
    expect(() => loadConfig({ ...baseEnv, ...overrides })).toThrow(message);
  });

  it("rejects an unknown ranking mode", () => {
    expect(() => loadConfig({ ...baseEnv, RECIPE_RANKING_MODE: "3" })).toThrow(
      ConfigurationError
    );
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ ...baseEnv, PORT: "eighty" })).toThrow(/Invalid environment/);
  });
});
