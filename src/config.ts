import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { LogLevel } from "./utils/logger";

export type LlmProvider = "openai" | "groq" | "gemini";

/** 1 = maximize used ingredients, 2 = minimize missing ingredients */
export type RankingMode = 1 | 2;

export interface LlmConfig {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface RecipeSearchConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  candidateCount: number;
  rankingMode: RankingMode;
  retryAttempts: number;
  retryBaseDelayMs: number;
}

export interface GroceryConfig {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  locationId: string;
  productLimit: number;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  corsOrigins: string[] | null;
  logLevel: LogLevel;
  llm: LlmConfig;
  recipes: RecipeSearchConfig;
  grocery: GroceryConfig;
  summaryNarration: boolean;
  sessionTtlMs: number;
}

// `KEY=` in a .env file arrives as an empty string
const blankAsUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const optionalString = z.preprocess(
  blankAsUndefined,
  z.string().trim().optional()
);

const intWithDefault = (fallback: number) =>
  z.preprocess(
    (v) => (v === undefined || v === "" ? fallback : v),
    z.coerce.number().int().positive()
  );

const booleanWithDefault = (fallback: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === "") return fallback;
    if (typeof v === "string") return ["1", "true", "yes", "on"].includes(v.toLowerCase());
    return v;
  }, z.boolean());

const EnvSchema = z.object({
  PORT: intWithDefault(3000),
  CORS_ORIGIN: optionalString,
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(["debug", "info", "warn", "error"]).default("info")
  ),

  LLM_PROVIDER: z.preprocess(
    blankAsUndefined,
    z.enum(["openai", "groq", "gemini"]).default("openai")
  ),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: optionalString,
  AI_KEY: optionalString,
  GEMINI_MODEL: optionalString,
  LLM_TIMEOUT_MS: intWithDefault(60_000),

  SPOONACULAR_API_KEY: optionalString,
  SPOONACULAR_BASE_URL: optionalString,
  SPOONACULAR_TIMEOUT_MS: intWithDefault(30_000),
  RECIPE_CANDIDATE_COUNT: intWithDefault(5),
  RECIPE_RANKING_MODE: z
    .preprocess((v) => (v === undefined || v === "" ? 1 : v), z.coerce.number())
    .pipe(z.union([z.literal(1), z.literal(2)])),
  RECIPE_RETRY_ATTEMPTS: intWithDefault(3),
  RECIPE_RETRY_BASE_DELAY_MS: intWithDefault(500),

  KROGER_CLIENT_ID: optionalString,
  KROGER_CLIENT_SECRET: optionalString,
  KROGER_BASE_URL: optionalString,
  KROGER_LOCATION_ID: optionalString,
  KROGER_PRODUCT_LIMIT: intWithDefault(1),
  KROGER_TIMEOUT_MS: intWithDefault(15_000),

  SUMMARY_NARRATION: booleanWithDefault(true),
  SESSION_TTL_MS: intWithDefault(60 * 60 * 1000),
});

type Env = z.infer<typeof EnvSchema>;

function requireValue(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigurationError(`${name} is not set`);
  }
  return value;
}

function resolveLlm(env: Env): LlmConfig {
  switch (env.LLM_PROVIDER) {
    case "groq":
      return {
        provider: "groq",
        apiKey: requireValue(env.GROQ_API_KEY, "GROQ_API_KEY"),
        model: env.GROQ_MODEL ?? "llama-3.3-70b-versatile",
        timeoutMs: env.LLM_TIMEOUT_MS,
      };
    case "gemini":
      return {
        provider: "gemini",
        apiKey: requireValue(env.AI_KEY, "AI_KEY"),
        model: env.GEMINI_MODEL ?? "gemini-1.5-pro",
        timeoutMs: env.LLM_TIMEOUT_MS,
      };
    case "openai":
      return {
        provider: "openai",
        apiKey: requireValue(env.OPENAI_API_KEY, "OPENAI_API_KEY"),
        model: env.OPENAI_MODEL ?? "gpt-4o-mini",
        timeoutMs: env.LLM_TIMEOUT_MS,
      };
  }
}

/**
 * Validates the environment. Missing credentials are fatal here rather
 * than on the first request that needs them.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  const e = parsed.data;

  if (!e.KROGER_CLIENT_ID || !e.KROGER_CLIENT_SECRET) {
    throw new ConfigurationError(
      "KROGER_CLIENT_ID and KROGER_CLIENT_SECRET must be set"
    );
  }

  return {
    port: e.PORT,
    corsOrigins: e.CORS_ORIGIN
      ? e.CORS_ORIGIN.split(",")
          .map((s) => s.trim())
          .filter(Boolean)
      : null,
    logLevel: e.LOG_LEVEL,
    llm: resolveLlm(e),
    recipes: {
      apiKey: requireValue(e.SPOONACULAR_API_KEY, "SPOONACULAR_API_KEY"),
      baseUrl: e.SPOONACULAR_BASE_URL ?? "https://api.spoonacular.com",
      timeoutMs: e.SPOONACULAR_TIMEOUT_MS,
      candidateCount: e.RECIPE_CANDIDATE_COUNT,
      rankingMode: e.RECIPE_RANKING_MODE,
      retryAttempts: e.RECIPE_RETRY_ATTEMPTS,
      retryBaseDelayMs: e.RECIPE_RETRY_BASE_DELAY_MS,
    },
    grocery: {
      clientId: e.KROGER_CLIENT_ID,
      clientSecret: e.KROGER_CLIENT_SECRET,
      baseUrl: e.KROGER_BASE_URL ?? "https://api.kroger.com/v1",
      locationId: e.KROGER_LOCATION_ID ?? "01400722",
      productLimit: e.KROGER_PRODUCT_LIMIT,
      timeoutMs: e.KROGER_TIMEOUT_MS,
    },
    summaryNarration: e.SUMMARY_NARRATION,
    sessionTtlMs: e.SESSION_TTL_MS,
  };
}

export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
