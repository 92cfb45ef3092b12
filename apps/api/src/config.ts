import { z } from "zod";
import { ConfigError } from "./errors";

const PositiveInt = z.coerce.number().int().positive();

export type PromptBudgets = {
  evaluation: number;
  swot: number;
  questions: number;
  alternatives: number;
};

export const DEFAULT_PROMPT_BUDGETS: PromptBudgets = {
  evaluation: 2000,
  swot: 1200,
  questions: 3000,
  alternatives: 1200,
};

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().trim().min(1, "ANTHROPIC_API_KEY is required."),
  ANTHROPIC_BASE_URL: z.url().default("https://api.anthropic.com/v1"),
  ANTHROPIC_VERSION: z.string().min(1).default("2023-06-01"),
  ANTHROPIC_MODEL: z.string().min(1).default("claude-sonnet-4-6"),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  ANTHROPIC_TIMEOUT_MS: PositiveInt.default(45000),
  EVAL_MAX_TOKENS: PositiveInt.default(DEFAULT_PROMPT_BUDGETS.evaluation),
  SWOT_MAX_TOKENS: PositiveInt.default(DEFAULT_PROMPT_BUDGETS.swot),
  QA_MAX_TOKENS: PositiveInt.default(DEFAULT_PROMPT_BUDGETS.questions),
  ALTERNATIVES_MAX_TOKENS: PositiveInt.default(DEFAULT_PROMPT_BUDGETS.alternatives),
  // A single retry at most; the gateway call blocks the request.
  LLM_RETRY_LIMIT: z.coerce.number().int().min(0).max(1).default(1),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type LlmConfig = {
  apiKey: string;
  baseUrl: string;
  apiVersion: string;
  model: string;
  temperature: number;
  timeoutMs: number;
};

export type AppConfig = {
  llm: LlmConfig;
  maxTokens: PromptBudgets;
  retryLimit: number;
  server: { port: number; host: string };
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
};

/**
 * Validates the process environment once at start-up.
 * A missing credential is fatal here rather than on the first request.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid environment configuration: ${problems.join("; ")}`);
  }

  const parsed = result.data;
  return {
    llm: {
      apiKey: parsed.ANTHROPIC_API_KEY,
      baseUrl: parsed.ANTHROPIC_BASE_URL.replace(/\/+$/, ""),
      apiVersion: parsed.ANTHROPIC_VERSION,
      model: parsed.ANTHROPIC_MODEL,
      temperature: parsed.ANTHROPIC_TEMPERATURE,
      timeoutMs: parsed.ANTHROPIC_TIMEOUT_MS,
    },
    maxTokens: {
      evaluation: parsed.EVAL_MAX_TOKENS,
      swot: parsed.SWOT_MAX_TOKENS,
      questions: parsed.QA_MAX_TOKENS,
      alternatives: parsed.ALTERNATIVES_MAX_TOKENS,
    },
    retryLimit: parsed.LLM_RETRY_LIMIT,
    server: { port: parsed.PORT, host: parsed.HOST },
    logLevel: parsed.LOG_LEVEL,
  };
}
