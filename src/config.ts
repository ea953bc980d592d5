import path from "path";
import { z } from "zod";

export const APP_NAME = "deckflow";
export const APP_VERSION = "0.1.0";

// Default marker the model is told to emit once it has gathered everything a
// draft needs (see buildConversationSystemPrompt). It must never reach the user.
export const DEFAULT_READY_MARKER = "[READY_FOR_DRAFT]";

const DEFAULT_TEMPLATES_PATH = path.join(__dirname, "..", "config", "templates.json");

const optionalString = z
  .string()
  .optional()
  .transform((v) => (typeof v === "string" && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),

  DECK_LLM_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  DECK_OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  ANTHROPIC_API_KEY: optionalString,
  DECK_ANTHROPIC_MODEL: z.string().min(1).default("claude-3-5-haiku-latest"),
  DECK_LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.15),
  DECK_LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
  DECK_LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  DECK_LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  DECK_RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  DECK_SESSION_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  DECK_SESSION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),
  DECK_SESSION_MAX_HISTORY: z.coerce.number().int().min(2).default(100),
  DECK_READY_MARKER: z.string().min(1).default(DEFAULT_READY_MARKER),

  DECK_OUTPUT_DIR: z.string().min(1).default("./output"),
  DECK_TEMPLATES_PATH: z.string().min(1).default(DEFAULT_TEMPLATES_PATH),
  DECK_MAX_SLIDES: z.coerce.number().int().min(1).max(20).default(10),
  DECK_DEFAULT_SLIDES: z.coerce.number().int().min(1).max(20).default(3),
  DECK_CORS_ORIGINS: z.string().default("*"),
});

export type LlmProvider = "openai" | "anthropic";

export interface AppConfig {
  port: number;
  llm: {
    provider: LlmProvider;
    openai: { apiKey?: string; baseURL?: string; model: string };
    anthropic: { apiKey?: string; model: string };
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
  };
  render: { outputDir: string; timeoutMs: number };
  sessions: {
    idleTimeoutMs: number;
    sweepIntervalMs: number;
    maxHistory: number;
    readyMarker: string;
  };
  templatesPath: string;
  maxSlides: number;
  defaultSlides: number;
  corsOrigins: string[] | "*";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "environment";
    throw new Error(`Invalid configuration: ${where}: ${issue?.message ?? "validation failed"}`);
  }
  const e = parsed.data;

  const origins = e.DECK_CORS_ORIGINS.split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  return {
    port: e.PORT,
    llm: {
      provider: e.DECK_LLM_PROVIDER,
      openai: { apiKey: e.OPENAI_API_KEY, baseURL: e.OPENAI_BASE_URL, model: e.DECK_OPENAI_MODEL },
      anthropic: { apiKey: e.ANTHROPIC_API_KEY, model: e.DECK_ANTHROPIC_MODEL },
      temperature: e.DECK_LLM_TEMPERATURE,
      maxTokens: e.DECK_LLM_MAX_TOKENS,
      timeoutMs: e.DECK_LLM_TIMEOUT_MS,
      maxRetries: e.DECK_LLM_MAX_RETRIES,
    },
    render: { outputDir: path.resolve(e.DECK_OUTPUT_DIR), timeoutMs: e.DECK_RENDER_TIMEOUT_MS },
    sessions: {
      idleTimeoutMs: e.DECK_SESSION_IDLE_TIMEOUT_MS,
      sweepIntervalMs: e.DECK_SESSION_SWEEP_INTERVAL_MS,
      maxHistory: e.DECK_SESSION_MAX_HISTORY,
      readyMarker: e.DECK_READY_MARKER,
    },
    templatesPath: path.resolve(e.DECK_TEMPLATES_PATH),
    maxSlides: e.DECK_MAX_SLIDES,
    defaultSlides: Math.min(e.DECK_DEFAULT_SLIDES, e.DECK_MAX_SLIDES),
    corsOrigins: origins.length === 0 || origins.includes("*") ? "*" : origins,
  };
}
