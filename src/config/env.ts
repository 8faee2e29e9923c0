import dotenv from "dotenv";
import { z } from "zod";
import type { Logger } from "pino";

dotenv.config();

const csv = z
  .string()
  .transform(value => value.split(",").map(s => s.trim()).filter(Boolean));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),

  DATABASE_URL: z.string().default(""),
  POSTGRES_POOL_SIZE: z.coerce.number().int().positive().default(20),
  POSTGRES_POOL_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  OPENAI_API_KEY: z.string().default(""),
  CLAUDE_API_KEY: z.string().default(""),
  GEMINI_API_KEY: z.string().default(""),
  DEEPSEEK_API_KEY: z.string().default(""),

  LLM_BACKENDS: csv.default("gpt-4o-mini,gpt-4o,claude-3-5-sonnet-latest,gemini-1.5-pro,deepseek-chat"),
  DEFAULT_LLM_MODEL: z.string().default("gpt-4o-mini"),
  DEFAULT_LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  REASONING_EFFORT: z.enum(["low", "medium", "high"]).optional(),
  MAX_LLM_CALL_RETRIES: z.coerce.number().int().positive().default(3),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2000),
  LLM_RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(10_000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  MAX_CONTEXT_TOKENS: z.coerce.number().int().positive().default(4000),

  LONG_TERM_MEMORY_MODEL: z.string().default("gpt-4o-mini"),
  LONG_TERM_MEMORY_EMBEDDER_MODEL: z.string().default("text-embedding-3-small"),
  LONG_TERM_MEMORY_EMBEDDING_DIMS: z.coerce.number().int().positive().default(1536),
  LONG_TERM_MEMORY_TOP_K: z.coerce.number().int().positive().default(5),
  MEMORY_QUEUE_SIZE: z.coerce.number().int().positive().default(100),
  MEMORY_QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(2),

  RAGFLOW_BASE_URL: z.string().default("http://localhost:9380/api/v1"),
  RAGFLOW_API_KEY: z.string().default(""),
  RAGFLOW_CHAT_ID: z.string().default(""),

  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW: z.string().default("1 minute"),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000)
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}

export const env = loadEnv();

export function validateEnv(config: Env, logger: Logger): void {
  const providerKeys = ["OPENAI_API_KEY", "CLAUDE_API_KEY", "GEMINI_API_KEY", "DEEPSEEK_API_KEY"] as const;
  const configured = providerKeys.filter(key => config[key] !== "");
  if (configured.length === 0) {
    logger.warn("No model provider API key is set; every backend will be skipped");
  }
  if (!config.DATABASE_URL) {
    logger.warn("DATABASE_URL is not set; checkpoints and memory facts live in process memory only");
  }
  if (!config.OPENAI_API_KEY) {
    logger.warn("OPENAI_API_KEY is not set; long-term memory lookups will fail and turns run without recalled facts");
  }
}
