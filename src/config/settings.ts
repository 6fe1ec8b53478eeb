/**
 * Runtime settings read from environment variables
 * Validated once with zod; scripts load .env files with dotenv before first use
 */

import * as path from "path";
import { z } from "zod";

const envBoolean = (fallback: boolean) =>
  z
    .preprocess(
      (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
      z.enum(["true", "false", "1", "0", "yes", "no"]).optional()
    )
    .transform((value) => (value === undefined ? fallback : value === "true" || value === "1" || value === "yes"));

const SettingsSchema = z.object({
  DATA_DIR: z.string().default(".data"),
  DATABASE_URL: z.string().optional(),
  SQLITE_PATH: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),

  EMBEDDING_PROVIDER: z.enum(["openai", "pseudo"]).default("openai"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(384),

  SEMANTIC_THRESHOLD: z.coerce.number().default(0.15),
  PREFILTER_THRESHOLD: z.coerce.number().default(0.35),
  HIGH_ENGAGEMENT_THRESHOLD: z.coerce.number().int().default(100),
  DUPLICATE_THRESHOLD: z.coerce.number().default(0.85),

  EVAL_BATCH_SIZE: z.coerce.number().int().positive().default(12),
  EVAL_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  DIGEST_TOP_N: z.coerce.number().int().positive().default(5),
  CANDIDATES_PER_SOURCE: z.coerce.number().int().positive().default(50),
  CANDIDATE_POOL_LIMIT: z.coerce.number().int().positive().default(1000),
  INGEST_LOOKBACK_HOURS: z.coerce.number().int().positive().default(24),

  TELEGRAM_ENABLED: envBoolean(false),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  TELEGRAM_CHUNK_SIZE: z.coerce.number().int().positive().default(4000),

  EMAIL_ENABLED: envBoolean(false),
  EMAIL_SMTP_HOST: z.string().default("smtp.gmail.com"),
  EMAIL_SMTP_PORT: z.coerce.number().int().positive().default(465),
  EMAIL_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  EMAIL_FROM: z.string().optional(),
  EMAIL_TO: z.string().optional(),
  EMAIL_PASSWORD: z.string().optional(),

  SERVER_PORT: z.coerce.number().int().positive().default(8001),
});

export type Settings = z.infer<typeof SettingsSchema>;

let cached: Settings | null = null;

/**
 * Parse settings from an environment map (empty strings count as unset)
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = SettingsSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function getSettings(): Settings {
  if (!cached) {
    cached = loadSettings();
  }
  return cached;
}

export function resolveDataPath(settings: Settings, ...segments: string[]): string {
  return path.resolve(process.cwd(), settings.DATA_DIR, ...segments);
}
