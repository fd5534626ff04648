import "dotenv/config";

export const DEFAULT_GEMINI_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta/openai/";

export const DEFAULT_GEMINI_MODELS = ["gemini-2.5-flash", "gemini-2.0-flash"];

export interface AppConfig {
  telegramBotToken: string;
  geminiApiKey: string;
  geminiBaseUrl: string;
  geminiModels: readonly string[];
  transcriptLanguage: string;
  transcriptTimeoutMs: number;
  summaryTimeoutMs: number;
  maxTranscriptChars: number;
  databaseUrl: string | null;
  databaseSsl: boolean;
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) return [...fallback];

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw new Error(`${key} must list at least one value`);
  }
  return items;
}

/**
 * Validates and loads the bot's environment into an immutable config object.
 * The chat token and the generative service key are mandatory; everything else
 * has a default. The result is frozen and handed to the services explicitly.
 * @param env The variables to read, `process.env` unless a test passes its own
 * @throws Error if a required variable is missing or a numeric one is malformed
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const { TELEGRAM_BOT_TOKEN, GEMINI_API_KEY } = env;

  if (!TELEGRAM_BOT_TOKEN) throw new Error("TELEGRAM_BOT_TOKEN is required");
  if (!GEMINI_API_KEY) throw new Error("GEMINI_API_KEY is required");

  return Object.freeze({
    telegramBotToken: TELEGRAM_BOT_TOKEN,
    geminiApiKey: GEMINI_API_KEY,
    geminiBaseUrl: env.GEMINI_BASE_URL || DEFAULT_GEMINI_BASE_URL,
    geminiModels: Object.freeze(
      readList(env, "GEMINI_MODELS", DEFAULT_GEMINI_MODELS)
    ),
    transcriptLanguage: env.TRANSCRIPT_LANGUAGE || "en",
    transcriptTimeoutMs: readPositiveInt(env, "TRANSCRIPT_TIMEOUT_MS", 30_000),
    summaryTimeoutMs: readPositiveInt(env, "SUMMARY_TIMEOUT_MS", 120_000),
    maxTranscriptChars: readPositiveInt(env, "MAX_TRANSCRIPT_CHARS", 100_000),
    databaseUrl: env.DATABASE_URL || null,
    databaseSsl: env.DATABASE_SSL === "true"
  });
}

/**
 * Shortens a secret for startup logs so operators can tell which key is loaded.
 */
export function maskSecret(secret: string): string {
  return secret.length <= 4 ? "****" : `${secret.slice(0, 4)}...`;
}
