import { describe, expect, it } from "vitest";
import { DEFAULT_GEMINI_BASE_URL, loadConfig, maskSecret } from "./env";

const REQUIRED = {
  TELEGRAM_BOT_TOKEN: "test-telegram-token",
  GEMINI_API_KEY: "test-secret"
};

describe("loadConfig", () => {
  it("applies defaults for every optional key", () => {
    expect(loadConfig(REQUIRED)).toEqual({
      telegramBotToken: "test-telegram-token",
      geminiApiKey: "test-secret",
      geminiBaseUrl: DEFAULT_GEMINI_BASE_URL,
      geminiModels: ["gemini-2.5-flash", "gemini-2.0-flash"],
      transcriptLanguage: "en",
      transcriptTimeoutMs: 30_000,
      summaryTimeoutMs: 120_000,
      maxTranscriptChars: 100_000,
      databaseUrl: null,
      databaseSsl: false
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...REQUIRED,
      GEMINI_BASE_URL: "http://localhost:8080/v1/",
      GEMINI_MODELS: " model-a , ,model-b ",
      TRANSCRIPT_LANGUAGE: "de",
      TRANSCRIPT_TIMEOUT_MS: "5000",
      SUMMARY_TIMEOUT_MS: "60000",
      MAX_TRANSCRIPT_CHARS: "2000",
      DATABASE_URL: "postgres://localhost/test",
      DATABASE_SSL: "true"
    });

    expect(config).toMatchObject({
      geminiBaseUrl: "http://localhost:8080/v1/",
      geminiModels: ["model-a", "model-b"],
      transcriptLanguage: "de",
      transcriptTimeoutMs: 5_000,
      summaryTimeoutMs: 60_000,
      maxTranscriptChars: 2_000,
      databaseUrl: "postgres://localhost/test",
      databaseSsl: true
    });
  });

  it("requires the chat token", () => {
    expect(() => loadConfig({ GEMINI_API_KEY: "test-secret" })).toThrow(
      "TELEGRAM_BOT_TOKEN is required"
    );
  });

  it("requires the generative service key", () => {
    expect(() => loadConfig({ TELEGRAM_BOT_TOKEN: "test-telegram-token" })).toThrow(
      "GEMINI_API_KEY is required"
    );
  });

  it.each(["abc", "0", "-5", "1.5"])("rejects %j as a timeout", (raw) => {
    expect(() => loadConfig({ ...REQUIRED, SUMMARY_TIMEOUT_MS: raw })).toThrow(
      `SUMMARY_TIMEOUT_MS must be a positive integer (got "${raw}")`
    );
  });

  it("rejects a model list with no names", () => {
    expect(() => loadConfig({ ...REQUIRED, GEMINI_MODELS: " , " })).toThrow(
      "GEMINI_MODELS must list at least one value"
    );
  });

  it("returns a frozen config", () => {
    const config = loadConfig(REQUIRED);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.geminiModels)).toBe(true);
  });
});

describe("maskSecret", () => {
  it("keeps only a short prefix", () => {
    expect(maskSecret("test-secret")).toBe("test...");
  });

  it("hides short secrets entirely", () => {
    expect(maskSecret("abc")).toBe("****");
  });
});
