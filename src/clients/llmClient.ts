import OpenAI from "openai";
import type { AppConfig } from "../config/env";

export interface CompletionMessage {
  role: "system" | "user";
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: CompletionMessage[];
}

export interface CompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
}

export interface CompletionCallOptions {
  signal?: AbortSignal;
  timeout?: number;
  maxRetries?: number;
}

/**
 * The slice of an OpenAI-compatible client the bot uses. The SDK's
 * `chat.completions` satisfies it, and tests substitute an in-process fake.
 */
export interface ChatCompletions {
  create(
    body: CompletionRequest,
    options?: CompletionCallOptions
  ): Promise<CompletionResponse>;
}

export interface ModelCatalog {
  list(): Promise<unknown>;
}

export interface LlmClient {
  completions: ChatCompletions;
  models: ModelCatalog;
}

/**
 * Builds an OpenAI SDK client pointed at the configured provider. Gemini exposes an
 * OpenAI-compatible endpoint, so switching providers is a base URL and key change.
 * SDK-level retries are disabled; fallback between models is the model manager's job.
 * @param config The loaded application config
 */
export function createLlmClient(
  config: Pick<AppConfig, "geminiApiKey" | "geminiBaseUrl">
): LlmClient {
  const openai = new OpenAI({
    apiKey: config.geminiApiKey,
    baseURL: config.geminiBaseUrl,
    maxRetries: 0
  });

  return {
    completions: openai.chat.completions,
    models: openai.models
  };
}
