import { APIError, APIUserAbortError } from "openai";
import type { ChatCompletions } from "../clients/llmClient";
import { PIPELINE_LIMITS } from "../config/limits";
import { LogLevel, describeError, log } from "../utils/logger";

export class ModelsExhaustedError extends Error {
  constructor(
    message: string,
    readonly lastError?: unknown
  ) {
    super(message);
    this.name = "ModelsExhaustedError";
  }
}

export class GenerationAbortedError extends Error {
  constructor() {
    super("Generation aborted");
    this.name = "GenerationAbortedError";
  }
}

interface ModelState {
  name: string;
  priority: number;
  available: boolean;
  errorCount: number;
  cooldownUntil: number | null;
  lastSuccess: number | null;
}

export interface ModelStatus {
  name: string;
  available: boolean;
  quotaRemaining: boolean;
  errorCount: number;
  cooldownRemainingMs: number | null;
  lastSuccess: Date | null;
}

export interface ModelManagerOptions {
  cooldownMs?: number;
  errorThreshold?: number;
  now?: () => number;
}

export interface GeneratedText {
  text: string;
  model: string;
}

function isRateLimit(err: unknown): boolean {
  if (err instanceof APIError && err.status === 429) return true;
  const message = describeError(err).toLowerCase();
  return message.includes("429") || message.includes("quota");
}

function isAbort(err: unknown, signal?: AbortSignal): boolean {
  return err instanceof APIUserAbortError || signal?.aborted === true;
}

/**
 * Keeps an ordered list of generative models and picks one per request.
 * A rate-limited model sits out a cooldown; a model that keeps failing is disabled
 * until it succeeds again. Each model is tried at most once per call, so a request
 * costs at most one attempt per configured model.
 */
export class ModelManager {
  private models: ModelState[];
  private cooldownMs: number;
  private errorThreshold: number;
  private now: () => number;
  private lastUsed: string;

  constructor(
    private completions: ChatCompletions,
    modelNames: readonly string[],
    options: ModelManagerOptions = {}
  ) {
    if (modelNames.length === 0) {
      throw new Error("ModelManager needs at least one model");
    }

    this.models = modelNames.map((name, index) => ({
      name,
      priority: index + 1,
      available: true,
      errorCount: 0,
      cooldownUntil: null,
      lastSuccess: null
    }));
    this.cooldownMs = options.cooldownMs ?? PIPELINE_LIMITS.RATE_LIMIT_COOLDOWN_MS;
    this.errorThreshold =
      options.errorThreshold ?? PIPELINE_LIMITS.MODEL_ERROR_THRESHOLD;
    this.now = options.now ?? Date.now;
    this.lastUsed = modelNames[0];
  }

  get currentModel(): string {
    return this.lastUsed;
  }

  /**
   * Models that may be tried right now, by priority: not disabled and not cooling down.
   */
  private candidates(): ModelState[] {
    const now = this.now();
    return this.models
      .filter((m) => m.available && (m.cooldownUntil === null || m.cooldownUntil <= now))
      .sort((a, b) => a.priority - b.priority);
  }

  private recordSuccess(model: ModelState): void {
    model.errorCount = 0;
    model.available = true;
    model.cooldownUntil = null;
    model.lastSuccess = this.now();
    this.lastUsed = model.name;
  }

  private recordFailure(model: ModelState, err: unknown): void {
    if (isRateLimit(err)) {
      model.cooldownUntil = this.now() + this.cooldownMs;
      log(LogLevel.WARN, `${model.name} rate limited, cooling down`);
      return;
    }

    model.errorCount += 1;
    if (model.errorCount >= this.errorThreshold) {
      model.available = false;
      log(LogLevel.ERROR, `Disabled ${model.name} after ${model.errorCount} errors`);
    }
  }

  /**
   * Sends a single-turn prompt to the best available model, falling back to the next
   * one on failure.
   * @param prompt The full instruction and transcript text
   * @param signal Aborts the in-flight HTTP request when fired
   * @returns The generated text and the model that produced it
   * @throws GenerationAbortedError if the signal fires
   * @throws ModelsExhaustedError if no model is available or all of them fail
   */
  async generate(prompt: string, signal?: AbortSignal): Promise<GeneratedText> {
    const candidates = this.candidates();
    let lastError: unknown;

    if (candidates.length === 0) {
      throw new ModelsExhaustedError("No available models. Please try again later.");
    }

    for (const model of candidates) {
      if (signal?.aborted) throw new GenerationAbortedError();

      try {
        log(LogLevel.INFO, `Generating summary with ${model.name}`);
        const response = await this.completions.create(
          { model: model.name, messages: [{ role: "user", content: prompt }] },
          { signal, maxRetries: 0 }
        );

        const text = response.choices[0]?.message.content?.trim();
        if (!text) {
          throw new Error(`Empty response from ${model.name}`);
        }

        this.recordSuccess(model);
        return { text, model: model.name };
      } catch (err: unknown) {
        if (isAbort(err, signal)) throw new GenerationAbortedError();

        lastError = err;
        this.recordFailure(model, err);
        log(LogLevel.WARN, `Error with ${model.name}: ${describeError(err)}`);
      }
    }

    throw new ModelsExhaustedError(
      `All models failed. Last error: ${describeError(lastError)}`,
      lastError
    );
  }

  /**
   * Snapshot of every configured model for the settings screen.
   */
  getStatus(): ModelStatus[] {
    const now = this.now();
    return this.models.map((m) => {
      const coolingDown = m.cooldownUntil !== null && m.cooldownUntil > now;
      return {
        name: m.name,
        available: m.available,
        quotaRemaining: !coolingDown,
        errorCount: m.errorCount,
        cooldownRemainingMs:
          coolingDown && m.cooldownUntil !== null ? m.cooldownUntil - now : null,
        lastSuccess: m.lastSuccess === null ? null : new Date(m.lastSuccess)
      };
    });
  }
}
