export const PIPELINE_LIMITS = {
  // Telegram rejects messages over 4096 chars; leave room for the header
  MAX_MESSAGE_LENGTH: 4000,

  // Model manager
  RATE_LIMIT_COOLDOWN_MS: 5 * 60 * 1000,
  MODEL_ERROR_THRESHOLD: 5,

  // Telegraf aborts a handler after this long; must outlast both stage timeouts
  HANDLER_TIMEOUT_MS: 5 * 60 * 1000,

  // Startup probes
  SENTINEL_MAX_ATTEMPTS: 3
} as const;
