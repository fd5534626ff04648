import { PIPELINE_LIMITS } from "../config/limits";
import { LogLevel, describeError, log } from "./logger";
import { retryWithBackoff, type RetryOptions } from "./retry";

export interface SentinelProbe {
  name: string;
  /** A failing critical probe stops startup; a non-critical one only warns */
  critical: boolean;
  check: () => Promise<void>;
}

/**
 * Verifies that external infrastructure is reachable before the bot starts
 * accepting messages. Each probe gets a few attempts with backoff.
 * @param probes The checks to run, in order
 * @param retry Overrides for the probe retry policy
 * @throws Error naming the first critical probe that stays unreachable
 */
export async function runSentinelCheck(
  probes: SentinelProbe[],
  retry: RetryOptions = {}
): Promise<void> {
  log(LogLevel.INFO, "🛡️ Running Sentinel Infrastructure Check...");

  for (const probe of probes) {
    try {
      await retryWithBackoff(probe.check, {
        maxAttempts: PIPELINE_LIMITS.SENTINEL_MAX_ATTEMPTS,
        label: probe.name,
        ...retry
      });
      log(LogLevel.INFO, `    ✅ ${probe.name}: Reachable`);
    } catch (err: unknown) {
      const errorMessage = describeError(err);

      if (probe.critical) {
        throw new Error(
          `CRITICAL: ${probe.name} unreachable. Refusing to start. (${errorMessage})`
        );
      }

      log(LogLevel.WARN, `    ${probe.name} health check failed.`);
      log(
        LogLevel.WARN,
        "   The bot will start, but requests depending on it may fail."
      );
      log(LogLevel.WARN, `   Reason: ${errorMessage}`);
    }
  }
}
