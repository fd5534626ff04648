import type { RunRepository } from "../db/runRepository";
import type {
  ErrorKind,
  PipelineState,
  RunStatus,
  SummaryRequest
} from "../jobs/types";
import { LogLevel, describeError, log } from "../utils/logger";

/**
 * Console and history bookkeeping for a single pipeline run.
 * History write failures are logged as warnings and never propagate to the run.
 */
export class RunReporter {
  private runId: string | null = null;
  private startedAt = 0;

  constructor(
    private repo: RunRepository,
    private senderId: string
  ) {}

  get id(): string | null {
    return this.runId;
  }

  /**
   * Opens the run record. Must be called before the first transition is reported so
   * log lines carry the run id.
   * @param request The settings the run was started with
   */
  async startRun(request: SummaryRequest): Promise<void> {
    this.startedAt = Date.now();
    try {
      this.runId = await this.repo.createRun({
        senderId: this.senderId,
        request
      });
    } catch (err: unknown) {
      log(LogLevel.WARN, `Could not record run start: ${describeError(err)}`);
    }
    this.log(LogLevel.INFO, `Run started (${request.mode}/${request.tone})`);
  }

  log(level: LogLevel, message: string): void {
    const tag = this.runId ? this.runId.slice(0, 8) : "--------";
    log(level, `[${tag}] [${this.senderId}] ${message}`);
  }

  transition(from: PipelineState, to: PipelineState): void {
    this.log(LogLevel.INFO, `${from} -> ${to}`);
  }

  /**
   * Closes the run record with its terminal status and prints the duration.
   * @param status How the run ended
   * @param details Failure kind, video id and model, where known
   */
  async finishRun(
    status: RunStatus,
    details: {
      errorKind: ErrorKind | null;
      videoId: string | null;
      model: string | null;
    }
  ): Promise<void> {
    const elapsed = ((Date.now() - this.startedAt) / 1000).toFixed(1);
    const suffix = details.errorKind ? ` (${details.errorKind})` : "";
    this.log(
      details.errorKind ? LogLevel.WARN : LogLevel.INFO,
      `Run ${status}${suffix} in ${elapsed}s`
    );

    if (!this.runId) return;

    try {
      await this.repo.finishRun(this.runId, { status, ...details });
    } catch (err: unknown) {
      log(LogLevel.WARN, `Could not record run result: ${describeError(err)}`);
    }
  }
}
