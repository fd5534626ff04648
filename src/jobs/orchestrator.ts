import type { AppConfig } from "../config/env";
import type { RunRepository } from "../db/runRepository";
import { RunReporter } from "../services/runReporter";
import { extractVideoReference } from "../services/urlExtractor";
import { RunCancelledError, withDeadline } from "../utils/deadline";
import { LogLevel, describeError } from "../utils/logger";
import { PipelineRun } from "./pipelineRun";
import { ERROR_REPLIES } from "./replyMessages";
import {
  ErrorKind,
  PipelineState,
  RunStatus,
  stageFail,
  type Replier,
  type RunOutcome,
  type StageResult,
  type SummaryGenerator,
  type SummaryRequest,
  type SummaryResult,
  type TranscriptRetriever
} from "./types";

export type PipelineConfig = Pick<
  AppConfig,
  "transcriptLanguage" | "transcriptTimeoutMs" | "summaryTimeoutMs"
>;

export interface OrchestratorDeps {
  retriever: TranscriptRetriever;
  generator: SummaryGenerator;
  runs: RunRepository;
}

export interface HandleInput {
  senderId: string;
  text: string;
  request: SummaryRequest;
  reply: Replier;
  /** Aborted when the sender cancels or the transport goes away */
  signal?: AbortSignal;
}

interface StagesResult {
  videoId: string | null;
  summary: SummaryResult | null;
}

/**
 * Composes extraction, transcript retrieval and summarization into one
 * request/response cycle. Holds no per-request state: every call to `handle`
 * builds its own PipelineRun and RunReporter, so independent runs may overlap.
 */
export class Orchestrator {
  constructor(
    private deps: OrchestratorDeps,
    private config: Readonly<PipelineConfig>
  ) {}

  /**
   * Runs the full pipeline for one incoming message and delivers exactly one reply,
   * either the summary or the fixed message for the first failure. A cancelled run
   * stops at the next stage boundary, releases the in-flight call and sends nothing.
   * Transitions: IDLE -> EXTRACTING -> RETRIEVING -> SUMMARIZING -> REPLYING -> DONE,
   * or any stage -> FAILED -> REPLYING -> DONE (FAILED -> DONE when cancelled).
   * @param input The message, the sender's settings and the reply channel
   * @returns The run's terminal status, failure kind and visited states
   * @throws Whatever `input.reply` throws, after the run has been recorded
   */
  async handle(input: HandleInput): Promise<RunOutcome> {
    const reporter = new RunReporter(this.deps.runs, input.senderId);
    const run = new PipelineRun((from, to) => reporter.transition(from, to));
    const signal = input.signal ?? new AbortController().signal;

    await reporter.startRun(input.request);

    const { videoId, summary } = await this.runStages(run, input, signal, reporter);

    if (run.state !== PipelineState.FAILED && signal.aborted) {
      run.fail(ErrorKind.CANCELLED);
    }

    const errorKind = run.errorKind;
    const model = summary?.model ?? null;

    if (errorKind === ErrorKind.CANCELLED) {
      run.moveTo(PipelineState.DONE);
      await reporter.finishRun(RunStatus.CANCELLED, { errorKind, videoId, model });
      return {
        runId: reporter.id,
        status: RunStatus.CANCELLED,
        errorKind,
        videoId,
        reply: null,
        states: run.states
      };
    }

    let replyText: string;
    if (errorKind !== null) {
      replyText = ERROR_REPLIES[errorKind];
    } else if (summary) {
      replyText = summary.text;
    } else {
      throw new Error("Pipeline finished without a summary or a failure");
    }
    const status = errorKind === null ? RunStatus.COMPLETED : RunStatus.FAILED;

    run.moveTo(PipelineState.REPLYING);
    try {
      await input.reply(replyText);
    } catch (err: unknown) {
      reporter.log(LogLevel.ERROR, `Reply delivery failed: ${describeError(err)}`);
      run.moveTo(PipelineState.DONE);
      await reporter.finishRun(RunStatus.FAILED, { errorKind, videoId, model });
      throw err;
    }
    run.moveTo(PipelineState.DONE);

    await reporter.finishRun(status, { errorKind, videoId, model });

    return {
      runId: reporter.id,
      status,
      errorKind,
      videoId,
      reply: replyText,
      states: run.states
    };
  }

  /**
   * Runs the three stages in order and stops at the first failure, leaving the run
   * either FAILED or in SUMMARIZING with a summary in hand.
   */
  private async runStages(
    run: PipelineRun,
    input: HandleInput,
    signal: AbortSignal,
    reporter: RunReporter
  ): Promise<StagesResult> {
    const { retriever, generator } = this.deps;
    const { transcriptLanguage, transcriptTimeoutMs, summaryTimeoutMs } = this.config;

    const failWith = (result: { kind: ErrorKind; message: string }) => {
      reporter.log(LogLevel.WARN, `${run.state} failed: ${result.kind} (${result.message})`);
      run.fail(result.kind);
    };

    run.moveTo(PipelineState.EXTRACTING);
    const ref = extractVideoReference(input.text);
    if (!ref) {
      failWith({ kind: ErrorKind.INVALID_URL, message: "No supported link in message" });
      return { videoId: null, summary: null };
    }
    reporter.log(LogLevel.INFO, `Video ${ref.videoId} (${ref.form} link)`);

    run.moveTo(PipelineState.RETRIEVING);
    const transcript = await this.runStage(
      (stageSignal) => retriever.retrieve(ref, transcriptLanguage, stageSignal),
      transcriptTimeoutMs,
      ErrorKind.TRANSCRIPT_SERVICE_ERROR,
      signal
    );
    if (!transcript.success) {
      failWith(transcript);
      return { videoId: ref.videoId, summary: null };
    }
    reporter.log(
      LogLevel.INFO,
      `Transcript fetched (${transcript.value.text.length} chars, ${transcript.value.language})`
    );

    run.moveTo(PipelineState.SUMMARIZING);
    const summary = await this.runStage(
      (stageSignal) => generator.generate(transcript.value, input.request, stageSignal),
      summaryTimeoutMs,
      ErrorKind.SUMMARY_UNAVAILABLE,
      signal
    );
    if (!summary.success) {
      failWith(summary);
      return { videoId: ref.videoId, summary: null };
    }
    reporter.log(LogLevel.INFO, `Summary generated by ${summary.value.model}`);

    return { videoId: ref.videoId, summary: summary.value };
  }

  /**
   * Bounds one external call. An expired deadline, or a stage that throws despite
   * its result contract, becomes `failureKind`; a cancelled run becomes CANCELLED.
   */
  private async runStage<T>(
    task: (signal: AbortSignal) => Promise<StageResult<T>>,
    timeoutMs: number,
    failureKind: ErrorKind,
    signal: AbortSignal
  ): Promise<StageResult<T>> {
    try {
      return await withDeadline(task, timeoutMs, signal);
    } catch (err: unknown) {
      if (err instanceof RunCancelledError) {
        return stageFail(ErrorKind.CANCELLED, err.message);
      }
      return stageFail(failureKind, describeError(err));
    }
  }
}
