import {
  MODE_TEMPLATES,
  SHARED_GUIDELINES,
  TONE_INSTRUCTIONS
} from "../config/prompts";
import {
  ErrorKind,
  type StageResult,
  type SummaryGenerator,
  type SummaryRequest,
  type SummaryResult,
  type TranscriptText,
  stageFail,
  stageOk
} from "../jobs/types";
import { describeError } from "../utils/logger";
import { GenerationAbortedError, type GeneratedText } from "./modelManager";

/** Anything that turns a prompt into text; the model manager in production. */
export interface TextGenerator {
  generate(prompt: string, signal?: AbortSignal): Promise<GeneratedText>;
}

/**
 * Builds the instruction prompt for a transcript. Pure: the same transcript and
 * request always produce the same string.
 * @param transcript The retrieved caption text
 * @param request Presentation mode and tone
 */
export function buildSummaryPrompt(
  transcript: TranscriptText,
  request: SummaryRequest
): string {
  return [
    ...MODE_TEMPLATES[request.mode],
    TONE_INSTRUCTIONS[request.tone],
    "Guidelines:",
    ...SHARED_GUIDELINES.map((line) => `- ${line}`),
    `- Write the summary in the transcript's language (${transcript.language}).`,
    "",
    "Transcript:",
    transcript.text
  ].join("\n");
}

export class SummaryService implements SummaryGenerator {
  /**
   * @param generator Model access, normally a ModelManager
   * @param maxTranscriptChars Transcripts longer than this are rejected, never truncated
   */
  constructor(
    private generator: TextGenerator,
    private maxTranscriptChars: number
  ) {}

  /**
   * Requests a condensed summary of a transcript in the requested style.
   * Oversized transcripts fail with INPUT_TOO_LARGE before any upstream call; every
   * upstream problem (rate limit, timeout, empty output) collapses to SUMMARY_UNAVAILABLE.
   * @param transcript The retrieved caption text
   * @param request Presentation mode and tone
   * @param signal Aborted when the run is cancelled or its deadline passes
   */
  async generate(
    transcript: TranscriptText,
    request: SummaryRequest,
    signal: AbortSignal
  ): Promise<StageResult<SummaryResult>> {
    if (transcript.text.length > this.maxTranscriptChars) {
      return stageFail(
        ErrorKind.INPUT_TOO_LARGE,
        `Transcript has ${transcript.text.length} chars, limit is ${this.maxTranscriptChars}`
      );
    }

    if (signal.aborted) {
      return stageFail(ErrorKind.CANCELLED, "Cancelled before summarizing");
    }

    try {
      const prompt = buildSummaryPrompt(transcript, request);
      const { text, model } = await this.generator.generate(prompt, signal);
      return stageOk({ text, model });
    } catch (err: unknown) {
      if (err instanceof GenerationAbortedError) {
        return stageFail(ErrorKind.CANCELLED, err.message);
      }
      return stageFail(ErrorKind.SUMMARY_UNAVAILABLE, describeError(err));
    }
  }
}
