import {
  CaptionError,
  CaptionFailure,
  type CaptionSegment,
  type CaptionSource
} from "../clients/captionClient";
import {
  ErrorKind,
  type StageResult,
  type TranscriptRetriever,
  type TranscriptText,
  type VideoReference,
  stageFail,
  stageOk
} from "../jobs/types";

const FAILURE_KINDS: Record<CaptionFailure, ErrorKind> = {
  [CaptionFailure.DISABLED]: ErrorKind.CAPTIONS_DISABLED,
  [CaptionFailure.LANGUAGE_MISSING]: ErrorKind.CAPTIONS_UNAVAILABLE,
  [CaptionFailure.VIDEO_UNAVAILABLE]: ErrorKind.VIDEO_UNREACHABLE,
  [CaptionFailure.RATE_LIMITED]: ErrorKind.TRANSCRIPT_SERVICE_ERROR,
  [CaptionFailure.UNKNOWN]: ErrorKind.TRANSCRIPT_SERVICE_ERROR
};

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
  "&nbsp;": " "
};

const MAX_CODE_POINT = 0x10ffff;

/**
 * Caption payloads arrive HTML-encoded, sometimes twice (`&amp;#39;`).
 */
export function decodeCaptionText(raw: string): string {
  let text = raw;
  for (let pass = 0; pass < 2; pass++) {
    text = text
      .replace(/&#(\d+);/g, (entity: string, code: string) => {
        const point = Number(code);
        return point <= MAX_CODE_POINT ? String.fromCodePoint(point) : entity;
      })
      .replace(/&(amp|lt|gt|quot|apos|nbsp);/g, (entity) => ENTITIES[entity]);
  }
  return text;
}

/**
 * Flattens caption segments into one line of prose with entities decoded and
 * whitespace collapsed.
 */
export function joinSegments(segments: CaptionSegment[]): string {
  return segments
    .map((segment) => decodeCaptionText(segment.text))
    .join(" ")
    .replace(/\s+/g, " ")
    .trim();
}

export class TranscriptService implements TranscriptRetriever {
  constructor(private captions: CaptionSource) {}

  /**
   * Fetches the caption track of a video and returns it as plain text.
   * Every upstream failure is returned as a typed result rather than thrown, so the
   * orchestrator can tell disabled captions from a missing language or a dead video.
   * @param ref The extracted video reference
   * @param language Requested caption language code
   * @param signal Aborted when the run is cancelled or its deadline passes
   */
  async retrieve(
    ref: VideoReference,
    language: string,
    signal: AbortSignal
  ): Promise<StageResult<TranscriptText>> {
    if (signal.aborted) {
      return stageFail(ErrorKind.CANCELLED, "Cancelled before retrieval");
    }

    try {
      const track = await this.captions.fetchTrack(ref.videoId, language);
      const text = joinSegments(track.segments);

      if (text.length === 0) {
        return stageFail(
          ErrorKind.TRANSCRIPT_SERVICE_ERROR,
          `Empty caption track for ${ref.videoId}`
        );
      }

      return stageOk({ text, language: track.language });
    } catch (err: unknown) {
      if (err instanceof CaptionError) {
        return stageFail(FAILURE_KINDS[err.failure], err.message);
      }
      const message = err instanceof Error ? err.message : String(err);
      return stageFail(ErrorKind.TRANSCRIPT_SERVICE_ERROR, message);
    }
  }
}
