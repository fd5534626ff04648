import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError
} from "youtube-transcript";

export enum CaptionFailure {
  DISABLED = "disabled",
  LANGUAGE_MISSING = "language_missing",
  VIDEO_UNAVAILABLE = "video_unavailable",
  RATE_LIMITED = "rate_limited",
  UNKNOWN = "unknown"
}

export class CaptionError extends Error {
  constructor(
    readonly failure: CaptionFailure,
    message: string,
    readonly originalError?: unknown
  ) {
    super(message);
    this.name = "CaptionError";
  }
}

export interface CaptionSegment {
  text: string;
  offset: number;
  duration: number;
}

export interface CaptionTrack {
  videoId: string;
  language: string;
  segments: CaptionSegment[];
}

/** Anything that can return a caption track for a video, e.g. a test double. */
export interface CaptionSource {
  fetchTrack(videoId: string, language: string): Promise<CaptionTrack>;
}

function classify(err: unknown): CaptionFailure {
  if (err instanceof YoutubeTranscriptNotAvailableLanguageError) {
    return CaptionFailure.LANGUAGE_MISSING;
  }
  // NotAvailable: the video exposes no caption tracks at all
  if (
    err instanceof YoutubeTranscriptDisabledError ||
    err instanceof YoutubeTranscriptNotAvailableError
  ) {
    return CaptionFailure.DISABLED;
  }
  if (err instanceof YoutubeTranscriptVideoUnavailableError) {
    return CaptionFailure.VIDEO_UNAVAILABLE;
  }
  if (err instanceof YoutubeTranscriptTooManyRequestError) {
    return CaptionFailure.RATE_LIMITED;
  }
  return CaptionFailure.UNKNOWN;
}

/**
 * Requests the caption track of a YouTube video in one language.
 * Library errors are normalised into a CaptionError carrying a CaptionFailure so
 * callers never depend on the library's error classes.
 * @param videoId The 11-character YouTube id
 * @param language ISO 639-1 code of the requested track (e.g. 'en')
 * @returns The raw caption segments in playback order
 * @throws CaptionError for every upstream failure
 */
export async function fetchCaptionTrack(
  videoId: string,
  language: string
): Promise<CaptionTrack> {
  try {
    const segments = await YoutubeTranscript.fetchTranscript(videoId, {
      lang: language
    });

    return {
      videoId,
      language: segments[0]?.lang ?? language,
      segments: segments.map(({ text, offset, duration }) => ({
        text,
        offset,
        duration
      }))
    };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CaptionError(classify(err), message, err);
  }
}

export const youtubeCaptionSource: CaptionSource = {
  fetchTrack: fetchCaptionTrack
};
