import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("youtube-transcript", () => {
  class YoutubeTranscriptError extends Error {}
  return {
    YoutubeTranscript: { fetchTranscript: vi.fn() },
    YoutubeTranscriptError,
    YoutubeTranscriptDisabledError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptNotAvailableError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptNotAvailableLanguageError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptTooManyRequestError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptVideoUnavailableError: class extends YoutubeTranscriptError {}
  };
});

import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError
} from "youtube-transcript";
import { CaptionError, CaptionFailure, fetchCaptionTrack } from "./captionClient";

const fetchTranscript = vi.mocked(YoutubeTranscript.fetchTranscript);

async function failureFor(err: unknown): Promise<CaptionError> {
  fetchTranscript.mockRejectedValueOnce(err);
  try {
    await fetchCaptionTrack("dQw4w9WgXcQ", "en");
  } catch (caught: unknown) {
    if (caught instanceof CaptionError) return caught;
    throw caught;
  }
  throw new Error("expected fetchCaptionTrack to reject");
}

describe("fetchCaptionTrack", () => {
  beforeEach(() => {
    fetchTranscript.mockReset();
  });

  it("requests the track in the given language and keeps segment order", async () => {
    fetchTranscript.mockResolvedValueOnce([
      { text: "hello", offset: 0, duration: 1.5, lang: "en" },
      { text: "world", offset: 1.5, duration: 2, lang: "en" }
    ]);

    const track = await fetchCaptionTrack("dQw4w9WgXcQ", "en");

    expect(fetchTranscript).toHaveBeenCalledWith("dQw4w9WgXcQ", { lang: "en" });
    expect(track).toEqual({
      videoId: "dQw4w9WgXcQ",
      language: "en",
      segments: [
        { text: "hello", offset: 0, duration: 1.5 },
        { text: "world", offset: 1.5, duration: 2 }
      ]
    });
  });

  it("falls back to the requested language when segments carry none", async () => {
    fetchTranscript.mockResolvedValueOnce([{ text: "hola", offset: 0, duration: 1 }]);

    const track = await fetchCaptionTrack("dQw4w9WgXcQ", "es");

    expect(track.language).toBe("es");
  });

  it("classifies disabled captions", async () => {
    const err = await failureFor(new YoutubeTranscriptDisabledError("dQw4w9WgXcQ"));
    expect(err.failure).toBe(CaptionFailure.DISABLED);
  });

  it("treats a video without any track as disabled", async () => {
    const err = await failureFor(new YoutubeTranscriptNotAvailableError("dQw4w9WgXcQ"));
    expect(err.failure).toBe(CaptionFailure.DISABLED);
  });

  it("classifies a missing language", async () => {
    const err = await failureFor(
      new YoutubeTranscriptNotAvailableLanguageError("en", ["de"], "dQw4w9WgXcQ")
    );
    expect(err.failure).toBe(CaptionFailure.LANGUAGE_MISSING);
  });

  it("classifies an unavailable video", async () => {
    const err = await failureFor(new YoutubeTranscriptVideoUnavailableError("dQw4w9WgXcQ"));
    expect(err.failure).toBe(CaptionFailure.VIDEO_UNAVAILABLE);
  });

  it("classifies upstream throttling", async () => {
    const err = await failureFor(new YoutubeTranscriptTooManyRequestError());
    expect(err.failure).toBe(CaptionFailure.RATE_LIMITED);
  });

  it("wraps anything else as unknown and keeps the original error", async () => {
    const original = new Error("socket hang up");
    const err = await failureFor(original);

    expect(err.failure).toBe(CaptionFailure.UNKNOWN);
    expect(err.message).toBe("socket hang up");
    expect(err.originalError).toBe(original);
  });
});
