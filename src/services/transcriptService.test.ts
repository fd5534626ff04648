import { describe, expect, it, vi } from "vitest";

vi.mock("youtube-transcript", () => {
  class YoutubeTranscriptError extends Error {}
  return {
    YoutubeTranscript: { fetchTranscript: vi.fn() },
    YoutubeTranscriptDisabledError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptNotAvailableError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptNotAvailableLanguageError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptTooManyRequestError: class extends YoutubeTranscriptError {},
    YoutubeTranscriptVideoUnavailableError: class extends YoutubeTranscriptError {}
  };
});

import {
  CaptionError,
  CaptionFailure,
  type CaptionSource,
  type CaptionTrack
} from "../clients/captionClient";
import { ErrorKind, LinkForm, VideoPlatform, type VideoReference } from "../jobs/types";
import { TranscriptService, decodeCaptionText, joinSegments } from "./transcriptService";

const REF: VideoReference = {
  videoId: "dQw4w9WgXcQ",
  platform: VideoPlatform.YOUTUBE,
  form: LinkForm.SHORT,
  canonicalUrl: "https://www.youtube.com/watch?v=dQw4w9WgXcQ"
};

function sourceReturning(track: CaptionTrack): CaptionSource {
  return { fetchTrack: vi.fn().mockResolvedValue(track) };
}

function sourceFailing(err: unknown): CaptionSource {
  return { fetchTrack: vi.fn().mockRejectedValue(err) };
}

const live = () => new AbortController().signal;

describe("decodeCaptionText", () => {
  it("decodes named and numeric entities", () => {
    expect(decodeCaptionText("Tom &amp; Jerry &lt;3 &#39;hi&#39;")).toBe("Tom & Jerry <3 'hi'");
  });

  it("decodes double-encoded entities", () => {
    expect(decodeCaptionText("it&amp;#39;s")).toBe("it's");
  });

  it("turns non-breaking spaces into plain spaces", () => {
    expect(decodeCaptionText("a&nbsp;b")).toBe("a b");
  });

  it("leaves numeric entities beyond the Unicode range as they are", () => {
    expect(decodeCaptionText("a &#1114112; b &#128512;")).toBe("a &#1114112; b 😀");
  });
});

describe("joinSegments", () => {
  it("joins segments with single spaces and trims", () => {
    const segments = [
      { text: "  first\nline ", offset: 0, duration: 1 },
      { text: "second", offset: 1, duration: 1 }
    ];
    expect(joinSegments(segments)).toBe("first line second");
  });
});

describe("TranscriptService.retrieve", () => {
  it("returns the flattened transcript and the track language", async () => {
    const captions = sourceReturning({
      videoId: REF.videoId,
      language: "en",
      segments: [
        { text: "never gonna", offset: 0, duration: 1 },
        { text: "give you up", offset: 1, duration: 1 }
      ]
    });
    const service = new TranscriptService(captions);

    const result = await service.retrieve(REF, "en", live());

    expect(captions.fetchTrack).toHaveBeenCalledWith("dQw4w9WgXcQ", "en");
    expect(result).toEqual({
      success: true,
      value: { text: "never gonna give you up", language: "en" }
    });
  });

  it.each([
    [CaptionFailure.DISABLED, ErrorKind.CAPTIONS_DISABLED],
    [CaptionFailure.LANGUAGE_MISSING, ErrorKind.CAPTIONS_UNAVAILABLE],
    [CaptionFailure.VIDEO_UNAVAILABLE, ErrorKind.VIDEO_UNREACHABLE],
    [CaptionFailure.RATE_LIMITED, ErrorKind.TRANSCRIPT_SERVICE_ERROR],
    [CaptionFailure.UNKNOWN, ErrorKind.TRANSCRIPT_SERVICE_ERROR]
  ])("maps caption failure %s to %s", async (failure, kind) => {
    const service = new TranscriptService(
      sourceFailing(new CaptionError(failure, "upstream said no"))
    );

    const result = await service.retrieve(REF, "en", live());

    expect(result).toEqual({ success: false, kind, message: "upstream said no" });
  });

  it("keeps the transcript when a segment holds an out-of-range entity", async () => {
    const service = new TranscriptService(
      sourceReturning({
        videoId: REF.videoId,
        language: "en",
        segments: [
          { text: "before", offset: 0, duration: 1 },
          { text: "&#1114112; after", offset: 1, duration: 1 }
        ]
      })
    );

    const result = await service.retrieve(REF, "en", live());

    expect(result).toEqual({
      success: true,
      value: { text: "before &#1114112; after", language: "en" }
    });
  });

  it("maps an unexpected error to a transcript service error", async () => {
    const service = new TranscriptService(sourceFailing(new TypeError("boom")));

    const result = await service.retrieve(REF, "en", live());

    expect(result).toEqual({
      success: false,
      kind: ErrorKind.TRANSCRIPT_SERVICE_ERROR,
      message: "boom"
    });
  });

  it("rejects a track whose text is empty", async () => {
    const service = new TranscriptService(
      sourceReturning({
        videoId: REF.videoId,
        language: "en",
        segments: [{ text: "  ", offset: 0, duration: 1 }]
      })
    );

    const result = await service.retrieve(REF, "en", live());

    expect(result).toEqual({
      success: false,
      kind: ErrorKind.TRANSCRIPT_SERVICE_ERROR,
      message: "Empty caption track for dQw4w9WgXcQ"
    });
  });

  it("does not call upstream once the run is cancelled", async () => {
    const captions = sourceReturning({ videoId: REF.videoId, language: "en", segments: [] });
    const service = new TranscriptService(captions);
    const controller = new AbortController();
    controller.abort();

    const result = await service.retrieve(REF, "en", controller.signal);

    expect(result).toEqual({
      success: false,
      kind: ErrorKind.CANCELLED,
      message: "Cancelled before retrieval"
    });
    expect(captions.fetchTrack).not.toHaveBeenCalled();
  });
});
