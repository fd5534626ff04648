import { ErrorKind } from "./types";

/**
 * The only place an ErrorKind becomes user-facing text. CANCELLED has no entry: a
 * cancelled run sends nothing.
 */
export const ERROR_REPLIES: Record<Exclude<ErrorKind, ErrorKind.CANCELLED>, string> = {
  [ErrorKind.INVALID_URL]: "Please send a valid YouTube URL",
  [ErrorKind.CAPTIONS_DISABLED]: "This video has no available English captions",
  [ErrorKind.CAPTIONS_UNAVAILABLE]: "This video has no available English captions",
  [ErrorKind.VIDEO_UNREACHABLE]: "This video could not be found or is unavailable",
  [ErrorKind.TRANSCRIPT_SERVICE_ERROR]:
    "Unable to fetch the transcript right now. Please try later",
  [ErrorKind.SUMMARY_UNAVAILABLE]: "Summary service unavailable. Please try later",
  [ErrorKind.INPUT_TOO_LARGE]: "This video is too long to summarize"
};
