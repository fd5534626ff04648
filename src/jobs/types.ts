export enum VideoPlatform {
  YOUTUBE = "youtube"
}

export enum LinkForm {
  STANDARD = "standard", // youtube.com/watch?v=ID
  SHORT = "short", // youtu.be/ID
  EMBED = "embed", // youtube.com/embed/ID
  SHORTS = "shorts", // youtube.com/shorts/ID
  LEGACY = "legacy" // youtube.com/v/ID
}

export interface VideoReference {
  readonly videoId: string;
  readonly platform: VideoPlatform;
  readonly form: LinkForm;
  readonly canonicalUrl: string;
}

export interface TranscriptText {
  readonly text: string;
  readonly language: string;
}

export enum SummaryMode {
  DETAILED = "detailed",
  BULLET = "bullet",
  QUICK = "quick"
}

export enum SummaryTone {
  SIMPLE = "simple",
  TECHNICAL = "technical",
  BEGINNER = "beginner-friendly"
}

export interface SummaryRequest {
  readonly mode: SummaryMode;
  readonly tone: SummaryTone;
}

export const DEFAULT_SUMMARY_REQUEST: SummaryRequest = Object.freeze({
  mode: SummaryMode.DETAILED,
  tone: SummaryTone.SIMPLE
});

export interface SummaryResult {
  readonly text: string;
  readonly model: string;
}

export enum ErrorKind {
  INVALID_URL = "invalid_url",
  CAPTIONS_DISABLED = "captions_disabled",
  CAPTIONS_UNAVAILABLE = "captions_unavailable",
  VIDEO_UNREACHABLE = "video_unreachable",
  TRANSCRIPT_SERVICE_ERROR = "transcript_service_error",
  SUMMARY_UNAVAILABLE = "summary_unavailable",
  INPUT_TOO_LARGE = "input_too_large",
  CANCELLED = "cancelled"
}

export type StageResult<T> =
  | { success: true; value: T }
  | { success: false; kind: ErrorKind; message: string };

export function stageOk<T>(value: T): StageResult<T> {
  return { success: true, value };
}

export function stageFail<T>(kind: ErrorKind, message: string): StageResult<T> {
  return { success: false, kind, message };
}

export enum PipelineState {
  IDLE = "idle",
  EXTRACTING = "extracting",
  RETRIEVING = "retrieving",
  SUMMARIZING = "summarizing",
  REPLYING = "replying",
  FAILED = "failed",
  DONE = "done"
}

export enum RunStatus {
  COMPLETED = "completed",
  FAILED = "failed",
  CANCELLED = "cancelled"
}

export interface RunOutcome {
  /** Null when the run history could not be written */
  runId: string | null;
  status: RunStatus;
  errorKind: ErrorKind | null;
  videoId: string | null;
  /** The text handed to the transport, null when the run was cancelled */
  reply: string | null;
  states: PipelineState[];
}

/** Delivers the single reply of a run back to the chat transport. */
export type Replier = (text: string) => Promise<void>;

export interface TranscriptRetriever {
  retrieve(
    ref: VideoReference,
    language: string,
    signal: AbortSignal
  ): Promise<StageResult<TranscriptText>>;
}

export interface SummaryGenerator {
  generate(
    transcript: TranscriptText,
    request: SummaryRequest,
    signal: AbortSignal
  ): Promise<StageResult<SummaryResult>>;
}
