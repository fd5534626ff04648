import { PipelineState, type ErrorKind } from "./types";

const TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  [PipelineState.IDLE]: [PipelineState.EXTRACTING],
  [PipelineState.EXTRACTING]: [PipelineState.RETRIEVING, PipelineState.FAILED],
  [PipelineState.RETRIEVING]: [PipelineState.SUMMARIZING, PipelineState.FAILED],
  [PipelineState.SUMMARIZING]: [PipelineState.REPLYING, PipelineState.FAILED],
  [PipelineState.REPLYING]: [PipelineState.DONE],
  // A cancelled run goes straight to DONE without replying
  [PipelineState.FAILED]: [PipelineState.REPLYING, PipelineState.DONE],
  [PipelineState.DONE]: []
};

export class IllegalTransitionError extends Error {
  constructor(from: PipelineState, to: PipelineState) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * State of one request moving through the pipeline. Records every state it passes
 * through and the failure kind once it fails.
 */
export class PipelineRun {
  private current = PipelineState.IDLE;
  private history: PipelineState[] = [PipelineState.IDLE];
  private failure: ErrorKind | null = null;

  constructor(
    private onTransition?: (from: PipelineState, to: PipelineState) => void
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get states(): PipelineState[] {
    return [...this.history];
  }

  get errorKind(): ErrorKind | null {
    return this.failure;
  }

  /**
   * @throws IllegalTransitionError if `to` is not reachable from the current state
   */
  moveTo(to: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }

    if (to === PipelineState.FAILED && this.failure === null) {
      throw new Error("Use fail(kind) to enter the FAILED state");
    }

    const from = this.current;
    this.current = to;
    this.history.push(to);
    this.onTransition?.(from, to);
  }

  fail(kind: ErrorKind): void {
    this.failure = kind;
    this.moveTo(PipelineState.FAILED);
  }
}
