export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

export class RunCancelledError extends Error {
  constructor() {
    super("Run was cancelled");
    this.name = "RunCancelledError";
  }
}

/**
 * Runs an async task under a hard deadline and an optional parent cancellation signal.
 * The task receives its own AbortSignal, fired when the deadline passes or the parent
 * aborts, so HTTP clients that honour it can release the in-flight request. The returned
 * promise settles as soon as either happens even if the task ignores the signal.
 * @param task The work to run; should pass the signal on to its network calls
 * @param timeoutMs Upper bound on the wait
 * @param parent Signal of the enclosing run, aborted when the caller goes away
 * @returns The task's resolved value
 * @throws DeadlineExceededError when the deadline passes first
 * @throws RunCancelledError when the parent signal aborts first
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) return Promise.reject(new RunCancelledError());

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onParentAbort = () => {
      cleanup();
      controller.abort();
      reject(new RunCancelledError());
    };

    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);

    function cleanup() {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }

    parent?.addEventListener("abort", onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}
