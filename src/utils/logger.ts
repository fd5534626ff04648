export enum LogLevel {
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR"
}

const icons = {
  [LogLevel.INFO]: "ℹ️",
  [LogLevel.WARN]: "⚠️",
  [LogLevel.ERROR]: "❌"
};

/**
 * Writes a timestamped, icon-prefixed line to the console stream matching its level.
 * @param level The severity level using the LogLevel enum (INFO, WARN, ERROR)
 * @param message The descriptive text to be recorded
 * @param detail Optional error or object printed after the message
 */
export function log(level: LogLevel, message: string, detail?: unknown): void {
  const timestamp = new Date().toLocaleTimeString();
  const line = `[${timestamp}] ${icons[level]} ${message}`;
  const args = detail === undefined ? [line] : [line, detail];

  if (level === LogLevel.ERROR) console.error(...args);
  else if (level === LogLevel.WARN) console.warn(...args);
  else console.log(...args);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : JSON.stringify(err);
}
