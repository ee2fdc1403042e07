// Scoped console logger shared by the runtime and the configurator UI.
// Entries use the same shape the UI log panel renders.

export type LogType = "Info" | "Warning" | "Error";

export type LogEntry = { timestamp: string; type: LogType; message: string };

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Extra receivers for every entry (UI panel, tests). */
  sinks?: LogSink[];
  /** Set to false to keep entries off the console. */
  console?: boolean;
  now?: () => Date; // DI for testing
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const { sinks = [], console: toConsole = true, now = () => new Date() } =
    opts;

  const emit = (type: LogType, message: string, cause?: unknown) => {
    const text = `[${scope}] ${message}`;
    const entry: LogEntry = {
      message: text,
      timestamp: now().toISOString(),
      type,
    };
    if (toConsole) {
      if (type === "Error") {
        if (cause === undefined) console.error(text);
        else console.error(text, cause);
      } else if (type === "Warning") console.warn(text);
      else console.log(text);
    }
    for (const sink of sinks) sink(entry);
  };

  return {
    child: (sub) => createLogger(`${scope}:${sub}`, opts),
    error: (message, cause) => emit("Error", message, cause),
    info: (message) => emit("Info", message),
    warn: (message) => emit("Warning", message),
  };
}
