import { useCallback, useMemo, useState } from "preact/hooks";
import type { LogEntry, LogSink, LogType } from "../../logger.ts";

export interface UseLogsOptions {
  now?: () => Date; // DI for testing
  max?: number; // default 100
}

export interface UseLogsResult {
  logs: LogEntry[];
  addLog: (type: LogType, message: string) => void;
  clearLogs: () => void;
  /** Feeds `createLogger` entries into the panel. */
  sink: LogSink;
}

export function useLogs(opts: UseLogsOptions = {}): UseLogsResult {
  const { now = () => new Date(), max = 100 } = opts;
  const [logs, setLogs] = useState<LogEntry[]>([]);

  const push = useCallback(
    (entry: LogEntry) => {
      setLogs((prev) => [...prev.slice(Math.max(0, prev.length - max + 1)), entry]);
    },
    [max],
  );

  const addLog = useCallback(
    (type: LogType, message: string) => {
      push({ message, timestamp: now().toLocaleTimeString(), type });
    },
    [now, push],
  );

  const sink = useMemo<LogSink>(
    () => (entry) => push({ ...entry, timestamp: now().toLocaleTimeString() }),
    [now, push],
  );

  const clearLogs = useCallback(() => setLogs([]), []);

  return { addLog, clearLogs, logs, sink };
}
