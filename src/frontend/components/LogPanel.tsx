import type { FunctionalComponent } from "preact";
import type { LogEntry } from "../../logger.ts";

interface Props {
  logs: readonly LogEntry[];
  onClear: () => void;
}

const LOG_CLASS: Record<LogEntry["type"], string> = {
  Error: "log-error",
  Info: "log-info",
  Warning: "log-warning",
};

export const LogPanel: FunctionalComponent<Props> = ({ logs, onClear }) => (
  <section className="panel log-panel">
    <h2>Log</h2>
    <div className="data-controls">
      <button className="btn btn-secondary" onClick={onClear} type="button">
        Clear Logs
      </button>
    </div>
    <div className="log-display">
      {logs.map((log, i) => (
        <div className={`log-entry ${LOG_CLASS[log.type]}`} key={`log-${log.timestamp}-${i}`}>
          <span className="log-timestamp">{log.timestamp}</span>
          <span className="log-direction">[{log.type}]</span>
          <span className="log-data">{log.message}</span>
        </div>
      ))}
    </div>
  </section>
);
