import type { FunctionalComponent } from "preact";

interface Props {
  /** CSV actions need a selected device. */
  csvEnabled: boolean;
  onImportJson: (text: string) => void;
  onExportJson: () => void;
  onImportCsv: (text: string) => void;
  onExportCsv: () => void;
  onError: (message: string) => void;
}

function readFileInput(
  input: HTMLInputElement,
  onText: (text: string) => void,
  onError: (message: string) => void,
) {
  const file = input.files?.[0];
  if (!file) return;
  input.value = "";
  file.text().then(onText, (e: unknown) => {
    onError(`Cannot read ${file.name}: ${e instanceof Error ? e.message : String(e)}`);
  });
}

export const ImportExportPanel: FunctionalComponent<Props> = ({
  csvEnabled,
  onImportJson,
  onExportJson,
  onImportCsv,
  onExportCsv,
  onError,
}) => (
  <section className="panel io-panel">
    <h2>Import / Export</h2>
    <div className="form-row">
      <div className="form-group">
        <label htmlFor="importJson">Import project (JSON):</label>
        <input
          accept=".json,application/json"
          id="importJson"
          onChange={(e) => readFileInput(e.currentTarget, onImportJson, onError)}
          type="file"
        />
      </div>
      <button className="btn btn-secondary" onClick={onExportJson} type="button">
        Export JSON
      </button>
    </div>
    <div className="form-row">
      <div className="form-group">
        <label htmlFor="importCsv">Import tags (CSV):</label>
        <input
          accept=".csv,text/csv"
          disabled={!csvEnabled}
          id="importCsv"
          onChange={(e) => readFileInput(e.currentTarget, onImportCsv, onError)}
          type="file"
        />
      </div>
      <button
        className="btn btn-secondary"
        disabled={!csvEnabled}
        onClick={onExportCsv}
        type="button"
      >
        Export CSV
      </button>
    </div>
  </section>
);
