import type { FunctionalComponent } from "preact";
import { isErr } from "option-t/plain_result";
import { useState } from "preact/hooks";
import type { WriteValueDialog } from "../../dialogs/writeValueDialog.ts";
import { FormView } from "./FormView.tsx";

interface Props {
  dialog: WriteValueDialog;
  onClose: () => void;
}

export const WriteValuePanel: FunctionalComponent<Props> = ({ dialog, onClose }) => {
  const [error, setError] = useState<string>();

  const handleWrite = () => {
    const res = dialog.submit();
    if (isErr(res)) {
      setError(res.err.message);
      return;
    }
    setError(undefined);
    onClose();
  };

  return (
    <section aria-label={dialog.title} className="panel write-panel">
      <h2>{dialog.title}</h2>
      <FormView form={dialog.form} sectionId="write" />
      {error && (
        <p className="error" role="alert">
          {error}
        </p>
      )}
      <div className="form-row">
        <button
          className="btn btn-primary"
          disabled={dialog.readOnly}
          onClick={handleWrite}
          type="button"
        >
          Write
        </button>
        <button className="btn btn-secondary" onClick={onClose} type="button">
          Close
        </button>
      </div>
    </section>
  );
};
