import type { FunctionalComponent } from "preact";
import { useState } from "preact/hooks";
import type { DialogSection } from "../../dialogs/dialog.ts";
import { FormView } from "./FormView.tsx";

interface Props {
  title: string;
  sections: readonly DialogSection[];
  /** Returns an error message to keep the dialog open. */
  onOk: () => string | undefined;
  onCancel: () => void;
}

export const DialogPanel: FunctionalComponent<Props> = ({
  title,
  sections,
  onOk,
  onCancel,
}) => {
  const [error, setError] = useState<string>();
  return (
    <section aria-label={title} className="panel dialog-panel">
      <h2>{title}</h2>
      {sections.map((s) => (
        <FormView form={s.form} key={s.id} sectionId={s.id} title={s.title} />
      ))}
      {error && (
        <p className="error" role="alert">
          {error}
        </p>
      )}
      <div className="form-row">
        <button
          className="btn btn-primary"
          onClick={() => setError(onOk())}
          type="button"
        >
          OK
        </button>
        <button className="btn btn-secondary" onClick={onCancel} type="button">
          Cancel
        </button>
      </div>
    </section>
  );
};
