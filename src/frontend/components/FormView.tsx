import type { FunctionalComponent } from "preact";
import type { FormBuilder, FormField } from "../../forms/formBuilder.ts";
import { useFormBuilder } from "../hooks/useFormBuilder.ts";

interface Props {
  form: FormBuilder;
  /** Prefix for input ids, so several forms can share a page. */
  sectionId: string;
  title?: string;
}

function FieldInput({ field, form, id }: {
  field: FormField;
  form: FormBuilder;
  id: string;
}) {
  const disabled = !field.enabled;
  switch (field.kind) {
    case "combo":
      return (
        <select
          disabled={disabled || field.readOnly}
          id={id}
          onChange={(e) => form.setValue(field.id, e.currentTarget.value)}
          value={field.value}
        >
          {field.options.map((o) => <option key={o} value={o}>{o}</option>)}
        </select>
      );
    case "checkbox":
      return (
        <input
          checked={field.value === "true"}
          disabled={disabled || field.readOnly}
          id={id}
          onChange={(e) => form.setValue(field.id, e.currentTarget.checked)}
          type="checkbox"
        />
      );
    default:
      return (
        <input
          disabled={disabled}
          id={id}
          onInput={(e) => form.setValue(field.id, e.currentTarget.value)}
          readOnly={field.readOnly}
          type={field.kind === "password" ? "password" : "text"}
          value={field.value}
        />
      );
  }
}

export const FormView: FunctionalComponent<Props> = ({ form, sectionId, title }) => {
  const fields = useFormBuilder(form);
  return (
    <fieldset className="form-section">
      {title && <legend>{title}</legend>}
      {fields
        .filter((f) => f.visible)
        .map((f) => {
          const id = `${sectionId}-${f.id}`;
          return (
            <div className="form-group" key={f.id}>
              <label htmlFor={id}>{f.label}</label>
              <FieldInput field={f} form={form} id={id} />
            </div>
          );
        })}
    </fieldset>
  );
};
