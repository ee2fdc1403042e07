import { createErr, createOk, type Result } from "option-t/plain_result";
import { ValidationError } from "../errors.ts";
import { FormBuilder } from "../forms/formBuilder.ts";

/** One tab of a dialog. */
export interface DialogSection {
  readonly id: string;
  readonly title: string;
  readonly form: FormBuilder;
}

/**
 * Contract shared by the property dialogs. `D` is the dictionary shape
 * produced by `getData()`; `loadData` accepts anything and picks out what
 * it understands.
 */
export interface DialogModel<D> {
  readonly title: string;
  readonly sections: readonly DialogSection[];
  getData(): D;
  loadData(data: unknown): void;
  validate(): Result<void, ValidationError>;
}

export function section(id: string, title: string): DialogSection {
  return { form: new FormBuilder(), id, title };
}

export const valid = (): Result<void, ValidationError> => createOk(undefined);

export const invalid = (
  field: string,
  message: string,
): Result<void, ValidationError> =>
  createErr(new ValidationError(field, message));

/** Subscribe to every section; returns one unsubscribe for all. */
export function subscribeSections(
  sections: readonly DialogSection[],
  listener: () => void,
): () => void {
  const offs = sections.map((s) => s.form.subscribe(listener));
  return () => {
    for (const off of offs) off();
  };
}
