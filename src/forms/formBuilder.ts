/**
 * Headless form model shared by every dialog.
 *
 * A form is an ordered list of labelled fields. Values are always strings
 * (checkboxes read back as `"true"` / `"false"`) so that dialogs can marshal
 * them into configuration dictionaries without knowing how they are drawn.
 * Preact components subscribe and re-render on every mutation.
 */
import { parseBooleanString } from "../config/validators.ts";

export type FieldKind = "text" | "combo" | "password" | "checkbox";

export interface FormField {
  readonly id: string;
  readonly label: string;
  readonly kind: FieldKind;
  readonly options: readonly string[];
  readonly value: string;
  readonly enabled: boolean;
  readonly visible: boolean;
  readonly readOnly: boolean;
}

export type FieldDefault = string | number | boolean;

export type FormListener = (fields: readonly FormField[]) => void;

function initialValue(
  kind: FieldKind,
  options: readonly string[],
  fallback: FieldDefault | undefined,
): string {
  if (kind === "checkbox") {
    if (typeof fallback === "boolean") return String(fallback);
    return String(parseBooleanString(String(fallback ?? "")) ?? false);
  }
  if (kind === "combo") {
    const wanted = fallback === undefined ? undefined : String(fallback);
    return wanted !== undefined && options.includes(wanted)
      ? wanted
      : (options[0] ?? "");
  }
  return fallback === undefined ? "" : String(fallback);
}

export class FormBuilder {
  #fields = new Map<string, FormField>();
  #listeners = new Set<FormListener>();

  addField(
    id: string,
    label: string,
    kind: FieldKind = "text",
    options: readonly string[] = [],
    fallback?: FieldDefault,
  ): this {
    this.#fields.set(id, {
      enabled: true,
      id,
      kind,
      label,
      options: [...options],
      readOnly: false,
      value: initialValue(kind, options, fallback),
      visible: true,
    });
    this.#notify();
    return this;
  }

  clearForm(): void {
    this.#fields.clear();
    this.#notify();
  }

  has(id: string): boolean {
    return this.#fields.has(id);
  }

  field(id: string): FormField | undefined {
    return this.#fields.get(id);
  }

  fields(): readonly FormField[] {
    return [...this.#fields.values()];
  }

  getValues(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const f of this.#fields.values()) out[f.id] = f.value;
    return out;
  }

  getValue(id: string): string {
    return this.#fields.get(id)?.value ?? "";
  }

  getBoolean(id: string): boolean {
    return parseBooleanString(this.getValue(id)) ?? false;
  }

  /** Apply known ids; combo values outside the option list are ignored. */
  setValues(values: Readonly<Record<string, unknown>>): void {
    let changed = false;
    for (const [id, raw] of Object.entries(values)) {
      const f = this.#fields.get(id);
      if (!f || raw === undefined || raw === null) continue;
      const next = this.#coerce(f, raw);
      if (next === undefined || next === f.value) continue;
      this.#fields.set(id, { ...f, value: next });
      changed = true;
    }
    if (changed) this.#notify();
  }

  setValue(id: string, value: unknown): void {
    this.setValues({ [id]: value });
  }

  /** Replace combo options, keeping the current value if still offered. */
  setOptions(id: string, options: readonly string[]): void {
    const f = this.#fields.get(id);
    if (!f) return;
    const value = options.includes(f.value) ? f.value : (options[0] ?? "");
    this.#fields.set(id, { ...f, options: [...options], value });
    this.#notify();
  }

  setEnabled(id: string, enabled: boolean): void {
    this.#patch(id, { enabled });
  }

  setVisible(id: string, visible: boolean): void {
    this.#patch(id, { visible });
  }

  setReadOnly(id: string, readOnly: boolean): void {
    this.#patch(id, { readOnly });
  }

  subscribe(listener: FormListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  #coerce(f: FormField, raw: unknown): string | undefined {
    if (typeof raw === "object") return undefined;
    const text = String(raw);
    switch (f.kind) {
      case "checkbox": {
        const b = typeof raw === "boolean" ? raw : parseBooleanString(text);
        return b === undefined ? undefined : String(b);
      }
      case "combo":
        return f.options.includes(text) ? text : undefined;
      default:
        return text;
    }
  }

  #patch(id: string, patch: Partial<Pick<FormField, "enabled" | "visible" | "readOnly">>) {
    const f = this.#fields.get(id);
    if (!f) return;
    const next = { ...f, ...patch };
    if (
      next.enabled === f.enabled && next.visible === f.visible &&
      next.readOnly === f.readOnly
    ) {
      return;
    }
    this.#fields.set(id, next);
    this.#notify();
  }

  #notify() {
    const snapshot = this.fields();
    for (const listener of this.#listeners) listener(snapshot);
  }
}
