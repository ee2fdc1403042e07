import { useEffect, useState } from "preact/hooks";
import type { FormBuilder, FormField } from "../../forms/formBuilder.ts";

/** Current fields of `form`, refreshed on every mutation. */
export function useFormBuilder(form: FormBuilder): readonly FormField[] {
  const [fields, setFields] = useState<readonly FormField[]>(() => form.fields());

  useEffect(() => {
    setFields(form.fields());
    return form.subscribe((next) => setFields([...next]));
  }, [form]);

  return fields;
}
