import {
  createErr,
  createOk,
  isErr,
  type Result,
} from "option-t/plain_result";
import { parseBooleanString } from "../config/validators.ts";
import { ValidationError } from "../errors.ts";
import { FormBuilder } from "../forms/formBuilder.ts";

export interface WriteTagInfo {
  name?: string;
  address?: string | number;
  function_code?: string | number;
  data_type?: string;
  read_write?: string;
}

export type WriteValue = boolean | number | string;

export interface WriteRequestEvent {
  address: number;
  functionCode: number;
  value: WriteValue;
}

const INTEGER_HINTS = ["int", "word", "short", "long", "byte"];

function toInt(value: string | number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(String(value).trim());
  return Number.isInteger(n) ? n : fallback;
}

/** Prompt for a single value to write to a tag. */
export class WriteValueDialog {
  readonly title = "Write Value";
  readonly form = new FormBuilder();
  readonly readOnly: boolean;

  constructor(
    readonly tagInfo: WriteTagInfo,
    private readonly onWrite: (request: WriteRequestEvent) => void,
    currentValue?: unknown,
  ) {
    this.readOnly = (tagInfo.read_write ?? "").includes("Read Only");
    this.form
      .addField("name", "Tag", "text", [], tagInfo.name ?? "Unknown")
      .addField("address", "Address", "text", [], tagInfo.address ?? "N/A")
      .addField("function_code", "Function Code", "text", [], tagInfo.function_code ?? "N/A")
      .addField("current", "Current Value", "text", [], currentValue === undefined || currentValue === null ? "N/A" : String(currentValue))
      .addField("data_type", "Data Type", "text", [], tagInfo.data_type ?? "Unknown")
      .addField("read_write", "Access", "text", [], tagInfo.read_write ?? "Unknown")
      .addField("value", "New Value");
    for (const id of ["name", "address", "function_code", "current", "data_type", "read_write"]) {
      this.form.setReadOnly(id, true);
    }
    this.form.setEnabled("value", !this.readOnly);
  }

  parseValue(input: string): Result<WriteValue, ValidationError> {
    const text = input.trim();
    if (!text) return createErr(new ValidationError("value", "A value is required"));
    const type = (this.tagInfo.data_type ?? "int").toLowerCase();

    if (type.includes("bool")) {
      const b = parseBooleanString(text);
      return b === undefined
        ? createErr(new ValidationError("value", "Boolean values must be 0/1 or true/false"))
        : createOk(b);
    }
    if (type.includes("float") || type.includes("double")) {
      const n = Number(text);
      return Number.isFinite(n)
        ? createOk(n)
        : createErr(new ValidationError("value", `Not a number: ${text}`));
    }
    if (INTEGER_HINTS.some((h) => type.includes(h))) {
      return /^[+-]?\d+$/.test(text)
        ? createOk(Number(text))
        : createErr(new ValidationError("value", `Not an integer: ${text}`));
    }
    return createOk(text);
  }

  /** Parse `input` and hand the write to `onWrite`. */
  submit(input: string = this.form.getValue("value")): Result<WriteRequestEvent, ValidationError> {
    if (this.readOnly) {
      return createErr(new ValidationError("value", "Tag is read only"));
    }
    const parsed = this.parseValue(input);
    if (isErr(parsed)) return parsed;
    const request: WriteRequestEvent = {
      address: toInt(this.tagInfo.address, 0),
      functionCode: toInt(this.tagInfo.function_code, 16),
      value: parsed.val,
    };
    this.onWrite(request);
    return createOk(request);
  }
}
