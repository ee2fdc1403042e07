/**
 * Modbus address notation and tag data type resolution.
 *
 * Project addresses use the 6-digit form: the leading digit selects the
 * table (0 coil, 1 discrete input, 3 input register, 4 holding register)
 * and the remaining five digits are the 1-based register number. Array
 * tags append the element count, e.g. `"400010 [4]"`.
 */
import {
  ADDRESS_STEP_MAP,
  type AddressType,
  MODBUS_ADDRESS_OFFSET,
  MODBUS_ADDRESS_RANGES,
  MODBUS_COIL_PREFIX,
  MODBUS_DISCRETE_PREFIX,
  MODBUS_HOLDING_REG_PREFIX,
  MODBUS_INPUT_REG_PREFIX,
  MODBUS_SEQUENCE_WIDTH,
  SIZE_MAP,
} from "./constants.ts";

export interface ParsedAddress {
  type: AddressType;
  /** Protocol (0-based) address sent on the wire. */
  offset: number;
  raw: string;
}

const PREFIX_TYPES: Readonly<Record<string, AddressType>> = {
  0: "coil",
  1: "discrete_input",
  3: "input_register",
  4: "holding_register",
};

const ARRAY_SUFFIX = /\s*\[\s*(\d+)\s*\]\s*$/;

function rangeFor(n: number) {
  return MODBUS_ADDRESS_RANGES.find((r) => r.min <= n && n <= r.max);
}

function trailingNumber(s: string): number | undefined {
  const m = /(\d+)$/.exec(s);
  return m ? Number(m[1]) : undefined;
}

/** Resolve a labelled address ("hr400001") against its own table only. */
function labelled(
  s: string,
  type: AddressType,
  zb: number,
  raw: string,
): ParsedAddress {
  const idx = trailingNumber(s);
  const range = MODBUS_ADDRESS_RANGES.find((r) => r.type === type);
  if (idx === undefined || !range || idx < range.min || idx > range.max) {
    return { offset: 0, raw, type };
  }
  return { offset: idx - range.offset - zb, raw, type };
}

/**
 * Parse an address string into its table and protocol offset.
 *
 * Unrecognised input resolves to holding register 0.
 *
 * @param zeroBased subtract one from the register number
 */
export function parseAddress(address: string, zeroBased = false): ParsedAddress {
  const raw = address.trim();
  const s = raw.toLowerCase();
  const zb = zeroBased ? 1 : 0;

  if (s.startsWith("coil") || s.startsWith("c:") || s.startsWith("co")) {
    return labelled(s, "coil", zb, raw);
  }
  if (s.startsWith("discrete") || s.startsWith("di")) {
    return labelled(s, "discrete_input", zb, raw);
  }
  if (s.startsWith("holding") || s.startsWith("hr") || s.startsWith("h:")) {
    return labelled(s, "holding_register", zb, raw);
  }
  if (s.startsWith("input") || s.startsWith("ir")) {
    return labelled(s, "input_register", zb, raw);
  }

  const colon = /^(\d+):(\d+)$/.exec(s);
  if (colon) {
    const type = PREFIX_TYPES[colon[1]] ?? "holding_register";
    const idx = Number(colon[2]);
    const range = rangeFor(idx);
    return range?.type === type
      ? { offset: idx - range.offset - zb, raw, type }
      : { offset: 0, raw, type };
  }

  const lead = /^(\d+)/.exec(s);
  if (lead) {
    const n = Number(lead[1]);
    const range = rangeFor(n);
    if (range) return { offset: n - range.offset - zb, raw, type: range.type };
    if (n === 0) return { offset: 0, raw, type: "coil" };
  }
  return { offset: 0, raw, type: "holding_register" };
}

export type RuntimeDataType =
  | "bool"
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "bcd16"
  | "bcd32"
  | "int32"
  | "uint32"
  | "float32"
  | "int64"
  | "uint64"
  | "float64"
  | "string";

export type RuntimeTypeName = RuntimeDataType | `${RuntimeDataType}[]`;

export interface NormalizedDataType {
  type: RuntimeTypeName;
  base: RuntimeDataType;
  isArray: boolean;
  /** Registers (or bits) per element. */
  elementSize: number;
  /** Total registers; element size times any `[n]` in the type name. */
  count: number;
}

const BASE_TYPES: Readonly<Record<string, [RuntimeDataType, string]>> = {
  bcd: ["bcd16", "BCD"],
  bool: ["bool", "Boolean"],
  boolean: ["bool", "Boolean"],
  byte: ["uint8", "Byte"],
  char: ["int8", "Char"],
  dint: ["int32", "DInt"],
  double: ["float64", "Double"],
  dword: ["uint32", "DWord"],
  float: ["float32", "Float"],
  float32: ["float32", "Float"],
  float64: ["float64", "Double"],
  int: ["int16", "Int"],
  int16: ["int16", "Short"],
  int32: ["int32", "Long"],
  int64: ["int64", "LLong"],
  int8: ["int8", "Char"],
  lbcd: ["bcd32", "LBCD"],
  llong: ["int64", "LLong"],
  long: ["int32", "Long"],
  qword: ["uint64", "QWord"],
  real: ["float32", "Real"],
  short: ["int16", "Short"],
  string: ["string", "String"],
  uint16: ["uint16", "Word"],
  uint32: ["uint32", "DWord"],
  uint64: ["uint64", "QWord"],
  uint8: ["uint8", "Byte"],
  word: ["uint16", "Word"],
};

const FALLBACK_TYPE: [RuntimeDataType, string] = ["uint16", "Word"];

/**
 * Map a project data type ("Long(Array)", "Float", "uint16[4]") onto its
 * runtime representation. Unknown names resolve to uint16.
 */
export function normalizeDataType(name: string): NormalizedDataType {
  let s = name.trim().toLowerCase();
  let isArray = false;
  let multiplier = 1;

  const sized = /\[\s*(\d*)\s*\]/.exec(s);
  if (sized) {
    isArray = true;
    multiplier = sized[1] ? Number(sized[1]) : 1;
    s = s.replace(/\s*\[\s*\d*\s*\]/, "");
  }
  if (s.includes("array")) {
    isArray = true;
    s = s.replace(/\(?\s*array\s*\)?/, "");
  }

  const [base, projectName] = BASE_TYPES[s.trim()] ?? FALLBACK_TYPE;
  const elementSize = SIZE_MAP[projectName] ?? 1;
  return {
    base,
    count: elementSize * multiplier,
    elementSize,
    isArray,
    type: isArray ? `${base}[]` : base,
  };
}

export function isBooleanType(dataType: string): boolean {
  return dataType.toLowerCase().includes("bool");
}

export function isArrayDataType(dataType: string): boolean {
  return dataType.toLowerCase().includes("array");
}

/** Element count from a trailing `" [n]"`, or undefined. */
export function arraySizeFromAddress(address: string): number | undefined {
  const m = ARRAY_SUFFIX.exec(address);
  return m ? Number(m[1]) : undefined;
}

export function stripArraySuffix(address: string): string {
  return address.replace(ARRAY_SUFFIX, "");
}

/**
 * Registers advanced per element when laying out tags one after another.
 * The longest table key contained in the type name wins.
 */
export function addressStep(dataType: string): number {
  const low = dataType.toLowerCase();
  const key = Object.keys(ADDRESS_STEP_MAP)
    .sort((a, b) => b.length - a.length)
    .find((k) => low.includes(k.toLowerCase()));
  return key === undefined ? 1 : ADDRESS_STEP_MAP[key];
}

/** Table prefix implied by data type and access. */
export function addressPrefixFor(dataType: string, readOnly: boolean): string {
  if (isBooleanType(dataType)) {
    return readOnly ? MODBUS_DISCRETE_PREFIX : MODBUS_COIL_PREFIX;
  }
  return readOnly ? MODBUS_INPUT_REG_PREFIX : MODBUS_HOLDING_REG_PREFIX;
}

/**
 * Rewrite `address` so its table prefix matches the data type and access.
 * The register number is kept (mod 100000); arrays keep or gain `" [n]"`.
 */
export function formatTagAddress(
  dataType: string,
  readOnly: boolean,
  address: string,
): string {
  const array = isArrayDataType(dataType);
  const size = array ? (arraySizeFromAddress(address) ?? 1) : 1;
  const digits = stripArraySuffix(address).replace(/\D/g, "");
  const offset = (digits ? Number(digits) : 0) % MODBUS_ADDRESS_OFFSET;
  const body = addressPrefixFor(dataType, readOnly) +
    String(offset).padStart(MODBUS_SEQUENCE_WIDTH, "0");
  return array ? `${body} [${size}]` : body;
}
