/**
 * Flag conversion, driver classification, adapter string parsing and small
 * value validators shared by dialogs, serializers and the runtime.
 */
import { DISABLE, ENABLE } from "./constants.ts";

export type FlagValue = number | string;

const TRUE_WORDS = new Set(["enable", "enabled", "true", "1", "on"]);
const FALSE_WORDS = new Set(["disable", "disabled", "false", "0", "off"]);

/**
 * Convert a UI / JSON flag into 1 or 0.
 *
 * Empty strings pass through unchanged, as do strings that are neither a
 * known word nor numeric.
 */
export function toNumericFlag(value: unknown): FlagValue {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") return Math.trunc(value);
  if (value === undefined || value === null) return 0;
  const s = String(value).trim();
  if (s === "") return s;
  const lower = s.toLowerCase();
  if (TRUE_WORDS.has(lower)) return 1;
  if (FALSE_WORDS.has(lower)) return 0;
  const n = Number(s);
  return Number.isFinite(n) ? Math.trunc(n) : s;
}

export function normalizeDictFlags(
  dict: Record<string, unknown>,
): Record<string, FlagValue> {
  const out: Record<string, FlagValue> = {};
  for (const [k, v] of Object.entries(dict)) out[k] = toNumericFlag(v);
  return out;
}

/** Map stored flags back onto the Enable/Disable combo choices. */
export function flagToChoice(value: unknown): string {
  if (value === true || value === 1) return ENABLE;
  if (value === false || value === 0) return DISABLE;
  const s = String(value ?? "").trim();
  if (["1", "enable", "Enable", "true", "True"].includes(s)) return ENABLE;
  if (["0", "disable", "Disable", "false", "False"].includes(s)) return DISABLE;
  return s;
}

/** Numeric flag to boolean; anything unrecognised is false. */
export function flagToBoolean(value: unknown): boolean {
  return toNumericFlag(value) === 1;
}

export function isTcpLikeDriver(driver: string | undefined | null): boolean {
  const low = (driver ?? "").toLowerCase();
  return ["over tcp", "ethernet", "tcp"].some((x) => low.includes(x));
}

export function isRtuOverTcpDriver(driver: string | undefined | null): boolean {
  return (driver ?? "").toLowerCase().includes("rtu over tcp");
}

export function isEthernetDriver(driver: string | undefined | null): boolean {
  const low = (driver ?? "").toLowerCase();
  return (low.includes("tcp") && low.includes("ethernet")) ||
    low.includes("modbus tcp");
}

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

function looksLikeIp(s: string): boolean {
  return (s.match(/\./g) ?? []).length === 3;
}

/**
 * Split an adapter label into `[name, ip]`.
 *
 * Accepts `"eth0 (192.168.1.5)"`, `"eth0 - 192.168.1.5"` and
 * `"192.168.1.5 - eth0"`; anything else is a bare name.
 */
export function parseAdapterString(
  value: string | undefined | null,
): [string, string | null] {
  const s = (value ?? "").trim();
  if (!s) return ["", null];
  if (s.includes("(") && s.endsWith(")")) {
    const at = s.lastIndexOf("(");
    return [s.slice(0, at).trim(), s.slice(at + 1, -1).trim()];
  }
  if (s.includes(" - ")) {
    const at = s.indexOf(" - ");
    const left = s.slice(0, at).trim();
    const right = s.slice(at + 3).trim();
    return looksLikeIp(left) ? [right, left] : [left, right];
  }
  return [s, null];
}

export function formatAdapterWithIp(
  name: string | undefined | null,
  ip: string | undefined | null,
): string {
  const n = (name ?? "").trim() || "Default";
  const addr = (ip ?? "").trim();
  return addr ? `${n} (${addr})` : n;
}

export function isValidIp(value: string): boolean {
  const m = IPV4.exec(value.trim());
  if (!m) return false;
  return m.slice(1).every((part) => Number(part) <= 255);
}

export function isValidPort(value: string | number): boolean {
  const n = Number(value);
  return Number.isInteger(n) && n >= 1 && n <= 65535;
}

export function isValidModbusAddress(value: string | number): boolean {
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 && n <= 65535;
}

const VALID_FUNCTION_CODES = new Set([1, 2, 3, 4, 5, 6, 15, 16, 23]);

export function isValidFunctionCode(value: string | number): boolean {
  return VALID_FUNCTION_CODES.has(Number(value));
}

export function parseBooleanString(value: string): boolean | undefined {
  const s = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  return undefined;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
