// Helpers for reading loosely-shaped configuration dictionaries
// (imported JSON, dialog payloads) without trusting their structure.

export type Dict = Record<string, unknown>;

export function isRecord(value: unknown): value is Dict {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walk `path` through nested records. Returns undefined as soon as a step
 * is missing or not a record.
 */
export function safeDictGet(obj: unknown, ...path: string[]): unknown {
  let current: unknown = obj;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** Nested record at `path`, or an empty record. */
export function getSection(obj: unknown, ...path: string[]): Dict {
  const found = safeDictGet(obj, ...path);
  return isRecord(found) ? found : {};
}

/** Stringify scalars; null / undefined / objects become undefined. */
export function asString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

/** First key in `keys` whose value in `obj` is present (not null/undefined). */
export function pick(obj: Dict, ...keys: string[]): unknown {
  for (const key of keys) {
    const v = obj[key];
    if (v !== undefined && v !== null) return v;
  }
  return undefined;
}

/**
 * Parse `value` as a number and truncate it. Values that do not parse or
 * fall outside [min, max] yield `fallback`.
 */
export function validateAndGetInt(
  value: unknown,
  fallback: number,
  min = Number.MIN_SAFE_INTEGER,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const text = asString(value)?.trim();
  if (!text) return fallback;
  const parsed = Number(text);
  if (!Number.isFinite(parsed)) return fallback;
  const n = Math.trunc(parsed);
  if (n < min || n > max) return fallback;
  return n;
}

/** Like {@link validateAndGetInt} for floats; no range check. */
export function toFloat(value: unknown, fallback: number): number {
  const text = asString(value)?.trim();
  if (!text) return fallback;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Scalar entries of `obj`, stringified; everything else is dropped. */
export function toStringRecord(obj: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(obj)) return out;
  for (const [k, v] of Object.entries(obj)) {
    const s = asString(v);
    if (s !== undefined) out[k] = s;
  }
  return out;
}
