// Linear and square-root scaling between raw register values and
// engineering units.
import type { Scaling } from "./project.ts";

export type ScalarValue = number | null;
export type ScalableValue = ScalarValue | ScalarValue[];

function scaleOne(raw: number, s: Scaling): number {
  const rawRange = s.rawHigh - s.rawLow;
  if (rawRange === 0) return raw;
  const scaledRange = s.scaledHigh - s.scaledLow;

  let scaled: number;
  if (s.type === "Linear") {
    scaled = ((raw - s.rawLow) * scaledRange) / rawRange + s.scaledLow;
  } else {
    const normalized = Math.max(0, (raw - s.rawLow) / rawRange);
    scaled = Math.sqrt(normalized) * scaledRange + s.scaledLow;
  }
  if (s.negate) scaled = -scaled;
  if (s.clampLow && scaled < s.scaledLow) scaled = s.scaledLow;
  if (s.clampHigh && scaled > s.scaledHigh) scaled = s.scaledHigh;
  return scaled;
}

/** Raw → engineering value. Arrays scale element-wise; nulls pass through. */
export function applyScaling(raw: number, scaling: Scaling): number;
export function applyScaling(
  raw: ScalableValue,
  scaling: Scaling,
): ScalableValue;
export function applyScaling(
  raw: ScalableValue,
  scaling: Scaling,
): ScalableValue {
  if (scaling.type === "None" || raw === null) return raw;
  if (Array.isArray(raw)) {
    return raw.map((v) => (v === null ? null : scaleOne(v, scaling)));
  }
  return scaleOne(raw, scaling);
}

const INTEGER_RAW = ["int", "word", "short", "byte", "char", "long", "bcd"];

function isIntegerType(rawType: string | undefined): boolean {
  const low = (rawType ?? "").toLowerCase();
  return INTEGER_RAW.some((k) => low.includes(k));
}

function reverseOne(value: number, s: Scaling, rawType?: string): number {
  const v = s.negate ? -value : value;
  const scaledRange = s.scaledHigh - s.scaledLow;
  if (scaledRange === 0) return value;
  const rawRange = s.rawHigh - s.rawLow;

  let raw: number;
  if (s.type === "Linear") {
    raw = ((v - s.scaledLow) * rawRange) / scaledRange + s.rawLow;
  } else {
    const normalized = Math.max(0, (v - s.scaledLow) / scaledRange);
    raw = normalized ** 2 * rawRange + s.rawLow;
  }
  return isIntegerType(rawType) ? Math.round(raw) : raw;
}

/**
 * Engineering value → raw, undoing negate before inverting the curve.
 * Integer raw types ("Word", "int16", ...) are rounded.
 */
export function reverseScaling(
  value: number,
  scaling: Scaling,
  rawType?: string,
): number;
export function reverseScaling(
  value: ScalableValue,
  scaling: Scaling,
  rawType?: string,
): ScalableValue;
export function reverseScaling(
  value: ScalableValue,
  scaling: Scaling,
  rawType?: string,
): ScalableValue {
  if (scaling.type === "None" || value === null) return value;
  if (Array.isArray(value)) {
    return value.map((v) =>
      v === null ? null : reverseOne(v, scaling, rawType)
    );
  }
  return reverseOne(value, scaling, rawType);
}

export interface ScalingInfo {
  enabled: boolean;
  type: Scaling["type"];
  scaledType: string;
  params: Omit<Scaling, "type" | "scaledType">;
}

export function getScalingInfo(scaling: Scaling): ScalingInfo {
  const { type, scaledType, ...params } = scaling;
  return { enabled: type !== "None", params, scaledType, type };
}
