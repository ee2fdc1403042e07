/**
 * Register and bit encoding for runtime tags.
 *
 * Registers arrive as big-endian 16-bit words. A device's encoding flags
 * then say how multi-register values are laid out:
 * - `byteOrder: "little"` swaps the two bytes of every register;
 * - `wordOrder: "low_high"` puts the low word of each dword first;
 * - `dwordOrder: "low_high"` puts the low dword of a 64-bit value first;
 * - `bitOrder: "msb"` reverses the 16 bits of single-register values.
 * Each of these is its own inverse, so encoding reuses the same helpers.
 */
import { createErr, createOk, type Result } from "option-t/plain_result";
import type { RuntimeDataType } from "../config/address.ts";
import type { EndianOptions, RuntimeTag } from "../config/mapping.ts";

export type ScalarDecoded = number | string | null;
export type DecodedValue = ScalarDecoded | ScalarDecoded[];

export type WriteInput =
  | number
  | string
  | boolean
  | readonly (number | string | boolean)[];

const DECIMAL_LONG_MAX = 99_999_999;

export function swapBytes(word: number): number {
  return ((word & 0xff) << 8) | ((word >> 8) & 0xff);
}

export function reverseBits16(word: number): number {
  let out = 0;
  for (let i = 0; i < 16; i++) {
    if (word & (1 << i)) out |= 1 << (15 - i);
  }
  return out;
}

function byteOrdered(words: readonly number[], endian: EndianOptions): number[] {
  return endian.byteOrder === "little" ? words.map(swapBytes) : [...words];
}

/** Two device registers ↔ [high, low]. */
export function order32(
  words: readonly number[],
  endian: EndianOptions,
): number[] {
  const w = byteOrdered(words, endian);
  return endian.wordOrder === "low_high" ? [w[1], w[0]] : w;
}

/** Four device registers ↔ most significant word first. */
export function order64(
  words: readonly number[],
  endian: EndianOptions,
): number[] {
  let w = byteOrdered(words, endian);
  if (endian.wordOrder === "low_high") w = [w[1], w[0], w[3], w[2]];
  if (endian.dwordOrder === "low_high") w = [w[2], w[3], w[0], w[1]];
  return w;
}

function toView(words: readonly number[]): DataView {
  const view = new DataView(new ArrayBuffer(words.length * 2));
  words.forEach((w, i) => view.setUint16(i * 2, w));
  return view;
}

function fromView(view: DataView): number[] {
  const words: number[] = [];
  for (let i = 0; i < view.byteLength; i += 2) words.push(view.getUint16(i));
  return words;
}

function bcdToNumber(word: number): number {
  let n = 0;
  for (let shift = 12; shift >= 0; shift -= 4) n = n * 10 + ((word >> shift) & 0xf);
  return n;
}

function numberToBcd(value: number): number {
  let n = Math.min(9999, Math.max(0, Math.trunc(value)));
  let word = 0;
  for (let shift = 0; shift < 16; shift += 4) {
    word |= (n % 10) << shift;
    n = Math.floor(n / 10);
  }
  return word;
}

function decodeString(words: readonly number[], endian: EndianOptions): string {
  let out = "";
  for (const w of byteOrdered(words, endian)) {
    for (const code of [w >> 8, w & 0xff]) {
      if (code === 0) return out;
      out += String.fromCharCode(code);
    }
  }
  return out;
}

function encodeString(
  text: string,
  registers: number,
  endian: EndianOptions,
): number[] {
  const words: number[] = [];
  for (let i = 0; i < registers; i++) {
    // charCodeAt past the end is NaN, which masks to 0.
    const hi = text.charCodeAt(i * 2) & 0xff;
    const lo = text.charCodeAt(i * 2 + 1) & 0xff;
    words.push((hi << 8) | lo);
  }
  return byteOrdered(words, endian);
}

function decodeWord(base: RuntimeDataType, raw: number, endian: EndianOptions) {
  let w = endian.byteOrder === "little" ? swapBytes(raw) : raw;
  if (endian.bitOrder === "msb") w = reverseBits16(w);
  switch (base) {
    case "bool":
      return w === 0 ? 0 : 1;
    case "int16":
      return w >= 0x8000 ? w - 0x10000 : w;
    case "uint8":
      return w & 0xff;
    case "int8": {
      const b = w & 0xff;
      return b >= 0x80 ? b - 0x100 : b;
    }
    case "bcd16":
      return bcdToNumber(w);
    default:
      return w;
  }
}

function encodeWord(base: RuntimeDataType, value: number, endian: EndianOptions) {
  let w = base === "bcd16" ? numberToBcd(value) : Math.trunc(value) & 0xffff;
  if (base === "int8" || base === "uint8") w &= 0xff;
  if (endian.bitOrder === "msb") w = reverseBits16(w);
  return endian.byteOrder === "little" ? swapBytes(w) : w;
}

/** Decode one element from exactly its registers. */
export function decodeScalar(
  base: RuntimeDataType,
  words: readonly number[],
  endian: EndianOptions,
): ScalarDecoded {
  switch (base) {
    case "string":
      return decodeString(words, endian);
    case "bcd32": {
      const [hi, lo] = order32(words, endian);
      return bcdToNumber(hi) * 10000 + bcdToNumber(lo);
    }
    case "int32":
      return toView(order32(words, endian)).getInt32(0);
    case "uint32":
      return toView(order32(words, endian)).getUint32(0);
    case "float32":
      return toView(order32(words, endian)).getFloat32(0);
    case "int64":
    case "uint64": {
      const w = order64(words, endian);
      if (endian.treatLongsAsDecimals) return w[1] * 10000 + w[3];
      const view = toView(w);
      return Number(
        base === "int64" ? view.getBigInt64(0) : view.getBigUint64(0),
      );
    }
    case "float64":
      return toView(order64(words, endian)).getFloat64(0);
    default:
      return decodeWord(base, words[0], endian);
  }
}

/** Registers for one element. */
export function encodeScalar(
  base: RuntimeDataType,
  value: number,
  endian: EndianOptions,
  registers = 1,
): number[] {
  const view32 = new DataView(new ArrayBuffer(4));
  const view64 = new DataView(new ArrayBuffer(8));
  switch (base) {
    case "string":
      return encodeString(String(value), registers, endian);
    case "bcd32": {
      const n = Math.min(DECIMAL_LONG_MAX, Math.max(0, Math.trunc(value)));
      return order32(
        [numberToBcd(Math.floor(n / 10000)), numberToBcd(n % 10000)],
        endian,
      );
    }
    case "int32":
      view32.setInt32(0, Math.trunc(value));
      return order32(fromView(view32), endian);
    case "uint32":
      view32.setUint32(0, Math.trunc(value));
      return order32(fromView(view32), endian);
    case "float32":
      view32.setFloat32(0, value);
      return order32(fromView(view32), endian);
    case "int64":
    case "uint64": {
      if (endian.treatLongsAsDecimals) {
        const n = Math.min(DECIMAL_LONG_MAX, Math.max(0, Math.trunc(value)));
        return order64([0, Math.floor(n / 10000), 0, n % 10000], endian);
      }
      const big = BigInt(Math.trunc(value));
      if (base === "int64") view64.setBigInt64(0, big);
      else view64.setBigUint64(0, big);
      return order64(fromView(view64), endian);
    }
    case "float64":
      view64.setFloat64(0, value);
      return order64(fromView(view64), endian);
    default:
      return [encodeWord(base, value, endian)];
  }
}

const isBitTable = (tag: RuntimeTag) =>
  tag.addressType === "coil" || tag.addressType === "discrete_input";

/**
 * Value of `tag` from the registers (or bits) that start at its address.
 * Missing data yields null, element-wise for arrays.
 */
export function decodeTagValue(
  tag: RuntimeTag,
  data: readonly number[],
): DecodedValue {
  if (isBitTable(tag)) {
    const bit = (i: number) => {
      const b = data[i];
      return b === undefined ? null : b ? 1 : 0;
    };
    return tag.isArray
      ? Array.from({ length: tag.elementCount }, (_, i) => bit(i))
      : bit(0);
  }

  const size = tag.elementSize;
  const element = (i: number): ScalarDecoded => {
    const words = data.slice(i * size, (i + 1) * size);
    return words.length < size ? null : decodeScalar(tag.base, words, tag.endian);
  };
  return tag.isArray
    ? Array.from({ length: tag.elementCount }, (_, i) => element(i))
    : element(0);
}

type WriteItem = number | string | boolean;

function isList(value: WriteInput): value is readonly WriteItem[] {
  return typeof value === "object";
}

function toNumber(value: WriteItem): number {
  if (typeof value === "boolean") return value ? 1 : 0;
  return typeof value === "number" ? value : Number(value.trim());
}

/**
 * Registers (or bits) to write for `value`. FC6 writes the first register
 * of a wider value.
 */
export function encodeTagValue(
  tag: RuntimeTag,
  value: WriteInput,
): Result<number[], Error> {
  const items: readonly WriteItem[] = isList(value) ? value : [value];
  if (items.length === 0) return createErr(new Error("Nothing to write"));

  if (isBitTable(tag) || tag.base === "bool") {
    const bits = items.map((v) => (toNumber(v) ? 1 : 0));
    return createOk(tag.writeFunction === 5 ? bits.slice(0, 1) : bits);
  }

  if (tag.base === "string") {
    return createOk(
      encodeString(items.map(String).join(""), tag.count, tag.endian),
    );
  }

  const registers: number[] = [];
  for (const item of items) {
    const n = toNumber(item);
    if (!Number.isFinite(n)) {
      return createErr(new Error(`Invalid value for ${tag.name}: ${item}`));
    }
    registers.push(...encodeScalar(tag.base, n, tag.endian, tag.elementSize));
  }
  return createOk(tag.writeFunction === 6 ? registers.slice(0, 1) : registers);
}
