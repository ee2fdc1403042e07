/**
 * Project tag → runtime descriptor used by the grouping, codec and worker.
 */
import {
  arraySizeFromAddress,
  isBooleanType,
  normalizeDataType,
  parseAddress,
  type RuntimeDataType,
  type RuntimeTypeName,
} from "./address.ts";
import type { WriteFunctionCode } from "../functionCodes.ts";
import type { AddressType, TagAccess } from "./constants.ts";
import type {
  ChannelNode,
  DeviceNode,
  Encoding,
  Scaling,
  TagNode,
} from "./project.ts";
import { qualifiedTagName } from "./project.ts";

export type ByteOrder = "big" | "little";
export type WordOrder = "low_high" | "high_low";
export type BitOrder = "lsb" | "msb";

export interface EndianOptions {
  byteOrder: ByteOrder;
  wordOrder: WordOrder;
  dwordOrder: WordOrder;
  bitOrder: BitOrder;
  treatLongsAsDecimals: boolean;
}

export const DEFAULT_ENDIAN: Readonly<EndianOptions> = {
  bitOrder: "lsb",
  byteOrder: "big",
  dwordOrder: "low_high",
  treatLongsAsDecimals: false,
  wordOrder: "low_high",
};

export interface RuntimeTag {
  name: string;
  /** `Channel.Device[.Group...].Tag` */
  qualifiedName: string;
  unitId: number;
  addressType: AddressType;
  /** Protocol address of the first register / bit. */
  address: number;
  /** Registers (or bits) covered by the whole tag. */
  count: number;
  dataType: RuntimeTypeName;
  base: RuntimeDataType;
  isArray: boolean;
  elementCount: number;
  /** Registers per element. */
  elementSize: number;
  /** Project data type name, e.g. "Word(Array)". */
  projectType: string;
  access: TagAccess;
  writeFunction: WriteFunctionCode;
  scanRate: number;
  endian: EndianOptions;
  scaling: Scaling;
  rawAddress: string;
}

type FlagInput = string | number | boolean | undefined;

export interface EndianFlags {
  byteOrder?: FlagInput;
  wordOrder?: FlagInput;
  dwordOrder?: FlagInput;
  bitOrder?: FlagInput;
  treatLongsAsDecimals?: FlagInput;
}

function orderOf(value: FlagInput): WordOrder {
  const s = String(value).toLowerCase();
  return s === "0" || s === "false" || s === "high_low" || s === "high-low"
    ? "high_low"
    : "low_high";
}

/**
 * Translate device encoding flags (0/1, Enable/Disable or the canonical
 * names) into {@link EndianOptions}. Missing flags keep the defaults.
 */
export function mapEndianNames(flags: EndianFlags): EndianOptions {
  const res: EndianOptions = { ...DEFAULT_ENDIAN };
  if (flags.byteOrder !== undefined) {
    const s = String(flags.byteOrder).toLowerCase();
    const little = s === "0" || s === "false" ||
      ["disable", "little", "intel"].some((k) => s.includes(k));
    res.byteOrder = little ? "little" : "big";
  }
  if (flags.wordOrder !== undefined) res.wordOrder = orderOf(flags.wordOrder);
  if (flags.dwordOrder !== undefined) {
    res.dwordOrder = orderOf(flags.dwordOrder);
  }
  if (flags.bitOrder !== undefined) {
    const s = String(flags.bitOrder).toLowerCase();
    const msb = s === "1" || s === "true" ||
      ["enable", "msb", "modicon"].some((k) => s.includes(k));
    res.bitOrder = msb ? "msb" : "lsb";
  }
  if (flags.treatLongsAsDecimals !== undefined) {
    const s = String(flags.treatLongsAsDecimals).toLowerCase();
    res.treatLongsAsDecimals = ["1", "true", "yes", "enable", "enabled"]
      .includes(s);
  }
  return res;
}

export function endianFromEncoding(encoding: Encoding): EndianOptions {
  return mapEndianNames(encoding);
}

function writeFunctionFor(
  base: RuntimeDataType,
  isArray: boolean,
  elementSize: number,
  device: DeviceNode,
): WriteFunctionCode {
  if (base === "bool") {
    return !isArray && device.dataAccess.func05 === 1 ? 5 : 15;
  }
  if (!isArray && elementSize === 1 && device.dataAccess.func06 === 1) {
    return 6;
  }
  return 16;
}

/**
 * Build the runtime descriptor for `tag`.
 *
 * Bit tables honour `zeroBasedBit` (Enable means the address is already
 * 0-based); register tables honour `zeroBased` (Enable means 1-based input).
 */
export function mapTagToRuntime(
  tag: TagNode,
  path: readonly string[],
  device: DeviceNode,
  channel: ChannelNode,
): RuntimeTag {
  const zeroBased = isBooleanType(tag.dataType)
    ? device.dataAccess.zeroBasedBit === 0
    : device.dataAccess.zeroBased === 1;
  const addr = parseAddress(tag.address, zeroBased);
  const dt = normalizeDataType(tag.dataType);
  const elementCount = dt.isArray
    ? (arraySizeFromAddress(tag.address) ?? 1)
    : 1;

  return {
    access: tag.access,
    address: addr.offset,
    addressType: addr.type,
    base: dt.base,
    count: dt.isArray ? elementCount * dt.elementSize : dt.count,
    dataType: dt.type,
    elementCount,
    elementSize: dt.elementSize,
    endian: endianFromEncoding(device.encoding),
    isArray: dt.isArray,
    name: tag.name,
    projectType: tag.dataType,
    qualifiedName: qualifiedTagName(
      [channel.name, device.name, ...path],
      tag.name,
    ),
    rawAddress: addr.raw,
    scaling: tag.scaling,
    scanRate: tag.scanRate,
    unitId: device.deviceId,
    writeFunction: writeFunctionFor(dt.base, dt.isArray, dt.elementSize, device),
  };
}
