import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENDIAN,
  mapEndianNames,
  mapTagToRuntime,
} from "../src/config/mapping.ts";
import {
  createChannel,
  createDevice,
  createTag,
  type DeviceNode,
} from "../src/config/project.ts";

const channel = createChannel({ name: "Line1" });

function device(patch: Partial<DeviceNode> = {}): DeviceNode {
  return { ...createDevice({ deviceId: 7, name: "PLC" }), ...patch };
}

describe("mapEndianNames", () => {
  it("keeps defaults for missing flags", () => {
    expect(mapEndianNames({})).toEqual(DEFAULT_ENDIAN);
  });

  it("maps numeric flags", () => {
    expect(
      mapEndianNames({
        bitOrder: 1,
        byteOrder: 0,
        dwordOrder: 0,
        treatLongsAsDecimals: 1,
        wordOrder: 0,
      }),
    ).toEqual({
      bitOrder: "msb",
      byteOrder: "little",
      dwordOrder: "high_low",
      treatLongsAsDecimals: true,
      wordOrder: "high_low",
    });
  });

  it("maps names", () => {
    expect(mapEndianNames({ bitOrder: "Modicon", byteOrder: "Intel" }))
      .toMatchObject({ bitOrder: "msb", byteOrder: "little" });
    expect(mapEndianNames({ byteOrder: "Enable", wordOrder: "Enable" }))
      .toMatchObject({ byteOrder: "big", wordOrder: "low_high" });
  });
});

describe("mapTagToRuntime", () => {
  it("maps a holding register float", () => {
    const tag = createTag({ address: "400001", dataType: "Float", name: "T" });
    const rt = mapTagToRuntime(tag, ["G"], device(), channel);
    expect(rt).toMatchObject({
      address: 1,
      addressType: "holding_register",
      base: "float32",
      count: 2,
      dataType: "float32",
      elementCount: 1,
      isArray: false,
      qualifiedName: "Line1.PLC.G.T",
      scanRate: 10,
      unitId: 7,
      writeFunction: 16,
    });
    expect(rt.endian).toEqual({
      bitOrder: "lsb",
      byteOrder: "big",
      dwordOrder: "low_high",
      treatLongsAsDecimals: false,
      wordOrder: "low_high",
    });
  });

  it("prefers FC6 for single registers when enabled", () => {
    const tag = createTag({ address: "400003", dataType: "Word" });
    expect(mapTagToRuntime(tag, [], device(), channel).writeFunction).toBe(6);
    const noFc6 = device({
      dataAccess: { ...createDevice().dataAccess, func06: 0 },
    });
    expect(mapTagToRuntime(tag, [], noFc6, channel).writeFunction).toBe(16);
  });

  it("honours zero-based register addressing", () => {
    const tag = createTag({ address: "400003", dataType: "Word" });
    const zb = device({
      dataAccess: { ...createDevice().dataAccess, zeroBased: 1 },
    });
    expect(mapTagToRuntime(tag, [], zb, channel).address).toBe(2);
  });

  it("uses zero_based_bit for bit tables", () => {
    const tag = createTag({ address: "000005", dataType: "Boolean" });
    const rt = mapTagToRuntime(tag, [], device(), channel);
    expect(rt).toMatchObject({
      address: 5,
      addressType: "coil",
      dataType: "bool",
      writeFunction: 5,
    });
    const oneBased = device({
      dataAccess: { ...createDevice().dataAccess, zeroBasedBit: 0 },
    });
    expect(mapTagToRuntime(tag, [], oneBased, channel).address).toBe(4);
  });

  it("sizes arrays from the address suffix", () => {
    const words = createTag({ address: "400010 [4]", dataType: "Word(Array)" });
    expect(mapTagToRuntime(words, [], device(), channel)).toMatchObject({
      count: 4,
      dataType: "uint16[]",
      elementCount: 4,
      isArray: true,
      writeFunction: 16,
    });
    const floats = createTag({
      address: "400010 [3]",
      dataType: "Float(Array)",
    });
    expect(mapTagToRuntime(floats, [], device(), channel).count).toBe(6);
    const bits = createTag({
      address: "000001 [10]",
      dataType: "Boolean(Array)",
    });
    expect(mapTagToRuntime(bits, [], device(), channel)).toMatchObject({
      count: 10,
      writeFunction: 15,
    });
  });
});
