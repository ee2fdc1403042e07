import fc from "fast-check";
import { isErr, isOk } from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENDIAN,
  type EndianOptions,
  mapTagToRuntime,
  type RuntimeTag,
} from "../src/config/mapping.ts";
import {
  createChannel,
  createDevice,
  createTag,
  type Encoding,
} from "../src/config/project.ts";
import {
  decodeScalar,
  decodeTagValue,
  encodeScalar,
  encodeTagValue,
  reverseBits16,
  swapBytes,
} from "../src/runtime/codec.ts";

const BIG_HIGH_LOW: EndianOptions = {
  ...DEFAULT_ENDIAN,
  dwordOrder: "high_low",
  wordOrder: "high_low",
};

function runtimeTag(
  dataType: string,
  address = "400001",
  encoding: Partial<Encoding> = {},
): RuntimeTag {
  const base = createDevice();
  const device = createDevice({ encoding: { ...base.encoding, ...encoding } });
  return mapTagToRuntime(
    createTag({ address, dataType, name: "T" }),
    [],
    device,
    createChannel(),
  );
}

describe("word helpers", () => {
  it("swaps bytes and reverses bits", () => {
    expect(swapBytes(0x1234)).toBe(0x3412);
    expect(reverseBits16(0x0001)).toBe(0x8000);
    expect(reverseBits16(0x00f0)).toBe(0x0f00);
  });

  it("both are their own inverse", () => {
    fc.assert(
      fc.property(fc.integer({ max: 0xffff, min: 0 }), (w) => {
        expect(swapBytes(swapBytes(w))).toBe(w);
        expect(reverseBits16(reverseBits16(w))).toBe(w);
      }),
    );
  });
});

describe("decodeScalar", () => {
  it("reads single-register types", () => {
    expect(decodeScalar("uint16", [0xffff], DEFAULT_ENDIAN)).toBe(65535);
    expect(decodeScalar("int16", [0xffff], DEFAULT_ENDIAN)).toBe(-1);
    expect(decodeScalar("uint8", [0x12ff], DEFAULT_ENDIAN)).toBe(255);
    expect(decodeScalar("int8", [0x00ff], DEFAULT_ENDIAN)).toBe(-1);
    expect(decodeScalar("bcd16", [0x1234], DEFAULT_ENDIAN)).toBe(1234);
    expect(decodeScalar("bool", [0x0400], DEFAULT_ENDIAN)).toBe(1);
  });

  it("applies byte and bit order to one register", () => {
    expect(
      decodeScalar("uint16", [0x3412], { ...DEFAULT_ENDIAN, byteOrder: "little" }),
    ).toBe(0x1234);
    expect(
      decodeScalar("uint16", [0x0001], { ...DEFAULT_ENDIAN, bitOrder: "msb" }),
    ).toBe(0x8000);
  });

  it("reads 32-bit values in both word orders", () => {
    expect(decodeScalar("int32", [0xfffe, 0xffff], DEFAULT_ENDIAN)).toBe(-2);
    expect(decodeScalar("int32", [0xffff, 0xfffe], BIG_HIGH_LOW)).toBe(-2);
    expect(decodeScalar("uint32", [0x0001, 0x0002], BIG_HIGH_LOW)).toBe(65538);
    expect(decodeScalar("float32", [0x0000, 0x4120], DEFAULT_ENDIAN)).toBe(10);
    expect(decodeScalar("bcd32", [0x0012, 0x3456], BIG_HIGH_LOW)).toBe(123456);
  });

  it("reads 64-bit values least significant word first by default", () => {
    expect(decodeScalar("uint64", [1, 0, 0, 0], DEFAULT_ENDIAN)).toBe(1);
    expect(decodeScalar("int64", [0xffff, 0xffff, 0xffff, 0xffff], DEFAULT_ENDIAN))
      .toBe(-1);
    expect(decodeScalar("float64", [0x3ff8, 0, 0, 0], BIG_HIGH_LOW)).toBe(1.5);
  });

  it("reads decimal longs as two four-digit halves", () => {
    expect(
      decodeScalar("int64", [0, 1234, 0, 5678], {
        ...BIG_HIGH_LOW,
        treatLongsAsDecimals: true,
      }),
    ).toBe(12345678);
  });

  it("reads strings high byte first up to NUL", () => {
    expect(decodeScalar("string", [0x4142, 0x4300, 0x4444], DEFAULT_ENDIAN)).toBe(
      "ABC",
    );
    expect(
      decodeScalar("string", [0x4241], { ...DEFAULT_ENDIAN, byteOrder: "little" }),
    ).toBe("AB");
  });
});

describe("encodeScalar", () => {
  it("lays out values the way decodeScalar reads them", () => {
    expect(encodeScalar("int32", -2, DEFAULT_ENDIAN)).toEqual([0xfffe, 0xffff]);
    expect(encodeScalar("float32", 10, BIG_HIGH_LOW)).toEqual([0x4120, 0x0000]);
    expect(encodeScalar("bcd32", 123456, BIG_HIGH_LOW)).toEqual([0x0012, 0x3456]);
    expect(encodeScalar("uint16", 0x1234, { ...DEFAULT_ENDIAN, byteOrder: "little" }))
      .toEqual([0x3412]);
    expect(encodeScalar("bcd16", 42, DEFAULT_ENDIAN)).toEqual([0x0042]);
  });

  it("writes decimal longs as [0, high, 0, low]", () => {
    expect(
      encodeScalar("uint64", 12345678, { ...BIG_HIGH_LOW, treatLongsAsDecimals: true }),
    ).toEqual([0, 1234, 0, 5678]);
  });

  it("round-trips int32 under every word and byte order", () => {
    fc.assert(
      fc.property(
        fc.integer({ max: 0x7fffffff, min: -0x80000000 }),
        fc.boolean(),
        fc.boolean(),
        (n, little, lowFirst) => {
          const e: EndianOptions = {
            ...DEFAULT_ENDIAN,
            byteOrder: little ? "little" : "big",
            wordOrder: lowFirst ? "low_high" : "high_low",
          };
          expect(decodeScalar("int32", encodeScalar("int32", n, e), e)).toBe(n);
        },
      ),
    );
  });
});

describe("decodeTagValue", () => {
  it("decodes a float holding register", () => {
    expect(decodeTagValue(runtimeTag("Float"), [0x0000, 0x4120])).toBe(10);
  });

  it("uses the device encoding flags", () => {
    const tag = runtimeTag("Long", "400001", { wordOrder: 0 });
    expect(decodeTagValue(tag, [0xffff, 0xfffe])).toBe(-2);
  });

  it("yields 1/0 for coils and null for missing bits", () => {
    const coil = runtimeTag("Boolean", "000001");
    expect(decodeTagValue(coil, [1])).toBe(1);
    expect(decodeTagValue(coil, [])).toBeNull();
    const bits = runtimeTag("Boolean(Array)", "000001 [3]");
    expect(decodeTagValue(bits, [1, 0])).toEqual([1, 0, null]);
  });

  it("decodes arrays element-wise", () => {
    const words = runtimeTag("Word(Array)", "400001 [3]");
    expect(decodeTagValue(words, [1, 2])).toEqual([1, 2, null]);
    const floats = runtimeTag("Float(Array)", "400001 [2]");
    expect(decodeTagValue(floats, [0, 0x4120, 0, 0x3fc0])).toEqual([10, 1.5]);
  });
});

describe("encodeTagValue", () => {
  it("writes a single word with FC6", () => {
    const tag = runtimeTag("Word");
    expect(tag.writeFunction).toBe(6);
    const res = encodeTagValue(tag, "4660");
    expect(isOk(res) && res.val).toEqual([0x1234]);
  });

  it("writes a float with FC16", () => {
    const res = encodeTagValue(runtimeTag("Float"), 10);
    expect(isOk(res) && res.val).toEqual([0x0000, 0x4120]);
  });

  it("writes the first bit only with FC5", () => {
    const res = encodeTagValue(runtimeTag("Boolean", "000001"), [false, true]);
    expect(isOk(res) && res.val).toEqual([0]);
  });

  it("writes every bit of a bool array with FC15", () => {
    const tag = runtimeTag("Boolean(Array)", "000001 [3]");
    expect(tag.writeFunction).toBe(15);
    const res = encodeTagValue(tag, [true, false, 1]);
    expect(isOk(res) && res.val).toEqual([1, 0, 1]);
  });

  it("pads strings to the register count", () => {
    const res = encodeTagValue(runtimeTag("String"), "Hi");
    expect(isOk(res) && res.val).toEqual([0x4869, 0, 0, 0, 0, 0]);
  });

  it("writes array elements in order", () => {
    const res = encodeTagValue(runtimeTag("Word(Array)", "400001 [3]"), [1, 2, 3]);
    expect(isOk(res) && res.val).toEqual([1, 2, 3]);
  });

  it("rejects non-numeric input", () => {
    const res = encodeTagValue(runtimeTag("Word"), "abc");
    expect(isErr(res) && res.err.message).toBe("Invalid value for T: abc");
  });

  it("rejects an empty list", () => {
    const res = encodeTagValue(runtimeTag("Word(Array)", "400001 [2]"), []);
    expect(isErr(res) && res.err.message).toBe("Nothing to write");
  });
});
