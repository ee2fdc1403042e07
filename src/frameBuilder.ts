/**
 * Request builders. A PDU is the function code plus its data; the RTU and
 * TCP framers wrap it with the unit id and either a CRC or an MBAP header.
 */
import { crcBytes } from "./crc.ts";
import type { ReadRequest, WriteRequest } from "./modbus.ts";

const hi = (n: number) => (n >> 8) & 0xff;
const lo = (n: number) => n & 0xff;

function firstValue(value: number | readonly number[]): number {
  return typeof value === "number" ? value : (value[0] ?? 0);
}

export function toReadPDU(request: ReadRequest): Uint8Array {
  const { address, functionCode, quantity } = request;
  return new Uint8Array([
    functionCode,
    hi(address),
    lo(address),
    hi(quantity),
    lo(quantity),
  ]);
}

/**
 * @throws Error when FC15/FC16 are given a single value or an unknown
 *   function code is passed.
 */
export function toWritePDU(request: WriteRequest): Uint8Array {
  const { address, functionCode, value } = request;
  switch (functionCode) {
    case 5: {
      const on = firstValue(value) !== 0;
      return new Uint8Array([5, hi(address), lo(address), on ? 0xff : 0, 0]);
    }
    case 6: {
      const word = firstValue(value) & 0xffff;
      return new Uint8Array([6, hi(address), lo(address), hi(word), lo(word)]);
    }
    case 15: {
      if (typeof value === "number") {
        throw new Error("FC15 requires an array of coil states");
      }
      const packed = new Array<number>(Math.ceil(value.length / 8)).fill(0);
      value.forEach((bit, i) => {
        if (bit) packed[i >> 3] |= 1 << (i & 7);
      });
      return new Uint8Array([
        15,
        hi(address),
        lo(address),
        hi(value.length),
        lo(value.length),
        packed.length,
        ...packed,
      ]);
    }
    case 16: {
      if (typeof value === "number") {
        throw new Error("FC16 requires an array of register values");
      }
      return new Uint8Array([
        16,
        hi(address),
        lo(address),
        hi(value.length),
        lo(value.length),
        value.length * 2,
        ...value.flatMap((w) => [hi(w), lo(w)]),
      ]);
    }
    default:
      throw new Error(`Unsupported write function code: ${String(functionCode)}`);
  }
}

/** `unit | pdu | crc(lo, hi)` */
export function toRTUFrame(unitId: number, pdu: Uint8Array): Uint8Array {
  const body = [unitId & 0xff, ...pdu];
  return new Uint8Array([...body, ...crcBytes(body)]);
}

/** MBAP header (transaction, protocol 0, length, unit) followed by the PDU. */
export function toTCPFrame(
  transactionId: number,
  unitId: number,
  pdu: Uint8Array,
): Uint8Array {
  const length = pdu.length + 1;
  return new Uint8Array([
    hi(transactionId),
    lo(transactionId),
    0,
    0,
    hi(length),
    lo(length),
    unitId & 0xff,
    ...pdu,
  ]);
}
