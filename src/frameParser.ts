/**
 * Pure functions for parsing RTU and TCP response frames.
 */
import { createErr, createOk, type Result } from "option-t/plain_result";
import { calculateCRC16 } from "./crc.ts";
import { ModbusCRCError, ModbusFrameError } from "./errors.ts";

export interface ParsedFrame {
  unitId: number;
  /** Function code without the exception bit. */
  functionCode: number;
  /** Payload after the function code; for reads, after the byte count. */
  data: number[];
  isException: boolean;
  exceptionCode?: number;
}

export interface ParsedTCPFrame extends ParsedFrame {
  transactionId: number;
}

export const MBAP_HEADER_LENGTH = 7;

/**
 * Total RTU response length (CRC included) implied by the first bytes of
 * `buffer`, or -1 when it cannot be known yet or the function is unknown.
 */
export function getExpectedResponseLength(buffer: ArrayLike<number>): number {
  if (buffer.length < 2) return -1;
  const fc = buffer[1];
  if (fc & 0x80) return 5;
  switch (fc) {
    case 1:
    case 2:
    case 3:
    case 4:
      return buffer.length < 3 ? -1 : 3 + buffer[2] + 2;
    case 5:
    case 6:
    case 15:
    case 16:
      return 8;
    default:
      return -1;
  }
}

/** True when the last two of the first `length` bytes hold a valid CRC. */
export function checkFrameCRC(
  buffer: ArrayLike<number>,
  length: number = buffer.length,
): boolean {
  if (length < 3 || buffer.length < length) return false;
  const received = buffer[length - 2] | (buffer[length - 1] << 8);
  return received === calculateCRC16(Array.from(buffer).slice(0, length - 2));
}

/** Split `unit | fc | payload` into a {@link ParsedFrame}. */
function parseADU(adu: readonly number[]): ParsedFrame {
  const [unitId, rawFc] = adu;
  const functionCode = rawFc & 0x7f;
  if (rawFc & 0x80) {
    return {
      data: [],
      exceptionCode: adu[2],
      functionCode,
      isException: true,
      unitId,
    };
  }
  const data = functionCode >= 1 && functionCode <= 4
    ? adu.slice(3, 3 + adu[2])
    : adu.slice(2);
  return { data, functionCode, isException: false, unitId };
}

export function parseRTUFrame(
  buffer: ArrayLike<number>,
): Result<ParsedFrame, ModbusFrameError | ModbusCRCError> {
  if (buffer.length < 5) {
    return createErr(
      new ModbusFrameError("RTU frame too short (minimum 5 bytes)"),
    );
  }
  const expected = getExpectedResponseLength(buffer);
  if (expected === -1) {
    return createErr(
      new ModbusFrameError(`Unknown function code: ${buffer[1]}`),
    );
  }
  if (buffer.length < expected) {
    return createErr(
      new ModbusFrameError(
        `Incomplete frame: expected ${expected} bytes, got ${buffer.length}`,
      ),
    );
  }
  if (!checkFrameCRC(buffer, expected)) return createErr(new ModbusCRCError());
  return createOk(parseADU(Array.from(buffer).slice(0, expected - 2)));
}

/**
 * Parse one MBAP framed message. The protocol id must be 0 and the length
 * field must match the bytes that follow it.
 */
export function parseTCPFrame(
  buffer: ArrayLike<number>,
): Result<ParsedTCPFrame, ModbusFrameError> {
  if (buffer.length < MBAP_HEADER_LENGTH + 1) {
    return createErr(new ModbusFrameError("TCP frame too short"));
  }
  const protocolId = (buffer[2] << 8) | buffer[3];
  if (protocolId !== 0) {
    return createErr(new ModbusFrameError(`Unexpected protocol id ${protocolId}`));
  }
  const length = (buffer[4] << 8) | buffer[5];
  if (length !== buffer.length - 6) {
    return createErr(
      new ModbusFrameError(
        `MBAP length ${length} does not match ${buffer.length - 6} bytes`,
      ),
    );
  }
  const adu = Array.from(buffer).slice(6);
  if (!(adu[1] & 0x80) && adu[1] >= 1 && adu[1] <= 4 && adu.length < 3 + adu[2]) {
    return createErr(new ModbusFrameError("Byte count exceeds frame"));
  }
  return createOk({
    ...parseADU(adu),
    transactionId: (buffer[0] << 8) | buffer[1],
  });
}

/** Unpack LSB-first coil bytes; `count` trims the padding bits. */
export function parseBitResponse(
  data: readonly number[],
  count: number = data.length * 8,
): number[] {
  const bits: number[] = [];
  for (let i = 0; i < count; i++) {
    const byte = data[i >> 3];
    bits.push(byte === undefined ? 0 : (byte >> (i & 7)) & 1);
  }
  return bits;
}

/** Big-endian 16-bit registers; a trailing odd byte is dropped. */
export function parseRegisterResponse(data: readonly number[]): number[] {
  const words: number[] = [];
  for (let i = 0; i + 1 < data.length; i += 2) {
    words.push((data[i] << 8) | data[i + 1]);
  }
  return words;
}
