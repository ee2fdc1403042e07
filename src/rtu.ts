// Modbus RTU request/response over any IModbusTransport.
import {
  createErr,
  createOk,
  isErr,
  type Result,
} from "option-t/plain_result";
import {
  ModbusExceptionError,
  ModbusFrameError,
  toError,
} from "./errors.ts";
import { toReadPDU, toRTUFrame, toWritePDU } from "./frameBuilder.ts";
import {
  getExpectedResponseLength,
  type ParsedFrame,
  parseRTUFrame,
} from "./frameParser.ts";
import type {
  ModbusResponse,
  ReadRequest,
  RequestOptions,
  WriteRequest,
} from "./modbus.ts";
import { decodeReadPayload } from "./response.ts";
import { byteStreamFromTransport, requestSignal } from "./stream.ts";
import type { IModbusTransport } from "./transport/transport.ts";

/**
 * Yield every CRC-valid RTU frame found in `source`.
 *
 * A byte that cannot start a frame, or a candidate that fails to parse, is
 * dropped and scanning resumes at the next byte. Trailing partial data is
 * discarded when the source ends.
 */
export async function* rtuFrameStream(
  source: AsyncIterable<Uint8Array>,
): AsyncGenerator<Uint8Array, void, unknown> {
  const buffer: number[] = [];
  for await (const chunk of source) {
    buffer.push(...chunk);
    while (buffer.length >= 5) {
      const expected = getExpectedResponseLength(buffer);
      if (expected === -1) {
        buffer.shift();
        continue;
      }
      if (buffer.length < expected) break;
      const candidate = buffer.slice(0, expected);
      if (isErr(parseRTUFrame(candidate))) {
        buffer.shift();
        continue;
      }
      buffer.splice(0, expected);
      yield new Uint8Array(candidate);
    }
  }
}

/** One request, one matching response. */
async function exchange(
  transport: IModbusTransport,
  unitId: number,
  pdu: Uint8Array,
  options: RequestOptions,
): Promise<Result<ParsedFrame, Error>> {
  if (!transport.connected) {
    return createErr(new Error("Transport not connected"));
  }
  const functionCode = pdu[0];
  const { dispose, signal } = requestSignal(options);
  try {
    transport.postMessage(toRTUFrame(unitId, pdu));
    const frames = rtuFrameStream(byteStreamFromTransport(transport, { signal }));
    for await (const raw of frames) {
      const parsed = parseRTUFrame(raw);
      if (isErr(parsed)) continue;
      const frame = parsed.val;
      if (frame.unitId !== unitId || frame.functionCode !== functionCode) {
        continue;
      }
      if (frame.isException) {
        return createErr(new ModbusExceptionError(frame.exceptionCode ?? 0));
      }
      return createOk(frame);
    }
    return createErr(new Error("Stream ended before frame complete"));
  } catch (e) {
    return createErr(toError(e));
  } finally {
    dispose();
  }
}

export async function read(
  transport: IModbusTransport,
  request: ReadRequest,
  options: RequestOptions = {},
): Promise<Result<ModbusResponse, Error>> {
  const res = await exchange(transport, request.unitId, toReadPDU(request), options);
  if (isErr(res)) return res;
  return decodeReadPayload(request, res.val.data);
}

export async function write(
  transport: IModbusTransport,
  request: WriteRequest,
  options: RequestOptions = {},
): Promise<Result<void, Error>> {
  let pdu: Uint8Array;
  try {
    pdu = toWritePDU(request);
  } catch (e) {
    return createErr(toError(e));
  }
  const res = await exchange(transport, request.unitId, pdu, options);
  if (isErr(res)) return res;
  const address = (res.val.data[0] << 8) | res.val.data[1];
  return address === request.address
    ? createOk(undefined)
    : createErr(new ModbusFrameError(`Write echo for address ${address}`));
}
