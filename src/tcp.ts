// Modbus TCP (MBAP framing) request/response over any IModbusTransport.
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
import { toReadPDU, toTCPFrame, toWritePDU } from "./frameBuilder.ts";
import {
  MBAP_HEADER_LENGTH,
  type ParsedTCPFrame,
  parseTCPFrame,
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

// Largest legal ADU after the length field: unit + 253 byte PDU.
const MAX_MBAP_LENGTH = 254;

const transactionIds = new WeakMap<IModbusTransport, number>();

/** Next transaction id for `transport`, wrapping at 0xffff. */
export function nextTransactionId(transport: IModbusTransport): number {
  const id = ((transactionIds.get(transport) ?? 0) % 0xffff) + 1;
  transactionIds.set(transport, id);
  return id;
}

/**
 * Split a byte stream into MBAP messages using the header length field.
 * A header with a non-zero protocol id or an impossible length drops one
 * byte and scanning resumes.
 */
export async function* tcpFrameStream(
  source: AsyncIterable<Uint8Array>,
): AsyncGenerator<Uint8Array, void, unknown> {
  const buffer: number[] = [];
  for await (const chunk of source) {
    buffer.push(...chunk);
    while (buffer.length >= MBAP_HEADER_LENGTH) {
      const protocolId = (buffer[2] << 8) | buffer[3];
      const length = (buffer[4] << 8) | buffer[5];
      if (protocolId !== 0 || length < 2 || length > MAX_MBAP_LENGTH) {
        buffer.shift();
        continue;
      }
      const total = 6 + length;
      if (buffer.length < total) break;
      yield new Uint8Array(buffer.splice(0, total));
    }
  }
}

async function exchange(
  transport: IModbusTransport,
  unitId: number,
  pdu: Uint8Array,
  options: RequestOptions,
): Promise<Result<ParsedTCPFrame, Error>> {
  if (!transport.connected) {
    return createErr(new Error("Transport not connected"));
  }
  const transactionId = nextTransactionId(transport);
  const functionCode = pdu[0];
  const { dispose, signal } = requestSignal(options);
  try {
    transport.postMessage(toTCPFrame(transactionId, unitId, pdu));
    const frames = tcpFrameStream(byteStreamFromTransport(transport, { signal }));
    for await (const raw of frames) {
      const parsed = parseTCPFrame(raw);
      // Stale answers to earlier, timed out requests are skipped.
      if (isErr(parsed) || parsed.val.transactionId !== transactionId) continue;
      const frame = parsed.val;
      if (frame.functionCode !== functionCode) {
        return createErr(
          new ModbusFrameError(`Unexpected function code ${frame.functionCode}`),
        );
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
  return isErr(res) ? res : createOk(undefined);
}
