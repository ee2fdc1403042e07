import { createErr, createOk, type Result } from "option-t/plain_result";
import { ModbusFrameError } from "./errors.ts";
import { parseBitResponse, parseRegisterResponse } from "./frameParser.ts";
import { isBitFunctionCode } from "./functionCodes.ts";
import type { ModbusResponse, ReadRequest } from "./modbus.ts";

/** Turn the data bytes of a read response into bits or registers. */
export function decodeReadPayload(
  request: ReadRequest,
  payload: readonly number[],
): Result<ModbusResponse, ModbusFrameError> {
  const bits = isBitFunctionCode(request.functionCode);
  const needed = bits ? Math.ceil(request.quantity / 8) : request.quantity * 2;
  if (payload.length < needed) {
    return createErr(
      new ModbusFrameError(
        `Expected ${needed} data bytes, got ${payload.length}`,
      ),
    );
  }
  return createOk({
    address: request.address,
    data: bits
      ? parseBitResponse(payload, request.quantity)
      : parseRegisterResponse(payload).slice(0, request.quantity),
    functionCode: request.functionCode,
    timestamp: new Date(),
    unitId: request.unitId,
  });
}
