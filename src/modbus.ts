import type { ReadFunctionCode, WriteFunctionCode } from "./functionCodes.ts";

/** Decoded answer to a read request. */
export interface ModbusResponse {
  unitId: number;
  /** Function code without the exception bit. */
  functionCode: number;
  /** Registers, or one 0/1 entry per requested bit. */
  data: number[];
  address: number;
  timestamp: Date;
}

export interface ReadRequest {
  unitId: number;
  functionCode: ReadFunctionCode;
  address: number;
  quantity: number;
}

export interface WriteRequest {
  unitId: number;
  functionCode: WriteFunctionCode;
  address: number;
  /** Coil states as 0/1 for FC05/FC15, register words for FC06/FC16. */
  value: number | readonly number[];
}

/** Per-request controls. */
export interface RequestOptions {
  signal?: AbortSignal;
  /** Abort with a timeout error after this many milliseconds. */
  timeoutMs?: number;
}
