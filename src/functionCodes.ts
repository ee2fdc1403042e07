/**
 * Modbus function codes used by the gateway and the helpers that classify
 * them.
 */
import type { AddressType } from "./config/constants.ts";

export const READ_FUNCTION_CODES = [1, 2, 3, 4] as const;
export const WRITE_FUNCTION_CODES = [5, 6, 15, 16] as const;

export type ReadFunctionCode = (typeof READ_FUNCTION_CODES)[number];
export type WriteFunctionCode = (typeof WRITE_FUNCTION_CODES)[number];
export type FunctionCode = ReadFunctionCode | WriteFunctionCode;

export const FUNCTION_CODE_LABELS: Readonly<Record<FunctionCode, string>> = {
  1: "Read Coils",
  2: "Read Discrete Inputs",
  3: "Read Holding Registers",
  4: "Read Input Registers",
  5: "Write Single Coil",
  6: "Write Single Register",
  15: "Write Multiple Coils",
  16: "Write Multiple Registers",
};

/** Read function for each address table. */
export const READ_FUNCTION_FOR: Readonly<Record<AddressType, ReadFunctionCode>> = {
  coil: 1,
  discrete_input: 2,
  holding_register: 3,
  input_register: 4,
};

export function isReadFunctionCode(code: number): code is ReadFunctionCode {
  return READ_FUNCTION_CODES.some((c) => c === code);
}

export function isWriteFunctionCode(code: number): code is WriteFunctionCode {
  return WRITE_FUNCTION_CODES.some((c) => c === code);
}

export function isFunctionCode(code: number): code is FunctionCode {
  return isReadFunctionCode(code) || isWriteFunctionCode(code);
}

/** FC01/FC02 responses carry packed bits. */
export function isBitFunctionCode(code: number): code is 1 | 2 {
  return code === 1 || code === 2;
}

export function functionCodeLabel(code: number): string {
  return isFunctionCode(code)
    ? FUNCTION_CODE_LABELS[code]
    : `Function ${code}`;
}
