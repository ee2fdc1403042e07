/**
 * Unified error types for Modbus exchanges and project configuration.
 */

/** Modbus exception codes as defined by the protocol. */
export const MODBUS_EXCEPTION_CODES = {
  1: "Illegal function",
  2: "Illegal data address (address does not exist)",
  3: "Illegal data value",
  4: "Slave device failure",
  5: "Acknowledge",
  6: "Slave device busy",
  8: "Memory parity error",
  10: "Gateway path unavailable",
  11: "Gateway target device failed to respond",
} as const;

export type ModbusExceptionCode = keyof typeof MODBUS_EXCEPTION_CODES;

function isKnownExceptionCode(code: number): code is ModbusExceptionCode {
  return Object.hasOwn(MODBUS_EXCEPTION_CODES, code);
}

/** Base error class for Modbus-related errors. */
export class ModbusError extends Error {
  constructor(
    message: string,
    public readonly code?: number,
  ) {
    super(message);
    this.name = "ModbusError";
  }
}

/** Error for Modbus exception responses (function code | 0x80). */
export class ModbusExceptionError extends ModbusError {
  constructor(public readonly exceptionCode: number) {
    const message = isKnownExceptionCode(exceptionCode)
      ? MODBUS_EXCEPTION_CODES[exceptionCode]
      : `Unknown exception ${exceptionCode}`;
    super(`${message} (code: ${exceptionCode})`, exceptionCode);
    this.name = "ModbusExceptionError";
  }
}

/** Error for CRC validation failures. */
export class ModbusCRCError extends ModbusError {
  constructor() {
    super("CRC error");
    this.name = "ModbusCRCError";
  }
}

/** Error for invalid frame format. */
export class ModbusFrameError extends ModbusError {
  constructor(message: string) {
    super(`Frame error: ${message}`);
    this.name = "ModbusFrameError";
  }
}

/** Error for concurrent request attempts. */
export class ModbusBusyError extends ModbusError {
  constructor() {
    super("Another request is in progress");
    this.name = "ModbusBusyError";
  }
}

/** No matching response arrived within the request timeout. */
export class ModbusTimeoutError extends ModbusError {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "ModbusTimeoutError";
  }
}

/** Malformed or inconsistent project configuration. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

/** A dialog field holds a value that cannot be accepted. */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Normalise an unknown thrown value into an Error instance. */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
