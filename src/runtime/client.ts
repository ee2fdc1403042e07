// Modbus master bound to one transport, framing and unit.
import { createErr, createOk, isOk, type Result } from "option-t/plain_result";
import { toError } from "../errors.ts";
import type { ReadFunctionCode, WriteFunctionCode } from "../functionCodes.ts";
import type { Logger } from "../logger.ts";
import type { ModbusResponse, ReadRequest, WriteRequest } from "../modbus.ts";
import * as rtu from "../rtu.ts";
import {
  executeWithRetry,
  RequestPriority,
  type RequestScheduler,
  type RetryOptions,
} from "../scheduler/request-scheduler.ts";
import * as tcp from "../tcp.ts";
import type {
  IModbusTransport,
  TransportEventMap,
  TransportState,
} from "../transport/transport.ts";
import type { DiagnosticsManager } from "./diagnostics.ts";

export type Framing = "rtu" | "tcp";

export interface ModbusClientOptions {
  transport: IModbusTransport;
  framing: Framing;
  unitId: number;
  requestTimeoutMs?: number;
  /** Tries per request, including the first. */
  attempts?: number;
  connectAttempts?: number;
  /** Shared by every client on the same link. */
  scheduler?: RequestScheduler;
  logger?: Logger;
}

/** Errors worth another attempt on the same request. */
export const RETRYABLE_ERRORS = [
  "ModbusTimeoutError",
  "ModbusCRCError",
  "ModbusFrameError",
];

/**
 * Transport wrapper that records outbound frames and inbound chunks on
 * `diagnostics` as `TX:` / `RX:` hex lines.
 */
export class TracedTransport implements IModbusTransport {
  constructor(
    readonly inner: IModbusTransport,
    readonly diagnostics: DiagnosticsManager,
  ) {
    inner.addEventListener("message", (ev) => {
      diagnostics.traffic("RX", ev.detail);
    });
  }

  get config() {
    return this.inner.config;
  }

  get state(): TransportState {
    return this.inner.state;
  }

  get connected(): boolean {
    return this.inner.connected;
  }

  connect(): Promise<void> {
    return this.inner.connect();
  }

  disconnect(): Promise<void> {
    return this.inner.disconnect();
  }

  postMessage(data: Uint8Array): void {
    this.diagnostics.traffic("TX", data);
    this.inner.postMessage(data);
  }

  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.inner.addEventListener(type, listener, options);
  }
}

const connecting = new WeakMap<
  IModbusTransport,
  Promise<Result<void, Error>>
>();

export class ModbusClient {
  readonly transport: IModbusTransport;
  readonly framing: Framing;
  readonly unitId: number;
  readonly requestTimeoutMs: number;
  readonly attempts: number;
  readonly connectAttempts: number;
  readonly #scheduler?: RequestScheduler;
  readonly #logger?: Logger;

  constructor(options: ModbusClientOptions) {
    this.transport = options.transport;
    this.framing = options.framing;
    this.unitId = options.unitId;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 1000;
    this.attempts = Math.max(1, options.attempts ?? 1);
    this.connectAttempts = Math.max(1, options.connectAttempts ?? 1);
    this.#scheduler = options.scheduler;
    this.#logger = options.logger;
  }

  get connected(): boolean {
    return this.transport.connected;
  }

  /**
   * Open the link, trying up to `connectAttempts` times. Clients sharing a
   * transport share one attempt.
   */
  connect(): Promise<Result<void, Error>> {
    const transport = this.transport;
    if (transport.connected) return Promise.resolve(createOk(undefined));
    let pending = connecting.get(transport);
    if (!pending) {
      pending = this.#connect().finally(() => connecting.delete(transport));
      connecting.set(transport, pending);
    }
    return pending;
  }

  async #connect(): Promise<Result<void, Error>> {
    let last: Error = new Error("Not connected");
    for (let attempt = 1; attempt <= this.connectAttempts; attempt++) {
      try {
        await this.transport.connect();
        return createOk(undefined);
      } catch (e) {
        last = toError(e);
        this.#logger?.warn(
          `Connect attempt ${attempt}/${this.connectAttempts} failed: ${last.message}`,
        );
      }
    }
    return createErr(last);
  }

  async close(): Promise<void> {
    await this.transport.disconnect();
  }

  get #retry(): RetryOptions {
    return {
      baseDelay: 50,
      exponentialBackoff: false,
      maxRetries: this.attempts - 1,
      retryableErrors: RETRYABLE_ERRORS,
    };
  }

  async #run<T>(
    operation: () => Promise<Result<T, Error>>,
    priority: RequestPriority,
  ): Promise<Result<T, Error>> {
    const link = await this.connect();
    if (!isOk(link)) return link;
    return this.#scheduler
      ? this.#scheduler.schedule(operation, priority, this.#retry)
      : executeWithRetry(operation, this.#retry);
  }

  read(
    functionCode: ReadFunctionCode,
    address: number,
    quantity: number,
    unitId = this.unitId,
  ): Promise<Result<ModbusResponse, Error>> {
    const request: ReadRequest = { address, functionCode, quantity, unitId };
    const options = { timeoutMs: this.requestTimeoutMs };
    return this.#run(
      () =>
        this.framing === "tcp"
          ? tcp.read(this.transport, request, options)
          : rtu.read(this.transport, request, options),
      RequestPriority.NORMAL,
    );
  }

  write(
    functionCode: WriteFunctionCode,
    address: number,
    value: number | readonly number[],
    unitId = this.unitId,
  ): Promise<Result<void, Error>> {
    const request: WriteRequest = { address, functionCode, unitId, value };
    const options = { timeoutMs: this.requestTimeoutMs };
    return this.#run(
      () =>
        this.framing === "tcp"
          ? tcp.write(this.transport, request, options)
          : rtu.write(this.transport, request, options),
      RequestPriority.HIGH,
    );
  }
}
