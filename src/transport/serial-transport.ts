// Serial transport backed by the `serialport` package.
import { SerialPort } from "serialport";
import { toError } from "../errors.ts";
import { BaseTransport, type SerialTransportConfig } from "./transport.ts";

/** The part of `SerialPort` this transport drives. */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  write(
    data: Uint8Array,
    callback: (err: Error | null | undefined) => void,
  ): boolean;
  on(event: "data", listener: (chunk: Uint8Array) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  on(event: "close", listener: () => void): this;
}

export type SerialPortFactory = (config: SerialTransportConfig) => SerialPortLike;

export const openSerialPort: SerialPortFactory = (config) =>
  new SerialPort({
    autoOpen: false,
    baudRate: config.baudRate,
    dataBits: config.dataBits,
    parity: config.parity,
    path: config.path,
    rtscts: config.rtscts ?? false,
    stopBits: config.stopBits,
  });

export class SerialTransport extends BaseTransport<SerialTransportConfig> {
  #createPort: SerialPortFactory;
  #port: SerialPortLike | undefined;

  constructor(
    config: SerialTransportConfig,
    createPort: SerialPortFactory = openSerialPort,
  ) {
    super(config);
    this.#createPort = createPort;
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    this.setState("connecting");
    const port = this.#createPort(this.config);
    try {
      await new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      });
    } catch (e) {
      this.setState("error");
      throw new Error(`Failed to open ${this.config.path}: ${toError(e).message}`, {
        cause: e,
      });
    }
    port.on("data", (chunk) => this.dispatchMessage(new Uint8Array(chunk)));
    port.on("error", (err) => this.dispatchError(err));
    port.on("close", () => {
      if (this.#port === port) this.#port = undefined;
      this.markClosed();
    });
    this.#port = port;
    this.setState("connected");
    this.dispatchOpen();
  }

  async disconnect(): Promise<void> {
    const port = this.#port;
    this.#port = undefined;
    if (port?.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err) => (err ? reject(err) : resolve()));
      });
    }
    this.markClosed();
  }

  /** Write errors surface as `error` events. */
  postMessage(data: Uint8Array): void {
    const port = this.#port;
    if (!this.connected || !port) throw new Error("Transport not connected");
    port.write(data, (err) => {
      if (err) this.dispatchError(err);
    });
  }
}
