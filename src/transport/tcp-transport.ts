// TCP socket transport for Modbus TCP and RTU over TCP.
import { Socket } from "node:net";
import { BaseTransport, type TcpTransportConfig } from "./transport.ts";

export const DEFAULT_CONNECT_TIMEOUT_MS = 3000;

export class TcpTransport extends BaseTransport<TcpTransportConfig> {
  #socket: Socket | undefined;

  async connect(): Promise<void> {
    if (this.connected) return;
    this.setState("connecting");
    const { connectTimeoutMs = DEFAULT_CONNECT_TIMEOUT_MS, host, port } =
      this.config;
    const socket = new Socket();
    socket.setNoDelay(true);

    try {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => {
          socket.destroy();
          reject(
            new Error(
              `Connection to ${host}:${port} timed out after ${connectTimeoutMs}ms`,
            ),
          );
        }, connectTimeoutMs);
        socket.once("error", (err) => {
          clearTimeout(timer);
          reject(err);
        });
        socket.connect(port, host, () => {
          clearTimeout(timer);
          socket.removeAllListeners("error");
          resolve();
        });
      });
    } catch (e) {
      this.setState("error");
      throw e;
    }

    socket.on("data", (chunk) => this.dispatchMessage(new Uint8Array(chunk)));
    socket.on("error", (err) => this.dispatchError(err));
    socket.on("close", () => {
      if (this.#socket === socket) this.#socket = undefined;
      this.markClosed();
    });
    this.#socket = socket;
    this.setState("connected");
    this.dispatchOpen();
  }

  async disconnect(): Promise<void> {
    const socket = this.#socket;
    this.#socket = undefined;
    if (socket && !socket.destroyed) {
      await new Promise<void>((resolve) => {
        socket.once("close", () => resolve());
        socket.destroy();
      });
    }
    this.markClosed();
  }

  postMessage(data: Uint8Array): void {
    const socket = this.#socket;
    if (!this.connected || !socket) throw new Error("Transport not connected");
    socket.write(data);
  }
}
