// Connected UDP socket; each datagram is one Modbus ADU.
import { createSocket, type Socket } from "node:dgram";
import { isIP } from "node:net";
import { BaseTransport, type UdpTransportConfig } from "./transport.ts";

export class UdpTransport extends BaseTransport<UdpTransportConfig> {
  #socket: Socket | undefined;

  async connect(): Promise<void> {
    if (this.connected) return;
    this.setState("connecting");
    const { host, port } = this.config;
    const socket = createSocket(isIP(host) === 6 ? "udp6" : "udp4");

    try {
      await new Promise<void>((resolve, reject) => {
        socket.once("error", reject);
        socket.connect(port, host, () => {
          socket.off("error", reject);
          resolve();
        });
      });
    } catch (e) {
      socket.close();
      this.setState("error");
      throw e;
    }

    socket.on("message", (msg) => this.dispatchMessage(new Uint8Array(msg)));
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
    if (socket) {
      await new Promise<void>((resolve) => socket.close(() => resolve()));
    }
    this.markClosed();
  }

  postMessage(data: Uint8Array): void {
    const socket = this.#socket;
    if (!this.connected || !socket) throw new Error("Transport not connected");
    socket.send(data, (err) => {
      if (err) this.dispatchError(err);
    });
  }
}
