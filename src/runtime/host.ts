/**
 * Host discovery: serial ports, network interfaces and the outbound IP.
 */
import { createSocket } from "node:dgram";
import { networkInterfaces } from "node:os";
import { SerialPort } from "serialport";
import {
  createNetworkProbe,
  LOOPBACK_IP,
  listNetworkAdapters,
  type NetworkAdapter,
  type NetworkProbe,
} from "../config/network.ts";

/**
 * Source address the host would use for outbound traffic. A connected UDP
 * socket sends nothing, so this never leaves the machine.
 */
export function detectOutboundIp(
  target = "8.8.8.8",
  port = 80,
): Promise<string> {
  return new Promise((resolve) => {
    const socket = createSocket("udp4");
    const done = (ip: string) => {
      socket.close();
      resolve(ip);
    };
    socket.once("error", () => done(LOOPBACK_IP));
    socket.connect(port, target, () => {
      try {
        done(socket.address().address);
      } catch {
        done(LOOPBACK_IP);
      }
    });
  });
}

export async function listSerialPorts(): Promise<string[]> {
  const ports = await SerialPort.list();
  return ports.map((p) => p.path);
}

export interface HostNetwork {
  adapters: NetworkAdapter[];
  detectedIp: string;
  probe: NetworkProbe;
}

/** Resolve the outbound IP once and snapshot the interface table. */
export async function probeHostNetwork(): Promise<HostNetwork> {
  const detectedIp = await detectOutboundIp();
  const table = networkInterfaces();
  return {
    adapters: listNetworkAdapters(detectedIp, table),
    detectedIp,
    probe: createNetworkProbe(detectedIp, table),
  };
}
