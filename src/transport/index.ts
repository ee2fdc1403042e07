// Transport module exports and registration of the built-in transports.

import type { DeviceTiming } from "../config/project.ts";
import type { ChannelNode } from "../config/project.ts";
import { validateAndGetInt } from "../config/utils.ts";
import { isTcpLikeDriver } from "../config/validators.ts";
import { MockTransport } from "./mock-transport.ts";
import { SerialTransport } from "./serial-transport.ts";
import { TcpTransport } from "./tcp-transport.ts";
import {
  type IModbusTransport,
  type SerialParity,
  type SerialTransportConfig,
  type TransportConfig,
  TransportRegistry,
} from "./transport.ts";
import { UdpTransport } from "./udp-transport.ts";

TransportRegistry.register("serial", (config) => new SerialTransport(config));
TransportRegistry.register("tcp", (config) => new TcpTransport(config));
TransportRegistry.register("udp", (config) => new UdpTransport(config));
TransportRegistry.register("mock", (config) => new MockTransport(config));

export { MockTransport, type MockTransportOptions } from "./mock-transport.ts";
export {
  openSerialPort,
  type SerialPortFactory,
  type SerialPortLike,
  SerialTransport,
} from "./serial-transport.ts";
export { TcpTransport } from "./tcp-transport.ts";
export type {
  IModbusTransport,
  MockTransportConfig,
  SerialTransportConfig,
  TcpTransportConfig,
  TransportConfig,
  TransportEventMap,
  TransportFactory,
  TransportState,
  TransportType,
  UdpTransportConfig,
} from "./transport.ts";
export { BaseTransport, TransportRegistry } from "./transport.ts";
export { UdpTransport } from "./udp-transport.ts";

export function createTransport(config: TransportConfig): IModbusTransport {
  return TransportRegistry.create(config);
}

function toParity(value: string | undefined): SerialParity {
  const s = (value ?? "").toLowerCase();
  return s === "even" || s === "odd" ? s : "none";
}

function toDataBits(value: string | undefined): SerialTransportConfig["dataBits"] {
  switch (validateAndGetInt(value, 8)) {
    case 5:
      return 5;
    case 6:
      return 6;
    case 7:
      return 7;
    default:
      return 8;
  }
}

/**
 * Transport config for a channel. Serial settings come from the
 * communication section; TCP-like drivers read `ip`, `port` and
 * `protocol` from the driver params.
 */
export function transportConfigForChannel(
  channel: ChannelNode,
  timing?: Pick<DeviceTiming, "connectTimeout">,
): TransportConfig {
  if (!isTcpLikeDriver(channel.driver.type)) {
    const comm = channel.communication;
    return {
      baudRate: validateAndGetInt(comm.baud, 9600),
      dataBits: toDataBits(comm.data_bits),
      parity: toParity(comm.parity),
      path: comm.com ?? "COM1",
      rtscts: (comm.flow ?? "").includes("RTS"),
      stopBits: validateAndGetInt(comm.stop, 1) === 2 ? 2 : 1,
      type: "serial",
    };
  }
  const params = channel.driver.params;
  const host = params.ip ?? "127.0.0.1";
  const port = validateAndGetInt(params.port, 502, 1, 65535);
  if ((params.protocol ?? "").toUpperCase() === "UDP") {
    return { host, port, type: "udp" };
  }
  return {
    connectTimeoutMs: timing?.connectTimeout !== undefined
      ? timing.connectTimeout * 1000
      : undefined,
    host,
    port,
    type: "tcp",
  };
}
