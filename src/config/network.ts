/**
 * Network adapter listing and the probe interface used by config
 * normalisation. Nothing here touches the OS: callers pass the interface
 * table and the detected outbound address (see `runtime/host.ts`).
 */
import type { NetworkInterfaceInfo } from "node:os";

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface NetworkAdapter {
  name: string;
  ip: string;
  /** `"name (ip)"` as shown in adapter combos. */
  display: string;
}

/** Synchronous view of the host network used by config normalisation. */
export interface NetworkProbe {
  findAdapterForIp(ip: string): string | null;
  outboundIp(): string;
}

export const LOOPBACK_IP = "127.0.0.1";

function ipv4Entries(
  table: InterfaceTable,
): Array<{ name: string; address: string }> {
  const out: Array<{ name: string; address: string }> = [];
  for (const [name, infos] of Object.entries(table)) {
    for (const info of infos ?? []) {
      if (info.family === "IPv4") out.push({ address: info.address, name });
    }
  }
  return out;
}

export function formatAdapterDisplay(
  name: string | undefined,
  ip: string | undefined,
): string {
  if (name && ip) return `${name} (${ip})`;
  if (ip) return `Auto (${ip})`;
  return `Default (${LOOPBACK_IP})`;
}

/**
 * Non-loopback IPv4 adapters. When there are none the list holds a single
 * `"Auto (ip)"` entry built from `fallbackIp`.
 */
export function listNetworkAdapters(
  fallbackIp: string,
  table: InterfaceTable,
): NetworkAdapter[] {
  const adapters = ipv4Entries(table)
    .filter(({ address }) => !address.startsWith("127."))
    .map(({ name, address }) => ({
      display: formatAdapterDisplay(name, address),
      ip: address,
      name,
    }));
  if (adapters.length > 0) return adapters;
  return [
    {
      display: formatAdapterDisplay(undefined, fallbackIp),
      ip: fallbackIp,
      name: "Auto",
    },
  ];
}

export function findAdapterForIp(
  ip: string,
  table: InterfaceTable,
): string | null {
  return ipv4Entries(table).find(({ address }) => address === ip)?.name ??
    null;
}

export function createNetworkProbe(
  detectedIp: string,
  table: InterfaceTable,
): NetworkProbe {
  return {
    findAdapterForIp: (ip) => findAdapterForIp(ip, table),
    outboundIp: () => detectedIp,
  };
}

/** Probe for tests and offline use: knows no adapters. */
export const offlineProbe: NetworkProbe = {
  findAdapterForIp: () => null,
  outboundIp: () => LOOPBACK_IP,
};
