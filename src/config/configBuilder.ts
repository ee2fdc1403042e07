/**
 * Driver-dependent normalisation of channel communication params, OPC UA
 * adapter settings and device timing.
 */
import { MODBUS_DEFAULT_TIMING } from "./constants.ts";
import { type NetworkProbe, offlineProbe } from "./network.ts";
import type { DeviceTiming } from "./project.ts";
import {
  type Dict,
  asString,
  getSection,
  isRecord,
  pick,
  validateAndGetInt,
} from "./utils.ts";
import { isTcpLikeDriver, parseAdapterString } from "./validators.ts";

const ADAPTER_ALIASES = ["adapter", "adapter_name", "adapter_ip"] as const;

export function normalizeCommunicationParams(
  params: Dict,
  driverType: string | undefined,
  probe: NetworkProbe = offlineProbe,
): Dict {
  const out: Dict = { ...params };
  if (!isTcpLikeDriver(driverType)) return out;

  const raw = ADAPTER_ALIASES.map((key) => asString(out[key])?.trim())
    .find((v) => v);
  for (const key of ADAPTER_ALIASES) delete out[key];

  if (raw) {
    const [name, ip] = parseAdapterString(raw);
    if (name) out.network_adapter = name;
    if (ip) out.network_adapter_ip = ip;
    return out;
  }

  const ip = asString(out.ip);
  if (ip && out.network_adapter === undefined) {
    const iface = probe.findAdapterForIp(ip);
    if (iface) {
      out.network_adapter = `${iface} (${ip})`;
      out.network_adapter_ip = ip;
    } else {
      const detected = probe.outboundIp();
      out.network_adapter = `Auto (${detected})`;
      out.network_adapter_ip = detected;
    }
  }
  return out;
}

/**
 * Split `general.network_adapter` ("Name (ip)") into name and ip. Settings
 * without a `general` section are normalised at the top level. A missing
 * IP falls back to the detected outbound address.
 */
export function normalizeOpcUaNetworkAdapter(
  settings: Dict,
  probe: NetworkProbe = offlineProbe,
): Dict {
  const out: Dict = structuredClone(settings);
  const nested = isRecord(out.general);
  const gen: Dict = nested ? getSection(out, "general") : out;

  const adapter = asString(gen.network_adapter);
  if (adapter) {
    const [name, ip] = parseAdapterString(adapter);
    if (name) gen.network_adapter = name;
    if (ip) gen.network_adapter_ip = ip;
  }
  if (!asString(gen.network_adapter_ip)) {
    gen.network_adapter_ip = probe.outboundIp();
  }
  return out;
}

export type TimingKey =
  | "connect_timeout"
  | "connect_attempts"
  | "request_timeout"
  | "attempts_before_timeout"
  | "inter_request_delay";

export const TIMING_DEFAULTS: Readonly<Record<TimingKey, number>> = {
  attempts_before_timeout: Number(MODBUS_DEFAULT_TIMING.attempts),
  connect_attempts: Number(MODBUS_DEFAULT_TIMING.connect_attempts),
  connect_timeout: Number(MODBUS_DEFAULT_TIMING.connect_timeout),
  inter_request_delay: Number(MODBUS_DEFAULT_TIMING.inter_req_delay),
  request_timeout: Number(MODBUS_DEFAULT_TIMING.req_timeout),
};

/** Dialog field names accepted for each timing key. */
export const TIMING_ALIASES: Readonly<Record<TimingKey, readonly string[]>> = {
  attempts_before_timeout: ["attempts"],
  connect_attempts: [],
  connect_timeout: [],
  inter_request_delay: ["inter_req_delay"],
  request_timeout: ["req_timeout"],
};

export function timingKeysForDriver(
  driverType: string | undefined,
): TimingKey[] {
  const low = (driverType ?? "").toLowerCase();
  if (low.includes("over tcp")) {
    return [
      "connect_timeout",
      "connect_attempts",
      "request_timeout",
      "attempts_before_timeout",
      "inter_request_delay",
    ];
  }
  if (low.includes("tcp") || low.includes("ethernet")) {
    return [
      "connect_timeout",
      "request_timeout",
      "attempts_before_timeout",
      "inter_request_delay",
    ];
  }
  return ["request_timeout", "attempts_before_timeout", "inter_request_delay"];
}

/**
 * Timing dictionary holding exactly the keys the driver uses. Values come
 * from `timing` (canonical name first, then aliases) or the defaults.
 */
export function buildDeviceTimingForDriver(
  driverType: string | undefined,
  timing: Dict = {},
): Record<string, number> {
  const out: Record<string, number> = {};
  for (const key of timingKeysForDriver(driverType)) {
    const raw = pick(timing, key, ...TIMING_ALIASES[key]);
    out[key] = validateAndGetInt(raw, TIMING_DEFAULTS[key]);
  }
  return out;
}

/** Camel-cased {@link DeviceTiming} from a driver timing dictionary. */
export function deviceTimingFromRecord(
  timing: Readonly<Record<string, number>>,
): DeviceTiming {
  const out: DeviceTiming = {
    attemptsBeforeTimeout: timing.attempts_before_timeout ??
      TIMING_DEFAULTS.attempts_before_timeout,
    interRequestDelay: timing.inter_request_delay ??
      TIMING_DEFAULTS.inter_request_delay,
    requestTimeout: timing.request_timeout ?? TIMING_DEFAULTS.request_timeout,
  };
  if (timing.connect_timeout !== undefined) {
    out.connectTimeout = timing.connect_timeout;
  }
  if (timing.connect_attempts !== undefined) {
    out.connectAttempts = timing.connect_attempts;
  }
  return out;
}
