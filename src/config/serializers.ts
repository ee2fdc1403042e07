/**
 * Project JSON and device tag CSV import / export.
 */
import { parse as parseCsv } from "csv-parse/sync";
import { stringify as stringifyCsv } from "csv-stringify/sync";
import { createErr, createOk, isErr, type Result } from "option-t/plain_result";
import { z } from "zod";
import { ConfigError, toError } from "../errors.ts";
import { arraySizeFromAddress, isArrayDataType } from "./address.ts";
import {
  buildDeviceTimingForDriver,
  deviceTimingFromRecord,
  normalizeOpcUaNetworkAdapter,
} from "./configBuilder.ts";
import {
  DEFAULT_DRIVER,
  type DriverType,
  GROUP_SEPARATOR,
  isDriverType,
  MODBUS_DEFAULT_TAG,
  MODBUS_DEFAULT_TAG_SCALING,
  OPCUA_AUTH_TYPES,
  OPCUA_SECURITY_POLICIES,
  SCALING_TYPES,
  type ScalingType,
  type TagAccess,
} from "./constants.ts";
import { type NetworkProbe, offlineProbe } from "./network.ts";
import {
  type ChannelNode,
  createChannel,
  createDevice,
  createGroup,
  createTag,
  type DeviceNode,
  defaultOpcUaSettings,
  defaultScaling,
  type Flag,
  type GroupNode,
  type OpcUaSettings,
  type Project,
  qualifiedTagName,
  type Scaling,
  type TagContainerChild,
  type TagNode,
  walkTags,
} from "./project.ts";
import type { Dict } from "./utils.ts";
import {
  formatAdapterWithIp,
  isTcpLikeDriver,
  toNumericFlag,
} from "./validators.ts";

// ---------------------------------------------------------------------------
// JSON export

const COMM_KEYS = [
  "com",
  "baud",
  "data_bits",
  "parity",
  "stop",
  "flow",
  "ip",
  "port",
] as const;

const yesNo = (b: boolean) => (b ? "Yes" : "No");

function exportCommunication(channel: ChannelNode): Dict {
  const comm = channel.communication;
  const adapter = comm.network_adapter;
  if (isTcpLikeDriver(channel.driver.type)) {
    if (adapter) {
      return {
        network_adapter: adapter.endsWith(")")
          ? adapter
          : formatAdapterWithIp(adapter, comm.network_adapter_ip),
      };
    }
    if (channel.driver.params.ip && channel.driver.params.port) {
      return { network_adapter: "Default" };
    }
  }
  const out: Dict = {};
  for (const key of COMM_KEYS) {
    if (comm[key] !== undefined) out[key] = comm[key];
  }
  return out;
}

function withChildren(node: Dict, children: Dict[]): Dict {
  return children.length > 0 ? { ...node, children } : node;
}

function exportScaling(s: Scaling): Dict {
  return {
    type: s.type,
    raw_low: s.rawLow,
    raw_high: s.rawHigh,
    scaled_type: s.scaledType,
    scaled_low: s.scaledLow,
    scaled_high: s.scaledHigh,
    clamp_low: yesNo(s.clampLow),
    clamp_high: yesNo(s.clampHigh),
    negate: yesNo(s.negate),
    units: s.units,
  };
}

function exportTag(tag: TagNode): Dict {
  const node: Dict = {
    type: "Tag",
    text: tag.name,
    general: {
      name: tag.name,
      description: tag.description,
      data_type: tag.dataType,
      access: tag.access,
      address: tag.address,
      scan_rate: tag.scanRate,
    },
  };
  if (tag.scaling.type !== "None") node.scaling = exportScaling(tag.scaling);
  return node;
}

function exportChild(child: TagContainerChild): Dict {
  if (child.kind === "Tag") return exportTag(child);
  return withChildren(
    { type: "Group", text: child.name, description: child.description },
    child.children.map(exportChild),
  );
}

export function exportDevice(device: DeviceNode, driver: DriverType): Dict {
  const t = device.timing;
  const { dataAccess: a, encoding: e, blockSizes: b } = device;
  return withChildren(
    {
      type: "Device",
      text: device.name,
      general: {
        name: device.name,
        description: device.description,
        device_id: device.deviceId,
      },
      timing: buildDeviceTimingForDriver(driver, {
        connect_timeout: t.connectTimeout,
        connect_attempts: t.connectAttempts,
        request_timeout: t.requestTimeout,
        attempts_before_timeout: t.attemptsBeforeTimeout,
        inter_request_delay: t.interRequestDelay,
      }),
      data_access: {
        zero_based: a.zeroBased,
        zero_based_bit: a.zeroBasedBit,
        bit_writes: a.bitWrites,
        func_06: a.func06,
        func_05: a.func05,
      },
      encoding: {
        byte_order: e.byteOrder,
        word_order: e.wordOrder,
        dword_order: e.dwordOrder,
        bit_order: e.bitOrder,
        treat_longs_as_decimals: e.treatLongsAsDecimals,
      },
      block_sizes: {
        out_coils: b.outCoils,
        in_coils: b.inCoils,
        int_regs: b.intRegs,
        hold_regs: b.holdRegs,
      },
    },
    device.children.map(exportChild),
  );
}

export function exportChannel(channel: ChannelNode): Dict {
  return withChildren(
    {
      type: "Channel",
      text: channel.name,
      general: {
        channel_name: channel.name,
        description: channel.description,
      },
      driver: { type: channel.driver.type, params: channel.driver.params },
      communication: exportCommunication(channel),
    },
    channel.devices.map((d) => exportDevice(d, channel.driver.type)),
  );
}

export function exportOpcUaSettings(s: OpcUaSettings): Dict {
  const na = s.networkAdapter;
  const ip = s.networkAdapterIp;
  const adapter = na && ip ? `${na} (${ip})` : ip ? `Auto (${ip})` : na;
  const anonymous = s.authentication.type === "Anonymous";
  const c = s.certificate;
  return {
    general: {
      application_name: s.applicationName,
      namespace: s.namespace,
      port: String(s.port),
      product_uri: s.productUri,
      max_sessions: String(s.maxSessions),
      publish_interval: String(s.publishInterval),
      network_adapter: adapter,
    },
    authentication: {
      authentication: s.authentication.type,
      username: anonymous ? "" : s.authentication.username,
      password: anonymous ? "" : s.authentication.password,
    },
    security_policies: Object.fromEntries(
      OPCUA_SECURITY_POLICIES.map((k) => [k, s.securityPolicies[k] ? 1 : 0]),
    ),
    certificate: {
      auto_generate: c.autoGenerate ? 1 : 0,
      common_name: c.commonName,
      organization: c.organization,
      organization_unit: c.organizationUnit,
      locality: c.locality,
      state: c.state,
      country: c.country,
      cert_validity: String(c.validityYears),
    },
  };
}

/** Serialise the whole project, keys in dialog order, 2-space indent. */
export function exportProjectJson(project: Project): string {
  return JSON.stringify(
    {
      type: "Project",
      channels: project.channels.map(exportChannel),
      opcua_settings: exportOpcUaSettings(project.opcua),
    },
    null,
    2,
  );
}

// ---------------------------------------------------------------------------
// JSON import

const scalar = z.union([z.string(), z.number(), z.boolean()]);
const text = scalar.transform(String);
const flag = scalar.nullable().transform(
  (v): Flag => (toNumericFlag(v) === 1 ? 1 : 0),
);
const integer = z.union([z.string(), z.number()]).transform((v, ctx) => {
  const n = typeof v === "number" ? v : Number(v.trim() || Number.NaN);
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a number" });
    return z.NEVER;
  }
  return Math.trunc(n);
});
const decimal = z.union([z.string(), z.number()]).transform((v, ctx) => {
  const n = typeof v === "number" ? v : Number(v.trim() || Number.NaN);
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a number" });
    return z.NEVER;
  }
  return n;
});
const textRecord = z.record(text.nullable()).transform((r) => {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(r)) if (v !== null) out[k] = v;
  return out;
});

const baseNode = z
  .object({
    type: z.string(),
    text: text.optional(),
    children: z.array(z.unknown()).optional(),
  })
  .passthrough();

const driverTypeSchema = z.string().refine(isDriverType, {
  message: "Unknown driver type",
});

const noParams = (): Record<string, string> => ({});

const driverSchema = z.union([
  driverTypeSchema.transform((type) => ({ params: noParams(), type })),
  z
    .object({
      type: z.union([
        driverTypeSchema,
        z.object({ type: driverTypeSchema, params: textRecord.optional() }),
      ]),
      params: textRecord.optional(),
    })
    .transform(({ type, params }) =>
      typeof type === "string"
        ? { params: params ?? {}, type }
        : { params: { ...type.params, ...params }, type: type.type }
    ),
]);

const channelSchema = z.object({
  text: text.optional(),
  general: z
    .object({
      channel_name: text.optional(),
      name: text.optional(),
      description: text.optional(),
    })
    .optional(),
  description: text.optional(),
  driver: driverSchema.optional(),
  communication: textRecord.optional(),
  params: textRecord.optional(),
});

const deviceSchema = z.object({
  text: text.optional(),
  name: text.optional(),
  description: text.optional(),
  device_id: integer.optional(),
  general: z
    .object({
      name: text.optional(),
      description: text.optional(),
      device_id: integer.optional(),
    })
    .optional(),
  timing: z.record(scalar).optional(),
  data_access: z.record(flag).optional(),
  encoding: z.record(flag).optional(),
  block_sizes: z.record(integer).optional(),
});

const tagFields = z.object({
  name: text.optional(),
  description: text.optional(),
  data_type: text.optional(),
  access: text.optional(),
  address: text.optional(),
  scan_rate: integer.optional(),
});

const scalingSchema = z.object({
  type: z.enum(SCALING_TYPES).optional(),
  raw_low: decimal.optional(),
  raw_high: decimal.optional(),
  scaled_type: text.optional(),
  scaled_low: decimal.optional(),
  scaled_high: decimal.optional(),
  clamp_low: scalar.optional(),
  clamp_high: scalar.optional(),
  negate: scalar.optional(),
  units: text.optional(),
});

const tagSchema = tagFields.extend({
  text: text.optional(),
  general: tagFields.optional(),
  scaling: scalingSchema.nullable().optional(),
});

const groupSchema = z.object({
  text: text.optional(),
  description: text.optional(),
  general: z
    .object({ name: text.optional(), description: text.optional() })
    .optional(),
});

const opcuaSchema = z.object({
  general: z.record(scalar).optional(),
  authentication: z.record(scalar).optional(),
  security_policies: z.record(flag).optional(),
  certificate: z.record(scalar).optional(),
});

const projectSchema = z.object({
  type: z.literal("Project").optional(),
  channels: z.array(z.unknown()),
  opcua_settings: z.record(z.unknown()).optional(),
});

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  path: string,
): Result<z.output<S>, ConfigError> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return createOk(parsed.data);
  const issue = parsed.error.issues[0];
  const where = [path, ...issue.path.map(String)].filter(Boolean).join(".");
  return createErr(new ConfigError(issue.message, where || undefined));
}

const ACCESS_ALIASES: Readonly<Record<string, TagAccess>> = {
  "r/w": "Read/Write",
  "read only": "Read Only",
  "read/write": "Read/Write",
  r: "Read Only",
  ro: "Read Only",
  rw: "Read/Write",
};

export function normalizeAccess(value: string | undefined): TagAccess {
  return ACCESS_ALIASES[(value ?? "").trim().toLowerCase()] ?? "Read/Write";
}

function isYes(value: unknown): boolean {
  return ["yes", "true", "1", "enable"].includes(
    String(value ?? "").toLowerCase(),
  );
}

function importScaling(raw: z.infer<typeof scalingSchema>): Scaling {
  const d = defaultScaling();
  const type: ScalingType = raw.type ?? "None";
  return {
    clampHigh: isYes(raw.clamp_high),
    clampLow: isYes(raw.clamp_low),
    negate: isYes(raw.negate),
    rawHigh: raw.raw_high ?? d.rawHigh,
    rawLow: raw.raw_low ?? d.rawLow,
    scaledHigh: raw.scaled_high ?? d.scaledHigh,
    scaledLow: raw.scaled_low ?? d.scaledLow,
    scaledType: raw.scaled_type ?? d.scaledType,
    type,
    units: raw.units ?? d.units,
  };
}

type Importer<T> = (raw: unknown, path: string) => Result<T, ConfigError>;

function importChildren(
  raw: readonly unknown[],
  path: string,
): Result<TagContainerChild[], ConfigError> {
  const out: TagContainerChild[] = [];
  for (const [i, item] of raw.entries()) {
    const at = `${path}.children.${i}`;
    const base = parseWith(baseNode, item, at);
    if (isErr(base)) return base;
    const { type } = base.val;
    const child: Result<TagContainerChild, ConfigError> = type === "Tag"
      ? importTag(item, at)
      : type === "Group"
      ? importGroup(item, at)
      : createErr(new ConfigError(`Unknown node type ${type}`, at));
    if (isErr(child)) return child;
    out.push(child.val);
  }
  return createOk(out);
}

const importTag: Importer<TagNode> = (raw, path) => {
  const parsed = parseWith(tagSchema, raw, path);
  if (isErr(parsed)) return parsed;
  const t = parsed.val;
  const g = t.general ?? {};
  return createOk(
    createTag({
      access: normalizeAccess(g.access ?? t.access),
      address: g.address ?? t.address ?? MODBUS_DEFAULT_TAG.address,
      dataType: g.data_type ?? t.data_type ?? MODBUS_DEFAULT_TAG.data_type,
      description: g.description ?? t.description ?? "",
      name: g.name ?? t.name ?? t.text ?? "",
      scaling: t.scaling ? importScaling(t.scaling) : defaultScaling(),
      scanRate: g.scan_rate ?? t.scan_rate ??
        Number(MODBUS_DEFAULT_TAG.scan_rate),
    }),
  );
};

const importGroup: Importer<GroupNode> = (raw, path) => {
  const parsed = parseWith(groupSchema, raw, path);
  if (isErr(parsed)) return parsed;
  const base = parseWith(baseNode, raw, path);
  if (isErr(base)) return base;
  const children = importChildren(base.val.children ?? [], path);
  if (isErr(children)) return children;
  const g = parsed.val;
  return createOk(
    createGroup({
      children: children.val,
      description: g.general?.description ?? g.description ?? "",
      name: g.general?.name ?? g.text ?? "",
    }),
  );
};

const LEGACY_ENCODING_KEYS: Readonly<Record<string, string>> = {
  dword_low: "dword_order",
  treat_long: "treat_longs_as_decimals",
  word_low: "word_order",
};

function flagOf(
  dict: Record<string, Flag> | undefined,
  key: string,
  fallback: Flag,
): Flag {
  return dict?.[key] ?? fallback;
}

function importDevice(
  raw: unknown,
  path: string,
  driver: DriverType,
): Result<DeviceNode, ConfigError> {
  const parsed = parseWith(deviceSchema, raw, path);
  if (isErr(parsed)) return parsed;
  const base = parseWith(baseNode, raw, path);
  if (isErr(base)) return base;
  const children = importChildren(base.val.children ?? [], path);
  if (isErr(children)) return children;

  const d = parsed.val;
  const defaults = createDevice();
  const timing = deviceTimingFromRecord(
    buildDeviceTimingForDriver(driver, d.timing ?? {}),
  );

  const enc: Record<string, Flag> = { ...d.encoding };
  for (const [legacy, key] of Object.entries(LEGACY_ENCODING_KEYS)) {
    const v = enc[legacy];
    if (v !== undefined && enc[key] === undefined) enc[key] = v;
  }
  const a = d.data_access;
  const da = defaults.dataAccess;
  const de = defaults.encoding;
  const b = d.block_sizes ?? {};
  const db = defaults.blockSizes;

  return createOk(
    createDevice({
      blockSizes: {
        holdRegs: b.hold_regs ?? db.holdRegs,
        inCoils: b.in_coils ?? db.inCoils,
        intRegs: b.int_regs ?? db.intRegs,
        outCoils: b.out_coils ?? db.outCoils,
      },
      children: children.val,
      dataAccess: {
        bitWrites: flagOf(a, "bit_writes", da.bitWrites),
        func05: flagOf(a, "func_05", da.func05),
        func06: flagOf(a, "func_06", da.func06),
        zeroBased: flagOf(a, "zero_based", da.zeroBased),
        zeroBasedBit: flagOf(a, "zero_based_bit", da.zeroBasedBit),
      },
      description: d.general?.description ?? d.description ?? "",
      deviceId: d.general?.device_id ?? d.device_id ?? 1,
      encoding: {
        bitOrder: flagOf(enc, "bit_order", de.bitOrder),
        byteOrder: flagOf(enc, "byte_order", de.byteOrder),
        dwordOrder: flagOf(enc, "dword_order", de.dwordOrder),
        treatLongsAsDecimals: flagOf(
          enc,
          "treat_longs_as_decimals",
          de.treatLongsAsDecimals,
        ),
        wordOrder: flagOf(enc, "word_order", de.wordOrder),
      },
      name: d.general?.name ?? d.name ?? d.text ?? "",
      timing,
    }),
  );
}

const ADAPTER_KEYS = [
  "network_adapter",
  "adapter",
  "adapter_name",
  "adapter_ip",
];

const importChannel: Importer<ChannelNode> = (raw, path) => {
  const parsed = parseWith(channelSchema, raw, path);
  if (isErr(parsed)) return parsed;
  const base = parseWith(baseNode, raw, path);
  if (isErr(base)) return base;
  const c = parsed.val;
  const parsedDriver = c.driver ?? { params: noParams(), type: DEFAULT_DRIVER };
  // Older files keep driver params beside a plain driver string.
  const driver = Object.keys(parsedDriver.params).length > 0 || !c.params
    ? parsedDriver
    : { params: { ...c.params }, type: parsedDriver.type };

  const communication: Record<string, string> = {
    ...(c.communication ?? c.params ?? driver.params),
  };
  if (isTcpLikeDriver(driver.type)) {
    const hasAdapter = ADAPTER_KEYS.some((k) => communication[k]);
    if (!hasAdapter && (communication.ip || communication.port)) {
      delete communication.ip;
      delete communication.port;
      communication.network_adapter = "Default";
    }
  }

  const devices: DeviceNode[] = [];
  for (const [i, item] of (base.val.children ?? []).entries()) {
    const at = `${path}.children.${i}`;
    const kind = parseWith(baseNode, item, at);
    if (isErr(kind)) return kind;
    if (kind.val.type !== "Device") {
      return createErr(
        new ConfigError(`Unknown node type ${kind.val.type}`, at),
      );
    }
    const device = importDevice(item, at, driver.type);
    if (isErr(device)) return device;
    devices.push(device.val);
  }

  return createOk(
    createChannel({
      communication,
      description: c.general?.description ?? c.description ?? "",
      devices,
      driver,
      name: c.general?.channel_name ?? c.general?.name ?? c.text ?? "",
    }),
  );
};

function readInt(dict: Dict, key: string, fallback: number): number {
  const v = dict[key];
  if (v === undefined || v === null || v === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
}

function readText(dict: Dict, key: string, fallback: string): string {
  const v = dict[key];
  return v === undefined || v === null ? fallback : String(v);
}

export function importOpcUaSettings(
  raw: Dict,
  probe: NetworkProbe = offlineProbe,
): Result<OpcUaSettings, ConfigError> {
  const parsed = parseWith(
    opcuaSchema,
    normalizeOpcUaNetworkAdapter(raw, probe),
    "opcua_settings",
  );
  if (isErr(parsed)) return parsed;
  const d = defaultOpcUaSettings();
  const g: Dict = parsed.val.general ?? {};
  const a: Dict = parsed.val.authentication ?? {};
  const p = parsed.val.security_policies ?? {};
  const c: Dict = parsed.val.certificate ?? {};

  const authText = readText(a, "authentication", d.authentication.type);
  const authType = OPCUA_AUTH_TYPES.find((t) => t === authText) ??
    "Anonymous";
  const policies = { ...d.securityPolicies };
  for (const key of OPCUA_SECURITY_POLICIES) {
    const v = p[key];
    if (v !== undefined) policies[key] = v === 1;
  }

  return createOk({
    applicationName: readText(g, "application_name", d.applicationName),
    authentication: {
      password: readText(a, "password", ""),
      type: authType,
      username: readText(a, "username", ""),
    },
    certificate: {
      autoGenerate: c.auto_generate === undefined
        ? d.certificate.autoGenerate
        : toNumericFlag(c.auto_generate) === 1,
      commonName: readText(c, "common_name", d.certificate.commonName),
      country: readText(c, "country", d.certificate.country),
      locality: readText(c, "locality", d.certificate.locality),
      organization: readText(c, "organization", d.certificate.organization),
      organizationUnit: readText(
        c,
        "organization_unit",
        d.certificate.organizationUnit,
      ),
      state: readText(c, "state", d.certificate.state),
      validityYears: readInt(c, "cert_validity", d.certificate.validityYears),
    },
    maxSessions: readInt(g, "max_sessions", d.maxSessions),
    namespace: readText(g, "namespace", d.namespace),
    networkAdapter: readText(g, "network_adapter", ""),
    networkAdapterIp: readText(g, "network_adapter_ip", ""),
    port: readInt(g, "port", d.port),
    productUri: readText(g, "product_uri", ""),
    publishInterval: readInt(g, "publish_interval", d.publishInterval),
    securityPolicies: policies,
  });
}

/** Parse and validate a project document produced by {@link exportProjectJson}. */
export function importProjectJson(
  json: string,
  probe: NetworkProbe = offlineProbe,
): Result<Project, ConfigError> {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (e) {
    return createErr(new ConfigError(`Invalid JSON: ${toError(e).message}`));
  }
  const parsed = parseWith(projectSchema, doc, "");
  if (isErr(parsed)) return parsed;

  const channels: ChannelNode[] = [];
  for (const [i, item] of parsed.val.channels.entries()) {
    const at = `channels.${i}`;
    const kind = parseWith(baseNode, item, at);
    if (isErr(kind)) return kind;
    if (kind.val.type !== "Channel") {
      return createErr(
        new ConfigError(`Unknown node type ${kind.val.type}`, at),
      );
    }
    const channel = importChannel(item, at);
    if (isErr(channel)) return channel;
    channels.push(channel.val);
  }

  const opcuaRaw = parsed.val.opcua_settings;
  if (!opcuaRaw) return createOk({ channels, opcua: defaultOpcUaSettings() });
  const opcua = importOpcUaSettings(opcuaRaw, probe);
  if (isErr(opcua)) return opcua;
  return createOk({ channels, opcua: opcua.val });
}

// ---------------------------------------------------------------------------
// CSV

export const CSV_HEADER = [
  "Tag Name",
  "Address",
  "Data Type",
  "Respect Data Type",
  "Client Access",
  "Scan Rate",
  "Scaling",
  "Raw Low",
  "Raw High",
  "Scaled Low",
  "Scaled High",
  "Scaled Data Type",
  "Clamp Low",
  "Clamp High",
  "Eng Units",
  "Description",
  "Negate Value",
] as const;

type CsvColumn = (typeof CSV_HEADER)[number];

/** `"000103"` → `"103"`, `"000010 [4]"` → `"10 [4]"`, `"000000"` → `"0"`. */
export function stripLeadingZeros(address: string): string {
  const m = /^(\d+)(.*)$/.exec(address);
  if (!m) return address;
  return (m[1].replace(/^0+/, "") || "0") + m[2];
}

/** Left-pad the register digits to six, keeping any `" [n]"`. */
export function padAddress(address: string): string {
  const m = /^(\d+)(.*)$/.exec(address.trim());
  if (!m) return address.trim();
  return m[1].padStart(6, "0") + m[2];
}

function addressNumber(address: string): number {
  const m = /(\d+)/.exec(address);
  return m ? Number(m[1]) : 0;
}

function isArrayTagRow(tag: TagNode): boolean {
  return isArrayDataType(tag.dataType) ||
    arraySizeFromAddress(tag.address) !== undefined ||
    tag.name.toLowerCase().includes("array");
}

function csvRow(tag: TagNode, path: string[]): string[] {
  const s = tag.scaling;
  const scaled = s.type !== "None";
  const cols: Record<CsvColumn, string> = {
    Address: stripLeadingZeros(tag.address),
    "Clamp High": scaled ? yesNo(s.clampHigh) : "",
    "Clamp Low": scaled ? yesNo(s.clampLow) : "",
    "Client Access": tag.access === "Read Only" ? "RO" : "R/W",
    "Data Type": tag.dataType.replace("(Array)", " Array"),
    Description: tag.description,
    "Eng Units": scaled ? s.units : "",
    "Negate Value": scaled ? yesNo(s.negate) : "",
    "Raw High": scaled ? String(s.rawHigh) : "",
    "Raw Low": scaled ? String(s.rawLow) : "",
    "Respect Data Type": "1",
    "Scaled Data Type": scaled ? s.scaledType : "",
    "Scaled High": scaled ? String(s.scaledHigh) : "",
    "Scaled Low": scaled ? String(s.scaledLow) : "",
    Scaling: scaled ? s.type : "",
    "Scan Rate": String(tag.scanRate),
    "Tag Name": qualifiedTagName(path, tag.name),
  };
  return CSV_HEADER.map((h) => cols[h]);
}

/**
 * Device tags as CSV (UTF-8 BOM, CRLF). Scalar tags come first, then
 * arrays; each part is ordered by address number, then qualified name.
 */
export function exportTagsCsv(device: DeviceNode): string {
  const entries = [...walkTags(device)].map(({ tag, path }) => ({
    key: addressNumber(tag.address),
    name: qualifiedTagName(path, tag.name),
    path,
    tag,
  }));
  type Entry = (typeof entries)[number];
  const byAddress = (a: Entry, b: Entry) =>
    a.key - b.key || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
  const scalars = entries.filter((e) => !isArrayTagRow(e.tag));
  const arrays = entries.filter((e) => isArrayTagRow(e.tag));
  const rows = [...scalars.sort(byAddress), ...arrays.sort(byAddress)].map(
    (e) => csvRow(e.tag, e.path),
  );

  return stringifyCsv([[...CSV_HEADER], ...rows], {
    bom: true,
    record_delimiter: "windows",
  });
}

const csvRowsSchema = z.array(z.array(z.string()));

function scalingFromCsv(cell: (column: CsvColumn) => string): Scaling {
  const d = defaultScaling();
  const type = SCALING_TYPES.find((t) => t === cell("Scaling"));
  if (!type || type === "None") return d;
  const num = (column: CsvColumn, fallback: number) => {
    const v = cell(column);
    const n = Number(v);
    return v !== "" && Number.isFinite(n) ? n : fallback;
  };
  return {
    clampHigh: isYes(cell("Clamp High")),
    clampLow: isYes(cell("Clamp Low")),
    negate: isYes(cell("Negate Value")),
    rawHigh: num("Raw High", d.rawHigh),
    rawLow: num("Raw Low", d.rawLow),
    scaledHigh: num("Scaled High", d.scaledHigh),
    scaledLow: num("Scaled Low", d.scaledLow),
    scaledType: cell("Scaled Data Type") ||
      MODBUS_DEFAULT_TAG_SCALING.scaled_type,
    type,
    units: cell("Eng Units"),
  };
}

function upsert(
  children: TagContainerChild[],
  groups: string[],
  tag: TagNode,
): TagContainerChild[] {
  const [head, ...rest] = groups;
  if (head === undefined) {
    const at = children.findIndex(
      (c) => c.kind === "Tag" && c.name === tag.name,
    );
    if (at < 0) return [...children, tag];
    const next = [...children];
    next[at] = { ...tag, id: children[at].id };
    return next;
  }
  const at = children.findIndex((c) => c.kind === "Group" && c.name === head);
  const existing = at >= 0 ? children[at] : undefined;
  const group = existing?.kind === "Group"
    ? existing
    : createGroup({ name: head });
  const updated: GroupNode = {
    ...group,
    children: upsert(group.children, rest, tag),
  };
  if (at < 0) return [...children, updated];
  const next = [...children];
  next[at] = updated;
  return next;
}

/**
 * Merge tag rows into `device`. Dotted names create or reuse groups; a tag
 * already present under the same parent is updated in place.
 */
export function importTagsCsv(
  device: DeviceNode,
  csv: string,
): Result<DeviceNode, ConfigError> {
  let rows: string[][];
  try {
    const parsed = csvRowsSchema.safeParse(
      parseCsv(csv, {
        bom: true,
        relax_column_count: true,
        skip_empty_lines: true,
        trim: true,
      }),
    );
    if (!parsed.success) return createErr(new ConfigError("Malformed CSV"));
    rows = parsed.data;
  } catch (e) {
    return createErr(new ConfigError(`Malformed CSV: ${toError(e).message}`));
  }

  const [header = [], ...body] = rows;
  const index = new Map(header.map((h, i) => [h, i]));
  if (!index.has("Tag Name")) {
    return createErr(new ConfigError("Missing column", "Tag Name"));
  }

  let children = device.children;
  for (const row of body) {
    const cell = (column: CsvColumn) => {
      const i = index.get(column);
      return i === undefined ? "" : (row[i] ?? "");
    };
    const fullName = cell("Tag Name");
    if (!fullName) continue;
    const parts = fullName.split(GROUP_SEPARATOR);
    const name = parts.pop() ?? fullName;
    const scan = Number(cell("Scan Rate"));

    const tag = createTag({
      access: normalizeAccess(cell("Client Access")),
      address: padAddress(cell("Address") || MODBUS_DEFAULT_TAG.address),
      dataType: cell("Data Type").replace(/ Array$/, "(Array)") ||
        MODBUS_DEFAULT_TAG.data_type,
      description: cell("Description"),
      name,
      scaling: scalingFromCsv(cell),
      scanRate: cell("Scan Rate") !== "" && Number.isFinite(scan)
        ? Math.trunc(scan)
        : Number(MODBUS_DEFAULT_TAG.scan_rate),
    });
    children = upsert(children, parts, tag);
  }
  return createOk({ ...device, children });
}
