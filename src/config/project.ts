/**
 * Project tree: Channel → Device → (Group →)* Tag, plus OPC UA settings.
 *
 * Tree operations never mutate their input; they return a new project that
 * shares untouched subtrees with the old one.
 */
import { createErr, createOk, type Result } from "option-t/plain_result";
import { ConfigError } from "../errors.ts";
import {
  arraySizeFromAddress,
  addressStep,
  isArrayDataType,
  stripArraySuffix,
} from "./address.ts";
import {
  DEFAULT_DRIVER,
  type DriverType,
  GROUP_SEPARATOR,
  MODBUS_DEFAULT_BLOCK_SIZES,
  MODBUS_DEFAULT_SERIAL_COMM,
  MODBUS_DEFAULT_TAG,
  MODBUS_DEFAULT_TAG_SCALING,
  MODBUS_DEFAULT_TIMING,
  MODBUS_SEQUENCE_WIDTH,
  OPCUA_DEFAULTS,
  type ScalingType,
  type SecurityPolicyKey,
  type TagAccess,
} from "./constants.ts";

export type Flag = 0 | 1;

export interface DeviceTiming {
  /** Seconds; TCP-like drivers only. */
  connectTimeout?: number;
  /** RTU over TCP only. */
  connectAttempts?: number;
  /** Milliseconds. */
  requestTimeout: number;
  attemptsBeforeTimeout: number;
  /** Milliseconds between consecutive requests. */
  interRequestDelay: number;
}

export interface DataAccess {
  zeroBased: Flag;
  zeroBasedBit: Flag;
  bitWrites: Flag;
  func06: Flag;
  func05: Flag;
}

export interface Encoding {
  byteOrder: Flag;
  wordOrder: Flag;
  dwordOrder: Flag;
  bitOrder: Flag;
  treatLongsAsDecimals: Flag;
}

export interface BlockSizes {
  outCoils: number;
  inCoils: number;
  intRegs: number;
  holdRegs: number;
}

export interface Scaling {
  type: ScalingType;
  rawLow: number;
  rawHigh: number;
  scaledLow: number;
  scaledHigh: number;
  scaledType: string;
  clampLow: boolean;
  clampHigh: boolean;
  negate: boolean;
  units: string;
}

export interface TagNode {
  kind: "Tag";
  id: string;
  name: string;
  description: string;
  dataType: string;
  access: TagAccess;
  address: string;
  scanRate: number;
  scaling: Scaling;
}

export interface GroupNode {
  kind: "Group";
  id: string;
  name: string;
  description: string;
  children: TagContainerChild[];
}

export type TagContainerChild = GroupNode | TagNode;

export interface DeviceNode {
  kind: "Device";
  id: string;
  name: string;
  description: string;
  deviceId: number;
  timing: DeviceTiming;
  dataAccess: DataAccess;
  encoding: Encoding;
  blockSizes: BlockSizes;
  children: TagContainerChild[];
}

export interface ChannelNode {
  kind: "Channel";
  id: string;
  name: string;
  description: string;
  driver: { type: DriverType; params: Record<string, string> };
  communication: Record<string, string>;
  devices: DeviceNode[];
}

export type ProjectNode = ChannelNode | DeviceNode | GroupNode | TagNode;
export type NodeKind = ProjectNode["kind"];

export type AuthenticationType = "Anonymous" | "Username/Password";

export interface OpcUaSettings {
  applicationName: string;
  namespace: string;
  port: number;
  productUri: string;
  maxSessions: number;
  publishInterval: number;
  networkAdapter: string;
  networkAdapterIp: string;
  authentication: {
    type: AuthenticationType;
    username: string;
    password: string;
  };
  securityPolicies: Record<SecurityPolicyKey, boolean>;
  certificate: {
    autoGenerate: boolean;
    commonName: string;
    organization: string;
    organizationUnit: string;
    locality: string;
    state: string;
    country: string;
    validityYears: number;
  };
}

export interface Project {
  channels: ChannelNode[];
  opcua: OpcUaSettings;
}

let nodeCounter = 0;

export function nextNodeId(kind: NodeKind): string {
  nodeCounter += 1;
  return `${kind.toLowerCase()}-${nodeCounter}`;
}

export function defaultScaling(): Scaling {
  const d = MODBUS_DEFAULT_TAG_SCALING;
  return {
    clampHigh: false,
    clampLow: false,
    negate: false,
    rawHigh: Number(d.raw_high),
    rawLow: Number(d.raw_low),
    scaledHigh: Number(d.scaled_high),
    scaledLow: Number(d.scaled_low),
    scaledType: d.scaled_type,
    type: "None",
    units: d.units,
  };
}

export function defaultSecurityPolicies(): Record<SecurityPolicyKey, boolean> {
  return {
    policy_encrypt_aes128: false,
    policy_encrypt_aes256: false,
    policy_encrypt_basic256sha256: false,
    policy_none: true,
    policy_sign_aes128: false,
    policy_sign_aes256: false,
    policy_sign_basic256sha256: false,
  };
}

export function defaultOpcUaSettings(): OpcUaSettings {
  const d = OPCUA_DEFAULTS;
  return {
    applicationName: d.application_name,
    authentication: { password: "", type: "Anonymous", username: "" },
    certificate: {
      autoGenerate: d.auto_generate,
      commonName: d.common_name,
      country: d.country,
      locality: d.locality,
      organization: d.organization,
      organizationUnit: d.organization_unit,
      state: d.state,
      validityYears: Number(d.cert_validity),
    },
    maxSessions: Number(d.max_sessions),
    namespace: d.namespace,
    networkAdapter: "",
    networkAdapterIp: "",
    port: Number(d.port),
    productUri: "",
    publishInterval: Number(d.publish_interval),
    securityPolicies: defaultSecurityPolicies(),
  };
}

export function createProject(): Project {
  return { channels: [], opcua: defaultOpcUaSettings() };
}

type Init<N extends ProjectNode> = Partial<Omit<N, "kind" | "id">>;

export function createChannel(init: Init<ChannelNode> = {}): ChannelNode {
  return {
    communication: init.communication ?? { ...MODBUS_DEFAULT_SERIAL_COMM },
    description: init.description ?? "",
    devices: init.devices ?? [],
    driver: init.driver ?? { params: {}, type: DEFAULT_DRIVER },
    id: nextNodeId("Channel"),
    kind: "Channel",
    name: init.name ?? "Channel1",
  };
}

export function createDevice(init: Init<DeviceNode> = {}): DeviceNode {
  const t = MODBUS_DEFAULT_TIMING;
  const b = MODBUS_DEFAULT_BLOCK_SIZES;
  return {
    blockSizes: init.blockSizes ?? {
      holdRegs: Number(b.hold_regs),
      inCoils: Number(b.in_coils),
      intRegs: Number(b.int_regs),
      outCoils: Number(b.out_coils),
    },
    children: init.children ?? [],
    dataAccess: init.dataAccess ?? {
      bitWrites: 0,
      func05: 1,
      func06: 1,
      zeroBased: 0,
      zeroBasedBit: 1,
    },
    description: init.description ?? "",
    deviceId: init.deviceId ?? 1,
    encoding: init.encoding ?? {
      bitOrder: 0,
      byteOrder: 1,
      dwordOrder: 1,
      treatLongsAsDecimals: 0,
      wordOrder: 1,
    },
    id: nextNodeId("Device"),
    kind: "Device",
    name: init.name ?? "Device1",
    timing: init.timing ?? {
      attemptsBeforeTimeout: Number(t.attempts),
      interRequestDelay: Number(t.inter_req_delay),
      requestTimeout: Number(t.req_timeout),
    },
  };
}

export function createGroup(init: Init<GroupNode> = {}): GroupNode {
  return {
    children: init.children ?? [],
    description: init.description ?? "",
    id: nextNodeId("Group"),
    kind: "Group",
    name: init.name ?? "Group1",
  };
}

export function createTag(init: Init<TagNode> = {}): TagNode {
  return {
    access: init.access ?? "Read/Write",
    address: init.address ?? MODBUS_DEFAULT_TAG.address,
    dataType: init.dataType ?? MODBUS_DEFAULT_TAG.data_type,
    description: init.description ?? "",
    id: nextNodeId("Tag"),
    kind: "Tag",
    name: init.name ?? "Tag1",
    scaling: init.scaling ?? defaultScaling(),
    scanRate: init.scanRate ?? Number(MODBUS_DEFAULT_TAG.scan_rate),
  };
}

export function childrenOf(node: ProjectNode): ProjectNode[] {
  switch (node.kind) {
    case "Channel":
      return node.devices;
    case "Device":
    case "Group":
      return node.children;
    case "Tag":
      return [];
  }
}

export interface FoundNode {
  node: ProjectNode;
  /** Outermost first; empty for channels. */
  ancestors: ProjectNode[];
}

export function findNode(project: Project, id: string): FoundNode | undefined {
  const visit = (
    nodes: ProjectNode[],
    ancestors: ProjectNode[],
  ): FoundNode | undefined => {
    for (const node of nodes) {
      if (node.id === id) return { ancestors, node };
      const hit = visit(childrenOf(node), [...ancestors, node]);
      if (hit) return hit;
    }
    return undefined;
  };
  return visit(project.channels, []);
}

/** Apply `fn` bottom-up to every node; `null` drops the node. */
function mapTree(
  project: Project,
  fn: (node: ProjectNode) => ProjectNode | null,
): Project {
  const mapNodes = <N extends ProjectNode>(
    nodes: N[],
    accept: (n: ProjectNode) => n is N,
  ): N[] => {
    const out: N[] = [];
    for (const node of nodes) {
      const mapped = fn(rebuild(node));
      if (mapped !== null && accept(mapped)) out.push(mapped);
    }
    return out;
  };
  const isDevice = (n: ProjectNode): n is DeviceNode => n.kind === "Device";
  const isChannel = (n: ProjectNode): n is ChannelNode => n.kind === "Channel";
  const isChild = (n: ProjectNode): n is TagContainerChild =>
    n.kind === "Group" || n.kind === "Tag";

  const rebuild = (node: ProjectNode): ProjectNode => {
    switch (node.kind) {
      case "Channel":
        return { ...node, devices: mapNodes(node.devices, isDevice) };
      case "Device":
        return { ...node, children: mapNodes(node.children, isChild) };
      case "Group":
        return { ...node, children: mapNodes(node.children, isChild) };
      case "Tag":
        return node;
    }
  };
  return { ...project, channels: mapNodes(project.channels, isChannel) };
}

const ALLOWED_CHILDREN: Readonly<Record<NodeKind, readonly NodeKind[]>> = {
  Channel: ["Device"],
  Device: ["Group", "Tag"],
  Group: ["Group", "Tag"],
  Tag: [],
};

export function canContain(parent: NodeKind, child: NodeKind): boolean {
  return ALLOWED_CHILDREN[parent].includes(child);
}

/** Append `node` to the parent with `parentId`, or to the root for channels. */
export function addChild(
  project: Project,
  parentId: string | null,
  node: ProjectNode,
): Result<Project, ConfigError> {
  if (parentId === null) {
    if (node.kind !== "Channel") {
      return createErr(
        new ConfigError(`${node.kind} cannot be added at the project root`),
      );
    }
    return createOk({ ...project, channels: [...project.channels, node] });
  }
  const parent = findNode(project, parentId);
  if (!parent) return createErr(new ConfigError(`No node with id ${parentId}`));
  if (!canContain(parent.node.kind, node.kind)) {
    return createErr(
      new ConfigError(
        `${parent.node.kind} cannot contain ${node.kind}`,
        parent.node.name,
      ),
    );
  }
  return createOk(
    mapTree(project, (n) => {
      if (n.id !== parentId) return n;
      if (n.kind === "Channel" && node.kind === "Device") {
        return { ...n, devices: [...n.devices, node] };
      }
      if (
        (n.kind === "Device" || n.kind === "Group") &&
        (node.kind === "Group" || node.kind === "Tag")
      ) {
        return { ...n, children: [...n.children, node] };
      }
      return n;
    }),
  );
}

export function removeNode(
  project: Project,
  id: string,
): Result<Project, ConfigError> {
  if (!findNode(project, id)) {
    return createErr(new ConfigError(`No node with id ${id}`));
  }
  return createOk(mapTree(project, (n) => (n.id === id ? null : n)));
}

/**
 * Replace the fields of node `id` with those of `patch`, a node of the same
 * kind (typically fresh from a dialog). Id and children are kept.
 */
export function updateNode(
  project: Project,
  id: string,
  patch: ProjectNode,
): Result<Project, ConfigError> {
  const found = findNode(project, id);
  if (!found) return createErr(new ConfigError(`No node with id ${id}`));
  if (found.node.kind !== patch.kind) {
    return createErr(
      new ConfigError(`Cannot replace ${found.node.kind} with ${patch.kind}`),
    );
  }
  return createOk(
    mapTree(project, (n) => {
      if (n.id !== id) return n;
      if (n.kind === "Channel" && patch.kind === "Channel") {
        return { ...patch, devices: n.devices, id };
      }
      if (n.kind === "Device" && patch.kind === "Device") {
        return { ...patch, children: n.children, id };
      }
      if (n.kind === "Group" && patch.kind === "Group") {
        return { ...patch, children: n.children, id };
      }
      if (n.kind === "Tag" && patch.kind === "Tag") return { ...patch, id };
      return n;
    }),
  );
}

export interface TagEntry {
  tag: TagNode;
  /** Group names from the device down to the tag's parent. */
  path: string[];
}

export function* walkTags(
  container: DeviceNode | GroupNode,
  path: string[] = [],
): Generator<TagEntry> {
  for (const child of container.children) {
    if (child.kind === "Tag") yield { path, tag: child };
    else yield* walkTags(child, [...path, child.name]);
  }
}

export function qualifiedTagName(path: readonly string[], name: string): string {
  return [...path, name].join(GROUP_SEPARATOR);
}

/** Next free device id on the channel: max + 1, within [1, 65535]. */
export function calculateNextId(channel: ChannelNode): number {
  const max = channel.devices.reduce((m, d) => Math.max(m, d.deviceId), 0);
  return Math.min(65535, Math.max(1, max + 1));
}

/**
 * First address after every tag directly under `parent` whose address starts
 * with `prefix`. Arrays occupy `n` elements.
 */
export function calculateNextAddress(
  parent: DeviceNode | GroupNode,
  prefix?: string,
): string {
  let maxEnd = -1;
  for (const child of parent.children) {
    if (child.kind !== "Tag") continue;
    let addr = stripArraySuffix(child.address);
    if (prefix !== undefined) {
      if (!addr.startsWith(prefix)) continue;
      addr = addr.slice(prefix.length);
    }
    const m = /(\d+)/.exec(addr);
    if (!m) continue;
    const start = Number(m[1]);
    const isArray = isArrayDataType(child.dataType) ||
      arraySizeFromAddress(child.address) !== undefined ||
      child.name.toLowerCase().includes("array");
    const elements = isArray ? (arraySizeFromAddress(child.address) ?? 1) : 1;
    const end = start + elements * addressStep(child.dataType) - 1;
    if (end > maxEnd) maxEnd = end;
  }
  const next = maxEnd + 1;
  return prefix === undefined
    ? String(next).padStart(MODBUS_SEQUENCE_WIDTH + 1, "0")
    : prefix + String(next).padStart(MODBUS_SEQUENCE_WIDTH, "0");
}

/** `base + k` for the smallest k ≥ 1 no sibling already uses. */
export function suggestName(
  siblings: ReadonlyArray<{ name: string }>,
  base: string,
): string {
  const used = new Set(siblings.map((s) => s.name));
  let k = 1;
  while (used.has(`${base}${k}`)) k += 1;
  return `${base}${k}`;
}
