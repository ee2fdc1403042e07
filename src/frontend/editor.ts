/**
 * Glue between the project tree and the dialog models: which dialog opens
 * for an add or edit action, and how its result lands in the project.
 */
import {
  createErr,
  createOk,
  isErr,
  type Result,
} from "option-t/plain_result";
import { LOOPBACK_IP, type NetworkAdapter, type NetworkProbe } from "../config/network.ts";
import {
  addChild,
  calculateNextAddress,
  calculateNextId,
  type ChannelNode,
  childrenOf,
  findNode,
  type NodeKind,
  type Project,
  type ProjectNode,
  suggestName,
  updateNode,
} from "../config/project.ts";
import { exportChannel, exportDevice, exportOpcUaSettings } from "../config/serializers.ts";
import { ChannelDialog } from "../dialogs/channelDialog.ts";
import { DeviceDialog } from "../dialogs/deviceDialog.ts";
import type { DialogModel, DialogSection } from "../dialogs/dialog.ts";
import { GroupDialog } from "../dialogs/groupDialog.ts";
import { OpcUaDialog } from "../dialogs/opcuaDialog.ts";
import { TagDialog, tagToDialogData } from "../dialogs/tagDialog.ts";
import { ConfigError } from "../errors.ts";

/** Host facts the dialogs need but the browser cannot discover. */
export interface DialogEnv {
  ports?: readonly string[];
  adapters?: readonly NetworkAdapter[];
  detectedIp?: string;
}

/** Host network lookups answered from the injected facts. */
export function networkFromEnv(env: DialogEnv): NetworkProbe {
  return {
    findAdapterForIp: (ip) => env.adapters?.find((a) => a.ip === ip)?.name ?? null,
    outboundIp: () => env.detectedIp ?? LOOPBACK_IP,
  };
}

/** A dialog on screen plus what OK does with it. */
export interface ActiveDialog {
  readonly title: string;
  readonly sections: readonly DialogSection[];
  accept(project: Project): Result<Project, Error>;
}

const CHILD_KIND: Readonly<Record<NodeKind, NodeKind | undefined>> = {
  Channel: "Device",
  Device: "Tag",
  Group: "Tag",
  Tag: undefined,
};

/** Kind the "Add" action creates under `node`; channels at the root. */
export function childKindFor(node: ProjectNode | undefined): NodeKind | undefined {
  return node ? CHILD_KIND[node.kind] : "Channel";
}

function withValidation<D>(
  dialog: DialogModel<D>,
  apply: (project: Project) => Result<Project, Error>,
): ActiveDialog {
  return {
    accept: (project) => {
      const checked = dialog.validate();
      if (isErr(checked)) return checked;
      return apply(project);
    },
    sections: dialog.sections,
    title: dialog.title,
  };
}

function channelOf(ancestors: readonly ProjectNode[]): ChannelNode | undefined {
  const first = ancestors[0];
  return first?.kind === "Channel" ? first : undefined;
}

/** Dialog that creates a `kind` node under `parentId` (null for the root). */
export function addDialog(
  project: Project,
  parentId: string | null,
  kind: NodeKind,
  env: DialogEnv = {},
): Result<ActiveDialog, ConfigError> {
  if (parentId === null) {
    if (kind !== "Channel") {
      return createErr(new ConfigError(`${kind} needs a parent`));
    }
    const dialog = new ChannelDialog({
      ...env,
      suggestedName: suggestName(project.channels, "Channel"),
    });
    return createOk(
      withValidation(dialog, (p) => addChild(p, null, dialog.toChannelNode())),
    );
  }

  const found = findNode(project, parentId);
  if (!found) return createErr(new ConfigError(`No node with id ${parentId}`));
  const parent = found.node;
  const siblings = childrenOf(parent);

  if (kind === "Device" && parent.kind === "Channel") {
    const dialog = new DeviceDialog(
      parent.driver.type,
      suggestName(siblings, "Device"),
      calculateNextId(parent),
    );
    return createOk(
      withValidation(dialog, (p) => addChild(p, parentId, dialog.toDeviceNode())),
    );
  }
  if (kind === "Group" && (parent.kind === "Device" || parent.kind === "Group")) {
    const dialog = new GroupDialog(suggestName(siblings, "Group"));
    return createOk(
      withValidation(dialog, (p) => addChild(p, parentId, dialog.toGroupNode())),
    );
  }
  if (kind === "Tag" && (parent.kind === "Device" || parent.kind === "Group")) {
    const dialog = new TagDialog(
      (prefix) => calculateNextAddress(parent, prefix),
      suggestName(siblings, "Tag"),
    );
    return createOk(
      withValidation(dialog, (p) => addChild(p, parentId, dialog.toTagNode())),
    );
  }
  return createErr(
    new ConfigError(`${parent.kind} cannot contain ${kind}`, parent.name),
  );
}

/** Dialog preloaded with node `id`; OK replaces the node in place. */
export function editDialog(
  project: Project,
  id: string,
  env: DialogEnv = {},
): Result<ActiveDialog, ConfigError> {
  const found = findNode(project, id);
  if (!found) return createErr(new ConfigError(`No node with id ${id}`));
  const { ancestors, node } = found;

  switch (node.kind) {
    case "Channel": {
      const dialog = new ChannelDialog(env);
      dialog.loadData(exportChannel(node));
      return createOk(
        withValidation(dialog, (p) => updateNode(p, id, dialog.toChannelNode(node))),
      );
    }
    case "Device": {
      const channel = channelOf(ancestors);
      if (!channel) return createErr(new ConfigError("Device has no channel", node.name));
      const dialog = new DeviceDialog(channel.driver.type, node.name, node.deviceId);
      dialog.loadData(exportDevice(node, channel.driver.type));
      return createOk(
        withValidation(dialog, (p) => updateNode(p, id, dialog.toDeviceNode(node))),
      );
    }
    case "Group": {
      const dialog = new GroupDialog(node.name);
      dialog.loadData({ description: node.description, name: node.name });
      return createOk(
        withValidation(dialog, (p) => updateNode(p, id, dialog.toGroupNode(node))),
      );
    }
    case "Tag": {
      const dialog = new TagDialog(undefined, node.name);
      dialog.loadData(tagToDialogData(node));
      return createOk(
        withValidation(dialog, (p) => updateNode(p, id, dialog.toTagNode(node))),
      );
    }
  }
}

/** OPC UA settings dialog; the outbound IP comes from `env`. */
export function opcUaDialog(project: Project, env: DialogEnv = {}): ActiveDialog {
  const dialog = new OpcUaDialog(env.adapters ?? [], networkFromEnv(env).outboundIp);
  dialog.loadData(exportOpcUaSettings(project.opcua));
  return withValidation(dialog, (p) => createOk({ ...p, opcua: dialog.toSettings() }));
}
