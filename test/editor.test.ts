import { isErr, isOk, type Result } from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import {
  createChannel,
  createDevice,
  createGroup,
  createProject,
  createTag,
  type Project,
} from "../src/config/project.ts";
import type { FormBuilder } from "../src/forms/formBuilder.ts";
import {
  type ActiveDialog,
  addDialog,
  childKindFor,
  editDialog,
  opcUaDialog,
  networkFromEnv,
} from "../src/frontend/editor.ts";

function formOf(dialog: ActiveDialog, id: string): FormBuilder {
  const s = dialog.sections.find((x) => x.id === id);
  if (!s) throw new Error(`no section ${id}`);
  return s.form;
}

function opened<T>(res: Result<T, Error>): T {
  if (!isOk(res)) throw res.err;
  return res.val;
}

function accepted(dialog: ActiveDialog, project: Project): Project {
  const res = dialog.accept(project);
  if (!isOk(res)) throw res.err;
  return res.val;
}

function sampleProject() {
  const tag = createTag({ address: "400010", name: "Speed" });
  const group = createGroup({ children: [tag], name: "Motors" });
  const device = createDevice({ children: [group], deviceId: 5, name: "PLC" });
  const channel = createChannel({ devices: [device], name: "Line1" });
  const project: Project = { ...createProject(), channels: [channel] };
  return { channel, device, group, project, tag };
}

describe("childKindFor", () => {
  it("follows the tree levels", () => {
    const { channel, device, group, tag } = sampleProject();
    expect(childKindFor(undefined)).toBe("Channel");
    expect(childKindFor(channel)).toBe("Device");
    expect(childKindFor(device)).toBe("Tag");
    expect(childKindFor(group)).toBe("Tag");
    expect(childKindFor(tag)).toBeUndefined();
  });
});

describe("addDialog", () => {
  it("adds a channel at the root with a free name", () => {
    const { project } = sampleProject();
    const dialog = opened(addDialog(project, null, "Channel"));
    expect(dialog.title).toBe("Channel Properties");
    expect(formOf(dialog, "general").getValue("channel_name")).toBe("Channel1");
    const next = accepted(dialog, project);
    expect(next.channels.map((c) => c.name)).toEqual(["Line1", "Channel1"]);
  });

  it("only channels go at the root", () => {
    const res = addDialog(createProject(), null, "Device");
    expect(isErr(res) && res.err.message).toBe("Device needs a parent");
  });

  it("suggests the next device id and name", () => {
    const { channel, project } = sampleProject();
    const dialog = opened(addDialog(project, channel.id, "Device"));
    const general = formOf(dialog, "general");
    expect(general.getValue("name")).toBe("Device1");
    expect(general.getValue("device_id")).toBe("6");
    const next = accepted(dialog, project);
    expect(next.channels[0].devices.map((d) => [d.name, d.deviceId])).toEqual([
      ["PLC", 5],
      ["Device1", 6],
    ]);
  });

  it("adds tags and groups under a group", () => {
    const { group, project } = sampleProject();
    const tagDialog = opened(addDialog(project, group.id, "Tag"));
    expect(formOf(tagDialog, "general").getValue("name")).toBe("Tag1");
    const withTag = accepted(tagDialog, project);
    const groupDialog = opened(addDialog(withTag, group.id, "Group"));
    const next = accepted(groupDialog, withTag);

    const motors = next.channels[0].devices[0].children[0];
    if (motors.kind !== "Group") throw new Error("expected group");
    expect(motors.children.map((c) => [c.kind, c.name])).toEqual([
      ["Tag", "Speed"],
      ["Tag", "Tag1"],
      ["Group", "Group1"],
    ]);
  });

  it("refuses children a node cannot hold", () => {
    const { group, project } = sampleProject();
    const res = addDialog(project, group.id, "Device");
    expect(isErr(res) && res.err.message).toBe("Motors: Group cannot contain Device");
  });

  it("keeps the project when validation fails", () => {
    const project = createProject();
    const dialog = opened(addDialog(project, null, "Channel"));
    formOf(dialog, "general").setValue("channel_name", " ");
    const res = dialog.accept(project);
    expect(isErr(res) && res.err.message).toBe("Channel name is required");
  });
});

describe("editDialog", () => {
  it("renames a channel and keeps its devices", () => {
    const { channel, project } = sampleProject();
    const dialog = opened(editDialog(project, channel.id));
    const general = formOf(dialog, "general");
    expect(general.getValue("channel_name")).toBe("Line1");
    general.setValue("channel_name", "Line2");
    const next = accepted(dialog, project);
    expect(next.channels[0]).toMatchObject({ id: channel.id, name: "Line2" });
    expect(next.channels[0].devices.map((d) => d.name)).toEqual(["PLC"]);
  });

  it("loads device fields", () => {
    const { device, project } = sampleProject();
    const dialog = opened(editDialog(project, device.id));
    expect(formOf(dialog, "general").getValues()).toMatchObject({
      device_id: "5",
      name: "PLC",
    });
  });

  it("loads tag fields and keeps the tag id", () => {
    const { project, tag } = sampleProject();
    const dialog = opened(editDialog(project, tag.id));
    const general = formOf(dialog, "general");
    expect(general.getValue("address")).toBe("400010");
    general.setValue("scan_rate", "250");
    const next = accepted(dialog, project);
    const motors = next.channels[0].devices[0].children[0];
    if (motors.kind !== "Group") throw new Error("expected group");
    expect(motors.children[0]).toMatchObject({ id: tag.id, name: "Speed", scanRate: 250 });
  });

  it("renames a group", () => {
    const { group, project } = sampleProject();
    const dialog = opened(editDialog(project, group.id));
    formOf(dialog, "general").setValue("name", "Pumps");
    const next = accepted(dialog, project);
    expect(next.channels[0].devices[0].children[0]).toMatchObject({
      id: group.id,
      name: "Pumps",
    });
  });

  it("reports unknown ids", () => {
    const res = editDialog(createProject(), "nope");
    expect(isErr(res) && res.err.message).toBe("No node with id nope");
  });
});

describe("opcUaDialog", () => {
  it("writes settings back into the project", () => {
    const project = createProject();
    const dialog = opcUaDialog(project);
    formOf(dialog, "general").setValue("port", "4841");
    expect(accepted(dialog, project).opcua.port).toBe(4841);
  });

  it("rejects a bad port", () => {
    const project = createProject();
    const dialog = opcUaDialog(project);
    formOf(dialog, "general").setValue("port", "0");
    const res = dialog.accept(project);
    expect(isErr(res) && res.err.message).toBe("Port must be between 1 and 65535");
  });
});

describe("networkFromEnv", () => {
  it("answers from the injected host facts", () => {
    const network = networkFromEnv({
      adapters: [{ display: "eth0 (10.0.0.9)", ip: "10.0.0.9", name: "eth0" }],
      detectedIp: "10.0.0.9",
    });
    expect(network.outboundIp()).toBe("10.0.0.9");
    expect(network.findAdapterForIp("10.0.0.9")).toBe("eth0");
    expect(network.findAdapterForIp("10.0.0.8")).toBeNull();
  });

  it("falls back to loopback without host facts", () => {
    expect(networkFromEnv({}).outboundIp()).toBe("127.0.0.1");
  });
});
