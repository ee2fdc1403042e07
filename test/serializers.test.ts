import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import {
  createChannel,
  createDevice,
  createGroup,
  createProject,
  createTag,
  defaultScaling,
  type Project,
} from "../src/config/project.ts";
import {
  CSV_HEADER,
  exportProjectJson,
  exportTagsCsv,
  importProjectJson,
  importTagsCsv,
  padAddress,
  stripLeadingZeros,
} from "../src/config/serializers.ts";

function sampleProject(): Project {
  const serial = createChannel({
    communication: {
      baud: "9600",
      com: "COM3",
      data_bits: "8",
      flow: "None",
      parity: "None",
      stop: "1",
    },
    devices: [
      createDevice({
        children: [
          createTag({
            address: "400001",
            dataType: "Float",
            name: "Flow",
            scaling: {
              ...defaultScaling(),
              clampHigh: true,
              rawHigh: 4095,
              scaledHigh: 100,
              type: "Linear",
              units: "m3/h",
            },
          }),
          createGroup({
            children: [createTag({ address: "000003", dataType: "Boolean" })],
            name: "Valves",
          }),
        ],
        deviceId: 2,
        name: "Meter",
      }),
    ],
    name: "Serial1",
  });
  const tcp = createChannel({
    communication: {
      network_adapter: "eth0",
      network_adapter_ip: "192.168.1.20",
    },
    devices: [createDevice({ name: "PLC" })],
    driver: {
      params: { ip: "192.168.1.50", port: "502", protocol: "TCP/IP" },
      type: "Modbus TCP/IP Ethernet",
    },
    name: "Ethernet1",
  });
  return { ...createProject(), channels: [serial, tcp] };
}

describe("exportProjectJson", () => {
  const doc = JSON.parse(exportProjectJson(sampleProject()));

  it("writes the project envelope in order", () => {
    expect(Object.keys(doc)).toEqual(["type", "channels", "opcua_settings"]);
    expect(doc.type).toBe("Project");
  });

  it("writes serial channels with ordered communication keys", () => {
    const ch = doc.channels[0];
    expect(Object.keys(ch)).toEqual([
      "type",
      "text",
      "general",
      "driver",
      "communication",
      "children",
    ]);
    expect(ch.general).toEqual({ channel_name: "Serial1", description: "" });
    expect(ch.driver).toEqual({ params: {}, type: "Modbus RTU Serial" });
    expect(Object.keys(ch.communication)).toEqual([
      "com",
      "baud",
      "data_bits",
      "parity",
      "stop",
      "flow",
    ]);
  });

  it("writes devices with driver-specific timing and numeric flags", () => {
    const dev = doc.channels[0].children[0];
    expect(dev.general).toEqual({
      description: "",
      device_id: 2,
      name: "Meter",
    });
    expect(dev.timing).toEqual({
      attempts_before_timeout: 1,
      inter_request_delay: 0,
      request_timeout: 1000,
    });
    expect(dev.data_access).toEqual({
      bit_writes: 0,
      func_05: 1,
      func_06: 1,
      zero_based: 0,
      zero_based_bit: 1,
    });
    expect(dev.block_sizes).toEqual({
      hold_regs: 120,
      in_coils: 2000,
      int_regs: 120,
      out_coils: 2000,
    });
    const tcpDev = doc.channels[1].children[0];
    expect(tcpDev.timing).toEqual({
      attempts_before_timeout: 1,
      connect_timeout: 3,
      inter_request_delay: 0,
      request_timeout: 1000,
    });
    expect(tcpDev.children).toBeUndefined();
  });

  it("writes tags with scaling only when enabled", () => {
    const [flow, group] = doc.channels[0].children[0].children;
    expect(flow.general).toEqual({
      access: "Read/Write",
      address: "400001",
      data_type: "Float",
      description: "",
      name: "Flow",
      scan_rate: 10,
    });
    expect(flow.scaling).toEqual({
      clamp_high: "Yes",
      clamp_low: "No",
      negate: "No",
      raw_high: 4095,
      raw_low: 0,
      scaled_high: 100,
      scaled_low: 0,
      scaled_type: "Float",
      type: "Linear",
      units: "m3/h",
    });
    expect(group).toMatchObject({ description: "", text: "Valves", type: "Group" });
    expect(group.children[0].scaling).toBeUndefined();
  });

  it("collapses TCP communication to the adapter label", () => {
    expect(doc.channels[1].communication).toEqual({
      network_adapter: "eth0 (192.168.1.20)",
    });
  });

  it("writes OPC UA settings", () => {
    const opc = doc.opcua_settings;
    expect(opc.general).toEqual({
      application_name: "ModUA",
      max_sessions: "4096",
      namespace: "ModUA",
      network_adapter: "",
      port: "48480",
      product_uri: "",
      publish_interval: "1000",
    });
    expect(opc.authentication).toEqual({
      authentication: "Anonymous",
      password: "",
      username: "",
    });
    expect(opc.security_policies.policy_none).toBe(1);
    expect(opc.security_policies.policy_sign_aes128).toBe(0);
    expect(opc.certificate.auto_generate).toBe(1);
    expect(opc.certificate.cert_validity).toBe("20");
  });

  it("clears credentials for anonymous access", () => {
    const project = sampleProject();
    project.opcua.authentication.username = "operator";
    project.opcua.authentication.password = "test-secret";
    const opc = JSON.parse(exportProjectJson(project)).opcua_settings;
    expect(opc.authentication.username).toBe("");
    expect(opc.authentication.password).toBe("");
  });
});

describe("importProjectJson", () => {
  it("restores an exported project", () => {
    const project = unwrapOk(importProjectJson(exportProjectJson(sampleProject())));
    const [serial, tcp] = project.channels;
    expect(serial.name).toBe("Serial1");
    expect(serial.communication.com).toBe("COM3");
    const meter = serial.devices[0];
    expect(meter.deviceId).toBe(2);
    expect(meter.timing).toEqual({
      attemptsBeforeTimeout: 1,
      interRequestDelay: 0,
      requestTimeout: 1000,
    });
    const flow = meter.children[0];
    expect(flow.kind).toBe("Tag");
    expect(flow.kind === "Tag" && flow.scaling).toEqual({
      ...defaultScaling(),
      clampHigh: true,
      rawHigh: 4095,
      scaledHigh: 100,
      type: "Linear",
      units: "m3/h",
    });
    expect(meter.children[1]).toMatchObject({ kind: "Group", name: "Valves" });
    expect(tcp.driver).toEqual({
      params: { ip: "192.168.1.50", port: "502", protocol: "TCP/IP" },
      type: "Modbus TCP/IP Ethernet",
    });
    expect(tcp.communication).toEqual({
      network_adapter: "eth0 (192.168.1.20)",
    });
    expect(tcp.devices[0].timing.connectTimeout).toBe(3);
    expect(project.opcua.networkAdapterIp).toBe("127.0.0.1");
    expect(project.opcua.port).toBe(48480);
  });

  it("accepts legacy layouts", () => {
    const legacy = {
      channels: [
        {
          children: [
            {
              block_sizes: { hold_regs: "64" },
              children: [
                {
                  access: "R/W",
                  address: "400005",
                  data_type: "Float",
                  name: "Flow",
                  scan_rate: "100",
                  type: "Tag",
                },
              ],
              data_access: { zero_based: "Enable" },
              encoding: { dword_low: "Disable", treat_long: "Enable", word_low: 0 },
              general: { device_id: "4", name: "Dev" },
              timing: { attempts: 2, req_timeout: "500" },
              type: "Device",
            },
          ],
          driver: "Modbus RTU over TCP",
          general: { name: "Legacy" },
          params: { ip: "10.0.0.9", port: "502" },
          type: "Channel",
        },
      ],
    };
    const project = unwrapOk(importProjectJson(JSON.stringify(legacy)));
    const channel = project.channels[0];
    expect(channel.name).toBe("Legacy");
    expect(channel.driver).toEqual({
      params: { ip: "10.0.0.9", port: "502" },
      type: "Modbus RTU over TCP",
    });
    expect(channel.communication).toEqual({ network_adapter: "Default" });

    const dev = channel.devices[0];
    expect(dev.deviceId).toBe(4);
    expect(dev.timing).toEqual({
      attemptsBeforeTimeout: 2,
      connectAttempts: 1,
      connectTimeout: 3,
      interRequestDelay: 0,
      requestTimeout: 500,
    });
    expect(dev.dataAccess.zeroBased).toBe(1);
    expect(dev.encoding).toEqual({
      bitOrder: 0,
      byteOrder: 1,
      dwordOrder: 0,
      treatLongsAsDecimals: 1,
      wordOrder: 0,
    });
    expect(dev.blockSizes).toEqual({
      holdRegs: 64,
      inCoils: 2000,
      intRegs: 120,
      outCoils: 2000,
    });
    expect(dev.children[0]).toMatchObject({
      access: "Read/Write",
      address: "400005",
      dataType: "Float",
      kind: "Tag",
      name: "Flow",
      scanRate: 100,
    });
    expect(project.opcua.applicationName).toBe("ModUA");
  });

  it("accepts the nested driver form", () => {
    const doc = {
      channels: [
        {
          driver: {
            params: { port: "1502" },
            type: {
              params: { ip: "10.0.0.1", port: "502" },
              type: "Modbus TCP/IP Ethernet",
            },
          },
          text: "Nested",
          type: "Channel",
        },
      ],
    };
    const channel = unwrapOk(importProjectJson(JSON.stringify(doc))).channels[0];
    expect(channel.name).toBe("Nested");
    expect(channel.driver).toEqual({
      params: { ip: "10.0.0.1", port: "1502" },
      type: "Modbus TCP/IP Ethernet",
    });
  });

  it("rejects malformed JSON", () => {
    const result = importProjectJson("{ nope");
    expect(isErr(result)).toBe(true);
    expect(unwrapErr(result).message).toMatch(/^Invalid JSON: /);
  });

  it("rejects unknown node types with their path", () => {
    const doc = {
      channels: [
        {
          children: [
            { children: [{ type: "Widget" }], general: {}, type: "Device" },
          ],
          driver: "Modbus RTU Serial",
          type: "Channel",
        },
      ],
    };
    const err = unwrapErr(importProjectJson(JSON.stringify(doc)));
    expect(err.message).toBe(
      "channels.0.children.0.children.0: Unknown node type Widget",
    );
  });

  it("rejects unknown drivers", () => {
    const doc = { channels: [{ driver: "CAN bus", type: "Channel" }] };
    const err = unwrapErr(importProjectJson(JSON.stringify(doc)));
    expect(err.name).toBe("ConfigError");
    expect(err.path?.startsWith("channels.0")).toBe(true);
  });
});

describe("CSV address helpers", () => {
  it("strips and restores leading zeros", () => {
    expect(stripLeadingZeros("000103")).toBe("103");
    expect(stripLeadingZeros("000000")).toBe("0");
    expect(stripLeadingZeros("400000 [25]")).toBe("400000 [25]");
    expect(stripLeadingZeros("000010 [4]")).toBe("10 [4]");
    expect(padAddress("103")).toBe("000103");
    expect(padAddress("10 [4]")).toBe("000010 [4]");
  });
});

describe("exportTagsCsv", () => {
  it("writes scalars before arrays ordered by address", () => {
    const device = createDevice({
      children: [
        createTag({
          address: "400003",
          dataType: "Word",
          description: "Boiler temp",
          name: "Temp",
        }),
        createGroup({
          children: [
            createTag({
              access: "Read Only",
              address: "300001",
              dataType: "Float",
              description: "a, b",
              name: "Flow",
              scaling: {
                ...defaultScaling(),
                clampLow: true,
                rawHigh: 4095,
                scaledHigh: 100,
                type: "Linear",
                units: "m3/h",
              },
            }),
          ],
          name: "Line",
        }),
        createTag({
          address: "400010 [4]",
          dataType: "Word(Array)",
          name: "Buf",
        }),
        createTag({ address: "000002", dataType: "Boolean", name: "Coil" }),
      ],
    });
    const blank = (n: number) => Array<string>(n).fill("");
    const expected = [
      CSV_HEADER.join(","),
      ["Coil", "2", "Boolean", "1", "R/W", "10", ...blank(11)].join(","),
      [
        "Line.Flow",
        "300001",
        "Float",
        "1",
        "RO",
        "10",
        "Linear",
        "0",
        "4095",
        "0",
        "100",
        "Float",
        "Yes",
        "No",
        "m3/h",
        '"a, b"',
        "No",
      ].join(","),
      [
        "Temp",
        "400003",
        "Word",
        "1",
        "R/W",
        "10",
        ...blank(9),
        "Boiler temp",
        "",
      ].join(","),
      ["Buf", "400010 [4]", "Word Array", "1", "R/W", "10", ...blank(11)].join(
        ",",
      ),
    ];
    expect(exportTagsCsv(device)).toBe(`\uFEFF${expected.join("\r\n")}\r\n`);
  });
});

describe("importTagsCsv", () => {
  const header = CSV_HEADER.join(",");

  it("updates existing tags and creates groups", () => {
    const existing = createTag({ address: "400001", name: "Temp" });
    const device = createDevice({ children: [existing] });
    const csv = [
      header,
      "Temp,103,Float,1,RO,500,,,,,,,,,,updated,",
      "Line.Flow,300001,Word,1,R/W,100,Linear,0,4095,0,100,Float,Yes,No,m3/h,,No",
      "Line.Buf,400010 [4],Word Array,1,R/W,10,None,,,,,,,,,,",
      ",1,Word,1,R/W,10,,,,,,,,,,,",
    ].join("\r\n");

    const result = unwrapOk(importTagsCsv(device, `\uFEFF${csv}`));
    expect(result.children).toHaveLength(2);
    const temp = result.children[0];
    expect(temp).toMatchObject({
      access: "Read Only",
      address: "000103",
      dataType: "Float",
      description: "updated",
      id: existing.id,
      kind: "Tag",
      scanRate: 500,
    });

    const line = result.children[1];
    expect(line.kind).toBe("Group");
    if (line.kind !== "Group") return;
    expect(line.name).toBe("Line");
    const [flow, buf] = line.children;
    expect(flow.kind === "Tag" && flow.scaling).toEqual({
      clampHigh: false,
      clampLow: true,
      negate: false,
      rawHigh: 4095,
      rawLow: 0,
      scaledHigh: 100,
      scaledLow: 0,
      scaledType: "Float",
      type: "Linear",
      units: "m3/h",
    });
    expect(buf).toMatchObject({
      address: "400010 [4]",
      dataType: "Word(Array)",
      name: "Buf",
    });
    expect(buf.kind === "Tag" && buf.scaling.type).toBe("None");
  });

  it("reuses existing groups", () => {
    const device = createDevice({
      children: [createGroup({ children: [], name: "Line" })],
    });
    const csv = `${header}\nLine.A,400001,Word,1,R/W,10,,,,,,,,,,,\n`;
    const result = unwrapOk(importTagsCsv(device, csv));
    expect(result.children).toHaveLength(1);
    const line = result.children[0];
    expect(line.kind === "Group" && line.children.map((c) => c.name)).toEqual([
      "A",
    ]);
  });

  it("requires the Tag Name column", () => {
    const err = unwrapErr(importTagsCsv(createDevice(), "Name,Address\nX,1\n"));
    expect(err.message).toBe("Tag Name: Missing column");
  });
});
