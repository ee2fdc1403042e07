import fc from "fast-check";
import { isErr, unwrapErr, unwrapOk } from "option-t/plain_result";
import { describe, expect, it, vi } from "vitest";
import {
  ENABLE_CHOICES,
  OPCUA_AUTH_TYPES,
  OPCUA_SECURITY_POLICIES,
  SERIAL_BAUD_RATES,
  SERIAL_PARITY,
  TCP_PROTOCOLS,
} from "../src/config/constants.ts";
import type { NetworkAdapter } from "../src/config/network.ts";
import {
  createChannel,
  createTag,
  defaultScaling,
} from "../src/config/project.ts";
import { ChannelDialog } from "../src/dialogs/channelDialog.ts";
import {
  DeviceDialog,
  normalizeBlockSizes,
} from "../src/dialogs/deviceDialog.ts";
import { GroupDialog } from "../src/dialogs/groupDialog.ts";
import { OpcUaDialog } from "../src/dialogs/opcuaDialog.ts";
import { TagDialog, tagToDialogData } from "../src/dialogs/tagDialog.ts";
import { WriteValueDialog } from "../src/dialogs/writeValueDialog.ts";

const eth0: NetworkAdapter = {
  display: "eth0 (192.168.1.10)",
  ip: "192.168.1.10",
  name: "eth0",
};

describe("ChannelDialog", () => {
  it("starts as a serial channel with default communication", () => {
    const dialog = new ChannelDialog();
    const data = dialog.getData();
    expect(data.general).toEqual({ channel_name: "Channel1", description: "" });
    expect(data.driver).toEqual({ params: {}, type: "Modbus RTU Serial" });
    expect(data.communication).toEqual({
      baud: "9600",
      com: "COM1",
      data_bits: "8",
      flow: "None",
      parity: "None",
      stop: "1",
    });
    expect(data.params).toEqual(data.communication);
  });

  it("rebuilds the dependent sections when the driver combo changes", () => {
    const dialog = new ChannelDialog({ detectedIp: "10.0.0.9" });
    dialog.driver.form.setValue("type", "Modbus TCP/IP Ethernet");
    expect(dialog.isTcp).toBe(true);
    const data = dialog.getData();
    expect(data.communication).toEqual({ adapter: "Auto - 10.0.0.9" });
    expect(data.driver).toEqual({
      params: { ip: "127.0.0.1", port: "502", protocol: "TCP/IP" },
      type: "Modbus TCP/IP Ethernet",
    });
    expect(dialog.communication.form.has("baud")).toBe(false);
  });

  it("validates name, ip and port", () => {
    const dialog = new ChannelDialog();
    dialog.setDriver("Modbus TCP/IP Ethernet");
    expect(isErr(dialog.validate())).toBe(false);

    dialog.driverParams.form.setValue("ip", "999.1.1.1");
    expect(unwrapErr(dialog.validate()).field).toBe("ip");

    dialog.driverParams.form.setValue("ip", "10.0.0.5");
    dialog.driverParams.form.setValue("port", "0");
    expect(unwrapErr(dialog.validate()).field).toBe("port");

    dialog.general.form.setValue("channel_name", "  ");
    expect(unwrapErr(dialog.validate()).field).toBe("channel_name");
  });

  it("loads a nested TCP channel and builds its node", () => {
    const dialog = new ChannelDialog({ adapters: [eth0] });
    dialog.loadData({
      communication: {
        network_adapter: "eth0",
        network_adapter_ip: "192.168.1.10",
      },
      driver: {
        params: { ip: "10.0.0.5", port: "503" },
        type: "Modbus RTU over TCP",
      },
      general: { channel_name: "Plant" },
    });
    const data = dialog.getData();
    expect(data.name).toBe("Plant");
    expect(data.communication).toEqual({ adapter: "eth0 (192.168.1.10)" });
    expect(data.driver.params).toEqual({
      ip: "10.0.0.5",
      port: "503",
      protocol: "TCP/IP",
    });

    const base = createChannel({ name: "Old" });
    const node = dialog.toChannelNode(base);
    expect(node.id).toBe(base.id);
    expect(node.name).toBe("Plant");
    expect(node.communication).toEqual({
      network_adapter: "eth0",
      network_adapter_ip: "192.168.1.10",
    });
  });

  it("adds a stored adapter that is not listed", () => {
    const dialog = new ChannelDialog({ adapters: [eth0] });
    dialog.loadData({
      communication: { network_adapter: "wlan0", network_adapter_ip: "10.1.1.2" },
      driver: "Modbus TCP/IP Ethernet",
      name: "Remote",
    });
    expect(dialog.communication.form.field("adapter")?.options).toEqual([
      "eth0 (192.168.1.10)",
      "wlan0 (10.1.1.2)",
    ]);
    expect(dialog.communication.form.getValue("adapter")).toBe(
      "wlan0 (10.1.1.2)",
    );
  });

  it("loads flat data with a string driver and params", () => {
    const dialog = new ChannelDialog({ ports: ["COM1", "COM2"] });
    dialog.loadData({
      description: "line 2",
      driver: "Modbus RTU Serial",
      name: "Line",
      params: { baud: "19200", com: "COM2" },
    });
    const data = dialog.getData();
    expect(data.general).toEqual({ channel_name: "Line", description: "line 2" });
    expect(data.communication.com).toBe("COM2");
    expect(data.communication.baud).toBe("19200");
  });
});

describe("DeviceDialog", () => {
  it("shows the timing fields each driver uses", () => {
    const ids = (d: DeviceDialog) => d.timing.form.fields().map((f) => f.id);
    expect(ids(new DeviceDialog("Modbus RTU Serial"))).toEqual([
      "req_timeout",
      "attempts",
      "inter_req_delay",
    ]);
    expect(ids(new DeviceDialog("Modbus TCP/IP Ethernet"))).toEqual([
      "connect_timeout",
      "req_timeout",
      "attempts",
      "inter_req_delay",
    ]);
    expect(new DeviceDialog("Modbus RTU over TCP").getData().timing).toEqual({
      attempts_before_timeout: 1,
      connect_attempts: 1,
      connect_timeout: 3,
      inter_request_delay: 0,
      request_timeout: 1000,
    });
  });

  it("loads stored flags and timing and builds the node", () => {
    const dialog = new DeviceDialog();
    dialog.loadData({
      block_sizes: { hold_regs: 64 },
      data_access: { func_06: "disable", zero_based: 1 },
      encoding: { bit_order: true, byte_order: 0 },
      general: { device_id: "7", name: "Meter" },
      timing: { attempts_before_timeout: 3, request_timeout: 2500 },
    });
    const data = dialog.getData();
    expect(data.general).toEqual({ description: "", device_id: 7, name: "Meter" });
    expect(data.timing).toEqual({
      attempts_before_timeout: 3,
      inter_request_delay: 0,
      request_timeout: 2500,
    });
    expect(data.data_access).toEqual({
      bit_writes: "Disable",
      func_05: "Enable",
      func_06: "Disable",
      zero_based: "Enable",
      zero_based_bit: "Enable",
    });
    expect(data.block_sizes).toEqual({
      hold_regs: 64,
      in_coils: 2000,
      int_regs: 120,
      out_coils: 2000,
    });

    const node = dialog.toDeviceNode();
    expect(node.deviceId).toBe(7);
    expect(node.dataAccess).toEqual({
      bitWrites: 0,
      func05: 1,
      func06: 0,
      zeroBased: 1,
      zeroBasedBit: 1,
    });
    expect(node.encoding).toEqual({
      bitOrder: 1,
      byteOrder: 0,
      dwordOrder: 1,
      treatLongsAsDecimals: 0,
      wordOrder: 1,
    });
    expect(node.timing).toEqual({
      attemptsBeforeTimeout: 3,
      interRequestDelay: 0,
      requestTimeout: 2500,
    });
  });

  it("keeps the suggested id when none is loaded", () => {
    const dialog = new DeviceDialog("Modbus RTU Serial", "Device2", 2);
    dialog.loadData({ name: "Pump" });
    expect(dialog.getData().device_id).toBe(2);
  });

  it("validates the name and device id", () => {
    const dialog = new DeviceDialog();
    dialog.general.form.setValue("device_id", "0");
    expect(unwrapErr(dialog.validate()).field).toBe("device_id");
    dialog.general.form.setValue("device_id", "65535");
    dialog.general.form.setValue("name", "");
    expect(unwrapErr(dialog.validate()).field).toBe("name");
  });
});

describe("normalizeBlockSizes", () => {
  it("maps aliases without overriding canonical keys", () => {
    expect(
      normalizeBlockSizes({
        "Holding Registers": "50",
        "Input Coils": "900",
        "Internal Registers": "60",
        "Output Coils": "800",
        hold_regs: "100",
      }),
    ).toEqual({ hold_regs: 100, in_coils: 900, int_regs: 60, out_coils: 800 });
    expect(normalizeBlockSizes({ "Input Registers": 30 })).toEqual({
      int_regs: 30,
    });
  });

  it("spreads a bare number over both register kinds", () => {
    expect(normalizeBlockSizes(64)).toEqual({ hold_regs: 64, int_regs: 64 });
    expect(normalizeBlockSizes("32")).toEqual({ hold_regs: 32, int_regs: 32 });
  });

  it("skips empty and non-numeric values", () => {
    expect(normalizeBlockSizes({ hold_regs: "", out_coils: "lots" })).toEqual(
      {},
    );
    expect(normalizeBlockSizes(null)).toEqual({});
  });
});

describe("GroupDialog", () => {
  it("round-trips nested data", () => {
    const dialog = new GroupDialog("Group3");
    expect(dialog.getData().name).toBe("Group3");
    dialog.loadData({ general: { description: "pumps", name: "Pumps" } });
    expect(dialog.getData()).toEqual({
      description: "pumps",
      general: { description: "pumps", name: "Pumps" },
      name: "Pumps",
    });
    dialog.loadData({ description: "", name: "" });
    expect(unwrapErr(dialog.validate()).field).toBe("name");
  });
});

describe("OpcUaDialog", () => {
  const detect = () => "10.1.1.1";

  it("derives the product URI from the adapter IP", () => {
    const dialog = new OpcUaDialog([eth0], detect);
    expect(dialog.general.form.getValue("network_adapter_ip")).toBe(
      "192.168.1.10",
    );
    expect(dialog.general.form.getValue("product_uri")).toBe(
      "opc.tcp://192.168.1.10:48480/",
    );
  });

  it("uses the outbound IP for empty and loopback hosts", () => {
    const dialog = new OpcUaDialog([], detect);
    expect(dialog.productUri()).toBe("opc.tcp://10.1.1.1:48480/");
    dialog.general.form.setValue("port", "");
    expect(dialog.productUri()).toBe("opc.tcp://10.1.1.1:4848/");

    const lo = { display: "lo (127.0.0.1)", ip: "127.0.0.1", name: "lo" };
    expect(new OpcUaDialog([lo], detect).productUri()).toBe(
      "opc.tcp://10.1.1.1:48480/",
    );
  });

  it("toggles credentials and certificate fields", () => {
    const dialog = new OpcUaDialog([eth0], detect);
    const auth = dialog.authentication.form;
    expect(auth.field("username")?.visible).toBe(false);
    auth.setValue("authentication", "Username/Password");
    expect(auth.field("username")?.visible).toBe(true);
    expect(unwrapErr(dialog.validate()).field).toBe("username");

    const cert = dialog.certificate.form;
    expect(cert.field("organization")?.enabled).toBe(false);
    cert.setValue("auto_generate", false);
    expect(cert.field("organization")?.enabled).toBe(true);
  });

  it("loads nested settings and adds an unknown adapter", () => {
    const dialog = new OpcUaDialog([eth0], detect);
    dialog.loadData({
      authentication: {
        authentication: "Username/Password",
        password: "test-secret",
        username: "operator",
      },
      certificate: { auto_generate: false, organization: "ACME" },
      general: {
        application_name: "Plant UA",
        network_adapter: "lan (172.16.0.4)",
        network_adapter_ip: "172.16.0.4",
        port: "4840",
      },
      security_policies: { policy_none: 0, policy_sign_aes128: 1 },
    });
    const data = dialog.getData();
    expect(data.general.network_adapter).toBe("lan (172.16.0.4)");
    expect(data.general.product_uri).toBe("opc.tcp://172.16.0.4:4840/");
    expect(data.authentication).toEqual({
      authentication: "Username/Password",
      password: "test-secret",
      username: "operator",
    });
    expect(data.username).toBe("operator");
    expect(data.security_policies.policy_none).toBe(false);
    expect(data.policy_sign_aes128).toBe(true);
    expect(data.certificate.organization).toBe("ACME");

    const settings = dialog.toSettings();
    expect(settings.applicationName).toBe("Plant UA");
    expect(settings.networkAdapter).toBe("lan");
    expect(settings.networkAdapterIp).toBe("172.16.0.4");
    expect(settings.port).toBe(4840);
    expect(settings.authentication).toEqual({
      password: "test-secret",
      type: "Username/Password",
      username: "operator",
    });
    expect(settings.certificate.autoGenerate).toBe(false);
  });

  it("selects a listed adapter by IP or adds an Auto entry", () => {
    const known = new OpcUaDialog([eth0], detect);
    known.loadData({ general: { network_adapter_ip: "192.168.1.10" } });
    expect(known.general.form.getValue("network_adapter")).toBe(
      "eth0 (192.168.1.10)",
    );

    const unknown = new OpcUaDialog([eth0], detect);
    unknown.loadData({ network_adapter_ip: "10.9.9.9" });
    expect(unknown.general.form.getValue("network_adapter")).toBe(
      "Auto - 10.9.9.9",
    );
    expect(unknown.productUri()).toBe("opc.tcp://10.9.9.9:48480/");
  });

  it("matches a stored adapter without an IP by name", () => {
    const eth1 = { display: "eth1 (10.0.0.7)", ip: "10.0.0.7", name: "eth1" };
    const dialog = new OpcUaDialog([eth0, eth1], detect);
    dialog.loadData({ general: { network_adapter: "eth1" } });
    expect(dialog.general.form.getValue("network_adapter")).toBe("eth1 (10.0.0.7)");
    expect(dialog.getData().general.network_adapter_ip).toBe("10.0.0.7");
    expect(dialog.productUri()).toBe("opc.tcp://10.0.0.7:48480/");
  });

  it("accepts the legacy application name key", () => {
    const dialog = new OpcUaDialog([eth0], detect);
    dialog.loadData({ application_Name: "Legacy" });
    expect(dialog.getData().application_name).toBe("Legacy");
  });
});

describe("TagDialog", () => {
  it("re-prefixes the address when the data type changes", () => {
    const dialog = new TagDialog();
    const g = dialog.general.form;
    expect(g.getValue("address")).toBe("400000");
    g.setValue("data_type", "Boolean");
    expect(g.getValue("address")).toBe("000000");
    expect(dialog.scaling.form.getValue("type")).toBe("None");
    expect(dialog.scaling.form.field("type")?.enabled).toBe(false);
  });

  it("keeps the register number across access changes", () => {
    const dialog = new TagDialog();
    const g = dialog.general.form;
    g.setValue("address", "400012");
    g.setValue("access", "Read Only");
    expect(g.getValue("address")).toBe("300012");
  });

  it("carries the array size for array types", () => {
    const dialog = new TagDialog();
    const g = dialog.general.form;
    g.setValue("data_type", "Float(Array)");
    expect(g.getValue("address")).toBe("400000 [1]");
    g.setValue("address", "400010 [4]");
    expect(g.getValue("address")).toBe("400010 [4]");
  });

  it("asks for the next free address on new tags", () => {
    const next = vi.fn((prefix: string) => `${prefix}00005`);
    const dialog = new TagDialog(next);
    expect(dialog.general.form.getValue("address")).toBe("400005");
    dialog.general.form.setValue("data_type", "Boolean");
    expect(dialog.general.form.getValue("address")).toBe("000005");
    expect(next.mock.calls.map(([p]) => p)).toEqual(["4", "0"]);
  });

  it("shows scaling parameters only when scaling is on", () => {
    const dialog = new TagDialog();
    const s = dialog.scaling.form;
    expect(s.field("raw_low")?.visible).toBe(false);
    s.setValue("type", "Linear");
    expect(s.field("raw_low")?.visible).toBe(true);
  });

  it("round-trips an existing tag", () => {
    const tag = createTag({
      access: "Read Only",
      address: "300020",
      dataType: "Float",
      name: "Flow",
      scaling: {
        ...defaultScaling(),
        rawHigh: 4095,
        scaledHigh: 100,
        type: "Linear",
        units: "m3/h",
      },
      scanRate: 500,
    });
    const dialog = new TagDialog();
    dialog.loadData(tagToDialogData(tag));
    expect(dialog.getData().scaling.raw_high).toBe("4095");
    expect(dialog.toTagNode(tag)).toEqual(tag);
  });

  it("validates name and scan rate", () => {
    const dialog = new TagDialog();
    dialog.general.form.setValue("scan_rate", "0");
    expect(unwrapErr(dialog.validate()).field).toBe("scan_rate");
    dialog.general.form.setValue("scan_rate", "600000");
    expect(isErr(dialog.validate())).toBe(false);
    dialog.general.form.setValue("name", "");
    expect(unwrapErr(dialog.validate()).field).toBe("name");
  });
});

describe("WriteValueDialog", () => {
  const dialogFor = (data_type: string) =>
    new WriteValueDialog({ data_type }, () => {});

  it("parses booleans", () => {
    const d = dialogFor("Boolean");
    expect(unwrapOk(d.parseValue("on"))).toBe(true);
    expect(unwrapOk(d.parseValue("0"))).toBe(false);
    expect(isErr(d.parseValue("maybe"))).toBe(true);
  });

  it("parses floats and integers by type name", () => {
    expect(unwrapOk(dialogFor("Float").parseValue("3.5"))).toBe(3.5);
    expect(isErr(dialogFor("Double").parseValue("abc"))).toBe(true);
    expect(unwrapOk(dialogFor("Word").parseValue("-12"))).toBe(-12);
    expect(isErr(dialogFor("DWord").parseValue("1.5"))).toBe(true);
    expect(unwrapOk(dialogFor("String").parseValue(" hello "))).toBe("hello");
    expect(unwrapErr(dialogFor("Word").parseValue("  ")).field).toBe("value");
  });

  it("emits the write request", () => {
    const onWrite = vi.fn();
    const dialog = new WriteValueDialog(
      {
        address: "40",
        data_type: "Word",
        function_code: "6",
        name: "Setpoint",
        read_write: "Read/Write",
      },
      onWrite,
    );
    dialog.form.setValue("value", "12");
    expect(unwrapOk(dialog.submit())).toEqual({
      address: 40,
      functionCode: 6,
      value: 12,
    });
    expect(onWrite).toHaveBeenCalledWith({ address: 40, functionCode: 6, value: 12 });
  });

  it("defaults address and function code", () => {
    const onWrite = vi.fn();
    new WriteValueDialog({ data_type: "Float" }, onWrite).submit("1.25");
    expect(onWrite).toHaveBeenCalledWith({
      address: 0,
      functionCode: 16,
      value: 1.25,
    });
  });

  it("refuses read-only tags", () => {
    const onWrite = vi.fn();
    const dialog = new WriteValueDialog(
      { data_type: "Word", read_write: "Read Only" },
      onWrite,
    );
    expect(dialog.form.field("value")?.enabled).toBe(false);
    expect(isErr(dialog.submit("1"))).toBe(true);
    expect(onWrite).not.toHaveBeenCalled();
  });
});

describe("getData / loadData round trips", () => {
  const eth1: NetworkAdapter = {
    display: "eth1 (10.0.0.7)",
    ip: "10.0.0.7",
    name: "eth1",
  };
  const oneOf = <T>(items: readonly T[]) =>
    fc.integer({ max: items.length - 1, min: 0 }).map((i) => items[i]);

  it("keeps serial channel fields", () => {
    fc.assert(
      fc.property(
        fc.string(),
        fc.string(),
        oneOf(["COM1", "COM2"]),
        oneOf(SERIAL_BAUD_RATES),
        oneOf(SERIAL_PARITY),
        (name, description, com, baud, parity) => {
          const a = new ChannelDialog({ ports: ["COM1", "COM2"] });
          a.general.form.setValues({ channel_name: name, description });
          a.communication.form.setValues({ baud, com, parity });
          const b = new ChannelDialog({ ports: ["COM1", "COM2"] });
          b.loadData(a.getData());
          expect(b.getData()).toEqual(a.getData());
        },
      ),
    );
  });

  it("keeps TCP channel fields and the chosen adapter", () => {
    fc.assert(
      fc.property(
        fc.string(),
        fc.string(),
        fc.string(),
        oneOf(TCP_PROTOCOLS),
        oneOf([eth0, eth1]),
        (name, ip, port, protocol, adapter) => {
          const a = new ChannelDialog({ adapters: [eth0, eth1] });
          a.setDriver("Modbus TCP/IP Ethernet");
          a.general.form.setValue("channel_name", name);
          a.driverParams.form.setValues({ ip, port, protocol });
          a.communication.form.setValue("adapter", adapter.display);
          const b = new ChannelDialog({ adapters: [eth0, eth1] });
          b.loadData(a.getData());
          expect(b.getData()).toEqual(a.getData());
          expect(b.getData().communication).toEqual({ adapter: adapter.display });
        },
      ),
    );
  });

  it("keeps device fields", () => {
    fc.assert(
      fc.property(
        fc.string(),
        fc.integer({ max: 65535, min: 1 }),
        fc.integer({ max: 60000, min: 0 }),
        fc.integer({ max: 2000, min: 1 }),
        oneOf(ENABLE_CHOICES),
        oneOf(ENABLE_CHOICES),
        (name, id, timeout, block, zeroBased, wordOrder) => {
          const a = new DeviceDialog("Modbus RTU over TCP");
          a.general.form.setValues({ device_id: id, name });
          a.timing.form.setValues({ connect_attempts: 3, req_timeout: timeout });
          a.blockSizes.form.setValue("hold_regs", block);
          a.dataAccess.form.setValue("zero_based", zeroBased);
          a.encoding.form.setValue("word_order", wordOrder);
          const b = new DeviceDialog("Modbus RTU over TCP");
          b.loadData(a.getData());
          expect(b.getData()).toEqual(a.getData());
        },
      ),
    );
  });

  it("keeps OPC UA settings and the chosen adapter", () => {
    const detect = () => "10.1.1.1";
    fc.assert(
      fc.property(
        fc.string(),
        fc.string(),
        oneOf([eth0, eth1]),
        oneOf(OPCUA_AUTH_TYPES),
        oneOf(OPCUA_SECURITY_POLICIES),
        fc.boolean(),
        (appName, user, adapter, auth, policy, autoGenerate) => {
          const a = new OpcUaDialog([eth0, eth1], detect);
          a.general.form.setValues({
            application_name: appName,
            network_adapter: adapter.display,
            port: "4841",
          });
          a.authentication.form.setValues({
            authentication: auth,
            password: "test-secret",
            username: user,
          });
          a.policies.form.setValue(policy, true);
          a.certificate.form.setValue("auto_generate", autoGenerate);
          const b = new OpcUaDialog([eth0, eth1], detect);
          b.loadData(a.getData());
          expect(b.getData()).toEqual(a.getData());
          expect(b.getData().general.network_adapter_ip).toBe(adapter.ip);
        },
      ),
    );
  });
});
