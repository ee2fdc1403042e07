import type { Result } from "option-t/plain_result";
import { normalizeCommunicationParams } from "../config/configBuilder.ts";
import {
  DEFAULT_DRIVER,
  DRIVER_TYPES,
  type DriverType,
  isDriverType,
  MODBUS_DEFAULT_SERIAL_COMM,
  MODBUS_DEFAULT_TCP_PARAMS,
  SERIAL_BAUD_RATES,
  SERIAL_DATA_BITS,
  SERIAL_FLOW_CONTROL,
  SERIAL_PARITY,
  SERIAL_STOP_BITS,
  TCP_PROTOCOLS,
} from "../config/constants.ts";
import type { NetworkAdapter } from "../config/network.ts";
import { type ChannelNode, createChannel } from "../config/project.ts";
import {
  asString,
  type Dict,
  getSection,
  isRecord,
  toStringRecord,
} from "../config/utils.ts";
import {
  formatAdapterWithIp,
  isTcpLikeDriver,
  isValidIp,
  isValidPort,
} from "../config/validators.ts";
import type { ValidationError } from "../errors.ts";
import {
  type DialogModel,
  invalid,
  section,
  valid,
} from "./dialog.ts";

export interface ChannelDialogData {
  name: string;
  description: string;
  /** Driver params and communication merged, as older callers expect. */
  params: Record<string, string>;
  general: { channel_name: string; description: string };
  driver: { type: DriverType; params: Record<string, string> };
  communication: Record<string, string>;
}

export interface ChannelDialogOptions {
  ports?: readonly string[];
  adapters?: readonly NetworkAdapter[];
  /** Used for the `"Auto - ip"` entry when no adapter is listed. */
  detectedIp?: string;
  suggestedName?: string;
}

export class ChannelDialog implements DialogModel<ChannelDialogData> {
  readonly title = "Channel Properties";
  readonly general = section("general", "General");
  readonly driver = section("driver", "Driver");
  readonly communication = section("communication", "Communication");
  readonly driverParams = section("driverParams", "Driver Settings");
  readonly sections = [
    this.general,
    this.driver,
    this.communication,
    this.driverParams,
  ];

  #ports: string[];
  #adapters: string[];
  #driverType: DriverType = DEFAULT_DRIVER;

  constructor(options: ChannelDialogOptions = {}) {
    const { adapters = [], detectedIp = "127.0.0.1", ports = [] } = options;
    this.#ports = ports.length > 0 ? [...ports] : ["COM1"];
    this.#adapters = adapters.length > 0
      ? adapters.map((a) => a.display)
      : [`Auto - ${detectedIp}`];

    this.general.form
      .addField(
        "channel_name",
        "Channel Name:",
        "text",
        [],
        options.suggestedName ?? "Channel1",
      )
      .addField("description", "Description:");
    this.driver.form.addField(
      "type",
      "Select Driver:",
      "combo",
      DRIVER_TYPES,
      DEFAULT_DRIVER,
    );
    this.#buildDriverFields();

    // Picking another driver in the combo swaps the dependent sections.
    this.driver.form.subscribe(() => {
      const type = this.driverType;
      if (type !== this.#driverType) this.setDriver(type);
    });
  }

  get driverType(): DriverType {
    const v = this.driver.form.getValue("type");
    return isDriverType(v) ? v : DEFAULT_DRIVER;
  }

  get isTcp(): boolean {
    return isTcpLikeDriver(this.#driverType);
  }

  setDriver(type: DriverType): void {
    this.#driverType = type;
    this.driver.form.setValue("type", type);
    this.#buildDriverFields();
  }

  #buildDriverFields() {
    const comm = this.communication.form;
    const params = this.driverParams.form;
    comm.clearForm();
    params.clearForm();

    if (!isTcpLikeDriver(this.#driverType)) {
      const d = MODBUS_DEFAULT_SERIAL_COMM;
      comm
        .addField("com", "COM ID:", "combo", this.#ports)
        .addField("baud", "Baud Rate:", "combo", SERIAL_BAUD_RATES, d.baud)
        .addField(
          "data_bits",
          "Data Bits:",
          "combo",
          SERIAL_DATA_BITS,
          d.data_bits,
        )
        .addField("parity", "Parity:", "combo", SERIAL_PARITY, d.parity)
        .addField("stop", "Stop Bits:", "combo", SERIAL_STOP_BITS, d.stop)
        .addField(
          "flow",
          "Flow Control:",
          "combo",
          SERIAL_FLOW_CONTROL,
          d.flow,
        );
      return;
    }

    const t = MODBUS_DEFAULT_TCP_PARAMS;
    comm.addField("adapter", "Network Adapter:", "combo", this.#adapters);
    params
      .addField("ip", "IP Address:", "text", [], t.ip)
      .addField("port", "Port:", "text", [], t.port)
      .addField("protocol", "Protocol:", "combo", TCP_PROTOCOLS, t.protocol);
  }

  /** Stored channels keep `network_adapter`; the combo shows `"name (ip)"`. */
  #loadCommunication(values: Dict) {
    const comm = toStringRecord(values);
    if (this.isTcp && comm.adapter === undefined && comm.network_adapter) {
      const label = comm.network_adapter.endsWith(")")
        ? comm.network_adapter
        : formatAdapterWithIp(comm.network_adapter, comm.network_adapter_ip);
      if (!this.#adapters.includes(label)) {
        this.#adapters = [...this.#adapters, label];
        this.communication.form.setOptions("adapter", this.#adapters);
      }
      comm.adapter = label;
    }
    this.communication.form.setValues(comm);
  }

  loadData(data: unknown): void {
    if (!isRecord(data)) return;
    const general = isRecord(data.general) ? data.general : undefined;
    const name = general
      ? (asString(general.channel_name) || asString(general.name) || "")
      : (asString(data.name) ?? "");
    const description = asString(
      general ? general.description : data.description,
    ) ?? "";
    this.general.form.setValues({ channel_name: name, description });

    const driver = data.driver;
    if (isRecord(driver)) {
      const type = asString(driver.type);
      if (type && isDriverType(type)) this.setDriver(type);
      this.driverParams.form.setValues(getSection(driver, "params"));
    } else {
      const type = asString(driver);
      if (type && isDriverType(type)) this.setDriver(type);
    }

    if (isRecord(data.communication)) {
      this.#loadCommunication(data.communication);
    } else if (isRecord(driver) && isRecord(driver.params)) {
      this.#loadCommunication(driver.params);
    } else if (isRecord(data.params)) {
      this.#loadCommunication(data.params);
    }
  }

  getData(): ChannelDialogData {
    const name = this.general.form.getValue("channel_name");
    const description = this.general.form.getValue("description");
    const driverParams = this.driverParams.form.getValues();
    const communication = this.communication.form.getValues();
    return {
      communication,
      description,
      driver: { params: driverParams, type: this.#driverType },
      general: { channel_name: name, description },
      name,
      params: { ...driverParams, ...communication },
    };
  }

  validate(): Result<void, ValidationError> {
    const { driver, general } = this.getData();
    if (!general.channel_name.trim()) {
      return invalid("channel_name", "Channel name is required");
    }
    if (this.isTcp) {
      const { ip = "", port = "" } = driver.params;
      if (!isValidIp(ip)) {
        return invalid("ip", `Invalid IP address: ${ip}`);
      }
      if (!isValidPort(port)) {
        return invalid("port", "Port must be between 1 and 65535");
      }
    }
    return valid();
  }

  /**
   * Channel node for the current form. Editing an existing channel keeps
   * its id and devices.
   */
  toChannelNode(base?: ChannelNode): ChannelNode {
    const data = this.getData();
    const node = createChannel({
      communication: toStringRecord(
        normalizeCommunicationParams(data.communication, data.driver.type),
      ),
      description: data.description,
      devices: base?.devices ?? [],
      driver: data.driver,
      name: data.name,
    });
    return base ? { ...node, id: base.id } : node;
  }
}
