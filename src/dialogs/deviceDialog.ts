import type { Result } from "option-t/plain_result";
import {
  buildDeviceTimingForDriver,
  deviceTimingFromRecord,
} from "../config/configBuilder.ts";
import {
  DEFAULT_DRIVER,
  type DriverType,
  ENABLE_CHOICES,
  MODBUS_DEFAULT_BLOCK_SIZES,
  MODBUS_DEFAULT_DATA_ACCESS,
  MODBUS_DEFAULT_ENCODING,
  MODBUS_DEFAULT_TIMING,
} from "../config/constants.ts";
import {
  type BlockSizes,
  createDevice,
  type DeviceNode,
  type Flag,
} from "../config/project.ts";
import {
  asString,
  type Dict,
  isRecord,
  validateAndGetInt,
} from "../config/utils.ts";
import {
  flagToChoice,
  isRtuOverTcpDriver,
  isTcpLikeDriver,
  toNumericFlag,
} from "../config/validators.ts";
import type { ValidationError } from "../errors.ts";
import { type DialogModel, invalid, section, valid } from "./dialog.ts";

const BLOCK_KEYS = ["out_coils", "in_coils", "int_regs", "hold_regs"] as const;
export type BlockSizeKey = (typeof BLOCK_KEYS)[number];

const ACCESS_KEYS = [
  "zero_based",
  "zero_based_bit",
  "bit_writes",
  "func_06",
  "func_05",
] as const;

const ENCODING_KEYS = [
  "byte_order",
  "word_order",
  "dword_order",
  "bit_order",
  "treat_longs_as_decimals",
] as const;

/** JSON timing key → dialog field id. */
const TIMING_FIELDS: ReadonlyArray<readonly [string, string]> = [
  ["connect_timeout", "connect_timeout"],
  ["connect_attempts", "connect_attempts"],
  ["request_timeout", "req_timeout"],
  ["req_timeout", "req_timeout"],
  ["attempts_before_timeout", "attempts"],
  ["attempts", "attempts"],
  ["inter_request_delay", "inter_req_delay"],
  ["inter_req_delay", "inter_req_delay"],
];

export interface DeviceGeneral {
  name: string;
  description: string;
  device_id: number;
}

export interface DeviceDialogData extends DeviceGeneral {
  general: DeviceGeneral;
  timing: Record<string, number>;
  data_access: Record<string, string>;
  encoding: Record<string, string>;
  block_sizes: Partial<Record<BlockSizeKey, number>>;
}

function isBlockKey(key: string): key is BlockSizeKey {
  return BLOCK_KEYS.some((k) => k === key);
}

function aliasBlockKey(key: string): BlockSizeKey | undefined {
  const k = key.toLowerCase();
  if (k.includes("hold")) return "hold_regs";
  if (
    k.includes("int") || k.includes("internal") ||
    (k.includes("input") && k.includes("reg"))
  ) {
    return "int_regs";
  }
  if (k.includes("out") && k.includes("coil")) return "out_coils";
  if (k.includes("in") && k.includes("coil")) return "in_coils";
  return undefined;
}

/**
 * Integer block sizes keyed canonically. Aliased keys only fill slots the
 * canonical keys leave empty; a bare number applies to both register kinds.
 */
export function normalizeBlockSizes(
  raw: unknown,
): Partial<Record<BlockSizeKey, number>> {
  if (typeof raw === "number" && Number.isFinite(raw)) {
    const v = Math.trunc(raw);
    return { hold_regs: v, int_regs: v };
  }
  if (typeof raw === "string" && /^\d+$/.test(raw.trim())) {
    const v = Number(raw.trim());
    return { hold_regs: v, int_regs: v };
  }
  const out: Partial<Record<BlockSizeKey, number>> = {};
  if (!isRecord(raw)) return out;
  const aliased: Array<[BlockSizeKey, number]> = [];
  for (const [key, value] of Object.entries(raw)) {
    const text = asString(value)?.trim();
    if (!text) continue;
    const n = Number(text);
    if (!Number.isFinite(n)) continue;
    const k = key.trim();
    if (isBlockKey(k)) {
      out[k] = Math.trunc(n);
      continue;
    }
    const alias = aliasBlockKey(k);
    if (alias) aliased.push([alias, Math.trunc(n)]);
  }
  for (const [k, v] of aliased) {
    if (out[k] === undefined) out[k] = v;
  }
  return out;
}

function choiceToFlag(choice: string, fallback: Flag): Flag {
  const n = toNumericFlag(choice);
  return n === 1 ? 1 : n === 0 ? 0 : fallback;
}

export class DeviceDialog implements DialogModel<DeviceDialogData> {
  readonly title = "Device Properties";
  readonly general = section("general", "General");
  readonly timing = section("timing", "Timing");
  readonly dataAccess = section("data_access", "DataAccess");
  readonly encoding = section("encoding", "DataEncoding");
  readonly blockSizes = section("block_sizes", "Block Sizes");
  readonly sections = [
    this.general,
    this.timing,
    this.dataAccess,
    this.encoding,
    this.blockSizes,
  ];

  constructor(
    readonly driverType: DriverType = DEFAULT_DRIVER,
    suggestedName = "Device1",
    suggestedId = 1,
  ) {
    this.general.form
      .addField("name", "Device Name:", "text", [], suggestedName)
      .addField("description", "Description:")
      .addField("device_id", "Device ID:", "text", [], suggestedId);

    const t = MODBUS_DEFAULT_TIMING;
    const timing = this.timing.form;
    if (isTcpLikeDriver(driverType)) {
      timing.addField(
        "connect_timeout",
        "Connect Timeout (s):",
        "text",
        [],
        t.connect_timeout,
      );
    }
    if (isRtuOverTcpDriver(driverType)) {
      timing.addField(
        "connect_attempts",
        "Connect Attempts:",
        "text",
        [],
        t.connect_attempts,
      );
    }
    timing
      .addField("req_timeout", "Request Timeout (ms):", "text", [], t.req_timeout)
      .addField("attempts", "Attempts Before Timeout:", "text", [], t.attempts)
      .addField(
        "inter_req_delay",
        "Inter-Request Delay (ms):",
        "text",
        [],
        t.inter_req_delay,
      );

    const a = MODBUS_DEFAULT_DATA_ACCESS;
    this.dataAccess.form
      .addField("zero_based", "Zero-Based Addressing:", "combo", ENABLE_CHOICES, a.zero_based)
      .addField(
        "zero_based_bit",
        "Zero-Based Bit Addressing:",
        "combo",
        ENABLE_CHOICES,
        a.zero_based_bit,
      )
      .addField("bit_writes", "Holding Register Bit Writes:", "combo", ENABLE_CHOICES, a.bit_writes)
      .addField("func_06", "Modbus Function 06:", "combo", ENABLE_CHOICES, a.func_06)
      .addField("func_05", "Modbus Function 05:", "combo", ENABLE_CHOICES, a.func_05);

    const e = MODBUS_DEFAULT_ENCODING;
    this.encoding.form
      .addField("byte_order", "Modbus Byte Order:", "combo", ENABLE_CHOICES, e.byte_order)
      .addField("word_order", "First Word Low:", "combo", ENABLE_CHOICES, e.word_order)
      .addField("dword_order", "First Dword Low:", "combo", ENABLE_CHOICES, e.dword_order)
      .addField("bit_order", "Modicon Bit Order:", "combo", ENABLE_CHOICES, e.bit_order)
      .addField(
        "treat_longs_as_decimals",
        "Treat Longs as Decimals:",
        "combo",
        ENABLE_CHOICES,
        e.treat_longs_as_decimals,
      );

    const b = MODBUS_DEFAULT_BLOCK_SIZES;
    this.blockSizes.form
      .addField("out_coils", "Output Coils:", "text", [], b.out_coils)
      .addField("in_coils", "Input Coils:", "text", [], b.in_coils)
      .addField("int_regs", "Internal Registers:", "text", [], b.int_regs)
      .addField("hold_regs", "Holding Registers:", "text", [], b.hold_regs);
  }

  loadData(data: unknown): void {
    if (!isRecord(data)) return;
    const general: Dict = isRecord(data.general) ? data.general : data;
    const currentId = validateAndGetInt(this.general.form.getValue("device_id"), 1);
    this.general.form.setValues({
      description: asString(general.description) ?? "",
      device_id: validateAndGetInt(general.device_id, currentId, 1, 65535),
      name: asString(general.name) ?? "",
    });

    const sectionOf = (key: string): Dict | undefined => {
      const v = data[key] ?? general[key];
      return isRecord(v) ? v : undefined;
    };

    const timing = sectionOf("timing");
    if (timing) {
      const mapped: Dict = {};
      for (const [from, to] of TIMING_FIELDS) {
        if (timing[from] !== undefined && mapped[to] === undefined) {
          mapped[to] = timing[from];
        }
      }
      this.timing.form.setValues(mapped);
    }

    const flags = (src: Dict | undefined, keys: readonly string[]) => {
      const out: Dict = {};
      for (const k of keys) {
        if (src && src[k] !== undefined) out[k] = flagToChoice(src[k]);
      }
      return out;
    };
    this.dataAccess.form.setValues(flags(sectionOf("data_access"), ACCESS_KEYS));
    this.encoding.form.setValues(flags(sectionOf("encoding"), ENCODING_KEYS));
    this.blockSizes.form.setValues(sectionOf("block_sizes") ?? {});
  }

  getData(): DeviceDialogData {
    const g = this.general.form;
    const general: DeviceGeneral = {
      description: g.getValue("description"),
      device_id: validateAndGetInt(g.getValue("device_id"), 1, 1, 65535),
      name: g.getValue("name"),
    };
    return {
      ...general,
      block_sizes: normalizeBlockSizes(this.blockSizes.form.getValues()),
      data_access: this.dataAccess.form.getValues(),
      encoding: this.encoding.form.getValues(),
      general,
      timing: buildDeviceTimingForDriver(
        this.driverType,
        this.timing.form.getValues(),
      ),
    };
  }

  validate(): Result<void, ValidationError> {
    if (!this.general.form.getValue("name").trim()) {
      return invalid("name", "Device name is required");
    }
    const id = validateAndGetInt(
      this.general.form.getValue("device_id"),
      Number.NaN,
      1,
      65535,
    );
    if (Number.isNaN(id)) {
      return invalid("device_id", "Device ID must be between 1 and 65535");
    }
    return valid();
  }

  /** Device node for the current form; `base` keeps its id and tags. */
  toDeviceNode(base?: DeviceNode): DeviceNode {
    const data = this.getData();
    const defaults = createDevice();
    const a = data.data_access;
    const da = defaults.dataAccess;
    const e = data.encoding;
    const de = defaults.encoding;
    const b = data.block_sizes;
    const db: BlockSizes = defaults.blockSizes;
    const node = createDevice({
      blockSizes: {
        holdRegs: b.hold_regs ?? db.holdRegs,
        inCoils: b.in_coils ?? db.inCoils,
        intRegs: b.int_regs ?? db.intRegs,
        outCoils: b.out_coils ?? db.outCoils,
      },
      children: base?.children ?? [],
      dataAccess: {
        bitWrites: choiceToFlag(a.bit_writes, da.bitWrites),
        func05: choiceToFlag(a.func_05, da.func05),
        func06: choiceToFlag(a.func_06, da.func06),
        zeroBased: choiceToFlag(a.zero_based, da.zeroBased),
        zeroBasedBit: choiceToFlag(a.zero_based_bit, da.zeroBasedBit),
      },
      description: data.description,
      deviceId: data.device_id,
      encoding: {
        bitOrder: choiceToFlag(e.bit_order, de.bitOrder),
        byteOrder: choiceToFlag(e.byte_order, de.byteOrder),
        dwordOrder: choiceToFlag(e.dword_order, de.dwordOrder),
        treatLongsAsDecimals: choiceToFlag(
          e.treat_longs_as_decimals,
          de.treatLongsAsDecimals,
        ),
        wordOrder: choiceToFlag(e.word_order, de.wordOrder),
      },
      name: data.name,
      timing: deviceTimingFromRecord(data.timing),
    });
    return base ? { ...node, id: base.id } : node;
  }
}
