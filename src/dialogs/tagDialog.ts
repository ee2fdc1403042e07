import type { Result } from "option-t/plain_result";
import {
  addressPrefixFor,
  arraySizeFromAddress,
  formatTagAddress,
  isArrayDataType,
  isBooleanType,
} from "../config/address.ts";
import {
  MODBUS_DEFAULT_TAG,
  MODBUS_DEFAULT_TAG_SCALING,
  SCALED_DATA_TYPES,
  SCALING_TYPES,
  TAG_ACCESS,
  TAG_DATA_TYPES,
  TAG_SCAN_RATE_MAX,
  TAG_SCAN_RATE_MIN,
  YES_NO,
} from "../config/constants.ts";
import {
  createTag,
  defaultScaling,
  type Scaling,
  type TagNode,
} from "../config/project.ts";
import {
  asString,
  type Dict,
  getSection,
  isRecord,
  toFloat,
  validateAndGetInt,
} from "../config/utils.ts";
import type { ValidationError } from "../errors.ts";
import { type DialogModel, invalid, section, valid } from "./dialog.ts";

export interface TagGeneralData {
  name: string;
  description: string;
  address: string;
  data_type: string;
  access: string;
  scan_rate: string;
}

export interface TagScalingData {
  type: string;
  raw_low: string;
  raw_high: string;
  scaled_type: string;
  scaled_low: string;
  scaled_high: string;
  clamp_low: string;
  clamp_high: string;
  negate: string;
  units: string;
}

export interface TagDialogData extends TagGeneralData {
  general: TagGeneralData;
  scaling: TagScalingData;
}

/** Suggests the first free address for a table prefix (`"0"`, `"4"`, ...). */
export type NextAddressFn = (prefix: string) => string;

const SCALING_PARAMS = [
  "raw_low",
  "raw_high",
  "scaled_type",
  "scaled_low",
  "scaled_high",
  "clamp_low",
  "clamp_high",
  "negate",
  "units",
] as const;

function scalingToForm(s: Scaling): TagScalingData {
  const yes = (b: boolean) => (b ? "Yes" : "No");
  return {
    clamp_high: yes(s.clampHigh),
    clamp_low: yes(s.clampLow),
    negate: yes(s.negate),
    raw_high: String(s.rawHigh),
    raw_low: String(s.rawLow),
    scaled_high: String(s.scaledHigh),
    scaled_low: String(s.scaledLow),
    scaled_type: s.scaledType,
    type: s.type,
    units: s.units,
  };
}

export class TagDialog implements DialogModel<TagDialogData> {
  readonly title = "Tag Properties";
  readonly general = section("general", "General");
  readonly scaling = section("scaling", "Scaling");
  readonly sections = [this.general, this.scaling];

  #nextAddress: NextAddressFn | undefined;
  #loading = false;
  #last = { access: "", address: "", dataType: "" };

  /** With `nextAddress` the dialog creates a tag and suggests addresses. */
  constructor(nextAddress?: NextAddressFn, suggestedName = "Tag1") {
    this.#nextAddress = nextAddress;
    const t = MODBUS_DEFAULT_TAG;
    this.general.form
      .addField("name", "Tag Name:", "text", [], suggestedName)
      .addField("description", "Description:")
      .addField("data_type", "Data Type:", "combo", TAG_DATA_TYPES, t.data_type)
      .addField("access", "Client Access:", "combo", TAG_ACCESS, t.access)
      .addField("address", "Address:", "text", [], t.address)
      .addField("scan_rate", "Scan Rate (ms):", "text", [], t.scan_rate);

    const s = MODBUS_DEFAULT_TAG_SCALING;
    this.scaling.form
      .addField("type", "Scaling Type:", "combo", SCALING_TYPES, s.type)
      .addField("raw_low", "Raw Low:", "text", [], s.raw_low)
      .addField("raw_high", "Raw High:", "text", [], s.raw_high)
      .addField("scaled_type", "Scaled Data Type:", "combo", SCALED_DATA_TYPES, s.scaled_type)
      .addField("scaled_low", "Scaled Low:", "text", [], s.scaled_low)
      .addField("scaled_high", "Scaled High:", "text", [], s.scaled_high)
      .addField("clamp_low", "Clamp Low:", "combo", YES_NO, s.clamp_low)
      .addField("clamp_high", "Clamp High:", "combo", YES_NO, s.clamp_high)
      .addField("negate", "Negate Value:", "combo", YES_NO, s.negate)
      .addField("units", "Units:", "text", [], s.units);

    this.updateModbusLogic(true);
    this.#remember();
    this.general.form.subscribe(() => this.#onGeneralChange());
    this.scaling.form.subscribe(() => this.#applyScalingState());
  }

  #remember() {
    const g = this.general.form;
    this.#last = {
      access: g.getValue("access"),
      address: g.getValue("address"),
      dataType: g.getValue("data_type"),
    };
  }

  #onGeneralChange() {
    if (this.#loading) return;
    const g = this.general.form;
    const typeOrAccess = g.getValue("data_type") !== this.#last.dataType ||
      g.getValue("access") !== this.#last.access;
    const address = g.getValue("address") !== this.#last.address;
    if (!typeOrAccess && !address) return;
    // Remember first: updateModbusLogic writes the address back.
    this.#remember();
    this.updateModbusLogic(typeOrAccess);
    this.#remember();
  }

  /**
   * Re-derive the address prefix from data type and access, keeping the
   * register offset and any array size. `suggest` asks the parent for the
   * next free address instead (new tags only).
   */
  updateModbusLogic(suggest = false): void {
    const g = this.general.form;
    const dataType = g.getValue("data_type");
    const readOnly = g.getValue("access") === "Read Only";
    const current = g.getValue("address");
    if (suggest && this.#nextAddress) {
      const base = this.#nextAddress(addressPrefixFor(dataType, readOnly));
      const n = arraySizeFromAddress(current) ?? 1;
      g.setValue("address", isArrayDataType(dataType) ? `${base} [${n}]` : base);
    } else {
      g.setValue("address", formatTagAddress(dataType, readOnly, current));
    }

    if (isBooleanType(dataType)) this.scaling.form.setValue("type", "None");
    this.#applyScalingState();
  }

  #applyScalingState() {
    const s = this.scaling.form;
    const bool = isBooleanType(this.general.form.getValue("data_type"));
    s.setEnabled("type", !bool);
    const shown = s.getValue("type") !== "None";
    for (const id of SCALING_PARAMS) {
      s.setVisible(id, shown);
      s.setEnabled(id, !bool);
    }
  }

  loadData(data: unknown): void {
    if (!isRecord(data)) return;
    const gen: Dict = isRecord(data.general) ? data.general : data;
    this.#loading = true;
    try {
      const { address, ...rest } = gen;
      this.general.form.setValues(rest);
      const addr = asString(address);
      if (addr) {
        this.general.form.setValue("address", addr);
      } else if (this.#nextAddress) {
        this.updateModbusLogic(true);
      }
      this.scaling.form.setValues(getSection(data, "scaling"));
    } finally {
      this.#loading = false;
    }
    this.#remember();
    this.#applyScalingState();
  }

  getData(): TagDialogData {
    const g = this.general.form;
    const general: TagGeneralData = {
      access: g.getValue("access"),
      address: g.getValue("address"),
      data_type: g.getValue("data_type"),
      description: g.getValue("description"),
      name: g.getValue("name"),
      scan_rate: g.getValue("scan_rate"),
    };
    const s = this.scaling.form;
    const scaling: TagScalingData = {
      clamp_high: s.getValue("clamp_high"),
      clamp_low: s.getValue("clamp_low"),
      negate: s.getValue("negate"),
      raw_high: s.getValue("raw_high"),
      raw_low: s.getValue("raw_low"),
      scaled_high: s.getValue("scaled_high"),
      scaled_low: s.getValue("scaled_low"),
      scaled_type: s.getValue("scaled_type"),
      type: s.getValue("type"),
      units: s.getValue("units"),
    };
    return { ...general, general, scaling };
  }

  validate(): Result<void, ValidationError> {
    const g = this.general.form;
    if (!g.getValue("name").trim()) {
      return invalid("name", "Tag name is required");
    }
    const rate = validateAndGetInt(
      g.getValue("scan_rate"),
      Number.NaN,
      TAG_SCAN_RATE_MIN,
      TAG_SCAN_RATE_MAX,
    );
    if (Number.isNaN(rate)) {
      return invalid(
        "scan_rate",
        `Scan rate must be between ${TAG_SCAN_RATE_MIN} and ${TAG_SCAN_RATE_MAX}`,
      );
    }
    return valid();
  }

  /** Tag node for the current form; `base` keeps its id. */
  toTagNode(base?: TagNode): TagNode {
    const { general: g, scaling: s } = this.getData();
    const d = defaultScaling();
    const type = SCALING_TYPES.find((t) => t === s.type) ?? "None";
    const node = createTag({
      access: TAG_ACCESS.find((a) => a === g.access) ?? "Read/Write",
      address: g.address,
      dataType: g.data_type,
      description: g.description,
      name: g.name,
      scaling: type === "None" ? d : {
        clampHigh: s.clamp_high === "Yes",
        clampLow: s.clamp_low === "Yes",
        negate: s.negate === "Yes",
        rawHigh: toFloat(s.raw_high, d.rawHigh),
        rawLow: toFloat(s.raw_low, d.rawLow),
        scaledHigh: toFloat(s.scaled_high, d.scaledHigh),
        scaledLow: toFloat(s.scaled_low, d.scaledLow),
        scaledType: s.scaled_type,
        type,
        units: s.units,
      },
      scanRate: validateAndGetInt(
        g.scan_rate,
        Number(MODBUS_DEFAULT_TAG.scan_rate),
        TAG_SCAN_RATE_MIN,
        TAG_SCAN_RATE_MAX,
      ),
    });
    return base ? { ...node, id: base.id } : node;
  }
}

/** Dialog payload for an existing tag. */
export function tagToDialogData(tag: TagNode): TagDialogData {
  const general: TagGeneralData = {
    access: tag.access,
    address: tag.address,
    data_type: tag.dataType,
    description: tag.description,
    name: tag.name,
    scan_rate: String(tag.scanRate),
  };
  return { ...general, general, scaling: scalingToForm(tag.scaling) };
}
