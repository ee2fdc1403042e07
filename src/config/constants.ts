/**
 * Application-wide constants: drivers, dialog defaults, Modbus address
 * ranges and runtime buffer limits.
 */

export const DRIVER_TYPES = [
  "Modbus RTU Serial",
  "Modbus RTU over TCP",
  "Modbus TCP/IP Ethernet",
] as const;

export type DriverType = (typeof DRIVER_TYPES)[number];

export const DEFAULT_DRIVER: DriverType = "Modbus RTU Serial";

export function isDriverType(value: string): value is DriverType {
  return DRIVER_TYPES.some((d) => d === value);
}

/** Separator between group path segments in qualified tag names. */
export const GROUP_SEPARATOR = ".";

// 6-digit address notation: leading digit selects the table.
export const MODBUS_COIL_PREFIX = "0";
export const MODBUS_DISCRETE_PREFIX = "1";
export const MODBUS_INPUT_REG_PREFIX = "3";
export const MODBUS_HOLDING_REG_PREFIX = "4";
export const MODBUS_ADDRESS_OFFSET = 100000;
export const MODBUS_SEQUENCE_WIDTH = 5;

export type AddressType =
  | "coil"
  | "discrete_input"
  | "input_register"
  | "holding_register";

export interface AddressRange {
  type: AddressType;
  min: number;
  max: number;
  offset: number;
}

/** Checked in order; the first matching range wins. */
export const MODBUS_ADDRESS_RANGES: readonly AddressRange[] = [
  { max: 465536, min: 400001, offset: 400000, type: "holding_register" },
  { max: 365536, min: 300001, offset: 300000, type: "input_register" },
  { max: 165536, min: 100001, offset: 100000, type: "discrete_input" },
  { max: 65536, min: 1, offset: 0, type: "coil" },
];

export const MODBUS_DEFAULT_SCAN_RATE = 1000;
export const MODBUS_DEFAULT_MAX_REGS = 120;
export const MODBUS_DEFAULT_MAX_BITS = 2000;

export const ENABLE = "Enable";
export const DISABLE = "Disable";
export const ENABLE_CHOICES = [ENABLE, DISABLE] as const;
export const YES_NO = ["No", "Yes"] as const;

export const SERIAL_BAUD_RATES = [
  "4800",
  "9600",
  "19200",
  "38400",
  "57600",
  "115200",
];
export const SERIAL_DATA_BITS = ["5", "6", "7", "8"];
export const SERIAL_PARITY = ["None", "Odd", "Even"];
export const SERIAL_STOP_BITS = ["1", "2"];
export const SERIAL_FLOW_CONTROL = [
  "None",
  "DTR",
  "RTS",
  "RTS/DTR",
  "RTS Always",
  "RTS Manual",
];
export const TCP_PROTOCOLS = ["TCP/IP", "UDP"];

export const MODBUS_DEFAULT_SERIAL_COMM = {
  baud: "9600",
  data_bits: "8",
  flow: "None",
  parity: "None",
  stop: "1",
};

export const MODBUS_DEFAULT_TCP_PARAMS = {
  ip: "127.0.0.1",
  port: "502",
  protocol: "TCP/IP",
};

export const MODBUS_DEFAULT_TIMING = {
  attempts: "1",
  connect_attempts: "1",
  connect_timeout: "3",
  inter_req_delay: "0",
  req_timeout: "1000",
};

export const MODBUS_DEFAULT_DATA_ACCESS = {
  bit_writes: DISABLE,
  func_05: ENABLE,
  func_06: ENABLE,
  zero_based: DISABLE,
  zero_based_bit: ENABLE,
};

export const MODBUS_DEFAULT_ENCODING = {
  bit_order: DISABLE,
  byte_order: ENABLE,
  dword_order: ENABLE,
  treat_longs_as_decimals: DISABLE,
  word_order: ENABLE,
};

export const MODBUS_DEFAULT_BLOCK_SIZES = {
  hold_regs: "120",
  in_coils: "2000",
  int_regs: "120",
  out_coils: "2000",
};

export const TAG_BASE_TYPES = [
  "Word",
  "Short",
  "Long",
  "DWord",
  "Float",
  "Double",
  "BCD",
  "LBCD",
  "LLong",
  "QWord",
  "Char",
  "Byte",
  "String",
];

/** Boolean first, then every base type followed by its array variant. */
export const TAG_DATA_TYPES = [
  "Boolean",
  "Boolean(Array)",
  ...TAG_BASE_TYPES.flatMap((t) => [t, `${t}(Array)`]),
];

export const TAG_ACCESS = ["Read/Write", "Read Only"] as const;
export type TagAccess = (typeof TAG_ACCESS)[number];

export const SCALING_TYPES = ["None", "Linear", "Square Root"] as const;
export type ScalingType = (typeof SCALING_TYPES)[number];

export const SCALED_DATA_TYPES = [
  "Char",
  "Byte",
  "Short",
  "Word",
  "Long",
  "DWord",
  "Float",
  "Double",
];

export const MODBUS_DEFAULT_TAG = {
  access: "Read/Write",
  address: "400000",
  data_type: "Word",
  scan_rate: "10",
};

export const TAG_SCAN_RATE_MIN = 1;
export const TAG_SCAN_RATE_MAX = 600000;

export const MODBUS_DEFAULT_TAG_SCALING = {
  clamp_high: "No",
  clamp_low: "No",
  negate: "No",
  raw_high: "1000",
  raw_low: "0",
  scaled_high: "100.0",
  scaled_low: "0.0",
  scaled_type: "Float",
  type: "None",
  units: "",
};

/** Registers occupied by one element of each tag data type. */
export const SIZE_MAP: Readonly<Record<string, number>> = {
  BCD: 1,
  Boolean: 1,
  "Boolean(Array)": 1,
  Byte: 1,
  Char: 1,
  DInt: 2,
  DWord: 2,
  Double: 4,
  Float: 2,
  Int: 1,
  LBCD: 2,
  LLong: 4,
  Long: 2,
  QWord: 4,
  Real: 2,
  Short: 1,
  String: 6,
  Word: 1,
};

/** Step sizes used when suggesting the next free tag address. */
export const ADDRESS_STEP_MAP: Readonly<Record<string, number>> = {
  Boolean: 1,
  Char: 1,
  DInt: 2,
  DWord: 2,
  Double: 4,
  Float: 2,
  Int: 1,
  Long: 2,
  Real: 2,
  Short: 1,
  String: 6,
  Word: 1,
};

export const OPCUA_AUTH_TYPES = ["Anonymous", "Username/Password"] as const;

export const OPCUA_SECURITY_POLICIES = [
  "policy_none",
  "policy_sign_aes128",
  "policy_sign_aes256",
  "policy_sign_basic256sha256",
  "policy_encrypt_aes128",
  "policy_encrypt_aes256",
  "policy_encrypt_basic256sha256",
] as const;
export type SecurityPolicyKey = (typeof OPCUA_SECURITY_POLICIES)[number];

export const OPCUA_POLICY_LABELS: Record<SecurityPolicyKey, string> = {
  policy_encrypt_aes128: "Sign & Encrypt - Aes128",
  policy_encrypt_aes256: "Sign & Encrypt - Aes256",
  policy_encrypt_basic256sha256: "Sign & Encrypt - Basic256Sha256",
  policy_none: "None",
  policy_sign_aes128: "Sign - Aes128",
  policy_sign_aes256: "Sign - Aes256",
  policy_sign_basic256sha256: "Sign - Basic256Sha256",
};

export const OPCUA_DEFAULTS = {
  application_name: "ModUA",
  auto_generate: true,
  cert_validity: "20",
  common_name: "ModUA@ModUA",
  country: "tw",
  locality: "Locality",
  max_sessions: "4096",
  namespace: "ModUA",
  organization: "Organization",
  organization_unit: "Unit",
  port: "48480",
  publish_interval: "1000",
  state: "State",
};

/** Port used in the product URI when the port field is empty. */
export const OPCUA_FALLBACK_URI_PORT = "4848";

export const DATA_BUFFER_MAX_SIZE = 2000;
export const DATA_BUFFER_MAX_AGE = 120;

export const DIAGNOSTICS_CAPACITY = 5000;
export const WRITE_QUEUE_MAX_PENDING = 100;
export const WRITE_QUEUE_BATCH = 10;
