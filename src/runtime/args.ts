import { parseArgs } from "node:util";
import { createErr, createOk, isErr, type Result } from "option-t/plain_result";
import { MODBUS_DEFAULT_SCAN_RATE } from "../config/constants.ts";
import { ConfigError, toError } from "../errors.ts";

export interface GatewayArgs {
  project: string;
  scanMs: number;
  dutyCycle: number;
  onlyTxrx: boolean;
  /** Print the host's serial ports and exit. */
  listPorts: boolean;
}

export const USAGE =
  "Usage: gateway --project <file> [--scan <ms>] [--duty <n>] [--only-txrx] | --list-ports";

function positiveInt(
  value: string | undefined,
  fallback: number,
  flag: string,
): Result<number, ConfigError> {
  if (value === undefined) return createOk(fallback);
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    return createErr(new ConfigError(`expected a positive integer, got "${value}"`, flag));
  }
  return createOk(n);
}

const OPTIONS = {
  duty: { type: "string" },
  "list-ports": { default: false, type: "boolean" },
  "only-txrx": { default: false, type: "boolean" },
  project: { short: "p", type: "string" },
  scan: { type: "string" },
} as const;

const parseFlags = (argv: readonly string[]) =>
  parseArgs({ args: [...argv], options: OPTIONS, strict: true }).values;

export function parseGatewayArgs(
  argv: readonly string[],
): Result<GatewayArgs, ConfigError> {
  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(argv);
  } catch (e) {
    return createErr(new ConfigError(toError(e).message));
  }
  const listPorts = values["list-ports"] ?? false;
  if (!values.project && !listPorts) return createErr(new ConfigError(USAGE));

  const scan = positiveInt(values.scan, MODBUS_DEFAULT_SCAN_RATE, "--scan");
  if (isErr(scan)) return scan;
  const duty = positiveInt(values.duty, 1, "--duty");
  if (isErr(duty)) return duty;

  return createOk({
    dutyCycle: duty.val,
    listPorts,
    onlyTxrx: values["only-txrx"] ?? false,
    project: values.project ?? "",
    scanMs: scan.val,
  });
}
