// Gateway entry point: `npm run gateway -- --project plant.json`
import { readFile } from "node:fs/promises";
import { isErr } from "option-t/plain_result";
import { importProjectJson } from "../config/serializers.ts";
import { toError } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { parseGatewayArgs } from "./args.ts";
import { listSerialPorts, probeHostNetwork } from "./host.ts";
import { DiagnosticsManager } from "./diagnostics.ts";
import { Gateway } from "./gateway.ts";

const logger = createLogger("modlink");

async function main(argv: readonly string[]): Promise<number> {
  const args = parseGatewayArgs(argv);
  if (isErr(args)) {
    logger.error(args.err.message);
    return 2;
  }
  const { dutyCycle, listPorts, onlyTxrx, project: file, scanMs } = args.val;

  if (listPorts) {
    const ports = await listSerialPorts();
    for (const port of ports) console.log(port);
    if (ports.length === 0) logger.warn("No serial ports found");
    return 0;
  }

  const host = await probeHostNetwork();
  logger.info(`Outbound address ${host.detectedIp}, ${host.adapters.length} adapter(s)`);
  const project = importProjectJson(await readFile(file, "utf8"), host.probe);
  if (isErr(project)) {
    logger.error(`Cannot load ${file}: ${project.err.message}`);
    return 1;
  }

  const diagnostics = new DiagnosticsManager({
    logger: logger.child("diagnostics"),
    onlyTxrx,
  });
  diagnostics.registerListener("console", ({ text, timestamp }) => {
    console.log(`${timestamp} ${text}`);
  });

  const last = new Map<string, string>();
  const gateway = new Gateway(project.val, {
    defaultScanMs: scanMs,
    diagnostics,
    dutyCycle,
    logger,
    onValue: (tag, value) => {
      const text = JSON.stringify(value);
      if (last.get(tag.qualifiedName) === text) return;
      last.set(tag.qualifiedName, text);
      logger.info(`${tag.qualifiedName} = ${text}`);
    },
  });

  const stopped = new Promise<void>((resolve) => {
    process.once("SIGINT", () => {
      logger.info("Stopping...");
      gateway.stop().then(resolve, (e: unknown) => {
        logger.error("Stop failed", e);
        resolve();
      });
    });
  });
  await gateway.start();
  await stopped;
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    logger.error(toError(e).message, e);
    process.exitCode = 1;
  },
);
