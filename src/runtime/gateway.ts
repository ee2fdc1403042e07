/**
 * Runs a whole project: one transport and scheduler per channel, one
 * client and worker per device, all feeding a shared data buffer.
 */
import { createErr, isErr, type Result } from "option-t/plain_result";
import { mapTagToRuntime, type RuntimeTag } from "../config/mapping.ts";
import {
  type ChannelNode,
  type DeviceNode,
  type Project,
  walkTags,
} from "../config/project.ts";
import { isEthernetDriver } from "../config/validators.ts";
import { createLogger, type Logger } from "../logger.ts";
import { RequestScheduler } from "../scheduler/request-scheduler.ts";
import {
  createTransport,
  transportConfigForChannel,
} from "../transport/index.ts";
import type {
  IModbusTransport,
  TransportConfig,
} from "../transport/transport.ts";
import { type Framing, ModbusClient, TracedTransport } from "./client.ts";
import type { DecodedValue, WriteInput } from "./codec.ts";
import { DataBuffer, type TagSnapshot } from "./dataBuffer.ts";
import { DiagnosticsManager } from "./diagnostics.ts";
import { ModbusWorker } from "./worker.ts";

export interface GatewayOptions {
  /** Scan rate for tags that carry none. */
  defaultScanMs?: number;
  /** Reads between write batches. */
  dutyCycle?: number;
  logger?: Logger;
  diagnostics?: DiagnosticsManager;
  buffer?: DataBuffer;
  createTransport?: (config: TransportConfig) => IModbusTransport;
  onValue?: (tag: RuntimeTag, value: DecodedValue) => void;
  /** Passed to each worker; tests replace it to skip real waits. */
  sleep?: (ms: number) => Promise<void>;
}

export interface DeviceRuntime {
  channel: ChannelNode;
  device: DeviceNode;
  client: ModbusClient;
  worker: ModbusWorker;
  tags: RuntimeTag[];
}

export function framingFor(channel: ChannelNode): Framing {
  return isEthernetDriver(channel.driver.type) ? "tcp" : "rtu";
}

export class Gateway {
  readonly buffer: DataBuffer;
  readonly diagnostics: DiagnosticsManager;
  readonly devices: DeviceRuntime[] = [];
  readonly #logger: Logger;
  readonly #schedulers: RequestScheduler[] = [];
  readonly #transports: IModbusTransport[] = [];
  readonly #tags = new Map<string, DeviceRuntime & { tag: RuntimeTag }>();
  #running = false;

  constructor(project: Project, options: GatewayOptions = {}) {
    this.#logger = options.logger ?? createLogger("gateway");
    this.buffer = options.buffer ?? new DataBuffer();
    this.diagnostics = options.diagnostics ??
      new DiagnosticsManager({ logger: this.#logger.child("diagnostics") });
    const create = options.createTransport ?? createTransport;

    for (const channel of project.channels) {
      if (channel.devices.length === 0) continue;
      const first = channel.devices[0];
      const transport = new TracedTransport(
        create(transportConfigForChannel(channel, first.timing)),
        this.diagnostics,
      );
      const scheduler = new RequestScheduler(
        { requestIntervalMs: 1 },
        () => transport.connected,
      );
      this.#transports.push(transport);
      this.#schedulers.push(scheduler);

      for (const device of channel.devices) {
        const tags = [...walkTags(device)].map(({ path, tag }) =>
          mapTagToRuntime(tag, path, device, channel)
        );
        const client = new ModbusClient({
          attempts: device.timing.attemptsBeforeTimeout,
          connectAttempts: device.timing.connectAttempts,
          framing: framingFor(channel),
          logger: this.#logger.child(device.name),
          requestTimeoutMs: device.timing.requestTimeout,
          scheduler,
          transport,
          unitId: device.deviceId,
        });
        const { holdRegs, inCoils, intRegs, outCoils } = device.blockSizes;
        const worker = new ModbusWorker({
          buffer: this.buffer,
          client,
          defaultScanMs: options.defaultScanMs,
          dutyCycle: options.dutyCycle,
          interRequestDelayMs: device.timing.interRequestDelay,
          logger: this.#logger.child(device.name),
          maxBits: Math.min(outCoils, inCoils),
          maxRegs: Math.min(holdRegs, intRegs),
          onValue: options.onValue,
          sleep: options.sleep,
          tags,
        });
        const runtime: DeviceRuntime = { channel, client, device, tags, worker };
        this.devices.push(runtime);
        for (const tag of tags) {
          this.#tags.set(tag.qualifiedName, { ...runtime, tag });
        }
      }
    }
  }

  get running(): boolean {
    return this.#running;
  }

  get tagNames(): string[] {
    return [...this.#tags.keys()];
  }

  async start(): Promise<void> {
    if (this.#running) return;
    this.#running = true;
    for (const scheduler of this.#schedulers) scheduler.start();
    for (const { client, device, worker } of this.devices) {
      const res = await client.connect();
      if (isErr(res)) {
        // The worker keeps retrying on each cycle.
        this.#logger.warn(`${device.name}: ${res.err.message}`);
      }
      worker.start();
    }
    this.#logger.info(
      `Started ${this.devices.length} device(s), ${this.#tags.size} tag(s)`,
    );
  }

  async stop(): Promise<void> {
    if (!this.#running) return;
    this.#running = false;
    await Promise.all(this.devices.map(({ worker }) => worker.stop()));
    for (const scheduler of this.#schedulers) scheduler.stop();
    for (const transport of this.#transports) {
      try {
        await transport.disconnect();
      } catch (e) {
        this.#logger.error("Disconnect failed", e);
      }
    }
    this.#logger.info("Stopped");
  }

  /** Queue a write by qualified tag name, e.g. `Channel1.Device1.Tag1`. */
  writeTag(qualifiedName: string, value: WriteInput): Result<void, Error> {
    const entry = this.#tags.get(qualifiedName);
    if (!entry) return createErr(new Error(`Unknown tag: ${qualifiedName}`));
    const res = entry.worker.enqueueWrite(entry.tag, value);
    if (isErr(res)) return res;
    this.buffer.writeTagValue(
      qualifiedName,
      typeof value === "object" ? [...value] : value,
    );
    return res;
  }

  snapshot(): Record<string, TagSnapshot> {
    return this.buffer.getAllTags();
  }
}
