/**
 * Polling loop for one device: grouped reads on each tag's scan rate,
 * with queued writes interleaved by a read/write duty cycle.
 */
import { createErr, createOk, isErr, type Result } from "option-t/plain_result";
import {
  MODBUS_DEFAULT_MAX_BITS,
  MODBUS_DEFAULT_MAX_REGS,
  MODBUS_DEFAULT_SCAN_RATE,
} from "../config/constants.ts";
import type { RuntimeTag } from "../config/mapping.ts";
import { applyScaling, reverseScaling } from "../config/scaling.ts";
import type { Logger } from "../logger.ts";
import type { ModbusClient } from "./client.ts";
import {
  type DecodedValue,
  decodeTagValue,
  encodeTagValue,
  type WriteInput,
} from "./codec.ts";
import type { DataBuffer } from "./dataBuffer.ts";
import { groupReads, type ReadBatch } from "./groupReads.ts";
import { WriteQueueManager } from "./writeQueue.ts";

export const WORKER_WRITE_BATCH = 5;
export const FAILED_BATCH_DELAY_MS = 1000;
export const CYCLE_DELAY_MS = 200;

export type ValueListener = (tag: RuntimeTag, value: DecodedValue) => void;

export interface ModbusWorkerOptions {
  client: ModbusClient;
  tags?: readonly RuntimeTag[];
  buffer?: DataBuffer;
  writeQueue?: WriteQueueManager;
  onValue?: ValueListener;
  logger?: Logger;
  defaultScanMs?: number;
  maxRegs?: number;
  maxBits?: number;
  /** Reads between write batches. */
  dutyCycle?: number;
  interRequestDelayMs?: number;
  failedBatchDelayMs?: number;
  cycleDelayMs?: number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const usesScaling = (tag: RuntimeTag) =>
  tag.scaling.type !== "None" && tag.base !== "bool" && tag.base !== "string";

/** Engineering value for a decoded raw value. */
export function scaleDecoded(tag: RuntimeTag, value: DecodedValue): DecodedValue {
  if (!usesScaling(tag)) return value;
  const one = (v: number | string | null) =>
    typeof v === "number" ? applyScaling(v, tag.scaling) : v;
  return Array.isArray(value) ? value.map(one) : one(value);
}

function unscale(tag: RuntimeTag, value: WriteInput): WriteInput {
  if (!usesScaling(tag)) return value;
  const one = (v: number | string | boolean) => {
    const n = typeof v === "string" ? Number(v.trim()) : Number(v);
    return Number.isFinite(n)
      ? reverseScaling(n, tag.scaling, tag.projectType)
      : v;
  };
  return typeof value === "object" ? value.map(one) : one(value);
}

export class ModbusWorker {
  readonly client: ModbusClient;
  readonly writeQueue: WriteQueueManager;
  readonly #tags: RuntimeTag[] = [];
  readonly #nextDue = new Map<RuntimeTag, number>();
  readonly #buffer?: DataBuffer;
  readonly #onValue?: ValueListener;
  readonly #logger?: Logger;
  readonly #defaultScanMs: number;
  readonly #maxRegs: number;
  readonly #maxBits: number;
  readonly #dutyCycle: number;
  readonly #interRequestDelayMs: number;
  readonly #failedBatchDelayMs: number;
  readonly #cycleDelayMs: number;
  readonly #clock: () => number;
  readonly #sleep: (ms: number) => Promise<void>;
  #readCount = 0;
  #running = false;
  #loop: Promise<void> | undefined;

  constructor(options: ModbusWorkerOptions) {
    this.client = options.client;
    this.writeQueue = options.writeQueue ??
      new WriteQueueManager({ batchSize: WORKER_WRITE_BATCH });
    this.#buffer = options.buffer;
    this.#onValue = options.onValue;
    this.#logger = options.logger;
    this.#defaultScanMs = options.defaultScanMs ?? MODBUS_DEFAULT_SCAN_RATE;
    this.#maxRegs = options.maxRegs ?? MODBUS_DEFAULT_MAX_REGS;
    this.#maxBits = options.maxBits ?? MODBUS_DEFAULT_MAX_BITS;
    this.#dutyCycle = Math.max(1, options.dutyCycle ?? 1);
    this.#interRequestDelayMs = options.interRequestDelayMs ?? 0;
    this.#failedBatchDelayMs = options.failedBatchDelayMs ??
      FAILED_BATCH_DELAY_MS;
    this.#cycleDelayMs = options.cycleDelayMs ?? CYCLE_DELAY_MS;
    this.#clock = options.clock ?? (() => performance.now());
    this.#sleep = options.sleep ??
      ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    for (const tag of options.tags ?? []) this.addTag(tag);
  }

  get tags(): readonly RuntimeTag[] {
    return this.#tags;
  }

  get running(): boolean {
    return this.#running;
  }

  addTag(tag: RuntimeTag): void {
    if (this.#tags.includes(tag)) return;
    this.#tags.push(tag);
    this.#buffer?.setTagInfo(tag.qualifiedName, tag.projectType, tag.access);
  }

  removeTag(tag: RuntimeTag): void {
    const i = this.#tags.indexOf(tag);
    if (i !== -1) this.#tags.splice(i, 1);
    this.#nextDue.delete(tag);
  }

  /** Reverse-scale, encode and queue a value for `tag`. */
  enqueueWrite(tag: RuntimeTag, value: WriteInput): Result<void, Error> {
    if (tag.access === "Read Only") {
      return createErr(new Error(`${tag.qualifiedName} is read only`));
    }
    const encoded = encodeTagValue(tag, unscale(tag, value));
    if (isErr(encoded)) return encoded;
    const words = encoded.val;
    const fc = tag.writeFunction;
    const payload = fc === 5 || fc === 6 ? words[0] : words;
    if (!this.writeQueue.enqueue(tag.address, fc, payload, tag.qualifiedName)) {
      return createErr(new Error("Write queue is full"));
    }
    return createOk(undefined);
  }

  /** One poll cycle: due reads, then any pending writes. */
  async tick(): Promise<void> {
    const now = this.#clock();
    const due = this.#tags.filter((t) => (this.#nextDue.get(t) ?? now) <= now);
    const batches = due.length > 0
      ? groupReads(due, this.#maxRegs, this.#maxBits)
      : [];

    for (const [i, batch] of batches.entries()) {
      if (i > 0) {
        if (this.#loop && !this.#running) return;
        await this.#sleep(this.#interRequestDelayMs);
      }
      const ok = await this.#readBatch(batch);
      if (!ok) {
        await this.#sleep(this.#failedBatchDelayMs);
        continue;
      }
      this.#readCount++;
      if (this.#readCount >= this.#dutyCycle && !this.writeQueue.isEmpty()) {
        await this.executePendingWrites();
        this.#readCount = 0;
      }
    }

    if (!this.writeQueue.isEmpty()) await this.executePendingWrites();
  }

  async #readBatch(batch: ReadBatch): Promise<boolean> {
    const res = await this.client.read(
      batch.functionCode,
      batch.start,
      batch.count,
      batch.unitId,
    );
    if (isErr(res)) {
      this.#logger?.warn(
        `Read failed (fc=${batch.functionCode} start=${batch.start} count=${batch.count}): ${res.err.message}`,
      );
      for (const tag of batch.tags) {
        this.#buffer?.setQuality(tag.qualifiedName, "Bad");
      }
      return false;
    }

    const data = res.val.data;
    for (const tag of batch.tags) {
      const offset = tag.address - batch.start;
      const raw = decodeTagValue(tag, data.slice(offset, offset + tag.count));
      const value = scaleDecoded(tag, raw);
      this.#buffer?.updateTagValue(tag.qualifiedName, value, "Good");
      this.#onValue?.(tag, value);
      this.#nextDue.set(
        tag,
        this.#clock() + (tag.scanRate > 0 ? tag.scanRate : this.#defaultScanMs),
      );
    }
    return true;
  }

  /** Failed writes stay queued for the next batch. */
  async executePendingWrites(): Promise<void> {
    for (const w of this.writeQueue.getPendingWrites()) {
      const res = await this.client.write(w.fc, w.address, w.value);
      if (isErr(res)) {
        this.#logger?.error(
          `Write failed (addr=${w.address} fc=${w.fc}): ${res.err.message}`,
        );
        this.writeQueue.markFailed(w.address, w.fc, res.err.message);
      } else {
        this.writeQueue.markCompleted(w.address, w.fc);
      }
    }
  }

  start(): void {
    if (this.#running) return;
    this.#running = true;
    this.#loop = this.#run();
  }

  async stop(): Promise<void> {
    this.#running = false;
    await this.#loop;
    this.#loop = undefined;
  }

  async #run(): Promise<void> {
    while (this.#running) {
      try {
        await this.tick();
      } catch (e) {
        this.#logger?.error("Poll cycle failed", e);
      }
      await this.#sleep(this.#cycleDelayMs);
    }
  }
}
