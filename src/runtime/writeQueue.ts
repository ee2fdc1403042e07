// Pending Modbus writes, one slot per (address, function code).
import {
  WRITE_QUEUE_BATCH,
  WRITE_QUEUE_MAX_PENDING,
} from "../config/constants.ts";
import type { WriteFunctionCode } from "../functionCodes.ts";

export type WriteValue = number | readonly number[];

export interface PendingWrite {
  address: number;
  fc: WriteFunctionCode;
  value: WriteValue;
  /** Tag name or other caller context. */
  tag?: string;
  enqueuedAt: number;
}

export interface WriteQueueStats {
  enqueued: number;
  executed: number;
  overwritten: number;
  failed: number;
  pending_count: number;
}

export interface WriteQueueOptions {
  maxPending?: number;
  batchSize?: number;
  onDiagnostic?: (message: string) => void;
  now?: () => number;
}

const keyOf = (address: number, fc: number) => `${address}:${fc}`;

const show = (value: WriteValue) =>
  typeof value === "number" ? String(value) : `[${value.join(",")}]`;

/**
 * Write queue where only the latest value per point is kept. Entries stay
 * queued until {@link markCompleted}, so a failed write is retried on the
 * next batch.
 */
export class WriteQueueManager {
  readonly maxPending: number;
  readonly batchSize: number;
  readonly #queue = new Map<string, PendingWrite>();
  readonly #diag?: (message: string) => void;
  readonly #now: () => number;
  #stats = { enqueued: 0, executed: 0, failed: 0, overwritten: 0 };

  constructor(options: WriteQueueOptions = {}) {
    this.maxPending = options.maxPending ?? WRITE_QUEUE_MAX_PENDING;
    this.batchSize = options.batchSize ?? WRITE_QUEUE_BATCH;
    this.#diag = options.onDiagnostic;
    this.#now = options.now ?? (() => performance.now());
  }

  /** False when the queue is full and the point is not already queued. */
  enqueue(
    address: number,
    fc: WriteFunctionCode,
    value: WriteValue,
    tag?: string,
  ): boolean {
    const key = keyOf(address, fc);
    const existing = this.#queue.get(key);
    if (!existing && this.#queue.size >= this.maxPending) {
      this.#diag?.(`WRITE_QUEUE_FULL: max=${this.maxPending}`);
      return false;
    }
    if (existing) {
      this.#stats.overwritten++;
      this.#diag?.(
        `WRITE_QUEUE_OVERRIDE: addr=${address} fc=${fc} old=${
          show(existing.value)
        } new=${show(value)}`,
      );
    } else {
      this.#stats.enqueued++;
      this.#diag?.(
        `WRITE_QUEUE_ENQUEUE: addr=${address} fc=${fc} value=${show(value)}`,
      );
    }
    // Map.set on an existing key keeps its insertion position.
    this.#queue.set(key, {
      address,
      enqueuedAt: this.#now(),
      fc,
      tag,
      value,
    });
    return true;
  }

  /** Oldest entries first; nothing is removed. */
  getPendingWrites(maxCount = this.batchSize): PendingWrite[] {
    return [...this.#queue.values()].slice(0, Math.max(0, maxCount));
  }

  markCompleted(address: number, fc: WriteFunctionCode): boolean {
    if (!this.#queue.delete(keyOf(address, fc))) return false;
    this.#stats.executed++;
    this.#diag?.(`WRITE_COMPLETED: addr=${address} fc=${fc}`);
    return true;
  }

  markFailed(address: number, fc: WriteFunctionCode, error: string): void {
    this.#stats.failed++;
    this.#diag?.(`WRITE_FAILED: addr=${address} fc=${fc} error=${error}`);
  }

  isEmpty(): boolean {
    return this.#queue.size === 0;
  }

  get count(): number {
    return this.#queue.size;
  }

  clear(): void {
    this.#queue.clear();
  }

  getStats(): WriteQueueStats {
    return { ...this.#stats, pending_count: this.#queue.size };
  }
}
