// TX/RX traffic recorder feeding terminal-style views.
import { randomUUID } from "node:crypto";
import { DIAGNOSTICS_CAPACITY } from "../config/constants.ts";
import type { Logger } from "../logger.ts";

export type TrafficDirection = "TX" | "RX";

export interface DiagnosticContext {
  direction?: TrafficDirection | string;
  unitId?: number;
  [key: string]: unknown;
}

export interface DiagnosticRecord {
  /** Local time, `HH:MM:SS.mmm` */
  timestamp: string;
  text: string;
  context?: DiagnosticContext;
}

export type DiagnosticListener = (record: DiagnosticRecord) => void;
export type DiagnosticMatcher = (
  text: string,
  context: DiagnosticContext | undefined,
) => boolean;

export interface DiagnosticsOptions {
  capacity?: number;
  onlyTxrx?: boolean;
  logger?: Logger;
  now?: () => Date;
}

interface ListenerEntry {
  name: string;
  callback: DiagnosticListener;
  matcher?: DiagnosticMatcher;
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

export function formatClock(d: Date): string {
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${
    pad(d.getMilliseconds(), 3)
  }`;
}

export function toHex(bytes: ArrayLike<number>): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0").toUpperCase())
    .join(" ");
}

/**
 * Bounded record of protocol traffic. Nothing is kept while no listener
 * is registered.
 */
export class DiagnosticsManager {
  readonly #capacity: number;
  readonly #logger?: Logger;
  readonly #now: () => Date;
  #onlyTxrx: boolean;
  #records: DiagnosticRecord[] = [];
  readonly #listeners = new Map<string, ListenerEntry>();

  constructor(options: DiagnosticsOptions = {}) {
    this.#capacity = Math.max(1, Math.trunc(options.capacity ?? DIAGNOSTICS_CAPACITY));
    this.#onlyTxrx = options.onlyTxrx ?? false;
    this.#logger = options.logger;
    this.#now = options.now ?? (() => new Date());
  }

  setOnlyTxrx(value: boolean): void {
    this.#onlyTxrx = value;
  }

  /** Returns the token for {@link unregisterListener}. */
  registerListener(
    name: string,
    callback: DiagnosticListener,
    matcher?: DiagnosticMatcher,
  ): string {
    const token = randomUUID();
    this.#listeners.set(token, { callback, matcher, name });
    return token;
  }

  unregisterListener(token: string): void {
    this.#listeners.delete(token);
  }

  get listenerCount(): number {
    return this.#listeners.size;
  }

  #shouldEmit(text: string, context?: DiagnosticContext): boolean {
    if (!this.#onlyTxrx) return true;
    if (text.includes("TX:") || text.includes("RX:")) return true;
    const dir = String(context?.direction ?? "").toUpperCase();
    return dir === "TX" || dir === "RX";
  }

  emit(text: string, context?: DiagnosticContext, timestamp?: string): void {
    if (!this.#shouldEmit(text, context)) return;
    if (this.#listeners.size === 0) return;

    const record: DiagnosticRecord = {
      context,
      text,
      timestamp: timestamp ?? formatClock(this.#now()),
    };
    this.#records.push(record);
    if (this.#records.length > this.#capacity) {
      this.#records = this.#records.slice(-this.#capacity);
    }

    for (const { callback, matcher, name } of [...this.#listeners.values()]) {
      if (matcher && !matcher(record.text, record.context)) continue;
      try {
        callback(record);
      } catch (e) {
        this.#logger?.error(`Diagnostics listener "${name}" failed`, e);
      }
    }
  }

  /** `TX: 01 03 ...` / `RX: ...` record for one frame. */
  traffic(
    direction: TrafficDirection,
    bytes: ArrayLike<number>,
    context: DiagnosticContext = {},
  ): void {
    if (this.#listeners.size === 0) return;
    this.emit(`${direction}: ${toHex(bytes)}`, { ...context, direction });
  }

  snapshot(): DiagnosticRecord[] {
    return [...this.#records];
  }

  clear(): void {
    this.#records = [];
  }

  /** Drop every listener and record. */
  stop(): void {
    this.#listeners.clear();
    this.#records = [];
  }
}
