/**
 * Latest value per tag, shared by the polling worker and its consumers
 * (monitor views, an OPC UA bridge).
 */
import {
  DATA_BUFFER_MAX_AGE,
  DATA_BUFFER_MAX_SIZE,
} from "../config/constants.ts";

export type Quality = "Good" | "Bad" | "Uncertain";

export type TagValue = number | boolean | string | null | TagValue[];

export interface TagData {
  value: TagValue;
  /** Epoch milliseconds of the sample. */
  timestamp: number;
  quality: Quality;
  updateCount: number;
  lastUpdate: Date;
  lastWrite?: Date;
}

export interface TagInfo {
  dataType: string;
  access: string;
}

export type TagSnapshot = Partial<TagInfo> & Partial<TagData>;

export interface TagUpdate {
  name: string;
  value: TagValue;
  timestamp: number;
  quality: Quality;
}

export type TagUpdateListener = (update: TagUpdate) => void;

export interface DataBufferOptions {
  maxHistory?: number;
  /** Seconds. */
  maxAge?: number;
  now?: () => Date;
}

export class DataBuffer {
  readonly #data = new Map<string, TagData>();
  readonly #info = new Map<string, TagInfo>();
  readonly #listeners = new Set<TagUpdateListener>();
  #history: TagUpdate[] = [];
  readonly #maxHistory: number;
  readonly #maxAgeMs: number;
  readonly #now: () => Date;

  constructor(options: DataBufferOptions = {}) {
    this.#maxHistory = options.maxHistory ?? DATA_BUFFER_MAX_SIZE;
    this.#maxAgeMs = (options.maxAge ?? DATA_BUFFER_MAX_AGE) * 1000;
    this.#now = options.now ?? (() => new Date());
  }

  updateTagValue(
    name: string,
    value: TagValue,
    quality: Quality = "Good",
    timestamp = this.#now().getTime(),
  ): void {
    const prev = this.#data.get(name);
    this.#data.set(name, {
      ...prev,
      lastUpdate: this.#now(),
      quality,
      timestamp,
      updateCount: (prev?.updateCount ?? 0) + 1,
      value,
    });
    this.#record({ name, quality, timestamp, value });
  }

  /** Keep the last value and change only the quality. */
  setQuality(name: string, quality: Quality): void {
    const prev = this.#data.get(name);
    this.updateTagValue(name, prev?.value ?? null, quality);
  }

  setTagInfo(name: string, dataType = "", access = "R"): void {
    this.#info.set(name, { access, dataType });
  }

  getTagData(name: string): TagSnapshot {
    return { ...this.#info.get(name), ...this.#data.get(name) };
  }

  getTagValue(name: string): TagValue | undefined {
    return this.#data.get(name)?.value;
  }

  /** Store a value written from outside the poll loop. */
  writeTagValue(name: string, value: TagValue): void {
    const now = this.#now();
    const prev = this.#data.get(name);
    this.#data.set(name, {
      lastUpdate: prev?.lastUpdate ?? now,
      quality: prev?.quality ?? "Uncertain",
      timestamp: prev?.timestamp ?? now.getTime(),
      updateCount: prev?.updateCount ?? 0,
      ...prev,
      lastWrite: now,
      value,
    });
  }

  /** Tags that have data, merged with their static info. */
  getAllTags(): Record<string, TagSnapshot> {
    const out: Record<string, TagSnapshot> = {};
    for (const name of this.#data.keys()) out[name] = this.getTagData(name);
    return out;
  }

  /** Updates newer than `maxAge`, oldest first. */
  history(): TagUpdate[] {
    this.#prune();
    return [...this.#history];
  }

  subscribe(listener: TagUpdateListener): () => void {
    this.#listeners.add(listener);
    return () => this.#listeners.delete(listener);
  }

  clear(): void {
    this.#data.clear();
    this.#info.clear();
    this.#history = [];
  }

  #record(update: TagUpdate) {
    this.#history.push(update);
    this.#prune();
    for (const listener of [...this.#listeners]) listener(update);
  }

  #prune() {
    const cutoff = this.#now().getTime() - this.#maxAgeMs;
    let start = this.#history.findIndex((u) => u.timestamp >= cutoff);
    if (start === -1) start = this.#history.length;
    start = Math.max(start, this.#history.length - this.#maxHistory);
    if (start > 0) this.#history = this.#history.slice(start);
  }
}
