// Request scheduler: serialises Modbus exchanges on one link and adds
// priority, pacing and retry.

import { createErr, isOk, type Result } from "option-t/plain_result";
import { toError } from "../errors.ts";

export enum RequestPriority {
  LOW = 0,
  NORMAL = 1,
  HIGH = 2,
  CRITICAL = 3,
}

export interface RetryOptions {
  maxRetries: number;
  /** Base delay in milliseconds */
  baseDelay: number;
  exponentialBackoff: boolean;
  /** Error names that trigger a retry; all errors when omitted */
  retryableErrors?: string[];
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error or
 * `maxRetries` extra attempts are spent.
 */
export async function executeWithRetry<T>(
  operation: () => Promise<Result<T, Error>>,
  options: RetryOptions,
  sleep: (ms: number) => Promise<void> = (ms) =>
    new Promise((resolve) => setTimeout(resolve, ms)),
): Promise<Result<T, Error>> {
  const { baseDelay, exponentialBackoff, maxRetries, retryableErrors } =
    options;
  let attempt = 0;
  for (;;) {
    const result = await operation();
    if (isOk(result)) return result;
    if (retryableErrors && !retryableErrors.includes(result.err.name)) {
      return result;
    }
    if (attempt >= maxRetries) return result;
    await sleep(exponentialBackoff ? baseDelay * 2 ** attempt : baseDelay);
    attempt++;
  }
}

export type ScheduledOperation<T> = () => Promise<Result<T, Error>>;

interface InternalRequest {
  id: number;
  priority: RequestPriority;
  retryOptions: RetryOptions;
  timestamp: Date;
  run: () => Promise<void>;
  fail: (error: Error) => void;
}

export interface SchedulerConfig {
  /** One for RTU links */
  maxConcurrentRequests: number;
  defaultRetryOptions: RetryOptions;
  queueSizeLimit: number;
  /** Minimum interval between requests */
  requestIntervalMs: number;
}

export interface SchedulerStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  queueLength: number;
  activeRequests: number;
  averageResponseTime: number;
  uptime: number;
}

export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfig> = {
  defaultRetryOptions: {
    baseDelay: 100,
    exponentialBackoff: true,
    maxRetries: 2,
    retryableErrors: ["ModbusTimeoutError", "ModbusCRCError"],
  },
  maxConcurrentRequests: 1,
  queueSizeLimit: 100,
  requestIntervalMs: 10,
};

/**
 * Priority queue in front of a link. Requests with a higher priority run
 * first; equal priorities keep submission order.
 */
export class RequestScheduler {
  readonly #config: SchedulerConfig;
  readonly #isReady: () => boolean;
  readonly #queue: InternalRequest[] = [];
  readonly #active = new Set<InternalRequest>();
  readonly #stats: SchedulerStats = {
    activeRequests: 0,
    averageResponseTime: 0,
    failedRequests: 0,
    queueLength: 0,
    successfulRequests: 0,
    totalRequests: 0,
    uptime: 0,
  };
  #running = false;
  #timer: ReturnType<typeof setInterval> | undefined;
  #lastRequestTime = 0;
  #startTime = Date.now();
  #nextId = 1;

  /** `isReady` gates submission, typically `() => transport.connected`. */
  constructor(
    config: Partial<SchedulerConfig> = {},
    isReady: () => boolean = () => true,
  ) {
    this.#config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.#isReady = isReady;
  }

  start(): void {
    if (this.#running) return;
    this.#running = true;
    this.#startTime = Date.now();
    this.#timer = setInterval(
      () => this.#processQueue(),
      Math.max(1, this.#config.requestIntervalMs),
    );
  }

  /** Stop processing; queued requests resolve with an error. */
  stop(): void {
    if (!this.#running) return;
    this.#running = false;
    clearInterval(this.#timer);
    this.#timer = undefined;
    this.#drain("Scheduler stopped");
  }

  isRunning(): boolean {
    return this.#running;
  }

  schedule<T>(
    operation: ScheduledOperation<T>,
    priority: RequestPriority = RequestPriority.NORMAL,
    retryOptions: RetryOptions = this.#config.defaultRetryOptions,
  ): Promise<Result<T, Error>> {
    if (!this.#running) {
      return Promise.resolve(createErr(new Error("Scheduler not running")));
    }
    if (!this.#isReady()) {
      return Promise.resolve(createErr(new Error("Transport not connected")));
    }
    if (this.#queue.length >= this.#config.queueSizeLimit) {
      return Promise.resolve(createErr(new Error("Request queue is full")));
    }

    return new Promise((resolve) => {
      const request: InternalRequest = {
        fail: (error) => resolve(createErr(error)),
        id: this.#nextId++,
        priority,
        retryOptions,
        run: async () => {
          const started = Date.now();
          let result: Result<T, Error>;
          try {
            result = await executeWithRetry(operation, retryOptions);
          } catch (e) {
            result = createErr(toError(e));
          }
          if (isOk(result)) this.#stats.successfulRequests++;
          else this.#stats.failedRequests++;
          this.#recordResponseTime(Date.now() - started);
          resolve(result);
        },
        timestamp: new Date(),
      };
      this.#insertByPriority(request);
      this.#stats.totalRequests++;
      this.#updateQueueStats();
    });
  }

  #insertByPriority(request: InternalRequest): void {
    const index = this.#queue.findIndex((q) => request.priority > q.priority);
    this.#queue.splice(index === -1 ? this.#queue.length : index, 0, request);
  }

  #processQueue(): void {
    if (!this.#running) return;
    if (this.#active.size >= this.#config.maxConcurrentRequests) return;
    const now = Date.now();
    if (now - this.#lastRequestTime < this.#config.requestIntervalMs) return;

    const request = this.#queue.shift();
    if (!request) return;
    this.#active.add(request);
    this.#lastRequestTime = now;
    this.#updateQueueStats();

    void request.run().finally(() => {
      this.#active.delete(request);
      this.#updateQueueStats();
    });
  }

  #drain(reason: string): void {
    const pending = this.#queue.splice(0);
    for (const request of pending) request.fail(new Error(reason));
    this.#updateQueueStats();
  }

  #updateQueueStats(): void {
    this.#stats.queueLength = this.#queue.length;
    this.#stats.activeRequests = this.#active.size;
    this.#stats.uptime = Date.now() - this.#startTime;
  }

  #recordResponseTime(ms: number): void {
    const completed = this.#stats.successfulRequests +
      this.#stats.failedRequests;
    this.#stats.averageResponseTime =
      (this.#stats.averageResponseTime * (completed - 1) + ms) / completed;
  }

  getStats(): SchedulerStats {
    this.#updateQueueStats();
    return { ...this.#stats };
  }

  /** Drop every queued request; each resolves with an error. */
  clearQueue(): void {
    this.#drain("Queue cleared");
  }

  getQueueContents(): Array<{
    id: number;
    priority: RequestPriority;
    timestamp: Date;
  }> {
    return this.#queue.map(({ id, priority, timestamp }) => ({
      id,
      priority,
      timestamp,
    }));
  }

  getConfig(): SchedulerConfig {
    return { ...this.#config };
  }
}
