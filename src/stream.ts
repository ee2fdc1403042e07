/**
 * Turn transport events into async iterables, and per-request abort
 * signals with a timeout.
 */
import { ModbusTimeoutError } from "./errors.ts";
import type { RequestOptions } from "./modbus.ts";
import type { IModbusTransport } from "./transport/transport.ts";

/**
 * Raw chunks received by `transport`.
 *
 * Ends on `close`; throws the transport error on `error`, or the abort
 * reason when `signal` aborts.
 */
export async function* byteStreamFromTransport(
  transport: IModbusTransport,
  options: { signal?: AbortSignal } = {},
): AsyncGenerator<Uint8Array, void, unknown> {
  const { signal } = options;
  const queue: Uint8Array[] = [];
  let wake: (() => void) | undefined;
  let done = false;
  let failure: Error | undefined;

  const notify = () => {
    const w = wake;
    wake = undefined;
    w?.();
  };
  const finish = (error?: Error) => {
    if (done) return;
    done = true;
    failure = error;
    notify();
  };
  const onAbort = () =>
    finish(signal?.reason instanceof Error ? signal.reason : new Error("Aborted"));

  // Listeners live until the consumer stops iterating.
  const detach = new AbortController();
  const listen = { signal: detach.signal };
  if (signal?.aborted) {
    onAbort();
  } else {
    transport.addEventListener("message", (ev) => {
      if (done) return;
      queue.push(ev.detail);
      notify();
    }, listen);
    transport.addEventListener("error", (ev) => finish(ev.error), listen);
    transport.addEventListener("close", () => finish(), listen);
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    while (true) {
      const chunk = queue.shift();
      if (chunk) {
        yield chunk;
        continue;
      }
      if (done) break;
      await new Promise<void>((r) => {
        wake = r;
      });
    }
    if (failure) throw failure;
  } finally {
    done = true;
    detach.abort();
    signal?.removeEventListener("abort", onAbort);
  }
}

export interface RequestSignal {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Combine the caller's signal with `timeoutMs`. On expiry the signal aborts
 * with a {@link ModbusTimeoutError}.
 */
export function requestSignal(options: RequestOptions = {}): RequestSignal {
  const { signal, timeoutMs } = options;
  if (timeoutMs === undefined && signal) return { dispose: () => {}, signal };
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) onAbort();
  else signal?.addEventListener("abort", onAbort, { once: true });
  const timer = timeoutMs === undefined
    ? undefined
    : setTimeout(() => controller.abort(new ModbusTimeoutError(timeoutMs)), timeoutMs);
  return {
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    },
    signal: controller.signal,
  };
}
