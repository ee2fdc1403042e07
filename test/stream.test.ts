import { afterEach, describe, expect, it, vi } from "vitest";
import { ModbusTimeoutError } from "../src/errors.ts";
import { byteStreamFromTransport, requestSignal } from "../src/stream.ts";
import { MockTransport } from "../src/transport/mock-transport.ts";

async function consume(
  iter: AsyncIterable<Uint8Array>,
  seen: number[][] = [],
): Promise<string> {
  try {
    for await (const c of iter) seen.push(Array.from(c));
    return "completed";
  } catch (e) {
    return e instanceof Error ? e.message : String(e);
  }
}

describe("byteStreamFromTransport", () => {
  it("yields chunks then ends on close", async () => {
    const t = new MockTransport();
    await t.connect();
    const chunks: number[][] = [];
    const done = consume(byteStreamFromTransport(t), chunks);
    t.simulateData(new Uint8Array([1, 2]));
    t.simulateData(new Uint8Array([3]));
    await t.disconnect();
    expect(await done).toBe("completed");
    expect(chunks).toEqual([[1, 2], [3]]);
  });

  it("propagates error event", async () => {
    const t = new MockTransport();
    await t.connect();
    const done = consume(byteStreamFromTransport(t));
    t.simulateError(new Error("boom"));
    expect(await done).toBe("boom");
  });

  it("abort signal terminates iteration with its reason", async () => {
    const t = new MockTransport();
    await t.connect();
    const controller = new AbortController();
    const seen: number[][] = [];
    const done = consume(
      byteStreamFromTransport(t, { signal: controller.signal }),
      seen,
    );
    t.simulateData(new Uint8Array([9]));
    await new Promise((r) => setTimeout(r, 0));
    controller.abort(new Error("stop"));
    expect(await done).toBe("stop");
    expect(seen).toEqual([[9]]);
  });

  it("fails at once on an already aborted signal", async () => {
    const t = new MockTransport();
    await t.connect();
    const done = consume(
      byteStreamFromTransport(t, { signal: AbortSignal.abort(new Error("late")) }),
    );
    expect(await done).toBe("late");
  });
});

describe("requestSignal", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("aborts with a timeout error after timeoutMs", () => {
    vi.useFakeTimers();
    const { signal } = requestSignal({ timeoutMs: 100 });
    vi.advanceTimersByTime(99);
    expect(signal.aborted).toBe(false);
    vi.advanceTimersByTime(1);
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(ModbusTimeoutError);
    expect(signal.reason.message).toBe("Request timed out after 100ms");
  });

  it("dispose cancels the timer", () => {
    vi.useFakeTimers();
    const { dispose, signal } = requestSignal({ timeoutMs: 100 });
    dispose();
    vi.advanceTimersByTime(500);
    expect(signal.aborted).toBe(false);
  });

  it("forwards the caller's abort", () => {
    const caller = new AbortController();
    const { dispose, signal } = requestSignal({
      signal: caller.signal,
      timeoutMs: 1000,
    });
    caller.abort(new Error("cancel"));
    dispose();
    expect(signal.reason.message).toBe("cancel");
  });

  it("returns the caller's signal when there is no timeout", () => {
    const caller = new AbortController();
    expect(requestSignal({ signal: caller.signal }).signal).toBe(caller.signal);
  });
});
