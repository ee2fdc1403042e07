import { isErr, isOk } from "option-t/plain_result";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { toRTUFrame } from "../src/frameBuilder.ts";
import { createLogger, type LogEntry } from "../src/logger.ts";
import { ModbusClient, TracedTransport } from "../src/runtime/client.ts";
import { DiagnosticsManager, toHex } from "../src/runtime/diagnostics.ts";
import { RequestScheduler } from "../src/scheduler/index.ts";
import { MockTransport } from "../src/transport/mock-transport.ts";
import { rtuSlave, type SlaveMemory } from "./modbus-slave.ts";

const rtu = (...pdu: number[]) => toRTUFrame(1, new Uint8Array(pdu));

describe("ModbusClient", () => {
  let transport: MockTransport;
  let memory: SlaveMemory;

  beforeEach(() => {
    transport = new MockTransport();
    memory = { coils: [0, 1], registers: [7, 0] };
    transport.responder = rtuSlave(memory);
  });

  const client = (extra: Partial<ConstructorParameters<typeof ModbusClient>[0]> = {}) =>
    new ModbusClient({
      framing: "rtu",
      requestTimeoutMs: 20,
      transport,
      unitId: 1,
      ...extra,
    });

  it("connects on first use and reads", async () => {
    const c = client();
    expect(c.connected).toBe(false);
    const res = await c.read(3, 0, 1);
    if (!isOk(res)) throw res.err;
    expect(res.val.data).toEqual([7]);
    expect(c.connected).toBe(true);
    expect(Array.from(transport.sentData[0])).toEqual([1, 3, 0, 0, 0, 1, 0x84, 0x0a]);
  });

  it("reads bits and writes registers", async () => {
    const c = client();
    const bits = await c.read(1, 0, 2);
    expect(isOk(bits) && bits.val.data).toEqual([0, 1]);
    const res = await c.write(6, 1, 99);
    expect(isOk(res)).toBe(true);
    expect(memory.registers).toEqual([7, 99]);
  });

  it("shares one connect between clients on a link", async () => {
    transport = new MockTransport({ type: "mock" }, { connectDelay: 5 });
    const connect = vi.spyOn(transport, "connect");
    const a = client();
    const b = client({ unitId: 2 });
    const [ra, rb] = await Promise.all([a.connect(), b.connect()]);
    expect(isOk(ra) && isOk(rb)).toBe(true);
    expect(connect).toHaveBeenCalledTimes(1);
  });

  it("logs each failed connect attempt", async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("client", {
      console: false,
      sinks: [(e) => entries.push(e)],
    });
    transport = new MockTransport({ type: "mock" }, { shouldFailConnect: true });
    const res = await client({ connectAttempts: 2, logger }).read(3, 0, 1);
    expect(isErr(res) && res.err.message).toBe("Mock transport error");
    expect(entries.map((e) => e.message)).toEqual([
      "[client] Connect attempt 1/2 failed: Mock transport error",
      "[client] Connect attempt 2/2 failed: Mock transport error",
    ]);
    expect(transport.sentData).toEqual([]);
  });

  it("retries a timed out request", async () => {
    const slave = rtuSlave(memory);
    let calls = 0;
    transport.responder = (req) => (++calls === 1 ? undefined : slave(req));
    const res = await client({ attempts: 2 }).read(3, 0, 1);
    expect(isOk(res) && res.val.data).toEqual([7]);
    expect(transport.sentData).toHaveLength(2);
  });

  it("does not retry exception replies", async () => {
    transport.responder = () => rtu(0x83, 2);
    const res = await client({ attempts: 3 }).read(3, 100, 1);
    expect(isErr(res) && res.err.message).toBe(
      "Illegal data address (address does not exist) (code: 2)",
    );
    expect(transport.sentData).toHaveLength(1);
  });

  it("closes the link", async () => {
    const c = client();
    await c.connect();
    await c.close();
    expect(transport.connected).toBe(false);
  });

  describe("with a scheduler", () => {
    let scheduler: RequestScheduler;

    beforeEach(() => {
      scheduler = new RequestScheduler(
        { requestIntervalMs: 1 },
        () => transport.connected,
      );
      scheduler.start();
    });

    afterEach(() => {
      scheduler.stop();
    });

    it("runs requests through the queue", async () => {
      const c = client({ scheduler });
      const write = await c.write(16, 0, [1, 2]);
      expect(isOk(write)).toBe(true);
      const read = await c.read(3, 0, 2);
      expect(isOk(read) && read.val.data).toEqual([1, 2]);
      expect(scheduler.getStats()).toMatchObject({
        failedRequests: 0,
        successfulRequests: 2,
        totalRequests: 2,
      });
    });

    it("fails once the scheduler stops", async () => {
      const c = client({ scheduler });
      await c.connect();
      scheduler.stop();
      const res = await c.read(3, 0, 1);
      expect(isErr(res) && res.err.message).toBe("Scheduler not running");
    });
  });
});

describe("TracedTransport", () => {
  it("records TX and RX frames", async () => {
    const transport = new MockTransport();
    transport.responder = rtuSlave({ coils: [], registers: [7] });
    const diagnostics = new DiagnosticsManager();
    const texts: string[] = [];
    diagnostics.registerListener("test", (r) => texts.push(r.text));
    const traced = new TracedTransport(transport, diagnostics);
    const c = new ModbusClient({ framing: "rtu", transport: traced, unitId: 1 });

    const res = await c.read(3, 0, 1);
    expect(isOk(res)).toBe(true);
    expect(traced.connected).toBe(true);
    expect(traced.state).toBe("connected");
    expect(texts).toEqual([
      "TX: 01 03 00 00 00 01 84 0A",
      `RX: ${toHex(rtu(3, 2, 0, 7))}`,
    ]);
  });
});
