// In-memory transport for tests and offline demos.
import { BaseTransport, type MockTransportConfig } from "./transport.ts";

export interface MockTransportOptions {
  /** Delay before `connect()` resolves (ms). */
  connectDelay?: number;
  /** `connect()` rejects with `errorMessage`. */
  shouldFailConnect?: boolean;
  /** `postMessage()` fires an error event and throws. */
  shouldFailSend?: boolean;
  errorMessage?: string;
  /** Canned replies keyed by the request bytes joined with `,`. */
  autoResponses?: Map<string, Uint8Array>;
  /** Delay before an auto response is delivered (ms). */
  responseDelay?: number;
}

const keyOf = (bytes: Uint8Array) => Array.from(bytes).join(",");

/**
 * Transport whose peer is the test: outbound frames are recorded in
 * `sentData` and inbound bytes are injected with `simulateData` or
 * answered from `autoResponses`.
 */
export class MockTransport extends BaseTransport<MockTransportConfig> {
  readonly sentData: Uint8Array[] = [];
  #options: Required<Omit<MockTransportOptions, "autoResponses">>;
  #responses: Map<string, Uint8Array>;
  /** Called with each outbound frame; may return the reply. */
  responder?: (request: Uint8Array) => Uint8Array | undefined;

  constructor(
    config: MockTransportConfig = { type: "mock" },
    options: MockTransportOptions = {},
  ) {
    super(config);
    this.#responses = options.autoResponses ?? new Map();
    this.#options = {
      connectDelay: options.connectDelay ?? 0,
      errorMessage: options.errorMessage ?? "Mock transport error",
      responseDelay: options.responseDelay ?? 1,
      shouldFailConnect: options.shouldFailConnect ?? false,
      shouldFailSend: options.shouldFailSend ?? false,
    };
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    this.setState("connecting");
    if (this.#options.connectDelay > 0) {
      await new Promise((r) => setTimeout(r, this.#options.connectDelay));
    }
    if (this.#options.shouldFailConnect) {
      this.setState("error");
      throw new Error(this.#options.errorMessage);
    }
    this.setState("connected");
    this.dispatchOpen();
  }

  async disconnect(): Promise<void> {
    this.markClosed();
  }

  postMessage(data: Uint8Array): void {
    if (!this.connected) throw new Error("Transport not connected");
    if (this.#options.shouldFailSend) {
      const error = new Error(this.#options.errorMessage);
      this.dispatchError(error);
      throw error;
    }
    const copy = new Uint8Array(data);
    this.sentData.push(copy);
    const reply = this.responder?.(copy) ?? this.#responses.get(keyOf(copy));
    if (reply) {
      setTimeout(() => {
        if (this.connected) this.dispatchMessage(reply);
      }, this.#options.responseDelay);
    }
  }

  setAutoResponse(request: Uint8Array, response: Uint8Array): void {
    this.#responses.set(keyOf(request), response);
  }

  clearAutoResponses(): void {
    this.#responses.clear();
  }

  /** Inject inbound bytes as if the peer had sent them. */
  simulateData(data: Uint8Array): void {
    if (this.connected) this.dispatchMessage(data);
  }

  simulateError(error: Error): void {
    this.setState("error");
    this.dispatchError(error);
  }

  simulateDisconnect(): void {
    this.markClosed();
  }

  getLastSentData(): Uint8Array | undefined {
    return this.sentData.at(-1);
  }

  clearSentData(): void {
    this.sentData.length = 0;
  }
}
