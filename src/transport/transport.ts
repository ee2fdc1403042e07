/**
 * Transport abstraction for Modbus communication (MessagePort-like).
 *
 * Every link (serial port, TCP socket, UDP socket, in-memory mock) exposes
 * the same narrow surface: `connect()`, `disconnect()`, `postMessage()`
 * and DOM style events. Inbound bytes arrive as `message` events carrying
 * a `Uint8Array`; framing is left to the protocol layer.
 */

export type SerialParity = "none" | "even" | "odd";

/** Configuration for a `serialport` backed transport. */
export interface SerialTransportConfig {
  type: "serial";
  /** Device path, e.g. `COM3` or `/dev/ttyUSB0`. */
  path: string;
  baudRate: number;
  dataBits: 5 | 6 | 7 | 8;
  parity: SerialParity;
  stopBits: 1 | 2;
  rtscts?: boolean;
}

export interface TcpTransportConfig {
  type: "tcp";
  host: string;
  port: number;
  /** Give up connecting after this many milliseconds. */
  connectTimeoutMs?: number;
}

export interface UdpTransportConfig {
  type: "udp";
  host: string;
  port: number;
}

export interface MockTransportConfig {
  type: "mock";
  name?: string;
}

export type TransportConfig =
  | SerialTransportConfig
  | TcpTransportConfig
  | UdpTransportConfig
  | MockTransportConfig;

export type TransportType = TransportConfig["type"];

export type TransportState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "error";

export interface TransportMessageEvent extends CustomEvent<Uint8Array> {}
export interface TransportErrorEvent extends CustomEvent<Error> {
  /** Same as `detail`, mirroring WebSocket error events. */
  readonly error: Error;
}

export type TransportEventMap = {
  open: Event;
  close: Event;
  /** New state in `detail`. */
  statechange: CustomEvent<TransportState>;
  message: TransportMessageEvent;
  error: TransportErrorEvent;
};

export interface IModbusTransport {
  readonly config: TransportConfig;
  readonly state: TransportState;
  /** `state === "connected"` */
  readonly connected: boolean;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Send raw bytes. Throws when not connected. */
  postMessage(data: Uint8Array): void;
  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void;
}

/**
 * State bookkeeping and event dispatch shared by the concrete transports.
 */
export abstract class BaseTransport<C extends TransportConfig>
  implements IModbusTransport {
  #state: TransportState = "disconnected";
  readonly #target = new EventTarget();

  constructor(readonly config: C) {}

  get state(): TransportState {
    return this.#state;
  }

  get connected(): boolean {
    return this.#state === "connected";
  }

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract postMessage(data: Uint8Array): void;

  addEventListener<K extends keyof TransportEventMap>(
    type: K,
    listener: (ev: TransportEventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.#target.addEventListener(type, listener as EventListener, options);
  }

  protected setState(next: TransportState): void {
    if (this.#state === next) return;
    this.#state = next;
    this.#target.dispatchEvent(
      new CustomEvent<TransportState>("statechange", { detail: next }),
    );
  }

  protected dispatchOpen(): void {
    this.#target.dispatchEvent(new Event("open"));
  }

  /** Move to `disconnected` and fire `close` once. */
  protected markClosed(): void {
    if (this.#state === "disconnected") return;
    this.setState("disconnected");
    this.#target.dispatchEvent(new Event("close"));
  }

  protected dispatchMessage(data: Uint8Array): void {
    this.#target.dispatchEvent(
      new CustomEvent<Uint8Array>("message", { detail: data }),
    );
  }

  protected dispatchError(error: Error): void {
    this.#target.dispatchEvent(
      Object.assign(new CustomEvent<Error>("error", { detail: error }), {
        error,
      }),
    );
  }
}

export type TransportFactory<T extends TransportConfig = TransportConfig> = (
  config: T,
) => IModbusTransport;

type ConfigOf<K extends TransportType> = Extract<TransportConfig, { type: K }>;

function hasType<K extends TransportType>(
  config: TransportConfig,
  type: K,
): config is ConfigOf<K> {
  return config.type === type;
}

const factories = new Map<TransportType, TransportFactory>();

/**
 * Registry of transport factories keyed by config discriminator.
 *
 * `TransportRegistry.register("tcp", (cfg) => new TcpTransport(cfg))`
 */
export const TransportRegistry = {
  create(config: TransportConfig): IModbusTransport {
    const factory = factories.get(config.type);
    if (!factory) {
      throw new Error(`Unknown transport type: ${config.type}`);
    }
    return factory(config);
  },

  getRegisteredTypes(): TransportType[] {
    return [...factories.keys()];
  },

  /** Register (or replace) the factory for `type`. */
  register<K extends TransportType>(
    type: K,
    factory: TransportFactory<ConfigOf<K>>,
  ): void {
    factories.set(type, (config) => {
      if (!hasType(config, type)) {
        throw new Error(`Invalid config type for ${type} transport`);
      }
      return factory(config);
    });
  },
} as const;
