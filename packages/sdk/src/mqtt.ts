import { createLogger, toError, type Logger } from "@devicedeck/device-cache";
import mqtt, { type IClientOptions, type MqttClient } from "mqtt";

export type ConnectionState = "connecting" | "connected" | "error" | "offline";
export type MessageHandler = (topic: string, payload: Uint8Array) => void;
export type StateHandler = (state: ConnectionState) => void;

export interface BrokerCredentials {
  username?: string;
  password?: string;
  clientId?: string;
}

const BACKOFF_BASE_MS = 1000;
const BACKOFF_MAX_MS = 30000;

type ClientListeners = {
  connect: () => void;
  error: (error: Error) => void;
  close: () => void;
  message: (topic: string, payload: Uint8Array) => void;
};

/**
 * Broker connection for device notifications. Reconnects with exponential
 * backoff and restores topic subscriptions after every reconnect.
 */
export class DeviceEventBridge {
  private url: string | null = null;
  private credentials: BrokerCredentials = {};
  private client: MqttClient | null = null;
  private listeners: ClientListeners | null = null;
  private generation = 0;
  private connecting = false;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private state: ConnectionState = "offline";
  private lastError: Error | null = null;
  private pendingConnects: Array<() => void> = [];
  private readonly handlers = new Map<string, Set<MessageHandler>>();
  private readonly stateListeners = new Set<StateHandler>();
  private readonly log: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.log = options.logger ?? createLogger("event-bridge");
  }

  /** Resolves on the first successful connect, however many retries it takes. */
  async connect(url: string, credentials: BrokerCredentials = {}): Promise<void> {
    if (!url) {
      throw new Error("MQTT url is required");
    }

    const urlChanged = this.url !== null && this.url !== url;
    this.url = url;
    this.credentials = { ...this.credentials, ...definedOnly(credentials) };

    if (!urlChanged && this.state === "connected" && this.client) {
      return;
    }
    if (urlChanged) {
      this.resetConnection();
    }

    return new Promise<void>((resolve) => {
      this.pendingConnects.push(resolve);
      this.startConnection();
    });
  }

  async disconnect(): Promise<void> {
    this.clearReconnectTimer();
    this.pendingConnects = [];
    this.handlers.clear();
    this.credentials = {};
    this.lastError = null;
    this.url = null;
    this.reconnectAttempts = 0;
    this.updateState("offline");
    this.teardownClient();
  }

  subscribe(topic: string, handler: MessageHandler): () => void {
    if (!topic) {
      throw new Error("topic is required");
    }

    let set = this.handlers.get(topic);
    if (!set) {
      set = new Set();
      this.handlers.set(topic, set);
      this.requestSubscription(topic);
    }
    set.add(handler);

    return () => {
      this.removeHandler(topic, handler);
    };
  }

  unsubscribe(topic: string): void {
    if (!this.handlers.delete(topic)) {
      return;
    }
    if (this.client && this.state === "connected") {
      this.client.unsubscribe(topic, () => undefined);
    }
  }

  /** The handler is called at once with the current state. */
  onState(handler: StateHandler): () => void {
    this.stateListeners.add(handler);
    handler(this.state);
    return () => {
      this.stateListeners.delete(handler);
    };
  }

  getState(): ConnectionState {
    return this.state;
  }

  getLastError(): Error | null {
    return this.lastError;
  }

  private startConnection(): void {
    if (!this.url || this.connecting) {
      return;
    }

    this.connecting = true;
    this.clearReconnectTimer();
    this.teardownClient();

    const generation = ++this.generation;
    this.updateState("connecting");

    const options: IClientOptions = {
      reconnectPeriod: 0,
      clean: true,
      ...this.credentials
    };

    let instance: MqttClient;
    try {
      instance = mqtt.connect(this.url, options);
    } catch (error) {
      this.connecting = false;
      this.lastError = toError(error);
      this.updateState("error");
      this.scheduleReconnect();
      return;
    }

    const current = () => generation === this.generation;

    const listeners: ClientListeners = {
      connect: () => {
        if (!current()) return;
        this.connecting = false;
        this.reconnectAttempts = 0;
        this.lastError = null;
        this.updateState("connected");
        this.pendingConnects.splice(0).forEach((resolve) => resolve());
        for (const topic of this.handlers.keys()) {
          this.requestSubscription(topic);
        }
      },
      error: (error) => {
        if (!current()) return;
        this.connecting = false;
        this.lastError = error;
        this.log.debug("broker connection error", { url: this.url, error });
        this.updateState("error");
        this.scheduleReconnect();
      },
      close: () => {
        if (!current()) return;
        this.connecting = false;
        this.updateState("offline");
        this.scheduleReconnect();
      },
      message: (topic, payload) => {
        if (!current()) return;
        this.dispatch(topic, payload);
      }
    };

    instance.on("connect", listeners.connect);
    instance.on("error", listeners.error);
    instance.on("close", listeners.close);
    instance.on("offline", listeners.close);
    instance.on("end", listeners.close);
    instance.on("message", listeners.message);

    this.client = instance;
    this.listeners = listeners;
  }

  private requestSubscription(topic: string): void {
    if (!this.client || this.state !== "connected") {
      return;
    }
    this.client.subscribe(topic, (error) => {
      if (error) {
        this.lastError = toError(error);
        this.log.warn("subscribe failed", { topic, error });
        this.updateState("error");
      }
    });
  }

  private removeHandler(topic: string, handler: MessageHandler): void {
    const set = this.handlers.get(topic);
    if (!set) {
      return;
    }
    set.delete(handler);
    if (set.size === 0) {
      this.unsubscribe(topic);
    }
  }

  private dispatch(topic: string, payload: Uint8Array): void {
    const set = this.handlers.get(topic);
    if (!set || set.size === 0) {
      return;
    }
    const copy = new Uint8Array(payload);
    set.forEach((handler) => {
      try {
        handler(topic, copy);
      } catch (error) {
        this.log.warn("message handler threw", { topic, error });
      }
    });
  }

  private scheduleReconnect(): void {
    if (!this.url || this.reconnectTimer) {
      return;
    }
    this.reconnectAttempts += 1;
    const delay = reconnectDelay(this.reconnectAttempts);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.startConnection();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (!this.reconnectTimer) {
      return;
    }
    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
  }

  private teardownClient(): void {
    if (!this.client) {
      return;
    }
    if (this.listeners) {
      const { connect, error, close, message } = this.listeners;
      this.client.removeListener("connect", connect);
      this.client.removeListener("error", error);
      this.client.removeListener("close", close);
      this.client.removeListener("offline", close);
      this.client.removeListener("end", close);
      this.client.removeListener("message", message);
      this.listeners = null;
    }
    this.client.end(true);
    this.client = null;
    this.connecting = false;
  }

  private resetConnection(): void {
    this.clearReconnectTimer();
    this.teardownClient();
    this.reconnectAttempts = 0;
    this.updateState("offline");
  }

  private updateState(next: ConnectionState): void {
    const changed = this.state !== next;
    this.state = next;
    if (changed || next === "error") {
      this.stateListeners.forEach((listener) => listener(next));
    }
  }
}

/** Delay before reconnect attempt `attempt` (1-based). */
export function reconnectDelay(attempt: number): number {
  return Math.min(BACKOFF_BASE_MS * 2 ** (attempt - 1), BACKOFF_MAX_MS);
}

/** Subset of the bridge that topic consumers need. */
export interface EventSource {
  subscribe(topic: string, handler: MessageHandler): () => void;
}

function definedOnly(credentials: BrokerCredentials): BrokerCredentials {
  const result: BrokerCredentials = {};
  if (credentials.username !== undefined) result.username = credentials.username;
  if (credentials.password !== undefined) result.password = credentials.password;
  if (credentials.clientId !== undefined) result.clientId = credentials.clientId;
  return result;
}
