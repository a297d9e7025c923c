import { isRecord } from "@devicedeck/device-cache";

export interface DeviceInfo {
  id: string;
  mac?: string;
  model?: string;
  gen?: number;
  fwId?: string;
  version?: string;
  app?: string;
  name?: string;
  authEnabled?: boolean;
}

export type ComponentConfig = Record<string, unknown>;
export type ComponentStatus = Record<string, unknown>;

export interface SetConfigResult {
  restartRequired: boolean;
}

export interface DeviceClient {
  /** Raw JSON-RPC call; resolves with the `result` member. */
  call(method: string, params?: Record<string, unknown>): Promise<unknown>;
  getDeviceInfo(): Promise<DeviceInfo>;
  getStatus(component: string): Promise<ComponentStatus>;
  getConfig(component: string): Promise<ComponentConfig>;
  setConfig(component: string, config: ComponentConfig): Promise<SetConfigResult>;
}

export interface DeviceClientOptions {
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

export class RpcError extends Error {
  readonly code: number;

  constructor(method: string, code: number, message: string) {
    super(`${method} failed (${code}): ${message}`);
    this.name = "RpcError";
    this.code = code;
  }
}

export function createDeviceClient(options: string | DeviceClientOptions): DeviceClient {
  const resolved = typeof options === "string" ? { baseUrl: options } : options;
  const endpoint = `${normalizedBaseUrl(resolved.baseUrl)}/rpc`;
  const fetchImpl = resolved.fetchImpl ?? globalFetch();
  const defaultHeaders = resolved.defaultHeaders ?? {};
  let nextId = 1;

  const call = async (method: string, params?: Record<string, unknown>): Promise<unknown> => {
    const id = nextId++;
    const response = await fetchImpl(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...defaultHeaders
      },
      body: JSON.stringify(params === undefined ? { id, method } : { id, method, params })
    });

    if (!response.ok) {
      throw new Error(`Request failed (${response.status} ${response.statusText}) for ${method}`);
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new Error(`Malformed RPC response for ${method}`);
    }
    const error = body["error"];
    if (isRecord(error)) {
      const code = typeof error["code"] === "number" ? error["code"] : -1;
      const message = typeof error["message"] === "string" ? error["message"] : "unknown error";
      throw new RpcError(method, code, message);
    }
    return body["result"];
  };

  const expectRecord = (method: string, value: unknown): Record<string, unknown> => {
    if (!isRecord(value)) {
      throw new Error(`Unexpected result for ${method}`);
    }
    return value;
  };

  return {
    call,
    async getDeviceInfo() {
      const method = "Shelly.GetDeviceInfo";
      return parseDeviceInfo(await call(method));
    },
    async getStatus(component) {
      const { method, params } = componentMethod(component, "GetStatus");
      return expectRecord(method, await call(method, params));
    },
    async getConfig(component) {
      const { method, params } = componentMethod(component, "GetConfig");
      return expectRecord(method, await call(method, params));
    },
    async setConfig(component, config) {
      const { method, params } = componentMethod(component, "SetConfig");
      const result = expectRecord(method, await call(method, { ...params, config }));
      return { restartRequired: result["restart_required"] === true };
    }
  };
}

/**
 * Maps a component key such as `wifi` or `input:0` to its RPC method and
 * params: `Wifi.GetConfig`, or `Input.GetConfig` with `{ id: 0 }`.
 */
export function componentMethod(component: string, verb: string): { method: string; params?: Record<string, unknown> } {
  const [type, rawId] = component.split(":");
  if (!type) {
    throw new Error("component is required");
  }
  const method = `${type.charAt(0).toUpperCase()}${type.slice(1)}.${verb}`;
  if (rawId === undefined) {
    return { method };
  }
  const id = Number.parseInt(rawId, 10);
  if (!Number.isInteger(id) || id < 0) {
    throw new Error(`invalid component id in "${component}"`);
  }
  return { method, params: { id } };
}

export function parseDeviceInfo(raw: unknown): DeviceInfo {
  if (!isRecord(raw) || typeof raw["id"] !== "string") {
    throw new Error("device info must carry an id");
  }
  const record = raw;
  const str = (key: string): string | undefined => {
    const value = record[key];
    return typeof value === "string" ? value : undefined;
  };
  return {
    id: raw["id"],
    mac: str("mac"),
    model: str("model"),
    gen: typeof raw["gen"] === "number" ? raw["gen"] : undefined,
    fwId: str("fw_id"),
    version: str("ver"),
    app: str("app"),
    name: str("name"),
    authEnabled: typeof raw["auth_en"] === "boolean" ? raw["auth_en"] : undefined
  };
}

function normalizedBaseUrl(baseUrl: string): string {
  if (!baseUrl) {
    throw new Error("baseUrl is required for DeviceClient");
  }
  return baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
}

function globalFetch(): typeof fetch {
  if (typeof fetch === "function") {
    return fetch.bind(globalThis);
  }
  throw new Error("fetch is not available in the current environment");
}
