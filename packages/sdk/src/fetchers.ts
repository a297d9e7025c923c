import { DataTypes, TTL, defineChannel, isRecord, type CacheChannel, type Fetcher } from "@devicedeck/device-cache";
import { parseDeviceInfo, type ComponentConfig, type DeviceClient, type DeviceInfo } from "./rpc";

function parseConfig(raw: unknown): ComponentConfig {
  if (!isRecord(raw)) {
    throw new Error("component config must be an object");
  }
  return raw;
}

const configChannel = (dataType: string, ttlMs: number): CacheChannel<ComponentConfig> =>
  defineChannel({ dataType, ttlMs, parse: parseConfig });

/** Typed cache channels for the device data the fetchers below produce. */
export const deviceChannels = {
  deviceInfo: defineChannel<DeviceInfo>({ dataType: DataTypes.deviceInfo, ttlMs: TTL.deviceInfo, parse: parseDeviceInfo }),
  system: configChannel(DataTypes.system, TTL.system),
  wifi: configChannel(DataTypes.wifi, TTL.wifi),
  cloud: configChannel(DataTypes.cloud, TTL.cloud),
  ble: configChannel(DataTypes.ble, TTL.ble),
  mqtt: configChannel(DataTypes.mqtt, TTL.protocols)
} as const;

export interface DeviceFetchers {
  deviceInfo: Fetcher<DeviceInfo>;
  system: Fetcher<ComponentConfig>;
  wifi: Fetcher<ComponentConfig>;
  cloud: Fetcher<ComponentConfig>;
  ble: Fetcher<ComponentConfig>;
  mqtt: Fetcher<ComponentConfig>;
}

export function createDeviceFetchers(client: DeviceClient): DeviceFetchers {
  return {
    deviceInfo: () => client.getDeviceInfo(),
    system: () => client.getConfig("sys"),
    wifi: () => client.getConfig("wifi"),
    cloud: () => client.getConfig("cloud"),
    ble: () => client.getConfig("ble"),
    mqtt: () => client.getConfig("mqtt")
  };
}
