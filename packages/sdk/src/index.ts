export { RpcError, componentMethod, createDeviceClient, parseDeviceInfo } from "./rpc";
export type {
  ComponentConfig,
  ComponentStatus,
  DeviceClient,
  DeviceClientOptions,
  DeviceInfo,
  SetConfigResult
} from "./rpc";
export { createDeviceFetchers, deviceChannels } from "./fetchers";
export type { DeviceFetchers } from "./fetchers";
export { DeviceEventBridge, reconnectDelay } from "./mqtt";
export type {
  BrokerCredentials,
  ConnectionState,
  EventSource,
  MessageHandler,
  StateHandler
} from "./mqtt";
export { parseNotification } from "./notifications";
export type { DeviceEvent, DeviceNotification, NotificationMethod } from "./notifications";
export { bindCacheInvalidation, dataTypesForComponent } from "./cache-sync";
export * from "./topics";
