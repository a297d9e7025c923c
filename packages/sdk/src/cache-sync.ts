import { DataTypes, componentDataType, createLogger, type Logger, type RefreshCoordinator } from "@devicedeck/device-cache";
import type { EventSource } from "./mqtt";
import { parseNotification } from "./notifications";
import { rpcEventTopic } from "./topics";

const CONFIG_CHANGED = "config_changed";

const COMPONENT_TYPES: Record<string, string> = {
  sys: DataTypes.system,
  wifi: DataTypes.wifi,
  cloud: DataTypes.cloud,
  ble: DataTypes.ble,
  mqtt: DataTypes.mqtt,
  eth: DataTypes.ethernet,
  modbus: DataTypes.modbus,
  matter: DataTypes.matter,
  zigbee: DataTypes.zigbee,
  lora: DataTypes.lora,
  zwave: DataTypes.zwave,
  input: DataTypes.inputs,
  script: DataTypes.scripts,
  schedule: DataTypes.schedules,
  webhook: DataTypes.webhooks,
  kvs: DataTypes.kvs,
  boolean: DataTypes.virtuals,
  number: DataTypes.virtuals,
  text: DataTypes.virtuals,
  enum: DataTypes.virtuals,
  group: DataTypes.virtuals,
  button: DataTypes.virtuals
};

/**
 * Data types a notification about `component` (e.g. `wifi`, `script:2`)
 * makes stale. Components with an id also drop their per-component entry.
 */
export function dataTypesForComponent(component: string): string[] {
  const [type, rawId] = component.split(":");
  const dataType = type !== undefined && Object.hasOwn(COMPONENT_TYPES, type) ? COMPONENT_TYPES[type] : undefined;
  if (!dataType) {
    return [];
  }
  const id = rawId === undefined ? Number.NaN : Number.parseInt(rawId, 10);
  return Number.isInteger(id) ? [dataType, componentDataType(dataType, id)] : [dataType];
}

/**
 * Invalidates cached configuration when a device reports `config_changed`.
 * Status notifications leave the cache alone. A change to a component the
 * cache does not track drops every entry of the device. Returns a function
 * that removes every subscription it made.
 */
export function bindCacheInvalidation(
  source: EventSource,
  coordinator: RefreshCoordinator,
  devices: string[],
  logger: Logger = createLogger("cache-sync")
): () => void {
  const disposers = devices.map((device) =>
    source.subscribe(rpcEventTopic(device), (_topic, payload) => {
      const notification = parseNotification(payload);
      if (!notification) {
        logger.debug("ignored device message", { device });
        return;
      }

      if (notification.method !== "NotifyEvent") {
        return;
      }

      const stale = new Set<string>();
      for (const event of notification.events) {
        if (event.event !== CONFIG_CHANGED) continue;
        const types = dataTypesForComponent(event.component);
        if (types.length === 0) {
          logger.debug("device configuration changed", { device, component: event.component });
          void coordinator.invalidate(device);
          return;
        }
        types.forEach((type) => stale.add(type));
      }

      stale.forEach((dataType) => {
        void coordinator.invalidate(device, dataType);
      });
    })
  );

  return () => {
    disposers.forEach((dispose) => dispose());
  };
}
