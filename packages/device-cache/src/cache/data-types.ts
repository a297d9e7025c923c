const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

/** Data types cached per device. Slash-separated types nest on disk. */
export const DataTypes = {
  deviceInfo: "deviceinfo",
  components: "components",
  system: "system",
  wifi: "wifi",
  security: "security",
  cloud: "cloud",
  ble: "ble",
  mqtt: "protocols/mqtt",
  modbus: "protocols/modbus",
  ethernet: "protocols/ethernet",
  matter: "smarthome/matter",
  zigbee: "smarthome/zigbee",
  lora: "smarthome/lora",
  zwave: "smarthome/zwave",
  firmware: "firmware",
  schedules: "automation/schedules",
  webhooks: "automation/webhooks",
  virtuals: "automation/virtuals",
  inputs: "automation/inputs",
  kvs: "automation/kvs",
  scripts: "automation/scripts"
} as const;

export type DataType = (typeof DataTypes)[keyof typeof DataTypes];

/** Lifetimes by how often the underlying data changes. */
export const TTL = {
  deviceInfo: 24 * HOUR,
  components: 24 * HOUR,
  system: HOUR,
  wifi: 30 * MINUTE,
  security: HOUR,
  cloud: 30 * MINUTE,
  ble: HOUR,
  protocols: HOUR,
  smartHome: 30 * MINUTE,
  firmware: HOUR,
  automation: 5 * MINUTE,
  inputs: 10 * MINUTE
} as const;

/** Key for one component of a type, e.g. `automation/scripts:2`. */
export function componentDataType(dataType: string, componentId: number): string {
  return `${dataType}:${componentId}`;
}
