export type TopicKind = "events" | "online";

const EVENTS_SUFFIX = "/events/rpc";
const ONLINE_SUFFIX = "/online";

/**
 * Topic a device publishes its RPC notifications on. The device's MQTT
 * prefix may itself contain slashes.
 */
export function rpcEventTopic(device: string): string {
  if (!device) {
    throw new Error("device is required");
  }
  return `${device}${EVENTS_SUFFIX}`;
}

export function onlineTopic(device: string): string {
  if (!device) {
    throw new Error("device is required");
  }
  return `${device}${ONLINE_SUFFIX}`;
}

export interface ParsedTopic {
  device: string;
  kind: TopicKind;
}

export function parseDeviceTopic(topic: string): ParsedTopic | null {
  if (topic.endsWith(EVENTS_SUFFIX)) {
    const device = topic.slice(0, -EVENTS_SUFFIX.length);
    return device ? { device, kind: "events" } : null;
  }
  if (topic.endsWith(ONLINE_SUFFIX)) {
    const device = topic.slice(0, -ONLINE_SUFFIX.length);
    return device ? { device, kind: "online" } : null;
  }
  return null;
}
