import { isRecord } from "@devicedeck/device-cache";

export type NotificationMethod = "NotifyStatus" | "NotifyFullStatus" | "NotifyEvent";

export interface DeviceEvent {
  component: string;
  event: string;
  id?: number;
  ts?: number;
}

export type DeviceNotification =
  | { method: "NotifyStatus" | "NotifyFullStatus"; src: string; components: Record<string, unknown> }
  | { method: "NotifyEvent"; src: string; events: DeviceEvent[] };

/**
 * Decodes a notification frame published on a device's RPC event topic.
 * Returns null for anything that is not a recognised notification.
 */
export function parseNotification(payload: Uint8Array | string): DeviceNotification | null {
  let frame: unknown;
  try {
    frame = JSON.parse(typeof payload === "string" ? payload : new TextDecoder().decode(payload));
  } catch {
    return null;
  }
  if (!isRecord(frame) || !isRecord(frame["params"])) {
    return null;
  }

  const src = typeof frame["src"] === "string" ? frame["src"] : "";
  const params = frame["params"];
  const method = frame["method"];

  if (method === "NotifyStatus" || method === "NotifyFullStatus") {
    const components: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(params)) {
      if (key !== "ts") components[key] = value;
    }
    return { method, src, components };
  }

  if (method === "NotifyEvent") {
    const rawEvents = params["events"];
    const events = Array.isArray(rawEvents) ? rawEvents.flatMap(toDeviceEvent) : [];
    return { method, src, events };
  }

  return null;
}

function toDeviceEvent(raw: unknown): DeviceEvent[] {
  if (!isRecord(raw) || typeof raw["component"] !== "string" || typeof raw["event"] !== "string") {
    return [];
  }
  const event: DeviceEvent = { component: raw["component"], event: raw["event"] };
  if (typeof raw["id"] === "number") event.id = raw["id"];
  if (typeof raw["ts"] === "number") event.ts = raw["ts"];
  return [event];
}
