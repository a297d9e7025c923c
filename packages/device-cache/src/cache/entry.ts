import { CacheEncodeError } from "../errors";

/**
 * On-disk format version. Entries written under any other version are
 * discarded on read.
 */
export const CURRENT_VERSION = 1;

export interface CacheEntry {
  version: number;
  device: string;
  /** Stable identifier that survives device renames. */
  deviceId?: string;
  dataType: string;
  cachedAt: Date;
  expiresAt: Date;
  /** Opaque JSON payload; the cache never looks inside it. */
  data: unknown;
}

interface EntryWire {
  version: number;
  device: string;
  device_id?: string;
  data_type: string;
  cached_at: string;
  expires_at: string;
  data: unknown;
}

/**
 * Serializes the payload to JSON text, rejecting values JSON cannot carry
 * (functions, `undefined`, BigInt, cycles).
 */
export function encodePayload(payload: unknown): string {
  let raw: string | undefined;
  try {
    raw = JSON.stringify(payload);
  } catch (error) {
    throw new CacheEncodeError(error);
  }
  if (raw === undefined) {
    throw new CacheEncodeError(new Error(`payload of type ${typeof payload} is not JSON-serializable`));
  }
  return raw;
}

/** `rawPayload` must already be JSON text from `encodePayload`. */
export function encodeEntry(entry: Omit<CacheEntry, "data">, rawPayload: string): string {
  const wire: Omit<EntryWire, "data"> = {
    version: entry.version,
    device: entry.device,
    data_type: entry.dataType,
    cached_at: entry.cachedAt.toISOString(),
    expires_at: entry.expiresAt.toISOString()
  };
  if (entry.deviceId) {
    wire.device_id = entry.deviceId;
  }
  const head = JSON.stringify(wire, null, 2);
  // Splice the payload in verbatim so it is stored as JSON, not as a string.
  return `${head.slice(0, -2)},\n  "data": ${rawPayload}\n}`;
}

/**
 * Decodes an entry file. Returns null for anything that is not a well-formed
 * envelope; the version is not checked here.
 */
export function decodeEntry(text: string): CacheEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }

  // A missing version reads as 0 and fails the version check downstream.
  const version = parsed["version"] ?? 0;
  if (typeof version !== "number" || !Number.isInteger(version)) {
    return null;
  }

  const device = optionalString(parsed["device"]);
  const deviceId = optionalString(parsed["device_id"]);
  const dataType = optionalString(parsed["data_type"]);
  const cachedAt = parseTimestamp(parsed["cached_at"]);
  const expiresAt = parseTimestamp(parsed["expires_at"]);
  if (device === null || deviceId === null || dataType === null || !cachedAt || !expiresAt) {
    return null;
  }

  const entry: CacheEntry = {
    version,
    device,
    dataType,
    cachedAt,
    expiresAt,
    data: parsed["data"] ?? null
  };
  if (deviceId) {
    entry.deviceId = deviceId;
  }
  return entry;
}

const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parses an RFC 3339 timestamp. Fractional seconds beyond milliseconds are
 * truncated, since writers may emit nanosecond precision.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== "string") {
    return null;
  }
  const match = RFC3339.exec(value);
  if (!match) {
    return null;
  }
  const [, base, fraction, zone] = match;
  const millis = fraction ? `.${fraction.slice(0, 3).padEnd(3, "0")}` : "";
  const time = Date.parse(`${base}${millis}${zone}`);
  return Number.isNaN(time) ? null : new Date(time);
}

function optionalString(value: unknown): string | null {
  if (value === undefined || value === null) {
    return "";
  }
  return typeof value === "string" ? value : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
