import { componentDataType } from "./data-types";

export type PayloadParser<T> = (raw: unknown) => T;

/**
 * Where a kind of device data lives in the cache and how its payload is
 * read back. `parse` should throw on payloads it does not recognise.
 */
export interface CacheChannel<T> {
  dataType: string;
  ttlMs: number;
  parse: PayloadParser<T>;
}

export function defineChannel<T>(channel: CacheChannel<T>): CacheChannel<T> {
  return Object.freeze({ ...channel });
}

export function jsonChannel(dataType: string, ttlMs: number): CacheChannel<unknown> {
  return defineChannel({ dataType, ttlMs, parse: (raw) => raw });
}

export function componentChannel<T>(channel: CacheChannel<T>, componentId: number): CacheChannel<T> {
  return defineChannel({ ...channel, dataType: componentDataType(channel.dataType, componentId) });
}
