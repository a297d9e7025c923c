import type { CacheChannel } from "../cache/channel";
import type { FileCache } from "../cache/file-cache";
import type { CacheMode } from "../config/env";
import { CacheFlagConflictError, OfflineCacheMissError } from "../errors";
import { createLogger, type Logger } from "../lib/logger";
import type { Fetcher } from "./types";

export interface CachedFetchOptions {
  /** Skip the cache read and always fetch. */
  refresh?: boolean;
  /** Never fetch; serve whatever is cached, expired or not. */
  offline?: boolean;
  logger?: Logger;
}

export interface CachedFetchResult<T> {
  data: T;
  fromCache: boolean;
  cachedAt: Date | null;
}

const log = createLogger("cached-fetch");

export function fetchOptionsForMode(mode: CacheMode): CachedFetchOptions {
  return { refresh: mode === "refresh", offline: mode === "offline" };
}

/**
 * One-shot read-through for command-style callers. Cache problems never fail
 * the call; fetch errors propagate unchanged.
 */
export async function cachedFetch<T>(
  cache: FileCache | null,
  device: string,
  channel: CacheChannel<T>,
  fetcher: Fetcher<T>,
  options: CachedFetchOptions = {}
): Promise<CachedFetchResult<T>> {
  const logger = options.logger ?? log;
  if (options.refresh && options.offline) {
    throw new CacheFlagConflictError();
  }

  if (cache && !options.refresh) {
    const cached = await readCached(cache, device, channel, options.offline === true, logger);
    if (cached) {
      return cached;
    }
  }

  if (options.offline) {
    throw new OfflineCacheMissError(device, channel.dataType);
  }

  const data = await fetcher();
  if (cache) {
    try {
      await cache.set(device, channel.dataType, data, channel.ttlMs);
    } catch (error) {
      logger.warn("cache write failed", { device, dataType: channel.dataType, error });
    }
  }
  return { data, fromCache: false, cachedAt: null };
}

async function readCached<T>(
  cache: FileCache,
  device: string,
  channel: CacheChannel<T>,
  includeExpired: boolean,
  logger: Logger
): Promise<CachedFetchResult<T> | null> {
  try {
    const entry = includeExpired
      ? await cache.getWithExpired(device, channel.dataType)
      : await cache.get(device, channel.dataType);
    if (!entry) {
      return null;
    }
    return { data: channel.parse(entry.data), fromCache: true, cachedAt: entry.cachedAt };
  } catch (error) {
    logger.debug("cache read skipped", { device, dataType: channel.dataType, error });
    return null;
  }
}

/**
 * Invalidates the given types after a successful write-through action.
 * Failures are logged and otherwise ignored.
 */
export async function invalidateAfterMutation(
  cache: FileCache | null,
  device: string,
  ...dataTypes: string[]
): Promise<void> {
  if (!cache) return;
  for (const dataType of dataTypes) {
    try {
      await cache.invalidate(device, dataType);
    } catch (error) {
      log.debug("invalidate cache failed", { device, dataType, error });
    }
  }
}
