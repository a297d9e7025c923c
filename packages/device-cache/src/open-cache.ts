import type { CacheConfig } from "./config/env";
import { FileCache } from "./cache/file-cache";
import { NodeFileSystem } from "./fs/node-fs";
import type { CacheFileSystem } from "./fs/types";
import { createLogger, type Logger } from "./lib/logger";

export interface OpenCacheDeps {
  fs?: CacheFileSystem;
  logger?: Logger;
  clock?: () => Date;
}

const log = createLogger("open-cache");

/**
 * Opens the cache under `config.cacheDir` and runs a throttled cleanup.
 * Returns null when the cache cannot be created; callers then run uncached.
 */
export async function openDeviceCache(
  config: Pick<CacheConfig, "cacheDir" | "cleanupIntervalMs">,
  deps: OpenCacheDeps = {}
): Promise<FileCache | null> {
  const logger = deps.logger ?? log;
  let cache: FileCache;
  try {
    cache = await FileCache.open({
      rootDir: config.cacheDir,
      fs: deps.fs ?? new NodeFileSystem(),
      logger: deps.logger,
      clock: deps.clock
    });
  } catch (error) {
    logger.warn("initialize file cache failed", { dir: config.cacheDir, error });
    return null;
  }

  try {
    const removed = await cache.cleanupIfNeeded(config.cleanupIntervalMs);
    if (removed > 0) {
      logger.debug("cache cleanup removed expired entries", { removed });
    }
  } catch (error) {
    logger.warn("cache cleanup failed", { error });
  }
  return cache;
}
