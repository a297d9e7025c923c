export { FileCache, createFileCache, sanitizeDeviceName, ORPHAN_TEMP_AGE_MS } from "./cache/file-cache";
export type { FileCacheOptions } from "./cache/file-cache";
export { CURRENT_VERSION, decodeEntry, encodeEntry, encodePayload, isRecord, parseTimestamp } from "./cache/entry";
export type { CacheEntry } from "./cache/entry";
export { entryAge, entryTtl, isExpired, needsRefresh } from "./cache/expiry";
export { META_FILENAME, NEVER, decodeMeta, defaultMeta, encodeMeta } from "./cache/meta";
export type { CacheMeta } from "./cache/meta";
export { statsToWire } from "./cache/stats";
export type { CacheStats, CacheStatsWire } from "./cache/stats";
export { DataTypes, TTL, componentDataType } from "./cache/data-types";
export type { DataType } from "./cache/data-types";
export { componentChannel, defineChannel, jsonChannel } from "./cache/channel";
export type { CacheChannel, PayloadParser } from "./cache/channel";
export { ReadWriteLock } from "./cache/rw-lock";

export { NodeFileSystem, createNodeFileSystem } from "./fs/node-fs";
export { MemoryFileSystem, createMemoryFileSystem } from "./fs/memory-fs";
export { walkFiles } from "./fs/walk";
export type { CacheFileSystem, DirEntry, FileStat } from "./fs/types";

export { RefreshCoordinator } from "./refresh/coordinator";
export type { RefreshCoordinatorOptions } from "./refresh/coordinator";
export { cachedFetch, fetchOptionsForMode, invalidateAfterMutation } from "./refresh/cached-fetch";
export type { CachedFetchOptions, CachedFetchResult } from "./refresh/cached-fetch";
export type {
  CacheEvent,
  CacheEventListener,
  CacheHit,
  CacheMiss,
  Fetcher,
  LoadResult,
  RefreshComplete
} from "./refresh/types";

export { openDeviceCache } from "./open-cache";
export type { OpenCacheDeps } from "./open-cache";
export { DEFAULT_CLEANUP_INTERVAL_MS, loadCacheConfig } from "./config/env";
export type { CacheConfig, CacheMode } from "./config/env";
export { runCacheAdmin } from "./cli/cache-admin";
export type { CacheAdminDeps } from "./cli/cache-admin";

export {
  CacheEncodeError,
  CacheError,
  CacheFlagConflictError,
  CleanupError,
  OfflineCacheMissError,
  isNotFound,
  toError
} from "./errors";
export { createLogger, flushLogs, resetLogSink, setLogLevel, setLogSink } from "./lib/logger";
export type { LogLevel, LogSink, Logger } from "./lib/logger";
