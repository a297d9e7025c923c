import path from "path";
import { CacheError, CleanupError, isNotFound } from "../errors";
import type { CacheFileSystem, DirEntry } from "../fs/types";
import { walkFiles } from "../fs/walk";
import { createLogger, type Logger } from "../lib/logger";
import { CURRENT_VERSION, decodeEntry, encodeEntry, encodePayload, type CacheEntry } from "./entry";
import { isExpired } from "./expiry";
import { META_FILENAME, decodeMeta, defaultMeta, encodeMeta, type CacheMeta } from "./meta";
import { ReadWriteLock } from "./rw-lock";
import { StatsAccumulator, type CacheStats } from "./stats";

const ENTRY_EXT = ".json";
const TEMP_SUFFIX = ".tmp";
/** Temp files older than this are treated as leftovers of a crashed write. */
export const ORPHAN_TEMP_AGE_MS = 60 * 60 * 1000;
// Largest millisecond value a Date can hold.
const MAX_DATE_MS = 8.64e15;

export interface FileCacheOptions {
  rootDir: string;
  fs: CacheFileSystem;
  logger?: Logger;
  clock?: () => Date;
}

type ScannedFile =
  | { kind: "entry"; path: string; entry: CacheEntry }
  | { kind: "temp"; path: string };

/**
 * File-backed device data cache. Each entry lives at
 * `<root>/<dataType>/<device>.json`; nothing is indexed in memory.
 */
export class FileCache {
  private readonly rootDir: string;
  private readonly fs: CacheFileSystem;
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly lock = new ReadWriteLock();

  constructor(options: FileCacheOptions) {
    this.rootDir = options.rootDir;
    this.fs = options.fs;
    this.log = options.logger ?? createLogger("file-cache");
    this.clock = options.clock ?? (() => new Date());
  }

  /** Creates the root directory, then the cache. */
  static async open(options: FileCacheOptions): Promise<FileCache> {
    try {
      await options.fs.mkdirAll(options.rootDir);
    } catch (error) {
      throw new CacheError("create cache directory", error);
    }
    return new FileCache(options);
  }

  get path(): string {
    return this.rootDir;
  }

  entryPath(device: string, dataType: string): string {
    return path.join(this.rootDir, dataType, `${sanitizeDeviceName(device)}${ENTRY_EXT}`);
  }

  /** Returns the entry if present and unexpired, otherwise null. */
  async get(device: string, dataType: string): Promise<CacheEntry | null> {
    return this.lock.withRead(async () => {
      const entry = await this.readEntry(device, dataType);
      if (!entry || isExpired(entry, this.clock())) {
        return null;
      }
      return entry;
    });
  }

  /** Like `get`, but expired entries are returned too. */
  async getWithExpired(device: string, dataType: string): Promise<CacheEntry | null> {
    return this.lock.withRead(() => this.readEntry(device, dataType));
  }

  /** Stores `payload` and resolves with the `cachedAt` written. */
  async set(device: string, dataType: string, payload: unknown, ttlMs: number): Promise<Date> {
    return this.setWithId(device, "", dataType, payload, ttlMs);
  }

  async setWithId(device: string, deviceId: string, dataType: string, payload: unknown, ttlMs: number): Promise<Date> {
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new RangeError(`ttl must be a non-negative number of milliseconds, got ${ttlMs}`);
    }
    const rawPayload = encodePayload(payload);

    return this.lock.withWrite(async () => {
      const cachedAt = this.clock();
      const expiresAtMs = cachedAt.getTime() + ttlMs;
      if (expiresAtMs > MAX_DATE_MS) {
        throw new RangeError(`ttl of ${ttlMs} ms puts expiry past the latest representable date`);
      }
      const text = encodeEntry(
        {
          version: CURRENT_VERSION,
          device,
          deviceId: deviceId || undefined,
          dataType,
          cachedAt,
          expiresAt: new Date(expiresAtMs)
        },
        rawPayload
      );
      await this.atomicWrite(this.entryPath(device, dataType), text);
      return cachedAt;
    });
  }

  async invalidate(device: string, dataType: string): Promise<void> {
    await this.lock.withWrite(async () => {
      try {
        await this.fs.remove(this.entryPath(device, dataType));
      } catch (error) {
        if (!isNotFound(error)) {
          throw new CacheError("remove cache file", error);
        }
      }
    });
  }

  /**
   * Removes every entry whose stored device name matches. Returns the number
   * of files removed.
   */
  async invalidateDevice(device: string): Promise<number> {
    return this.lock.withWrite(async () => {
      let removed = 0;
      for await (const file of this.scan()) {
        if (file.kind !== "entry" || file.entry.device !== device) continue;
        try {
          await this.fs.remove(file.path);
          removed += 1;
        } catch (error) {
          if (!isNotFound(error)) {
            throw new CacheError("remove cache file", error);
          }
        }
      }
      return removed;
    });
  }

  /** Empties the cache root, keeping the root itself. */
  async invalidateAll(): Promise<void> {
    await this.lock.withWrite(async () => {
      let children: DirEntry[];
      try {
        children = await this.fs.readDir(this.rootDir);
      } catch (error) {
        if (isNotFound(error)) return;
        throw new CacheError("read cache directory", error);
      }
      for (const child of children) {
        const childPath = path.join(this.rootDir, child.name);
        try {
          await this.fs.removeAll(childPath);
        } catch (error) {
          throw new CacheError(`remove ${childPath}`, error);
        }
      }
    });
  }

  /**
   * Deletes expired entries and returns how many were removed. Temp files
   * left behind by interrupted writes are swept as well once they are older
   * than `ORPHAN_TEMP_AGE_MS`; they are not counted.
   */
  async cleanup(): Promise<number> {
    return this.lock.withWrite(async () => {
      const now = this.clock();
      let removed = 0;
      for await (const file of this.scan()) {
        if (file.kind === "temp") {
          await this.removeOrphanedTemp(file.path, now);
          continue;
        }
        if (!isExpired(file.entry, now)) continue;
        try {
          await this.fs.remove(file.path);
        } catch (error) {
          if (!isNotFound(error)) {
            throw new CleanupError(error, removed);
          }
        }
        removed += 1;
      }
      if (removed > 0) {
        this.log.debug("removed expired cache entries", { removed });
      }
      return removed;
    });
  }

  /**
   * Runs `cleanup` unless the last recorded run is less than `intervalMs`
   * ago. Intervals below one millisecond always run.
   */
  async cleanupIfNeeded(intervalMs: number): Promise<number> {
    let meta: CacheMeta;
    try {
      meta = await this.readMeta();
    } catch (error) {
      this.log.debug("read cache meta failed, running cleanup", { error });
      meta = defaultMeta();
    }

    const elapsed = this.clock().getTime() - meta.lastCleanupAt.getTime();
    if (intervalMs >= 1 && elapsed < intervalMs) {
      return 0;
    }

    const removed = await this.cleanup();

    try {
      await this.writeMeta({ ...meta, lastCleanupAt: this.clock() });
    } catch (error) {
      this.log.warn("persist cache meta failed", { error });
    }
    return removed;
  }

  async stats(): Promise<CacheStats> {
    return this.lock.withRead(async () => {
      const stats = new StatsAccumulator(this.clock());
      for await (const file of this.scan()) {
        if (file.kind !== "entry") continue;
        let size: number;
        try {
          size = (await this.fs.stat(file.path)).size;
        } catch {
          continue;
        }
        stats.add(file.entry, size);
      }
      return stats.result();
    });
  }

  async readMeta(): Promise<CacheMeta> {
    return this.lock.withRead(async () => {
      let text: string;
      try {
        text = await this.fs.readFile(this.metaPath());
      } catch (error) {
        if (isNotFound(error)) {
          return defaultMeta();
        }
        throw new CacheError("read meta file", error);
      }
      return decodeMeta(text);
    });
  }

  async writeMeta(meta: CacheMeta): Promise<void> {
    await this.lock.withWrite(() => this.atomicWrite(this.metaPath(), encodeMeta(meta)));
  }

  private metaPath(): string {
    return path.join(this.rootDir, META_FILENAME);
  }

  /** Reads and validates one entry; corrupt or foreign-version files are deleted. */
  private async readEntry(device: string, dataType: string): Promise<CacheEntry | null> {
    const entryPath = this.entryPath(device, dataType);
    let text: string;
    try {
      text = await this.fs.readFile(entryPath);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new CacheError("read cache file", error);
    }

    const entry = decodeEntry(text);
    if (!entry) {
      await this.discard(entryPath, "corrupt");
      return null;
    }
    if (entry.version !== CURRENT_VERSION) {
      await this.discard(entryPath, "version mismatch");
      return null;
    }
    return entry;
  }

  private async discard(filePath: string, reason: string): Promise<void> {
    try {
      await this.fs.remove(filePath);
      this.log.debug("removed unusable cache file", { path: filePath, reason });
    } catch (error) {
      this.log.debug("remove unusable cache file failed", { path: filePath, reason, error });
    }
  }

  private async atomicWrite(finalPath: string, data: string): Promise<void> {
    try {
      await this.fs.mkdirAll(path.dirname(finalPath));
    } catch (error) {
      throw new CacheError("create cache directory", error);
    }

    const tmpPath = `${finalPath}${TEMP_SUFFIX}`;
    try {
      await this.fs.writeFile(tmpPath, data);
    } catch (error) {
      throw new CacheError("write cache file", error);
    }

    try {
      await this.fs.rename(tmpPath, finalPath);
    } catch (error) {
      try {
        await this.fs.remove(tmpPath);
      } catch (removeError) {
        this.log.debug("remove temp cache file failed", { path: tmpPath, error: removeError });
      }
      throw new CacheError("rename cache file", error);
    }
  }

  private async removeOrphanedTemp(tmpPath: string, now: Date): Promise<void> {
    try {
      const info = await this.fs.stat(tmpPath);
      if (now.getTime() - info.modifiedAt.getTime() < ORPHAN_TEMP_AGE_MS) return;
      await this.fs.remove(tmpPath);
      this.log.debug("removed orphaned temp file", { path: tmpPath });
    } catch (error) {
      this.log.debug("remove orphaned temp file failed", { path: tmpPath, error });
    }
  }

  /**
   * Walks the cache root, yielding decodable entries and in-progress temp
   * files. The root meta file, other extensions and unreadable or corrupt
   * files are skipped.
   */
  private async *scan(): AsyncGenerator<ScannedFile> {
    for await (const file of walkFiles(this.fs, this.rootDir)) {
      if (file.name.endsWith(`${ENTRY_EXT}${TEMP_SUFFIX}`)) {
        yield { kind: "temp", path: file.path };
        continue;
      }
      if (path.extname(file.name) !== ENTRY_EXT) continue;
      if (file.depth === 0 && file.name === META_FILENAME) continue;
      if (file.name.endsWith(`${TEMP_SUFFIX}${ENTRY_EXT}`)) continue;

      let text: string;
      try {
        text = await this.fs.readFile(file.path);
      } catch {
        continue;
      }
      const entry = decodeEntry(text);
      if (entry) {
        yield { kind: "entry", path: file.path, entry };
      }
    }
  }
}

/** Replaces the characters `/ \ : * ? " < > |` with `_`; everything else is kept. */
export function sanitizeDeviceName(device: string): string {
  return device.replace(/[/\\:*?"<>|]/g, "_");
}

export const createFileCache = (options: FileCacheOptions): Promise<FileCache> => FileCache.open(options);
