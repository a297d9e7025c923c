import type { CacheChannel } from "../cache/channel";
import { needsRefresh } from "../cache/expiry";
import type { CacheEntry } from "../cache/entry";
import type { FileCache } from "../cache/file-cache";
import { toError } from "../errors";
import { createLogger, type Logger } from "../lib/logger";
import type { CacheEventListener, Fetcher, LoadResult, RefreshComplete } from "./types";

export interface RefreshCoordinatorOptions {
  logger?: Logger;
  clock?: () => Date;
}

type CompletionHandler = (event: RefreshComplete<unknown>) => void;

/**
 * Stale-while-revalidate front end for the file cache. Consumers get the
 * cached value immediately and a second answer once a refresh lands.
 *
 * Concurrent requests for the same key are not merged: each consumer runs
 * its own fetch and the last write wins.
 */
export class RefreshCoordinator {
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly completionHandlers = new Set<CompletionHandler>();

  /** A null cache disables caching; every load is a miss. */
  constructor(private readonly cache: FileCache | null, options: RefreshCoordinatorOptions = {}) {
    this.log = options.logger ?? createLogger("refresh");
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Reads the entry, expired or not. Store failures and payloads the channel
   * cannot parse are reported as misses.
   */
  async load<T>(device: string, channel: CacheChannel<T>): Promise<LoadResult<T>> {
    const miss = { kind: "miss", device, dataType: channel.dataType } as const;
    if (!this.cache) {
      return miss;
    }

    let entry: CacheEntry | null;
    try {
      entry = await this.cache.getWithExpired(device, channel.dataType);
    } catch (error) {
      this.log.warn("cache read failed", { device, dataType: channel.dataType, error });
      return miss;
    }
    if (!entry) {
      return miss;
    }

    let data: T;
    try {
      data = channel.parse(entry.data);
    } catch (error) {
      this.log.debug("cached payload rejected", { device, dataType: channel.dataType, error });
      return miss;
    }

    return {
      kind: "hit",
      device,
      dataType: channel.dataType,
      data,
      cachedAt: entry.cachedAt,
      needsRefresh: needsRefresh(entry, this.clock())
    };
  }

  /**
   * Fetches and writes the result back. Fetch failures come back in `error`;
   * a failed cache write is logged and the fetched data still returned.
   */
  async fetchAndCache<T>(device: string, channel: CacheChannel<T>, fetcher: Fetcher<T>): Promise<RefreshComplete<T>> {
    const base = { kind: "refresh-complete", device, dataType: channel.dataType } as const;

    let data: T;
    try {
      data = await fetcher();
    } catch (error) {
      const failed: RefreshComplete<T> = { ...base, error: toError(error) };
      this.notify(failed);
      return failed;
    }

    let cachedAt = this.clock();
    if (this.cache) {
      try {
        cachedAt = await this.cache.set(device, channel.dataType, data, channel.ttlMs);
      } catch (error) {
        this.log.warn("cache write failed", { device, dataType: channel.dataType, error });
      }
    }

    const done: RefreshComplete<T> = { ...base, data, cachedAt };
    this.notify(done);
    return done;
  }

  /**
   * Starts a refresh without waiting on it. The returned promise never
   * rejects and may be ignored; completion is also announced to
   * `onRefreshComplete` handlers.
   */
  backgroundRefresh<T>(device: string, channel: CacheChannel<T>, fetcher: Fetcher<T>): Promise<RefreshComplete<T>> {
    return this.fetchAndCache(device, channel, fetcher);
  }

  /**
   * Drops one entry, or every entry of the device when `dataType` is omitted.
   * Never rejects; failures are logged.
   */
  async invalidate(device: string, dataType?: string): Promise<void> {
    if (!this.cache) return;
    try {
      if (dataType === undefined) {
        await this.cache.invalidateDevice(device);
      } else {
        await this.cache.invalidate(device, dataType);
      }
    } catch (error) {
      this.log.warn("cache invalidation failed", { device, dataType, error });
    }
  }

  onRefreshComplete(handler: CompletionHandler): () => void {
    this.completionHandlers.add(handler);
    return () => {
      this.completionHandlers.delete(handler);
    };
  }

  /**
   * Runs one full cycle for a consumer: the load result is delivered first,
   * then on a miss a blocking fetch, or on a stale hit a background refresh,
   * followed by its completion. Resolves once the cycle is over.
   */
  async request<T>(
    device: string,
    channel: CacheChannel<T>,
    fetcher: Fetcher<T>,
    listener: CacheEventListener<T>
  ): Promise<void> {
    const loaded = await this.load(device, channel);
    listener(loaded);

    if (loaded.kind === "miss") {
      listener(await this.fetchAndCache(device, channel, fetcher));
      return;
    }
    if (loaded.needsRefresh) {
      listener(await this.backgroundRefresh(device, channel, fetcher));
    }
  }

  private notify(event: RefreshComplete<unknown>): void {
    this.completionHandlers.forEach((handler) => {
      try {
        handler(event);
      } catch (error) {
        this.log.warn("refresh completion handler threw", { device: event.device, error });
      }
    });
  }
}
