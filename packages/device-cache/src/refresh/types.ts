/** Zero-argument producer of fresh device data. Timeouts belong here. */
export type Fetcher<T> = () => Promise<T>;

export interface CacheMiss {
  kind: "miss";
  device: string;
  dataType: string;
}

export interface CacheHit<T> {
  kind: "hit";
  device: string;
  dataType: string;
  data: T;
  cachedAt: Date;
  /** Past half of its lifetime (or expired); a refresh should follow. */
  needsRefresh: boolean;
}

export type LoadResult<T> = CacheMiss | CacheHit<T>;

export interface RefreshComplete<T> {
  kind: "refresh-complete";
  device: string;
  dataType: string;
  data?: T;
  cachedAt?: Date;
  error?: Error;
}

export type CacheEvent<T> = LoadResult<T> | RefreshComplete<T>;

export type CacheEventListener<T> = (event: CacheEvent<T>) => void;
