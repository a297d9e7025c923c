import type { CacheEntry } from "./entry";
import { isExpired } from "./expiry";

export interface CacheStats {
  totalEntries: number;
  /** Sum of entry file sizes on disk. */
  totalSizeBytes: number;
  expiredEntries: number;
  deviceCount: number;
  oldestEntry: Date | null;
  newestEntry: Date | null;
  typeCounts: Record<string, number>;
}

export interface CacheStatsWire {
  total_entries: number;
  total_size_bytes: number;
  expired_entries: number;
  device_count: number;
  oldest_entry: string | null;
  newest_entry: string | null;
  type_counts: Record<string, number>;
}

export class StatsAccumulator {
  private totalEntries = 0;
  private totalSizeBytes = 0;
  private expiredEntries = 0;
  private oldestEntry: Date | null = null;
  private newestEntry: Date | null = null;
  private readonly devices = new Set<string>();
  private readonly typeCounts: Record<string, number> = {};

  constructor(private readonly now: Date) {}

  add(entry: CacheEntry, sizeBytes: number): void {
    this.totalEntries += 1;
    this.totalSizeBytes += sizeBytes;
    this.typeCounts[entry.dataType] = (this.typeCounts[entry.dataType] ?? 0) + 1;
    this.devices.add(entry.device);

    if (isExpired(entry, this.now)) {
      this.expiredEntries += 1;
    }
    if (!this.oldestEntry || entry.cachedAt < this.oldestEntry) {
      this.oldestEntry = entry.cachedAt;
    }
    if (!this.newestEntry || entry.cachedAt > this.newestEntry) {
      this.newestEntry = entry.cachedAt;
    }
  }

  result(): CacheStats {
    return {
      totalEntries: this.totalEntries,
      totalSizeBytes: this.totalSizeBytes,
      expiredEntries: this.expiredEntries,
      deviceCount: this.devices.size,
      oldestEntry: this.oldestEntry,
      newestEntry: this.newestEntry,
      typeCounts: { ...this.typeCounts }
    };
  }
}

export function statsToWire(stats: CacheStats): CacheStatsWire {
  return {
    total_entries: stats.totalEntries,
    total_size_bytes: stats.totalSizeBytes,
    expired_entries: stats.expiredEntries,
    device_count: stats.deviceCount,
    oldest_entry: stats.oldestEntry?.toISOString() ?? null,
    newest_entry: stats.newestEntry?.toISOString() ?? null,
    type_counts: stats.typeCounts
  };
}
