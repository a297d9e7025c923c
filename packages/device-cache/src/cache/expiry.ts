import type { CacheEntry } from "./entry";

type Timed = Pick<CacheEntry, "cachedAt" | "expiresAt">;

/** Milliseconds since the entry was written. */
export function entryAge(entry: Timed, now: Date = new Date()): number {
  return now.getTime() - entry.cachedAt.getTime();
}

/** Lifetime the entry was written with. */
export function entryTtl(entry: Timed): number {
  return entry.expiresAt.getTime() - entry.cachedAt.getTime();
}

export function isExpired(entry: Timed, now: Date = new Date()): boolean {
  return now.getTime() > entry.expiresAt.getTime();
}

/**
 * True once the entry is past half of its lifetime. Hard-expired entries
 * always need a refresh.
 */
export function needsRefresh(entry: Timed, now: Date = new Date()): boolean {
  return entryAge(entry, now) > entryTtl(entry) / 2;
}
