/**
 * Error types surfaced by the cache. Cache misses are never errors; these
 * cover I/O failures, unserializable payloads and conflicting fetch modes.
 */

export class CacheError extends Error {
  readonly op: string;

  constructor(op: string, cause: unknown) {
    super(`failed to ${op}: ${toError(cause).message}`, { cause });
    this.name = "CacheError";
    this.op = op;
  }
}

export class CacheEncodeError extends CacheError {
  constructor(cause: unknown) {
    super("encode cache data", cause);
    this.name = "CacheEncodeError";
  }
}

export class CleanupError extends CacheError {
  /** Entries deleted before the sweep stopped. */
  readonly removed: number;

  constructor(cause: unknown, removed: number) {
    super("remove expired cache entry", cause);
    this.name = "CleanupError";
    this.removed = removed;
  }
}

export class OfflineCacheMissError extends Error {
  constructor(device: string, dataType: string) {
    super(`no cached ${dataType} data for ${device} (offline mode)`);
    this.name = "OfflineCacheMissError";
  }
}

export class CacheFlagConflictError extends Error {
  constructor() {
    super("refresh and offline cannot be used together");
    this.name = "CacheFlagConflictError";
  }
}

export function isNotFound(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  try {
    return new Error(JSON.stringify(error));
  } catch {
    return new Error("Unknown error");
  }
}
