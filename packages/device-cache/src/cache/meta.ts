import { CURRENT_VERSION, isRecord, parseTimestamp } from "./entry";

export const META_FILENAME = "meta.json";

/** Zero time used when no cleanup has run yet. */
export const NEVER = new Date("0001-01-01T00:00:00Z");

export interface CacheMeta {
  version: number;
  lastCleanupAt: Date;
}

export function defaultMeta(): CacheMeta {
  return { version: CURRENT_VERSION, lastCleanupAt: NEVER };
}

export function encodeMeta(meta: CacheMeta): string {
  return JSON.stringify(
    {
      version: meta.version,
      last_cleanup: meta.lastCleanupAt.toISOString()
    },
    null,
    2
  );
}

/** Anything unreadable decodes to the default record. */
export function decodeMeta(text: string): CacheMeta {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return defaultMeta();
  }
  if (!isRecord(parsed)) {
    return defaultMeta();
  }
  const version = typeof parsed["version"] === "number" ? parsed["version"] : CURRENT_VERSION;
  const lastCleanupAt = parseTimestamp(parsed["last_cleanup"]) ?? NEVER;
  return { version, lastCleanupAt };
}
