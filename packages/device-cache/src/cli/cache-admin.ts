import { parseArgs } from "util";
import type { FileCache } from "../cache/file-cache";
import { statsToWire, type CacheStatsWire } from "../cache/stats";
import { DEFAULT_CLEANUP_INTERVAL_MS } from "../config/env";
import { toError } from "../errors";

export interface CacheAdminDeps {
  cache: FileCache | null;
  cleanupIntervalMs?: number;
  write?: (line: string) => void;
}

type AdminOutput =
  | { ok: true; command: "show"; path: string; stats: CacheStatsWire }
  | { ok: true; command: "clear"; scope: "entry" | "device" | "all"; removed?: number }
  | { ok: true; command: "cleanup"; forced: boolean; removed: number }
  | { ok: false; error: string };

const USAGE = "usage: cache-admin <show | clear [--device <name>] [--type <type>] | cleanup [--force]>";

/**
 * Operator commands over the cache. Writes one JSON line and returns the
 * process exit code.
 */
export async function runCacheAdmin(argv: string[], deps: CacheAdminDeps): Promise<number> {
  const write = deps.write ?? ((line: string) => process.stdout.write(line));
  const output = await execute(argv, deps).catch(
    (error: unknown): AdminOutput => ({ ok: false, error: toError(error).message })
  );
  write(`${JSON.stringify(output)}\n`);
  return output.ok ? 0 : 1;
}

async function execute(argv: string[], deps: CacheAdminDeps): Promise<AdminOutput> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      device: { type: "string" },
      type: { type: "string" },
      force: { type: "boolean", default: false }
    }
  });

  const [command, ...rest] = positionals;
  if (!command || rest.length > 0) {
    return { ok: false, error: USAGE };
  }

  const { cache } = deps;
  if (!cache) {
    return { ok: false, error: "cache is unavailable" };
  }

  switch (command) {
    case "show": {
      const stats = await cache.stats();
      return { ok: true, command: "show", path: cache.path, stats: statsToWire(stats) };
    }
    case "clear": {
      if (values.type !== undefined && values.device === undefined) {
        return { ok: false, error: "--type requires --device" };
      }
      if (values.device !== undefined && values.type !== undefined) {
        await cache.invalidate(values.device, values.type);
        return { ok: true, command: "clear", scope: "entry" };
      }
      if (values.device !== undefined) {
        const removed = await cache.invalidateDevice(values.device);
        return { ok: true, command: "clear", scope: "device", removed };
      }
      await cache.invalidateAll();
      return { ok: true, command: "clear", scope: "all" };
    }
    case "cleanup": {
      const forced = values.force === true;
      const removed = forced
        ? await cache.cleanup()
        : await cache.cleanupIfNeeded(deps.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS);
      return { ok: true, command: "cleanup", forced, removed };
    }
    default:
      return { ok: false, error: `unknown command "${command}"\n${USAGE}` };
  }
}
