import { loadCacheConfig } from "../config/env";
import { flushLogs, setLogLevel } from "../lib/logger";
import { openDeviceCache } from "../open-cache";
import { runCacheAdmin } from "./cache-admin";

async function main(): Promise<void> {
  const config = loadCacheConfig();
  setLogLevel(config.logLevel);
  const cache = await openDeviceCache(config);
  process.exitCode = await runCacheAdmin(process.argv.slice(2), {
    cache,
    cleanupIntervalMs: config.cleanupIntervalMs
  });
}

main()
  .catch((error: unknown) => {
    process.stdout.write(`${JSON.stringify({ ok: false, error: String(error) })}\n`);
    process.exitCode = 1;
  })
  .finally(flushLogs);
