import path from "path";
import { describe, expect, it } from "vitest";

import { CURRENT_VERSION } from "../src/cache/entry";
import { isExpired } from "../src/cache/expiry";
import { FileCache, ORPHAN_TEMP_AGE_MS, sanitizeDeviceName } from "../src/cache/file-cache";
import { CacheEncodeError, CacheError, CleanupError } from "../src/errors";
import { MemoryFileSystem } from "../src/fs/memory-fs";
import { HOUR, MINUTE, ROOT, SECOND, createClock, createMemoryCache, createSpyLogger, fsError } from "./helpers/cache";

class FlakyFileSystem extends MemoryFileSystem {
  failRename = false;
  failRemoveFor: string | null = null;
  failWriteFor: string | null = null;
  failReadFor: string | null = null;

  async rename(from: string, to: string): Promise<void> {
    if (this.failRename) throw fsError("EACCES");
    return super.rename(from, to);
  }

  async remove(target: string): Promise<void> {
    if (this.failRemoveFor !== null && target === this.failRemoveFor) throw fsError("EACCES");
    return super.remove(target);
  }

  async writeFile(target: string, data: string): Promise<void> {
    if (this.failWriteFor !== null && target === this.failWriteFor) throw fsError("ENOSPC");
    return super.writeFile(target, data);
  }

  async readFile(target: string): Promise<string> {
    if (this.failReadFor !== null && target === this.failReadFor) throw fsError("EACCES");
    return super.readFile(target);
  }
}

const entryFile = (dataType: string, device: string) => path.join(ROOT, dataType, `${device}.json`);

describe("FileCache", () => {
  describe("set and get", () => {
    it("round-trips a payload", async () => {
      const { cache, clock } = await createMemoryCache();
      const payload = { ssid: "home", rssi: -61, bands: ["2.4", "5"], nested: { enabled: true } };

      await cache.set("kitchen", "wifi", payload, HOUR);
      const entry = await cache.get("kitchen", "wifi");

      expect(entry).not.toBeNull();
      expect(entry?.data).toEqual(payload);
      expect(entry?.version).toBe(CURRENT_VERSION);
      expect(entry?.device).toBe("kitchen");
      expect(entry?.dataType).toBe("wifi");
      expect(entry?.deviceId).toBeUndefined();
      expect(entry?.cachedAt.toISOString()).toBe("2024-01-01T00:00:00.000Z");
      expect(entry?.expiresAt.toISOString()).toBe("2024-01-01T01:00:00.000Z");
      expect(entry && isExpired(entry, clock.now())).toBe(false);
    });

    it("writes the interoperable JSON envelope", async () => {
      const { cache, fs } = await createMemoryCache();
      await cache.setWithId("kitchen", "shellyplus1-a8032ab1", "wifi", { ssid: "home" }, 30 * MINUTE);

      const stored = JSON.parse(await fs.readFile(entryFile("wifi", "kitchen")));
      expect(stored).toEqual({
        version: 1,
        device: "kitchen",
        device_id: "shellyplus1-a8032ab1",
        data_type: "wifi",
        cached_at: "2024-01-01T00:00:00.000Z",
        expires_at: "2024-01-01T00:30:00.000Z",
        data: { ssid: "home" }
      });

      const entry = await cache.get("kitchen", "wifi");
      expect(entry?.deviceId).toBe("shellyplus1-a8032ab1");
    });

    it("omits device_id when none is given", async () => {
      const { cache, fs } = await createMemoryCache();
      await cache.set("kitchen", "wifi", { ssid: "home" }, HOUR);

      const stored = JSON.parse(await fs.readFile(entryFile("wifi", "kitchen")));
      expect(Object.keys(stored)).toEqual(["version", "device", "data_type", "cached_at", "expires_at", "data"]);
    });

    it("replaces an existing entry in full", async () => {
      const { cache } = await createMemoryCache();
      await cache.set("kitchen", "system", { name: "Kitchen", tz: "UTC" }, HOUR);
      await cache.set("kitchen", "system", { name: "Kitchen Light" }, HOUR);

      const entry = await cache.get("kitchen", "system");
      expect(entry?.data).toEqual({ name: "Kitchen Light" });
    });

    it("stores nested data types as nested directories", async () => {
      const { cache, fs } = await createMemoryCache();
      await cache.set("kitchen", "protocols/mqtt", { enable: false }, HOUR);

      expect(fs.exists(path.join(ROOT, "protocols", "mqtt", "kitchen.json"))).toBe(true);
      expect((await cache.get("kitchen", "protocols/mqtt"))?.data).toEqual({ enable: false });
    });

    it("returns null for a missing entry", async () => {
      const { cache } = await createMemoryCache();
      await expect(cache.get("nobody", "wifi")).resolves.toBeNull();
      await expect(cache.getWithExpired("nobody", "wifi")).resolves.toBeNull();
    });

    it("surfaces read failures other than a missing file", async () => {
      const fs = new FlakyFileSystem();
      const { cache } = await createMemoryCache({ fs });
      await cache.set("kitchen", "wifi", { ssid: "home" }, HOUR);
      fs.failReadFor = entryFile("wifi", "kitchen");

      const error = await cache.get("kitchen", "wifi").catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CacheError);
      expect(error).toMatchObject({ op: "read cache file", message: "failed to read cache file: EACCES: simulated failure" });
    });

    it("rejects payloads JSON cannot encode without touching the disk", async () => {
      const { cache, fs } = await createMemoryCache();

      await expect(cache.set("kitchen", "wifi", { big: 10n }, HOUR)).rejects.toBeInstanceOf(CacheEncodeError);
      await expect(cache.set("kitchen", "wifi", undefined, HOUR)).rejects.toBeInstanceOf(CacheEncodeError);
      expect(fs.exists(path.join(ROOT, "wifi"))).toBe(false);
    });

    it("rejects negative lifetimes", async () => {
      const { cache } = await createMemoryCache();
      await expect(cache.set("kitchen", "wifi", {}, -1)).rejects.toBeInstanceOf(RangeError);
    });

    it("rejects lifetimes that end past the latest representable date", async () => {
      const { cache, fs } = await createMemoryCache();
      await expect(cache.set("kitchen", "wifi", {}, 1e16)).rejects.toThrow(
        new RangeError("ttl of 10000000000000000 ms puts expiry past the latest representable date")
      );
      expect(fs.exists(path.join(ROOT, "wifi"))).toBe(false);
    });

    it("resolves with the cachedAt it wrote", async () => {
      const { cache, clock } = await createMemoryCache();
      clock.advance(MINUTE);
      await expect(cache.set("kitchen", "wifi", {}, HOUR)).resolves.toEqual(new Date("2024-01-01T00:01:00.000Z"));
    });
  });

  describe("expiry", () => {
    it("hides expired entries from get but not from getWithExpired", async () => {
      const { cache, clock } = await createMemoryCache();
      await cache.set("kitchen", "wifi", { ssid: "home" }, 1);
      clock.advance(5);

      await expect(cache.get("kitchen", "wifi")).resolves.toBeNull();
      const stale = await cache.getWithExpired("kitchen", "wifi");
      expect(stale?.data).toEqual({ ssid: "home" });
      expect(stale && isExpired(stale, clock.now())).toBe(true);
    });

    it("keeps the file of an expired entry after get", async () => {
      const { cache, clock, fs } = await createMemoryCache();
      await cache.set("kitchen", "wifi", { ssid: "home" }, SECOND);
      clock.advance(2 * SECOND);

      await cache.get("kitchen", "wifi");
      expect(fs.exists(entryFile("wifi", "kitchen"))).toBe(true);
    });
  });

  describe("self-healing reads", () => {
    it("deletes a corrupt file and reports a miss", async () => {
      const { cache, fs } = await createMemoryCache();
      await fs.mkdirAll(path.join(ROOT, "wifi"));
      await fs.writeFile(entryFile("wifi", "kitchen"), "{not json");

      await expect(cache.get("kitchen", "wifi")).resolves.toBeNull();
      expect(fs.exists(entryFile("wifi", "kitchen"))).toBe(false);
    });

    it("deletes entries written under another format version", async () => {
      const { cache, fs } = await createMemoryCache();
      await fs.mkdirAll(path.join(ROOT, "wifi"));
      const envelope = (version: number) =>
        JSON.stringify({
          version,
          device: "kitchen",
          data_type: "wifi",
          cached_at: "2024-01-01T00:00:00Z",
          expires_at: "2024-01-01T01:00:00Z",
          data: {}
        });

      await fs.writeFile(entryFile("wifi", "kitchen"), envelope(0));
      await expect(cache.getWithExpired("kitchen", "wifi")).resolves.toBeNull();
      expect(fs.exists(entryFile("wifi", "kitchen"))).toBe(false);

      await fs.writeFile(entryFile("wifi", "kitchen"), envelope(2));
      await expect(cache.get("kitchen", "wifi")).resolves.toBeNull();
      expect(fs.exists(entryFile("wifi", "kitchen"))).toBe(false);
    });

    it("still reports a miss when the corrupt file cannot be removed", async () => {
      const fs = new FlakyFileSystem();
      const logger = createSpyLogger();
      const { cache } = await createMemoryCache({ fs, logger });
      await fs.mkdirAll(path.join(ROOT, "wifi"));
      await fs.writeFile(entryFile("wifi", "kitchen"), "garbage");
      fs.failRemoveFor = entryFile("wifi", "kitchen");

      await expect(cache.get("kitchen", "wifi")).resolves.toBeNull();
      expect(logger.debug).toHaveBeenCalledWith(
        "remove unusable cache file failed",
        expect.objectContaining({ reason: "corrupt" })
      );
    });
  });

  describe("atomic writes", () => {
    it("leaves no temp file behind after a successful write", async () => {
      const { cache, fs } = await createMemoryCache();
      await cache.set("kitchen", "wifi", { ssid: "home" }, HOUR);
      expect(fs.exists(`${entryFile("wifi", "kitchen")}.tmp`)).toBe(false);
    });

    it("keeps the previous entry and removes the temp file when rename fails", async () => {
      const fs = new FlakyFileSystem();
      const { cache } = await createMemoryCache({ fs });
      await cache.set("kitchen", "wifi", { ssid: "old" }, HOUR);
      fs.failRename = true;

      const error = await cache.set("kitchen", "wifi", { ssid: "new" }, HOUR).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CacheError);
      expect(error).toMatchObject({ op: "rename cache file" });

      fs.failRename = false;
      expect((await cache.get("kitchen", "wifi"))?.data).toEqual({ ssid: "old" });
      expect(fs.exists(`${entryFile("wifi", "kitchen")}.tmp`)).toBe(false);
    });
  });

  describe("sanitizeDeviceName", () => {
    it("replaces only filesystem-unsafe characters", () => {
      expect(sanitizeDeviceName('a/b:c*?"<>|\\d.local')).toBe("a_b_c_______d.local");
      expect(sanitizeDeviceName("küche.lamp-2")).toBe("küche.lamp-2");
    });

    it("is applied to entry paths", async () => {
      const { cache } = await createMemoryCache();
      expect(cache.entryPath("192.168.1.20:80", "wifi")).toBe(path.join(ROOT, "wifi", "192.168.1.20_80.json"));
    });
  });

  describe("invalidation", () => {
    it("removes a single entry and tolerates absent ones", async () => {
      const { cache } = await createMemoryCache();
      await cache.set("kitchen", "wifi", {}, HOUR);
      await cache.set("kitchen", "system", {}, HOUR);

      await cache.invalidate("kitchen", "wifi");
      await expect(cache.invalidate("kitchen", "wifi")).resolves.toBeUndefined();

      await expect(cache.get("kitchen", "wifi")).resolves.toBeNull();
      await expect(cache.get("kitchen", "system")).resolves.not.toBeNull();
    });

    it("removes every data type of one device only", async () => {
      const { cache } = await createMemoryCache();
      await cache.set("d1", "wifi", {}, HOUR);
      await cache.set("d1", "system", {}, HOUR);
      await cache.set("d1", "automation/scripts", [], HOUR);
      await cache.set("d2", "wifi", {}, HOUR);
      await cache.set("d2", "automation/scripts", [], HOUR);

      await expect(cache.invalidateDevice("d1")).resolves.toBe(3);

      await expect(cache.get("d1", "wifi")).resolves.toBeNull();
      await expect(cache.get("d1", "system")).resolves.toBeNull();
      await expect(cache.get("d1", "automation/scripts")).resolves.toBeNull();
      await expect(cache.get("d2", "wifi")).resolves.not.toBeNull();
      await expect(cache.get("d2", "automation/scripts")).resolves.not.toBeNull();
    });

    it("matches on the stored device name rather than the file name", async () => {
      const { cache } = await createMemoryCache();
      await cache.set("hall/left", "wifi", {}, HOUR);

      await expect(cache.invalidateDevice("hall_left")).resolves.toBe(0);
      await expect(cache.invalidateDevice("hall/left")).resolves.toBe(1);
    });

    it("empties the root but keeps it", async () => {
      const { cache, fs } = await createMemoryCache();
      await cache.set("d1", "wifi", {}, HOUR);
      await cache.set("d2", "protocols/mqtt", {}, HOUR);
      await cache.cleanupIfNeeded(HOUR);

      await cache.invalidateAll();

      expect(fs.exists(ROOT)).toBe(true);
      await expect(fs.readDir(ROOT)).resolves.toEqual([]);
    });

    it("treats a missing root as already empty", async () => {
      const cache = new FileCache({ rootDir: "/nowhere", fs: new MemoryFileSystem() });
      await expect(cache.invalidateAll()).resolves.toBeUndefined();
    });
  });

  describe("cleanup", () => {
    it("removes only expired entries", async () => {
      const { cache, clock } = await createMemoryCache();
      await cache.set("d1", "wifi", { ssid: "old" }, MINUTE);
      await cache.set("d2", "wifi", { ssid: "live" }, HOUR);
      clock.advance(2 * MINUTE);

      await expect(cache.cleanup()).resolves.toBe(1);

      await expect(cache.getWithExpired("d1", "wifi")).resolves.toBeNull();
      expect((await cache.get("d2", "wifi"))?.data).toEqual({ ssid: "live" });
    });

    it("sweeps temp files once they are old enough", async () => {
      const { cache, clock, fs } = await createMemoryCache();
      await fs.mkdirAll(path.join(ROOT, "wifi"));
      const orphan = `${entryFile("wifi", "d1")}.tmp`;
      const inFlight = `${entryFile("wifi", "d2")}.tmp`;
      await fs.writeFile(orphan, "{");
      await fs.writeFile(inFlight, "{");
      fs.touch(orphan, new Date(clock.now().getTime() - ORPHAN_TEMP_AGE_MS - SECOND));
      fs.touch(inFlight, new Date(clock.now().getTime() - MINUTE));

      await expect(cache.cleanup()).resolves.toBe(0);

      expect(fs.exists(orphan)).toBe(false);
      expect(fs.exists(inFlight)).toBe(true);
    });

    it("stops at the first removal failure and reports what was removed", async () => {
      const fs = new FlakyFileSystem();
      const { cache, clock } = await createMemoryCache({ fs });
      await cache.set("d1", "a-type", {}, SECOND);
      await cache.set("d1", "b-type", {}, SECOND);
      await cache.set("d1", "c-type", {}, SECOND);
      clock.advance(2 * SECOND);
      fs.failRemoveFor = entryFile("b-type", "d1");

      const error = await cache.cleanup().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CleanupError);
      expect(error).toMatchObject({ removed: 1 });
      expect(fs.exists(entryFile("a-type", "d1"))).toBe(false);
      expect(fs.exists(entryFile("b-type", "d1"))).toBe(true);
      expect(fs.exists(entryFile("c-type", "d1"))).toBe(true);
    });
  });

  describe("cleanupIfNeeded", () => {
    it("runs at most once per interval", async () => {
      const { cache, clock } = await createMemoryCache();
      await cache.set("d1", "wifi", {}, SECOND);
      clock.advance(2 * SECOND);

      await expect(cache.cleanupIfNeeded(HOUR)).resolves.toBe(1);
      const meta = await cache.readMeta();
      expect(meta.lastCleanupAt.toISOString()).toBe("2024-01-01T00:00:02.000Z");

      await cache.set("d2", "wifi", {}, 1);
      clock.advance(5);

      await expect(cache.cleanupIfNeeded(HOUR)).resolves.toBe(0);
      await expect(cache.getWithExpired("d2", "wifi")).resolves.not.toBeNull();

      await expect(cache.cleanupIfNeeded(0.000001)).resolves.toBe(1);
      await expect(cache.cleanupIfNeeded(0.000001)).resolves.toBe(0);
    });

    it("runs again once the interval has passed", async () => {
      const { cache, clock } = await createMemoryCache();
      await cache.cleanupIfNeeded(HOUR);
      await cache.set("d1", "wifi", {}, MINUTE);
      clock.advance(HOUR);

      await expect(cache.cleanupIfNeeded(HOUR)).resolves.toBe(1);
    });

    it("treats a corrupt meta file as no previous cleanup", async () => {
      const { cache, clock, fs } = await createMemoryCache();
      await fs.writeFile(path.join(ROOT, "meta.json"), "\u0000\u0001");
      await cache.set("d1", "wifi", {}, SECOND);
      clock.advance(2 * SECOND);

      await expect(cache.cleanupIfNeeded(HOUR)).resolves.toBe(1);
    });

    it("treats an unreadable meta file as no previous cleanup", async () => {
      const fs = new FlakyFileSystem();
      const { cache, clock } = await createMemoryCache({ fs });
      await cache.cleanupIfNeeded(HOUR);
      await cache.set("d1", "wifi", {}, SECOND);
      clock.advance(2 * SECOND);
      fs.failReadFor = path.join(ROOT, "meta.json");

      await expect(cache.readMeta()).rejects.toBeInstanceOf(CacheError);
      await expect(cache.cleanupIfNeeded(HOUR)).resolves.toBe(1);
    });

    it("succeeds even when the watermark cannot be persisted", async () => {
      const fs = new FlakyFileSystem();
      const logger = createSpyLogger();
      const { cache, clock } = await createMemoryCache({ fs, logger });
      await cache.set("d1", "wifi", {}, SECOND);
      clock.advance(2 * SECOND);
      fs.failWriteFor = path.join(ROOT, "meta.json.tmp");

      await expect(cache.cleanupIfNeeded(HOUR)).resolves.toBe(1);
      expect(logger.warn).toHaveBeenCalledWith("persist cache meta failed", expect.any(Object));
      expect((await cache.readMeta()).lastCleanupAt.toISOString()).toBe("0001-01-01T00:00:00.000Z");
    });
  });

  describe("stats", () => {
    it("summarises entries and skips everything else", async () => {
      const { cache, clock, fs } = await createMemoryCache();
      await cache.set("d1", "wifi", { ssid: "home" }, HOUR);
      clock.advance(SECOND);
      await cache.set("d1", "system", { name: "Kitchen" }, HOUR);
      clock.advance(SECOND);
      await cache.set("d2", "wifi", { ssid: "guest" }, 1);
      clock.advance(SECOND);
      await cache.cleanupIfNeeded(0.000001);
      await cache.set("d2", "wifi", { ssid: "guest" }, 1);
      clock.advance(SECOND);

      await fs.writeFile(entryFile("wifi", "broken"), "not json");
      await fs.writeFile(path.join(ROOT, "wifi", "notes.txt"), "hello");
      await fs.writeFile(`${entryFile("wifi", "d3")}.tmp`, "{}");

      const stats = await cache.stats();

      let expectedSize = 0;
      for (const [dataType, device] of [["wifi", "d1"], ["system", "d1"], ["wifi", "d2"]]) {
        expectedSize += (await fs.stat(entryFile(dataType, device))).size;
      }

      expect(stats).toEqual({
        totalEntries: 3,
        totalSizeBytes: expectedSize,
        expiredEntries: 1,
        deviceCount: 2,
        oldestEntry: new Date("2024-01-01T00:00:00.000Z"),
        newestEntry: new Date("2024-01-01T00:00:03.000Z"),
        typeCounts: { wifi: 2, system: 1 }
      });
      expect(fs.exists(entryFile("wifi", "broken"))).toBe(true);
    });

    it("reports an empty cache", async () => {
      const { cache } = await createMemoryCache();
      await expect(cache.stats()).resolves.toEqual({
        totalEntries: 0,
        totalSizeBytes: 0,
        expiredEntries: 0,
        deviceCount: 0,
        oldestEntry: null,
        newestEntry: null,
        typeCounts: {}
      });
    });

    it("counts an entry for a device named meta", async () => {
      const { cache } = await createMemoryCache();
      await cache.set("meta", "wifi", {}, HOUR);
      expect((await cache.stats()).totalEntries).toBe(1);
    });
  });

  describe("concurrency", () => {
    it("serialises writers against readers without losing entries", async () => {
      const { cache } = await createMemoryCache({ clock: createClock() });
      const writers = Array.from({ length: 25 }, (_, index) =>
        cache.set(`device-${index}`, "wifi", { index }, HOUR)
      );
      const readers = Array.from({ length: 25 }, (_, index) =>
        index % 2 === 0 ? cache.get(`device-${index}`, "wifi") : cache.stats()
      );

      await Promise.all([...writers, ...readers]);

      const stats = await cache.stats();
      expect(stats.totalEntries).toBe(25);
      for (let index = 0; index < 25; index += 1) {
        expect((await cache.get(`device-${index}`, "wifi"))?.data).toEqual({ index });
      }
    });
  });
});
