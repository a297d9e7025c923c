import dotenv from "dotenv";
import { homedir } from "os";
import path from "path";
import { isLogLevel, type LogLevel } from "../lib/logger";

dotenv.config();

export type CacheMode = "default" | "refresh" | "offline";

export interface CacheConfig {
  cacheDir: string;
  cleanupIntervalMs: number;
  mode: CacheMode;
  logLevel: LogLevel;
}

export const DEFAULT_CLEANUP_INTERVAL_MS = 24 * 60 * 60 * 1000;

const APP_DIR = "devicedeck";

type EnvSource = Record<string, string | undefined>;

export function loadCacheConfig(source: EnvSource = process.env): CacheConfig {
  const env = (key: string, fallback: string): string => {
    const value = source[key];
    return value === undefined || value === "" ? fallback : value;
  };

  const envInt = (key: string, fallback: number): number => {
    const value = source[key];
    if (!value) return fallback;
    const n = Number.parseInt(value, 10);
    return Number.isFinite(n) && n >= 0 ? n : fallback;
  };

  return Object.freeze({
    cacheDir: env("DEVICEDECK_CACHE_DIR", defaultCacheDir(source)),
    cleanupIntervalMs: envInt("DEVICEDECK_CACHE_CLEANUP_INTERVAL_MS", DEFAULT_CLEANUP_INTERVAL_MS),
    mode: normalizeMode(source["DEVICEDECK_CACHE_MODE"]),
    logLevel: normalizeLogLevel(source["DEVICEDECK_LOG_LEVEL"])
  });
}

function defaultCacheDir(source: EnvSource): string {
  const xdg = source["XDG_CACHE_HOME"];
  if (xdg) {
    return path.join(xdg, APP_DIR);
  }
  return path.join(homedir(), ".cache", APP_DIR);
}

function normalizeMode(value: string | undefined): CacheMode {
  if (value === "refresh" || value === "offline") {
    return value;
  }
  return "default";
}

function normalizeLogLevel(value: string | undefined): LogLevel {
  const lowered = value?.toLowerCase();
  return isLogLevel(lowered) ? lowered : "warn";
}
