import path from "path";
import type { CacheFileSystem, DirEntry, FileStat } from "./types";

interface MemoryFile {
  data: string;
  modifiedAt: Date;
}

const ROOT = "/";

/**
 * In-process filesystem with POSIX path rules. Parent directories must exist
 * for writes and renames, mirroring what the cache sees on a real disk.
 */
export class MemoryFileSystem implements CacheFileSystem {
  private readonly files = new Map<string, MemoryFile>();
  private readonly dirs = new Set<string>([ROOT]);

  async readFile(target: string): Promise<string> {
    const key = normalize(target);
    if (this.dirs.has(key)) {
      throw fsError("EISDIR", "read", key);
    }
    const file = this.files.get(key);
    if (!file) {
      throw fsError("ENOENT", "open", key);
    }
    return file.data;
  }

  async writeFile(target: string, data: string): Promise<void> {
    const key = normalize(target);
    if (this.dirs.has(key)) {
      throw fsError("EISDIR", "open", key);
    }
    this.assertParentDir(key, "open");
    this.files.set(key, { data, modifiedAt: new Date() });
  }

  async rename(from: string, to: string): Promise<void> {
    const source = normalize(from);
    const destination = normalize(to);
    const file = this.files.get(source);
    if (!file) {
      throw fsError(this.dirs.has(source) ? "EISDIR" : "ENOENT", "rename", source);
    }
    if (this.dirs.has(destination)) {
      throw fsError("EISDIR", "rename", destination);
    }
    this.assertParentDir(destination, "rename");
    this.files.delete(source);
    this.files.set(destination, file);
  }

  async remove(target: string): Promise<void> {
    const key = normalize(target);
    if (this.dirs.has(key)) {
      throw fsError("EISDIR", "unlink", key);
    }
    if (!this.files.delete(key)) {
      throw fsError("ENOENT", "unlink", key);
    }
  }

  async removeAll(target: string): Promise<void> {
    const key = normalize(target);
    this.files.delete(key);
    if (!this.dirs.has(key)) {
      return;
    }
    const prefix = key === ROOT ? ROOT : `${key}/`;
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(prefix)) this.files.delete(file);
    }
    for (const dir of [...this.dirs]) {
      if (dir.startsWith(prefix)) this.dirs.delete(dir);
    }
    if (key !== ROOT) {
      this.dirs.delete(key);
    }
  }

  async mkdirAll(target: string): Promise<void> {
    const key = normalize(target);
    const chain: string[] = [];
    for (let current = key; current !== ROOT; current = path.posix.dirname(current)) {
      chain.unshift(current);
    }
    for (const dir of chain) {
      if (this.files.has(dir)) {
        throw fsError("ENOTDIR", "mkdir", dir);
      }
      this.dirs.add(dir);
    }
  }

  async stat(target: string): Promise<FileStat> {
    const key = normalize(target);
    if (this.dirs.has(key)) {
      return { size: 0, isDirectory: true, modifiedAt: new Date(0) };
    }
    const file = this.files.get(key);
    if (!file) {
      throw fsError("ENOENT", "stat", key);
    }
    return { size: Buffer.byteLength(file.data, "utf8"), isDirectory: false, modifiedAt: file.modifiedAt };
  }

  async readDir(target: string): Promise<DirEntry[]> {
    const key = normalize(target);
    if (this.files.has(key)) {
      throw fsError("ENOTDIR", "scandir", key);
    }
    if (!this.dirs.has(key)) {
      throw fsError("ENOENT", "scandir", key);
    }
    const entries: DirEntry[] = [];
    for (const dir of this.dirs) {
      if (dir !== key && path.posix.dirname(dir) === key) {
        entries.push({ name: path.posix.basename(dir), isDirectory: true });
      }
    }
    for (const file of this.files.keys()) {
      if (path.posix.dirname(file) === key) {
        entries.push({ name: path.posix.basename(file), isDirectory: false });
      }
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Backdates a file's modification time. */
  touch(target: string, modifiedAt: Date): void {
    const file = this.files.get(normalize(target));
    if (file) {
      file.modifiedAt = modifiedAt;
    }
  }

  exists(target: string): boolean {
    const key = normalize(target);
    return this.files.has(key) || this.dirs.has(key);
  }

  private assertParentDir(key: string, syscall: string): void {
    const parent = path.posix.dirname(key);
    if (this.files.has(parent)) {
      throw fsError("ENOTDIR", syscall, key);
    }
    if (!this.dirs.has(parent)) {
      throw fsError("ENOENT", syscall, key);
    }
  }
}

function normalize(target: string): string {
  const resolved = path.posix.resolve(ROOT, target);
  return resolved.length > 1 && resolved.endsWith("/") ? resolved.slice(0, -1) : resolved;
}

function fsError(code: string, syscall: string, target: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: ${syscall} '${target}'`), { code });
}

export const createMemoryFileSystem = (): MemoryFileSystem => new MemoryFileSystem();
