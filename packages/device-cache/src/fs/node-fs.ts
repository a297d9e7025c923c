import { promises as fs } from "fs";
import type { CacheFileSystem, DirEntry, FileStat } from "./types";

const DIR_MODE = 0o755;
const FILE_MODE = 0o644;

export class NodeFileSystem implements CacheFileSystem {
  async readFile(path: string): Promise<string> {
    return fs.readFile(path, "utf8");
  }

  async writeFile(path: string, data: string): Promise<void> {
    await fs.writeFile(path, data, { encoding: "utf8", mode: FILE_MODE });
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.rename(from, to);
  }

  async remove(path: string): Promise<void> {
    await fs.unlink(path);
  }

  async removeAll(path: string): Promise<void> {
    await fs.rm(path, { recursive: true, force: true });
  }

  async mkdirAll(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true, mode: DIR_MODE });
  }

  async stat(path: string): Promise<FileStat> {
    const info = await fs.stat(path);
    return {
      size: info.size,
      isDirectory: info.isDirectory(),
      modifiedAt: info.mtime
    };
  }

  async readDir(path: string): Promise<DirEntry[]> {
    const entries = await fs.readdir(path, { withFileTypes: true });
    return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
  }
}

export const createNodeFileSystem = (): NodeFileSystem => new NodeFileSystem();
