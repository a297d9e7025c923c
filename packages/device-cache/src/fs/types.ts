export interface FileStat {
  size: number;
  isDirectory: boolean;
  modifiedAt: Date;
}

export interface DirEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * The subset of filesystem operations the cache needs. Paths are absolute.
 * Failures for absent paths must carry `code: "ENOENT"`.
 */
export interface CacheFileSystem {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Removes a single file. */
  remove(path: string): Promise<void>;
  /** Removes a file or directory tree; absent paths are not an error. */
  removeAll(path: string): Promise<void>;
  mkdirAll(path: string): Promise<void>;
  stat(path: string): Promise<FileStat>;
  readDir(path: string): Promise<DirEntry[]>;
}
