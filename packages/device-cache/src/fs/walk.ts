import path from "path";
import type { CacheFileSystem, DirEntry } from "./types";

export interface WalkedFile {
  path: string;
  name: string;
  /** Directory depth below the walk root; 0 for files directly in it. */
  depth: number;
}

/**
 * Yields every file below `root` in name order. Directories that cannot be
 * listed are skipped along with their contents.
 */
export async function* walkFiles(fs: CacheFileSystem, root: string, depth = 0): AsyncGenerator<WalkedFile> {
  let entries: DirEntry[];
  try {
    entries = await fs.readDir(root);
  } catch {
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory) {
      yield* walkFiles(fs, fullPath, depth + 1);
    } else {
      yield { path: fullPath, name: entry.name, depth };
    }
  }
}
