import fs from "node:fs/promises";
import path from "node:path";
import { isSupportedImagePath } from "@vectorize-batch/core";

export type DirectoryEntry = {
  name: string;
  path: string;
  kind: "directory" | "file";
};

/** Parent link first, then sub-directories, then images; hidden entries are left out. */
export async function listDirectory(dir: string): Promise<DirectoryEntry[]> {
  const resolved = path.resolve(dir);
  const entries = await fs.readdir(resolved, { withFileTypes: true });
  const directories: DirectoryEntry[] = [];
  const images: DirectoryEntry[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith(".")) {
      continue;
    }
    const entryPath = path.join(resolved, entry.name);
    if (entry.isDirectory()) {
      directories.push({ name: entry.name, path: entryPath, kind: "directory" });
    } else if (entry.isFile() && isSupportedImagePath(entry.name)) {
      images.push({ name: entry.name, path: entryPath, kind: "file" });
    }
  }

  const byName = (a: DirectoryEntry, b: DirectoryEntry) => a.name.localeCompare(b.name);
  directories.sort(byName);
  images.sort(byName);

  const parent = path.dirname(resolved);
  const up: DirectoryEntry[] = parent === resolved ? [] : [{ name: "..", path: parent, kind: "directory" }];
  return [...up, ...directories, ...images];
}

export function visibleWindow(length: number, cursor: number, size: number): { start: number; end: number } {
  if (length <= size) {
    return { start: 0, end: length };
  }
  const start = Math.min(Math.max(0, cursor - Math.floor(size / 2)), length - size);
  return { start, end: start + size };
}
