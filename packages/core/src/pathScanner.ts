import fs from "node:fs/promises";
import path from "node:path";
import type { Dirent, Stats } from "node:fs";
import { isSupportedImagePath } from "./fileType";

async function statOrNull(targetPath: string): Promise<Stats | null> {
  try {
    return await fs.stat(targetPath);
  } catch {
    return null;
  }
}

async function realpathOrNull(targetPath: string): Promise<string | null> {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return null;
  }
}

/**
 * Turns command-line inputs into the list of files to convert. Directories
 * expand to the images inside them; every other argument is kept as given,
 * repeats and unreadable paths included, so the batch reports on each one.
 */
export async function expandInputPaths(inputPaths: string[]): Promise<string[]> {
  // Real paths of walked directories and collected files.
  const seen = new Set<string>();
  const files: string[] = [];

  async function walkDirectory(dirPath: string): Promise<void> {
    const realDir = await realpathOrNull(dirPath);
    if (realDir === null || seen.has(realDir)) {
      return;
    }
    seen.add(realDir);

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch {
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);
      const stat = await statOrNull(entryPath);
      if (stat === null) {
        continue;
      }
      if (stat.isDirectory()) {
        await walkDirectory(entryPath);
        continue;
      }
      if (!stat.isFile() || !isSupportedImagePath(entryPath)) {
        continue;
      }
      const realFile = await realpathOrNull(entryPath);
      if (realFile === null || seen.has(realFile)) {
        continue;
      }
      seen.add(realFile);
      files.push(entryPath);
    }
  }

  for (const inputPath of inputPaths) {
    const resolved = path.resolve(inputPath);
    const stat = await statOrNull(resolved);
    if (stat?.isDirectory()) {
      await walkDirectory(resolved);
      continue;
    }
    files.push(resolved);
    const realFile = await realpathOrNull(resolved);
    if (realFile !== null) {
      seen.add(realFile);
    }
  }

  return files;
}
