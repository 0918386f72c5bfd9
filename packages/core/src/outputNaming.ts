import fs from "node:fs/promises";
import path from "node:path";

const numericStem = /^\d+$/;

// Two processes writing into the same directory can pick the same number.
export async function nextNumberedOutputPath(outputDir: string, ext = ".svg"): Promise<string> {
  const entries = await fs.readdir(outputDir);
  let max = 0;

  for (const name of entries) {
    if (path.extname(name).toLowerCase() !== ext) {
      continue;
    }
    const stem = path.basename(name, path.extname(name));
    if (!numericStem.test(stem)) {
      continue;
    }
    max = Math.max(max, Number.parseInt(stem, 10));
  }

  return path.join(outputDir, `${max + 1}${ext}`);
}
