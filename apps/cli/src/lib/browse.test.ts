import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { listDirectory, visibleWindow } from "./browse";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "vectorize-browse-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("listDirectory", () => {
  it("lists the parent, then folders, then images", async () => {
    await fs.mkdir(path.join(dir, "zeta"));
    await fs.mkdir(path.join(dir, "alpha"));
    await fs.mkdir(path.join(dir, ".cache"));
    await fs.writeFile(path.join(dir, "b.png"), "");
    await fs.writeFile(path.join(dir, "a.jpeg"), "");
    await fs.writeFile(path.join(dir, "readme.md"), "");

    const entries = await listDirectory(dir);

    expect(entries.map((entry) => `${entry.kind}:${entry.name}`)).toEqual([
      "directory:..",
      "directory:alpha",
      "directory:zeta",
      "file:a.jpeg",
      "file:b.png"
    ]);
    expect(entries[0]?.path).toBe(path.dirname(dir));
  });
});

describe("visibleWindow", () => {
  it("shows everything when it fits", () => {
    expect(visibleWindow(5, 4, 10)).toEqual({ start: 0, end: 5 });
  });

  it("keeps the cursor near the middle and clamps at the ends", () => {
    expect(visibleWindow(50, 0, 10)).toEqual({ start: 0, end: 10 });
    expect(visibleWindow(50, 20, 10)).toEqual({ start: 15, end: 25 });
    expect(visibleWindow(50, 49, 10)).toEqual({ start: 40, end: 50 });
  });
});
