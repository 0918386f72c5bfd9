import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ConversionJob } from "@vectorize-batch/core";
import { runCli } from "./cli";
import type { CliDeps } from "./cli";

let dir: string;
let info: string[];
let errors: string[];

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "vectorize-cli-"));
  info = [];
  errors = [];
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function makeDeps(overrides: Partial<CliDeps> = {}) {
  const convert = vi.fn(async (job: ConversionJob) => {
    await fs.writeFile(job.outputPath, "<svg/>");
  });
  const deps: CliDeps = {
    logger: {
      info: (message) => info.push(message),
      error: (message) => errors.push(message)
    },
    env: {},
    cwd: dir,
    isToolAvailable: vi.fn(async () => true),
    createConverter: vi.fn(() => convert),
    pickFiles: vi.fn(async () => []),
    launchForm: vi.fn(async () => 0),
    ...overrides
  };
  return { deps, convert };
}

async function touch(name: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, "png");
  return filePath;
}

describe("runCli", () => {
  it("converts existing inputs, reports missing ones and exits 1", async () => {
    await touch("a.png");
    const { deps, convert } = makeDeps();

    const code = await runCli(["a.png", "missing.png", "-o", "out"], deps);

    expect(code).toBe(1);
    expect(convert).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(path.join(dir, "out"))).toEqual(["1.svg"]);
    expect(info).toContain("Vectorizing: a.png");
    expect(info).toContain(`✓ Successfully created: ${path.join(dir, "out", "1.svg")}`);
    const missing = path.join(dir, "missing.png");
    expect(errors).toEqual([`✗ Failed to process ${missing}: Input file not found: ${missing}`]);
    expect(info.slice(-4)).toEqual(["--- Summary ---", "Successful: 1", "Failed: 1", "Total: 2"]);
  });

  it("exits 0 when every file converts and numbers outputs in order", async () => {
    await touch("a.png");
    await touch("b.png");
    const { deps } = makeDeps();

    const code = await runCli(["a.png", "b.png", "--output-dir", "svg"], deps);

    expect(code).toBe(0);
    expect((await fs.readdir(path.join(dir, "svg"))).sort()).toEqual(["1.svg", "2.svg"]);
    expect(errors).toEqual([]);
  });

  it("converts a file once for every time it is named", async () => {
    await touch("a.png");
    const { deps, convert } = makeDeps();

    const code = await runCli(["a.png", "a.png", "-o", "out"], deps);

    expect(code).toBe(0);
    expect(convert).toHaveBeenCalledTimes(2);
    expect((await fs.readdir(path.join(dir, "out"))).sort()).toEqual(["1.svg", "2.svg"]);
    expect(info.slice(-4)).toEqual(["--- Summary ---", "Successful: 2", "Failed: 0", "Total: 2"]);
  });

  it("hands the parsed parameters and binary to the converter", async () => {
    await touch("a.png");
    const { deps, convert } = makeDeps({ env: { VTRACER_BIN: "/opt/vtracer" } });

    await runCli(["a.png", "--colormode", "binary", "--mode", "polygon", "--segment-length", "3.25"], deps);

    expect(deps.isToolAvailable).toHaveBeenCalledWith("/opt/vtracer");
    expect(deps.createConverter).toHaveBeenCalledWith("/opt/vtracer", expect.any(Function));
    expect(convert.mock.calls[0]?.[0]).toEqual({
      inputPath: path.join(dir, "a.png"),
      outputPath: path.join(dir, "1.svg"),
      parameters: {
        colorMode: "binary",
        hierarchical: "stacked",
        curveMode: "polygon",
        filterSpeckle: 4,
        colorPrecision: 6,
        gradientStep: 55,
        cornerThreshold: 105,
        segmentLength: 3.25,
        spliceThreshold: 0
      }
    });
  });

  it("stops before any file when vtracer is missing", async () => {
    await touch("a.png");
    const { deps, convert } = makeDeps({ isToolAvailable: vi.fn(async () => false) });

    const code = await runCli(["a.png"], deps);

    expect(code).toBe(1);
    expect(deps.createConverter).not.toHaveBeenCalled();
    expect(convert).not.toHaveBeenCalled();
    expect(deps.pickFiles).not.toHaveBeenCalled();
    expect(errors).toContain("vtracer is not installed or not found in PATH");
    expect(errors).toContain("2. Install vtracer: cargo install vtracer");
    expect(errors.some((line) => line.startsWith("✗"))).toBe(false);
    expect(info).toEqual([]);
  });

  it("opens the picker when no files are given and exits 0 on an empty selection", async () => {
    const { deps } = makeDeps();

    const code = await runCli([], deps);

    expect(code).toBe(0);
    expect(deps.pickFiles).toHaveBeenCalledWith(dir);
    expect(info).toEqual(["No files selected."]);
  });

  it("uses the picked files when --pick is set", async () => {
    const picked = await touch("picked.png");
    await touch("ignored.png");
    const { deps, convert } = makeDeps({ pickFiles: vi.fn(async () => [picked]) });

    const code = await runCli(["ignored.png", "--pick"], deps);

    expect(code).toBe(0);
    expect(convert).toHaveBeenCalledTimes(1);
    expect(convert.mock.calls[0]?.[0].inputPath).toBe(picked);
  });

  it("launches the form with the settings location and returns its exit code", async () => {
    const { deps } = makeDeps({
      env: { VECTORIZE_BATCH_CONFIG_DIR: "/tmp/settings-test" },
      launchForm: vi.fn(async () => 0)
    });

    const code = await runCli(["--form", "a.png"], deps);

    expect(code).toBe(0);
    expect(deps.launchForm).toHaveBeenCalledWith({
      cwd: dir,
      files: ["a.png"],
      outputDir: undefined,
      vtracerBin: "vtracer",
      settingsDir: "/tmp/settings-test"
    });
    expect(deps.pickFiles).not.toHaveBeenCalled();
  });

  it("rejects an unknown choice", async () => {
    const { deps } = makeDeps();

    const code = await runCli(["a.png", "--colormode", "grey"], deps);

    expect(code).toBe(1);
    expect(deps.isToolAvailable).not.toHaveBeenCalled();
    expect(errors.join("\n")).toContain("Allowed choices are color, binary.");
  });

  it("rejects a fractional value for an integer option", async () => {
    const { deps } = makeDeps();

    const code = await runCli(["a.png", "--filter-speckle", "2.5"], deps);

    expect(code).toBe(1);
    expect(errors.join("\n")).toContain("Not an integer.");
  });

  it("prints help and exits 0", async () => {
    const { deps } = makeDeps();

    const code = await runCli(["--help"], deps);

    expect(code).toBe(0);
    expect(info.join("\n")).toContain("--corner-threshold <n>");
  });

  it("reports an error thrown by the picker", async () => {
    const { deps } = makeDeps({
      pickFiles: vi.fn(async () => {
        throw new Error("Interactive mode needs a terminal");
      })
    });

    const code = await runCli([], deps);

    expect(code).toBe(1);
    expect(errors).toEqual(["Interactive mode needs a terminal"]);
  });
});
