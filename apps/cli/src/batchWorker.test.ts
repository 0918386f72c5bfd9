import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ConversionJob } from "@vectorize-batch/core";
import { createBatchQueue, submitBatch } from "./batchWorker";
import type { BatchQueue } from "./batchWorker";
import { createFileStorage } from "./lib/fileStorage";
import { createSessionStore } from "./store/session";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "vectorize-worker-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

function untilIdle(queue: BatchQueue): Promise<void> {
  return new Promise((resolve) => {
    const off = queue.onEvent((event) => {
      if (event.type === "idle") {
        off();
        resolve();
      }
    });
  });
}

function setup() {
  const store = createSessionStore({
    storage: createFileStorage(path.join(dir, "settings")),
    outputDir: path.join(dir, "out")
  });
  const convert = vi.fn(async (job: ConversionJob) => {
    await fs.writeFile(job.outputPath, "<svg/>");
  });
  const queue = createBatchQueue(convert);
  queue.onEvent(store.getState().applyEvent);
  return { store, queue, convert };
}

describe("submitBatch", () => {
  it("refuses to start without input files", () => {
    const { store, queue, convert } = setup();

    expect(submitBatch(store, queue)).toBe(false);
    expect(store.getState().log).toEqual([{ level: "error", text: "Please select at least one image file." }]);
    expect(queue.busy).toBe(false);
    expect(convert).not.toHaveBeenCalled();
  });

  it("runs the selection on the queue and logs the summary", async () => {
    const { store, queue, convert } = setup();
    const input = path.join(dir, "a.png");
    await fs.writeFile(input, "png");
    store.getState().setFiles([input, path.join(dir, "missing.png")]);
    const idle = untilIdle(queue);

    expect(submitBatch(store, queue)).toBe(true);
    await idle;

    expect(convert).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(path.join(dir, "out"))).toEqual(["1.svg"]);
    const texts = store.getState().log.map((line) => line.text);
    expect(texts[0]).toBe(`Processing 2 input(s) into ${path.join(dir, "out")}...`);
    expect(texts.slice(-4)).toEqual(["--- Summary ---", "Successful: 1", "Failed: 1", "Total: 2"]);
    expect(store.getState().running).toBe(false);
  });
});
