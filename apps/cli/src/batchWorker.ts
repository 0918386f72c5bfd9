import { randomUUID } from "node:crypto";
import { createConversionRequest, expandInputPaths, runBatch } from "@vectorize-batch/core";
import type { BatchEvent, BatchResult, ConvertFn, ParameterSet } from "@vectorize-batch/core";
import { TaskQueue } from "@vectorize-batch/queue";
import type { TaskWorker } from "@vectorize-batch/queue";
import { convertWithVtracer } from "@vectorize-batch/vtracer";
import type { SessionStore } from "./store/session";

export type BatchSubmission = {
  files: string[];
  outputDir: string;
  parameters: ParameterSet;
};

export type BatchQueue = TaskQueue<BatchSubmission, BatchResult, BatchEvent>;

export function createVtracerConverter(vtracerBin: string, onCommand?: (command: string) => void): ConvertFn {
  return (job) => convertWithVtracer(job, { vtracerBin, onCommand });
}

export function createBatchWorker(convert: ConvertFn): TaskWorker<BatchSubmission, BatchResult, BatchEvent> {
  return async ({ payload, reportProgress }) => {
    const inputs = await expandInputPaths(payload.files);
    const requests = inputs.map((input) => createConversionRequest(input, payload.parameters));
    return runBatch(requests, {
      outputDir: payload.outputDir,
      convert,
      onEvent: reportProgress
    });
  };
}

export function createBatchQueue(convert: ConvertFn): BatchQueue {
  return new TaskQueue(createBatchWorker(convert));
}

/** Queues the form's current selection. Returns false when there is nothing to run. */
export function submitBatch(store: SessionStore, queue: BatchQueue): boolean {
  const { files, outputDir, parameters, appendLog } = store.getState();
  if (files.length === 0) {
    appendLog("error", ["Please select at least one image file."]);
    return false;
  }
  if (!outputDir.trim()) {
    appendLog("error", ["Please enter an output directory."]);
    return false;
  }

  appendLog("info", [`Processing ${files.length} input(s) into ${outputDir}...`]);
  queue.enqueue([{ id: randomUUID(), payload: { files, outputDir, parameters: { ...parameters } } }]);
  return true;
}
