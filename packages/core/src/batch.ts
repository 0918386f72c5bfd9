import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { ConversionFailedError, isNotFoundError, toErrorMessage } from "./errors";
import { nextNumberedOutputPath } from "./outputNaming";
import type {
  BatchEvent,
  BatchResult,
  ConversionOutcome,
  ConversionRequest,
  ConvertFn,
  FailureReason
} from "./types";

export type RunBatchOptions = {
  outputDir: string;
  convert: ConvertFn;
  onEvent?: (event: BatchEvent) => void;
};

type InputCheck = { ok: true } | { ok: false; reason: FailureReason; message: string };

// Missing or non-file inputs are "not-found"; any other stat error fails just this request.
async function checkInput(inputPath: string): Promise<InputCheck> {
  let stat: Stats;
  try {
    stat = await fs.stat(inputPath);
  } catch (error) {
    if (isNotFoundError(error)) {
      return { ok: false, reason: "not-found", message: `Input file not found: ${inputPath}` };
    }
    return { ok: false, reason: "conversion-failed", message: toErrorMessage(error, "Cannot read input file") };
  }
  if (!stat.isFile()) {
    return { ok: false, reason: "not-found", message: `Input file not found: ${inputPath}` };
  }
  return { ok: true };
}

export function emptyBatchResult(): BatchResult {
  return { successful: 0, failed: 0, total: 0, outcomes: [] };
}

/**
 * Converts each request in order, one at a time. A failed request is recorded
 * and the batch moves on; the result always holds one outcome per request.
 */
export async function runBatch(
  requests: readonly ConversionRequest[],
  options: RunBatchOptions
): Promise<BatchResult> {
  const { outputDir, convert, onEvent } = options;
  const result = emptyBatchResult();

  let outputDirReady = false;

  const record = (outcome: ConversionOutcome) => {
    result.outcomes.push(outcome);
    result.total += 1;
    if (outcome.status === "success") {
      result.successful += 1;
    } else {
      result.failed += 1;
    }
  };

  const fail = (index: number, inputPath: string, reason: FailureReason, message: string, diagnostics?: string) => {
    record({ status: "failure", inputPath, reason, message, diagnostics });
    onEvent?.({ type: "file-error", index, inputPath, reason, message, diagnostics });
  };

  for (const [index, request] of requests.entries()) {
    const { inputPath, parameters } = request;

    const check = await checkInput(inputPath);
    if (!check.ok) {
      fail(index, inputPath, check.reason, check.message);
      continue;
    }

    let outputPath: string;
    try {
      if (request.outputPath !== undefined) {
        outputPath = request.outputPath;
      } else {
        if (!outputDirReady) {
          await fs.mkdir(outputDir, { recursive: true });
          outputDirReady = true;
        }
        outputPath = await nextNumberedOutputPath(outputDir);
      }
    } catch (error) {
      fail(index, inputPath, "conversion-failed", toErrorMessage(error, "Cannot prepare output path"));
      continue;
    }

    onEvent?.({ type: "file-start", index, inputPath, outputPath });

    try {
      await convert({ inputPath, outputPath, parameters });
    } catch (error) {
      const diagnostics =
        error instanceof ConversionFailedError && error.diagnostics ? error.diagnostics : undefined;
      fail(index, inputPath, "conversion-failed", toErrorMessage(error, "Conversion failed"), diagnostics);
      continue;
    }

    record({ status: "success", inputPath, outputPath });
    onEvent?.({ type: "file-done", index, inputPath, outputPath });
  }

  onEvent?.({ type: "summary", result });
  return result;
}
