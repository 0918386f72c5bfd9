import path from "node:path";
import type { BatchEvent, BatchResult, ParameterSet } from "@vectorize-batch/core";

export type LogLevel = "info" | "error";

export type Logger = {
  info: (message: string) => void;
  error: (message: string) => void;
};

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  error: (message) => console.error(message)
};

export type ReportLines = {
  level: LogLevel;
  lines: string[];
};

export function formatSettings(parameters: ParameterSet): string[] {
  return [
    "Settings:",
    `  Color Mode: ${parameters.colorMode}`,
    `  Hierarchical: ${parameters.hierarchical}`,
    `  Mode: ${parameters.curveMode}`,
    `  Filter Speckle: ${parameters.filterSpeckle}`,
    `  Color Precision: ${parameters.colorPrecision}`,
    `  Gradient Step: ${parameters.gradientStep}`,
    `  Corner Threshold: ${parameters.cornerThreshold}`,
    `  Segment Length: ${parameters.segmentLength}`,
    `  Splice Threshold: ${parameters.spliceThreshold}`
  ];
}

export function formatSummary(result: BatchResult): string[] {
  return [
    "",
    "--- Summary ---",
    `Successful: ${result.successful}`,
    `Failed: ${result.failed}`,
    `Total: ${result.total}`
  ];
}

export function describeBatchEvent(event: BatchEvent): ReportLines {
  switch (event.type) {
    case "file-start":
      return { level: "info", lines: [`Vectorizing: ${path.basename(event.inputPath)}`] };
    case "file-done":
      return { level: "info", lines: [`✓ Successfully created: ${event.outputPath}`] };
    case "file-error": {
      const lines = [`✗ Failed to process ${event.inputPath}: ${event.message}`];
      if (event.diagnostics) {
        lines.push(...event.diagnostics.split("\n").map((line) => `  ${line}`));
      }
      return { level: "error", lines };
    }
    case "summary":
      return { level: "info", lines: formatSummary(event.result) };
  }
}

export function writeLines(logger: Logger, report: ReportLines): void {
  for (const line of report.lines) {
    logger[report.level](line);
  }
}
