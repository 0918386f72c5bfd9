import { execFile, spawn } from "node:child_process";
import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import { promisify } from "node:util";
import {
  ConversionFailedError,
  InputNotFoundError,
  defaultParameterSet,
  isNotFoundError,
  replaceExtension
} from "@vectorize-batch/core";
import type { ConversionJob, ParameterSet } from "@vectorize-batch/core";

const execFileAsync = promisify(execFile);

export const DEFAULT_VTRACER_BIN = "vtracer";

const TAIL_LINES = 10;

export type VtracerOptions = {
  vtracerBin?: string;
  /** Placed before the converter flags, for a binary that launches vtracer (`wsl vtracer`, a script runner). */
  vtracerArgs?: string[];
  onStderrLine?: (line: string) => void;
};

export type ConvertWithVtracerOptions = VtracerOptions & {
  onCommand?: (command: string) => void;
};

export function resolveVtracerBin(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.VTRACER_BIN?.trim();
  return fromEnv ? fromEnv : DEFAULT_VTRACER_BIN;
}

export function buildVtracerArgs(job: ConversionJob): string[] {
  const { inputPath, outputPath, parameters } = job;
  return [
    "--input",
    inputPath,
    "--output",
    outputPath,
    "--colormode",
    parameters.colorMode,
    "--hierarchical",
    parameters.hierarchical,
    "--mode",
    parameters.curveMode,
    "--filter_speckle",
    String(parameters.filterSpeckle),
    "--color_precision",
    String(parameters.colorPrecision),
    "--gradient_step",
    String(parameters.gradientStep),
    "--corner_threshold",
    String(parameters.cornerThreshold),
    "--segment_length",
    String(parameters.segmentLength),
    "--splice_threshold",
    String(parameters.spliceThreshold)
  ];
}

export function formatCommand(bin: string, args: string[]): string {
  return [bin, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

function splitLines(buffer: string): { lines: string[]; rest: string } {
  const chunks = buffer.split(/\r?\n/);
  const rest = chunks.pop() ?? "";
  return {
    lines: chunks.filter((line) => line.length > 0),
    rest
  };
}

function createTail() {
  const lines: string[] = [];
  let buffer = "";

  const remember = (line: string) => {
    if (!line.trim()) {
      return;
    }
    lines.push(line.trim());
    if (lines.length > TAIL_LINES) {
      lines.shift();
    }
  };

  return {
    lines,
    push(chunk: string, onLine?: (line: string) => void) {
      buffer += chunk;
      const split = splitLines(buffer);
      buffer = split.rest;
      for (const line of split.lines) {
        remember(line);
        onLine?.(line);
      }
    },
    flush(onLine?: (line: string) => void) {
      if (buffer.trim().length > 0) {
        remember(buffer);
        onLine?.(buffer.trim());
      }
      buffer = "";
    }
  };
}

/**
 * Runs the converter and waits for it to exit. Rejects with a
 * `ConversionFailedError` carrying the tail of the tool's output when the
 * process cannot start or exits with a non-zero status.
 */
export function runVtracer(args: string[], options: VtracerOptions = {}): Promise<void> {
  const vtracerBin = options.vtracerBin ?? DEFAULT_VTRACER_BIN;
  const leadingArgs = options.vtracerArgs ?? [];

  return new Promise((resolve, reject) => {
    const child = spawn(vtracerBin, [...leadingArgs, ...args], {
      stdio: ["ignore", "pipe", "pipe"]
    });

    let settled = false;
    const stderrTail = createTail();
    const stdoutTail = createTail();

    const complete = (err?: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    };

    child.stdout.setEncoding("utf8");
    child.stdout.on("data", (chunk) => {
      stdoutTail.push(String(chunk));
    });

    child.stderr.setEncoding("utf8");
    child.stderr.on("data", (chunk) => {
      stderrTail.push(String(chunk), options.onStderrLine);
    });

    child.on("error", (error) => {
      complete(
        new ConversionFailedError(`Failed to start ${vtracerBin}: ${error.message}`, "", { cause: error })
      );
    });

    child.on("close", (code, signal) => {
      stdoutTail.flush();
      stderrTail.flush(options.onStderrLine);

      if (code === 0) {
        complete();
        return;
      }

      const reason = signal ? `signal ${signal}` : `code ${code}`;
      const diagnostics = (stderrTail.lines.length > 0 ? stderrTail.lines : stdoutTail.lines).join("\n");
      complete(new ConversionFailedError(`vtracer exited with ${reason}`, diagnostics));
    });
  });
}

/** Checks the converter with `--help`; any spawn error or non-zero exit counts as missing. */
export async function isVtracerAvailable(
  options: Pick<VtracerOptions, "vtracerBin" | "vtracerArgs"> = {}
): Promise<boolean> {
  const vtracerBin = options.vtracerBin ?? DEFAULT_VTRACER_BIN;
  try {
    await execFileAsync(vtracerBin, [...(options.vtracerArgs ?? []), "--help"]);
    return true;
  } catch (error) {
    if (error instanceof Error) {
      return false;
    }
    throw error;
  }
}

export async function convertWithVtracer(
  job: ConversionJob,
  options: ConvertWithVtracerOptions = {}
): Promise<void> {
  const args = buildVtracerArgs(job);
  options.onCommand?.(
    formatCommand(options.vtracerBin ?? DEFAULT_VTRACER_BIN, [...(options.vtracerArgs ?? []), ...args])
  );
  await runVtracer(args, options);
}

export type VectorizeImageOptions = ConvertWithVtracerOptions & {
  outputPath?: string;
  parameters?: Partial<ParameterSet>;
};

/** Converts a single image, writing next to the input (`photo.png` → `photo.svg`) unless told otherwise. */
export async function vectorizeImage(inputPath: string, options: VectorizeImageOptions = {}): Promise<string> {
  let stat: Stats;
  try {
    stat = await fs.stat(inputPath);
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new InputNotFoundError(inputPath);
    }
    throw error;
  }
  if (!stat.isFile()) {
    throw new InputNotFoundError(inputPath);
  }

  const outputPath = options.outputPath ?? replaceExtension(inputPath, ".svg");
  await convertWithVtracer(
    {
      inputPath,
      outputPath,
      parameters: { ...defaultParameterSet, ...options.parameters }
    },
    options
  );
  return outputPath;
}
