import path from "node:path";
import { CommanderError } from "commander";
import {
  ToolUnavailableError,
  createConversionRequest,
  expandInputPaths,
  runBatch,
  toErrorMessage
} from "@vectorize-batch/core";
import type { BatchResult, ConvertFn } from "@vectorize-batch/core";
import { isVtracerAvailable } from "@vectorize-batch/vtracer";
import { createVtracerConverter } from "./batchWorker";
import { installGuidance, resolveSettingsDir } from "./constants";
import type { FormContext } from "./interactive";
import { parseCliOptions } from "./options";
import type { CliOptions } from "./options";
import { consoleLogger, describeBatchEvent, formatSettings, writeLines } from "./reporter";
import type { Logger } from "./reporter";

export type CliDeps = {
  logger: Logger;
  env: NodeJS.ProcessEnv;
  cwd: string;
  isToolAvailable: (vtracerBin: string) => Promise<boolean>;
  createConverter: (vtracerBin: string, onCommand: (command: string) => void) => ConvertFn;
  pickFiles: (startDir: string) => Promise<string[]>;
  launchForm: (context: FormContext) => Promise<number>;
};

async function loadInteractive() {
  return import("./interactive");
}

export function createDefaultDeps(): CliDeps {
  return {
    logger: consoleLogger,
    env: process.env,
    cwd: process.cwd(),
    isToolAvailable: (vtracerBin) => isVtracerAvailable({ vtracerBin }),
    createConverter: createVtracerConverter,
    pickFiles: async (startDir) => (await loadInteractive()).pickFilesInteractively(startDir),
    launchForm: async (context) => (await loadInteractive()).launchForm(context)
  };
}

async function ensureToolAvailable(options: CliOptions, deps: CliDeps): Promise<void> {
  if (!(await deps.isToolAvailable(options.vtracerBin))) {
    throw new ToolUnavailableError(options.vtracerBin);
  }
}

async function runFromArguments(options: CliOptions, deps: CliDeps): Promise<number> {
  const { logger } = deps;

  let inputs = options.files;
  if (options.pick || inputs.length === 0) {
    inputs = await deps.pickFiles(deps.cwd);
    if (inputs.length === 0) {
      logger.info("No files selected.");
      return 0;
    }
  }

  const files = await expandInputPaths(inputs.map((input) => path.resolve(deps.cwd, input)));
  const requests = files.map((file) => createConversionRequest(file, options.parameters));

  logger.info("");
  logger.info(`Processing ${requests.length} file(s) with the tuned settings...`);
  for (const line of formatSettings(options.parameters)) {
    logger.info(line);
  }
  logger.info("");

  const result: BatchResult = await runBatch(requests, {
    outputDir: options.outputDir,
    convert: deps.createConverter(options.vtracerBin, (command) => logger.info(`Command: ${command}`)),
    onEvent: (event) => writeLines(logger, describeBatchEvent(event))
  });

  return result.failed === 0 ? 0 : 1;
}

/**
 * Runs one invocation and resolves to the process exit code: 0 when every file
 * converted (or nothing was selected), 1 on any failure.
 */
export async function runCli(argv: string[], deps: CliDeps = createDefaultDeps()): Promise<number> {
  const { logger } = deps;

  let options: CliOptions;
  try {
    options = parseCliOptions(argv, deps.env, deps.cwd, logger);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  try {
    await ensureToolAvailable(options, deps);

    if (options.form) {
      return await deps.launchForm({
        cwd: deps.cwd,
        files: options.files,
        outputDir: options.outputDirGiven ? options.outputDir : undefined,
        vtracerBin: options.vtracerBin,
        settingsDir: resolveSettingsDir(deps.env)
      });
    }

    return await runFromArguments(options, deps);
  } catch (error) {
    if (error instanceof ToolUnavailableError) {
      logger.error("");
      logger.error(error.message);
      for (const line of installGuidance) {
        logger.error(line);
      }
      return 1;
    }
    logger.error(toErrorMessage(error, "Unexpected error"));
    return 1;
  }
}
