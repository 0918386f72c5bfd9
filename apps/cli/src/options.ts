import path from "node:path";
import { Command, InvalidArgumentError, Option } from "commander";
import { colorModes, curveModes, defaultParameterSet, hierarchicalModes } from "@vectorize-batch/core";
import type { ColorMode, CurveMode, HierarchicalMode, ParameterSet } from "@vectorize-batch/core";
import { resolveVtracerBin } from "@vectorize-batch/vtracer";
import { PROGRAM_NAME, PROGRAM_VERSION } from "./constants";
import type { Logger } from "./reporter";

export type CliOptions = {
  files: string[];
  outputDir: string;
  outputDirGiven: boolean;
  pick: boolean;
  form: boolean;
  vtracerBin: string;
  parameters: ParameterSet;
};

type RawOptions = {
  outputDir?: string;
  pick: boolean;
  form: boolean;
  colormode: ColorMode;
  hierarchical: HierarchicalMode;
  mode: CurveMode;
  filterSpeckle: number;
  colorPrecision: number;
  gradientStep: number;
  cornerThreshold: number;
  segmentLength: number;
  spliceThreshold: number;
  vtracerBin: string;
};

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function numberOption(flags: string, description: string, fallback: number, parser = parseInteger): Option {
  return new Option(flags, description).argParser(parser).default(fallback);
}

export function createProgram(env: NodeJS.ProcessEnv, logger: Logger): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description("Vectorize images with vtracer using tuned settings")
    .version(PROGRAM_VERSION)
    .argument("[files...]", "input image files or directories")
    .option("-o, --output-dir <dir>", "output directory for SVG files (default: current directory)")
    .option("--pick", "choose input files with the interactive picker", false)
    .option("--form", "launch the interactive parameter form", false)
    .addOption(
      new Option("--colormode <mode>", "color mode (B/W or color)")
        .choices(colorModes)
        .default(defaultParameterSet.colorMode)
    )
    .addOption(
      new Option("--hierarchical <mode>", "cutout or stacked layering")
        .choices(hierarchicalModes)
        .default(defaultParameterSet.hierarchical)
    )
    .addOption(
      new Option("--mode <mode>", "curve fitting mode")
        .choices(curveModes)
        .default(defaultParameterSet.curveMode)
    )
    .addOption(numberOption("--filter-speckle <n>", "filter speckle, cleaner", defaultParameterSet.filterSpeckle))
    .addOption(
      numberOption("--color-precision <n>", "color precision, more accurate", defaultParameterSet.colorPrecision)
    )
    .addOption(numberOption("--gradient-step <n>", "gradient step, fewer layers", defaultParameterSet.gradientStep))
    .addOption(
      numberOption("--corner-threshold <n>", "corner threshold, smoother", defaultParameterSet.cornerThreshold)
    )
    .addOption(
      numberOption(
        "--segment-length <n>",
        "segment length, more coarse",
        defaultParameterSet.segmentLength,
        parseDecimal
      )
    )
    .addOption(
      numberOption("--splice-threshold <n>", "splice threshold, less accurate", defaultParameterSet.spliceThreshold)
    )
    .option("--vtracer-bin <path>", "vtracer executable (default: $VTRACER_BIN or vtracer)", resolveVtracerBin(env))
    .exitOverride()
    .configureOutput({
      writeOut: (text) => logger.info(text.trimEnd()),
      writeErr: (text) => logger.error(text.trimEnd())
    });
}

/** Parses user arguments (no node/script prefix). Throws `CommanderError` on bad input, help and version. */
export function parseCliOptions(argv: string[], env: NodeJS.ProcessEnv, cwd: string, logger: Logger): CliOptions {
  const program = createProgram(env, logger);
  program.parse(argv, { from: "user" });
  const raw = program.opts<RawOptions>();

  return {
    files: program.args,
    outputDir: path.resolve(cwd, raw.outputDir ?? "."),
    outputDirGiven: raw.outputDir !== undefined,
    pick: raw.pick,
    form: raw.form,
    vtracerBin: raw.vtracerBin,
    parameters: {
      colorMode: raw.colormode,
      hierarchical: raw.hierarchical,
      curveMode: raw.mode,
      filterSpeckle: raw.filterSpeckle,
      colorPrecision: raw.colorPrecision,
      gradientStep: raw.gradientStep,
      cornerThreshold: raw.cornerThreshold,
      segmentLength: raw.segmentLength,
      spliceThreshold: raw.spliceThreshold
    }
  };
}
