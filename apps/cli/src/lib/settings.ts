import {
  colorModes,
  curveModes,
  defaultParameterSet,
  hierarchicalModes
} from "@vectorize-batch/core";
import type { NumericParameter, ParameterSet } from "@vectorize-batch/core";

export type StoredSettings = {
  outputDir?: string;
  parameters: ParameterSet;
};

const numericKeys: NumericParameter[] = [
  "filterSpeckle",
  "colorPrecision",
  "gradientStep",
  "cornerThreshold",
  "segmentLength",
  "spliceThreshold"
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickChoice<T extends string>(options: readonly T[], value: unknown, fallback: T): T {
  return options.find((option) => option === value) ?? fallback;
}

function pickNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function normalizeParameters(input: unknown): ParameterSet {
  const source = isRecord(input) ? input : {};
  const parameters: ParameterSet = {
    ...defaultParameterSet,
    colorMode: pickChoice(colorModes, source.colorMode, defaultParameterSet.colorMode),
    hierarchical: pickChoice(hierarchicalModes, source.hierarchical, defaultParameterSet.hierarchical),
    curveMode: pickChoice(curveModes, source.curveMode, defaultParameterSet.curveMode)
  };
  for (const key of numericKeys) {
    parameters[key] = pickNumber(source[key], defaultParameterSet[key]);
  }
  return parameters;
}

/** Reads whatever an earlier session left behind, dropping fields that no longer fit. */
export function normalizeStoredSettings(input: unknown): StoredSettings {
  const source = isRecord(input) ? input : {};
  const outputDir =
    typeof source.outputDir === "string" && source.outputDir.trim() ? source.outputDir : undefined;
  return {
    outputDir,
    parameters: normalizeParameters(source.parameters)
  };
}
