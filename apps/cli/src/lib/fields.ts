import { colorModes, curveModes, hierarchicalModes } from "@vectorize-batch/core";
import type { NumericParameter, ParameterSet } from "@vectorize-batch/core";

export type ChoiceParameter = "colorMode" | "hierarchical" | "curveMode";

export type FormField =
  | { kind: "files"; label: string }
  | { kind: "outputDir"; label: string }
  | { kind: "choice"; key: ChoiceParameter; label: string }
  | { kind: "number"; key: NumericParameter; label: string; integer: boolean }
  | { kind: "start"; label: string };

export const formFields: FormField[] = [
  { kind: "files", label: "Input Images" },
  { kind: "outputDir", label: "Output Directory" },
  { kind: "choice", key: "colorMode", label: "Color Mode" },
  { kind: "choice", key: "hierarchical", label: "Hierarchical" },
  { kind: "choice", key: "curveMode", label: "Mode" },
  { kind: "number", key: "filterSpeckle", label: "Filter Speckle", integer: true },
  { kind: "number", key: "colorPrecision", label: "Color Precision", integer: true },
  { kind: "number", key: "gradientStep", label: "Gradient Step", integer: true },
  { kind: "number", key: "cornerThreshold", label: "Corner Threshold", integer: true },
  { kind: "number", key: "segmentLength", label: "Segment Length", integer: false },
  { kind: "number", key: "spliceThreshold", label: "Splice Threshold", integer: true },
  { kind: "start", label: "Start Vectorization" }
];

export function cycleChoice<T>(options: readonly T[], current: T, direction: 1 | -1): T {
  const index = options.indexOf(current);
  const next = (index + direction + options.length) % options.length;
  return options[next] ?? current;
}

export function cycleParameter(parameters: ParameterSet, key: ChoiceParameter, direction: 1 | -1): ParameterSet {
  switch (key) {
    case "colorMode":
      return { ...parameters, colorMode: cycleChoice(colorModes, parameters.colorMode, direction) };
    case "hierarchical":
      return { ...parameters, hierarchical: cycleChoice(hierarchicalModes, parameters.hierarchical, direction) };
    case "curveMode":
      return { ...parameters, curveMode: cycleChoice(curveModes, parameters.curveMode, direction) };
  }
}

/** Parses a typed draft; anything unusable keeps the current value. */
export function commitNumericDraft(raw: string, current: number, integer: boolean): number {
  if (raw.trim() === "") {
    return current;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return current;
  }
  if (integer && !Number.isInteger(parsed)) {
    return current;
  }
  return parsed;
}

export function isNumericInput(input: string): boolean {
  return /^[0-9.+-]+$/.test(input);
}

export function moveFocus(index: number, direction: 1 | -1, count = formFields.length): number {
  return (index + direction + count) % count;
}
