export type ColorMode = "color" | "binary";

export type HierarchicalMode = "stacked" | "cutout";

export type CurveMode = "spline" | "polygon" | "pixel";

export type ParameterSet = {
  colorMode: ColorMode;
  hierarchical: HierarchicalMode;
  curveMode: CurveMode;
  filterSpeckle: number;
  colorPrecision: number;
  gradientStep: number;
  cornerThreshold: number;
  segmentLength: number;
  spliceThreshold: number;
};

export type NumericParameter = {
  [K in keyof ParameterSet]: ParameterSet[K] extends number ? K : never;
}[keyof ParameterSet];

export const colorModes: readonly ColorMode[] = ["color", "binary"];
export const hierarchicalModes: readonly HierarchicalMode[] = ["stacked", "cutout"];
export const curveModes: readonly CurveMode[] = ["spline", "polygon", "pixel"];

export const defaultParameterSet: ParameterSet = {
  colorMode: "color",
  hierarchical: "stacked",
  curveMode: "spline",
  filterSpeckle: 4,
  colorPrecision: 6,
  gradientStep: 55,
  cornerThreshold: 105,
  segmentLength: 7.5,
  spliceThreshold: 0
};

/** One input/output/parameter tuple. `outputPath` left out means auto-numbered. */
export type ConversionRequest = Readonly<{
  inputPath: string;
  outputPath?: string;
  parameters: Readonly<ParameterSet>;
}>;

/** A request with its output path settled, as handed to the converter. */
export type ConversionJob = Readonly<{
  inputPath: string;
  outputPath: string;
  parameters: Readonly<ParameterSet>;
}>;

export type ConvertFn = (job: ConversionJob) => Promise<void>;

export type FailureReason = "not-found" | "conversion-failed";

export type ConversionOutcome =
  | { status: "success"; inputPath: string; outputPath: string }
  | {
      status: "failure";
      inputPath: string;
      reason: FailureReason;
      message: string;
      diagnostics?: string;
    };

export type BatchResult = {
  successful: number;
  failed: number;
  total: number;
  outcomes: ConversionOutcome[];
};

export type BatchEvent =
  | { type: "file-start"; index: number; inputPath: string; outputPath: string }
  | { type: "file-done"; index: number; inputPath: string; outputPath: string }
  | {
      type: "file-error";
      index: number;
      inputPath: string;
      reason: FailureReason;
      message: string;
      diagnostics?: string;
    }
  | { type: "summary"; result: BatchResult };

export function createConversionRequest(
  inputPath: string,
  parameters: ParameterSet,
  outputPath?: string
): ConversionRequest {
  const request: ConversionRequest =
    outputPath === undefined
      ? { inputPath, parameters: Object.freeze({ ...parameters }) }
      : { inputPath, outputPath, parameters: Object.freeze({ ...parameters }) };
  return Object.freeze(request);
}
