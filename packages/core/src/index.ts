export * from "./types";
export * from "./errors";
export { isSupportedImagePath, replaceExtension, supportedImageExtensions } from "./fileType";
export { expandInputPaths } from "./pathScanner";
export { nextNumberedOutputPath } from "./outputNaming";
export { emptyBatchResult, runBatch } from "./batch";
export type { RunBatchOptions } from "./batch";
