export class ToolUnavailableError extends Error {
  readonly tool: string;

  constructor(tool: string) {
    super(`${tool} is not installed or not found in PATH`);
    this.name = "ToolUnavailableError";
    this.tool = tool;
  }
}

export class ConversionFailedError extends Error {
  readonly diagnostics: string;

  constructor(message: string, diagnostics = "", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionFailedError";
    this.diagnostics = diagnostics;
  }
}

export class InputNotFoundError extends Error {
  readonly inputPath: string;

  constructor(inputPath: string) {
    super(`Input file not found: ${inputPath}`);
    this.name = "InputNotFoundError";
    this.inputPath = inputPath;
  }
}

export function toErrorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message.trim();
  }
  if (typeof error === "string" && error.trim()) {
    return error.trim();
  }
  return fallback;
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
