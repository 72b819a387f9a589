export class ModuleRunnerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModuleRunnerError";
  }
}

/** Malformed template, IO request or settings. Always fatal, raised before anything is staged. */
export class ConfigurationError extends ModuleRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * A supplied file whose inferred type matches no template slot.
 * The slot matcher records these instead of throwing; the file is left off the command line.
 */
export class ResolutionError extends ModuleRunnerError {
  constructor(
    message: string,
    readonly category: string,
    readonly remotePath: string,
    readonly fileType: string
  ) {
    super(message);
    this.name = "ResolutionError";
  }
}

export class TransferError extends ModuleRunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransferError";
  }
}

export class AbortedError extends TransferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AbortedError";
  }
}

export class ExecutionError extends ModuleRunnerError {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string = "",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExecutionError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
