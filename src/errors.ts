/**
 * Base class for failures that abort a summary run.
 */
export class SummaryError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends SummaryError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_INVALID", context);
  }
}

export class ManifestReadError extends SummaryError {
  constructor(source: string, cause: unknown) {
    super(`Unable to read manifest ${source}`, "MANIFEST_READ_FAILED", { source }, { cause });
  }
}

export class ManifestEntryError extends SummaryError {
  constructor(line: string, entryNumber: number) {
    super(
      `Malformed manifest entry #${entryNumber}: "${line}" (expected project/component)`,
      "MANIFEST_ENTRY_MALFORMED",
      { line, entryNumber }
    );
  }
}

export class ReportLoadError extends SummaryError {
  constructor(filePath: string, reason: string, cause?: unknown, details?: Record<string, unknown>) {
    super(
      `Failed to load report ${filePath}: ${reason}`,
      "REPORT_LOAD_FAILED",
      { filePath, ...details },
      { cause }
    );
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
