// Error taxonomy for the tailing pipeline
// Every category except INVALID_CONFIGURATION and EXPORT_FAILURE ends the running session

export enum ErrorCategory {
  SourceUnavailable = 'SOURCE_UNAVAILABLE',
  EndOfStream = 'END_OF_STREAM',
  WriteFailure = 'WRITE_FAILURE',
  InvalidConfiguration = 'INVALID_CONFIGURATION',
  ExportFailure = 'EXPORT_FAILURE',
}

export class TailerError extends Error {
  constructor(
    public readonly category: ErrorCategory,
    message: string,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = `TailerError/${category}`;
  }
}

/**
 * The log source could not be launched (gcloud missing, not executable,
 * or refused to start).
 */
export class SourceUnavailableError extends TailerError {
  constructor(message: string, detail?: unknown) {
    super(ErrorCategory.SourceUnavailable, message, detail);
  }
}

/**
 * The log source exited while the session still expected lines.
 */
export class EndOfStreamError extends TailerError {
  constructor(
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null
  ) {
    super(
      ErrorCategory.EndOfStream,
      `Log source exited unexpectedly (code: ${exitCode ?? 'none'}, signal: ${signal ?? 'none'})`
    );
  }
}

export class WriteFailureError extends TailerError {
  constructor(
    message: string,
    public readonly filePath: string,
    detail?: unknown
  ) {
    super(ErrorCategory.WriteFailure, message, detail);
  }
}

export class InvalidConfigurationError extends TailerError {
  constructor(message: string) {
    super(ErrorCategory.InvalidConfiguration, message);
  }
}

/**
 * Copying or archiving existing log files failed. Never raised during a session.
 */
export class ExportFailureError extends TailerError {
  constructor(
    message: string,
    public readonly filePath: string,
    detail?: unknown
  ) {
    super(ErrorCategory.ExportFailure, message, detail);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
