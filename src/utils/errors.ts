/**
 * Standard error classes for survey-load
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FETCH_ERROR = "FETCH_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  DECODE_ERROR = "DECODE_ERROR",
  STORE_CONNECTION_ERROR = "STORE_CONNECTION_ERROR",
  TABLE_PREPARATION_ERROR = "TABLE_PREPARATION_ERROR",
  LOAD_ERROR = "LOAD_ERROR",
}

/**
 * Process exit codes. Anything that is not a clean run maps onto one of the
 * three failure classes below.
 */
export enum ExitCode {
  SUCCESS = 0,
  RETRIEVAL_FAILURE = 1,
  LOAD_FAILURE = 2,
  CONFIG_FAILURE = 3,
}

export class SurveyLoadError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SurveyLoadError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: errorMessage(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends SurveyLoadError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FetchError extends SurveyLoadError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.FETCH_ERROR, message, details, options);
    this.name = "FetchError";
  }
}

export class FileIOError extends SurveyLoadError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class DecodeError extends SurveyLoadError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.DECODE_ERROR, message, details, options);
    this.name = "DecodeError";
  }
}

export class StoreConnectionError extends SurveyLoadError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.STORE_CONNECTION_ERROR, message, details, options);
    this.name = "StoreConnectionError";
  }
}

export class TablePreparationError extends SurveyLoadError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.TABLE_PREPARATION_ERROR, message, details, options);
    this.name = "TablePreparationError";
  }
}

export class LoadError extends SurveyLoadError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.LOAD_ERROR, message, details, options);
    this.name = "LoadError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything thrown into a SurveyLoadError, keeping the original as cause
 */
export function toSurveyLoadError(error: unknown): SurveyLoadError {
  if (error instanceof SurveyLoadError) return error;
  return new SurveyLoadError(
    ErrorCode.GENERAL_ERROR,
    errorMessage(error),
    undefined,
    { cause: error },
  );
}

export function exitCodeFor(error: SurveyLoadError): ExitCode {
  switch (error.code) {
    case ErrorCode.CONFIG_ERROR:
      return ExitCode.CONFIG_FAILURE;
    case ErrorCode.FETCH_ERROR:
    case ErrorCode.FILE_IO_ERROR:
    case ErrorCode.DECODE_ERROR:
      return ExitCode.RETRIEVAL_FAILURE;
    case ErrorCode.STORE_CONNECTION_ERROR:
    case ErrorCode.TABLE_PREPARATION_ERROR:
    case ErrorCode.LOAD_ERROR:
    case ErrorCode.GENERAL_ERROR:
      return ExitCode.LOAD_FAILURE;
  }
}
