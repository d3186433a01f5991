/**
 * Standard error classes for the log analyzer
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  LOG_DIRECTORY_ERROR = "LOG_DIRECTORY_ERROR",
  UNSUPPORTED_LOG_FORMAT = "UNSUPPORTED_LOG_FORMAT",
  LOG_ENCODING_ERROR = "LOG_ENCODING_ERROR",
  INVALID_RECORDS_THRESHOLD = "INVALID_RECORDS_THRESHOLD",
  REPORT_WRITE_ERROR = "REPORT_WRITE_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
    cause?: string;
  };
}

export class LogAnalyzerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "LogAnalyzerError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends LogAnalyzerError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends LogAnalyzerError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class LogDirectoryError extends LogAnalyzerError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.LOG_DIRECTORY_ERROR, message, details, options);
    this.name = "LogDirectoryError";
  }
}

export class UnsupportedLogFormatError extends LogAnalyzerError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNSUPPORTED_LOG_FORMAT, message, details, options);
    this.name = "UnsupportedLogFormatError";
  }
}

export class LogEncodingError extends LogAnalyzerError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.LOG_ENCODING_ERROR, message, details, options);
    this.name = "LogEncodingError";
  }
}

export class InvalidRecordsThresholdError extends LogAnalyzerError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INVALID_RECORDS_THRESHOLD, message, details, options);
    this.name = "InvalidRecordsThresholdError";
  }
}

export class ReportWriteError extends LogAnalyzerError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.REPORT_WRITE_ERROR, message, details, options);
    this.name = "ReportWriteError";
  }
}

/**
 * Wrap anything thrown into a LogAnalyzerError
 */
export function toLogAnalyzerError(error: unknown): LogAnalyzerError {
  if (error instanceof LogAnalyzerError) {
    return error;
  }
  return new LogAnalyzerError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

/**
 * Process exit code for an error
 */
export function exitCodeFor(error: LogAnalyzerError): number {
  switch (error.code) {
    case ErrorCode.CONFIG_ERROR:
      return 2;
    case ErrorCode.INVALID_RECORDS_THRESHOLD:
      return 3;
    case ErrorCode.FILE_IO_ERROR:
    case ErrorCode.LOG_DIRECTORY_ERROR:
    case ErrorCode.UNSUPPORTED_LOG_FORMAT:
    case ErrorCode.LOG_ENCODING_ERROR:
    case ErrorCode.REPORT_WRITE_ERROR:
      return 4;
    default:
      return 1;
  }
}

/**
 * Narrow a Node.js system error by its errno code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === code
  );
}
