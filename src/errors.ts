/**
 * Error handling for reference configuration and materialization
 *
 * Every error raised by this library extends RefsmithError and carries a
 * machine-readable code plus, where one exists, the offending key.
 */

/**
 * Base error class for all refsmith errors
 */
export class RefsmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "RefsmithError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Reasons a configuration can be rejected
 */
export type ConfigurationErrorCode =
  | "DUPLICATE_TYPE"
  | "DUPLICATE_REFERENCE"
  | "UNKNOWN_INDEX"
  | "UNKNOWN_CONVERSION"
  | "MISSING_REFERENCES_DIR"
  | "MISSING_REFERENCE"
  | "MISSING_URL";

/**
 * Fatal configuration errors, detected eagerly and never retried
 */
export class ConfigurationError extends RefsmithError {
  constructor(
    message: string,
    code: ConfigurationErrorCode,
    public readonly key?: string,
    context?: string
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Validation errors for malformed configuration documents or arguments
 */
export class ValidationError extends RefsmithError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * A postprocess function name that no registered module provides
 */
export class ResolutionError extends RefsmithError {
  constructor(
    message: string,
    public readonly functionName: string,
    context?: string
  ) {
    super(message, "RESOLUTION_ERROR", context);
    this.name = "ResolutionError";
  }
}

/**
 * Download failure, raised only when the pipeline is asked to verify fetches
 */
export class FetchError extends RefsmithError {
  constructor(
    message: string,
    public readonly url: string,
    context?: string
  ) {
    super(message, "FETCH_ERROR", context);
    this.name = "FetchError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends RefsmithError {
  constructor(
    message: string,
    public readonly operation: "compress" | "decompress" | "stream",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("header") || msg.includes("magic")
        ? ". File may be corrupted or not actually gzip compressed"
        : msg.includes("unexpected end")
          ? ". File appears to be truncated or incomplete"
          : "";

    return new CompressionError(
      `gzip ${operation} failed: ${errorMessage}${suggestion}`,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with the path and operation that failed
 */
export class FileError extends RefsmithError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "move" | "remove" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("exdev")) {
      return "Source and destination are on different devices";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}
