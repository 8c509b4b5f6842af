/**
 * Error types for CSV decoding and encoding
 *
 * Errors raised by caller-supplied byte sources and sinks are never wrapped;
 * the classes here cover invalid configuration, contract violations and the
 * bundled file transports.
 */

/**
 * Base error class for all octet-csv errors
 */
export class CsvError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "CsvError";
  }

  /**
   * Render the error with its context, when present
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
 * Invalid dialect or transport options
 */
export class ValidationError extends CsvError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * A caller broke the API contract: an out-of-range field index, a
 * `writeRecord` issued while a record is still open, or use of a closed sink.
 */
export class ContractError extends CsvError {
  constructor(
    message: string,
    public readonly operation: string
  ) {
    super(message, "CONTRACT_ERROR", operation);
    this.name = "ContractError";
  }
}

/**
 * File I/O errors raised by the file-descriptor transports
 */
export class FileError extends CsvError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "open" | "read" | "write" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  /**
   * Wrap an error thrown by `node:fs`
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
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
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}
