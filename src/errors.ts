/**
 * Error handling for abundance table processing
 *
 * Every failure the library raises is a XenomapError carrying a stable
 * `code`, so callers (the CLI, batch mode) can tell usage errors, missing
 * files and malformed tables apart without matching on messages.
 */

/**
 * Base error class for all xenomap errors
 */
export class XenomapError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "XenomapError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options or configuration
 */
export class ValidationError extends XenomapError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * A required command-line argument or pipeline input was not supplied
 */
export class MissingArgumentError extends XenomapError {
  constructor(public readonly argument: string) {
    super(`Missing required argument: --${argument}`, "MISSING_ARGUMENT");
    this.name = "MissingArgumentError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends XenomapError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string,
    code: string = "PARSE_ERROR"
  ) {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const location = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column ${column}`,
      field !== undefined && `field "${field}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(location ? `${message} (${location})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * Why a table was rejected
 */
export type MalformedReason =
  | "empty"
  | "missing-column"
  | "column-count"
  | "invalid-number"
  | "negative-value"
  | "duplicate-id";

/**
 * A table that cannot be used as an abundance or mapping table
 *
 * `source` names the file (or sample) so batch reports point at the
 * offending input.
 */
export class MalformedTableError extends ParseError {
  constructor(
    message: string,
    public readonly reason: MalformedReason,
    public readonly source?: string,
    lineNumber?: number,
    context?: string
  ) {
    const where = source !== undefined ? `${source}: ` : "";
    super(`${where}${message}`, "TSV", lineNumber, context, "MALFORMED_TABLE");
    this.name = "MalformedTableError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends XenomapError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress" | "validate",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = describeError(systemError);
    const lower = errorMessage.toLowerCase();
    let suggestion = "";
    if (lower.includes("header") || lower.includes("magic")) {
      suggestion = `. File may be corrupted or not actually ${format} compressed`;
    } else if (lower.includes("unexpected end") || lower.includes("truncated")) {
      suggestion = ". File appears to be truncated or incomplete";
    }

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }
    return msg;
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends XenomapError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "list" | "remove",
    public readonly systemError?: unknown,
    context?: string,
    code: string = "FILE_ERROR"
  ) {
    super(message, code, undefined, context);
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
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = describeError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("not found") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, expected a file";
    }
    if (msg.includes("enospc") || msg.includes("no space")) {
      return "Free up disk space and try again";
    }
    return undefined;
  }
}

/**
 * An input file or directory does not exist
 */
export class FileNotFoundError extends FileError {
  constructor(filePath: string, operation: FileError["operation"] = "read", detail?: string) {
    super(
      detail ?? `File not found: ${filePath}`,
      filePath,
      operation,
      undefined,
      undefined,
      "FILE_NOT_FOUND"
    );
    this.name = "FileNotFoundError";
  }
}

/**
 * A per-sample pipeline run failed
 *
 * Wraps the underlying error so reports can name the sample while keeping
 * the original error (and its code) reachable through `cause`.
 */
export class SampleError extends XenomapError {
  constructor(
    public readonly sample: string,
    public override readonly cause: XenomapError
  ) {
    super(`Sample "${sample}" failed: ${cause.message}`, cause.code, cause.lineNumber, cause.context);
    this.name = "SampleError";
  }
}

/**
 * Normalize an unknown thrown value into a XenomapError
 */
export function toXenomapError(error: unknown): XenomapError {
  if (error instanceof XenomapError) {
    return error;
  }
  return new XenomapError(describeError(error), "UNKNOWN_ERROR");
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
