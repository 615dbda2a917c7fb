/**
 * Abstract base parser with shared option handling and interrupt support
 *
 * Gives every table parser the same `onError`/`onWarning` defaults, an
 * error `source` name and AbortSignal checks, without imposing how a format
 * is parsed.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * @template TResult - What `parseString` and `parseFile` produce
 */
export abstract class AbstractParser<TResult, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions;
  protected readonly onError: (error: string, lineNumber?: number) => void;
  protected readonly onWarning: (warning: string, lineNumber?: number) => void;

  constructor(options: TOptions) {
    // Merge in order: format-specific defaults -> user options
    this.options = { ...this.getDefaultOptions(), ...options };

    this.onError =
      options.onError ??
      ((error: string, lineNumber?: number): void => {
        throw new ParseError(error, this.getFormatName(), lineNumber);
      });
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        const where = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} warning${where}: ${warning}`);
      });
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Name used in error messages and warnings
   */
  abstract getFormatName(): string;

  /**
   * Parse from an in-memory string
   */
  abstract parseString(data: string): TResult;

  /**
   * Parse from a file path (gzip input is decompressed)
   */
  abstract parseFile(path: string): TResult;

  /**
   * Name of the input for error messages
   */
  protected get source(): string | undefined {
    return this.options.source;
  }

  /**
   * Check if parsing should stop
   *
   * @throws {ParseError} If the signal was aborted
   */
  protected checkAborted(): void {
    if (this.options.signal?.aborted === true) {
      throw new ParseError(
        `${this.getFormatName()} parsing was aborted`,
        this.getFormatName(),
        undefined,
        undefined,
        "ABORTED"
      );
    }
  }
}
