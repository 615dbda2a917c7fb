/**
 * @module formats/dsv/writer
 * @description DSV (Delimiter-Separated Values) writer
 *
 * Formats rows with RFC 4180 quoting and writes them through the file
 * writer, so `.gz` targets are compressed and outputs can be written
 * atomically.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { writeString, writeStringAtomic } from "../../io/file-writer";
import { DEFAULT_DELIMITERS, DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
import type { DSVWriterOptions } from "./types";
import { DSVWriterOptionsSchema } from "./validation";

/**
 * A value that can appear in an output cell
 */
export type DSVCell = string | number | boolean | null | undefined;

/**
 * DSVWriter - Core CSV/TSV writer implementation
 *
 * Fields are quoted only when they contain the delimiter, the quote
 * character or a line break, unless `quoteAll` is set.
 */
export class DSVWriter {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly escapeChar: string;
  private readonly lineEnding: string;
  private readonly quoteAll: boolean;
  private readonly trailingNewline: boolean;
  private readonly compressionLevel: number;

  constructor(options: DSVWriterOptions = {}) {
    const validation = DSVWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV writer options: ${validation.summary}`);
    }

    this.delimiter = options.delimiter ?? DEFAULT_DELIMITERS.tsv;
    this.quote = options.quote ?? DEFAULT_QUOTE;
    this.escapeChar = options.escapeChar ?? DEFAULT_ESCAPE;
    this.lineEnding = options.lineEnding ?? "\n";
    this.quoteAll = options.quoteAll ?? false;
    this.trailingNewline = options.trailingNewline ?? true;
    this.compressionLevel = options.compressionLevel ?? 6;
  }

  /**
   * Format a single field with proper escaping
   */
  private formatField(value: DSVCell): string {
    if (value == null) return "";

    const field = String(value);
    const needsQuoting =
      this.quoteAll ||
      field.includes(this.delimiter) ||
      field.includes(this.quote) ||
      field.includes("\n") ||
      field.includes("\r");

    if (!needsQuoting) {
      return field;
    }

    // Escape quotes by doubling them (RFC 4180) or with the escape character
    const escaped = field.split(this.quote).join(this.escapeChar + this.quote);
    return this.quote + escaped + this.quote;
  }

  /**
   * Format a row of fields
   */
  formatRow(fields: readonly DSVCell[]): string {
    return fields.map((field) => this.formatField(field)).join(this.delimiter);
  }

  /**
   * Format a header and its rows as one document
   */
  formatRows(header: readonly DSVCell[] | null, rows: Iterable<readonly DSVCell[]>): string {
    const lines: string[] = [];
    if (header !== null) {
      lines.push(this.formatRow(header));
    }
    for (const row of rows) {
      lines.push(this.formatRow(row));
    }

    if (lines.length === 0) {
      return "";
    }
    const body = lines.join(this.lineEnding);
    return this.trailingNewline ? body + this.lineEnding : body;
  }

  /**
   * Write a header and its rows to a file
   *
   * Compression is detected from the file extension (`.gz`). With `atomic`
   * the file appears only once it is complete.
   */
  async writeFile(
    path: string,
    header: readonly DSVCell[] | null,
    rows: Iterable<readonly DSVCell[]>,
    options: { atomic?: boolean } = {}
  ): Promise<void> {
    const content = this.formatRows(header, rows);
    const writeOptions = { compressionLevel: this.compressionLevel };

    if (options.atomic === true) {
      await writeStringAtomic(path, content, writeOptions);
    } else {
      await writeString(path, content, writeOptions);
    }
  }
}

/**
 * CSVWriter - Convenience class for CSV files
 */
export class CSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSVWriter - Convenience class for TSV files
 */
export class TSVWriter extends DSVWriter {
  constructor(options: Omit<DSVWriterOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
