/**
 * @module formats/dsv/parser
 * @description DSV (Delimiter-Separated Values) parser
 *
 * Parses CSV/TSV tables with:
 * - RFC 4180 quoting and multi-line fields
 * - Headers written as comment lines (`# Gene Family\tsample`)
 * - Transparent gzip input
 * - Configurable ragged-row handling and error recovery
 */

import { type } from "arktype";
import { DSVParseError, ValidationError } from "../../errors";
import { readToString } from "../../io/file-reader";
import { AbstractParser } from "../abstract-parser";
import {
  DEFAULT_COMMENT_PREFIX,
  DEFAULT_DELIMITERS,
  DEFAULT_ESCAPE,
  DEFAULT_MAX_FIELD_LINES,
  DEFAULT_QUOTE,
  MAX_FIELD_SIZE,
} from "./constants";
import { isRowOpen, parseCSVRow } from "./state-machine";
import type { DSVParserOptions, DSVParserState, DSVRecord, DSVTable } from "./types";
import { handleRaggedRow, normalizeLineEndings, removeBOM, stripCommentPrefix } from "./utils";
import { DSVParserOptionsSchema, validateFieldSize } from "./validation";

/**
 * DSVParser - Core CSV/TSV parser implementation
 *
 * Records are yielded in file order. The header row (if any) is consumed and
 * exposed through `headers` once parsing has passed it.
 *
 * @example Reading a table with a commented header
 * ```typescript
 * const parser = new TSVParser({ commentedHeader: true });
 * const table = await parser.parseTable("# Gene Family\tS1\nK00001\t10.5\n");
 * console.log(table.header); // ["Gene Family", "S1"]
 * ```
 */
export class DSVParser extends AbstractParser<AsyncIterable<DSVRecord>, DSVParserOptions> {
  private readonly delimiter: string;
  private readonly quote: string;
  private readonly escapeChar: string;
  private readonly commentPrefix: string;
  private headerRow: string[] | null = null;
  private headerLine: number | undefined;

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      quote: DEFAULT_QUOTE,
      escape: DEFAULT_ESCAPE,
      header: true,
      commentedHeader: false,
      skipEmptyLines: true,
      skipComments: true,
      commentPrefix: DEFAULT_COMMENT_PREFIX,
      raggedRows: "pad",
      maxFieldLines: DEFAULT_MAX_FIELD_LINES,
    };
  }

  constructor(options: DSVParserOptions = {}) {
    const validation = DSVParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid DSV parser options: ${validation.summary}`);
    }

    super({
      ...options,
      // Without a handler, problems surface as DSVParseError
      onError:
        options.onError ??
        ((error: string, lineNumber?: number): void => {
          throw new DSVParseError(error, lineNumber);
        }),
    });

    this.delimiter = this.options.delimiter ?? DEFAULT_DELIMITERS.tsv;
    this.quote = this.options.quote ?? DEFAULT_QUOTE;
    this.escapeChar = this.options.escape ?? DEFAULT_ESCAPE;
    this.commentPrefix = this.options.commentPrefix ?? DEFAULT_COMMENT_PREFIX;
  }

  getFormatName(): string {
    switch (this.delimiter) {
      case ",":
        return "CSV";
      case "\t":
        return "TSV";
      default:
        return "DSV";
    }
  }

  /**
   * Header row of the last parse, once it has been read
   */
  get headers(): string[] | null {
    return this.headerRow;
  }

  /**
   * Parse records from a string
   */
  async *parseString(data: string): AsyncIterable<DSVRecord> {
    this.headerRow = null;
    this.headerLine = undefined;

    const text = normalizeLineEndings(removeBOM(data)).replace(/\0/g, "");
    const lines = text.split("\n");
    // A final newline does not start another row
    if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }

    const state = this.createInitialState();
    yield* this.processLines(lines, state);
    yield* this.finish(state);
  }

  /**
   * Parse records from a file (gzip input is decompressed)
   *
   * @throws {FileNotFoundError} If the file does not exist
   */
  async *parseFile(path: string): AsyncIterable<DSVRecord> {
    const content = await readToString(path);
    yield* this.parseString(content);
  }

  /**
   * Parse a whole string into a header and its records
   */
  async parseTable(data: string): Promise<DSVTable> {
    const records: DSVRecord[] = [];
    for await (const record of this.parseString(data)) {
      records.push(record);
    }
    return this.toTable(records);
  }

  /**
   * Parse a whole file into a header and its records
   */
  async parseTableFile(path: string): Promise<DSVTable> {
    const records: DSVRecord[] = [];
    for await (const record of this.parseFile(path)) {
      records.push(record);
    }
    return this.toTable(records);
  }

  private toTable(records: DSVRecord[]): DSVTable {
    const table: DSVTable = { header: this.headerRow, records };
    if (this.headerLine !== undefined) {
      table.headerLine = this.headerLine;
    }
    return table;
  }

  private createInitialState(): DSVParserState {
    return {
      accumulatedRow: "",
      rowStartLine: 1,
      inMultiLineField: false,
      linesInCurrentField: 0,
      currentLineNumber: 1,
      headerProcessed: false,
      pendingHeader: null,
      expectedColumns: 0,
    };
  }

  /**
   * Walk physical lines, joining quoted fields that span several of them
   */
  private *processLines(lines: string[], state: DSVParserState): Generator<DSVRecord> {
    for (const line of lines) {
      this.checkAborted();
      const lineNumber = state.currentLineNumber++;

      if (state.inMultiLineField) {
        state.accumulatedRow += `\n${line}`;
        state.linesInCurrentField++;

        const maxFieldLines = this.options.maxFieldLines ?? DEFAULT_MAX_FIELD_LINES;
        if (state.linesInCurrentField > maxFieldLines) {
          this.onError(`Quoted field spans more than ${maxFieldLines} lines`, state.rowStartLine);
          this.resetRow(state);
          continue;
        }

        if (isRowOpen(state.accumulatedRow, this.delimiter, this.quote, this.escapeChar)) {
          continue;
        }

        const row = state.accumulatedRow;
        const startLine = state.rowStartLine;
        this.resetRow(state);
        yield* this.emitRow(row, startLine, state);
        continue;
      }

      if (line.trim() === "" && this.options.skipEmptyLines !== false) {
        continue;
      }

      if (line.startsWith(this.commentPrefix)) {
        if (this.acceptsCommentedHeader(state) && line.includes(this.delimiter)) {
          // The last such comment before the data wins
          state.pendingHeader = {
            text: stripCommentPrefix(line, this.commentPrefix),
            lineNumber,
          };
          continue;
        }
        if (this.options.skipComments !== false) {
          continue;
        }
      }

      if (isRowOpen(line, this.delimiter, this.quote, this.escapeChar)) {
        state.accumulatedRow = line;
        state.rowStartLine = lineNumber;
        state.inMultiLineField = true;
        state.linesInCurrentField = 1;
        continue;
      }

      yield* this.emitRow(line, lineNumber, state);
    }
  }

  /**
   * Flush what is left after the last line
   */
  private *finish(state: DSVParserState): Generator<DSVRecord> {
    if (state.inMultiLineField) {
      const startLine = state.rowStartLine;
      const rest = state.accumulatedRow.split("\n").slice(1);
      this.onError("Unclosed quote at end of input", startLine);

      // Recovery: drop the broken row and read the lines after it again
      this.resetRow(state);
      state.currentLineNumber = startLine + 1;
      yield* this.processLines(rest, state);
      yield* this.finish(state);
      return;
    }

    if (this.options.header !== false && !state.headerProcessed && state.pendingHeader !== null) {
      this.adoptHeader(state.pendingHeader.text, state.pendingHeader.lineNumber, state);
    }
  }

  private *emitRow(row: string, lineNumber: number, state: DSVParserState): Generator<DSVRecord> {
    let fields: string[];
    try {
      fields = parseCSVRow(row, this.delimiter, this.quote, this.escapeChar);
      for (const field of fields) {
        validateFieldSize(field, MAX_FIELD_SIZE, lineNumber);
      }
    } catch (error) {
      this.onError(error instanceof Error ? error.message : String(error), lineNumber);
      return;
    }

    if (this.options.header !== false && !state.headerProcessed) {
      if (state.pendingHeader !== null) {
        this.adoptHeader(state.pendingHeader.text, state.pendingHeader.lineNumber, state);
      } else {
        this.headerRow = fields;
        this.headerLine = lineNumber;
        state.headerProcessed = true;
        state.expectedColumns = fields.length;
        return;
      }
    }

    if (state.expectedColumns > 0 && this.options.raggedRows !== "ignore") {
      try {
        fields = handleRaggedRow(fields, state.expectedColumns, this.options.raggedRows);
      } catch (error) {
        this.onError(error instanceof Error ? error.message : String(error), lineNumber);
        return;
      }
    }

    yield { format: "dsv", fields, lineNumber };
  }

  private adoptHeader(text: string, lineNumber: number, state: DSVParserState): void {
    const fields = parseCSVRow(text, this.delimiter, this.quote, this.escapeChar);
    this.headerRow = fields;
    this.headerLine = lineNumber;
    state.headerProcessed = true;
    state.pendingHeader = null;
    state.expectedColumns = fields.length;
  }

  private acceptsCommentedHeader(state: DSVParserState): boolean {
    return (
      this.options.header !== false &&
      this.options.commentedHeader === true &&
      !state.headerProcessed
    );
  }

  private resetRow(state: DSVParserState): void {
    state.accumulatedRow = "";
    state.inMultiLineField = false;
    state.linesInCurrentField = 0;
  }
}

/**
 * CSVParser - comma-separated values
 */
export class CSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.csv });
  }
}

/**
 * TSVParser - tab-separated values
 */
export class TSVParser extends DSVParser {
  constructor(options: Omit<DSVParserOptions, "delimiter"> = {}) {
    super({ ...options, delimiter: DEFAULT_DELIMITERS.tsv });
  }
}
