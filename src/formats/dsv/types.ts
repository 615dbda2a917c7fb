/**
 * DSV Format Type Definitions
 *
 * Types for delimiter-separated tables. Records stay positional: the
 * abundance and mapping layers decide what each column means.
 */

import type { ParserOptions } from "../../types";

/**
 * Supported delimiter types for DSV formats
 */
export type DelimiterType = "," | "\t" | "|" | ";" | string;

/**
 * How to treat rows whose field count differs from the header
 */
export type RaggedRowPolicy = "error" | "pad" | "truncate" | "ignore";

/**
 * One logical row of a delimited file
 */
export interface DSVRecord {
  format: "dsv";
  fields: string[];
  /** Source line number where the row starts (1-based) */
  lineNumber: number;
}

/**
 * A fully parsed table
 */
export interface DSVTable {
  header: string[] | null;
  /** Line number of the header row, when there is one */
  headerLine?: number;
  records: DSVRecord[];
}

/**
 * Parser state for CSV/TSV parsing state machine
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * DSV parser options extending base parser options
 */
export interface DSVParserOptions extends ParserOptions {
  delimiter?: DelimiterType;

  // Quote handling
  quote?: string;
  escape?: string;

  // Header configuration
  header?: boolean;
  /** Accept a header written as a comment line (`# Gene Family\tS1`) */
  commentedHeader?: boolean;

  // Parsing behavior
  skipEmptyLines?: boolean;
  skipComments?: boolean;
  commentPrefix?: string;
  raggedRows?: RaggedRowPolicy;
  /** Maximum lines a single quoted field can span (default: 100) */
  maxFieldLines?: number;
}

/**
 * DSV writer options for output formatting
 */
export interface DSVWriterOptions {
  delimiter?: DelimiterType;
  quote?: string;
  escapeChar?: string;
  lineEnding?: "\n" | "\r\n";
  quoteAll?: boolean;
  /** End the output with a line ending (default: true) */
  trailingNewline?: boolean;
  compressionLevel?: number;
}

/**
 * Parser state carried across lines
 */
export interface DSVParserState {
  accumulatedRow: string;
  rowStartLine: number;
  inMultiLineField: boolean;
  linesInCurrentField: number;
  currentLineNumber: number;
  headerProcessed: boolean;
  /** Commented header candidate seen before any data */
  pendingHeader: { text: string; lineNumber: number } | null;
  expectedColumns: number;
}
