/**
 * @module formats/dsv
 * @description DSV (Delimiter-Separated Values) format support
 *
 * Parsing and writing of CSV, TSV and other delimiter-separated tables,
 * including headers written as comment lines.
 *
 * @example Reading a TSV table
 * ```typescript
 * import { TSVParser } from './formats/dsv';
 *
 * const parser = new TSVParser({ commentedHeader: true });
 * for await (const record of parser.parseFile('sample_genefamilies.tsv')) {
 *   console.log(record.fields);
 * }
 * ```
 */

export type {
  DelimiterType,
  DSVParserOptions,
  DSVParserState,
  DSVRecord,
  DSVTable,
  DSVWriterOptions,
  RaggedRowPolicy,
} from "./types";
export { CSVParseState } from "./types";

export { CSVParser, DSVParser, TSVParser } from "./parser";
export { CSVWriter, type DSVCell, DSVWriter, TSVWriter } from "./writer";

export { isRowOpen, parseCSVRow } from "./state-machine";
export { handleRaggedRow, normalizeLineEndings, removeBOM, stripCommentPrefix } from "./utils";
export { DSVParserOptionsSchema, DSVWriterOptionsSchema, validateFieldSize } from "./validation";

export {
  DEFAULT_COMMENT_PREFIX,
  DEFAULT_DELIMITERS,
  DEFAULT_ESCAPE,
  DEFAULT_QUOTE,
  LINE_ENDINGS,
  MAX_FIELD_SIZE,
} from "./constants";
