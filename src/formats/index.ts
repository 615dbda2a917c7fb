/**
 * Central format module exports
 *
 * @example
 * ```typescript
 * import { AbundanceParser, MappingParser } from '../formats';
 * ```
 */

export { AbstractParser } from "./abstract-parser";
export {
  AbundanceParser,
  type AbundanceParserOptions,
  type AbundanceRow,
  type AbundanceTable,
  AbundanceWriter,
  type AbundanceWriterOptions,
  type ColumnSelector,
  type LabelledTable,
  parseAbundance,
  resolveColumns,
} from "./abundance";
export {
  CSVParser,
  CSVWriter,
  type DSVCell,
  DSVParser,
  type DSVParserOptions,
  type DSVRecord,
  type DSVTable,
  DSVWriter,
  type DSVWriterOptions,
  TSVParser,
  TSVWriter,
} from "./dsv";
export {
  loadBuiltinCatalog,
  loadNameCatalog,
  type MappingEntry,
  MappingParser,
  type MappingParserOptions,
  type MappingTable,
  mappingKeys,
  type NameCatalog,
  normalizePathwayId,
  parseNameCatalog,
  restrictToCategory,
} from "./mapping";
