/**
 * Abundance table reader and writer
 *
 * An abundance table is a TSV whose first column holds a feature identifier
 * (a KEGG Orthology id, a stratified `K00001|g__Genus.s__species` feature or
 * a MetaPhlAn clade path) and whose remaining columns hold one non-negative
 * abundance per sample. HUMAnN writes the header as a comment line
 * (`# Gene Family\tsample_Abundance-RPKs`), which is accepted as the header.
 */

import { type } from "arktype";
import { MalformedTableError, ValidationError } from "../errors";
import { readToString } from "../io/file-reader";
import type { ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";
import { type DSVRecord, TSVParser, TSVWriter } from "./dsv";

/**
 * One feature and its abundances, in column order
 */
export interface AbundanceRow {
  id: string;
  values: number[];
}

/**
 * A parsed abundance table
 */
export interface AbundanceTable {
  /** Header of the identifier column (e.g. `Gene Family`) */
  idColumn: string;
  /** Headers of the value columns */
  columns: string[];
  rows: AbundanceRow[];
  /** Name of the input the table was read from */
  source?: string;
}

/**
 * A table with one or more leading text columns, as written after
 * annotation (`Pathway_Name`, or `Gene Family` then `Pathway_Name`)
 */
export interface LabelledTable {
  labelColumns: string[];
  columns: string[];
  rows: { labels: string[]; values: number[] }[];
}

/**
 * A column picked by header name or by 0-based index
 */
export type ColumnSelector = string | number;

export interface AbundanceParserOptions extends ParserOptions {
  /**
   * Value columns to keep (names or 0-based indexes, never the identifier
   * column). Other columns are ignored and not validated.
   */
  columns?: ColumnSelector[];
  /**
   * Without `columns`, read only the column at this 0-based index when the
   * header reaches it, and every value column otherwise
   */
  defaultColumn?: number;
  /** Allow negative values (default: false) */
  allowNegative?: boolean;
}

export interface AbundanceWriterOptions {
  /** Fixed number of decimals; shortest round-trip form when omitted */
  precision?: number;
  compressionLevel?: number;
}

const AbundanceParserOptionsSchema = type({
  "source?": "string",
  "columns?": "(string | number)[]",
  "defaultColumn?": "number>=1",
  "allowNegative?": "boolean",
}).narrow((options, ctx) => {
  if (options.columns?.length === 0) {
    return ctx.reject({ path: ["columns"], expected: "at least one column", actual: "none" });
  }
  const invalid = options.columns?.find(
    (column) => typeof column === "number" && (!Number.isInteger(column) || column < 0)
  );
  if (invalid !== undefined) {
    return ctx.reject({
      path: ["columns"],
      expected: "column names or non-negative integer indexes",
      actual: String(invalid),
    });
  }
  if (options.defaultColumn !== undefined && !Number.isInteger(options.defaultColumn)) {
    return ctx.reject({
      path: ["defaultColumn"],
      expected: "an integer column index",
      actual: String(options.defaultColumn),
    });
  }
  return true;
});

const AbundanceWriterOptionsSchema = type({
  "precision?": "0<=number<=20",
  "compressionLevel?": "1<=number<=9",
}).narrow((options, ctx) => {
  if (options.precision !== undefined && !Number.isInteger(options.precision)) {
    return ctx.reject({
      path: ["precision"],
      expected: "an integer number of decimals",
      actual: String(options.precision),
    });
  }
  return true;
});

/**
 * Parse an abundance value
 *
 * Accepts anything `Number` reads as a finite number (`10.5`, `1e-3`);
 * empty cells, `NaN` and infinities are rejected.
 */
export function parseAbundance(text: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === "") {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Resolve column selectors against a header
 *
 * @returns 0-based indexes, in selector order
 * @throws {MalformedTableError} If a named column is missing or an index is out of range
 */
export function resolveColumns(
  header: readonly string[],
  selectors: readonly ColumnSelector[],
  source?: string
): number[] {
  return selectors.map((selector) => {
    const index = typeof selector === "number" ? selector : header.indexOf(selector);
    if (index < 0 || index >= header.length) {
      throw new MalformedTableError(
        typeof selector === "number"
          ? `Column index ${selector} is out of range for ${header.length} columns`
          : `Column "${selector}" not found in header (${header.join(", ")})`,
        "missing-column",
        source
      );
    }
    return index;
  });
}

/**
 * AbundanceParser - reads abundance tables and enforces their invariants
 *
 * Rejected with MalformedTableError: a missing header, fewer than two
 * columns, rows whose column count differs from the header, values that are
 * not finite numbers, negative values and repeated identifiers.
 *
 * @example
 * ```typescript
 * const table = await new AbundanceParser().parseFile("S1_merged_genefamilies.tsv");
 * console.log(table.columns, table.rows.length);
 * ```
 */
export class AbundanceParser extends AbstractParser<Promise<AbundanceTable>, AbundanceParserOptions> {
  constructor(options: AbundanceParserOptions = {}) {
    const validation = AbundanceParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid abundance parser options: ${validation.summary}`);
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<AbundanceParserOptions> {
    return { allowNegative: false };
  }

  getFormatName(): string {
    return "abundance table";
  }

  async parseString(data: string): Promise<AbundanceTable> {
    const parser = new TSVParser({
      commentedHeader: true,
      raggedRows: "ignore",
      ...(this.source !== undefined && { source: this.source }),
      ...(this.options.signal !== undefined && { signal: this.options.signal }),
    });
    const dsv = await parser.parseTable(data);

    if (dsv.header === null) {
      throw new MalformedTableError("Table is empty (no header row)", "empty", this.source);
    }
    return this.buildTable(dsv.header, dsv.records);
  }

  /**
   * @throws {FileNotFoundError} If the file does not exist
   */
  async parseFile(path: string): Promise<AbundanceTable> {
    const content = await readToString(path);
    const parser = new AbundanceParser({ ...this.options, source: this.source ?? path });
    return parser.parseString(content);
  }

  private buildTable(header: string[], records: DSVRecord[]): AbundanceTable {
    const [idColumn, ...valueHeaders] = header;
    if (idColumn === undefined || valueHeaders.length === 0) {
      throw new MalformedTableError(
        `Expected an identifier column and at least one value column, found ${header.length} column(s)`,
        "missing-column",
        this.source
      );
    }

    const selected = this.selectedColumns(header);
    const indexes =
      selected !== undefined
        ? resolveColumns(header, selected, this.source)
        : valueHeaders.map((_, i) => i + 1);
    if (indexes.includes(0)) {
      throw new MalformedTableError(
        "The identifier column cannot be selected as a value column",
        "missing-column",
        this.source
      );
    }

    // With selected columns, rows only need to reach the last selected one
    const minColumns = selected !== undefined ? Math.max(...indexes) + 1 : header.length;
    const seen = new Map<string, number>();
    const rows: AbundanceRow[] = [];

    for (const record of records) {
      this.checkAborted();
      const { fields, lineNumber } = record;

      const countMismatch =
        selected !== undefined ? fields.length < minColumns : fields.length !== header.length;
      if (countMismatch) {
        throw new MalformedTableError(
          `Row has ${fields.length} columns, expected ${header.length}`,
          "column-count",
          this.source,
          lineNumber
        );
      }

      const id = fields[0] ?? "";
      const firstLine = seen.get(id);
      if (firstLine !== undefined) {
        throw new MalformedTableError(
          `Duplicate identifier "${id}" (first seen on line ${firstLine})`,
          "duplicate-id",
          this.source,
          lineNumber
        );
      }
      seen.set(id, lineNumber);

      const values = indexes.map((index) => {
        const cell = fields[index] ?? "";
        const value = parseAbundance(cell);
        if (value === undefined) {
          throw new MalformedTableError(
            `Invalid number "${cell}" in column "${header[index]}"`,
            "invalid-number",
            this.source,
            lineNumber
          );
        }
        if (value < 0 && this.options.allowNegative !== true) {
          throw new MalformedTableError(
            `Negative value ${value} in column "${header[index]}"`,
            "negative-value",
            this.source,
            lineNumber
          );
        }
        return value;
      });

      rows.push({ id, values });
    }

    const table: AbundanceTable = {
      idColumn,
      columns: indexes.map((index) => header[index] ?? ""),
      rows,
    };
    if (this.source !== undefined) {
      table.source = this.source;
    }
    return table;
  }

  private selectedColumns(header: readonly string[]): ColumnSelector[] | undefined {
    if (this.options.columns !== undefined) {
      return this.options.columns;
    }
    const fallback = this.options.defaultColumn;
    return fallback !== undefined && fallback < header.length ? [fallback] : undefined;
  }
}

/**
 * AbundanceWriter - formats abundance tables as TSV
 */
export class AbundanceWriter {
  private readonly writer: TSVWriter;
  private readonly precision: number | undefined;

  constructor(options: AbundanceWriterOptions = {}) {
    const validation = AbundanceWriterOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid abundance writer options: ${validation.summary}`);
    }
    this.precision = options.precision;
    this.writer = new TSVWriter(
      options.compressionLevel !== undefined ? { compressionLevel: options.compressionLevel } : {}
    );
  }

  formatValue(value: number): string {
    return this.precision !== undefined ? value.toFixed(this.precision) : String(value);
  }

  /**
   * Format a table, header first
   */
  format(table: AbundanceTable): string {
    return this.writer.formatRows(this.header(table), this.cells(table));
  }

  /**
   * Format a table whose rows start with several text columns
   */
  formatLabelled(table: LabelledTable): string {
    return this.writer.formatRows([...table.labelColumns, ...table.columns], this.labelledCells(table));
  }

  /**
   * Write a table; `.gz` paths are gzip-compressed
   */
  async writeFile(
    path: string,
    table: AbundanceTable,
    options: { atomic?: boolean } = {}
  ): Promise<void> {
    await this.writer.writeFile(path, this.header(table), this.cells(table), options);
  }

  async writeLabelledFile(
    path: string,
    table: LabelledTable,
    options: { atomic?: boolean } = {}
  ): Promise<void> {
    await this.writer.writeFile(
      path,
      [...table.labelColumns, ...table.columns],
      this.labelledCells(table),
      options
    );
  }

  private header(table: AbundanceTable): string[] {
    return [table.idColumn, ...table.columns];
  }

  private *cells(table: AbundanceTable): Iterable<string[]> {
    for (const row of table.rows) {
      yield [row.id, ...row.values.map((value) => this.formatValue(value))];
    }
  }

  private *labelledCells(table: LabelledTable): Iterable<string[]> {
    for (const row of table.rows) {
      yield [...row.labels, ...row.values.map((value) => this.formatValue(value))];
    }
  }
}
