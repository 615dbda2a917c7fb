/**
 * Mapping tables and name catalogs
 *
 * A mapping table links a feature key (a KO id) to the groups it belongs to
 * (KEGG pathway ids) and, optionally, to categories such as `xenobiotics`:
 *
 * ```
 * KO      Map                 Category
 * K00001  map00624,map00980   xenobiotics
 * ```
 *
 * A name catalog gives each group id a human-readable name.
 */

import { fileURLToPath } from "node:url";
import { type } from "arktype";
import { MalformedTableError, ValidationError } from "../errors";
import { readToString } from "../io/file-reader";
import type { ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";
import { type ColumnSelector, resolveColumns } from "./abundance";
import { TSVParser } from "./dsv";

/**
 * Targets and categories of one key
 */
export interface MappingEntry {
  key: string;
  /** Group ids in first-seen order, without duplicates */
  targets: string[];
  categories: string[];
}

export interface MappingTable {
  keyColumn: string;
  targetColumn: string;
  /** Present when the table has a category column */
  categoryColumn?: string;
  /** Entries in first-seen key order */
  entries: ReadonlyMap<string, MappingEntry>;
  source?: string;
}

export interface MappingParserOptions extends ParserOptions {
  /** Key column (default: `KO`) */
  keyColumn?: ColumnSelector;
  /** Target column, comma-separated group ids (default: `Map`) */
  targetColumn?: ColumnSelector;
  /** Category column; a column named `Category` is used when present */
  categoryColumn?: ColumnSelector;
  /** Rewrite `ko00624`, `ec00624`, `rn00624` to `map00624` (default: true) */
  normalizePathwayIds?: boolean;
}

/**
 * Group id to display name
 */
export type NameCatalog = ReadonlyMap<string, string>;

const DEFAULT_KEY_COLUMN = "KO";
const DEFAULT_TARGET_COLUMN = "Map";
const DEFAULT_CATEGORY_COLUMN = "Category";

const PATHWAY_ID = /^(?:map|ko|ec|rn)(\d{5})$/;

const MappingParserOptionsSchema = type({
  "source?": "string",
  "keyColumn?": "string | number",
  "targetColumn?": "string | number",
  "categoryColumn?": "string | number",
  "normalizePathwayIds?": "boolean",
});

const BuiltinCatalogSchema = type({
  category: "string",
  pathways: "Record<string, string>",
});

/**
 * Normalize a KEGG pathway id to its reference (`map`) form
 *
 * @example
 * ```typescript
 * normalizePathwayId("ko00624"); // "map00624"
 * normalizePathwayId("K00001");  // "K00001"
 * ```
 */
export function normalizePathwayId(id: string): string {
  const match = PATHWAY_ID.exec(id);
  return match?.[1] !== undefined ? `map${match[1]}` : id;
}

/**
 * Split a comma-separated cell, dropping blanks and repeats
 */
function splitList(cell: string, normalize: (value: string) => string = (value) => value): string[] {
  const values: string[] = [];
  for (const part of cell.split(",")) {
    const value = normalize(part.trim());
    if (value !== "" && !values.includes(value)) {
      values.push(value);
    }
  }
  return values;
}

/**
 * MappingParser - reads key → group mapping tables
 *
 * The header is required and columns are found by name. Rows that repeat a
 * key are merged into one entry.
 */
export class MappingParser extends AbstractParser<Promise<MappingTable>, MappingParserOptions> {
  constructor(options: MappingParserOptions = {}) {
    const validation = MappingParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid mapping parser options: ${validation.summary}`);
    }
    super(options);
  }

  protected getDefaultOptions(): Partial<MappingParserOptions> {
    return {
      keyColumn: DEFAULT_KEY_COLUMN,
      targetColumn: DEFAULT_TARGET_COLUMN,
      normalizePathwayIds: true,
    };
  }

  getFormatName(): string {
    return "mapping table";
  }

  async parseString(data: string): Promise<MappingTable> {
    const parser = new TSVParser({
      commentedHeader: false,
      raggedRows: "ignore",
      ...(this.source !== undefined && { source: this.source }),
    });
    const dsv = await parser.parseTable(data);
    const header = dsv.header;
    if (header === null) {
      throw new MalformedTableError("Mapping table is empty (no header row)", "empty", this.source);
    }

    const [keyIndex, targetIndex] = resolveColumns(
      header,
      [this.options.keyColumn ?? DEFAULT_KEY_COLUMN, this.options.targetColumn ?? DEFAULT_TARGET_COLUMN],
      this.source
    );
    if (keyIndex === undefined || targetIndex === undefined) {
      throw new MalformedTableError("Key and target columns are required", "missing-column", this.source);
    }
    const categoryIndex = this.findCategoryColumn(header);

    const normalize =
      this.options.normalizePathwayIds !== false ? normalizePathwayId : (id: string) => id;
    const entries = new Map<string, MappingEntry>();

    for (const { fields, lineNumber } of dsv.records) {
      this.checkAborted();
      if (fields.length > header.length) {
        throw new MalformedTableError(
          `Row has ${fields.length} columns, expected ${header.length}`,
          "column-count",
          this.source,
          lineNumber
        );
      }

      const key = (fields[keyIndex] ?? "").trim();
      if (key === "") {
        this.onWarning("Row without a key skipped", lineNumber);
        continue;
      }

      const targets = splitList(fields[targetIndex] ?? "", normalize);
      const categories =
        categoryIndex !== undefined ? splitList(fields[categoryIndex] ?? "") : [];

      const existing = entries.get(key);
      if (existing === undefined) {
        entries.set(key, { key, targets, categories });
      } else {
        existing.targets = splitList([...existing.targets, ...targets].join(","));
        existing.categories = splitList([...existing.categories, ...categories].join(","));
      }
    }

    const table: MappingTable = {
      keyColumn: header[keyIndex] ?? DEFAULT_KEY_COLUMN,
      targetColumn: header[targetIndex] ?? DEFAULT_TARGET_COLUMN,
      entries,
    };
    if (categoryIndex !== undefined) {
      table.categoryColumn = header[categoryIndex] ?? DEFAULT_CATEGORY_COLUMN;
    }
    if (this.source !== undefined) {
      table.source = this.source;
    }
    return table;
  }

  /**
   * @throws {FileNotFoundError} If the file does not exist
   */
  async parseFile(path: string): Promise<MappingTable> {
    const content = await readToString(path);
    const parser = new MappingParser({ ...this.options, source: this.source ?? path });
    return parser.parseString(content);
  }

  private findCategoryColumn(header: string[]): number | undefined {
    if (this.options.categoryColumn !== undefined) {
      return resolveColumns(header, [this.options.categoryColumn], this.source)[0];
    }
    const index = header.findIndex(
      (column) => column.toLowerCase() === DEFAULT_CATEGORY_COLUMN.toLowerCase()
    );
    return index >= 0 ? index : undefined;
  }
}

/**
 * Keep the entries listed under a category (case-insensitive)
 *
 * @throws {ValidationError} If the mapping has no category column
 */
export function restrictToCategory(mapping: MappingTable, category: string): MappingTable {
  if (mapping.categoryColumn === undefined) {
    throw new ValidationError(
      `Cannot restrict to category "${category}": mapping table${
        mapping.source !== undefined ? ` ${mapping.source}` : ""
      } has no category column`
    );
  }

  const wanted = category.toLowerCase();
  const entries = new Map<string, MappingEntry>();
  for (const [key, entry] of mapping.entries) {
    if (entry.categories.some((value) => value.toLowerCase() === wanted)) {
      entries.set(key, entry);
    }
  }
  return { ...mapping, entries };
}

/**
 * The key set of a mapping table
 */
export function mappingKeys(mapping: MappingTable): ReadonlySet<string> {
  return new Set(mapping.entries.keys());
}

/**
 * Parse a name catalog TSV (`id<TAB>name`, with a header row)
 *
 * @throws {MalformedTableError} On a missing header, a short row or a repeated id
 */
export async function parseNameCatalog(
  data: string,
  options: { source?: string; normalizePathwayIds?: boolean } = {}
): Promise<NameCatalog> {
  const parser = new TSVParser({
    raggedRows: "ignore",
    ...(options.source !== undefined && { source: options.source }),
  });
  const table = await parser.parseTable(data);
  if (table.header === null) {
    throw new MalformedTableError("Name catalog is empty (no header row)", "empty", options.source);
  }
  if (table.header.length < 2) {
    throw new MalformedTableError(
      "Name catalog needs an id column and a name column",
      "missing-column",
      options.source
    );
  }

  const normalize = options.normalizePathwayIds !== false;
  const names = new Map<string, string>();
  for (const { fields, lineNumber } of table.records) {
    const [rawId, rawName] = fields;
    if (rawId === undefined || rawName === undefined) {
      throw new MalformedTableError(
        `Row has ${fields.length} columns, expected at least 2`,
        "column-count",
        options.source,
        lineNumber
      );
    }
    const id = normalize ? normalizePathwayId(rawId.trim()) : rawId.trim();
    if (names.has(id)) {
      throw new MalformedTableError(`Duplicate identifier "${id}"`, "duplicate-id", options.source, lineNumber);
    }
    names.set(id, rawName.trim());
  }
  return names;
}

/**
 * Read a name catalog from a TSV file
 */
export async function loadNameCatalog(
  path: string,
  options: { normalizePathwayIds?: boolean } = {}
): Promise<NameCatalog> {
  const content = await readToString(path);
  return parseNameCatalog(content, { ...options, source: path });
}

/**
 * The bundled catalog of KEGG xenobiotic biodegradation pathways
 */
export async function loadBuiltinCatalog(): Promise<NameCatalog> {
  const path = fileURLToPath(new URL("../../data/xenobiotic-pathways.json", import.meta.url));
  const content = await readToString(path);

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Built-in pathway catalog is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const catalog = BuiltinCatalogSchema(json);
  if (catalog instanceof type.errors) {
    throw new ValidationError(`Invalid built-in pathway catalog: ${catalog.summary}`);
  }
  return new Map(
    Object.entries(catalog.pathways).map(([id, name]) => [normalizePathwayId(id), name])
  );
}
