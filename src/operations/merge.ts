/**
 * Merge per-sample tables into one matrix
 *
 * An outer join on the identifier column: every identifier of every table
 * appears once, in the order it is first seen, and a sample that lacks an
 * identifier gets 0 for it.
 */

import { ValidationError } from "../errors";
import { type AbundanceParserOptions, AbundanceParser, type AbundanceTable } from "../formats/abundance";

/**
 * Column read from each file when none are selected: the third, which is
 * `relative_abundance` in a MetaPhlAn bugs list
 * (`clade_name`, `NCBI_tax_id`, `relative_abundance`, `additional_species`)
 */
export const MERGE_VALUE_COLUMN = 2;

/**
 * A table and the name its columns are reported under
 */
export interface MergeSource {
  name: string;
  table: AbundanceTable;
}

export interface MergeOptions {
  /** Header of the merged identifier column; the first table's when omitted */
  idColumn?: string;
}

/**
 * Column names a source contributes
 *
 * A single-column table is named after its source (`S1`); wider tables
 * prefix each column with it (`S1_reads`, `S1_abundance`).
 */
export function mergedColumnNames(source: MergeSource): string[] {
  if (source.table.columns.length === 1) {
    return [source.name];
  }
  return source.table.columns.map((column) => `${source.name}_${column}`);
}

/**
 * Outer-join tables on their identifiers
 *
 * @throws {ValidationError} If there are no sources or two sources produce the same column name
 *
 * @example
 * ```typescript
 * const merged = mergeTables([
 *   { name: "S1", table: s1 },
 *   { name: "S2", table: s2 },
 * ]);
 * ```
 */
export function mergeTables(sources: readonly MergeSource[], options: MergeOptions = {}): AbundanceTable {
  const [first] = sources;
  if (first === undefined) {
    throw new ValidationError("At least one table is required to merge");
  }

  const columns: string[] = [];
  const offsets: number[] = [];
  for (const source of sources) {
    offsets.push(columns.length);
    for (const name of mergedColumnNames(source)) {
      if (columns.includes(name)) {
        throw new ValidationError(`Duplicate column "${name}" in merged table`);
      }
      columns.push(name);
    }
  }

  const merged = new Map<string, number[]>();
  sources.forEach((source, sourceIndex) => {
    const offset = offsets[sourceIndex] ?? 0;
    for (const row of source.table.rows) {
      const existing = merged.get(row.id);
      const values = existing ?? columns.map(() => 0);
      if (existing === undefined) {
        merged.set(row.id, values);
      }
      row.values.forEach((value, i) => {
        // Repeated ids within one table are summed
        values[offset + i] = (values[offset + i] ?? 0) + value;
      });
    }
  });

  return {
    idColumn: options.idColumn ?? first.table.idColumn,
    columns,
    rows: Array.from(merged, ([id, values]) => ({ id, values })),
  };
}

/**
 * Read and merge tables from files
 *
 * Each file contributes its third column whatever the header calls it, or
 * its only value column in a two-column table. `columns` picks others.
 */
export async function mergeFiles(
  inputs: readonly { name: string; path: string }[],
  options: MergeOptions & Pick<AbundanceParserOptions, "columns"> = {}
): Promise<AbundanceTable> {
  const sources: MergeSource[] = [];
  for (const input of inputs) {
    const parser = new AbundanceParser({
      source: input.path,
      ...(options.columns !== undefined
        ? { columns: options.columns }
        : { defaultColumn: MERGE_VALUE_COLUMN }),
    });
    sources.push({ name: input.name, table: await parser.parseFile(input.path) });
  }
  return mergeTables(sources, options.idColumn !== undefined ? { idColumn: options.idColumn } : {});
}
