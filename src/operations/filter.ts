/**
 * FilterProcessor - Keep the rows whose identifier is a mapping key
 *
 * Rows are kept in their original order and are never modified, so the
 * stage is idempotent. Identifiers absent from the mapping are dropped
 * silently; the count is reported in the result. An empty mapping yields
 * an empty table.
 */

import type { AbundanceTable } from "../formats/abundance";
import { mappingKeys } from "../formats/mapping";
import type { FilterOptions, StageResult, TableProcessor } from "./types";

/**
 * Processor for category filtering
 *
 * @example
 * ```typescript
 * const mapping = restrictToCategory(await new MappingParser().parseFile("ko_map.tsv"), "xenobiotics");
 * const { table, dropped } = new FilterProcessor().process(abundance, { mapping });
 * ```
 */
export class FilterProcessor implements TableProcessor<FilterOptions> {
  process(table: AbundanceTable, options: FilterOptions): StageResult {
    return filterByKeys(table, mappingKeys(options.mapping));
  }
}

/**
 * Keep the rows whose identifier is in `keys`
 */
export function filterByKeys(table: AbundanceTable, keys: ReadonlySet<string>): StageResult {
  const rows = table.rows.filter((row) => keys.has(row.id));
  return {
    table: { ...table, rows },
    input: table.rows.length,
    output: rows.length,
    dropped: table.rows.length - rows.length,
  };
}

/**
 * Keep the rows whose identifier is a key of the mapping
 */
export function filterTable(table: AbundanceTable, options: FilterOptions): StageResult {
  return new FilterProcessor().process(table, options);
}
