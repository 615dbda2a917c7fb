/**
 * ExtractProcessor - Select the features of a HUMAnN table
 *
 * HUMAnN stratifies every gene family by the taxa contributing to it:
 *
 * ```
 * K00001                       12.0
 * K00001|g__Bacteroides.s__B_fragilis   7.5
 * K00001|unclassified          4.5
 * ```
 *
 * Community mode keeps the totals; stratified mode rebuilds them from the
 * classified per-taxon rows.
 */

import type { AbundanceRow, AbundanceTable } from "../formats/abundance";
import type { ExtractOptions, StageResult, TableProcessor } from "./types";

const STRATUM_SEPARATOR = "|";

/**
 * Split a stratified feature id into feature and taxon
 */
export function splitStratum(id: string): { feature: string; taxon?: string } {
  const index = id.indexOf(STRATUM_SEPARATOR);
  if (index < 0) {
    return { feature: id };
  }
  return { feature: id.slice(0, index), taxon: id.slice(index + 1) };
}

/**
 * @example
 * ```typescript
 * const { table } = new ExtractProcessor().process(genefamilies, {
 *   stratification: "stratified",
 *   idPattern: /^K\d{5}$/,
 * });
 * ```
 */
export class ExtractProcessor implements TableProcessor<ExtractOptions> {
  process(table: AbundanceTable, options: ExtractOptions): StageResult {
    const rows = this.select(table.rows, options);
    const kept =
      options.idPattern !== undefined ? rows.filter((row) => this.matches(row.id, options)) : rows;

    return {
      table: { ...table, rows: kept },
      input: table.rows.length,
      output: kept.length,
      dropped: table.rows.length - kept.length,
    };
  }

  private select(rows: AbundanceRow[], options: ExtractOptions): AbundanceRow[] {
    switch (options.stratification) {
      case "none":
        return rows;
      case "community":
        return rows.filter((row) => !row.id.includes(STRATUM_SEPARATOR));
      case "stratified":
        return this.sumStrata(rows, options.keepUnclassified === true);
    }
  }

  /**
   * Sum classified per-taxon rows per feature, in first-seen feature order
   */
  private sumStrata(rows: AbundanceRow[], keepUnclassified: boolean): AbundanceRow[] {
    const totals = new Map<string, number[]>();

    for (const row of rows) {
      const { feature, taxon } = splitStratum(row.id);
      if (taxon === undefined) continue;
      if (!keepUnclassified && taxon.toLowerCase().includes("unclassified")) continue;

      const total = totals.get(feature);
      if (total === undefined) {
        totals.set(feature, [...row.values]);
      } else {
        row.values.forEach((value, i) => {
          total[i] = (total[i] ?? 0) + value;
        });
      }
    }

    return Array.from(totals, ([id, values]) => ({ id, values }));
  }

  private matches(id: string, options: ExtractOptions): boolean {
    const pattern = options.idPattern;
    if (pattern === undefined) return true;
    // Global and sticky patterns carry lastIndex between calls
    pattern.lastIndex = 0;
    return pattern.test(id);
  }
}

/**
 * Select the features of a table
 */
export function extractFeatures(table: AbundanceTable, options: ExtractOptions): StageResult {
  return new ExtractProcessor().process(table, options);
}
