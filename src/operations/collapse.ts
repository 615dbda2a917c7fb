/**
 * CollapseProcessor - Sum the rows that share a label
 *
 * After `explode`, or whenever several features belong to the same
 * pathway, a label appears on several rows. Collapsing sums them into one
 * row per label, in the order labels are first seen, so the written table
 * has one row per pathway.
 */

import { ValidationError } from "../errors";
import type { AbundanceRow, AbundanceTable } from "../formats/abundance";
import type { AnnotatedTable, CollapseOptions, StageResult, TableProcessor } from "./types";

export class CollapseProcessor
  implements TableProcessor<CollapseOptions, AnnotatedTable, StageResult>
{
  /**
   * @throws {ValidationError} If the table keeps its identifier column (`augment`)
   */
  process(table: AnnotatedTable, options: CollapseOptions = {}): StageResult {
    if (table.mode !== "replace") {
      throw new ValidationError(
        'Rows can only be collapsed by label when the label replaces the identifier (label "replace")'
      );
    }

    const totals = new Map<string, number[]>();
    for (const row of table.rows) {
      const total = totals.get(row.label);
      if (total === undefined) {
        totals.set(row.label, [...row.values]);
      } else {
        row.values.forEach((value, i) => {
          total[i] = (total[i] ?? 0) + value;
        });
      }
    }

    const rows: AbundanceRow[] = Array.from(totals, ([id, values]) => ({ id, values }));
    const collapsed: AbundanceTable = {
      idColumn: options.labelColumn ?? table.labelColumn,
      columns: table.columns,
      rows,
    };
    if (table.source !== undefined) {
      collapsed.source = table.source;
    }

    return {
      table: collapsed,
      input: table.rows.length,
      output: rows.length,
      dropped: table.rows.length - rows.length,
    };
  }
}

/**
 * Sum the rows of an annotated table that share a label
 */
export function collapseLabels(table: AnnotatedTable, options: CollapseOptions = {}): StageResult {
  return new CollapseProcessor().process(table, options);
}
