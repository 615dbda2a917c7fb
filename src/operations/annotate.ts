/**
 * AnnotateProcessor - Resolve identifiers to human-readable labels
 *
 * Each row's key is looked up in the mapping; each group id it maps to is
 * looked up in the name catalog. Two explicit policies decide the ambiguous
 * cases:
 *
 * - `multiple`: a key with several groups yields the first listed group
 *   (`first`) or one row per group with the values copied (`explode`)
 * - `unmapped`: a key absent from the mapping, or with no group, is labelled
 *   with its own id (`passthrough`) or removed (`drop`)
 *
 * A group id missing from the catalog is labelled with the group id itself.
 */

import type { AbundanceTable, LabelledTable } from "../formats/abundance";
import type {
  AnnotatedRow,
  AnnotatedTable,
  AnnotateOptions,
  AnnotateResult,
  TableProcessor,
} from "./types";

export const DEFAULT_LABEL_COLUMN = "Pathway_Name";

/**
 * @example
 * ```typescript
 * const { table } = new AnnotateProcessor().process(filtered, {
 *   mapping,
 *   catalog: await loadBuiltinCatalog(),
 *   multiple: "first",
 *   unmapped: "passthrough",
 *   label: "replace",
 * });
 * ```
 */
export class AnnotateProcessor implements TableProcessor<AnnotateOptions, AbundanceTable, AnnotateResult> {
  process(table: AbundanceTable, options: AnnotateOptions): AnnotateResult {
    const rows: AnnotatedRow[] = [];
    let unmapped = 0;
    let exploded = 0;
    let dropped = 0;

    for (const row of table.rows) {
      const targets = options.mapping.entries.get(row.id)?.targets ?? [];

      if (targets.length === 0) {
        unmapped++;
        if (options.unmapped === "drop") {
          dropped++;
        } else {
          rows.push({ id: row.id, label: row.id, values: row.values });
        }
        continue;
      }

      const chosen = options.multiple === "first" ? targets.slice(0, 1) : targets;
      exploded += chosen.length - 1;
      for (const target of chosen) {
        rows.push({
          id: row.id,
          target,
          label: options.catalog.get(target) ?? target,
          values: [...row.values],
        });
      }
    }

    const annotated = {
      idColumn: table.idColumn,
      labelColumn: options.labelColumn ?? DEFAULT_LABEL_COLUMN,
      mode: options.label,
      columns: table.columns,
      rows,
      ...(table.source !== undefined && { source: table.source }),
    };

    return {
      table: annotated,
      input: table.rows.length,
      output: rows.length,
      dropped,
      unmapped,
      exploded,
    };
  }
}

/**
 * Resolve a table's identifiers to labels
 */
export function annotateTable(table: AbundanceTable, options: AnnotateOptions): AnnotateResult {
  return new AnnotateProcessor().process(table, options);
}

/**
 * Lay an annotated table out for writing
 *
 * `replace` puts the label column in place of the identifier column;
 * `augment` keeps the identifier column and adds the label column after it.
 */
export function toLabelledTable(table: AnnotatedTable): LabelledTable {
  const augment = table.mode === "augment";
  return {
    labelColumns: augment ? [table.idColumn, table.labelColumn] : [table.labelColumn],
    columns: table.columns,
    rows: table.rows.map((row) => ({
      labels: augment ? [row.id, row.label] : [row.label],
      values: row.values,
    })),
  };
}
