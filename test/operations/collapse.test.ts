/**
 * Tests for collapsing rows by label
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { CollapseProcessor, collapseLabels } from "../../src/operations/collapse";
import type { AnnotatedTable } from "../../src/operations/types";

function annotated(mode: AnnotatedTable["mode"]): AnnotatedTable {
  return {
    idColumn: "Gene Family",
    labelColumn: "Pathway_Name",
    mode,
    columns: ["S1", "S2"],
    rows: [
      { id: "K00001", target: "map00624", label: "Xenobiotics degradation", values: [1, 2] },
      { id: "K00002", target: "map00980", label: "Cytochrome P450", values: [3, 4] },
      { id: "K00003", target: "map00624", label: "Xenobiotics degradation", values: [5, 6] },
    ],
    source: "S1.tsv",
  };
}

describe("CollapseProcessor", () => {
  test("sums rows sharing a label in first-seen order", () => {
    const result = new CollapseProcessor().process(annotated("replace"));

    expect(result.table).toEqual({
      idColumn: "Pathway_Name",
      columns: ["S1", "S2"],
      rows: [
        { id: "Xenobiotics degradation", values: [6, 8] },
        { id: "Cytochrome P450", values: [3, 4] },
      ],
      source: "S1.tsv",
    });
    expect(result).toMatchObject({ input: 3, output: 2, dropped: 1 });
  });

  test("renames the identifier column when asked", () => {
    const { table } = collapseLabels(annotated("replace"), { labelColumn: "Pathway" });
    expect(table.idColumn).toBe("Pathway");
  });

  test("leaves the annotated rows untouched", () => {
    const table = annotated("replace");
    collapseLabels(table);

    expect(table.rows[0]?.values).toEqual([1, 2]);
  });

  test("refuses tables that keep their identifier column", () => {
    expect(() => collapseLabels(annotated("augment"))).toThrow(ValidationError);
  });
});
