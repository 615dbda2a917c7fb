/**
 * Collapse MetaPhlAn clade tables to one taxonomic level
 *
 * Clade paths look like `k__Bacteria|p__Bacteroidetes|...|g__Bacteroides`.
 * Collapsing to `genus` keeps the genus name (`Bacteroides`) and sums every
 * row that belongs to it. Clades from uncharacterised genome bins (`GGB`)
 * are dropped.
 */

import { ValidationError } from "../errors";
import type { AbundanceTable } from "../formats/abundance";
import type { StageResult } from "./types";

export type TaxonLevel = "kingdom" | "phylum" | "class" | "order" | "family" | "genus" | "species";

/**
 * Which rows count towards a taxon
 *
 * - `terminal`: rows whose last rank is the level; MetaPhlAn tables list
 *   every ancestor with its cumulative abundance, so this counts each
 *   read once
 * - `descendants`: every row that reaches the level, including deeper ranks
 */
export type TaxaStrategy = "terminal" | "descendants";

export const TAXON_PREFIXES: Readonly<Record<TaxonLevel, string>> = {
  kingdom: "k__",
  phylum: "p__",
  class: "c__",
  order: "o__",
  family: "f__",
  genus: "g__",
  species: "s__",
};

export const TAXON_LEVELS: readonly TaxonLevel[] = [
  "kingdom",
  "phylum",
  "class",
  "order",
  "family",
  "genus",
  "species",
];

export interface TaxaCollapseOptions {
  level: TaxonLevel | "all";
  strategy?: TaxaStrategy;
  /** Clades containing this marker are dropped (default: `GGB`) */
  dropMarker?: string;
}

export function isTaxonLevel(value: string): value is TaxonLevel {
  return TAXON_LEVELS.some((level) => level === value);
}

/**
 * Collapse a clade table to one level
 *
 * With level `all` the table keeps every clade (minus dropped ones).
 *
 * @throws {ValidationError} On an unknown level
 */
export function collapseTaxa(table: AbundanceTable, options: TaxaCollapseOptions): StageResult {
  const marker = options.dropMarker ?? "GGB";
  const strategy = options.strategy ?? "terminal";
  const kept = table.rows.filter((row) => marker === "" || !row.id.includes(marker));

  if (options.level === "all") {
    return {
      table: { ...table, rows: kept },
      input: table.rows.length,
      output: kept.length,
      dropped: table.rows.length - kept.length,
    };
  }
  if (!isTaxonLevel(options.level)) {
    throw new ValidationError(
      `Invalid taxonomic level "${String(options.level)}"; expected one of ${TAXON_LEVELS.join(", ")} or all`
    );
  }

  const prefix = TAXON_PREFIXES[options.level];
  const totals = new Map<string, number[]>();

  for (const row of kept) {
    const ranks = row.id.split("|");
    const index = ranks.findIndex((rank) => rank.startsWith(prefix));
    if (index < 0) continue;
    if (strategy === "terminal" && index !== ranks.length - 1) continue;

    const name = (ranks[index] ?? "").slice(prefix.length);
    const total = totals.get(name);
    if (total === undefined) {
      totals.set(name, [...row.values]);
    } else {
      row.values.forEach((value, i) => {
        total[i] = (total[i] ?? 0) + value;
      });
    }
  }

  const rows = Array.from(totals, ([id, values]) => ({ id, values }));
  return {
    table: { ...table, rows },
    input: table.rows.length,
    output: rows.length,
    dropped: table.rows.length - rows.length,
  };
}
