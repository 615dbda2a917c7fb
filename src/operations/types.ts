/**
 * Shared types and interfaces for table processors
 *
 * Each stage of the pathway pipeline is a processor: a pure, single-pass
 * transformation of one table, with the options that drive it and a result
 * that carries the counts the pipeline reports.
 */

import type { AbundanceTable } from "../formats/abundance";
import type { MappingTable, NameCatalog } from "../formats/mapping";

// =============================================================================
// POLICIES
// =============================================================================

/**
 * Which rows of a HUMAnN table become features
 *
 * - `none`: every row, as is
 * - `community`: unstratified rows only (`K00001`)
 * - `stratified`: per-taxon rows (`K00001|g__Genus.s__species`), summed per feature
 */
export type Stratification = "none" | "community" | "stratified";

/** What to do with a key mapped to several groups */
export type MultipleTargetPolicy = "first" | "explode";

/** What to do with a key that has no group */
export type UnmappedPolicy = "passthrough" | "drop";

/** Whether the label replaces the identifier column or follows it */
export type LabelMode = "replace" | "augment";

/** Whether rows sharing a label are summed */
export type CollapseMode = "none" | "sum";

// =============================================================================
// STAGE OPTIONS AND RESULTS
// =============================================================================

export interface ExtractOptions {
  stratification: Stratification;
  /** Keep stratified rows whose taxon is `unclassified` (default: false) */
  keepUnclassified?: boolean;
  /** Keep only features whose id matches */
  idPattern?: RegExp;
}

export interface FilterOptions {
  mapping: MappingTable;
}

export interface AnnotateOptions {
  mapping: MappingTable;
  catalog: NameCatalog;
  multiple: MultipleTargetPolicy;
  unmapped: UnmappedPolicy;
  label: LabelMode;
  /** Header of the label column (default: `Pathway_Name`) */
  labelColumn?: string;
}

export interface CollapseOptions {
  /** Header of the collapsed identifier column; the table's own when omitted */
  labelColumn?: string;
}

/**
 * A table and what a stage did to it
 */
export interface StageResult<TTable = AbundanceTable> {
  table: TTable;
  /** Rows in */
  input: number;
  /** Rows out */
  output: number;
  /** Rows removed by the stage */
  dropped: number;
}

/**
 * A row whose identifier has been resolved to a label
 */
export interface AnnotatedRow {
  /** The feature identifier the row came from */
  id: string;
  /** The group id the label was resolved from; absent for passthrough rows */
  target?: string;
  label: string;
  values: number[];
}

export interface AnnotatedTable {
  idColumn: string;
  labelColumn: string;
  mode: LabelMode;
  columns: string[];
  rows: AnnotatedRow[];
  source?: string;
}

export interface AnnotateResult extends StageResult<AnnotatedTable> {
  /** Rows whose key had no group */
  unmapped: number;
  /** Extra rows created by `explode` */
  exploded: number;
}

/**
 * Base interface for table processors
 *
 * @template TOptions - Options the stage takes
 * @template TInput - Table the stage reads
 * @template TResult - What the stage returns
 */
export interface TableProcessor<TOptions, TInput = AbundanceTable, TResult = StageResult> {
  process(table: TInput, options: TOptions): TResult;
}

// =============================================================================
// PIPELINE AND BATCH
// =============================================================================

/**
 * Validated pipeline configuration with every default applied
 */
export interface PipelineConfig {
  stratification: Stratification;
  keepUnclassified: boolean;
  idPattern?: RegExp;
  /** Restrict the mapping to this category before filtering */
  category?: string;
  multiple: MultipleTargetPolicy;
  unmapped: UnmappedPolicy;
  label: LabelMode;
  collapse: CollapseMode;
  labelColumn: string;
  /** Fixed decimals in the written table */
  precision?: number;
}

/**
 * Pipeline configuration as given by a caller (all fields optional)
 */
export interface PipelineConfigInput {
  stratification?: Stratification;
  keepUnclassified?: boolean;
  /** Regular expression source, e.g. `^K\d{5}$` */
  idPattern?: string;
  category?: string;
  multiple?: MultipleTargetPolicy;
  unmapped?: UnmappedPolicy;
  label?: LabelMode;
  collapse?: CollapseMode;
  labelColumn?: string;
  precision?: number;
}

/**
 * Row counts after each stage of one sample
 */
export interface StageCounts {
  read: number;
  extracted: number;
  filtered: number;
  annotated: number;
  written: number;
}

export type SampleStatus = "ok" | "empty";

export interface SampleReport {
  sample: string;
  input: string;
  output: string;
  status: SampleStatus;
  counts: StageCounts;
  /** Rows whose key had no group */
  unmapped: number;
}

export interface PipelineCallbacks {
  onWarning?: (message: string, sample: string) => void;
  onProgress?: (message: string, sample: string) => void;
}

export type BatchOutcome =
  | { sample: string; input: string; status: "ok" | "empty"; report: SampleReport }
  | { sample: string; input: string; status: "failed"; error: Error };

export interface BatchReport {
  outcomes: BatchOutcome[];
  ok: number;
  empty: number;
  failed: number;
}
