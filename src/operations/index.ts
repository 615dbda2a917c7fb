/**
 * Table operations
 *
 * Stage processors (extract, filter, annotate, collapse), the per-sample
 * pipeline that chains them, directory batches, and the sample-matrix and
 * taxonomy helpers.
 */

export { AnnotateProcessor, annotateTable, DEFAULT_LABEL_COLUMN, toLabelledTable } from "./annotate";
export {
  type BatchOptions,
  DEFAULT_INPUT_SUFFIX,
  DEFAULT_OUTPUT_SUFFIX,
  findBatchInputs,
  runBatch,
} from "./batch";
export { CollapseProcessor, collapseLabels } from "./collapse";
export { ExtractProcessor, extractFeatures, splitStratum } from "./extract";
export { FilterProcessor, filterByKeys, filterTable } from "./filter";
export {
  MERGE_VALUE_COLUMN,
  type MergeOptions,
  type MergeSource,
  mergedColumnNames,
  mergeFiles,
  mergeTables,
} from "./merge";
export {
  loadReferences,
  PipelineConfigSchema,
  type PipelineInputs,
  type PipelineReferences,
  type ReferenceSources,
  resolvePipelineConfig,
  runPipeline,
  sampleNameFromPath,
} from "./pipeline";
export {
  collapseTaxa,
  isTaxonLevel,
  type TaxaCollapseOptions,
  type TaxaStrategy,
  TAXON_LEVELS,
  TAXON_PREFIXES,
  type TaxonLevel,
} from "./taxa";
export type * from "./types";
