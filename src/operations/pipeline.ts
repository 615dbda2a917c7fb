/**
 * Per-sample pathway pipeline
 *
 * read → extract → filter → annotate → collapse → write
 *
 * Each run owns its intermediate state: tables stay in memory and the output
 * is staged in a temporary directory created beside it, so concurrent runs
 * never share paths. A sample whose filtered table is empty still gets a
 * header-only output and an `empty` report.
 */

import { basename } from "node:path";
import { type } from "arktype";
import { SampleError, toXenomapError, ValidationError } from "../errors";
import { type AbundanceParserOptions, AbundanceParser, AbundanceWriter } from "../formats/abundance";
import {
  loadBuiltinCatalog,
  loadNameCatalog,
  type MappingParserOptions,
  MappingParser,
  type MappingTable,
  type NameCatalog,
  restrictToCategory,
} from "../formats/mapping";
import { annotateTable, DEFAULT_LABEL_COLUMN, toLabelledTable } from "./annotate";
import { collapseLabels } from "./collapse";
import { extractFeatures } from "./extract";
import { filterTable } from "./filter";
import type {
  PipelineCallbacks,
  PipelineConfig,
  PipelineConfigInput,
  SampleReport,
  StageCounts,
} from "./types";

/**
 * ArkType schema for caller-supplied pipeline configuration
 */
export const PipelineConfigSchema = type({
  "stratification?": '"none"|"community"|"stratified"',
  "keepUnclassified?": "boolean",
  "idPattern?": "string>0",
  "category?": "string>0",
  "multiple?": '"first"|"explode"',
  "unmapped?": '"passthrough"|"drop"',
  "label?": '"replace"|"augment"',
  "collapse?": '"none"|"sum"',
  "labelColumn?": "string>0",
  "precision?": "0<=number<=20",
}).narrow((config, ctx) => {
  if (config.collapse === "sum" && config.label === "augment") {
    return ctx.reject({
      path: ["collapse"],
      expected: 'collapse "none" when label is "augment"',
      actual: '"sum"',
    });
  }
  if (config.precision !== undefined && !Number.isInteger(config.precision)) {
    return ctx.reject({
      path: ["precision"],
      expected: "an integer number of decimals",
      actual: String(config.precision),
    });
  }
  return true;
});

/**
 * Validate a pipeline configuration and apply defaults
 *
 * Defaults: `stratification=stratified` (classified taxa only),
 * `multiple=explode`,
 * `unmapped=drop`, `label=replace`, `collapse=sum` (`none` with
 * `label=augment`), `labelColumn=Pathway_Name`.
 *
 * @throws {ValidationError} On an unknown option value or an invalid id pattern
 */
export function resolvePipelineConfig(
  input: PipelineConfigInput | Record<string, unknown> = {}
): PipelineConfig {
  const valid = PipelineConfigSchema(input);
  if (valid instanceof type.errors) {
    throw new ValidationError(`Invalid pipeline configuration: ${valid.summary}`);
  }

  const label = valid.label ?? "replace";
  const config: PipelineConfig = {
    stratification: valid.stratification ?? "stratified",
    keepUnclassified: valid.keepUnclassified ?? false,
    multiple: valid.multiple ?? "explode",
    unmapped: valid.unmapped ?? "drop",
    label,
    collapse: valid.collapse ?? (label === "replace" ? "sum" : "none"),
    labelColumn: valid.labelColumn ?? DEFAULT_LABEL_COLUMN,
  };

  if (valid.idPattern !== undefined) {
    try {
      config.idPattern = new RegExp(valid.idPattern);
    } catch (error) {
      throw new ValidationError(
        `Invalid id pattern "${valid.idPattern}": ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
  if (valid.category !== undefined) {
    config.category = valid.category;
  }
  if (valid.precision !== undefined) {
    config.precision = valid.precision;
  }
  return config;
}

/**
 * The mapping and name catalog shared by every sample of a run
 */
export interface PipelineReferences {
  mapping: MappingTable;
  catalog: NameCatalog;
}

export interface ReferenceSources {
  /** Mapping table path */
  mapping: string;
  /** Name catalog TSV; the built-in xenobiotic catalog when omitted */
  names?: string;
  mappingOptions?: Omit<MappingParserOptions, "source">;
}

/**
 * Read the mapping table and name catalog once
 */
export async function loadReferences(sources: ReferenceSources): Promise<PipelineReferences> {
  const normalize = sources.mappingOptions?.normalizePathwayIds;
  const [mapping, catalog] = await Promise.all([
    new MappingParser(sources.mappingOptions).parseFile(sources.mapping),
    sources.names !== undefined
      ? loadNameCatalog(sources.names, { normalizePathwayIds: normalize })
      : loadBuiltinCatalog(),
  ]);
  return { mapping, catalog };
}

/**
 * Sample name from a file name: the base name without `.gz` and a table
 * extension (`.tsv`, `.txt`, `.csv`)
 */
export function sampleNameFromPath(path: string, suffix?: string): string {
  const name = basename(path);
  if (suffix !== undefined && name.endsWith(suffix) && name.length > suffix.length) {
    return name.slice(0, -suffix.length);
  }
  return name.replace(/\.gz$/, "").replace(/\.(tsv|txt|csv)$/, "");
}

export interface PipelineInputs {
  /** Abundance table path */
  abundance: string;
  /** Output table path (`.gz` for gzip) */
  output: string;
  /** Sample name for reports and errors; derived from the input path when omitted */
  sample?: string;
  references: PipelineReferences;
  /** Value columns to read, for tables with non-numeric columns */
  columns?: AbundanceParserOptions["columns"];
}

/**
 * Run the pipeline for one sample
 *
 * @throws {SampleError} Wrapping whatever stopped the sample (missing file,
 * malformed table, write failure)
 *
 * @example
 * ```typescript
 * const references = await loadReferences({ mapping: "ko_to_xenobiotic_maps.tsv" });
 * const report = await runPipeline(
 *   { abundance: "S1_merged_genefamilies.tsv", output: "S1_xenobiotic_named.tsv", references },
 *   resolvePipelineConfig({ category: "xenobiotics" })
 * );
 * console.log(report.status, report.counts.written);
 * ```
 */
export async function runPipeline(
  inputs: PipelineInputs,
  config: PipelineConfig,
  callbacks: PipelineCallbacks = {}
): Promise<SampleReport> {
  const sample = inputs.sample ?? sampleNameFromPath(inputs.abundance);
  const warn =
    callbacks.onWarning ?? ((message: string, name: string) => console.warn(`Warning [${name}]: ${message}`));
  const progress = callbacks.onProgress ?? ((message: string, name: string) => console.log(`[${name}] ${message}`));

  try {
    const table = await new AbundanceParser({
      source: inputs.abundance,
      ...(inputs.columns !== undefined && { columns: inputs.columns }),
    }).parseFile(inputs.abundance);

    const extracted = extractFeatures(table, {
      stratification: config.stratification,
      keepUnclassified: config.keepUnclassified,
      ...(config.idPattern !== undefined && { idPattern: config.idPattern }),
    });

    const mapping =
      config.category !== undefined
        ? restrictToCategory(inputs.references.mapping, config.category)
        : inputs.references.mapping;
    const filtered = filterTable(extracted.table, { mapping });

    const annotated = annotateTable(filtered.table, {
      mapping,
      catalog: inputs.references.catalog,
      multiple: config.multiple,
      unmapped: config.unmapped,
      label: config.label,
      labelColumn: config.labelColumn,
    });

    const writer = new AbundanceWriter(
      config.precision !== undefined ? { precision: config.precision } : {}
    );
    let written: number;
    if (config.collapse === "sum") {
      const collapsed = collapseLabels(annotated.table);
      await writer.writeFile(inputs.output, collapsed.table, { atomic: true });
      written = collapsed.output;
    } else {
      await writer.writeLabelledFile(inputs.output, toLabelledTable(annotated.table), {
        atomic: true,
      });
      written = annotated.output;
    }

    const counts: StageCounts = {
      read: table.rows.length,
      extracted: extracted.output,
      filtered: filtered.output,
      annotated: annotated.output,
      written,
    };
    const status = written === 0 ? "empty" : "ok";

    if (status === "empty") {
      warn(`no rows left after filtering (${counts.extracted} features read); wrote header only`, sample);
    }
    progress(
      `${counts.read} rows read, ${counts.filtered} kept, ${counts.written} written to ${inputs.output}`,
      sample
    );

    return {
      sample,
      input: inputs.abundance,
      output: inputs.output,
      status,
      counts,
      unmapped: annotated.unmapped,
    };
  } catch (error) {
    throw new SampleError(sample, toXenomapError(error));
  }
}
