/**
 * Directory batch mode
 *
 * Runs the pipeline once per matching file of a directory. The mapping and
 * name catalog are read once and shared read-only by every sample. A sample
 * that fails is recorded in the report and the batch moves on to the next
 * one, unless `failFast` is set.
 */

import { join } from "node:path";
import { type } from "arktype";
import { FileNotFoundError, SampleError, toXenomapError, ValidationError } from "../errors";
import { isDirectory, listDirectory } from "../io/file-reader";
import { ensureDirectory } from "../io/file-writer";
import { restrictToCategory } from "../formats/mapping";
import {
  loadReferences,
  type PipelineReferences,
  type ReferenceSources,
  runPipeline,
  sampleNameFromPath,
} from "./pipeline";
import type { BatchOutcome, BatchReport, PipelineCallbacks, PipelineConfig } from "./types";

export const DEFAULT_INPUT_SUFFIX = "_merged_genefamilies.tsv";
export const DEFAULT_OUTPUT_SUFFIX = "_xenobiotic_named.tsv";

export interface BatchOptions extends PipelineCallbacks {
  inputDir: string;
  outputDir: string;
  /** Mapping table, name catalog and mapping parser options */
  references: ReferenceSources | PipelineReferences;
  config: PipelineConfig;
  /** Input file suffix; the sample name is the file name without it */
  suffix?: string;
  outputSuffix?: string;
  /** Stop starting new samples after the first failure (default: false) */
  failFast?: boolean;
  /** Samples processed at once (default: 1) */
  concurrency?: number;
  /** Called once per finished sample; a throw is reported as a warning for that sample */
  onSample?: (outcome: BatchOutcome) => void;
}

const BatchOptionsSchema = type({
  inputDir: "string>0",
  outputDir: "string>0",
  "suffix?": "string>0",
  "outputSuffix?": "string>0",
  "failFast?": "boolean",
  "concurrency?": "number>=1",
}).narrow((options, ctx) => {
  if (options.concurrency !== undefined && !Number.isInteger(options.concurrency)) {
    return ctx.reject({
      path: ["concurrency"],
      expected: "a whole number of samples",
      actual: String(options.concurrency),
    });
  }
  return true;
});

interface BatchJob {
  index: number;
  sample: string;
  input: string;
  output: string;
}

/**
 * Find the batch inputs of a directory, sorted by file name
 *
 * @throws {FileNotFoundError} If the directory does not exist or holds no matching file
 */
export async function findBatchInputs(
  inputDir: string,
  suffix: string = DEFAULT_INPUT_SUFFIX
): Promise<{ sample: string; path: string }[]> {
  if (!(await isDirectory(inputDir))) {
    throw new FileNotFoundError(inputDir, "list", `Input directory not found: ${inputDir}`);
  }
  const names = (await listDirectory(inputDir)).filter(
    (name) => name.endsWith(suffix) && name.length > suffix.length
  );
  if (names.length === 0) {
    throw new FileNotFoundError(inputDir, "list", `No files ending in "${suffix}" found in ${inputDir}`);
  }
  return names.map((name) => ({
    sample: sampleNameFromPath(name, suffix),
    path: join(inputDir, name),
  }));
}

/**
 * Run the pipeline for every matching file of a directory
 *
 * @throws {FileNotFoundError} If there are no inputs
 * @throws {ValidationError} If the options are invalid
 * @throws Errors reading the shared mapping or catalog, which stop the whole batch
 *
 * @example
 * ```typescript
 * const report = await runBatch({
 *   inputDir: "regrouped/",
 *   outputDir: "xenobiotics/",
 *   references: { mapping: "ko_to_xenobiotic_maps.tsv" },
 *   config: resolvePipelineConfig(),
 * });
 * console.log(`${report.ok} ok, ${report.empty} empty, ${report.failed} failed`);
 * ```
 */
export async function runBatch(options: BatchOptions): Promise<BatchReport> {
  const validation = BatchOptionsSchema({
    inputDir: options.inputDir,
    outputDir: options.outputDir,
    ...(options.suffix !== undefined && { suffix: options.suffix }),
    ...(options.outputSuffix !== undefined && { outputSuffix: options.outputSuffix }),
    ...(options.failFast !== undefined && { failFast: options.failFast }),
    ...(options.concurrency !== undefined && { concurrency: options.concurrency }),
  });
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid batch options: ${validation.summary}`);
  }

  const suffix = options.suffix ?? DEFAULT_INPUT_SUFFIX;
  const outputSuffix = options.outputSuffix ?? DEFAULT_OUTPUT_SUFFIX;
  const inputs = await findBatchInputs(options.inputDir, suffix);

  const loaded =
    "catalog" in options.references ? options.references : await loadReferences(options.references);
  // Restrict once; a mapping without a category column fails here, not per sample
  const { category, ...sampleConfig } = options.config;
  const references: PipelineReferences =
    category !== undefined
      ? { ...loaded, mapping: restrictToCategory(loaded.mapping, category) }
      : loaded;

  await ensureDirectory(options.outputDir);

  const queue: BatchJob[] = inputs.map((input, index) => ({
    index,
    sample: input.sample,
    input: input.path,
    output: join(options.outputDir, `${input.sample}${outputSuffix}`),
  }));
  const outcomes: (BatchOutcome | undefined)[] = queue.map(() => undefined);
  let stopped = false;

  const warn =
    options.onWarning ?? ((message: string, name: string) => console.warn(`Warning [${name}]: ${message}`));
  const callbacks: PipelineCallbacks = {
    ...(options.onWarning !== undefined && { onWarning: options.onWarning }),
    ...(options.onProgress !== undefined && { onProgress: options.onProgress }),
  };

  const runJob = async (job: BatchJob): Promise<BatchOutcome> => {
    try {
      const report = await runPipeline(
        { abundance: job.input, output: job.output, sample: job.sample, references },
        sampleConfig,
        callbacks
      );
      return { sample: job.sample, input: job.input, status: report.status, report };
    } catch (error) {
      const failure =
        error instanceof SampleError ? error : new SampleError(job.sample, toXenomapError(error));
      return { sample: job.sample, input: job.input, status: "failed", error: failure };
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency ?? 1, queue.length));
  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0 && !stopped) {
      const job = queue.shift();
      if (job === undefined) continue;

      const outcome = await runJob(job);
      outcomes[job.index] = outcome;
      try {
        options.onSample?.(outcome);
      } catch (error) {
        warn(`sample callback failed: ${toXenomapError(error).message}`, job.sample);
      }
      if (outcome.status === "failed" && options.failFast === true) {
        stopped = true;
      }
    }
  });
  await Promise.all(workers);

  const finished = outcomes.filter((outcome): outcome is BatchOutcome => outcome !== undefined);
  return {
    outcomes: finished,
    ok: finished.filter((outcome) => outcome.status === "ok").length,
    empty: finished.filter((outcome) => outcome.status === "empty").length,
    failed: finished.filter((outcome) => outcome.status === "failed").length,
  };
}
