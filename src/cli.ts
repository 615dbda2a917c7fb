/**
 * Command-line interface
 *
 * Usage:
 *   xenomap run --abundance S1_merged_genefamilies.tsv --mapping ko_map.tsv --output S1.tsv
 *   xenomap batch --input-dir regrouped/ --output-dir named/ --mapping ko_map.tsv
 *   xenomap filter --abundance S1.tsv --mapping ko_map.tsv --output S1_filtered.tsv
 *   xenomap annotate --input S1_filtered.tsv --mapping ko_map.tsv --output S1_named.tsv
 *   xenomap merge --input-dir named/ --output matrix.tsv
 *   xenomap collapse-taxa --input merged_bugs.tsv --output genus.tsv --level genus
 *
 * Exit codes: 0 on success (including samples with no matching rows),
 * 1 when processing fails, 2 on a usage error.
 */

import { parseArgs } from "node:util";
import { MissingArgumentError, toXenomapError, ValidationError, XenomapError } from "./errors";
import { AbundanceParser, AbundanceWriter, type ColumnSelector } from "./formats/abundance";
import { type MappingParserOptions, restrictToCategory } from "./formats/mapping";
import { annotateTable, toLabelledTable } from "./operations/annotate";
import { DEFAULT_INPUT_SUFFIX, DEFAULT_OUTPUT_SUFFIX, findBatchInputs, runBatch } from "./operations/batch";
import { collapseLabels } from "./operations/collapse";
import { extractFeatures } from "./operations/extract";
import { filterTable } from "./operations/filter";
import { mergeFiles } from "./operations/merge";
import { loadReferences, resolvePipelineConfig, runPipeline } from "./operations/pipeline";
import { collapseTaxa, isTaxonLevel, type TaxaStrategy, TAXON_LEVELS } from "./operations/taxa";
import type { PipelineConfig, PipelineConfigInput } from "./operations/types";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Where the CLI prints; tests pass their own
 */
export interface CliOutput {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleOutput: CliOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const COMMANDS = ["run", "batch", "filter", "annotate", "merge", "collapse-taxa"] as const;
type Command = (typeof COMMANDS)[number];

const OPTIONS = {
  input: { type: "string", short: "i" },
  abundance: { type: "string", short: "a" },
  mapping: { type: "string", short: "m" },
  output: { type: "string", short: "o" },
  "input-dir": { type: "string" },
  "output-dir": { type: "string" },
  names: { type: "string" },
  category: { type: "string" },
  stratification: { type: "string" },
  "keep-unclassified": { type: "boolean" },
  "id-pattern": { type: "string" },
  multiple: { type: "string" },
  unmapped: { type: "string" },
  label: { type: "string" },
  "label-column": { type: "string" },
  collapse: { type: "string" },
  precision: { type: "string" },
  "key-column": { type: "string" },
  "target-column": { type: "string" },
  "category-column": { type: "string" },
  columns: { type: "string" },
  suffix: { type: "string" },
  "output-suffix": { type: "string" },
  "fail-fast": { type: "boolean" },
  concurrency: { type: "string" },
  level: { type: "string" },
  strategy: { type: "string" },
  quiet: { type: "boolean", short: "q" },
  help: { type: "boolean", short: "h" },
} as const;

type CliValues = ReturnType<typeof parseCommandLine>["values"];

const USAGE = `Usage: xenomap <command> [options]

Commands:
  run            --abundance <path> --mapping <path> --output <path>
  batch          --input-dir <dir> --output-dir <dir> --mapping <path>
  filter         --abundance <path> --mapping <path> --output <path>
  annotate       --abundance <path> --mapping <path> --output <path>
  merge          --input-dir <dir> --output <path>
  collapse-taxa  --input <path> --output <path> [--level genus]

Pipeline options:
  --category <name>           Restrict the mapping to a category (e.g. xenobiotics)
  --names <path>              Name catalog TSV (default: built-in KEGG xenobiotic pathways)
  --stratification <mode>     none | community | stratified (default: stratified)
  --keep-unclassified         Keep unclassified taxa in stratified mode
  --id-pattern <regex>        Keep only features matching, e.g. '^K\\d{5}$'
  --multiple <policy>         first | explode (default: explode)
  --unmapped <policy>         passthrough | drop (default: drop)
  --label <mode>              replace | augment (default: replace)
  --label-column <name>       Header of the label column (default: Pathway_Name)
  --collapse <mode>           sum | none (default: sum with --label replace)
  --precision <digits>        Fixed decimals in written tables
  --key-column <name>         Mapping key column (default: KO)
  --target-column <name>      Mapping target column (default: Map)
  --category-column <name>    Mapping category column (default: Category, if present)

Batch and merge options:
  --suffix <text>             Input file suffix (batch: ${DEFAULT_INPUT_SUFFIX}, merge: .tsv)
  --output-suffix <text>      Output file suffix (default: ${DEFAULT_OUTPUT_SUFFIX})
  --fail-fast                 Stop after the first failed sample
  --concurrency <n>           Samples processed at once (default: 1)
  --columns <list>            Value columns to read (names or 0-based indexes;
                              merge default: 2, the third column)

Taxa options:
  --level <rank>              ${TAXON_LEVELS.join(" | ")} | all (default: genus)
  --strategy <mode>           terminal | descendants (default: terminal)

  -q, --quiet                 Only print warnings and errors
  -h, --help                  Show this help`;

/**
 * A command line that cannot be run as given
 */
class UsageError extends XenomapError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

function parseCommandLine(args: string[]) {
  return parseArgs({ args, options: OPTIONS, strict: true, allowPositionals: false });
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function required(values: CliValues, name: "input" | "mapping" | "output" | "input-dir" | "output-dir"): string {
  const value = values[name];
  if (value === undefined || value === "") {
    throw new MissingArgumentError(name);
  }
  return value;
}

function abundancePath(values: CliValues): string {
  const value = values.abundance ?? values.input;
  if (value === undefined || value === "") {
    throw new MissingArgumentError("abundance");
  }
  return value;
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

function parseColumns(value: string | undefined): ColumnSelector[] | undefined {
  if (value === undefined) return undefined;
  const columns = value
    .split(",")
    .map((column) => column.trim())
    .filter((column) => column !== "")
    .map((column) => (/^\d+$/.test(column) ? Number(column) : column));
  if (columns.length === 0) {
    throw new ValidationError("--columns needs at least one column");
  }
  return columns;
}

function mappingOptions(values: CliValues): Omit<MappingParserOptions, "source"> {
  return {
    ...(values["key-column"] !== undefined && { keyColumn: values["key-column"] }),
    ...(values["target-column"] !== undefined && { targetColumn: values["target-column"] }),
    ...(values["category-column"] !== undefined && { categoryColumn: values["category-column"] }),
  };
}

/**
 * Build the pipeline configuration from the command line
 *
 * Enumerated values are passed through unchecked; the configuration schema
 * rejects anything outside them.
 */
function pipelineConfig(values: CliValues): PipelineConfig {
  const input: Record<string, unknown> = {};
  const set = (key: keyof PipelineConfigInput, value: unknown): void => {
    if (value !== undefined) input[key] = value;
  };
  set("stratification", values.stratification);
  set("keepUnclassified", values["keep-unclassified"]);
  set("idPattern", values["id-pattern"]);
  set("category", values.category);
  set("multiple", values.multiple);
  set("unmapped", values.unmapped);
  set("label", values.label);
  set("collapse", values.collapse);
  set("labelColumn", values["label-column"]);
  set("precision", parseInteger("precision", values.precision));
  return resolvePipelineConfig(input);
}

function writerFor(config: PipelineConfig): AbundanceWriter {
  return new AbundanceWriter(config.precision !== undefined ? { precision: config.precision } : {});
}

function errorLine(error: unknown): string {
  const xenomapError = toXenomapError(error);
  return xenomapError.lineNumber !== undefined && !xenomapError.message.includes(`line ${xenomapError.lineNumber}`)
    ? `Error: ${xenomapError.message} (line ${xenomapError.lineNumber})`
    : `Error: ${xenomapError.message}`;
}

// =============================================================================
// COMMANDS
// =============================================================================

interface CommandContext {
  values: CliValues;
  out: CliOutput;
  progress: (line: string) => void;
}

async function runCommand(ctx: CommandContext, config: PipelineConfig): Promise<number> {
  const { values, out, progress } = ctx;
  const abundance = abundancePath(values);
  const mapping = required(values, "mapping");
  const output = required(values, "output");
  const columns = parseColumns(values.columns);

  const references = await loadReferences({
    mapping,
    ...(values.names !== undefined && { names: values.names }),
    mappingOptions: mappingOptions(values),
  });
  const report = await runPipeline(
    { abundance, output, references, ...(columns !== undefined && { columns }) },
    config,
    {
      onWarning: (message, sample) => out.stderr(`Warning [${sample}]: ${message}`),
      onProgress: (message, sample) => progress(`[${sample}] ${message}`),
    }
  );
  progress(`${report.sample}: ${report.status} (${report.counts.written} rows) -> ${report.output}`);
  return EXIT_OK;
}

async function batchCommand(ctx: CommandContext, config: PipelineConfig): Promise<number> {
  const { values, out, progress } = ctx;
  const inputDir = required(values, "input-dir");
  const outputDir = required(values, "output-dir");
  const mapping = required(values, "mapping");
  const concurrency = parseInteger("concurrency", values.concurrency);

  const report = await runBatch({
    inputDir,
    outputDir,
    references: {
      mapping,
      ...(values.names !== undefined && { names: values.names }),
      mappingOptions: mappingOptions(values),
    },
    config,
    ...(values.suffix !== undefined && { suffix: values.suffix }),
    ...(values["output-suffix"] !== undefined && { outputSuffix: values["output-suffix"] }),
    ...(values["fail-fast"] !== undefined && { failFast: values["fail-fast"] }),
    ...(concurrency !== undefined && { concurrency }),
    onWarning: (message, sample) => out.stderr(`Warning [${sample}]: ${message}`),
    onProgress: (message, sample) => progress(`[${sample}] ${message}`),
    onSample: (outcome) => {
      if (outcome.status === "failed") {
        out.stderr(errorLine(outcome.error));
      }
    },
  });

  progress(
    `Processed ${report.outcomes.length} sample(s): ${report.ok} ok, ${report.empty} empty, ${report.failed} failed`
  );
  return report.failed > 0 ? EXIT_FAILURE : EXIT_OK;
}

async function filterCommand(ctx: CommandContext, config: PipelineConfig): Promise<number> {
  const { values, out, progress } = ctx;
  const abundance = abundancePath(values);
  const mappingPath = required(values, "mapping");
  const output = required(values, "output");
  const columns = parseColumns(values.columns);

  const { mapping: loaded } = await loadReferences({ mapping: mappingPath, mappingOptions: mappingOptions(values) });
  const mapping = config.category !== undefined ? restrictToCategory(loaded, config.category) : loaded;
  const table = await new AbundanceParser({
    source: abundance,
    ...(columns !== undefined && { columns }),
  }).parseFile(abundance);

  const extracted = extractFeatures(table, {
    stratification: config.stratification,
    keepUnclassified: config.keepUnclassified,
    ...(config.idPattern !== undefined && { idPattern: config.idPattern }),
  });
  const filtered = filterTable(extracted.table, { mapping });
  if (filtered.output === 0) {
    out.stderr(`Warning: no rows of ${abundance} matched the mapping; wrote header only`);
  }

  await writerFor(config).writeFile(output, filtered.table, { atomic: true });
  progress(`${filtered.output} of ${filtered.input} rows kept (${filtered.dropped} dropped) -> ${output}`);
  return EXIT_OK;
}

async function annotateCommand(ctx: CommandContext, config: PipelineConfig): Promise<number> {
  const { values, out, progress } = ctx;
  const input = abundancePath(values);
  const mappingPath = required(values, "mapping");
  const output = required(values, "output");
  const columns = parseColumns(values.columns);

  const references = await loadReferences({
    mapping: mappingPath,
    ...(values.names !== undefined && { names: values.names }),
    mappingOptions: mappingOptions(values),
  });
  const mapping =
    config.category !== undefined ? restrictToCategory(references.mapping, config.category) : references.mapping;
  const table = await new AbundanceParser({
    source: input,
    ...(columns !== undefined && { columns }),
  }).parseFile(input);

  const annotated = annotateTable(table, {
    mapping,
    catalog: references.catalog,
    multiple: config.multiple,
    unmapped: config.unmapped,
    label: config.label,
    labelColumn: config.labelColumn,
  });
  if (annotated.unmapped > 0) {
    out.stderr(
      `Warning: ${annotated.unmapped} row(s) without a mapped group were ${config.unmapped === "drop" ? "dropped" : "kept under their own id"}`
    );
  }

  const writer = writerFor(config);
  if (config.collapse === "sum") {
    const collapsed = collapseLabels(annotated.table);
    await writer.writeFile(output, collapsed.table, { atomic: true });
    progress(`${collapsed.output} label(s) from ${annotated.input} rows -> ${output}`);
  } else {
    await writer.writeLabelledFile(output, toLabelledTable(annotated.table), { atomic: true });
    progress(`${annotated.output} row(s) from ${annotated.input} rows -> ${output}`);
  }
  return EXIT_OK;
}

async function mergeCommand(ctx: CommandContext, config: PipelineConfig): Promise<number> {
  const { values, progress } = ctx;
  const inputDir = required(values, "input-dir");
  const output = required(values, "output");
  const columns = parseColumns(values.columns);

  const inputs = await findBatchInputs(inputDir, values.suffix ?? ".tsv");
  const merged = await mergeFiles(
    inputs.map((input) => ({ name: input.sample, path: input.path })),
    columns !== undefined ? { columns } : {}
  );
  await writerFor(config).writeFile(output, merged, { atomic: true });
  progress(`Merged ${inputs.length} table(s): ${merged.rows.length} rows, ${merged.columns.length} columns -> ${output}`);
  return EXIT_OK;
}

async function collapseTaxaCommand(ctx: CommandContext, config: PipelineConfig): Promise<number> {
  const { values, out, progress } = ctx;
  const input = required(values, "input");
  const output = required(values, "output");
  const columns = parseColumns(values.columns);

  const level = values.level ?? "genus";
  if (level !== "all" && !isTaxonLevel(level)) {
    throw new UsageError(`Invalid --level "${level}"; expected ${TAXON_LEVELS.join(", ")} or all`);
  }
  const strategy = values.strategy ?? "terminal";
  if (strategy !== "terminal" && strategy !== "descendants") {
    throw new UsageError(`Invalid --strategy "${strategy}"; expected terminal or descendants`);
  }
  const taxaStrategy: TaxaStrategy = strategy;

  const table = await new AbundanceParser({
    source: input,
    ...(columns !== undefined && { columns }),
  }).parseFile(input);
  const collapsed = collapseTaxa(table, { level, strategy: taxaStrategy });
  if (collapsed.output === 0) {
    out.stderr(`Warning: no taxa matched level ${level}; wrote header only`);
  }

  await writerFor(config).writeFile(output, collapsed.table, { atomic: true });
  progress(`Reduced ${collapsed.input} clades to ${collapsed.output} at level ${level} -> ${output}`);
  return EXIT_OK;
}

const HANDLERS: Record<Command, (ctx: CommandContext, config: PipelineConfig) => Promise<number>> = {
  run: runCommand,
  batch: batchCommand,
  filter: filterCommand,
  annotate: annotateCommand,
  merge: mergeCommand,
  "collapse-taxa": collapseTaxaCommand,
};

/**
 * Run the CLI and return its exit code
 */
export async function run(argv: string[], out: CliOutput = consoleOutput): Promise<number> {
  const [command, ...rest] = argv;

  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    (command === undefined ? out.stderr : out.stdout)(USAGE);
    return command === undefined ? EXIT_USAGE : EXIT_OK;
  }
  if (!isCommand(command)) {
    out.stderr(`Error: Unknown command "${command}"\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  // Usage errors: anything wrong with the command line itself
  let values: CliValues;
  let config: PipelineConfig;
  try {
    values = parseCommandLine(rest).values;
    if (values.help === true) {
      out.stdout(USAGE);
      return EXIT_OK;
    }
    config = pipelineConfig(values);
  } catch (error) {
    out.stderr(errorLine(error));
    return EXIT_USAGE;
  }

  const progress = values.quiet === true ? () => {} : out.stdout;
  try {
    return await HANDLERS[command]({ values, out, progress }, config);
  } catch (error) {
    out.stderr(errorLine(error));
    const usage =
      error instanceof MissingArgumentError ||
      error instanceof UsageError ||
      error instanceof ValidationError;
    return usage ? EXIT_USAGE : EXIT_FAILURE;
  }
}
