/**
 * xenomap - xenobiotic degradation pathways from metagenomic abundance tables
 *
 * Reads HUMAnN regrouped gene-family tables, keeps the KEGG Orthology
 * features that belong to xenobiotic biodegradation pathways and labels them
 * with pathway names, one sample or a whole directory at a time.
 *
 * @example
 * ```typescript
 * import { loadReferences, resolvePipelineConfig, runPipeline } from 'xenomap';
 *
 * const references = await loadReferences({ mapping: 'ko_to_xenobiotic_maps.tsv' });
 * const report = await runPipeline(
 *   { abundance: 'S1_merged_genefamilies.tsv', output: 'S1_xenobiotic_named.tsv', references },
 *   resolvePipelineConfig()
 * );
 * ```
 */

// Compression infrastructure
export { CompressionDetector, CompressionService, GzipCodec } from './compression';
// Error types
export {
  CompressionError,
  DSVParseError,
  FileError,
  FileNotFoundError,
  MalformedTableError,
  type MalformedReason,
  MissingArgumentError,
  ParseError,
  SampleError,
  toXenomapError,
  ValidationError,
  XenomapError,
} from './errors';
// Formats
export * from './formats';
// File I/O
export { exists, FileReader, isDirectory, listDirectory, readBytes, readToString } from './io/file-reader';
export { ensureDirectory, writeString, writeStringAtomic } from './io/file-writer';
// Operations
export * from './operations';
// CLI entry
export { type CliOutput, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, run } from './cli';
// Shared types
export type {
  CompressionDetection,
  CompressionFormat,
  FilePath,
  FileReaderOptions,
  ParserOptions,
  WriteOptions,
} from './types';
