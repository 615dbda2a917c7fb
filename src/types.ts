/**
 * Shared types and ArkType schemas
 *
 * Types used across the I/O, compression and format layers. Table-specific
 * types live beside their parsers in `formats/`.
 */

import { type } from "arktype";

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * Parser configuration options shared by every table parser
 */
export interface ParserOptions {
  /** Name reported in errors, usually the file path or sample name */
  source?: string;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler; the default throws */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler; the default writes to console.warn */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// COMPRESSION
// =============================================================================

/**
 * Compression formats understood on read and write
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Compression detection result with confidence scoring
 */
export interface CompressionDetection {
  /** Detected compression format */
  readonly format: CompressionFormat;
  /** Detection confidence level (0-1) */
  readonly confidence: number;
  /** How the format was determined */
  readonly detectionMethod: "magic-bytes" | "extension" | "none";
}

export const CompressionFormatSchema = type('"gzip"|"none"');

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * Branded type for validated file paths
 * Ensures file paths have been validated before use in I/O operations
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading options
 */
export interface FileReaderOptions {
  /** Maximum file size to prevent memory exhaustion (default: 1GB) */
  readonly maxFileSize?: number;
  /** Whether to detect and decompress gzip input (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression detection (default: auto-detect) */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File writing options
 *
 * Mirrors FileReaderOptions for symmetric read/write API design.
 */
export interface WriteOptions {
  /** Compress based on file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression detection (default: from extension) */
  readonly compressionFormat?: CompressionFormat;
  /** Gzip level 1-9 (default: 6) */
  readonly compressionLevel?: number;
}

/**
 * File path validation schema
 *
 * Rejects empty paths and embedded NUL bytes, and collapses repeated
 * separators.
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  const normalized = path.replace(/[\\/]+/g, "/");
  return normalized as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "maxFileSize?": "number>0",
  "autoDecompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
});

/**
 * File writer options validation schema
 */
export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
  "compressionLevel?": "1<=number<=9",
});
