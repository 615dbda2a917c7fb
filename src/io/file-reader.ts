/**
 * File reading utilities
 *
 * Promise-based wrappers over the @effect/platform FileSystem service. Tables
 * are bounded files, so reads load the whole file and decompress gzip input
 * transparently.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError, FileNotFoundError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { runWithPlatform } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  maxFileSize: 1_073_741_824, // 1GB
  autoDecompress: true,
  compressionFormat: "none",
};

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);
  return runWithPlatform(statType(validatedPath, "stat").pipe(Effect.map((t) => t === "File")));
}

/**
 * Check if a path exists and is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);
  return runWithPlatform(
    statType(validatedPath, "stat").pipe(Effect.map((t) => t === "Directory"))
  );
}

/**
 * Read an entire file into memory, decompressing gzip input
 *
 * @throws {FileNotFoundError} If the path does not name an existing file
 * @throws {FileError} If the file is too large or cannot be read
 * @throws {CompressionError} If gzip input is corrupted
 */
export async function readBytes(path: string, options: FileReaderOptions = {}): Promise<Uint8Array> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const info = yield* fs.stat(validatedPath);
    if (info.type !== "File") {
      return yield* Effect.fail(
        new FileError(`Not a regular file: ${validatedPath}`, validatedPath, "read")
      );
    }
    const size = Number(info.size);
    if (size > mergedOptions.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${size} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
          validatedPath,
          "read"
        )
      );
    }

    const raw = yield* fs.readFile(validatedPath);
    if (!mergedOptions.autoDecompress) {
      return raw;
    }

    const format =
      mergedOptions.compressionFormat !== "none"
        ? mergedOptions.compressionFormat
        : CompressionDetector.detect(raw, validatedPath).format;

    const compression = yield* CompressionService;
    return yield* compression.decompress(raw, format);
  }).pipe(
    Effect.mapError((error) => toReadError("read", validatedPath, error)),
    Effect.provide(CompressionService.Live)
  );

  return runWithPlatform(program);
}

/**
 * Read entire file to string (UTF-8)
 *
 * @example
 * ```typescript
 * const text = await readToString('sample_regroup.tsv.gz');
 * ```
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const bytes = await readBytes(path, options);
  return new TextDecoder().decode(bytes);
}

/**
 * List the entries of a directory, sorted by name
 *
 * @throws {FileNotFoundError} If the directory does not exist
 */
export async function listDirectory(path: string): Promise<string[]> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const entries = yield* fs.readDirectory(validatedPath);
    return [...entries].sort();
  }).pipe(Effect.mapError((error) => toReadError("list", validatedPath, error)));

  return runWithPlatform(program);
}

export const FileReader = {
  exists,
  isDirectory,
  readBytes,
  readToString,
  listDirectory,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Stat a path, reporting a missing path as `undefined` instead of failing
 */
function statType(
  validatedPath: FilePath,
  operation: FileError["operation"]
): Effect.Effect<string | undefined, FileError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return undefined;
    const info = yield* fs.stat(validatedPath);
    return info.type;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError(operation, validatedPath, error)));
}

/**
 * Map a platform failure to FileNotFoundError or FileError
 *
 * Errors that are already ours (FileError, CompressionError) pass through.
 */
function toReadError(
  operation: FileError["operation"],
  validatedPath: FilePath,
  error: unknown
): Error {
  if (error instanceof FileError || error instanceof CompressionError) {
    return error;
  }
  if (isNotFound(error)) {
    return new FileNotFoundError(validatedPath, operation);
  }
  return FileError.fromSystemError(operation, validatedPath, error);
}

function isNotFound(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  if ("reason" in error && error.reason === "NotFound") {
    return true;
  }
  return error instanceof Error && /ENOENT|no such file/i.test(error.message);
}

/**
 * Validate file path using ArkType and return branded type
 */
export function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) {
      throw error;
    }
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const validationResult = FileReaderOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }
  return { ...DEFAULT_OPTIONS, ...options };
}
