/**
 * File writing operations using Effect Platform
 *
 * Outputs are compressed according to their extension (`.gz`) through the
 * CompressionService, and `writeStringAtomic` stages content in a scoped
 * temporary directory beside the target so a failed run never leaves a
 * half-written table behind.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { CompressionError, FileError, ValidationError } from "../errors";
import type { WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { validatePath } from "./file-reader";
import { runWithPlatform } from "./runtime";

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Apply compression to data if needed based on options and file extension
 *
 * Mirrors the decompression step in file-reader.ts for API symmetry.
 */
function applyCompression(
  data: Uint8Array,
  filePath: string,
  options: WriteOptions = {}
): Effect.Effect<Uint8Array, CompressionError> {
  if (options.autoCompress === false) {
    return Effect.succeed(data);
  }

  let compressionFormat = options.compressionFormat ?? "none";
  if (compressionFormat === "none") {
    compressionFormat = CompressionDetector.fromExtension(filePath);
  }

  const format = compressionFormat;
  return Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return yield* compressionService.compress(data, format, options.compressionLevel ?? 6);
  }).pipe(Effect.provide(CompressionService.Live));
}

function validateWriteOptions(options: WriteOptions = {}): void {
  const validation = WriteOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${validation.summary}`);
  }
}

function toWriteError(path: string, error: unknown): FileError | CompressionError {
  if (error instanceof CompressionError) {
    return error;
  }
  return FileError.fromSystemError("write", path, error);
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @example Automatic gzip compression
 * ```typescript
 * await writeString("filtered.tsv.gz", content);
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options?: WriteOptions
): Promise<void> {
  const validatedPath = validatePath(path);
  validateWriteOptions(options);
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const finalData = yield* applyCompression(data, validatedPath, options);
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(validatedPath, finalData);
  }).pipe(Effect.mapError((error) => toWriteError(validatedPath, error)));

  await runWithPlatform(program);
}

/**
 * Write string to file atomically
 *
 * Content is written into a temporary directory created next to the target
 * and renamed into place; the directory is removed when the scope closes,
 * whether the write succeeded or not. Concurrent runs writing different
 * outputs never share intermediate paths.
 */
export async function writeStringAtomic(
  path: string,
  content: string,
  options?: WriteOptions
): Promise<void> {
  const validatedPath = validatePath(path);
  validateWriteOptions(options);
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const finalData = yield* applyCompression(data, validatedPath, options);
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const directory = pathService.dirname(validatedPath);
    yield* fs.makeDirectory(directory, { recursive: true });

    const scratch = yield* fs.makeTempDirectoryScoped({ directory, prefix: ".xenomap-" });
    const staged = pathService.join(scratch, pathService.basename(validatedPath));
    yield* fs.writeFile(staged, finalData);
    yield* fs.rename(staged, validatedPath);
  }).pipe(
    Effect.scoped,
    Effect.mapError((error) => toWriteError(validatedPath, error))
  );

  await runWithPlatform(program);
}

/**
 * Create a directory and any missing parents
 */
export async function ensureDirectory(path: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(validatedPath, { recursive: true });
  }).pipe(Effect.mapError((error) => toWriteError(validatedPath, error)));

  await runWithPlatform(program);
}
