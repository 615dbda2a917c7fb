/**
 * Gzip compression and decompression
 *
 * Tables are read and written whole, so buffer-level fflate calls are all
 * that is needed here.
 */

import { gunzipSync, gzipSync } from "fflate";
import { CompressionError } from "../errors";
import { CompressionDetector } from "./detector";

/**
 * Options for gzip compression
 */
export interface GzipOptions {
  /** Compression level 1-9 (default: 6) */
  level?: number;
}

type GzipLevel = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

function toGzipLevel(level: number): GzipLevel {
  switch (Math.round(level)) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    case 7:
      return 7;
    case 8:
      return 8;
    case 9:
      return 9;
    default:
      return 6;
  }
}

/**
 * Decompress an entire gzip buffer
 *
 * @throws {CompressionError} If the data is not gzip or is truncated
 */
export function decompress(compressed: Uint8Array): Uint8Array {
  if (compressed.length === 0) {
    throw new CompressionError("Compressed data must not be empty", "gzip", "decompress");
  }
  if (CompressionDetector.fromMagicBytes(compressed).format !== "gzip") {
    throw new CompressionError("Invalid gzip magic bytes", "gzip", "validate", 0);
  }

  try {
    return gunzipSync(compressed);
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "decompress", error, compressed.length);
  }
}

/**
 * Compress a buffer with gzip
 */
export function compress(data: Uint8Array, options: GzipOptions = {}): Uint8Array {
  try {
    return gzipSync(data, { level: toGzipLevel(options.level ?? 6) });
  } catch (error) {
    throw CompressionError.fromSystemError("gzip", "compress", error, data.length);
  }
}

export const GzipCodec = {
  compress,
  decompress,
} as const;
