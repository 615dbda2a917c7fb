/**
 * Compression format detection for abundance tables
 *
 * HUMAnN and MetaPhlAn outputs are routinely archived as `.tsv.gz`; the
 * readers sniff magic bytes first and fall back to the file extension.
 */

import { CompressionError } from "../errors";
import type { CompressionDetection, CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

const NO_COMPRESSION: CompressionDetection = {
  format: "none",
  confidence: 1.0,
  detectionMethod: "none",
};

/**
 * Compression format detector
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * console.log(detection.format); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase();
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the leading bytes of a file
   *
   * Empty input is reported as uncompressed rather than rejected, since an
   * empty table file is a table-level problem.
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    if (bytes.length < 2) {
      return NO_COMPRESSION;
    }

    if (bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE) {
      return { format: "gzip", confidence: 1.0, detectionMethod: "magic-bytes" };
    }

    return NO_COMPRESSION;
  }

  /**
   * Combine magic bytes and extension
   *
   * Magic bytes win: a `.gz` name on plain text is read as plain text.
   */
  static detect(bytes: Uint8Array, filePath: string): CompressionDetection {
    const fromBytes = CompressionDetector.fromMagicBytes(bytes);
    if (fromBytes.format !== "none") {
      return fromBytes;
    }

    if (bytes.length < 2 && CompressionDetector.fromExtension(filePath) === "gzip") {
      return { format: "gzip", confidence: 0.6, detectionMethod: "extension" };
    }

    return NO_COMPRESSION;
  }
}
