/**
 * Compression module
 *
 * @example Detection and decompression
 * ```typescript
 * import { CompressionDetector, GzipCodec } from './compression';
 *
 * if (CompressionDetector.fromMagicBytes(bytes).format === 'gzip') {
 *   const text = new TextDecoder().decode(GzipCodec.decompress(bytes));
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { compress, decompress, GzipCodec, type GzipOptions } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";

export type { CompressionDetection, CompressionFormat } from "../types";
export { CompressionFormatSchema } from "../types";
