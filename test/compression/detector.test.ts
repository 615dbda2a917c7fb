/**
 * Tests for compression format detection
 */

import { describe, expect, test } from "vitest";
import { CompressionDetector } from "../../src/compression";
import { CompressionError } from "../../src/errors";

describe("CompressionDetector", () => {
  describe("fromExtension", () => {
    test("recognizes gzip extensions case-insensitively", () => {
      expect(CompressionDetector.fromExtension("S1_genefamilies.tsv.gz")).toBe("gzip");
      expect(CompressionDetector.fromExtension("S1.TSV.GZ")).toBe("gzip");
      expect(CompressionDetector.fromExtension("S1.tsv.gzip")).toBe("gzip");
    });

    test("treats other extensions as uncompressed", () => {
      expect(CompressionDetector.fromExtension("S1_genefamilies.tsv")).toBe("none");
      expect(CompressionDetector.fromExtension("archive.zst")).toBe("none");
    });

    test("rejects an empty path", () => {
      expect(() => CompressionDetector.fromExtension("")).toThrow(CompressionError);
    });
  });

  describe("fromMagicBytes", () => {
    test("detects gzip magic bytes", () => {
      const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
      expect(detection).toEqual({ format: "gzip", confidence: 1.0, detectionMethod: "magic-bytes" });
    });

    test("reports short or plain input as uncompressed", () => {
      expect(CompressionDetector.fromMagicBytes(new Uint8Array([0x1f])).format).toBe("none");
      expect(CompressionDetector.fromMagicBytes(new TextEncoder().encode("KO\tMap")).format).toBe("none");
    });
  });

  describe("detect", () => {
    test("trusts the content over the extension", () => {
      const plain = new TextEncoder().encode("KO\tMap\n");
      expect(CompressionDetector.detect(plain, "mapping.tsv.gz").format).toBe("none");
    });

    test("falls back to the extension for files too short to sniff", () => {
      const detection = CompressionDetector.detect(new Uint8Array(0), "empty.tsv.gz");
      expect(detection).toEqual({ format: "gzip", confidence: 0.6, detectionMethod: "extension" });
    });
  });
});
