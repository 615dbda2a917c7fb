/**
 * Tests for file reading
 */

import { gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CompressionError, FileError, FileNotFoundError } from "../../src/errors";
import {
  exists,
  isDirectory,
  listDirectory,
  readBytes,
  readToString,
  validatePath,
} from "../../src/io/file-reader";
import { makeTempDir, type TempDir } from "../helpers/temp-dir";

const TABLE = "KO\tMap\nK00001\tmap00624\n";

describe("FileReader", () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = makeTempDir();
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe("exists", () => {
    test("is true for regular files only", async () => {
      const file = temp.write("mapping.tsv", TABLE);

      expect(await exists(file)).toBe(true);
      expect(await exists(temp.dir)).toBe(false);
      expect(await exists(temp.path("missing.tsv"))).toBe(false);
    });
  });

  describe("isDirectory", () => {
    test("is true for directories only", async () => {
      const file = temp.write("mapping.tsv", TABLE);

      expect(await isDirectory(temp.dir)).toBe(true);
      expect(await isDirectory(file)).toBe(false);
      expect(await isDirectory(temp.path("nowhere"))).toBe(false);
    });
  });

  describe("readToString", () => {
    test("reads plain text", async () => {
      const file = temp.write("mapping.tsv", TABLE);
      expect(await readToString(file)).toBe(TABLE);
    });

    test("decompresses gzip content", async () => {
      const file = temp.write("mapping.tsv.gz", gzipSync(new TextEncoder().encode(TABLE)));
      expect(await readToString(file)).toBe(TABLE);
    });

    test("reads plain text saved under a .gz name", async () => {
      const file = temp.write("mislabelled.tsv.gz", TABLE);
      expect(await readToString(file)).toBe(TABLE);
    });

    test("fails with FileNotFoundError for a missing file", async () => {
      const missing = temp.path("missing.tsv");

      await expect(readToString(missing)).rejects.toBeInstanceOf(FileNotFoundError);
      await expect(readToString(missing)).rejects.toThrow(`File not found: ${missing}`);
    });

    test("fails with CompressionError for a corrupt gzip file", async () => {
      const corrupt = gzipSync(new TextEncoder().encode(TABLE)).slice(0, 14);
      const file = temp.write("corrupt.tsv.gz", corrupt);

      await expect(readToString(file)).rejects.toBeInstanceOf(CompressionError);
    });
  });

  describe("readBytes", () => {
    test("returns raw bytes when decompression is off", async () => {
      const compressed = gzipSync(new TextEncoder().encode(TABLE));
      const file = temp.write("mapping.tsv.gz", compressed);

      const bytes = await readBytes(file, { autoDecompress: false });
      expect(Array.from(bytes)).toEqual(Array.from(compressed));
    });

    test("enforces the size limit", async () => {
      const file = temp.write("mapping.tsv", TABLE);

      await expect(readBytes(file, { maxFileSize: 4 })).rejects.toThrow(
        `File too large: ${TABLE.length} bytes exceeds limit of 4 bytes`
      );
    });

    test("refuses directories", async () => {
      await expect(readBytes(temp.dir)).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("listDirectory", () => {
    test("lists entries sorted by name", async () => {
      temp.write("S2_merged_genefamilies.tsv", TABLE);
      temp.write("S1_merged_genefamilies.tsv", TABLE);
      temp.write("notes.txt", "x");

      expect(await listDirectory(temp.dir)).toEqual([
        "S1_merged_genefamilies.tsv",
        "S2_merged_genefamilies.tsv",
        "notes.txt",
      ]);
    });

    test("fails with FileNotFoundError for a missing directory", async () => {
      await expect(listDirectory(temp.path("absent"))).rejects.toBeInstanceOf(FileNotFoundError);
    });
  });

  describe("validatePath", () => {
    test("collapses repeated separators", () => {
      expect(validatePath("data//tables///S1.tsv")).toBe("data/tables/S1.tsv");
    });

    test("rejects empty paths and NUL bytes", () => {
      expect(() => validatePath("")).toThrow(FileError);
      expect(() => validatePath("S1\0.tsv")).toThrow(FileError);
    });
  });
});
