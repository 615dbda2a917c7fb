/**
 * Tests for gzip compression and the CompressionService
 */

import { Effect } from "effect";
import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { CompressionService, GzipCodec } from "../../src/compression";
import { CompressionError } from "../../src/errors";

const TABLE = new TextEncoder().encode("# Gene Family\tS1\nK00001\t10.5\nK99999\t2.0\n");

describe("GzipCodec", () => {
  describe("decompress", () => {
    test("should reject invalid magic bytes", () => {
      const zip = new Uint8Array([0x50, 0x4b, 0x03, 0x04]);

      expect(() => GzipCodec.decompress(zip)).toThrow(CompressionError);
      expect(() => GzipCodec.decompress(zip)).toThrow(/Invalid gzip magic bytes/);
    });

    test("should reject empty data", () => {
      expect(() => GzipCodec.decompress(new Uint8Array(0))).toThrow(/must not be empty/);
    });

    test("should decompress fflate output", () => {
      const decompressed = GzipCodec.decompress(gzipSync(TABLE));
      expect(new TextDecoder().decode(decompressed)).toBe(
        "# Gene Family\tS1\nK00001\t10.5\nK99999\t2.0\n"
      );
    });

    test("should report truncated streams as CompressionError", () => {
      const truncated = gzipSync(TABLE).slice(0, 12);
      expect(() => GzipCodec.decompress(truncated)).toThrow(CompressionError);
    });
  });

  describe("compress", () => {
    test("should write the gzip magic bytes", () => {
      const compressed = GzipCodec.compress(TABLE, { level: 9 });
      expect(compressed[0]).toBe(0x1f);
      expect(compressed[1]).toBe(0x8b);
    });

    test("should round-trip through decompress", () => {
      const restored = GzipCodec.decompress(GzipCodec.compress(TABLE));
      expect(Array.from(restored)).toEqual(Array.from(TABLE));
    });
  });
});

describe("CompressionService", () => {
  const run = <A, E>(program: Effect.Effect<A, E, CompressionService>) =>
    Effect.runPromise(program.pipe(Effect.provide(CompressionService.Live)));

  test("passes data through for format none", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        return yield* service.decompress(TABLE, "none");
      })
    );
    expect(result).toBe(TABLE);
  });

  test("compresses and decompresses gzip", async () => {
    const result = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        const compressed = yield* service.compress(TABLE, "gzip", 1);
        return yield* service.decompress(compressed, "gzip");
      })
    );
    expect(new TextDecoder().decode(result)).toBe(new TextDecoder().decode(TABLE));
  });

  test("fails with CompressionError on corrupt input", async () => {
    const failure = await run(
      Effect.gen(function* () {
        const service = yield* CompressionService;
        return yield* service.decompress(new Uint8Array([0x00, 0x01, 0x02]), "gzip");
      }).pipe(Effect.flip)
    );
    expect(failure).toBeInstanceOf(CompressionError);
    expect(failure.operation).toBe("validate");
  });
});
