/**
 * Tests for the command-line interface
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { type CliOutput, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, run } from "../src/cli";
import { makeTempDir, type TempDir } from "./helpers/temp-dir";

const GENE_FAMILIES = "# Gene Family\tS1\nK00001|g__Bacteroides.s__Bacteroides_fragilis\t10.5\nK99999|g__Prevotella.s__Prevotella_copri\t2.0\n";
const ABUNDANCE = "# Gene Family\tS1\nK00001\t10.5\nK99999\t2.0\n";
const MAPPING = "KO\tMap\tCategory\nK00001\tko00624\txenobiotics\n";
const NAMES = "id\tname\nmap00624\tXenobiotics degradation\n";

interface Captured extends CliOutput {
  out: string[];
  err: string[];
}

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
  };
}

describe("cli", () => {
  let temp: TempDir;
  let io: Captured;

  beforeEach(() => {
    temp = makeTempDir();
    io = capture();
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe("usage", () => {
    test("prints usage to stderr without a command", async () => {
      expect(await run([], io)).toBe(EXIT_USAGE);
      expect(io.err[0]).toMatch(/^Usage: xenomap <command>/);
    });

    test("prints usage to stdout on request", async () => {
      expect(await run(["--help"], io)).toBe(EXIT_OK);
      expect(await run(["batch", "-h"], io)).toBe(EXIT_OK);
      expect(io.out).toHaveLength(2);
      expect(io.err).toEqual([]);
    });

    test("rejects unknown commands", async () => {
      expect(await run(["frobnicate"], io)).toBe(EXIT_USAGE);
      expect(io.err[0]).toMatch(/^Error: Unknown command "frobnicate"/);
    });

    test("rejects unknown options", async () => {
      expect(await run(["run", "--bogus"], io)).toBe(EXIT_USAGE);
      expect(io.err[0]).toMatch(/^Error: Unknown option '--bogus'/);
    });

    test("names a missing required argument", async () => {
      const code = await run(["run", "--mapping", "map.tsv", "--output", "out.tsv"], io);

      expect(code).toBe(EXIT_USAGE);
      expect(io.err).toEqual(["Error: Missing required argument: --abundance"]);
    });

    test("rejects invalid policy values", async () => {
      const code = await run(
        ["run", "-a", "S1.tsv", "-m", "map.tsv", "-o", "out.tsv", "--stratification", "bogus"],
        io
      );

      expect(code).toBe(EXIT_USAGE);
      expect(io.err[0]).toMatch(/^Error: Invalid pipeline configuration/);
    });

    test("rejects a non-numeric precision", async () => {
      const code = await run(["run", "-a", "S1.tsv", "-m", "map.tsv", "-o", "out.tsv", "--precision", "two"], io);

      expect(code).toBe(EXIT_USAGE);
      expect(io.err).toEqual(['Error: --precision must be a non-negative integer, got "two"']);
    });
  });

  describe("run", () => {
    test("writes the named pathway table", async () => {
      const abundance = temp.write("S1.tsv", GENE_FAMILIES);
      const mapping = temp.write("map.tsv", MAPPING);
      const names = temp.write("names.tsv", NAMES);
      const output = temp.path("S1_named.tsv");

      const code = await run(
        ["run", "--abundance", abundance, "--mapping", mapping, "--names", names, "--output", output],
        io
      );

      expect(code).toBe(EXIT_OK);
      expect(temp.read("S1_named.tsv")).toBe("Pathway_Name\tS1\nXenobiotics degradation\t10.5\n");
      expect(io.out).toEqual([
        `[S1] 2 rows read, 1 kept, 1 written to ${output}`,
        `S1: ok (1 rows) -> ${output}`,
      ]);
      expect(io.err).toEqual([]);
    });

    test("prints nothing but warnings with --quiet", async () => {
      const abundance = temp.write("S1.tsv", "# Gene Family\tS1\nK99999|g__Prevotella.s__Prevotella_copri\t2.0\n");
      const mapping = temp.write("map.tsv", MAPPING);

      const code = await run(
        ["run", "-q", "-a", abundance, "-m", mapping, "-o", temp.path("out.tsv")],
        io
      );

      expect(code).toBe(EXIT_OK);
      expect(io.out).toEqual([]);
      expect(io.err).toEqual([
        "Warning [S1]: no rows left after filtering (1 features read); wrote header only",
      ]);
      expect(temp.read("out.tsv")).toBe("Pathway_Name\tS1\n");
    });

    test("exits with a failure when the input is missing", async () => {
      const abundance = temp.path("S1.tsv");
      const mapping = temp.write("map.tsv", MAPPING);

      const code = await run(["run", "-a", abundance, "-m", mapping, "-o", temp.path("out.tsv")], io);

      expect(code).toBe(EXIT_FAILURE);
      expect(io.err).toEqual([`Error: Sample "S1" failed: File not found: ${abundance}`]);
    });
  });

  describe("batch", () => {
    let inputDir: TempDir;

    beforeEach(() => {
      inputDir = makeTempDir("xenomap-batch-");
      inputDir.write("S1_merged_genefamilies.tsv", GENE_FAMILIES);
      inputDir.write("S3_merged_genefamilies.tsv", "# Gene Family\tS3\nK99999|g__Prevotella.s__Prevotella_copri\t4\n");
    });

    afterEach(() => {
      inputDir.cleanup();
    });

    test("exits cleanly when every sample succeeds", async () => {
      const mapping = temp.write("map.tsv", MAPPING);
      const outputDir = temp.path("named");

      const code = await run(
        ["batch", "-q", "--input-dir", inputDir.dir, "--output-dir", outputDir, "--mapping", mapping],
        io
      );

      expect(code).toBe(EXIT_OK);
      expect(temp.read("named/S1_xenobiotic_named.tsv")).toBe(
        "Pathway_Name\tS1\nPolycyclic aromatic hydrocarbon degradation\t10.5\n"
      );
      expect(temp.read("named/S3_xenobiotic_named.tsv")).toBe("Pathway_Name\tS3\n");
    });

    test("reports failed samples and exits with a failure", async () => {
      const broken = inputDir.write("S2_merged_genefamilies.tsv", "# Gene Family\tS2\nK00001\tn/a\n");
      const mapping = temp.write("map.tsv", MAPPING);

      const code = await run(
        ["batch", "--input-dir", inputDir.dir, "--output-dir", temp.path("named"), "--mapping", mapping],
        io
      );

      expect(code).toBe(EXIT_FAILURE);
      expect(io.err).toEqual([
        `Error: Sample "S2" failed: ${broken}: Invalid number "n/a" in column "S2" (line 2)`,
        "Warning [S3]: no rows left after filtering (1 features read); wrote header only",
      ]);
      expect(io.out.at(-1)).toBe("Processed 3 sample(s): 1 ok, 1 empty, 1 failed");
    });

    test("treats a category restriction without a category column as a usage error", async () => {
      const mapping = temp.write("map.tsv", "KO\tMap\nK00001\tmap00624\n");

      const code = await run(
        [
          "batch",
          "--input-dir",
          inputDir.dir,
          "--output-dir",
          temp.path("named"),
          "--mapping",
          mapping,
          "--category",
          "xenobiotics",
        ],
        io
      );

      expect(code).toBe(EXIT_USAGE);
      expect(io.err).toEqual([
        `Error: Cannot restrict to category "xenobiotics": mapping table ${mapping} has no category column`,
      ]);
    });
  });

  describe("filter and annotate", () => {
    test("filter keeps mapped rows under their ids", async () => {
      const abundance = temp.write("S1.tsv", GENE_FAMILIES);
      const mapping = temp.write("map.tsv", MAPPING);
      const output = temp.path("filtered.tsv");

      const code = await run(["filter", "-a", abundance, "-m", mapping, "-o", output], io);

      expect(code).toBe(EXIT_OK);
      expect(temp.read("filtered.tsv")).toBe("Gene Family\tS1\nK00001\t10.5\n");
      expect(io.out).toEqual([`1 of 2 rows kept (1 dropped) -> ${output}`]);
    });

    test("filter warns when nothing matches", async () => {
      const abundance = temp.write("S1.tsv", "# Gene Family\tS1\nK99999\t2.0\n");
      const mapping = temp.write("map.tsv", MAPPING);

      const code = await run(["filter", "-q", "-a", abundance, "-m", mapping, "-o", temp.path("f.tsv")], io);

      expect(code).toBe(EXIT_OK);
      expect(io.err).toEqual([`Warning: no rows of ${abundance} matched the mapping; wrote header only`]);
      expect(temp.read("f.tsv")).toBe("Gene Family\tS1\n");
    });

    test("annotate labels a table and reports unmapped rows", async () => {
      const input = temp.write("S1.tsv", ABUNDANCE);
      const mapping = temp.write("map.tsv", MAPPING);
      const names = temp.write("names.tsv", NAMES);
      const output = temp.path("named.tsv");

      const code = await run(
        ["annotate", "--abundance", input, "-m", mapping, "--names", names, "-o", output],
        io
      );

      expect(code).toBe(EXIT_OK);
      expect(temp.read("named.tsv")).toBe("Pathway_Name\tS1\nXenobiotics degradation\t10.5\n");
      expect(io.err).toEqual(["Warning: 1 row(s) without a mapped group were dropped"]);
      expect(io.out).toEqual([`1 label(s) from 2 rows -> ${output}`]);
    });

    test("annotate can keep unmapped rows beside their labels", async () => {
      const input = temp.write("S1.tsv", ABUNDANCE);
      const mapping = temp.write("map.tsv", MAPPING);
      const names = temp.write("names.tsv", NAMES);
      const output = temp.path("named.tsv");

      const code = await run(
        [
          "annotate",
          "-q",
          "-i",
          input,
          "-m",
          mapping,
          "--names",
          names,
          "-o",
          output,
          "--unmapped",
          "passthrough",
          "--label",
          "augment",
        ],
        io
      );

      expect(code).toBe(EXIT_OK);
      expect(temp.read("named.tsv")).toBe(
        "Gene Family\tPathway_Name\tS1\nK00001\tXenobiotics degradation\t10.5\nK99999\tK99999\t2\n"
      );
      expect(io.err).toEqual(["Warning: 1 row(s) without a mapped group were kept under their own id"]);
    });
  });

  describe("merge", () => {
    test("joins the tables of a directory", async () => {
      const tables = makeTempDir("xenomap-merge-");
      try {
        tables.write("S1.tsv", "# Pathway_Name\tS1\nBenzoate degradation\t1\n");
        tables.write("S2.tsv", "# Pathway_Name\tS2\nBenzoate degradation\t2\nXylene degradation\t3\n");
        const output = temp.path("matrix.tsv");

        const code = await run(["merge", "--input-dir", tables.dir, "-o", output], io);

        expect(code).toBe(EXIT_OK);
        expect(temp.read("matrix.tsv")).toBe(
          "Pathway_Name\tS1\tS2\nBenzoate degradation\t1\t2\nXylene degradation\t0\t3\n"
        );
        expect(io.out).toEqual([`Merged 2 table(s): 2 rows, 2 columns -> ${output}`]);
      } finally {
        tables.cleanup();
      }
    });
  });

  describe("merge bugs lists", () => {
    test("merges relative abundances without selecting columns", async () => {
      const bugs = makeTempDir("xenomap-bugs-");
      try {
        const header =
          "#mpa_vJan21_CHOCOPhlAnSGB_202103\n" +
          "#SampleID\tMetaphlan_Analysis\n" +
          "#clade_name\tNCBI_tax_id\trelative_abundance\tadditional_species\n";
        bugs.write("A.tsv", `${header}k__Bacteria\t2\t100.0\t\nk__Bacteria|p__Firmicutes\t2|1239\t75.5\t\n`);
        bugs.write("B.tsv", `${header}k__Bacteria\t2\t100.0\t\nk__Archaea\t2157\t1.25\t\n`);
        const output = temp.path("bugs.tsv");

        const code = await run(["merge", "-q", "--input-dir", bugs.dir, "--output", output], io);

        expect(code).toBe(EXIT_OK);
        expect(io.err).toEqual([]);
        expect(temp.read("bugs.tsv")).toBe(
          "clade_name\tA\tB\n" +
            "k__Bacteria\t100\t100\n" +
            "k__Bacteria|p__Firmicutes\t75.5\t0\n" +
            "k__Archaea\t0\t1.25\n"
        );
      } finally {
        bugs.cleanup();
      }
    });
  });

  describe("collapse-taxa", () => {
    const CLADES = [
      "clade_name\tS1",
      "k__Bacteria\t100",
      "k__Bacteria|p__Bacteroidetes|c__Bacteroidia|o__Bacteroidales|f__Bacteroidaceae|g__Bacteroides\t40",
      "k__Bacteria|p__Firmicutes|c__Clostridia|o__Eubacteriales|f__Lachnospiraceae|g__GGB1234\t5",
      "",
    ].join("\n");

    test("collapses clades to genus", async () => {
      const input = temp.write("bugs.tsv", CLADES);
      const output = temp.path("genus.tsv");

      const code = await run(["collapse-taxa", "-i", input, "-o", output], io);

      expect(code).toBe(EXIT_OK);
      expect(temp.read("genus.tsv")).toBe("clade_name\tS1\nBacteroides\t40\n");
      expect(io.out).toEqual([`Reduced 3 clades to 1 at level genus -> ${output}`]);
    });

    test("rejects an unknown level", async () => {
      const input = temp.write("bugs.tsv", CLADES);

      const code = await run(["collapse-taxa", "-i", input, "-o", temp.path("x.tsv"), "--level", "strain"], io);

      expect(code).toBe(EXIT_USAGE);
      expect(io.err).toEqual([
        'Error: Invalid --level "strain"; expected kingdom, phylum, class, order, family, genus, species or all',
      ]);
    });
  });
});
