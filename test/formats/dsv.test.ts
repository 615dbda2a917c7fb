/**
 * Tests for delimiter-separated table parsing and writing
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DSVParseError, ParseError, ValidationError } from "../../src/errors";
import {
  CSVParser,
  CSVWriter,
  DSVParser,
  isRowOpen,
  parseCSVRow,
  stripCommentPrefix,
  TSVParser,
  TSVWriter,
} from "../../src/formats/dsv";
import { makeTempDir, type TempDir } from "../helpers/temp-dir";

describe("parseCSVRow", () => {
  test("splits quoted fields containing the delimiter", () => {
    expect(parseCSVRow('a,"b,c",d')).toEqual(["a", "b,c", "d"]);
  });

  test("unescapes doubled quotes", () => {
    expect(parseCSVRow('"say ""hi""",x')).toEqual(['say "hi"', "x"]);
  });

  test("keeps a trailing empty field", () => {
    expect(parseCSVRow("a,b,")).toEqual(["a", "b", ""]);
  });

  test("keeps quotes inside unquoted fields", () => {
    expect(parseCSVRow('K01081\t5"-nucleotidase', "\t")).toEqual(["K01081", '5"-nucleotidase']);
  });

  test("rejects an unclosed quoted field", () => {
    expect(() => parseCSVRow('a,"open')).toThrow(DSVParseError);
    expect(() => parseCSVRow('a,"open')).toThrow(/Unclosed quote in field/);
  });
});

describe("isRowOpen", () => {
  test("is true only while a quoted field is unterminated", () => {
    expect(isRowOpen('1,"line one', ",", '"', '"')).toBe(true);
    expect(isRowOpen('1,"line one\nline two"', ",", '"', '"')).toBe(false);
    expect(isRowOpen('K01081\t5"-nucleotidase', "\t", '"', '"')).toBe(false);
  });
});

describe("stripCommentPrefix", () => {
  test("removes the prefix and following spaces", () => {
    expect(stripCommentPrefix("# Gene Family\tS1", "#")).toBe("Gene Family\tS1");
    expect(stripCommentPrefix("Gene Family", "#")).toBe("Gene Family");
  });
});

describe("DSVParser", () => {
  describe("headers", () => {
    test("reads a header written as a comment", async () => {
      const parser = new TSVParser({ commentedHeader: true });
      const table = await parser.parseTable("# Gene Family\tS1\tS2\nK00001\t1\t2\nK00002\t3\t4\n");

      expect(table.header).toEqual(["Gene Family", "S1", "S2"]);
      expect(table.headerLine).toBe(1);
      expect(table.records).toEqual([
        { format: "dsv", fields: ["K00001", "1", "2"], lineNumber: 2 },
        { format: "dsv", fields: ["K00002", "3", "4"], lineNumber: 3 },
      ]);
      expect(parser.headers).toEqual(["Gene Family", "S1", "S2"]);
    });

    test("takes the last delimited comment before the data as the header", async () => {
      const parser = new TSVParser({ commentedHeader: true });
      const table = await parser.parseTable(
        "# generated by regroup\n# old\theader\n# Gene Family\tS1\nK00001\t1\n"
      );

      expect(table.header).toEqual(["Gene Family", "S1"]);
      expect(table.headerLine).toBe(3);
      expect(table.records.map((r) => r.fields)).toEqual([["K00001", "1"]]);
    });

    test("adopts a commented header from a table with no rows", async () => {
      const table = await new TSVParser({ commentedHeader: true }).parseTable("# Gene Family\tS1\n");

      expect(table.header).toEqual(["Gene Family", "S1"]);
      expect(table.records).toEqual([]);
    });

    test("skips comments and uses the first row when commented headers are off", async () => {
      const table = await new TSVParser().parseTable("# note\tignored\nKO\tMap\nK00001\tmap00624\n");

      expect(table.header).toEqual(["KO", "Map"]);
      expect(table.headerLine).toBe(2);
      expect(table.records.map((r) => r.fields)).toEqual([["K00001", "map00624"]]);
    });

    test("yields every row without a header", async () => {
      const table = await new CSVParser({ header: false }).parseTable("a,b\nc,d\n");

      expect(table.header).toBeNull();
      expect(table.records.map((r) => r.fields)).toEqual([
        ["a", "b"],
        ["c", "d"],
      ]);
    });
  });

  describe("input cleanup", () => {
    test("strips a byte order mark and normalizes CRLF", async () => {
      const table = await new TSVParser().parseTable("\uFEFFid\tS1\r\nK00001\t1\r\n");

      expect(table.header).toEqual(["id", "S1"]);
      expect(table.records.map((r) => r.fields)).toEqual([["K00001", "1"]]);
    });

    test("skips blank lines", async () => {
      const table = await new TSVParser().parseTable("id\tS1\n\nK00001\t1\n   \nK00002\t2\n");

      expect(table.records.map((r) => r.lineNumber)).toEqual([3, 5]);
    });
  });

  describe("quoted fields", () => {
    test("joins fields spanning several lines", async () => {
      const table = await new CSVParser().parseTable('id,desc\n1,"line one\nline two"\n2,plain\n');

      expect(table.records).toEqual([
        { format: "dsv", fields: ["1", "line one\nline two"], lineNumber: 2 },
        { format: "dsv", fields: ["2", "plain"], lineNumber: 4 },
      ]);
    });

    test("recovers from an unclosed quote at the end of input", async () => {
      const errors: Array<[string, number | undefined]> = [];
      const parser = new CSVParser({
        onError: (error, lineNumber) => {
          errors.push([error, lineNumber]);
        },
      });

      const table = await parser.parseTable('id,v\n1,"broken\n2,ok\n');

      expect(errors).toEqual([["Unclosed quote at end of input", 2]]);
      expect(table.records).toEqual([{ format: "dsv", fields: ["2", "ok"], lineNumber: 3 }]);
    });
  });

  describe("ragged rows", () => {
    test("pads short rows by default", async () => {
      const table = await new CSVParser().parseTable("a,b,c\n1,2\n");
      expect(table.records.map((r) => r.fields)).toEqual([["1", "2", ""]]);
    });

    test("truncates long rows when asked", async () => {
      const table = await new CSVParser({ raggedRows: "truncate" }).parseTable("a,b\n1,2,3\n");
      expect(table.records.map((r) => r.fields)).toEqual([["1", "2"]]);
    });

    test("leaves rows untouched under ignore", async () => {
      const table = await new CSVParser({ raggedRows: "ignore" }).parseTable("a,b\n1,2,3\n4\n");
      expect(table.records.map((r) => r.fields)).toEqual([["1", "2", "3"], ["4"]]);
    });

    test("reports the line under the error policy", async () => {
      const parser = new CSVParser({ raggedRows: "error" });

      await expect(parser.parseTable("a,b,c\n1,2\n")).rejects.toThrow(
        "Row has 2 columns, expected 3 (line 2)"
      );
    });
  });

  describe("options", () => {
    test("rejects multi-character delimiters", () => {
      expect(() => new DSVParser({ delimiter: "::" })).toThrow(ValidationError);
    });

    test("rejects a commented header without a header", () => {
      expect(() => new TSVParser({ header: false, commentedHeader: true })).toThrow(ValidationError);
    });

    test("stops when the signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const parser = new TSVParser({ signal: controller.signal });

      const failure = await parser.parseTable("id\tS1\nK00001\t1\n").catch((error: unknown) => error);
      expect(failure).toBeInstanceOf(ParseError);
      expect(failure).toMatchObject({ code: "ABORTED", message: "TSV parsing was aborted" });
    });

    test("names its format after the delimiter", () => {
      expect(new CSVParser().getFormatName()).toBe("CSV");
      expect(new TSVParser().getFormatName()).toBe("TSV");
      expect(new DSVParser({ delimiter: "|" }).getFormatName()).toBe("DSV");
    });
  });
});

describe("DSVWriter", () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = makeTempDir();
  });

  afterEach(() => {
    temp.cleanup();
  });

  test("formats a header and rows with a trailing newline", () => {
    const writer = new TSVWriter();
    const text = writer.formatRows(["Gene Family", "S1"], [
      ["K00001", 10.5],
      ["K00002", null],
    ]);

    expect(text).toBe("Gene Family\tS1\nK00001\t10.5\nK00002\t\n");
  });

  test("quotes fields containing the delimiter or quotes", () => {
    expect(new CSVWriter().formatRow(["a,b", 'say "hi"', "plain"])).toBe('"a,b","say ""hi""",plain');
  });

  test("quotes everything under quoteAll", () => {
    expect(new CSVWriter({ quoteAll: true }).formatRow(["x", 1, true])).toBe('"x","1","true"');
  });

  test("honours line ending and trailing newline options", () => {
    const writer = new CSVWriter({ lineEnding: "\r\n", trailingNewline: false });
    expect(writer.formatRows(["a"], [["1"]])).toBe("a\r\n1");
  });

  test("formats nothing as an empty document", () => {
    expect(new TSVWriter().formatRows(null, [])).toBe("");
  });

  test("rejects invalid compression levels", () => {
    expect(() => new TSVWriter({ compressionLevel: 0 })).toThrow(ValidationError);
  });

  test("writes files that the parser reads back", async () => {
    const target = temp.path("table.tsv.gz");
    await new TSVWriter().writeFile(target, ["KO", "Map"], [["K00001", "map00624,map00625"]], {
      atomic: true,
    });

    const table = await new TSVParser().parseTableFile(target);
    expect(table.header).toEqual(["KO", "Map"]);
    expect(table.records.map((r) => r.fields)).toEqual([["K00001", "map00624,map00625"]]);
  });
});
