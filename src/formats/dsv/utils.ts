/**
 * DSV Utility Functions Module
 */

import { DSVParseError } from "../../errors";
import type { RaggedRowPolicy } from "./types";

/**
 * Remove a UTF-8 Byte Order Mark from text
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Normalize line endings to Unix format (LF)
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Apply the ragged-row policy to a row
 *
 * @throws {DSVParseError} Under the "error" policy when the count differs
 */
export function handleRaggedRow(
  fields: string[],
  expectedColumns: number,
  handling: RaggedRowPolicy = "pad",
  lineNumber?: number
): string[] {
  if (fields.length === expectedColumns || handling === "ignore") {
    return fields;
  }

  switch (handling) {
    case "error":
      throw new DSVParseError(
        `Row has ${fields.length} columns, expected ${expectedColumns}`,
        lineNumber
      );
    case "pad": {
      const padded = [...fields];
      while (padded.length < expectedColumns) {
        padded.push("");
      }
      return padded;
    }
    case "truncate":
      return fields.slice(0, expectedColumns);
  }
}

/**
 * Strip the comment prefix (and the space after it) from a header line
 *
 * `# Gene Family\tS1` becomes `Gene Family\tS1`.
 */
export function stripCommentPrefix(line: string, prefix: string): string {
  return line.startsWith(prefix) ? line.slice(prefix.length).replace(/^ +/, "") : line;
}
