/**
 * CSV State Machine Module
 *
 * RFC 4180 row splitting: quoted fields, doubled quotes and fields that
 * span several physical lines.
 */

import { DSVParseError } from "../../errors";
import { CSVParseState } from "./types";

/**
 * Check if a (possibly accumulated) row ends inside a quoted field
 *
 * Only quotes that open a field count, so `5"-nucleotidase` in an unquoted
 * field never starts a multi-line row.
 */
export function isRowOpen(line: string, delimiter: string, quote: string, escapeChar: string): boolean {
  return scanRow(line, delimiter, quote, escapeChar).state === CSVParseState.QUOTED_FIELD;
}

/**
 * Split one logical row into fields
 *
 * @throws {DSVParseError} On an unclosed quoted field
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  quote: string = '"',
  escapeChar: string = '"'
): string[] {
  const { fields, state } = scanRow(line, delimiter, quote, escapeChar);
  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in field", undefined, fields.length + 1, line);
  }
  return fields;
}

function scanRow(
  line: string,
  delimiter: string,
  quote: string,
  escapeChar: string
): { fields: string[]; state: CSVParseState } {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          if (escapeChar === quote && line[i + 1] === quote) {
            currentField += quote;
            i++;
          } else {
            state = CSVParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Text after a closing quote is kept as part of the field
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    // Trailing delimiter means empty final field
    fields.push("");
  }

  return { fields, state };
}
