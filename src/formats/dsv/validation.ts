/**
 * @module formats/dsv/validation
 * @description ArkType schemas for DSV parser and writer options
 */

import { type } from "arktype";
import { DSVParseError } from "../../errors";
import { MAX_FIELD_SIZE } from "./constants";

/**
 * Validate that a field doesn't exceed the maximum allowed size
 *
 * @throws {DSVParseError} if field exceeds size limit
 */
export function validateFieldSize(
  field: string,
  maxSize: number = MAX_FIELD_SIZE,
  lineNumber?: number
): void {
  // Each UTF-16 code unit encodes to at most 3 UTF-8 bytes
  if (field.length * 3 <= maxSize) {
    return;
  }
  const sizeInBytes = new TextEncoder().encode(field).length;
  if (sizeInBytes > maxSize) {
    throw new DSVParseError(
      `Field size (${sizeInBytes} bytes) exceeds maximum allowed (${maxSize} bytes)`,
      lineNumber
    );
  }
}

/**
 * ArkType validation schema for DSV parser options
 */
export const DSVParserOptionsSchema = type({
  "source?": "string",
  "delimiter?": "string",
  "quote?": "string",
  "escape?": "string",
  "header?": "boolean",
  "commentedHeader?": "boolean",
  "skipEmptyLines?": "boolean",
  "skipComments?": "boolean",
  "commentPrefix?": "string>0",
  "raggedRows?": '"error"|"pad"|"truncate"|"ignore"',
  "maxFieldLines?": "number>0",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (options.quote !== undefined && options.quote === options.delimiter) {
    return ctx.reject({
      path: ["quote"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }

  if (options.commentedHeader === true && options.header === false) {
    return ctx.reject({
      path: ["commentedHeader"],
      expected: "header enabled when commentedHeader is set",
      actual: "header: false",
    });
  }

  return true;
});

/**
 * ArkType validation schema for DSV writer options
 */
export const DSVWriterOptionsSchema = type({
  "delimiter?": "string",
  "quote?": "string",
  "escapeChar?": "string",
  "lineEnding?": '"\n"|"\r\n"',
  "quoteAll?": "boolean",
  "trailingNewline?": "boolean",
  "compressionLevel?": "1<=number<=9",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  return true;
});
