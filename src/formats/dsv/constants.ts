/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Default escape character (doubling quotes per RFC 4180)
 */
export const DEFAULT_ESCAPE = '"';

/**
 * Comment prefix used by HUMAnN and MetaPhlAn headers
 */
export const DEFAULT_COMMENT_PREFIX = "#";

/**
 * Maximum field size (100MB)
 */
export const MAX_FIELD_SIZE = 100_000_000;

/**
 * Maximum number of physical lines a quoted field may span
 */
export const DEFAULT_MAX_FIELD_LINES = 100;

/**
 * Line ending options
 */
export const LINE_ENDINGS = {
  unix: "\n",
  windows: "\r\n",
} as const;
