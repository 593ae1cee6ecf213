/**
 * Shared types for the block locator and source transforms
 */

/**
 * Category of a single source line, decided from the line text alone
 */
export type LineKind =
  | "blank"
  | "comment"
  | "decorator"
  | "def-header"
  | "class-header"
  | "else-elif-continuation"
  | "code";

/**
 * Represents a line range in a document (1-based indexing)
 */
export interface LineRange {
  /** 1-based start line number */
  startLine: number;
  /** 1-based end line number (inclusive) */
  endLine: number;
}

/**
 * Kinds of unit the locator can resolve around a cursor
 */
export const BLOCK_KINDS = [
  "statement",
  "top-statement",
  "defun",
  "defclass",
  "group",
  "cell",
  "region",
  "buffer",
] as const;

export type BlockKind = (typeof BLOCK_KINDS)[number];

/**
 * A located unit of source text.
 * `start`/`end` are a half-open character offset range that always covers
 * full lines; `range` holds the same span as 1-based inclusive lines.
 */
export interface Block {
  kind: BlockKind;
  start: number;
  end: number;
  range: LineRange;
}

/**
 * Line patterns recognising notebook-style cell markers.
 * Every line matching `beginning` must also match `boundary`.
 */
export interface CellPatterns {
  boundary: RegExp;
  beginning: RegExp;
}
