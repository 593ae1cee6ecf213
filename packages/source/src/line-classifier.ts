/**
 * Classifies single lines of Python source with anchored patterns.
 * No state is carried between lines; multi-line constructs are the
 * document scanner's concern.
 */

import type { LineKind } from "./types.js";

/**
 * Patterns tested in precedence order, first match wins
 */
const LINE_PATTERNS: Array<{ pattern: RegExp; kind: LineKind }> = [
  { pattern: /^[ \t\f]*@/, kind: "decorator" },
  { pattern: /^[ \t\f]*(?:async[ \t]+)?def[ \t]+\w/, kind: "def-header" },
  { pattern: /^[ \t\f]*class[ \t]+\w/, kind: "class-header" },
  {
    pattern: /^[ \t\f]*(?:else|elif|except|finally)\b/,
    kind: "else-elif-continuation",
  },
];

const BLANK_LINE = /^\s*$/;
const COMMENT_LINE = /^[ \t\f]*#/;

export const TAB_WIDTH = 8;

export function classifyLine(line: string): LineKind {
  for (const { pattern, kind } of LINE_PATTERNS) {
    if (pattern.test(line)) {
      return kind;
    }
  }
  if (BLANK_LINE.test(line)) return "blank";
  if (COMMENT_LINE.test(line)) return "comment";
  return "code";
}

/**
 * Blank and comment lines carry no code
 */
export function isCodeKind(kind: LineKind): boolean {
  return kind !== "blank" && kind !== "comment";
}

/**
 * Lines that open (or decorate) a function or class definition
 */
export function isDefinitionKind(kind: LineKind): boolean {
  return kind === "decorator" || kind === "def-header" || kind === "class-header";
}

/**
 * Column of the first non-whitespace character.
 * Tabs advance to the next multiple of 8 and a form feed resets the
 * column, as the Python tokenizer does.
 */
export function indentationOf(line: string): number {
  let column = 0;
  for (const ch of line) {
    if (ch === " ") {
      column += 1;
    } else if (ch === "\t") {
      column += TAB_WIDTH - (column % TAB_WIDTH);
    } else if (ch === "\f") {
      column = 0;
    } else {
      break;
    }
  }
  return column;
}

/**
 * Length of the leading whitespace run, in characters
 */
export function leadingWhitespaceLength(line: string): number {
  const match = line.match(/^[ \t\f]*/);
  return match ? match[0].length : 0;
}
