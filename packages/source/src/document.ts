/**
 * SourceDocument
 * Line-indexed view of a Python source text.
 *
 * Besides splitting lines it runs one lexical pass that tracks open
 * brackets, string literals and backslash continuations, so the locator
 * can tell which lines begin in the middle of a statement. Nothing is
 * parsed beyond that.
 */

import { classifyLine, indentationOf, isCodeKind } from "./line-classifier.js";
import type { LineKind } from "./types.js";

const OPENING_BRACKETS = "([{";
const CLOSING_BRACKETS = ")]}";

/**
 * Mark every line that starts inside an unfinished statement
 */
function scanContinuations(lines: readonly string[]): boolean[] {
  const continuation: boolean[] = [];
  let depth = 0;
  let quote: string | null = null;
  let escapedNewline = false;

  for (const rawLine of lines) {
    continuation.push(depth > 0 || quote !== null || escapedNewline);
    escapedNewline = false;

    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    let inComment = false;
    let position = 0;

    while (position < line.length) {
      const ch = line[position];

      if (quote !== null) {
        if (ch === "\\") {
          position += 2;
        } else if (line.startsWith(quote, position)) {
          position += quote.length;
          quote = null;
        } else {
          position += 1;
        }
        continue;
      }

      if (ch === "#") {
        inComment = true;
        break;
      }
      if (ch === '"' || ch === "'") {
        const triple = ch.repeat(3);
        quote = line.startsWith(triple, position) ? triple : ch;
        position += quote.length;
        continue;
      }
      if (OPENING_BRACKETS.includes(ch)) {
        depth += 1;
      } else if (CLOSING_BRACKETS.includes(ch)) {
        depth = Math.max(0, depth - 1);
      }
      position += 1;
    }

    const endsWithBackslash = !inComment && line.endsWith("\\");
    if (quote !== null && quote.length === 1) {
      // A single-quoted string only survives the newline when escaped
      if (!endsWithBackslash) quote = null;
    } else if (quote === null && endsWithBackslash) {
      escapedNewline = true;
    }
  }

  return continuation;
}

function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export class SourceDocument {
  readonly lines: readonly string[];
  private readonly lineStarts: number[] = [];
  private readonly continuation: boolean[];
  private readonly kinds: LineKind[];
  private readonly indents: number[];

  constructor(readonly text: string) {
    this.lines = splitLines(text);

    let offset = 0;
    for (const line of this.lines) {
      this.lineStarts.push(offset);
      offset += line.length + 1;
    }

    this.continuation = scanContinuations(this.lines);
    this.kinds = this.lines.map(classifyLine);
    this.indents = this.lines.map(indentationOf);
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /**
   * 0-based index of the line containing `offset` (clamped to the text)
   */
  lineAt(offset: number): number {
    if (this.lines.length === 0) return 0;
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((this.lineStarts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low;
  }

  /**
   * Offset of the first character of a 0-based line
   */
  lineStart(line: number): number {
    return this.lineStarts[line] ?? this.text.length;
  }

  /**
   * Offset just past a 0-based line, including its newline
   */
  lineEnd(line: number): number {
    return this.lineStarts[line + 1] ?? this.text.length;
  }

  line(index: number): string {
    return this.lines[index] ?? "";
  }

  kind(line: number): LineKind {
    return this.kinds[line] ?? "blank";
  }

  indentation(line: number): number {
    return this.indents[line] ?? 0;
  }

  /**
   * True when the line begins inside a bracket, a string literal or after
   * a backslash-continued line
   */
  isContinuation(line: number): boolean {
    return this.continuation[line] ?? false;
  }

  /**
   * True for lines that belong to some statement: code lines, plus any
   * line (even blank or comment-like) inside an unfinished statement
   */
  isStatementLine(line: number): boolean {
    return this.isContinuation(line) || isCodeKind(this.kind(line));
  }

  /**
   * True for blank lines that sit between statements
   */
  isSeparatorLine(line: number): boolean {
    return this.kind(line) === "blank" && !this.isContinuation(line);
  }

  /**
   * True for comment lines that sit between statements
   */
  isStandaloneComment(line: number): boolean {
    return this.kind(line) === "comment" && !this.isContinuation(line);
  }
}
