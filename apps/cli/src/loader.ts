/**
 * Loading source files and cursor positions for commands
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { SourceDocument } from "@replkit/source";
import { InvalidArgumentError } from "commander";
import { Data, Effect } from "effect";

export class SourceReadError extends Data.TaggedError("SourceReadError")<{
  message: string;
  cause?: unknown;
}> {}

export const loadDocument = (file: string): Effect.Effect<SourceDocument, SourceReadError> =>
  Effect.tryPromise({
    try: () => readFile(path.resolve(file), "utf-8"),
    catch: (error) =>
      new SourceReadError({ message: `Cannot read ${file}: ${String(error)}`, cause: error }),
  }).pipe(Effect.map((text) => new SourceDocument(text)));

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseOffset(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export interface CursorOptions {
  /** 1-based line number */
  line?: number;
  offset?: number;
  /** 1-based last line of a region */
  to?: number;
}

/**
 * Cursor offset for the options; an explicit offset wins over a line
 */
export function cursorOffset(doc: SourceDocument, options: CursorOptions): number {
  if (options.offset !== undefined) return Math.min(options.offset, doc.text.length);
  if (options.line !== undefined) return doc.lineStart(options.line - 1);
  return 0;
}

/**
 * End offset for region sends: the end of the `--to` line
 */
export function regionEnd(doc: SourceDocument, options: CursorOptions): number | undefined {
  return options.to === undefined ? undefined : doc.lineEnd(options.to - 1);
}
