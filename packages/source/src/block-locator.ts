/**
 * Block Locator
 *
 * Resolves statement, top-level statement, definition, group and cell
 * boundaries around a cursor offset from indentation alone. Internally
 * everything works on 0-based line indices; blocks leave this module as
 * offsets plus a 1-based LineRange.
 *
 * The scan is a heuristic. A top-level statement whose continuation lines
 * are indented less than its own first line is mis-scoped by
 * `locateTopStatement`.
 */

import { Effect } from "effect";
import type { SourceDocument } from "./document.js";
import { NavigationError, NoActiveBlockError, type LocateError } from "./errors.js";
import { isDefinitionKind } from "./line-classifier.js";
import type { Block, BlockKind, CellPatterns, LineKind } from "./types.js";

/**
 * Default notebook-style cell markers: `##`, `# <codecell>` and
 * `# In[..]:` begin a cell; `# <markdowncell>` and `# Out[..]:` only
 * end one.
 */
export const DEFAULT_CELL_PATTERNS: CellPatterns = {
  boundary: /^(?:##.*|#\s*<.+>|#\s*(?:In|Out)\[.*\]:)\s*$/,
  beginning: /^(?:##.*|#\s*<codecell>|#\s*In\[.*\]:)\s*$/,
};

interface LineSpan {
  start: number;
  end: number;
}

function makeBlock(doc: SourceDocument, kind: BlockKind, span: LineSpan): Block {
  return {
    kind,
    start: doc.lineStart(span.start),
    end: doc.lineEnd(span.end),
    range: { startLine: span.start + 1, endLine: span.end + 1 },
  };
}

/**
 * Text covered by a block
 */
export function blockText(doc: SourceDocument, block: Block): string {
  return doc.text.slice(block.start, block.end);
}

// ============================================================
// Line-level navigation
// ============================================================

function nextStatementLine(doc: SourceDocument, from: number): number | undefined {
  for (let line = Math.max(0, from); line < doc.lineCount; line++) {
    if (doc.isStatementLine(line)) return line;
  }
  return undefined;
}

function previousStatementLine(
  doc: SourceDocument,
  from: number,
): number | undefined {
  for (let line = Math.min(from, doc.lineCount - 1); line >= 0; line--) {
    if (doc.isStatementLine(line)) return line;
  }
  return undefined;
}

/**
 * Climb backward over continuation lines
 */
function statementStart(doc: SourceDocument, line: number): number {
  let start = line;
  while (start > 0 && doc.isContinuation(start)) start--;
  return start;
}

/**
 * Last line of the logical line that begins at `start`
 */
function statementLastLine(doc: SourceDocument, start: number): number {
  let last = start;
  while (last + 1 < doc.lineCount && doc.isContinuation(last + 1)) last++;
  return last;
}

/**
 * Last line of the block opened at `start`: the statement itself plus every
 * following statement indented deeper. Trailing blank and comment lines are
 * not part of the block.
 */
function blockLastLine(doc: SourceDocument, start: number): number {
  const indent = doc.indentation(start);
  let last = statementLastLine(doc, start);
  let line = last + 1;

  while (line < doc.lineCount) {
    if (!doc.isStatementLine(line)) {
      line++;
      continue;
    }
    if (doc.indentation(line) <= indent) break;
    last = statementLastLine(doc, line);
    line = last + 1;
  }

  return last;
}

/**
 * Next statement at exactly the same indentation, skipping nested blocks.
 * Stops at the first shallower statement.
 */
function nextSibling(doc: SourceDocument, start: number): number | undefined {
  const indent = doc.indentation(start);
  let line = statementLastLine(doc, start) + 1;

  while (line < doc.lineCount) {
    if (!doc.isStatementLine(line)) {
      line++;
      continue;
    }
    const current = doc.indentation(line);
    if (current < indent) return undefined;
    if (current === indent) return line;
    line = statementLastLine(doc, line) + 1;
  }

  return undefined;
}

/**
 * Previous statement at exactly the same indentation, skipping nested
 * blocks. Stops at the first shallower statement.
 */
function previousSibling(doc: SourceDocument, start: number): number | undefined {
  const indent = doc.indentation(start);
  let line = start - 1;

  while (line >= 0) {
    if (!doc.isStatementLine(line)) {
      line--;
      continue;
    }
    const candidate = statementStart(doc, line);
    const current = doc.indentation(candidate);
    if (current < indent) return undefined;
    if (current === indent) return candidate;
    line = candidate - 1;
  }

  return undefined;
}

function isContinuationClause(kind: LineKind): boolean {
  return kind === "else-elif-continuation";
}

// ============================================================
// Statement boundaries
// ============================================================

const noProgress = (line: number) =>
  new NavigationError({
    message: `Statement boundary scan made no progress at line ${line + 1}`,
    line: line + 1,
  });

/**
 * Move from a statement line to the start of the statement owning it.
 * Else/elif clauses and decorated definitions expand backward to the
 * sibling they belong to.
 */
const beginningOfStatement = (doc: SourceDocument, line: number) =>
  Effect.gen(function* () {
    let start = statementStart(doc, line);

    for (let steps = 0; ; steps++) {
      if (steps > doc.lineCount) {
        return yield* Effect.fail(noProgress(start));
      }

      const kind = doc.kind(start);
      let expanded: number | undefined;

      if (isContinuationClause(kind)) {
        expanded = previousSibling(doc, start);
      } else if (isDefinitionKind(kind)) {
        const previous = previousSibling(doc, start);
        if (previous !== undefined && doc.kind(previous) === "decorator") {
          expanded = previous;
        }
      }

      if (expanded === undefined || expanded === start) {
        return start;
      }
      start = expanded;
    }
  });

/**
 * Last line of the statement starting at `start`. Following else/elif
 * clauses belong to it, and a decorator runs through the definition it
 * decorates.
 */
const endOfStatement = (doc: SourceDocument, start: number) =>
  Effect.gen(function* () {
    let current = start;

    for (let steps = 0; ; steps++) {
      if (steps > doc.lineCount) {
        return yield* Effect.fail(noProgress(current));
      }

      const sibling = nextSibling(doc, current);
      const continues =
        sibling !== undefined &&
        sibling > current &&
        (isContinuationClause(doc.kind(sibling)) ||
          (doc.kind(current) === "decorator" && isDefinitionKind(doc.kind(sibling))));

      if (!continues) {
        return blockLastLine(doc, current);
      }
      current = sibling;
    }
  });

const statementSpan = (doc: SourceDocument, line: number) =>
  Effect.gen(function* () {
    const start = yield* beginningOfStatement(doc, line);
    const end = yield* endOfStatement(doc, start);
    return { start, end };
  });

const firstStatementLineFrom = (
  doc: SourceDocument,
  line: number,
): Effect.Effect<number, NoActiveBlockError> => {
  const found = nextStatementLine(doc, line);
  return found === undefined
    ? Effect.fail(
        new NoActiveBlockError({ message: "No statement at or after the cursor" }),
      )
    : Effect.succeed(found);
};

const topStatementSpan = (doc: SourceDocument, line: number) =>
  Effect.gen(function* () {
    let span = yield* statementSpan(doc, line);

    while (doc.indentation(span.start) > 0) {
      const previous = previousStatementLine(doc, span.start - 1);
      if (previous === undefined) {
        return yield* Effect.fail(
          new NavigationError({
            message: `No top-level statement encloses line ${line + 1}`,
            line: line + 1,
          }),
        );
      }
      span = yield* statementSpan(doc, previous);
    }

    return span;
  });

/**
 * Locate the statement at (or after) the cursor
 */
export const locateStatement = (
  doc: SourceDocument,
  offset: number,
): Effect.Effect<Block, LocateError> =>
  Effect.gen(function* () {
    const line = yield* firstStatementLineFrom(doc, doc.lineAt(offset));
    const span = yield* statementSpan(doc, line);
    return makeBlock(doc, "statement", span);
  });

/**
 * Locate the top-level statement enclosing the cursor
 */
export const locateTopStatement = (
  doc: SourceDocument,
  offset: number,
): Effect.Effect<Block, LocateError> =>
  Effect.gen(function* () {
    const line = yield* firstStatementLineFrom(doc, doc.lineAt(offset));
    const span = yield* topStatementSpan(doc, line);
    return makeBlock(doc, "top-statement", span);
  });

// ============================================================
// Definitions
// ============================================================

/**
 * Locate the definition at the cursor, or the nearest one enclosing it.
 *
 * A header above the cursor only counts when it is indented less than
 * every code line between it and the cursor, which rules out siblings.
 */
export const locateDefinition = (
  doc: SourceDocument,
  offset: number,
  isHeader: (kind: LineKind) => boolean,
  kind: BlockKind,
): Effect.Effect<Block, LocateError> =>
  Effect.gen(function* () {
    const notFound = new NoActiveBlockError({
      message: kind === "defclass" ? "Not inside a class definition" : "Not inside a function definition",
    });
    if (doc.lineCount === 0) return yield* Effect.fail(notFound);

    const cursorLine = doc.lineAt(offset);
    let header: number | undefined;

    // The cursor may sit on the decorators above a header
    let probe = cursorLine;
    while (probe < doc.lineCount && doc.kind(probe) === "decorator" && !doc.isContinuation(probe)) {
      probe = nextStatementLine(doc, probe + 1) ?? doc.lineCount;
    }
    if (probe < doc.lineCount && !doc.isContinuation(probe) && isHeader(doc.kind(probe))) {
      header = probe;
    }

    // Off a statement, the definition must enclose the next code line
    let bound = Number.POSITIVE_INFINITY;
    if (header === undefined && !doc.isStatementLine(cursorLine)) {
      const next = nextStatementLine(doc, cursorLine);
      if (next === undefined) return yield* Effect.fail(notFound);
      bound = doc.indentation(next);
    }
    for (let line = cursorLine; header === undefined && line >= 0; line--) {
      if (!doc.isStatementLine(line) || doc.isContinuation(line)) continue;

      const indent = doc.indentation(line);
      if (isHeader(doc.kind(line)) && indent < bound) {
        header = line;
        break;
      }
      bound = Math.min(bound, indent);
      // Reached the start of the enclosing top-level statement
      if (indent === 0) break;
    }

    if (header === undefined) {
      return yield* Effect.fail(notFound);
    }

    let start = header;
    for (;;) {
      const previous = previousStatementLine(doc, start - 1);
      if (previous === undefined || doc.kind(previous) !== "decorator" || doc.isContinuation(previous)) {
        break;
      }
      start = previous;
    }

    const end = yield* endOfStatement(doc, header);
    return makeBlock(doc, kind, { start, end });
  });

export const locateDefun = (doc: SourceDocument, offset: number) =>
  locateDefinition(doc, offset, (kind) => kind === "def-header", "defun");

export const locateDefclass = (doc: SourceDocument, offset: number) =>
  locateDefinition(doc, offset, (kind) => kind === "class-header", "defclass");

// ============================================================
// Groups and cells
// ============================================================

/**
 * Locate the run of top-level statements around the cursor that is not
 * interrupted by a blank line. Blank lines inside a statement do not
 * separate; comment lines between statements join the group.
 */
export const locateGroup = (
  doc: SourceDocument,
  offset: number,
): Effect.Effect<Block, LocateError> =>
  Effect.gen(function* () {
    const line = yield* firstStatementLineFrom(doc, doc.lineAt(offset));
    const top = yield* topStatementSpan(doc, line);
    let { start, end } = top;

    let previous = start - 1;
    while (previous >= 0 && !doc.isSeparatorLine(previous)) {
      if (doc.isStandaloneComment(previous)) {
        start = previous;
        previous--;
        continue;
      }
      const span = yield* topStatementSpan(doc, previous);
      start = Math.min(start, span.start);
      previous = Math.min(span.start, previous) - 1;
    }

    let next = end + 1;
    while (next < doc.lineCount && !doc.isSeparatorLine(next)) {
      if (doc.isStandaloneComment(next)) {
        end = next;
        next++;
        continue;
      }
      const span = yield* topStatementSpan(doc, next);
      end = Math.max(end, span.end, next);
      next = end + 1;
    }

    return makeBlock(doc, "group", { start, end });
  });

/**
 * Locate the notebook-style cell around the cursor: the lines after the
 * nearest cell-beginning marker, up to the next boundary marker
 */
export const locateCell = (
  doc: SourceDocument,
  offset: number,
  patterns: CellPatterns = DEFAULT_CELL_PATTERNS,
): Effect.Effect<Block, NoActiveBlockError> =>
  Effect.gen(function* () {
    const cursorLine = doc.lineAt(offset);
    let marker: number | undefined;

    for (let line = Math.min(cursorLine, doc.lineCount - 1); line >= 0; line--) {
      if (patterns.boundary.test(doc.line(line))) {
        marker = line;
        break;
      }
    }

    if (marker === undefined || !patterns.beginning.test(doc.line(marker))) {
      return yield* Effect.fail(
        new NoActiveBlockError({ message: "Not inside a code cell" }),
      );
    }

    let end = doc.lineCount - 1;
    for (let line = marker + 1; line < doc.lineCount; line++) {
      if (patterns.boundary.test(doc.line(line))) {
        end = line - 1;
        break;
      }
    }

    const start = marker + 1;
    if (start > end) {
      return yield* Effect.fail(new NoActiveBlockError({ message: "Code cell is empty" }));
    }

    return makeBlock(doc, "cell", { start, end });
  });

// ============================================================
// Regions, buffers and dispatch
// ============================================================

/**
 * Full lines covering the half-open offset range [from, to)
 */
export const locateRegion = (
  doc: SourceDocument,
  from: number,
  to: number,
): Effect.Effect<Block, NoActiveBlockError> => {
  if (doc.lineCount === 0) {
    return Effect.fail(new NoActiveBlockError({ message: "Nothing to send" }));
  }
  const low = Math.min(from, to);
  const high = Math.max(from, to);
  const start = doc.lineAt(low);
  const end = doc.lineAt(Math.max(low, high - 1));
  return Effect.succeed(makeBlock(doc, "region", { start, end }));
};

export const locateBuffer = (
  doc: SourceDocument,
): Effect.Effect<Block, NoActiveBlockError> =>
  doc.lineCount === 0
    ? Effect.fail(new NoActiveBlockError({ message: "Nothing to send" }))
    : Effect.succeed(makeBlock(doc, "buffer", { start: 0, end: doc.lineCount - 1 }));

/**
 * Offset of the first statement after a block, or the end of the text.
 * Used to step the cursor past a unit once it has been sent.
 */
export function nextStatementOffset(doc: SourceDocument, block: Block): number {
  const line = nextStatementLine(doc, block.range.endLine);
  return line === undefined ? doc.text.length : doc.lineStart(line);
}

export interface LocateOptions {
  cells?: CellPatterns;
  /** End offset for "region" lookups; defaults to the cursor line */
  regionEnd?: number;
}

/**
 * Resolve a block of the given kind around the cursor
 */
export const locate = (
  doc: SourceDocument,
  kind: BlockKind,
  offset: number,
  options: LocateOptions = {},
): Effect.Effect<Block, LocateError> => {
  switch (kind) {
    case "statement":
      return locateStatement(doc, offset);
    case "top-statement":
      return locateTopStatement(doc, offset);
    case "defun":
      return locateDefun(doc, offset);
    case "defclass":
      return locateDefclass(doc, offset);
    case "group":
      return locateGroup(doc, offset);
    case "cell":
      return locateCell(doc, offset, options.cells);
    case "region":
      return locateRegion(doc, offset, options.regionEnd ?? doc.lineEnd(doc.lineAt(offset)));
    case "buffer":
      return locateBuffer(doc);
  }
};
