/**
 * Source Transformer
 * Text transforms applied to located blocks before they are transmitted
 * or echoed into a session transcript.
 */

import { Effect } from "effect";
import { CODING_DECLARATION, FILE_LOAD_PREAMBLE } from "./bootstrap.js";
import { MalformedBlockError } from "./errors.js";
import {
  classifyLine,
  indentationOf,
  isCodeKind,
  leadingWhitespaceLength,
} from "./line-classifier.js";

export const ELLIPSIS_LINE = "...";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Artifacts the driver adds around transmitted code, removed again from
 * the copy shown in the transcript
 */
const BOOTSTRAP_PATTERNS: RegExp[] = [
  // File-load command; the compile/exec steps run inline on the same line
  new RegExp(`^${escapeRegExp(FILE_LOAD_PREAMBLE)}.*(?:\\n|$)`, "m"),
  // Guard that prepareRegion wraps around indented regions, only together
  // with the declaration it puts in front of it
  new RegExp(`^${escapeRegExp(CODING_DECLARATION)}\\nif True:(?:\\n|$)`),
  // Encoding declaration on the first line
  /^#[ \t]*-\*-[ \t]*coding:[ \t]*[-\w.]+[ \t]*-\*-[ \t]*(?:\n|$)/,
  // Leading blank lines
  /^(?:[ \t]*\n)+/,
];

/**
 * Remove driver-injected boilerplate. Runs to a fixed point, so applying it
 * twice gives the same result as applying it once.
 */
export function stripBootstrap(text: string): string {
  let current = text;
  for (;;) {
    const next = BOOTSTRAP_PATTERNS.reduce(
      (value, pattern) => value.replace(pattern, ""),
      current,
    );
    if (next === current) return current;
    current = next;
  }
}

/**
 * Remove `columns` columns of leading whitespace and re-emit what remains
 * as spaces
 */
function shiftLeft(line: string, columns: number): string {
  const leading = leadingWhitespaceLength(line);
  const width = indentationOf(line.slice(0, leading));
  return " ".repeat(Math.max(0, width - columns)) + line.slice(leading);
}

/**
 * Shift a fragment left so its first code line starts at column 0.
 * Fails when a later code line is indented less than the first one, since
 * no uniform shift can fix that fragment.
 */
export const dedent = (text: string): Effect.Effect<string, MalformedBlockError> =>
  Effect.gen(function* () {
    const lines = text.split("\n");
    let shift: number | undefined;

    for (const [index, line] of lines.entries()) {
      if (!isCodeKind(classifyLine(line))) continue;

      const indent = indentationOf(line);
      if (shift === undefined) {
        shift = indent;
      } else if (indent < shift) {
        return yield* Effect.fail(
          new MalformedBlockError({
            message: `Can't send an inconsistent block: line ${index + 1} is indented less than the first line`,
            line: index + 1,
          }),
        );
      }
    }

    if (!shift) return text;
    const columns = shift;
    return lines.map((line) => shiftLeft(line, columns)).join("\n");
  });

/**
 * Keep the first `headLines` and last `tailLines` lines of a long text,
 * joined by a single ellipsis line
 */
export function truncateForDisplay(
  text: string,
  headLines: number,
  tailLines: number,
): string {
  const trailingNewline = text.endsWith("\n");
  const body = trailingNewline ? text.slice(0, -1) : text;
  const lines = body.split("\n");

  if (lines.length <= headLines + tailLines) return text;

  const kept = [
    ...lines.slice(0, headLines),
    ELLIPSIS_LINE,
    ...lines.slice(lines.length - tailLines),
  ];
  return kept.join("\n") + (trailingNewline ? "\n" : "");
}

/**
 * Text actually transmitted for a region. Regions whose first code line is
 * indented are wrapped in an always-true guard so the interpreter accepts
 * them; multi-line payloads get an encoding declaration since they travel
 * through a file.
 */
export function prepareRegion(text: string): string {
  const body = text.replace(/\s+$/, "");
  const firstCode = body.split("\n").find((line) => isCodeKind(classifyLine(line)));
  const guarded =
    firstCode !== undefined && indentationOf(firstCode) > 0 ? `if True:\n${body}` : body;

  return guarded.includes("\n") ? `${CODING_DECLARATION}\n${guarded}` : guarded;
}
