/**
 * Output formatting for the replkit CLI
 */

import type { EchoSummary } from "@replkit/session";
import type { Block, SourceDocument } from "@replkit/source";
import pc from "picocolors";

export type Colors = ReturnType<typeof pc.createColors>;

/** Completion result once the wait has ended */
export type CompletionOutcome = EchoSummary | null | "timeout";

export function formatBlockHeader(block: Block, file: string, colors: Colors = pc): string {
  return `${colors.bold(block.kind)} ${file}:${block.range.startLine}-${block.range.endLine}`;
}

export function blockToJson(block: Block, text: string): string {
  return JSON.stringify(
    {
      kind: block.kind,
      start: block.start,
      end: block.end,
      startLine: block.range.startLine,
      endLine: block.range.endLine,
      text,
    },
    null,
    2,
  );
}

export function formatOutcome(
  outcome: CompletionOutcome,
  timeoutMs: number,
  colors: Colors = pc,
): string {
  if (outcome === null) return colors.dim("Sent (output not captured).");
  if (outcome === "timeout") {
    return colors.yellow(`No prompt after ${timeoutMs} ms; the interpreter may still be running.`);
  }

  switch (outcome.kind) {
    case "exception":
      return `${colors.red(outcome.message)}\n${outcome.text.trimEnd()}`;
    case "empty":
      return colors.dim(outcome.message);
    case "output":
      return outcome.message;
  }
}

/**
 * Where the cursor goes after "send and step"
 */
export function formatStep(doc: SourceDocument, nextOffset: number): string {
  return nextOffset >= doc.text.length
    ? "End of file reached."
    : `Next statement at line ${doc.lineAt(nextOffset) + 1}`;
}

export interface ReportedError {
  text: string;
  exitCode: number;
}

/**
 * A cursor outside the requested block is a notice, not a failure
 */
export function formatError(
  error: { _tag: string; message: string },
  colors: Colors = pc,
): ReportedError {
  if (error._tag === "NoActiveBlockError") {
    return { text: colors.yellow(error.message), exitCode: 0 };
  }
  return { text: `${colors.red("Error:")} ${error.message}`, exitCode: 1 };
}
