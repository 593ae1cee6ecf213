/**
 * Output capture for a single send.
 * Chunks arrive with arbitrary boundaries; the prompt is looked for in the
 * accumulated text, never in a chunk on its own.
 */

import type { PromptBoundary } from "./prompt.js";

export const TRACEBACK_MARKER = "Traceback (most recent call last):";

export type EchoSummaryKind = "output" | "empty" | "exception";

export interface EchoSummary {
  kind: EchoSummaryKind;
  /** One-line message for the user */
  message: string;
  /** Captured text before the prompt */
  text: string;
}

export function summarizeOutput(text: string): EchoSummary {
  if (text.includes(TRACEBACK_MARKER)) {
    return {
      kind: "exception",
      message: "Exception occurred (see the session transcript)",
      text,
    };
  }
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { kind: "empty", message: "No output was produced.", text };
  }
  return { kind: "output", message: trimmed, text };
}

export class OutputCapture {
  private buffer = "";
  private done = false;

  constructor(
    private readonly boundary: PromptBoundary,
    private readonly onFlush: (summary: EchoSummary) => void,
  ) {}

  get pending(): string {
    return this.buffer;
  }

  get isDone(): boolean {
    return this.done;
  }

  /**
   * Add a chunk. Returns true once the capture has flushed.
   */
  push(chunk: string): boolean {
    if (this.done) return true;

    this.buffer += chunk;
    const match = this.boundary.find(this.buffer);
    if (match === null) return false;

    const text = this.buffer.slice(0, match.index);
    this.buffer = "";
    this.done = true;
    this.onFlush(summarizeOutput(text));
    return true;
  }

  /**
   * Drop buffered text without flushing
   */
  discard(): void {
    this.buffer = "";
    this.done = true;
  }
}
