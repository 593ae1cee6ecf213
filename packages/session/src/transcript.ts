import { EventEmitter } from "node:events";

export type TranscriptSource = "output" | "input";

export interface TranscriptEntry {
  source: TranscriptSource;
  text: string;
}

/**
 * Everything a session has shown: interpreter output plus echoed input.
 * Emits "append" with a TranscriptEntry and "clear".
 */
export class Transcript extends EventEmitter {
  private buffer = "";

  append(text: string, source: TranscriptSource = "output"): void {
    if (text.length === 0) return;
    this.buffer += text;
    const entry: TranscriptEntry = { source, text };
    this.emit("append", entry);
  }

  get text(): string {
    return this.buffer;
  }

  /**
   * Last `length` characters
   */
  tail(length = 256): string {
    return this.buffer.slice(-length);
  }

  clear(): void {
    this.buffer = "";
    this.emit("clear");
  }
}
