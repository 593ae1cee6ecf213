/**
 * Transmission strategies.
 *
 * A single line is typed straight into the interpreter. Anything longer is
 * written to a temporary file and the interpreter is told to load it with
 * the file bootstrap command, which removes the file once read.
 */

import { randomUUID } from "node:crypto";
import { rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { buildFileBootstrap } from "@replkit/source";
import { Effect } from "effect";
import { TransmissionError } from "./errors.js";
import type { InterpreterSession } from "./session.js";

export type Transmitter = (
  session: InterpreterSession,
  text: string,
) => Effect.Effect<void, TransmissionError>;

export interface FileTransmitterOptions {
  /** Keep `if __name__ == "__main__":` blocks */
  runMainGuard?: boolean;
  /** Name shown in tracebacks instead of the temporary file */
  displayName?: string;
  tempDir?: string;
}

// A compound statement typed on one line leaves the interpreter waiting
// for an empty line
const COMPOUND_HEADER = /^(?:async[ \t]+)?(?:if|for|while|with|try|def|class)\b|^@/;

const writePayload = (text: string, tempDir: string) =>
  Effect.tryPromise({
    try: async () => {
      const file = path.join(tempDir, `replkit-${randomUUID()}.py`);
      await writeFile(file, text, "utf-8");
      return file;
    },
    catch: (error) =>
      new TransmissionError({
        message: `Failed to write payload file: ${String(error)}`,
        cause: error,
      }),
  });

const removePayload = (file: string) =>
  Effect.tryPromise({
    try: () => rm(file, { force: true }),
    catch: (error) =>
      new TransmissionError({ message: `Failed to remove ${file}`, cause: error }),
  }).pipe(
    Effect.catchAll((error) => Effect.logWarning(`[Transmitter] ${error.message}`)),
  );

export const makeFileTransmitter =
  (options: FileTransmitterOptions = {}): Transmitter =>
  (session, text) =>
    Effect.gen(function* () {
      const payload = text.replace(/\s+$/, "");

      if (!payload.includes("\n")) {
        const terminator = COMPOUND_HEADER.test(payload) ? "\n\n" : "\n";
        yield* Effect.logDebug(`[Transmitter] Writing one line to ${session.target}`);
        return yield* session.write(`${payload}${terminator}`);
      }

      const file = yield* writePayload(payload, options.tempDir ?? os.tmpdir());
      const command = buildFileBootstrap({
        path: file,
        displayName: options.displayName,
        encoding: "utf-8",
        deleteAfter: true,
        runMainGuard: options.runMainGuard ?? true,
      });

      yield* Effect.logDebug(
        `[Transmitter] Sending ${payload.split("\n").length} lines to ${session.target} through ${file}`,
      );
      yield* session
        .write(`${command}\n`)
        .pipe(Effect.tapError(() => removePayload(file)));
    });

export const defaultTransmitter: Transmitter = makeFileTransmitter();
