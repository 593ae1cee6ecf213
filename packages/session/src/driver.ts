/**
 * Driver
 * Locate-and-send operations built on the block locator and the echo
 * controller.
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import {
  type Block,
  type BlockKind,
  type LocateError,
  type LocateOptions,
  type SourceDocument,
  blockText,
  buildFileBootstrap,
  dedent,
  detectEncoding,
  locate,
  nextStatementOffset,
  prepareRegion,
} from "@replkit/source";
import { Effect } from "effect";
import type { ReplkitConfig } from "./config.js";
import { type SendError, type SendOptions, type SendReceipt, send } from "./echo-controller.js";
import { TransmissionError } from "./errors.js";
import type { InterpreterSession } from "./session.js";
import { makeFileTransmitter } from "./transmit.js";

export interface BlockSendResult {
  block: Block;
  receipt: SendReceipt;
  /** Offset of the statement after the block, for stepping through a file */
  nextOffset: number;
}

/**
 * Send options described by the configuration
 */
export function sendOptionsFromConfig(config: ReplkitConfig): SendOptions {
  return {
    echoInput: config.echoInput ? "always" : "never",
    echoOutput: config.echoOutput,
    headLines: config.echoInputHeadLines,
    tailLines: config.echoInputTailLines,
  };
}

/**
 * Locate a block around the cursor and send it. Regions travel as they
 * are, under an `if True:` guard when indented; every other kind is
 * dedented first, which rejects inconsistently indented blocks.
 */
export const sendBlock = (
  session: InterpreterSession,
  doc: SourceDocument,
  kind: BlockKind,
  offset: number,
  options: SendOptions & LocateOptions = {},
): Effect.Effect<BlockSendResult, LocateError | SendError> =>
  Effect.gen(function* () {
    const block = yield* locate(doc, kind, offset, options);
    const text = blockText(doc, block);
    const payload = kind === "region" ? prepareRegion(text) : yield* dedent(text);

    yield* Effect.logDebug(
      `[Driver] Sending ${kind} at lines ${block.range.startLine}-${block.range.endLine}`,
    );
    const receipt = yield* send(
      session,
      { text: payload, echo: true, addToHistory: true },
      options,
    );
    return { block, receipt, nextOffset: nextStatementOffset(doc, block) };
  });

/**
 * Send a whole unsaved source text. `if __name__ == "__main__":` blocks
 * only run with `runMainGuard`.
 */
export const sendBuffer = (
  session: InterpreterSession,
  source: string,
  name: string,
  options: SendOptions & { runMainGuard?: boolean } = {},
): Effect.Effect<SendReceipt, SendError> =>
  send(
    session,
    { text: source, echo: true, addToHistory: false },
    {
      ...options,
      transmit:
        options.transmit ??
        makeFileTransmitter({ displayName: name, runMainGuard: options.runMainGuard ?? false }),
    },
  );

/**
 * Run a file in the session through the file bootstrap command. The
 * interpreter reads the file itself; only its encoding is checked here.
 */
export const sendFile = (
  session: InterpreterSession,
  filePath: string,
  options: SendOptions & { runMainGuard?: boolean } = {},
): Effect.Effect<SendReceipt, SendError> =>
  Effect.gen(function* () {
    const absolute = path.resolve(filePath);
    const source = yield* Effect.tryPromise({
      try: () => readFile(absolute, "utf-8"),
      catch: (error) =>
        new TransmissionError({ message: `Cannot read ${absolute}: ${String(error)}`, cause: error }),
    });

    const command = buildFileBootstrap({
      path: absolute,
      encoding: detectEncoding(source),
      runMainGuard: options.runMainGuard ?? false,
    });

    yield* Effect.logDebug(`[Driver] Running ${absolute} in ${session.target}`);
    return yield* send(session, { text: command, echo: true, addToHistory: false }, options);
  });
