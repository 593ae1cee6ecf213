/**
 * Effect runtime wiring for CLI commands
 */

import {
  type EchoSummary,
  InterpreterLauncher,
  type ReplkitConfig,
  type SendReceipt,
  createLoggerLayer,
  makeSessionManagerLive,
} from "@replkit/session";
import { Duration, Effect, Either, Layer } from "effect";
import pc from "picocolors";
import { type CompletionOutcome, formatError } from "./format.js";

export const DEFAULT_COMPLETION_TIMEOUT_MS = 30_000;

export function isVerbose(flag: boolean | undefined): boolean {
  return Boolean(flag) || Boolean(process.env.DEBUG);
}

export const loggerLayer = (verbose: boolean) =>
  createLoggerLayer((line) => {
    process.stderr.write(`${pc.dim(line)}\n`);
  }, verbose);

/**
 * SessionManager backed by real interpreter processes
 */
export const sessionLayer = (config: ReplkitConfig) =>
  makeSessionManagerLive(config).pipe(Layer.provide(InterpreterLauncher.Default));

/**
 * Wait for a send to report its output, or give up after `timeoutMs`
 */
export const awaitCompletion = (
  receipt: SendReceipt,
  timeoutMs: number,
): Effect.Effect<CompletionOutcome> =>
  receipt.completion.pipe(
    Effect.timeoutTo({
      duration: Duration.millis(timeoutMs),
      onSuccess: (summary: EchoSummary | null): CompletionOutcome => summary,
      onTimeout: (): CompletionOutcome => "timeout",
    }),
  );

/**
 * Run a command program, printing its failure the way the CLI reports
 * errors and setting the exit code
 */
export async function runCommand<A, E extends { _tag: string; message: string }>(
  program: Effect.Effect<A, E>,
  verbose: boolean,
): Promise<A | undefined> {
  const result = await Effect.runPromise(
    Effect.either(program).pipe(Effect.provide(loggerLayer(verbose))),
  );

  if (Either.isRight(result)) return result.right;

  const reported = formatError(result.left);
  if (reported.exitCode === 0) {
    console.log(reported.text);
  } else {
    console.error(reported.text);
  }
  process.exitCode = reported.exitCode;
  return undefined;
}
