/**
 * Echo / Capture Controller
 *
 * Sends one request to a session and decides what to show for it:
 * the input (cleaned and truncated) goes into the transcript after the
 * prompt, and the output up to the next prompt is collected and reported
 * once as an EchoSummary.
 */

import { dedent, stripBootstrap, truncateForDisplay } from "@replkit/source";
import type { MalformedBlockError } from "@replkit/source";
import { Deferred, Effect } from "effect";
import { OutputCapture, type EchoSummary } from "./capture.js";
import { SessionBusyError, type TransmissionError } from "./errors.js";
import type { InterpreterSession } from "./session.js";
import { defaultTransmitter, type Transmitter } from "./transmit.js";

export type EchoPolicy = "always" | "never" | "when-not-visible";

export const CONTINUATION_PROMPT = "... ";

export interface SendRequest {
  text: string;
  /** False suppresses both input and output echo */
  echo: boolean;
  addToHistory: boolean;
}

export interface SendOptions {
  echoInput?: EchoPolicy;
  echoOutput?: EchoPolicy;
  headLines?: number;
  tailLines?: number;
  /** Whether the session is currently on screen */
  isVisible?: (session: InterpreterSession) => boolean;
  transmit?: Transmitter;
}

export interface SendReceipt {
  /** Text appended to the transcript, or null when input was not echoed */
  echoedInput: string | null;
  capturing: boolean;
  /** Flushed output summary; null when nothing is captured or the session dies first */
  completion: Effect.Effect<EchoSummary | null>;
}

export type SendError = MalformedBlockError | SessionBusyError | TransmissionError;

export function resolveEchoPolicy(policy: EchoPolicy, visible: boolean): boolean {
  switch (policy) {
    case "always":
      return true;
    case "never":
      return false;
    case "when-not-visible":
      return !visible;
  }
}

/**
 * Input as it appears in the transcript: every line after the first
 * carries the continuation prompt
 */
export function formatEchoedInput(text: string, headLines: number, tailLines: number): string {
  const body = truncateForDisplay(text.replace(/\s+$/, ""), headLines, tailLines);
  const [first = "", ...rest] = body.split("\n");
  return [first, ...rest.map((line) => `${CONTINUATION_PROMPT}${line}`)].join("\n") + "\n";
}

export const send = (
  session: InterpreterSession,
  request: SendRequest,
  options: SendOptions = {},
): Effect.Effect<SendReceipt, SendError> =>
  Effect.gen(function* () {
    const visible = options.isVisible?.(session) ?? false;
    const echoInput =
      request.echo && resolveEchoPolicy(options.echoInput ?? "always", visible);
    const echoOutput =
      request.echo && resolveEchoPolicy(options.echoOutput ?? "when-not-visible", visible);
    const transmit = options.transmit ?? defaultTransmitter;

    const display = echoInput ? yield* dedent(stripBootstrap(request.text)) : "";

    if (echoOutput && !session.beginCapture()) {
      return yield* Effect.fail(
        new SessionBusyError({
          message: `${session.target} is still running the previous request`,
          target: session.target,
        }),
      );
    }

    let echoedInput: string | null = null;
    if (display.trim().length > 0) {
      echoedInput = formatEchoedInput(
        display,
        options.headLines ?? 10,
        options.tailLines ?? 10,
      );
      session.transcript.append(echoedInput, "input");
    }

    if (request.addToHistory) {
      session.history.push(request.text);
    }

    if (!echoOutput) {
      yield* Effect.logDebug(`[EchoController] Sending to ${session.target} without capture`);
      yield* transmit(session, request.text);
      return { echoedInput, capturing: false, completion: Effect.succeed(null) };
    }

    const completion = yield* Deferred.make<EchoSummary | null>();
    const release: Array<() => void> = [];
    const cleanup = () => {
      for (const remove of release.splice(0)) remove();
      session.endCapture();
    };

    const capture = new OutputCapture(session.prompt, (summary) => {
      cleanup();
      Deferred.unsafeDone(completion, Effect.succeed(summary));
    });
    release.push(
      session.addOutputObserver((chunk) => {
        capture.push(chunk);
      }),
      session.onKilled(() => {
        capture.discard();
        cleanup();
        Deferred.unsafeDone(completion, Effect.succeed(null));
      }),
    );

    yield* Effect.logDebug(`[EchoController] Capturing output from ${session.target}`);
    yield* transmit(session, request.text).pipe(
      Effect.onError(() => Effect.sync(cleanup)),
    );

    return { echoedInput, capturing: true, completion: Deferred.await(completion) };
  });
