/**
 * @replkit/session
 * Runs interactive Python interpreters, sends code to them and reports
 * what each request printed.
 *
 * @example
 * ```typescript
 * import { Effect, Layer } from "effect";
 * import {
 *   InterpreterLauncher,
 *   SessionManager,
 *   defaultConfig,
 *   makeSessionManagerLive,
 *   send,
 * } from "@replkit/session";
 *
 * const program = Effect.gen(function* () {
 *   const manager = yield* SessionManager;
 *   const session = yield* manager.ensureRunning(manager.targetFor());
 *   const receipt = yield* send(session, { text: "1 + 1", echo: true, addToHistory: true });
 *   return yield* receipt.completion; // { kind: "output", message: "2", ... }
 * });
 *
 * const live = makeSessionManagerLive(defaultConfig).pipe(
 *   Layer.provide(InterpreterLauncher.Default),
 * );
 * Effect.runPromise(program.pipe(Effect.provide(live)));
 * ```
 */

// ============================================================
// Errors
// ============================================================

export { ConfigurationError, SessionBusyError, TransmissionError } from "./errors.js";

// ============================================================
// Processes and sessions
// ============================================================

export {
  InterpreterLauncher,
  type InterpreterProcess,
  type LaunchOptions,
} from "./interpreter-process.js";

export {
  PYTHON_PROMPT_PATTERN,
  endsAtPrompt,
  makePromptBoundary,
  pythonPromptBoundary,
  type PromptBoundary,
  type PromptMatch,
} from "./prompt.js";

export { Transcript, type TranscriptEntry, type TranscriptSource } from "./transcript.js";

export { InterpreterSession, type OutputObserver, type SessionState } from "./session.js";

export {
  SHARED_TARGET,
  SessionManager,
  makeSessionManagerLive,
  type KillConfirmation,
  type SessionManagerConfig,
} from "./session-manager.js";

// ============================================================
// Sending
// ============================================================

export {
  OutputCapture,
  TRACEBACK_MARKER,
  summarizeOutput,
  type EchoSummary,
  type EchoSummaryKind,
} from "./capture.js";

export {
  defaultTransmitter,
  makeFileTransmitter,
  type FileTransmitterOptions,
  type Transmitter,
} from "./transmit.js";

export {
  CONTINUATION_PROMPT,
  formatEchoedInput,
  resolveEchoPolicy,
  send,
  type EchoPolicy,
  type SendError,
  type SendOptions,
  type SendReceipt,
  type SendRequest,
} from "./echo-controller.js";

export {
  sendBlock,
  sendBuffer,
  sendFile,
  sendOptionsFromConfig,
  type BlockSendResult,
} from "./driver.js";

// ============================================================
// Configuration and logging
// ============================================================

export {
  CONFIG_FILE_NAME,
  ReplkitConfigSchema,
  cellPatternsFromConfig,
  defaultConfig,
  loadConfig,
  parseConfig,
  promptBoundaryFromConfig,
  resolveWorkingDirectory,
  type ReplkitConfig,
  type WorkingDirectorySetting,
} from "./config.js";

export { createLoggerLayer, type LogSink } from "./logger.js";
