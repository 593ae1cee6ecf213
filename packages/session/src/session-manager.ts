/**
 * SessionManager - Effect service owning one interpreter session per target
 *
 * Targets are `Python` for the shared session, or `Python[<source>]` when
 * dedicated sessions are enabled. Sessions are created lazily on first use
 * and live until killed.
 */

import { Context, Duration, Effect, Layer } from "effect";
import {
  type ReplkitConfig,
  promptBoundaryFromConfig,
  resolveWorkingDirectory,
} from "./config.js";
import type { ConfigurationError } from "./errors.js";
import { InterpreterLauncher } from "./interpreter-process.js";
import { InterpreterSession } from "./session.js";

export const SHARED_TARGET = "Python";

export type SessionManagerConfig = Pick<
  ReplkitConfig,
  | "interpreter"
  | "interpreterArgs"
  | "dedicated"
  | "workingDirectory"
  | "readyTimeoutMs"
  | "readyPollIntervalMs"
  | "promptPattern"
>;

/**
 * Asked once per live session before killAll terminates it
 */
export type KillConfirmation = (session: InterpreterSession) => boolean;

// Service interface
export interface SessionManager {
  /**
   * Target name for a source; the shared target unless dedicated sessions
   * are enabled
   */
  readonly targetFor: (sourceId?: string, dedicated?: boolean) => string;

  /**
   * Live session for the target, started if needed
   */
  readonly getOrCreate: (
    target: string,
    sourcePath?: string,
  ) => Effect.Effect<InterpreterSession, ConfigurationError>;

  /**
   * getOrCreate, then wait (bounded) for the first prompt. Returns the
   * session whether or not the prompt appeared.
   */
  readonly ensureRunning: (
    target: string,
    sourcePath?: string,
  ) => Effect.Effect<InterpreterSession, ConfigurationError>;

  readonly get: (target: string) => InterpreterSession | undefined;

  /**
   * The target's transcript does not end at a prompt. False without a
   * live session.
   */
  readonly isBusy: (target: string) => boolean;

  /**
   * Kill one session. Succeeds with false when there was none.
   */
  readonly kill: (target: string, destroyTranscript?: boolean) => Effect.Effect<boolean>;

  /**
   * Kill every live session the confirmation accepts. Succeeds with the
   * number killed.
   */
  readonly killAll: (
    destroyTranscripts?: boolean,
    confirm?: KillConfirmation,
  ) => Effect.Effect<number>;

  readonly list: () => readonly InterpreterSession[];
}

export const SessionManager = Context.GenericTag<SessionManager>("SessionManager");

export const makeSessionManagerLive = (config: SessionManagerConfig) =>
  Layer.effect(
    SessionManager,
    Effect.gen(function* () {
      const launcher = yield* InterpreterLauncher;
      const sessions = new Map<string, InterpreterSession>();
      const prompt = promptBoundaryFromConfig(config);

      const targetFor = (sourceId?: string, dedicated = config.dedicated) =>
        dedicated && sourceId ? `${SHARED_TARGET}[${sourceId}]` : SHARED_TARGET;

      const get = (target: string) => {
        const session = sessions.get(target);
        return session?.isAlive ? session : undefined;
      };

      const getOrCreate = (target: string, sourcePath?: string) =>
        Effect.gen(function* () {
          const existing = get(target);
          if (existing) return existing;

          const cwd = yield* resolveWorkingDirectory(config.workingDirectory, sourcePath);
          const interpreter = yield* launcher.resolve(config.interpreter);
          const child = yield* launcher.launch({
            interpreter,
            args: config.interpreterArgs,
            cwd,
          });

          const session = new InterpreterSession(target, child, prompt, cwd);
          sessions.set(target, session);
          session.onKilled(() => {
            if (sessions.get(target) === session) sessions.delete(target);
          });
          session.start();

          yield* Effect.logInfo(`[SessionManager] Started ${target} (${interpreter})`);
          return session;
        });

      const waitForPrompt = (session: InterpreterSession) =>
        Effect.gen(function* () {
          let waited = 0;
          while (
            !session.hasPrompted &&
            session.isAlive &&
            waited < config.readyTimeoutMs
          ) {
            const step = Math.min(config.readyPollIntervalMs, config.readyTimeoutMs - waited);
            yield* Effect.sleep(Duration.millis(step));
            waited += step;
          }

          if (!session.hasPrompted) {
            yield* Effect.logWarning(
              `[SessionManager] ${session.target} showed no prompt within ${config.readyTimeoutMs} ms`,
            );
          }
          return session;
        });

      const ensureRunning = (target: string, sourcePath?: string) =>
        getOrCreate(target, sourcePath).pipe(Effect.flatMap(waitForPrompt));

      const isBusy = (target: string) => get(target)?.isBusy() ?? false;

      const kill = (target: string, destroyTranscript = false) =>
        Effect.gen(function* () {
          const session = get(target);
          if (!session) return false;
          session.kill(destroyTranscript);
          yield* Effect.logDebug(`[SessionManager] Killed ${target}`);
          return true;
        });

      const killAll = (destroyTranscripts = false, confirm?: KillConfirmation) =>
        Effect.gen(function* () {
          let killed = 0;
          for (const session of [...sessions.values()]) {
            if (!session.isAlive) continue;
            if (confirm && !confirm(session)) continue;
            session.kill(destroyTranscripts);
            killed++;
          }
          if (killed > 0) {
            yield* Effect.logDebug(`[SessionManager] Killed ${killed} session(s)`);
          }
          return killed;
        });

      const list = () => [...sessions.values()].filter((session) => session.isAlive);

      return {
        targetFor,
        getOrCreate,
        ensureRunning,
        get,
        isBusy,
        kill,
        killAll,
        list,
      } satisfies SessionManager;
    }),
  );
