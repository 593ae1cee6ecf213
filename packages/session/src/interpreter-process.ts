/**
 * InterpreterLauncher
 * Finds the interpreter binary and spawns it as an interactive subprocess
 * with piped stdio. stdout and stderr are merged into one output feed.
 */

import { execFile, spawn } from "node:child_process";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { promisify } from "node:util";
import { Effect } from "effect";
import { ConfigurationError, TransmissionError } from "./errors.js";

const execFileAsync = promisify(execFile);

/** Bare command names looked up in PATH */
const COMMAND_NAME = /^[\w.+-]+$/;

/**
 * Handle on a running interpreter
 */
export interface InterpreterProcess {
  readonly pid: number | undefined;
  /** Write raw text to the interpreter's stdin */
  write(data: string): Effect.Effect<void, TransmissionError>;
  /** Subscribe to merged stdout/stderr text */
  onOutput(listener: (chunk: string) => void): void;
  onExit(listener: (code: number | null) => void): void;
  kill(): void;
}

export interface LaunchOptions {
  /** Resolved interpreter path */
  interpreter: string;
  args: readonly string[];
  cwd: string;
  env?: Record<string, string>;
}

/**
 * Check if a file exists and is executable
 */
function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function spawnInterpreter(options: LaunchOptions): InterpreterProcess {
  const child = spawn(options.interpreter, [...options.args], {
    stdio: ["pipe", "pipe", "pipe"],
    cwd: options.cwd,
    env: { ...process.env, PYTHONUNBUFFERED: "1", ...options.env },
  });

  child.stdout.setEncoding("utf8");
  child.stderr.setEncoding("utf8");

  const exitListeners: Array<(code: number | null) => void> = [];
  let exited = false;
  const notifyExit = (code: number | null) => {
    if (exited) return;
    exited = true;
    for (const listener of exitListeners) listener(code);
  };

  let stdinError: Error | null = null;
  child.stdin.on("error", (error) => {
    stdinError = error;
  });
  child.on("error", (error) => {
    stdinError = error;
    notifyExit(null);
  });
  child.on("exit", (code) => notifyExit(code));

  return {
    pid: child.pid,
    write: (data) =>
      Effect.async<void, TransmissionError>((resume) => {
        if (exited || stdinError !== null || !child.stdin.writable) {
          resume(
            Effect.fail(
              new TransmissionError({
                message: "Interpreter is not accepting input",
                cause: stdinError ?? undefined,
              }),
            ),
          );
          return;
        }
        child.stdin.write(data, (error) => {
          resume(
            error
              ? Effect.fail(
                  new TransmissionError({
                    message: `Failed to write to interpreter: ${error.message}`,
                    cause: error,
                  }),
                )
              : Effect.void,
          );
        });
      }),
    onOutput: (listener) => {
      child.stdout.on("data", (chunk: string) => listener(chunk));
      child.stderr.on("data", (chunk: string) => listener(chunk));
    },
    onExit: (listener) => {
      exitListeners.push(listener);
    },
    kill: () => {
      child.kill();
    },
  };
}

/**
 * Service for locating and starting interpreters
 */
export class InterpreterLauncher extends Effect.Service<InterpreterLauncher>()(
  "InterpreterLauncher",
  {
    effect: Effect.gen(function* () {
      /**
       * Resolve an interpreter name or path to an executable file
       */
      const resolve = (
        interpreter: string,
      ): Effect.Effect<string, ConfigurationError> =>
        Effect.gen(function* () {
          if (interpreter.includes(path.sep) || interpreter.includes("/")) {
            const absolute = path.resolve(interpreter);
            if (isExecutable(absolute)) return absolute;
            return yield* Effect.fail(
              new ConfigurationError({
                message: `Interpreter is not executable: ${absolute}`,
              }),
            );
          }

          if (!COMMAND_NAME.test(interpreter)) {
            return yield* Effect.fail(
              new ConfigurationError({
                message: `Interpreter "${interpreter}" is not a command name or path`,
              }),
            );
          }

          const lookup = yield* Effect.tryPromise({
            try: () =>
              execFileAsync(os.platform() === "win32" ? "where" : "which", [interpreter]),
            catch: () => new Error("Not found in PATH"),
          }).pipe(
            Effect.map((result) => result.stdout),
            Effect.catchAll(() => Effect.succeed(null)),
          );

          const found = lookup?.trim().split("\n")[0]?.trim();
          if (found && isExecutable(found)) {
            yield* Effect.logDebug(
              `[InterpreterLauncher] Found ${interpreter} in PATH: ${found}`,
            );
            return found;
          }

          return yield* Effect.fail(
            new ConfigurationError({
              message: `Interpreter "${interpreter}" not found in PATH`,
            }),
          );
        });

      /**
       * Spawn the interpreter
       */
      const launch = (
        options: LaunchOptions,
      ): Effect.Effect<InterpreterProcess, ConfigurationError> =>
        Effect.try({
          try: () => spawnInterpreter(options),
          catch: (error) =>
            new ConfigurationError({
              message: `Failed to start ${options.interpreter}: ${String(error)}`,
            }),
        }).pipe(
          Effect.tap((child) =>
            Effect.logDebug(
              `[InterpreterLauncher] Started ${options.interpreter} ${options.args.join(" ")} (pid ${child.pid ?? "unknown"}) in ${options.cwd}`,
            ),
          ),
        );

      return { resolve, launch };
    }),
  },
) {}
