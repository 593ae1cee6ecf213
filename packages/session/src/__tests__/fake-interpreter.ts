/**
 * In-process stand-in for an interpreter subprocess
 */

import { Effect, Layer } from "effect";
import { ConfigurationError, TransmissionError } from "../errors.js";
import {
  InterpreterLauncher,
  type InterpreterProcess,
  type LaunchOptions,
} from "../interpreter-process.js";
import { pythonPromptBoundary } from "../prompt.js";
import { InterpreterSession } from "../session.js";

/** Output chunks produced in reply to one write */
export type Responder = (input: string) => string[];

export const promptOnly: Responder = () => [">>> "];

export interface FakeInterpreterOptions {
  /** Printed when the first output listener attaches; null for none */
  greeting?: string | null;
  respond?: Responder;
}

export class FakeInterpreter implements InterpreterProcess {
  readonly pid = 4242;
  readonly written: string[] = [];
  killed = false;
  failWrites = false;

  private outputListeners: Array<(chunk: string) => void> = [];
  private exitListeners: Array<(code: number | null) => void> = [];

  constructor(private readonly options: FakeInterpreterOptions = {}) {}

  write(data: string): Effect.Effect<void, TransmissionError> {
    return Effect.suspend(() => {
      if (this.failWrites) {
        return Effect.fail(new TransmissionError({ message: "broken pipe" }));
      }
      this.written.push(data);
      const respond = this.options.respond ?? promptOnly;
      for (const chunk of respond(data)) this.emitOutput(chunk);
      return Effect.void;
    });
  }

  onOutput(listener: (chunk: string) => void): void {
    this.outputListeners.push(listener);
    const greeting =
      this.options.greeting === undefined ? "Python 3.12.0\n>>> " : this.options.greeting;
    if (greeting !== null && this.outputListeners.length === 1) listener(greeting);
  }

  onExit(listener: (code: number | null) => void): void {
    this.exitListeners.push(listener);
  }

  emitOutput(chunk: string): void {
    for (const listener of this.outputListeners) listener(chunk);
  }

  emitExit(code: number | null): void {
    for (const listener of this.exitListeners) listener(code);
  }

  kill(): void {
    this.killed = true;
  }
}

export interface FakeLauncherOptions extends FakeInterpreterOptions {
  resolvable?: boolean;
}

/**
 * InterpreterLauncher layer that hands out FakeInterpreters
 */
export function makeFakeLauncher(options: FakeLauncherOptions = {}) {
  const launched: FakeInterpreter[] = [];
  const launches: LaunchOptions[] = [];

  const layer = Layer.succeed(
    InterpreterLauncher,
    new InterpreterLauncher({
      resolve: (interpreter: string) =>
        options.resolvable === false
          ? Effect.fail(
              new ConfigurationError({
                message: `Interpreter "${interpreter}" not found in PATH`,
              }),
            )
          : Effect.succeed(`/usr/bin/${interpreter}`),
      launch: (launchOptions: LaunchOptions) =>
        Effect.sync(() => {
          const fake = new FakeInterpreter(options);
          launches.push(launchOptions);
          launched.push(fake);
          return fake;
        }),
    }),
  );

  return { layer, launched, launches };
}

/**
 * Started session on top of a fake process
 */
export function makeFakeSession(options: FakeInterpreterOptions = {}, target = "Python") {
  const fake = new FakeInterpreter(options);
  const session = new InterpreterSession(target, fake, pythonPromptBoundary, "/work");
  session.start();
  return { session, fake };
}
