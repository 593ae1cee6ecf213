/**
 * InterpreterSession
 * One live interpreter addressed by a target name.
 *
 * State moves not-started -> starting -> ready <-> busy -> killed. Output
 * is appended to the transcript first and then handed to the registered
 * observers in registration order.
 *
 * Events: "state" (SessionState), "exit" (code), "killed"
 */

import { EventEmitter } from "node:events";
import { Effect } from "effect";
import { TransmissionError } from "./errors.js";
import type { InterpreterProcess } from "./interpreter-process.js";
import { endsAtPrompt, type PromptBoundary } from "./prompt.js";
import { Transcript } from "./transcript.js";

export type SessionState = "not-started" | "starting" | "ready" | "busy" | "killed";

export type OutputObserver = (chunk: string) => void;

export class InterpreterSession extends EventEmitter {
  readonly transcript = new Transcript();
  readonly history: string[] = [];

  private currentState: SessionState = "not-started";
  private observers: OutputObserver[] = [];
  private killListeners: Array<() => void> = [];
  private capturing = false;
  private prompted = false;

  constructor(
    readonly target: string,
    readonly process: InterpreterProcess,
    readonly prompt: PromptBoundary,
    readonly cwd: string,
  ) {
    super();
  }

  get state(): SessionState {
    return this.currentState;
  }

  get isAlive(): boolean {
    return this.currentState !== "not-started" && this.currentState !== "killed";
  }

  /**
   * True once the interpreter has shown its first prompt
   */
  get hasPrompted(): boolean {
    return this.prompted;
  }

  /**
   * Start listening to the process
   */
  start(): void {
    if (this.currentState !== "not-started") return;
    this.setState("starting");
    this.process.onOutput((chunk) => this.receive(chunk));
    this.process.onExit((code) => {
      if (this.currentState === "killed") return;
      this.emit("exit", code);
      this.terminate(false);
    });
  }

  /**
   * The transcript does not end at a prompt
   */
  isBusy(): boolean {
    return !endsAtPrompt(this.prompt, this.transcript.tail());
  }

  /**
   * Register an output observer; returns its remover
   */
  addOutputObserver(observer: OutputObserver): () => void {
    this.observers.push(observer);
    return () => {
      this.observers = this.observers.filter((current) => current !== observer);
    };
  }

  /**
   * Run `listener` once when the session is killed or its process exits;
   * returns its remover
   */
  onKilled(listener: () => void): () => void {
    this.killListeners.push(listener);
    return () => {
      this.killListeners = this.killListeners.filter((current) => current !== listener);
    };
  }

  /**
   * Claim the session's single capture slot. False when already taken.
   */
  beginCapture(): boolean {
    if (this.capturing) return false;
    this.capturing = true;
    return true;
  }

  endCapture(): void {
    this.capturing = false;
  }

  get isCapturing(): boolean {
    return this.capturing;
  }

  write(data: string): Effect.Effect<void, TransmissionError> {
    return Effect.suspend(() => {
      if (!this.isAlive) {
        return Effect.fail(
          new TransmissionError({ message: `Session ${this.target} is not running` }),
        );
      }
      if (this.currentState === "ready") this.setState("busy");
      return this.process.write(data);
    });
  }

  /**
   * Terminate the process. A pending capture is dropped without a flush.
   */
  kill(destroyTranscript = false): void {
    if (this.currentState === "killed") return;
    this.terminate(true);
    if (destroyTranscript) this.transcript.clear();
  }

  private terminate(killProcess: boolean): void {
    this.setState("killed");
    this.observers = [];
    this.capturing = false;
    if (killProcess) this.process.kill();

    const listeners = this.killListeners;
    this.killListeners = [];
    for (const listener of listeners) listener();
    this.emit("killed");
  }

  private receive(chunk: string): void {
    if (this.currentState === "killed") return;

    this.transcript.append(chunk, "output");
    if (endsAtPrompt(this.prompt, this.transcript.tail())) {
      this.prompted = true;
      if (this.currentState === "starting" || this.currentState === "busy") {
        this.setState("ready");
      }
    }

    for (const observer of [...this.observers]) observer(chunk);
  }

  private setState(state: SessionState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.emit("state", state);
  }
}
