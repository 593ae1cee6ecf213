import { Data } from "effect";

/**
 * Invalid configuration, unknown working-directory mode or an interpreter
 * that cannot be found
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  message: string;
  issues?: string[];
}> {}

/**
 * A capturing send was issued while another capture is still pending
 */
export class SessionBusyError extends Data.TaggedError("SessionBusyError")<{
  message: string;
  target: string;
}> {}

/**
 * Writing to the interpreter or to a payload file failed
 */
export class TransmissionError extends Data.TaggedError("TransmissionError")<{
  message: string;
  cause?: unknown;
}> {}
