import { Data } from "effect";

/**
 * Error types for locating and transforming source blocks
 */
export class NavigationError extends Data.TaggedError("NavigationError")<{
  message: string;
  line?: number;
}> {}

export class NoActiveBlockError extends Data.TaggedError("NoActiveBlockError")<{
  message: string;
}> {}

export class MalformedBlockError extends Data.TaggedError(
  "MalformedBlockError",
)<{
  message: string;
  /** 1-based line (within the fragment) that breaks the indentation */
  line: number;
}> {}

export type LocateError = NavigationError | NoActiveBlockError;
