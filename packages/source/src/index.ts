/**
 * @replkit/source
 * Locates Python statements, definitions, groups and cells from
 * indentation, and prepares their text for an interactive interpreter.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { SourceDocument, locateStatement, blockText } from "@replkit/source";
 *
 * const doc = new SourceDocument("if x:\n    a()\nelse:\n    b()\n");
 * const block = Effect.runSync(locateStatement(doc, 0));
 * blockText(doc, block); // the whole if/else statement
 * ```
 */

export {
  BLOCK_KINDS,
  type Block,
  type BlockKind,
  type CellPatterns,
  type LineKind,
  type LineRange,
} from "./types.js";

export {
  MalformedBlockError,
  NavigationError,
  NoActiveBlockError,
  type LocateError,
} from "./errors.js";

export {
  classifyLine,
  indentationOf,
  isCodeKind,
  isDefinitionKind,
} from "./line-classifier.js";

export { SourceDocument } from "./document.js";

export {
  DEFAULT_CELL_PATTERNS,
  blockText,
  locate,
  locateBuffer,
  locateCell,
  locateDefclass,
  locateDefinition,
  locateDefun,
  locateGroup,
  locateRegion,
  locateStatement,
  locateTopStatement,
  nextStatementOffset,
  type LocateOptions,
} from "./block-locator.js";

export {
  ELLIPSIS_LINE,
  dedent,
  prepareRegion,
  stripBootstrap,
  truncateForDisplay,
} from "./source-transformer.js";

export {
  CODING_DECLARATION,
  FILE_LOAD_PREAMBLE,
  buildFileBootstrap,
  detectEncoding,
  type FileBootstrapOptions,
} from "./bootstrap.js";
