/**
 * Locate command - Print the block around a cursor without running it
 */

import { cellPatternsFromConfig, loadConfig } from "@replkit/session";
import { BLOCK_KINDS, type BlockKind, blockText, locate } from "@replkit/source";
import { type Command, Option } from "commander";
import { Effect } from "effect";
import pc from "picocolors";
import { blockToJson, formatBlockHeader } from "../format.js";
import {
  type CursorOptions,
  cursorOffset,
  loadDocument,
  parseOffset,
  parsePositiveInt,
  regionEnd,
} from "../loader.js";
import { isVerbose, runCommand } from "../runtime.js";

interface LocateCommandOptions extends CursorOptions {
  kind: BlockKind;
  json?: boolean;
  verbose?: boolean;
}

export function locateCommand(program: Command): void {
  program
    .command("locate")
    .description("Show the block a send would use")
    .argument("<file>", "Python source file")
    .addOption(
      new Option("-k, --kind <kind>", "Block kind").choices(BLOCK_KINDS).default("statement"),
    )
    .option("-l, --line <n>", "Cursor line (1-based)", parsePositiveInt)
    .option("-o, --offset <n>", "Cursor offset in characters", parseOffset)
    .option("--to <n>", "Last line of a region (1-based)", parsePositiveInt)
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Log debug output")
    .action(async (file: string, options: LocateCommandOptions) => {
      const task = Effect.gen(function* () {
        const config = yield* loadConfig(process.cwd());
        const doc = yield* loadDocument(file);
        const block = yield* locate(doc, options.kind, cursorOffset(doc, options), {
          cells: cellPatternsFromConfig(config),
          regionEnd: regionEnd(doc, options),
        });
        const text = blockText(doc, block);

        if (options.json) {
          console.log(blockToJson(block, text));
          return;
        }

        console.log(formatBlockHeader(block, file));
        console.log(pc.gray("-".repeat(40)));
        process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
      });

      await runCommand(task, isVerbose(options.verbose));
    });
}
