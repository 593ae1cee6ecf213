/**
 * Send command - Run the block around a cursor in a Python session
 */

import {
  type ReplkitConfig,
  SessionManager,
  cellPatternsFromConfig,
  loadConfig,
  sendBlock,
  sendOptionsFromConfig,
} from "@replkit/session";
import { BLOCK_KINDS, type BlockKind } from "@replkit/source";
import { type Command, Option } from "commander";
import { Effect } from "effect";
import pc from "picocolors";
import { formatBlockHeader, formatOutcome, formatStep } from "../format.js";
import {
  type CursorOptions,
  cursorOffset,
  loadDocument,
  parseOffset,
  parsePositiveInt,
  regionEnd,
} from "../loader.js";
import {
  DEFAULT_COMPLETION_TIMEOUT_MS,
  awaitCompletion,
  isVerbose,
  runCommand,
  sessionLayer,
} from "../runtime.js";

interface SendCommandOptions extends CursorOptions {
  kind: BlockKind;
  dedicated?: boolean;
  echo: boolean;
  showTranscript?: boolean;
  step?: boolean;
  timeout: number;
  verbose?: boolean;
}

export function sendCommand(program: Command): void {
  program
    .command("send")
    .description("Send the block around a cursor to a Python session")
    .argument("<file>", "Python source file")
    .addOption(
      new Option("-k, --kind <kind>", "Block kind").choices(BLOCK_KINDS).default("statement"),
    )
    .option("-l, --line <n>", "Cursor line (1-based)", parsePositiveInt)
    .option("-o, --offset <n>", "Cursor offset in characters", parseOffset)
    .option("--to <n>", "Last line of a region (1-based)", parsePositiveInt)
    .option("--dedicated", "Use a session dedicated to this file")
    .option("--no-echo", "Do not echo the sent code")
    .option("--show-transcript", "Print the session transcript afterwards")
    .option("--step", "Report where the next statement starts")
    .option(
      "-t, --timeout <ms>",
      "How long to wait for the prompt",
      parsePositiveInt,
      DEFAULT_COMPLETION_TIMEOUT_MS,
    )
    .option("-v, --verbose", "Log debug output")
    .action(async (file: string, options: SendCommandOptions) => {
      const task = Effect.gen(function* () {
        const config = yield* loadConfig(process.cwd());
        return yield* sendAndReport(file, options, config).pipe(
          Effect.ensuring(Effect.flatMap(SessionManager, (manager) => manager.killAll(true))),
          Effect.provide(sessionLayer(config)),
        );
      });

      await runCommand(task, isVerbose(options.verbose));
    });
}

const sendAndReport = (file: string, options: SendCommandOptions, config: ReplkitConfig) =>
  Effect.gen(function* () {
    const manager = yield* SessionManager;
    const doc = yield* loadDocument(file);
    const session = yield* manager.ensureRunning(
      manager.targetFor(file, options.dedicated ?? config.dedicated),
      file,
    );

    const sendOptions = sendOptionsFromConfig(config);
    const result = yield* sendBlock(session, doc, options.kind, cursorOffset(doc, options), {
      ...sendOptions,
      echoInput: options.echo ? sendOptions.echoInput : "never",
      cells: cellPatternsFromConfig(config),
      regionEnd: regionEnd(doc, options),
    });

    console.log(formatBlockHeader(result.block, file));
    if (result.receipt.echoedInput !== null) {
      process.stdout.write(pc.gray(`>>> ${result.receipt.echoedInput}`));
    }

    const outcome = yield* awaitCompletion(result.receipt, options.timeout);
    console.log(formatOutcome(outcome, options.timeout));

    if (options.showTranscript) {
      console.log(pc.bold(`Transcript of ${session.target}:`));
      console.log(session.transcript.text);
    }
    if (options.step) {
      console.log(formatStep(doc, result.nextOffset));
    }
  });
