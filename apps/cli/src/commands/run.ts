/**
 * Run command - Execute a whole file in a Python session
 */

import * as path from "node:path";
import {
  type ReplkitConfig,
  SessionManager,
  loadConfig,
  sendBuffer,
  sendFile,
  sendOptionsFromConfig,
} from "@replkit/session";
import type { Command } from "commander";
import { Effect } from "effect";
import pc from "picocolors";
import { formatOutcome } from "../format.js";
import { loadDocument, parsePositiveInt } from "../loader.js";
import {
  DEFAULT_COMPLETION_TIMEOUT_MS,
  awaitCompletion,
  isVerbose,
  runCommand,
  sessionLayer,
} from "../runtime.js";

interface RunCommandOptions {
  main?: boolean;
  buffer?: boolean;
  dedicated?: boolean;
  showTranscript?: boolean;
  timeout: number;
  verbose?: boolean;
}

export function runFileCommand(program: Command): void {
  program
    .command("run")
    .description("Run a Python file in a session")
    .argument("<file>", "Python source file")
    .option("--main", 'Also run `if __name__ == "__main__":` blocks')
    .option("--buffer", "Send the file text instead of letting the interpreter read the file")
    .option("--dedicated", "Use a session dedicated to this file")
    .option("--show-transcript", "Print the session transcript afterwards")
    .option(
      "-t, --timeout <ms>",
      "How long to wait for the prompt",
      parsePositiveInt,
      DEFAULT_COMPLETION_TIMEOUT_MS,
    )
    .option("-v, --verbose", "Log debug output")
    .action(async (file: string, options: RunCommandOptions) => {
      const task = Effect.gen(function* () {
        const config = yield* loadConfig(process.cwd());
        return yield* runAndReport(file, options, config).pipe(
          Effect.ensuring(Effect.flatMap(SessionManager, (manager) => manager.killAll(true))),
          Effect.provide(sessionLayer(config)),
        );
      });

      await runCommand(task, isVerbose(options.verbose));
    });
}

const runAndReport = (file: string, options: RunCommandOptions, config: ReplkitConfig) =>
  Effect.gen(function* () {
    const manager = yield* SessionManager;
    const session = yield* manager.ensureRunning(
      manager.targetFor(file, options.dedicated ?? config.dedicated),
      file,
    );
    const sendOptions = {
      ...sendOptionsFromConfig(config),
      runMainGuard: options.main ?? config.runMainGuard,
    };

    const receipt = options.buffer
      ? yield* loadDocument(file).pipe(
          Effect.flatMap((doc) =>
            sendBuffer(session, doc.text, path.basename(file), sendOptions),
          ),
        )
      : yield* sendFile(session, file, sendOptions);

    console.log(`${pc.bold("run")} ${file}`);
    if (receipt.echoedInput !== null) {
      process.stdout.write(pc.gray(`>>> ${receipt.echoedInput}`));
    }

    const outcome = yield* awaitCompletion(receipt, options.timeout);
    console.log(formatOutcome(outcome, options.timeout));

    if (options.showTranscript) {
      console.log(pc.bold(`Transcript of ${session.target}:`));
      console.log(session.transcript.text);
    }
  });
