#!/usr/bin/env node

/**
 * replkit CLI
 * Locate Python blocks and run them in interactive interpreter sessions
 */

import { Command, CommanderError } from "commander";
import pc from "picocolors";
import { locateCommand } from "./commands/locate.js";
import { runFileCommand } from "./commands/run.js";
import { sendCommand } from "./commands/send.js";

const program = new Command();

program
  .name("replkit")
  .description("Send Python statements, definitions and cells to an interpreter")
  .version("0.1.0");

locateCommand(program);
sendCommand(program);
runFileCommand(program);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    // Commander has already printed help, the version or its own message
    process.exit(err.exitCode);
  }
  console.error(pc.red("Error:"), err instanceof Error ? err.message : String(err));
  process.exit(1);
}
