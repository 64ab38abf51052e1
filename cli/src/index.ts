#!/usr/bin/env tsx

/**
 * Cellar CLI — Entry Point
 *
 * Installs Windows programs into Bottles bottles: resolves the runtime
 * components a program needs, runs it, and leaves a shortcut behind.
 *
 * Commands:
 *   cellar install <path>            Install a program into a bottle
 *   cellar analyze <binary>          Show the components a binary needs
 *   cellar shortcuts <bottle>        List a bottle's shortcuts
 *   cellar history [execution-id]    Past installs and their state logs
 */

import { Command } from "commander";
import { registerInstallCommand } from "./commands/install";
import { registerAnalyzeCommand } from "./commands/analyze";
import { registerShortcutsCommand } from "./commands/shortcuts";
import { registerHistoryCommand } from "./commands/history";
import { setDebugMode } from "./output";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("cellar")
    .description("Install Windows programs into Bottles with their runtime dependencies")
    .version("0.1.0")
    .option("--debug", "Print debug output and full stack traces", false)
    .hook("preAction", (thisCommand) => {
      setDebugMode(thisCommand.opts<{ debug: boolean }>().debug);
    });

  registerInstallCommand(program);
  registerAnalyzeCommand(program);
  registerShortcutsCommand(program);
  registerHistoryCommand(program);

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
