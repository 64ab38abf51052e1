/**
 * Cellar CLI — Shortcuts Command
 *
 * Lists a bottle's shortcuts from both backends: Bottles' own program
 * list and the sidecar file.
 *
 * Usage:
 *   cellar shortcuts <bottle>          All shortcuts in a bottle
 *   cellar shortcuts <bottle> <name>   One shortcut by display name
 */

import { Command } from 'commander';
import { CellarEngine, ShortcutEntry } from '@cellar/engine';
import { getEngineOptions } from '../config';
import {
  printInfo,
  printError,
  printAdaptiveTable,
  formatShortcutSource,
  colors,
} from '../output';

export function registerShortcutsCommand(program: Command): void {
  program
    .command('shortcuts <bottle> [name]')
    .description('List the shortcuts recorded for a bottle')
    .action(async (bottle: string, name: string | undefined) => {
      const engine = new CellarEngine(getEngineOptions());
      await engine.init();

      try {
        if (name) {
          const entry = await engine.findShortcut(bottle, name);
          if (!entry) {
            printError(`No shortcut "${name}" in bottle ${colors.bottle(bottle)}.`);
            process.exitCode = 1;
            return;
          }
          printShortcut(entry);
          return;
        }

        const entries = await engine.listShortcuts(bottle);
        if (entries.length === 0) {
          printInfo(`No shortcuts in bottle ${colors.bottle(bottle)}.`);
          return;
        }

        printInfo(`${colors.bold(String(entries.length))} shortcut(s) in ${colors.bottle(bottle)}:\n`);
        printAdaptiveTable({
          columns: [
            { header: 'Name', minWidth: 20 },
            { header: 'Source', minWidth: 8 },
            { header: 'Target', minWidth: 20, flexible: true },
          ],
          rows: entries.map((e) => [
            e.display_name,
            formatShortcutSource(e.source),
            e.target_executable_path,
          ]),
          styles: [colors.app, colors.dim],
        });
      } finally {
        engine.close();
      }
    });
}

function printShortcut(entry: ShortcutEntry): void {
  console.log();
  console.log(`  ${colors.bold('Name:')}    ${colors.app(entry.display_name)}`);
  console.log(`  ${colors.bold('Bottle:')}  ${colors.bottle(entry.bottle_name)}`);
  console.log(`  ${colors.bold('Source:')}  ${formatShortcutSource(entry.source)}`);
  console.log(`  ${colors.bold('Target:')}  ${entry.target_executable_path}`);
  console.log();
}
