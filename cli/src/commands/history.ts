/**
 * Cellar CLI — History Command
 *
 * Usage:
 *   cellar history                    Recent installs across bottles
 *   cellar history -b <bottle>        Recent installs into one bottle
 *   cellar history <execution-id>     State log of one install
 */

import { Command } from 'commander';
import { CellarEngine, InstallRun } from '@cellar/engine';
import { getEngineOptions } from '../config';
import {
  printInfo,
  printError,
  printAdaptiveTable,
  formatDate,
  formatState,
  colors,
} from '../output';

function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10);
  return Number.isNaN(limit) || limit < 1 ? 20 : limit;
}

export function runStatusText(run: InstallRun): string {
  return run.status === 'failed' && run.error_stage ? `failed (${run.error_stage})` : run.status;
}

function colorStatus(text: string): string {
  if (text.startsWith('succeeded')) return colors.success(text);
  if (text.startsWith('failed')) return colors.error(text);
  return colors.warn(text);
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history [execution-id]')
    .description('Show past installs, or the state log of one install')
    .option('-b, --bottle <name>', 'Only installs into this bottle')
    .option('-n, --limit <count>', 'Number of runs to show', parseLimit, 20)
    .action(
      async (
        executionId: string | undefined,
        opts: { bottle?: string; limit: number },
      ) => {
        const engine = new CellarEngine(getEngineOptions());
        await engine.init();

        try {
          if (executionId) {
            const log = engine.getExecutionLog(executionId);
            if (log.length === 0) {
              printError(`No install with id ${executionId}.`);
              process.exitCode = 1;
              return;
            }
            for (const entry of log) {
              console.log(`  ${colors.dim(formatDate(entry.entered_at))}  ${formatState(entry.state)}`);
            }
            return;
          }

          const runs = engine.getHistory(opts.bottle, opts.limit);
          if (runs.length === 0) {
            printInfo('No installs recorded yet.');
            printInfo(`Run ${colors.bold('cellar install <path>')} to get started.`);
            return;
          }

          printAdaptiveTable({
            columns: [
              { header: 'Started', minWidth: 16 },
              { header: 'Bottle', minWidth: 12 },
              { header: 'Status', minWidth: 24 },
              { header: 'Target', minWidth: 16, flexible: true },
            ],
            rows: runs.map((run) => [
              formatDate(run.started_at),
              run.bottle_name,
              runStatusText(run),
              run.target_path,
            ]),
            styles: [colors.dim, colors.bottle, colorStatus],
          });

          const failed = runs.filter((run) => run.status === 'failed');
          for (const run of failed.slice(0, 3)) {
            printInfo(`${colors.dim(run.execution_id)} ${colorStatus(runStatusText(run))}: ${run.error_message ?? ''}`);
          }
        } finally {
          engine.close();
        }
      },
    );
}
