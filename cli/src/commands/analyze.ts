/**
 * Cellar CLI — Analyze Command
 *
 * Reads a binary's import table and shows which runtime components it
 * would pull in, without touching any bottle.
 *
 * Usage:
 *   cellar analyze <binary>
 *   cellar analyze <binary> --json
 */

import { Command } from 'commander';
import { CellarEngine, DependencyReport } from '@cellar/engine';
import { getEngineOptions } from '../config';
import {
  printInfo,
  printWarn,
  printBlank,
  printAdaptiveTable,
  colors,
} from '../output';

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze <binary>')
    .description('Show the runtime components a Windows binary depends on')
    .option('--json', 'Print the dependency report as JSON', false)
    .action(async (binary: string, opts: { json: boolean }) => {
      const engine = new CellarEngine(getEngineOptions());
      await engine.init();

      try {
        const report = await engine.analyze(binary);
        if (opts.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }
        printReport(report);
      } finally {
        engine.close();
      }
    });
}

function printReport(report: DependencyReport): void {
  if (report.scan_error) {
    printWarn(`Could not read imports of ${report.binary_path}: ${report.scan_error}`);
    return;
  }

  printInfo(
    `${colors.bold(String(report.detected_imports.length))} imported librar${
      report.detected_imports.length === 1 ? 'y' : 'ies'
    } in ${colors.path(report.binary_path)}`,
  );
  printBlank();

  if (report.resolved_components.length === 0) {
    printInfo('No runtime components needed.');
  } else {
    printAdaptiveTable({
      columns: [
        { header: 'Component', minWidth: 16 },
        { header: 'Provided by', minWidth: 14 },
        { header: 'Installer', minWidth: 10, flexible: true },
      ],
      rows: report.resolved_components.map((c) => [
        c.id,
        c.provided_by === 'base_runtime' ? 'Wine' : 'install',
        c.installer,
      ]),
      styles: [colors.app, colors.dim],
    });
  }

  if (report.unresolved_imports.length > 0) {
    printBlank();
    printWarn(`Not in the catalog: ${report.unresolved_imports.join(', ')}`);
  }
}
