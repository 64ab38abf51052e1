/**
 * Cellar CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type { InstallErrorKind, InstallerState, ShortcutSource } from "@cellar/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  app: chalk.bold.white,
  bottle: chalk.cyan,
  path: chalk.underline,
  muted: chalk.gray,
};

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  bullet: chalk.gray("\u2022"), // •
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 *   ✔ Bottle ready
 *   ✔ Installed dependencies
 */
export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageInfo(msg: string): void {
  console.log(`  ${symbols.info} ${colors.dim(msg)}`);
}

export function printHeader(msg: string): void {
  console.log();
  console.log(`  ${colors.bold(msg)}`);
  console.log();
}

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan" });
}

// ─── Tables ─────────────────────────────────────────────────

/** Below this terminal width tables collapse into a compact list */
const MIN_TABLE_WIDTH = 70;

const DEFAULT_TERMINAL_WIDTH = 80;

export function getTerminalWidth(): number {
  return process.stdout.columns || DEFAULT_TERMINAL_WIDTH;
}

/**
 * Truncate a plain-text string to `max` visible characters, appending "..."
 * if it was shortened. Never returns a string longer than `max`.
 */
export function truncateText(s: string, max: number): string {
  if (max < 4) return s.slice(0, max);
  if (s.length <= max) return s;
  return s.slice(0, max - 3) + "...";
}

/**
 * Truncate a plain-text cell to `width`, keeping the end of the string.
 */
export function truncateStart(s: string, width: number): string {
  if (width < 4) return s.slice(s.length - width);
  if (s.length <= width) return s;
  return "..." + s.slice(s.length - (width - 3));
}

export interface TableColumn {
  header: string;
  /** Minimum content width, excluding padding */
  minWidth?: number;
  /** Absorbs the remaining width. At most one column should set it. */
  flexible?: boolean;
}

export interface AdaptiveTableOptions {
  columns: TableColumn[];
  /** Plain-text cells, one array per row, matching columns.length */
  rows: string[][];
  /** Colors applied per column after fitting */
  styles?: ((cell: string) => string)[];
}

export interface CompactItem {
  label: string;
  fields: { key: string; value: string }[];
}

/**
 * Column widths (content + 2 padding) that fit within `termWidth`.
 * The flexible column takes whatever the fixed columns leave.
 */
export function calculateColWidths(columns: TableColumn[], termWidth: number): number[] {
  const borderOverhead = columns.length + 1;
  const paddingPerCol = 2;
  const available = termWidth - borderOverhead;

  const minWidths = columns.map((c) => Math.max(c.minWidth ?? 8, 4));
  const flexIdx = columns.findIndex((c) => c.flexible);

  const fixedSum = minWidths.reduce(
    (sum, w, i) => sum + (i === flexIdx ? 0 : w + paddingPerCol),
    0,
  );

  return minWidths.map((min, i) => {
    const width = i === flexIdx ? Math.max(available - fixedSum - paddingPerCol, min) : min;
    return width + paddingPerCol;
  });
}

/**
 * Print a table that adapts to terminal width. Narrow terminals get the
 * compact card layout; cells that do not fit are truncated, never wrapped.
 */
export function printAdaptiveTable(opts: AdaptiveTableOptions): void {
  const termWidth = getTerminalWidth();
  const { columns, rows, styles = [] } = opts;
  const style = (cell: string, i: number): string => (styles[i] ? styles[i](cell) : cell);

  if (termWidth < MIN_TABLE_WIDTH) {
    printCompactList(
      rows.map((row) => ({
        label: row[0],
        fields: columns.slice(1).map((col, i) => ({
          key: col.header,
          value: style(row[i + 1], i + 1),
        })),
      })),
    );
    return;
  }

  const colWidths = calculateColWidths(columns, termWidth);
  const table = new Table({
    head: columns.map((c) => chalk.bold.cyan(c.header)),
    colWidths,
    style: { head: [], border: ["gray"] },
    wordWrap: false,
  });
  for (const row of rows) {
    table.push(
      row.map((cell, i) => {
        const fitted = columns[i].flexible
          ? truncateStart(cell, colWidths[i] - 2)
          : truncateText(cell, colWidths[i] - 2);
        return style(fitted, i);
      }),
    );
  }
  console.log(table.toString());
}

/**
 *   Super Game
 *     Source: Bottles
 *     Target: C:\Games\Super\game.exe
 */
export function printCompactList(items: CompactItem[]): void {
  for (const item of items) {
    console.log(colors.app(item.label));
    const maxKeyLen = Math.max(...item.fields.map((f) => f.key.length));
    for (const f of item.fields) {
      const padded = f.key.padEnd(maxKeyLen);
      console.log(`  ${colors.dim(padded + ":")} ${f.value}`);
    }
    console.log();
  }
}

// ─── State Labels ───────────────────────────────────────────

const STATE_COLORS: Record<InstallerState, chalk.Chalk> = {
  CREATED: chalk.gray,
  ENVIRONMENT_READY: chalk.cyan,
  STAGED: chalk.blue,
  COPIED: chalk.blue,
  EXECUTABLE_DISCOVERED: chalk.blue,
  DEPENDENCIES_RESOLVED: chalk.cyan,
  EXECUTED: chalk.yellow,
  SHORTCUT_CREATED: chalk.magenta,
  SHORTCUT_RECORDED: chalk.magenta,
  DONE: chalk.green,
  FAILED: chalk.red,
};

const STATE_LABELS: Record<InstallerState, string> = {
  CREATED: "Starting",
  ENVIRONMENT_READY: "Bottle ready",
  STAGED: "Staged",
  COPIED: "Copied",
  EXECUTABLE_DISCOVERED: "Executable found",
  DEPENDENCIES_RESOLVED: "Dependencies installed",
  EXECUTED: "Executed",
  SHORTCUT_CREATED: "Shortcut created",
  SHORTCUT_RECORDED: "Shortcut recorded",
  DONE: "Done",
  FAILED: "Failed",
};

export function formatState(state: InstallerState): string {
  return STATE_COLORS[state](STATE_LABELS[state]);
}

// ─── Error Kinds ────────────────────────────────────────────

const ERROR_LABELS: Record<InstallErrorKind, string> = {
  ClassificationError: "Target cannot be installed",
  EnvironmentError: "Bottles environment failure",
  StagingError: "Could not stage the files",
  DiscoveryError: "No executable found",
  DependencyInstallError: "Dependency installation failed",
  ExecutionError: "Program execution failed",
  ShortcutConflictError: "Shortcut conflict",
  CancellationError: "Cancelled",
};

export function formatErrorKind(kind: InstallErrorKind): string {
  return ERROR_LABELS[kind];
}

const SOURCE_LABELS: Record<ShortcutSource, string> = {
  environment_native: "Bottles",
  manual_record: "Sidecar",
};

export function formatShortcutSource(source: ShortcutSource): string {
  return SOURCE_LABELS[source];
}

// ─── Time ───────────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}

/**
 * ISO timestamp as "2026-03-01 14:05" in local time; unparseable input is
 * returned unchanged.
 */
export function formatDate(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}
