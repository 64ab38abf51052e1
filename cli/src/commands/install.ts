/**
 * Cellar CLI -- Install Command
 *
 * Installs a Windows program (installer, disk image or extracted folder)
 * into a Bottles bottle.
 *
 * Usage:
 *   cellar install <path>                  Bottle named after the target
 *   cellar install <path> -b <bottle>      Install into a named bottle
 *   cellar install <path> --kind folder    Hint what the target is
 *
 * Output:
 *   cellar install ~/Downloads/setup.exe -b games
 *
 *   Installing setup.exe into games
 *
 *     ✔ Bottle ready
 *     ✔ Staged installer
 *     ✔ Installed dependencies
 *     ✔ Ran setup.exe
 *     ✔ Created shortcut
 *
 *   ✔ Installed setup.exe into games in 2m 4s
 */

import * as path from "path";
import { Command, Option } from "commander";
import {
  CellarEngine,
  DeclaredKind,
  EngineEvent,
  InstallOutcome,
  InstallerState,
  InstallStrategy,
} from "@cellar/engine";
import { getEngineOptions, parseSeconds } from "../config";
import {
  printSuccess,
  printError,
  printInfo,
  printHeader,
  printStageSuccess,
  printStageInfo,
  printDetail,
  printBlank,
  printDebug,
  isDebugMode,
  createSpinner,
  formatDuration,
  formatErrorKind,
  formatShortcutSource,
  colors,
} from "../output";

interface InstallCommandOptions {
  bottle?: string;
  kind: DeclaredKind;
  strategy?: InstallStrategy;
  timeout?: number;
  verbose: boolean;
}

/** Spinner text while moving on from a state */
const STAGE_NEXT: Partial<Record<InstallerState, string>> = {
  CREATED: "Preparing bottle...",
  ENVIRONMENT_READY: "Staging files...",
  STAGED: "Installing dependencies...",
  COPIED: "Looking for the executable...",
  EXECUTABLE_DISCOVERED: "Installing dependencies...",
  DEPENDENCIES_RESOLVED: "Running the program...",
  EXECUTED: "Creating shortcut...",
};

/**
 * Check-marked line printed when a state is reached.
 */
export function stageDoneMessage(state: InstallerState, strategy?: InstallStrategy): string | undefined {
  switch (state) {
    case "ENVIRONMENT_READY":
      return "Bottle ready";
    case "STAGED":
      return "Staged installer";
    case "COPIED":
      return "Copied application files";
    case "EXECUTABLE_DISCOVERED":
      return "Found executable";
    case "DEPENDENCIES_RESOLVED":
      return "Installed dependencies";
    case "EXECUTED":
      return strategy === "folder" ? "Ran program" : "Ran installer";
    case "SHORTCUT_CREATED":
      return "Created shortcut";
    case "SHORTCUT_RECORDED":
      return "Recorded shortcut";
    default:
      return undefined;
  }
}

export function registerInstallCommand(program: Command): void {
  program
    .command("install <path>")
    .alias("i")
    .description("Install a Windows program into a bottle")
    .option("-b, --bottle <name>", "Bottle to install into (default: derived from the target)")
    .addOption(
      new Option("--kind <kind>", "What the target is believed to be")
        .choices(["file", "folder", "unknown"])
        .default("unknown"),
    )
    .addOption(
      new Option("--strategy <strategy>", "Preferred installer strategy").choices(["file", "folder"]),
    )
    .option("--timeout <seconds>", "Bound for running the program", parseSeconds)
    .option("--verbose", "Show structured engine logs", false)
    .action(async (target: string, opts: InstallCommandOptions) => {
      const verbose = opts.verbose || isDebugMode();
      const engine = new CellarEngine(
        getEngineOptions({ verbose, runTimeoutSeconds: opts.timeout }),
      );
      await engine.init();

      const label = path.basename(path.resolve(target));
      printHeader(
        opts.bottle
          ? `Installing ${colors.app(label)} into ${colors.bottle(opts.bottle)}`
          : `Installing ${colors.app(label)}`,
      );

      const spinner = createSpinner("Starting...");
      engine.on((event: EngineEvent) => {
        if (event.type === "state_change") {
          const { state, strategy } = event.data;
          const done = stageDoneMessage(state, strategy);
          if (done) {
            spinner.stop();
            printStageSuccess(done);
            spinner.start();
          }
          const next = STAGE_NEXT[state];
          if (next) spinner.text = next;
          printDebug(`${event.data.execution_id}: ${state}`);
        } else {
          printDebug(`${event.data.level}: ${event.data.message}`);
        }
      });

      // Ctrl+C cancels cooperatively; a second one kills the process
      const controller = new AbortController();
      const onSigint = (): void => {
        if (controller.signal.aborted) process.exit(130);
        spinner.text = "Cancelling after the current step...";
        controller.abort();
      };
      process.on("SIGINT", onSigint);

      spinner.start();
      const startTime = Date.now();

      try {
        const outcome = await engine.install(
          {
            target_path: target,
            declared_kind: opts.kind,
            bottle_name: opts.bottle,
            strategy_hint: opts.strategy,
          },
          { signal: controller.signal },
        );
        spinner.stop();
        printOutcome(outcome, label, Date.now() - startTime);
        if (outcome.status !== "succeeded") {
          process.exitCode = 1;
        }
      } catch (err: unknown) {
        spinner.stop();
        printBlank();
        printError("Unexpected error during installation");
        if (isDebugMode()) {
          console.error(err);
        } else {
          printDetail("Message", err instanceof Error ? err.message : String(err));
          printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
        }
        process.exitCode = 1;
      } finally {
        process.off("SIGINT", onSigint);
        engine.close();
      }
    });
}

function printOutcome(outcome: InstallOutcome, label: string, elapsed: number): void {
  const bottle = colors.bottle(outcome.bottle_name);

  if (outcome.status === "succeeded") {
    const components = outcome.installed_components;
    if (components.length > 0) {
      printStageInfo(`Installed ${components.length} component(s): ${components.join(", ")}`);
    }
    const unresolved = outcome.dependency_report?.unresolved_imports ?? [];
    if (unresolved.length > 0) {
      printStageInfo(`Not in the catalog: ${unresolved.join(", ")}`);
    }

    printBlank();
    printSuccess(`Installed ${colors.app(label)} into ${bottle} in ${formatDuration(elapsed)}`);
    if (outcome.shortcut) {
      printDetail(
        "Shortcut",
        `${outcome.shortcut.display_name} (${formatShortcutSource(outcome.shortcut.source)})`,
      );
      printDetail("Target", outcome.shortcut.target_executable_path);
    }
    return;
  }

  printBlank();
  printError(`Failed to install ${colors.app(label)} into ${bottle}`);
  if (outcome.error) {
    printDetail("Reason", formatErrorKind(outcome.error.kind));
    printDetail("Details", outcome.error.message);
    printDetail("Stage", outcome.error.stage);
    if (outcome.error.cause && outcome.error.cause !== outcome.error.message) {
      printDetail("Cause", outcome.error.cause);
    }
  }
  if (outcome.installed_components.length > 0) {
    printBlank();
    printInfo(
      `Left installed in ${bottle}: ${outcome.installed_components.join(", ")}`,
    );
  }
  printInfo(`Run ${colors.bold("cellar history " + outcome.execution_id)} for the state log.`);
}
