/**
 * Cellar Engine — Bottles Gateway
 *
 * EnvironmentGateway backed by the Bottles command line, winetricks,
 * wineserver and 7z. Bottles is looked up as the Flatpak
 * com.usebottles.bottles first, then as a native install on PATH.
 *
 * Every process result is mapped here: non-zero exit, timeout, launch
 * failure and unparseable output all become InstallErrors.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ResolvedEngineOptions } from "../config";
import {
  DependencyInstallError,
  EnvironmentError,
  ExecutionError,
  InstallError,
  InstallErrorOptions,
  StagingError,
} from "../errors";
import { findInstallerInImage } from "../discovery";
import { InstallStage, RuntimeComponent } from "../types";
import { Logger } from "../utils/logger";
import {
  EnvironmentGateway,
  EnvironmentInfo,
  NativeProgram,
  RunResult,
} from "./environment-gateway";
import { ProcessResult, ProcessRunner, runProcess } from "./process-runner";

export const FLATPAK_APP_ID = "com.usebottles.bottles";

export interface BottlesCommands {
  type: "flatpak" | "native";
  bottles_cli: string[];
  winetricks: string[];
  wineserver: string[];
  wine: string[];
}

/** Bottles components toggled through `edit --params` */
const BOTTLES_COMPONENT_PARAMS: Record<string, string> = {
  dxvk: "dxvk",
  vkd3d: "vkd3d",
  "dxvk-nvapi": "dxvk_nvapi",
};

const BottleListSchema = z.record(z.unknown());

const ProgramListSchema = z.array(
  z
    .object({
      name: z.string(),
      path: z.string(),
    })
    .passthrough(),
);

export interface BottlesGatewayDeps {
  runner?: ProcessRunner;
  /** Override command detection */
  commands?: BottlesCommands;
  /** PATH searched for a native install; defaults to process.env.PATH */
  searchPath?: string;
}

type ErrorFactory = new (
  stage: InstallStage,
  message: string,
  options?: InstallErrorOptions,
) => InstallError;

function tail(text: string, max = 300): string {
  const trimmed = text.trim();
  return trimmed.length > max ? trimmed.slice(trimmed.length - max) : trimmed;
}

/**
 * Whether an executable named `name` exists on PATH.
 */
export async function findOnPath(
  name: string,
  searchPath: string = process.env.PATH ?? "",
): Promise<boolean> {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    try {
      await fs.promises.access(path.join(dir, name), fs.constants.X_OK);
      return true;
    } catch {
      continue;
    }
  }
  return false;
}

function flatpakCommand(command: string): string[] {
  return ["flatpak", "run", `--command=${command}`, FLATPAK_APP_ID];
}

export class BottlesGateway implements EnvironmentGateway {
  private readonly runner: ProcessRunner;
  private commands: Promise<BottlesCommands> | undefined;
  private readonly searchPath: string | undefined;

  constructor(
    private readonly options: ResolvedEngineOptions,
    private readonly logger: Logger,
    deps: BottlesGatewayDeps = {},
  ) {
    this.runner = deps.runner ?? runProcess;
    this.searchPath = deps.searchPath;
    if (deps.commands) {
      this.commands = Promise.resolve(deps.commands);
    }
  }

  // ─── Command Detection ───────────────────────────────────────

  private async detectCommands(): Promise<BottlesCommands> {
    if (!this.commands) {
      this.commands = this.detect();
    }
    try {
      return await this.commands;
    } catch (err: unknown) {
      // Retried on the next call
      this.commands = undefined;
      throw err;
    }
  }

  private async detect(): Promise<BottlesCommands> {
    const flatpak = await this.runner(
      ["flatpak", "list", "--app", "--columns=application"],
      { timeoutMs: this.options.command_timeout_ms },
    );
    if (flatpak.exitCode === 0 && flatpak.stdout.includes(FLATPAK_APP_ID)) {
      this.logger.debug("Using Flatpak Bottles installation");
      return {
        type: "flatpak",
        bottles_cli: flatpakCommand("bottles-cli"),
        winetricks: flatpakCommand("winetricks"),
        wineserver: flatpakCommand("wineserver"),
        wine: flatpakCommand("wine"),
      };
    }

    const required = ["bottles-cli", "winetricks", "wineserver"];
    const present = await Promise.all(required.map((name) => findOnPath(name, this.searchPath)));
    if (present.every(Boolean)) {
      this.logger.debug("Using native Bottles installation");
      return {
        type: "native",
        bottles_cli: ["bottles-cli"],
        winetricks: ["winetricks"],
        wineserver: ["wineserver"],
        wine: ["wine"],
      };
    }

    throw new EnvironmentError(
      "environment",
      "No Bottles installation (Flatpak or native) found",
    );
  }

  // ─── Process Helpers ─────────────────────────────────────────

  private prefixPath(bottle: string): string {
    return path.join(this.options.prefix_base, bottle);
  }

  private prefixEnv(bottle: string): Record<string, string> {
    return { WINEPREFIX: this.prefixPath(bottle) };
  }

  private async run(
    command: string[],
    options: { env?: Record<string, string>; cwd?: string; timeoutMs?: number } = {},
  ): Promise<ProcessResult> {
    const timeoutMs = options.timeoutMs ?? this.options.command_timeout_ms;
    this.logger.debug({ command, timeout_ms: timeoutMs }, "Running command");
    const result = await this.runner(command, { ...options, timeoutMs });
    this.logger.debug(
      {
        command: command.join(" "),
        exit_code: result.exitCode,
        timed_out: result.timedOut,
        duration_ms: result.durationMs,
      },
      "Command finished",
    );
    return result;
  }

  /**
   * Throw the stage's error for a failed process result.
   */
  private check(
    result: ProcessResult,
    what: string,
    ErrorClass: ErrorFactory,
    stage: InstallStage,
  ): void {
    if (result.launchError !== undefined) {
      throw new ErrorClass(stage, `${what}: could not launch (${result.launchError})`, {
        cause: result.launchError,
      });
    }
    if (result.timedOut) {
      throw new ErrorClass(stage, `${what}: timed out after ${result.durationMs}ms`, {
        timedOut: true,
      });
    }
    if (result.exitCode !== 0) {
      throw new ErrorClass(stage, `${what}: exited with code ${result.exitCode}`, {
        cause: tail(result.stderr || result.stdout),
        exitCode: result.exitCode,
      });
    }
  }

  private parseJson(output: string, what: string, stage: InstallStage, ErrorClass: ErrorFactory): unknown {
    try {
      return JSON.parse(output);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ErrorClass(stage, `${what}: unparseable output`, { cause: message });
    }
  }

  // ─── Environments ────────────────────────────────────────────

  async listBottles(): Promise<string[]> {
    const cmd = await this.detectCommands();
    const result = await this.run([...cmd.bottles_cli, "--json", "list", "bottles"]);
    this.check(result, "list bottles", EnvironmentError, "environment");

    const parsed = BottleListSchema.safeParse(
      this.parseJson(result.stdout, "list bottles", "environment", EnvironmentError),
    );
    if (!parsed.success) {
      throw new EnvironmentError("environment", "list bottles: unexpected output shape", {
        cause: parsed.error.message,
      });
    }
    return Object.keys(parsed.data);
  }

  async ensureEnvironment(name: string): Promise<EnvironmentInfo> {
    const prefix = this.prefixPath(name);
    const existing = await this.listBottles();
    if (existing.includes(name)) {
      this.logger.info({ bottle: name }, "Reusing existing bottle");
      return { name, prefix_path: prefix, created: false };
    }

    const cmd = await this.detectCommands();
    const result = await this.run([
      ...cmd.bottles_cli,
      "new",
      "--bottle-name",
      name,
      "--environment",
      "gaming",
    ]);
    this.check(result, `create bottle "${name}"`, EnvironmentError, "environment");
    this.logger.info({ bottle: name, prefix }, "Created bottle");

    await this.sanitize(name, cmd);
    return { name, prefix_path: prefix, created: true };
  }

  /**
   * Let wineboot repair a freshly created prefix. A failed repair is only
   * logged; the bottle is still usable for most installers.
   */
  private async sanitize(bottle: string, cmd: BottlesCommands): Promise<void> {
    const result = await this.run([...cmd.wine, "wineboot", "--repair"], {
      env: this.prefixEnv(bottle),
    });
    if (result.launchError !== undefined || result.timedOut || result.exitCode !== 0) {
      this.logger.warn(
        {
          bottle,
          exit_code: result.exitCode,
          timed_out: result.timedOut,
          launch_error: result.launchError,
        },
        "wineboot --repair failed",
      );
      return;
    }
    this.logger.info({ bottle }, "Repaired new prefix");
  }

  storagePath(bottle: string): string {
    return path.join(this.prefixPath(bottle), "drive_c");
  }

  // ─── Staging ─────────────────────────────────────────────────

  async mountImage(bottle: string, imagePath: string): Promise<string> {
    const stem = path.basename(imagePath, path.extname(imagePath));
    const target = path.join(this.options.staging_dir, bottle, stem);

    try {
      await fs.promises.mkdir(target, { recursive: true });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StagingError("staging", `Cannot create staging directory ${target}`, {
        cause: message,
      });
    }

    const result = await this.run(["7z", "x", "-y", imagePath, `-o${target}`]);
    this.check(result, `extract ${path.basename(imagePath)}`, StagingError, "staging");
    this.logger.info({ bottle, image: imagePath, target }, "Extracted disk image");

    const installer = await findInstallerInImage(target);
    if (!installer) {
      throw new StagingError(
        "staging",
        `No installer (setup.exe, install.exe, autorun.exe, start.exe) found in ${path.basename(imagePath)}`,
      );
    }
    return installer;
  }

  async copyTree(source: string, destination: string): Promise<void> {
    try {
      await fs.promises.rm(destination, { recursive: true, force: true });
      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
      await fs.promises.cp(source, destination, { recursive: true });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StagingError("copy", `Copy ${source} -> ${destination} failed`, {
        cause: message,
      });
    }
    this.logger.info({ source, destination }, "Copied application tree");
  }

  // ─── Components ──────────────────────────────────────────────

  async installComponent(bottle: string, component: RuntimeComponent): Promise<void> {
    const cmd = await this.detectCommands();
    const what = `install ${component.id}`;

    switch (component.installer) {
      case "none":
        return;

      case "winetricks": {
        const result = await this.run([...cmd.winetricks, "-q", component.id], {
          env: this.prefixEnv(bottle),
        });
        if (result.exitCode !== 0 && result.stdout.includes("already installed")) {
          this.logger.info({ bottle, component: component.id }, "Component already installed");
          return;
        }
        this.check(result, what, DependencyInstallError, "dependencies");
        break;
      }

      case "bottles": {
        const param = BOTTLES_COMPONENT_PARAMS[component.id] ?? component.id.replace(/-/g, "_");
        const result = await this.run([
          ...cmd.bottles_cli,
          "edit",
          "-b",
          bottle,
          "--params",
          `${param}:true`,
        ]);
        this.check(result, what, DependencyInstallError, "dependencies");
        break;
      }
    }

    this.logger.info(
      { bottle, component: component.id, installer: component.installer },
      "Installed component",
    );
  }

  // ─── Execution ───────────────────────────────────────────────

  async runBinary(bottle: string, binaryPath: string, timeoutMs: number): Promise<RunResult> {
    const cmd = await this.detectCommands();
    const result = await this.run([...cmd.bottles_cli, "run", "-b", bottle, "-e", binaryPath], {
      timeoutMs,
    });
    this.check(result, `run ${path.basename(binaryPath)}`, ExecutionError, "execution");

    await this.waitForIdle(bottle, cmd);
    return { exit_code: result.exitCode, duration_ms: result.durationMs };
  }

  /**
   * Wait for the bottle's wineserver to exit so child installers finish
   * before the next step. A wait that fails or times out is only logged.
   */
  private async waitForIdle(bottle: string, cmd: BottlesCommands): Promise<void> {
    const result = await this.run([...cmd.wineserver, "--wait"], {
      env: this.prefixEnv(bottle),
    });
    if (result.exitCode !== 0 || result.timedOut) {
      this.logger.warn(
        { bottle, exit_code: result.exitCode, timed_out: result.timedOut },
        "wineserver --wait did not complete",
      );
    }
  }

  // ─── Shortcuts ───────────────────────────────────────────────

  async listNativeShortcuts(bottle: string): Promise<NativeProgram[]> {
    const cmd = await this.detectCommands();
    const result = await this.run([...cmd.bottles_cli, "--json", "programs", "-b", bottle]);
    this.check(result, `list programs of "${bottle}"`, EnvironmentError, "shortcut");

    const parsed = ProgramListSchema.safeParse(
      this.parseJson(result.stdout, "list programs", "shortcut", EnvironmentError),
    );
    if (!parsed.success) {
      throw new EnvironmentError("shortcut", "list programs: unexpected output shape", {
        cause: parsed.error.message,
      });
    }
    return parsed.data.map((program) => ({ name: program.name, path: program.path }));
  }

  async addNativeShortcut(bottle: string, name: string, targetPath: string): Promise<void> {
    const cmd = await this.detectCommands();
    const result = await this.run(
      [...cmd.bottles_cli, "add", "-b", bottle, "-n", name, "-p", targetPath],
      { env: this.prefixEnv(bottle) },
    );
    this.check(result, `add program "${name}"`, EnvironmentError, "shortcut");
    this.logger.info({ bottle, name, path: targetPath }, "Added program to bottle");
  }
}
