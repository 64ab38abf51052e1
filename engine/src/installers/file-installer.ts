/**
 * Cellar Engine — File Installer
 *
 * Single-file installers: a Windows executable / .msi, or a disk image
 * whose installer binary is extracted first.
 *
 * CREATED → ENVIRONMENT_READY → STAGED → DEPENDENCIES_RESOLVED → EXECUTED
 *   → SHORTCUT_CREATED → DONE
 */

import * as path from "path";
import { setTimeout as sleep } from "timers/promises";
import { CancellationError, errorMessage } from "../errors";
import { NativeProgram } from "../gateway/environment-gateway";
import { ShortcutEntry } from "../types";
import { BaseInstaller, InstallerContext } from "./base-installer";

function sameBinary(programPath: string, binaryPath: string): boolean {
  if (programPath === binaryPath) return true;
  // Program paths may be recorded relative to drive_c or with backslashes
  const programName = programPath.split(/[\\/]/).pop() ?? "";
  return programName.toLowerCase() === path.basename(binaryPath).toLowerCase();
}

export class FileInstaller extends BaseInstaller {
  readonly strategy = "file" as const;

  protected async run(ctx: InstallerContext): Promise<void> {
    const { gateway, bottleName, classification } = ctx;

    const snapshot = await this.step(ctx, "environment", "ENVIRONMENT_READY", async () => {
      await gateway.ensureEnvironment(bottleName);
      return this.snapshotPrograms(ctx);
    });

    const binary = await this.step(ctx, "staging", "STAGED", async () =>
      classification.kind === "disk_image"
        ? gateway.mountImage(bottleName, classification.target_path)
        : classification.target_path,
    );
    ctx.progress.binary_path = binary;

    await this.step(ctx, "dependencies", "DEPENDENCIES_RESOLVED", () =>
      this.installDependencies(ctx, binary),
    );

    await this.step(ctx, "execution", "EXECUTED", () => this.execute(ctx, binary));

    const shortcut = await this.step(ctx, "shortcut", "SHORTCUT_CREATED", () =>
      this.createShortcut(ctx, binary, snapshot),
    );
    ctx.progress.shortcut = shortcut;
  }

  /**
   * Names in the bottle's program list before anything ran, or undefined
   * if the list could not be read.
   */
  private async snapshotPrograms(ctx: InstallerContext): Promise<Set<string> | undefined> {
    try {
      const programs = await ctx.gateway.listNativeShortcuts(ctx.bottleName);
      return new Set(programs.map((p) => p.name));
    } catch (err: unknown) {
      ctx.logger.warn(
        { bottle: ctx.bottleName, error: errorMessage(err) },
        "Could not snapshot program list",
      );
      return undefined;
    }
  }

  private pickProgram(
    programs: NativeProgram[],
    snapshot: Set<string> | undefined,
    binary: string,
  ): NativeProgram | undefined {
    const matching = programs.filter((p) => sameBinary(p.path, binary));
    if (!snapshot) {
      return matching[0];
    }
    const added = programs.filter((p) => !snapshot.has(p.name));
    return added.find((p) => sameBinary(p.path, binary)) ?? added[0];
  }

  /**
   * Adopt the program the installer registered, or synthesize one from the
   * binary. Failures are logged and leave the install without a shortcut.
   */
  private async createShortcut(
    ctx: InstallerContext,
    binary: string,
    snapshot: Set<string> | undefined,
  ): Promise<ShortcutEntry | undefined> {
    const { options, logger, bottleName } = ctx;

    try {
      for (let attempt = 1; attempt <= options.shortcut_poll_attempts; attempt++) {
        let programs: NativeProgram[] = [];
        try {
          programs = await ctx.gateway.listNativeShortcuts(bottleName);
        } catch (err: unknown) {
          logger.debug({ bottle: bottleName, attempt, error: errorMessage(err) }, "Program list poll failed");
        }

        const adopted = this.pickProgram(programs, snapshot, binary);
        if (adopted) {
          logger.info(
            { bottle: bottleName, display_name: adopted.name, attempt },
            "Adopting program registered by installer",
          );
          return await ctx.shortcuts.upsert({
            bottle_name: bottleName,
            display_name: adopted.name,
            target_executable_path: adopted.path,
            source: "environment_native",
          });
        }

        if (attempt < options.shortcut_poll_attempts) {
          await sleep(options.shortcut_poll_interval_ms);
        }
      }

      const displayName = path.basename(binary, path.extname(binary));
      logger.info({ bottle: bottleName, display_name: displayName }, "Synthesizing shortcut from binary");
      return await ctx.shortcuts.upsert({
        bottle_name: bottleName,
        display_name: displayName,
        target_executable_path: binary,
        source: "environment_native",
      });
    } catch (err: unknown) {
      if (err instanceof CancellationError) throw err;
      logger.warn({ bottle: bottleName, error: errorMessage(err) }, "Shortcut creation failed");
      return undefined;
    }
  }
}
