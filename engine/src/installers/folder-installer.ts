/**
 * Cellar Engine — Folder Installer
 *
 * Pre-extracted application trees: copied into the bottle's drive_c, the
 * program is discovered, and a manual shortcut record is written.
 *
 * CREATED → ENVIRONMENT_READY → COPIED → EXECUTABLE_DISCOVERED
 *   → DEPENDENCIES_RESOLVED → EXECUTED → SHORTCUT_RECORDED → DONE
 */

import * as path from "path";
import { findExecutables, selectExecutable } from "../discovery";
import { DiscoveryError } from "../errors";
import { BaseInstaller, InstallerContext } from "./base-installer";

export class FolderInstaller extends BaseInstaller {
  readonly strategy = "folder" as const;

  protected async run(ctx: InstallerContext): Promise<void> {
    const { gateway, bottleName, classification, logger } = ctx;
    const folderName = path.basename(classification.target_path);

    await this.step(ctx, "environment", "ENVIRONMENT_READY", () =>
      gateway.ensureEnvironment(bottleName),
    );

    const destination = await this.step(ctx, "copy", "COPIED", async () => {
      const target = path.join(gateway.storagePath(bottleName), folderName);
      await gateway.copyTree(classification.target_path, target);
      return target;
    });

    const binary = await this.step(ctx, "discovery", "EXECUTABLE_DISCOVERED", async () => {
      const candidates = await findExecutables(destination);
      const chosen = selectExecutable(candidates, folderName);
      if (!chosen) {
        throw new DiscoveryError("discovery", `No executable found in ${destination}`);
      }
      logger.info(
        { bottle: bottleName, binary: chosen, candidates: candidates.length },
        "Discovered executable",
      );
      return chosen;
    });
    ctx.progress.binary_path = binary;

    await this.step(ctx, "dependencies", "DEPENDENCIES_RESOLVED", () =>
      this.installDependencies(ctx, binary),
    );

    await this.step(ctx, "execution", "EXECUTED", () => this.execute(ctx, binary));

    ctx.progress.shortcut = await this.step(ctx, "shortcut", "SHORTCUT_RECORDED", () =>
      ctx.shortcuts.upsert({
        bottle_name: bottleName,
        display_name: folderName,
        target_executable_path: binary,
        source: "manual_record",
      }),
    );
  }
}
