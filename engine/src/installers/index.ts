/**
 * Cellar Engine — Installer Registry
 *
 * Maps install strategies to their installer implementations.
 * This is the only place where installers are registered.
 */

import { InstallStrategy } from "../types";
import { BaseInstaller } from "./base-installer";
import { FileInstaller } from "./file-installer";
import { FolderInstaller } from "./folder-installer";

export { BaseInstaller } from "./base-installer";
export type { InstallerContext, InstallProgress } from "./base-installer";

const installers: Map<InstallStrategy, BaseInstaller> = new Map();

installers.set("file", new FileInstaller());
installers.set("folder", new FolderInstaller());

/**
 * Get the installer for a strategy.
 *
 * @throws Error if no installer is registered for the strategy
 */
export function getInstaller(strategy: InstallStrategy): BaseInstaller {
  const installer = installers.get(strategy);
  if (!installer) {
    throw new Error(
      `No installer registered for strategy "${strategy}". ` +
        `Supported strategies: ${Array.from(installers.keys()).join(", ")}`,
    );
  }
  return installer;
}

export function getSupportedStrategies(): InstallStrategy[] {
  return Array.from(installers.keys());
}
