/**
 * Cellar Engine — Base Installer
 *
 * Every install strategy (file, folder) is a state machine built on this
 * class. Installers only drive the gateway, resolver and shortcut manager
 * handed to them in the context; leasing, history and the outcome record
 * belong to the engine.
 *
 * A failing step throws an InstallError stamped with its stage. The engine
 * records FAILED; there is no rollback.
 */

import { ResolvedEngineOptions } from "../config";
import { DependencyResolver } from "../dependencies/dependency-resolver";
import { CancellationError, toInstallError } from "../errors";
import { EnvironmentGateway } from "../gateway/environment-gateway";
import { ShortcutManager } from "../shortcuts/shortcut-manager";
import {
  DependencyReport,
  InstallRequest,
  InstallStage,
  InstallStrategy,
  InstallerState,
  RuntimeComponent,
  ShortcutEntry,
  TargetClassification,
} from "../types";
import { Logger } from "../utils/logger";

/** Filled in by the installer as it goes; read by the engine on success and failure */
export interface InstallProgress {
  binary_path?: string;
  dependency_report?: DependencyReport;
  installed_components: string[];
  shortcut?: ShortcutEntry;
}

export interface InstallerContext {
  executionId: string;
  request: Readonly<InstallRequest>;
  classification: TargetClassification;
  bottleName: string;
  gateway: EnvironmentGateway;
  resolver: DependencyResolver;
  shortcuts: ShortcutManager;
  options: ResolvedEngineOptions;
  /** Components installed into every bottle */
  baseline: RuntimeComponent[];
  logger: Logger;
  signal?: AbortSignal;
  progress: InstallProgress;
  onTransition: (state: InstallerState) => void;
}

export abstract class BaseInstaller {
  abstract readonly strategy: InstallStrategy;

  /**
   * Run the state machine from CREATED to DONE.
   *
   * @throws InstallError for the first failing step
   */
  async install(ctx: InstallerContext): Promise<void> {
    ctx.onTransition("CREATED");
    await this.run(ctx);
    ctx.onTransition("DONE");
  }

  protected abstract run(ctx: InstallerContext): Promise<void>;

  // ─── Step Helpers ────────────────────────────────────────────

  /**
   * Abort with CancellationError if the request was cancelled.
   */
  protected checkpoint(ctx: InstallerContext, stage: InstallStage): void {
    if (ctx.signal?.aborted) {
      throw new CancellationError(stage, `Install cancelled before ${stage}`);
    }
  }

  /**
   * Run one step and enter `state` when it succeeds.
   */
  protected async step<T>(
    ctx: InstallerContext,
    stage: InstallStage,
    state: InstallerState,
    fn: () => Promise<T>,
  ): Promise<T> {
    this.checkpoint(ctx, stage);
    let value: T;
    try {
      value = await fn();
    } catch (err: unknown) {
      throw toInstallError(err, stage);
    }
    ctx.onTransition(state);
    return value;
  }

  /**
   * Resolve the binary's dependencies and install the baseline and
   * resolved components one at a time, in catalog order.
   */
  protected async installDependencies(
    ctx: InstallerContext,
    binaryPath: string,
  ): Promise<void> {
    const report = await ctx.resolver.resolve(binaryPath);
    ctx.progress.dependency_report = report;

    const components = ctx.resolver.componentsToInstall(report, ctx.baseline);
    ctx.logger.info(
      {
        bottle: ctx.bottleName,
        execution_id: ctx.executionId,
        components: components.map((c) => c.id),
      },
      "Installing components",
    );

    for (const component of components) {
      this.checkpoint(ctx, "dependencies");
      await ctx.gateway.installComponent(ctx.bottleName, component);
      ctx.progress.installed_components.push(component.id);
    }
  }

  protected async execute(ctx: InstallerContext, binaryPath: string): Promise<void> {
    ctx.logger.info(
      { bottle: ctx.bottleName, execution_id: ctx.executionId, binary: binaryPath },
      "Running target binary",
    );
    const result = await ctx.gateway.runBinary(
      ctx.bottleName,
      binaryPath,
      ctx.options.run_timeout_ms,
    );
    ctx.logger.info(
      { bottle: ctx.bottleName, exit_code: result.exit_code, duration_ms: result.duration_ms },
      "Target binary finished",
    );
  }
}
