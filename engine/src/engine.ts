/**
 * Cellar Engine — Main Engine Class
 *
 * Entry point for the agent and CLI layers. For each install request the
 * engine:
 * 1. Resolves the bottle name
 * 2. Takes the exclusive lease on that bottle (FIFO per name)
 * 3. Classifies the target and routes it to an installer
 * 4. Runs the installer state machine against the environment gateway
 * 5. Records every state and the final outcome in the state database
 *
 * install() never rejects for install failures: they come back as a
 * failed InstallOutcome. The engine has no UI logic and communicates via
 * return values and event callbacks.
 */

import * as crypto from "crypto";
import * as path from "path";
import { ComponentCatalog } from "@cellar/catalog";
import {
  ConfigError,
  EngineOptions,
  ResolvedEngineOptions,
  resolveEngineOptions,
} from "./config";
import { DependencyResolver } from "./dependencies/dependency-resolver";
import {
  CancellationError,
  ClassificationError,
  InstallError,
  errorMessage,
  toInstallError,
} from "./errors";
import { BottlesGateway } from "./gateway/bottles-gateway";
import { EnvironmentGateway } from "./gateway/environment-gateway";
import { InstallProgress } from "./installers";
import { StrategyRouter } from "./router";
import { ShortcutManager } from "./shortcuts/shortcut-manager";
import { SidecarStore } from "./shortcuts/sidecar-store";
import { StateDB } from "./state-db";
import {
  DependencyInstallOutcome,
  DependencyInstallRequest,
  DependencyReport,
  EngineEvent,
  EngineEventHandler,
  InstallOptions,
  InstallOutcome,
  InstallRequest,
  InstallRun,
  InstallStage,
  InstallStrategy,
  InstallerState,
  RuntimeComponent,
  ShortcutEntry,
  StateLogEntry,
  TargetClassification,
} from "./types";
import { createLogger, Logger } from "./utils/logger";
import { KeyedLock } from "./utils/keyed-lock";

const BOTTLE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9 ._-]*$/;
const STRIPPED_EXTENSIONS = new Set([".exe", ".msi", ".iso"]);
const DEFAULT_BOTTLE_NAME = "default";

export interface EngineDeps {
  gateway?: EnvironmentGateway;
  logger?: Logger;
}

interface Initialized {
  catalog: ComponentCatalog;
  resolver: DependencyResolver;
  baseline: RuntimeComponent[];
}

/**
 * Bottle name for a request: the given one, validated, or one derived
 * from the target's name.
 *
 * @throws ClassificationError if a given name is not usable
 */
export function resolveBottleName(request: InstallRequest): string {
  if (request.bottle_name !== undefined) {
    const name = request.bottle_name.trim();
    if (!BOTTLE_NAME_PATTERN.test(name) || name.includes("..")) {
      throw new ClassificationError(
        "request",
        `Invalid bottle name "${request.bottle_name}": use letters, digits, space, ".", "_" or "-"`,
      );
    }
    return name;
  }

  const base = path.basename(path.resolve(request.target_path));
  const extension = path.extname(base);
  const stem = STRIPPED_EXTENSIONS.has(extension.toLowerCase())
    ? base.slice(0, base.length - extension.length)
    : base;
  const derived = stem
    .replace(/[^A-Za-z0-9._-]+/g, "-")
    .replace(/\.{2,}/g, ".")
    .replace(/^[-._]+|[-._]+$/g, "");
  return derived || DEFAULT_BOTTLE_NAME;
}

export class CellarEngine {
  private readonly options: ResolvedEngineOptions;
  private readonly logger: Logger;
  private readonly stateDb: StateDB;
  private readonly gateway: EnvironmentGateway;
  private readonly router: StrategyRouter;
  private readonly shortcuts: ShortcutManager;
  private readonly leases = new KeyedLock();
  private eventHandlers: EngineEventHandler[] = [];
  private state: Initialized | null = null;

  constructor(options: EngineOptions, deps: EngineDeps = {}) {
    this.options = resolveEngineOptions(options);
    this.logger =
      deps.logger ??
      createLogger({ level: this.options.verbose ? "debug" : "silent" });
    this.stateDb = new StateDB(this.options.state_db_path, this.logger);
    this.gateway = deps.gateway ?? new BottlesGateway(this.options, this.logger);
    this.router = new StrategyRouter(this.logger);
    this.shortcuts = new ShortcutManager(
      this.gateway,
      new SidecarStore(this.options.shortcut_sidecar_path),
      this.logger,
    );
  }

  /**
   * Load the catalog and open the state database.
   * Must be called once before any other operation.
   *
   * @throws CatalogLoadError if the catalog is invalid
   * @throws ConfigError if a baseline component is unknown
   */
  async init(): Promise<void> {
    if (this.state) return;

    const catalog = ComponentCatalog.load(this.options.catalog_path);
    const baseline: RuntimeComponent[] = [];
    for (const id of this.options.baseline_components) {
      const component = catalog.get(id);
      if (!component) {
        throw new ConfigError(`Unknown baseline component "${id}"`);
      }
      baseline.push(component);
    }

    await this.stateDb.init();
    this.state = {
      catalog,
      resolver: new DependencyResolver(catalog, this.logger),
      baseline,
    };
    this.logger.debug(
      { catalog_version: catalog.version, components: catalog.size },
      "Engine initialized",
    );
  }

  private ensureInit(): Initialized {
    if (!this.state) {
      throw new Error("CellarEngine not initialized. Call init() first.");
    }
    return this.state;
  }

  get catalog(): ComponentCatalog {
    return this.ensureInit().catalog;
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. CLI/backend use this to receive progress updates.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.warn({ error: errorMessage(err) }, "Event handler threw");
      }
    }
  }

  // ─── Core: Install ───────────────────────────────────────────

  /**
   * Install a target into a bottle.
   */
  async install(
    request: InstallRequest,
    options: InstallOptions = {},
  ): Promise<InstallOutcome> {
    const { resolver, baseline } = this.ensureInit();
    const frozen: Readonly<InstallRequest> = Object.freeze({ ...request });
    const executionId = crypto.randomUUID();
    const startedAt = new Date().toISOString();
    const states: InstallerState[] = [];
    const progress: InstallProgress = { installed_components: [] };
    const routed: { classification?: TargetClassification; strategy?: InstallStrategy } = {};

    let bottleName = frozen.bottle_name ?? "";
    let failure: InstallError | undefined;
    try {
      bottleName = resolveBottleName(frozen);
    } catch (err: unknown) {
      failure = toInstallError(err, "request");
    }

    this.stateDb.recordRunStart({
      execution_id: executionId,
      bottle_name: bottleName,
      target_path: frozen.target_path,
      started_at: startedAt,
    });

    const transition = (state: InstallerState): void => {
      states.push(state);
      this.stateDb.logStateTransition(executionId, bottleName, state);
      this.logger.info(
        { execution_id: executionId, bottle: bottleName, strategy: routed.strategy, state },
        `State: ${state}`,
      );
      this.emit({
        type: "state_change",
        timestamp: new Date().toISOString(),
        data: {
          execution_id: executionId,
          bottle_name: bottleName,
          strategy: routed.strategy,
          state,
        },
      });
    };

    if (!failure) {
      this.logger.info(
        { execution_id: executionId, bottle: bottleName, target: frozen.target_path },
        "Starting install",
      );
      failure = await this.runLeased(bottleName, options.signal, async () => {
        const classification = await this.router.classify(frozen);
        routed.classification = classification;
        const route = this.router.select(classification);
        routed.strategy = route.strategy;

        await route.installer.install({
          executionId,
          request: frozen,
          classification,
          bottleName,
          gateway: this.gateway,
          resolver,
          shortcuts: this.shortcuts,
          options: this.options,
          baseline,
          logger: this.logger.child({ execution_id: executionId, bottle: bottleName }),
          signal: options.signal,
          progress,
          onTransition: transition,
        });
      });
    }

    if (failure) {
      transition("FAILED");
      this.logger.error(
        {
          execution_id: executionId,
          bottle: bottleName,
          kind: failure.kind,
          stage: failure.stage,
          error: failure.message,
        },
        "Install failed",
      );
      this.emit({
        type: "log",
        timestamp: new Date().toISOString(),
        data: { message: `${failure.stage}: ${failure.message}`, level: "error" },
      });
    } else {
      this.logger.info({ execution_id: executionId, bottle: bottleName }, "Install complete");
    }

    const outcome: InstallOutcome = {
      execution_id: executionId,
      status: failure ? "failed" : "succeeded",
      bottle_name: bottleName,
      target_path: frozen.target_path,
      strategy: routed.strategy,
      classification: routed.classification,
      shortcut: progress.shortcut,
      dependency_report: progress.dependency_report,
      installed_components: [...progress.installed_components],
      states: [...states],
      error: failure?.toInfo(),
      started_at: startedAt,
      finished_at: new Date().toISOString(),
    };
    Object.freeze(outcome);

    this.stateDb.recordRunFinish(executionId, {
      strategy: outcome.strategy,
      status: outcome.status,
      error: outcome.error,
      shortcut: outcome.shortcut,
      finished_at: outcome.finished_at,
    });
    return outcome;
  }

  // ─── Core: Dependencies Only ─────────────────────────────────

  /**
   * Install the runtime components a binary needs into a bottle, creating
   * the bottle if it is missing. The binary itself is never run. Holds the
   * bottle lease like install() and, like it, never rejects for failures.
   */
  async installDependencies(
    request: DependencyInstallRequest,
    options: InstallOptions = {},
  ): Promise<DependencyInstallOutcome> {
    const { resolver, baseline } = this.ensureInit();
    const startedAt = new Date().toISOString();
    const binaryPath = path.resolve(request.binary_path);
    const installed: string[] = [];
    let report: DependencyReport | undefined;

    let bottleName = request.bottle_name;
    let failure: InstallError | undefined;
    try {
      bottleName = resolveBottleName({
        target_path: binaryPath,
        declared_kind: "file",
        bottle_name: request.bottle_name,
      });
    } catch (err: unknown) {
      failure = toInstallError(err, "request");
    }

    const step = async <T>(stage: InstallStage, fn: () => Promise<T>): Promise<T> => {
      if (options.signal?.aborted) {
        throw new CancellationError(stage, `Dependency install cancelled before ${stage}`);
      }
      try {
        return await fn();
      } catch (err: unknown) {
        throw toInstallError(err, stage);
      }
    };

    if (!failure) {
      this.logger.info({ bottle: bottleName, binary: binaryPath }, "Starting dependency install");
      failure = await this.runLeased(bottleName, options.signal, async () => {
        const classification = await step("classification", () =>
          this.router.classify({ target_path: binaryPath, declared_kind: "file" }),
        );
        if (classification.kind !== "executable") {
          throw new ClassificationError(
            "classification",
            `Cannot scan ${binaryPath} for dependencies: ${classification.reason}`,
          );
        }

        await step("environment", () => this.gateway.ensureEnvironment(bottleName));
        const resolved = await step("dependencies", () => resolver.resolve(binaryPath));
        report = resolved;

        const components = resolver.componentsToInstall(resolved, baseline);
        this.logger.info(
          { bottle: bottleName, components: components.map((c) => c.id) },
          "Installing components",
        );
        for (const component of components) {
          await step("dependencies", () => this.gateway.installComponent(bottleName, component));
          installed.push(component.id);
        }
      });
    }

    if (failure) {
      this.logger.error(
        { bottle: bottleName, kind: failure.kind, stage: failure.stage, error: failure.message },
        "Dependency install failed",
      );
    } else {
      this.logger.info({ bottle: bottleName, installed }, "Dependency install complete");
    }

    const outcome: DependencyInstallOutcome = {
      status: failure ? "failed" : "succeeded",
      bottle_name: bottleName,
      binary_path: binaryPath,
      dependency_report: report,
      installed_components: [...installed],
      error: failure?.toInfo(),
      started_at: startedAt,
      finished_at: new Date().toISOString(),
    };
    return Object.freeze(outcome);
  }

  /**
   * Hold the bottle lease while fn runs. Returns the failure, if any.
   */
  private async runLeased(
    bottleName: string,
    signal: AbortSignal | undefined,
    fn: () => Promise<void>,
  ): Promise<InstallError | undefined> {
    if (this.leases.isLocked(bottleName)) {
      this.logger.info(
        { bottle: bottleName, queued: this.leases.waiting(bottleName) + 1 },
        "Waiting for bottle lease",
      );
    }
    const release = await this.leases.acquire(bottleName, signal).catch(
      (err: unknown) => toInstallError(err, "lease"),
    );
    if (release instanceof InstallError) {
      return release;
    }

    try {
      await fn();
      return undefined;
    } catch (err: unknown) {
      return err instanceof InstallError ? err : toInstallError(err, "classification");
    } finally {
      release();
    }
  }

  // ─── Queries ─────────────────────────────────────────────────

  /**
   * Classify a request without installing anything.
   */
  classify(request: InstallRequest): Promise<TargetClassification> {
    return this.router.classify(request);
  }

  /**
   * Dependency report for a binary, without installing anything.
   */
  analyze(binaryPath: string): Promise<DependencyReport> {
    return this.ensureInit().resolver.resolve(path.resolve(binaryPath));
  }

  findShortcut(bottleName: string, displayName: string): Promise<ShortcutEntry | undefined> {
    return this.shortcuts.find(bottleName, displayName);
  }

  listShortcuts(bottleName: string): Promise<ShortcutEntry[]> {
    return this.shortcuts.list(bottleName);
  }

  getHistory(bottleName?: string, limit?: number): InstallRun[] {
    this.ensureInit();
    return this.stateDb.getRuns(bottleName, limit);
  }

  getExecutionLog(executionId: string): StateLogEntry[] {
    this.ensureInit();
    return this.stateDb.getExecutionLog(executionId);
  }

  // ─── Cleanup ─────────────────────────────────────────────────

  /**
   * Close the engine and release resources.
   */
  close(): void {
    this.stateDb.close();
    this.state = null;
    this.logger.info("Engine shut down");
  }
}
