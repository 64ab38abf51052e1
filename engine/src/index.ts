/**
 * Cellar Engine — Public API
 *
 * This is the single entry point for the engine package.
 * CLI and backend import from here, never from internal modules.
 */

// Main engine class
export { CellarEngine, resolveBottleName } from "./engine";
export type { EngineDeps } from "./engine";

// All types
export type {
  // Requests & classification
  InstallRequest,
  DeclaredKind,
  InstallStrategy,
  TargetKind,
  TargetClassification,

  // Dependencies & shortcuts
  RuntimeComponent,
  DependencyReport,
  ShortcutEntry,
  ShortcutSource,

  // Execution
  InstallerState,
  FileInstallerState,
  FolderInstallerState,
  InstallStage,
  InstallErrorKind,
  InstallErrorInfo,
  InstallStatus,
  InstallOutcome,
  InstallOptions,
  DependencyInstallRequest,
  DependencyInstallOutcome,

  // History
  InstallRun,
  StateLogEntry,

  // Events
  EngineEvent,
  EngineEventType,
  EngineEventHandler,
  StateChangeData,
  LogEventData,
} from "./types";

// Configuration
export {
  resolveEngineOptions,
  EngineOptionsSchema,
  ConfigError,
  engineOptionsFromEnv,
  cellarHome,
  DEFAULT_PREFIX_BASE,
  MAX_TIMEOUT_MS,
} from "./config";
export type { EngineOptions, ResolvedEngineOptions } from "./config";

// Errors
export {
  InstallError,
  ClassificationError,
  EnvironmentError,
  StagingError,
  DiscoveryError,
  DependencyInstallError,
  ExecutionError,
  ShortcutConflictError,
  CancellationError,
  toInstallError,
} from "./errors";

// Building blocks (exposed for advanced use / testing)
export { StrategyRouter } from "./router";
export { DependencyResolver } from "./dependencies/dependency-resolver";
export { readPeImports, PeFormatError } from "./dependencies/pe-imports";
export { ShortcutManager } from "./shortcuts/shortcut-manager";
export { SidecarStore, SidecarFormatError } from "./shortcuts/sidecar-store";
export { BottlesGateway } from "./gateway/bottles-gateway";
export type { BottlesCommands } from "./gateway/bottles-gateway";
export type {
  EnvironmentGateway,
  EnvironmentInfo,
  NativeProgram,
  RunResult,
} from "./gateway/environment-gateway";
export { runProcess } from "./gateway/process-runner";
export type { ProcessRunner, ProcessResult, ProcessOptions } from "./gateway/process-runner";
export { findExecutables, selectExecutable, findInstallerInImage } from "./discovery";
export { getInstaller, getSupportedStrategies } from "./installers";

export { createLogger, LOG_LEVELS } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
