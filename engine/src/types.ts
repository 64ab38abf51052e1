/**
 * Cellar Engine — Core Type Definitions
 *
 * Records that cross module boundaries: install requests, classification,
 * dependency reports, shortcuts, outcomes, installer states and engine
 * events. Gateway-facing types live in gateway/environment-gateway.ts.
 */

import type { RuntimeComponent } from "@cellar/catalog";

export type { RuntimeComponent } from "@cellar/catalog";

// ─── Install Request ─────────────────────────────────────────────

/** What the agent layer believes the target is. Advisory only. */
export type DeclaredKind = "file" | "folder" | "unknown";

/** Installer strategies the router can dispatch to */
export type InstallStrategy = "file" | "folder";

export interface InstallRequest {
  target_path: string;
  declared_kind: DeclaredKind;
  bottle_name?: string;
  strategy_hint?: InstallStrategy;
}

// ─── Classification ──────────────────────────────────────────────

export type TargetKind = "executable" | "disk_image" | "folder" | "invalid";

export interface TargetClassification {
  kind: TargetKind;
  reason: string;
  /** Absolute path that was inspected */
  target_path: string;
  /** True when declared_kind or strategy_hint disagreed with the filesystem */
  hint_overridden: boolean;
}

// ─── Dependencies ────────────────────────────────────────────────

export interface DependencyReport {
  binary_path: string;
  /** Import libraries in first-seen order, deduplicated case-insensitively */
  detected_imports: string[];
  /** Components in catalog install order */
  resolved_components: RuntimeComponent[];
  unresolved_imports: string[];
  /** Set when the binary could not be read as a PE image */
  scan_error?: string;
}

// ─── Shortcuts ───────────────────────────────────────────────────

export type ShortcutSource = "environment_native" | "manual_record";

export interface ShortcutEntry {
  bottle_name: string;
  display_name: string;
  target_executable_path: string;
  source: ShortcutSource;
}

// ─── Installer State Machines ────────────────────────────────────

export type FileInstallerState =
  | "CREATED"
  | "ENVIRONMENT_READY"
  | "STAGED"
  | "DEPENDENCIES_RESOLVED"
  | "EXECUTED"
  | "SHORTCUT_CREATED"
  | "DONE"
  | "FAILED";

export type FolderInstallerState =
  | "CREATED"
  | "ENVIRONMENT_READY"
  | "COPIED"
  | "EXECUTABLE_DISCOVERED"
  | "DEPENDENCIES_RESOLVED"
  | "EXECUTED"
  | "SHORTCUT_RECORDED"
  | "DONE"
  | "FAILED";

export type InstallerState = FileInstallerState | FolderInstallerState;

/** Stage names carried by failures */
export type InstallStage =
  | "request"
  | "lease"
  | "classification"
  | "environment"
  | "staging"
  | "copy"
  | "discovery"
  | "dependencies"
  | "execution"
  | "shortcut";

export type InstallErrorKind =
  | "ClassificationError"
  | "EnvironmentError"
  | "StagingError"
  | "DiscoveryError"
  | "DependencyInstallError"
  | "ExecutionError"
  | "ShortcutConflictError"
  | "CancellationError";

/** Serializable form of an InstallError */
export interface InstallErrorInfo {
  kind: InstallErrorKind;
  stage: InstallStage;
  message: string;
  cause?: string;
}

// ─── Outcome ─────────────────────────────────────────────────────

export type InstallStatus = "succeeded" | "failed";

export interface InstallOutcome {
  execution_id: string;
  status: InstallStatus;
  bottle_name: string;
  target_path: string;
  strategy?: InstallStrategy;
  classification?: TargetClassification;
  shortcut?: ShortcutEntry;
  dependency_report?: DependencyReport;
  /** Component ids installed during this run, in install order */
  installed_components: string[];
  /** Every installer state entered, in order */
  states: InstallerState[];
  error?: InstallErrorInfo;
  started_at: string;
  finished_at: string;
}

export interface InstallOptions {
  /** Cooperative cancellation, checked between steps */
  signal?: AbortSignal;
}

// ─── Dependency-only Installs ────────────────────────────────────

/** Install a binary's runtime components into a bottle without running it */
export interface DependencyInstallRequest {
  binary_path: string;
  bottle_name: string;
}

export interface DependencyInstallOutcome {
  status: InstallStatus;
  bottle_name: string;
  binary_path: string;
  dependency_report?: DependencyReport;
  installed_components: string[];
  error?: InstallErrorInfo;
  started_at: string;
  finished_at: string;
}

// ─── History ─────────────────────────────────────────────────────

export interface InstallRun {
  execution_id: string;
  bottle_name: string;
  target_path: string;
  strategy: InstallStrategy | null;
  status: InstallStatus | "running";
  error_kind: InstallErrorKind | null;
  error_stage: InstallStage | null;
  error_message: string | null;
  shortcut: ShortcutEntry | null;
  started_at: string;
  finished_at: string | null;
}

export interface StateLogEntry {
  state: InstallerState;
  entered_at: string;
}

// ─── Engine Events ───────────────────────────────────────────────

export interface StateChangeData {
  execution_id: string;
  bottle_name: string;
  strategy?: InstallStrategy;
  state: InstallerState;
  message?: string;
}

export interface LogEventData {
  message: string;
  level: "info" | "warn" | "error";
}

export type EngineEvent =
  | { type: "state_change"; timestamp: string; data: StateChangeData }
  | { type: "log"; timestamp: string; data: LogEventData };

export type EngineEventType = EngineEvent["type"];

export type EngineEventHandler = (event: EngineEvent) => void;
