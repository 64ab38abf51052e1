/**
 * Cellar Engine — Install Errors
 *
 * Every failure that can end an install is an InstallError subclass. The
 * gateway creates them from process results; installers stamp the stage
 * they were in; the engine turns them into InstallOutcome.error.
 */

import {
  InstallErrorInfo,
  InstallErrorKind,
  InstallStage,
} from "./types";

export interface InstallErrorOptions {
  /** Underlying cause, reduced to a string for the outcome */
  cause?: string;
  exitCode?: number;
  timedOut?: boolean;
}

export abstract class InstallError extends Error {
  abstract readonly kind: InstallErrorKind;
  /** Stage the installer was in; assigned by the installer when unknown to the thrower */
  stage: InstallStage;
  readonly detail?: string;
  readonly exitCode?: number;
  readonly timedOut: boolean;

  constructor(
    stage: InstallStage,
    message: string,
    options: InstallErrorOptions = {},
  ) {
    super(message);
    this.name = new.target.name;
    this.stage = stage;
    this.detail = options.cause;
    this.exitCode = options.exitCode;
    this.timedOut = options.timedOut ?? false;
  }

  toInfo(): InstallErrorInfo {
    return {
      kind: this.kind,
      stage: this.stage,
      message: this.message,
      ...(this.detail !== undefined ? { cause: this.detail } : {}),
    };
  }
}

export class ClassificationError extends InstallError {
  readonly kind = "ClassificationError" as const;
}

export class EnvironmentError extends InstallError {
  readonly kind = "EnvironmentError" as const;
}

export class StagingError extends InstallError {
  readonly kind = "StagingError" as const;
}

export class DiscoveryError extends InstallError {
  readonly kind = "DiscoveryError" as const;
}

export class DependencyInstallError extends InstallError {
  readonly kind = "DependencyInstallError" as const;
}

export class ExecutionError extends InstallError {
  readonly kind = "ExecutionError" as const;
}

/** Non-fatal: logged by the shortcut manager, never surfaced as a failure */
export class ShortcutConflictError extends InstallError {
  readonly kind = "ShortcutConflictError" as const;
}

export class CancellationError extends InstallError {
  readonly kind = "CancellationError" as const;
}

type InstallErrorClass = new (
  stage: InstallStage,
  message: string,
  options?: InstallErrorOptions,
) => InstallError;

/** Error class used when a stage throws something that is not an InstallError */
const STAGE_DEFAULTS: Record<InstallStage, InstallErrorClass> = {
  request: ClassificationError,
  lease: EnvironmentError,
  classification: ClassificationError,
  environment: EnvironmentError,
  staging: StagingError,
  copy: StagingError,
  discovery: DiscoveryError,
  dependencies: DependencyInstallError,
  execution: ExecutionError,
  shortcut: EnvironmentError,
};

/**
 * Normalize anything thrown inside a stage into an InstallError for that stage.
 * InstallErrors keep their kind; their stage is overwritten with the stage
 * the installer was actually in.
 */
export function toInstallError(err: unknown, stage: InstallStage): InstallError {
  if (err instanceof CancellationError) {
    return err;
  }
  if (err instanceof InstallError) {
    err.stage = stage;
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  const ErrorClass = STAGE_DEFAULTS[stage];
  return new ErrorClass(stage, `${stage} failed: ${message}`, { cause: message });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
