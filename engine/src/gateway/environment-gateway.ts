/**
 * Cellar Engine — Environment Gateway Interface
 *
 * The single boundary between the engine and the external environment
 * manager. Installers only ever talk to a bottle through this interface,
 * so the state machines can run against an in-memory implementation.
 *
 * Implementations throw InstallError subclasses; they never return a
 * failure value.
 */

import { RuntimeComponent } from "../types";

export interface EnvironmentInfo {
  name: string;
  /** Wine prefix directory of the bottle */
  prefix_path: string;
  /** False when the bottle already existed */
  created: boolean;
}

export interface RunResult {
  exit_code: number;
  duration_ms: number;
}

/** A program entry in the environment manager's own program list */
export interface NativeProgram {
  name: string;
  path: string;
}

export interface EnvironmentGateway {
  /** Create the bottle if it does not exist. Idempotent. */
  ensureEnvironment(name: string): Promise<EnvironmentInfo>;

  /** Extract a disk image and return the path of its installer binary */
  mountImage(bottle: string, imagePath: string): Promise<string>;

  /** Directory inside the bottle where copied application trees go */
  storagePath(bottle: string): string;

  copyTree(source: string, destination: string): Promise<void>;

  installComponent(bottle: string, component: RuntimeComponent): Promise<void>;

  runBinary(bottle: string, binaryPath: string, timeoutMs: number): Promise<RunResult>;

  listNativeShortcuts(bottle: string): Promise<NativeProgram[]>;

  addNativeShortcut(bottle: string, name: string, targetPath: string): Promise<void>;
}
