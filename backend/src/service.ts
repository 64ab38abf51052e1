/**
 * Cellar Backend — Install Service
 *
 * The part of the engine the tool server drives. CellarEngine satisfies it;
 * tests substitute a fake.
 */

import type {
  DependencyInstallOutcome,
  DependencyInstallRequest,
  DependencyReport,
  InstallOptions,
  InstallOutcome,
  InstallRequest,
} from '@cellar/engine';

export interface InstallService {
  install(request: InstallRequest, options?: InstallOptions): Promise<InstallOutcome>;
  installDependencies(
    request: DependencyInstallRequest,
    options?: InstallOptions,
  ): Promise<DependencyInstallOutcome>;
  analyze(binaryPath: string): Promise<DependencyReport>;
}
