/**
 * Cellar Engine — Dependency Resolver
 *
 * Maps the libraries a binary imports to the runtime components that
 * provide them. Unmapped imports are reported and an unreadable binary
 * yields an empty report; neither fails an install.
 */

import * as fs from "fs";
import { ComponentCatalog } from "@cellar/catalog";
import { DependencyReport, RuntimeComponent } from "../types";
import { Logger } from "../utils/logger";
import { readPeImports } from "./pe-imports";

export class DependencyResolver {
  constructor(
    private readonly catalog: ComponentCatalog,
    private readonly logger: Logger,
  ) {}

  /**
   * Read a binary's import table and resolve it.
   */
  async resolve(binaryPath: string): Promise<DependencyReport> {
    let imports: string[];
    try {
      const image = await fs.promises.readFile(binaryPath);
      imports = readPeImports(image);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(
        { binary: binaryPath, error: message },
        "Import scan failed; continuing without dependency coverage",
      );
      return Object.freeze({
        ...this.resolveImports(binaryPath, []),
        scan_error: message,
      });
    }

    const report = this.resolveImports(binaryPath, imports);
    this.logger.info(
      {
        binary: binaryPath,
        imports: report.detected_imports.length,
        components: report.resolved_components.map((c) => c.id),
        unresolved: report.unresolved_imports,
      },
      "Resolved dependencies",
    );
    return report;
  }

  /**
   * Pure mapping step: import names → report.
   */
  resolveImports(binaryPath: string, imports: string[]): DependencyReport {
    const detected: string[] = [];
    const unresolved: string[] = [];
    const seenImports = new Set<string>();
    const components = new Map<string, RuntimeComponent>();

    for (const library of imports) {
      const key = library.toLowerCase();
      if (seenImports.has(key)) continue;
      seenImports.add(key);
      detected.push(library);

      const component = this.catalog.lookup(library);
      if (!component) {
        unresolved.push(library);
      } else if (!components.has(component.id)) {
        components.set(component.id, component);
      }
    }

    return Object.freeze({
      binary_path: binaryPath,
      detected_imports: detected,
      resolved_components: this.catalog.sortByInstallOrder(
        Array.from(components.values()),
      ),
      unresolved_imports: unresolved,
    });
  }

  /**
   * Components that must be installed, baseline first-class with resolved
   * ones, deduplicated and in catalog install order.
   */
  componentsToInstall(
    report: DependencyReport,
    baseline: RuntimeComponent[] = [],
  ): RuntimeComponent[] {
    const merged = new Map<string, RuntimeComponent>();
    for (const component of [...baseline, ...report.resolved_components]) {
      if (component.provided_by === "must_install") {
        merged.set(component.id, component);
      }
    }
    return this.catalog.sortByInstallOrder(Array.from(merged.values()));
  }
}
