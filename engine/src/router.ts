/**
 * Cellar Engine — Strategy Router
 *
 * Classifies a request from the live filesystem and picks the installer.
 * declared_kind and strategy_hint are advisory: the filesystem always wins.
 */

import * as fs from "fs";
import * as path from "path";
import { ClassificationError } from "./errors";
import { BaseInstaller, getInstaller } from "./installers";
import {
  InstallRequest,
  InstallStrategy,
  TargetClassification,
  TargetKind,
} from "./types";
import { Logger } from "./utils/logger";

/** Installer extension set (lowercase) */
const EXTENSION_KINDS: Record<string, TargetKind> = {
  ".exe": "executable",
  ".msi": "executable",
  ".iso": "disk_image",
};

export function strategyFor(kind: TargetKind): InstallStrategy | undefined {
  switch (kind) {
    case "executable":
    case "disk_image":
      return "file";
    case "folder":
      return "folder";
    case "invalid":
      return undefined;
  }
}

export interface RouteResult {
  classification: TargetClassification;
  strategy: InstallStrategy;
  installer: BaseInstaller;
}

export class StrategyRouter {
  constructor(private readonly logger: Logger) {}

  async classify(request: InstallRequest): Promise<TargetClassification> {
    const targetPath = path.resolve(request.target_path);
    const { kind, reason } = await this.inspect(targetPath);

    const strategy = strategyFor(kind);
    const declared =
      request.declared_kind === "unknown" ? undefined : request.declared_kind;
    const overridden =
      strategy !== undefined &&
      ((declared !== undefined && declared !== strategy) ||
        (request.strategy_hint !== undefined && request.strategy_hint !== strategy));

    if (overridden) {
      this.logger.warn(
        {
          target: targetPath,
          declared_kind: request.declared_kind,
          strategy_hint: request.strategy_hint,
          classified: kind,
        },
        "Request hint disagrees with filesystem; using filesystem",
      );
    }

    return Object.freeze({
      kind,
      reason,
      target_path: targetPath,
      hint_overridden: overridden,
    });
  }

  private async inspect(targetPath: string): Promise<{ kind: TargetKind; reason: string }> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(targetPath);
    } catch (err: unknown) {
      const code =
        err instanceof Error && "code" in err && typeof err.code === "string"
          ? err.code
          : "UNKNOWN";
      if (code === "ENOENT" || code === "ENOTDIR") {
        return { kind: "invalid", reason: "path not found" };
      }
      return { kind: "invalid", reason: `path not readable: ${code}` };
    }

    if (stats.isDirectory()) {
      return { kind: "folder", reason: "directory" };
    }

    const extension = path.extname(targetPath).toLowerCase();
    const kind = EXTENSION_KINDS[extension];
    if (kind) {
      return { kind, reason: `${extension} file` };
    }
    return { kind: "invalid", reason: "unrecognized file type" };
  }

  /**
   * Classify and select the installer.
   *
   * @throws ClassificationError when the target is invalid
   */
  async route(request: InstallRequest): Promise<RouteResult> {
    return this.select(await this.classify(request));
  }

  /**
   * Select the installer for an existing classification.
   *
   * @throws ClassificationError when the target is invalid
   */
  select(classification: TargetClassification): RouteResult {
    const strategy = strategyFor(classification.kind);
    if (!strategy) {
      throw new ClassificationError(
        "classification",
        `Cannot install ${classification.target_path}: ${classification.reason}`,
      );
    }
    this.logger.info(
      { target: classification.target_path, kind: classification.kind, strategy },
      "Routed install request",
    );
    return { classification, strategy, installer: getInstaller(strategy) };
  }
}
