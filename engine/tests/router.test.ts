/**
 * Cellar Engine — Strategy Router Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ClassificationError } from "../src/errors";
import { FileInstaller } from "../src/installers/file-installer";
import { FolderInstaller } from "../src/installers/folder-installer";
import { StrategyRouter } from "../src/router";
import { createLogger } from "../src/utils/logger";

describe("StrategyRouter", () => {
  const router = new StrategyRouter(createLogger());
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cellar-router-"));
    fs.mkdirSync(path.join(tmpDir, "Game Folder"));
    fs.writeFileSync(path.join(tmpDir, "setup.exe"), "MZ");
    fs.writeFileSync(path.join(tmpDir, "Package.MSI"), "");
    fs.writeFileSync(path.join(tmpDir, "disc.ISO"), "");
    fs.writeFileSync(path.join(tmpDir, "notes.txt"), "");
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("classifies a directory as folder regardless of hints", async () => {
    const result = await router.classify({
      target_path: path.join(tmpDir, "Game Folder"),
      declared_kind: "file",
      strategy_hint: "file",
    });

    expect(result.kind).toBe("folder");
    expect(result.hint_overridden).toBe(true);
    expect(result.target_path).toBe(path.join(tmpDir, "Game Folder"));
  });

  it("classifies installer extensions case-insensitively", async () => {
    const kinds = await Promise.all(
      ["setup.exe", "Package.MSI", "disc.ISO"].map(async (name) =>
        (await router.classify({ target_path: path.join(tmpDir, name), declared_kind: "unknown" }))
          .kind,
      ),
    );
    expect(kinds).toEqual(["executable", "executable", "disk_image"]);
  });

  it("does not flag agreeing hints", async () => {
    const result = await router.classify({
      target_path: path.join(tmpDir, "setup.exe"),
      declared_kind: "file",
      strategy_hint: "file",
    });
    expect(result.hint_overridden).toBe(false);
  });

  it("overrides a folder hint for a file", async () => {
    const result = await router.classify({
      target_path: path.join(tmpDir, "disc.ISO"),
      declared_kind: "unknown",
      strategy_hint: "folder",
    });
    expect(result.kind).toBe("disk_image");
    expect(result.hint_overridden).toBe(true);
  });

  it("classifies a missing path as invalid", async () => {
    const result = await router.classify({
      target_path: path.join(tmpDir, "nope.exe"),
      declared_kind: "file",
    });
    expect(result).toMatchObject({ kind: "invalid", reason: "path not found" });
    expect(result.hint_overridden).toBe(false);
  });

  it("classifies an unknown extension as invalid", async () => {
    const result = await router.classify({
      target_path: path.join(tmpDir, "notes.txt"),
      declared_kind: "unknown",
    });
    expect(result).toMatchObject({ kind: "invalid", reason: "unrecognized file type" });
  });

  it("routes files and folders to their installers", async () => {
    const file = await router.route({
      target_path: path.join(tmpDir, "setup.exe"),
      declared_kind: "unknown",
    });
    const folder = await router.route({
      target_path: path.join(tmpDir, "Game Folder"),
      declared_kind: "unknown",
    });

    expect(file.strategy).toBe("file");
    expect(file.installer).toBeInstanceOf(FileInstaller);
    expect(folder.strategy).toBe("folder");
    expect(folder.installer).toBeInstanceOf(FolderInstaller);
  });

  it("rejects invalid targets with a ClassificationError", async () => {
    await expect(
      router.route({ target_path: path.join(tmpDir, "notes.txt"), declared_kind: "file" }),
    ).rejects.toBeInstanceOf(ClassificationError);
  });
});
