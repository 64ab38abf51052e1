/**
 * Cellar Engine — Bottles Gateway Tests
 *
 * The process runner is replaced by a scripted one; no external command
 * is ever launched.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { resolveEngineOptions } from "../src/config";
import { DependencyInstallError, EnvironmentError, ExecutionError, StagingError } from "../src/errors";
import { BottlesCommands, BottlesGateway, findOnPath } from "../src/gateway/bottles-gateway";
import { ProcessOptions, ProcessResult, ProcessRunner } from "../src/gateway/process-runner";
import { createLogger } from "../src/utils/logger";

interface RecordedCall {
  command: string[];
  options: ProcessOptions;
}

type Script = (command: string[], options: ProcessOptions) => Partial<ProcessResult> | undefined;

function scriptedRunner(script: Script): { runner: ProcessRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: ProcessRunner = async (command, options) => {
    calls.push({ command, options });
    return {
      exitCode: 0,
      stdout: "",
      stderr: "",
      timedOut: false,
      durationMs: 5,
      ...script(command, options),
    };
  };
  return { runner, calls };
}

const NATIVE: BottlesCommands = {
  type: "native",
  bottles_cli: ["bottles-cli"],
  winetricks: ["winetricks"],
  wineserver: ["wineserver"],
  wine: ["wine"],
};

const COMPONENT = { provided_by: "must_install" as const };

describe("BottlesGateway", () => {
  let tmpDir: string;

  function createGateway(
    script: Script,
    deps: { commands?: BottlesCommands; searchPath?: string } = { commands: NATIVE },
  ) {
    const { runner, calls } = scriptedRunner(script);
    const options = resolveEngineOptions({
      state_db_path: path.join(tmpDir, "state.db"),
      prefix_base: path.join(tmpDir, "bottles"),
      staging_dir: path.join(tmpDir, "staging"),
      shortcut_sidecar_path: path.join(tmpDir, "shortcuts.yaml"),
      command_timeout_ms: 1000,
    });
    const gateway = new BottlesGateway(options, createLogger(), { runner, ...deps });
    return { gateway, calls };
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cellar-gateway-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  // ─── Detection ──────────────────────────────────────────────

  it("uses the Flatpak installation when it is listed", async () => {
    const { gateway, calls } = createGateway(
      (command) =>
        command[0] === "flatpak" && command[1] === "list"
          ? { stdout: "org.example.Other\ncom.usebottles.bottles\n" }
          : { stdout: "{}" },
      {},
    );

    await gateway.listBottles();

    expect(calls.map((c) => c.command)).toEqual([
      ["flatpak", "list", "--app", "--columns=application"],
      ["flatpak", "run", "--command=bottles-cli", "com.usebottles.bottles", "--json", "list", "bottles"],
    ]);
  });

  it("falls back to a native installation on PATH", async () => {
    const bin = path.join(tmpDir, "bin");
    fs.mkdirSync(bin);
    for (const name of ["bottles-cli", "winetricks", "wineserver"]) {
      fs.writeFileSync(path.join(bin, name), "#!/bin/sh\n", { mode: 0o755 });
    }
    const { gateway, calls } = createGateway(
      (command) => (command[0] === "flatpak" ? { exitCode: 1 } : { stdout: "{}" }),
      { searchPath: bin },
    );

    await gateway.listBottles();

    expect(calls.map((c) => c.command)).toEqual([
      ["flatpak", "list", "--app", "--columns=application"],
      ["bottles-cli", "--json", "list", "bottles"],
    ]);
  });

  it("fails when neither Flatpak nor native Bottles is installed", async () => {
    const bin = path.join(tmpDir, "bin");
    fs.mkdirSync(bin);
    fs.writeFileSync(path.join(bin, "bottles-cli"), "#!/bin/sh\n", { mode: 0o755 });
    const { gateway, calls } = createGateway(() => ({ exitCode: 1 }), { searchPath: bin });

    const failure = gateway.listBottles();

    await expect(failure).rejects.toBeInstanceOf(EnvironmentError);
    await expect(failure).rejects.toThrow("No Bottles installation (Flatpak or native) found");
    expect(calls).toHaveLength(1);
  });

  it("finds executables on a search path", async () => {
    const bin = path.join(tmpDir, "bin");
    fs.mkdirSync(bin);
    fs.writeFileSync(path.join(bin, "bottles-cli"), "#!/bin/sh\n", { mode: 0o755 });

    expect(await findOnPath("bottles-cli", bin)).toBe(true);
    expect(await findOnPath("winetricks", bin)).toBe(false);
  });

  // ─── Environments ───────────────────────────────────────────

  it("reuses an existing bottle", async () => {
    const { gateway, calls } = createGateway(() => ({ stdout: '{"games": {"Name": "games"}}' }));

    const info = await gateway.ensureEnvironment("games");

    expect(info).toEqual({
      name: "games",
      prefix_path: path.join(tmpDir, "bottles", "games"),
      created: false,
    });
    expect(calls).toHaveLength(1);
  });

  it("creates a missing bottle with the gaming environment", async () => {
    const { gateway, calls } = createGateway(() => ({ stdout: "{}" }));

    const info = await gateway.ensureEnvironment("games");

    expect(info.created).toBe(true);
    expect(calls[1].command).toEqual([
      "bottles-cli",
      "new",
      "--bottle-name",
      "games",
      "--environment",
      "gaming",
    ]);
    expect(calls[1].options.timeoutMs).toBe(1000);
    expect(calls[2].command).toEqual(["wine", "wineboot", "--repair"]);
    expect(calls[2].options.env).toEqual({ WINEPREFIX: path.join(tmpDir, "bottles", "games") });
    expect(calls).toHaveLength(3);
  });

  it("keeps a new bottle when the prefix repair fails", async () => {
    const { gateway, calls } = createGateway((command) =>
      command.includes("wineboot") ? { exitCode: 1, stderr: "wine: could not load kernel32.dll" } : { stdout: "{}" },
    );

    const info = await gateway.ensureEnvironment("games");

    expect(info).toEqual({
      name: "games",
      prefix_path: path.join(tmpDir, "bottles", "games"),
      created: true,
    });
    expect(calls.map((c) => c.command[0])).toEqual(["bottles-cli", "bottles-cli", "wine"]);
  });

  it("maps a failed bottle creation to an EnvironmentError", async () => {
    const { gateway } = createGateway((command) =>
      command.includes("new") ? { exitCode: 1, stderr: "disk full\n" } : { stdout: "{}" },
    );

    await expect(gateway.ensureEnvironment("games")).rejects.toMatchObject({
      kind: "EnvironmentError",
      stage: "environment",
      message: 'create bottle "games": exited with code 1',
      detail: "disk full",
      exitCode: 1,
    });
  });

  it("rejects unparseable bottle listings", async () => {
    const { gateway } = createGateway(() => ({ stdout: "Bottles 51.0 starting..." }));

    await expect(gateway.listBottles()).rejects.toThrow("list bottles: unparseable output");
  });

  it("puts application trees under drive_c", () => {
    const { gateway } = createGateway(() => undefined);
    expect(gateway.storagePath("games")).toBe(path.join(tmpDir, "bottles", "games", "drive_c"));
  });

  // ─── Components ─────────────────────────────────────────────

  it("installs winetricks verbs quietly in the bottle prefix", async () => {
    const { gateway, calls } = createGateway(() => undefined);

    await gateway.installComponent("games", { ...COMPONENT, id: "vcrun2019", installer: "winetricks" });

    expect(calls[0].command).toEqual(["winetricks", "-q", "vcrun2019"]);
    expect(calls[0].options.env).toEqual({ WINEPREFIX: path.join(tmpDir, "bottles", "games") });
  });

  it("treats an already installed verb as success", async () => {
    const { gateway } = createGateway(() => ({
      exitCode: 1,
      stdout: "vcrun2019 already installed, skipping\n",
    }));

    await expect(
      gateway.installComponent("games", { ...COMPONENT, id: "vcrun2019", installer: "winetricks" }),
    ).resolves.toBeUndefined();
  });

  it("maps a failed verb to a DependencyInstallError", async () => {
    const { gateway } = createGateway(() => ({ exitCode: 1, stderr: "download failed" }));

    const error = await gateway
      .installComponent("games", { ...COMPONENT, id: "d3dx9", installer: "winetricks" })
      .then(
        () => undefined,
        (err: unknown) => err,
      );

    expect(error).toBeInstanceOf(DependencyInstallError);
    expect(error).toMatchObject({ message: "install d3dx9: exited with code 1", detail: "download failed" });
  });

  it("reports a command that cannot be launched", async () => {
    const { gateway } = createGateway(() => ({
      exitCode: -1,
      launchError: "spawn winetricks ENOENT",
    }));

    await expect(
      gateway.installComponent("games", { ...COMPONENT, id: "xinput", installer: "winetricks" }),
    ).rejects.toThrow("install xinput: could not launch (spawn winetricks ENOENT)");
  });

  it("enables Bottles components through edit params", async () => {
    const { gateway, calls } = createGateway(() => undefined);

    await gateway.installComponent("games", { ...COMPONENT, id: "dxvk-nvapi", installer: "bottles" });

    expect(calls[0].command).toEqual([
      "bottles-cli",
      "edit",
      "-b",
      "games",
      "--params",
      "dxvk_nvapi:true",
    ]);
  });

  it("never runs anything for base runtime components", async () => {
    const { gateway, calls } = createGateway(() => undefined);

    await gateway.installComponent("games", {
      id: "builtin",
      provided_by: "base_runtime",
      installer: "none",
    });

    expect(calls).toEqual([]);
  });

  // ─── Execution ──────────────────────────────────────────────

  it("runs the binary and waits for the wineserver", async () => {
    const { gateway, calls } = createGateway(() => ({ durationMs: 42 }));

    const result = await gateway.runBinary("games", "/stage/setup.exe", 5000);

    expect(result).toEqual({ exit_code: 0, duration_ms: 42 });
    expect(calls.map((c) => c.command)).toEqual([
      ["bottles-cli", "run", "-b", "games", "-e", "/stage/setup.exe"],
      ["wineserver", "--wait"],
    ]);
    expect(calls[0].options.timeoutMs).toBe(5000);
    expect(calls[1].options.env).toEqual({ WINEPREFIX: path.join(tmpDir, "bottles", "games") });
  });

  it("maps a run timeout to an ExecutionError", async () => {
    const { gateway, calls } = createGateway(() => ({ exitCode: -1, timedOut: true, durationMs: 5000 }));

    const error = await gateway.runBinary("games", "/stage/setup.exe", 5000).then(
      () => undefined,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toMatchObject({
      stage: "execution",
      timedOut: true,
      message: "run setup.exe: timed out after 5000ms",
    });
    expect(calls).toHaveLength(1);
  });

  // ─── Staging ────────────────────────────────────────────────

  it("extracts a disk image and finds its installer", async () => {
    const { gateway, calls } = createGateway((command) => {
      const output = command.find((arg) => arg.startsWith("-o"));
      if (command[0] === "7z" && output) {
        fs.writeFileSync(path.join(output.slice(2), "SETUP.EXE"), "");
      }
      return undefined;
    });
    const image = path.join(tmpDir, "Disc One.iso");

    const installer = await gateway.mountImage("games", image);

    const target = path.join(tmpDir, "staging", "games", "Disc One");
    expect(calls[0].command).toEqual(["7z", "x", "-y", image, `-o${target}`]);
    expect(installer).toBe(path.join(target, "SETUP.EXE"));
  });

  it("fails staging when the image has no installer", async () => {
    const { gateway } = createGateway(() => undefined);

    await expect(gateway.mountImage("games", path.join(tmpDir, "data.iso"))).rejects.toBeInstanceOf(
      StagingError,
    );
  });

  it("replaces an existing copy of an application tree", async () => {
    const { gateway } = createGateway(() => undefined);
    const source = path.join(tmpDir, "src", "Game");
    const destination = path.join(tmpDir, "bottles", "games", "drive_c", "Game");
    fs.mkdirSync(path.join(source, "bin"), { recursive: true });
    fs.writeFileSync(path.join(source, "bin", "game.exe"), "new");
    fs.mkdirSync(destination, { recursive: true });
    fs.writeFileSync(path.join(destination, "stale.txt"), "old");

    await gateway.copyTree(source, destination);

    expect(fs.readdirSync(destination)).toEqual(["bin"]);
    expect(fs.readFileSync(path.join(destination, "bin", "game.exe"), "utf-8")).toBe("new");
  });

  // ─── Shortcuts ──────────────────────────────────────────────

  it("parses the program list", async () => {
    const { gateway, calls } = createGateway(() => ({
      stdout: JSON.stringify([
        { name: "Game", path: "C:\\Games\\game.exe", executable: "game.exe" },
      ]),
    }));

    expect(await gateway.listNativeShortcuts("games")).toEqual([
      { name: "Game", path: "C:\\Games\\game.exe" },
    ]);
    expect(calls[0].command).toEqual(["bottles-cli", "--json", "programs", "-b", "games"]);
  });

  it("rejects a program list with the wrong shape", async () => {
    const { gateway } = createGateway(() => ({ stdout: '{"Game": "C:\\\\game.exe"}' }));

    await expect(gateway.listNativeShortcuts("games")).rejects.toBeInstanceOf(EnvironmentError);
  });

  it("adds a program to the bottle", async () => {
    const { gateway, calls } = createGateway(() => undefined);

    await gateway.addNativeShortcut("games", "Game", "/bottles/games/drive_c/Game/game.exe");

    expect(calls[0].command).toEqual([
      "bottles-cli",
      "add",
      "-b",
      "games",
      "-n",
      "Game",
      "-p",
      "/bottles/games/drive_c/Game/game.exe",
    ]);
  });
});
