/**
 * Cellar Engine — Configuration Tests
 */

import { describe, it, expect } from "vitest";
import * as os from "os";
import * as path from "path";
import {
  ConfigError,
  DEFAULT_PREFIX_BASE,
  MAX_TIMEOUT_MS,
  cellarHome,
  engineOptionsFromEnv,
  resolveEngineOptions,
} from "../src/config";

const HOME = "/data/cellar";

describe("resolveEngineOptions", () => {
  const base = {
    state_db_path: "/data/state.db",
    prefix_base: "/data/bottles",
    staging_dir: "/data/staging",
    shortcut_sidecar_path: "/data/shortcuts.yaml",
  };

  it("applies defaults and freezes the result", () => {
    const options = resolveEngineOptions(base);

    expect(options.command_timeout_ms).toBe(300_000);
    expect(options.run_timeout_ms).toBe(1_800_000);
    expect(options.shortcut_poll_attempts).toBe(5);
    expect(options.shortcut_poll_interval_ms).toBe(1_000);
    expect(options.baseline_components).toEqual([]);
    expect(options.verbose).toBe(false);
    expect(Object.isFrozen(options)).toBe(true);
  });

  it("lists every invalid field", () => {
    expect(() =>
      resolveEngineOptions({ ...base, prefix_base: "", run_timeout_ms: -1 }),
    ).toThrow(ConfigError);
    expect(() =>
      resolveEngineOptions({ ...base, prefix_base: "", run_timeout_ms: -1 }),
    ).toThrow(/prefix_base: .*; run_timeout_ms: /);
  });

  it("rejects timeouts longer than a timer can wait", () => {
    expect(resolveEngineOptions({ ...base, run_timeout_ms: MAX_TIMEOUT_MS }).run_timeout_ms).toBe(
      2_147_483_647,
    );
    expect(() => resolveEngineOptions({ ...base, run_timeout_ms: 3_000_000_000 })).toThrow(
      "Invalid engine options: run_timeout_ms: Number must be less than or equal to 2147483647",
    );
    expect(() => resolveEngineOptions({ ...base, command_timeout_ms: 2_147_483_648 })).toThrow(
      "Invalid engine options: command_timeout_ms: Number must be less than or equal to 2147483647",
    );
  });
});

describe("engineOptionsFromEnv", () => {
  it("defaults every path under the home directory", () => {
    const options = resolveEngineOptions(engineOptionsFromEnv(HOME, {}));

    expect(options.state_db_path).toBe(path.join(HOME, "state.db"));
    expect(options.staging_dir).toBe(path.join(HOME, "staging"));
    expect(options.shortcut_sidecar_path).toBe(path.join(HOME, "shortcuts.yaml"));
    expect(options.prefix_base).toBe(DEFAULT_PREFIX_BASE);
    expect(options.catalog_path).toBeUndefined();
    expect(options.command_timeout_ms).toBe(300_000);
  });

  it("reads overrides from CELLAR_* variables", () => {
    const options = resolveEngineOptions(
      engineOptionsFromEnv(HOME, {
        CELLAR_PREFIX_BASE: "/bottles",
        CELLAR_STAGING_DIR: "/tmp/stage",
        CELLAR_CATALOG: "/etc/cellar/components.yaml",
        CELLAR_BASELINE: "dxvk, vcrun2019,,d3dx9",
        CELLAR_COMMAND_TIMEOUT: "90",
        CELLAR_RUN_TIMEOUT: "1.5",
        CELLAR_VERBOSE: "true",
      }),
    );

    expect(options.prefix_base).toBe("/bottles");
    expect(options.staging_dir).toBe("/tmp/stage");
    expect(options.catalog_path).toBe("/etc/cellar/components.yaml");
    expect(options.baseline_components).toEqual(["dxvk", "vcrun2019", "d3dx9"]);
    expect(options.command_timeout_ms).toBe(90_000);
    expect(options.run_timeout_ms).toBe(1_500);
    expect(options.verbose).toBe(true);
  });

  it("rejects a run timeout beyond the timer limit at resolution", () => {
    const options = engineOptionsFromEnv(HOME, { CELLAR_RUN_TIMEOUT: "3000000" });
    expect(options.run_timeout_ms).toBe(3_000_000_000);
    expect(() => resolveEngineOptions(options)).toThrow(ConfigError);
  });

  it("rejects a malformed timeout", () => {
    expect(() => engineOptionsFromEnv(HOME, { CELLAR_RUN_TIMEOUT: "soon" })).toThrow(
      'CELLAR_RUN_TIMEOUT must be a positive number of seconds, got "soon"',
    );
  });

  it("places the home directory under the user's home unless overridden", () => {
    expect(cellarHome({})).toBe(path.join(os.homedir(), ".cellar"));
    expect(cellarHome({ CELLAR_HOME: "/srv/cellar" })).toBe("/srv/cellar");
  });
});
