/**
 * Cellar Engine — Shortcut Manager
 *
 * Reconciles the two places a shortcut can live:
 * - environment_native: the bottle's own program list (via the gateway)
 * - manual_record: the YAML sidecar (SidecarStore)
 *
 * For one (bottle, display name) exactly one entry is visible, and the
 * native backend wins over the sidecar. Writes are serialized per key;
 * reads take no lock.
 */

import { EnvironmentGateway, NativeProgram } from "../gateway/environment-gateway";
import { ShortcutConflictError, errorMessage } from "../errors";
import { ShortcutEntry } from "../types";
import { KeyedLock } from "../utils/keyed-lock";
import { Logger } from "../utils/logger";
import { SidecarStore } from "./sidecar-store";

function keyOf(bottle: string, displayName: string): string {
  return `${bottle}\u0000${displayName}`;
}

function fromNative(bottle: string, program: NativeProgram): ShortcutEntry {
  return {
    bottle_name: bottle,
    display_name: program.name,
    target_executable_path: program.path,
    source: "environment_native",
  };
}

export class ShortcutManager {
  private readonly locks = new KeyedLock();

  constructor(
    private readonly gateway: EnvironmentGateway,
    private readonly sidecar: SidecarStore,
    private readonly logger: Logger,
  ) {}

  /**
   * Native programs of a bottle, or undefined when the listing failed.
   */
  private async nativePrograms(bottle: string): Promise<NativeProgram[] | undefined> {
    try {
      return await this.gateway.listNativeShortcuts(bottle);
    } catch (err: unknown) {
      this.logger.warn(
        { bottle, error: errorMessage(err) },
        "Native program listing failed; using sidecar only",
      );
      return undefined;
    }
  }

  /**
   * Write an entry to its backend and return the entry that is now
   * authoritative for its key.
   */
  async upsert(entry: ShortcutEntry): Promise<ShortcutEntry> {
    const key = keyOf(entry.bottle_name, entry.display_name);
    return this.locks.withLock(key, () =>
      entry.source === "environment_native"
        ? this.upsertNative(entry)
        : this.upsertManual(entry),
    );
  }

  private async upsertManual(entry: ShortcutEntry): Promise<ShortcutEntry> {
    const programs = await this.nativePrograms(entry.bottle_name);
    const native = programs?.find((p) => p.name === entry.display_name);
    if (native) {
      const conflict = new ShortcutConflictError(
        "shortcut",
        `"${entry.display_name}" already exists in the program list of "${entry.bottle_name}"; manual record skipped`,
      );
      this.logger.warn(
        { bottle: entry.bottle_name, display_name: entry.display_name, kind: conflict.kind },
        conflict.message,
      );
      await this.dropManualRecord(entry);
      return fromNative(entry.bottle_name, native);
    }

    await this.recordManually(entry);
    this.logger.info(
      { bottle: entry.bottle_name, display_name: entry.display_name },
      "Recorded manual shortcut",
    );
    return { ...entry, source: "manual_record" };
  }

  private async upsertNative(entry: ShortcutEntry): Promise<ShortcutEntry> {
    const programs = await this.nativePrograms(entry.bottle_name);
    if (!programs) {
      // Adding blind could create a second program under the same name
      this.logger.warn(
        { bottle: entry.bottle_name, display_name: entry.display_name },
        "Program list unavailable; recording manually",
      );
      return this.recordManually(entry);
    }

    const existing = programs.find((p) => p.name === entry.display_name);
    let result: ShortcutEntry;
    if (existing) {
      result = fromNative(entry.bottle_name, existing);
    } else {
      try {
        await this.gateway.addNativeShortcut(
          entry.bottle_name,
          entry.display_name,
          entry.target_executable_path,
        );
        result = { ...entry, source: "environment_native" };
      } catch (err: unknown) {
        // Keep the key retrievable through the sidecar
        this.logger.warn(
          { bottle: entry.bottle_name, display_name: entry.display_name, error: errorMessage(err) },
          "Native program entry could not be created; recording manually",
        );
        return this.recordManually(entry);
      }
    }

    await this.dropManualRecord(entry);
    return result;
  }

  private async recordManually(entry: ShortcutEntry): Promise<ShortcutEntry> {
    await this.sidecar.upsert(entry.bottle_name, {
      display_name: entry.display_name,
      target_executable_path: entry.target_executable_path,
    });
    return { ...entry, source: "manual_record" };
  }

  /** The native entry owns the key; a sidecar record for it would be a second entry */
  private async dropManualRecord(entry: ShortcutEntry): Promise<void> {
    const removed = await this.sidecar.remove(entry.bottle_name, entry.display_name);
    if (removed) {
      this.logger.info(
        { bottle: entry.bottle_name, display_name: entry.display_name },
        "Replaced manual shortcut with native program entry",
      );
    }
  }

  async find(bottle: string, displayName: string): Promise<ShortcutEntry | undefined> {
    const programs = await this.nativePrograms(bottle);
    const native = programs?.find((p) => p.name === displayName);
    if (native) return fromNative(bottle, native);

    const records = await this.sidecar.list(bottle);
    const record = records.find((r) => r.display_name === displayName);
    if (!record) return undefined;
    return {
      bottle_name: bottle,
      display_name: record.display_name,
      target_executable_path: record.target_executable_path,
      source: "manual_record",
    };
  }

  /**
   * Every shortcut of a bottle: native entries, then sidecar records whose
   * name the native list does not already hold.
   */
  async list(bottle: string): Promise<ShortcutEntry[]> {
    const programs = (await this.nativePrograms(bottle)) ?? [];
    const entries: ShortcutEntry[] = [];
    const names = new Set<string>();

    for (const program of programs) {
      if (names.has(program.name)) continue;
      names.add(program.name);
      entries.push(fromNative(bottle, program));
    }

    for (const record of await this.sidecar.list(bottle)) {
      if (names.has(record.display_name)) continue;
      names.add(record.display_name);
      entries.push({
        bottle_name: bottle,
        display_name: record.display_name,
        target_executable_path: record.target_executable_path,
        source: "manual_record",
      });
    }
    return entries;
  }
}
