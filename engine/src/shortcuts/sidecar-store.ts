/**
 * Cellar Engine — Shortcut Sidecar Store
 *
 * YAML file holding manually recorded shortcuts, keyed by bottle name:
 *
 *   bottles:
 *     my-bottle:
 *       - display_name: Game
 *         target_executable_path: /.../drive_c/Game/game.exe
 *
 * Validated on every read. Writes replace the file atomically (temp file +
 * rename) and are serialized per file.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { KeyedLock } from "../utils/keyed-lock";

const SidecarRecordSchema = z.object({
  display_name: z.string().min(1),
  target_executable_path: z.string().min(1),
});

const SidecarSchema = z.object({
  bottles: z.record(z.array(SidecarRecordSchema)).default({}),
});

export type SidecarRecord = z.infer<typeof SidecarRecordSchema>;
export type SidecarDocument = z.infer<typeof SidecarSchema>;

export class SidecarFormatError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
  ) {
    super(message);
    this.name = "SidecarFormatError";
  }
}

/** Writes to one file path are serialized across store instances */
const fileLocks = new KeyedLock();

export class SidecarStore {
  constructor(readonly filePath: string) {}

  /**
   * Read and validate the sidecar. A missing file is an empty document.
   *
   * @throws SidecarFormatError if the file is not valid YAML or has the wrong shape
   */
  async read(): Promise<SidecarDocument> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { bottles: {} };
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SidecarFormatError(`Shortcut sidecar is not valid YAML: ${message}`, this.filePath);
    }
    if (raw === null || raw === undefined) {
      return { bottles: {} };
    }

    const parsed = SidecarSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SidecarFormatError(
        `Shortcut sidecar is malformed: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
        this.filePath,
      );
    }
    return parsed.data;
  }

  async list(bottle: string): Promise<SidecarRecord[]> {
    const doc = await this.read();
    return doc.bottles[bottle] ?? [];
  }

  /**
   * Apply a read-modify-write under the file lock.
   */
  async update(mutate: (doc: SidecarDocument) => void): Promise<void> {
    await fileLocks.withLock(path.resolve(this.filePath), async () => {
      const doc = await this.read();
      mutate(doc);
      for (const [bottle, records] of Object.entries(doc.bottles)) {
        if (records.length === 0) delete doc.bottles[bottle];
      }
      await this.write(doc);
    });
  }

  async upsert(bottle: string, record: SidecarRecord): Promise<void> {
    await this.update((doc) => {
      const records = (doc.bottles[bottle] ?? []).filter(
        (r) => r.display_name !== record.display_name,
      );
      records.push({
        display_name: record.display_name,
        target_executable_path: record.target_executable_path,
      });
      doc.bottles[bottle] = records;
    });
  }

  /**
   * Remove the record for displayName. Returns whether one existed.
   */
  async remove(bottle: string, displayName: string): Promise<boolean> {
    let removed = false;
    await this.update((doc) => {
      const records = doc.bottles[bottle];
      if (!records) return;
      const kept = records.filter((r) => r.display_name !== displayName);
      removed = kept.length !== records.length;
      doc.bottles[bottle] = kept;
    });
    return removed;
  }

  private async write(doc: SidecarDocument): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.promises.mkdir(dir, { recursive: true });
    const tempPath = path.join(
      dir,
      `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`,
    );
    try {
      await fs.promises.writeFile(tempPath, stringifyYaml(doc), "utf-8");
      await fs.promises.rename(tempPath, this.filePath);
    } catch (err: unknown) {
      await fs.promises.rm(tempPath, { force: true });
      throw err;
    }
  }
}
