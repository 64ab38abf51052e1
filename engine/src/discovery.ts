/**
 * Cellar Engine — Executable Discovery
 *
 * Finds the program to run inside a copied application tree, and the
 * installer binary inside an extracted disk image.
 */

import * as fs from "fs";
import * as path from "path";

/** Directories never descended into (compared lowercase) */
const EXCLUDED_DIRS = new Set([
  "windows",
  "system32",
  "syswow64",
  "installer",
  "temp_installer",
]);

/** Stem fragments that mark helper binaries rather than the application */
const HELPER_KEYWORDS = [
  "unins",
  "uninstall",
  "crash",
  "report",
  "update",
  "patch",
  "readme",
  "vcredist",
  "directx",
  "dxsetup",
  "setup",
];

/** Installer names looked for in an extracted image, in preference order */
export const IMAGE_INSTALLER_NAMES = ["setup.exe", "install.exe", "autorun.exe", "start.exe"];

const EXE_PATTERN = /\.exe$/i;

/**
 * Every .exe under root, in lexicographic depth-first order.
 */
export async function findExecutables(root: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!EXCLUDED_DIRS.has(entry.name.toLowerCase())) {
          await walk(full);
        }
      } else if (entry.isFile() && EXE_PATTERN.test(entry.name)) {
        found.push(full);
      }
    }
  };

  await walk(root);
  return found;
}

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function stemOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function isHelperBinary(filePath: string): boolean {
  const stem = stemOf(filePath).toLowerCase();
  return HELPER_KEYWORDS.some((keyword) => stem.includes(keyword));
}

/**
 * Length of the longest common substring of a and b.
 */
export function longestCommonSubstring(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  let previous = new Array<number>(b.length + 1).fill(0);
  let best = 0;
  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        current[j] = previous[j - 1] + 1;
        if (current[j] > best) best = current[j];
      }
    }
    previous = current;
  }
  return best;
}

/**
 * Pick the application binary among candidates (in walk order).
 * Helpers are only considered when nothing else exists; the best name
 * match against hint wins and ties keep walk order.
 */
export function selectExecutable(
  candidates: string[],
  hint: string,
): string | undefined {
  const primary = candidates.filter((c) => !isHelperBinary(c));
  const pool = primary.length > 0 ? primary : candidates;
  const target = normalizeName(hint);

  let chosen: string | undefined;
  let bestScore = -1;
  for (const candidate of pool) {
    const score = longestCommonSubstring(normalizeName(stemOf(candidate)), target);
    if (score > bestScore) {
      bestScore = score;
      chosen = candidate;
    }
  }
  return chosen;
}

/**
 * Locate the installer binary in an extracted image: the root first, then
 * its immediate subdirectories, each by IMAGE_INSTALLER_NAMES preference.
 */
export async function findInstallerInImage(root: string): Promise<string | undefined> {
  const pick = async (dir: string): Promise<string | undefined> => {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    const files = new Map<string, string>();
    for (const entry of entries) {
      if (entry.isFile()) files.set(entry.name.toLowerCase(), entry.name);
    }
    for (const name of IMAGE_INSTALLER_NAMES) {
      const actual = files.get(name);
      if (actual) return path.join(dir, actual);
    }
    return undefined;
  };

  const atRoot = await pick(root);
  if (atRoot) return atRoot;

  const subdirs = (await fs.promises.readdir(root, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  for (const subdir of subdirs) {
    const found = await pick(path.join(root, subdir));
    if (found) return found;
  }
  return undefined;
}
