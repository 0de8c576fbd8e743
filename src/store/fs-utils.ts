/**
 * Filesystem helpers shared by the note and asset stores.
 *
 * Callers pass absolute paths that already came out of the path resolver.
 */

import fs from "node:fs";
import path from "node:path";
import { StoreError, errnoCode, storageFailure, toStoreError } from "./errors.js";

export type EntryKind = "note" | "asset" | "directory";

export interface DirectoryEntry {
  name: string;
  /** Logical path of the entry, relative to the tenant root. */
  path: string;
  kind: EntryKind;
}

export function joinLogical(dir: string, name: string): string {
  return dir ? `${dir}/${name}` : name;
}

/**
 * Stat a regular file without following a final symlink. Anything that is
 * not a plain file (missing, directory, symlink, socket) is NotFound.
 */
export function statFile(absolutePath: string, what: string): fs.Stats {
  let stats: fs.Stats;
  try {
    stats = fs.lstatSync(absolutePath);
  } catch (error) {
    throw toStoreError(error, what);
  }
  if (!stats.isFile()) {
    throw new StoreError("NotFound", `${what} does not exist`);
  }
  return stats;
}

/**
 * Check the target of a write. Returns whether a regular file is already
 * there. A symlink, directory or other entry in its place is AlreadyExists:
 * writes never follow a link out of the tenant tree.
 */
export function checkWriteTarget(absolutePath: string, what: string): boolean {
  let stats: fs.Stats | undefined;
  try {
    stats = fs.lstatSync(absolutePath, { throwIfNoEntry: false });
  } catch (error) {
    throw storageFailure(error, what);
  }
  if (!stats) return false;
  if (!stats.isFile()) {
    throw new StoreError("AlreadyExists", `${what} is taken by an entry that is not a regular file`);
  }
  return true;
}

/**
 * Immediate, non-hidden children of a directory: directories first, then
 * the files `classify` accepts, each group sorted by name.
 */
export function listEntries(
  absoluteDir: string,
  logicalDir: string,
  classify: (name: string) => EntryKind | null,
  what: string,
): DirectoryEntry[] {
  let dirents: fs.Dirent[];
  try {
    dirents = fs.readdirSync(absoluteDir, { withFileTypes: true });
  } catch (error) {
    throw toStoreError(error, what);
  }

  const directories: DirectoryEntry[] = [];
  const files: DirectoryEntry[] = [];

  for (const dirent of dirents) {
    if (dirent.name.startsWith(".")) continue;
    const entryPath = joinLogical(logicalDir, dirent.name);

    if (dirent.isDirectory()) {
      directories.push({ name: dirent.name, path: entryPath, kind: "directory" });
    } else if (dirent.isFile()) {
      const kind = classify(dirent.name);
      if (kind) files.push({ name: dirent.name, path: entryPath, kind });
    }
  }

  const byName = (a: DirectoryEntry, b: DirectoryEntry) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
  return [...directories.sort(byName), ...files.sort(byName)];
}

/**
 * After a delete, remove directories left empty, walking up to (never
 * including) the tenant root.
 *
 * Best effort: emptiness is re-checked right before each removal, and a
 * directory a concurrent writer refilled is left alone. Nothing here fails
 * the delete that triggered it.
 */
export function pruneEmptyParents(startDir: string, tenantRoot: string): string[] {
  const removed: string[] = [];
  let dir = startDir;

  while (dir !== tenantRoot && dir.startsWith(tenantRoot + path.sep)) {
    try {
      if (fs.readdirSync(dir).length > 0) break;
      fs.rmdirSync(dir);
      removed.push(dir);
    } catch (error) {
      const code = errnoCode(error);
      if (code !== "ENOTEMPTY" && code !== "EEXIST" && code !== "ENOENT") {
        console.warn(`Could not clean up directory ${dir}: ${error instanceof Error ? error.message : String(error)}`);
      }
      break;
    }
    dir = path.dirname(dir);
  }

  return removed;
}
