/**
 * Note store: Markdown notes under each tenant's root.
 *
 * Notes are plain `.md` files; directories are whatever the note paths imply.
 * They appear when a note is written into them and disappear when their last
 * entry is deleted. All paths go through the PathResolver.
 */

import fs from "node:fs";
import path from "node:path";
import { StoreError, errnoCode, storageFailure, toStoreError } from "./errors.js";
import { checkWriteTarget, joinLogical, listEntries, pruneEmptyParents, statFile, type DirectoryEntry } from "./fs-utils.js";
import { encodeIdentifier } from "./identifiers.js";
import { hasLoneSurrogate, type PathResolver, type ResolvedPath } from "./paths.js";

export const NOTE_EXTENSION = ".md";
export const DEFAULT_MAX_NOTE_BYTES = 1024 * 1024;

export interface WriteOptions {
  /** Fail with AlreadyExists instead of overwriting. */
  strict?: boolean;
}

export interface NoteWriteResult {
  uri: string;
  path: string;
  created: boolean;
  bytes: number;
}

export interface NoteStat {
  uri: string;
  path: string;
  size: number;
  mtime: number;
}

export interface NoteRenameResult {
  uri: string;
  path: string;
  previousPath: string;
}

export interface NoteTreeNode {
  name: string;
  path: string;
  type: "directory" | "note";
  /** Milliseconds since epoch. For directories, the newest mtime below them (0 when empty). */
  mtime: number;
  children?: NoteTreeNode[];
}

export interface NoteStore {
  write(tenantId: string, logicalPath: string, content: string | Uint8Array, options?: WriteOptions): NoteWriteResult;
  read(tenantId: string, logicalPath: string): string;
  stat(tenantId: string, logicalPath: string): NoteStat;
  delete(tenantId: string, logicalPath: string): void;
  list(tenantId: string, directoryPath: string): DirectoryEntry[];
  rename(tenantId: string, logicalPath: string, newName: string): NoteRenameResult;
  tree(tenantId: string): NoteTreeNode[];
  readonly resolver: PathResolver;
}

export interface NoteStoreOptions {
  maxBytes?: number;
}

/**
 * Turn caller content into note text, rejecting anything that isn't text.
 */
export function decodeNoteContent(content: string | Uint8Array, maxBytes: number = DEFAULT_MAX_NOTE_BYTES): string {
  let text: string;
  if (typeof content === "string") {
    text = content;
  } else {
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(content);
    } catch {
      throw new StoreError("InvalidContent", "Note content is not valid UTF-8 text");
    }
  }

  if (text.includes("\0")) {
    throw new StoreError("InvalidContent", "Note content contains NUL bytes; binary data belongs in the asset store");
  }
  if (hasLoneSurrogate(text)) {
    throw new StoreError("InvalidContent", "Note content is not valid Unicode text");
  }

  const bytes = Buffer.byteLength(text, "utf-8");
  if (bytes > maxBytes) {
    throw new StoreError("InvalidContent", `Note content is ${bytes} bytes; the limit is ${maxBytes}`);
  }
  return text;
}

/** Drop the second link a half-finished rename left behind. */
function undoLink(absolutePath: string): void {
  try {
    fs.unlinkSync(absolutePath);
  } catch (error) {
    console.warn(`Could not undo rename link ${absolutePath}: ${toStoreError(error, "link").message}`);
  }
}

function isNoteName(name: string): boolean {
  return name.endsWith(NOTE_EXTENSION);
}

export function createNoteStore(resolver: PathResolver, options: NoteStoreOptions = {}): NoteStore {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_NOTE_BYTES;

  /** Locate a note, appending `.md` when the caller left it off. */
  function locateNote(tenantId: string, logicalPath: string): ResolvedPath {
    const located = resolver.locate(tenantId, logicalPath);
    if (isNoteName(located.logicalPath)) return located;
    return resolver.locate(tenantId, located.logicalPath + NOTE_EXTENSION);
  }

  function buildTree(absoluteDir: string, logicalDir: string): NoteTreeNode[] {
    let dirents: fs.Dirent[];
    try {
      dirents = fs.readdirSync(absoluteDir, { withFileTypes: true });
    } catch (error) {
      console.warn(`Skipping unreadable directory ${absoluteDir}: ${toStoreError(error, "directory").message}`);
      return [];
    }

    const visible = dirents
      .filter((d) => !d.name.startsWith("."))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const directories: NoteTreeNode[] = [];
    const notes: NoteTreeNode[] = [];

    for (const dirent of visible) {
      const entryPath = joinLogical(logicalDir, dirent.name);
      const absolutePath = path.join(absoluteDir, dirent.name);

      if (dirent.isDirectory()) {
        const children = buildTree(absolutePath, entryPath);
        const mtime = children.reduce((newest, child) => Math.max(newest, child.mtime), 0);
        directories.push({ name: dirent.name, path: entryPath, type: "directory", children, mtime });
      } else if (dirent.isFile() && isNoteName(dirent.name)) {
        // Gone between readdir and stat: keep the entry without an mtime.
        const mtime = fs.statSync(absolutePath, { throwIfNoEntry: false })?.mtimeMs ?? 0;
        notes.push({ name: dirent.name, path: entryPath, type: "note", mtime });
      }
    }

    return [...directories, ...notes];
  }

  return {
    resolver,

    write(tenantId, logicalPath, content, writeOptions = {}) {
      const { logicalPath: notePath, absolutePath } = locateNote(tenantId, logicalPath);
      const text = decodeNoteContent(content, maxBytes);
      const label = `note "${notePath}"`;

      const created = !checkWriteTarget(absolutePath, `Note "${notePath}"`);
      try {
        fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
        fs.writeFileSync(absolutePath, text, { encoding: "utf-8", flag: writeOptions.strict ? "wx" : "w" });
      } catch (error) {
        if (writeOptions.strict && errnoCode(error) === "EEXIST") {
          throw new StoreError("AlreadyExists", `Note "${notePath}" already exists`, error);
        }
        throw storageFailure(error, label);
      }

      console.log(`${created ? "Created" : "Updated"} note ${tenantId}:${notePath}`);
      return {
        uri: encodeIdentifier("note", tenantId, notePath),
        path: notePath,
        created,
        bytes: Buffer.byteLength(text, "utf-8"),
      };
    },

    read(tenantId, logicalPath) {
      const { logicalPath: notePath, absolutePath } = locateNote(tenantId, logicalPath);
      const label = `Note "${notePath}"`;
      statFile(absolutePath, label);
      try {
        return fs.readFileSync(absolutePath, "utf-8");
      } catch (error) {
        throw toStoreError(error, label);
      }
    },

    stat(tenantId, logicalPath) {
      const { logicalPath: notePath, absolutePath } = locateNote(tenantId, logicalPath);
      const stats = statFile(absolutePath, `Note "${notePath}"`);
      return {
        uri: encodeIdentifier("note", tenantId, notePath),
        path: notePath,
        size: stats.size,
        mtime: stats.mtimeMs,
      };
    },

    delete(tenantId, logicalPath) {
      const { logicalPath: notePath, absolutePath } = locateNote(tenantId, logicalPath);
      const label = `Note "${notePath}"`;
      statFile(absolutePath, label);
      try {
        fs.unlinkSync(absolutePath);
      } catch (error) {
        throw toStoreError(error, label);
      }
      console.log(`Deleted note ${tenantId}:${notePath}`);

      pruneEmptyParents(path.dirname(absolutePath), resolver.registry.resolveTenantRoot(tenantId));
    },

    list(tenantId, directoryPath) {
      const { logicalPath: dir, absolutePath } = resolver.locateDirectory(tenantId, directoryPath);
      const label = dir ? `Directory "${dir}"` : "Tenant root";
      return listEntries(absolutePath, dir, (name) => (isNoteName(name) ? "note" : null), label);
    },

    rename(tenantId, logicalPath, newName) {
      const source = locateNote(tenantId, logicalPath);
      statFile(source.absolutePath, `Note "${source.logicalPath}"`);

      // Only the last component of newName counts: renames stay in the same directory.
      const baseName = path.posix.basename(newName.replace(/\\/g, "/"));
      if (baseName === "" || baseName === "." || baseName === "..") {
        throw new StoreError("PathTraversal", `Invalid note name "${newName}"`);
      }
      const fileName = isNoteName(baseName) ? baseName : baseName + NOTE_EXTENSION;
      const dir = path.posix.dirname(source.logicalPath);
      const target = locateNote(tenantId, dir === "." ? fileName : `${dir}/${fileName}`);

      // linkSync fails on an existing target; renameSync would replace it.
      try {
        fs.linkSync(source.absolutePath, target.absolutePath);
      } catch (error) {
        if (errnoCode(error) === "EEXIST") {
          throw new StoreError("AlreadyExists", `Note "${target.logicalPath}" already exists`, error);
        }
        throw toStoreError(error, `Note "${source.logicalPath}"`);
      }
      try {
        fs.unlinkSync(source.absolutePath);
      } catch (error) {
        undoLink(target.absolutePath);
        throw toStoreError(error, `Note "${source.logicalPath}"`);
      }

      console.log(`Renamed note ${tenantId}:${source.logicalPath} -> ${target.logicalPath}`);
      return {
        uri: encodeIdentifier("note", tenantId, target.logicalPath),
        path: target.logicalPath,
        previousPath: source.logicalPath,
      };
    },

    tree(tenantId) {
      const { absolutePath } = resolver.locateDirectory(tenantId, "");
      if (!fs.existsSync(absolutePath)) {
        throw new StoreError("NotFound", `Tenant root for "${tenantId}" does not exist`);
      }
      return buildTree(absolutePath, "");
    },
  };
}
