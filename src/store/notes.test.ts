import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createTenantRegistry } from "./tenants.js";
import { createPathResolver } from "./paths.js";
import { createNoteStore, decodeNoteContent, type NoteStore } from "./notes.js";
import { isStoreError } from "./errors.js";

function thrownKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isStoreError(error) ? error.kind : "non-store error";
  }
  return undefined;
}

describe("NoteStore", () => {
  let tempDir: string;
  let root: string;
  let notes: NoteStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "notekeep-notes-"));
    for (const tenant of ["t1", "t2"]) {
      fs.mkdirSync(path.join(tempDir, tenant));
    }
    root = path.join(tempDir, "t1");
    const registry = createTenantRegistry({ notesDir: tempDir, tenants: ["t1", "t2"] });
    notes = createNoteStore(createPathResolver(registry));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("write/read", () => {
    it("reads back what was written", () => {
      const result = notes.write("t1", "a/b.md", "# Hi");

      expect(result).toEqual({ uri: "note:///a/b.md", path: "a/b.md", created: true, bytes: 4 });
      expect(notes.read("t1", "a/b.md")).toBe("# Hi");
      expect(fs.readFileSync(path.join(root, "a", "b.md"), "utf-8")).toBe("# Hi");
    });

    it("appends the .md extension when it is missing", () => {
      const result = notes.write("t1", "projects/plan", "steps");

      expect(result.path).toBe("projects/plan.md");
      expect(result.uri).toBe("note:///projects/plan.md");
      expect(notes.read("t1", "projects/plan.md")).toBe("steps");
      expect(notes.read("t1", "projects/plan")).toBe("steps");
    });

    it("overwrites an existing note", () => {
      notes.write("t1", "x.md", "first");
      const result = notes.write("t1", "x.md", "second");

      expect(result.created).toBe(false);
      expect(notes.read("t1", "x.md")).toBe("second");
    });

    it("refuses to overwrite in strict mode", () => {
      notes.write("t1", "x.md", "first");

      expect(thrownKind(() => notes.write("t1", "x.md", "second", { strict: true }))).toBe("AlreadyExists");
      expect(notes.read("t1", "x.md")).toBe("first");
    });

    it("creates in strict mode when the note is new", () => {
      expect(notes.write("t1", "fresh.md", "new", { strict: true }).created).toBe(true);
    });

    it("accepts UTF-8 bytes", () => {
      notes.write("t1", "bytes.md", new TextEncoder().encode("héllo"));
      expect(notes.read("t1", "bytes.md")).toBe("héllo");
    });

    it("keeps tenants apart", () => {
      notes.write("t1", "x.md", "A");

      expect(thrownKind(() => notes.read("t2", "x.md"))).toBe("NotFound");
      expect(fs.existsSync(path.join(tempDir, "t2", "x.md"))).toBe(false);
    });

    it("reports a missing note as NotFound", () => {
      expect(thrownKind(() => notes.read("t1", "missing.md"))).toBe("NotFound");
    });

    it("reports a directory as NotFound", () => {
      fs.mkdirSync(path.join(root, "folder.md"));
      expect(thrownKind(() => notes.read("t1", "folder.md"))).toBe("NotFound");
    });

    it("rejects paths that are not valid Unicode before touching the disk", () => {
      expect(thrownKind(() => notes.write("t1", "\uD800x.md", "hi"))).toBe("PathTraversal");
      expect(thrownKind(() => notes.write("t1", "dir/\uDBFFx", "hi"))).toBe("PathTraversal");
      expect(fs.readdirSync(root)).toEqual([]);
    });

    it("does not write through a symlink", () => {
      const outside = path.join(tempDir, "outside.md");
      fs.writeFileSync(outside, "original");
      fs.symlinkSync(outside, path.join(root, "x.md"));

      expect(thrownKind(() => notes.write("t1", "x.md", "replaced"))).toBe("AlreadyExists");
      expect(thrownKind(() => notes.write("t1", "x.md", "replaced", { strict: true }))).toBe("AlreadyExists");
      expect(fs.readFileSync(outside, "utf-8")).toBe("original");
    });

    it("does not write over a directory", () => {
      fs.mkdirSync(path.join(root, "folder.md"));
      expect(thrownKind(() => notes.write("t1", "folder", "x"))).toBe("AlreadyExists");
    });

    it("wraps filesystem failures as StorageFailure", () => {
      notes.write("t1", "a.md", "file, not a directory");

      let caught: unknown;
      try {
        notes.write("t1", "a.md/child.md", "x");
      } catch (error) {
        caught = error;
      }
      expect(isStoreError(caught, "StorageFailure")).toBe(true);
      expect(isStoreError(caught) && caught.cause).toBeInstanceOf(Error);
    });
  });

  describe("content validation", () => {
    it("rejects bytes that are not UTF-8", () => {
      expect(thrownKind(() => notes.write("t1", "bin.md", new Uint8Array([0xff, 0xfe, 0x00])))).toBe("InvalidContent");
      expect(fs.existsSync(path.join(root, "bin.md"))).toBe(false);
    });

    it("rejects text with NUL characters", () => {
      expect(thrownKind(() => notes.write("t1", "nul.md", "a\0b"))).toBe("InvalidContent");
    });

    it("rejects lone surrogates", () => {
      expect(thrownKind(() => decodeNoteContent("bad \uD800 text"))).toBe("InvalidContent");
      expect(decodeNoteContent("fine 😀 text")).toBe("fine 😀 text");
    });

    it("enforces the size limit", () => {
      const registry = createTenantRegistry({ notesDir: tempDir, tenants: ["t1"] });
      const small = createNoteStore(createPathResolver(registry), { maxBytes: 4 });

      expect(small.write("t1", "ok.md", "1234").bytes).toBe(4);
      expect(thrownKind(() => small.write("t1", "big.md", "12345"))).toBe("InvalidContent");
    });
  });

  describe("delete", () => {
    it("succeeds once, then reports NotFound", () => {
      notes.write("t1", "x.md", "A");

      expect(() => notes.delete("t1", "x.md")).not.toThrow();
      expect(thrownKind(() => notes.delete("t1", "x.md"))).toBe("NotFound");
    });

    it("removes directories left empty, up to but not including the tenant root", () => {
      notes.write("t1", "a/b.md", "x");
      notes.delete("t1", "a/b.md");

      expect(fs.existsSync(path.join(root, "a"))).toBe(false);
      expect(fs.existsSync(root)).toBe(true);
    });

    it("removes a chain of empty directories", () => {
      notes.write("t1", "a/b/c/d.md", "x");
      notes.delete("t1", "a/b/c/d.md");

      expect(fs.existsSync(path.join(root, "a"))).toBe(false);
      expect(fs.readdirSync(root)).toEqual([]);
    });

    it("keeps a directory that still has entries", () => {
      notes.write("t1", "a/b.md", "x");
      notes.write("t1", "a/c.md", "y");
      notes.delete("t1", "a/b.md");

      expect(fs.existsSync(path.join(root, "a"))).toBe(true);
      expect(notes.read("t1", "a/c.md")).toBe("y");
    });

    it("stops cleaning at the first directory that is not empty", () => {
      notes.write("t1", "a/keep.md", "x");
      notes.write("t1", "a/b/gone.md", "y");
      notes.delete("t1", "a/b/gone.md");

      expect(fs.existsSync(path.join(root, "a", "b"))).toBe(false);
      expect(fs.existsSync(path.join(root, "a", "keep.md"))).toBe(true);
    });

    it("does not fail when a concurrent writer refills the directory", () => {
      notes.write("t1", "a/b.md", "x");
      const rmdir = vi.spyOn(fs, "rmdirSync").mockImplementation(() => {
        throw Object.assign(new Error("directory not empty"), { code: "ENOTEMPTY" });
      });

      expect(() => notes.delete("t1", "a/b.md")).not.toThrow();
      expect(rmdir).toHaveBeenCalledTimes(1);
      expect(fs.existsSync(path.join(root, "a"))).toBe(true);
      expect(fs.existsSync(path.join(root, "a", "b.md"))).toBe(false);
    });

    it("refuses to delete a directory", () => {
      fs.mkdirSync(path.join(root, "dir.md"));
      expect(thrownKind(() => notes.delete("t1", "dir.md"))).toBe("NotFound");
      expect(fs.existsSync(path.join(root, "dir.md"))).toBe(true);
    });
  });

  describe("list", () => {
    beforeEach(() => {
      notes.write("t1", "b.md", "b");
      notes.write("t1", "a.md", "a");
      notes.write("t1", "sub/x.md", "x");
      fs.writeFileSync(path.join(root, "photo.png"), "not a note");
      fs.writeFileSync(path.join(root, ".hidden.md"), "hidden");
      fs.mkdirSync(path.join(root, ".git"));
    });

    it("returns directories first, then notes, each by name", () => {
      expect(notes.list("t1", "")).toEqual([
        { name: "sub", path: "sub", kind: "directory" },
        { name: "a.md", path: "a.md", kind: "note" },
        { name: "b.md", path: "b.md", kind: "note" },
      ]);
    });

    it("lists a subdirectory without recursing", () => {
      expect(notes.list("t1", "sub")).toEqual([{ name: "x.md", path: "sub/x.md", kind: "note" }]);
    });

    it("reports a missing directory as NotFound", () => {
      expect(thrownKind(() => notes.list("t1", "nope"))).toBe("NotFound");
      expect(thrownKind(() => notes.list("t1", "a.md"))).toBe("NotFound");
    });

    it("rejects traversal", () => {
      expect(thrownKind(() => notes.list("t1", ".."))).toBe("PathTraversal");
    });
  });

  describe("rename", () => {
    it("renames within the same directory", () => {
      notes.write("t1", "dir/old.md", "content");
      const result = notes.rename("t1", "dir/old", "new");

      expect(result).toEqual({ uri: "note:///dir/new.md", path: "dir/new.md", previousPath: "dir/old.md" });
      expect(notes.read("t1", "dir/new.md")).toBe("content");
      expect(thrownKind(() => notes.read("t1", "dir/old.md"))).toBe("NotFound");
    });

    it("ignores directory parts of the new name", () => {
      notes.write("t1", "dir/old.md", "content");
      expect(notes.rename("t1", "dir/old.md", "../../evil.md").path).toBe("dir/evil.md");
    });

    it("refuses to replace an existing note", () => {
      notes.write("t1", "a.md", "a");
      notes.write("t1", "b.md", "b");

      expect(thrownKind(() => notes.rename("t1", "a.md", "b.md"))).toBe("AlreadyExists");
      expect(notes.read("t1", "b.md")).toBe("b");
    });

    it("refuses a target created after the source was checked", () => {
      notes.write("t1", "a.md", "a");
      vi.spyOn(fs, "linkSync").mockImplementationOnce(() => {
        throw Object.assign(new Error("file already exists"), { code: "EEXIST" });
      });

      expect(thrownKind(() => notes.rename("t1", "a.md", "b.md"))).toBe("AlreadyExists");
      expect(notes.read("t1", "a.md")).toBe("a");
    });

    it("does not replace a symlink at the target", () => {
      const outside = path.join(tempDir, "outside.md");
      fs.writeFileSync(outside, "original");
      fs.symlinkSync(outside, path.join(root, "b.md"));
      notes.write("t1", "a.md", "a");

      expect(thrownKind(() => notes.rename("t1", "a.md", "b.md"))).toBe("AlreadyExists");
      expect(fs.readFileSync(outside, "utf-8")).toBe("original");
      expect(notes.read("t1", "a.md")).toBe("a");
    });

    it("reports a missing source as NotFound", () => {
      expect(thrownKind(() => notes.rename("t1", "ghost.md", "new.md"))).toBe("NotFound");
    });

    it("rejects empty names", () => {
      notes.write("t1", "a.md", "a");
      expect(thrownKind(() => notes.rename("t1", "a.md", ".."))).toBe("PathTraversal");
    });
  });

  describe("tree", () => {
    it("nests notes under their directories with mtimes", () => {
      notes.write("t1", "b.md", "b");
      notes.write("t1", "a/x.md", "x");
      fs.writeFileSync(path.join(root, "a", "skip.png"), "image");

      const tree = notes.tree("t1");
      const xMtime = fs.statSync(path.join(root, "a", "x.md")).mtimeMs;
      const bMtime = fs.statSync(path.join(root, "b.md")).mtimeMs;

      expect(tree).toEqual([
        {
          name: "a",
          path: "a",
          type: "directory",
          mtime: xMtime,
          children: [{ name: "x.md", path: "a/x.md", type: "note", mtime: xMtime }],
        },
        { name: "b.md", path: "b.md", type: "note", mtime: bMtime },
      ]);
    });

    it("gives empty directories an mtime of 0", () => {
      fs.mkdirSync(path.join(root, "empty"));
      expect(notes.tree("t1")).toEqual([{ name: "empty", path: "empty", type: "directory", mtime: 0, children: [] }]);
    });
  });

  describe("stat", () => {
    it("returns size, mtime and the identifier", () => {
      notes.write("t1", "s.md", "12345");
      const stat = notes.stat("t1", "s");

      expect(stat.path).toBe("s.md");
      expect(stat.uri).toBe("note:///s.md");
      expect(stat.size).toBe(5);
      expect(stat.mtime).toBe(fs.statSync(path.join(root, "s.md")).mtimeMs);
    });
  });

  describe("guards run before any filesystem access", () => {
    const fsFunctions = [
      "existsSync",
      "lstatSync",
      "statSync",
      "readdirSync",
      "readFileSync",
      "writeFileSync",
      "mkdirSync",
      "unlinkSync",
      "renameSync",
      "linkSync",
      "rmdirSync",
    ] as const;

    function spyOnFs() {
      return fsFunctions.map((name) => vi.spyOn(fs, name));
    }

    const operations: Array<[string, (store: NoteStore, tenant: string, p: string) => unknown]> = [
      ["write", (store, tenant, p) => store.write(tenant, p, "x")],
      ["read", (store, tenant, p) => store.read(tenant, p)],
      ["stat", (store, tenant, p) => store.stat(tenant, p)],
      ["delete", (store, tenant, p) => store.delete(tenant, p)],
      ["list", (store, tenant, p) => store.list(tenant, p)],
      ["rename", (store, tenant, p) => store.rename(tenant, p, "other.md")],
      ["tree", (store, tenant) => store.tree(tenant)],
    ];

    it.each(operations)("%s fails with UnknownTenant for unconfigured tenants", (_name, op) => {
      const spies = spyOnFs();

      expect(thrownKind(() => op(notes, "intruder", "x.md"))).toBe("UnknownTenant");
      for (const spy of spies) {
        expect(spy).not.toHaveBeenCalled();
      }
    });

    it.each(operations.filter(([name]) => name !== "tree"))(
      "%s fails with PathTraversal for escaping paths",
      (_name, op) => {
        const spies = spyOnFs();

        expect(thrownKind(() => op(notes, "t1", "a/../../t2/x.md"))).toBe("PathTraversal");
        for (const spy of spies) {
          expect(spy).not.toHaveBeenCalled();
        }
      },
    );
  });
});
