/**
 * Note tools: create/update, read, delete, list, rename and tree.
 *
 * Bound to one tenant when created; the tenant never comes from tool input.
 * Paths are relative to the tenant's notes root. Leading slashes are dropped
 * and `.md` is appended when missing.
 */

import type { AgentTool, AgentToolResult } from "@mariozechner/pi-agent-core";
import type { Static } from "@sinclair/typebox";
import { Type } from "@sinclair/typebox";
import { encodeIdentifier } from "../store/identifiers.js";
import type { NoteStore } from "../store/notes.js";
import { toolError, toolSuccess } from "./result.js";

const PATH_RULES =
  "Subdirectories are separated by '/' (e.g. 'projects/meeting-notes'); the '.md' extension is added " +
  "if missing; leading slashes are ignored; '..' is not allowed.";

const writeSchema = Type.Object({
  path: Type.String({ description: "Note path, e.g. 'projects/meeting-notes'" }),
  content: Type.String({ description: "Markdown content of the note" }),
  strict: Type.Optional(Type.Boolean({ description: "Fail instead of overwriting an existing note" })),
});

const pathSchema = Type.Object({
  path: Type.String({ description: "Note path, e.g. 'projects/meeting-notes'" }),
});

const listSchema = Type.Object({
  directory: Type.Optional(Type.String({ description: "Directory to list; empty or omitted for the root" })),
  directories: Type.Optional(Type.Boolean({ description: "Include subdirectories in the listing" })),
});

const renameSchema = Type.Object({
  path: Type.String({ description: "Current note path" }),
  new_name: Type.String({ description: "New file name; the note stays in its directory" }),
});

const treeSchema = Type.Object({});

type WriteInput = Static<typeof writeSchema>;
type PathInput = Static<typeof pathSchema>;
type ListInput = Static<typeof listSchema>;
type RenameInput = Static<typeof renameSchema>;

export function stripLeadingSlashes(logicalPath: string): string {
  return logicalPath.replace(/^\/+/, "");
}

export function createNoteTools(notes: NoteStore, tenantId: string): AgentTool<any>[] {
  const writeTool: AgentTool<typeof writeSchema> = {
    name: "note_write",
    label: "note_write",
    description:
      "Create a Markdown note or replace an existing one with the given content. " +
      `${PATH_RULES} Missing directories are created. Returns the note's resource URI.`,
    parameters: writeSchema,
    async execute(
      _toolCallId: string,
      { path, content, strict }: WriteInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const result = notes.write(tenantId, stripLeadingSlashes(path), content, { strict: strict ?? false });
        return toolSuccess({ ...result });
      } catch (error) {
        return toolError(error, "Failed to write note");
      }
    },
  };

  const readTool: AgentTool<typeof pathSchema> = {
    name: "note_read",
    label: "note_read",
    description: `Read the full Markdown content of a note. ${PATH_RULES} Use note_list to find notes.`,
    parameters: pathSchema,
    async execute(
      _toolCallId: string,
      { path }: PathInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const stat = notes.stat(tenantId, stripLeadingSlashes(path));
        const content = notes.read(tenantId, stat.path);
        return toolSuccess({ path: stat.path, uri: stat.uri, mtime: stat.mtime, content });
      } catch (error) {
        return toolError(error, "Failed to read note");
      }
    },
  };

  const deleteTool: AgentTool<typeof pathSchema> = {
    name: "note_delete",
    label: "note_delete",
    description:
      `Delete a note. ${PATH_RULES} Directories left empty by the delete are removed as well.`,
    parameters: pathSchema,
    async execute(
      _toolCallId: string,
      { path }: PathInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const notePath = stripLeadingSlashes(path);
        notes.delete(tenantId, notePath);
        return toolSuccess({ deleted: true, path: notePath });
      } catch (error) {
        return toolError(error, "Failed to delete note");
      }
    },
  };

  const listTool: AgentTool<typeof listSchema> = {
    name: "note_list",
    label: "note_list",
    description:
      "List the notes directly inside a directory (not recursive). Hidden entries are skipped. " +
      "Set directories to true to include subdirectories, then list those to walk deeper.",
    parameters: listSchema,
    async execute(
      _toolCallId: string,
      { directory, directories }: ListInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const dir = stripLeadingSlashes(directory ?? "");
        const entries = notes
          .list(tenantId, dir)
          .filter((entry) => directories || entry.kind !== "directory")
          .map((entry) =>
            entry.kind === "note"
              ? { ...entry, uri: encodeIdentifier("note", tenantId, entry.path) }
              : entry,
          );
        return toolSuccess({ directory: dir, entries });
      } catch (error) {
        return toolError(error, "Failed to list notes");
      }
    },
  };

  const renameTool: AgentTool<typeof renameSchema> = {
    name: "note_rename",
    label: "note_rename",
    description:
      "Rename a note within its directory. new_name is a file name only; any directory part is ignored. " +
      "Fails if a note with the new name already exists.",
    parameters: renameSchema,
    async execute(
      _toolCallId: string,
      { path, new_name }: RenameInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const result = notes.rename(tenantId, stripLeadingSlashes(path), new_name);
        return toolSuccess({ ...result });
      } catch (error) {
        return toolError(error, "Failed to rename note");
      }
    },
  };

  const treeTool: AgentTool<typeof treeSchema> = {
    name: "note_tree",
    label: "note_tree",
    description: "Return the whole directory tree of notes with modification times.",
    parameters: treeSchema,
    async execute(): Promise<AgentToolResult<unknown>> {
      try {
        return toolSuccess({ tree: notes.tree(tenantId) });
      } catch (error) {
        return toolError(error, "Failed to build note tree");
      }
    },
  };

  return [writeTool, readTool, deleteTool, listTool, renameTool, treeTool];
}
