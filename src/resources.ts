/**
 * Resource view of a tenant's notes: enumeration as resource links and
 * reading by identifier (`note:///...`, `img:///...`).
 */

import { decodeIdentifier, encodeIdentifier, mimeTypeFor } from "./store/identifiers.js";
import { NOTE_EXTENSION, type NoteStore, type NoteTreeNode } from "./store/notes.js";
import type { AssetStore } from "./store/assets.js";

export interface ResourceLink {
  uri: string;
  /** Note path without the `.md` extension. */
  name: string;
  description: string;
  mimeType: string;
}

export type ResourceContents =
  | { uri: string; mimeType: string; text: string }
  | { uri: string; mimeType: string; blob: string };

function collectNotes(nodes: NoteTreeNode[], tenantId: string, out: ResourceLink[]): void {
  for (const node of nodes) {
    if (node.type === "directory") {
      collectNotes(node.children ?? [], tenantId, out);
      continue;
    }
    const name = node.path.slice(0, -NOTE_EXTENSION.length);
    out.push({
      uri: encodeIdentifier("note", tenantId, node.path),
      name,
      description: `Markdown note: ${name}`,
      mimeType: mimeTypeFor("note", node.path),
    });
  }
}

/**
 * Every note of a tenant, depth first, directories before the notes beside them.
 */
export function listNoteResources(notes: NoteStore, tenantId: string): ResourceLink[] {
  const links: ResourceLink[] = [];
  collectNotes(notes.tree(tenantId), tenantId, links);
  return links;
}

export function readResource(
  stores: { notes: NoteStore; assets: AssetStore },
  tenantId: string,
  uri: string,
): ResourceContents {
  const { kind, logicalPath } = decodeIdentifier(uri);

  if (kind === "note") {
    return { uri, mimeType: mimeTypeFor(kind, logicalPath), text: stores.notes.read(tenantId, logicalPath) };
  }

  const asset = stores.assets.read(tenantId, logicalPath);
  return { uri, mimeType: asset.mimeType, blob: asset.data.toString("base64") };
}
