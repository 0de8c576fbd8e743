/**
 * Resource identifiers: `note:///<path>` and `img:///<path>`.
 *
 * Identifiers are tenant-relative; the tenant comes from the calling context.
 * Each path segment is percent-encoded, and decode only accepts the canonical
 * encoding, so identifier ↔ logical path is a bijection.
 */

import { StoreError } from "./errors.js";
import { assetKindForPath, mimeTypeForAsset } from "./media-types.js";
import { validateLogicalPath } from "./paths.js";

export type ResourceKind = "note" | "img";

export interface DecodedIdentifier {
  kind: ResourceKind;
  logicalPath: string;
}

const KINDS: readonly ResourceKind[] = ["note", "img"];

const SCHEMES: Record<ResourceKind, string> = {
  note: "note:///",
  img: "img:///",
};

export const NOTE_MIME_TYPE = "text/markdown";

/**
 * MIME type a resource is served with. Images go by their extension; the
 * asset store re-checks the bytes on read.
 */
export function mimeTypeFor(kind: ResourceKind, logicalPath: string): string {
  if (kind === "note") return NOTE_MIME_TYPE;

  const assetKind = assetKindForPath(logicalPath);
  if (!assetKind) {
    throw new StoreError("UnsupportedAssetType", `"${logicalPath}" is not a JPEG, PNG or GIF path`);
  }
  return mimeTypeForAsset(assetKind);
}

function encodePath(logicalPath: string): string {
  return logicalPath.split("/").map(encodeURIComponent).join("/");
}

function malformed(identifier: string, reason: string): StoreError {
  return new StoreError("MalformedIdentifier", `Malformed identifier "${identifier}": ${reason}`);
}

/**
 * Build the identifier for a logical path. The tenant id is accepted for
 * symmetry with the store calls but never embedded.
 */
export function encodeIdentifier(kind: ResourceKind, _tenantId: string, logicalPath: string): string {
  // Throws PathTraversal for paths no store would ever produce.
  return SCHEMES[kind] + encodePath(validateLogicalPath(logicalPath));
}

export function decodeIdentifier(identifier: string): DecodedIdentifier {
  const kind = KINDS.find((k) => identifier.startsWith(SCHEMES[k]));
  if (!kind) {
    throw malformed(identifier, "scheme must be note:/// or img:///");
  }

  const encoded = identifier.slice(SCHEMES[kind].length);
  let logicalPath: string;
  try {
    logicalPath = encoded.split("/").map(decodeURIComponent).join("/");
  } catch {
    throw malformed(identifier, "invalid percent-encoding");
  }

  let normalized: string;
  try {
    normalized = validateLogicalPath(logicalPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw malformed(identifier, reason);
  }
  if (normalized !== logicalPath) {
    throw malformed(identifier, "path contains empty or '.' segments");
  }

  // Rejects encoded slashes, raw `?`/`#`, redundant escapes and the like.
  if (encodePath(logicalPath) !== encoded) {
    throw malformed(identifier, "path is not canonically encoded");
  }

  return { kind, logicalPath };
}
