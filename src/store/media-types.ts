/**
 * Image kinds the asset store accepts, keyed by file extension.
 */

import path from "node:path";

export type AssetKind = "jpeg" | "png" | "gif";

const EXTENSION_KINDS: Record<string, AssetKind> = {
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".png": "png",
  ".gif": "gif",
};

export const ASSET_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_KINDS);

const MIME_TYPES: Record<AssetKind, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
};

/** Content kind implied by the file extension (case-insensitive), or null. */
export function assetKindForPath(logicalPath: string): AssetKind | null {
  const ext = path.posix.extname(logicalPath).toLowerCase();
  return EXTENSION_KINDS[ext] ?? null;
}

export function mimeTypeForAsset(kind: AssetKind): string {
  return MIME_TYPES[kind];
}
