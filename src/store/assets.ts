/**
 * Asset store: JPEG, PNG and GIF images stored beside the notes.
 *
 * The content kind is never taken from the caller. On write the file
 * extension must be on the allow-list and the byte signature must agree with
 * it; on read the kind is detected from the stored bytes again.
 */

import fs from "node:fs";
import path from "node:path";
import { StoreError, errnoCode, storageFailure, toStoreError } from "./errors.js";
import { checkWriteTarget, listEntries, pruneEmptyParents, statFile, type DirectoryEntry } from "./fs-utils.js";
import { encodeIdentifier } from "./identifiers.js";
import type { PathResolver, ResolvedPath } from "./paths.js";
import type { WriteOptions } from "./notes.js";
import { ASSET_EXTENSIONS, assetKindForPath, mimeTypeForAsset, type AssetKind } from "./media-types.js";

export const DEFAULT_MAX_ASSET_BYTES = 10 * 1024 * 1024;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];
const GIF87A = [0x47, 0x49, 0x46, 0x38, 0x37, 0x61];
const GIF89A = [0x47, 0x49, 0x46, 0x38, 0x39, 0x61];

export interface AssetWriteResult {
  uri: string;
  path: string;
  kind: AssetKind;
  mimeType: string;
  created: boolean;
  bytes: number;
}

export interface AssetContent {
  path: string;
  uri: string;
  data: Buffer;
  kind: AssetKind;
  mimeType: string;
}

export interface AssetStore {
  write(tenantId: string, logicalPath: string, data: Uint8Array, options?: WriteOptions): AssetWriteResult;
  read(tenantId: string, logicalPath: string): AssetContent;
  delete(tenantId: string, logicalPath: string): void;
  list(tenantId: string, directoryPath: string): DirectoryEntry[];
  readonly resolver: PathResolver;
}

export interface AssetStoreOptions {
  maxBytes?: number;
}

function matchesBytes(bytes: Uint8Array, pattern: number[]): boolean {
  if (bytes.length < pattern.length) return false;
  return pattern.every((value, i) => bytes[i] === value);
}

/** Content kind from the byte signature, or null for anything else. */
export function detectAssetKind(bytes: Uint8Array): AssetKind | null {
  if (matchesBytes(bytes, PNG_SIGNATURE)) return "png";
  if (matchesBytes(bytes, JPEG_SIGNATURE)) return "jpeg";
  if (matchesBytes(bytes, GIF87A) || matchesBytes(bytes, GIF89A)) return "gif";
  return null;
}

export function createAssetStore(resolver: PathResolver, options: AssetStoreOptions = {}): AssetStore {
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_ASSET_BYTES;

  /** Locate an existing asset; paths without an image extension can't name one. */
  function locateAsset(tenantId: string, logicalPath: string): ResolvedPath & { extensionKind: AssetKind } {
    const located = resolver.locate(tenantId, logicalPath);
    const extensionKind = assetKindForPath(located.logicalPath);
    if (!extensionKind) {
      throw new StoreError("NotFound", `Asset "${located.logicalPath}" does not exist`);
    }
    return { ...located, extensionKind };
  }

  return {
    resolver,

    write(tenantId, logicalPath, data, writeOptions = {}) {
      const { logicalPath: assetPath, absolutePath } = resolver.locate(tenantId, logicalPath);

      const extensionKind = assetKindForPath(assetPath);
      if (!extensionKind) {
        throw new StoreError(
          "UnsupportedAssetType",
          `Unsupported asset extension for "${assetPath}"; expected one of ${ASSET_EXTENSIONS.join(", ")}`,
        );
      }
      const detected = detectAssetKind(data);
      if (detected !== extensionKind) {
        throw new StoreError(
          "UnsupportedAssetType",
          detected
            ? `Asset "${assetPath}" contains ${detected} data but its extension says ${extensionKind}`
            : `Asset "${assetPath}" is not a JPEG, PNG or GIF image`,
        );
      }
      if (data.byteLength > maxBytes) {
        throw new StoreError("UnsupportedAssetType", `Asset is ${data.byteLength} bytes; the limit is ${maxBytes}`);
      }

      const created = !checkWriteTarget(absolutePath, `Asset "${assetPath}"`);
      try {
        fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
        fs.writeFileSync(absolutePath, data, { flag: writeOptions.strict ? "wx" : "w" });
      } catch (error) {
        if (writeOptions.strict && errnoCode(error) === "EEXIST") {
          throw new StoreError("AlreadyExists", `Asset "${assetPath}" already exists`, error);
        }
        throw storageFailure(error, `asset "${assetPath}"`);
      }

      console.log(`${created ? "Stored" : "Replaced"} ${extensionKind} asset ${tenantId}:${assetPath}`);
      return {
        uri: encodeIdentifier("img", tenantId, assetPath),
        path: assetPath,
        kind: extensionKind,
        mimeType: mimeTypeForAsset(extensionKind),
        created,
        bytes: data.byteLength,
      };
    },

    read(tenantId, logicalPath) {
      const { logicalPath: assetPath, absolutePath, extensionKind } = locateAsset(tenantId, logicalPath);
      const label = `Asset "${assetPath}"`;
      statFile(absolutePath, label);

      let data: Buffer;
      try {
        data = fs.readFileSync(absolutePath);
      } catch (error) {
        throw toStoreError(error, label);
      }

      const kind = detectAssetKind(data) ?? extensionKind;
      return {
        path: assetPath,
        uri: encodeIdentifier("img", tenantId, assetPath),
        data,
        kind,
        mimeType: mimeTypeForAsset(kind),
      };
    },

    delete(tenantId, logicalPath) {
      const { logicalPath: assetPath, absolutePath } = locateAsset(tenantId, logicalPath);
      const label = `Asset "${assetPath}"`;
      statFile(absolutePath, label);
      try {
        fs.unlinkSync(absolutePath);
      } catch (error) {
        throw toStoreError(error, label);
      }
      console.log(`Deleted asset ${tenantId}:${assetPath}`);

      pruneEmptyParents(path.dirname(absolutePath), resolver.registry.resolveTenantRoot(tenantId));
    },

    list(tenantId, directoryPath) {
      const { logicalPath: dir, absolutePath } = resolver.locateDirectory(tenantId, directoryPath);
      const label = dir ? `Directory "${dir}"` : "Tenant root";
      return listEntries(absolutePath, dir, (name) => (assetKindForPath(name) ? "asset" : null), label);
    },
  };
}
