export { StoreError, isStoreError, type StoreErrorKind } from "./errors.js";
export { createTenantRegistry, tenantIdProblem, type TenantRegistry, type TenantRegistryOptions } from "./tenants.js";
export { createPathResolver, validateLogicalPath, hasLoneSurrogate, type PathResolver, type ResolvedPath } from "./paths.js";
export {
  encodeIdentifier,
  decodeIdentifier,
  NOTE_MIME_TYPE,
  mimeTypeFor,
  type ResourceKind,
  type DecodedIdentifier,
} from "./identifiers.js";
export type { DirectoryEntry, EntryKind } from "./fs-utils.js";
export {
  createNoteStore,
  decodeNoteContent,
  NOTE_EXTENSION,
  type NoteStore,
  type NoteStoreOptions,
  type NoteWriteResult,
  type NoteStat,
  type NoteRenameResult,
  type NoteTreeNode,
  type WriteOptions,
} from "./notes.js";
export {
  createAssetStore,
  detectAssetKind,
  DEFAULT_MAX_ASSET_BYTES,
  type AssetStore,
  type AssetStoreOptions,
  type AssetWriteResult,
  type AssetContent,
} from "./assets.js";
export { ASSET_EXTENSIONS, assetKindForPath, mimeTypeForAsset, type AssetKind } from "./media-types.js";
