/**
 * Path resolver: (tenant, logical path) → absolute path inside the tenant root.
 *
 * Every filesystem path the stores touch is produced here. Resolution is pure
 * string work: nothing is created, opened or stat'ed, and symlinks are never
 * followed while normalizing.
 *
 * Two independent checks guard the tenant root:
 *   1. syntactic: empty, absolute, `..`, NUL, backslash and lone
 *      surrogates are rejected before anything else happens;
 *   2. containment: the joined absolute path must sit under the root.
 */

import path from "node:path";
import { StoreError } from "./errors.js";
import type { TenantRegistry } from "./tenants.js";

export interface ResolvedPath {
  tenantId: string;
  /** Normalized logical path ("" for the tenant root). */
  logicalPath: string;
  absolutePath: string;
}

export interface PathResolver {
  /** Absolute path of a file-like entry. The logical path must name something below the root. */
  resolve(tenantId: string, logicalPath: string): string;

  /** Like resolve, but also returns the normalized logical path. */
  locate(tenantId: string, logicalPath: string): ResolvedPath;

  /** Like locate, but "" and "." name the tenant root itself. */
  locateDirectory(tenantId: string, logicalPath: string): ResolvedPath;

  readonly registry: TenantRegistry;
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** True when the string has half a surrogate pair, i.e. no UTF-8 encoding. */
export function hasLoneSurrogate(text: string): boolean {
  return LONE_SURROGATE.test(text);
}

function reject(logicalPath: string, reason: string): never {
  throw new StoreError("PathTraversal", `Invalid path "${logicalPath}": ${reason}`);
}

function escapeSurrogates(text: string): string {
  return text.replace(/[\uD800-\uDFFF]/g, (unit) => `\\u${unit.charCodeAt(0).toString(16).toUpperCase()}`);
}

function normalize(logicalPath: string, allowRoot: boolean): string {
  if (logicalPath.includes("\0")) reject(logicalPath.replace(/\0/g, "\\0"), "contains a NUL byte");
  if (hasLoneSurrogate(logicalPath)) reject(escapeSurrogates(logicalPath), "is not valid Unicode text");
  if (logicalPath.includes("\\")) reject(logicalPath, "backslashes are not allowed");
  if (logicalPath.startsWith("/")) reject(logicalPath, "absolute paths are not allowed");
  if (logicalPath.length === 0 && !allowRoot) reject(logicalPath, "path is empty");

  const segments = logicalPath.split("/");
  if (segments.includes("..")) reject(logicalPath, "path traversal is not allowed");

  const normalized = segments.filter((s) => s !== "" && s !== ".").join("/");
  if (normalized.length === 0 && !allowRoot) reject(logicalPath, "path names no entry");
  return normalized;
}

/**
 * Syntactic validation shared with the identifier codec. Returns the
 * normalized path (`.` and empty segments collapsed). Throws PathTraversal.
 */
export function validateLogicalPath(logicalPath: string): string {
  return normalize(logicalPath, false);
}

export function createPathResolver(registry: TenantRegistry): PathResolver {
  function locateWith(tenantId: string, logicalPath: string, allowRoot: boolean): ResolvedPath {
    // Tenant first: an unknown tenant is reported as such whatever the path.
    const root = registry.resolveTenantRoot(tenantId);
    const normalized = normalize(logicalPath, allowRoot);

    const absolutePath = normalized ? path.join(root, normalized) : root;
    const contained = absolutePath.startsWith(root + path.sep) || (allowRoot && absolutePath === root);
    if (!contained) {
      reject(logicalPath, "resolves outside the tenant root");
    }

    return { tenantId, logicalPath: normalized, absolutePath };
  }

  return {
    registry,

    resolve(tenantId: string, logicalPath: string): string {
      return locateWith(tenantId, logicalPath, false).absolutePath;
    },

    locate(tenantId: string, logicalPath: string): ResolvedPath {
      return locateWith(tenantId, logicalPath, false);
    },

    locateDirectory(tenantId: string, logicalPath: string): ResolvedPath {
      return locateWith(tenantId, logicalPath, true);
    },
  };
}
