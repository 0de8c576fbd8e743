/**
 * Tenant registry: the fixed allow-list of tenants and their root directories.
 *
 * Built once at startup from configuration and never mutated afterwards.
 * Each tenant owns `<notesDir>/<tenantId>`.
 */

import path from "node:path";
import { StoreError } from "./errors.js";

export interface TenantRegistryOptions {
  /** Base notes directory. Resolved to an absolute path. */
  notesDir: string;
  tenants: readonly string[];
}

export interface TenantRegistry {
  /** Absolute, normalized base directory holding every tenant root. */
  readonly baseDir: string;

  /** Root directory of a tenant. Throws UnknownTenant for ids not in the allow-list. */
  resolveTenantRoot(tenantId: string): string;

  has(tenantId: string): boolean;

  tenantIds(): readonly string[];
}

/**
 * Why a tenant id can't be used as a directory name, or null if it can.
 */
export function tenantIdProblem(tenantId: string): string | null {
  if (tenantId.length === 0) return "tenant id is empty";
  if (tenantId === "." || tenantId === "..") return `tenant id "${tenantId}" is reserved`;
  if (/[/\\\0]/.test(tenantId)) return `tenant id "${tenantId}" contains a path separator or NUL`;
  return null;
}

export function createTenantRegistry(options: TenantRegistryOptions): TenantRegistry {
  if (options.tenants.length === 0) {
    throw new Error("At least one tenant must be configured");
  }

  const baseDir = path.resolve(options.notesDir);
  const roots = new Map<string, string>();

  for (const tenantId of options.tenants) {
    const problem = tenantIdProblem(tenantId);
    if (problem) {
      throw new Error(`Invalid tenant configuration: ${problem}`);
    }
    if (roots.has(tenantId)) {
      throw new Error(`Invalid tenant configuration: tenant id "${tenantId}" is listed twice`);
    }
    roots.set(tenantId, path.join(baseDir, tenantId));
  }

  const ids = Object.freeze([...roots.keys()]);

  return Object.freeze({
    baseDir,

    resolveTenantRoot(tenantId: string): string {
      const root = roots.get(tenantId);
      if (root === undefined) {
        throw new StoreError("UnknownTenant", `Unknown tenant: ${tenantId}`);
      }
      return root;
    },

    has(tenantId: string): boolean {
      return roots.has(tenantId);
    },

    tenantIds(): readonly string[] {
      return ids;
    },
  });
}
