/**
 * Wires the tenant registry, path resolver and both stores from config.
 *
 * The registry is the only shared state and it is immutable; everything else
 * receives it explicitly.
 */

import type { Config } from "./config.js";
import { createTenantRegistry, type TenantRegistry } from "./store/tenants.js";
import { createPathResolver, type PathResolver } from "./store/paths.js";
import { createNoteStore, type NoteStore } from "./store/notes.js";
import { createAssetStore, type AssetStore } from "./store/assets.js";

export interface Stores {
  registry: TenantRegistry;
  resolver: PathResolver;
  notes: NoteStore;
  assets: AssetStore;
}

export function createStores(config: Pick<Config, "notes" | "tenants">): Stores {
  const registry = createTenantRegistry({ notesDir: config.notes.dir, tenants: config.tenants });
  const resolver = createPathResolver(registry);
  return {
    registry,
    resolver,
    notes: createNoteStore(resolver, { maxBytes: config.notes.max_note_bytes }),
    assets: createAssetStore(resolver, { maxBytes: config.notes.max_asset_bytes }),
  };
}
