/**
 * Tool registry. Every tool is bound to a single tenant; build one set per
 * tenant context.
 */

import type { AgentTool } from "@mariozechner/pi-agent-core";
import { StoreError } from "../store/errors.js";
import type { Stores } from "../stores.js";
import { createNoteTools } from "./notes.js";
import { createAssetTools } from "./assets.js";
import { createResourceTools } from "./resources.js";

type NotekeepTool = AgentTool<any>;

/**
 * Create all tools for one tenant. Unknown tenants are refused here, before
 * any tool exists that could touch the disk on their behalf.
 */
export function createTools(stores: Stores, tenantId: string): NotekeepTool[] {
  if (!stores.registry.has(tenantId)) {
    throw new StoreError("UnknownTenant", `Unknown tenant: ${tenantId}`);
  }

  return [
    ...createNoteTools(stores.notes, tenantId),
    ...createAssetTools(stores.assets, tenantId),
    ...createResourceTools(stores, tenantId),
  ];
}
