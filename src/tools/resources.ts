/**
 * Resource tools: enumerate a tenant's notes as URIs and read any
 * `note:///` or `img:///` URI back.
 */

import type { AgentTool, AgentToolResult } from "@mariozechner/pi-agent-core";
import type { Static } from "@sinclair/typebox";
import { Type } from "@sinclair/typebox";
import { listNoteResources, readResource } from "../resources.js";
import type { Stores } from "../stores.js";
import { toolError, toolSuccess } from "./result.js";

const listSchema = Type.Object({});

const readSchema = Type.Object({
  uri: Type.String({ description: "Resource URI, e.g. 'note:///projects/plan.md' or 'img:///images/a.png'" }),
});

type ReadInput = Static<typeof readSchema>;

export function createResourceTools(stores: Pick<Stores, "notes" | "assets">, tenantId: string): AgentTool<any>[] {
  const listTool: AgentTool<typeof listSchema> = {
    name: "resource_list",
    label: "resource_list",
    description: "List every note as a resource link (URI, name, MIME type), across all directories.",
    parameters: listSchema,
    async execute(): Promise<AgentToolResult<unknown>> {
      try {
        return toolSuccess({ resources: listNoteResources(stores.notes, tenantId) });
      } catch (error) {
        return toolError(error, "Failed to list resources");
      }
    },
  };

  const readTool: AgentTool<typeof readSchema> = {
    name: "resource_read",
    label: "resource_read",
    description: "Read a note or image by its resource URI, as returned by the other note and image tools.",
    parameters: readSchema,
    async execute(
      _toolCallId: string,
      { uri }: ReadInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const resource = readResource(stores, tenantId, uri);
        if ("text" in resource) {
          return toolSuccess({ ...resource });
        }
        return {
          content: [{ type: "image", data: resource.blob, mimeType: resource.mimeType }],
          details: { uri: resource.uri, mimeType: resource.mimeType },
        };
      } catch (error) {
        return toolError(error, "Failed to read resource");
      }
    },
  };

  return [listTool, readTool];
}
