/**
 * Asset tools: upload, read, delete and list images (JPEG, PNG, GIF).
 *
 * Image bytes travel base64-encoded in tool input. asset_read answers with
 * image content so the caller gets the picture, not a text dump.
 */

import type { AgentTool, AgentToolResult } from "@mariozechner/pi-agent-core";
import type { Static } from "@sinclair/typebox";
import { Type } from "@sinclair/typebox";
import type { AssetStore } from "../store/assets.js";
import { ASSET_EXTENSIONS } from "../store/media-types.js";
import { StoreError } from "../store/errors.js";
import { encodeIdentifier } from "../store/identifiers.js";
import { stripLeadingSlashes } from "./notes.js";
import { toolError, toolSuccess } from "./result.js";

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const uploadSchema = Type.Object({
  path: Type.String({
    description: `Image path including the extension (${ASSET_EXTENSIONS.join(", ")}), e.g. 'images/diagram.png'`,
  }),
  content: Type.String({ description: "Image bytes, base64-encoded" }),
  strict: Type.Optional(Type.Boolean({ description: "Fail instead of overwriting an existing image" })),
});

const pathSchema = Type.Object({
  path: Type.String({ description: "Image path, e.g. 'images/diagram.png'" }),
});

const listSchema = Type.Object({
  directory: Type.Optional(Type.String({ description: "Directory to list; empty or omitted for the root" })),
});

type UploadInput = Static<typeof uploadSchema>;
type PathInput = Static<typeof pathSchema>;
type ListInput = Static<typeof listSchema>;

/**
 * Strict base64 decoding. Buffer.from silently skips bad characters, which
 * would turn a typo into a corrupt image.
 */
export function decodeBase64(content: string): Buffer {
  const compact = content.replace(/\s+/g, "");
  if (!BASE64.test(compact)) {
    throw new StoreError("InvalidContent", "Image content is not valid base64");
  }
  return Buffer.from(compact, "base64");
}

export function createAssetTools(assets: AssetStore, tenantId: string): AgentTool<any>[] {
  const uploadTool: AgentTool<typeof uploadSchema> = {
    name: "asset_upload",
    label: "asset_upload",
    description:
      "Upload an image next to the notes. The file type is checked against the image bytes; " +
      `only ${ASSET_EXTENSIONS.join(", ")} are accepted. Missing directories are created. ` +
      "Returns the image's resource URI, which notes can reference.",
    parameters: uploadSchema,
    async execute(
      _toolCallId: string,
      { path, content, strict }: UploadInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const data = decodeBase64(content);
        const result = assets.write(tenantId, stripLeadingSlashes(path), data, { strict: strict ?? false });
        return toolSuccess({ ...result });
      } catch (error) {
        return toolError(error, "Failed to upload image");
      }
    },
  };

  const readTool: AgentTool<typeof pathSchema> = {
    name: "asset_read",
    label: "asset_read",
    description: "Read an image. Returns the image itself together with its detected type.",
    parameters: pathSchema,
    async execute(
      _toolCallId: string,
      { path }: PathInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const asset = assets.read(tenantId, stripLeadingSlashes(path));
        const details = {
          path: asset.path,
          uri: asset.uri,
          kind: asset.kind,
          mimeType: asset.mimeType,
          bytes: asset.data.byteLength,
        };
        return {
          content: [
            { type: "text", text: JSON.stringify(details, null, 2) },
            { type: "image", data: asset.data.toString("base64"), mimeType: asset.mimeType },
          ],
          details,
        };
      } catch (error) {
        return toolError(error, "Failed to read image");
      }
    },
  };

  const deleteTool: AgentTool<typeof pathSchema> = {
    name: "asset_delete",
    label: "asset_delete",
    description: "Delete an image. Directories left empty by the delete are removed as well.",
    parameters: pathSchema,
    async execute(
      _toolCallId: string,
      { path }: PathInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const assetPath = stripLeadingSlashes(path);
        assets.delete(tenantId, assetPath);
        return toolSuccess({ deleted: true, path: assetPath });
      } catch (error) {
        return toolError(error, "Failed to delete image");
      }
    },
  };

  const listTool: AgentTool<typeof listSchema> = {
    name: "asset_list",
    label: "asset_list",
    description: "List the images and subdirectories directly inside a directory (not recursive).",
    parameters: listSchema,
    async execute(
      _toolCallId: string,
      { directory }: ListInput,
    ): Promise<AgentToolResult<unknown>> {
      try {
        const dir = stripLeadingSlashes(directory ?? "");
        const entries = assets.list(tenantId, dir).map((entry) =>
          entry.kind === "asset" ? { ...entry, uri: encodeIdentifier("img", tenantId, entry.path) } : entry,
        );
        return toolSuccess({ directory: dir, entries });
      } catch (error) {
        return toolError(error, "Failed to list images");
      }
    },
  };

  return [uploadTool, readTool, deleteTool, listTool];
}
