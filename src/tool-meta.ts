import type { Tool } from "@modelcontextprotocol/sdk/types.js";

import {
  type McpUiToolMeta,
  McpUiToolMetaSchema,
  RESOURCE_URI_META_KEY,
} from "./types.js";

/**
 * Read the UI metadata of a tool.
 *
 * Accepts both `_meta.ui.resourceUri` and the legacy `_meta["ui/resourceUri"]`
 * key; the nested form wins when both are present. A malformed `_meta.ui`
 * yields an empty record.
 */
export function getToolUiMeta(tool: Pick<Tool, "_meta">): McpUiToolMeta {
  const parsed = McpUiToolMetaSchema.safeParse(tool._meta?.ui);
  const meta: McpUiToolMeta = parsed.success ? { ...parsed.data } : {};
  const legacy = tool._meta?.[RESOURCE_URI_META_KEY];
  if (meta.resourceUri === undefined && typeof legacy === "string") {
    meta.resourceUri = legacy;
  }
  return meta;
}

/**
 * Get the `ui://` resource linked to a tool.
 *
 * @returns The URI, or `undefined` when the tool has no view
 * @throws {Error} When a URI is declared but does not use the `ui://` scheme
 *
 * @example
 * ```typescript
 * const uri = getToolUiResourceUri(tool);
 * if (uri) {
 *   const resource = await host.readUiResource(serverId, uri);
 * }
 * ```
 */
export function getToolUiResourceUri(
  tool: Pick<Tool, "_meta">,
): string | undefined {
  const uri = getToolUiMeta(tool).resourceUri;
  if (uri === undefined) {
    return undefined;
  }
  if (!uri.startsWith("ui://")) {
    throw new Error(`Invalid UI resource URI: ${JSON.stringify(uri)}`);
  }
  return uri;
}

/**
 * Build a tool `_meta` object that older and newer peers both understand.
 *
 * Copies `ui.resourceUri` to the legacy key and the legacy key to
 * `ui.resourceUri`, keeping every other entry.
 *
 * @example
 * ```typescript
 * server.registerTool("get-weather", {
 *   description: "Current weather",
 *   _meta: normalizeToolMeta({ ui: { resourceUri: "ui://weather/view.html" } }),
 * }, handler);
 * ```
 */
export function normalizeToolMeta(
  meta: Record<string, unknown>,
): Record<string, unknown> {
  const uiMeta = getToolUiMeta({ _meta: meta });
  if (uiMeta.resourceUri === undefined) {
    return { ...meta };
  }
  return {
    ...meta,
    ui: { ...uiMeta },
    [RESOURCE_URI_META_KEY]: uiMeta.resourceUri,
  };
}
