import type { Tool } from "@modelcontextprotocol/sdk/types.js";

import { type McpUiToolVisibility, McpUiToolVisibilitySchema } from "./types.js";

/** Visibility applied when a tool does not declare one. */
export const DEFAULT_TOOL_VISIBILITY: readonly McpUiToolVisibility[] = [
  "model",
  "app",
];

/**
 * Decision of the visibility enforcer for one tool call.
 */
export type McpUiAccessDecision =
  | { allowed: true }
  | { allowed: false; reason: string };

/**
 * Declared visibility of a tool.
 *
 * The default applies only when `_meta.ui.visibility` is omitted; an empty
 * list is kept as is and grants access to nobody. The field is read on its
 * own, so other malformed `_meta.ui` entries do not affect it: unknown roles
 * are ignored, and a `visibility` that is not a list, or a `_meta.ui` that is
 * not a record, grants access to nobody.
 */
export function getToolVisibility(
  tool: Pick<Tool, "_meta">,
): readonly McpUiToolVisibility[] {
  const ui = tool._meta?.ui;
  if (ui === undefined) {
    return DEFAULT_TOOL_VISIBILITY;
  }
  if (typeof ui !== "object" || ui === null || Array.isArray(ui)) {
    return [];
  }
  if (!("visibility" in ui) || ui.visibility === undefined) {
    return DEFAULT_TOOL_VISIBILITY;
  }
  if (!Array.isArray(ui.visibility)) {
    return [];
  }
  const roles: McpUiToolVisibility[] = [];
  for (const entry of ui.visibility) {
    const role = McpUiToolVisibilitySchema.safeParse(entry);
    if (role.success && !roles.includes(role.data)) {
      roles.push(role.data);
    }
  }
  return roles;
}

export function isToolVisibleTo(
  tool: Pick<Tool, "_meta">,
  role: McpUiToolVisibility,
): boolean {
  return getToolVisibility(tool).includes(role);
}

/**
 * Keep only the tools a caller with `role` may see.
 *
 * @example Model-facing listing
 * ```typescript
 * const { tools } = await client.listTools();
 * const forModel = filterToolsForRole(tools, "model");
 * ```
 */
export function filterToolsForRole<T extends Pick<Tool, "_meta">>(
  tools: readonly T[],
  role: McpUiToolVisibility,
): T[] {
  return tools.filter((tool) => isToolVisibleTo(tool, role));
}

/**
 * Decide whether a tool call may proceed.
 *
 * A view may only call tools of the server its resource was loaded from,
 * whatever their visibility.
 *
 * @param call.caller - Who issues the call
 * @param call.name - Requested tool name, for error messages
 * @param call.tool - The tool definition, or `undefined` if the server has none by that name
 * @param call.toolServerId - Server that provides `tool`
 * @param call.viewServerId - Server the calling view was loaded from (app callers only)
 */
export function checkToolCall(call: {
  caller: McpUiToolVisibility;
  name: string;
  tool: Pick<Tool, "_meta"> | undefined;
  toolServerId?: string;
  viewServerId?: string;
}): McpUiAccessDecision {
  const { caller, name, tool } = call;
  if (!tool) {
    return { allowed: false, reason: `Unknown tool: ${name}` };
  }
  if (caller === "app" && call.viewServerId === undefined) {
    return {
      allowed: false,
      reason: `Tool ${name} called by a view with no known server`,
    };
  }
  if (caller === "app" && call.toolServerId !== call.viewServerId) {
    return {
      allowed: false,
      reason: `Tool ${name} belongs to another server than the calling view`,
    };
  }
  if (!isToolVisibleTo(tool, caller)) {
    return {
      allowed: false,
      reason: `Tool ${name} is not visible to the ${caller}`,
    };
  }
  return { allowed: true };
}
