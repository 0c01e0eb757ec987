import {
  ALL_DISPLAY_MODES,
  LATEST_PROTOCOL_VERSION,
  type McpUiAppCapabilities,
  type McpUiDisplayMode,
  type McpUiExtensionCapability,
  McpUiExtensionCapabilitySchema,
  type McpUiHostCapabilities,
  type McpUiHostContext,
  type McpUiPermission,
  type McpUiResourceCsp,
  type McpUiResourcePermissions,
  RESOURCE_MIME_TYPE,
  UI_EXTENSION_ID,
} from "./types.js";

/**
 * Protocol versions this engine can speak, newest first.
 */
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [
  LATEST_PROTOCOL_VERSION,
  "2025-11-21",
];

/**
 * Order in which permissions appear in allow-lists and policy attributes.
 */
export const PERMISSION_ORDER: ReadonlyArray<
  readonly [keyof McpUiResourcePermissions, McpUiPermission]
> = [
  ["camera", "camera"],
  ["microphone", "microphone"],
  ["geolocation", "geolocation"],
  ["clipboardWrite", "clipboard-write"],
];

/**
 * List the permissions present in a permissions record, in {@link PERMISSION_ORDER}.
 */
export function listPermissions(
  permissions: McpUiResourcePermissions | undefined,
): McpUiPermission[] {
  if (!permissions) {
    return [];
  }
  return PERMISSION_ORDER.filter(([key]) => permissions[key] !== undefined).map(
    ([, name]) => name,
  );
}

/**
 * Inverse of {@link listPermissions}.
 */
export function permissionsFromList(
  permissions: readonly McpUiPermission[],
): McpUiResourcePermissions {
  const record: McpUiResourcePermissions = {};
  for (const [key, name] of PERMISSION_ORDER) {
    if (permissions.includes(name)) {
      record[key] = {};
    }
  }
  return record;
}

/**
 * What a host is willing to grant any view's sandbox.
 */
export interface McpUiSandboxGrant {
  readonly permissions: readonly McpUiPermission[];
  /** Approved origins per axis; `undefined` when the host approves whatever is declared */
  readonly csp: Readonly<McpUiResourceCsp> | undefined;
}

/**
 * Read the sandbox upper bound from static host capabilities.
 *
 * Without a `sandbox` declaration the host grants no permissions.
 */
export function resolveSandboxGrant(
  hostCapabilities: McpUiHostCapabilities,
): McpUiSandboxGrant {
  return Object.freeze({
    permissions: Object.freeze(
      listPermissions(hostCapabilities.sandbox?.permissions),
    ),
    csp: hostCapabilities.sandbox?.csp
      ? Object.freeze({ ...hostCapabilities.sandbox.csp })
      : undefined,
  });
}

/**
 * Capabilities agreed between a host and one view. Immutable once created.
 */
export interface McpUiNegotiatedCapabilities {
  readonly protocolVersion: string;
  /** Modes both sides support, in host order */
  readonly displayModes: readonly McpUiDisplayMode[];
  /** The view exposes tools the host can call */
  readonly appTools: boolean;
  readonly openLinks: boolean;
  readonly serverTools: boolean;
  readonly serverResources: boolean;
  readonly logging: boolean;
  readonly message: boolean;
  readonly updateModelContext: boolean;
  readonly sandbox: McpUiSandboxGrant;
}

/**
 * Pick the protocol version for a session: the app's if supported, otherwise
 * the latest.
 */
export function negotiateProtocolVersion(requested: string): string {
  return SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
    ? requested
    : LATEST_PROTOCOL_VERSION;
}

/**
 * Merge the app's declared capabilities with the host's static ones.
 *
 * Display modes are the host's modes (from `hostContext.availableDisplayModes`,
 * or every mode when the host lists none) that the app also declares; an app
 * that declares no list accepts every host mode.
 *
 * @example
 * ```typescript
 * const negotiated = negotiateCapabilities({
 *   app: { availableDisplayModes: ["inline", "fullscreen"] },
 *   host: { openLinks: {} },
 *   hostContext: { availableDisplayModes: ["inline", "pip"] },
 *   protocolVersion: LATEST_PROTOCOL_VERSION,
 * });
 * negotiated.displayModes; // ["inline"]
 * ```
 */
export function negotiateCapabilities({
  app,
  host,
  hostContext = {},
  protocolVersion,
}: {
  app: McpUiAppCapabilities;
  host: McpUiHostCapabilities;
  hostContext?: McpUiHostContext;
  protocolVersion: string;
}): McpUiNegotiatedCapabilities {
  const hostModes = hostContext.availableDisplayModes ?? ALL_DISPLAY_MODES;
  const appModes = app.availableDisplayModes;
  const displayModes = appModes
    ? hostModes.filter((mode) => appModes.includes(mode))
    : [...hostModes];

  return Object.freeze({
    protocolVersion: negotiateProtocolVersion(protocolVersion),
    displayModes: Object.freeze(displayModes),
    appTools: app.tools !== undefined,
    openLinks: host.openLinks !== undefined,
    serverTools: host.serverTools !== undefined,
    serverResources: host.serverResources !== undefined,
    logging: host.logging !== undefined,
    message: host.message !== undefined,
    updateModelContext: host.updateModelContext !== undefined,
    sandbox: resolveSandboxGrant(host),
  });
}

/**
 * Whether a display mode may be honored for the session.
 */
export function supportsDisplayMode(
  negotiated: McpUiNegotiatedCapabilities,
  mode: McpUiDisplayMode,
): boolean {
  return negotiated.displayModes.includes(mode);
}

/**
 * Read the UI extension payload from a peer's MCP capabilities.
 *
 * @returns The payload, or `undefined` when the extension is absent or malformed
 */
export function getUiExtension(
  capabilities: { experimental?: { [key: string]: object } } | undefined,
): McpUiExtensionCapability | undefined {
  const raw = capabilities?.experimental?.[UI_EXTENSION_ID];
  if (raw === undefined) {
    return undefined;
  }
  const parsed = McpUiExtensionCapabilitySchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Whether a peer advertises the UI extension with MCP App HTML support.
 */
export function isUiExtensionActive(
  capabilities: { experimental?: { [key: string]: object } } | undefined,
): boolean {
  return (
    getUiExtension(capabilities)?.mimeTypes.includes(RESOURCE_MIME_TYPE) ??
    false
  );
}

/**
 * Capabilities a host's MCP client advertises to servers to enable views.
 *
 * @example
 * ```typescript
 * const client = new Client(hostInfo, { capabilities: uiClientCapabilities() });
 * ```
 */
export function uiClientCapabilities(
  mimeTypes: string[] = [RESOURCE_MIME_TYPE],
): { experimental: { [key: string]: object } } {
  return {
    experimental: {
      [UI_EXTENSION_ID]: { mimeTypes },
    },
  };
}
