import {
  type CallToolResult,
  type ContentBlock,
  type Implementation,
  type RequestId,
  type Tool,
  CallToolResultSchema,
  ContentBlockSchema,
  EmptyResultSchema,
  ImplementationSchema,
  RequestIdSchema,
  RequestSchema,
  ToolSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod/v4";

/**
 * Type-level assertion that validates a Zod schema produces the expected interface.
 *
 * Request and notification schemas keep their concrete `ZodObject` type so the
 * MCP SDK's `setRequestHandler()` and `setNotificationHandler()` can read the
 * method literal from them. Annotating them with `z.ZodType<Interface>` would
 * widen that type, so this assertion checks the shape at compile time instead.
 *
 * @internal
 */
type VerifySchemaMatches<TSchema extends z.ZodTypeAny, TInterface> =
  z.infer<TSchema> extends TInterface
    ? TInterface extends z.infer<TSchema>
      ? true
      : never
    : never;

/**
 * Current protocol version spoken by this engine.
 *
 * Version negotiation happens during `ui/initialize`; neither side needs to
 * manage versions manually.
 */
export const LATEST_PROTOCOL_VERSION = "2026-01-26";

/**
 * MIME type identifying an HTML resource that is an MCP App view.
 */
export const RESOURCE_MIME_TYPE = "text/html;profile=mcp-app";

/**
 * Legacy flat `_meta` key linking a tool to its UI resource.
 *
 * @deprecated Prefer `_meta.ui.resourceUri`. Still read and written for older peers.
 */
export const RESOURCE_URI_META_KEY = "ui/resourceUri";

/**
 * Identifier under which the UI extension is advertised in MCP capabilities.
 */
export const UI_EXTENSION_ID = "io.modelcontextprotocol/ui";

/**
 * Method prefix reserved for messages between the host and a sandbox relay.
 * Messages with this prefix are never forwarded to or from a view.
 */
export const RELAY_CONTROL_PREFIX = "ui/notifications/sandbox-";

/**
 * Every method name the engine recognizes. Anything else is an
 * "unrecognized" method and is handled by the generic dispatch rules.
 */
export const UI_METHODS = [
  "ui/initialize",
  "ui/notifications/initialized",
  "ui/open-link",
  "ui/message",
  "ui/request-display-mode",
  "ui/update-model-context",
  "ui/notifications/size-changed",
  "ui/notifications/tool-input-partial",
  "ui/notifications/tool-input",
  "ui/notifications/tool-result",
  "ui/notifications/tool-cancelled",
  "ui/resource-teardown",
  "ui/notifications/host-context-changed",
  "ui/notifications/sandbox-proxy-ready",
  "ui/notifications/sandbox-resource-ready",
] as const;

export type McpUiMethod = (typeof UI_METHODS)[number];

/**
 * How a view is presented by the host.
 */
export type McpUiDisplayMode = "inline" | "fullscreen" | "pip";

/**
 * Runtime validation schema for {@link McpUiDisplayMode}.
 * @internal
 */
export const McpUiDisplayModeSchema = z.enum(["inline", "fullscreen", "pip"]);

/** Every display mode, in the order hosts offer them by default. */
export const ALL_DISPLAY_MODES: readonly McpUiDisplayMode[] = [
  "inline",
  "fullscreen",
  "pip",
];

/**
 * Role of the party invoking or listing a tool.
 *
 * - `model`: the language model acting through the host
 * - `app`: a view rendered by the host
 */
export type McpUiToolVisibility = "model" | "app";

export const McpUiToolVisibilitySchema = z.enum(["model", "app"]);

/**
 * Request to open an external URL in the host's default browser.
 *
 * Sent from the view to the host. The host may deny the request based on user
 * preferences or security policy.
 *
 * @see {@link app.App.sendOpenLink} for the method that sends this request
 */
export interface McpUiOpenLinkRequest {
  method: "ui/open-link";
  params: {
    /** URL to open in the host's browser */
    url: string;
  };
}

/**
 * Runtime validation schema for {@link McpUiOpenLinkRequest}.
 *
 * The URL is only checked to be a string here; the host validates it and
 * answers an unparsable URL with a denial error.
 * @internal
 */
export const McpUiOpenLinkRequestSchema = RequestSchema.extend({
  method: z.literal("ui/open-link"),
  params: z.object({
    url: z.string(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyOpenLinkRequest = VerifySchemaMatches<
  typeof McpUiOpenLinkRequestSchema,
  McpUiOpenLinkRequest
>;

/**
 * Result from a {@link McpUiOpenLinkRequest}.
 *
 * @see {@link McpUiOpenLinkRequest}
 */
export interface McpUiOpenLinkResult {
  /**
   * True if the host callback declined the link. The bridge turns this into a
   * `-32000` error response, so views only ever see it as a rejection.
   */
  isError?: boolean;
  /**
   * Index signature required for MCP SDK `Protocol` class compatibility.
   */
  [key: string]: unknown;
}

/**
 * Runtime validation schema for {@link McpUiOpenLinkResult}.
 * @internal
 */
export const McpUiOpenLinkResultSchema: z.ZodType<McpUiOpenLinkResult> =
  z.object({
    isError: z.boolean().optional(),
  });

/**
 * Request to send a message to the host's chat interface.
 *
 * @see {@link app.App.sendMessage} for the method that sends this request
 */
export interface McpUiMessageRequest {
  method: "ui/message";
  params: {
    /** Message role, currently only "user" is supported */
    role: "user";
    /** Message content blocks (text, image, etc.) */
    content: ContentBlock[];
  };
}

/**
 * Runtime validation schema for {@link McpUiMessageRequest}.
 * @internal
 */
export const McpUiMessageRequestSchema = RequestSchema.extend({
  method: z.literal("ui/message"),
  params: z.object({
    role: z.literal("user"),
    content: z.array(ContentBlockSchema),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyMessageRequest = VerifySchemaMatches<
  typeof McpUiMessageRequestSchema,
  McpUiMessageRequest
>;

/**
 * Result from a {@link McpUiMessageRequest}.
 *
 * The host never returns conversation content here; only error status.
 */
export interface McpUiMessageResult {
  /** True if the host rejected or failed to deliver the message. */
  isError?: boolean;
  [key: string]: unknown;
}

/**
 * Runtime validation schema for {@link McpUiMessageResult}.
 * @internal
 */
export const McpUiMessageResultSchema: z.ZodType<McpUiMessageResult> = z.object(
  {
    isError: z.boolean().optional(),
  },
);

/**
 * Request to change how the view is displayed (View → Host).
 *
 * The host only honors modes that both it and the app declared. A declined
 * request is not an error: the result echoes the mode that stays in effect.
 */
export interface McpUiRequestDisplayModeRequest {
  method: "ui/request-display-mode";
  params: {
    /** Requested display mode */
    mode: McpUiDisplayMode;
  };
}

/**
 * Runtime validation schema for {@link McpUiRequestDisplayModeRequest}.
 * @internal
 */
export const McpUiRequestDisplayModeRequestSchema = RequestSchema.extend({
  method: z.literal("ui/request-display-mode"),
  params: z.object({
    mode: McpUiDisplayModeSchema,
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyRequestDisplayModeRequest = VerifySchemaMatches<
  typeof McpUiRequestDisplayModeRequestSchema,
  McpUiRequestDisplayModeRequest
>;

/**
 * Result from a {@link McpUiRequestDisplayModeRequest}.
 */
export interface McpUiRequestDisplayModeResult {
  /** Display mode in effect after the request was processed */
  mode: McpUiDisplayMode;
  [key: string]: unknown;
}

/**
 * Runtime validation schema for {@link McpUiRequestDisplayModeResult}.
 * @internal
 */
export const McpUiRequestDisplayModeResultSchema: z.ZodType<McpUiRequestDisplayModeResult> =
  z.object({
    mode: McpUiDisplayModeSchema,
  });

/**
 * Request to update the context the model sees for this view (View → Host).
 *
 * Lets a view publish state (for example the current selection) that the host
 * may attach to the next model turn.
 */
export interface McpUiUpdateModelContextRequest {
  method: "ui/update-model-context";
  params: {
    /** Content blocks describing the view's state */
    content?: ContentBlock[];
    /** Structured form of the same state */
    structuredContent?: Record<string, unknown>;
  };
}

/**
 * Runtime validation schema for {@link McpUiUpdateModelContextRequest}.
 * @internal
 */
export const McpUiUpdateModelContextRequestSchema = RequestSchema.extend({
  method: z.literal("ui/update-model-context"),
  params: z.object({
    content: z.array(ContentBlockSchema).optional(),
    structuredContent: z.record(z.string(), z.unknown()).optional(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyUpdateModelContextRequest = VerifySchemaMatches<
  typeof McpUiUpdateModelContextRequestSchema,
  McpUiUpdateModelContextRequest
>;

/**
 * Result from a {@link McpUiUpdateModelContextRequest}.
 */
export interface McpUiUpdateModelContextResult {
  /** True if the host declined the update. Sent to the view as a `-32000` error. */
  isError?: boolean;
  [key: string]: unknown;
}

/**
 * Runtime validation schema for {@link McpUiUpdateModelContextResult}.
 * @internal
 */
export const McpUiUpdateModelContextResultSchema: z.ZodType<McpUiUpdateModelContextResult> =
  z.object({
    isError: z.boolean().optional(),
  });

/**
 * Notification that the sandbox relay is ready to receive content.
 *
 * Sent by a {@link relay.SandboxRelay} to the host once it is listening. It is
 * the only message a relay ever originates and it never carries parameters.
 *
 * @internal
 */
export interface McpUiSandboxProxyReadyNotification {
  method: "ui/notifications/sandbox-proxy-ready";
  params: {};
}

/**
 * Runtime validation schema for {@link McpUiSandboxProxyReadyNotification}.
 * @internal
 */
export const McpUiSandboxProxyReadyNotificationSchema = z.object({
  method: z.literal("ui/notifications/sandbox-proxy-ready"),
  params: z.object({}),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifySandboxProxyReadyNotification = VerifySchemaMatches<
  typeof McpUiSandboxProxyReadyNotificationSchema,
  McpUiSandboxProxyReadyNotification
>;

// =============================================================================
// UI Resource Metadata Types
// =============================================================================

/**
 * Origins a UI resource declares it needs, one list per policy axis.
 * Servers declare these; hosts derive the Content Security Policy from them.
 */
export const McpUiResourceCspSchema = z.object({
  /** Origins for network requests (fetch/XHR/WebSocket). Maps to CSP connect-src */
  connectDomains: z.array(z.string()).optional(),
  /** Origins for static resources. Maps to script-src, style-src, img-src, font-src, media-src */
  resourceDomains: z.array(z.string()).optional(),
  /** Origins the view may embed in nested frames. Maps to CSP frame-src */
  frameDomains: z.array(z.string()).optional(),
  /** Allowed document base URIs. Maps to CSP base-uri */
  baseUriDomains: z.array(z.string()).optional(),
});
export type McpUiResourceCsp = z.infer<typeof McpUiResourceCspSchema>;

/**
 * Browser permissions a UI resource may request. Each present key is a request.
 */
export const McpUiResourcePermissionsSchema = z.object({
  camera: z.object({}).optional(),
  microphone: z.object({}).optional(),
  geolocation: z.object({}).optional(),
  clipboardWrite: z.object({}).optional(),
});
export type McpUiResourcePermissions = z.infer<
  typeof McpUiResourcePermissionsSchema
>;

/**
 * Permission names as they appear in a permission policy `allow` attribute.
 */
export type McpUiPermission =
  | "camera"
  | "microphone"
  | "geolocation"
  | "clipboard-write";

/**
 * UI resource metadata for security and rendering configuration.
 * Found in the `_meta.ui` field of resource contents returned via `resources/read`.
 */
export const McpUiResourceMetaSchema = z.object({
  /** Content Security Policy configuration */
  csp: McpUiResourceCspSchema.optional(),
  /** Browser permissions requested by the view */
  permissions: McpUiResourcePermissionsSchema.optional(),
  /** Dedicated origin for the view's sandbox */
  domain: z.string().optional(),
  /** Visual boundary preference; absent leaves the choice to the host */
  prefersBorder: z.boolean().optional(),
});
export type McpUiResourceMeta = z.infer<typeof McpUiResourceMetaSchema>;

/**
 * UI metadata attached to a tool definition under `_meta.ui`.
 */
export const McpUiToolMetaSchema = z.object({
  /** URI of the UI resource rendered for this tool, e.g. "ui://weather/view.html" */
  resourceUri: z.string().optional(),
  /**
   * Who may see and call the tool. Defaults to `["model", "app"]` when
   * omitted; an empty list grants access to nobody.
   */
  visibility: z.array(McpUiToolVisibilitySchema).optional(),
});
export type McpUiToolMeta = z.infer<typeof McpUiToolMetaSchema>;

/**
 * Notification containing the HTML resource for the sandbox relay to load.
 *
 * Sent by the host after the relay signalled readiness. The relay builds the
 * security policy from `csp` and `permissions`, injects it into `html` and
 * hands the result to its renderer. Never forwarded to the view.
 *
 * @internal
 */
export interface McpUiSandboxResourceReadyNotification {
  method: "ui/notifications/sandbox-resource-ready";
  params: {
    /** HTML content of the view */
    html: string;
    /** Optional override for the sandbox attribute of the view's frame */
    sandbox?: string;
    /** Declared origins, already restricted by the host where it chose to */
    csp?: McpUiResourceCsp;
    /** Permissions the host grants the view */
    permissions?: McpUiResourcePermissions;
  };
}

/**
 * Runtime validation schema for {@link McpUiSandboxResourceReadyNotification}.
 * @internal
 */
export const McpUiSandboxResourceReadyNotificationSchema = z.object({
  method: z.literal("ui/notifications/sandbox-resource-ready"),
  params: z.object({
    html: z.string(),
    sandbox: z.string().optional(),
    csp: McpUiResourceCspSchema.optional(),
    permissions: McpUiResourcePermissionsSchema.optional(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifySandboxResourceReadyNotification = VerifySchemaMatches<
  typeof McpUiSandboxResourceReadyNotificationSchema,
  McpUiSandboxResourceReadyNotification
>;

/**
 * Notification of the view's rendered size (View → Host).
 *
 * @see {@link app.App.sendSizeChanged}
 */
export interface McpUiSizeChangedNotification {
  method: "ui/notifications/size-changed";
  params: {
    /** New width in pixels */
    width?: number;
    /** New height in pixels */
    height?: number;
  };
}

/**
 * Runtime validation schema for {@link McpUiSizeChangedNotification}.
 * @internal
 */
export const McpUiSizeChangedNotificationSchema = z.object({
  method: z.literal("ui/notifications/size-changed"),
  params: z.object({
    width: z.number().optional(),
    height: z.number().optional(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifySizeChangedNotification = VerifySchemaMatches<
  typeof McpUiSizeChangedNotificationSchema,
  McpUiSizeChangedNotification
>;

/**
 * Notification containing complete tool arguments (Host → View).
 *
 * Delivered at most once per session, after initialization. Any
 * {@link McpUiToolInputPartialNotification} must come before it.
 */
export interface McpUiToolInputNotification {
  method: "ui/notifications/tool-input";
  params: {
    /** Complete tool call arguments as key-value pairs */
    arguments?: Record<string, unknown>;
  };
}

/**
 * Runtime validation schema for {@link McpUiToolInputNotification}.
 * @internal
 */
export const McpUiToolInputNotificationSchema = z.object({
  method: z.literal("ui/notifications/tool-input"),
  params: z.object({
    arguments: z.record(z.string(), z.unknown()).optional(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyToolInputNotification = VerifySchemaMatches<
  typeof McpUiToolInputNotificationSchema,
  McpUiToolInputNotification
>;

/**
 * Notification containing partial, streaming tool arguments (Host → View).
 *
 * Zero or more of these may precede the single
 * {@link McpUiToolInputNotification}. Arguments are a best-effort recovery of
 * incomplete JSON and may change between notifications.
 */
export interface McpUiToolInputPartialNotification {
  method: "ui/notifications/tool-input-partial";
  params: {
    /** Partial tool call arguments (incomplete, may change) */
    arguments?: Record<string, unknown>;
  };
}

/**
 * Runtime validation schema for {@link McpUiToolInputPartialNotification}.
 * @internal
 */
export const McpUiToolInputPartialNotificationSchema = z.object({
  method: z.literal("ui/notifications/tool-input-partial"),
  params: z.object({
    arguments: z.record(z.string(), z.unknown()).optional(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyToolInputPartialNotification = VerifySchemaMatches<
  typeof McpUiToolInputPartialNotificationSchema,
  McpUiToolInputPartialNotification
>;

/**
 * Notification containing the tool execution result (Host → View).
 *
 * Uses the standard MCP `CallToolResult` shape.
 */
export interface McpUiToolResultNotification {
  method: "ui/notifications/tool-result";
  params: CallToolResult;
}

/**
 * Runtime validation schema for {@link McpUiToolResultNotification}.
 * @internal
 */
export const McpUiToolResultNotificationSchema = z.object({
  method: z.literal("ui/notifications/tool-result"),
  params: CallToolResultSchema,
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyToolResultNotification = VerifySchemaMatches<
  typeof McpUiToolResultNotificationSchema,
  McpUiToolResultNotification
>;

/**
 * Notification that the tool call behind this view was cancelled (Host → View).
 */
export interface McpUiToolCancelledNotification {
  method: "ui/notifications/tool-cancelled";
  params: {
    /** Human-readable cancellation reason */
    reason?: string;
  };
}

/**
 * Runtime validation schema for {@link McpUiToolCancelledNotification}.
 * @internal
 */
export const McpUiToolCancelledNotificationSchema = z.object({
  method: z.literal("ui/notifications/tool-cancelled"),
  params: z.object({
    reason: z.string().optional(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyToolCancelledNotification = VerifySchemaMatches<
  typeof McpUiToolCancelledNotificationSchema,
  McpUiToolCancelledNotification
>;

/**
 * Size constraint for one axis of the view's container.
 *
 * - `fixed`: the container has exactly `size` pixels
 * - `flexible`: the view chooses its size, up to `max` pixels when given
 * - `unbounded`: the view chooses its size freely
 */
export type McpUiAxisConstraint =
  | { mode: "fixed"; size: number }
  | { mode: "flexible"; max?: number }
  | { mode: "unbounded" };

/**
 * Runtime validation schema for {@link McpUiAxisConstraint}.
 * @internal
 */
export const McpUiAxisConstraintSchema: z.ZodType<McpUiAxisConstraint> =
  z.discriminatedUnion("mode", [
    z.object({ mode: z.literal("fixed"), size: z.number().nonnegative() }),
    z.object({
      mode: z.literal("flexible"),
      max: z.number().nonnegative().optional(),
    }),
    z.object({ mode: z.literal("unbounded") }),
  ]);

/**
 * Rich context about the host environment provided to views.
 *
 * Sent in the {@link McpUiInitializeResult}; later changes arrive through
 * {@link McpUiHostContextChangedNotification} with only the changed fields.
 * Every field is optional.
 */
export type McpUiHostContext = {
  /** Metadata of the tool call that instantiated this view */
  toolInfo?: {
    /** JSON-RPC id of the tools/call request */
    id: RequestId;
    /** Tool definition including name, inputSchema, etc. */
    tool: Tool;
  };
  /** Current color theme preference */
  theme?: "light" | "dark";
  /** Host styling the view may adopt */
  styles?: {
    /** CSS custom properties, keyed by property name (e.g. "--color-text-primary") */
    variables?: Record<string, string>;
    css?: {
      /** CSS `@font-face` rules or font imports */
      fonts?: string;
    };
  };
  /** How the view is currently displayed */
  displayMode?: McpUiDisplayMode;
  /** Display modes the host supports */
  availableDisplayModes?: McpUiDisplayMode[];
  /** Size constraints of the view's container, per axis */
  containerDimensions?: {
    width: McpUiAxisConstraint;
    height: McpUiAxisConstraint;
  };
  /**
   * User's language and region preference in BCP 47 format.
   * @example "en-US"
   */
  locale?: string;
  /**
   * User's timezone in IANA format.
   * @example "Europe/London"
   */
  timeZone?: string;
  /** Host application identifier */
  userAgent?: string;
  /** Platform type for responsive design decisions */
  platform?: "web" | "desktop" | "mobile";
  /** Device input capabilities */
  deviceCapabilities?: {
    touch?: boolean;
    hover?: boolean;
  };
  /** Safe area boundaries in pixels */
  safeAreaInsets?: {
    top: number;
    right: number;
    bottom: number;
    left: number;
  };
};

/**
 * Runtime validation schema for {@link McpUiHostContext}.
 * @internal
 */
export const McpUiHostContextSchema: z.ZodType<McpUiHostContext> = z.object({
  toolInfo: z
    .object({
      id: RequestIdSchema,
      tool: ToolSchema,
    })
    .optional(),
  theme: z.enum(["light", "dark"]).optional(),
  styles: z
    .object({
      variables: z.record(z.string(), z.string()).optional(),
      css: z
        .object({
          fonts: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
  displayMode: McpUiDisplayModeSchema.optional(),
  availableDisplayModes: z.array(McpUiDisplayModeSchema).optional(),
  containerDimensions: z
    .object({
      width: McpUiAxisConstraintSchema,
      height: McpUiAxisConstraintSchema,
    })
    .optional(),
  locale: z.string().optional(),
  timeZone: z.string().optional(),
  userAgent: z.string().optional(),
  platform: z.enum(["web", "desktop", "mobile"]).optional(),
  deviceCapabilities: z
    .object({
      touch: z.boolean().optional(),
      hover: z.boolean().optional(),
    })
    .optional(),
  safeAreaInsets: z
    .object({
      top: z.number(),
      right: z.number(),
      bottom: z.number(),
      left: z.number(),
    })
    .optional(),
});

/**
 * Notification that host context has changed (Host → View).
 *
 * Carries only the changed fields. Views merge them into their current context.
 */
export interface McpUiHostContextChangedNotification {
  method: "ui/notifications/host-context-changed";
  params: McpUiHostContext;
}

/**
 * Runtime validation schema for {@link McpUiHostContextChangedNotification}.
 * @internal
 */
export const McpUiHostContextChangedNotificationSchema = z.object({
  method: z.literal("ui/notifications/host-context-changed"),
  params: McpUiHostContextSchema,
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyHostContextChangedNotification = VerifySchemaMatches<
  typeof McpUiHostContextChangedNotificationSchema,
  McpUiHostContextChangedNotification
>;

/**
 * Request for graceful shutdown of the view (Host → View).
 *
 * Gives the view a chance to save state or cancel pending work. The host waits
 * for the response for a bounded time before closing the session.
 *
 * @see {@link app-bridge.AppBridge.sendResourceTeardown}
 */
export interface McpUiResourceTeardownRequest {
  method: "ui/resource-teardown";
  params: {
    /** Why the view is being torn down */
    reason?: string;
  };
}

/**
 * Runtime validation schema for {@link McpUiResourceTeardownRequest}.
 * @internal
 */
export const McpUiResourceTeardownRequestSchema = RequestSchema.extend({
  method: z.literal("ui/resource-teardown"),
  params: z.object({
    reason: z.string().optional(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyResourceTeardownRequest = VerifySchemaMatches<
  typeof McpUiResourceTeardownRequestSchema,
  McpUiResourceTeardownRequest
>;

/**
 * Result from a teardown request. Empty: the view finished its cleanup.
 */
export interface McpUiResourceTeardownResult {
  [key: string]: unknown;
}

/**
 * Runtime validation schema for {@link McpUiResourceTeardownResult}.
 * @internal
 */
export const McpUiResourceTeardownResultSchema: z.ZodType<McpUiResourceTeardownResult> =
  EmptyResultSchema;

/**
 * Sandbox grants a host is willing to give any view. Acts as an upper bound:
 * a view never receives more than this, whatever its metadata requests.
 */
export interface McpUiHostSandboxCapabilities {
  /** Permissions the host can grant */
  permissions?: McpUiResourcePermissions;
  /** Origins the host approves, per axis; `*` and `*.example.com` patterns allowed */
  csp?: McpUiResourceCsp;
}

/**
 * Capabilities supported by the host application.
 *
 * Declared statically by the host and sent to the view in the initialize
 * result.
 */
export interface McpUiHostCapabilities {
  /** Experimental features */
  experimental?: {};
  /** Host supports opening external URLs via {@link app.App.sendOpenLink} */
  openLinks?: {};
  /** Host can proxy tool calls to the MCP server */
  serverTools?: {
    /** Host supports tools/list_changed notifications */
    listChanged?: boolean;
  };
  /** Host can proxy resource reads to the MCP server */
  serverResources?: {
    /** Host supports resources/list_changed notifications */
    listChanged?: boolean;
  };
  /** Host accepts log messages via {@link app.App.sendLog} */
  logging?: {};
  /** Host accepts chat messages via {@link app.App.sendMessage} */
  message?: {};
  /** Host accepts model context updates via {@link app.App.updateModelContext} */
  updateModelContext?: {};
  /** Sandbox grants available to views */
  sandbox?: McpUiHostSandboxCapabilities;
}

/**
 * Runtime validation schema for {@link McpUiHostCapabilities}.
 * @internal
 */
export const McpUiHostCapabilitiesSchema: z.ZodType<McpUiHostCapabilities> =
  z.object({
    experimental: z.object({}).optional(),
    openLinks: z.object({}).optional(),
    serverTools: z
      .object({
        listChanged: z.boolean().optional(),
      })
      .optional(),
    serverResources: z
      .object({
        listChanged: z.boolean().optional(),
      })
      .optional(),
    logging: z.object({}).optional(),
    message: z.object({}).optional(),
    updateModelContext: z.object({}).optional(),
    sandbox: z
      .object({
        permissions: McpUiResourcePermissionsSchema.optional(),
        csp: McpUiResourceCspSchema.optional(),
      })
      .optional(),
  });

/**
 * Capabilities provided by the view (App).
 *
 * @example
 * ```typescript
 * const app = new App(
 *   { name: "WeatherView", version: "1.0.0" },
 *   { availableDisplayModes: ["inline", "fullscreen"] },
 * );
 * ```
 */
export interface McpUiAppCapabilities {
  /** Experimental features */
  experimental?: {};
  /** App exposes MCP-style tools that the host can call */
  tools?: {
    /** App supports tools/list_changed notifications */
    listChanged?: boolean;
  };
  /**
   * Display modes the app can render in, in order of preference. When
   * omitted the app accepts any mode the host offers.
   */
  availableDisplayModes?: McpUiDisplayMode[];
}

/**
 * Runtime validation schema for {@link McpUiAppCapabilities}.
 * @internal
 */
export const McpUiAppCapabilitiesSchema: z.ZodType<McpUiAppCapabilities> =
  z.object({
    experimental: z.object({}).optional(),
    tools: z
      .object({
        listChanged: z.boolean().optional(),
      })
      .optional(),
    availableDisplayModes: z.array(McpUiDisplayModeSchema).optional(),
  });

/**
 * Initialization request sent from the view to the host.
 *
 * The first message of every session. After the response arrives the view
 * must send {@link McpUiInitializedNotification}.
 *
 * @see {@link app.App.connect}
 */
export interface McpUiInitializeRequest {
  method: "ui/initialize";
  params: {
    /** App identification (name and version) */
    appInfo: Implementation;
    /** Features and capabilities this app provides */
    appCapabilities: McpUiAppCapabilities;
    /** Protocol version this app supports */
    protocolVersion: string;
  };
}

/**
 * Runtime validation schema for {@link McpUiInitializeRequest}.
 * @internal
 */
export const McpUiInitializeRequestSchema = RequestSchema.extend({
  method: z.literal("ui/initialize"),
  params: z.object({
    appInfo: ImplementationSchema,
    appCapabilities: McpUiAppCapabilitiesSchema,
    protocolVersion: z.string(),
  }),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyInitializeRequest = VerifySchemaMatches<
  typeof McpUiInitializeRequestSchema,
  McpUiInitializeRequest
>;

/**
 * Initialization result returned from the host to the view.
 */
export interface McpUiInitializeResult {
  /** Negotiated protocol version string */
  protocolVersion: string;
  /** Host application identification and version */
  hostInfo: Implementation;
  /** Features and capabilities provided by the host */
  hostCapabilities: McpUiHostCapabilities;
  /** Rich context about the host environment */
  hostContext: McpUiHostContext;
  [key: string]: unknown;
}

/**
 * Runtime validation schema for {@link McpUiInitializeResult}.
 * @internal
 */
export const McpUiInitializeResultSchema: z.ZodType<McpUiInitializeResult> =
  z.object({
    protocolVersion: z.string(),
    hostInfo: ImplementationSchema,
    hostCapabilities: McpUiHostCapabilitiesSchema,
    hostContext: McpUiHostContextSchema,
  });

/**
 * Notification that the view has completed initialization (View → Host).
 *
 * The host delivers no application message to the view before receiving it.
 */
export interface McpUiInitializedNotification {
  method: "ui/notifications/initialized";
  params?: {};
}

/**
 * Runtime validation schema for {@link McpUiInitializedNotification}.
 * @internal
 */
export const McpUiInitializedNotificationSchema = z.object({
  method: z.literal("ui/notifications/initialized"),
  params: z.object({}).optional(),
});

/** @internal - Compile-time verification that schema matches interface */
type _VerifyInitializedNotification = VerifySchemaMatches<
  typeof McpUiInitializedNotificationSchema,
  McpUiInitializedNotification
>;

/**
 * Payload advertised under {@link UI_EXTENSION_ID} in MCP capabilities.
 */
export const McpUiExtensionCapabilitySchema = z.object({
  /** Content kinds the peer accepts, e.g. `["text/html;profile=mcp-app"]` */
  mimeTypes: z.array(z.string()).min(1),
});
export type McpUiExtensionCapability = z.infer<
  typeof McpUiExtensionCapabilitySchema
>;
