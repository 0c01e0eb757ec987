import {
  Protocol,
  type ProtocolOptions,
  type RequestOptions,
} from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  type CallToolRequest,
  CallToolRequestSchema,
  type CallToolResult,
  CallToolResultSchema,
  type Implementation,
  type ListToolsRequest,
  ListToolsRequestSchema,
  type ListToolsResult,
  ListToolsResultSchema,
  type LoggingMessageNotification,
  type Notification,
  PingRequestSchema,
  type ReadResourceRequest,
  type ReadResourceResult,
  ReadResourceResultSchema,
  type Request,
  type Result,
} from "@modelcontextprotocol/sdk/types.js";

import { SUPPORTED_PROTOCOL_VERSIONS } from "./capabilities.js";
import { type Logger, createLogger } from "./logger.js";
import {
  LATEST_PROTOCOL_VERSION,
  type McpUiAppCapabilities,
  type McpUiHostCapabilities,
  type McpUiHostContext,
  type McpUiHostContextChangedNotification,
  McpUiHostContextChangedNotificationSchema,
  McpUiInitializeResultSchema,
  type McpUiMessageRequest,
  type McpUiMessageResult,
  McpUiMessageResultSchema,
  type McpUiOpenLinkRequest,
  type McpUiOpenLinkResult,
  McpUiOpenLinkResultSchema,
  type McpUiRequestDisplayModeRequest,
  type McpUiRequestDisplayModeResult,
  McpUiRequestDisplayModeResultSchema,
  type McpUiResourceTeardownRequest,
  McpUiResourceTeardownRequestSchema,
  type McpUiSizeChangedNotification,
  type McpUiToolCancelledNotification,
  McpUiToolCancelledNotificationSchema,
  type McpUiToolInputNotification,
  McpUiToolInputNotificationSchema,
  type McpUiToolInputPartialNotification,
  McpUiToolInputPartialNotificationSchema,
  type McpUiToolResultNotification,
  McpUiToolResultNotificationSchema,
  type McpUiUpdateModelContextRequest,
  type McpUiUpdateModelContextResult,
  McpUiUpdateModelContextResultSchema,
} from "./types.js";

/**
 * Options for configuring App behavior.
 *
 * @see ProtocolOptions from @modelcontextprotocol/sdk for inherited options
 */
export type AppOptions = ProtocolOptions & {
  /** Diagnostics sink; defaults to a console logger scoped `APP` */
  logger?: Logger;
};

type RequestHandlerExtra = Parameters<
  Parameters<App["setRequestHandler"]>[1]
>[1];

/**
 * View-side end of an MCP Apps session.
 *
 * The App class extends the MCP SDK's Protocol class. It performs the
 * `ui/initialize` handshake, keeps the host context up to date, and sends the
 * view's requests (tool calls, messages, links, display mode changes) to the
 * host, which proxies server-bound ones to the MCP server.
 *
 * ## Lifecycle
 *
 * 1. **Create**: Instantiate App with info and capabilities
 * 2. **Connect**: Call `connect()` to establish transport and perform handshake
 * 3. **Interactive**: Receive tool input and results, call tools
 * 4. **Cleanup**: The host sends `ui/resource-teardown` before closing
 *
 * ## Notification Setters
 *
 * - `ontoolinput` - Complete tool arguments from host
 * - `ontoolinputpartial` - Streaming partial tool arguments
 * - `ontoolresult` - Tool execution results
 * - `ontoolcancelled` - The tool call was cancelled
 * - `onhostcontextchanged` - Host context changes (theme, display mode, etc.)
 *
 * Register handlers before calling {@link connect} to avoid missing
 * notifications.
 *
 * @example Basic usage in a worker
 * ```typescript
 * const app = new App({ name: "WeatherApp", version: "1.0.0" });
 *
 * app.ontoolinput = (params) => {
 *   render(params.arguments);
 * };
 *
 * await app.connect(new MessagePortTransport(workerData.port));
 * ```
 */
export class App extends Protocol<Request, Notification, Result> {
  private _hostCapabilities?: McpUiHostCapabilities;
  private _hostInfo?: Implementation;
  private _hostContext: McpUiHostContext = {};
  private _protocolVersion?: string;
  private _onhostcontextchanged?: (
    params: McpUiHostContextChangedNotification["params"],
  ) => void;
  private _log: Logger;

  /**
   * Create a new MCP App instance.
   *
   * @param _appInfo - App identification (name and version)
   * @param _capabilities - Features and capabilities this app provides
   * @param options - Protocol options and logger
   *
   * @example
   * ```typescript
   * const app = new App(
   *   { name: "MyApp", version: "1.0.0" },
   *   { tools: { listChanged: true }, availableDisplayModes: ["inline", "fullscreen"] },
   * );
   * ```
   */
  constructor(
    private _appInfo: Implementation,
    private _capabilities: McpUiAppCapabilities = {},
    options: AppOptions = {},
  ) {
    super(options);
    this._log = options.logger ?? createLogger("APP");

    this.setRequestHandler(PingRequestSchema, (request) => {
      this._log.debug("Received ping:", request.params);
      return {};
    });
    this.setNotificationHandler(
      McpUiHostContextChangedNotificationSchema,
      (notification) => {
        this._hostContext = { ...this._hostContext, ...notification.params };
        this._onhostcontextchanged?.(notification.params);
      },
    );
    this.setRequestHandler(McpUiResourceTeardownRequestSchema, () => ({}));
  }

  /**
   * Get the host's capabilities discovered during initialization.
   *
   * @returns Host capabilities, or `undefined` if not yet connected
   *
   * @example Check host capabilities after connection
   * ```typescript
   * await app.connect(transport);
   * if (app.getHostCapabilities()?.serverTools) {
   *   const { tools } = await app.listServerTools();
   * }
   * ```
   */
  getHostCapabilities(): McpUiHostCapabilities | undefined {
    return this._hostCapabilities;
  }

  /**
   * Get the host's implementation info discovered during initialization.
   *
   * @returns Host implementation info, or `undefined` if not yet connected
   */
  getHostVersion(): Implementation | undefined {
    return this._hostInfo;
  }

  /**
   * Current host context: the initialize result with every later change
   * merged in.
   */
  getHostContext(): McpUiHostContext {
    return this._hostContext;
  }

  /** Protocol version agreed with the host, once connected. */
  getProtocolVersion(): string | undefined {
    return this._protocolVersion;
  }

  /**
   * Convenience handler for receiving complete tool input from the host.
   *
   * Sent once, after initialization and before the tool result.
   *
   * @example
   * ```typescript
   * app.ontoolinput = (params) => {
   *   console.log("Tool:", params.arguments);
   * };
   * await app.connect(transport);
   * ```
   */
  set ontoolinput(
    callback: (params: McpUiToolInputNotification["params"]) => void,
  ) {
    this.setNotificationHandler(McpUiToolInputNotificationSchema, (n) =>
      callback(n.params),
    );
  }

  /**
   * Convenience handler for streaming partial tool input from the host.
   *
   * Partial arguments are a best-effort recovery of incomplete JSON and only
   * arrive before {@link ontoolinput}.
   *
   * @example Progressive rendering of tool arguments
   * ```typescript
   * app.ontoolinputpartial = (params) => {
   *   preview(params.arguments);
   * };
   * ```
   */
  set ontoolinputpartial(
    callback: (params: McpUiToolInputPartialNotification["params"]) => void,
  ) {
    this.setNotificationHandler(McpUiToolInputPartialNotificationSchema, (n) =>
      callback(n.params),
    );
  }

  /**
   * Convenience handler for receiving tool execution results from the host.
   *
   * @example Display tool execution results
   * ```typescript
   * app.ontoolresult = (params) => {
   *   if (params.isError) {
   *     showError(params.content);
   *     return;
   *   }
   *   render(params.structuredContent);
   * };
   * ```
   */
  set ontoolresult(
    callback: (params: McpUiToolResultNotification["params"]) => void,
  ) {
    this.setNotificationHandler(McpUiToolResultNotificationSchema, (n) =>
      callback(n.params),
    );
  }

  /**
   * Convenience handler for a cancelled tool call. No result will follow.
   */
  set ontoolcancelled(
    callback: (params: McpUiToolCancelledNotification["params"]) => void,
  ) {
    this.setNotificationHandler(McpUiToolCancelledNotificationSchema, (n) =>
      callback(n.params),
    );
  }

  /**
   * Convenience handler for host context changes.
   *
   * Receives only the changed fields; {@link getHostContext} already has them
   * merged in when the callback runs.
   *
   * @example Respond to theme changes
   * ```typescript
   * app.onhostcontextchanged = (changes) => {
   *   if (changes.theme) {
   *     applyTheme(changes.theme);
   *   }
   * };
   * ```
   */
  set onhostcontextchanged(
    callback: (params: McpUiHostContextChangedNotification["params"]) => void,
  ) {
    this._onhostcontextchanged = callback;
  }

  /**
   * Convenience handler for the host's teardown request.
   *
   * The host waits for the callback (within its teardown bound) before it
   * closes the session. Without a handler, teardown is acknowledged at once.
   *
   * @example Save state before the view goes away
   * ```typescript
   * app.onteardown = async ({ reason }) => {
   *   await saveDraft();
   * };
   * ```
   */
  set onteardown(
    callback: (
      params: McpUiResourceTeardownRequest["params"],
      extra: RequestHandlerExtra,
    ) => void | Promise<void>,
  ) {
    this.setRequestHandler(
      McpUiResourceTeardownRequestSchema,
      async (request, extra) => {
        await callback(request.params, extra);
        return {};
      },
    );
  }

  /**
   * Convenience handler for tool call requests from the host.
   *
   * The app must declare tool capabilities in the constructor to use this handler.
   *
   * @example Handle tool calls from the host
   * ```typescript
   * app.oncalltool = async (params, extra) => {
   *   if (params.name === "greet") {
   *     const name = params.arguments?.name ?? "World";
   *     return { content: [{ type: "text", text: `Hello, ${name}!` }] };
   *   }
   *   throw new Error(`Unknown tool: ${params.name}`);
   * };
   * ```
   */
  set oncalltool(
    callback: (
      params: CallToolRequest["params"],
      extra: RequestHandlerExtra,
    ) => Promise<CallToolResult>,
  ) {
    this.setRequestHandler(CallToolRequestSchema, (request, extra) =>
      callback(request.params, extra),
    );
  }

  /**
   * Convenience handler for listing the tools this app provides.
   *
   * The app must declare tool capabilities in the constructor to use this handler.
   */
  set onlisttools(
    callback: (
      params: ListToolsRequest["params"],
      extra: RequestHandlerExtra,
    ) => Promise<ListToolsResult>,
  ) {
    this.setRequestHandler(ListToolsRequestSchema, (request, extra) =>
      callback(request.params, extra),
    );
  }

  /**
   * Verify that the host supports the capability required for the given
   * request method. Only consulted with `enforceStrictCapabilities`.
   * @internal
   */
  assertCapabilityForMethod(method: Request["method"]): void {
    switch (method) {
      case "ui/open-link":
        this._requireHostCapability("openLinks", method);
        return;
      case "ui/message":
        this._requireHostCapability("message", method);
        return;
      case "ui/update-model-context":
        this._requireHostCapability("updateModelContext", method);
        return;
      case "tools/call":
      case "tools/list":
        this._requireHostCapability("serverTools", method);
        return;
      case "resources/read":
        this._requireHostCapability("serverResources", method);
        return;
    }
  }

  /**
   * Verify that the app declared the capability required for the given request method.
   * @internal
   */
  assertRequestHandlerCapability(method: Request["method"]): void {
    switch (method) {
      case "tools/call":
      case "tools/list":
        if (!this._capabilities.tools) {
          throw new Error(
            `Client does not support tool capability (required for ${method})`,
          );
        }
        return;
      case "ping":
      case "ui/resource-teardown":
        return;
      default:
        throw new Error(`No handler for method ${method} registered`);
    }
  }

  /**
   * Verify that the host accepts the given notification.
   * @internal
   */
  assertNotificationCapability(method: Notification["method"]): void {
    if (method === "notifications/message") {
      this._requireHostCapability("logging", method);
    }
  }

  /**
   * Verify that task creation is supported for the given request method.
   * @internal
   */
  protected assertTaskCapability(_method: string): void {
    throw new Error("Tasks are not supported in MCP Apps");
  }

  /**
   * Verify that task handler is supported for the given method.
   * @internal
   */
  protected assertTaskHandlerCapability(_method: string): void {
    throw new Error("Task handlers are not supported in MCP Apps");
  }

  private _requireHostCapability(
    capability: keyof McpUiHostCapabilities,
    method: string,
  ): void {
    if (!this._hostCapabilities?.[capability]) {
      throw new Error(
        `Host does not support ${capability} (required for ${method})`,
      );
    }
  }

  /**
   * Call a tool on the originating MCP server (proxied through the host).
   *
   * Tool-level execution errors are returned in the result with
   * `isError: true`; calls the host refuses (unknown tool, hidden from apps,
   * another server's tool) reject with a `-32000` error.
   *
   * @example Fetch updated weather data
   * ```typescript
   * const result = await app.callServerTool({
   *   name: "get_weather",
   *   arguments: { location: "Tokyo" },
   * });
   * if (result.isError) {
   *   console.error("Tool returned error:", result.content);
   * }
   * ```
   */
  async callServerTool(
    params: CallToolRequest["params"],
    options?: RequestOptions,
  ): Promise<CallToolResult> {
    return await this.request(
      { method: "tools/call", params },
      CallToolResultSchema,
      options,
    );
  }

  /**
   * List the server tools this app may call.
   */
  async listServerTools(
    params?: ListToolsRequest["params"],
    options?: RequestOptions,
  ): Promise<ListToolsResult> {
    return await this.request(
      { method: "tools/list", params },
      ListToolsResultSchema,
      options,
    );
  }

  /**
   * Read a resource of the originating MCP server (proxied through the host).
   */
  async readServerResource(
    params: ReadResourceRequest["params"],
    options?: RequestOptions,
  ): Promise<ReadResourceResult> {
    return await this.request(
      { method: "resources/read", params },
      ReadResourceResultSchema,
      options,
    );
  }

  /**
   * Send a message to the host's chat interface.
   *
   * @example Send a text message from user interaction
   * ```typescript
   * await app.sendMessage({
   *   role: "user",
   *   content: [{ type: "text", text: "Show me details for item #42" }],
   * });
   * ```
   */
  sendMessage(
    params: McpUiMessageRequest["params"],
    options?: RequestOptions,
  ): Promise<McpUiMessageResult> {
    return this.request(
      { method: "ui/message", params },
      McpUiMessageResultSchema,
      options,
    );
  }

  /**
   * Send log messages to the host. Requires the `logging` host capability.
   *
   * @example
   * ```typescript
   * await app.sendLog({ level: "info", data: "Weather data refreshed", logger: "WeatherApp" });
   * ```
   */
  sendLog(params: LoggingMessageNotification["params"]): Promise<void> {
    return this.notification({ method: "notifications/message", params });
  }

  /**
   * Request the host to open an external URL.
   *
   * Rejects with a `-32000` error when the URL is invalid, uses a scheme
   * other than http(s), or the host declines it.
   *
   * @example Open documentation link
   * ```typescript
   * try {
   *   await app.sendOpenLink({ url: "https://docs.example.com" });
   * } catch (error) {
   *   showCopyableUrl("https://docs.example.com");
   * }
   * ```
   */
  sendOpenLink(
    params: McpUiOpenLinkRequest["params"],
    options?: RequestOptions,
  ): Promise<McpUiOpenLinkResult> {
    return this.request(
      { method: "ui/open-link", params },
      McpUiOpenLinkResultSchema,
      options,
    );
  }

  /**
   * Ask the host for another display mode.
   *
   * A declined request is not an error; the result holds the mode in effect,
   * which is also recorded in {@link getHostContext}.
   *
   * @example
   * ```typescript
   * const { mode } = await app.requestDisplayMode({ mode: "fullscreen" });
   * if (mode !== "fullscreen") {
   *   showCompactLayout();
   * }
   * ```
   */
  async requestDisplayMode(
    params: McpUiRequestDisplayModeRequest["params"],
    options?: RequestOptions,
  ): Promise<McpUiRequestDisplayModeResult> {
    const result = await this.request(
      { method: "ui/request-display-mode", params },
      McpUiRequestDisplayModeResultSchema,
      options,
    );
    this._hostContext = { ...this._hostContext, displayMode: result.mode };
    return result;
  }

  /**
   * Publish view state the host may attach to the model's context.
   *
   * @throws {McpError} `-32000` when the host declines the update
   */
  updateModelContext(
    params: McpUiUpdateModelContextRequest["params"],
    options?: RequestOptions,
  ): Promise<McpUiUpdateModelContextResult> {
    return this.request(
      { method: "ui/update-model-context", params },
      McpUiUpdateModelContextResultSchema,
      options,
    );
  }

  /**
   * Notify the host of the view's rendered size.
   *
   * @example
   * ```typescript
   * await app.sendSizeChanged({ width: 400, height: 600 });
   * ```
   */
  sendSizeChanged(
    params: McpUiSizeChangedNotification["params"],
  ): Promise<void> {
    return this.notification({
      method: "ui/notifications/size-changed",
      params,
    });
  }

  /**
   * Establish connection with the host and perform initialization handshake.
   *
   * 1. Connects the transport layer
   * 2. Sends `ui/initialize` with app info and capabilities
   * 3. Records host capabilities, info and context from the response
   * 4. Sends `ui/notifications/initialized`
   *
   * If initialization fails, the connection is closed and the error is
   * rethrown.
   *
   * @throws {Error} If initialization fails, the host answers with an
   *   unsupported protocol version, or the connection is lost
   */
  override async connect(
    transport: Transport,
    options?: RequestOptions,
  ): Promise<void> {
    await super.connect(transport);

    try {
      const result = await this.request(
        {
          method: "ui/initialize",
          params: {
            appCapabilities: this._capabilities,
            appInfo: this._appInfo,
            protocolVersion: LATEST_PROTOCOL_VERSION,
          },
        },
        McpUiInitializeResultSchema,
        options,
      );

      if (!SUPPORTED_PROTOCOL_VERSIONS.includes(result.protocolVersion)) {
        throw new Error(
          `Host's protocol version is not supported: ${result.protocolVersion}`,
        );
      }

      this._protocolVersion = result.protocolVersion;
      this._hostCapabilities = result.hostCapabilities;
      this._hostInfo = result.hostInfo;
      this._hostContext = result.hostContext;

      await this.notification({ method: "ui/notifications/initialized" });
    } catch (error) {
      try {
        await this.close();
      } catch (closeError) {
        this._log.warn("Failed to close after initialization error:", closeError);
      }
      throw error;
    }
  }
}
