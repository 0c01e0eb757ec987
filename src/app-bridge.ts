import {
  Protocol,
  type RequestOptions,
} from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  type CallToolResult,
  EmptyResultSchema,
  ErrorCode,
  type Implementation,
  ListToolsRequestSchema,
  type LoggingMessageNotification,
  LoggingMessageNotificationSchema,
  McpError,
  type Notification,
  type PingRequest,
  PingRequestSchema,
  ReadResourceRequestSchema,
  type Request,
  type Result,
} from "@modelcontextprotocol/sdk/types.js";

import {
  type McpUiNegotiatedCapabilities,
  negotiateCapabilities,
  supportsDisplayMode,
} from "./capabilities.js";
import {
  type HostOptions,
  type ResolvedHostOptions,
  resolveHostOptions,
} from "./config.js";
import {
  type McpUiDeliveryResult,
  type McpUiRequestOutcome,
  type McpUiTeardownOutcome,
  denied,
  settle,
  toMcpError,
} from "./errors.js";
import type { McpUiSessionState } from "./lifecycle.js";
import type { Logger } from "./logger.js";
import type { McpUiServerHandle } from "./registry.js";
import { SessionRouter } from "./router.js";
import { McpUiSession } from "./session.js";
import {
  type McpUiAppCapabilities,
  type McpUiHostCapabilities,
  type McpUiHostContext,
  McpUiInitializedNotificationSchema,
  type McpUiInitializeRequest,
  McpUiInitializeRequestSchema,
  type McpUiInitializeResult,
  type McpUiMessageRequest,
  McpUiMessageRequestSchema,
  type McpUiMessageResult,
  type McpUiOpenLinkRequest,
  McpUiOpenLinkRequestSchema,
  type McpUiOpenLinkResult,
  type McpUiRequestDisplayModeRequest,
  McpUiRequestDisplayModeRequestSchema,
  type McpUiRequestDisplayModeResult,
  type McpUiResourceTeardownRequest,
  McpUiResourceTeardownResultSchema,
  McpUiSandboxProxyReadyNotificationSchema,
  type McpUiSandboxResourceReadyNotification,
  type McpUiSizeChangedNotification,
  McpUiSizeChangedNotificationSchema,
  type McpUiToolCancelledNotification,
  type McpUiToolInputNotification,
  type McpUiToolInputPartialNotification,
  type McpUiUpdateModelContextRequest,
  McpUiUpdateModelContextRequestSchema,
  type McpUiUpdateModelContextResult,
} from "./types.js";
import { checkToolCall, filterToolsForRole } from "./visibility.js";

/**
 * Extra metadata passed to request handlers.
 *
 * Extracted from the MCP SDK's request handler signature: abort signal,
 * session id, request id.
 *
 * @internal
 */
type RequestHandlerExtra = Parameters<
  Parameters<AppBridge["setRequestHandler"]>[1]
>[1];

const HOST_CONTEXT_KEYS: ReadonlyArray<keyof McpUiHostContext> = [
  "toolInfo",
  "theme",
  "styles",
  "displayMode",
  "availableDisplayModes",
  "containerDimensions",
  "locale",
  "timeZone",
  "userAgent",
  "platform",
  "deviceCapabilities",
  "safeAreaInsets",
];

/**
 * Host-side session with a single view.
 *
 * AppBridge extends the MCP SDK's `Protocol` class. It owns the view's
 * {@link McpUiSession}, answers the `ui/initialize` handshake, proxies the
 * view's tool calls and resource reads to the server the view came from, and
 * sends tool input, results and host context to the view.
 *
 * ## Architecture
 *
 * **View ↔ [SandboxRelay] ↔ AppBridge ↔ Host ↔ MCP Server**
 *
 * Every message passes through a {@link SessionRouter}, which drops anything
 * the session's lifecycle does not accept at that moment.
 *
 * ## Lifecycle
 *
 * 1. **Create**: one AppBridge per rendered view
 * 2. **Connect**: `connect()` with the view's transport (`initializing`)
 * 3. **Handshake**: the view initializes (`ready`)
 * 4. **Send data**: `sendToolInput()`, `sendToolResult()`, ... (`interactive`)
 * 5. **Teardown**: `sendResourceTeardown()` (`tearingDown`, then `closed`)
 *
 * @example Basic usage
 * ```typescript
 * const registry = new ToolRegistry();
 * const server = registry.addServer("weather", clientBackend(client));
 * const bridge = new AppBridge(
 *   server,
 *   { name: "MyHost", version: "1.0.0" },
 *   { openLinks: {}, serverTools: {}, logging: {} },
 * );
 *
 * bridge.oninitialized = () => {
 *   void bridge.sendToolInput({ arguments: { location: "NYC" } });
 * };
 *
 * await bridge.connect(transport);
 * ```
 */
export class AppBridge extends Protocol<Request, Notification, Result> {
  private _appCapabilities?: McpUiAppCapabilities;
  private _appInfo?: Implementation;
  private _hostOptions: ResolvedHostOptions;
  private _log: Logger;
  private _session: McpUiSession;
  private _router?: SessionRouter;
  private _teardown?: Promise<McpUiTeardownOutcome>;

  /**
   * Create a new AppBridge instance.
   *
   * @param _server - Server the view's resource was loaded from; tool calls and
   *   resource reads from the view go here and nowhere else
   * @param _hostInfo - Host application identification (name and version)
   * @param _capabilities - Features and capabilities the host supports
   * @param options - Host configuration, see {@link HostOptions}
   */
  constructor(
    private _server: McpUiServerHandle,
    private _hostInfo: Implementation,
    private _capabilities: McpUiHostCapabilities,
    options?: HostOptions,
  ) {
    super(options);

    this._hostOptions = resolveHostOptions(options);
    this._log = this._hostOptions.logger;
    this._session = new McpUiSession({
      hostContext: this._hostOptions.hostContext,
      logger: this._log,
    });

    this.setRequestHandler(McpUiInitializeRequestSchema, (request) =>
      this._oninitialize(request),
    );
    this.setNotificationHandler(McpUiInitializedNotificationSchema, () =>
      this._oninitialized(),
    );
    this.setNotificationHandler(
      McpUiSandboxProxyReadyNotificationSchema,
      async () => {
        if (this._session.lifecycle.transition("initializing")) {
          await this.onsandboxready?.();
        }
      },
    );
    this.setRequestHandler(PingRequestSchema, (request, extra) => {
      this.onping?.(request.params, extra);
      return {};
    });
    this.setRequestHandler(
      McpUiRequestDisplayModeRequestSchema,
      (request, extra) => this._onrequestdisplaymode(request, extra),
    );

    if (this._capabilities.serverTools) {
      this._proxyTools();
    }
    if (this._capabilities.serverResources) {
      this._proxyResources();
    }
  }

  /**
   * Get the view's capabilities discovered during initialization.
   *
   * @returns View capabilities, or `undefined` if not yet initialized
   */
  getAppCapabilities(): McpUiAppCapabilities | undefined {
    return this._appCapabilities;
  }

  /**
   * Get the view's implementation info discovered during initialization.
   *
   * @returns View name and version, or `undefined` if not yet initialized
   */
  getAppVersion(): Implementation | undefined {
    return this._appInfo;
  }

  /**
   * Get the host capabilities passed to the constructor.
   */
  getCapabilities(): McpUiHostCapabilities {
    return this._capabilities;
  }

  /**
   * Capabilities agreed with the view, or `undefined` before `ui/initialize`.
   */
  getNegotiatedCapabilities(): McpUiNegotiatedCapabilities | undefined {
    return this._session.negotiated;
  }

  /** The session this bridge drives. */
  getSession(): McpUiSession {
    return this._session;
  }

  getState(): McpUiSessionState {
    return this._session.state;
  }

  /** Current host context snapshot, including accepted display-mode changes. */
  getHostContext(): McpUiHostContext {
    return this._session.hostContext;
  }

  /**
   * Optional observer for ping requests from the view. Pings are answered
   * whether or not it is set.
   */
  onping?: (params: PingRequest["params"], extra: RequestHandlerExtra) => void;

  /**
   * Called when the view completes initialization. The session is `ready`
   * (or already `interactive` when no tool call is pending) by the time it
   * runs, so tool input can be sent from here.
   *
   * @example
   * ```typescript
   * bridge.oninitialized = () => {
   *   void bridge.sendToolInput({ arguments: toolArgs });
   * };
   * ```
   */
  oninitialized?: () => void;

  /**
   * Called when a {@link relay.SandboxRelay} reports it is ready
   * (`sandboxProxy` mode only). Respond with {@link sendSandboxResourceReady}.
   *
   * @example
   * ```typescript
   * bridge.onsandboxready = async () => {
   *   await bridge.sendSandboxResourceReady({ html, csp: resource.meta?.csp });
   * };
   * ```
   */
  onsandboxready?: () => void | Promise<void>;

  /**
   * Decide on a display mode the view requested.
   *
   * Only called for modes both sides declared; other modes are declined
   * without asking. Return the mode that is now in effect. When unset, every
   * negotiated mode is accepted as requested.
   */
  onrequestdisplaymode?: (
    params: McpUiRequestDisplayModeRequest["params"],
    extra: RequestHandlerExtra,
  ) => Promise<McpUiRequestDisplayModeResult>;

  /**
   * Register a handler for size change notifications from the view.
   *
   * @example
   * ```typescript
   * bridge.onsizechange = ({ width, height }) => {
   *   renderer.resize(width, height);
   * };
   * ```
   */
  set onsizechange(
    callback: (params: McpUiSizeChangedNotification["params"]) => void,
  ) {
    this.setNotificationHandler(McpUiSizeChangedNotificationSchema, (n) =>
      callback(n.params),
    );
  }

  /**
   * Register a handler for `ui/message` requests from the view.
   *
   * Requires the `message` host capability. The host should not return
   * conversation content in the result.
   *
   * @example
   * ```typescript
   * bridge.onmessage = async ({ role, content }) => {
   *   await chat.append({ role, content, source: "app" });
   *   return {};
   * };
   * ```
   */
  set onmessage(
    callback: (
      params: McpUiMessageRequest["params"],
      extra: RequestHandlerExtra,
    ) => Promise<McpUiMessageResult>,
  ) {
    this.setRequestHandler(McpUiMessageRequestSchema, (request, extra) =>
      callback(request.params, extra),
    );
  }

  /**
   * Register a handler for external link requests from the view.
   *
   * Requires the `openLinks` host capability. Unparsable URLs and schemes
   * other than http(s) are refused before the callback runs. A callback
   * result with `isError: true` is sent to the view as a `-32000` error.
   *
   * @example
   * ```typescript
   * bridge.onopenlink = async ({ url }) => {
   *   if (!(await confirmWithUser(url))) {
   *     return { isError: true };
   *   }
   *   await openInBrowser(url);
   *   return {};
   * };
   * ```
   */
  set onopenlink(
    callback: (
      params: McpUiOpenLinkRequest["params"],
      extra: RequestHandlerExtra,
    ) => Promise<McpUiOpenLinkResult>,
  ) {
    this.setRequestHandler(
      McpUiOpenLinkRequestSchema,
      async (request, extra) => {
        const { url } = request.params;
        const parsed = parseUrl(url);
        if (!parsed) {
          throw denied(`Invalid URL: ${url}`);
        }
        if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
          throw denied(`Link denied: unsupported scheme ${parsed.protocol}`);
        }
        const result = await callback(request.params, extra);
        if (result.isError) {
          throw denied(`Link denied: ${url}`);
        }
        return result;
      },
    );
  }

  /**
   * Register a handler for `ui/update-model-context` requests.
   *
   * Requires the `updateModelContext` host capability. A result with
   * `isError: true` is sent to the view as a `-32000` error.
   */
  set onupdatemodelcontext(
    callback: (
      params: McpUiUpdateModelContextRequest["params"],
      extra: RequestHandlerExtra,
    ) => Promise<McpUiUpdateModelContextResult>,
  ) {
    this.setRequestHandler(
      McpUiUpdateModelContextRequestSchema,
      async (request, extra) => {
        const result = await callback(request.params, extra);
        if (result.isError) {
          throw denied("Model context update denied");
        }
        return {};
      },
    );
  }

  /**
   * Register a handler for logging messages from the view.
   *
   * @example
   * ```typescript
   * bridge.onloggingmessage = ({ level, logger, data }) => {
   *   console.log(`[${logger ?? "view"}] ${level}:`, data);
   * };
   * ```
   */
  set onloggingmessage(
    callback: (params: LoggingMessageNotification["params"]) => void,
  ) {
    this.setNotificationHandler(
      LoggingMessageNotificationSchema,
      async (notification) => {
        callback(notification.params);
      },
    );
  }

  /**
   * Verify that the view supports the capability required for a request the
   * host sends. Only consulted with `enforceStrictCapabilities`.
   * @internal
   */
  assertCapabilityForMethod(method: Request["method"]): void {
    switch (method) {
      case "tools/call":
      case "tools/list":
        if (!this._appCapabilities?.tools) {
          throw new Error(
            `View does not support tool capability (required for ${method})`,
          );
        }
        return;
    }
  }

  /**
   * Verify that the host declared the capability behind a handler being
   * registered.
   * @internal
   */
  assertRequestHandlerCapability(method: Request["method"]): void {
    switch (method) {
      case "ui/open-link":
        this._requireCapability("openLinks", method);
        return;
      case "ui/message":
        this._requireCapability("message", method);
        return;
      case "ui/update-model-context":
        this._requireCapability("updateModelContext", method);
        return;
      case "tools/call":
      case "tools/list":
        this._requireCapability("serverTools", method);
        return;
      case "resources/read":
        this._requireCapability("serverResources", method);
        return;
    }
  }

  /**
   * Host notifications carry no capability requirement on the view.
   * @internal
   */
  assertNotificationCapability(_method: Notification["method"]): void {}

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

  private _requireCapability(
    capability: keyof McpUiHostCapabilities,
    method: string,
  ): void {
    if (!this._capabilities[capability]) {
      throw new Error(
        `Host does not declare the ${capability} capability (required for ${method})`,
      );
    }
  }

  /**
   * Handle the ui/initialize request from the view.
   * @internal
   */
  private async _oninitialize(
    request: McpUiInitializeRequest,
  ): Promise<McpUiInitializeResult> {
    const { appCapabilities, appInfo, protocolVersion } = request.params;
    this._appCapabilities = appCapabilities;
    this._appInfo = appInfo;

    const negotiated = negotiateCapabilities({
      app: appCapabilities,
      host: this._capabilities,
      hostContext: this._session.hostContext,
      protocolVersion,
    });
    this._session.negotiated = negotiated;
    this._log.info(
      `View ${appInfo.name} ${appInfo.version} initializing (protocol ${negotiated.protocolVersion})`,
    );

    return {
      protocolVersion: negotiated.protocolVersion,
      hostCapabilities: this._capabilities,
      hostInfo: this._hostInfo,
      hostContext: this._session.hostContext,
    };
  }

  private _oninitialized(): void {
    const lifecycle = this._session.lifecycle;
    if (!lifecycle.transition("ready")) {
      return;
    }
    if (!this._session.hostContext.toolInfo) {
      lifecycle.transition("interactive");
    }
    this.oninitialized?.();
  }

  private async _onrequestdisplaymode(
    request: McpUiRequestDisplayModeRequest,
    extra: RequestHandlerExtra,
  ): Promise<McpUiRequestDisplayModeResult> {
    const current = this._session.hostContext.displayMode ?? "inline";
    const { mode } = request.params;
    const negotiated = this._session.negotiated;
    if (!negotiated || !supportsDisplayMode(negotiated, mode)) {
      this._log.info(`Declining display mode ${mode}; staying ${current}`);
      return { mode: current };
    }
    const result = this.onrequestdisplaymode
      ? await this.onrequestdisplaymode(request.params, extra)
      : { mode };
    if (!supportsDisplayMode(negotiated, result.mode)) {
      this._log.warn(
        `Host chose unsupported display mode ${result.mode}; staying ${current}`,
      );
      return { mode: current };
    }
    this._session.hostContext = {
      ...this._session.hostContext,
      displayMode: result.mode,
    };
    return { mode: result.mode };
  }

  private _proxyTools(): void {
    const server = this._server;

    this.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name } = request.params;
      const tool = await server.getTool(name);
      const decision = checkToolCall({
        caller: "app",
        name,
        tool,
        toolServerId: tool ? server.id : undefined,
        viewServerId: server.id,
      });
      if (!decision.allowed) {
        this._log.warn(`Rejecting tools/call from view: ${decision.reason}`);
        throw denied(decision.reason);
      }
      this._log.info(`Forwarding tools/call ${name} to ${server.id}`);
      return server.backend.callTool(request.params, {
        signal: extra.signal,
        timeout: this._hostOptions.requestTimeoutMs,
      });
    });

    this.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: filterToolsForRole(await server.listTools(), "app"),
    }));
  }

  private _proxyResources(): void {
    const backend = this._server.backend;
    this.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
      if (!backend.readResource) {
        throw new McpError(
          ErrorCode.MethodNotFound,
          `Server ${this._server.id} does not serve resources`,
        );
      }
      this._log.info(`Forwarding resources/read ${request.params.uri}`);
      return backend.readResource(request.params, {
        signal: extra.signal,
        timeout: this._hostOptions.requestTimeoutMs,
      });
    });
  }

  /**
   * Send a notification if the session admits it now.
   *
   * Refused and failed sends are logged and reported as values.
   */
  private async _deliver(
    notification: Notification,
  ): Promise<McpUiDeliveryResult> {
    const admission = this._session.admitOutbound({
      kind: "notification",
      method: notification.method,
    });
    if (!admission.admitted) {
      this._log.warn(`Not delivering ${notification.method}: ${admission.reason}`);
      return { delivered: false, reason: admission.reason };
    }
    try {
      await this.notification(notification);
      return { delivered: true };
    } catch (error) {
      const reason = toMcpError(error).message;
      this._log.warn(`Failed to deliver ${notification.method}: ${reason}`);
      return { delivered: false, reason };
    }
  }

  /**
   * Merge a partial host context into the snapshot and notify the view of
   * the fields that changed.
   *
   * Before the view is `ready` the snapshot is updated silently; the view
   * receives it in the initialize result.
   *
   * @example Update theme when user toggles dark mode
   * ```typescript
   * await bridge.setHostContext({ theme: "dark" });
   * ```
   */
  async setHostContext(
    update: McpUiHostContext,
  ): Promise<McpUiDeliveryResult> {
    const current = this._session.hostContext;
    const next: McpUiHostContext = { ...current };
    const changes: McpUiHostContext = {};
    let hasChanges = false;
    for (const key of HOST_CONTEXT_KEYS) {
      if (update[key] === undefined || deepEqual(current[key], update[key])) {
        continue;
      }
      copyField(next, update, key);
      copyField(changes, update, key);
      hasChanges = true;
    }
    if (!hasChanges) {
      return { delivered: false, reason: "host context unchanged" };
    }
    this._session.hostContext = next;
    if (!this._session.lifecycle.is("ready", "interactive")) {
      return { delivered: false, reason: "view not initialized yet" };
    }
    return this._deliver({
      method: "ui/notifications/host-context-changed",
      params: changes,
    });
  }

  /**
   * Send complete tool arguments to the view.
   *
   * Delivered once per session, after initialization; later calls are
   * refused.
   *
   * @example
   * ```typescript
   * bridge.oninitialized = () => {
   *   void bridge.sendToolInput({ arguments: { location: "New York" } });
   * };
   * ```
   */
  sendToolInput(
    params: McpUiToolInputNotification["params"],
  ): Promise<McpUiDeliveryResult> {
    return this._deliver({ method: "ui/notifications/tool-input", params });
  }

  /**
   * Send streaming partial tool arguments to the view. Refused once the
   * complete input has been sent.
   *
   * @example
   * ```typescript
   * await bridge.sendToolInputPartial({ arguments: { loc: "N" } });
   * await bridge.sendToolInputPartial({ arguments: { location: "New York" } });
   * await bridge.sendToolInput({ arguments: { location: "New York" } });
   * ```
   */
  sendToolInputPartial(
    params: McpUiToolInputPartialNotification["params"],
  ): Promise<McpUiDeliveryResult> {
    return this._deliver({
      method: "ui/notifications/tool-input-partial",
      params,
    });
  }

  /**
   * Send the tool execution result to the view.
   */
  sendToolResult(params: CallToolResult): Promise<McpUiDeliveryResult> {
    return this._deliver({ method: "ui/notifications/tool-result", params });
  }

  /**
   * Tell the view its tool call was cancelled.
   */
  sendToolCancelled(
    params: McpUiToolCancelledNotification["params"] = {},
  ): Promise<McpUiDeliveryResult> {
    return this._deliver({ method: "ui/notifications/tool-cancelled", params });
  }

  /**
   * Send the view's HTML to the sandbox relay (`sandboxProxy` mode).
   * @internal
   */
  sendSandboxResourceReady(
    params: McpUiSandboxResourceReadyNotification["params"],
  ): Promise<McpUiDeliveryResult> {
    return this._deliver({
      method: "ui/notifications/sandbox-resource-ready",
      params,
    });
  }

  /**
   * Check that the view still answers.
   */
  ping(options?: RequestOptions): Promise<McpUiRequestOutcome<{}>> {
    return settle(
      this.request({ method: "ping" }, EmptyResultSchema, {
        timeout: this._hostOptions.requestTimeoutMs,
        ...options,
      }),
    );
  }

  /**
   * Tear the view down.
   *
   * Sends `ui/resource-teardown` and waits for the answer within the
   * configured teardown bound, then closes the session and its channel
   * whatever happened. Calling it again returns the same promise.
   *
   * @example
   * ```typescript
   * const outcome = await bridge.sendResourceTeardown({ reason: "user closed" });
   * if (outcome.status === "timed-out") {
   *   log.warn("View did not confirm teardown");
   * }
   * renderer.unmount();
   * ```
   */
  sendResourceTeardown(
    params: McpUiResourceTeardownRequest["params"] = {},
    options?: RequestOptions,
  ): Promise<McpUiTeardownOutcome> {
    if (!this._teardown) {
      this._teardown = this._runTeardown(params, options);
    }
    return this._teardown;
  }

  private async _runTeardown(
    params: McpUiResourceTeardownRequest["params"],
    options?: RequestOptions,
  ): Promise<McpUiTeardownOutcome> {
    const lifecycle = this._session.lifecycle;
    const policy = this._hostOptions.teardown;

    let outcome: McpUiTeardownOutcome;
    if (lifecycle.is("closed")) {
      return { status: "skipped", reason: "session already closed" };
    } else if (policy.mode === "skip") {
      outcome = { status: "skipped", reason: "teardown policy is skip" };
    } else if (!lifecycle.is("ready", "interactive")) {
      outcome = { status: "skipped", reason: "view never finished initializing" };
    } else {
      lifecycle.transition("tearingDown");
      try {
        await this.request(
          { method: "ui/resource-teardown", params },
          McpUiResourceTeardownResultSchema,
          { ...options, timeout: policy.timeoutMs },
        );
        outcome = { status: "completed" };
      } catch (error) {
        const mcpError = toMcpError(error);
        outcome =
          mcpError.code === ErrorCode.RequestTimeout
            ? { status: "timed-out" }
            : { status: "failed", error: mcpError };
      }
    }

    this._log.info(`Session ${this._session.id} teardown: ${outcome.status}`);
    lifecycle.transition("closed");
    try {
      await this.close();
    } catch (error) {
      this._log.warn("Failed to close view channel:", error);
    }
    return outcome;
  }

  /**
   * Resolve once the view is initialized.
   *
   * @returns `true` when the session reached `ready`, `false` if it ended first
   */
  whenReady(): Promise<boolean> {
    const lifecycle = this._session.lifecycle;
    if (lifecycle.is("ready", "interactive")) {
      return Promise.resolve(true);
    }
    if (lifecycle.is("tearingDown", "closed")) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      const unsubscribe = lifecycle.onchange((to) => {
        if (to === "ready" || to === "tearingDown" || to === "closed") {
          unsubscribe();
          resolve(to === "ready");
        }
      });
    });
  }

  /**
   * Connect to the view.
   *
   * Wraps the transport in a {@link SessionRouter} bound to this bridge's
   * session. In direct mode the session starts initializing at once; in
   * `sandboxProxy` mode it waits for the relay's ready notification.
   *
   * @throws {Error} If the bridge is already connected
   */
  override async connect(transport: Transport): Promise<void> {
    if (this._router) {
      throw new Error("AppBridge is already connected");
    }
    this._router = new SessionRouter(transport, this._session, this._log);
    if (!this._hostOptions.sandboxProxy) {
      this._session.lifecycle.transition("initializing");
    }
    await super.connect(this._router);
  }
}

function parseUrl(value: string): URL | undefined {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
}

function copyField<K extends keyof McpUiHostContext>(
  target: McpUiHostContext,
  source: McpUiHostContext,
  key: K,
): void {
  target[key] = source[key];
}

function deepEqual(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
