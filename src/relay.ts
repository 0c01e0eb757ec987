import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";

import { listPermissions } from "./capabilities.js";
import {
  decodeEnvelope,
  describeEnvelope,
  isRelayControlMethod,
} from "./envelope.js";
import { type Logger, createLogger } from "./logger.js";
import {
  type McpUiSecurityPolicy,
  buildSecurityPolicy,
  injectSecurityPolicy,
} from "./policy.js";
import {
  type McpUiSandboxProxyReadyNotification,
  type McpUiSandboxResourceReadyNotification,
  McpUiSandboxResourceReadyNotificationSchema,
} from "./types.js";

/**
 * What a {@link SandboxRelay} hands its renderer: the view's HTML with the CSP
 * `<meta>` tag already injected, plus the frame attributes to apply.
 */
export interface McpUiRenderedView {
  html: string;
  /** Sandbox attribute for the view's frame */
  sandbox: string;
  policy: McpUiSecurityPolicy;
}

/**
 * Loads a view and returns the transport that reaches it. The transport must
 * not be started; the relay starts it.
 */
export type McpUiViewRenderer = (
  view: McpUiRenderedView,
) => Transport | Promise<Transport>;

const PROXY_READY: McpUiSandboxProxyReadyNotification["method"] =
  "ui/notifications/sandbox-proxy-ready";

/**
 * Message relay between a host and a view loaded in an isolated context.
 *
 * ```
 * Host ↔ SandboxRelay ↔ View
 * ```
 *
 * On start the relay announces itself with
 * `ui/notifications/sandbox-proxy-ready`. It waits for
 * `ui/notifications/sandbox-resource-ready`, builds the security policy from
 * it, and asks its renderer to load the view. From then on every message is
 * forwarded verbatim, in order per direction. Messages with the reserved
 * `ui/notifications/sandbox-` prefix are consumed or dropped, never forwarded.
 * Host messages that arrive before the view is loaded are queued.
 *
 * @example
 * ```typescript
 * const relay = new SandboxRelay(hostTransport, async ({ html, sandbox }) => {
 *   const { port1, port2 } = new MessageChannel();
 *   startViewWorker(html, sandbox, port2);
 *   return new MessagePortTransport(port1);
 * });
 * await relay.start();
 * ```
 */
export class SandboxRelay {
  private _view?: Transport;
  private _pending: JSONRPCMessage[] = [];
  private _toView: Promise<void> = Promise.resolve();
  private _toHost: Promise<void> = Promise.resolve();
  private _loaded = false;
  private _closed = false;
  private _log: Logger;

  constructor(
    private _host: Transport,
    private _render: McpUiViewRenderer,
    options: { logger?: Logger } = {},
  ) {
    this._log = options.logger ?? createLogger("SANDBOX");
  }

  /** Called on forwarding and rendering failures. */
  onerror?: (error: Error) => void;

  /** Called once both sides are closed. */
  onclose?: () => void;

  /** Whether the view has been rendered and attached. */
  get loaded(): boolean {
    return this._view !== undefined;
  }

  /**
   * Listen to the host and announce readiness.
   */
  async start(): Promise<void> {
    this._host.onmessage = (message) => this._fromHost(message);
    this._host.onerror = (error) => this.onerror?.(error);
    this._host.onclose = () => {
      this.close().catch((error: unknown) => this._report(error));
    };
    await this._host.start();
    await this._host.send({ jsonrpc: "2.0", method: PROXY_READY, params: {} });
    this._log.info("Sandbox relay ready");
  }

  /**
   * Close both sides. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return;
    }
    this._closed = true;
    this._pending = [];
    const view = this._view;
    this._view = undefined;
    await view?.close();
    await this._host.close();
    this.onclose?.();
  }

  private _fromHost(message: JSONRPCMessage): void {
    const decoded = decodeEnvelope(message);
    if (!decoded.ok) {
      this._log.warn(`Dropping malformed host message: ${decoded.reason}`);
      return;
    }
    const envelope = decoded.envelope;
    if (
      (envelope.kind === "request" || envelope.kind === "notification") &&
      isRelayControlMethod(envelope.method)
    ) {
      if (envelope.method === "ui/notifications/sandbox-resource-ready") {
        this._toView = this._toView
          .then(() => this._load(envelope.message))
          .catch((error: unknown) => this._report(error));
      } else {
        this._log.warn(`Dropping host ${describeEnvelope(envelope)}`);
      }
      return;
    }
    this._toView = this._toView
      .then(() => this._forwardToView(message))
      .catch((error: unknown) => this._report(error));
  }

  private _fromView(message: JSONRPCMessage): void {
    const decoded = decodeEnvelope(message);
    if (!decoded.ok) {
      this._log.warn(`Dropping malformed view message: ${decoded.reason}`);
      return;
    }
    const envelope = decoded.envelope;
    if (
      (envelope.kind === "request" || envelope.kind === "notification") &&
      isRelayControlMethod(envelope.method)
    ) {
      this._log.warn(`Dropping view ${describeEnvelope(envelope)}`);
      return;
    }
    this._toHost = this._toHost
      .then(() => this._host.send(message))
      .catch((error: unknown) => this._report(error));
  }

  private async _forwardToView(message: JSONRPCMessage): Promise<void> {
    if (this._closed) {
      return;
    }
    if (!this._view) {
      this._pending.push(message);
      return;
    }
    await this._view.send(message);
  }

  private async _load(message: JSONRPCMessage): Promise<void> {
    if (this._loaded) {
      this._log.warn("Ignoring sandbox-resource-ready: resource already loaded");
      return;
    }
    const parsed = McpUiSandboxResourceReadyNotificationSchema.safeParse(message);
    if (!parsed.success) {
      throw new Error(
        `Invalid sandbox-resource-ready notification: ${parsed.error.message}`,
      );
    }
    this._loaded = true;
    const params: McpUiSandboxResourceReadyNotification["params"] =
      parsed.data.params;

    const policy = buildSecurityPolicy(
      { csp: params.csp, permissions: params.permissions },
      { grantedPermissions: listPermissions(params.permissions) },
    );
    const html = injectSecurityPolicy(params.html, policy);
    const sandbox = params.sandbox ?? policy.sandbox;
    this._log.info("Loading view with CSP:", policy.csp);

    let view: Transport | undefined;
    try {
      view = await this._render({ html, sandbox, policy });
      view.onmessage = (viewMessage) => this._fromView(viewMessage);
      view.onerror = (error) => this.onerror?.(error);
      view.onclose = () => {
        this.close().catch((error: unknown) => this._report(error));
      };
      await view.start();
    } catch (error) {
      // The relay is unusable without a view.
      this._view = view;
      await this.close();
      throw error;
    }
    if (this._closed) {
      await view.close();
      return;
    }
    this._view = view;

    for (const pending of this._pending.splice(0)) {
      await view.send(pending);
    }
  }

  private _report(error: unknown): void {
    const reported = error instanceof Error ? error : new Error(String(error));
    this._log.error("Relay failure:", reported.message);
    this.onerror?.(reported);
  }
}
