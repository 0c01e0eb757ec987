import { randomUUID } from "node:crypto";

import type { RequestId } from "@modelcontextprotocol/sdk/types.js";

import type { McpUiNegotiatedCapabilities } from "./capabilities.js";
import { type McpUiEnvelope, isRelayControlMethod } from "./envelope.js";
import { type McpUiSessionState, SessionLifecycle } from "./lifecycle.js";
import { type Logger, silentLogger } from "./logger.js";
import type { McpUiHostContext } from "./types.js";

/**
 * Whether a message may pass in the session's current state.
 */
export type McpUiAdmission =
  | { admitted: true }
  | { admitted: false; reason: string };

const ADMITTED: McpUiAdmission = { admitted: true };

function refuse(reason: string): McpUiAdmission {
  return { admitted: false, reason };
}

/** View → host methods accepted while the handshake is in progress. */
const HANDSHAKE_INBOUND: ReadonlySet<string> = new Set([
  "ui/initialize",
  "ui/notifications/initialized",
  "ping",
  "notifications/message",
  "notifications/cancelled",
]);

/** Host → view methods allowed before the view is ready. */
const HANDSHAKE_OUTBOUND: ReadonlySet<string> = new Set([
  "ui/notifications/sandbox-resource-ready",
  "ping",
  "notifications/cancelled",
]);

/** Host → view methods allowed while tearing down. */
const TEARDOWN_OUTBOUND: ReadonlySet<string> = new Set([
  "ui/resource-teardown",
  "notifications/cancelled",
]);

/**
 * Live state of one rendered view, owned by its host.
 *
 * Holds the lifecycle, the negotiated capabilities, the host-context snapshot
 * and the delivery flags that enforce tool-input ordering. The router asks it
 * whether each message may pass ({@link admitInbound}, {@link admitOutbound})
 * and reports what actually passed ({@link recordInbound},
 * {@link recordOutbound}).
 */
export class McpUiSession {
  readonly id: string;
  readonly lifecycle: SessionLifecycle;
  hostContext: McpUiHostContext;
  negotiated?: McpUiNegotiatedCapabilities;

  private _toolInputSent = false;
  private _toolInputPartialCount = 0;
  private _initializeRequestId?: RequestId;
  private _initializeAnswered = false;
  private _initializedReceived = false;

  constructor(
    options: {
      id?: string;
      hostContext?: McpUiHostContext;
      logger?: Logger;
    } = {},
  ) {
    this.id = options.id ?? randomUUID();
    this.hostContext = options.hostContext ?? {};
    this.lifecycle = new SessionLifecycle(options.logger ?? silentLogger);
  }

  get state(): McpUiSessionState {
    return this.lifecycle.state;
  }

  get toolInputSent(): boolean {
    return this._toolInputSent;
  }

  get toolInputPartialCount(): number {
    return this._toolInputPartialCount;
  }

  /** Whether the `ui/initialize` response has been sent. */
  get initializeAnswered(): boolean {
    return this._initializeAnswered;
  }

  /**
   * Decide whether a message from the view may be dispatched.
   */
  admitInbound(envelope: McpUiEnvelope): McpUiAdmission {
    const state = this.state;
    if (state === "closed") {
      return refuse("session is closed");
    }
    if (envelope.kind === "response" || envelope.kind === "error") {
      return ADMITTED;
    }

    const method = envelope.method;
    if (state === "created") {
      return method === "ui/notifications/sandbox-proxy-ready"
        ? ADMITTED
        : refuse(`${method} received before the view channel was established`);
    }
    if (isRelayControlMethod(method)) {
      return refuse(`relay control message ${method} after the view loaded`);
    }
    if (method === "ui/initialize") {
      return state === "initializing" && this._initializeRequestId === undefined
        ? ADMITTED
        : refuse("duplicate ui/initialize");
    }
    if (method === "ui/notifications/initialized") {
      if (this._initializedReceived) {
        return refuse("duplicate ui/notifications/initialized");
      }
      return this._initializeAnswered
        ? ADMITTED
        : refuse("ui/notifications/initialized before ui/initialize was answered");
    }
    if (state === "initializing" && !HANDSHAKE_INBOUND.has(method)) {
      return refuse(`${method} received before initialization completed`);
    }
    return ADMITTED;
  }

  /**
   * Decide whether a message to the view may be sent. Pure: nothing changes
   * until {@link recordOutbound} is called.
   */
  admitOutbound(
    envelope:
      | { kind: "request" | "notification"; method: string }
      | { kind: "response" }
      | { kind: "error" },
  ): McpUiAdmission {
    const state = this.state;
    if (state === "closed") {
      return refuse("session is closed");
    }
    if (envelope.kind === "response" || envelope.kind === "error") {
      return state === "created"
        ? refuse("no view channel established")
        : ADMITTED;
    }

    const method = envelope.method;
    switch (state) {
      case "created":
        return refuse(`${method} sent before the view channel was established`);
      case "initializing":
        return HANDSHAKE_OUTBOUND.has(method)
          ? ADMITTED
          : refuse(`${method} sent before the view finished initializing`);
      case "tearingDown":
        return TEARDOWN_OUTBOUND.has(method)
          ? ADMITTED
          : refuse(`${method} sent while the session is tearing down`);
    }

    if (method === "ui/notifications/sandbox-resource-ready") {
      return refuse("resource already loaded");
    }
    if (method === "ui/notifications/tool-input" && this._toolInputSent) {
      return refuse("tool-input was already delivered");
    }
    if (
      method === "ui/notifications/tool-input-partial" &&
      this._toolInputSent
    ) {
      return refuse("tool-input-partial after tool-input");
    }
    return ADMITTED;
  }

  /**
   * Record an admitted inbound message.
   */
  recordInbound(envelope: McpUiEnvelope): void {
    if (envelope.kind === "request" && envelope.method === "ui/initialize") {
      this._initializeRequestId = envelope.id;
    } else if (
      envelope.kind === "notification" &&
      envelope.method === "ui/notifications/initialized"
    ) {
      this._initializedReceived = true;
    }
  }

  /**
   * Record an admitted outbound message: the initialize response, and tool
   * input deliveries, which also move a `ready` session to `interactive`.
   */
  recordOutbound(envelope: McpUiEnvelope): void {
    if (envelope.kind === "response" || envelope.kind === "error") {
      if (
        this._initializeRequestId !== undefined &&
        envelope.id === this._initializeRequestId
      ) {
        this._initializeAnswered = envelope.kind === "response";
      }
      return;
    }
    if (envelope.kind !== "notification") {
      return;
    }
    if (envelope.method === "ui/notifications/tool-input") {
      this._toolInputSent = true;
    } else if (envelope.method === "ui/notifications/tool-input-partial") {
      this._toolInputPartialCount++;
    } else {
      return;
    }
    if (this.state === "ready") {
      this.lifecycle.transition("interactive");
    }
  }
}
