import type {
  Transport,
  TransportSendOptions,
} from "@modelcontextprotocol/sdk/shared/transport.js";
import type {
  JSONRPCMessage,
  MessageExtraInfo,
  RequestId,
} from "@modelcontextprotocol/sdk/types.js";

import { decodeEnvelope, describeEnvelope } from "./envelope.js";
import { denied } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import type { McpUiSession } from "./session.js";

/**
 * Transport decorator that sits between a session's `Protocol` and its channel.
 *
 * Every message in either direction is decoded and checked against the
 * session's lifecycle before it passes:
 *
 * - inbound messages the session does not admit are dropped and logged, so no
 *   handler sees them;
 * - inbound responses whose id matches no outstanding request are dropped;
 * - outbound notifications the session does not admit are dropped and logged;
 * - outbound requests the session does not admit are rejected with a `-32000`
 *   error so the awaiting caller settles at once;
 * - an outbound notification counts as delivered only once the channel
 *   accepted it, so a failed `tool-input` can be sent again.
 *
 * When the underlying channel closes the session moves to `closed`.
 *
 * @example
 * ```typescript
 * const router = new SessionRouter(channel, session, log);
 * await protocol.connect(router);
 * ```
 */
export class SessionRouter implements Transport {
  private _outstanding = new Set<RequestId>();

  constructor(
    private _inner: Transport,
    private _session: McpUiSession,
    private _log: Logger = silentLogger,
  ) {}

  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;
  sessionId?: string;
  setProtocolVersion?: (version: string) => void;

  /** Ids of outbound requests still awaiting an answer. */
  get outstanding(): ReadonlySet<RequestId> {
    return this._outstanding;
  }

  async start(): Promise<void> {
    this.sessionId = this._session.id;
    this._inner.onmessage = (message, extra) => this._receive(message, extra);
    this._inner.onerror = (error) => this.onerror?.(error);
    this._inner.onclose = () => {
      this._outstanding.clear();
      this._session.lifecycle.transition("closed");
      this.onclose?.();
    };
    await this._inner.start();
  }

  async send(
    message: JSONRPCMessage,
    options?: TransportSendOptions,
  ): Promise<void> {
    const decoded = decodeEnvelope(message);
    if (!decoded.ok) {
      throw new Error(`Refusing to send malformed message: ${decoded.reason}`);
    }
    const envelope = decoded.envelope;
    const admission = this._session.admitOutbound(envelope);
    if (!admission.admitted) {
      this._log.warn(
        `Dropping outbound ${describeEnvelope(envelope)}: ${admission.reason}`,
      );
      if (envelope.kind === "request") {
        throw denied(`Request ${envelope.method} refused: ${admission.reason}`);
      }
      return;
    }

    if (envelope.kind === "request") {
      this._outstanding.add(envelope.id);
    } else if (
      envelope.kind === "notification" &&
      envelope.method === "notifications/cancelled"
    ) {
      const requestId = envelope.params?.requestId;
      if (typeof requestId === "string" || typeof requestId === "number") {
        this._outstanding.delete(requestId);
      }
    }

    // The peer may react to a response before the send settles.
    if (envelope.kind === "response" || envelope.kind === "error") {
      this._session.recordOutbound(envelope);
    }
    this._log.debug(`Sending ${describeEnvelope(envelope)}`);
    try {
      await this._inner.send(message, options);
    } catch (error) {
      if (envelope.kind === "request") {
        this._outstanding.delete(envelope.id);
      }
      throw error;
    }
    if (envelope.kind === "notification") {
      this._session.recordOutbound(envelope);
    }
  }

  async close(): Promise<void> {
    await this._inner.close();
  }

  private _receive(message: JSONRPCMessage, extra?: MessageExtraInfo) {
    const decoded = decodeEnvelope(message);
    if (!decoded.ok) {
      this._log.warn(`Dropping malformed inbound message: ${decoded.reason}`);
      this.onerror?.(new Error(`Malformed message: ${decoded.reason}`));
      return;
    }
    const envelope = decoded.envelope;

    if (envelope.kind === "response" || envelope.kind === "error") {
      if (!this._outstanding.delete(envelope.id)) {
        this._log.warn(
          `Dropping ${describeEnvelope(envelope)}: no outstanding request with that id`,
        );
        return;
      }
    }

    const admission = this._session.admitInbound(envelope);
    if (!admission.admitted) {
      this._log.warn(
        `Dropping inbound ${describeEnvelope(envelope)}: ${admission.reason}`,
      );
      return;
    }
    this._session.recordInbound(envelope);
    this.onmessage?.(message, extra);
  }
}
