import type {
  Transport,
  TransportSendOptions,
} from "@modelcontextprotocol/sdk/shared/transport.js";
import type {
  JSONRPCMessage,
  MessageExtraInfo,
} from "@modelcontextprotocol/sdk/types.js";

import { decodeEnvelope } from "./envelope.js";
import { type Logger, silentLogger } from "./logger.js";

/**
 * One end of a structured-clone message channel.
 *
 * A `MessagePort` from `node:worker_threads`, a `Worker`, or the parent port
 * inside a worker all fit.
 */
export interface MessageEndpoint {
  postMessage(value: unknown): void;
  on(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
  close?(): void;
}

/**
 * JSON-RPC transport over a message channel endpoint.
 *
 * Connects a view running in a worker (or any isolated context reachable by
 * `postMessage`) with its host or sandbox relay. Incoming values are checked
 * to be well-formed JSON-RPC messages before they reach the protocol layer;
 * anything else is logged and reported through {@link onerror}.
 *
 * ## Usage
 *
 * **Host side**:
 * ```typescript
 * const { port1, port2 } = new MessageChannel();
 * const worker = new Worker(viewScript, { workerData: { port: port2 }, transferList: [port2] });
 * await bridge.connect(new MessagePortTransport(port1));
 * ```
 *
 * **View side (inside the worker)**:
 * ```typescript
 * await app.connect(new MessagePortTransport(workerData.port));
 * ```
 *
 * @see {@link app.App.connect} for view usage
 * @see {@link app-bridge.AppBridge.connect} for host usage
 */
export class MessagePortTransport implements Transport {
  private _listener: (value: unknown) => void;
  private _started = false;
  private _closed = false;
  private _log: Logger;

  /**
   * @param _endpoint - Channel end to send to and receive from
   * @param options.logger - Receives malformed-message diagnostics
   */
  constructor(
    private _endpoint: MessageEndpoint,
    options: { logger?: Logger } = {},
  ) {
    this._log = options.logger ?? silentLogger;
    this._listener = (value) => {
      const decoded = decodeEnvelope(value);
      if (!decoded.ok) {
        this._log.error("Failed to parse message:", decoded.reason);
        this.onerror?.(
          new Error("Invalid JSON-RPC message received: " + decoded.reason),
        );
        return;
      }
      this.onmessage?.(decoded.envelope.message);
    };
  }

  /**
   * Begin listening for messages on the endpoint.
   *
   * @throws {Error} If the transport was already started
   */
  async start(): Promise<void> {
    if (this._started) {
      throw new Error("MessagePortTransport already started");
    }
    this._started = true;
    this._endpoint.on("message", this._listener);
  }

  /**
   * Post a JSON-RPC message to the other end of the channel.
   *
   * @throws {Error} If the transport is closed
   */
  async send(
    message: JSONRPCMessage,
    _options?: TransportSendOptions,
  ): Promise<void> {
    if (this._closed) {
      throw new Error("MessagePortTransport is closed");
    }
    this._endpoint.postMessage(message);
  }

  /**
   * Stop listening, close the endpoint if it can be closed, and call
   * {@link onclose}. Closing twice has no further effect.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return;
    }
    this._closed = true;
    this._endpoint.off("message", this._listener);
    this._endpoint.close?.();
    this.onclose?.();
  }

  onclose?: () => void;

  /**
   * Called when a value that is not a well-formed JSON-RPC message arrives.
   */
  onerror?: (error: Error) => void;

  onmessage?: (message: JSONRPCMessage, extra?: MessageExtraInfo) => void;

  sessionId?: string;

  setProtocolVersion?: (version: string) => void;
}
