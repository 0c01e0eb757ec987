import { type Logger, silentLogger } from "./logger.js";

/**
 * Lifecycle states of a view session, in the only order they can be entered.
 *
 * - `created`: session exists, no channel to the view yet
 * - `initializing`: channel established, `ui/initialize` handshake in progress
 * - `ready`: handshake complete, application messages may flow
 * - `interactive`: tool input delivered, or no tool call pending
 * - `tearingDown`: teardown request sent, awaiting the view's answer
 * - `closed`: session ended; nothing is sent or accepted
 */
export type McpUiSessionState =
  | "created"
  | "initializing"
  | "ready"
  | "interactive"
  | "tearingDown"
  | "closed";

const TRANSITIONS: Record<McpUiSessionState, readonly McpUiSessionState[]> = {
  created: ["initializing", "tearingDown", "closed"],
  initializing: ["ready", "tearingDown", "closed"],
  ready: ["interactive", "tearingDown", "closed"],
  interactive: ["tearingDown", "closed"],
  tearingDown: ["closed"],
  closed: [],
};

/**
 * Per-session state machine. States only move forward; teardown and closure
 * are reachable from every live state.
 *
 * @example
 * ```typescript
 * const lifecycle = new SessionLifecycle();
 * lifecycle.transition("initializing"); // true
 * lifecycle.transition("created"); // false, logged and ignored
 * ```
 */
export class SessionLifecycle {
  private _state: McpUiSessionState = "created";
  private _history: McpUiSessionState[] = ["created"];
  private _listeners: Array<
    (to: McpUiSessionState, from: McpUiSessionState) => void
  > = [];

  constructor(private _log: Logger = silentLogger) {}

  get state(): McpUiSessionState {
    return this._state;
  }

  /** Every state entered so far, starting with `created`. */
  get history(): readonly McpUiSessionState[] {
    return this._history;
  }

  is(...states: McpUiSessionState[]): boolean {
    return states.includes(this._state);
  }

  /** Whether `to` can be entered from the current state. */
  canTransition(to: McpUiSessionState): boolean {
    return TRANSITIONS[this._state].includes(to);
  }

  /**
   * Move to `to` if the transition is legal.
   *
   * @returns `true` if the state changed; an illegal transition is logged and
   *   leaves the state untouched
   */
  transition(to: McpUiSessionState): boolean {
    if (!this.canTransition(to)) {
      this._log.debug(`Ignoring transition ${this._state} -> ${to}`);
      return false;
    }
    const from = this._state;
    this._state = to;
    this._history.push(to);
    this._log.debug(`Session ${from} -> ${to}`);
    for (const listener of this._listeners) {
      listener(to, from);
    }
    return true;
  }

  /**
   * Subscribe to state changes.
   *
   * @returns Function that removes the listener
   */
  onchange(
    listener: (to: McpUiSessionState, from: McpUiSessionState) => void,
  ): () => void {
    this._listeners.push(listener);
    return () => {
      this._listeners = this._listeners.filter((l) => l !== listener);
    };
  }
}
