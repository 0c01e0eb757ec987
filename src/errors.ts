import {
  type CallToolResult,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";

/**
 * JSON-RPC error code for implementation-defined denials: link denied, invalid
 * URL, policy violation, context-update denied, teardown error.
 */
export const UI_ERROR_CODE = -32000;

/**
 * Outcome of a host → view notification. A notification the session does not
 * admit in its current state is dropped and reported here instead of thrown.
 */
export type McpUiDeliveryResult =
  | { delivered: true }
  | { delivered: false; reason: string };

/**
 * Outcome of a request whose failure is reported as a value.
 */
export type McpUiRequestOutcome<T> =
  | { ok: true; result: T }
  | { ok: false; error: McpError };

/**
 * Outcome of a tool call made on behalf of the model or a view.
 */
export type McpUiToolCallOutcome = McpUiRequestOutcome<CallToolResult>;

/**
 * Outcome of the teardown handshake. In every case the session ends `closed`.
 *
 * - `completed`: the view acknowledged the teardown request
 * - `timed-out`: the view did not answer within the teardown bound
 * - `failed`: the view answered with an error, or the channel closed first
 * - `skipped`: no request was sent (view not initialized, or policy says skip)
 */
export type McpUiTeardownOutcome =
  | { status: "completed" }
  | { status: "timed-out" }
  | { status: "failed"; error: McpError }
  | { status: "skipped"; reason: string };

/**
 * Normalize any thrown value into an {@link McpError}.
 */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, error.message);
  }
  return new McpError(ErrorCode.InternalError, String(error));
}

/**
 * Run a request and fold its rejection into a {@link McpUiRequestOutcome}.
 */
export async function settle<T>(
  promise: Promise<T>,
): Promise<McpUiRequestOutcome<T>> {
  try {
    return { ok: true, result: await promise };
  } catch (error) {
    return { ok: false, error: toMcpError(error) };
  }
}

/** Create a denial error carrying {@link UI_ERROR_CODE}. */
export function denied(reason: string): McpError {
  return new McpError(UI_ERROR_CODE, reason);
}
