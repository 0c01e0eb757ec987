import {
  type JSONRPCMessage,
  JSONRPCMessageSchema,
  RequestIdSchema,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod/v4";

import { type McpUiMethod, RELAY_CONTROL_PREFIX, UI_METHODS } from "./types.js";

const ParamsSchema = z.record(z.string(), z.unknown());

const RequestEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: RequestIdSchema,
  method: z.string().min(1),
  params: ParamsSchema.optional(),
});

const NotificationEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string().min(1),
  params: ParamsSchema.optional(),
});

const ResponseEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: RequestIdSchema,
  result: ParamsSchema,
});

const ErrorEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: RequestIdSchema,
  error: z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
  }),
});

/**
 * A decoded JSON-RPC message, tagged by kind.
 *
 * `message` is the validated wire message, kept so that routers and relays can
 * forward it verbatim. Method-bearing variants report whether the method is one
 * of the names in {@link UI_METHODS}; MCP methods such as `tools/call` or
 * `ping` are valid but unrecognized here and follow the generic rules.
 */
export type McpUiEnvelope =
  | {
      kind: "request";
      id: RequestId;
      method: string;
      params?: Record<string, unknown>;
      recognized: boolean;
      message: JSONRPCMessage;
    }
  | {
      kind: "notification";
      method: string;
      params?: Record<string, unknown>;
      recognized: boolean;
      message: JSONRPCMessage;
    }
  | {
      kind: "response";
      id: RequestId;
      result: Record<string, unknown>;
      message: JSONRPCMessage;
    }
  | {
      kind: "error";
      id: RequestId;
      code: number;
      errorMessage: string;
      data?: unknown;
      message: JSONRPCMessage;
    };

export type McpUiEnvelopeKind = McpUiEnvelope["kind"];

/**
 * Result of {@link decodeEnvelope}. Decoding never throws.
 */
export type DecodedEnvelope =
  | { ok: true; envelope: McpUiEnvelope }
  | { ok: false; reason: string };

const KNOWN_METHODS: ReadonlySet<string> = new Set(UI_METHODS);

/** Whether `method` is one of the canonical UI method names. */
export function isUiMethod(method: string): method is McpUiMethod {
  return KNOWN_METHODS.has(method);
}

/** Whether `method` is reserved for host ↔ relay control traffic. */
export function isRelayControlMethod(method: string): boolean {
  return method.startsWith(RELAY_CONTROL_PREFIX);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate an inbound payload and classify it as request, notification,
 * response or error.
 *
 * Exactly one of `method`, `result` and `error` must be present; a
 * method-bearing payload with an `id` is a request, without one a
 * notification.
 *
 * @example
 * ```typescript
 * const decoded = decodeEnvelope(raw);
 * if (!decoded.ok) {
 *   log.warn("Dropping malformed message:", decoded.reason);
 *   return;
 * }
 * ```
 */
export function decodeEnvelope(raw: unknown): DecodedEnvelope {
  if (!isRecord(raw)) {
    return { ok: false, reason: "Message is not an object" };
  }
  const bearing = ["method", "result", "error"].filter((key) => key in raw);
  if (bearing.length !== 1) {
    return {
      ok: false,
      reason: `Message must carry exactly one of method, result or error (found ${bearing.length === 0 ? "none" : bearing.join(", ")})`,
    };
  }

  const wire = JSONRPCMessageSchema.safeParse(raw);
  if (!wire.success) {
    return {
      ok: false,
      reason: `Invalid JSON-RPC message: ${wire.error.message}`,
    };
  }
  const message = wire.data;

  switch (bearing[0]) {
    case "method": {
      if ("id" in raw) {
        const parsed = RequestEnvelopeSchema.safeParse(raw);
        if (!parsed.success) {
          return { ok: false, reason: `Invalid request: ${parsed.error.message}` };
        }
        const { id, method, params } = parsed.data;
        return {
          ok: true,
          envelope: {
            kind: "request",
            id,
            method,
            params,
            recognized: isUiMethod(method),
            message,
          },
        };
      }
      const parsed = NotificationEnvelopeSchema.safeParse(raw);
      if (!parsed.success) {
        return {
          ok: false,
          reason: `Invalid notification: ${parsed.error.message}`,
        };
      }
      const { method, params } = parsed.data;
      return {
        ok: true,
        envelope: {
          kind: "notification",
          method,
          params,
          recognized: isUiMethod(method),
          message,
        },
      };
    }
    case "result": {
      const parsed = ResponseEnvelopeSchema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, reason: `Invalid response: ${parsed.error.message}` };
      }
      return {
        ok: true,
        envelope: {
          kind: "response",
          id: parsed.data.id,
          result: parsed.data.result,
          message,
        },
      };
    }
    default: {
      const parsed = ErrorEnvelopeSchema.safeParse(raw);
      if (!parsed.success) {
        return {
          ok: false,
          reason: `Invalid error response: ${parsed.error.message}`,
        };
      }
      const { id, error } = parsed.data;
      return {
        ok: true,
        envelope: {
          kind: "error",
          id,
          code: error.code,
          errorMessage: error.message,
          data: error.data,
          message,
        },
      };
    }
  }
}

/**
 * Short human-readable label for logs, e.g. `request ui/open-link #3`.
 */
export function describeEnvelope(envelope: McpUiEnvelope): string {
  switch (envelope.kind) {
    case "request":
      return `request ${envelope.method} #${envelope.id}`;
    case "notification":
      return `notification ${envelope.method}`;
    case "response":
      return `response #${envelope.id}`;
    case "error":
      return `error #${envelope.id} (${envelope.code})`;
  }
}
