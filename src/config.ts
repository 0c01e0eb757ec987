import {
  DEFAULT_REQUEST_TIMEOUT_MSEC,
  type ProtocolOptions,
} from "@modelcontextprotocol/sdk/shared/protocol.js";
import { z } from "zod/v4";

import { type Logger, createLogger } from "./logger.js";
import type { McpUiHostContext } from "./types.js";

/** Largest delay `setTimeout` honors. */
const MAX_TIMEOUT_MSEC = 2_147_483_647;

/** Default bound on waiting for the view's teardown response. */
export const DEFAULT_TEARDOWN_TIMEOUT_MSEC = 10_000;

/**
 * What the host does with `ui/resource-teardown`.
 *
 * - `await`: send the request and wait at most `timeoutMs` for the answer,
 *   then close the session either way
 * - `skip`: close the session without asking the view
 */
export type McpUiTeardownPolicy =
  | { mode: "await"; timeoutMs?: number }
  | { mode: "skip" };

const TimeoutSchema = z.number().int().positive().max(MAX_TIMEOUT_MSEC);

/**
 * Runtime validation schema for the tunable part of {@link HostOptions}.
 * @internal
 */
export const McpUiHostConfigSchema = z.object({
  requestTimeoutMs: TimeoutSchema.default(DEFAULT_REQUEST_TIMEOUT_MSEC),
  teardown: z
    .discriminatedUnion("mode", [
      z.object({
        mode: z.literal("await"),
        timeoutMs: TimeoutSchema.default(DEFAULT_TEARDOWN_TIMEOUT_MSEC),
      }),
      z.object({ mode: z.literal("skip") }),
    ])
    .default({ mode: "await", timeoutMs: DEFAULT_TEARDOWN_TIMEOUT_MSEC }),
  sandboxProxy: z.boolean().default(false),
});

/**
 * Options for configuring AppBridge behavior.
 *
 * @see ProtocolOptions from @modelcontextprotocol/sdk for the inherited options
 */
export type HostOptions = ProtocolOptions & {
  /** Initial host context; defaults to {@link DEFAULT_HOST_CONTEXT} */
  hostContext?: McpUiHostContext;
  /**
   * The view is rendered behind a {@link relay.SandboxRelay}: the session waits
   * for `ui/notifications/sandbox-proxy-ready` before it starts initializing.
   */
  sandboxProxy?: boolean;
  /** Bound on every request the host sends to the view */
  requestTimeoutMs?: number;
  /** Teardown handshake policy */
  teardown?: McpUiTeardownPolicy;
  /** Diagnostics sink; defaults to a console logger scoped `HOST` */
  logger?: Logger;
};

/**
 * {@link HostOptions} with defaults applied and values validated.
 */
export interface ResolvedHostOptions {
  hostContext: McpUiHostContext;
  sandboxProxy: boolean;
  requestTimeoutMs: number;
  teardown: { mode: "await"; timeoutMs: number } | { mode: "skip" };
  logger: Logger;
}

/**
 * Host context of a desktop host with an inline view of at most 800×600.
 */
export const DEFAULT_HOST_CONTEXT: McpUiHostContext = {
  theme: "light",
  displayMode: "inline",
  availableDisplayModes: ["inline"],
  containerDimensions: {
    width: { mode: "flexible", max: 800 },
    height: { mode: "flexible", max: 600 },
  },
  locale: "en-US",
  timeZone: "UTC",
  platform: "desktop",
  deviceCapabilities: { touch: false, hover: true },
};

/**
 * Apply defaults to host options and validate them.
 *
 * @throws {z.ZodError} If a timeout is not a positive integer within the
 *   range `setTimeout` accepts
 */
export function resolveHostOptions(
  options: HostOptions = {},
): ResolvedHostOptions {
  const config = McpUiHostConfigSchema.parse({
    requestTimeoutMs: options.requestTimeoutMs,
    teardown: options.teardown,
    sandboxProxy: options.sandboxProxy,
  });
  return {
    ...config,
    hostContext: options.hostContext ?? { ...DEFAULT_HOST_CONTEXT },
    logger: options.logger ?? createLogger("HOST"),
  };
}
