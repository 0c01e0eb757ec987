import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import {
  type CallToolRequest,
  type CallToolResult,
  ErrorCode,
  type Implementation,
  McpError,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod/v4";

import { AppBridge } from "./app-bridge.js";
import { permissionsFromList, resolveSandboxGrant } from "./capabilities.js";
import type { HostOptions } from "./config.js";
import {
  type McpUiDeliveryResult,
  type McpUiRequestOutcome,
  type McpUiTeardownOutcome,
  type McpUiToolCallOutcome,
  denied,
  settle,
} from "./errors.js";
import { type Logger, createLogger } from "./logger.js";
import {
  type McpUiSecurityPolicy,
  buildSecurityPolicy,
  restrictToApprovedDomains,
} from "./policy.js";
import {
  type McpUiServerBackend,
  type McpUiServerHandle,
  ToolRegistry,
} from "./registry.js";
import {
  type McpUiHostCapabilities,
  type McpUiResourceMeta,
  McpUiResourceMetaSchema,
  RESOURCE_MIME_TYPE,
} from "./types.js";
import { checkToolCall, filterToolsForRole } from "./visibility.js";

const UiResourceContentSchema = z.object({
  uri: z.string(),
  mimeType: z.string().optional(),
  text: z.string().optional(),
  blob: z.string().optional(),
  _meta: z.record(z.string(), z.unknown()).optional(),
});

/**
 * A UI resource read from a server, ready to be rendered.
 */
export interface McpUiLoadedResource {
  uri: string;
  html: string;
  /** `_meta.ui` as declared, with the CSP restricted to host-approved origins */
  meta: McpUiResourceMeta;
  policy: McpUiSecurityPolicy;
  /** Declared origins the host did not approve */
  droppedSources: string[];
}

/**
 * A tool as the model sees it, tagged with the server providing it.
 */
export interface McpUiModelTool {
  serverId: string;
  tool: Tool;
}

/**
 * Host-side facade over the registry and every live session.
 *
 * Owns the {@link ToolRegistry}, reads and vets UI resources, creates one
 * {@link AppBridge} per rendered view, and drives the tool-call flow into it.
 *
 * @example
 * ```typescript
 * const host = new AppHost({ name: "MyHost", version: "1.0.0" }, {
 *   openLinks: {},
 *   serverTools: {},
 *   sandbox: { csp: { connectDomains: ["https://*.example.com"] } },
 * });
 * host.addServer("weather", clientBackend(client));
 *
 * const loaded = await host.readUiResource("weather", "ui://weather/view.html");
 * if (loaded.ok) {
 *   const bridge = host.createSession("weather", { resource: loaded.result });
 *   await bridge.connect(relayTransport);
 * }
 * ```
 */
export class AppHost {
  readonly registry: ToolRegistry;
  private _sessions = new Map<string, AppBridge>();
  private _log: Logger;

  constructor(
    private _hostInfo: Implementation,
    private _capabilities: McpUiHostCapabilities,
    private _options: HostOptions = {},
  ) {
    this._log = _options.logger ?? createLogger("HOST");
    this.registry = new ToolRegistry(this._log);
  }

  addServer(id: string, backend: McpUiServerBackend): McpUiServerHandle {
    this._log.info(`Registering server ${id}`);
    return this.registry.addServer(id, backend);
  }

  /**
   * Every tool visible to the model, across all servers. Servers whose tool
   * list cannot be loaded are logged and left out.
   */
  async listModelTools(): Promise<McpUiModelTool[]> {
    const servers = this.registry.servers();
    const loaded = await Promise.allSettled(
      servers.map((server) => server.listTools()),
    );
    const tools: McpUiModelTool[] = [];
    loaded.forEach((result, index) => {
      const serverId = servers[index].id;
      if (result.status === "rejected") {
        this._log.warn(`Skipping tools of ${serverId}:`, result.reason);
        return;
      }
      for (const tool of filterToolsForRole(result.value, "model")) {
        tools.push({ serverId, tool });
      }
    });
    return tools;
  }

  /**
   * Call a tool on behalf of the model. Tools hidden from the model are
   * refused with a `-32000` error.
   */
  callToolAsModel(
    serverId: string,
    params: CallToolRequest["params"],
    options?: RequestOptions,
  ): Promise<McpUiToolCallOutcome> {
    return settle(this._callToolAsModel(serverId, params, options));
  }

  private async _callToolAsModel(
    serverId: string,
    params: CallToolRequest["params"],
    options?: RequestOptions,
  ): Promise<CallToolResult> {
    const server = this._requireServer(serverId);
    const decision = checkToolCall({
      caller: "model",
      name: params.name,
      tool: await server.getTool(params.name),
    });
    if (!decision.allowed) {
      throw denied(decision.reason);
    }
    return server.backend.callTool(params, options);
  }

  /**
   * Read a view's HTML and derive its security policy.
   *
   * The resource must be a `ui://` URI with exactly one content of MIME type
   * {@link RESOURCE_MIME_TYPE}. When the host declares approved origins in
   * `sandbox.csp`, undeclared ones are removed from the resource's CSP before
   * the policy is built.
   */
  readUiResource(
    serverId: string,
    uri: string,
  ): Promise<McpUiRequestOutcome<McpUiLoadedResource>> {
    return settle(this._readUiResource(serverId, uri));
  }

  private async _readUiResource(
    serverId: string,
    uri: string,
  ): Promise<McpUiLoadedResource> {
    if (!uri.startsWith("ui://")) {
      throw denied(`Invalid UI resource URI: ${JSON.stringify(uri)}`);
    }
    const server = this._requireServer(serverId);
    if (!server.backend.readResource) {
      throw new McpError(
        ErrorCode.MethodNotFound,
        `Server ${serverId} does not serve resources`,
      );
    }
    this._log.info("Reading UI resource:", uri);
    const resource = await server.backend.readResource({ uri });
    if (resource.contents.length !== 1) {
      throw new McpError(
        ErrorCode.InvalidParams,
        `Unexpected contents count: ${resource.contents.length}`,
      );
    }

    const parsed = UiResourceContentSchema.safeParse(resource.contents[0]);
    if (!parsed.success) {
      throw new McpError(
        ErrorCode.InvalidParams,
        `Invalid resource contents: ${parsed.error.message}`,
      );
    }
    const content = parsed.data;
    if (content.mimeType !== RESOURCE_MIME_TYPE) {
      throw denied(`Unsupported MIME type: ${content.mimeType}`);
    }
    const html =
      content.blob !== undefined
        ? Buffer.from(content.blob, "base64").toString("utf8")
        : content.text;
    if (html === undefined) {
      throw new McpError(ErrorCode.InvalidParams, `Resource ${uri} has no body`);
    }

    let meta: McpUiResourceMeta = {};
    if (content._meta?.ui !== undefined) {
      const declared = McpUiResourceMetaSchema.safeParse(content._meta.ui);
      if (declared.success) {
        meta = declared.data;
      } else {
        this._log.warn(
          `Ignoring malformed _meta.ui of ${uri}:`,
          declared.error.message,
        );
      }
    }

    const grant = resolveSandboxGrant(this._capabilities);
    let droppedSources: string[] = [];
    if (grant.csp && meta.csp) {
      const restricted = restrictToApprovedDomains(meta.csp, grant.csp);
      meta = { ...meta, csp: restricted.csp };
      droppedSources = restricted.dropped;
      if (droppedSources.length > 0) {
        this._log.warn(
          `Dropped origins of ${uri} not approved by the host:`,
          droppedSources,
        );
      }
    }

    const policy = buildSecurityPolicy(meta, {
      grantedPermissions: grant.permissions,
    });
    if (policy.rejectedSources.length > 0) {
      this._log.warn(
        `Ignored invalid CSP sources of ${uri}:`,
        policy.rejectedSources,
      );
    }
    return { uri, html, meta, policy, droppedSources };
  }

  /**
   * Create the session for one view of `serverId`.
   *
   * With a `resource`, the session runs behind a sandbox relay: it waits for
   * the relay's ready notification and answers it with the resource.
   *
   * @throws {Error} If the server is not registered
   */
  createSession(
    serverId: string,
    options: HostOptions & { resource?: McpUiLoadedResource } = {},
  ): AppBridge {
    const server = this._requireServer(serverId);
    const { resource, ...hostOptions } = options;
    const bridge = new AppBridge(server, this._hostInfo, this._capabilities, {
      ...this._options,
      logger: this._log,
      ...hostOptions,
      sandboxProxy: resource !== undefined || hostOptions.sandboxProxy,
    });
    const session = bridge.getSession();

    if (resource) {
      bridge.onsandboxready = async () => {
        const delivery = await bridge.sendSandboxResourceReady({
          html: resource.html,
          csp: resource.meta.csp,
          permissions: permissionsFromList(resource.policy.permissions),
        });
        if (!delivery.delivered) {
          this._log.warn(`Resource not delivered: ${delivery.reason}`);
        }
      };
    }

    this._sessions.set(session.id, bridge);
    const unsubscribe = session.lifecycle.onchange((to) => {
      if (to === "closed") {
        unsubscribe();
        this._sessions.delete(session.id);
      }
    });
    this._log.info(`Created session ${session.id} for ${serverId}`);
    return bridge;
  }

  getSession(id: string): AppBridge | undefined {
    return this._sessions.get(id);
  }

  sessions(): AppBridge[] {
    return [...this._sessions.values()];
  }

  /**
   * Tear a session down. Unknown ids are reported as skipped.
   */
  async closeSession(id: string, reason?: string): Promise<McpUiTeardownOutcome> {
    const bridge = this._sessions.get(id);
    if (!bridge) {
      return { status: "skipped", reason: `Unknown session: ${id}` };
    }
    return bridge.sendResourceTeardown({ reason });
  }

  /**
   * Drive a tool call into a view: wait for it to initialize, send the
   * complete input, then the result once `result` settles. A rejected
   * `result` is sent as a cancellation.
   */
  async deliverToolCall(
    bridge: AppBridge,
    call: {
      arguments?: Record<string, unknown>;
      result: Promise<CallToolResult>;
    },
  ): Promise<McpUiDeliveryResult> {
    if (!(await bridge.whenReady())) {
      return {
        delivered: false,
        reason: "session ended before the view initialized",
      };
    }
    const input = await bridge.sendToolInput({ arguments: call.arguments });
    if (!input.delivered) {
      return input;
    }
    const outcome = await settle(call.result);
    if (outcome.ok) {
      return bridge.sendToolResult(outcome.result);
    }
    return bridge.sendToolCancelled({ reason: outcome.error.message });
  }

  private _requireServer(id: string): McpUiServerHandle {
    const server = this.registry.getServer(id);
    if (!server) {
      throw new Error(`Unknown server: ${id}`);
    }
    return server;
  }
}
