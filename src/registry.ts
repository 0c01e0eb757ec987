import type { Client } from "@modelcontextprotocol/sdk/client/index.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import {
  type CallToolRequest,
  type CallToolResult,
  CallToolResultSchema,
  ListToolsResultSchema,
  type ReadResourceRequest,
  type ReadResourceResult,
  ReadResourceResultSchema,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import { type Logger, silentLogger } from "./logger.js";

/**
 * What the host needs from one MCP server: its tool list (the registry side),
 * tool execution (the Tool Execution Backend) and resource reads (the
 * Resource Provider).
 */
export interface McpUiServerBackend {
  listTools(params?: {
    cursor?: string;
  }): Promise<{ tools: Tool[]; nextCursor?: string }>;
  callTool(
    params: CallToolRequest["params"],
    options?: RequestOptions,
  ): Promise<CallToolResult>;
  readResource?(
    params: ReadResourceRequest["params"],
    options?: RequestOptions,
  ): Promise<ReadResourceResult>;
}

/**
 * Adapt a connected MCP SDK client into a {@link McpUiServerBackend}.
 *
 * @example
 * ```typescript
 * const client = new Client(hostInfo, { capabilities: uiClientCapabilities() });
 * await client.connect(transport);
 * registry.addServer("weather", clientBackend(client));
 * ```
 */
export function clientBackend(
  client: Pick<Client, "request">,
): McpUiServerBackend {
  return {
    listTools: (params) =>
      client.request({ method: "tools/list", params }, ListToolsResultSchema),
    callTool: (params, options) =>
      client.request(
        { method: "tools/call", params },
        CallToolResultSchema,
        options,
      ),
    readResource: (params, options) =>
      client.request(
        { method: "resources/read", params },
        ReadResourceResultSchema,
        options,
      ),
  };
}

/**
 * A server registered with a {@link ToolRegistry}.
 *
 * Tool definitions are loaded lazily and cached. Concurrent readers share one
 * in-flight load; a failed load is forgotten so the next read retries.
 */
export class McpUiServerHandle {
  private _tools?: Promise<ReadonlyMap<string, Tool>>;

  constructor(
    readonly id: string,
    readonly backend: McpUiServerBackend,
    private _log: Logger = silentLogger,
  ) {}

  /** All tools of the server, keyed by name. */
  tools(): Promise<ReadonlyMap<string, Tool>> {
    if (!this._tools) {
      const loading = this._load();
      this._tools = loading;
      loading.catch((error: unknown) => {
        if (this._tools === loading) {
          this._tools = undefined;
        }
        this._log.warn(`Failed to load tools of ${this.id}:`, error);
      });
    }
    return this._tools;
  }

  async getTool(name: string): Promise<Tool | undefined> {
    return (await this.tools()).get(name);
  }

  async listTools(): Promise<Tool[]> {
    return [...(await this.tools()).values()];
  }

  /** Drop the cached tool list, e.g. after `notifications/tools/list_changed`. */
  invalidate(): void {
    this._tools = undefined;
  }

  private async _load(): Promise<ReadonlyMap<string, Tool>> {
    const tools = new Map<string, Tool>();
    let cursor: string | undefined;
    do {
      const page = await this.backend.listTools(cursor ? { cursor } : undefined);
      for (const tool of page.tools) {
        tools.set(tool.name, tool);
      }
      cursor = page.nextCursor;
    } while (cursor);
    this._log.debug(`Loaded ${tools.size} tools from ${this.id}`);
    return tools;
  }
}

/**
 * Tool and resource registry shared by every session of a host.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.addServer("weather", clientBackend(weatherClient));
 * const tool = await registry.getServer("weather")?.getTool("get-forecast");
 * ```
 */
export class ToolRegistry {
  private _servers = new Map<string, McpUiServerHandle>();

  constructor(private _log: Logger = silentLogger) {}

  /**
   * Register a server.
   *
   * @throws {Error} If a server with the same id is already registered
   */
  addServer(id: string, backend: McpUiServerBackend): McpUiServerHandle {
    if (this._servers.has(id)) {
      throw new Error(`Server already registered: ${id}`);
    }
    const handle = new McpUiServerHandle(id, backend, this._log);
    this._servers.set(id, handle);
    return handle;
  }

  getServer(id: string): McpUiServerHandle | undefined {
    return this._servers.get(id);
  }

  removeServer(id: string): boolean {
    return this._servers.delete(id);
  }

  servers(): McpUiServerHandle[] {
    return [...this._servers.values()];
  }

  /** Ids of every server providing a tool named `name`. */
  async findToolServers(name: string): Promise<string[]> {
    const matches = await Promise.all(
      this.servers().map(async (server) =>
        (await server.getTool(name)) ? server.id : undefined,
      ),
    );
    return matches.filter((id): id is string => id !== undefined);
  }
}
