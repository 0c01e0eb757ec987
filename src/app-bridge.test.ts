import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import {
  type CallToolRequest,
  type CallToolResult,
  EmptyResultSchema,
  ErrorCode,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import { App } from "./app.js";
import { AppBridge } from "./app-bridge.js";
import { DEFAULT_HOST_CONTEXT, type HostOptions } from "./config.js";
import { type Logger, silentLogger } from "./logger.js";
import { McpUiServerHandle } from "./registry.js";
import type { McpUiHostCapabilities } from "./types.js";

/** Wait for pending microtasks to complete */
const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

const testHostInfo = { name: "TestHost", version: "1.0.0" };
const testAppInfo = { name: "TestApp", version: "1.0.0" };
const testHostCapabilities: McpUiHostCapabilities = {
  openLinks: {},
  serverTools: {},
  logging: {},
  message: {},
  updateModelContext: {},
};

const weatherTool: Tool = {
  name: "get-weather",
  inputSchema: { type: "object" },
};
const modelOnlyTool: Tool = {
  name: "refresh-cache",
  inputSchema: { type: "object" },
  _meta: { ui: { visibility: ["model"] } },
};
const appOnlyTool: Tool = {
  name: "poll-status",
  inputSchema: { type: "object" },
  _meta: { ui: { visibility: ["app"] } },
};

/**
 * Create a server handle backed by a fixed tool list. Only implements what
 * AppBridge calls.
 */
function createServer(tools: Tool[] = [weatherTool, modelOnlyTool, appOnlyTool]) {
  const callTool = vi.fn(
    async (params: CallToolRequest["params"]): Promise<CallToolResult> => ({
      content: [{ type: "text", text: `called ${params.name}` }],
    }),
  );
  const server = new McpUiServerHandle("weather", {
    listTools: async () => ({ tools }),
    callTool,
  });
  return { server, callTool };
}

function createBridge(options: HostOptions = {}) {
  const { server, callTool } = createServer();
  const bridge = new AppBridge(server, testHostInfo, testHostCapabilities, {
    logger: silentLogger,
    ...options,
  });
  return { bridge, callTool };
}

describe("App <-> AppBridge integration", () => {
  let app: App;
  let bridge: AppBridge;
  let callTool: ReturnType<typeof createServer>["callTool"];
  let appTransport: InMemoryTransport;
  let bridgeTransport: InMemoryTransport;

  beforeEach(() => {
    [appTransport, bridgeTransport] = InMemoryTransport.createLinkedPair();
    app = new App(testAppInfo, {}, { logger: silentLogger });
    ({ bridge, callTool } = createBridge());
  });

  afterEach(async () => {
    await appTransport.close();
    await bridgeTransport.close();
  });

  describe("initialization handshake", () => {
    it("App.connect() triggers bridge.oninitialized", async () => {
      let initializedFired = false;

      bridge.oninitialized = () => {
        initializedFired = true;
      };

      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      expect(initializedFired).toBe(true);
    });

    it("App receives host info, capabilities and context after connect", async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      expect(app.getHostVersion()).toEqual(testHostInfo);
      expect(app.getHostCapabilities()).toEqual(testHostCapabilities);
      expect(app.getHostContext().displayMode).toBe("inline");
      expect(app.getProtocolVersion()).toBe("2026-01-26");
    });

    it("Bridge receives app info and capabilities after initialization", async () => {
      const appCapabilities = { tools: { listChanged: true } };
      app = new App(testAppInfo, appCapabilities, { logger: silentLogger });

      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      expect(bridge.getAppVersion()).toEqual(testAppInfo);
      expect(bridge.getAppCapabilities()).toEqual(appCapabilities);
      expect(bridge.getNegotiatedCapabilities()?.appTools).toBe(true);
    });

    it("goes straight to interactive when no tool call is pending", async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      expect(bridge.getSession().lifecycle.history).toEqual([
        "created",
        "initializing",
        "ready",
        "interactive",
      ]);
    });

    it("stays ready until tool input is delivered", async () => {
      ({ bridge } = createBridge({
        hostContext: {
          ...DEFAULT_HOST_CONTEXT,
          toolInfo: { id: 7, tool: weatherTool },
        },
      }));
      const received: unknown[] = [];
      app.ontoolinput = (params) => {
        received.push(params.arguments);
      };

      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);
      expect(bridge.getState()).toBe("ready");
      expect(app.getHostContext().toolInfo?.tool.name).toBe("get-weather");

      await bridge.sendToolInput({ arguments: { location: "NYC" } });

      expect(bridge.getState()).toBe("interactive");
      expect(received).toEqual([{ location: "NYC" }]);
    });
  });

  describe("Host -> App notifications", () => {
    beforeEach(async () => {
      await bridge.connect(bridgeTransport);
    });

    it("sendToolInput triggers app.ontoolinput", async () => {
      const receivedArgs: unknown[] = [];
      app.ontoolinput = (params) => {
        receivedArgs.push(params.arguments);
      };

      await app.connect(appTransport);
      const delivery = await bridge.sendToolInput({
        arguments: { location: "NYC" },
      });

      expect(delivery).toEqual({ delivered: true });
      expect(receivedArgs).toEqual([{ location: "NYC" }]);
    });

    it("delivers tool input only once", async () => {
      const receivedArgs: unknown[] = [];
      app.ontoolinput = (params) => {
        receivedArgs.push(params.arguments);
      };

      await app.connect(appTransport);
      await bridge.sendToolInput({ arguments: { location: "NYC" } });
      const second = await bridge.sendToolInput({
        arguments: { location: "LA" },
      });

      expect(second).toEqual({
        delivered: false,
        reason: "tool-input was already delivered",
      });
      expect(receivedArgs).toEqual([{ location: "NYC" }]);
    });

    it("does not deliver tool input before the view initializes", async () => {
      const delivery = await bridge.sendToolInput({ arguments: {} });

      expect(delivery).toEqual({
        delivered: false,
        reason:
          "ui/notifications/tool-input sent before the view finished initializing",
      });
      expect(bridge.getSession().toolInputSent).toBe(false);
    });

    it("sendToolInputPartial triggers app.ontoolinputpartial", async () => {
      const receivedArgs: unknown[] = [];
      app.ontoolinputpartial = (params) => {
        receivedArgs.push(params.arguments);
      };

      await app.connect(appTransport);
      await bridge.sendToolInputPartial({ arguments: { loc: "N" } });
      await bridge.sendToolInputPartial({ arguments: { location: "NYC" } });

      expect(receivedArgs).toEqual([{ loc: "N" }, { location: "NYC" }]);
      expect(bridge.getSession().toolInputPartialCount).toBe(2);
    });

    it("refuses partial input after the complete input", async () => {
      await app.connect(appTransport);
      await bridge.sendToolInput({ arguments: { location: "NYC" } });

      const late = await bridge.sendToolInputPartial({ arguments: {} });

      expect(late).toEqual({
        delivered: false,
        reason: "tool-input-partial after tool-input",
      });
    });

    it("sendToolResult triggers app.ontoolresult", async () => {
      const receivedResults: unknown[] = [];
      app.ontoolresult = (params) => {
        receivedResults.push(params);
      };

      await app.connect(appTransport);
      await bridge.sendToolResult({
        content: [{ type: "text", text: "Weather: Sunny" }],
      });

      expect(receivedResults).toHaveLength(1);
      expect(receivedResults[0]).toEqual({
        content: [{ type: "text", text: "Weather: Sunny" }],
      });
    });

    it("sendToolCancelled triggers app.ontoolcancelled", async () => {
      const reasons: unknown[] = [];
      app.ontoolcancelled = (params) => {
        reasons.push(params.reason);
      };

      await app.connect(appTransport);
      await bridge.sendToolCancelled({ reason: "user stopped" });

      expect(reasons).toEqual(["user stopped"]);
    });

    it("setHostContext triggers app.onhostcontextchanged", async () => {
      const receivedContexts: unknown[] = [];
      app.onhostcontextchanged = (params) => {
        receivedContexts.push(params);
      };

      await app.connect(appTransport);
      await bridge.setHostContext({ theme: "dark" });
      await flush();

      expect(receivedContexts).toEqual([{ theme: "dark" }]);
      expect(app.getHostContext().theme).toBe("dark");
      expect(app.getHostContext().locale).toBe("en-US");
    });

    it("setHostContext only sends changed values", async () => {
      const receivedContexts: unknown[] = [];
      app.onhostcontextchanged = (params) => {
        receivedContexts.push(params);
      };

      await app.connect(appTransport);

      await bridge.setHostContext({ theme: "dark", locale: "fr-FR" });
      await flush();
      const unchanged = await bridge.setHostContext({
        theme: "dark",
        locale: "fr-FR",
      });
      await flush();
      await bridge.setHostContext({ theme: "light", locale: "fr-FR" });
      await flush();

      expect(unchanged).toEqual({
        delivered: false,
        reason: "host context unchanged",
      });
      expect(receivedContexts).toEqual([
        { theme: "dark", locale: "fr-FR" },
        { theme: "light" },
      ]);
    });

    it("setHostContext before initialization updates the initial context", async () => {
      const result = await bridge.setHostContext({ theme: "dark" });
      await app.connect(appTransport);

      expect(result).toEqual({
        delivered: false,
        reason: "view not initialized yet",
      });
      expect(app.getHostContext().theme).toBe("dark");
    });
  });

  describe("App -> Host notifications", () => {
    beforeEach(async () => {
      await bridge.connect(bridgeTransport);
    });

    it("app.sendSizeChanged triggers bridge.onsizechange", async () => {
      const receivedSizes: unknown[] = [];
      bridge.onsizechange = (params) => {
        receivedSizes.push(params);
      };

      await app.connect(appTransport);
      await app.sendSizeChanged({ width: 400, height: 600 });

      expect(receivedSizes).toEqual([{ width: 400, height: 600 }]);
    });

    it("app.sendLog triggers bridge.onloggingmessage", async () => {
      const receivedLogs: unknown[] = [];
      bridge.onloggingmessage = (params) => {
        receivedLogs.push(params);
      };

      await app.connect(appTransport);
      await app.sendLog({
        level: "info",
        data: "Test log message",
        logger: "TestApp",
      });

      expect(receivedLogs).toHaveLength(1);
      expect(receivedLogs[0]).toMatchObject({
        level: "info",
        data: "Test log message",
        logger: "TestApp",
      });
    });
  });

  describe("App -> Host requests", () => {
    beforeEach(async () => {
      await bridge.connect(bridgeTransport);
    });

    it("app.sendMessage triggers bridge.onmessage and returns result", async () => {
      const receivedMessages: unknown[] = [];
      bridge.onmessage = async (params) => {
        receivedMessages.push(params);
        return {};
      };

      await app.connect(appTransport);
      const result = await app.sendMessage({
        role: "user",
        content: [{ type: "text", text: "Hello from app" }],
      });

      expect(receivedMessages).toHaveLength(1);
      expect(receivedMessages[0]).toMatchObject({
        role: "user",
        content: [{ type: "text", text: "Hello from app" }],
      });
      expect(result).toEqual({});
    });

    it("app.sendMessage returns error result when handler indicates error", async () => {
      bridge.onmessage = async () => {
        return { isError: true };
      };

      await app.connect(appTransport);
      const result = await app.sendMessage({
        role: "user",
        content: [{ type: "text", text: "Test" }],
      });

      expect(result.isError).toBe(true);
    });

    it("app.sendOpenLink triggers bridge.onopenlink and returns result", async () => {
      const receivedLinks: string[] = [];
      bridge.onopenlink = async (params) => {
        receivedLinks.push(params.url);
        return {};
      };

      await app.connect(appTransport);
      const result = await app.sendOpenLink({ url: "https://example.com" });

      expect(receivedLinks).toEqual(["https://example.com"]);
      expect(result).toEqual({});
    });

    it("app.sendOpenLink rejects when host denies", async () => {
      bridge.onopenlink = async () => {
        return { isError: true };
      };

      await app.connect(appTransport);

      await expect(
        app.sendOpenLink({ url: "https://blocked.example.com" }),
      ).rejects.toMatchObject({ code: -32000 });
    });

    it.each(["not a url", "javascript:alert(1)", "file:///etc/passwd"])(
      "refuses %s without asking the host callback",
      async (url) => {
        const onopenlink = vi.fn(async () => ({}));
        bridge.onopenlink = onopenlink;

        await app.connect(appTransport);

        await expect(app.sendOpenLink({ url })).rejects.toMatchObject({
          code: -32000,
        });
        expect(onopenlink).not.toHaveBeenCalled();
      },
    );

    it("app.updateModelContext reaches bridge.onupdatemodelcontext", async () => {
      const updates: unknown[] = [];
      bridge.onupdatemodelcontext = async (params) => {
        updates.push(params.structuredContent);
        return {};
      };

      await app.connect(appTransport);
      const result = await app.updateModelContext({
        structuredContent: { selection: "row-3" },
      });

      expect(result).toEqual({});
      expect(updates).toEqual([{ selection: "row-3" }]);
    });

    it("app.updateModelContext rejects when the host declines", async () => {
      bridge.onupdatemodelcontext = async () => ({ isError: true });

      await app.connect(appTransport);

      const error = await app
        .updateModelContext({ content: [{ type: "text", text: "state" }] })
        .catch((e: unknown) => e);
      expect(error).toMatchObject({ code: -32000 });
      expect(String(error)).toContain("Model context update denied");
    });
  });

  describe("display modes", () => {
    beforeEach(async () => {
      ({ bridge } = createBridge({
        hostContext: {
          ...DEFAULT_HOST_CONTEXT,
          availableDisplayModes: ["inline", "fullscreen"],
        },
      }));
      app = new App(
        testAppInfo,
        { availableDisplayModes: ["inline", "fullscreen", "pip"] },
        { logger: silentLogger },
      );
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);
    });

    it("negotiates the modes both sides declare", () => {
      expect(bridge.getNegotiatedCapabilities()?.displayModes).toEqual([
        "inline",
        "fullscreen",
      ]);
    });

    it("declines a mode the host does not offer by echoing the current one", async () => {
      const result = await app.requestDisplayMode({ mode: "pip" });

      expect(result).toEqual({ mode: "inline" });
      expect(bridge.getHostContext().displayMode).toBe("inline");
    });

    it("accepts a negotiated mode and records it", async () => {
      const result = await app.requestDisplayMode({ mode: "fullscreen" });

      expect(result).toEqual({ mode: "fullscreen" });
      expect(bridge.getHostContext().displayMode).toBe("fullscreen");
      expect(app.getHostContext().displayMode).toBe("fullscreen");
    });

    it("lets the host callback decide the final mode", async () => {
      bridge.onrequestdisplaymode = async () => ({ mode: "inline" });

      const result = await app.requestDisplayMode({ mode: "fullscreen" });

      expect(result).toEqual({ mode: "inline" });
    });

    it("keeps the current mode when the host callback picks an unsupported one", async () => {
      bridge.onrequestdisplaymode = async () => ({ mode: "pip" });

      const result = await app.requestDisplayMode({ mode: "fullscreen" });

      expect(result).toEqual({ mode: "inline" });
      expect(bridge.getHostContext().displayMode).toBe("inline");
    });
  });

  describe("display modes the view does not declare", () => {
    beforeEach(async () => {
      ({ bridge } = createBridge({
        hostContext: {
          ...DEFAULT_HOST_CONTEXT,
          availableDisplayModes: ["inline", "fullscreen", "pip"],
        },
      }));
      app = new App(
        testAppInfo,
        { availableDisplayModes: ["inline", "fullscreen"] },
        { logger: silentLogger },
      );
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);
    });

    it("declines a mode only the host offers", async () => {
      const onrequestdisplaymode = vi.fn(async () => ({ mode: "pip" as const }));
      bridge.onrequestdisplaymode = onrequestdisplaymode;

      const result = await app.requestDisplayMode({ mode: "pip" });

      expect(result).toEqual({ mode: "inline" });
      expect(onrequestdisplaymode).not.toHaveBeenCalled();
      expect(bridge.getHostContext().displayMode).toBe("inline");
    });
  });

  describe("server tool proxy", () => {
    beforeEach(async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);
    });

    it("forwards tools/call for tools visible to the app", async () => {
      const result = await app.callServerTool({
        name: "get-weather",
        arguments: { city: "Oslo" },
      });

      expect(result.content).toEqual([
        { type: "text", text: "called get-weather" },
      ]);
      expect(callTool).toHaveBeenCalledTimes(1);
      expect(callTool.mock.calls[0][0]).toEqual({
        name: "get-weather",
        arguments: { city: "Oslo" },
      });
    });

    it("refuses tools hidden from the app", async () => {
      const error = await app
        .callServerTool({ name: "refresh-cache" })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ code: -32000 });
      expect(String(error)).toContain(
        "Tool refresh-cache is not visible to the app",
      );
      expect(callTool).not.toHaveBeenCalled();
    });

    it("refuses unknown tools", async () => {
      const error = await app
        .callServerTool({ name: "missing" })
        .catch((e: unknown) => e);

      expect(error).toMatchObject({ code: -32000 });
      expect(String(error)).toContain("Unknown tool: missing");
    });

    it("lists only app-visible tools", async () => {
      const { tools } = await app.listServerTools();

      expect(tools.map((tool) => tool.name)).toEqual([
        "get-weather",
        "poll-status",
      ]);
    });
  });

  describe("ping", () => {
    it("App responds to ping from bridge", async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      const result = await bridge.request(
        { method: "ping", params: {} },
        EmptyResultSchema,
      );

      expect(result).toEqual({});
    });

    it("bridge.ping reports success as a value", async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      const outcome = await bridge.ping();

      expect(outcome.ok).toBe(true);
    });

    it("calls onping for pings from the app", async () => {
      const onping = vi.fn();
      bridge.onping = onping;
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      await app.request({ method: "ping" }, EmptyResultSchema);

      expect(onping).toHaveBeenCalledTimes(1);
    });
  });

  describe("teardown", () => {
    it("completes when the app acknowledges", async () => {
      const reasons: unknown[] = [];
      app.onteardown = ({ reason }) => {
        reasons.push(reason);
      };
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      const outcome = await bridge.sendResourceTeardown({ reason: "done" });

      expect(outcome).toEqual({ status: "completed" });
      expect(reasons).toEqual(["done"]);
      expect(bridge.getSession().lifecycle.history.slice(-2)).toEqual([
        "tearingDown",
        "closed",
      ]);
    });

    it("times out when the app never answers", async () => {
      ({ bridge } = createBridge({
        teardown: { mode: "await", timeoutMs: 50 },
      }));
      app.onteardown = () => new Promise<void>(() => {});
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      const outcome = await bridge.sendResourceTeardown();

      expect(outcome).toEqual({ status: "timed-out" });
      expect(bridge.getState()).toBe("closed");
    });

    it("reports a failing teardown handler", async () => {
      app.onteardown = () => {
        throw new Error("boom");
      };
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      const outcome = await bridge.sendResourceTeardown();

      expect(outcome.status).toBe("failed");
      if (outcome.status === "failed") {
        expect(outcome.error.code).toBe(ErrorCode.InternalError);
      }
      expect(bridge.getState()).toBe("closed");
    });

    it("is skipped before the view initializes", async () => {
      await bridge.connect(bridgeTransport);

      const outcome = await bridge.sendResourceTeardown();

      expect(outcome).toEqual({
        status: "skipped",
        reason: "view never finished initializing",
      });
      expect(bridge.getState()).toBe("closed");
    });

    it("is skipped under the skip policy", async () => {
      ({ bridge } = createBridge({ teardown: { mode: "skip" } }));
      const onteardown = vi.fn();
      app.onteardown = onteardown;
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      const outcome = await bridge.sendResourceTeardown();

      expect(outcome).toEqual({
        status: "skipped",
        reason: "teardown policy is skip",
      });
      expect(onteardown).not.toHaveBeenCalled();
    });

    it("returns the same promise when called again", async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      const first = bridge.sendResourceTeardown();
      const second = bridge.sendResourceTeardown({ reason: "again" });

      expect(second).toBe(first);
      expect(await first).toEqual({ status: "completed" });
    });

    it("refuses notifications once closed", async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);
      await bridge.sendResourceTeardown();

      const delivery = await bridge.sendToolResult({ content: [] });

      expect(delivery).toEqual({
        delivered: false,
        reason: "session is closed",
      });
    });
  });

  describe("channel closure", () => {
    it("closes the session when the channel closes", async () => {
      await bridge.connect(bridgeTransport);
      await app.connect(appTransport);

      await appTransport.close();

      expect(bridge.getState()).toBe("closed");
      expect(await bridge.sendToolInput({ arguments: {} })).toEqual({
        delivered: false,
        reason: "session is closed",
      });
    });

    it("rejects pending requests with ConnectionClosed", async () => {
      await bridge.connect(bridgeTransport);

      const pending = bridge.ping({ timeout: 1000 });
      await appTransport.close();
      const outcome = await pending;

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.code).toBe(ErrorCode.ConnectionClosed);
      }
    });
  });

  describe("message routing", () => {
    let warn: ReturnType<typeof vi.fn>;

    beforeEach(async () => {
      warn = vi.fn();
      const logger: Logger = { ...silentLogger, warn };
      ({ bridge } = createBridge({ logger }));
      await bridge.connect(bridgeTransport);
    });

    it("drops application requests that arrive before initialization", async () => {
      const onopenlink = vi.fn(async () => ({}));
      bridge.onopenlink = onopenlink;

      await appTransport.send({
        jsonrpc: "2.0",
        id: 1,
        method: "ui/open-link",
        params: { url: "https://example.com" },
      });
      await flush();

      expect(onopenlink).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining("received before initialization completed"),
      );
    });

    it("drops responses that match no outstanding request", async () => {
      const onerror = vi.fn();
      bridge.onerror = onerror;

      await appTransport.send({ jsonrpc: "2.0", id: 99, result: {} });
      await flush();

      expect(onerror).not.toHaveBeenCalled();
      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining("no outstanding request with that id"),
      );
    });

    it("drops a second ui/initialize", async () => {
      await app.connect(appTransport);

      await appTransport.send({
        jsonrpc: "2.0",
        id: 500,
        method: "ui/initialize",
        params: {
          appInfo: testAppInfo,
          appCapabilities: {},
          protocolVersion: "2026-01-26",
        },
      });
      await flush();

      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining("duplicate ui/initialize"),
      );
    });
  });
});
