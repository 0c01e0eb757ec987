import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { type JSONRPCMessage, McpError } from "@modelcontextprotocol/sdk/types.js";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { type Logger, silentLogger } from "./logger.js";
import { SessionRouter } from "./router.js";
import { McpUiSession } from "./session.js";

describe("SessionRouter", () => {
  let session: McpUiSession;
  let router: SessionRouter;
  let peer: InMemoryTransport;
  let log: Logger & { warn: ReturnType<typeof vi.fn> };
  let received: ReturnType<typeof vi.fn>;
  let peerReceived: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    const [hostSide, viewSide] = InMemoryTransport.createLinkedPair();
    session = new McpUiSession({ id: "session-1" });
    log = { ...silentLogger, warn: vi.fn() };
    router = new SessionRouter(hostSide, session, log);
    peer = viewSide;

    received = vi.fn();
    peerReceived = vi.fn();
    router.onmessage = received;
    peer.onmessage = peerReceived;
    await router.start();
    await peer.start();
  });

  it("takes the session id", () => {
    expect(router.sessionId).toBe("session-1");
  });

  it("drops inbound messages the session does not admit", async () => {
    await peer.send({
      jsonrpc: "2.0",
      id: 1,
      method: "ui/initialize",
      params: {},
    });

    expect(received).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith(
      "Dropping inbound request ui/initialize #1: ui/initialize received before the view channel was established",
    );
  });

  it("passes admitted inbound messages on", async () => {
    session.lifecycle.transition("initializing");
    const message = {
      jsonrpc: "2.0" as const,
      id: 1,
      method: "ui/initialize",
      params: {},
    };

    await peer.send(message);

    expect(received).toHaveBeenCalledTimes(1);
    expect(received.mock.calls[0][0]).toEqual(message);
  });

  it("drops outbound notifications the session does not admit", async () => {
    await router.send({
      jsonrpc: "2.0",
      method: "ui/notifications/tool-input",
      params: { arguments: {} },
    });

    expect(peerReceived).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith(
      "Dropping outbound notification ui/notifications/tool-input: ui/notifications/tool-input sent before the view channel was established",
    );
  });

  it("rejects outbound requests the session does not admit", async () => {
    const sending = router.send({
      jsonrpc: "2.0",
      id: 7,
      method: "ui/resource-teardown",
      params: {},
    });

    await expect(sending).rejects.toBeInstanceOf(McpError);
    await expect(sending).rejects.toMatchObject({ code: -32000 });
    expect(peerReceived).not.toHaveBeenCalled();
  });

  it("matches responses to outstanding requests", async () => {
    session.lifecycle.transition("initializing");

    await router.send({ jsonrpc: "2.0", id: 3, method: "ping" });
    expect(router.outstanding.has(3)).toBe(true);
    expect(peerReceived).toHaveBeenCalledTimes(1);

    await peer.send({ jsonrpc: "2.0", id: 3, result: {} });

    expect(router.outstanding.size).toBe(0);
    expect(received).toHaveBeenCalledTimes(1);
  });

  it("drops responses nobody asked for", async () => {
    session.lifecycle.transition("initializing");

    await peer.send({ jsonrpc: "2.0", id: 9, result: {} });

    expect(received).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith(
      "Dropping response #9: no outstanding request with that id",
    );
  });

  it("forgets a request once it is cancelled", async () => {
    session.lifecycle.transition("initializing");
    await router.send({ jsonrpc: "2.0", id: 4, method: "ping" });

    await router.send({
      jsonrpc: "2.0",
      method: "notifications/cancelled",
      params: { requestId: 4, reason: "timed out" },
    });

    expect(router.outstanding.has(4)).toBe(false);
  });

  it("closes the session when the channel closes", async () => {
    const onclose = vi.fn();
    router.onclose = onclose;
    session.lifecycle.transition("initializing");

    await peer.close();

    expect(session.state).toBe("closed");
    expect(onclose).toHaveBeenCalledTimes(1);
  });
});

describe("SessionRouter over a failing channel", () => {
  function busyOnce() {
    const delivered: JSONRPCMessage[] = [];
    let failures = 1;
    const inner: Transport = {
      start: async () => {},
      close: async () => {},
      send: async (message) => {
        if (failures > 0) {
          failures--;
          throw new Error("port busy");
        }
        delivered.push(message);
      },
    };
    return { inner, delivered };
  }

  function readySession() {
    const session = new McpUiSession();
    session.lifecycle.transition("initializing");
    session.lifecycle.transition("ready");
    return session;
  }

  it("lets tool-input be sent again after a failed send", async () => {
    const { inner, delivered } = busyOnce();
    const session = readySession();
    const router = new SessionRouter(inner, session);
    await router.start();
    const toolInput: JSONRPCMessage = {
      jsonrpc: "2.0",
      method: "ui/notifications/tool-input",
      params: { arguments: { city: "Paris" } },
    };

    await expect(router.send(toolInput)).rejects.toThrow("port busy");
    expect(session.toolInputSent).toBe(false);
    expect(session.state).toBe("ready");

    await router.send(toolInput);
    expect(delivered).toEqual([toolInput]);
    expect(session.toolInputSent).toBe(true);
    expect(session.state).toBe("interactive");
  });

  it("forgets a request whose send failed", async () => {
    const { inner } = busyOnce();
    const router = new SessionRouter(inner, readySession());
    await router.start();

    await expect(
      router.send({ jsonrpc: "2.0", id: 2, method: "ping" }),
    ).rejects.toThrow("port busy");
    expect(router.outstanding.size).toBe(0);
  });
});
