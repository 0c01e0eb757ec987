import { EventEmitter } from "node:events";
import { MessageChannel } from "node:worker_threads";

import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { type Logger, silentLogger } from "./logger.js";
import { type MessageEndpoint, MessagePortTransport } from "./message-transport.js";

class LoopbackEndpoint extends EventEmitter implements MessageEndpoint {
  posted: unknown[] = [];
  closed = false;

  postMessage(value: unknown): void {
    this.posted.push(value);
  }

  close(): void {
    this.closed = true;
  }
}

describe("MessagePortTransport", () => {
  describe("over a worker_threads channel", () => {
    let channel: MessageChannel;

    beforeEach(() => {
      channel = new MessageChannel();
    });

    afterEach(() => {
      channel.port1.close();
      channel.port2.close();
    });

    it("delivers messages to the other end", async () => {
      const host = new MessagePortTransport(channel.port1);
      const view = new MessagePortTransport(channel.port2);
      const received = new Promise<JSONRPCMessage>((resolve) => {
        view.onmessage = resolve;
      });
      await host.start();
      await view.start();

      await host.send({
        jsonrpc: "2.0",
        method: "ui/notifications/tool-input",
        params: { arguments: { city: "Paris" } },
      });

      await expect(received).resolves.toEqual({
        jsonrpc: "2.0",
        method: "ui/notifications/tool-input",
        params: { arguments: { city: "Paris" } },
      });
    });
  });

  describe("over a loopback endpoint", () => {
    let endpoint: LoopbackEndpoint;
    let log: Logger;
    let transport: MessagePortTransport;

    beforeEach(async () => {
      endpoint = new LoopbackEndpoint();
      log = { ...silentLogger, error: vi.fn() };
      transport = new MessagePortTransport(endpoint, { logger: log });
      await transport.start();
    });

    it("posts outgoing messages", async () => {
      await transport.send({ jsonrpc: "2.0", id: 1, method: "ping" });

      expect(endpoint.posted).toEqual([{ jsonrpc: "2.0", id: 1, method: "ping" }]);
    });

    it("reports malformed values instead of delivering them", () => {
      const onmessage = vi.fn();
      const onerror = vi.fn();
      transport.onmessage = onmessage;
      transport.onerror = onerror;

      endpoint.emit("message", { jsonrpc: "2.0", id: 1 });

      expect(onmessage).not.toHaveBeenCalled();
      expect(onerror).toHaveBeenCalledWith(
        new Error(
          "Invalid JSON-RPC message received: Message must carry exactly one of method, result or error (found none)",
        ),
      );
      expect(log.error).toHaveBeenCalledWith(
        "Failed to parse message:",
        "Message must carry exactly one of method, result or error (found none)",
      );
    });

    it("refuses to start twice", async () => {
      await expect(transport.start()).rejects.toThrow(
        "MessagePortTransport already started",
      );
    });

    it("closes once and stops listening", async () => {
      const onclose = vi.fn();
      transport.onclose = onclose;

      await transport.close();
      await transport.close();

      expect(onclose).toHaveBeenCalledTimes(1);
      expect(endpoint.closed).toBe(true);
      expect(endpoint.listenerCount("message")).toBe(0);
      await expect(
        transport.send({ jsonrpc: "2.0", method: "ui/notifications/initialized" }),
      ).rejects.toThrow("MessagePortTransport is closed");
    });
  });
});
