import { describe, expect, it } from "vitest";

import {
  checkToolCall,
  filterToolsForRole,
  getToolVisibility,
  isToolVisibleTo,
} from "./visibility.js";

const shared = { name: "get-weather", _meta: {} };
const modelOnly = { name: "refresh-cache", _meta: { ui: { visibility: ["model"] } } };
const appOnly = { name: "poll-status", _meta: { ui: { visibility: ["app"] } } };
const hidden = { name: "internal", _meta: { ui: { visibility: [] } } };

describe("getToolVisibility", () => {
  it("defaults to model and app", () => {
    expect(getToolVisibility(shared)).toEqual(["model", "app"]);
    expect(getToolVisibility({})).toEqual(["model", "app"]);
  });

  it("keeps an empty list as is", () => {
    expect(getToolVisibility(hidden)).toEqual([]);
    expect(isToolVisibleTo(hidden, "model")).toBe(false);
    expect(isToolVisibleTo(hidden, "app")).toBe(false);
  });
});

describe("malformed visibility", () => {
  const badUri = {
    name: "bad-uri",
    _meta: { ui: { visibility: ["app"], resourceUri: 42 } },
  };
  const unknownRole = {
    name: "unknown-role",
    _meta: { ui: { visibility: ["app", "widget"] } },
  };
  const notAList = { name: "not-a-list", _meta: { ui: { visibility: "app" } } };
  const notARecord = { name: "not-a-record", _meta: { ui: "app" } };

  it("reads the declared roles regardless of other fields", () => {
    expect(getToolVisibility(badUri)).toEqual(["app"]);
    expect(getToolVisibility(unknownRole)).toEqual(["app"]);
  });

  it("grants nobody access when the declaration cannot be read", () => {
    expect(getToolVisibility(notAList)).toEqual([]);
    expect(getToolVisibility(notARecord)).toEqual([]);
  });

  it("keeps app-only tools away from the model", () => {
    const tools = [badUri, unknownRole, notAList, notARecord, shared];

    expect(filterToolsForRole(tools, "model").map((tool) => tool.name)).toEqual([
      "get-weather",
    ]);
    expect(
      checkToolCall({ caller: "model", name: "unknown-role", tool: unknownRole }),
    ).toEqual({
      allowed: false,
      reason: "Tool unknown-role is not visible to the model",
    });
  });
});

describe("filterToolsForRole", () => {
  const tools = [shared, modelOnly, appOnly, hidden];

  it("lists model-visible tools for the model", () => {
    expect(filterToolsForRole(tools, "model").map((tool) => tool.name)).toEqual([
      "get-weather",
      "refresh-cache",
    ]);
  });

  it("lists app-visible tools for views", () => {
    expect(filterToolsForRole(tools, "app").map((tool) => tool.name)).toEqual([
      "get-weather",
      "poll-status",
    ]);
  });
});

describe("checkToolCall", () => {
  it("allows a visible tool of the view's own server", () => {
    expect(
      checkToolCall({
        caller: "app",
        name: "poll-status",
        tool: appOnly,
        toolServerId: "weather",
        viewServerId: "weather",
      }),
    ).toEqual({ allowed: true });
  });

  it("refuses unknown tools", () => {
    expect(
      checkToolCall({ caller: "model", name: "missing", tool: undefined }),
    ).toEqual({ allowed: false, reason: "Unknown tool: missing" });
  });

  it("refuses tools of another server", () => {
    expect(
      checkToolCall({
        caller: "app",
        name: "get-weather",
        tool: shared,
        toolServerId: "other",
        viewServerId: "weather",
      }),
    ).toEqual({
      allowed: false,
      reason: "Tool get-weather belongs to another server than the calling view",
    });
  });

  it("refuses tools hidden from the caller", () => {
    expect(
      checkToolCall({ caller: "model", name: "poll-status", tool: appOnly }),
    ).toEqual({
      allowed: false,
      reason: "Tool poll-status is not visible to the model",
    });
    expect(
      checkToolCall({
        caller: "app",
        name: "refresh-cache",
        tool: modelOnly,
        toolServerId: "weather",
        viewServerId: "weather",
      }),
    ).toEqual({
      allowed: false,
      reason: "Tool refresh-cache is not visible to the app",
    });
  });

  it("refuses app calls without the view's server", () => {
    expect(
      checkToolCall({ caller: "app", name: "get-weather", tool: shared }),
    ).toEqual({
      allowed: false,
      reason: "Tool get-weather called by a view with no known server",
    });
  });

  it("does not apply the server check to the model", () => {
    expect(
      checkToolCall({
        caller: "model",
        name: "get-weather",
        tool: shared,
        toolServerId: "weather",
      }),
    ).toEqual({ allowed: true });
  });
});
