export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./envelope.js";
export * from "./lifecycle.js";
export * from "./capabilities.js";
export * from "./policy.js";
export * from "./session.js";
export * from "./router.js";
export * from "./tool-meta.js";
export * from "./visibility.js";
export * from "./registry.js";
export * from "./config.js";
export { MessagePortTransport, type MessageEndpoint } from "./message-transport.js";
export { App, type AppOptions } from "./app.js";
export { AppBridge } from "./app-bridge.js";
export {
  SandboxRelay,
  type McpUiRenderedView,
  type McpUiViewRenderer,
} from "./relay.js";
export {
  AppHost,
  type McpUiLoadedResource,
  type McpUiModelTool,
} from "./app-host.js";
