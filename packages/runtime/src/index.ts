export * from "./errors.js";

export * from "./logging/logger.js";

export * from "./transport/frame-codec.js";
export * from "./transport/frame-reader.js";
export * from "./transport/frame-writer.js";

export * from "./rpc/request-timeout.js";
export * from "./rpc/request-multiplexer.js";

export * from "./process/peer-process.js";

export { SessionEventBus, type SessionEventListener } from "./session/event-bus.js";
export * from "./session/response-listener.js";
export * from "./session/handshake.js";
export * from "./session/periodic-task.js";
export * from "./session/heartbeat.js";
export * from "./session/metrics.js";
export * from "./session/agent-session.js";

export * from "./config/session-config.js";
