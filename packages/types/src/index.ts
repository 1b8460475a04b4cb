export * from "./json.js";
export * from "./jsonrpc.js";
export * from "./tool.js";
export * from "./session.js";
