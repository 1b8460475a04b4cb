import { describe, expect, it } from "vitest";

import {
  classifyJsonRpcMessage,
  createErrorResponse,
  createNotification,
  createRequest,
  isJsonObject,
  isJsonRpcErrorObject,
  isJsonRpcId,
  isJsonValue,
  isSessionState,
  JsonRpcErrorCode,
  metricsSnapshotToJson,
  parseToolDescriptor,
  parseToolListPage,
} from "../src/index.js";

describe("JSON guards", () => {
  it("accepts nested JSON values", () => {
    expect(isJsonValue({ a: [1, "two", true, null, { b: 3 }] })).toBe(true);
    expect(isJsonObject({ type: "object" })).toBe(true);
  });

  it("rejects functions, non-finite numbers and class instances", () => {
    expect(isJsonValue({ fn: () => 1 })).toBe(false);
    expect(isJsonValue(Number.NaN)).toBe(false);
    expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isJsonValue(new Date())).toBe(false);
    expect(isJsonObject([1, 2])).toBe(false);
  });
});

describe("JSON-RPC message classification", () => {
  it("classifies requests, notifications and responses", () => {
    expect(classifyJsonRpcMessage({ jsonrpc: "2.0", id: 3, method: "ping" })).toEqual({
      kind: "request",
      message: { jsonrpc: "2.0", id: 3, method: "ping" },
    });

    expect(classifyJsonRpcMessage({ jsonrpc: "2.0", method: "notifications/progress", params: { step: 1 } })).toEqual({
      kind: "notification",
      message: { jsonrpc: "2.0", method: "notifications/progress", params: { step: 1 } },
    });

    expect(classifyJsonRpcMessage({ jsonrpc: "2.0", id: 1, result: { ok: true } })).toEqual({
      kind: "response",
      message: { jsonrpc: "2.0", id: 1, result: { ok: true } },
    });

    expect(classifyJsonRpcMessage({ jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } })).toEqual({
      kind: "response",
      message: { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Parse error" } },
    });
  });

  it("jsonrpc 멤버가 없어도 받아들이고 결과에는 항상 채워 넣는다", () => {
    expect(classifyJsonRpcMessage({ id: 0, result: {} })).toEqual({
      kind: "response",
      message: { jsonrpc: "2.0", id: 0, result: {} },
    });
  });

  it("rejects values that are not JSON-RPC 2.0 messages", () => {
    expect(classifyJsonRpcMessage(null)).toBeUndefined();
    expect(classifyJsonRpcMessage([1, 2])).toBeUndefined();
    expect(classifyJsonRpcMessage({ jsonrpc: "1.0", id: 1, result: {} })).toBeUndefined();
    expect(classifyJsonRpcMessage({ id: 1 })).toBeUndefined();
    expect(classifyJsonRpcMessage({ id: 1, result: {}, error: { code: 1, message: "x" } })).toBeUndefined();
    expect(classifyJsonRpcMessage({ id: 1.5, result: {} })).toBeUndefined();
    expect(classifyJsonRpcMessage({ id: 1, method: "" })).toBeUndefined();
    expect(classifyJsonRpcMessage({ method: "x", params: "not-structured" })).toBeUndefined();
    expect(classifyJsonRpcMessage({ id: 1, error: { code: "bad", message: "x" } })).toBeUndefined();
  });

  it("validates ids and error objects", () => {
    expect(isJsonRpcId(0)).toBe(true);
    expect(isJsonRpcId("req-1")).toBe(true);
    expect(isJsonRpcId(null)).toBe(false);
    expect(isJsonRpcId(2.5)).toBe(false);

    expect(isJsonRpcErrorObject({ code: -32601, message: "Method not found" })).toBe(true);
    expect(isJsonRpcErrorObject({ code: -32601 })).toBe(false);
  });
});

describe("JSON-RPC builders", () => {
  it("omits params when they are not given", () => {
    expect(createRequest(0, "initialize")).toEqual({ jsonrpc: "2.0", id: 0, method: "initialize" });
    expect("params" in createNotification("notifications/initialized")).toBe(false);
  });

  it("builds error responses with optional data", () => {
    expect(createErrorResponse(4, JsonRpcErrorCode.METHOD_NOT_FOUND, "method not found: sampling/createMessage")).toEqual({
      jsonrpc: "2.0",
      id: 4,
      error: { code: -32601, message: "method not found: sampling/createMessage" },
    });
    expect(createErrorResponse(null, JsonRpcErrorCode.INTERNAL_ERROR, "boom", { detail: "x" }).error.data).toEqual({
      detail: "x",
    });
  });
});

describe("tool descriptors", () => {
  it("fills in description and input schema defaults", () => {
    expect(parseToolDescriptor({ name: "echo" })).toEqual({
      name: "echo",
      description: "",
      inputSchema: { type: "object" },
    });
  });

  it("passes the input schema through untouched", () => {
    const inputSchema = { type: "object", properties: { city: { type: "string" } }, required: ["city"] };
    expect(parseToolDescriptor({ name: "get_weather", description: "Current weather", inputSchema })).toEqual({
      name: "get_weather",
      description: "Current weather",
      inputSchema,
    });
  });

  it("이름이 없는 항목은 건너뛰고 nextCursor를 읽는다", () => {
    const page = parseToolListPage({
      tools: [{ name: "a" }, { description: "nameless" }, { name: "" }, { name: "b" }],
      nextCursor: "page-2",
    });

    expect(page?.tools.map((tool) => tool.name)).toEqual(["a", "b"]);
    expect(page?.nextCursor).toBe("page-2");
  });

  it("returns undefined when tools is missing", () => {
    expect(parseToolListPage({})).toBeUndefined();
    expect(parseToolListPage([])).toBeUndefined();
    expect(parseToolListPage({ tools: [] })).toEqual({ tools: [] });
  });
});

describe("session guards", () => {
  it("matches all 5 session states", () => {
    expect(isSessionState("uninitialized")).toBe(true);
    expect(isSessionState("initializing")).toBe(true);
    expect(isSessionState("ready")).toBe(true);
    expect(isSessionState("closing")).toBe(true);
    expect(isSessionState("closed")).toBe(true);
    expect(isSessionState("open")).toBe(false);
    expect(isSessionState(1)).toBe(false);
  });

  it("converts a metrics snapshot into a JSON object", () => {
    const json = metricsSnapshotToJson({
      state: "ready",
      pid: 42,
      uptimeMs: 1500,
      pendingRequests: 1,
      requestsSent: 4,
      responsesMatched: 3,
      requestTimeouts: 0,
      protocolAnomalies: 0,
      frameErrors: 2,
      notificationsReceived: 5,
      heartbeatFailures: 0,
      toolCount: 2,
    });

    expect(isJsonObject(json)).toBe(true);
    expect(json["frameErrors"]).toBe(2);
    expect(json["state"]).toBe("ready");
  });
});
