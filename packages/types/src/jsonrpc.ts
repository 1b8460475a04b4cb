import type { JsonArray, JsonObject, JsonValue } from "./json.js";
import { isJsonValue, isPlainObject } from "./json.js";

export const JSONRPC_VERSION = "2.0";

export const JsonRpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type JsonRpcId = number | string;
export type JsonRpcParams = JsonObject | JsonArray;

export interface JsonRpcRequest {
  readonly jsonrpc: typeof JSONRPC_VERSION;
  readonly id: JsonRpcId;
  readonly method: string;
  readonly params?: JsonRpcParams;
}

export interface JsonRpcNotification {
  readonly jsonrpc: typeof JSONRPC_VERSION;
  readonly method: string;
  readonly params?: JsonRpcParams;
}

export interface JsonRpcErrorObject {
  readonly code: number;
  readonly message: string;
  readonly data?: JsonValue;
}

export interface JsonRpcSuccessResponse {
  readonly jsonrpc: typeof JSONRPC_VERSION;
  readonly id: JsonRpcId | null;
  readonly result: JsonValue;
}

export interface JsonRpcErrorResponse {
  readonly jsonrpc: typeof JSONRPC_VERSION;
  readonly id: JsonRpcId | null;
  readonly error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export type ClassifiedMessage =
  | { kind: "request"; message: JsonRpcRequest }
  | { kind: "notification"; message: JsonRpcNotification }
  | { kind: "response"; message: JsonRpcResponse };

export function isJsonRpcId(value: unknown): value is JsonRpcId {
  if (typeof value === "string") {
    return true;
  }

  return typeof value === "number" && Number.isInteger(value);
}

export function isJsonRpcParams(value: unknown): value is JsonRpcParams {
  if (Array.isArray(value)) {
    return isJsonValue(value);
  }

  return isPlainObject(value) && isJsonValue(value);
}

export function isJsonRpcErrorObject(value: unknown): value is JsonRpcErrorObject {
  if (!isPlainObject(value)) {
    return false;
  }

  const codeValue = value["code"];
  const messageValue = value["message"];
  const dataValue = value["data"];

  if (typeof codeValue !== "number" || !Number.isInteger(codeValue)) {
    return false;
  }

  if (typeof messageValue !== "string") {
    return false;
  }

  return dataValue === undefined || isJsonValue(dataValue);
}

export function isJsonRpcErrorResponse(response: JsonRpcResponse): response is JsonRpcErrorResponse {
  return "error" in response;
}

/**
 * Sorts an inbound value into request, notification or response.
 * A missing `jsonrpc` member is tolerated; the returned message always carries it.
 * Returns undefined for anything that is not a JSON-RPC 2.0 message.
 */
export function classifyJsonRpcMessage(value: unknown): ClassifiedMessage | undefined {
  if (!isPlainObject(value)) {
    return undefined;
  }

  const versionValue = value["jsonrpc"];
  if (versionValue !== undefined && versionValue !== JSONRPC_VERSION) {
    return undefined;
  }

  const idValue = value["id"];
  const methodValue = value["method"];

  if (methodValue !== undefined) {
    if (typeof methodValue !== "string" || methodValue.length === 0) {
      return undefined;
    }

    const paramsValue = value["params"];
    if (paramsValue !== undefined && !isJsonRpcParams(paramsValue)) {
      return undefined;
    }

    if (idValue === undefined) {
      return {
        kind: "notification",
        message: createNotification(methodValue, paramsValue),
      };
    }

    if (!isJsonRpcId(idValue)) {
      return undefined;
    }

    return {
      kind: "request",
      message: createRequest(idValue, methodValue, paramsValue),
    };
  }

  if (idValue !== null && !isJsonRpcId(idValue)) {
    return undefined;
  }

  const hasResult = "result" in value;
  const hasError = "error" in value;
  if (hasResult === hasError) {
    return undefined;
  }

  if (hasError) {
    const errorValue = value["error"];
    if (!isJsonRpcErrorObject(errorValue)) {
      return undefined;
    }

    return {
      kind: "response",
      message: { jsonrpc: JSONRPC_VERSION, id: idValue, error: errorValue },
    };
  }

  const resultValue = value["result"];
  if (!isJsonValue(resultValue)) {
    return undefined;
  }

  return {
    kind: "response",
    message: { jsonrpc: JSONRPC_VERSION, id: idValue, result: resultValue },
  };
}

export function createRequest(id: JsonRpcId, method: string, params?: JsonRpcParams): JsonRpcRequest {
  if (params === undefined) {
    return { jsonrpc: JSONRPC_VERSION, id, method };
  }

  return { jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function createNotification(method: string, params?: JsonRpcParams): JsonRpcNotification {
  if (params === undefined) {
    return { jsonrpc: JSONRPC_VERSION, method };
  }

  return { jsonrpc: JSONRPC_VERSION, method, params };
}

export function createSuccessResponse(id: JsonRpcId, result: JsonValue): JsonRpcSuccessResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function createErrorResponse(
  id: JsonRpcId | null,
  code: number,
  message: string,
  data?: JsonValue,
): JsonRpcErrorResponse {
  const error: JsonRpcErrorObject = data === undefined ? { code, message } : { code, message, data };
  return { jsonrpc: JSONRPC_VERSION, id, error };
}
