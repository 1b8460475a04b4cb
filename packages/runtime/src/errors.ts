/**
 * Session error taxonomy.
 *
 * Every error carries a stable `code` so callers can branch without string matching.
 */
import type { JsonRpcErrorObject, JsonRpcId, JsonValue } from "@toolpipe/types";

export type SessionErrorCode =
  | "SPAWN_FAILED"
  | "FRAME_MALFORMED"
  | "FRAME_TOO_LARGE"
  | "PROTOCOL_ANOMALY"
  | "INITIALIZATION_FAILED"
  | "SESSION_NOT_READY"
  | "SESSION_CLOSED"
  | "REQUEST_TIMEOUT"
  | "RPC_ERROR"
  | "TRANSPORT_WRITE_FAILED"
  | "CONFIG_ERROR";

export interface SessionErrorOptions {
  cause?: unknown;
  /** 사용자에게 다음 행동을 안내하는 메시지 */
  suggestion?: string;
}

export class SessionError extends Error {
  readonly code: SessionErrorCode;
  readonly suggestion?: string;

  constructor(code: SessionErrorCode, message: string, options: SessionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SessionError";
    this.code = code;
    this.suggestion = options.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SpawnError extends SessionError {
  readonly command: string;
  readonly args: readonly string[];

  constructor(command: string, args: readonly string[], options: SessionErrorOptions = {}) {
    super("SPAWN_FAILED", `failed to spawn '${[command, ...args].join(" ")}': ${describeCause(options.cause)}`, {
      suggestion: options.suggestion ?? "Check that the command exists and is executable.",
      cause: options.cause,
    });
    this.name = "SpawnError";
    this.command = command;
    this.args = [...args];
  }
}

export class FrameError extends SessionError {
  readonly fatal: boolean;
  /** Offending line, truncated for logging */
  readonly excerpt: string;

  constructor(
    code: "FRAME_MALFORMED" | "FRAME_TOO_LARGE",
    message: string,
    options: SessionErrorOptions & { fatal?: boolean; excerpt?: string } = {},
  ) {
    super(code, message, options);
    this.name = "FrameError";
    this.fatal = options.fatal ?? false;
    this.excerpt = options.excerpt ?? "";
  }
}

export class ProtocolAnomaly extends SessionError {
  readonly responseId: JsonRpcId | null;

  constructor(responseId: JsonRpcId | null, message: string) {
    super("PROTOCOL_ANOMALY", message);
    this.name = "ProtocolAnomaly";
    this.responseId = responseId;
  }
}

export class InitializationError extends SessionError {
  constructor(message: string, options: SessionErrorOptions = {}) {
    super("INITIALIZATION_FAILED", message, options);
    this.name = "InitializationError";
  }
}

export class NotReadyError extends SessionError {
  readonly state: string;
  readonly operation: string;

  constructor(operation: string, state: string) {
    super("SESSION_NOT_READY", `${operation} requires a ready session (current state: ${state})`, {
      suggestion: "Await start() before issuing tool calls.",
    });
    this.name = "NotReadyError";
    this.state = state;
    this.operation = operation;
  }
}

export class SessionClosedError extends SessionError {
  readonly reason: string;

  constructor(reason: string, options: SessionErrorOptions = {}) {
    super("SESSION_CLOSED", `session closed: ${reason}`, options);
    this.name = "SessionClosedError";
    this.reason = reason;
  }
}

export class RequestTimeoutError extends SessionError {
  readonly method: string;
  readonly requestId: JsonRpcId;
  readonly timeoutMs: number;

  constructor(method: string, requestId: JsonRpcId, timeoutMs: number) {
    super("REQUEST_TIMEOUT", `request '${method}' (id ${String(requestId)}) timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
    this.method = method;
    this.requestId = requestId;
    this.timeoutMs = timeoutMs;
  }
}

export class RpcError extends SessionError {
  readonly rpcCode: number;
  readonly data?: JsonValue;
  readonly method: string;

  constructor(method: string, error: JsonRpcErrorObject) {
    super("RPC_ERROR", `peer rejected '${method}': ${error.message} (code ${error.code})`);
    this.name = "RpcError";
    this.rpcCode = error.code;
    this.data = error.data;
    this.method = method;
  }
}

export class TransportWriteError extends SessionError {
  constructor(message: string, options: SessionErrorOptions = {}) {
    super("TRANSPORT_WRITE_FAILED", message, options);
    this.name = "TransportWriteError";
  }
}

export class ConfigError extends SessionError {
  readonly source?: string;

  constructor(message: string, options: SessionErrorOptions & { source?: string } = {}) {
    super("CONFIG_ERROR", options.source === undefined ? message : `${message} (${options.source})`, options);
    this.name = "ConfigError";
    this.source = options.source;
  }
}

export function isSessionError(value: unknown): value is SessionError {
  return value instanceof SessionError;
}

export function unknownToErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

function describeCause(cause: unknown): string {
  if (cause === undefined) {
    return "unknown error";
  }

  return unknownToErrorMessage(cause);
}
