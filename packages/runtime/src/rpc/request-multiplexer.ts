import type { JsonRpcErrorObject, JsonRpcId, JsonRpcParams, JsonValue } from "@toolpipe/types";
import { createNotification, createRequest } from "@toolpipe/types";
import { ProtocolAnomaly, RequestTimeoutError, RpcError, SessionClosedError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import type { MessageWriter } from "../transport/frame-writer.js";
import { DEFAULT_REQUEST_TIMEOUT_MS, resolveRequestTimeoutMs } from "./request-timeout.js";

export interface PendingRequestInfo {
  readonly id: number;
  readonly method: string;
  readonly issuedAt: Date;
  readonly timeoutMs: number;
}

/**
 * One outstanding request. `resolve`/`reject` settle the caller's promise exactly once:
 * the entry leaves the table before either is called.
 */
interface PendingRequest extends PendingRequestInfo {
  readonly resolve: (result: JsonValue) => void;
  readonly reject: (error: Error) => void;
  readonly timer: NodeJS.Timeout;
}

export interface RequestOptions {
  timeoutMs?: number;
}

export interface MultiplexerCounters {
  requestsSent: number;
  responsesMatched: number;
  requestTimeouts: number;
  protocolAnomalies: number;
}

export interface RequestMultiplexerOptions {
  writer: MessageWriter;
  logger?: Logger;
  defaultTimeoutMs?: number;
  onAnomaly?: (anomaly: ProtocolAnomaly) => void;
  now?: () => Date;
  setTimeoutFn?: (handler: () => void, timeoutMs: number) => NodeJS.Timeout;
  clearTimeoutFn?: (handle: NodeJS.Timeout) => void;
}

export interface FailAllOptions {
  /** Reject every later `send`/`notify` with SessionClosedError */
  closed?: boolean;
}

/**
 * Correlates requests and responses by id over one shared writer.
 *
 * The pending table is private to this class and only touched inside synchronous sections
 * on the event loop, so `send` and `resolve` never interleave mid-update.
 */
export class RequestMultiplexer {
  private readonly pendingRequests = new Map<number, PendingRequest>();
  private readonly writer: MessageWriter;
  private readonly logger: Logger;
  private readonly defaultTimeoutMs: number;
  private readonly onAnomaly?: (anomaly: ProtocolAnomaly) => void;
  private readonly now: () => Date;
  private readonly setTimeoutFn: (handler: () => void, timeoutMs: number) => NodeJS.Timeout;
  private readonly clearTimeoutFn: (handle: NodeJS.Timeout) => void;
  private readonly counters: MultiplexerCounters = {
    requestsSent: 0,
    responsesMatched: 0,
    requestTimeouts: 0,
    protocolAnomalies: 0,
  };

  private nextId = 0;
  private closedReason: string | null = null;

  constructor(options: RequestMultiplexerOptions) {
    this.writer = options.writer;
    this.logger = options.logger ?? createSilentLogger();
    this.defaultTimeoutMs = resolveRequestTimeoutMs(options.defaultTimeoutMs, DEFAULT_REQUEST_TIMEOUT_MS);
    this.onAnomaly = options.onAnomaly;
    this.now = options.now ?? (() => new Date());
    this.setTimeoutFn = options.setTimeoutFn ?? setTimeout;
    this.clearTimeoutFn = options.clearTimeoutFn ?? clearTimeout;
  }

  get pendingCount(): number {
    return this.pendingRequests.size;
  }

  get isClosed(): boolean {
    return this.closedReason !== null;
  }

  stats(): MultiplexerCounters {
    return { ...this.counters };
  }

  pending(): PendingRequestInfo[] {
    const snapshot: PendingRequestInfo[] = [];
    for (const entry of this.pendingRequests.values()) {
      snapshot.push({
        id: entry.id,
        method: entry.method,
        issuedAt: entry.issuedAt,
        timeoutMs: entry.timeoutMs,
      });
    }
    return snapshot;
  }

  send(method: string, params?: JsonRpcParams, options: RequestOptions = {}): Promise<JsonValue> {
    if (this.closedReason !== null) {
      return Promise.reject(new SessionClosedError(this.closedReason));
    }

    const id = this.nextId;
    this.nextId += 1;
    const timeoutMs = resolveRequestTimeoutMs(options.timeoutMs, this.defaultTimeoutMs);

    // Registered before the write starts: a reply may arrive before the write callback fires.
    const result = new Promise<JsonValue>((resolve, reject) => {
      const timer = this.setTimeoutFn(() => {
        this.expire(id);
      }, timeoutMs);

      this.pendingRequests.set(id, {
        id,
        method,
        issuedAt: this.now(),
        timeoutMs,
        resolve,
        reject,
        timer,
      });
    });

    this.counters.requestsSent += 1;
    this.logger.debug(`-> ${method}`, { id });

    void this.writer.writeMessage(createRequest(id, method, params)).catch((error: unknown) => {
      const entry = this.take(id);
      if (entry === undefined) {
        return;
      }
      entry.reject(error instanceof Error ? error : new Error(String(error)));
    });

    return result;
  }

  notify(method: string, params?: JsonRpcParams): Promise<void> {
    if (this.closedReason !== null) {
      return Promise.reject(new SessionClosedError(this.closedReason));
    }

    this.logger.debug(`-> ${method} (notification)`);
    return this.writer.writeMessage(createNotification(method, params));
  }

  /**
   * Completes the pending request with this id. Returns false (and records an anomaly)
   * when no request is waiting for it.
   */
  resolve(id: JsonRpcId | null, result: JsonValue): boolean {
    const entry = this.take(id);
    if (entry === undefined) {
      this.reportAnomaly(id, "response does not match any pending request");
      return false;
    }

    this.counters.responsesMatched += 1;
    this.logger.debug(`<- ${entry.method}`, { id: entry.id });
    entry.resolve(result);
    return true;
  }

  fail(id: JsonRpcId | null, error: Error | JsonRpcErrorObject): boolean {
    const entry = this.take(id);
    if (entry === undefined) {
      this.reportAnomaly(id, "error response does not match any pending request");
      return false;
    }

    this.counters.responsesMatched += 1;
    this.logger.debug(`<- ${entry.method} (error)`, { id: entry.id });
    entry.reject(error instanceof Error ? error : new RpcError(entry.method, error));
    return true;
  }

  /**
   * Fails every pending request with `error` and empties the table.
   */
  failAll(error: Error, options: FailAllOptions = {}): number {
    if (options.closed === true && this.closedReason === null) {
      this.closedReason = error instanceof SessionClosedError ? error.reason : error.message;
    }

    const entries = [...this.pendingRequests.values()];
    this.pendingRequests.clear();

    for (const entry of entries) {
      this.clearTimeoutFn(entry.timer);
      entry.reject(error);
    }

    if (entries.length > 0) {
      this.logger.debug(`failed ${entries.length} pending request(s)`, { reason: error.message });
    }

    return entries.length;
  }

  private take(id: JsonRpcId | null): PendingRequest | undefined {
    if (typeof id !== "number") {
      return undefined;
    }

    const entry = this.pendingRequests.get(id);
    if (entry === undefined) {
      return undefined;
    }

    this.pendingRequests.delete(id);
    this.clearTimeoutFn(entry.timer);
    return entry;
  }

  private expire(id: number): void {
    const entry = this.take(id);
    if (entry === undefined) {
      return;
    }

    this.counters.requestTimeouts += 1;
    this.logger.warn(`request timed out`, { id, method: entry.method, timeoutMs: entry.timeoutMs });
    entry.reject(new RequestTimeoutError(entry.method, id, entry.timeoutMs));
  }

  private reportAnomaly(id: JsonRpcId | null, message: string): void {
    this.counters.protocolAnomalies += 1;
    const anomaly = new ProtocolAnomaly(id, message);
    this.logger.warn(`protocol anomaly: ${message}`, { responseId: id });
    this.onAnomaly?.(anomaly);
  }
}
