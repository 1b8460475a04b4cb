import type { ClassifiedMessage, JsonRpcNotification, JsonRpcRequest } from "@toolpipe/types";
import {
  createErrorResponse,
  createSuccessResponse,
  isJsonRpcErrorResponse,
  JsonRpcErrorCode,
} from "@toolpipe/types";
import type { FrameError } from "../errors.js";
import { SessionClosedError, unknownToErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import type { RequestMultiplexer } from "../rpc/request-multiplexer.js";
import type { ReadResult } from "../transport/frame-reader.js";
import type { MessageWriter } from "../transport/frame-writer.js";

/**
 * Receives every notification the peer sends. Not awaited by the listener.
 */
export type NotificationSink = (notification: JsonRpcNotification) => void | Promise<void>;

export interface FrameSource {
  readNext(): Promise<ReadResult>;
}

export interface ListenerClosure {
  reason: string;
  error?: Error;
}

export interface ResponseListenerOptions {
  reader: FrameSource;
  multiplexer: RequestMultiplexer;
  /** Used to answer requests the peer sends to us */
  writer: MessageWriter;
  logger?: Logger;
  notificationSink?: NotificationSink;
  onFrameError?: (error: FrameError) => void;
  onClosed?: (closure: ListenerClosure) => void;
}

export interface ListenerCounters {
  notificationsReceived: number;
  frameErrors: number;
  peerRequests: number;
}

const PEER_CLOSED_REASON = "peer closed its output stream";

/**
 * The single read loop of a session. It is the only caller of `readNext()`; foreground callers
 * only ever wait on their own pending entry, so neither side can block the other.
 */
export class ResponseListener {
  private readonly reader: FrameSource;
  private readonly multiplexer: RequestMultiplexer;
  private readonly writer: MessageWriter;
  private readonly logger: Logger;
  private readonly notificationSink?: NotificationSink;
  private readonly onFrameError?: (error: FrameError) => void;
  private readonly onClosed?: (closure: ListenerClosure) => void;
  private readonly counters: ListenerCounters = {
    notificationsReceived: 0,
    frameErrors: 0,
    peerRequests: 0,
  };

  private loop: Promise<void> | null = null;

  constructor(options: ResponseListenerOptions) {
    this.reader = options.reader;
    this.multiplexer = options.multiplexer;
    this.writer = options.writer;
    this.logger = options.logger ?? createSilentLogger();
    this.notificationSink = options.notificationSink;
    this.onFrameError = options.onFrameError;
    this.onClosed = options.onClosed;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /** Resolves when the loop has ended and pending requests have been failed */
  get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  stats(): ListenerCounters {
    return { ...this.counters };
  }

  start(): void {
    if (this.loop !== null) {
      throw new Error("ResponseListener is already running");
    }

    this.loop = this.run();
  }

  private async run(): Promise<void> {
    let closure: ListenerClosure = { reason: PEER_CLOSED_REASON };

    try {
      for (;;) {
        const result = await this.reader.readNext();

        if (result.kind === "eof") {
          if (result.error !== undefined && closure.error === undefined) {
            closure = {
              reason: `transport error: ${result.error.message}`,
              error: result.error,
            };
          }
          break;
        }

        if (result.kind === "frame_error") {
          this.handleFrameError(result.error);
          if (result.error.fatal) {
            closure = { reason: result.error.message, error: result.error };
          }
          continue;
        }

        this.dispatch(result.message);
      }
    } catch (error) {
      closure = {
        reason: `listener failed: ${unknownToErrorMessage(error)}`,
        error: error instanceof Error ? error : undefined,
      };
    }

    this.logger.debug("listener stopped", { reason: closure.reason });
    this.multiplexer.failAll(new SessionClosedError(closure.reason, { cause: closure.error }), { closed: true });
    this.onClosed?.(closure);
  }

  private dispatch(classified: ClassifiedMessage): void {
    switch (classified.kind) {
      case "response": {
        const response = classified.message;
        if (isJsonRpcErrorResponse(response)) {
          this.multiplexer.fail(response.id, response.error);
        } else {
          this.multiplexer.resolve(response.id, response.result);
        }
        return;
      }
      case "notification":
        this.deliverNotification(classified.message);
        return;
      case "request":
        this.answerPeerRequest(classified.message);
        return;
    }
  }

  private deliverNotification(notification: JsonRpcNotification): void {
    this.counters.notificationsReceived += 1;

    const sink = this.notificationSink;
    if (sink === undefined) {
      this.logger.debug(`<- ${notification.method} (notification, no sink)`);
      return;
    }

    void Promise.resolve()
      .then(() => sink(notification))
      .catch((error: unknown) => {
        this.logger.warn(`notification sink failed for '${notification.method}'`, {
          error: unknownToErrorMessage(error),
        });
      });
  }

  private answerPeerRequest(request: JsonRpcRequest): void {
    this.counters.peerRequests += 1;

    const response =
      request.method === "ping"
        ? createSuccessResponse(request.id, {})
        : createErrorResponse(request.id, JsonRpcErrorCode.METHOD_NOT_FOUND, `method not found: ${request.method}`);

    if (request.method !== "ping") {
      this.logger.debug(`peer requested unsupported method '${request.method}'`, { id: request.id });
    }

    void this.writer.writeMessage(response).catch((error: unknown) => {
      this.logger.warn(`failed to answer peer request '${request.method}'`, {
        error: unknownToErrorMessage(error),
      });
    });
  }

  private handleFrameError(error: FrameError): void {
    this.counters.frameErrors += 1;

    const data = { code: error.code, excerpt: error.excerpt };
    if (error.fatal) {
      this.logger.error(error.message, data);
    } else {
      this.logger.warn(`${error.message}; skipping line`, data);
    }

    this.onFrameError?.(error);
  }
}
