import type {
  JsonObject,
  JsonValue,
  SessionEvent,
  SessionEventType,
  SessionMetricsSnapshot,
  SessionState,
  ToolCallParams,
  ToolCatalog,
  ToolDescriptor,
} from "@toolpipe/types";
import type { FrameError, ProtocolAnomaly } from "../errors.js";
import {
  InitializationError,
  NotReadyError,
  SessionClosedError,
  unknownToErrorMessage,
} from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import type { PeerProcessHandle, PeerProcessSpawner } from "../process/peer-process.js";
import { DEFAULT_SHUTDOWN_GRACE_PERIOD_MS, forwardLines, NodePeerProcessSpawner } from "../process/peer-process.js";
import type { PendingRequestInfo, RequestOptions } from "../rpc/request-multiplexer.js";
import { RequestMultiplexer } from "../rpc/request-multiplexer.js";
import { resolveRequestTimeoutMs } from "../rpc/request-timeout.js";
import { FrameReader } from "../transport/frame-reader.js";
import { FrameWriter } from "../transport/frame-writer.js";
import type { SessionEventListener } from "./event-bus.js";
import { SessionEventBus } from "./event-bus.js";
import type { ClientInfo } from "./handshake.js";
import { discoverTools, HandshakeCoordinator } from "./handshake.js";
import { HeartbeatTask } from "./heartbeat.js";
import type { MetricsSink } from "./metrics.js";
import { MetricsTask } from "./metrics.js";
import type { IntervalTimers } from "./periodic-task.js";
import type { ListenerClosure, NotificationSink } from "./response-listener.js";
import { ResponseListener } from "./response-listener.js";

export const DEFAULT_CLIENT_INFO: ClientInfo = {
  name: "toolpipe",
  version: "0.1.0",
};

export interface HeartbeatSettings {
  enabled?: boolean;
  intervalMs?: number;
  timeoutMs?: number;
}

export interface MetricsSettings {
  enabled?: boolean;
  intervalMs?: number;
  notifyMethod?: string | null;
}

export interface AgentSessionOptions extends IntervalTimers {
  command: string;
  args?: readonly string[];
  env?: Record<string, string>;
  cwd?: string;
  clientInfo?: ClientInfo;
  requestTimeoutMs?: number;
  /** Defaults to requestTimeoutMs */
  initializeTimeoutMs?: number;
  maxFrameBytes?: number;
  shutdownGracePeriodMs?: number;
  heartbeat?: HeartbeatSettings;
  metrics?: MetricsSettings;
  notificationSink?: NotificationSink;
  metricsSink?: MetricsSink;
  logger?: Logger;
  spawner?: PeerProcessSpawner;
  now?: () => Date;
  setTimeoutFn?: (handler: () => void, timeoutMs: number) => NodeJS.Timeout;
  clearTimeoutFn?: (handle: NodeJS.Timeout) => void;
}

interface ShutdownOptions {
  /** Skip `closing`: the peer's output has already ended */
  transportLost?: boolean;
}

/** Everything that exists only while a peer process is attached */
interface SessionConnection {
  readonly peer: PeerProcessHandle;
  readonly reader: FrameReader;
  readonly multiplexer: RequestMultiplexer;
  readonly listener: ResponseListener;
  readonly detach: Array<() => void>;
  heartbeat: HeartbeatTask | null;
  metrics: MetricsTask | null;
}

/**
 * One tool server session: spawn, handshake, tool calls, teardown.
 *
 * State machine: uninitialized -> initializing -> ready -> closing -> closed.
 * `closing` belongs to close() and a failed handshake. A transport failure moves
 * the session straight to closed and the teardown runs after the transition.
 */
export class AgentSession {
  private readonly options: AgentSessionOptions;
  private readonly logger: Logger;
  private readonly spawner: PeerProcessSpawner;
  private readonly events: SessionEventBus;
  private readonly now: () => Date;
  private readonly requestTimeoutMs: number;

  private currentState: SessionState = "uninitialized";
  private connection: SessionConnection | null = null;
  private catalog: ToolCatalog = [];
  private peerInfo: JsonObject | undefined;
  private negotiatedVersion: string | undefined;
  private startedAt: Date | null = null;
  private frameErrors = 0;
  private closing: Promise<void> | null = null;

  constructor(options: AgentSessionOptions) {
    this.options = options;
    this.logger = (options.logger ?? createSilentLogger()).child("session");
    this.spawner =
      options.spawner ??
      new NodePeerProcessSpawner({
        logger: this.logger,
        setTimeoutFn: options.setTimeoutFn,
        clearTimeoutFn: options.clearTimeoutFn,
      });
    this.events = new SessionEventBus(this.logger);
    this.now = options.now ?? (() => new Date());
    this.requestTimeoutMs = resolveRequestTimeoutMs(options.requestTimeoutMs);
  }

  get state(): SessionState {
    return this.currentState;
  }

  get pid(): number | undefined {
    return this.connection?.peer.pid;
  }

  get serverInfo(): JsonObject | undefined {
    return this.peerInfo;
  }

  get protocolVersion(): string | undefined {
    return this.negotiatedVersion;
  }

  on<T extends SessionEventType>(type: T, listener: SessionEventListener<T>): () => void {
    return this.events.on(type, listener);
  }

  async start(): Promise<void> {
    if (this.currentState !== "uninitialized") {
      throw new InitializationError(`start() called in state '${this.currentState}'`, {
        suggestion: "Create a new AgentSession to reconnect.",
      });
    }

    this.transition("initializing", "start_requested");

    const args = this.options.args ?? [];
    let peer: PeerProcessHandle;
    try {
      peer = await this.spawner.spawn({
        command: this.options.command,
        args,
        env: this.options.env,
        cwd: this.options.cwd,
      });
    } catch (error) {
      this.logger.error(unknownToErrorMessage(error));
      this.transition("closed", "spawn_failed");
      throw error;
    }

    if (this.state !== "initializing") {
      await peer.terminate({ gracePeriodMs: this.gracePeriodMs() });
      throw new SessionClosedError("session closed during start");
    }

    this.startedAt = this.now();
    const connection = this.attach(peer);
    this.connection = connection;
    connection.listener.start();

    try {
      const result = await new HandshakeCoordinator({
        channel: connection.multiplexer,
        clientInfo: this.options.clientInfo ?? DEFAULT_CLIENT_INFO,
        initializeTimeoutMs: this.options.initializeTimeoutMs ?? this.requestTimeoutMs,
        requestTimeoutMs: this.requestTimeoutMs,
        logger: this.logger,
      }).run();

      this.catalog = result.tools;
      this.peerInfo = result.serverInfo;
      this.negotiatedVersion = result.protocolVersion;
    } catch (error) {
      this.logger.error(unknownToErrorMessage(error));
      await this.shutdown("initialization_failed", "initialization failed");
      throw error;
    }

    if (this.state !== "initializing") {
      throw new SessionClosedError("transport closed before the session became ready");
    }

    this.transition("ready", "handshake_completed");
    this.logger.info(`session ready with ${this.catalog.length} tool(s)`, { pid: peer.pid });
    this.startBackgroundTasks(connection);
  }

  async callTool(name: string, args: JsonObject = {}, options: RequestOptions = {}): Promise<JsonValue> {
    const connection = this.requireReady("callTool");
    const params: ToolCallParams = { name, arguments: args };
    return connection.multiplexer.send("tools/call", params, options);
  }

  /**
   * The tool catalog discovered by the handshake (or the last refreshTools()).
   */
  listTools(): ToolDescriptor[] {
    this.requireReady("listTools");
    return [...this.catalog];
  }

  async refreshTools(): Promise<ToolDescriptor[]> {
    const connection = this.requireReady("refreshTools");
    const tools = await discoverTools(connection.multiplexer, { timeoutMs: this.requestTimeoutMs });
    this.catalog = tools;
    return [...tools];
  }

  /**
   * Plain-text tool listing for a caller that picks tools by description.
   */
  describeTools(): string {
    return this.listTools()
      .map((tool) => `- ${tool.name}: ${tool.description.length > 0 ? tool.description : "(no description)"}`)
      .join("\n");
  }

  pendingRequests(): PendingRequestInfo[] {
    return this.connection?.multiplexer.pending() ?? [];
  }

  metrics(): SessionMetricsSnapshot {
    const connection = this.connection;
    const multiplexerStats = connection?.multiplexer.stats();
    const listenerStats = connection?.listener.stats();

    return {
      state: this.currentState,
      pid: connection?.peer.pid ?? 0,
      uptimeMs: this.startedAt === null ? 0 : Math.max(0, this.now().getTime() - this.startedAt.getTime()),
      pendingRequests: connection?.multiplexer.pendingCount ?? 0,
      requestsSent: multiplexerStats?.requestsSent ?? 0,
      responsesMatched: multiplexerStats?.responsesMatched ?? 0,
      requestTimeouts: multiplexerStats?.requestTimeouts ?? 0,
      protocolAnomalies: multiplexerStats?.protocolAnomalies ?? 0,
      frameErrors: this.frameErrors,
      notificationsReceived: listenerStats?.notificationsReceived ?? 0,
      heartbeatFailures: connection?.heartbeat?.totalFailures ?? 0,
      toolCount: this.catalog.length,
    };
  }

  /**
   * Idempotent. Pending requests fail with SessionClosedError and the peer is terminated.
   */
  close(): Promise<void> {
    return this.shutdown("close_requested", "session closed by client");
  }

  private requireReady(operation: string): SessionConnection {
    const connection = this.connection;
    if (this.currentState !== "ready" || connection === null) {
      throw new NotReadyError(operation, this.currentState);
    }
    return connection;
  }

  private attach(peer: PeerProcessHandle): SessionConnection {
    const writer = new FrameWriter(peer.stdin);
    const reader = new FrameReader(peer.stdout, {
      maxFrameBytes: this.options.maxFrameBytes,
      logger: this.logger.child("reader"),
    });
    const multiplexer = new RequestMultiplexer({
      writer,
      logger: this.logger.child("rpc"),
      defaultTimeoutMs: this.requestTimeoutMs,
      onAnomaly: (anomaly) => {
        this.publishAnomaly(anomaly);
      },
      now: this.now,
      setTimeoutFn: this.options.setTimeoutFn,
      clearTimeoutFn: this.options.clearTimeoutFn,
    });
    const listener = new ResponseListener({
      reader,
      multiplexer,
      writer,
      logger: this.logger.child("listener"),
      notificationSink: this.options.notificationSink,
      onFrameError: (error) => {
        this.publishFrameError(error);
      },
      onClosed: (closure) => {
        this.handleTransportClosed(closure);
      },
    });

    const detach: Array<() => void> = [];
    const peerLogger = this.logger.child("peer");
    if (peer.stderr !== null) {
      detach.push(
        forwardLines(
          peer.stderr,
          (line) => {
            peerLogger.debug(line);
            this.publish({ type: "peer.stderr", timestamp: this.timestamp(), line });
          },
          peerLogger,
        ),
      );
    }

    detach.push(
      peer.onExit((exit) => {
        this.publish({
          type: "peer.exited",
          timestamp: this.timestamp(),
          code: exit.code,
          signal: exit.signal,
        });
      }),
    );

    return { peer, reader, multiplexer, listener, detach, heartbeat: null, metrics: null };
  }

  private startBackgroundTasks(connection: SessionConnection): void {
    const heartbeatSettings = this.options.heartbeat ?? {};
    if (heartbeatSettings.enabled !== false) {
      connection.heartbeat = new HeartbeatTask({
        channel: connection.multiplexer,
        logger: this.logger.child("heartbeat"),
        publish: (event) => {
          this.publish(event);
        },
        intervalMs: heartbeatSettings.intervalMs,
        timeoutMs: heartbeatSettings.timeoutMs,
        now: this.now,
        setIntervalFn: this.options.setIntervalFn,
        clearIntervalFn: this.options.clearIntervalFn,
      });
      connection.heartbeat.start();
    }

    const metricsSettings = this.options.metrics ?? {};
    if (metricsSettings.enabled !== false) {
      connection.metrics = new MetricsTask({
        channel: connection.multiplexer,
        logger: this.logger.child("metrics"),
        publish: (event) => {
          this.publish(event);
        },
        snapshot: () => this.metrics(),
        sink: this.options.metricsSink,
        notifyMethod: metricsSettings.notifyMethod,
        intervalMs: metricsSettings.intervalMs,
        now: this.now,
        setIntervalFn: this.options.setIntervalFn,
        clearIntervalFn: this.options.clearIntervalFn,
      });
      connection.metrics.start();
    }
  }

  private handleTransportClosed(closure: ListenerClosure): void {
    if (this.currentState === "closing" || this.currentState === "closed") {
      return;
    }

    this.logger.warn(`transport closed: ${closure.reason}`);
    void this.shutdown("transport_closed", closure.reason, { transportLost: true });
  }

  private shutdown(reason: string, message: string, options: ShutdownOptions = {}): Promise<void> {
    if (this.closing === null) {
      this.closing = this.performShutdown(reason, message, options);
    }
    return this.closing;
  }

  private async performShutdown(reason: string, message: string, options: ShutdownOptions): Promise<void> {
    const connection = this.connection;
    if (connection === null) {
      this.transition("closed", reason);
      return;
    }

    // A lost transport is already closed; teardown continues behind it.
    this.transition(options.transportLost === true ? "closed" : "closing", reason);

    try {
      connection.heartbeat?.cancel();
      connection.metrics?.cancel();
      connection.multiplexer.failAll(new SessionClosedError(message), { closed: true });

      await Promise.all([connection.heartbeat?.stop(), connection.metrics?.stop()]);
      await connection.peer.terminate({ gracePeriodMs: this.gracePeriodMs() });

      connection.reader.close();
      await connection.listener.done;
    } catch (error) {
      this.logger.error(`teardown failed: ${unknownToErrorMessage(error)}`);
    } finally {
      for (const detach of connection.detach) {
        detach();
      }
      this.transition("closed", reason);
    }
  }

  private gracePeriodMs(): number {
    return this.options.shutdownGracePeriodMs ?? DEFAULT_SHUTDOWN_GRACE_PERIOD_MS;
  }

  private transition(to: SessionState, reason: string): void {
    const from = this.currentState;
    if (from === to) {
      return;
    }

    this.currentState = to;
    this.logger.debug(`state ${from} -> ${to}`, { reason });
    this.publish({
      type: "session.state_changed",
      timestamp: this.timestamp(),
      from,
      to,
      reason,
    });
  }

  private publishAnomaly(anomaly: ProtocolAnomaly): void {
    this.publish({
      type: "protocol.anomaly",
      timestamp: this.timestamp(),
      responseId: anomaly.responseId,
      message: anomaly.message,
    });
  }

  private publishFrameError(error: FrameError): void {
    this.frameErrors += 1;
    this.publish({
      type: "frame.error",
      timestamp: this.timestamp(),
      code: error.code,
      message: error.message,
      fatal: error.fatal,
    });
  }

  private publish(event: SessionEvent): void {
    this.events.publish(event);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
