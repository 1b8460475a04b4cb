import type { SessionEvent } from "@toolpipe/types";
import { SessionClosedError, unknownToErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { RpcChannel } from "./handshake.js";
import type { IntervalTimers } from "./periodic-task.js";
import { PeriodicTask } from "./periodic-task.js";

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 5_000;
export const DEFAULT_HEARTBEAT_TIMEOUT_MS = 5_000;

export interface HeartbeatOptions extends IntervalTimers {
  channel: RpcChannel;
  logger: Logger;
  publish: (event: SessionEvent) => void;
  intervalMs?: number;
  timeoutMs?: number;
  now?: () => Date;
}

/**
 * Sends `ping` on every tick. Failures are counted and reported, never escalated:
 * transport loss is handled by the response listener.
 */
export class HeartbeatTask {
  private readonly channel: RpcChannel;
  private readonly logger: Logger;
  private readonly publish: (event: SessionEvent) => void;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly task: PeriodicTask;

  private consecutive = 0;
  private total = 0;

  constructor(options: HeartbeatOptions) {
    this.channel = options.channel;
    this.logger = options.logger;
    this.publish = options.publish;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
    this.task = new PeriodicTask({
      name: "heartbeat",
      intervalMs: options.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS,
      run: () => this.beat(),
      logger: options.logger,
      setIntervalFn: options.setIntervalFn,
      clearIntervalFn: options.clearIntervalFn,
    });
  }

  get consecutiveFailures(): number {
    return this.consecutive;
  }

  get totalFailures(): number {
    return this.total;
  }

  get active(): boolean {
    return this.task.active;
  }

  start(): void {
    this.task.start();
  }

  cancel(): void {
    this.task.cancel();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  tick(): Promise<void> {
    return this.task.tick();
  }

  private async beat(): Promise<void> {
    const startedAt = this.now().getTime();

    try {
      await this.channel.send("ping", undefined, { timeoutMs: this.timeoutMs });
    } catch (error) {
      if (error instanceof SessionClosedError) {
        this.task.cancel();
        return;
      }

      this.consecutive += 1;
      this.total += 1;
      const errorMessage = unknownToErrorMessage(error);
      this.logger.warn("heartbeat failed", { consecutiveFailures: this.consecutive, error: errorMessage });
      this.publish({
        type: "heartbeat.failed",
        timestamp: this.now().toISOString(),
        consecutiveFailures: this.consecutive,
        errorMessage,
      });
      return;
    }

    this.consecutive = 0;
    const finishedAt = this.now();
    this.publish({
      type: "heartbeat.succeeded",
      timestamp: finishedAt.toISOString(),
      roundTripMs: Math.max(0, finishedAt.getTime() - startedAt),
    });
  }
}
