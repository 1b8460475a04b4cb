import type { SessionEvent, SessionMetricsSnapshot } from "@toolpipe/types";
import { metricsSnapshotToJson } from "@toolpipe/types";
import { SessionClosedError, unknownToErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { RpcChannel } from "./handshake.js";
import type { IntervalTimers } from "./periodic-task.js";
import { PeriodicTask } from "./periodic-task.js";

export const DEFAULT_METRICS_INTERVAL_MS = 10_000;
export const DEFAULT_METRICS_NOTIFY_METHOD = "notifications/metrics";

export type MetricsSink = (snapshot: SessionMetricsSnapshot) => void | Promise<void>;

export interface MetricsTaskOptions extends IntervalTimers {
  channel: RpcChannel;
  logger: Logger;
  publish: (event: SessionEvent) => void;
  snapshot: () => SessionMetricsSnapshot;
  sink?: MetricsSink;
  /** Notification sent to the peer with each snapshot; null keeps metrics local */
  notifyMethod?: string | null;
  intervalMs?: number;
  now?: () => Date;
}

export class MetricsTask {
  private readonly channel: RpcChannel;
  private readonly logger: Logger;
  private readonly publish: (event: SessionEvent) => void;
  private readonly takeSnapshot: () => SessionMetricsSnapshot;
  private readonly sink: MetricsSink;
  private readonly notifyMethod: string | null;
  private readonly now: () => Date;
  private readonly task: PeriodicTask;

  private failed = 0;

  constructor(options: MetricsTaskOptions) {
    this.channel = options.channel;
    this.logger = options.logger;
    this.publish = options.publish;
    this.takeSnapshot = options.snapshot;
    this.sink =
      options.sink ??
      ((snapshot) => {
        options.logger.debug("metrics", metricsSnapshotToJson(snapshot));
      });
    this.notifyMethod = options.notifyMethod === undefined ? DEFAULT_METRICS_NOTIFY_METHOD : options.notifyMethod;
    this.now = options.now ?? (() => new Date());
    this.task = new PeriodicTask({
      name: "metrics",
      intervalMs: options.intervalMs ?? DEFAULT_METRICS_INTERVAL_MS,
      run: () => this.report(),
      logger: options.logger,
      setIntervalFn: options.setIntervalFn,
      clearIntervalFn: options.clearIntervalFn,
    });
  }

  get failures(): number {
    return this.failed;
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

  private async report(): Promise<void> {
    const snapshot = this.takeSnapshot();

    try {
      await this.sink(snapshot);
    } catch (error) {
      this.failed += 1;
      this.logger.warn("metrics sink failed", { error: unknownToErrorMessage(error) });
    }

    this.publish({
      type: "metrics.snapshot",
      timestamp: this.now().toISOString(),
      snapshot,
    });

    if (this.notifyMethod === null) {
      return;
    }

    try {
      await this.channel.notify(this.notifyMethod, metricsSnapshotToJson(snapshot));
    } catch (error) {
      if (error instanceof SessionClosedError) {
        this.task.cancel();
        return;
      }

      this.failed += 1;
      this.logger.warn("metrics notification failed", { error: unknownToErrorMessage(error) });
    }
  }
}
