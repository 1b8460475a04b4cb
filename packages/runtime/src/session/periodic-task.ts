import { unknownToErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";

export interface IntervalTimers {
  setIntervalFn?: (handler: () => void, intervalMs: number) => NodeJS.Timeout;
  clearIntervalFn?: (handle: NodeJS.Timeout) => void;
}

export interface PeriodicTaskOptions extends IntervalTimers {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  logger: Logger;
}

/**
 * Runs `run` on a fixed interval. A tick that fires while the previous run is still
 * in flight is skipped.
 */
export class PeriodicTask {
  private readonly name: string;
  private readonly intervalMs: number;
  private readonly runTick: () => Promise<void>;
  private readonly logger: Logger;
  private readonly setIntervalFn: (handler: () => void, intervalMs: number) => NodeJS.Timeout;
  private readonly clearIntervalFn: (handle: NodeJS.Timeout) => void;

  private handle: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private skipped = 0;

  constructor(options: PeriodicTaskOptions) {
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.runTick = options.run;
    this.logger = options.logger;
    this.setIntervalFn = options.setIntervalFn ?? setInterval;
    this.clearIntervalFn = options.clearIntervalFn ?? clearInterval;
  }

  get active(): boolean {
    return this.handle !== null;
  }

  get skippedTicks(): number {
    return this.skipped;
  }

  start(): void {
    if (this.handle !== null) {
      return;
    }

    this.handle = this.setIntervalFn(() => {
      void this.tick();
    }, this.intervalMs);
    this.logger.debug(`${this.name} started`, { intervalMs: this.intervalMs });
  }

  /** Stops scheduling further ticks without waiting for the current one */
  cancel(): void {
    if (this.handle === null) {
      return;
    }

    this.clearIntervalFn(this.handle);
    this.handle = null;
    this.logger.debug(`${this.name} stopped`);
  }

  async stop(): Promise<void> {
    this.cancel();
    if (this.inFlight !== null) {
      await this.inFlight;
    }
  }

  tick(): Promise<void> {
    if (this.inFlight !== null) {
      this.skipped += 1;
      this.logger.debug(`${this.name} tick skipped; previous run still in flight`);
      return this.inFlight;
    }

    const run = this.runTick()
      .catch((error: unknown) => {
        this.logger.warn(`${this.name} tick failed`, { error: unknownToErrorMessage(error) });
      })
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = run;
    return run;
  }
}
