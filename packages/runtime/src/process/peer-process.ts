/**
 * Owns the tool server child process and its three standard streams.
 */
import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { SpawnError, unknownToErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";

export const DEFAULT_SHUTDOWN_GRACE_PERIOD_MS = 2_000;

export interface PeerSpawnRequest {
  command: string;
  args: readonly string[];
  /** Merged over the parent's environment */
  env?: Record<string, string>;
  cwd?: string;
}

export interface PeerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface TerminateOptions {
  gracePeriodMs?: number;
}

export interface PeerProcessHandle {
  readonly pid: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  /** null while the process is running */
  readonly exit: PeerExit | null;
  onExit(listener: (exit: PeerExit) => void): () => void;
  /**
   * Ends stdin, sends SIGTERM and escalates to SIGKILL after the grace period.
   * Repeated calls share one termination.
   */
  terminate(options?: TerminateOptions): Promise<PeerExit>;
}

export interface PeerProcessSpawner {
  spawn(request: PeerSpawnRequest): Promise<PeerProcessHandle>;
}

export interface NodePeerProcessSpawnerOptions {
  logger?: Logger;
  setTimeoutFn?: (handler: () => void, timeoutMs: number) => NodeJS.Timeout;
  clearTimeoutFn?: (handle: NodeJS.Timeout) => void;
}

interface TerminationTimers {
  setTimeoutFn: (handler: () => void, timeoutMs: number) => NodeJS.Timeout;
  clearTimeoutFn: (handle: NodeJS.Timeout) => void;
}

class NodePeerProcess implements PeerProcessHandle {
  private readonly exitListeners = new Set<(exit: PeerExit) => void>();
  private exitInfo: PeerExit | null = null;
  private termination: Promise<PeerExit> | null = null;

  constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    readonly pid: number,
    private readonly logger: Logger,
    private readonly timers: TerminationTimers,
  ) {
    child.on("exit", (code, signal) => {
      this.exitInfo = { code, signal };
      this.logger.debug("peer exited", { pid, code, signal });
      for (const listener of [...this.exitListeners]) {
        listener(this.exitInfo);
      }
      this.exitListeners.clear();
    });

    child.on("error", (error) => {
      this.logger.warn("peer process error", { pid, error: error.message });
    });

    // EPIPE after the peer died must not become an uncaught stream error.
    child.stdin.on("error", (error) => {
      this.logger.debug("peer stdin error", { pid, error: error.message });
    });
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  get stderr(): Readable {
    return this.child.stderr;
  }

  get exit(): PeerExit | null {
    return this.exitInfo;
  }

  onExit(listener: (exit: PeerExit) => void): () => void {
    const current = this.exitInfo;
    if (current !== null) {
      listener(current);
      return () => {
        // already exited
      };
    }

    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  terminate(options: TerminateOptions = {}): Promise<PeerExit> {
    if (this.termination !== null) {
      return this.termination;
    }

    const gracePeriodMs = options.gracePeriodMs ?? DEFAULT_SHUTDOWN_GRACE_PERIOD_MS;

    this.termination = new Promise<PeerExit>((resolve) => {
      const current = this.exitInfo;
      if (current !== null) {
        resolve(current);
        return;
      }

      const timer = this.timers.setTimeoutFn(() => {
        if (this.exitInfo !== null) {
          return;
        }
        this.logger.warn("peer did not exit within grace period; sending SIGKILL", { pid: this.pid, gracePeriodMs });
        this.child.kill("SIGKILL");
      }, gracePeriodMs);

      this.onExit((exit) => {
        this.timers.clearTimeoutFn(timer);
        resolve(exit);
      });

      this.child.stdin.end();
      this.child.kill("SIGTERM");
    });

    return this.termination;
  }
}

export class NodePeerProcessSpawner implements PeerProcessSpawner {
  private readonly logger: Logger;
  private readonly timers: TerminationTimers;

  constructor(options: NodePeerProcessSpawnerOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.timers = {
      setTimeoutFn: options.setTimeoutFn ?? setTimeout,
      clearTimeoutFn: options.clearTimeoutFn ?? clearTimeout,
    };
  }

  spawn(request: PeerSpawnRequest): Promise<PeerProcessHandle> {
    return new Promise<PeerProcessHandle>((resolve, reject) => {
      let child: ChildProcessWithoutNullStreams;
      try {
        child = spawn(request.command, request.args, {
          cwd: request.cwd,
          env: request.env === undefined ? process.env : { ...process.env, ...request.env },
          windowsHide: true,
        });
      } catch (error) {
        reject(new SpawnError(request.command, request.args, { cause: error }));
        return;
      }

      const onSpawn = (): void => {
        child.off("error", onError);
        const pid = child.pid;
        if (pid === undefined) {
          reject(new SpawnError(request.command, request.args, { cause: new Error("process has no pid") }));
          return;
        }

        this.logger.debug("peer spawned", { pid, command: request.command });
        resolve(new NodePeerProcess(child, pid, this.logger, this.timers));
      };

      const onError = (error: Error): void => {
        child.off("spawn", onSpawn);
        reject(new SpawnError(request.command, request.args, { cause: error }));
      };

      child.once("spawn", onSpawn);
      child.once("error", onError);
    });
  }
}

/**
 * Calls `onLine` for each line the stream produces. Returns a function that stops forwarding.
 */
export function forwardLines(stream: Readable, onLine: (line: string) => void, logger?: Logger): () => void {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  lines.on("line", (line) => {
    if (line.length === 0) {
      return;
    }
    try {
      onLine(line);
    } catch (error) {
      logger?.warn("stderr line handler failed", { error: unknownToErrorMessage(error) });
    }
  });

  return () => {
    lines.close();
  };
}
