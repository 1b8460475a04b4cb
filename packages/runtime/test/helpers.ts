import { PassThrough } from "node:stream";
import type { JsonObject, JsonValue } from "@toolpipe/types";
import { isJsonRpcId, isPlainObject } from "@toolpipe/types";
import type {
  PeerExit,
  PeerProcessHandle,
  PeerProcessSpawner,
  PeerSpawnRequest,
  TerminateOptions,
} from "../src/process/peer-process.js";
import type { LogLevel, Logger } from "../src/logging/logger.js";
import { createLogger } from "../src/logging/logger.js";

export type ReceivedMessage = Record<string, unknown>;

export interface ReceivedRequest {
  id: number | string;
  method: string;
  params: unknown;
}

interface MessageWaiter {
  predicate: (message: ReceivedMessage) => boolean;
  resolve: (message: ReceivedMessage) => void;
}

/**
 * In-process stand-in for a tool server. The client writes to `stdin`;
 * the test answers through `stdout`.
 */
export class FakePeerProcess implements PeerProcessHandle {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly received: ReceivedMessage[] = [];
  readonly terminateCalls: TerminateOptions[] = [];
  /** Lines written to stdin that were not JSON objects */
  readonly rawLines: string[] = [];

  private readonly consumed = new Set<number>();
  private readonly exitListeners = new Set<(exit: PeerExit) => void>();
  private waiters: MessageWaiter[] = [];
  private buffer = "";
  private exitInfo: PeerExit | null = null;

  constructor(
    readonly pid: number,
    private readonly exitOnTerminate = true,
  ) {
    this.stdin.setEncoding("utf8");
    this.stdin.on("data", (chunk: string) => {
      this.buffer += chunk;
      const lines = this.buffer.split("\n");
      this.buffer = lines.pop() ?? "";
      for (const line of lines) {
        this.accept(line);
      }
    });
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
    this.terminateCalls.push(options);
    if (this.exitInfo === null && this.exitOnTerminate) {
      this.emitExit(null, "SIGTERM");
    }

    const current = this.exitInfo;
    if (current !== null) {
      return Promise.resolve(current);
    }

    return new Promise<PeerExit>((resolve) => {
      this.onExit(resolve);
    });
  }

  /** Simulates the process exiting: its stdout reaches EOF */
  emitExit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitInfo !== null) {
      return;
    }

    this.exitInfo = { code, signal };
    this.stdout.end();
    this.stderr.end();
    for (const listener of [...this.exitListeners]) {
      listener(this.exitInfo);
    }
    this.exitListeners.clear();
  }

  /** Resolves with the first not-yet-consumed message that matches */
  waitForMessage(predicate: (message: ReceivedMessage) => boolean): Promise<ReceivedMessage> {
    for (let index = 0; index < this.received.length; index += 1) {
      const message = this.received[index];
      if (message !== undefined && !this.consumed.has(index) && predicate(message)) {
        this.consumed.add(index);
        return Promise.resolve(message);
      }
    }

    return new Promise<ReceivedMessage>((resolve) => {
      this.waiters.push({ predicate, resolve });
    });
  }

  async waitForRequest(method: string): Promise<ReceivedRequest> {
    const message = await this.waitForMessage((item) => item["method"] === method && "id" in item);
    const id = message["id"];
    if (!isJsonRpcId(id)) {
      throw new Error(`request '${method}' has no usable id`);
    }
    return { id, method, params: message["params"] };
  }

  waitForNotification(method: string): Promise<ReceivedMessage> {
    return this.waitForMessage((item) => item["method"] === method && !("id" in item));
  }

  waitForResponse(id: number | string): Promise<ReceivedMessage> {
    return this.waitForMessage((item) => item["id"] === id && !("method" in item));
  }

  respond(id: number | string, result: JsonValue): void {
    this.sendLine(JSON.stringify({ jsonrpc: "2.0", id, result }));
  }

  respondError(id: number | string, code: number, message: string): void {
    this.sendLine(JSON.stringify({ jsonrpc: "2.0", id, error: { code, message } }));
  }

  notify(method: string, params?: JsonObject): void {
    this.sendLine(JSON.stringify(params === undefined ? { jsonrpc: "2.0", method } : { jsonrpc: "2.0", method, params }));
  }

  sendLine(line: string): void {
    this.stdout.write(line + "\n");
  }

  private accept(line: string): void {
    if (line.trim().length === 0) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      this.rawLines.push(line);
      return;
    }

    if (!isPlainObject(parsed)) {
      this.rawLines.push(line);
      return;
    }

    const message = parsed;
    const index = this.received.length;
    this.received.push(message);

    const waiter = this.waiters.find((item) => item.predicate(message));
    if (waiter !== undefined) {
      this.consumed.add(index);
      this.waiters = this.waiters.filter((item) => item !== waiter);
      waiter.resolve(message);
    }
  }
}

export class FakePeerSpawner implements PeerProcessSpawner {
  private pidSeed = 100;

  readonly requests: PeerSpawnRequest[] = [];
  readonly spawned: FakePeerProcess[] = [];

  constructor(private readonly failWith?: Error) {}

  spawn(request: PeerSpawnRequest): Promise<PeerProcessHandle> {
    this.requests.push(request);
    if (this.failWith !== undefined) {
      return Promise.reject(this.failWith);
    }

    this.pidSeed += 1;
    const peer = new FakePeerProcess(this.pidSeed);
    this.spawned.push(peer);
    return Promise.resolve(peer);
  }

  latest(): FakePeerProcess {
    const peer = this.spawned[this.spawned.length - 1];
    if (peer === undefined) {
      throw new Error("no peer has been spawned");
    }
    return peer;
  }
}

/**
 * Answers `initialize` and a single-page `tools/list` the way a minimal tool server does.
 */
export async function serveHandshake(
  peer: FakePeerProcess,
  tools: JsonValue[],
  initializeResult: JsonObject = { protocolVersion: "2024-11-05", capabilities: {}, serverInfo: { name: "stub", version: "1.0.0" } },
): Promise<void> {
  const initialize = await peer.waitForRequest("initialize");
  peer.respond(initialize.id, initializeResult);

  await peer.waitForNotification("notifications/initialized");

  const list = await peer.waitForRequest("tools/list");
  peer.respond(list.id, { tools });
}

export function createInertInterval(): NodeJS.Timeout {
  const handle = setTimeout(() => {
    // no-op
  }, 0);
  clearTimeout(handle);
  return handle;
}

/**
 * Captures interval callbacks so tests can fire ticks by hand.
 */
export class ManualIntervals {
  readonly handlers: Array<() => void> = [];
  readonly cleared: NodeJS.Timeout[] = [];
  readonly intervals: number[] = [];

  readonly setIntervalFn = (handler: () => void, intervalMs: number): NodeJS.Timeout => {
    this.handlers.push(handler);
    this.intervals.push(intervalMs);
    return createInertInterval();
  };

  readonly clearIntervalFn = (handle: NodeJS.Timeout): void => {
    this.cleared.push(handle);
  };

  fire(index = 0): void {
    const handler = this.handlers[index];
    if (handler === undefined) {
      throw new Error(`no interval handler at index ${index}`);
    }
    handler();
  }
}

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
}

export function createCapturedLogger(level: LogLevel = "debug"): CapturedLogger {
  const lines: string[] = [];
  const write = (line: string): void => {
    lines.push(line);
  };
  return {
    logger: createLogger({ level, noColor: true, stdout: write, stderr: write }),
    lines,
  };
}

export function flushMicrotasks(): Promise<void> {
  return new Promise<void>((resolve) => {
    setImmediate(resolve);
  });
}

export async function waitUntil(condition: () => boolean, attempts = 200): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (condition()) {
      return;
    }
    await flushMicrotasks();
  }
  throw new Error("condition was not met in time");
}
