import type { Readable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import type { ClassifiedMessage } from "@toolpipe/types";
import type { FrameError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import { DEFAULT_MAX_FRAME_BYTES, decodeFrameLine, LineFramer } from "./frame-codec.js";

export type ReadResult =
  | { kind: "message"; message: ClassifiedMessage }
  | { kind: "frame_error"; error: FrameError }
  | { kind: "eof"; error?: Error };

export interface FrameReaderOptions {
  maxFrameBytes?: number;
  /** Buffered results above which the stream is paused (default: 256) */
  highWaterMark?: number;
  logger?: Logger;
}

/**
 * Pulls frames off the inbound stream one at a time.
 *
 * Malformed lines surface as non-fatal `frame_error` results and reading continues with the
 * next line. An oversize frame is reported once as fatal, followed by `eof`.
 * Only one `readNext()` may be outstanding.
 */
export class FrameReader {
  private readonly queue: ReadResult[] = [];
  private readonly decoder = new StringDecoder("utf8");
  private readonly framer: LineFramer;
  private readonly highWaterMark: number;
  private readonly logger: Logger;
  private waiter: ((result: ReadResult) => void) | null = null;
  private finished = false;
  private eofResult: ReadResult = { kind: "eof" };
  private paused = false;

  private readonly onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === "string" ? chunk : this.decoder.write(chunk);
    this.consume(text);
  };

  private readonly onEnd = (): void => {
    this.consume(this.decoder.end());
    const rest = this.framer.flush();
    if (rest !== undefined) {
      this.deliver(decodeFrameLine(rest));
    }
    this.finish();
  };

  private readonly onClose = (): void => {
    this.onEnd();
  };

  private readonly onError = (error: Error): void => {
    this.finish(error);
  };

  private readonly onLateError = (error: Error): void => {
    this.logger.debug("inbound stream error after reader closed", { error: error.message });
  };

  constructor(
    private readonly stream: Readable,
    options: FrameReaderOptions = {},
  ) {
    this.framer = new LineFramer(options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES);
    this.highWaterMark = options.highWaterMark ?? 256;
    this.logger = options.logger ?? createSilentLogger();

    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onClose);
    stream.on("error", this.onError);
  }

  get closed(): boolean {
    return this.finished;
  }

  readNext(): Promise<ReadResult> {
    const next = this.queue.shift();
    if (next !== undefined) {
      this.resumeIfDrained();
      return Promise.resolve(next);
    }

    if (this.finished) {
      return Promise.resolve(this.eofResult);
    }

    if (this.waiter !== null) {
      return Promise.reject(new Error("FrameReader.readNext() is already pending"));
    }

    return new Promise<ReadResult>((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Stops reading. Pending and later reads return `eof`; buffered results are dropped.
   */
  close(): void {
    this.queue.length = 0;
    this.finish();
  }

  private consume(text: string): void {
    if (this.finished) {
      return;
    }

    const { lines, overflow } = this.framer.push(text);
    for (const line of lines) {
      this.deliver(decodeFrameLine(line));
    }

    if (overflow !== undefined) {
      this.deliver({ kind: "frame_error", error: overflow });
      this.finish();
    }
  }

  private deliver(result: ReadResult): void {
    if (this.finished) {
      return;
    }

    const waiter = this.waiter;
    if (waiter !== null) {
      this.waiter = null;
      waiter(result);
      return;
    }

    this.queue.push(result);
    if (!this.paused && this.queue.length >= this.highWaterMark) {
      this.paused = true;
      this.stream.pause();
    }
  }

  private resumeIfDrained(): void {
    if (this.paused && this.queue.length < this.highWaterMark / 2) {
      this.paused = false;
      this.stream.resume();
    }
  }

  private finish(error?: Error): void {
    if (this.finished) {
      return;
    }

    this.finished = true;
    this.eofResult = error === undefined ? { kind: "eof" } : { kind: "eof", error };

    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onClose);
    this.stream.off("error", this.onError);
    this.stream.on("error", this.onLateError);
    // Drain whatever the peer still writes so it never blocks on a full pipe.
    this.stream.resume();

    const waiter = this.waiter;
    if (waiter !== null) {
      this.waiter = null;
      waiter(this.eofResult);
    }
  }
}
