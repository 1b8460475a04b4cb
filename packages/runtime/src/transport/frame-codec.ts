import type { ClassifiedMessage, JsonRpcMessage } from "@toolpipe/types";
import { classifyJsonRpcMessage } from "@toolpipe/types";
import { FrameError } from "../errors.js";

/**
 * Wire format: newline-delimited JSON. One JSON-RPC message per line, UTF-8, `\n` terminated.
 */

export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

const EXCERPT_LENGTH = 120;

export type DecodedFrame =
  | { kind: "message"; message: ClassifiedMessage }
  | { kind: "frame_error"; error: FrameError };

export function encodeFrame(message: JsonRpcMessage): string {
  return JSON.stringify(message) + "\n";
}

function excerptOf(line: string): string {
  return line.length > EXCERPT_LENGTH ? `${line.slice(0, EXCERPT_LENGTH)}...` : line;
}

export function decodeFrameLine(line: string): DecodedFrame {
  const text = line.endsWith("\r") ? line.slice(0, -1) : line;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return {
      kind: "frame_error",
      error: new FrameError("FRAME_MALFORMED", "frame is not valid JSON", {
        cause: error,
        excerpt: excerptOf(text),
      }),
    };
  }

  const message = classifyJsonRpcMessage(parsed);
  if (message === undefined) {
    return {
      kind: "frame_error",
      error: new FrameError("FRAME_MALFORMED", "frame is not a JSON-RPC 2.0 message", {
        excerpt: excerptOf(text),
      }),
    };
  }

  return { kind: "message", message };
}

export interface LineFramerPushResult {
  lines: string[];
  /** Set once a line exceeded the frame limit; the framer accepts nothing afterwards */
  overflow?: FrameError;
}

/**
 * Splits decoded text into complete lines and enforces the frame size limit,
 * including on a partial line that has not seen its newline yet.
 */
export class LineFramer {
  private pending = "";
  private pendingBytes = 0;
  private overflowed = false;

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  get hasOverflowed(): boolean {
    return this.overflowed;
  }

  push(text: string): LineFramerPushResult {
    const lines: string[] = [];
    if (this.overflowed || text.length === 0) {
      return { lines };
    }

    const parts = text.split("\n");
    const last = parts.pop() ?? "";

    for (const part of parts) {
      const line = this.pending + part;
      const lineBytes = this.pendingBytes + Buffer.byteLength(part, "utf8");
      this.pending = "";
      this.pendingBytes = 0;

      if (lineBytes > this.maxFrameBytes) {
        return { lines, overflow: this.overflow(lineBytes, line) };
      }

      if (line.trim().length > 0) {
        lines.push(line);
      }
    }

    this.pending += last;
    this.pendingBytes += Buffer.byteLength(last, "utf8");
    if (this.pendingBytes > this.maxFrameBytes) {
      return { lines, overflow: this.overflow(this.pendingBytes, this.pending) };
    }

    return { lines };
  }

  /**
   * Returns the trailing partial line, if any, and resets the buffer.
   */
  flush(): string | undefined {
    const rest = this.pending;
    this.pending = "";
    this.pendingBytes = 0;
    if (this.overflowed || rest.trim().length === 0) {
      return undefined;
    }
    return rest;
  }

  private overflow(bytes: number, line: string): FrameError {
    this.overflowed = true;
    this.pending = "";
    this.pendingBytes = 0;
    return new FrameError("FRAME_TOO_LARGE", `frame exceeds ${this.maxFrameBytes} bytes (${bytes} buffered)`, {
      fatal: true,
      excerpt: excerptOf(line),
    });
  }
}
