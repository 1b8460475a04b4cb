import type { Writable } from "node:stream";
import type { JsonRpcMessage } from "@toolpipe/types";
import { TransportWriteError } from "../errors.js";
import { encodeFrame } from "./frame-codec.js";

export interface MessageWriter {
  writeMessage(message: JsonRpcMessage): Promise<void>;
}

function ignore(): void {
  // queue continuation only; the caller observes the outcome through its own promise
}

/**
 * Serializes every outbound frame through one queue so two senders never interleave bytes.
 * `writeMessage` resolves once the stream has accepted the frame, not when a reply arrives.
 */
export class FrameWriter implements MessageWriter {
  private tail: Promise<void> = Promise.resolve();
  private framesWritten = 0;

  constructor(private readonly stream: Writable) {}

  get writtenCount(): number {
    return this.framesWritten;
  }

  writeMessage(message: JsonRpcMessage): Promise<void> {
    let frame: string;
    try {
      frame = encodeFrame(message);
    } catch (error) {
      return Promise.reject(new TransportWriteError("message could not be serialized", { cause: error }));
    }

    const run = this.tail.then(() => this.writeFrame(frame));
    this.tail = run.then(ignore, ignore);
    return run;
  }

  private writeFrame(frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.stream.destroyed || this.stream.writableEnded) {
        reject(new TransportWriteError("outbound stream is closed"));
        return;
      }

      this.stream.write(frame, "utf8", (error?: Error | null) => {
        if (error !== undefined && error !== null) {
          reject(new TransportWriteError(`write to peer failed: ${error.message}`, { cause: error }));
          return;
        }

        this.framesWritten += 1;
        resolve();
      });
    });
  }
}
