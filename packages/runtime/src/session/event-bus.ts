import type { SessionEvent, SessionEventOf, SessionEventType } from "@toolpipe/types";
import { unknownToErrorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";

export type SessionEventListener<T extends SessionEventType = SessionEventType> = (
  event: SessionEventOf<T>,
) => void | Promise<void>;

type AnyListener = (event: SessionEvent) => void | Promise<void>;

/**
 * Typed publish/subscribe for session events.
 *
 * A listener that throws or rejects is logged; it never stops delivery to the others
 * and never reaches the publisher.
 */
export class SessionEventBus {
  private listeners = new Map<SessionEventType, Set<AnyListener>>();

  constructor(private readonly logger: Logger) {}

  on<T extends SessionEventType>(type: T, listener: SessionEventListener<T>): () => void {
    const wrapped: AnyListener = (event) => {
      if (!isEventOf(event, type)) {
        return;
      }
      return listener(event);
    };

    const set = this.listeners.get(type) ?? new Set<AnyListener>();
    set.add(wrapped);
    this.listeners.set(type, set);

    return () => {
      const current = this.listeners.get(type);
      if (current === undefined) {
        return;
      }

      current.delete(wrapped);
      if (current.size === 0) {
        this.listeners.delete(type);
      }
    };
  }

  async emit(event: SessionEvent): Promise<void> {
    const listeners = this.listeners.get(event.type);
    if (listeners === undefined || listeners.size === 0) {
      return;
    }

    const snapshot = [...listeners];
    for (const listener of snapshot) {
      try {
        await listener(event);
      } catch (error) {
        this.logger.warn(`event listener failed for '${event.type}'`, {
          error: unknownToErrorMessage(error),
        });
      }
    }
  }

  /** Fire-and-forget variant for synchronous call sites */
  publish(event: SessionEvent): void {
    void this.emit(event);
  }

  clear(): void {
    this.listeners.clear();
  }
}

function isEventOf<T extends SessionEventType>(event: SessionEvent, type: T): event is SessionEventOf<T> {
  return event.type === type;
}
