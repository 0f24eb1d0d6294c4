import { Context, Threads } from "./context";

export type LifecycleEventType = "created" | "released" | "resumed" | "interrupted";

export interface LifecycleEvent {
  type: LifecycleEventType;
  thread: string;
  timestamp: number;
}

/**
 * Bounded, timestamped record of lifecycle transitions for one owner.
 * Each record is also emitted as `lifecycle.<type>` on the current
 * context's event bus.
 *
 * Keeps the first event ever recorded (creation) plus the most recent
 * `capacity - 1` events, so a postmortem always shows where the owner was
 * created and how it ended.
 *
 * @example
 * ```typescript
 * const log = new LifecycleLog(8);
 * log.record('created');
 * log.record('released');
 * log.toDebugString();
 * // "created@main released@main"
 * ```
 */
export class LifecycleLog {
  private first: LifecycleEvent | null = null;
  private readonly recent: LifecycleEvent[] = [];
  private dropped = 0;

  constructor(
    private readonly capacity: number = 16,
    private readonly now: () => number = Date.now,
  ) {
    if (!Number.isInteger(capacity) || capacity < 2) {
      throw new RangeError("LifecycleLog capacity must be an integer >= 2");
    }
  }

  record(type: LifecycleEventType, thread: string = Threads.currentName()): LifecycleEvent {
    const event: LifecycleEvent = { type, thread, timestamp: this.now() };
    Context.emit(`lifecycle.${type}`, event, "lifecycle-log");

    if (this.first === null) {
      this.first = event;
      return event;
    }

    this.recent.push(event);
    if (this.recent.length > this.capacity - 1) {
      this.recent.shift();
      this.dropped++;
    }
    return event;
  }

  entries(): readonly LifecycleEvent[] {
    return this.first === null ? [] : [this.first, ...this.recent];
  }

  /** Events of one type, oldest first. */
  threadsFor(type: LifecycleEventType): string[] {
    return this.entries()
      .filter((event) => event.type === type)
      .map((event) => event.thread);
  }

  get droppedCount(): number {
    return this.dropped;
  }

  toDebugString(): string {
    const parts = this.entries().map((event) => `${event.type}@${event.thread}`);
    if (this.dropped > 0) {
      parts.splice(1, 0, `(${this.dropped} dropped)`);
    }
    return parts.join(" ");
  }
}
