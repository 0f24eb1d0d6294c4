import { EventEmitter } from "node:events";

/**
 * What a resolution pass needs from the scheduler that owns it.
 *
 * The scheduler guarantees passes for the same tree version never run in
 * parallel; the pass only polls these flags.
 */
export interface PassFuture {
  isInterruptRequested(): boolean;
  isReleased(): boolean;
}

export type FutureStatus = "running" | "interrupt-requested" | "released";

/**
 * Handle for one scheduled resolution pass.
 *
 * A synchronous foreground request for the same tree version calls
 * `requestInterrupt()`; the background pass notices at its next check and
 * hands its partial tree back. `release()` marks the result as no longer
 * wanted.
 *
 * @example
 * ```typescript
 * const future = new ResolutionFuture('v3');
 * future.on('interrupt', () => log.debug('interrupt requested'));
 * future.requestInterrupt();
 * future.isInterruptRequested(); // true
 * ```
 */
export class ResolutionFuture extends EventEmitter implements PassFuture {
  private interruptRequested = false;
  private released = false;

  constructor(public readonly version: string | number = 0) {
    super();
  }

  get status(): FutureStatus {
    if (this.released) return "released";
    return this.interruptRequested ? "interrupt-requested" : "running";
  }

  isInterruptRequested(): boolean {
    return this.interruptRequested;
  }

  requestInterrupt(): void {
    if (this.interruptRequested || this.released) {
      return;
    }
    this.interruptRequested = true;
    this.emit("interrupt", this.version);
  }

  isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.emit("release", this.version);
  }
}
