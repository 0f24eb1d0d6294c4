/**
 * Tree State
 *
 * Per-tree store of component state, keyed by global key. Updates are queued
 * as pending until a pass applies them; applied values stay uncommitted until
 * the pass commits, so an abandoned pass leaves the committed state untouched.
 *
 * Committing a pass settles the whole store against the tree it produced:
 * state and queued updates of components that are no longer mounted are
 * dropped.
 */

export type StateValues = Readonly<Record<string, unknown>>;

export type StateUpdate = (previous: StateValues) => StateValues;

export const EMPTY_STATE: StateValues = Object.freeze({});

export class TreeState {
  private readonly committed = new Map<string, StateValues>();
  private readonly pending = new Map<string, StateUpdate[]>();
  private readonly applied = new Map<string, StateValues>();
  /** Number of queued updates folded into each applied value */
  private readonly consumed = new Map<string, number>();

  /**
   * Queue an update for the component with `globalKey`. The update runs the
   * next time that component is resolved.
   */
  enqueueStateUpdate(globalKey: string, update: StateUpdate): void {
    const queue = this.pending.get(globalKey);
    if (queue) {
      queue.push(update);
    } else {
      this.pending.set(globalKey, [update]);
    }
  }

  hasUncommittedUpdates(): boolean {
    return this.pending.size > 0;
  }

  hasPendingUpdate(globalKey: string): boolean {
    return this.pending.has(globalKey);
  }

  /**
   * Whether the component with `globalKey` or any descendant has a queued
   * update. Descendant keys extend their ancestor's key.
   */
  hasPendingUpdateWithin(globalKey: string): boolean {
    const prefix = `${globalKey},`;
    for (const key of this.pending.keys()) {
      if (key === globalKey || key.startsWith(prefix)) return true;
    }
    return false;
  }

  /** Global keys with queued updates. */
  pendingKeys(): string[] {
    return [...this.pending.keys()];
  }

  /**
   * Current value for `globalKey`: the value applied in this pass if any,
   * otherwise the committed one.
   */
  getState(globalKey: string): StateValues | undefined {
    return this.applied.get(globalKey) ?? this.committed.get(globalKey);
  }

  getCommittedState(globalKey: string): StateValues | undefined {
    return this.committed.get(globalKey);
  }

  /**
   * Produce the state a component sees in this pass: its committed value (or
   * `initial()` on first mount) with every pending update folded in.
   *
   * A component resolved more than once in a pass sees the same value each
   * time.
   */
  applyStateUpdates(globalKey: string, initial: () => StateValues): StateValues {
    const existing = this.applied.get(globalKey);
    if (existing) {
      return existing;
    }

    const queue = this.pending.get(globalKey) ?? [];
    let value = this.committed.get(globalKey) ?? initial();
    for (const update of queue) {
      value = Object.freeze(update(value));
    }
    this.applied.set(globalKey, value);
    this.consumed.set(globalKey, queue.length);
    return value;
  }

  /**
   * Fold pending updates for already-mounted components ahead of resolution.
   */
  applyPendingUpdatesEarly(): void {
    for (const key of this.pending.keys()) {
      if (this.committed.has(key)) {
        this.applyStateUpdates(key, () => this.committed.get(key) ?? EMPTY_STATE);
      }
    }
  }

  /**
   * Promote values applied during the pass to committed.
   *
   * A component is mounted when the pass applied its state or it is listed
   * in `mountedKeys` (parts of the tree carried over without being resolved
   * again). State and queued updates of every other key are dropped. Updates
   * queued for a mounted component after its state was applied stay queued.
   */
  commit(mountedKeys: ReadonlySet<string> = new Set()): void {
    const isMounted = (key: string): boolean => this.applied.has(key) || mountedKeys.has(key);
    for (const key of this.committed.keys()) {
      if (!isMounted(key)) this.committed.delete(key);
    }
    for (const [key, queue] of this.pending) {
      const consumed = this.consumed.get(key) ?? (isMounted(key) ? 0 : queue.length);
      const remaining = queue.slice(consumed);
      if (remaining.length > 0) {
        this.pending.set(key, remaining);
      } else {
        this.pending.delete(key);
      }
    }
    for (const [key, value] of this.applied) {
      this.committed.set(key, value);
    }
    this.applied.clear();
    this.consumed.clear();
  }

  /** Drop values applied by an abandoned pass. Pending updates stay queued. */
  discardUncommitted(): void {
    this.applied.clear();
    this.consumed.clear();
  }
}
