import { AsyncLocalStorage } from "node:async_hooks";
import { EventEmitter } from "node:events";
import { ContextError } from "arbor-shared";

/**
 * Name of the privileged foreground thread.
 */
export const MAIN_THREAD = "main";

/**
 * Identity of the logical thread a piece of work runs on.
 *
 * Resolution is single-threaded in JavaScript, but the engine still has to
 * distinguish the foreground (UI) thread from background workers: only
 * background passes may be interrupted. The identity is carried through
 * AsyncLocalStorage so it survives nested calls without being threaded through
 * every signature.
 */
export interface ThreadInfo {
  name: string;
  isMain: boolean;
}

export interface ExecutionEvent {
  type: string;
  payload: unknown;
  timestamp: number;
  source: string;
  traceId: string;
}

export interface ContextMetadata extends Record<string, unknown> {}

/**
 * Base KernelContext interface with core properties.
 */
export interface KernelContext {
  traceId: string;
  thread: ThreadInfo;
  metadata: ContextMetadata;
  events: EventEmitter;
}

const storage = new AsyncLocalStorage<KernelContext>();

const MAIN_THREAD_INFO: ThreadInfo = { name: MAIN_THREAD, isMain: true };

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<Omit<KernelContext, "events">> = {}): KernelContext {
    return {
      traceId: overrides.traceId ?? crypto.randomUUID(),
      thread: overrides.thread ?? MAIN_THREAD_INFO,
      metadata: overrides.metadata ?? {},
      events: new EventEmitter(),
    };
  }

  /**
   * Runs a function within the given context.
   */
  static run<T>(context: KernelContext, fn: () => T): T {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * `events` is shared with the parent.
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return {
      ...parent,
      ...overrides,
    };
  }

  /**
   * Creates a child context and runs a function within it.
   */
  static fork<T>(overrides: Partial<KernelContext>, fn: () => T): T {
    return Context.run(Context.child(overrides), fn);
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): KernelContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  /**
   * Gets the current context or returns undefined if not found.
   */
  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }

  /**
   * Helper to emit an event on the current context.
   */
  static emit(type: string, payload: unknown, source: string = "system"): void {
    const ctx = this.tryGet();
    if (ctx) {
      const event: ExecutionEvent = {
        type,
        payload,
        timestamp: Date.now(),
        source,
        traceId: ctx.traceId,
      };

      ctx.events.emit(type, event);
      ctx.events.emit("*", event);
    }
  }
}

/**
 * Thread identity helpers built on the kernel context.
 *
 * @example
 * ```typescript
 * const partial = Threads.run('layout-bg', () => pass.resolve(root, w, h));
 * // back on the main thread
 * pass.resume();
 * ```
 */
export const Threads = {
  /**
   * Run `fn` bound to the named thread. `"main"` binds the foreground thread.
   */
  run<T>(name: string, fn: () => T): T {
    return Context.fork({ thread: { name, isMain: name === MAIN_THREAD } }, fn);
  },

  /**
   * The current thread. Code outside any binding runs on the main thread.
   */
  current(): ThreadInfo {
    return Context.tryGet()?.thread ?? MAIN_THREAD_INFO;
  },

  currentName(): string {
    return Threads.current().name;
  },

  isMainThread(): boolean {
    return Threads.current().isMain;
  },
};
