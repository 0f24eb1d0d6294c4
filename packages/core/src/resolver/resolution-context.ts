/**
 * Resolution Context
 *
 * Shared state of one resolution-and-measurement pass: the tree state, the
 * scheduler future, the reuse index of the previous committed tree, the
 * phase caches and the lifecycle log. A context is released exactly once,
 * when its pass commits or is abandoned; after that every accessor throws
 * and every node it owns is frozen.
 */

import { LifecycleError } from "arbor-shared";
import { LifecycleLog, Logger, Threads, type PassFuture } from "arbor-kernel";
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from "../config";
import type { TreeState } from "../state/tree-state";
import type { DiffNode } from "../tree/diff-node";
import type { ConstraintSolver } from "../layout/solver";
import { LayoutPhaseCache, RenderPhaseCache } from "../layout/caches";
import { LoggingDiagnosticsSink, type DiagnosticsSink } from "./diagnostics";
import type { PerfEvent } from "./perf-event";
import type { ReuseIndex } from "./reconciler";

const log = Logger.for("ResolutionContext");

export interface ResolutionContextOptions {
  treeState: TreeState;
  solver: ConstraintSolver;
  future?: PassFuture | null;
  /** Previous committed tree to reconcile against */
  diffTree?: DiffNode | null;
  perfEvent?: PerfEvent | null;
  config?: EngineConfigInput;
  diagnostics?: DiagnosticsSink;
  version?: number;
}

let nextContextId = 1;

export class ResolutionContext {
  readonly id = nextContextId++;
  readonly version: number;
  readonly config: EngineConfig;
  readonly solver: ConstraintSolver;
  readonly diagnostics: DiagnosticsSink;
  readonly lifecycle: LifecycleLog;

  private treeState: TreeState | null;
  private future: PassFuture | null;
  private diffTree: DiffNode | null;
  private perf: PerfEvent | null;
  private renderCache: RenderPhaseCache | null = new RenderPhaseCache();
  private layoutCache: LayoutPhaseCache | null = new LayoutPhaseCache();
  private reuseIndex: ReuseIndex | null = null;
  private nestedTreeDiffNode: DiffNode | null = null;
  private interruptible = true;
  private interrupted = false;
  private released = false;
  private nodeIds = 0;

  constructor(options: ResolutionContextOptions) {
    this.treeState = options.treeState;
    this.solver = options.solver;
    this.future = options.future ?? null;
    this.diffTree = options.diffTree ?? null;
    this.perf = options.perfEvent ?? null;
    this.config = resolveEngineConfig(options.config);
    this.diagnostics = options.diagnostics ?? new LoggingDiagnosticsSink();
    this.version = options.version ?? 0;
    this.lifecycle = new LifecycleLog(this.config.lifecycleLogCapacity);
    this.lifecycle.record("created");
  }

  // ==========================================================================
  // Owned resources
  // ==========================================================================

  getTreeState(): TreeState {
    if (this.treeState === null) {
      throw this.releasedError("tree state");
    }
    return this.treeState;
  }

  getRenderCache(): RenderPhaseCache {
    if (this.renderCache === null) {
      throw this.releasedError("render phase cache");
    }
    return this.renderCache;
  }

  getLayoutCache(): LayoutPhaseCache {
    if (this.layoutCache === null) {
      throw this.releasedError("layout phase cache");
    }
    return this.layoutCache;
  }

  /** Root of the previous committed tree, if the pass has one. */
  getCurrentDiffTree(): DiffNode | null {
    this.assertLive("diff tree");
    return this.diffTree;
  }

  getPerfEvent(): PerfEvent | null {
    return this.released ? null : this.perf;
  }

  getReuseIndex(): ReuseIndex | null {
    return this.reuseIndex;
  }

  setReuseIndex(index: ReuseIndex | null): void {
    this.assertLive("reuse index");
    this.reuseIndex = index;
  }

  nextNodeId(): number {
    return ++this.nodeIds;
  }

  // ==========================================================================
  // Interruption
  // ==========================================================================

  isInterruptible(): boolean {
    return this.interruptible;
  }

  /**
   * Interruption is only honoured off the main thread, while the pass is
   * still interruptible and the scheduler has asked for it.
   */
  isLayoutInterrupted(): boolean {
    const requested =
      this.interruptible &&
      this.future !== null &&
      this.future.isInterruptRequested() &&
      !Threads.isMainThread();
    if (requested && !this.interrupted) {
      this.interrupted = true;
      this.lifecycle.record("interrupted");
      log.debug({ context: this.id, version: this.version }, "Layout interrupted");
    }
    return requested;
  }

  /** True once any part of this pass was deferred by an interruption. */
  wasInterrupted(): boolean {
    return this.interrupted;
  }

  markLayoutUninterruptible(): void {
    this.interruptible = false;
  }

  markLayoutResumed(): void {
    this.assertLive("resume");
    this.lifecycle.record("resumed");
  }

  // ==========================================================================
  // Nested trees
  // ==========================================================================

  setNestedTreeDiffNode(diff: DiffNode | null): void {
    this.nestedTreeDiffNode = diff;
  }

  consumeNestedTreeDiffNode(): DiffNode | null {
    const diff = this.nestedTreeDiffNode;
    this.nestedTreeDiffNode = null;
    return diff;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  isReleased(): boolean {
    return this.released;
  }

  release(): void {
    if (this.released) {
      throw LifecycleError.doubleRelease(this.lifecycle.toDebugString());
    }
    this.lifecycle.record("released");
    this.released = true;
    this.treeState = null;
    this.future = null;
    this.diffTree = null;
    this.perf = null;
    this.renderCache?.clear();
    this.renderCache = null;
    this.layoutCache = null;
    this.reuseIndex = null;
    this.nestedTreeDiffNode = null;
  }

  /** One line of `event@thread` entries, oldest first. */
  lifecycleDebugString(): string {
    return this.lifecycle.toDebugString();
  }

  private assertLive(resource: string): void {
    if (this.released) {
      throw this.releasedError(resource);
    }
  }

  private releasedError(resource: string): LifecycleError {
    return LifecycleError.released(resource, this.lifecycle.toDebugString());
  }
}
