/**
 * Layout Pass
 *
 * One resolution-and-measurement pass over a tree version:
 *
 *   resolve -> [resume] -> measure -> commit | abandon
 *
 * A pass resolved off the main thread may come back interrupted; `resume`
 * finishes it on the main thread. Committing publishes the layout, commits
 * the tree state and releases the pass's context.
 */

import { ArborError } from "arbor-shared";
import { Logger, type PassFuture } from "arbor-kernel";
import type { Component, TreeProps } from "../component/component";
import { TreeRootScope } from "../component/scope";
import type { EngineConfigInput } from "../config";
import type { LayoutResult } from "../layout/layout-result";
import { measureTree } from "../layout/measure";
import type { SizeSpec } from "../layout/size-spec";
import { StackLayoutSolver, type ConstraintSolver } from "../layout/solver";
import type { DiagnosticsSink } from "../resolver/diagnostics";
import { createPerfEvent, type PerfEvent } from "../resolver/perf-event";
import { ResolutionContext } from "../resolver/resolution-context";
import { createResolvedTree, resumeResolvingTree } from "../resolver/resolver";
import type { TreeState } from "../state/tree-state";
import { collectGlobalKeys, createDiffTree, type DiffNode } from "../tree/diff-node";
import type { RenderNode } from "../tree/node";

const log = Logger.for("LayoutPass");

export interface CommittedLayout {
  readonly root: RenderNode;
  readonly layout: LayoutResult;
  readonly diffTree: DiffNode;
  readonly widthSpec: SizeSpec;
  readonly heightSpec: SizeSpec;
  readonly version: number;
}

export type PassStatus =
  | "created"
  | "interrupted"
  | "resolved"
  | "measured"
  | "committed"
  | "abandoned"
  | "failed";

export interface LayoutPassOptions {
  treeState: TreeState;
  solver?: ConstraintSolver;
  /** Previous committed layout to reconcile against */
  previous?: CommittedLayout | null;
  future?: PassFuture | null;
  config?: EngineConfigInput;
  diagnostics?: DiagnosticsSink;
  perfEvent?: PerfEvent | null;
  treeProps?: TreeProps;
  version?: number;
}

export class LayoutPass {
  readonly context: ResolutionContext;
  private readonly rootScope: TreeRootScope;
  private readonly previous: CommittedLayout | null;
  private currentStatus: PassStatus = "created";
  private root: RenderNode | null = null;
  private layout: LayoutResult | null = null;
  private specs: { width: SizeSpec; height: SizeSpec } | null = null;

  constructor(options: LayoutPassOptions) {
    this.previous = options.previous ?? null;
    this.rootScope = new TreeRootScope(options.treeProps);
    this.context = new ResolutionContext({
      treeState: options.treeState,
      solver: options.solver ?? new StackLayoutSolver(),
      future: options.future,
      diffTree: this.previous?.diffTree ?? null,
      perfEvent: options.perfEvent ?? createPerfEvent("arbor.layout_pass"),
      config: options.config,
      diagnostics: options.diagnostics,
      version: options.version,
    });
  }

  get status(): PassStatus {
    return this.currentStatus;
  }

  get resolvedRoot(): RenderNode | null {
    return this.root;
  }

  get result(): LayoutResult | null {
    return this.layout;
  }

  /**
   * Resolve `component` as the root. Returns null when the root failed to
   * resolve; failures were reported through the diagnostics sink.
   */
  resolve(component: Component, widthSpec: SizeSpec, heightSpec: SizeSpec): RenderNode | null {
    this.expectStatus("created");
    this.specs = { width: widthSpec, height: heightSpec };

    const resolved = this.abandonOnThrow("resolve", () =>
      createResolvedTree(this.context, this.rootScope, component, widthSpec, heightSpec),
    );

    if (resolved === null) {
      this.currentStatus = "failed";
      return null;
    }
    this.root = resolved.root;
    this.currentStatus = resolved.interrupted ? "interrupted" : "resolved";
    log.debug(
      { context: this.context.id, version: this.context.version, interrupted: resolved.interrupted },
      "Resolved tree",
    );
    return resolved.root;
  }

  /**
   * Finish an interrupted pass. The pass cannot be interrupted again. Safe to
   * call on a pass that is already fully resolved.
   */
  resume(): RenderNode | null {
    if (this.currentStatus !== "interrupted" && this.currentStatus !== "resolved") {
      throw new ArborError("RESOLUTION_UNSUPPORTED", `Cannot resume a ${this.currentStatus} pass`);
    }
    this.context.markLayoutUninterruptible();
    this.context.markLayoutResumed();
    const root = this.root;
    if (root) {
      this.abandonOnThrow("resume", () => resumeResolvingTree(this.context, root));
    }
    this.currentStatus = "resolved";
    return this.root;
  }

  /**
   * Measure the resolved tree, against the resolve specs unless others are
   * given. An interrupted pass is resumed first.
   */
  measure(widthSpec?: SizeSpec, heightSpec?: SizeSpec): LayoutResult | null {
    if (this.currentStatus === "interrupted") {
      this.resume();
    }
    const root = this.root;
    const specs = this.specs;
    if (root === null || specs === null) {
      return null;
    }
    if (widthSpec && heightSpec) {
      this.specs = { width: widthSpec, height: heightSpec };
    }
    const width = widthSpec ?? specs.width;
    const height = heightSpec ?? specs.height;

    const perf = this.context.getPerfEvent();
    perf?.markerPoint("start_measure");
    this.layout = this.abandonOnThrow("measure", () => measureTree(this.context, root, width, height));
    perf?.markerPoint("end_measure");

    this.currentStatus = "measured";
    return this.layout;
  }

  /**
   * Publish the measured tree and release the pass. Returns null when there
   * is nothing to publish (the root failed to resolve).
   */
  commit(): CommittedLayout | null {
    if (this.currentStatus === "failed") {
      this.abandon();
      return null;
    }
    if (this.currentStatus !== "measured") {
      this.measure();
    }
    const root = this.root;
    const layout = this.layout;
    const specs = this.specs;
    if (root === null || layout === null || specs === null) {
      this.abandon();
      return null;
    }

    const treeState = this.context.getTreeState();
    const diffTree = createDiffTree(layout);
    const committed: CommittedLayout = {
      root,
      layout,
      diffTree,
      widthSpec: specs.width,
      heightSpec: specs.height,
      version: this.context.version,
    };
    treeState.commit(collectGlobalKeys(diffTree));
    this.context.getPerfEvent()?.end();
    this.context.release();
    this.currentStatus = "committed";
    return committed;
  }

  /** Drop the pass: uncommitted state is discarded and the context released. */
  abandon(): void {
    if (this.context.isReleased()) {
      return;
    }
    this.context.getTreeState().discardUncommitted();
    this.context.getPerfEvent()?.end();
    this.context.release();
    this.currentStatus = "abandoned";
  }

  /** resolve, measure and commit in one call. */
  run(component: Component, widthSpec: SizeSpec, heightSpec: SizeSpec): CommittedLayout | null {
    this.resolve(component, widthSpec, heightSpec);
    return this.commit();
  }

  /**
   * Errors that escape a phase are fatal to the pass: it is abandoned before
   * the error reaches the caller.
   */
  private abandonOnThrow<T>(phase: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      log.error({ err: error, context: this.context.id, version: this.context.version, phase }, "Layout pass failed");
      this.abandon();
      throw error;
    }
  }

  private expectStatus(expected: PassStatus): void {
    if (this.currentStatus !== expected) {
      throw new ArborError(
        "RESOLUTION_UNSUPPORTED",
        `Layout pass is ${this.currentStatus}, expected ${expected}`,
      );
    }
  }
}
