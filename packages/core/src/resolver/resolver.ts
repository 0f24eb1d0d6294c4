/**
 * Resolver
 *
 * Turns components into render nodes. `create` is the single entry point for
 * one component: it consults the render-phase caches, derives the global
 * key, tries to reuse the previous tree, picks a resolution strategy by the
 * definition's kind and finally runs the same post-processing on every node
 * it returns.
 */

import { ArborError } from "arbor-shared";
import { Logger } from "arbor-kernel";
import {
  childrenOf,
  isSizeSpecDependent,
  normalizeRenderOutput,
  type Component,
  type ContainerApi,
  type RenderResult,
} from "../component/component";
import { ComponentScope, type ParentScope } from "../component/scope";
import { EMPTY_STATE } from "../state/tree-state";
import { NestedTreeHolder, RenderNode, walkNodes } from "../tree/node";
import type { MeasureOutput } from "../layout/layout-result";
import { componentMeasure, measureTree, nestedTreeMeasure } from "../layout/measure";
import { SizeSpec } from "../layout/size-spec";
import { handleWithHierarchy } from "./diagnostics";
import { isReconcilable, reconcileTree, reuseFromPreviousTree } from "./reconciler";
import type { ResolutionContext } from "./resolution-context";

const log = Logger.for("Resolver");

export interface CreateOptions {
  widthSpec?: SizeSpec;
  heightSpec?: SizeSpec;
  /** Resolve size-spec-dependent components now instead of deferring them */
  resolveNestedTree?: boolean;
  /** Resolve under this key instead of deriving a new one; skips reuse */
  globalKeyToReuse?: string | null;
}

export interface ResolvedTree {
  readonly root: RenderNode;
  /** Some children were deferred and wait for `resumeResolvingTree` */
  readonly interrupted: boolean;
}

// ============================================================================
// Tree entry points
// ============================================================================

/**
 * Resolve `component` as the root of a pass, reconciling against the
 * context's previous committed tree when the pass only carries state
 * updates.
 */
export function createResolvedTree(
  ctx: ResolutionContext,
  parent: ParentScope,
  component: Component,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): ResolvedTree | null {
  const treeState = ctx.getTreeState();
  const perf = ctx.getPerfEvent();
  const current = ctx.getCurrentDiffTree();
  const reconcilable = current !== null && isReconcilable(component, treeState, current, ctx.config);

  if (ctx.config.applyStateUpdatesEarly) {
    try {
      treeState.applyPendingUpdatesEarly();
    } catch (error) {
      handleWithHierarchy(ctx.diagnostics, parent, component, error);
      return null;
    }
  }

  perf?.markerPoint(reconcilable ? "start_reconcile_layout" : "start_create_layout");

  const root =
    reconcilable && current !== null
      ? reconcileTree(ctx, parent, current, component, widthSpec, heightSpec)
      : create(ctx, parent, component, {
          widthSpec,
          heightSpec,
          resolveNestedTree: !ctx.config.alwaysResolveNestedTreeInMeasure,
        });

  perf?.markerPoint(reconcilable ? "end_reconcile_layout" : "end_create_layout");

  if (root === null) {
    return null;
  }
  if (ctx.isLayoutInterrupted()) {
    // Finished on the main thread by resumeResolvingTree
    return { root, interrupted: true };
  }
  ctx.markLayoutUninterruptible();
  return { root, interrupted: false };
}

/**
 * Resolve every child deferred by an interruption, depth first, in original
 * order. Calling it on a fully resolved tree does nothing.
 */
export function resumeResolvingTree(ctx: ResolutionContext, root: RenderNode): void {
  const pending: RenderNode[] = [];
  walkNodes(root, (node) => {
    if (node.unresolvedChildren.length > 0) pending.push(node);
  });

  for (const node of pending) {
    const parent = node.tailScope;
    if (parent === null) {
      throw new ArborError("RESOLUTION_UNSUPPORTED", "Cannot resume children of a node without components");
    }
    for (const child of node.takeUnresolved()) {
      const resolved = create(ctx, parent, child);
      if (resolved) node.child(resolved);
    }
    node.markResolved();
  }
}

// ============================================================================
// Single component
// ============================================================================

export function create(
  ctx: ResolutionContext,
  parent: ParentScope,
  component: Component,
  options: CreateOptions = {},
): RenderNode | null {
  const widthSpec = options.widthSpec ?? SizeSpec.unspecified();
  const heightSpec = options.heightSpec ?? SizeSpec.unspecified();
  const resolveNestedTree = options.resolveNestedTree ?? false;
  const renderCache = ctx.getRenderCache();

  const early = renderCache.consumeWillRender(component);
  if (early) {
    return early;
  }

  // A component measured ahead of time keeps the key it was measured under
  const cachedNode = renderCache.getCachedNode(component);
  const keyToReuse = options.globalKeyToReuse ?? cachedNode?.headKey ?? null;
  const globalKey = keyToReuse ?? parent.generateChildKey(component);

  const definition = component.type.definition;
  const sizeSpecDependent = isSizeSpecDependent(component);
  const deferred = (sizeSpecDependent || cachedNode !== null) && !resolveNestedTree;

  let node: RenderNode | null = null;
  try {
    if (keyToReuse === null) {
      const reused = reuseFromPreviousTree(ctx, parent, component, globalKey);
      if (reused) {
        return reused;
      }
    }

    const scope = update(ctx, parent, component, globalKey);
    node = deferred
      ? new NestedTreeHolder(ctx, parent, cachedNode)
      : resolveWithStrategy(ctx, scope, widthSpec, heightSpec);
    if (node === null) {
      return null;
    }

    if (node.componentCount === 0) {
      if (deferred) {
        node.setMeasure(nestedTreeMeasure);
      } else if (definition.kind === "leaf" && definition.measure) {
        node.setMeasure(componentMeasure);
      }
    }

    // A nested root takes its layout props from the holder instead
    if (component.style && !(sizeSpecDependent && resolveNestedTree)) {
      node.copyStyle(component.style);
    }

    registerComponent(ctx, node, scope);
  } catch (error) {
    handleWithHierarchy(ctx.diagnostics, parent, component, error);
    return null;
  }
  if (node === null) {
    return null;
  }

  const match = ctx.getReuseIndex()?.get(globalKey);
  if (match && node.diffNode === null) {
    node.linkDiffNode(match.diff);
  }

  node.markResolved();
  return node;
}

/**
 * Build the scope `component` is resolved in, with its state for this pass
 * and its tree props.
 */
export function update(
  ctx: ResolutionContext,
  parent: ParentScope,
  component: Component,
  globalKey: string,
): ComponentScope {
  const treeState = ctx.getTreeState();
  const scope = new ComponentScope({ component, globalKey, parent, treeState });
  const definition = component.type.definition;

  scope.bindState(
    treeState.applyStateUpdates(globalKey, () => definition.initialState?.(scope) ?? EMPTY_STATE),
  );

  const inherited = parent.treeProps;
  scope.bindTreeProps(
    inherited,
    definition.treeProps ? definition.treeProps(scope, inherited) : inherited,
  );
  return scope;
}

function resolveWithStrategy(
  ctx: ResolutionContext,
  scope: ComponentScope,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): RenderNode | null {
  const definition = scope.component.type.definition;

  switch (definition.kind) {
    case "container":
      return definition.resolve(scope, containerApi(ctx, scope));

    case "leaf": {
      const node = new RenderNode(ctx);
      const unit = definition.prepare?.(scope) ?? null;
      if (unit) node.setRenderUnit(unit);
      return node;
    }

    case "delegate": {
      const output = normalizeRenderOutput(definition.render(scope, widthSpec, heightSpec));
      if (output.component === null) {
        return null;
      }
      // Rendering itself makes the component terminal; its children come from props
      const node =
        output.component === scope.component
          ? resolveSelf(ctx, scope)
          : create(ctx, scope, output.component);
      if (node) applyRenderResult(ctx, node, output);
      return node;
    }
  }
}

function resolveSelf(ctx: ResolutionContext, scope: ComponentScope): RenderNode {
  const node = new RenderNode(ctx);
  appendChildren(ctx, scope, node, childrenOf(scope.component));
  return node;
}

function applyRenderResult(ctx: ResolutionContext, node: RenderNode, output: RenderResult): void {
  if (ctx.config.transitionsEnabled) {
    for (const transition of output.transitions ?? []) {
      node.addTransition(transition);
    }
  }
  for (const effect of output.effects ?? []) {
    node.addAttachable(effect);
  }
}

/**
 * Post-processing shared by every node a component ends up in: append the
 * component's scope and collect its transitions, attachables and working
 * ranges.
 */
export function registerComponent(ctx: ResolutionContext, node: RenderNode, scope: ComponentScope): void {
  node.appendComponent(scope);
  const definition = scope.component.type.definition;

  if (ctx.config.transitionsEnabled) {
    if (definition.needsPreviousRenderData) {
      node.addComponentNeedingPreviousRenderData(scope);
    } else if (definition.createTransition) {
      try {
        const transition = definition.createTransition(scope);
        if (transition) node.addTransition(transition);
      } catch (error) {
        handleWithHierarchy(ctx.diagnostics, scope.parent, scope.component, error);
      }
    }
  }

  if (definition.onAttached || definition.onDetached) {
    node.addAttachable({
      id: scope.globalKey,
      attach: () => definition.onAttached?.(scope),
      detach: () => definition.onDetached?.(scope),
    });
  }

  for (const range of definition.workingRanges?.(scope) ?? []) {
    node.addWorkingRange({ globalKey: scope.globalKey, range });
  }
}

// ============================================================================
// Container operations
// ============================================================================

function containerApi(ctx: ResolutionContext, scope: ComponentScope): ContainerApi {
  return {
    createNode: (direction) => new RenderNode(ctx, direction),
    appendChildren: (node, children) => appendChildren(ctx, scope, node, children),
    willRender: (component) => willRender(ctx, scope, component),
    measure: (component, widthSpec, heightSpec) =>
      measureComponent(ctx, scope, component, widthSpec, heightSpec),
  };
}

/**
 * Resolve children in order. Once the pass is interrupted, every remaining
 * child is recorded as unresolved on `node`.
 */
export function appendChildren(
  ctx: ResolutionContext,
  parent: ParentScope,
  node: RenderNode,
  children: readonly Component[],
): void {
  for (const child of children) {
    if (ctx.isLayoutInterrupted()) {
      node.appendUnresolved(child);
      continue;
    }
    const resolved = create(ctx, parent, child);
    if (resolved) node.child(resolved);
  }
}

/**
 * Resolve `component` ahead of time. The node is handed out, once, when the
 * component is resolved for real.
 */
export function willRender(ctx: ResolutionContext, parent: ParentScope, component: Component): boolean {
  const cache = ctx.getRenderCache();
  if (cache.hasWillRender(component)) {
    return cache.peekWillRender(component) !== null;
  }
  const node = create(ctx, parent, component);
  cache.setWillRender(component, node);
  return node !== null;
}

/**
 * Resolve and measure `component` outside the tree. The node and its layout
 * are cached for the pass and adopted when the component is later resolved
 * in place.
 */
export function measureComponent(
  ctx: ResolutionContext,
  parent: ParentScope,
  component: Component,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): MeasureOutput {
  const node = create(ctx, parent, component, { widthSpec, heightSpec, resolveNestedTree: true });
  if (node === null) {
    return { width: 0, height: 0 };
  }
  const result = measureTree(ctx, node, widthSpec, heightSpec);
  ctx.getRenderCache().putCachedNode(component, node);
  log.debug({ component: component.type.displayName, key: node.headKey }, "Measured ahead of resolution");
  return { width: result.width, height: result.height, data: result.data };
}
