/**
 * Reconciler
 *
 * When a pass only carries state updates, the previous committed tree is
 * carried forward: every component is matched to its previous counterpart
 * by global key, and subtrees with no pending updates whose components
 * report no change are cloned from the previous tree together with their
 * layout instead of being resolved again.
 */

import { ArborError } from "arbor-shared";
import { Logger } from "arbor-kernel";
import type { Component } from "../component/component";
import { isEquivalentComponent, isShallowEqualState } from "../component/equivalence";
import type { ComponentScope, ParentScope } from "../component/scope";
import type { EngineConfig } from "../config";
import { isLayoutCompatible } from "../layout/layout-result";
import type { SizeSpec } from "../layout/size-spec";
import type { StateValues, TreeState } from "../state/tree-state";
import type { DiffNode } from "../tree/diff-node";
import { isNestedTreeHolder, NestedTreeHolder, RenderNode } from "../tree/node";
import { handleWithHierarchy, type DiagnosticsSink } from "./diagnostics";
import type { ResolutionContext } from "./resolution-context";
import { create, registerComponent, update } from "./resolver";

const log = Logger.for("Reconciler");

export interface ReuseMatch {
  readonly diff: DiffNode;
  /** Position of the matched component in the node's scopes, tail first */
  readonly scopeIndex: number;
}

/**
 * Global key to the previous node a component ended up in. A key shared by
 * a holder and the root of its nested tree maps to the holder.
 */
export class ReuseIndex {
  private readonly entries = new Map<string, ReuseMatch>();

  static fromDiffTree(root: DiffNode): ReuseIndex {
    const index = new ReuseIndex();
    const visit = (diff: DiffNode): void => {
      diff.node.componentScopes.forEach((scope, scopeIndex) => {
        if (!index.entries.has(scope.globalKey)) {
          index.entries.set(scope.globalKey, { diff, scopeIndex });
        }
      });
      diff.children.forEach(visit);
    };
    visit(root);
    return index;
  }

  get(globalKey: string): ReuseMatch | null {
    return this.entries.get(globalKey) ?? null;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Reconciliation is attempted only when there is a previous tree, the
 * feature is on, state updates are pending and the new root is equivalent
 * to the previous one.
 */
export function isReconcilable(
  next: Component,
  treeState: TreeState,
  previousTree: DiffNode | null,
  config: EngineConfig,
): boolean {
  if (previousTree === null || !config.reconciliationEnabled) {
    return false;
  }
  if (!treeState.hasUncommittedUpdates()) {
    return false;
  }
  const previous = previousTree.node.headComponent;
  if (previous === null || previous.key !== next.key || previous.type !== next.type) {
    return false;
  }
  return isEquivalentComponent(previous, next);
}

/**
 * Whether `next` differs from the component recorded in `previous`.
 *
 * A definition's own `shouldUpdate` wins; otherwise props, style and state
 * are compared. A comparison that throws counts as changed.
 */
export function shouldComponentUpdate(
  diagnostics: DiagnosticsSink,
  previous: ComponentScope,
  next: Component,
  nextState: StateValues,
): boolean {
  const definition = next.type.definition;
  try {
    if (definition.shouldUpdate) {
      return definition.shouldUpdate(
        { props: previous.props, state: previous.state },
        { props: next.props, state: nextState },
      );
    }
    return !isEquivalentComponent(previous.component, next) || !isShallowEqualState(previous.state, nextState);
  } catch (error) {
    handleWithHierarchy(diagnostics, previous.parent, next, error, "RESOLUTION_COMPARISON_FAILED");
    return true;
  }
}

/**
 * Rebind the previous root under its old key and resolve it again; its
 * descendants are reused where possible.
 */
export function reconcileTree(
  ctx: ResolutionContext,
  parent: ParentScope,
  previousTree: DiffNode,
  next: Component,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): RenderNode | null {
  const globalKeyToReuse = previousTree.node.headKey;
  if (globalKeyToReuse === null) {
    throw new ArborError("RESOLUTION_UNSUPPORTED", "Cannot reuse a null global key");
  }

  ctx.setReuseIndex(ReuseIndex.fromDiffTree(previousTree));

  return create(ctx, parent, next, {
    widthSpec,
    heightSpec,
    resolveNestedTree: !ctx.config.alwaysResolveNestedTreeInMeasure,
    globalKeyToReuse,
  });
}

function needsUpdate(
  ctx: ResolutionContext,
  diff: DiffNode,
  previous: ComponentScope,
  next: Component,
): boolean {
  const treeState = ctx.getTreeState();
  if (treeState.hasPendingUpdateWithin(previous.globalKey)) {
    return true;
  }
  // Unit-backed nodes are always resolved again
  if (diff.node.renderUnit !== null) {
    return true;
  }
  const nextState = treeState.getState(previous.globalKey) ?? previous.state;
  return shouldComponentUpdate(ctx.diagnostics, previous, next, nextState);
}

/**
 * Clone the previous counterpart of `component` if nothing in its subtree
 * changed.
 */
export function reuseFromPreviousTree(
  ctx: ResolutionContext,
  parent: ParentScope,
  component: Component,
  globalKey: string,
): RenderNode | null {
  const match = ctx.getReuseIndex()?.get(globalKey);
  if (!match) {
    return null;
  }
  const previous = match.diff.node.componentScopes[match.scopeIndex];
  if (!previous || previous.component.type !== component.type) {
    return null;
  }
  if (needsUpdate(ctx, match.diff, previous, component)) {
    return null;
  }

  log.debug({ key: globalKey }, "Reusing subtree");
  return cloneForReuse(ctx, parent, match.diff, match.scopeIndex, component);
}

/**
 * Clone the previous nested tree of `holder` if the deferred component is
 * unchanged and its old layout fits the new specs.
 */
export function reuseNestedTree(
  ctx: ResolutionContext,
  holder: NestedTreeHolder,
  nestedDiff: DiffNode,
  component: Component,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): RenderNode | null {
  if (ctx.getReuseIndex() === null || !isLayoutCompatible(nestedDiff.layout, widthSpec, heightSpec)) {
    return null;
  }
  const scopeIndex = nestedDiff.node.componentScopes.findIndex(
    (scope) => scope.globalKey === holder.tailKey,
  );
  const previous = nestedDiff.node.componentScopes[scopeIndex];
  if (!previous || previous.component.type !== component.type) {
    return null;
  }
  if (needsUpdate(ctx, nestedDiff, previous, component)) {
    return null;
  }
  return cloneForReuse(ctx, holder.parentScope, nestedDiff, scopeIndex, component);
}

/**
 * Copy a previous node into this pass: scopes up to `scopeIndex` are rebound
 * (outermost first, `head` replacing the matched component), registrations
 * are collected again, and children are cloned recursively.
 */
function cloneForReuse(
  ctx: ResolutionContext,
  parent: ParentScope,
  diff: DiffNode,
  scopeIndex: number,
  head: Component | null,
): RenderNode {
  const previous = diff.node;
  const scopes: ComponentScope[] = [];
  let scopeParent = parent;
  let tailParent = parent;

  for (let i = scopeIndex; i >= 0; i--) {
    const previousScope = previous.componentScopes[i];
    if (!previousScope) continue;
    const component = i === scopeIndex && head !== null ? head : previousScope.component;
    const scope = update(ctx, scopeParent, component, previousScope.globalKey);
    scopes.unshift(scope);
    tailParent = scopeParent;
    scopeParent = scope;
  }

  const node = isNestedTreeHolder(previous)
    ? new NestedTreeHolder(ctx, tailParent, previous.cachedNode)
    : new RenderNode(ctx, previous.flexDirection);

  node.copyStyle(previous.style);
  node.setLayoutDirection(previous.layoutDirection);
  if (previous.measure) node.setMeasure(previous.measure);
  if (previous.renderUnit) node.setRenderUnit(previous.renderUnit);

  for (const scope of scopes) {
    registerComponent(ctx, node, scope);
  }

  const tail = scopes[0];
  if (!isNestedTreeHolder(previous) && tail) {
    for (const child of diff.children) {
      const copy = cloneChild(ctx, tail, child);
      if (copy) node.child(copy);
    }
  }

  node.markReused(diff);
  node.markResolved();
  return node;
}

/**
 * A child that fails to clone is dropped and reported against its own
 * component, like a child that fails to resolve.
 */
function cloneChild(ctx: ResolutionContext, parent: ParentScope, diff: DiffNode): RenderNode | null {
  if (diff.node.renderUnit !== null) {
    return recreate(ctx, parent, diff);
  }
  try {
    return cloneForReuse(ctx, parent, diff, diff.node.componentCount - 1, null);
  } catch (error) {
    const component = diff.node.headComponent;
    if (component === null) {
      throw error;
    }
    handleWithHierarchy(ctx.diagnostics, parent, component, error);
    return null;
  }
}

/** Resolve a unit-backed child of a reused subtree again under its old key. */
function recreate(ctx: ResolutionContext, parent: ParentScope, diff: DiffNode): RenderNode | null {
  const component = diff.node.headComponent;
  const globalKey = diff.node.headKey;
  if (component === null || globalKey === null) {
    return null;
  }
  return create(ctx, parent, component, { globalKeyToReuse: globalKey });
}
