/**
 * Nested trees
 *
 * A size-spec-dependent component is left as a holder during resolution and
 * resolved here, when its container measures it with real specs. Work is
 * avoided in this order:
 *
 * 1. the holder's latest nested result, if compatible
 * 2. the layout cached for a node produced by a measure call, if still valid
 * 3. re-measuring the latest nested tree, when its structure does not depend
 *    on the specs
 * 4. resolving the component again under its existing global key
 */

import { Logger } from "arbor-kernel";
import { isSizeSpecDependent, type Component } from "../component/component";
import type { ResolutionContext } from "../resolver/resolution-context";
import { reuseNestedTree } from "../resolver/reconciler";
import { create } from "../resolver/resolver";
import type { NestedTreeHolder } from "../tree/node";
import { isLayoutCompatible, type LayoutResult } from "./layout-result";
import { measureTree } from "./measure";
import type { SizeSpec } from "./size-spec";

const log = Logger.for("NestedTree");

export function measureNestedTree(
  ctx: ResolutionContext,
  holder: NestedTreeHolder,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): LayoutResult | null {
  const component = holder.tailComponent;
  if (component === null) {
    return null;
  }

  const current = holder.nestedResult;
  if (current && isLayoutCompatible(current, widthSpec, heightSpec)) {
    return current;
  }

  const cached = consumeCachedLayout(ctx, holder, component, widthSpec, heightSpec);
  if (cached) {
    holder.setNestedResult(cached);
    return cached;
  }

  let result: LayoutResult | null;
  if (current && !isSizeSpecDependent(component)) {
    result = measureTree(ctx, current.node, widthSpec, heightSpec);
  } else {
    result = resolveNestedTree(ctx, holder, component, widthSpec, heightSpec);
  }

  if (result) {
    holder.setNestedResult(result);
  }
  return result;
}

/**
 * Layout of the node a measure call produced for the holder's component.
 * Discarded when the node has a direction of its own that differs from the
 * holder's; a node that inherits takes the holder's.
 */
function consumeCachedLayout(
  ctx: ResolutionContext,
  holder: NestedTreeHolder,
  component: Component,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): LayoutResult | null {
  const cachedNode = holder.cachedNode;
  if (cachedNode === null) {
    return null;
  }
  const cache = ctx.getLayoutCache();
  if (cache.latest(cachedNode) === null) {
    return null;
  }
  if (
    cachedNode.layoutDirection !== "inherit" &&
    cachedNode.layoutDirection !== holder.resolvedLayoutDirection()
  ) {
    log.debug({ key: holder.tailKey }, "Cached layout direction differs; resolving again");
    return null;
  }

  const compatible = cache.get(cachedNode, widthSpec, heightSpec);
  if (compatible) {
    return compatible;
  }
  if (!isSizeSpecDependent(component)) {
    return measureTree(ctx, cachedNode, widthSpec, heightSpec);
  }
  return null;
}

function resolveNestedTree(
  ctx: ResolutionContext,
  holder: NestedTreeHolder,
  component: Component,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): LayoutResult | null {
  const globalKeyToReuse = isSizeSpecDependent(component)
    ? holder.tailKey
    : (holder.cachedNode?.headKey ?? holder.tailKey);

  if (ctx.config.applyStateUpdatesEarly) {
    ctx.getTreeState().applyPendingUpdatesEarly();
  }

  const nestedDiff = holder.diffNode?.children[0] ?? null;
  const node =
    (nestedDiff && reuseNestedTree(ctx, holder, nestedDiff, component, widthSpec, heightSpec)) ??
    create(ctx, holder.parentScope, component, {
      widthSpec,
      heightSpec,
      resolveNestedTree: true,
      globalKeyToReuse,
    });

  if (node === null) {
    return null;
  }

  holder.copyInto(node);
  if (node.layoutDirection === "inherit") {
    node.setLayoutDirection(holder.resolvedLayoutDirection());
  }
  ctx.setNestedTreeDiffNode(nestedDiff);

  return measureTree(ctx, node, widthSpec, heightSpec);
}
