import { Telemetry } from "arbor-kernel";
import type { ResolutionContext } from "../resolver/resolution-context";
import { isNestedTreeHolder, type MeasureStrategy, type RenderNode } from "../tree/node";
import { createLayoutResult, isLayoutCompatible, type LayoutResult, type MeasureOutput } from "./layout-result";
import { measureNestedTree } from "./nested-tree";
import type { DiffNode } from "../tree/diff-node";
import { isStyleEqual } from "../tree/style";
import type { LayoutContext } from "./solver";
import type { SizeSpec } from "./size-spec";

const cacheHits = Telemetry.getCounter("arbor.measure.cache_hit", "lookups", "Measurements served from a cache");

/**
 * Measure `node` as the root of a (sub)tree. A diff node left by the nested
 * tree resolution is linked to the root first.
 */
export function measureTree(
  ctx: ResolutionContext,
  node: RenderNode,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): LayoutResult {
  const nestedDiff = ctx.consumeNestedTreeDiffNode();
  if (nestedDiff && node.diffNode === null) {
    node.linkDiffNode(nestedDiff);
  }
  return measureNode(ctx, node, widthSpec, heightSpec);
}

/**
 * Measure one node, preferring in order: the layout of a leaf carried over
 * from the previous tree, a compatible result from this pass, a fresh solve.
 */
export function measureNode(
  ctx: ResolutionContext,
  node: RenderNode,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): LayoutResult {
  const diff = node.diffNode;
  if (diff && canReuseDiffLayout(node, diff, widthSpec, heightSpec)) {
    cacheHits.add(1, { source: "diff" });
    return diff.layout;
  }

  const cache = ctx.getLayoutCache();
  const cached = cache.get(node, widthSpec, heightSpec);
  if (cached) {
    cacheHits.add(1, { source: "pass" });
    return cached;
  }

  const solved = ctx.solver.calculateLayout(node, widthSpec, heightSpec, layoutContextFor(ctx));
  const result = createLayoutResult(node, widthSpec, heightSpec, solved);
  cache.put(result);
  return result;
}

/**
 * Only childless nodes take their old layout as is; a reused container is
 * solved again and its reused descendants answer from their own diffs.
 */
function canReuseDiffLayout(node: RenderNode, diff: DiffNode, widthSpec: SizeSpec, heightSpec: SizeSpec): boolean {
  return (
    node.isReused &&
    node.children.length === 0 &&
    isStyleEqual(node.style, diff.node.style) &&
    isLayoutCompatible(diff.layout, widthSpec, heightSpec)
  );
}

function layoutContextFor(ctx: ResolutionContext): LayoutContext {
  return {
    measureChild: (node, widthSpec, heightSpec) => measureNode(ctx, node, widthSpec, heightSpec),
    measureContent: (node, widthSpec, heightSpec): MeasureOutput =>
      node.measure ? node.measure.measure(ctx, node, widthSpec, heightSpec) : { width: 0, height: 0 },
  };
}

// ============================================================================
// Measure strategies
// ============================================================================

/** Delegates to the tail leaf component's `measure`. */
export const componentMeasure: MeasureStrategy = {
  name: "component",
  measure(_ctx, node, widthSpec, heightSpec) {
    const scope = node.tailScope;
    const definition = scope?.component.type.definition;
    if (!scope || !definition || definition.kind !== "leaf" || !definition.measure) {
      return { width: 0, height: 0 };
    }
    return definition.measure(scope, widthSpec, heightSpec);
  },
};

/** Resolves and measures the nested tree of a holder. */
export const nestedTreeMeasure: MeasureStrategy = {
  name: "nested-tree",
  measure(ctx, node, widthSpec, heightSpec) {
    if (!isNestedTreeHolder(node)) {
      return { width: 0, height: 0 };
    }
    const nested = measureNestedTree(ctx, node, widthSpec, heightSpec);
    return nested
      ? { width: nested.width, height: nested.height, data: nested.data, nested }
      : { width: 0, height: 0, nested: null };
  },
};
