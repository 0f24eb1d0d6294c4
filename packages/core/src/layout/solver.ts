/**
 * Constraint solving
 *
 * The engine hands a node and its size specs to a ConstraintSolver, which
 * measures children back through the LayoutContext so every child
 * measurement goes through the engine's caches.
 */

import type { RenderNode } from "../tree/node";
import type { LayoutResult, MeasureOutput, PositionedLayout, SolvedLayout } from "./layout-result";
import { resolveSize, shrinkSizeSpec, SizeSpec, SizeSpecMode } from "./size-spec";

export interface LayoutContext {
  /** Measure a child node (cached by the engine). */
  measureChild(node: RenderNode, widthSpec: SizeSpec, heightSpec: SizeSpec): LayoutResult;
  /** Run the node's own measure strategy. */
  measureContent(node: RenderNode, widthSpec: SizeSpec, heightSpec: SizeSpec): MeasureOutput;
}

export interface ConstraintSolver {
  calculateLayout(
    node: RenderNode,
    widthSpec: SizeSpec,
    heightSpec: SizeSpec,
    context: LayoutContext,
  ): SolvedLayout;
}

function toAtMost(spec: SizeSpec): SizeSpec {
  return spec.mode === SizeSpecMode.Unspecified ? spec : SizeSpec.atMost(spec.size);
}

function remaining(spec: SizeSpec, consumed: number): SizeSpec {
  return spec.mode === SizeSpecMode.Unspecified
    ? spec
    : SizeSpec.atMost(Math.max(0, spec.size - consumed));
}

/**
 * Stacks children along the node's flex direction.
 *
 * - a styled width/height is passed to the child as EXACT
 * - otherwise the cross axis gets AT_MOST the available space and the main
 *   axis AT_MOST what is left; unbounded axes stay UNSPECIFIED
 * - nodes with a measure strategy are leaves; padding is taken off the specs
 *   passed to it
 */
export class StackLayoutSolver implements ConstraintSolver {
  calculateLayout(
    node: RenderNode,
    widthSpec: SizeSpec,
    heightSpec: SizeSpec,
    context: LayoutContext,
  ): SolvedLayout {
    const style = node.style;
    const padding = style.padding ?? 0;
    const inset = padding * 2;

    if (node.measure) {
      const content = context.measureContent(
        node,
        shrinkSizeSpec(widthSpec, inset),
        shrinkSizeSpec(heightSpec, inset),
      );
      return {
        width: resolveSize(widthSpec, style.width ?? content.width + inset),
        height: resolveSize(heightSpec, style.height ?? content.height + inset),
        data: content.data,
        children: [],
        nested: content.nested ?? null,
      };
    }

    const column = node.flexDirection === "column";
    const innerMain = shrinkSizeSpec(column ? heightSpec : widthSpec, inset);
    const innerCross = shrinkSizeSpec(column ? widthSpec : heightSpec, inset);

    const children: PositionedLayout[] = [];
    let consumed = 0;
    let crossExtent = 0;

    for (const child of node.children) {
      const fixedCross = column ? child.style.width : child.style.height;
      const fixedMain = column ? child.style.height : child.style.width;
      const crossSpec = fixedCross !== undefined ? SizeSpec.exact(fixedCross) : toAtMost(innerCross);
      const mainSpec = fixedMain !== undefined ? SizeSpec.exact(fixedMain) : remaining(innerMain, consumed);

      const result = column
        ? context.measureChild(child, crossSpec, mainSpec)
        : context.measureChild(child, mainSpec, crossSpec);

      children.push({
        x: padding + (column ? 0 : consumed),
        y: padding + (column ? consumed : 0),
        result,
      });
      consumed += column ? result.height : result.width;
      crossExtent = Math.max(crossExtent, column ? result.width : result.height);
    }

    const contentWidth = (column ? crossExtent : consumed) + inset;
    const contentHeight = (column ? consumed : crossExtent) + inset;

    return {
      width: resolveSize(widthSpec, style.width ?? contentWidth),
      height: resolveSize(heightSpec, style.height ?? contentHeight),
      children,
    };
  }
}
