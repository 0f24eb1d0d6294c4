import type { RenderNode } from "../tree/node";
import { hasCompatibleSizeSpec, SizeSpec } from "./size-spec";

/** Content size reported by a leaf measure function or a nested tree. */
export interface MeasureOutput {
  width: number;
  height: number;
  data?: unknown;
  /** Set when the content is a nested tree measured in place */
  nested?: LayoutResult | null;
}

export interface PositionedLayout {
  readonly x: number;
  readonly y: number;
  readonly result: LayoutResult;
}

/**
 * Geometry a solver produces for one node.
 */
export interface SolvedLayout {
  width: number;
  height: number;
  data?: unknown;
  children: PositionedLayout[];
  nested?: LayoutResult | null;
}

/**
 * Measured geometry of a node, together with the specs it was measured
 * against. Results are immutable and may be reused across passes as long as
 * the specs stay compatible.
 */
export interface LayoutResult {
  readonly node: RenderNode;
  readonly width: number;
  readonly height: number;
  readonly widthSpec: SizeSpec;
  readonly heightSpec: SizeSpec;
  readonly data: unknown;
  /** Children in node child order */
  readonly children: readonly PositionedLayout[];
  /** Root of the nested tree, for nodes whose content is a deferred component */
  readonly nested: LayoutResult | null;
}

export function createLayoutResult(
  node: RenderNode,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
  solved: SolvedLayout,
): LayoutResult {
  return Object.freeze({
    node,
    width: solved.width,
    height: solved.height,
    widthSpec,
    heightSpec,
    data: solved.data,
    children: Object.freeze([...solved.children]),
    nested: solved.nested ?? null,
  });
}

/**
 * Whether `result` is still valid for a request of `widthSpec` x `heightSpec`.
 */
export function isLayoutCompatible(
  result: LayoutResult,
  widthSpec: SizeSpec,
  heightSpec: SizeSpec,
): boolean {
  return hasCompatibleSizeSpec(
    result.widthSpec,
    result.heightSpec,
    widthSpec,
    heightSpec,
    result.width,
    result.height,
  );
}

/**
 * Indented dump of a layout tree, one node per line.
 *
 * @example
 * ```
 * Column 100x32 [EXACT 100, UNSPECIFIED]
 *   Text 16x16 @0,0 [AT_MOST 100, UNSPECIFIED]
 * ```
 */
export function layoutToDebugString(result: LayoutResult): string {
  const lines: string[] = [];
  const visit = (current: LayoutResult, depth: number, position: string): void => {
    const specs = `[${SizeSpec.toString(current.widthSpec)}, ${SizeSpec.toString(current.heightSpec)}]`;
    lines.push(
      `${"  ".repeat(depth)}${current.node.name} ${current.width}x${current.height}${position} ${specs}`,
    );
    if (current.nested) {
      visit(current.nested, depth + 1, " (nested)");
    }
    for (const child of current.children) {
      visit(child.result, depth + 1, ` @${child.x},${child.y}`);
    }
  };
  visit(result, 0, "");
  return lines.join("\n");
}
