import type { LayoutResult } from "../layout/layout-result";
import type { RenderNode } from "./node";

/**
 * Counterpart of a node in the previously committed tree: the node as it was
 * measured and the layout it produced. Reconciliation compares new
 * components against the scopes recorded here.
 */
export interface DiffNode {
  readonly node: RenderNode;
  readonly layout: LayoutResult;
  readonly children: readonly DiffNode[];
}

/** Global key of every component in the tree under `root`. */
export function collectGlobalKeys(root: DiffNode): Set<string> {
  const keys = new Set<string>();
  const visit = (diff: DiffNode): void => {
    for (const scope of diff.node.componentScopes) {
      keys.add(scope.globalKey);
    }
    diff.children.forEach(visit);
  };
  visit(root);
  return keys;
}

/**
 * Build the diff tree for a committed layout. The nested tree of a deferred
 * component becomes the single child of its holder.
 */
export function createDiffTree(layout: LayoutResult): DiffNode {
  const children = layout.nested
    ? [createDiffTree(layout.nested)]
    : layout.children.map((child) => createDiffTree(child.result));
  return Object.freeze({ node: layout.node, layout, children: Object.freeze(children) });
}
