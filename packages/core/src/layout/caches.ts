import type { Component } from "../component/component";
import type { RenderNode } from "../tree/node";
import { isLayoutCompatible, type LayoutResult } from "./layout-result";
import type { SizeSpec } from "./size-spec";

/**
 * Resolution-time caches of one pass.
 *
 * `willRender` results are keyed by component instance and consumed at most
 * once. Nodes produced by a measure call stay available for the rest of the
 * pass.
 */
export class RenderPhaseCache {
  private readonly willRender = new Map<number, RenderNode | null>();
  private readonly measuredNodes = new Map<number, RenderNode>();

  hasWillRender(component: Component): boolean {
    return this.willRender.has(component.id);
  }

  setWillRender(component: Component, node: RenderNode | null): void {
    this.willRender.set(component.id, node);
  }

  peekWillRender(component: Component): RenderNode | null {
    return this.willRender.get(component.id) ?? null;
  }

  /** Remove and return the node resolved ahead of time for `component`. */
  consumeWillRender(component: Component): RenderNode | null {
    const node = this.willRender.get(component.id) ?? null;
    this.willRender.delete(component.id);
    return node;
  }

  getCachedNode(component: Component): RenderNode | null {
    return this.measuredNodes.get(component.id) ?? null;
  }

  putCachedNode(component: Component, node: RenderNode): void {
    this.measuredNodes.set(component.id, node);
  }

  clear(): void {
    this.willRender.clear();
    this.measuredNodes.clear();
  }
}

/**
 * Measurement cache of one pass: node identity to the results measured for
 * it, looked up by spec compatibility.
 */
export class LayoutPhaseCache {
  private readonly results = new WeakMap<RenderNode, LayoutResult[]>();

  get(node: RenderNode, widthSpec: SizeSpec, heightSpec: SizeSpec): LayoutResult | null {
    const entries = this.results.get(node);
    if (!entries) return null;
    // Newest first
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry && isLayoutCompatible(entry, widthSpec, heightSpec)) {
        return entry;
      }
    }
    return null;
  }

  /** Most recent result for `node`, compatible or not. */
  latest(node: RenderNode): LayoutResult | null {
    const entries = this.results.get(node);
    return entries?.[entries.length - 1] ?? null;
  }

  put(result: LayoutResult): void {
    const entries = this.results.get(result.node);
    if (entries) {
      entries.push(result);
    } else {
      this.results.set(result.node, [result]);
    }
  }
}
