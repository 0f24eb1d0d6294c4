/**
 * Render nodes
 *
 * A RenderNode is the resolved counterpart of one or more components: a
 * delegating component and everything it delegates to collapse into a
 * single node. Components are stacked tail first; the tail is the innermost
 * component, the head is the outermost.
 *
 * Nodes are mutable while their resolution context is live, and frozen once
 * it is released.
 */

import { LifecycleError } from "arbor-shared";
import type { Attachable, Component, RenderUnit, Transition, WorkingRange } from "../component/component";
import type { ComponentScope, ParentScope } from "../component/scope";
import type { LayoutResult, MeasureOutput } from "../layout/layout-result";
import type { SizeSpec } from "../layout/size-spec";
import type { ResolutionContext } from "../resolver/resolution-context";
import type { DiffNode } from "./diff-node";
import type { FlexDirection, LayoutDirection, Style } from "./style";

export type NodeStatus = "resolving" | "resolved" | "interrupted";

/**
 * Measures a node's content when the node has no children of its own.
 */
export interface MeasureStrategy {
  readonly name: string;
  measure(
    context: ResolutionContext,
    node: RenderNode,
    widthSpec: SizeSpec,
    heightSpec: SizeSpec,
  ): MeasureOutput;
}

export interface WorkingRangeRegistration {
  readonly globalKey: string;
  readonly range: WorkingRange;
}

export class RenderNode {
  readonly id: number;
  private readonly scopes: ComponentScope[] = [];
  private readonly childNodes: RenderNode[] = [];
  private parentNode: RenderNode | null = null;
  private currentStyle: Style = {};
  private direction: FlexDirection;
  private ownLayoutDirection: LayoutDirection = "inherit";
  private measureStrategy: MeasureStrategy | null = null;
  private unit: RenderUnit | null = null;
  private readonly transitionList: Transition[] = [];
  private readonly attachableList: Attachable[] = [];
  private readonly workingRangeList: WorkingRangeRegistration[] = [];
  private readonly previousRenderDataScopes = new Map<string, ComponentScope>();
  private pendingChildren: Component[] = [];
  private nodeStatus: NodeStatus = "resolving";
  private diff: DiffNode | null = null;
  private reusedFromPreviousPass = false;

  constructor(
    readonly context: ResolutionContext,
    direction: FlexDirection = "column",
  ) {
    this.id = context.nextNodeId();
    this.direction = direction;
  }

  // ==========================================================================
  // Components
  // ==========================================================================

  /** Scopes tail first. */
  get componentScopes(): readonly ComponentScope[] {
    return this.scopes;
  }

  get componentCount(): number {
    return this.scopes.length;
  }

  get headScope(): ComponentScope | null {
    return this.scopes[this.scopes.length - 1] ?? null;
  }

  get tailScope(): ComponentScope | null {
    return this.scopes[0] ?? null;
  }

  get headComponent(): Component | null {
    return this.headScope?.component ?? null;
  }

  get tailComponent(): Component | null {
    return this.tailScope?.component ?? null;
  }

  get headKey(): string | null {
    return this.headScope?.globalKey ?? null;
  }

  get tailKey(): string | null {
    return this.tailScope?.globalKey ?? null;
  }

  get name(): string {
    return this.headScope?.name ?? "<blank>";
  }

  appendComponent(scope: ComponentScope): void {
    this.assertMutable();
    this.scopes.push(scope);
  }

  // ==========================================================================
  // Children
  // ==========================================================================

  get children(): readonly RenderNode[] {
    return this.childNodes;
  }

  get parent(): RenderNode | null {
    return this.parentNode;
  }

  child(node: RenderNode): void {
    this.assertMutable();
    node.parentNode = this;
    this.childNodes.push(node);
  }

  /** Children deferred by an interruption, in original order. */
  get unresolvedChildren(): readonly Component[] {
    return this.pendingChildren;
  }

  appendUnresolved(component: Component): void {
    this.assertMutable();
    this.pendingChildren.push(component);
    this.nodeStatus = "interrupted";
  }

  /** Hand the unresolved children to the caller and clear the list. */
  takeUnresolved(): Component[] {
    this.assertMutable();
    const pending = this.pendingChildren;
    this.pendingChildren = [];
    return pending;
  }

  // ==========================================================================
  // Layout properties
  // ==========================================================================

  get style(): Readonly<Style> {
    return this.currentStyle;
  }

  get flexDirection(): FlexDirection {
    return this.direction;
  }

  get layoutDirection(): LayoutDirection {
    return this.ownLayoutDirection;
  }

  /** Copy the defined fields of `style` over the node's own. */
  copyStyle(style: Style): void {
    this.assertMutable();
    const next: Style = { ...this.currentStyle };
    if (style.width !== undefined) next.width = style.width;
    if (style.height !== undefined) next.height = style.height;
    if (style.padding !== undefined) next.padding = style.padding;
    if (style.flexDirection !== undefined) this.direction = style.flexDirection;
    if (style.layoutDirection !== undefined) this.ownLayoutDirection = style.layoutDirection;
    this.currentStyle = next;
  }

  setFlexDirection(direction: FlexDirection): void {
    this.assertMutable();
    this.direction = direction;
  }

  setLayoutDirection(direction: LayoutDirection): void {
    this.assertMutable();
    this.ownLayoutDirection = direction;
  }

  /** First explicit direction on the way to the root; `ltr` if none. */
  resolvedLayoutDirection(): Exclude<LayoutDirection, "inherit"> {
    let current: RenderNode | null = this;
    while (current) {
      if (current.ownLayoutDirection !== "inherit") {
        return current.ownLayoutDirection;
      }
      current = current.parentNode;
    }
    return "ltr";
  }

  get measure(): MeasureStrategy | null {
    return this.measureStrategy;
  }

  setMeasure(strategy: MeasureStrategy): void {
    this.assertMutable();
    this.measureStrategy = strategy;
  }

  get renderUnit(): RenderUnit | null {
    return this.unit;
  }

  setRenderUnit(unit: RenderUnit): void {
    this.assertMutable();
    this.unit = unit;
  }

  // ==========================================================================
  // Registrations
  // ==========================================================================

  get transitions(): readonly Transition[] {
    return this.transitionList;
  }

  addTransition(transition: Transition): void {
    this.assertMutable();
    this.transitionList.push(transition);
  }

  get attachables(): readonly Attachable[] {
    return this.attachableList;
  }

  addAttachable(attachable: Attachable): void {
    this.assertMutable();
    this.attachableList.push(attachable);
  }

  get workingRanges(): readonly WorkingRangeRegistration[] {
    return this.workingRangeList;
  }

  addWorkingRange(registration: WorkingRangeRegistration): void {
    this.assertMutable();
    this.workingRangeList.push(registration);
  }

  /** Components whose transitions wait for previous render data, by global key. */
  get componentsNeedingPreviousRenderData(): ReadonlyMap<string, ComponentScope> {
    return this.previousRenderDataScopes;
  }

  addComponentNeedingPreviousRenderData(scope: ComponentScope): void {
    this.assertMutable();
    this.previousRenderDataScopes.set(scope.globalKey, scope);
  }

  // ==========================================================================
  // Status & reconciliation
  // ==========================================================================

  get status(): NodeStatus {
    return this.nodeStatus;
  }

  markResolved(): void {
    this.assertMutable();
    this.nodeStatus = this.pendingChildren.length > 0 ? "interrupted" : "resolved";
  }

  /** Counterpart of this node in the previous committed tree. */
  get diffNode(): DiffNode | null {
    return this.diff;
  }

  linkDiffNode(diff: DiffNode): void {
    this.assertMutable();
    this.diff = diff;
  }

  /** True for nodes carried over unchanged from the previous pass. */
  get isReused(): boolean {
    return this.reusedFromPreviousPass;
  }

  markReused(diff: DiffNode): void {
    this.assertMutable();
    this.diff = diff;
    this.reusedFromPreviousPass = true;
  }

  protected assertMutable(): void {
    if (this.context.isReleased()) {
      throw LifecycleError.immutable(this.name);
    }
  }
}

/**
 * Placeholder for a size-spec-dependent component. The real subtree is
 * resolved during measurement, once the holder's size specs are known.
 */
export class NestedTreeHolder extends RenderNode {
  private latestResult: LayoutResult | null = null;

  constructor(
    context: ResolutionContext,
    /** Scope the deferred component is resolved under */
    readonly parentScope: ParentScope,
    /** Node produced ahead of time by a measure call, if any */
    readonly cachedNode: RenderNode | null = null,
  ) {
    super(context);
  }

  /** Most recent nested tree measured for this holder in this pass. */
  get nestedResult(): LayoutResult | null {
    return this.latestResult;
  }

  setNestedResult(result: LayoutResult): void {
    this.assertMutable();
    this.latestResult = result;
  }

  /**
   * Carry the holder's size and direction over to the nested root. Padding
   * stays on the holder, which applies it around the nested tree.
   */
  copyInto(target: RenderNode): void {
    target.copyStyle({ width: this.style.width, height: this.style.height });
    if (this.layoutDirection !== "inherit") {
      target.setLayoutDirection(this.layoutDirection);
    }
  }
}

export function isNestedTreeHolder(node: RenderNode): node is NestedTreeHolder {
  return node instanceof NestedTreeHolder;
}

/**
 * Visit `root` and its descendants depth first, parents before children.
 */
export function walkNodes(root: RenderNode, visit: (node: RenderNode, depth: number) => void): void {
  const step = (node: RenderNode, depth: number): void => {
    visit(node, depth);
    for (const child of node.children) {
      step(child, depth + 1);
    }
  };
  step(root, 0);
}

/**
 * @example
 * ```
 * <Column key=Column>
 *   <Text key=Column,Text>
 *   (2 unresolved)
 * ```
 */
export function nodeToDebugString(root: RenderNode): string {
  const lines: string[] = [];
  walkNodes(root, (node, depth) => {
    const indent = "  ".repeat(depth);
    const flags = [
      isNestedTreeHolder(node) ? "deferred" : null,
      node.isReused ? "reused" : null,
    ].filter((flag): flag is string => flag !== null);
    const suffix = flags.length > 0 ? ` ${flags.join(" ")}` : "";
    lines.push(`${indent}<${node.name} key=${node.headKey ?? ""}${suffix}>`);
    if (node.unresolvedChildren.length > 0) {
      lines.push(`${indent}  (${node.unresolvedChildren.length} unresolved)`);
    }
  });
  return lines.join("\n");
}
