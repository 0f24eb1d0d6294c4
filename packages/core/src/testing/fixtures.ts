/**
 * Test Fixtures
 *
 * Components and engine stand-ins for exercising passes in-process.
 */

import { ResolutionFuture, type PassFuture } from "arbor-kernel";
import type { ResolutionError } from "arbor-shared";
import { defineComponent, type Component } from "../component/component";
import { TreeRootScope, type ParentScope } from "../component/scope";
import type { EngineConfigInput } from "../config";
import { Column, Image, Text } from "../components/primitives";
import type { SolvedLayout } from "../layout/layout-result";
import type { SizeSpec } from "../layout/size-spec";
import { StackLayoutSolver, type ConstraintSolver, type LayoutContext } from "../layout/solver";
import type { DiagnosticsSink } from "../resolver/diagnostics";
import { ResolutionContext } from "../resolver/resolution-context";
import { create, type CreateOptions } from "../resolver/resolver";
import { TreeState } from "../state/tree-state";
import type { RenderNode } from "../tree/node";

// =============================================================================
// Engine stand-ins
// =============================================================================

/**
 * Stack solver that counts how often each node name is solved.
 */
export class CountingSolver implements ConstraintSolver {
  readonly calls = new Map<string, number>();
  private readonly inner = new StackLayoutSolver();

  calculateLayout(
    node: RenderNode,
    widthSpec: SizeSpec,
    heightSpec: SizeSpec,
    context: LayoutContext,
  ): SolvedLayout {
    this.calls.set(node.name, this.count(node.name) + 1);
    return this.inner.calculateLayout(node, widthSpec, heightSpec, context);
  }

  count(name: string): number {
    return this.calls.get(name) ?? 0;
  }

  reset(): void {
    this.calls.clear();
  }
}

/**
 * Future that requests an interrupt on its `checks + 1`th poll.
 */
export class ScriptedFuture extends ResolutionFuture {
  private polls = 0;

  constructor(private readonly checks: number) {
    super("scripted");
  }

  override isInterruptRequested(): boolean {
    if (!super.isInterruptRequested() && this.polls++ >= this.checks) {
      this.requestInterrupt();
    }
    return super.isInterruptRequested();
  }
}

export class RecordingDiagnostics implements DiagnosticsSink {
  readonly errors: ResolutionError[] = [];

  report(error: ResolutionError): void {
    this.errors.push(error);
  }
}

export interface TestContextOverrides {
  treeState?: TreeState;
  solver?: ConstraintSolver;
  diagnostics?: RecordingDiagnostics;
  config?: EngineConfigInput;
  future?: PassFuture | null;
}

/**
 * A live resolution context plus a root scope to resolve under.
 */
export function createTestContext(overrides: TestContextOverrides = {}): {
  ctx: ResolutionContext;
  root: TreeRootScope;
  treeState: TreeState;
  diagnostics: RecordingDiagnostics;
} {
  const treeState = overrides.treeState ?? new TreeState();
  const diagnostics = overrides.diagnostics ?? new RecordingDiagnostics();
  const ctx = new ResolutionContext({
    treeState,
    solver: overrides.solver ?? new StackLayoutSolver(),
    diagnostics,
    config: overrides.config,
    future: overrides.future,
  });
  return { ctx, root: new TreeRootScope(), treeState, diagnostics };
}

/**
 * `create` for tests that expect the component to produce a node.
 */
export function createOrThrow(
  ctx: ResolutionContext,
  parent: ParentScope,
  component: Component,
  options?: CreateOptions,
): RenderNode {
  const node = create(ctx, parent, component, options);
  if (node === null) {
    throw new Error(`<${component.type.displayName}> resolved to null`);
  }
  return node;
}

// =============================================================================
// Components
// =============================================================================

export function countOf(state: Readonly<Record<string, unknown>>): number {
  return typeof state.count === "number" ? state.count : 0;
}

/**
 * Holds a count and renders it above a fixed image.
 */
export const Counter = defineComponent<{ label?: string }>({
  kind: "delegate",
  name: "Counter",
  initialState: () => ({ count: 0 }),
  render(scope) {
    return Column({
      children: [
        Text({ text: `${scope.props.label ?? ""}${countOf(scope.state)}` }),
        Image({ source: "logo.png", width: 24, height: 24 }),
      ],
    });
  },
});

/** Renders its text through another component. */
export const Label = defineComponent<{ text: string }>({
  kind: "delegate",
  name: "Label",
  render: (scope) => Text({ text: scope.props.text }),
});

/**
 * Size-spec-dependent: renders how much width it was offered.
 */
export const WidthEcho = defineComponent<{ prefix?: string }>({
  kind: "delegate",
  name: "WidthEcho",
  needsSizeSpec: true,
  render(scope, widthSpec) {
    return Text({ text: `${scope.props.prefix ?? ""}${widthSpec.mode}:${widthSpec.size}` });
  },
});

/** Leaf backed by a prepared unit. */
export const Tile = defineComponent<{ color: string }>({
  kind: "leaf",
  name: "Tile",
  prepare: (scope) => ({ description: `tile:${scope.props.color}` }),
  measure: () => ({ width: 10, height: 10 }),
});

/** Fails every time it resolves. */
export const Broken = defineComponent<{ message: string }>({
  kind: "delegate",
  name: "Broken",
  render(scope): Component {
    throw new Error(scope.props.message);
  },
});
