/**
 * # Arbor
 *
 * Incremental, interruptible resolution and measurement of declarative
 * component trees.
 *
 * ## Key Features
 *
 * - **Resolution** - Components resolve into render nodes by their kind: containers, leaves and delegates
 * - **Reconciliation** - State-only passes reuse unchanged subtrees of the committed tree, layout included
 * - **Measurement caches** - Results are reused whenever the new size specs are compatible
 * - **Nested trees** - Size-spec-dependent components resolve during measurement
 * - **Interruption** - Background passes hand their partial tree to the main thread, which resumes it
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ComponentTree, Column, Text, SizeSpec } from 'arbor';
 *
 * const tree = new ComponentTree();
 * tree.setRoot(Column({ children: [Text({ text: 'Hello' })] }));
 * const { layout } = tree.calculateLayout(SizeSpec.exact(320), SizeSpec.unspecified()) ?? {};
 * ```
 *
 * @module arbor
 */

// Component model
export * from "./component/component";
export * from "./component/scope";
export * from "./component/equivalence";
export * from "./components/primitives";

// State
export * from "./state/tree-state";

// Nodes
export * from "./tree/style";
export * from "./tree/node";
export * from "./tree/diff-node";

// Layout
export * from "./layout/size-spec";
export * from "./layout/layout-result";
export * from "./layout/solver";
export * from "./layout/caches";
export * from "./layout/measure";
export * from "./layout/nested-tree";

// Resolution
export * from "./resolver/resolution-context";
export * from "./resolver/resolver";
export * from "./resolver/reconciler";
export * from "./resolver/diagnostics";
export * from "./resolver/perf-event";

// Orchestration
export * from "./engine/layout-pass";
export * from "./engine/component-tree";

// Configuration
export * from "./config";
