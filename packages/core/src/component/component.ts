/**
 * Component model
 *
 * A component is an immutable description: a type, its props, an optional
 * manual key and common style props. How it resolves is decided by the closed
 * `kind` of its definition:
 *
 * - `container` resolves itself directly into a node with children
 * - `leaf` prepares a renderable unit and measures its own content
 * - `delegate` renders another component; with `needsSizeSpec` it is
 *   deferred until real size constraints are known
 *
 * @example
 * ```typescript
 * const Label = defineComponent<{ text: string }>({
 *   kind: 'delegate',
 *   name: 'Label',
 *   render: (scope) => Text({ text: scope.props.text }),
 * });
 *
 * const root = Column({ children: [Label({ text: 'hi' }, { key: 'title' })] });
 * ```
 */

import { ValidationError } from "arbor-shared";
import type { SizeSpec } from "../layout/size-spec";
import type { MeasureOutput } from "../layout/layout-result";
import type { RenderNode } from "../tree/node";
import type { FlexDirection, Style } from "../tree/style";
import type { StateValues } from "../state/tree-state";
import type { ComponentScope } from "./scope";

// ============================================================================
// Registrations
// ============================================================================

export interface Transition {
  /** Global key of the component the transition animates */
  readonly key: string;
  readonly properties: readonly string[];
}

export interface Attachable {
  readonly id: string;
  attach(): void;
  detach(): void;
}

export interface WorkingRange {
  readonly name: string;
  onEnterRange?(position: number): void;
  onExitRange?(position: number): void;
}

/** A prepared renderable unit produced by a leaf. */
export interface RenderUnit {
  readonly description: string;
}

export type TreeProps = ReadonlyMap<string, unknown>;

export const EMPTY_TREE_PROPS: TreeProps = new Map();

/**
 * What a delegate returns: the component to resolve in its place, optionally
 * with transitions and effects to register on the resulting node.
 */
export interface RenderResult {
  component: Component | null;
  transitions?: readonly Transition[];
  effects?: readonly Attachable[];
}

export type RenderOutput = Component | RenderResult | null;

export interface UpdateSnapshot<P extends object> {
  readonly props: Readonly<P>;
  readonly state: StateValues;
}

// ============================================================================
// Definitions
// ============================================================================

/**
 * Optional behaviour shared by every kind of component.
 */
export interface ComponentHooks<P extends object> {
  readonly name: string;

  initialState?(scope: ComponentScope<P>): StateValues;

  /** Return true when the component must be resolved again. */
  shouldUpdate?(previous: UpdateSnapshot<P>, next: UpdateSnapshot<P>): boolean;

  /** Props equivalence; defaults to a deep structural comparison. */
  isEquivalent?(a: Readonly<P>, b: Readonly<P>): boolean;

  createTransition?(scope: ComponentScope<P>): Transition | null;

  /** Defer transition creation until previous render data is available. */
  readonly needsPreviousRenderData?: boolean;

  onAttached?(scope: ComponentScope<P>): void;
  onDetached?(scope: ComponentScope<P>): void;

  workingRanges?(scope: ComponentScope<P>): readonly WorkingRange[];

  /** Tree props visible to descendants. */
  treeProps?(scope: ComponentScope<P>, inherited: TreeProps): TreeProps;
}

/**
 * Operations a container may use while resolving itself.
 */
export interface ContainerApi {
  createNode(direction?: FlexDirection): RenderNode;
  /**
   * Resolve `children` under the container and attach them to `node`. When
   * the pass is interrupted the remaining children are recorded as
   * unresolved and picked up on resume.
   */
  appendChildren(node: RenderNode, children: readonly Component[]): void;
  /** Resolve ahead of time; the result is consumed when the child resolves. */
  willRender(component: Component): boolean;
  /** Resolve and measure ahead of time; the result is reused when the child resolves. */
  measure(component: Component, widthSpec: SizeSpec, heightSpec: SizeSpec): MeasureOutput;
}

export interface ContainerDefinition<P extends object> extends ComponentHooks<P> {
  readonly kind: "container";
  resolve(scope: ComponentScope<P>, api: ContainerApi): RenderNode | null;
}

export interface LeafDefinition<P extends object> extends ComponentHooks<P> {
  readonly kind: "leaf";
  prepare?(scope: ComponentScope<P>): RenderUnit | null;
  measure?(scope: ComponentScope<P>, widthSpec: SizeSpec, heightSpec: SizeSpec): MeasureOutput;
}

export interface DelegateDefinition<P extends object> extends ComponentHooks<P> {
  readonly kind: "delegate";
  /** Resolution waits for real size specs; `render` receives them. */
  readonly needsSizeSpec?: boolean;
  render(scope: ComponentScope<P>, widthSpec: SizeSpec, heightSpec: SizeSpec): RenderOutput;
}

export type ComponentDefinition<P extends object = object> =
  | ContainerDefinition<P>
  | LeafDefinition<P>
  | DelegateDefinition<P>;

// ============================================================================
// Components
// ============================================================================

export interface ComponentType<P extends object = object> {
  readonly displayName: string;
  readonly definition: ComponentDefinition<P>;
}

export interface ComponentOptions {
  key?: string;
  style?: Style;
}

export interface Component<P extends object = object> {
  readonly type: ComponentType<P>;
  readonly props: Readonly<P>;
  /** Manual key, unique among siblings */
  readonly key: string | null;
  readonly style: Style | null;
  /** Instance id, used by the render-phase caches */
  readonly id: number;
}

export interface ComponentFactory<P extends object> extends ComponentType<P> {
  (props: P, options?: ComponentOptions): Component<P>;
}

let nextComponentId = 1;

/** Separates the parts of a global key. */
export const KEY_SEPARATOR = ",";

/**
 * Auto key parts are the bare name (with a `!n` repeat suffix) and manual
 * parts start with `$`, so names may carry neither.
 */
function assertValidName(name: string): void {
  if (name === "" || name.includes(KEY_SEPARATOR) || name.includes("!") || name.startsWith("$")) {
    throw new ValidationError(
      "name",
      `Invalid component name "${name}": names must be non-empty and may not contain "," or "!" or start with "$"`,
    );
  }
}

function assertValidKey(name: string, key: string): void {
  if (key.includes(KEY_SEPARATOR)) {
    throw new ValidationError("key", `Invalid key "${key}" for <${name}>: keys may not contain ","`);
  }
}

/**
 * @throws ValidationError when the name could not be told apart from a key
 * part; the factory throws the same for a manual key containing `,`
 */
export function defineComponent<P extends object>(definition: ComponentDefinition<P>): ComponentFactory<P> {
  assertValidName(definition.name);
  const create = (props: P, options: ComponentOptions = {}): Component<P> => {
    if (options.key !== undefined) {
      assertValidKey(definition.name, options.key);
    }
    return Object.freeze({
      type: factory,
      props: Object.freeze({ ...props }),
      key: options.key ?? null,
      style: options.style ? Object.freeze({ ...options.style }) : null,
      id: nextComponentId++,
    });
  };
  const factory: ComponentFactory<P> = Object.assign(create, {
    displayName: definition.name,
    definition,
  });
  return factory;
}

export function isComponent(value: unknown): value is Component {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    "props" in value &&
    "id" in value &&
    typeof value.id === "number" &&
    // Factories are functions carrying their definition
    typeof value.type === "function" &&
    "definition" in value.type &&
    "displayName" in value.type
  );
}

/**
 * Components listed under `props.children`, if any.
 */
export function childrenOf(component: Component): Component[] {
  const props: object = component.props;
  if (!("children" in props) || !Array.isArray(props.children)) {
    return [];
  }
  return props.children.filter(isComponent);
}

export function isSizeSpecDependent(component: Component): boolean {
  const definition = component.type.definition;
  return definition.kind === "delegate" && definition.needsSizeSpec === true;
}

export function normalizeRenderOutput(output: RenderOutput): RenderResult {
  if (output === null) {
    return { component: null };
  }
  return isComponent(output) ? { component: output } : output;
}
