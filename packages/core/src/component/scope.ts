import { KeyCollisionError } from "arbor-shared";
import { EMPTY_STATE, type StateUpdate, type StateValues, type TreeState } from "../state/tree-state";
import { EMPTY_TREE_PROPS, KEY_SEPARATOR, type Component, type TreeProps } from "./component";

/**
 * Anything children can be resolved under: a component scope, or the
 * synthetic root of a tree.
 */
export interface ParentScope {
  readonly globalKey: string;
  readonly treeProps: TreeProps;
  /** Names of the components from the root down to this scope. */
  hierarchy(): string[];
  /** Derive the global key of a child and reserve it among its siblings. */
  generateChildKey(child: Component): string;
}

function joinKey(parentKey: string, part: string): string {
  return parentKey === "" ? part : `${parentKey}${KEY_SEPARATOR}${part}`;
}

/**
 * Allocates sibling keys for one parent.
 *
 * Auto keys are the child's type name, suffixed `!n` for the nth repeat of
 * that type. Manual keys are prefixed `$` and must be unique.
 */
class SiblingKeys {
  private readonly typeCounts = new Map<string, number>();
  private readonly manualKeys = new Set<string>();

  constructor(private readonly parentKey: string) {}

  next(child: Component): string {
    if (child.key !== null) {
      const key = joinKey(this.parentKey, `$${child.key}`);
      if (this.manualKeys.has(key)) {
        throw new KeyCollisionError(key);
      }
      this.manualKeys.add(key);
      return key;
    }

    const name = child.type.displayName;
    const count = this.typeCounts.get(name) ?? 0;
    this.typeCounts.set(name, count + 1);
    return joinKey(this.parentKey, count === 0 ? name : `${name}!${count}`);
  }
}

/**
 * Root scope of a tree. Its key is empty, so the root component's global key
 * is just its own key part.
 */
export class TreeRootScope implements ParentScope {
  readonly globalKey = "";
  private readonly keys = new SiblingKeys("");

  constructor(readonly treeProps: TreeProps = EMPTY_TREE_PROPS) {}

  hierarchy(): string[] {
    return [];
  }

  generateChildKey(child: Component): string {
    return this.keys.next(child);
  }
}

export interface ComponentScopeInit<P extends object> {
  component: Component<P>;
  globalKey: string;
  parent: ParentScope;
  treeState: TreeState;
}

/**
 * Scoped identity of one component in one pass: its global key, state, tree
 * props and the allocator for its children's keys.
 */
export class ComponentScope<P extends object = object> implements ParentScope {
  readonly component: Component<P>;
  readonly globalKey: string;
  readonly parent: ParentScope;
  private readonly treeState: TreeState;
  private readonly keys: SiblingKeys;
  private currentState: StateValues = EMPTY_STATE;
  private inheritedTreeProps: TreeProps;
  private ownTreeProps: TreeProps;

  constructor(init: ComponentScopeInit<P>) {
    this.component = init.component;
    this.globalKey = init.globalKey;
    this.parent = init.parent;
    this.treeState = init.treeState;
    this.keys = new SiblingKeys(init.globalKey);
    this.inheritedTreeProps = init.parent.treeProps;
    this.ownTreeProps = init.parent.treeProps;
  }

  get props(): Readonly<P> {
    return this.component.props;
  }

  get name(): string {
    return this.component.type.displayName;
  }

  get state(): StateValues {
    return this.currentState;
  }

  /** Tree props visible to this component's children. */
  get treeProps(): TreeProps {
    return this.ownTreeProps;
  }

  /** Tree props this component received from its ancestors. */
  get parentTreeProps(): TreeProps {
    return this.inheritedTreeProps;
  }

  /** @internal */
  bindState(state: StateValues): void {
    this.currentState = state;
  }

  /** @internal */
  bindTreeProps(inherited: TreeProps, own: TreeProps): void {
    this.inheritedTreeProps = inherited;
    this.ownTreeProps = own;
  }

  /**
   * Queue a state update; it applies on the next pass that resolves this
   * component.
   */
  updateState(update: StateUpdate): void {
    this.treeState.enqueueStateUpdate(this.globalKey, update);
  }

  hierarchy(): string[] {
    return [...this.parent.hierarchy(), this.name];
  }

  generateChildKey(child: Component): string {
    return this.keys.next(child);
  }
}
