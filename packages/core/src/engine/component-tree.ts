import { Logger, MAIN_THREAD, ResolutionFuture, Threads } from "arbor-kernel";
import { ValidationError } from "arbor-shared";
import { EMPTY_TREE_PROPS, type Component, type TreeProps } from "../component/component";
import type { EngineConfigInput } from "../config";
import type { SizeSpec } from "../layout/size-spec";
import { StackLayoutSolver, type ConstraintSolver } from "../layout/solver";
import type { DiagnosticsSink } from "../resolver/diagnostics";
import { TreeState, type StateUpdate } from "../state/tree-state";
import { LayoutPass, type CommittedLayout } from "./layout-pass";

const log = Logger.for("ComponentTree");

export interface ComponentTreeOptions {
  solver?: ConstraintSolver;
  config?: EngineConfigInput;
  diagnostics?: DiagnosticsSink;
  treeProps?: TreeProps;
}

export interface BackgroundLayoutOptions {
  /** Future the pass polls; a fresh one is created when omitted */
  future?: ResolutionFuture;
  /** Name of the thread the pass runs on (default: "layout-bg") */
  thread?: string;
}

export type BackgroundLayout =
  | { status: "committed"; layout: CommittedLayout }
  | { status: "interrupted"; future: ResolutionFuture; pass: LayoutPass }
  | { status: "failed" };

interface PendingPass {
  pass: LayoutPass;
  future: ResolutionFuture;
  version: number;
}

/**
 * Owns a root component, its tree state and the last committed layout, and
 * schedules passes over them.
 *
 * A background pass that gets interrupted is parked; the next foreground
 * `calculateLayout` for the same tree version resumes it instead of starting
 * over.
 *
 * @example
 * ```typescript
 * const tree = new ComponentTree();
 * tree.setRoot(Counter({}));
 * const first = tree.calculateLayout(SizeSpec.exact(320), SizeSpec.unspecified());
 * tree.updateState('Counter', (s) => ({ count: Number(s.count ?? 0) + 1 }));
 * const second = tree.calculateLayout(SizeSpec.exact(320), SizeSpec.unspecified());
 * ```
 */
export class ComponentTree {
  readonly treeState = new TreeState();
  private readonly solver: ConstraintSolver;
  private readonly config: EngineConfigInput | undefined;
  private readonly diagnostics: DiagnosticsSink | undefined;
  private readonly treeProps: TreeProps;
  private rootComponent: Component | null = null;
  private committed: CommittedLayout | null = null;
  private pending: PendingPass | null = null;
  private treeVersion = 0;

  constructor(options: ComponentTreeOptions = {}) {
    this.solver = options.solver ?? new StackLayoutSolver();
    this.config = options.config;
    this.diagnostics = options.diagnostics;
    this.treeProps = options.treeProps ?? EMPTY_TREE_PROPS;
  }

  get version(): number {
    return this.treeVersion;
  }

  get committedLayout(): CommittedLayout | null {
    return this.committed;
  }

  setRoot(component: Component): void {
    this.rootComponent = component;
    this.treeVersion++;
  }

  /** Queue a state update for the component with `globalKey`. */
  updateState(globalKey: string, update: StateUpdate): void {
    this.treeState.enqueueStateUpdate(globalKey, update);
    this.treeVersion++;
  }

  /**
   * Compute and commit a layout on the main thread. A parked background
   * pass for the current version is interrupted and finished here.
   */
  calculateLayout(widthSpec: SizeSpec, heightSpec: SizeSpec): CommittedLayout | null {
    return Threads.run(MAIN_THREAD, () => {
      const handoff = this.takePending();
      if (handoff) {
        handoff.future.requestInterrupt();
        handoff.pass.resume();
        handoff.pass.measure(widthSpec, heightSpec);
        return this.publish(handoff.pass);
      }

      const pass = this.createPass(null);
      pass.resolve(this.requireRoot(), widthSpec, heightSpec);
      return this.publish(pass);
    });
  }

  /**
   * Run a pass on a background thread. If it is interrupted, the partial
   * tree is parked for the next `calculateLayout`.
   */
  calculateLayoutInBackground(
    widthSpec: SizeSpec,
    heightSpec: SizeSpec,
    options: BackgroundLayoutOptions = {},
  ): BackgroundLayout {
    const thread = options.thread ?? "layout-bg";
    const future = options.future ?? new ResolutionFuture(this.treeVersion);
    const root = this.requireRoot();
    this.takePending()?.pass.abandon();

    return Threads.run(thread, (): BackgroundLayout => {
      const pass = this.createPass(future);
      const resolved = pass.resolve(root, widthSpec, heightSpec);
      if (resolved === null) {
        pass.abandon();
        return { status: "failed" };
      }
      if (pass.status === "interrupted") {
        this.pending = { pass, future, version: this.treeVersion };
        log.debug({ version: this.treeVersion, thread }, "Background pass interrupted");
        return { status: "interrupted", future, pass };
      }
      const layout = this.publish(pass);
      return layout ? { status: "committed", layout } : { status: "failed" };
    });
  }

  private createPass(future: ResolutionFuture | null): LayoutPass {
    return new LayoutPass({
      treeState: this.treeState,
      solver: this.solver,
      previous: this.committed,
      future,
      config: this.config,
      diagnostics: this.diagnostics,
      treeProps: this.treeProps,
      version: this.treeVersion,
    });
  }

  /** The parked pass if it still matches the tree version; stale ones are dropped. */
  private takePending(): PendingPass | null {
    const pending = this.pending;
    this.pending = null;
    if (pending === null) {
      return null;
    }
    if (pending.version !== this.treeVersion || pending.future.isReleased()) {
      pending.pass.abandon();
      return null;
    }
    return pending;
  }

  private publish(pass: LayoutPass): CommittedLayout | null {
    const layout = pass.commit();
    if (layout) {
      this.committed = layout;
      log.debug({ version: layout.version, root: layout.root.headKey }, "Committed layout");
    }
    return layout;
  }

  private requireRoot(): Component {
    if (this.rootComponent === null) {
      throw ValidationError.required("root", "setRoot must be called before calculating a layout");
    }
    return this.rootComponent;
  }
}
