import { Telemetry, Threads, type Span, type TelemetryProvider } from "arbor-kernel";
import { isLifecycleError, KeyCollisionError } from "arbor-shared";
import { defineComponent } from "../component/component";
import { Column, Text } from "../components/primitives";
import { layoutToDebugString } from "../layout/layout-result";
import { SizeSpec } from "../layout/size-spec";
import { TreeState } from "../state/tree-state";
import {
  Broken,
  countOf,
  Counter,
  Label,
  RecordingDiagnostics,
  ScriptedFuture,
  WidthEcho,
} from "../testing/fixtures";
import { nodeToDebugString, walkNodes, type RenderNode } from "../tree/node";
import { LayoutPass } from "./layout-pass";

const WIDTH = SizeSpec.exact(100);
const HEIGHT = SizeSpec.unspecified();

interface SpanRecord {
  name: string;
  attributes: string[];
  ended: boolean;
}

const threeLines = () =>
  Column({ children: [Text({ text: "a" }), Text({ text: "b" }), Text({ text: "c" })] });

const mixed = () =>
  Column({
    children: [
      Label({ text: "a" }),
      Counter({ label: "n=" }),
      WidthEcho({ prefix: "w=" }),
      Column({ children: [Text({ text: "b" }), Label({ text: "c" })] }),
    ],
  });

function keysOf(root: RenderNode): string[] {
  const keys: string[] = [];
  walkNodes(root, (node) => {
    keys.push(node.headKey ?? "");
  });
  return keys;
}

describe("LayoutPass", () => {
  it("should resolve, measure and commit in one run", () => {
    const treeState = new TreeState();
    const pass = new LayoutPass({ treeState });

    const committed = pass.run(Counter({}), WIDTH, HEIGHT);

    expect(pass.status).toBe("committed");
    expect(pass.context.isReleased()).toBe(true);
    expect([committed?.layout.width, committed?.layout.height]).toEqual([100, 40]);
    expect(committed?.diffTree.node).toBe(committed?.root);
    expect(treeState.getCommittedState("Counter")).toEqual({ count: 0 });
  });

  it("should freeze the committed tree", () => {
    const pass = new LayoutPass({ treeState: new TreeState() });
    const committed = pass.run(Counter({}), WIDTH, HEIGHT);

    let caught: unknown;
    try {
      committed?.root.copyStyle({ width: 1 });
    } catch (error) {
      caught = error;
    }

    expect(isLifecycleError(caught)).toBe(true);
    if (isLifecycleError(caught)) {
      expect(caught.code).toBe("LIFECYCLE_IMMUTABLE");
      expect(caught.message).toBe("Cannot mutate node <Counter>: its resolution context was released");
    }
  });

  it("should discard applied state when abandoned", () => {
    const treeState = new TreeState();
    new LayoutPass({ treeState }).run(Counter({}), WIDTH, HEIGHT);
    treeState.enqueueStateUpdate("Counter", (state) => ({ count: countOf(state) + 1 }));
    const pass = new LayoutPass({ treeState });

    const root = pass.resolve(Counter({}), WIDTH, HEIGHT);
    expect(root?.headScope?.state).toEqual({ count: 1 });

    pass.abandon();
    pass.abandon();

    expect(pass.status).toBe("abandoned");
    expect(pass.context.isReleased()).toBe(true);
    expect(treeState.getCommittedState("Counter")).toEqual({ count: 0 });
    expect(treeState.hasPendingUpdate("Counter")).toBe(true);
  });

  it("should finish an interrupted background pass on the main thread", () => {
    const pass = new LayoutPass({ treeState: new TreeState(), future: new ScriptedFuture(1) });

    Threads.run("layout-bg", () => pass.resolve(threeLines(), WIDTH, HEIGHT));

    expect(pass.status).toBe("interrupted");
    expect(pass.resolvedRoot?.unresolvedChildren).toHaveLength(2);

    const committed = pass.commit();
    const reference = new LayoutPass({ treeState: new TreeState() }).run(threeLines(), WIDTH, HEIGHT);

    expect(committed && layoutToDebugString(committed.layout)).toBe(
      reference && layoutToDebugString(reference.layout),
    );
    expect(committed?.layout.children.map((child) => child.y)).toEqual([0, 16, 32]);
    expect(pass.context.lifecycleDebugString()).toBe(
      "created@main interrupted@layout-bg resumed@main released@main",
    );
  });

  it("should measure against new specs when given", () => {
    const pass = new LayoutPass({ treeState: new TreeState() });
    pass.resolve(threeLines(), WIDTH, HEIGHT);

    const layout = pass.measure(SizeSpec.exact(50), HEIGHT);
    const committed = pass.commit();

    expect(layout?.width).toBe(50);
    expect(committed?.layout).toBe(layout);
    expect(committed?.widthSpec).toEqual(SizeSpec.exact(50));
  });

  it("should report a failed root and publish nothing", () => {
    const diagnostics = new RecordingDiagnostics();
    const pass = new LayoutPass({ treeState: new TreeState(), diagnostics });

    expect(pass.run(Broken({ message: "boom" }), WIDTH, HEIGHT)).toBeNull();
    expect(pass.status).toBe("abandoned");
    expect(diagnostics.errors.map((error) => error.message)).toEqual(["Failed to resolve <Broken> at Broken: boom"]);
  });

  it("should commit the same tree wherever a background pass is interrupted", () => {
    const reference = new LayoutPass({ treeState: new TreeState() }).run(mixed(), WIDTH, HEIGHT);
    if (!reference) throw new Error("expected a committed layout");
    const statuses: string[] = [];

    for (let checks = 0; checks <= 10; checks++) {
      const pass = new LayoutPass({ treeState: new TreeState(), future: new ScriptedFuture(checks) });
      Threads.run("layout-bg", () => pass.resolve(mixed(), WIDTH, HEIGHT));
      statuses.push(pass.status);

      const committed = pass.commit();

      expect(committed && nodeToDebugString(committed.root)).toBe(nodeToDebugString(reference.root));
      expect(committed && layoutToDebugString(committed.layout)).toBe(layoutToDebugString(reference.layout));
    }

    expect(statuses[0]).toBe("interrupted");
    expect(statuses[10]).toBe("resolved");
  });

  it("should give the same tree when a pass without updates runs again", () => {
    const treeState = new TreeState();
    const first = new LayoutPass({ treeState }).run(mixed(), WIDTH, HEIGHT);
    const second = new LayoutPass({ treeState, previous: first }).run(mixed(), WIDTH, HEIGHT);
    if (!first || !second) throw new Error("expected committed layouts");

    expect(keysOf(second.root)).toEqual(keysOf(first.root));
    expect(layoutToDebugString(second.layout)).toBe(layoutToDebugString(first.layout));
    expect(treeState.getCommittedState("Column,Counter")).toEqual({ count: 0 });

    // An update for a key outside the tree still makes the pass reconcile
    treeState.enqueueStateUpdate("Elsewhere", (state) => state);
    const third = new LayoutPass({ treeState, previous: second }).run(mixed(), WIDTH, HEIGHT);
    if (!third) throw new Error("expected a committed layout");

    expect(third.root.children[0]?.isReused).toBe(true);
    expect(keysOf(third.root)).toEqual(keysOf(first.root));
    expect(layoutToDebugString(third.layout)).toBe(layoutToDebugString(first.layout));
  });

  it("should abandon the pass when a fatal error escapes resolution", () => {
    const pass = new LayoutPass({ treeState: new TreeState() });
    const tree = Column({
      children: [Text({ text: "a" }, { key: "x" }), Text({ text: "b" }, { key: "x" })],
    });

    expect(() => pass.run(tree, WIDTH, HEIGHT)).toThrow(KeyCollisionError);
    expect(pass.status).toBe("abandoned");
    expect(pass.context.isReleased()).toBe(true);
  });

  it("should abandon the pass when the root's registration hooks throw", () => {
    const Ranged = defineComponent<object>({
      kind: "leaf",
      name: "Ranged",
      measure: () => ({ width: 1, height: 1 }),
      workingRanges: () => {
        throw new Error("range boom");
      },
    });
    const diagnostics = new RecordingDiagnostics();
    const pass = new LayoutPass({ treeState: new TreeState(), diagnostics });

    expect(pass.run(Ranged({}), WIDTH, HEIGHT)).toBeNull();
    expect(pass.status).toBe("abandoned");
    expect(pass.context.isReleased()).toBe(true);
    expect(diagnostics.errors.map((error) => error.message)).toEqual(["Failed to resolve <Ranged> at Ranged: range boom"]);
  });

  it("should reject out-of-order calls", () => {
    const pass = new LayoutPass({ treeState: new TreeState() });
    pass.resolve(threeLines(), WIDTH, HEIGHT);

    expect(() => pass.resolve(threeLines(), WIDTH, HEIGHT)).toThrow("Layout pass is resolved, expected created");

    pass.commit();

    expect(() => pass.resume()).toThrow("Cannot resume a committed pass");
  });

  describe("telemetry", () => {
    afterEach(() => {
      Telemetry.resetProvider();
    });

    it("should mark each phase on the pass span", () => {
      const spans: SpanRecord[] = [];
      const provider: TelemetryProvider = {
        startSpan(name): Span {
          const record: SpanRecord = { name, attributes: [], ended: false };
          spans.push(record);
          return {
            end: () => {
              record.ended = true;
            },
            setAttribute: (key) => {
              record.attributes.push(key);
            },
            recordError: () => {},
          };
        },
        recordError: () => {},
        getCounter: () => ({ add: () => {} }),
      };
      Telemetry.setProvider(provider);

      new LayoutPass({ treeState: new TreeState() }).run(threeLines(), WIDTH, HEIGHT);

      expect(spans).toEqual([
        {
          name: "arbor.layout_pass",
          attributes: [
            "marker.start_create_layout",
            "marker.end_create_layout",
            "marker.start_measure",
            "marker.end_measure",
          ],
          ended: true,
        },
      ]);
    });
  });
});
