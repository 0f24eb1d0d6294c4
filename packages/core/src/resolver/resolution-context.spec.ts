import { ResolutionFuture, Threads } from "arbor-kernel";
import { isLifecycleError } from "arbor-shared";
import { StackLayoutSolver } from "../layout/solver";
import { TreeState } from "../state/tree-state";
import { ResolutionContext } from "./resolution-context";
import { createDiffTree } from "../tree/diff-node";
import { createLayoutResult } from "../layout/layout-result";
import { SizeSpec } from "../layout/size-spec";
import { RenderNode } from "../tree/node";

function createContext(future: ResolutionFuture | null = null): ResolutionContext {
  return new ResolutionContext({ treeState: new TreeState(), solver: new StackLayoutSolver(), future });
}

describe("ResolutionContext", () => {
  describe("release", () => {
    it("should fail accessors after release", () => {
      const ctx = createContext();

      ctx.release();

      expect(ctx.isReleased()).toBe(true);
      expect(() => ctx.getTreeState()).toThrow("Attempt to access tree state after release");
      expect(() => ctx.getRenderCache()).toThrow("Attempt to access render phase cache after release");
      expect(() => ctx.getLayoutCache()).toThrow("Attempt to access layout phase cache after release");
      expect(() => ctx.getCurrentDiffTree()).toThrow("Attempt to access diff tree after release");
      expect(() => ctx.setReuseIndex(null)).toThrow("Attempt to access reuse index after release");
      expect(ctx.getPerfEvent()).toBeNull();
    });

    it("should fail a second release with the lifecycle attached", () => {
      const ctx = createContext();
      ctx.release();

      let caught: unknown;
      try {
        ctx.release();
      } catch (error) {
        caught = error;
      }

      expect(isLifecycleError(caught)).toBe(true);
      if (isLifecycleError(caught)) {
        expect(caught.code).toBe("LIFECYCLE_DOUBLE_RELEASE");
        expect(caught.details).toEqual({ lifecycle: "created@main released@main" });
      }
    });

    it("should record the thread of every lifecycle event", () => {
      const ctx = createContext();

      Threads.run("t2", () => ctx.markLayoutResumed());
      Threads.run("t3", () => ctx.release());

      expect(ctx.lifecycleDebugString()).toBe("created@main resumed@t2 released@t3");
    });
  });

  describe("interruption", () => {
    it("should honour interrupt requests only off the main thread", () => {
      const future = new ResolutionFuture(1);
      const ctx = createContext(future);
      future.requestInterrupt();

      expect(ctx.isLayoutInterrupted()).toBe(false);
      expect(Threads.run("layout-bg", () => ctx.isLayoutInterrupted())).toBe(true);
      expect(ctx.wasInterrupted()).toBe(true);
    });

    it("should log the interruption once", () => {
      const future = new ResolutionFuture(1);
      const ctx = createContext(future);
      future.requestInterrupt();

      Threads.run("layout-bg", () => {
        ctx.isLayoutInterrupted();
        ctx.isLayoutInterrupted();
      });

      expect(ctx.lifecycle.threadsFor("interrupted")).toEqual(["layout-bg"]);
    });

    it("should stop reporting interruption once uninterruptible", () => {
      const future = new ResolutionFuture(1);
      const ctx = createContext(future);
      future.requestInterrupt();

      ctx.markLayoutUninterruptible();

      expect(ctx.isInterruptible()).toBe(false);
      expect(Threads.run("layout-bg", () => ctx.isLayoutInterrupted())).toBe(false);
    });

    it("should never interrupt without a future", () => {
      const ctx = createContext();

      expect(Threads.run("layout-bg", () => ctx.isLayoutInterrupted())).toBe(false);
    });
  });

  it("should hand the nested tree diff node out once", () => {
    const ctx = createContext();
    const node = new RenderNode(ctx);
    const diff = createDiffTree(
      createLayoutResult(node, SizeSpec.exact(10), SizeSpec.exact(10), { width: 10, height: 10, children: [] }),
    );

    ctx.setNestedTreeDiffNode(diff);

    expect(ctx.consumeNestedTreeDiffNode()).toBe(diff);
    expect(ctx.consumeNestedTreeDiffNode()).toBeNull();
  });

  it("should number nodes per context", () => {
    const ctx = createContext();

    expect(new RenderNode(ctx).id).toBe(1);
    expect(new RenderNode(ctx).id).toBe(2);
  });
});
