import { EMPTY_STATE, TreeState } from "./tree-state";

const increment = (state: Readonly<Record<string, unknown>>) => ({
  count: (typeof state.count === "number" ? state.count : 0) + 1,
});

describe("TreeState", () => {
  it("should seed state from the initializer on first mount", () => {
    const treeState = new TreeState();
    const initial = vi.fn(() => ({ count: 0 }));

    expect(treeState.applyStateUpdates("Counter", initial)).toEqual({ count: 0 });
    expect(treeState.applyStateUpdates("Counter", initial)).toEqual({ count: 0 });
    expect(initial).toHaveBeenCalledTimes(1);
  });

  it("should fold pending updates and keep them until commit", () => {
    const treeState = new TreeState();
    treeState.applyStateUpdates("Counter", () => ({ count: 0 }));
    treeState.commit();

    treeState.enqueueStateUpdate("Counter", increment);
    treeState.enqueueStateUpdate("Counter", increment);
    const applied = treeState.applyStateUpdates("Counter", () => EMPTY_STATE);

    expect(applied).toEqual({ count: 2 });
    expect(Object.isFrozen(applied)).toBe(true);
    expect(treeState.getState("Counter")).toBe(applied);
    expect(treeState.getCommittedState("Counter")).toEqual({ count: 0 });
    expect(treeState.hasUncommittedUpdates()).toBe(true);

    treeState.commit();

    expect(treeState.getCommittedState("Counter")).toEqual({ count: 2 });
    expect(treeState.hasUncommittedUpdates()).toBe(false);
  });

  it("should leave committed state and pending updates alone when a pass is discarded", () => {
    const treeState = new TreeState();
    treeState.applyStateUpdates("Counter", () => ({ count: 5 }));
    treeState.commit();
    treeState.enqueueStateUpdate("Counter", increment);

    expect(treeState.applyStateUpdates("Counter", () => EMPTY_STATE)).toEqual({ count: 6 });
    treeState.discardUncommitted();

    expect(treeState.getState("Counter")).toEqual({ count: 5 });
    expect(treeState.hasPendingUpdate("Counter")).toBe(true);
    expect(treeState.applyStateUpdates("Counter", () => EMPTY_STATE)).toEqual({ count: 6 });
  });

  it("should find pending updates under a key prefix", () => {
    const treeState = new TreeState();
    treeState.enqueueStateUpdate("Root,Column,Text", increment);

    expect(treeState.hasPendingUpdateWithin("Root")).toBe(true);
    expect(treeState.hasPendingUpdateWithin("Root,Column")).toBe(true);
    expect(treeState.hasPendingUpdateWithin("Root,Column,Text")).toBe(true);
    expect(treeState.hasPendingUpdateWithin("Root,Col")).toBe(false);
    expect(treeState.hasPendingUpdateWithin("Root,Column,Text!1")).toBe(false);
    expect(treeState.pendingKeys()).toEqual(["Root,Column,Text"]);
  });

  it("should apply pending updates early only for mounted components", () => {
    const treeState = new TreeState();
    treeState.applyStateUpdates("Mounted", () => ({ count: 1 }));
    treeState.commit();
    treeState.enqueueStateUpdate("Mounted", increment);
    treeState.enqueueStateUpdate("Unmounted", increment);

    treeState.applyPendingUpdatesEarly();

    expect(treeState.getState("Mounted")).toEqual({ count: 2 });
    expect(treeState.getState("Unmounted")).toBeUndefined();
  });

  describe("commit", () => {
    it("should drop state and updates of components that are no longer mounted", () => {
      const treeState = new TreeState();
      treeState.applyStateUpdates("Kept", () => ({ count: 1 }));
      treeState.applyStateUpdates("Gone", () => ({ count: 1 }));
      treeState.commit();
      treeState.enqueueStateUpdate("Gone", increment);

      treeState.applyStateUpdates("Kept", () => EMPTY_STATE);
      treeState.commit();

      expect(treeState.getCommittedState("Kept")).toEqual({ count: 1 });
      expect(treeState.getCommittedState("Gone")).toBeUndefined();
      expect(treeState.hasPendingUpdate("Gone")).toBe(false);
      expect(treeState.hasUncommittedUpdates()).toBe(false);
    });

    it("should keep updates queued after the state was applied", () => {
      const treeState = new TreeState();
      treeState.applyStateUpdates("Counter", () => ({ count: 0 }));
      treeState.commit();
      treeState.enqueueStateUpdate("Counter", increment);

      treeState.applyStateUpdates("Counter", () => EMPTY_STATE);
      treeState.enqueueStateUpdate("Counter", increment);
      treeState.commit();

      expect(treeState.getCommittedState("Counter")).toEqual({ count: 1 });
      expect(treeState.pendingKeys()).toEqual(["Counter"]);
      expect(treeState.applyStateUpdates("Counter", () => EMPTY_STATE)).toEqual({ count: 2 });
    });

    it("should keep state of components carried over without being resolved", () => {
      const treeState = new TreeState();
      treeState.applyStateUpdates("Nested", () => ({ count: 3 }));
      treeState.commit();
      treeState.enqueueStateUpdate("Nested", increment);

      treeState.commit(new Set(["Nested"]));

      expect(treeState.getCommittedState("Nested")).toEqual({ count: 3 });
      expect(treeState.hasPendingUpdate("Nested")).toBe(true);
    });
  });
});
