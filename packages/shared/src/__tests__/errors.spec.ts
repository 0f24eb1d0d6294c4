/**
 * Tests for the Arbor error hierarchy
 */

import {
  ArborError,
  LifecycleError,
  KeyCollisionError,
  ResolutionError,
  ValidationError,
  ContextError,
  isArborError,
  isLifecycleError,
  isKeyCollisionError,
  isResolutionError,
  isValidationError,
  isContextError,
  isFatalError,
  ensureError,
} from "../errors";

describe("ArborError", () => {
  describe("constructor", () => {
    it("should create error with code and message", () => {
      const error = new ArborError("RESOLUTION_FAILED", "Something went wrong");

      expect(error.message).toBe("Something went wrong");
      expect(error.code).toBe("RESOLUTION_FAILED");
      expect(error.name).toBe("ArborError");
      expect(error.details).toEqual({});
    });

    it("should create error with cause", () => {
      const cause = new Error("Original error");
      const error = new ArborError("RESOLUTION_FAILED", "Wrapped", {}, cause);

      expect(error.cause).toBe(cause);
    });

    it("should have proper prototype chain", () => {
      const error = new LifecycleError("Test");

      expect(error instanceof LifecycleError).toBe(true);
      expect(error instanceof ArborError).toBe(true);
      expect(error instanceof Error).toBe(true);
    });
  });

  describe("toJSON / fromJSON", () => {
    it("should serialize details and nested cause", () => {
      const cause = new KeyCollisionError("root,Text");
      const error = new ArborError("RESOLUTION_FAILED", "Wrapped", { depth: 2 }, cause);
      const json = error.toJSON();

      expect(json.details).toEqual({ depth: 2 });
      expect(json.cause).toMatchObject({ code: "KEY_COLLISION", name: "KeyCollisionError" });
    });

    it("should serialize plain error cause by name and message", () => {
      const error = new ArborError("RESOLUTION_FAILED", "Wrapped", {}, new TypeError("bad"));

      expect(error.toJSON().cause).toEqual({ message: "bad", name: "TypeError" });
    });

    it("should rebuild an error from its serialized form", () => {
      const original = new ArborError(
        "RESOLUTION_FAILED",
        "outer",
        {},
        new LifecycleError("inner", "LIFECYCLE_RELEASED"),
      );
      const restored = ArborError.fromJSON(original.toJSON());

      expect(restored.code).toBe("RESOLUTION_FAILED");
      expect(isArborError(restored.cause) && restored.cause.code).toBe("LIFECYCLE_RELEASED");
    });
  });
});

describe("LifecycleError", () => {
  it("should describe released resources", () => {
    const error = LifecycleError.released("TreeState", "created on main");

    expect(error.message).toBe("Attempt to access TreeState after release");
    expect(error.code).toBe("LIFECYCLE_RELEASED");
    expect(error.details).toEqual({ resource: "TreeState", lifecycle: "created on main" });
  });

  it("should build double release and immutable variants", () => {
    expect(LifecycleError.doubleRelease().code).toBe("LIFECYCLE_DOUBLE_RELEASE");
    expect(LifecycleError.immutable("Text").message).toBe(
      "Cannot mutate node <Text>: its resolution context was released",
    );
  });
});

describe("ResolutionError", () => {
  it("should include the hierarchy path in the message", () => {
    const error = new ResolutionError("Counter", ["Root", "Column", "Counter"], new Error("boom"));

    expect(error.message).toBe("Failed to resolve <Counter> at Root > Column > Counter: boom");
    expect(error.hierarchy).toEqual(["Root", "Column", "Counter"]);
  });

  it("should word comparison failures differently", () => {
    const error = new ResolutionError(
      "Text",
      ["Text"],
      new Error("nope"),
      "RESOLUTION_COMPARISON_FAILED",
    );

    expect(error.message).toBe("Failed to compare <Text> at Text: nope");
  });
});

describe("fatal classification", () => {
  it("should treat lifecycle and key collision errors as fatal", () => {
    expect(isFatalError(new LifecycleError("x"))).toBe(true);
    expect(isFatalError(new KeyCollisionError("a,b"))).toBe(true);
  });

  it("should treat other errors as recoverable", () => {
    expect(isFatalError(new ResolutionError("A", ["A"], new Error("x")))).toBe(false);
    expect(isFatalError(new ValidationError("field", "bad"))).toBe(false);
    expect(isFatalError(new Error("plain"))).toBe(false);
  });
});

describe("type guards", () => {
  it("should narrow each error class", () => {
    expect(isArborError(new ContextError("x"))).toBe(true);
    expect(isLifecycleError(LifecycleError.doubleRelease())).toBe(true);
    expect(isKeyCollisionError(new KeyCollisionError("k"))).toBe(true);
    expect(isResolutionError(new ResolutionError("A", [], new Error("x")))).toBe(true);
    expect(isValidationError(ValidationError.required("solver"))).toBe(true);
    expect(isContextError(ContextError.notFound())).toBe(true);
    expect(isArborError(new Error("plain"))).toBe(false);
  });
});

describe("ensureError", () => {
  it("should return errors unchanged", () => {
    const error = new Error("x");
    expect(ensureError(error)).toBe(error);
  });

  it("should wrap non-error values", () => {
    expect(ensureError("oops").message).toBe("oops");
    expect(ensureError(42).message).toBe("42");
  });
});
