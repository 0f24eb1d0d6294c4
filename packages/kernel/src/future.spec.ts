import { ResolutionFuture } from "./future";

describe("ResolutionFuture", () => {
  it("should start running", () => {
    const future = new ResolutionFuture(1);

    expect(future.status).toBe("running");
    expect(future.isInterruptRequested()).toBe(false);
    expect(future.isReleased()).toBe(false);
  });

  it("should emit interrupt once", () => {
    const future = new ResolutionFuture("v2");
    const onInterrupt = vi.fn();
    future.on("interrupt", onInterrupt);

    future.requestInterrupt();
    future.requestInterrupt();

    expect(future.isInterruptRequested()).toBe(true);
    expect(future.status).toBe("interrupt-requested");
    expect(onInterrupt).toHaveBeenCalledTimes(1);
    expect(onInterrupt).toHaveBeenCalledWith("v2");
  });

  it("should ignore interrupts after release", () => {
    const future = new ResolutionFuture();
    const onRelease = vi.fn();
    future.on("release", onRelease);

    future.release();
    future.release();
    future.requestInterrupt();

    expect(future.status).toBe("released");
    expect(future.isInterruptRequested()).toBe(false);
    expect(onRelease).toHaveBeenCalledTimes(1);
  });
});
