import { describe, it, expect, vi } from "vitest";
import { createTeardown } from "./teardown.js";

describe("createTeardown", () => {
  it("runs every step in order on the first call", () => {
    const calls: string[] = [];
    const stop = createTeardown(() => calls.push("interval"), () => calls.push("observer"), () => calls.push("gpu"));

    expect(stop()).toBe(true);
    expect(calls).toEqual(["interval", "observer", "gpu"]);
  });

  it("does nothing on later calls", () => {
    const destroy = vi.fn();
    const stop = createTeardown(destroy);

    stop();
    expect(stop()).toBe(false);
    expect(stop()).toBe(false);
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});
