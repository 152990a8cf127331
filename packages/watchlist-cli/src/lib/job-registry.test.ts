import { describe, expect, it, vi } from "vitest";
import { createJobRegistry, JobHandle } from "./job-registry.js";

describe("JobHandle", () => {
  it("settles exactly once", async () => {
    const handle = new JobHandle<string>();
    expect(handle.resolve("first")).toBe(true);
    expect(handle.resolve("second")).toBe(false);
    expect(handle.reject(new Error("late"))).toBe(false);
    await expect(handle).resolves.toBe("first");
    expect(handle.isSettled).toBe(true);
  });

  it("is awaitable on rejection", async () => {
    const handle = new JobHandle();
    handle.reject(new Error("boom"));
    await expect(handle.promise).rejects.toThrow("boom");
  });

  it("emits progress until it settles", () => {
    const listener = vi.fn();
    const handle = new JobHandle().onProgress(listener);
    handle.progress("12");
    handle.resolve(undefined);
    handle.progress("12");
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("12");
  });
});

describe("createJobRegistry", () => {
  it("refuses a second registration of the same id", () => {
    const registry = createJobRegistry();
    expect(registry.register(5, new JobHandle())).toBe(true);
    expect(registry.register("5", new JobHandle())).toBe(false);
    expect(registry.size()).toBe(1);
  });

  it("removes an entry when it is taken", () => {
    const registry = createJobRegistry();
    const handle = new JobHandle();
    registry.register("a", handle);

    expect(registry.take("a")?.handle).toBe(handle);
    expect(registry.take("a")).toBeUndefined();
    expect(registry.has("a")).toBe(false);
  });

  it("lists ids in registration order and drains them", () => {
    const registry = createJobRegistry();
    registry.register(3, new JobHandle());
    registry.register(1, new JobHandle());
    registry.register(2, new JobHandle());

    expect(registry.ids()).toEqual(["3", "1", "2"]);
    expect(registry.drain().map((e) => e.id)).toEqual(["3", "1", "2"]);
    expect(registry.size()).toBe(0);
  });
});
