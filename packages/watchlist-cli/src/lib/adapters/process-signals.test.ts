import { describe, expect, it, vi } from "vitest";
import { createProcessSignalHandler } from "./process-signals.js";
import { flush } from "../testing/fakes.js";

describe("createProcessSignalHandler", () => {
  it("runs shutdown callbacks once and exits with 0", async () => {
    const exit = vi.fn();
    const handler = createProcessSignalHandler(["SIGUSR2"], exit);
    const callback = vi.fn(async () => {});
    handler.onShutdown(callback);

    process.emit("SIGUSR2", "SIGUSR2");
    process.emit("SIGUSR2", "SIGUSR2");
    await flush();
    handler.dispose();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith("SIGUSR2");
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("exits with 1 when a callback rejects", async () => {
    const exit = vi.fn();
    const handler = createProcessSignalHandler(["SIGUSR2"], exit);
    handler.onShutdown(async () => {
      throw new Error("flush failed");
    });

    process.emit("SIGUSR2", "SIGUSR2");
    await flush();
    handler.dispose();

    expect(exit).toHaveBeenCalledWith(1);
  });
});
