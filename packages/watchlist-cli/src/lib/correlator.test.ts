import { describe, expect, it, vi } from "vitest";
import { createResponseCorrelator } from "./correlator.js";
import { JobError } from "./errors/types.js";
import { createJobRegistry, JobHandle } from "./job-registry.js";
import { createNotificationDispatcher } from "./notifications.js";
import { createRecordingLogger, createRecordingToast } from "./testing/fakes.js";
import type { TransportExchange } from "./ports/transport.js";

function setup(rootPath = "") {
  const registry = createJobRegistry();
  const logger = createRecordingLogger();
  const notifications = createNotificationDispatcher({ logger });
  const toast = createRecordingToast();
  const correlator = createResponseCorrelator({ registry, notifications, rootPath, toast, logger });
  return { registry, logger, notifications, toast, correlator };
}

describe("createResponseCorrelator", () => {
  it("resolves a pending job with its result and forgets it", async () => {
    const { registry, correlator } = setup();
    const handle = new JobHandle<{ need: number }>();
    registry.register(4, handle);

    const summary = correlator.correlate({ jobs: [{ id: 4, result: { need: 2 } }], notifications: [] });

    await expect(handle).resolves.toEqual({ need: 2 });
    expect(summary).toEqual({ resolved: 1, rejected: 0, ignored: 0, notifications: 0 });
    expect(registry.size()).toBe(0);
  });

  it("rejects with a job error carrying the payload and originating exchange", async () => {
    const { registry, correlator } = setup();
    const handle = new JobHandle();
    const origin: TransportExchange = {
      request: { method: "GET", path: "/api/shows/check", params: {} },
      status: 200,
    };
    registry.register("j1", handle, origin);

    const rejection = expect(handle.promise).rejects.toMatchObject({
      code: "JOB_FAILED",
      message: "Provider timed out",
      jobId: "j1",
      payload: { message: "Provider timed out", retry: true },
      exchange: origin,
    });
    correlator.correlate({
      jobs: [{ id: "j1", error: { message: "Provider timed out", retry: true } }],
      notifications: [],
    });

    await rejection;
    await expect(handle.promise).rejects.toBeInstanceOf(JobError);
  });

  it("ignores a completion for an id that is not pending", () => {
    const { registry, logger, correlator } = setup();
    const handle = new JobHandle();
    registry.register(1, handle);

    correlator.correlate({ jobs: [{ id: 1, result: "first" }], notifications: [] });
    const summary = correlator.correlate({ jobs: [{ id: 1, result: "second" }], notifications: [] });

    expect(summary.ignored).toBe(1);
    expect(logger.entries).toContainEqual({
      level: "debug",
      message: "Ignoring completion for unknown job",
      meta: { jobId: "1" },
    });
  });

  it("settles jobs before notifying subscribers", () => {
    const { registry, notifications, correlator } = setup();
    const handle = new JobHandle();
    registry.register(2, handle);
    const settledWhenNotified: boolean[] = [];
    notifications.subscribe("progress", () => {
      settledWhenNotified.push(handle.isSettled);
    });

    correlator.correlate({
      jobs: [{ id: 2, result: null }],
      notifications: [{ _ntype: "progress" }],
    });

    expect(settledWhenNotified).toEqual([true]);
  });

  it("shows alerts as toasts with defaults and root path applied", () => {
    const { notifications, toast, correlator } = setup("/tv");
    const handler = vi.fn();
    notifications.subscribe("alert", handler);

    correlator.correlate({
      jobs: [],
      notifications: [{ _ntype: "alert", _nid: 3, title: "Added", text: '<a href="{{root}}/s/1">Show</a>' }],
    });

    const expected = {
      _ntype: "alert",
      _nid: 3,
      title: "Added",
      text: '<a href="/tv/s/1">Show</a>',
      type: "info",
      nonblock: true,
      animation: "fade",
      closer: true,
      delay: 5000,
    };
    expect(handler).toHaveBeenCalledWith(expected);
    expect(toast.shown).toEqual([
      {
        pnotify__ntype: "alert",
        pnotify__nid: 3,
        pnotify_title: "Added",
        pnotify_text: '<a href="/tv/s/1">Show</a>',
        pnotify_type: "info",
        pnotify_nonblock: true,
        pnotify_animation: "fade",
        pnotify_closer: true,
        pnotify_delay: 5000,
      },
    ]);
  });

  it("does not toast other notification types", () => {
    const { toast, correlator } = setup();
    correlator.correlate({ jobs: [], notifications: [{ _ntype: "progress", pct: 50 }] });
    expect(toast.shown).toEqual([]);
  });

  it("keeps dispatching when the toast display throws", () => {
    const registry = createJobRegistry();
    const logger = createRecordingLogger();
    const notifications = createNotificationDispatcher({ logger });
    const toast = {
      show: vi.fn(() => {
        throw new Error("terminal closed");
      }),
    };
    const correlator = createResponseCorrelator({ registry, notifications, rootPath: "", toast, logger });
    const alerts = vi.fn();
    const progress = vi.fn();
    notifications.subscribe("alert", alerts);
    notifications.subscribe("progress", progress);

    const summary = correlator.correlate({
      jobs: [],
      notifications: [
        { _ntype: "alert", _nid: 1, title: "First" },
        { _ntype: "alert", _nid: 2, title: "Second" },
        { _ntype: "progress", pct: 75 },
      ],
    });

    expect(toast.show).toHaveBeenCalledTimes(2);
    expect(alerts).toHaveBeenCalledTimes(2);
    expect(progress).toHaveBeenCalledWith({ _ntype: "progress", pct: 75 });
    expect(summary.notifications).toBe(3);
    expect(logger.entries.filter((e) => e.message === "Toast display failed")).toEqual([
      { level: "warn", message: "Toast display failed", meta: { nid: 1, error: "terminal closed" } },
      { level: "warn", message: "Toast display failed", meta: { nid: 2, error: "terminal closed" } },
    ]);
  });
});
