import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { createCoordinator, type Coordinator } from "../lib/coordinator.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import {
  createManualTimers,
  createScriptedTransport,
  flush,
  type ManualTimers,
  type ScriptedTransport,
} from "../lib/testing/fakes.js";
import type { PromptService } from "../lib/ports/prompt.js";
import { registerShowCommands, showPath, showSettingsParams } from "./shows.js";

describe("showPath", () => {
  it("encodes the id and appends the action", () => {
    expect(showPath("tvmaze:82")).toBe("/api/shows/tvmaze%3A82");
    expect(showPath("12", "refresh")).toBe("/api/shows/12/refresh");
  });
});

describe("showSettingsParams", () => {
  it("sends every field, with unset ones blank", () => {
    expect(showSettingsParams({ language: "de", flat: true })).toEqual({
      quality: "",
      path: "",
      search_string: "",
      language: "de",
      identifier: "",
      paused: "false",
      flat: "true",
    });
  });
});

describe("shows commands", () => {
  let transport: ScriptedTransport;
  let timers: ManualTimers;
  let coordinator: Coordinator;
  let program: Command;
  let stdout: MockInstance;
  let stderr: MockInstance;
  const promptService: PromptService = { confirm: vi.fn(async () => true) };

  beforeEach(() => {
    transport = createScriptedTransport();
    timers = createManualTimers();
    coordinator = createCoordinator({ transport, timers });
    program = new Command().exitOverride();
    registerShowCommands(program, () => coordinator, { promptService });
    stdout = vi.spyOn(console, "log").mockImplementation(() => {});
    stderr = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    resetContext();
    process.exitCode = undefined;
  });

  function lastJson(): unknown {
    return JSON.parse(String(stdout.mock.calls.at(-1)?.[0]));
  }

  it("adds a series and waits for the deferred job", async () => {
    initContext(["node", "watchlist", "--json"], {});
    const run = program.parseAsync(["node", "watchlist", "shows", "add", "tvmaze:82"]);
    await flush();

    const put = transport.next();
    expect(put.request).toEqual({
      method: "PUT",
      path: "/api/shows/tvmaze%3A82",
      params: {},
      timeoutMs: 30000,
    });
    put.reply({ jobid: 1, pending: true });
    await flush();

    timers.tick();
    transport.next().reply({ jobs: [{ id: 1, result: { id: "tvmaze:82", name: "Dark" } }] });
    await run;

    expect(lastJson()).toEqual({
      success: true,
      data: { show: "tvmaze:82", action: "add", result: { id: "tvmaze:82", name: "Dark" } },
    });
    expect(coordinator.isPolling()).toBe(false);
    expect(process.exitCode).toBeUndefined();
  });

  it("sends the provider as a form parameter", async () => {
    initContext(["node", "watchlist", "--quiet"], {});
    const run = program.parseAsync(["node", "watchlist", "shows", "provider", "12", "tvmaze"]);
    await flush();

    const call = transport.next();
    expect(call.request).toMatchObject({
      method: "POST",
      path: "/api/shows/12/provider",
      params: { provider: "tvmaze" },
    });
    call.reply({});
    await run;

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(String(stdout.mock.calls[0][0])).toContain("Series 12 now uses tvmaze.");
  });

  it("refuses to remove without confirmation when it cannot prompt", async () => {
    initContext(["node", "watchlist", "--no-input"], {});
    await program.parseAsync(["node", "watchlist", "shows", "remove", "12"]);

    expect(transport.requests).toEqual([]);
    expect(promptService.confirm).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
    const lines = stderr.mock.calls.map((c) => String(c[0]));
    expect(lines.some((line) => line.includes("Refusing to remove series 12 without confirmation"))).toBe(true);
  });

  it("removes without prompting under --yes", async () => {
    initContext(["node", "watchlist", "--yes", "--quiet"], {});
    const run = program.parseAsync(["node", "watchlist", "shows", "remove", "12"]);
    await flush();

    const call = transport.next();
    expect(call.request).toMatchObject({ method: "DELETE", path: "/api/shows/12" });
    call.reply({ removed: true });
    await run;

    expect(promptService.confirm).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it("reports a failed job and sets the exit code", async () => {
    initContext(["node", "watchlist", "--json"], {});
    const run = program.parseAsync(["node", "watchlist", "shows", "refresh", "12"]);
    await flush();

    transport.next().reply({ jobid: "r1", pending: true });
    await flush();
    timers.tick();
    transport.next().reply({ jobs: [{ id: "r1", error: "Provider unavailable" }] });
    await run;

    expect(process.exitCode).toBe(1);
    expect(JSON.parse(String(stderr.mock.calls.at(-1)?.[0]))).toEqual({
      success: false,
      error: {
        code: "JOB_FAILED",
        message: "Provider unavailable",
        jobId: "r1",
        payload: { message: "Provider unavailable" },
      },
    });
  });

  it("posts series settings as form fields", async () => {
    initContext(["node", "watchlist", "--quiet"], {});
    const run = program.parseAsync([
      "node",
      "watchlist",
      "shows",
      "settings",
      "12",
      "--quality",
      "1080p",
      "--search-string",
      "Dark 2017",
      "--paused",
    ]);
    await flush();

    const call = transport.next();
    expect(call.request).toEqual({
      method: "POST",
      path: "/api/shows/12/settings",
      params: {
        quality: "1080p",
        path: "",
        search_string: "Dark 2017",
        language: "",
        identifier: "",
        paused: "true",
        flat: "false",
      },
      timeoutMs: 30000,
    });
    call.reply(null);
    await run;

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(String(stdout.mock.calls[0][0])).toContain("Series 12 settings saved.");
    expect(process.exitCode).toBeUndefined();
  });

  it("prints the overview of a series", async () => {
    initContext(["node", "watchlist"], {});
    const run = program.parseAsync(["node", "watchlist", "shows", "overview", "12"]);
    await flush();

    const call = transport.next();
    expect(call.request).toMatchObject({ method: "GET", path: "/api/shows/12/overview", params: {} });
    call.reply({ overview: "A family saga across three timelines." });
    await run;

    expect(stdout).toHaveBeenCalledWith("A family saga across three timelines.");
  });

  it("fetches an episode overview by code", async () => {
    initContext(["node", "watchlist", "--json"], {});
    const run = program.parseAsync(["node", "watchlist", "shows", "overview", "12", "s01e02"]);
    await flush();

    const call = transport.next();
    expect(call.request).toMatchObject({ method: "GET", path: "/api/shows/12/s01e02/overview" });
    call.reply({ overview: "Episode not found" });
    await run;

    expect(lastJson()).toEqual({
      success: true,
      data: { show: "12", episode: "s01e02", overview: "Episode not found" },
    });
  });
});
