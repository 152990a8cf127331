import { z } from "zod";
import { createApiClient, type FetchImpl, type SessionStore } from "./api-client.js";
import { createTerminalToast } from "./adapters/terminal-toast.js";
import { getContext } from "./cli-context.js";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { createCoordinator, type Coordinator } from "./coordinator.js";
import { unexpectedResult } from "./errors/catalog.js";
import { renderUnknownError } from "./errors/renderer.js";
import { createLogger, type Logger } from "./logger.js";
import type { TimerService } from "./ports/timer.js";
import type { ToastDisplay } from "./ports/toast.js";

export type CoordinatorFactory = () => Coordinator;

/** Global options every command accepts */
export interface GlobalOptions {
  config?: string;
  server?: string;
}

export interface RuntimeDeps {
  fetchImpl?: FetchImpl;
  sessionStore?: SessionStore;
  timers?: TimerService;
  toast?: ToastDisplay;
}

/**
 * Logger for the current context: debug with --verbose, and stderr only in
 * JSON mode so results on stdout stay parseable.
 */
export function createContextLogger(config: ResolvedConfig): Logger {
  const context = getContext();
  return createLogger({
    level: context.verbose ? "debug" : config.logLevel,
    json: config.logJson,
    stderrOnly: context.json,
  });
}

/**
 * Build a coordinator wired from resolved configuration.
 */
export function buildCoordinator(config: ResolvedConfig, deps: RuntimeDeps = {}): Coordinator {
  const context = getContext();
  const logger = createContextLogger(config);

  return createCoordinator({
    transport: createApiClient({
      baseUrl: config.serverUrl,
      cookieName: config.cookieName,
      sessionStore: deps.sessionStore,
      fetchImpl: deps.fetchImpl,
    }),
    rootPath: config.rootPath,
    minIntervalMs: config.minIntervalMs,
    maxIntervalMs: config.maxIntervalMs,
    pollPath: config.pollPath,
    requestTimeoutMs: config.requestTimeoutMs,
    timers: deps.timers,
    toast: context.quiet ? undefined : deps.toast ?? createTerminalToast(),
    logger: logger.child({ component: "coordinator" }),
  });
}

/**
 * Lazily resolve configuration and build a coordinator when a command runs,
 * so commands that never talk to the server don't need a valid config.
 */
export function createCoordinatorFactory(
  getOptions: () => GlobalOptions,
  deps: RuntimeDeps = {}
): CoordinatorFactory {
  return () => {
    const options = getOptions();
    const { config } = loadConfig(options.config, { serverUrl: options.server });
    return buildCoordinator(config, deps);
  };
}

/**
 * Run `fn` with a fresh coordinator and always stop it afterwards, so the
 * poll timer never keeps the process alive.
 */
export async function withCoordinator<T>(
  factory: CoordinatorFactory,
  fn: (coordinator: Coordinator) => Promise<T>
): Promise<T> {
  const coordinator = factory();
  try {
    return await fn(coordinator);
  } finally {
    coordinator.stop("command finished");
  }
}

/**
 * Render a command failure and flag the exit code.
 */
export function failCommand(error: unknown): void {
  renderUnknownError(error);
  process.exitCode = 1;
}

/**
 * Validate a job result against the shape a command expects.
 */
export function parseResult<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw unexpectedResult(
      what,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("\n")
    );
  }
  return result.data;
}
