import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/watchlist/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "watchlist", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  serverUrl: "http://localhost:8088",
  rootPath: "",
  cookieName: "watchlist.session",
  minIntervalMs: 5000,
  maxIntervalMs: 10000,
  pollPath: "/api/jobs",
  requestTimeoutMs: 30000,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const PollingSchema = z
  .object({
    minIntervalMs: z.number().int().min(100).max(600000).optional(),
    maxIntervalMs: z.number().int().min(100).max(600000).optional(),
    path: z.string().startsWith("/").optional(),
  })
  .refine(
    (p) => p.minIntervalMs === undefined || p.maxIntervalMs === undefined || p.minIntervalMs <= p.maxIntervalMs,
    { message: "minIntervalMs must not exceed maxIntervalMs", path: ["minIntervalMs"] }
  );

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  server: z
    .object({
      url: z.string().url().optional(),
      rootPath: z.string().optional(),
      cookieName: z.string().min(1).optional(),
    })
    .optional(),
  polling: PollingSchema.optional(),
  requests: z
    .object({
      timeoutMs: z.number().int().min(1000).max(600000).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  serverUrl: string;
  rootPath: string;
  cookieName: string;
  minIntervalMs: number;
  maxIntervalMs: number;
  pollPath: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist; throws CONFIG_INVALID if it
 * exists but can't be used.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${(err as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${(err as Error).message}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.server?.url !== undefined) target.serverUrl = source.server.url;
  if (source.server?.rootPath !== undefined) target.rootPath = source.server.rootPath;
  if (source.server?.cookieName !== undefined) target.cookieName = source.server.cookieName;
  if (source.polling?.minIntervalMs !== undefined) target.minIntervalMs = source.polling.minIntervalMs;
  if (source.polling?.maxIntervalMs !== undefined) target.maxIntervalMs = source.polling.maxIntervalMs;
  if (source.polling?.path !== undefined) target.pollPath = source.polling.path;
  if (source.requests?.timeoutMs !== undefined) target.requestTimeoutMs = source.requests.timeoutMs;
  if (source.logging?.level !== undefined) target.logLevel = source.logging.level;
  if (source.logging?.json !== undefined) target.logJson = source.logging.json;
}

/**
 * Environment overrides: WATCHLIST_SERVER_URL, WATCHLIST_ROOT_PATH.
 */
function applyEnv(target: ResolvedConfig, env: NodeJS.ProcessEnv): void {
  if (env.WATCHLIST_SERVER_URL) target.serverUrl = env.WATCHLIST_SERVER_URL;
  if (env.WATCHLIST_ROOT_PATH !== undefined) target.rootPath = env.WATCHLIST_ROOT_PATH;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  env: NodeJS.ProcessEnv = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    ...CONFIG_DEFAULTS,
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) applyConfigFile(config, systemConfig);
  if (userConfig) applyConfigFile(config, userConfig);
  applyEnv(config, env);

  for (const [key, value] of Object.entries(cliOptions)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }

  if (config.minIntervalMs > config.maxIntervalMs) {
    throw invalidConfig("(effective configuration)", [
      `polling.minIntervalMs (${config.minIntervalMs}) exceeds polling.maxIntervalMs (${config.maxIntervalMs})`,
    ]);
  }

  return config;
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file, used in place of the user config
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, process.env);

  return { config, sources };
}
