import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  type ResolvedConfig,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { maybeOutputJson } from "../lib/json-output.js";
import type { GlobalOptions } from "../lib/runtime.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# watchlist CLI configuration
# Place at ~/.config/watchlist/config.yaml (user) or /etc/watchlist/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags (--server, --config)
# 2. Environment (WATCHLIST_SERVER_URL, WATCHLIST_ROOT_PATH)
# 3. User config (~/.config/watchlist/config.yaml)
# 4. System config (/etc/watchlist/config.yaml)
# 5. Built-in defaults

server:
  # Base URL of the watchlist server
  url: "http://localhost:8088"

  # Replaces {{root}} in notification text (e.g. links to the web UI)
  rootPath: ""

  # Cookie that carries the session id; job ids are scoped to it
  cookieName: "watchlist.session"

# Adaptive polling for deferred jobs and notifications
polling:
  # Floor: used right after new work or activity
  minIntervalMs: 5000

  # Ceiling: idle polls back off towards it, failures jump to it
  maxIntervalMs: 10000

  # Endpoint that reports finished jobs and notifications
  path: "/api/jobs"

requests:
  # Timeout for command requests (polls use the current interval)
  timeoutMs: 30000

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs
  json: false
`;

// ---------------------------------------------------------------------------
// Display
// ---------------------------------------------------------------------------

export function describeConfig(config: ResolvedConfig, sources: string[]): string[] {
  return [
    chalk.cyan("Effective Configuration:"),
    chalk.gray("─".repeat(40)),
    chalk.gray(`Sources: ${sources.length > 0 ? sources.join(", ") : "(defaults only)"}`),
    "",
    chalk.bold("Server:"),
    `  url:            ${config.serverUrl}`,
    `  rootPath:       ${config.rootPath || chalk.gray("(empty)")}`,
    `  cookieName:     ${config.cookieName}`,
    "",
    chalk.bold("Polling:"),
    `  minIntervalMs:  ${config.minIntervalMs}`,
    `  maxIntervalMs:  ${config.maxIntervalMs}`,
    `  path:           ${config.pollPath}`,
    "",
    chalk.bold("Requests:"),
    `  timeoutMs:      ${config.requestTimeoutMs}`,
    "",
    chalk.bold("Logging:"),
    `  level:          ${config.logLevel}`,
    `  json:           ${config.logJson}`,
  ];
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(
  program: Command,
  getOptions: () => GlobalOptions = () => ({})
): void {
  const config = program
    .command("config")
    .description("Manage watchlist CLI configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", "Create system-wide config at /etc/watchlist/config.yaml")
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Use a text editor to modify it, or delete it first."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${(error as Error).message}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s); --config picks a single file")
    .action(() => {
      const explicit = getOptions().config;
      const pathsToCheck = explicit ? [explicit] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (explicit) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          renderUnknownError(error);
          hasErrors = true;
        }
      }

      if (!foundAny && !explicit) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'watchlist config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action(() => {
      try {
        const options = getOptions();
        const { config: resolved, sources } = loadConfig(options.config, { serverUrl: options.server });
        if (maybeOutputJson({ config: resolved, sources })) return;
        for (const line of describeConfig(resolved, sources)) console.log(line);
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(`  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(`  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
    });
}
