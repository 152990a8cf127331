#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { createCoordinatorFactory, type GlobalOptions } from "./lib/runtime.js";
import { registerCheckCommand } from "./modules/check.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerEpisodesCommand } from "./modules/episodes.js";
import { registerListenCommand } from "./modules/listen.js";
import { registerSearchCommand } from "./modules/search.js";
import { registerShowCommands } from "./modules/shows.js";

const PackageInfoSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageInfoSchema.parse(JSON.parse(raw)).version;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("watchlist")
    .description("Manage a TV series watchlist server from the terminal")
    .version(readVersion())
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress spinners and alerts")
    .option("-y, --yes", "Skip confirmation prompts")
    .option("--no-input", "Fail instead of prompting")
    .option("-v, --verbose", "Log at debug level")
    .option("-c, --config <path>", "Use this config file instead of the user config")
    .option("--server <url>", "Server base URL");

  const getOptions = () => program.opts<GlobalOptions>();
  const getCoordinator = createCoordinatorFactory(getOptions);

  registerShowCommands(program, getCoordinator);
  registerSearchCommand(program, getCoordinator);
  registerCheckCommand(program, getCoordinator);
  registerEpisodesCommand(program, getCoordinator);
  registerListenCommand(program, getCoordinator);
  registerConfigCommands(program, getOptions);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error((error as Error).message);
    process.exitCode = 1;
  }
}

void main();
