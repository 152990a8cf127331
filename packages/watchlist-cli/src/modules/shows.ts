import { Command } from "commander";
import chalk from "chalk";
import { z } from "zod";
import { interactivePrompts } from "../lib/adapters/interactive-prompts.js";
import { isNonInteractive, shouldAutoConfirm } from "../lib/cli-context.js";
import { confirmationRequired } from "../lib/errors/catalog.js";
import { maybeOutputJson, type OverviewJson, type ShowActionJson } from "../lib/json-output.js";
import type { PromptService } from "../lib/ports/prompt.js";
import type { RequestParams } from "../lib/ports/transport.js";
import { failCommand, parseResult, withCoordinator, type CoordinatorFactory } from "../lib/runtime.js";
import { trackJob } from "../lib/spinner.js";

export interface ShowCommandDeps {
  promptService?: PromptService;
}

export function showPath(id: string, action?: string): string {
  const base = `/api/shows/${encodeURIComponent(id)}`;
  return action ? `${base}/${action}` : base;
}

export const OverviewSchema = z.object({ overview: z.string() });

export interface ShowSettingsOptions {
  quality?: string;
  path?: string;
  searchString?: string;
  language?: string;
  identifier?: string;
  paused?: boolean;
  flat?: boolean;
}

/**
 * Form fields for the settings endpoint. The server replaces every setting
 * on each save, so options left out go as empty strings or "false".
 */
export function showSettingsParams(options: ShowSettingsOptions): RequestParams {
  return {
    quality: options.quality ?? "",
    path: options.path ?? "",
    search_string: options.searchString ?? "",
    language: options.language ?? "",
    identifier: options.identifier ?? "",
    paused: options.paused ? "true" : "false",
    flat: options.flat ? "true" : "false",
  };
}

function report(data: ShowActionJson, message: string): void {
  if (!maybeOutputJson(data)) console.log(chalk.green(message));
}

export function registerShowCommands(
  program: Command,
  getCoordinator: CoordinatorFactory,
  deps: ShowCommandDeps = {}
): void {
  const { promptService = interactivePrompts } = deps;
  const shows = program.command("shows").description("Manage the series watchlist");

  shows
    .command("add")
    .argument("<id>", "Provider id of the series (see `watchlist search`)")
    .description("Add a series and fetch its episode list")
    .action(async (id: string) => {
      try {
        const result = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit(showPath(id), {}, "PUT"), {
            start: `Adding series ${id}`,
            queued: (jobId) => `Retrieving episode information (job ${jobId})`,
            succeed: `Series ${id} added`,
            fail: `Failed to add series ${id}`,
          })
        );
        report({ show: id, action: "add", result }, `Series ${id} is on the watchlist.`);
      } catch (error) {
        failCommand(error);
      }
    });

  shows
    .command("remove")
    .argument("<id>", "Series id")
    .description("Remove a series from the database")
    .action(async (id: string) => {
      try {
        if (!shouldAutoConfirm()) {
          if (isNonInteractive()) throw confirmationRequired(`remove series ${id}`);
          const confirmed = await promptService.confirm(`Remove series ${id} from the database?`);
          if (!confirmed) {
            console.error(chalk.gray("Cancelled."));
            return;
          }
        }

        const result = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit(showPath(id), {}, "DELETE"), {
            start: `Removing series ${id}`,
            succeed: `Series ${id} removed`,
            fail: `Failed to remove series ${id}`,
          })
        );
        report({ show: id, action: "remove", result }, `Series ${id} was removed.`);
      } catch (error) {
        failCommand(error);
      }
    });

  shows
    .command("refresh")
    .argument("<id>", "Series id")
    .description("Refresh series metadata from its provider")
    .action(async (id: string) => {
      try {
        const result = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit(showPath(id, "refresh"), {}, "POST"), {
            start: `Refreshing series ${id}`,
            succeed: `Series ${id} refreshed`,
            fail: `Failed to refresh series ${id}`,
          })
        );
        report({ show: id, action: "refresh", result }, `Series ${id} is up to date.`);
      } catch (error) {
        failCommand(error);
      }
    });

  shows
    .command("provider")
    .argument("<id>", "Series id")
    .argument("<provider>", "Metadata provider name, e.g. thetvdb or tvmaze")
    .description("Switch the metadata provider of a series")
    .action(async (id: string, provider: string) => {
      try {
        const result = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit(showPath(id, "provider"), { provider }, "POST"), {
            start: `Switching series ${id} to ${provider}`,
            succeed: `Series ${id} now uses ${provider}`,
            fail: `Failed to switch provider for series ${id}`,
          })
        );
        report({ show: id, action: "provider", result }, `Series ${id} now uses ${provider}.`);
      } catch (error) {
        failCommand(error);
      }
    });

  shows
    .command("settings")
    .argument("<id>", "Series id")
    .option("--quality <quality>", "Preferred quality")
    .option("--path <dir>", "Library directory for the series")
    .option("--search-string <text>", "Search string used in place of the series name")
    .option("--language <lang>", "Episode language")
    .option("--identifier <id>", "Provider identifier override")
    .option("--paused", "Stop looking for new episodes")
    .option("--flat", "Keep episodes in one directory instead of per season")
    .description("Replace the settings of a series")
    .action(async (id: string, options: ShowSettingsOptions) => {
      try {
        const result = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit(showPath(id, "settings"), showSettingsParams(options), "POST"), {
            start: `Saving settings for series ${id}`,
            succeed: `Settings saved for series ${id}`,
            fail: `Failed to save settings for series ${id}`,
          })
        );
        report({ show: id, action: "settings", result }, `Series ${id} settings saved.`);
      } catch (error) {
        failCommand(error);
      }
    });

  shows
    .command("overview")
    .argument("<id>", "Series id")
    .argument("[code]", "Episode code, e.g. s01e02")
    .description("Print the overview of a series or one of its episodes")
    .action(async (id: string, code: string | undefined) => {
      try {
        const path = code ? showPath(id, `${encodeURIComponent(code)}/overview`) : showPath(id, "overview");
        const raw = await withCoordinator(getCoordinator, (coordinator) => coordinator.submit(path).promise);
        const { overview } = parseResult(OverviewSchema, raw, "overview");
        const data: OverviewJson = { show: id, ...(code ? { episode: code } : {}), overview };

        if (!maybeOutputJson(data)) console.log(overview);
      } catch (error) {
        failCommand(error);
      }
    });
}
