import { Argument, Command } from "commander";
import chalk from "chalk";
import { z } from "zod";
import { maybeOutputJson, type EpisodeStatusJson } from "../lib/json-output.js";
import { failCommand, parseResult, withCoordinator, type CoordinatorFactory } from "../lib/runtime.js";
import { trackJob } from "../lib/spinner.js";
import { showPath } from "./shows.js";

export const EPISODE_STATUSES = ["need", "ignore", "delete"] as const;
export type EpisodeStatus = (typeof EPISODE_STATUSES)[number];

export const EpisodeStatusResultSchema = z.object({
  statuses: z.record(z.unknown()).default({}),
});

/**
 * Path for a status change. The server reads `value` from the query string
 * even on POST, so it rides on the path rather than in the form body.
 */
export function episodeStatusPath(id: string, codes: string, status: EpisodeStatus): string {
  const list = codes
    .split(",")
    .map((code) => code.trim())
    .filter(Boolean)
    .join(",");
  return `${showPath(id, `episodes/${encodeURIComponent(list)}/status`)}?value=${status}`;
}

export function registerEpisodesCommand(program: Command, getCoordinator: CoordinatorFactory): void {
  program
    .command("episodes")
    .argument("<id>", "Series id")
    .argument("<codes>", "Comma separated episode codes, e.g. s01e01,s01e02")
    .addArgument(new Argument("<status>", "New status").choices(EPISODE_STATUSES))
    .description("Mark episodes as needed, ignored or deleted")
    .action(async (id: string, codes: string, status: EpisodeStatus) => {
      try {
        const raw = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit(episodeStatusPath(id, codes, status), {}, "POST"), {
            start: `Marking ${codes} as ${status}`,
            succeed: `Marked ${codes} as ${status}`,
            fail: `Failed to mark ${codes}`,
          })
        );
        const { statuses } = parseResult(EpisodeStatusResultSchema, raw, "episode status");
        const data: EpisodeStatusJson = { show: id, status, statuses };

        if (!maybeOutputJson(data)) {
          for (const code of Object.keys(statuses)) {
            console.log(`  ${chalk.bold(code)} ${chalk.gray("→")} ${status}`);
          }
        }
      } catch (error) {
        failCommand(error);
      }
    });
}
