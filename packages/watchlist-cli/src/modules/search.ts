import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { z } from "zod";
import { maybeOutputJson, type SearchResultJson } from "../lib/json-output.js";
import { failCommand, parseResult, withCoordinator, type CoordinatorFactory } from "../lib/runtime.js";
import { trackJob } from "../lib/spinner.js";

const SearchHitSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    name: z.string(),
    year: z.union([z.string(), z.number()]).nullish(),
    provider: z.string().optional(),
    overview: z.string().nullish(),
  })
  .passthrough();

export const SearchResultSchema = z.object({
  results: z.array(SearchHitSchema).default([]),
});

const OVERVIEW_WIDTH = 60;

function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}

export function renderSearchTable(results: SearchResultJson["results"]): string {
  const table = new CliTable3({
    head: [chalk.cyan("Id"), chalk.cyan("Name"), chalk.cyan("Year"), chalk.cyan("Overview")],
    colWidths: [22, 30, 8, OVERVIEW_WIDTH + 2],
    wordWrap: true,
  });
  for (const hit of results) {
    table.push([
      String(hit.id),
      hit.name,
      hit.year === undefined || hit.year === null ? "" : String(hit.year),
      truncate(hit.overview ?? "", OVERVIEW_WIDTH),
    ]);
  }
  return table.toString();
}

export function registerSearchCommand(program: Command, getCoordinator: CoordinatorFactory): void {
  program
    .command("search")
    .argument("<name>", "Series name to look up at the metadata providers")
    .description("Search providers for a series")
    .action(async (name: string) => {
      try {
        const raw = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit("/api/shows/search", { name }), {
            start: `Searching for "${name}"`,
            succeed: "Search complete",
            fail: "Search failed",
          })
        );
        const { results } = parseResult(SearchResultSchema, raw, "search");
        const data: SearchResultJson = {
          query: name,
          results: results.map((hit) => ({
            id: hit.id,
            name: hit.name,
            year: hit.year,
            provider: hit.provider,
            overview: hit.overview ?? undefined,
          })),
        };

        if (maybeOutputJson(data)) return;

        if (data.results.length === 0) {
          console.log(chalk.yellow(`No series found for "${name}".`));
          return;
        }
        console.log(renderSearchTable(data.results));
        console.log(chalk.gray(`Add one with: watchlist shows add <id>`));
      } catch (error) {
        failCommand(error);
      }
    });
}
