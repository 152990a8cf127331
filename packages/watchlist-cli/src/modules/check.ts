import { Command } from "commander";
import chalk from "chalk";
import { z } from "zod";
import { maybeOutputJson, type CheckResultJson } from "../lib/json-output.js";
import type { RequestParams } from "../lib/ports/transport.js";
import { failCommand, parseResult, withCoordinator, type CoordinatorFactory } from "../lib/runtime.js";
import { trackJob } from "../lib/spinner.js";

export const CheckResultSchema = z.object({
  need: z.number().int().nonnegative(),
  found: z.number().int().nonnegative(),
});

export function describeCheck(result: CheckResultJson): string {
  if (result.need === 0) return "No episodes needed.";
  return `${result.found} of ${result.need} needed episode${result.need === 1 ? "" : "s"} found.`;
}

export function registerCheckCommand(program: Command, getCoordinator: CoordinatorFactory): void {
  program
    .command("check")
    .option("-s, --show <id>", "Only check this series")
    .description("Check for new episodes and queue the ones found")
    .action(async (options: { show?: string }) => {
      try {
        const params: RequestParams = options.show ? { id: options.show } : {};
        const raw = await withCoordinator(getCoordinator, (coordinator) =>
          trackJob(coordinator.submit("/api/shows/check", params), {
            start: options.show ? `Checking series ${options.show}` : "Checking all series",
            succeed: "Check complete",
            fail: "Check failed",
          })
        );
        const counts = parseResult(CheckResultSchema, raw, "check");
        const data: CheckResultJson = { show: options.show, ...counts };

        if (!maybeOutputJson(data)) {
          console.log(data.found > 0 ? chalk.green(describeCheck(data)) : describeCheck(data));
        }
      } catch (error) {
        failCommand(error);
      }
    });
}
