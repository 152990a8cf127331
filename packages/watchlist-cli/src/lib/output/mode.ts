/**
 * Output mode detection for determining how to render CLI output.
 */

import { isJsonMode } from "../cli-context.js";

/**
 * - `color`: Interactive terminal, chalk styling
 * - `plain`: Pipes, CI and dumb terminals; same text, no colour
 * - `json`: Structured JSON output for scripting
 */
export type OutputMode = "color" | "plain" | "json";

/**
 * Detect the appropriate output mode from the CLI context and environment.
 */
export function getOutputMode(env: NodeJS.ProcessEnv = process.env): OutputMode {
  if (isJsonMode()) {
    return "json";
  }

  if (env.NO_COLOR || env.TERM === "dumb" || !process.stderr.isTTY) {
    return "plain";
  }

  return "color";
}
