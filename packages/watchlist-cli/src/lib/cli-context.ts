/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and toasts */
  quiet: boolean;
  /** Skip confirmation prompts (auto-yes) */
  yes: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
  /** Log at debug level */
  verbose: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
  noInput: false,
  verbose: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function envFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  const next: CLIContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || envFlag(env.WATCHLIST_JSON)) {
    next.json = true;
    next.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || envFlag(env.WATCHLIST_QUIET)) {
    next.quiet = true;
  }

  if (argv.includes("--yes") || argv.includes("-y") || envFlag(env.WATCHLIST_YES)) {
    next.yes = true;
  }

  if (argv.includes("--no-input") || env.CI || envFlag(env.WATCHLIST_NO_INPUT)) {
    next.noInput = true;
  }

  if (argv.includes("--verbose") || argv.includes("-v") || envFlag(env.WATCHLIST_VERBOSE)) {
    next.verbose = true;
  }

  currentContext = next;
  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/toasts).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we should skip confirmations.
 */
export function shouldAutoConfirm(): boolean {
  return currentContext.yes;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdin.isTTY;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
