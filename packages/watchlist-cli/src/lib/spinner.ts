/**
 * Spinner wrapper that respects quiet/JSON mode, plus a helper that follows
 * a job handle from submission to completion.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import type { JobHandle } from "./job-registry.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  text: string;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements Spinner {
  text = "";

  start(text?: string): Spinner {
    if (text) this.text = text;
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

/**
 * Wrapper around ora. Writes to stderr so stdout stays clean for results.
 */
class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}

export interface TrackJobLabels {
  start: string;
  /** Shown once the server reports the work was deferred */
  queued?: (jobId: string) => string;
  succeed: string;
  fail: string;
}

/**
 * Spin while a job handle is outstanding. Resolves or rejects with the handle.
 */
export async function trackJob<T>(
  handle: JobHandle<T>,
  labels: TrackJobLabels,
  spinner: Spinner = createSpinner()
): Promise<T> {
  spinner.start(labels.start);
  handle.onProgress((jobId) => {
    spinner.text = labels.queued ? labels.queued(jobId) : `${labels.start} (job ${jobId} queued)`;
  });

  try {
    const result = await handle;
    spinner.succeed(labels.succeed);
    return result;
  } catch (error) {
    spinner.fail(labels.fail);
    throw error;
  }
}
