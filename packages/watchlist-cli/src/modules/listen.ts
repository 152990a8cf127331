import { Command } from "commander";
import chalk from "chalk";
import { createProcessSignalHandler } from "../lib/adapters/process-signals.js";
import { ALERT_TYPE } from "../lib/alerts.js";
import { isJsonMode } from "../lib/cli-context.js";
import type { Coordinator } from "../lib/coordinator.js";
import { outputNdjson, type NotificationEventJson } from "../lib/json-output.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import { failCommand, type CoordinatorFactory } from "../lib/runtime.js";
import type { NotificationRecord } from "../lib/wire.js";

export interface ListenSessionOptions {
  /** Notification types to follow besides "alert" */
  types?: string[];
  json: boolean;
  emit?: (event: NotificationEventJson) => void;
  print?: (line: string) => void;
  now?: () => Date;
}

export interface ListenDeps {
  signalHandler?: SignalHandler;
}

export function formatNotification(record: NotificationRecord): string {
  const { _ntype, _nid, ...fields } = record;
  const id = _nid === undefined ? "" : chalk.gray(` #${String(_nid)}`);
  return `${chalk.magenta(_ntype)}${id} ${JSON.stringify(fields)}`;
}

/**
 * Subscribe to notifications on `coordinator`. Alerts already reach the
 * terminal as toasts, so in human mode only the extra types are printed.
 * Returns a function that removes every subscription.
 */
export function startListenSession(coordinator: Coordinator, options: ListenSessionOptions): () => void {
  const {
    types = [],
    json,
    emit = outputNdjson,
    print = (line) => console.log(line),
    now = () => new Date(),
  } = options;

  const followed = [...new Set([ALERT_TYPE, ...types])];
  const unsubscribers = followed
    .filter((type) => json || type !== ALERT_TYPE)
    .map((type) =>
      coordinator.subscribe(type, (record) => {
        if (json) {
          emit({ type: "notification", timestamp: now().toISOString(), notification: record });
        } else {
          print(formatNotification(record));
        }
      })
    );

  if (json) emit({ type: "start", timestamp: now().toISOString() });

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
    if (json) emit({ type: "stop", timestamp: now().toISOString() });
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerListenCommand(
  program: Command,
  getCoordinator: CoordinatorFactory,
  deps: ListenDeps = {}
): void {
  program
    .command("listen")
    .option("-t, --type <ntype>", "Also follow this notification type (repeatable)", collect, [])
    .description("Follow server notifications until interrupted")
    .action((options: { type: string[] }) => {
      try {
        const coordinator = getCoordinator();
        const json = isJsonMode();
        const stopSession = startListenSession(coordinator, { types: options.type, json });
        const signalHandler = deps.signalHandler ?? createProcessSignalHandler();

        signalHandler.onShutdown((signal) => {
          stopSession();
          coordinator.stop(`received ${signal}`);
        });

        if (!json) {
          console.error(chalk.gray("Listening for notifications. Press Ctrl+C to stop."));
        }
      } catch (error) {
        failCommand(error);
      }
    });
}
