/**
 * Admin command handlers. Transport-agnostic: each takes the parsed argument and
 * resolves to the reply text. Authorization happens in the channel adapter.
 */
import createDebug from "debug";
import type { ConfigStore } from "../config.js";
import { ValidationError } from "../errors.js";
import type { PostCoordinator } from "../posting/post-coordinator.js";
import type {
  FailureReport,
  IntervalScheduler,
} from "../scheduling/interval-scheduler.js";
import {
  formatCountdown,
  formatDuration,
  parseDuration,
} from "../utils/duration.js";
import { formatTimestamp } from "../utils/helpers.js";

const debug = createDebug("poster:commands");

/** Lower bound accepted from /setinterval. */
export const MIN_INTERVAL_SECONDS = 10;

export const NOT_AUTHORIZED_TEXT = "You are not authorized to use this bot.";

export const HELP_TEXT = `Welcome to the Same Picture Posting Bot!

Commands:
/status - Show current bot settings
/setchannel @channel_name - Set the target channel
/setinterval 1d12h30m - Set posting interval
/post - Post the picture now
/setpicture - Reply to a photo to set it as the picture to post`;

const SET_CHANNEL_USAGE = `Please provide a valid channel name starting with @.
Example: /setchannel @your_channel_name`;

const SET_INTERVAL_USAGE = `Please provide a time interval.
Examples:
/setinterval 1d - Once per day
/setinterval 12h - Every 12 hours
/setinterval 30m - Every 30 minutes
/setinterval 1d6h30m - 1 day, 6 hours and 30 minutes`;

export interface CommandDeps {
  store: ConfigStore;
  coordinator: Pick<PostCoordinator, "postNow">;
  scheduler: Pick<
    IntervalScheduler,
    "reschedule" | "state" | "nextDueAt" | "retryCount" | "maxRetryCount"
  >;
  /** Epoch ms clock. */
  now?: () => number;
}

export type Commands = ReturnType<typeof createCommands>;

export function createCommands(deps: CommandDeps) {
  const { store, coordinator, scheduler } = deps;
  const now = deps.now ?? Date.now;

  function status(): string {
    const config = store.current();
    const at = now();
    const lines = [
      "Current bot settings",
      "",
      `Channel: ${config.channelName || "(not set)"}`,
      `Picture: ${config.picturePath || "(not set)"}`,
      `Posting interval: ${formatDuration(config.postInterval)}`,
    ];

    if (config.lastPostTime === null) {
      lines.push("No posts have been made yet.");
    } else {
      const lastMs = config.lastPostTime * 1000;
      lines.push(
        `Last post: ${formatTimestamp(lastMs)} (${formatCountdown(at - lastMs)} ago)`,
      );
    }

    const dueAt =
      scheduler.nextDueAt ??
      (config.lastPostTime === null
        ? null
        : (config.lastPostTime + config.postInterval) * 1000);
    if (scheduler.state === "firing") {
      lines.push("Next post: in progress");
    } else if (dueAt !== null) {
      lines.push(`Next post: ${formatTimestamp(dueAt)}`);
      if (dueAt > at) {
        lines.push(`Time until next post: ${formatCountdown(dueAt - at)}`);
      }
    }

    if (scheduler.retryCount > 0) {
      lines.push(
        `Retrying a failed post (attempt ${scheduler.retryCount + 1} of ${scheduler.maxRetryCount + 1})`,
      );
    }
    return lines.join("\n");
  }

  async function setChannel(arg: string | undefined): Promise<string> {
    if (!arg || !arg.startsWith("@") || arg.length < 2) {
      return SET_CHANNEL_USAGE;
    }
    const result = await store.update((c) => ({ ...c, channelName: arg }));
    if (!result.ok) return `Could not set channel: ${result.error.message}`;
    debug("Channel set to %s", arg);
    return `Channel set to ${arg}`;
  }

  async function setInterval(arg: string | undefined): Promise<string> {
    if (!arg) return SET_INTERVAL_USAGE;
    let seconds: number;
    try {
      seconds = parseDuration(arg);
    } catch (err) {
      if (err instanceof ValidationError) return err.message;
      throw err;
    }
    if (seconds < MIN_INTERVAL_SECONDS) {
      return `Interval must be at least ${MIN_INTERVAL_SECONDS} seconds.`;
    }
    const result = await store.update((c) => ({ ...c, postInterval: seconds }));
    if (!result.ok) return `Could not set interval: ${result.error.message}`;
    // Latest committed value, so concurrent /setinterval calls settle on the last write.
    scheduler.reschedule(store.current().postInterval);
    return `Posting interval set to ${arg} (${formatDuration(seconds)})`;
  }

  async function setPicture(path: string): Promise<string> {
    const result = await store.update((c) => ({ ...c, picturePath: path }));
    if (!result.ok) return `Could not set picture: ${result.error.message}`;
    debug("Picture set to %s", path);
    return `Picture set to ${path}`;
  }

  async function post(): Promise<string> {
    const result = await coordinator.postNow("manual");
    if (!result.ok) return result.error.message;
    if (result.status === "skipped") return "Nothing to post right now.";
    if (result.persistError) {
      return `Picture posted, but the post time could not be saved: ${result.persistError.message}`;
    }
    return "Picture posted successfully!";
  }

  return {
    help: () => HELP_TEXT,
    status,
    setChannel,
    setInterval,
    setPicture,
    post,
  };
}

/** Admin notification for a scheduled post that gave up on its slot. */
export function describeFailure(report: FailureReport): string {
  const next = `Next attempt: ${formatTimestamp(report.nextDueAt)}`;
  if (report.exhausted) {
    return `Scheduled post failed after ${report.attempts} attempts: ${report.error.message}\n${next}`;
  }
  return `Scheduled post could not run: ${report.error.message}\n${next}`;
}
