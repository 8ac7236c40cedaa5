import createDebug from "debug";
import { access, constants } from "fs/promises";
import PQueue from "p-queue";
import type { ConfigStore } from "../config.js";
import {
  PersistError,
  SendError,
  ValidationError,
  toError,
} from "../errors.js";
import type { FireOutcome } from "../scheduling/interval-scheduler.js";
import type { PhotoSender, PostTrigger } from "../types.js";

const debug = createDebug("poster:post");

export type PostResult =
  | {
      ok: true;
      status: "posted";
      /** Unix seconds recorded as lastPostTime. */
      postedAt: number;
      /** Set when the send succeeded but lastPostTime could not be saved. */
      persistError?: PersistError;
    }
  | { ok: true; status: "skipped" }
  | { ok: false; error: ValidationError | SendError };

export interface PostCoordinatorDeps {
  store: ConfigStore;
  scheduler: { notifyPosted(postTime: number): void };
  sender: PhotoSender;
  /** Epoch ms clock. */
  now?: () => number;
  isReadable?: (path: string) => Promise<boolean>;
}

async function isReadableFile(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs posts one at a time. lastPostTime only moves after the sender confirmed the
 * photo went out: a crash in between means a repeated post on restart, never a lost one.
 */
export class PostCoordinator {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly now: () => number;
  private readonly isReadable: (path: string) => Promise<boolean>;

  constructor(private readonly deps: PostCoordinatorDeps) {
    this.now = deps.now ?? Date.now;
    this.isReadable = deps.isReadable ?? isReadableFile;
  }

  async postNow(trigger: PostTrigger): Promise<PostResult> {
    return this.queue.add(() => this.post(trigger), { throwOnTimeout: true });
  }

  /** Due callback for IntervalScheduler. */
  async runScheduled(): Promise<FireOutcome> {
    const result = await this.postNow("scheduled");
    if (result.ok) return { ok: true };
    return {
      ok: false,
      error: result.error,
      retryable: result.error instanceof SendError,
    };
  }

  private async post(trigger: PostTrigger): Promise<PostResult> {
    const { store, scheduler, sender } = this.deps;
    const config = store.current();

    if (trigger === "scheduled" && config.lastPostTime !== null) {
      const dueMs = (config.lastPostTime + config.postInterval) * 1000;
      if (dueMs > this.now()) {
        debug("Scheduled post skipped; a post already went out this cycle");
        return { ok: true, status: "skipped" };
      }
    }

    if (!config.channelName.trim()) {
      return {
        ok: false,
        error: new ValidationError(
          "Channel is not set. Use /setchannel @channel_name.",
        ),
      };
    }
    if (!config.picturePath.trim()) {
      return {
        ok: false,
        error: new ValidationError(
          "Picture is not set. Reply to a photo with /setpicture.",
        ),
      };
    }
    if (!(await this.isReadable(config.picturePath))) {
      return {
        ok: false,
        error: new ValidationError(
          `Picture not found: ${config.picturePath}\nPlease set a valid picture using /setpicture.`,
        ),
      };
    }

    try {
      await sender.sendPhoto(config.channelName, config.picturePath);
    } catch (err) {
      const cause = toError(err);
      debug("%s post to %s failed: %s", trigger, config.channelName, cause.message);
      return {
        ok: false,
        error: new SendError(`Error posting picture: ${cause.message}`, {
          cause,
        }),
      };
    }

    const postedAt = Math.floor(this.now() / 1000);
    const saved = await store.update((c) => ({ ...c, lastPostTime: postedAt }));
    scheduler.notifyPosted(postedAt);
    debug("%s post to %s done", trigger, config.channelName);

    if (!saved.ok) {
      const persistError =
        saved.error instanceof PersistError
          ? saved.error
          : new PersistError(saved.error.message, { cause: saved.error });
      return { ok: true, status: "posted", postedAt, persistError };
    }
    return { ok: true, status: "posted", postedAt };
  }
}
