import createDebug from "debug";
import { readFile } from "fs/promises";
import PQueue from "p-queue";
import { z } from "zod";
import {
  NotFoundError,
  PersistError,
  ValidationError,
  isNotFound,
  toError,
} from "./errors.js";
import type { PersistedRecord, PosterConfig } from "./types.js";
import { writeFileAtomic, type FileWriter } from "./utils/atomic-file.js";
import {
  MAX_INTERVAL_SECONDS,
  MAX_POST_TIME,
  formatDuration,
  parseDuration,
} from "./utils/duration.js";

const debug = createDebug("poster:config");

/** config.json as written by this bot or by hand. post_interval may be "1d12h" or seconds. */
const persistedSchema = z.object({
  bot_token: z.string().default(""),
  admin_id: z.coerce.number().int().default(0),
  channel_name: z.string().default(""),
  picture_path: z.string().default(""),
  post_interval: z.union([
    z.string(),
    z.number().int().positive().max(MAX_INTERVAL_SECONDS),
  ]),
  last_post_time: z
    .number()
    .int()
    .nonnegative()
    .max(MAX_POST_TIME)
    .nullable()
    .default(null),
});

export type UpdateResult =
  | { ok: true; config: PosterConfig }
  | { ok: false; config: PosterConfig; error: ValidationError | PersistError };

export type ConfigMutator = (current: PosterConfig) => PosterConfig;

export interface ConfigStoreOptions {
  /** Record used on first run, when no file exists yet. */
  defaults: () => PosterConfig;
  writeFile?: FileWriter;
}

export function toPersisted(config: PosterConfig): PersistedRecord {
  return {
    bot_token: config.botToken,
    admin_id: config.adminId,
    channel_name: config.channelName,
    picture_path: config.picturePath,
    post_interval: formatDuration(config.postInterval),
    last_post_time: config.lastPostTime,
  };
}

export function fromPersisted(raw: unknown): PosterConfig {
  const parsed = persistedSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid config record: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue"}`,
    );
  }
  const r = parsed.data;
  return {
    botToken: r.bot_token,
    adminId: r.admin_id,
    channelName: r.channel_name,
    picturePath: r.picture_path,
    postInterval:
      typeof r.post_interval === "number"
        ? r.post_interval
        : parseDuration(r.post_interval),
    lastPostTime: r.last_post_time,
  };
}

/**
 * Channel and picture start out empty, so they are only checked when a mutation
 * changes them.
 */
export function validateChange(prev: PosterConfig, next: PosterConfig): void {
  if (!Number.isSafeInteger(next.postInterval) || next.postInterval <= 0) {
    throw new ValidationError(
      "Post interval must be a positive whole number of seconds.",
    );
  }
  if (next.postInterval > MAX_INTERVAL_SECONDS) {
    throw new ValidationError(
      `Post interval must be at most ${formatDuration(MAX_INTERVAL_SECONDS)}.`,
    );
  }
  if (next.channelName !== prev.channelName && !next.channelName.trim()) {
    throw new ValidationError("Channel name cannot be empty.");
  }
  if (next.picturePath !== prev.picturePath && !next.picturePath.trim()) {
    throw new ValidationError("Picture path cannot be empty.");
  }
  if (
    next.lastPostTime !== null &&
    (!Number.isSafeInteger(next.lastPostTime) ||
      next.lastPostTime < 0 ||
      next.lastPostTime > MAX_POST_TIME)
  ) {
    throw new ValidationError(
      "Last post time must be a unix timestamp before 2100.",
    );
  }
}

/**
 * Single owner of the bot configuration. Loads and updates run one at a time;
 * the in-memory record only changes after the new record is on disk.
 */
export class ConfigStore {
  private record: PosterConfig | null = null;
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly writeFile: FileWriter;

  constructor(
    private readonly path: string,
    private readonly options: ConfigStoreOptions,
  ) {
    this.writeFile = options.writeFile ?? writeFileAtomic;
  }

  get filePath(): string {
    return this.path;
  }

  async load(): Promise<PosterConfig> {
    return this.queue.add(
      async () => {
        let config: PosterConfig;
        try {
          config = await this.read();
        } catch (err) {
          if (!(err instanceof NotFoundError)) throw err;
          config = this.options.defaults();
          debug("%s; writing defaults", err.message);
          await this.persist(config);
        }
        this.record = config;
        debug(
          "Loaded config (channel=%s, interval=%ss)",
          config.channelName || "-",
          config.postInterval,
        );
        return { ...config };
      },
      { throwOnTimeout: true },
    );
  }

  /** Latest committed snapshot. Throws before load(). */
  current(): PosterConfig {
    if (!this.record) throw new Error("ConfigStore.current() called before load()");
    return { ...this.record };
  }

  async update(mutator: ConfigMutator): Promise<UpdateResult> {
    return this.queue.add(
      async (): Promise<UpdateResult> => {
        const prev = this.current();
        let next: PosterConfig;
        try {
          next = mutator({ ...prev });
          validateChange(prev, next);
        } catch (err) {
          if (err instanceof ValidationError) {
            debug("Rejected config change: %s", err.message);
            return { ok: false, config: prev, error: err };
          }
          throw err;
        }
        try {
          await this.persist(next);
        } catch (err) {
          if (err instanceof PersistError) {
            return { ok: false, config: prev, error: err };
          }
          throw err;
        }
        this.record = { ...next };
        return { ok: true, config: { ...next } };
      },
      { throwOnTimeout: true },
    );
  }

  private async read(): Promise<PosterConfig> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) throw new NotFoundError(this.path);
      throw new PersistError(`Could not read ${this.path}`, { cause: err });
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ValidationError(
        `Could not parse ${this.path}: ${toError(err).message}`,
      );
    }
    return fromPersisted(json);
  }

  private async persist(config: PosterConfig): Promise<void> {
    const blob = JSON.stringify(toPersisted(config), null, 2);
    try {
      await this.writeFile(this.path, `${blob}\n`);
    } catch (err) {
      debug("persist error: %o", err);
      throw new PersistError(
        `Could not save config: ${toError(err).message}`,
        { cause: err },
      );
    }
  }
}

export function createDefaultConfig(seed: {
  botToken: string;
  adminId: number;
  postInterval: string;
}): PosterConfig {
  return {
    botToken: seed.botToken,
    adminId: seed.adminId,
    channelName: "",
    picturePath: "",
    postInterval: parseDuration(seed.postInterval),
    lastPostTime: null,
  };
}
