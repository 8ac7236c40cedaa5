/** In-memory configuration record. Owned by ConfigStore; treat snapshots as read-only. */
export interface PosterConfig {
  botToken: string;
  adminId: number;
  /** Destination channel, e.g. "@my_channel". Empty until the admin sets it. */
  channelName: string;
  /** Local file posted on every cycle. Empty until the admin sets it. */
  picturePath: string;
  /** Seconds between posts. Always > 0. */
  postInterval: number;
  /** Unix seconds of the last successful post; null before the first one. */
  lastPostTime: number | null;
}

/** Persisted shape of PosterConfig (config.json). */
export interface PersistedRecord {
  bot_token: string;
  admin_id: number;
  channel_name: string;
  picture_path: string;
  post_interval: string;
  last_post_time: number | null;
}

export type PostTrigger = "manual" | "scheduled";

/** Outbound side of the messaging transport. */
export interface PhotoSender {
  sendPhoto(channel: string, picturePath: string): Promise<void>;
}

/** Direct message to the administrator (failure reports). */
export type AdminNotifier = (text: string) => Promise<void>;
