import dotenv from "dotenv";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(join(__dirname, "..", "..", ".."));

// Runs from source (tsx), so this is always the repository root; .env lives there
dotenv.config({ path: join(PROJECT_ROOT, ".env") });

function str(name: string, defaultValue: string): string {
  const v = process.env[name];
  return (typeof v === "string" && v.trim()) || defaultValue;
}
function num(name: string, defaultValue: number): number {
  const v = process.env[name];
  if (v === undefined || v === "") return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

/** Loaded once at startup. Use this instead of process.env everywhere. */
export const env = {
  /** Overrides bot_token from config.json when set; also seeds it on first run. */
  BOT_TOKEN: str("BOT_TOKEN", ""),
  /** Telegram user id of the single administrator. 0 = take admin_id from config.json. */
  ADMIN_ID: num("ADMIN_ID", 0),
  DATA_DIR: str("DATA_DIR", join(PROJECT_ROOT, "workspace")),
  /** Interval written to config.json on first run. */
  DEFAULT_POST_INTERVAL: str("DEFAULT_POST_INTERVAL", "24h"),
  POST_RETRY_DELAY_SECONDS: num("POST_RETRY_DELAY_SECONDS", 30),
  POST_MAX_RETRIES: num("POST_MAX_RETRIES", 3),
  /** Upper bound for a single sendPhoto call. */
  SEND_TIMEOUT_MS: num("SEND_TIMEOUT_MS", 60_000),
} as const;

export { PROJECT_ROOT };
