import { ValidationError } from "../errors.js";

const DURATION_PATTERN = /^(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;

const DAY = 86_400;
const HOUR = 3_600;
const MINUTE = 60;

/** Longest accepted interval: 3650 days. Keeps every due time inside the Date range. */
export const MAX_INTERVAL_SECONDS = 3650 * DAY;

/** Latest accepted post time, in unix seconds (2100-01-01T00:00:00Z). */
export const MAX_POST_TIME = 4_102_444_800;

/**
 * Parse an interval like "1d12h30m45s" (parts optional, in that order) or a bare
 * number of seconds ("90") into seconds.
 */
export function parseDuration(text: string): number {
  const s = text.trim().toLowerCase();
  let total: number;
  if (/^\d+$/.test(s)) {
    total = Number(s);
  } else {
    const match = DURATION_PATTERN.exec(s);
    if (!s || !match || !match.slice(1).some(Boolean)) {
      throw new ValidationError(`Invalid time interval format: ${text}`);
    }
    const [, days, hours, minutes, seconds] = match;
    total =
      Number(days ?? 0) * DAY +
      Number(hours ?? 0) * HOUR +
      Number(minutes ?? 0) * MINUTE +
      Number(seconds ?? 0);
  }
  if (!Number.isSafeInteger(total) || total > MAX_INTERVAL_SECONDS) {
    throw new ValidationError(`Interval is too large: ${text}`);
  }
  if (total <= 0) {
    throw new ValidationError("Interval must be greater than zero.");
  }
  return total;
}

/** 131400 -> "1d12h30m". Zero parts are omitted; 0 -> "0s". */
export function formatDuration(totalSeconds: number): string {
  let rest = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(rest / DAY);
  rest %= DAY;
  const hours = Math.floor(rest / HOUR);
  rest %= HOUR;
  const minutes = Math.floor(rest / MINUTE);
  const seconds = rest % MINUTE;

  let result = "";
  if (days > 0) result += `${days}d`;
  if (hours > 0) result += `${hours}h`;
  if (minutes > 0) result += `${minutes}m`;
  if (seconds > 0 || !result) result += `${seconds}s`;
  return result;
}

/** Countdown for /status, always with every unit: "0d 5h 3m 2s". */
export function formatCountdown(ms: number): string {
  let rest = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(rest / DAY);
  rest %= DAY;
  const hours = Math.floor(rest / HOUR);
  rest %= HOUR;
  const minutes = Math.floor(rest / MINUTE);
  const seconds = rest % MINUTE;
  return `${days}d ${hours}h ${minutes}m ${seconds}s`;
}
