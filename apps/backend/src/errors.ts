/**
 * Error taxonomy shared by the config store, scheduler and post coordinator.
 * Every one of these ends up as a text reply to the admin; none is fatal after startup.
 */

/** Bad input rejected before any mutation or send (interval, channel, picture). */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Durable write of the config record failed; the previous record is still current. */
export class PersistError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistError";
  }
}

/** Transport failure while sending the picture. */
export class SendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SendError";
  }
}

/** No persisted record yet. Only seen on first run, where defaults are written instead. */
export class NotFoundError extends Error {
  constructor(path: string) {
    super(`No config record at ${path}`);
    this.name = "NotFoundError";
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
