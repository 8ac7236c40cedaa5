/**
 * Interval scheduler: keeps exactly one one-shot timer for the next post.
 *
 * idle -> armed -> firing -> armed, and stopped after cancel(). A fire never re-arms
 * by itself: the post outcome decides (notifyPosted on success, retry or fallback on
 * failure). Every arm/cancel bumps a generation counter; a fire whose generation is
 * stale when it settles is ignored, so superseded outcomes cannot arm a second timer.
 */
import createDebug from "debug";
import { ValidationError, toError } from "../errors.js";
import type { PosterConfig } from "../types.js";
import { MAX_INTERVAL_SECONDS, MAX_POST_TIME } from "../utils/duration.js";
import { formatTimestamp } from "../utils/helpers.js";
import { scheduleTimer, type ArmTimer, type TimerHandle } from "./timer.js";

const debug = createDebug("poster:scheduler");

export type SchedulerState = "idle" | "armed" | "firing" | "stopped";

export type FireOutcome =
  | { ok: true }
  | { ok: false; error: Error; retryable: boolean };

export type DueCallback = () => Promise<FireOutcome>;

export interface FailureReport {
  error: Error;
  /** Attempts made for this slot, including the first. */
  attempts: number;
  /** True when the retry budget ran out; false when the error was not retryable. */
  exhausted: boolean;
  /** Epoch ms of the regular slot the scheduler fell back to. */
  nextDueAt: number;
}

export interface IntervalSchedulerOptions {
  armTimer?: ArmTimer;
  /** Epoch ms clock. */
  now?: () => number;
  retryDelayMs?: number;
  maxRetries?: number;
  onFailure?: (report: FailureReport) => void;
}

export const MIN_RETRY_DELAY_MS = 5_000;
export const DEFAULT_RETRY_DELAY_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;

function toIntervalMs(seconds: number): number {
  if (
    !Number.isSafeInteger(seconds) ||
    seconds < 1 ||
    seconds > MAX_INTERVAL_SECONDS
  ) {
    throw new ValidationError(
      `Post interval must be a whole number of seconds from 1 to ${MAX_INTERVAL_SECONDS} (got ${seconds}).`,
    );
  }
  return seconds * 1000;
}

function toPostTimeMs(seconds: number): number {
  if (!Number.isSafeInteger(seconds) || seconds < 0 || seconds > MAX_POST_TIME) {
    throw new ValidationError(`Invalid post time: ${seconds}`);
  }
  return seconds * 1000;
}

export class IntervalScheduler {
  private status: SchedulerState = "idle";
  private timer: TimerHandle | null = null;
  private dueAt: number | null = null;
  private intervalMs = 0;
  /** Last successful post, or initialize() time when nothing was posted yet. */
  private anchorMs = 0;
  private onDue: DueCallback | null = null;
  private retries = 0;
  private generation = 0;
  private inflight: Promise<void> | null = null;

  private readonly armTimer: ArmTimer;
  private readonly now: () => number;
  private readonly retryDelayMs: number;
  private readonly maxRetries: number;
  private readonly onFailure?: (report: FailureReport) => void;

  constructor(options: IntervalSchedulerOptions = {}) {
    this.armTimer = options.armTimer ?? scheduleTimer;
    this.now = options.now ?? Date.now;
    this.retryDelayMs = Math.max(
      MIN_RETRY_DELAY_MS,
      options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    );
    this.maxRetries = Math.max(
      0,
      Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES),
    );
    this.onFailure = options.onFailure;
  }

  get state(): SchedulerState {
    return this.status;
  }

  /** Epoch ms of the armed timer; null unless armed. */
  get nextDueAt(): number | null {
    return this.status === "armed" ? this.dueAt : null;
  }

  /** Retries already spent on the current slot. */
  get retryCount(): number {
    return this.retries;
  }

  get maxRetryCount(): number {
    return this.maxRetries;
  }

  initialize(
    config: Pick<PosterConfig, "postInterval" | "lastPostTime">,
    onDue: DueCallback,
  ): void {
    if (this.status !== "idle") {
      throw new Error(`Scheduler already initialized (state: ${this.status})`);
    }
    const intervalMs = toIntervalMs(config.postInterval);
    const lastPostMs =
      config.lastPostTime === null ? null : toPostTimeMs(config.lastPostTime);
    this.intervalMs = intervalMs;
    this.onDue = onDue;
    const now = this.now();
    if (lastPostMs === null) {
      this.anchorMs = now;
      this.armAt(now, "initialize (no previous post)");
    } else {
      this.anchorMs = lastPostMs;
      this.armAt(this.anchorMs + this.intervalMs, "initialize");
    }
  }

  /**
   * Switch to a new interval, keeping the anchor. While a fire is in flight the value
   * is only stored; the fire's outcome makes the next decision with it.
   */
  reschedule(postInterval: number): void {
    const intervalMs = toIntervalMs(postInterval);
    if (this.status === "stopped") {
      debug("reschedule ignored: scheduler stopped");
      return;
    }
    this.intervalMs = intervalMs;
    if (this.status === "idle") return;
    if (this.status === "firing") {
      debug("Interval set to %ds; applies after the post in flight", postInterval);
      return;
    }
    this.retries = 0;
    this.armAt(this.anchorMs + intervalMs, "reschedule");
  }

  /** A post succeeded at postTime (unix seconds). Next slot is postTime + interval. */
  notifyPosted(postTime: number): void {
    const postTimeMs = toPostTimeMs(postTime);
    if (this.status === "stopped" || this.status === "idle") {
      debug("notifyPosted ignored (state: %s)", this.status);
      return;
    }
    this.anchorMs = postTimeMs;
    this.retries = 0;
    this.armAt(this.anchorMs + this.intervalMs, "posted");
  }

  cancel(): void {
    this.clearTimer();
    this.dueAt = null;
    if (this.status !== "stopped") debug("Scheduler stopped");
    this.status = "stopped";
  }

  /** Resolves once no fire is in flight. */
  async drain(): Promise<void> {
    while (this.inflight) {
      await this.inflight;
    }
  }

  private clearTimer(): void {
    this.generation++;
    if (this.timer) {
      this.timer.cancel();
      this.timer = null;
    }
  }

  private armAt(dueAt: number, reason: string): void {
    this.clearTimer();
    if (dueAt <= this.now()) {
      debug("%s: due %s, firing now", reason, formatTimestamp(dueAt));
      this.fire();
      return;
    }
    const generation = this.generation;
    this.dueAt = dueAt;
    this.status = "armed";
    this.timer = this.armTimer(new Date(dueAt), () => {
      if (generation !== this.generation) return;
      this.timer = null;
      this.fire();
    });
    debug("%s: next post at %s", reason, formatTimestamp(dueAt));
  }

  private fire(): void {
    const onDue = this.onDue;
    if (!onDue) return;
    this.status = "firing";
    this.dueAt = null;
    const generation = this.generation;
    const attempt = this.retries + 1;

    const run = (async () => {
      let outcome: FireOutcome;
      try {
        outcome = await onDue();
      } catch (err) {
        outcome = { ok: false, error: toError(err), retryable: true };
      }
      if (generation !== this.generation) {
        debug("Fire outcome superseded");
        return;
      }
      this.settle(outcome, attempt);
    })();
    this.inflight = run;
    void run.finally(() => {
      if (this.inflight === run) this.inflight = null;
    });
  }

  private settle(outcome: FireOutcome, attempt: number): void {
    if (outcome.ok) {
      // Success without notifyPosted (slot skipped): stay on the regular grid.
      this.retries = 0;
      this.armAt(this.nextRegularDue(), "fired");
      return;
    }

    if (outcome.retryable && this.retries < this.maxRetries) {
      this.retries++;
      debug(
        "Post failed (%s); retry %d/%d",
        outcome.error.message,
        this.retries,
        this.maxRetries,
      );
      this.armAt(this.now() + this.retryDelayMs, "retry");
      return;
    }

    this.retries = 0;
    const nextDueAt = this.nextRegularDue();
    this.armAt(
      nextDueAt,
      outcome.retryable ? "retries exhausted" : "not retryable",
    );
    const report: FailureReport = {
      error: outcome.error,
      attempts: attempt,
      exhausted: outcome.retryable,
      nextDueAt,
    };
    try {
      this.onFailure?.(report);
    } catch (err) {
      debug("onFailure handler threw: %o", err);
    }
  }

  /** First anchor + k * interval strictly after now (k >= 1). */
  private nextRegularDue(): number {
    const now = this.now();
    const elapsed = now - this.anchorMs;
    const k = Math.max(1, Math.floor(elapsed / this.intervalMs) + 1);
    return this.anchorMs + k * this.intervalMs;
  }
}
