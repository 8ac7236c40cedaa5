import schedule from "node-schedule";

/** Handle to the one outstanding "fire at T" commitment. cancel() is idempotent. */
export interface TimerHandle {
  cancel(): void;
}

export type ArmTimer = (at: Date, fn: () => void) => TimerHandle;

/** One-shot node-schedule job. */
export const scheduleTimer: ArmTimer = (at, fn) => {
  if (Number.isNaN(at.getTime())) {
    throw new Error(`Cannot schedule a job at ${String(at)}`);
  }
  const job = schedule.scheduleJob(at, () => fn());
  if (job) {
    return {
      cancel: () => {
        job.cancel();
      },
    };
  }
  // null means the date is already past
  if (at.getTime() > Date.now()) {
    throw new Error(`Cannot schedule a job at ${String(at)}`);
  }
  const timer = setTimeout(fn, 0);
  return {
    cancel: () => clearTimeout(timer),
  };
};
