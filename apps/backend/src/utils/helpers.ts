export async function runWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number | null,
  timeoutError: Error,
): Promise<T> {
  if (timeoutMs === null) {
    return fn();
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let timedOut = false;
  const task = fn();
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(timeoutError);
    }, timeoutMs);
  });
  try {
    return await Promise.race([task, timeoutPromise]);
  } finally {
    if (timer) clearTimeout(timer);
    if (timedOut) task.catch(() => undefined);
  }
}

/** Epoch ms -> "2026-10-18 21:05:00 UTC". */
export function formatTimestamp(ms: number): string {
  return `${new Date(ms).toISOString().slice(0, 19).replace("T", " ")} UTC`;
}
