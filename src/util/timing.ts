// Timed waits — every wait has a deadline and an AbortSignal for cancellation

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new Error("aborted"));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error("aborted"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type WaitVerdict = "done" | "continue" | "abort";

export interface WaitOptions {
  attempts: number;
  intervalMs: number;
  signal?: AbortSignal;
}

export type WaitOutcome =
  | { status: "done"; attempts: number }
  | { status: "aborted"; attempts: number }
  | { status: "timeout"; attempts: number };

/**
 * Polls `check` up to `attempts` times, sleeping `intervalMs` between tries.
 * `check` decides per iteration whether the wait is satisfied, should keep
 * going, or must stop early (e.g. the watched process exited).
 */
export async function waitFor(
  check: (attempt: number) => Promise<WaitVerdict> | WaitVerdict,
  opts: WaitOptions,
): Promise<WaitOutcome> {
  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    const verdict = await check(attempt);
    if (verdict === "done") return { status: "done", attempts: attempt };
    if (verdict === "abort") return { status: "aborted", attempts: attempt };
    if (attempt < opts.attempts) await sleep(opts.intervalMs, opts.signal);
  }
  return { status: "timeout", attempts: opts.attempts };
}

export class DeadlineExceededError extends Error {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`${label} exceeded deadline of ${timeoutMs}ms`);
    this.name = "DeadlineExceededError";
  }
}

/** Races `work` against a deadline; the signal handed to `work` aborts when the deadline passes. */
export async function withDeadline<T>(
  label: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new DeadlineExceededError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([work(controller.signal), deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const workerCount = Math.max(1, Math.min(limit, items.length));

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
