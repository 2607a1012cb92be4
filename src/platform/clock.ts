import { setTimeout as delay } from "timers/promises";
import { Result, ok } from "../errors";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  }
};

export type PollPolicy = {
  intervalMs: number;
  maxWaitMs: number;
};

export type PollOutcome<T> = { done: true; value: T } | { done: false };

/**
 * Re-runs `check` every `intervalMs` until it reports done, returns an error,
 * or `maxWaitMs` elapses. Expiry resolves to `null` so the caller can word the timeout.
 */
export async function pollUntil<T, E>(
  clock: Clock,
  policy: PollPolicy,
  check: () => Promise<Result<PollOutcome<T>, E>>
): Promise<Result<T | null, E>> {
  const deadline = clock.now() + policy.maxWaitMs;
  while (true) {
    const step = await check();
    if (!step.ok) {
      return step;
    }
    if (step.value.done) {
      return ok(step.value.value);
    }
    if (clock.now() >= deadline) {
      return ok(null);
    }
    await clock.sleep(policy.intervalMs);
  }
}
