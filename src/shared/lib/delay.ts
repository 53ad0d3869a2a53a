/**
 * Timing helpers for randomized, interruptible waits
 */

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Pick a uniformly random number in [min, max]
 */
export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) {
    return min;
  }
  return min + random() * (max - min);
}

/**
 * Sleep for the given time; resolves early if the signal aborts
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Sleep for a random number of seconds drawn from [minSeconds, maxSeconds]
 */
export async function waitRandom(
  minSeconds: number,
  maxSeconds: number,
  options: { sleep?: Sleep; signal?: AbortSignal; random?: () => number } = {}
): Promise<void> {
  const { sleep: sleepFn = sleep, signal, random } = options;
  const seconds = randomBetween(minSeconds, maxSeconds, random);
  await sleepFn(Math.round(seconds * 1000), signal);
}
