/** RNG function signature: returns a value in [0, 1). */
export type RandomFn = () => number;

/** Clock function signature: returns current time in ms. */
export type ClockFn = () => number;

/**
 * Waits for the given number of seconds. Implementations resolve early
 * (without rejecting) when the signal is aborted.
 */
export type SleepFn = (seconds: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sample an integer uniformly from [min, max], both inclusive.
 */
export function randomInt(min: number, max: number, random: RandomFn): number {
  if (max <= min) return min;
  const value = min + Math.floor(random() * (max - min + 1));
  // random() is documented as [0, 1) but guard against RNGs returning 1
  return Math.min(value, max);
}

/**
 * Default SleepFn backed by setTimeout. An abort clears the timer and
 * resolves immediately.
 */
export const sleepSeconds: SleepFn = (seconds, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted || seconds <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, seconds * 1000);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
