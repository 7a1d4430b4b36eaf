import {
  InvalidConfigurationError,
  randomInt,
  sleepSeconds,
} from "@slotwatch/core";
import type { RandomFn, SleepFn } from "@slotwatch/core";

import type { RateLimiterConfig } from "./types.js";

/**
 * Computes jittered wait durations in whole seconds.
 *
 * Jitter is symmetric: a base of 300s with a 0.2 ratio yields anything in
 * [240, 360]. The min/max window only bounds the base drawn when none is
 * given; the jittered result is not clamped to it, only floored at 1.
 */
export class RateLimiter {
  private readonly _min: number;
  private readonly _max: number;
  private readonly _jitter: number;
  private readonly _random: RandomFn;
  private readonly _sleep: SleepFn;

  constructor(config: RateLimiterConfig) {
    const { minIntervalSeconds: min, maxIntervalSeconds: max, jitterRatio } = config;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min <= 0 || max < min) {
      throw new InvalidConfigurationError("invalid interval bounds", [
        `expected integers with 0 < min <= max, got min=${min} max=${max}`,
      ]);
    }
    if (!(jitterRatio >= 0 && jitterRatio <= 1)) {
      throw new InvalidConfigurationError("invalid jitter ratio", [
        `expected 0 <= jitterRatio <= 1, got ${jitterRatio}`,
      ]);
    }

    this._min = min;
    this._max = max;
    this._jitter = jitterRatio;
    this._random = config.random ?? Math.random;
    this._sleep = config.sleep ?? sleepSeconds;
  }

  /**
   * Return a jittered wait in seconds. Without a base, one is drawn
   * uniformly from [min, max] first.
   */
  computeWait(base?: number): number {
    const b = base ?? randomInt(this._min, this._max, this._random);
    const delta = Math.floor(b * this._jitter);
    return randomInt(Math.max(1, b - delta), b + delta, this._random);
  }

  /**
   * computeWait() followed by the wait itself. Resolves to the computed
   * duration, also when the wait was cut short by the signal.
   */
  async sleepWithJitter(base?: number, signal?: AbortSignal): Promise<number> {
    const wait = this.computeWait(base);
    await this._sleep(wait, signal);
    return wait;
  }
}
