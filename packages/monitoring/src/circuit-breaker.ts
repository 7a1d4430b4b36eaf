import {
  InvalidConfigurationError,
  randomInt,
  sleepSeconds,
} from "@slotwatch/core";
import type { BreakerAction, BreakerState, RandomFn, SleepFn } from "@slotwatch/core";

import type { CircuitBreakerConfig } from "./types.js";

/**
 * Failure-count breaker with exponential backoff and a long cooldown.
 *
 * - CLOSED (failures < threshold): failures are answered with a backoff
 *   that doubles per consecutive failure, capped at backoffMax.
 * - OPEN (failures >= threshold): the caller may choose the cooldown
 *   instead. Finishing a cooldown closes the breaker again.
 *
 * The breaker only counts and sleeps; deciding which statuses count as a
 * failure is up to the caller.
 */
export class CircuitBreaker {
  private _failures = 0;
  private _lastAction: BreakerAction | null = null;

  private readonly _threshold: number;
  private readonly _cooldown: number;
  private readonly _backoffBase: number;
  private readonly _backoffMax: number;
  private readonly _random: RandomFn;
  private readonly _sleep: SleepFn;

  constructor(config: CircuitBreakerConfig) {
    if (!Number.isInteger(config.failureThreshold) || config.failureThreshold <= 0) {
      throw new InvalidConfigurationError("failureThreshold must be > 0", [
        `got ${config.failureThreshold}`,
      ]);
    }
    const negative = (["cooldownSeconds", "backoffBaseSeconds", "backoffMaxSeconds"] as const)
      .filter((key) => !(config[key] >= 0))
      .map((key) => `${key} must be >= 0, got ${config[key]}`);
    if (negative.length > 0) {
      throw new InvalidConfigurationError("invalid breaker durations", negative);
    }

    this._threshold = config.failureThreshold;
    this._cooldown = config.cooldownSeconds;
    this._backoffBase = config.backoffBaseSeconds;
    this._backoffMax = config.backoffMaxSeconds;
    this._random = config.random ?? Math.random;
    this._sleep = config.sleep ?? sleepSeconds;
  }

  /** A copy of the current counters. */
  state(): BreakerState {
    return {
      failures: this._failures,
      threshold: this._threshold,
      open: this.shouldCooldown(),
      lastAction: this._lastAction,
    };
  }

  recordFailure(): void {
    this._failures += 1;
  }

  /** Zero the failure count and forget the last action. */
  reset(): void {
    this._failures = 0;
    this._lastAction = null;
  }

  shouldCooldown(): boolean {
    return this._failures >= this._threshold;
  }

  /**
   * base * 2^(failures-1), capped at backoffMax, plus up to base/2 seconds
   * of jitter.
   */
  computeBackoff(): number {
    const exponent = Math.max(0, this._failures - 1);
    // 0 * Infinity is NaN once 2^exponent overflows
    const exp =
      this._backoffBase === 0 ? 0 : Math.min(this._backoffBase * 2 ** exponent, this._backoffMax);
    const jitter = randomInt(0, Math.max(0, Math.floor(this._backoffBase / 2)), this._random);
    return Math.floor(exp + jitter);
  }

  /** Wait out a backoff. The failure count is left untouched. */
  async backoffSleep(signal?: AbortSignal): Promise<number> {
    const duration = this.computeBackoff();
    await this._sleep(duration, signal);
    this._lastAction = "backoff";
    return duration;
  }

  /**
   * Wait out the full cooldown, then reset. Because reset() clears
   * lastAction, state() reports `null` once this resolves; callers that
   * report "cooldown" have to capture it from the call itself.
   */
  async cooldownSleep(signal?: AbortSignal): Promise<number> {
    await this._sleep(this._cooldown, signal);
    this._lastAction = "cooldown";
    this.reset();
    return this._cooldown;
  }
}
