import type {
  Logger,
  Notifier,
  Prober,
  RandomFn,
  SleepFn,
  SubscriberRegistry,
} from "@slotwatch/core";

import type { CircuitBreaker } from "./circuit-breaker.js";
import type { RateLimiter } from "./rate-limiter.js";

/**
 * Configuration for the RateLimiter.
 */
export interface RateLimiterConfig {
  /** Lower bound (seconds) of the window a base is drawn from. Must be > 0. */
  readonly minIntervalSeconds: number;
  /** Upper bound (seconds). Must be >= minIntervalSeconds. */
  readonly maxIntervalSeconds: number;
  /** Symmetric jitter as a fraction of the base, in [0, 1]. */
  readonly jitterRatio: number;
  /** Override the RNG for deterministic testing. Defaults to Math.random. */
  readonly random?: RandomFn;
  /** Override the wait primitive for testing. */
  readonly sleep?: SleepFn;
}

/**
 * Configuration for the CircuitBreaker. Durations are in seconds.
 */
export interface CircuitBreakerConfig {
  /** Consecutive failures at which the breaker opens. Must be > 0. */
  readonly failureThreshold: number;
  readonly cooldownSeconds: number;
  readonly backoffBaseSeconds: number;
  readonly backoffMaxSeconds: number;
  readonly random?: RandomFn;
  readonly sleep?: SleepFn;
}

/** Texts broadcast by the monitor. */
export interface MonitorMessages {
  /** Sent once per NO_SLOTS → anything-else edge. */
  readonly available: string;
  /** Sent before entering the CAPTCHA cooldown. */
  readonly cooldown: string;
}

/**
 * How broadcasts reach the notifier.
 *
 * - "fire-and-forget": every send is started and the cycle moves on;
 *   failures are logged as they settle.
 * - "sequential": sends are awaited one after another, each isolated.
 */
export type DispatchMode = "fire-and-forget" | "sequential";

/**
 * Configuration for the MonitorLoop.
 */
export interface MonitorLoopConfig {
  readonly prober: Prober;
  readonly notifier: Notifier;
  readonly subscribers: SubscriberRegistry;
  /** Base of the jittered wait after a successful cycle. Values below 1 are raised to 1. */
  readonly intervalSeconds: number;
  readonly limiter: RateLimiter;
  readonly breaker: CircuitBreaker;
  /** Wait primitive used for the settle delay. Defaults to sleepSeconds. */
  readonly sleep?: SleepFn;
  readonly logger?: Logger;
  /** Override the broadcast texts. */
  readonly messages?: Partial<MonitorMessages>;
  /** Defaults to "fire-and-forget". */
  readonly dispatch?: DispatchMode;
}

/** Copy of the loop's own bookkeeping. */
export interface MonitorRunState {
  readonly running: boolean;
  /** null until the first successful classification. */
  readonly lastNoSlots: boolean | null;
  readonly stopRequested: boolean;
}

/** Outcome of one broadcast call. */
export interface BroadcastResult {
  /** Recipients a send was started for, in registry order. */
  readonly recipients: readonly number[];
  /** Resolves once every started send has settled. Never rejects. */
  readonly settled: Promise<void>;
}
