/**
 * Shared types for the polling core and its collaborators.
 */

/**
 * Semantic classification of the target page.
 *
 * Only CAPTCHA and BLOCKED count as anti-automation responses; the other
 * three describe a live page.
 */
export enum PageStatus {
  OK = "OK",
  NO_SLOTS = "NO_SLOTS",
  MAYBE_SLOTS = "MAYBE_SLOTS",
  CAPTCHA = "CAPTCHA",
  BLOCKED = "BLOCKED",
}

/** Statuses that trigger breaker handling instead of transition tracking. */
export function isDetectionStatus(status: PageStatus): boolean {
  return status === PageStatus.CAPTCHA || status === PageStatus.BLOCKED;
}

/** A cached classification of the page. */
export interface StatusSnapshot {
  readonly status: PageStatus;
  /** Epoch ms at which the page was classified. */
  readonly at: number;
  /** Length of the raw page content that was classified. */
  readonly rawLength: number;
}

/** The last delay the circuit breaker imposed. */
export type BreakerAction = "backoff" | "cooldown";

/**
 * Copy of the circuit breaker's counters. `open` is always
 * `failures >= threshold`.
 */
export interface BreakerState {
  readonly failures: number;
  readonly threshold: number;
  readonly open: boolean;
  readonly lastAction: BreakerAction | null;
}

/** What the status query surface reports about a monitor. */
export interface MonitorStatus {
  readonly running: boolean;
  readonly subscriberCount: number;
  readonly lastStatus: PageStatus | null;
  readonly breaker: BreakerState;
}
