import {
  InvalidConfigurationError,
  PageStatus,
  createLogger,
  isDetectionStatus,
  sleepSeconds,
} from "@slotwatch/core";
import type {
  Logger,
  MonitorStatus,
  Prober,
  SleepFn,
  SubscriberRegistry,
} from "@slotwatch/core";

import { Broadcaster } from "./broadcast.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import type { RateLimiter } from "./rate-limiter.js";
import type {
  DispatchMode,
  MonitorLoopConfig,
  MonitorMessages,
  MonitorRunState,
} from "./types.js";

/** Pause between reloading the page and reading it. */
export const SETTLE_DELAY_SECONDS = 5;

export const DEFAULT_MESSAGES: MonitorMessages = {
  available: "🎉 Appointment may be available! Check now.",
  cooldown: "⚠️ CAPTCHA / anti-bot detected. Pausing checks for a while.",
};

/**
 * Polls the target page and tells subscribers when it stops saying
 * "no slots".
 *
 * One polling task per instance, one cycle at a time:
 *
 *   refresh → settle → read status →
 *     CAPTCHA/BLOCKED: count a failure, back off (or cool down and notify)
 *     otherwise:       reset breaker, notify on a NO_SLOTS edge, jittered wait
 *
 * Nothing thrown inside a cycle ends the loop: it is logged, counted as a
 * breaker failure and answered with a backoff. stop() ends the loop at the
 * next cycle boundary and cuts any in-progress wait short. The prober is
 * closed exactly once when the task ends.
 *
 * Usage:
 * ```ts
 * const monitor = new MonitorLoop({ prober, notifier, subscribers, intervalSeconds: 300, limiter, breaker });
 * monitor.start();
 * // later, from a signal handler:
 * monitor.stop();
 * await monitor.join(5);
 * ```
 */
export class MonitorLoop {
  private _task: Promise<void> | null = null;
  private _stopRequested = false;
  private _abort = new AbortController();
  private _lastNoSlots: boolean | null = null;
  private _lastStatus: PageStatus | null = null;

  private readonly _prober: Prober;
  private readonly _subscribers: SubscriberRegistry;
  private readonly _interval: number;
  private readonly _limiter: RateLimiter;
  private readonly _breaker: CircuitBreaker;
  private readonly _sleep: SleepFn;
  private readonly _log: Logger;
  private readonly _messages: MonitorMessages;
  private readonly _dispatch: DispatchMode;
  private readonly _broadcaster: Broadcaster;

  constructor(config: MonitorLoopConfig) {
    if (!Number.isFinite(config.intervalSeconds)) {
      throw new InvalidConfigurationError("intervalSeconds must be a finite number", [
        `got ${config.intervalSeconds}`,
      ]);
    }

    this._prober = config.prober;
    this._subscribers = config.subscribers;
    this._interval = config.intervalSeconds;
    this._limiter = config.limiter;
    this._breaker = config.breaker;
    this._sleep = config.sleep ?? sleepSeconds;
    this._log = config.logger ?? createLogger("monitor");
    this._messages = { ...DEFAULT_MESSAGES, ...config.messages };
    this._dispatch = config.dispatch ?? "fire-and-forget";
    this._broadcaster = new Broadcaster(config.notifier, config.subscribers, this._log.child("broadcast"));
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  isRunning(): boolean {
    return this._task !== null;
  }

  /** Spawn the polling task. No-op while it is already running. */
  start(): void {
    if (this._task) return;

    this._stopRequested = false;
    this._abort = new AbortController();
    this._task = this._run().finally(() => {
      this._task = null;
    });
  }

  /**
   * Ask the polling task to end after the current cycle. Any wait in
   * progress (login, settle, backoff, cooldown, interval) resolves immediately.
   */
  stop(): void {
    this._stopRequested = true;
    this._abort.abort();
  }

  /**
   * Resolve once the polling task has ended, or after timeoutSeconds,
   * whichever comes first.
   */
  async join(timeoutSeconds?: number): Promise<void> {
    const task = this._task;
    if (!task) return;

    if (timeoutSeconds === undefined) {
      await task;
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, Math.max(0, timeoutSeconds) * 1000);
    });
    try {
      await Promise.race([task, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  // ── Status surface ──────────────────────────────────────────────────────────

  /** Copy of everything the status command reports. */
  status(): MonitorStatus {
    let subscriberCount = 0;
    try {
      subscriberCount = this._subscribers.all().length;
    } catch (err) {
      this._log.warn("failed to count subscribers", undefined, err);
    }

    return {
      running: this.isRunning(),
      subscriberCount,
      lastStatus: this._lastStatus,
      breaker: this._breaker.state(),
    };
  }

  runState(): MonitorRunState {
    return {
      running: this.isRunning(),
      lastNoSlots: this._lastNoSlots,
      stopRequested: this._stopRequested,
    };
  }

  /** Resolves once every notification started so far has settled. */
  async flushNotifications(): Promise<void> {
    await this._broadcaster.idle();
  }

  // ── Cycle ───────────────────────────────────────────────────────────────────

  /**
   * Run one full cycle. Never rejects unless the breaker's own wait
   * primitive does.
   *
   * For hosts that schedule cycles themselves while the polling task is not
   * running. Waits end early only when the given signal is aborted; a
   * previous stop() has no effect on them.
   */
  async runCycle(signal: AbortSignal = new AbortController().signal): Promise<void> {
    await this._cycle(this._task ? this._abort.signal : signal);
  }

  private async _cycle(signal: AbortSignal): Promise<void> {
    try {
      await this._prober.refresh();
      await this._sleep(SETTLE_DELAY_SECONDS, signal);
      const status = await this._prober.readStatus();
      this._lastStatus = status;
      this._log.debug("status read", { status });

      if (!(await this._handleDetection(status, signal))) {
        await this._trackTransitionAndWait(status, signal);
      }
    } catch (err) {
      this._log.error("check error", { failures: this._breaker.state().failures + 1 }, err);
      this._breaker.recordFailure();
      const seconds = await this._breaker.backoffSleep(signal);
      this._log.info("backoff finished", { seconds });
    }
  }

  /**
   * CAPTCHA and BLOCKED pages are treated as failures. Returns false for
   * every other status.
   */
  private async _handleDetection(status: PageStatus, signal: AbortSignal): Promise<boolean> {
    if (!isDetectionStatus(status)) return false;

    this._log.info("special status detected", { status });
    this._breaker.recordFailure();

    if (status === PageStatus.CAPTCHA && this._breaker.shouldCooldown()) {
      await this._notifyAll(this._messages.cooldown);
      const seconds = await this._breaker.cooldownSleep(signal);
      this._log.warn("cooldown finished", { seconds });
    } else {
      const seconds = await this._breaker.backoffSleep(signal);
      this._log.info("backoff finished", { seconds, failures: this._breaker.state().failures });
    }
    return true;
  }

  private async _trackTransitionAndWait(status: PageStatus, signal: AbortSignal): Promise<void> {
    this._breaker.reset();

    const isNoSlots = status === PageStatus.NO_SLOTS;
    if (this._lastNoSlots === true && !isNoSlots) {
      this._log.info("transition to maybe slots detected", { status });
      await this._notifyAll(this._messages.available);
    }
    this._lastNoSlots = isNoSlots;

    await this._limiter.sleepWithJitter(Math.max(this._interval, 1), signal);
  }

  private async _notifyAll(text: string): Promise<void> {
    if (this._dispatch === "sequential") {
      await this._broadcaster.broadcastSequential(text);
      return;
    }
    const { recipients } = this._broadcaster.broadcast(text);
    this._log.info("broadcast dispatched", { recipients: recipients.length });
  }

  // ── Polling task ────────────────────────────────────────────────────────────

  private async _run(): Promise<void> {
    try {
      try {
        await this._prober.ensureLoggedIn(this._abort.signal);
      } catch (err) {
        this._log.error("login phase failed; monitoring anyway", undefined, err);
      }

      while (!this._stopRequested) {
        await this._cycle(this._abort.signal);
      }
      this._log.info("monitor stopped");
    } catch (err) {
      this._log.error("monitor loop terminated unexpectedly", undefined, err);
    } finally {
      await this._closeProber();
    }
  }

  private async _closeProber(): Promise<void> {
    try {
      await this._prober.close();
    } catch (err) {
      this._log.warn("prober close failed", undefined, err);
    }
  }
}
