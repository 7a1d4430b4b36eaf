import type { SleepFn } from "@slotwatch/core";

/**
 * A SleepFn that records every requested duration instead of waiting.
 *
 * Each call yields one macrotask so a started MonitorLoop does not starve
 * the test. holdFrom(n) makes the n-th call (1-based) and every later one
 * block until its abort signal fires, which lets a test freeze the loop at
 * a known point and then release it with stop().
 */
export class RecordingSleep {
  readonly calls: number[] = [];
  private _holdFrom: number | null = null;
  private _heldWaiters: Array<() => void> = [];
  private _heldCount = 0;

  readonly sleep: SleepFn = async (seconds, signal) => {
    this.calls.push(seconds);

    if (this._holdFrom !== null && this.calls.length >= this._holdFrom && signal && !signal.aborted) {
      this._heldCount += 1;
      const waiters = this._heldWaiters;
      this._heldWaiters = [];
      for (const wake of waiters) wake();

      await new Promise<void>((resolve) => {
        signal.addEventListener("abort", () => resolve(), { once: true });
      });
      return;
    }

    await new Promise<void>((resolve) => setImmediate(resolve));
  };

  holdFrom(n: number): this {
    this._holdFrom = n;
    return this;
  }

  /** Resolves once a call is being held. */
  held(): Promise<void> {
    if (this._heldCount > 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this._heldWaiters.push(resolve);
    });
  }

  /** Sum of all requested durations. */
  get total(): number {
    return this.calls.reduce((sum, s) => sum + s, 0);
  }
}
