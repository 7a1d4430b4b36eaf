/**
 * Scripted implementation of the Prober interface for testing.
 *
 * Every method is a vitest spy. readStatus() walks through the scripted
 * statuses and keeps returning the last one once the script runs out,
 * so a short script can drive any number of cycles.
 *
 * @example
 * ```ts
 * const prober = new MockProber([PageStatus.NO_SLOTS, PageStatus.MAYBE_SLOTS]);
 * prober.failRefresh(new ProbeError("refresh"));
 * expect(prober.close).toHaveBeenCalledOnce();
 * ```
 */
import { vi } from "vitest";
import type { Mock } from "vitest";

import { PageStatus } from "@slotwatch/core";
import type { Prober } from "@slotwatch/core";

export class MockProber implements Prober {
  private readonly _script: PageStatus[];
  private _cursor = 0;
  private _refreshError: unknown = null;

  constructor(script: PageStatus[] = [PageStatus.NO_SLOTS]) {
    this._script = [...script];
  }

  refresh: Mock<() => Promise<void>> = vi.fn(async () => {
    if (this._refreshError !== null) {
      throw this._refreshError;
    }
  });

  readStatus: Mock<() => Promise<PageStatus>> = vi.fn(async () => {
    const index = Math.min(this._cursor, this._script.length - 1);
    this._cursor += 1;
    return this._script[index] ?? PageStatus.OK;
  });

  ensureLoggedIn: Mock<(signal?: AbortSignal) => Promise<void>> = vi.fn(async (_signal?: AbortSignal) => {});

  close: Mock<() => Promise<void>> = vi.fn(async () => {});

  // ── Test Utilities ──────────────────────────────────────────────────────────

  /** Make every following refresh() reject with the given error. */
  failRefresh(error: unknown): void {
    this._refreshError = error;
  }

  /** Let refresh() succeed again. */
  recover(): void {
    this._refreshError = null;
  }

  /** Number of statuses read so far. */
  get reads(): number {
    return this._cursor;
  }
}
