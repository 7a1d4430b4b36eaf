import { DeliveryError, SchedulingError, createLogger } from "@slotwatch/core";
import type { Logger, Notifier, SubscriberRegistry } from "@slotwatch/core";

import type { BroadcastResult } from "./types.js";

/**
 * Fans a message out to every subscriber.
 *
 * Each recipient is isolated: a send that throws or rejects is logged with
 * the recipient id and the rest of the list still gets the message.
 *
 * Usage:
 * ```ts
 * const broadcaster = new Broadcaster(notifier, subscribers);
 * const { recipients, settled } = broadcaster.broadcast("Slots may be open");
 * // the caller is free to move on; settled resolves when all sends are done
 * ```
 */
export class Broadcaster {
  private readonly _notifier: Notifier;
  private readonly _subscribers: SubscriberRegistry;
  private readonly _log: Logger;
  private readonly _inFlight = new Set<Promise<void>>();

  constructor(notifier: Notifier, subscribers: SubscriberRegistry, logger?: Logger) {
    this._notifier = notifier;
    this._subscribers = subscribers;
    this._log = logger ?? createLogger("broadcast");
  }

  /**
   * Start a send to every current subscriber without waiting for any of
   * them.
   */
  broadcast(text: string): BroadcastResult {
    const recipients = this._snapshot();
    const pending: Promise<void>[] = [];

    for (const id of recipients) {
      let delivery: Promise<void>;
      try {
        delivery = this._notifier.send(id, text);
      } catch (err) {
        this._log.warn("failed to schedule notification", { recipientId: id }, new SchedulingError(id, err));
        continue;
      }

      const observed = delivery.then(
        () => undefined,
        (err: unknown) => {
          this._log.warn("notify error", { recipientId: id }, this._asDeliveryError(id, err));
        },
      );
      this._track(observed);
      pending.push(observed);
    }

    return {
      recipients,
      settled: Promise.all(pending).then(() => undefined),
    };
  }

  /**
   * Send to every current subscriber one at a time. Resolves to the ids
   * that were delivered to.
   */
  async broadcastSequential(text: string): Promise<number[]> {
    const delivered: number[] = [];
    for (const id of this._snapshot()) {
      try {
        await this._notifier.send(id, text);
        delivered.push(id);
      } catch (err) {
        this._log.warn("notify error (sequential)", { recipientId: id }, this._asDeliveryError(id, err));
      }
    }
    return delivered;
  }

  /** Number of sends that have been started and not yet settled. */
  get inFlight(): number {
    return this._inFlight.size;
  }

  /** Resolves once every send started so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this._inFlight]);
  }

  private _snapshot(): readonly number[] {
    try {
      return [...this._subscribers.all()];
    } catch (err) {
      this._log.error("failed to read subscribers; broadcast skipped", undefined, err);
      return [];
    }
  }

  private _track(observed: Promise<void>): void {
    this._inFlight.add(observed);
    void observed.finally(() => {
      this._inFlight.delete(observed);
    });
  }

  private _asDeliveryError(id: number, err: unknown): DeliveryError {
    return err instanceof DeliveryError ? err : new DeliveryError(id, err);
  }
}
