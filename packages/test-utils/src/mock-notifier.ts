import { vi } from "vitest";
import type { Mock } from "vitest";

import { DeliveryError } from "@slotwatch/core";
import type { Notifier, SubscriberRegistry } from "@slotwatch/core";

/** A message the MockNotifier accepted. */
export interface SentMessage {
  readonly recipientId: number;
  readonly text: string;
}

/**
 * Records every message and can be told to fail for chosen recipients,
 * either by rejecting (delivery failure) or by throwing synchronously
 * (scheduling failure).
 */
export class MockNotifier implements Notifier {
  readonly sent: SentMessage[] = [];
  private readonly _rejectFor = new Set<number>();
  private readonly _throwFor = new Set<number>();

  send: Mock<(recipientId: number, text: string) => Promise<void>> = vi.fn(
    (recipientId: number, text: string): Promise<void> => {
      if (this._throwFor.has(recipientId)) {
        throw new Error(`cannot schedule send to ${recipientId}`);
      }
      if (this._rejectFor.has(recipientId)) {
        return Promise.reject(new DeliveryError(recipientId, new Error("chat not found")));
      }
      this.sent.push({ recipientId, text });
      return Promise.resolve();
    },
  );

  /** Make sends to this recipient reject. */
  rejectFor(recipientId: number): this {
    this._rejectFor.add(recipientId);
    return this;
  }

  /** Make sends to this recipient throw before returning a promise. */
  throwFor(recipientId: number): this {
    this._throwFor.add(recipientId);
    return this;
  }

  /** Texts sent to one recipient, in order. */
  textsFor(recipientId: number): string[] {
    return this.sent.filter((m) => m.recipientId === recipientId).map((m) => m.text);
  }
}

/** Fixed subscriber list. */
export class StaticSubscribers implements SubscriberRegistry {
  private readonly _ids: number[];

  constructor(ids: number[]) {
    this._ids = [...ids];
  }

  all: Mock<() => readonly number[]> = vi.fn(() => [...this._ids]);
}
