import type { SubscriberStore } from "@slotwatch/core";

/** Ephemeral subscriber set. Everything is lost on restart. */
export class MemorySubscriberStore implements SubscriberStore {
  private readonly ids: Set<number>;

  constructor(initial: Iterable<number> = []) {
    this.ids = new Set(initial);
  }

  all(): readonly number[] {
    return [...this.ids].sort((a, b) => a - b);
  }

  count(): number {
    return this.ids.size;
  }

  has(recipientId: number): boolean {
    return this.ids.has(recipientId);
  }

  async add(recipientId: number): Promise<boolean> {
    if (this.ids.has(recipientId)) return false;
    this.ids.add(recipientId);
    return true;
  }

  async remove(recipientId: number): Promise<boolean> {
    return this.ids.delete(recipientId);
  }
}
