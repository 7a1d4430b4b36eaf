/**
 * Narrow interfaces through which the monitor reaches the outside world.
 *
 * The monitor never imports a browser or a chat SDK. Anything that
 * implements these interfaces (a puppeteer page, a static page, a test
 * fake) can be plugged in.
 */
import type { PageStatus } from "./types.js";

/**
 * Owns the page being watched.
 *
 * Only the monitor's polling task calls these methods, one at a time.
 */
export interface Prober {
  /** Reload the target page. Rejects with ProbeError. */
  refresh(): Promise<void>;

  /** Classify the current page. Rejects with ProbeError. */
  readStatus(): Promise<PageStatus>;

  /**
   * Make sure the session is logged in. Best-effort: the monitor logs a
   * rejection and carries on. An aborted signal ends any wait early.
   */
  ensureLoggedIn(signal?: AbortSignal): Promise<void>;

  /** Release the page and browser. Never rejects. */
  close(): Promise<void>;
}

/** Turns raw page content into a status. Never throws. */
export interface StatusClassifier {
  classify(content: string): PageStatus;
}

/** Delivers a text message to one recipient. */
export interface Notifier {
  /** Rejects with DeliveryError. */
  send(recipientId: number, text: string): Promise<void>;
}

/** Read side of the subscriber list, all the monitor needs. */
export interface SubscriberRegistry {
  /** Snapshot of recipient ids, no ordering guarantee. */
  all(): readonly number[];
}

/** Full subscriber store used by the chat commands. */
export interface SubscriberStore extends SubscriberRegistry {
  /** Returns false if the id was already subscribed. */
  add(recipientId: number): Promise<boolean>;
  /** Returns false if the id was not subscribed. */
  remove(recipientId: number): Promise<boolean>;
  count(): number;
  has(recipientId: number): boolean;
}
