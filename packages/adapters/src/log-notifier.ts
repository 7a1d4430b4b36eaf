import { createLogger } from "@slotwatch/core";
import type { Logger, Notifier } from "@slotwatch/core";

/** Notifier for offline runs: every message goes to the log instead of a chat. */
export class LogNotifier implements Notifier {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger("offline-notifier");
  }

  async send(recipientId: number, text: string): Promise<void> {
    this.log.info("notification", { recipientId, text });
  }
}
