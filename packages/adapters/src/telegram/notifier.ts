import { DeliveryError } from "@slotwatch/core";
import type { Notifier } from "@slotwatch/core";

import type { MessageSender } from "./types.js";

/**
 * Delivers notifications as plain Telegram messages.
 *
 * Recipient ids are Telegram chat ids. Any Bot API failure (blocked bot,
 * unknown chat, rate limit) rejects with a DeliveryError for that chat.
 */
export class TelegramNotifier implements Notifier {
  private readonly telegram: MessageSender;

  constructor(telegram: MessageSender) {
    this.telegram = telegram;
  }

  async send(recipientId: number, text: string): Promise<void> {
    try {
      await this.telegram.sendMessage(recipientId, text);
    } catch (err) {
      throw new DeliveryError(recipientId, err);
    }
  }
}
