/**
 * Configuration and the narrow slices of the Telegram API the adapters
 * touch.
 *
 * Telegraf's own context and client types satisfy these interfaces, so the
 * command handlers and the notifier can be exercised without a bot token.
 */
import type { Logger, MonitorStatus, SubscriberStore } from "@slotwatch/core";

/** Configuration for the Telegram gateway. */
export interface TelegramGatewayConfig {
  /** Bot token from @BotFather. */
  readonly token: string;

  /**
   * Telegram Bot API server URL override.
   * Useful for local Bot API server deployments.
   */
  readonly apiRoot?: string;
}

/** The one Bot API call the notifier needs. */
export interface MessageSender {
  sendMessage(chatId: number, text: string): Promise<unknown>;
}

/** Telegram user (subset of Bot API User). */
export interface CommandUser {
  readonly id: number;
  readonly username?: string;
}

/** What a command handler reads from an update and how it answers. */
export interface CommandContext {
  readonly chat?: { readonly id: number };
  readonly from?: CommandUser;
  reply(text: string): Promise<unknown>;
}

export interface CommandDeps {
  readonly store: SubscriberStore;
  /** Lowercase usernames allowed to subscribe. Empty allows everyone. */
  readonly whitelist: readonly string[];
  /** Registers /status when present. */
  readonly status?: () => MonitorStatus;
  readonly logger?: Logger;
}
