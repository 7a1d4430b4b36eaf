/**
 * Telegram gateway built on Telegraf.
 *
 * Owns the Telegraf instance: long polling for chat commands, and the Bot
 * API client the notifier sends through.
 *
 * Rate limits:
 * - 30 msg/sec across all chats
 * - 1 msg/sec to same user in DMs
 */
import { Telegraf } from "telegraf";
import type { Context } from "telegraf";
import { createLogger } from "@slotwatch/core";
import type { Logger } from "@slotwatch/core";

import { TelegramNotifier } from "./notifier.js";
import type { TelegramGatewayConfig } from "./types.js";

/**
 * @example
 * ```typescript
 * const gateway = new TelegramGateway({ token: process.env.TELEGRAM_TOKEN });
 * registerCommands(gateway.bot, { store, whitelist: [] });
 * gateway.start();
 * ```
 */
export class TelegramGateway {
  readonly bot: Telegraf;
  readonly notifier: TelegramNotifier;
  private readonly log: Logger;
  private polling: Promise<void> | null = null;

  constructor(config: TelegramGatewayConfig, logger?: Logger) {
    this.log = logger ?? createLogger("telegram");

    const opts: Partial<Telegraf.Options<Context>> = {};
    if (config.apiRoot) {
      opts.telegram = { apiRoot: config.apiRoot };
    }

    this.bot = new Telegraf(config.token, opts);
    this.notifier = new TelegramNotifier(this.bot.telegram);

    // Catch bot-level errors
    this.bot.catch((err: unknown, ctx: Context) => {
      this.log.error("update handler failed", { updateType: ctx.updateType }, err);
    });
  }

  isRunning(): boolean {
    return this.polling !== null;
  }

  /** Begin long polling. The returned promise of launch() is observed here. */
  start(): void {
    if (this.polling) return;

    this.polling = this.bot
      .launch()
      .then(
        () => {
          this.log.info("telegram polling ended");
        },
        (err: unknown) => {
          this.log.error("telegram polling failed", undefined, err);
        },
      )
      .finally(() => {
        this.polling = null;
      });
    this.log.info("telegram polling started");
  }

  async stop(reason = "shutdown"): Promise<void> {
    const polling = this.polling;
    if (!polling) return;
    this.bot.stop(reason);
    await polling;
  }
}
