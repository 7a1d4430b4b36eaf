import { createLogger } from "@slotwatch/core";
import type { Logger, MonitorStatus, SubscriberStore } from "@slotwatch/core";
import type { Telegraf } from "telegraf";

import type { CommandContext, CommandDeps } from "./types.js";

export const REPLIES = {
  start: "Hi. Use /subscribe to get notifications.",
  notAuthorized: "Not authorized.",
  subscribed: "Subscribed. You'll receive notifications when slots appear.",
  alreadySubscribed: "Already subscribed.",
  unsubscribed: "Unsubscribed.",
  notSubscribed: "You were not subscribed.",
} as const;

/**
 * A user may subscribe when the whitelist is empty, when they have no
 * username to check, or when their username is on it.
 */
export function isAuthorized(username: string | undefined, whitelist: readonly string[]): boolean {
  if (whitelist.length === 0 || !username) return true;
  const name = normalizeUsername(username);
  return whitelist.some((entry) => normalizeUsername(entry) === name);
}

function normalizeUsername(username: string): string {
  return username.trim().replace(/^@/, "").toLowerCase();
}

/** The multi-line /status reply. */
export function formatStatus(status: MonitorStatus): string {
  const { breaker } = status;
  return [
    `Monitor running: ${status.running}`,
    `Subscribers: ${status.subscriberCount}`,
    `Last status: ${status.lastStatus ?? "?"}`,
    `Failures: ${breaker.failures}/${breaker.threshold}`,
    `Breaker open: ${breaker.open}`,
    `Last breaker action: ${breaker.lastAction ?? "-"}`,
  ].join("\n");
}

export async function handleStart(ctx: CommandContext): Promise<void> {
  await ctx.reply(REPLIES.start);
}

export async function handleSubscribe(
  ctx: CommandContext,
  store: SubscriberStore,
  whitelist: readonly string[],
  log: Logger,
): Promise<void> {
  if (!ctx.chat) return;

  if (!isAuthorized(ctx.from?.username, whitelist)) {
    log.info("subscription refused", { chatId: ctx.chat.id, username: ctx.from?.username });
    await ctx.reply(REPLIES.notAuthorized);
    return;
  }

  const added = await store.add(ctx.chat.id);
  if (added) log.info("subscribed", { chatId: ctx.chat.id });
  await ctx.reply(added ? REPLIES.subscribed : REPLIES.alreadySubscribed);
}

export async function handleUnsubscribe(
  ctx: CommandContext,
  store: SubscriberStore,
  log: Logger,
): Promise<void> {
  if (!ctx.chat) return;

  const removed = await store.remove(ctx.chat.id);
  if (removed) log.info("unsubscribed", { chatId: ctx.chat.id });
  await ctx.reply(removed ? REPLIES.unsubscribed : REPLIES.notSubscribed);
}

export async function handleStatus(ctx: CommandContext, status: () => MonitorStatus): Promise<void> {
  await ctx.reply(formatStatus(status()));
}

/**
 * Register /start, /subscribe (/sub), /unsubscribe (/unsub) and, when a
 * status source is given, /status.
 */
export function registerCommands(bot: Telegraf, deps: CommandDeps): void {
  const log = deps.logger ?? createLogger("commands");
  const { store, whitelist, status } = deps;

  bot.command("start", (ctx) => handleStart(ctx));
  bot.command(["subscribe", "sub"], (ctx) => handleSubscribe(ctx, store, whitelist, log));
  bot.command(["unsubscribe", "unsub"], (ctx) => handleUnsubscribe(ctx, store, log));
  if (status) {
    bot.command("status", (ctx) => handleStatus(ctx, status));
  }
}
