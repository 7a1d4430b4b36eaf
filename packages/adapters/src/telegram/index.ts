export { TelegramGateway } from "./gateway.js";
export { TelegramNotifier } from "./notifier.js";
export {
  REPLIES,
  formatStatus,
  handleStart,
  handleStatus,
  handleSubscribe,
  handleUnsubscribe,
  isAuthorized,
  registerCommands,
} from "./commands.js";

export type {
  CommandContext,
  CommandDeps,
  CommandUser,
  MessageSender,
  TelegramGatewayConfig,
} from "./types.js";
