export * from "./telegram/index.js";
export * from "./subscribers/index.js";
export { LogNotifier } from "./log-notifier.js";
