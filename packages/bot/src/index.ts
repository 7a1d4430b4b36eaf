export { loadConfig, loadEnvFile, splitList } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp, SHUTDOWN_JOIN_SECONDS } from "./app.js";
export type { App, AppDeps, LaunchedBrowser } from "./app.js";
export { main, OFFLINE_RUN_SECONDS } from "./main.js";
