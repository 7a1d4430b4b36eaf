import { configureLogging, createLogger, sleepSeconds } from "@slotwatch/core";

import { createApp } from "./app.js";
import type { AppDeps } from "./app.js";
import { loadConfig, loadEnvFile } from "./config.js";

/** Offline runs are a short demo, then shut down on their own. */
export const OFFLINE_RUN_SECONDS = 5;

function waitForSignal(
  signals: readonly NodeJS.Signals[],
  abort: AbortSignal,
  onSignal: () => void,
): Promise<string> {
  return new Promise((resolve) => {
    const handler = (signal: NodeJS.Signals) => {
      for (const s of signals) process.off(s, handler);
      onSignal();
      resolve(signal);
    };
    for (const s of signals) process.once(s, handler);
    abort.addEventListener(
      "abort",
      () => {
        for (const s of signals) process.off(s, handler);
      },
      { once: true },
    );
  });
}

/**
 * Load configuration, run the bot until SIGINT/SIGTERM (or the offline
 * demo window ends) and shut down. Resolves to the process exit code.
 */
export async function main(env: NodeJS.ProcessEnv = process.env, deps: AppDeps = {}): Promise<number> {
  loadEnvFile();
  const config = loadConfig(env);
  configureLogging({ level: config.logLevel, format: config.logFormat });
  const log = deps.logger ?? createLogger("bot");
  log.info("starting bot");

  const app = await createApp(config, { ...deps, logger: log });

  // A signal during start() cuts the login wait short
  const done = new AbortController();
  const startup = new AbortController();
  const signalled = waitForSignal(["SIGINT", "SIGTERM"], done.signal, () => startup.abort());
  await app.start(startup.signal);

  let reason: string;
  if (config.offline) {
    log.warn("running in OFFLINE mode", { fakeDriver: config.fakeDriver, seconds: OFFLINE_RUN_SECONDS });
    reason = await Promise.race([
      signalled,
      sleepSeconds(OFFLINE_RUN_SECONDS, done.signal).then(() => "offline run finished"),
    ]);
  } else {
    reason = await signalled;
  }
  done.abort();

  log.info("signal received, shutting down", { reason });
  await app.shutdown(reason);
  return 0;
}
