import {
  InvalidConfigurationError,
  createLogger,
} from "@slotwatch/core";
import type { Logger, Notifier, Prober, SubscriberStore } from "@slotwatch/core";
import { CircuitBreaker, MonitorLoop, RateLimiter } from "@slotwatch/monitoring";
import {
  MarkerClassifier,
  PageProber,
  StaticPageSource,
  StealthBrowser,
} from "@slotwatch/browser";
import type { ProbePage, StealthBrowserOptions } from "@slotwatch/browser";
import {
  FileSubscriberStore,
  LogNotifier,
  MemorySubscriberStore,
  TelegramGateway,
  registerCommands,
} from "@slotwatch/adapters";

import type { AppConfig } from "./config.js";

/** How long shutdown waits for the polling task. */
export const SHUTDOWN_JOIN_SECONDS = 5;

/** A launched browser as far as the app is concerned. */
export interface LaunchedBrowser {
  readonly page: ProbePage;
  close(): Promise<void>;
}

/** Seams for swapping the browser launcher in tests. */
export interface AppDeps {
  readonly launchBrowser?: (options: StealthBrowserOptions) => Promise<LaunchedBrowser>;
  readonly logger?: Logger;
}

export interface App {
  readonly monitor: MonitorLoop;
  readonly store: SubscriberStore;
  readonly notifier: Notifier;
  readonly prober: Prober;
  readonly gateway: TelegramGateway | null;
  /**
   * Optional login phase, then the monitor and the Telegram polling.
   * Aborting the signal cuts the login wait short.
   */
  start(signal?: AbortSignal): Promise<void>;
  /** Stop Telegram polling and the monitor. Waits briefly for the monitor. */
  shutdown(reason: string): Promise<void>;
}

async function buildStore(config: AppConfig, log: Logger): Promise<SubscriberStore> {
  if (config.subscriberBackend === "memory") {
    return new MemorySubscriberStore();
  }
  return FileSubscriberStore.open(config.subscribersFile, log.child("subscribers"));
}

async function buildProber(config: AppConfig, deps: AppDeps, log: Logger): Promise<PageProber> {
  const classifier = new MarkerClassifier(
    {
      negative: config.negativePatterns,
      captcha: config.captchaMarkers,
      block: config.blockMarkers,
    },
    log.child("classifier"),
  );

  let browser: LaunchedBrowser;
  if (config.fakeDriver) {
    browser = { page: new StaticPageSource(), close: async () => {} };
  } else {
    if (!config.chromeBin) {
      throw new InvalidConfigurationError("CHROME_BIN is required to launch a browser");
    }
    const launch =
      deps.launchBrowser ?? ((options: StealthBrowserOptions) => new StealthBrowser(log.child("browser")).launch(options));
    browser = await launch({
      executablePath: config.chromeBin,
      userDataDir: config.userDataDir,
      headless: config.headless,
      windowSize: config.windowSize,
      stealth: config.stealth,
      remoteDebugPort: config.remoteDebugPort,
      userAgent: config.userAgent,
    });
  }

  return new PageProber({
    page: browser.page,
    closeBrowser: () => browser.close(),
    classifier,
    loginUrl: config.loginUrl,
    loginWaitSeconds: config.loginWaitSeconds,
    logger: log.child("prober"),
  });
}

/**
 * Wire every component from configuration. Nothing runs until start().
 */
export async function createApp(config: AppConfig, deps: AppDeps = {}): Promise<App> {
  const log = deps.logger ?? createLogger("bot");

  let gateway: TelegramGateway | null = null;
  if (!config.offline) {
    if (!config.telegramToken) {
      throw new InvalidConfigurationError("TELEGRAM_TOKEN is required unless OFFLINE is set");
    }
    gateway = new TelegramGateway({ token: config.telegramToken }, log.child("telegram"));
  }

  const store = await buildStore(config, log);
  const notifier: Notifier = gateway?.notifier ?? new LogNotifier(log.child("offline-notifier"));
  const prober = await buildProber(config, deps, log);

  const limiter = new RateLimiter({
    minIntervalSeconds: config.minIntervalSeconds,
    maxIntervalSeconds: config.maxIntervalSeconds,
    jitterRatio: config.jitterRatio,
  });
  const breaker = new CircuitBreaker({
    failureThreshold: config.failureThreshold,
    cooldownSeconds: config.cooldownSeconds,
    backoffBaseSeconds: config.backoffBaseSeconds,
    backoffMaxSeconds: config.backoffMaxSeconds,
  });
  const monitor = new MonitorLoop({
    prober,
    notifier,
    subscribers: store,
    intervalSeconds: config.checkIntervalSeconds,
    limiter,
    breaker,
    logger: log.child("monitor"),
  });

  if (gateway) {
    registerCommands(gateway.bot, {
      store,
      whitelist: config.whitelistUsernames,
      status: config.enableStatusCommand ? () => monitor.status() : undefined,
      logger: log.child("commands"),
    });
  }

  return {
    monitor,
    store,
    notifier,
    prober,
    gateway,

    async start(signal?: AbortSignal) {
      // Let a human solve the login / CAPTCHA before the first refresh
      if (!config.fakeDriver && config.startMonitorAfterLogin) {
        try {
          await prober.ensureLoggedIn(signal);
        } catch (err) {
          log.error("login phase failed", undefined, err);
        }
      }
      monitor.start();
      gateway?.start();
      log.info("bot started", { offline: config.offline, fakeDriver: config.fakeDriver });
    },

    async shutdown(reason: string) {
      log.info("stopping bot", { reason });
      await gateway?.stop(reason);
      monitor.stop();
      await monitor.join(SHUTDOWN_JOIN_SECONDS);
      if (monitor.isRunning()) {
        log.warn("monitor did not stop in time", { waitedSeconds: SHUTDOWN_JOIN_SECONDS });
      }
    },
  };
}
