import { mkdir, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import puppeteerExtra from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, Page, LaunchOptions } from 'puppeteer-core';
import { ProbeError, createLogger } from '@slotwatch/core';
import type { Logger } from '@slotwatch/core';

import type { StealthBrowserOptions, StealthBrowserInstance, WindowSize } from './types.js';

const DEFAULT_WINDOW: WindowSize = { width: 1280, height: 900 };

/** Chrome refuses to share a profile directory between two processes. */
const PROFILE_LOCK_PATTERN = /already in use|already running|processsingleton/i;

export function isProfileLockError(err: unknown): boolean {
  return err instanceof Error && PROFILE_LOCK_PATTERN.test(err.message);
}

/**
 * Launches and manages stealth-configured Chromium instances.
 *
 * Each instance is configured with:
 * - puppeteer-extra stealth plugin (automation evasion)
 * - a persistent profile directory, so a manual login survives restarts
 * - an optional user agent and remote debugging port
 *
 * puppeteer-extra picks up puppeteer-core when full puppeteer is not
 * installed; the Chrome binary always comes from the caller.
 *
 * Usage:
 * ```ts
 * const browser = new StealthBrowser();
 * const instance = await browser.launch({ executablePath, userDataDir: 'chrome_profile' });
 * // Use instance.page for automation
 * await instance.close();
 * ```
 */
export class StealthBrowser {
  private readonly stealthPlugin: ReturnType<typeof StealthPlugin>;
  private readonly log: Logger;
  private initialized = false;

  constructor(logger?: Logger) {
    this.stealthPlugin = StealthPlugin();
    this.log = logger ?? createLogger('browser');
  }

  /**
   * Launch a browser. If the profile directory is locked by another Chrome
   * process, retries once with a fresh temporary profile.
   */
  async launch(options: StealthBrowserOptions): Promise<StealthBrowserInstance> {
    const stealth = options.stealth ?? true;
    if (stealth) this.ensureInitialized();

    let userDataDir = options.userDataDir;
    await mkdir(userDataDir, { recursive: true });

    let browser: Browser;
    try {
      browser = await puppeteerExtra.launch(this.buildLaunchOptions(options, userDataDir));
    } catch (err) {
      if (!isProfileLockError(err)) {
        throw new ProbeError('launch', err);
      }
      const requested = userDataDir;
      userDataDir = await mkdtemp(join(tmpdir(), 'slotwatch-profile-'));
      this.log.warn('profile directory locked; using temporary directory instead', {
        original: requested,
        temp: userDataDir,
      });
      try {
        browser = await puppeteerExtra.launch(this.buildLaunchOptions(options, userDataDir));
      } catch (retryErr) {
        throw new ProbeError('launch', retryErr);
      }
    }

    try {
      const page = await this.setupPage(browser, options, stealth);

      return {
        browser,
        page,
        userDataDir,
        close: async () => {
          await browser.close();
        },
      };
    } catch (err) {
      // If page setup fails, close the browser to avoid leaks
      await browser.close();
      throw err;
    }
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      puppeteerExtra.use(this.stealthPlugin);
      this.initialized = true;
    }
  }

  buildLaunchOptions(options: StealthBrowserOptions, userDataDir: string): LaunchOptions {
    const stealth = options.stealth ?? true;
    const window = options.windowSize ?? DEFAULT_WINDOW;
    const extra = options.puppeteerOptions ?? {};

    const args = [
      // Required on many Linux distros (AppArmor restrictions)
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-gpu',
      '--disable-dev-shm-usage',
      `--window-size=${window.width},${window.height}`,
      '--disable-infobars',
      '--disable-extensions',
    ];

    if (stealth) {
      // Disable features that leak automation
      args.push('--disable-blink-features=AutomationControlled');
    }
    if (options.remoteDebugPort !== undefined) {
      args.push(`--remote-debugging-port=${options.remoteDebugPort}`);
    }

    return {
      executablePath: options.executablePath,
      headless: options.headless ?? false,
      userDataDir,
      defaultViewport: null,
      ...(stealth ? { ignoreDefaultArgs: ['--enable-automation'] } : {}),
      ...extra,
      args: [...args, ...(extra.args ?? [])],
    };
  }

  private async setupPage(browser: Browser, options: StealthBrowserOptions, stealth: boolean): Promise<Page> {
    const page = (await browser.pages())[0] ?? await browser.newPage();

    if (options.userAgent) {
      await page.setUserAgent(options.userAgent);
    }

    if (stealth) {
      // Remove webdriver flag (belt and suspenders with stealth plugin)
      await page.evaluateOnNewDocument(
        "Object.defineProperty(navigator, 'webdriver', { get: () => undefined });",
      );
    }

    return page;
  }
}
