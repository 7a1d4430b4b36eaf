import type { Browser, LaunchOptions, Page } from 'puppeteer-core';
import type { ClockFn, Logger, SleepFn, StatusClassifier } from '@slotwatch/core';

/**
 * The part of a browser page the prober drives. A puppeteer Page satisfies
 * it, and so does the in-memory StaticPageSource.
 */
export interface ProbePage {
  goto(url: string): Promise<unknown>;
  reload(): Promise<unknown>;
  content(): Promise<string>;
  url(): string;
}

export interface WindowSize {
  width: number;
  height: number;
}

/**
 * Options for launching a stealth browser instance.
 */
export interface StealthBrowserOptions {
  /** Chrome/Chromium binary. puppeteer-core never downloads one. */
  executablePath: string;
  /** Directory for persistent browser data (cookies, localStorage, etc.) */
  userDataDir: string;
  /** Run in headless mode. Defaults to false so a human can log in. */
  headless?: boolean;
  /** Defaults to 1280x900. */
  windowSize?: WindowSize;
  /** Register the stealth plugin and hide automation flags. Defaults to true. */
  stealth?: boolean;
  remoteDebugPort?: number;
  userAgent?: string;
  /** Additional Puppeteer launch options (applied last) */
  puppeteerOptions?: Partial<LaunchOptions>;
}

/**
 * A managed stealth browser instance.
 */
export interface StealthBrowserInstance {
  browser: Browser;
  page: Page;
  /** The profile directory actually in use, which differs from the requested one after a lock fallback. */
  userDataDir: string;
  close(): Promise<void>;
}

/** Lowercase substrings the classifier looks for. */
export interface MarkerSets {
  negative: readonly string[];
  captcha: readonly string[];
  block: readonly string[];
}

export interface PageProberOptions {
  page: ProbePage;
  /** Releases the page's browser. Called once by close(). */
  closeBrowser: () => Promise<void>;
  classifier: StatusClassifier;
  loginUrl: string;
  /** How long ensureLoggedIn() waits for a manual login. */
  loginWaitSeconds: number;
  /** Defaults to 2. */
  loginPollSeconds?: number;
  /** How long a classification is reused. Defaults to 2. */
  statusCacheTtlSeconds?: number;
  sleep?: SleepFn;
  clock?: ClockFn;
  logger?: Logger;
}
