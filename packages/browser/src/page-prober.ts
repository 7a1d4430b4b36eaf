import { PageStatus, ProbeError, createLogger, sleepSeconds } from '@slotwatch/core';
import type {
  ClockFn,
  Logger,
  Prober,
  SleepFn,
  StatusClassifier,
  StatusSnapshot,
} from '@slotwatch/core';

import type { PageProberOptions, ProbePage } from './types.js';

/**
 * Prober backed by a browser page.
 *
 * Keeps a logged-in session (detected heuristically from the URL), reloads
 * the page on request and classifies its content. A classification is
 * cached for a short TTL so repeated reads do not re-parse the DOM.
 */
export class PageProber implements Prober {
  private readonly page: ProbePage;
  private readonly closeBrowser: () => Promise<void>;
  private readonly classifier: StatusClassifier;
  private readonly loginUrl: string;
  private readonly loginWaitSeconds: number;
  private readonly loginPollSeconds: number;
  private readonly cacheTtlMs: number;
  private readonly sleep: SleepFn;
  private readonly clock: ClockFn;
  private readonly log: Logger;

  private loggedIn = false;
  private snapshot: StatusSnapshot | null = null;

  constructor(options: PageProberOptions) {
    this.page = options.page;
    this.closeBrowser = options.closeBrowser;
    this.classifier = options.classifier;
    this.loginUrl = options.loginUrl;
    this.loginWaitSeconds = options.loginWaitSeconds;
    this.loginPollSeconds = options.loginPollSeconds ?? 2;
    this.cacheTtlMs = (options.statusCacheTtlSeconds ?? 2) * 1000;
    this.sleep = options.sleep ?? sleepSeconds;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? createLogger('prober');
  }

  /**
   * Open the login page and wait for someone to log in by hand. Login counts
   * as confirmed once the URL no longer contains "/login"; after the wait
   * runs out monitoring proceeds anyway. Aborting the signal ends the wait
   * early without confirming the login.
   */
  async ensureLoggedIn(signal?: AbortSignal): Promise<void> {
    if (this.loggedIn || signal?.aborted) return;

    try {
      await this.page.goto(this.loginUrl);
    } catch (err) {
      this.log.error('initial navigation failed', { url: this.loginUrl }, err);
      throw new ProbeError('login', err);
    }

    this.log.info('waiting for manual login / captcha solve', { timeout: this.loginWaitSeconds });
    const deadline = this.clock() + this.loginWaitSeconds * 1000;

    for (;;) {
      if (this.loginConfirmed()) return;
      if (signal?.aborted) {
        this.log.info('login wait interrupted');
        return;
      }
      if (this.clock() >= deadline) break;
      await this.sleep(this.loginPollSeconds, signal);
    }

    this.log.warn('login not confirmed after timeout; proceeding anyway');
  }

  private loginConfirmed(): boolean {
    let current: string;
    try {
      current = this.page.url();
    } catch (err) {
      this.log.debug('current url unavailable', undefined, err);
      return false;
    }

    if (current.includes('/login')) return false;

    this.loggedIn = true;
    this.log.info('login heuristically confirmed', { currentUrl: current });
    return true;
  }

  async refresh(): Promise<void> {
    try {
      await this.page.reload();
    } catch (err) {
      this.log.warn('refresh failed, attempting recovery', undefined, err);
      try {
        await this.page.goto(this.loginUrl);
      } catch (navErr) {
        this.log.error('recovery navigation failed', { url: this.loginUrl }, navErr);
        throw new ProbeError('refresh', navErr);
      }
    }
  }

  async readStatus(): Promise<PageStatus> {
    const now = this.clock();
    if (this.snapshot && now - this.snapshot.at < this.cacheTtlMs) {
      return this.snapshot.status;
    }

    let html: string;
    try {
      html = await this.page.content();
    } catch (err) {
      this.log.warn('page content read failed', undefined, err);
      return PageStatus.BLOCKED;
    }

    const status = this.classifier.classify(html);
    this.snapshot = { status, at: now, rawLength: html.length };
    return status;
  }

  async close(): Promise<void> {
    try {
      await this.closeBrowser();
    } catch (err) {
      this.log.debug('browser close error ignored', undefined, err);
    }
  }
}
