import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { PageStatus, ProbeError } from '@slotwatch/core';
import type { SleepFn } from '@slotwatch/core';
import { captureLogs } from '@slotwatch/test-utils';
import type { LogCapture } from '@slotwatch/test-utils';

import { MarkerClassifier } from '../src/classifier.js';
import { PageProber } from '../src/page-prober.js';
import { StaticPageSource } from '../src/static-page.js';
import type { ProbePage } from '../src/types.js';

const LOGIN_URL = 'https://example.com/login';

class FakePage implements ProbePage {
  html = '<html>No appointment available</html>';
  currentUrl = 'about:blank';

  goto = vi.fn(async (url: string): Promise<null> => {
    this.currentUrl = url;
    return null;
  });
  reload = vi.fn(async (): Promise<null> => null);
  content = vi.fn(async (): Promise<string> => this.html);
  url = vi.fn((): string => this.currentUrl);
}

describe('PageProber', () => {
  let now: number;
  let page: FakePage;
  let closeBrowser: Mock<() => Promise<void>>;
  let sleep: Mock<SleepFn>;
  let logs: LogCapture;

  function makeProber(loginWaitSeconds = 90): PageProber {
    return new PageProber({
      page,
      closeBrowser,
      classifier: new MarkerClassifier(
        { negative: ['no appointment'], captcha: ['captcha'], block: ['too many requests'] },
        logs.logger,
      ),
      loginUrl: LOGIN_URL,
      loginWaitSeconds,
      sleep,
      clock: () => now,
      logger: logs.logger,
    });
  }

  beforeEach(() => {
    now = 0;
    page = new FakePage();
    closeBrowser = vi.fn<() => Promise<void>>(async () => {});
    sleep = vi.fn<SleepFn>(async (seconds) => {
      now += seconds * 1000;
    });
    logs = captureLogs('prober');
  });

  describe('ensureLoggedIn', () => {
    it('opens the login page and waits until the URL leaves it', async () => {
      page.url
        .mockReturnValueOnce(LOGIN_URL)
        .mockReturnValueOnce(LOGIN_URL)
        .mockReturnValue('https://example.com/dashboard');
      const prober = makeProber();

      await prober.ensureLoggedIn();

      expect(page.goto).toHaveBeenCalledWith(LOGIN_URL);
      expect(sleep.mock.calls).toEqual([
        [2, undefined],
        [2, undefined],
      ]);
      expect(logs.withMessage('login heuristically confirmed')).toEqual([
        expect.objectContaining({ currentUrl: 'https://example.com/dashboard' }),
      ]);

      await prober.ensureLoggedIn();
      expect(page.goto).toHaveBeenCalledOnce();
    });

    it('proceeds after the wait runs out and tries again next time', async () => {
      const prober = makeProber(6);

      await prober.ensureLoggedIn();

      expect(sleep).toHaveBeenCalledTimes(3);
      expect(logs.withMessage('login not confirmed after timeout; proceeding anyway')).toHaveLength(1);

      await prober.ensureLoggedIn();
      expect(page.goto).toHaveBeenCalledTimes(2);
    });

    it('keeps polling when the URL cannot be read', async () => {
      page.url
        .mockImplementationOnce(() => {
          throw new Error('Execution context was destroyed');
        })
        .mockReturnValue('https://example.com/app');
      const prober = makeProber();

      await prober.ensureLoggedIn();

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(logs.withMessage('login heuristically confirmed')).toHaveLength(1);
    });

    it('stops waiting once the signal is aborted', async () => {
      const controller = new AbortController();
      sleep.mockImplementation(async (seconds) => {
        now += seconds * 1000;
        controller.abort();
      });
      page.url.mockReturnValue(LOGIN_URL);
      const prober = makeProber();

      await prober.ensureLoggedIn(controller.signal);

      expect(sleep.mock.calls).toEqual([[2, controller.signal]]);
      expect(logs.withMessage('login wait interrupted')).toHaveLength(1);
      expect(logs.withMessage('login not confirmed after timeout; proceeding anyway')).toEqual([]);

      // not confirmed, so the next call opens the login page again
      await prober.ensureLoggedIn();
      expect(page.goto).toHaveBeenCalledTimes(2);
    });

    it('does nothing when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const prober = makeProber();

      await prober.ensureLoggedIn(controller.signal);

      expect(page.goto).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
    });

    it('rejects when the login page cannot be opened', async () => {
      page.goto.mockRejectedValue(new Error('net::ERR_CONNECTION_REFUSED'));
      const prober = makeProber();

      const attempt = prober.ensureLoggedIn();

      await expect(attempt).rejects.toBeInstanceOf(ProbeError);
      await expect(attempt).rejects.toThrow('Probe operation "login" failed: net::ERR_CONNECTION_REFUSED');
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('refresh', () => {
    it('reloads the page', async () => {
      await makeProber().refresh();

      expect(page.reload).toHaveBeenCalledOnce();
      expect(page.goto).not.toHaveBeenCalled();
    });

    it('recovers from a failed reload by opening the login page', async () => {
      page.reload.mockRejectedValue(new Error('Navigation timeout of 30000 ms exceeded'));

      await makeProber().refresh();

      expect(page.goto).toHaveBeenCalledWith(LOGIN_URL);
      expect(logs.withMessage('refresh failed, attempting recovery')).toHaveLength(1);
    });

    it('rejects when recovery fails too', async () => {
      page.reload.mockRejectedValue(new Error('Target closed'));
      page.goto.mockRejectedValue(new Error('Session closed'));

      await expect(makeProber().refresh()).rejects.toThrow('Probe operation "refresh" failed: Session closed');
    });
  });

  describe('readStatus', () => {
    it('classifies the page content', async () => {
      page.html = '<html>Choose your slot</html>';

      await expect(makeProber().readStatus()).resolves.toBe(PageStatus.MAYBE_SLOTS);
    });

    it('reuses a classification for two seconds', async () => {
      const prober = makeProber();

      await expect(prober.readStatus()).resolves.toBe(PageStatus.NO_SLOTS);
      page.html = '<html>captcha</html>';
      now = 1999;
      await expect(prober.readStatus()).resolves.toBe(PageStatus.NO_SLOTS);
      expect(page.content).toHaveBeenCalledOnce();

      now = 2000;
      await expect(prober.readStatus()).resolves.toBe(PageStatus.CAPTCHA);
      expect(page.content).toHaveBeenCalledTimes(2);
    });

    it('reports BLOCKED when the content cannot be read', async () => {
      page.content.mockRejectedValueOnce(new Error('Protocol error'));
      const prober = makeProber();

      await expect(prober.readStatus()).resolves.toBe(PageStatus.BLOCKED);
      await expect(prober.readStatus()).resolves.toBe(PageStatus.NO_SLOTS);
      expect(logs.withMessage('page content read failed')).toHaveLength(1);
    });
  });

  describe('close', () => {
    it('closes the browser', async () => {
      await makeProber().close();
      expect(closeBrowser).toHaveBeenCalledOnce();
    });

    it('logs and absorbs close errors', async () => {
      closeBrowser.mockRejectedValue(new Error('already closed'));

      await expect(makeProber().close()).resolves.toBeUndefined();
      expect(logs.withMessage('browser close error ignored')).toEqual([
        expect.objectContaining({ level: 'debug' }),
      ]);
    });
  });

  it('confirms an existing session without waiting', async () => {
    page.goto.mockImplementation(async () => {
      page.currentUrl = 'https://example.com/app';
      return null;
    });

    await makeProber().ensureLoggedIn();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('works against a static page', async () => {
    const source = new StaticPageSource();
    const prober = new PageProber({
      page: source,
      closeBrowser: async () => {},
      classifier: new MarkerClassifier({ negative: ['no appointment'], captcha: [], block: [] }, logs.logger),
      loginUrl: LOGIN_URL,
      loginWaitSeconds: 10,
      sleep,
      clock: () => now,
      logger: logs.logger,
    });

    await prober.ensureLoggedIn();
    expect(source.visited).toEqual([LOGIN_URL]);
    expect(sleep).not.toHaveBeenCalled();

    await prober.refresh();
    await expect(prober.readStatus()).resolves.toBe(PageStatus.NO_SLOTS);

    source.setContent('<html>Book now</html>');
    now += 5000;
    await expect(prober.readStatus()).resolves.toBe(PageStatus.MAYBE_SLOTS);
  });
});
