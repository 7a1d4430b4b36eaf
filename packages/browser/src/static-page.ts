import type { ProbePage } from './types.js';

/**
 * In-memory page with fixed content, used when no real browser is wanted.
 * It behaves like an already logged-in session: every navigation lands on
 * the same URL.
 */
export class StaticPageSource implements ProbePage {
  private html: string;
  private readonly currentUrl: string;
  /** URLs passed to goto(), in order. */
  readonly visited: string[] = [];

  constructor(html = '<html>No appointment available</html>', url = 'https://example.com/app') {
    this.html = html;
    this.currentUrl = url;
  }

  async goto(url: string): Promise<null> {
    this.visited.push(url);
    return null;
  }

  async reload(): Promise<null> {
    return null;
  }

  async content(): Promise<string> {
    return this.html;
  }

  url(): string {
    return this.currentUrl;
  }

  setContent(html: string): void {
    this.html = html;
  }
}
