export { StealthBrowser, isProfileLockError } from './stealth-browser.js';
export { MarkerClassifier } from './classifier.js';
export { PageProber } from './page-prober.js';
export { StaticPageSource } from './static-page.js';

export type {
  ProbePage,
  WindowSize,
  StealthBrowserOptions,
  StealthBrowserInstance,
  MarkerSets,
  PageProberOptions,
} from './types.js';
