import { describe, it, expect } from "vitest";

import { InvalidConfigurationError } from "@slotwatch/core";

import { loadConfig, splitList } from "../config.js";

const OFFLINE_ENV = { OFFLINE: "1", FAKE_DRIVER: "1" };

function issuesFor(env: Record<string, string>): readonly string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof InvalidConfigurationError) return err.issues;
    throw err;
  }
  throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
  it("fills in every default", () => {
    expect(loadConfig(OFFLINE_ENV)).toEqual({
      telegramToken: undefined,
      loginUrl: "https://example.com/login",
      checkIntervalSeconds: 300,
      minIntervalSeconds: 180,
      maxIntervalSeconds: 420,
      jitterRatio: 0.2,
      negativePatterns: ["no appointment", "not available", "no slots", "no appointments available"],
      captchaMarkers: ["verify", "captcha", "are you human", "robot check"],
      blockMarkers: ["too many requests", "429", "temporarily blocked", "suspicious activity"],
      headless: false,
      loginWaitSeconds: 90,
      windowSize: { width: 1280, height: 900 },
      userDataDir: "chrome_profile",
      stealth: true,
      remoteDebugPort: undefined,
      userAgent: undefined,
      chromeBin: undefined,
      startMonitorAfterLogin: true,
      subscribersFile: "subscribers.json",
      subscriberBackend: "file",
      backoffBaseSeconds: 30,
      backoffMaxSeconds: 600,
      cooldownSeconds: 1800,
      failureThreshold: 5,
      whitelistUsernames: [],
      logLevel: "info",
      logFormat: "pretty",
      enableStatusCommand: true,
      offline: true,
      fakeDriver: true,
    });
  });

  it("reads a full online configuration", () => {
    const config = loadConfig({
      TELEGRAM_TOKEN: "test-token",
      CHROME_BIN: "/usr/bin/chromium",
      TARGET_LOGIN_URL: "https://appointments.example.org/en/login",
      CHECK_INTERVAL: "120",
      MIN_CHECK_INTERVAL: "60",
      MAX_CHECK_INTERVAL: "240",
      JITTER_RATIO: "0.5",
      HEADLESS: "true",
      WINDOW_SIZE: "1920x1080",
      REMOTE_DEBUG_PORT: "9222",
      CUSTOM_USER_AGENT: "TestAgent/1.0",
      SUBSCRIBER_BACKEND: "Memory",
      WHITELIST_USERNAMES: "Alice; @bob,",
      LOG_LEVEL: "WARNING",
      LOG_FORMAT: "json",
      ENABLE_STATUS_COMMAND: "off",
    });

    expect(config).toMatchObject({
      telegramToken: "test-token",
      chromeBin: "/usr/bin/chromium",
      loginUrl: "https://appointments.example.org/en/login",
      checkIntervalSeconds: 120,
      minIntervalSeconds: 60,
      maxIntervalSeconds: 240,
      jitterRatio: 0.5,
      headless: true,
      windowSize: { width: 1920, height: 1080 },
      remoteDebugPort: 9222,
      userAgent: "TestAgent/1.0",
      subscriberBackend: "memory",
      whitelistUsernames: ["alice", "@bob"],
      logLevel: "warn",
      logFormat: "json",
      enableStatusCommand: false,
      offline: false,
      fakeDriver: false,
    });
  });

  it.each([
    ["1", true],
    ["YES", true],
    [" on ", true],
    ["0", false],
    ["no", false],
    ["banana", false],
  ])("reads HEADLESS=%j as %s", (value, expected) => {
    expect(loadConfig({ ...OFFLINE_ENV, HEADLESS: value }).headless).toBe(expected);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({
      ...OFFLINE_ENV,
      STEALTH_MODE: "",
      CHECK_INTERVAL: "  ",
      CUSTOM_USER_AGENT: "",
      REMOTE_DEBUG_PORT: "",
    });

    expect(config.stealth).toBe(true);
    expect(config.checkIntervalSeconds).toBe(300);
    expect(config.userAgent).toBeUndefined();
    expect(config.remoteDebugPort).toBeUndefined();
  });

  it("maps the text log format to pretty", () => {
    expect(loadConfig({ ...OFFLINE_ENV, LOG_FORMAT: "TEXT" }).logFormat).toBe("pretty");
  });

  it("requires a token and a browser binary by default", () => {
    expect(issuesFor({})).toEqual([
      "TELEGRAM_TOKEN: required unless OFFLINE is set",
      "CHROME_BIN: required unless FAKE_DRIVER is set",
    ]);
  });

  it("puts every issue in the error message", () => {
    expect(() => loadConfig({ OFFLINE: "1" })).toThrow(
      "Invalid configuration: CHROME_BIN: required unless FAKE_DRIVER is set",
    );
  });

  it("rejects a minimum interval above the maximum", () => {
    expect(issuesFor({ ...OFFLINE_ENV, MIN_CHECK_INTERVAL: "500", MAX_CHECK_INTERVAL: "100" })).toEqual([
      "MIN_CHECK_INTERVAL: must not exceed MAX_CHECK_INTERVAL (100)",
    ]);
  });

  it("rejects a malformed window size", () => {
    expect(issuesFor({ ...OFFLINE_ENV, WINDOW_SIZE: "wide" })).toEqual(["WINDOW_SIZE: expected WIDTH,HEIGHT"]);
  });

  it.each([
    ["CHECK_INTERVAL", "abc"],
    ["CHECK_INTERVAL", "2.5"],
    ["FAILURE_THRESHOLD", "0"],
    ["JITTER_RATIO", "1.5"],
    ["REMOTE_DEBUG_PORT", "70000"],
    ["SUBSCRIBER_BACKEND", "redis"],
    ["LOG_LEVEL", "verbose"],
    ["TARGET_LOGIN_URL", "not a url"],
  ])("rejects %s=%j", (key, value) => {
    const issues = issuesFor({ ...OFFLINE_ENV, [key]: value });

    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith(`${key}: `)).toBe(true);
  });
});

describe("splitList", () => {
  it("splits on both separators, trims, lowercases and drops empties", () => {
    expect(splitList(" Sold Out ;none,, ;LATER ")).toEqual(["sold out", "none", "later"]);
  });

  it("returns nothing for an empty string", () => {
    expect(splitList("")).toEqual([]);
  });
});
