/**
 * Environment configuration.
 *
 * Every setting comes from an environment variable. Outside production a
 * `.env` file in the working directory is loaded first; production
 * deployments inject variables directly.
 */
import { resolve } from "node:path";

import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { InvalidConfigurationError } from "@slotwatch/core";
import type { LogFormat, LogLevel } from "@slotwatch/core";

export interface AppConfig {
  readonly telegramToken: string | undefined;
  readonly loginUrl: string;

  readonly checkIntervalSeconds: number;
  readonly minIntervalSeconds: number;
  readonly maxIntervalSeconds: number;
  readonly jitterRatio: number;

  readonly negativePatterns: readonly string[];
  readonly captchaMarkers: readonly string[];
  readonly blockMarkers: readonly string[];

  readonly headless: boolean;
  readonly loginWaitSeconds: number;
  readonly windowSize: { readonly width: number; readonly height: number };
  readonly userDataDir: string;
  readonly stealth: boolean;
  readonly remoteDebugPort: number | undefined;
  readonly userAgent: string | undefined;
  readonly chromeBin: string | undefined;
  readonly startMonitorAfterLogin: boolean;

  readonly subscribersFile: string;
  readonly subscriberBackend: "file" | "memory";

  readonly backoffBaseSeconds: number;
  readonly backoffMaxSeconds: number;
  readonly cooldownSeconds: number;
  readonly failureThreshold: number;

  /** Lowercase usernames allowed to subscribe. Empty allows everyone. */
  readonly whitelistUsernames: readonly string[];

  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;

  readonly enableStatusCommand: boolean;
  /** No Telegram connection; notifications go to the log. */
  readonly offline: boolean;
  /** Probe a static in-memory page instead of launching Chrome. */
  readonly fakeDriver: boolean;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function lowerOrUndefined(value: unknown): unknown {
  const cleaned = blankToUndefined(value);
  return typeof cleaned === "string" ? cleaned.toLowerCase() : cleaned;
}

/** Split on `;` or `,`, trim, lowercase and drop empties. */
export function splitList(raw: string): string[] {
  return raw
    .split(/[;,]/)
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);
}

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const cleaned = value?.trim().toLowerCase();
      return cleaned ? TRUTHY.has(cleaned) : fallback;
    });

const integer = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const list = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => splitList(value ?? fallback));

const text = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const optionalText = () => z.preprocess(blankToUndefined, z.string().optional());

const LOG_LEVEL_ALIASES: Record<string, string> = { warning: "warn", critical: "error" };
const LOG_FORMAT_ALIASES: Record<string, string> = { text: "pretty" };

const EnvSchema = z
  .object({
    TELEGRAM_TOKEN: optionalText(),
    TARGET_LOGIN_URL: z.preprocess(blankToUndefined, z.string().url().default("https://example.com/login")),

    CHECK_INTERVAL: integer(300, 1),
    MIN_CHECK_INTERVAL: integer(180, 1),
    MAX_CHECK_INTERVAL: integer(420, 1),
    JITTER_RATIO: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(0.2)),

    NEGATIVE_PATTERNS: list("no appointment;not available;no slots;no appointments available"),
    CAPTCHA_MARKERS: list("verify;captcha;are you human;robot check"),
    BLOCK_MARKERS: list("too many requests;429;temporarily blocked;suspicious activity"),

    HEADLESS: flag(false),
    LOGIN_WAIT_SECONDS: integer(90, 0),
    WINDOW_SIZE: z
      .preprocess(
        blankToUndefined,
        z.string().regex(/^\d+\s*[,x]\s*\d+$/i, "expected WIDTH,HEIGHT").default("1280,900"),
      )
      .transform((value) => {
        const [width = 0, height = 0] = value.split(/\s*[,x]\s*/i).map(Number);
        return { width, height };
      }),
    USER_DATA_DIR: text("chrome_profile"),
    STEALTH_MODE: flag(true),
    REMOTE_DEBUG_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).optional()),
    CUSTOM_USER_AGENT: optionalText(),
    CHROME_BIN: optionalText(),
    START_MONITOR_AFTER_LOGIN: flag(true),

    SUBSCRIBERS_FILE: text("subscribers.json"),
    SUBSCRIBER_BACKEND: z.preprocess(lowerOrUndefined, z.enum(["file", "memory"]).default("file")),

    ERROR_BACKOFF_BASE: integer(30, 0),
    ERROR_BACKOFF_MAX: integer(600, 0),
    COOLDOWN_ON_CAPTCHA: integer(1800, 0),
    FAILURE_THRESHOLD: integer(5, 1),

    WHITELIST_USERNAMES: list(""),

    LOG_LEVEL: z.preprocess(
      (value) => {
        const lowered = lowerOrUndefined(value);
        return typeof lowered === "string" ? (LOG_LEVEL_ALIASES[lowered] ?? lowered) : lowered;
      },
      z.enum(["debug", "info", "warn", "error"]).default("info"),
    ),
    LOG_FORMAT: z.preprocess(
      (value) => {
        const lowered = lowerOrUndefined(value);
        return typeof lowered === "string" ? (LOG_FORMAT_ALIASES[lowered] ?? lowered) : lowered;
      },
      z.enum(["pretty", "json"]).default("pretty"),
    ),

    ENABLE_STATUS_COMMAND: flag(true),
    OFFLINE: flag(false),
    FAKE_DRIVER: flag(false),
  })
  .superRefine((env, ctx) => {
    if (!env.OFFLINE && !env.TELEGRAM_TOKEN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TELEGRAM_TOKEN"],
        message: "required unless OFFLINE is set",
      });
    }
    if (!env.FAKE_DRIVER && !env.CHROME_BIN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHROME_BIN"],
        message: "required unless FAKE_DRIVER is set",
      });
    }
    if (env.MIN_CHECK_INTERVAL > env.MAX_CHECK_INTERVAL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MIN_CHECK_INTERVAL"],
        message: `must not exceed MAX_CHECK_INTERVAL (${env.MAX_CHECK_INTERVAL})`,
      });
    }
  });

/**
 * Load `.env` into process.env unless running in production. Variables
 * already set win over the file.
 */
export function loadEnvFile(path = resolve(process.cwd(), ".env")): void {
  if (process.env.NODE_ENV === "production") return;
  loadDotenv({ path });
}

/**
 * Parse and validate configuration from environment variables.
 * Throws InvalidConfigurationError listing every invalid variable.
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidConfigurationError("Invalid configuration", issues);
  }

  const e = result.data;
  return {
    telegramToken: e.TELEGRAM_TOKEN,
    loginUrl: e.TARGET_LOGIN_URL,
    checkIntervalSeconds: e.CHECK_INTERVAL,
    minIntervalSeconds: e.MIN_CHECK_INTERVAL,
    maxIntervalSeconds: e.MAX_CHECK_INTERVAL,
    jitterRatio: e.JITTER_RATIO,
    negativePatterns: e.NEGATIVE_PATTERNS,
    captchaMarkers: e.CAPTCHA_MARKERS,
    blockMarkers: e.BLOCK_MARKERS,
    headless: e.HEADLESS,
    loginWaitSeconds: e.LOGIN_WAIT_SECONDS,
    windowSize: e.WINDOW_SIZE,
    userDataDir: e.USER_DATA_DIR,
    stealth: e.STEALTH_MODE,
    remoteDebugPort: e.REMOTE_DEBUG_PORT,
    userAgent: e.CUSTOM_USER_AGENT,
    chromeBin: e.CHROME_BIN,
    startMonitorAfterLogin: e.START_MONITOR_AFTER_LOGIN,
    subscribersFile: e.SUBSCRIBERS_FILE,
    subscriberBackend: e.SUBSCRIBER_BACKEND,
    backoffBaseSeconds: e.ERROR_BACKOFF_BASE,
    backoffMaxSeconds: e.ERROR_BACKOFF_MAX,
    cooldownSeconds: e.COOLDOWN_ON_CAPTCHA,
    failureThreshold: e.FAILURE_THRESHOLD,
    whitelistUsernames: e.WHITELIST_USERNAMES,
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
    enableStatusCommand: e.ENABLE_STATUS_COMMAND,
    offline: e.OFFLINE,
    fakeDriver: e.FAKE_DRIVER,
  };
}
