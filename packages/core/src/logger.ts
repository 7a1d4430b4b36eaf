/**
 * Structured console logging shared by every package.
 *
 * Two formats:
 * - `pretty`: one coloured, human-readable line per entry (development)
 * - `json`: one JSON object per line (production, log shippers)
 *
 * Loggers are cheap. Components create a child with their own name and
 * pass context (recipient id, status, ...) as metadata instead of
 * interpolating it into the message.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "pretty" | "json";

export type LogContext = Record<string, unknown>;

/** Receives a formatted line. Defaults to the matching console method. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level written. Defaults to "info". */
  readonly level?: LogLevel;
  /** Output format. Defaults to "pretty". */
  readonly format?: LogFormat;
  /** Override the output for testing. */
  readonly sink?: LogSink;
  /** Override the timestamp source for testing. */
  readonly clock?: () => number;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  error?: { name: string; message: string; stack?: string };
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

function formatError(error: unknown): LogEntry["error"] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "UnknownError", message: String(error) };
}

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, component, message, error, ...meta } = entry;
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : "";
  const errorStr = error ? `\n  ${DIM}${error.stack ?? `${error.name}: ${error.message}`}${RESET}` : "";
  return `${DIM}${timestamp}${RESET} ${LOG_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} [${component}] ${message}${metaStr}${errorStr}`;
}

export class Logger {
  private readonly _component: string;
  private readonly _context: LogContext;
  private readonly _level: LogLevel;
  private readonly _format: LogFormat;
  private readonly _sink: LogSink;
  private readonly _clock: () => number;

  constructor(component: string, options: LoggerOptions = {}, context: LogContext = {}) {
    this._component = component;
    this._context = context;
    this._level = options.level ?? "info";
    this._format = options.format ?? "pretty";
    this._sink = options.sink ?? consoleSink;
    this._clock = options.clock ?? Date.now;
  }

  debug(message: string, meta?: LogContext, error?: unknown): void {
    this._log("debug", message, meta, error);
  }

  info(message: string, meta?: LogContext, error?: unknown): void {
    this._log("info", message, meta, error);
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this._log("warn", message, meta, error);
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this._log("error", message, meta, error);
  }

  /**
   * Create a logger for a sub-component. The name is appended with a colon
   * and the context is merged over this logger's context.
   */
  child(component: string, context: LogContext = {}): Logger {
    return new Logger(
      `${this._component}:${component}`,
      { level: this._level, format: this._format, sink: this._sink, clock: this._clock },
      { ...this._context, ...context },
    );
  }

  private _log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this._level]) return;

    const entry: LogEntry = {
      timestamp: new Date(this._clock()).toISOString(),
      level,
      component: this._component,
      message,
      ...this._context,
      ...meta,
    };
    if (error !== undefined) {
      entry.error = formatError(error);
    }

    this._sink(level, this._format === "json" ? JSON.stringify(entry) : formatPretty(entry));
  }
}

let rootOptions: LoggerOptions = {};

/**
 * Set the options used by loggers created through createLogger() from now
 * on. Called once by the entrypoint after configuration is loaded.
 */
export function configureLogging(options: LoggerOptions): void {
  rootOptions = { ...options };
}

/** Create a named logger with the process-wide options. */
export function createLogger(component: string, context: LogContext = {}): Logger {
  return new Logger(component, rootOptions, context);
}
