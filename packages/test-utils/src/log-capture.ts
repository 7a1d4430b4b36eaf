import { Logger } from "@slotwatch/core";
import type { LogLevel } from "@slotwatch/core";

/** One parsed JSON log line. */
export type CapturedEntry = Record<string, unknown>;

export interface LogCapture {
  readonly logger: Logger;
  readonly entries: CapturedEntry[];
  /** Entries with exactly this message. */
  withMessage(message: string): CapturedEntry[];
}

function isRecord(value: unknown): value is CapturedEntry {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * A JSON logger whose output is parsed and kept in memory instead of being
 * written to the console.
 */
export function captureLogs(component = "test", level: LogLevel = "debug"): LogCapture {
  const entries: CapturedEntry[] = [];
  const logger = new Logger(component, {
    level,
    format: "json",
    clock: () => 0,
    sink: (_level, line) => {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) entries.push(parsed);
    },
  });

  return {
    logger,
    entries,
    withMessage: (message) => entries.filter((e) => e.message === message),
  };
}
