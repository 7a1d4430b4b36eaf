// @slotwatch/core
// Shared types, collaborator interfaces, errors, logging and timing helpers.

export { PageStatus, isDetectionStatus } from "./types.js";

export type {
  StatusSnapshot,
  BreakerAction,
  BreakerState,
  MonitorStatus,
} from "./types.js";

export type {
  Prober,
  StatusClassifier,
  Notifier,
  SubscriberRegistry,
  SubscriberStore,
} from "./ports.js";

export {
  SlotWatchError,
  InvalidConfigurationError,
  ProbeError,
  DeliveryError,
  SchedulingError,
  ClassificationError,
} from "./errors.js";

export { Logger, configureLogging, createLogger } from "./logger.js";

export type { LogLevel, LogFormat, LogContext, LogSink, LoggerOptions } from "./logger.js";

export { randomInt, sleepSeconds } from "./timing.js";

export type { RandomFn, ClockFn, SleepFn } from "./timing.js";
