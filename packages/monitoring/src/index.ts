// @slotwatch/monitoring
// Resilient polling core: jittered pacing, circuit breaker, transition detection and broadcast.

export type {
  RateLimiterConfig,
  CircuitBreakerConfig,
  MonitorMessages,
  DispatchMode,
  MonitorLoopConfig,
  MonitorRunState,
  BroadcastResult,
} from "./types.js";

export { RateLimiter } from "./rate-limiter.js";
export { CircuitBreaker } from "./circuit-breaker.js";
export { Broadcaster } from "./broadcast.js";
export { MonitorLoop, SETTLE_DELAY_SECONDS, DEFAULT_MESSAGES } from "./monitor-loop.js";
