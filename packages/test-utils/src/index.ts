export { MockProber } from "./mock-prober.js";
export { MockNotifier, StaticSubscribers } from "./mock-notifier.js";
export type { SentMessage } from "./mock-notifier.js";
export { RecordingSleep } from "./recording-sleep.js";
export { captureLogs } from "./log-capture.js";
export type { CapturedEntry, LogCapture } from "./log-capture.js";
