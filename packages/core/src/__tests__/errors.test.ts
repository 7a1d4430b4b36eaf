import { describe, it, expect } from "vitest";

import {
  ClassificationError,
  DeliveryError,
  InvalidConfigurationError,
  ProbeError,
  SchedulingError,
  SlotWatchError,
} from "../errors.js";
import { PageStatus, isDetectionStatus } from "../types.js";

describe("errors", () => {
  it("InvalidConfigurationError lists its issues", () => {
    const err = new InvalidConfigurationError("invalid interval bounds", ["min must be > 0", "max < min"]);
    expect(err).toBeInstanceOf(SlotWatchError);
    expect(err.name).toBe("InvalidConfigurationError");
    expect(err.message).toBe("invalid interval bounds: min must be > 0; max < min");
    expect(err.issues).toEqual(["min must be > 0", "max < min"]);
  });

  it("ProbeError keeps the operation and chains the cause", () => {
    const cause = new Error("net::ERR_CONNECTION_RESET");
    const err = new ProbeError("refresh", cause);
    expect(err.operation).toBe("refresh");
    expect(err.message).toBe('Probe operation "refresh" failed: net::ERR_CONNECTION_RESET');
    expect(err.cause).toBe(cause);
  });

  it("DeliveryError and SchedulingError carry the recipient", () => {
    expect(new DeliveryError(42, new Error("blocked by user")).recipientId).toBe(42);
    expect(new SchedulingError(7).message).toBe("Failed to schedule message to 7");
  });

  it("ClassificationError ignores non-Error causes", () => {
    const err = new ClassificationError("marker test failed", "nope");
    expect(err.cause).toBeUndefined();
  });
});

describe("isDetectionStatus", () => {
  it("is true only for CAPTCHA and BLOCKED", () => {
    expect(isDetectionStatus(PageStatus.CAPTCHA)).toBe(true);
    expect(isDetectionStatus(PageStatus.BLOCKED)).toBe(true);
    expect(isDetectionStatus(PageStatus.NO_SLOTS)).toBe(false);
    expect(isDetectionStatus(PageStatus.MAYBE_SLOTS)).toBe(false);
    expect(isDetectionStatus(PageStatus.OK)).toBe(false);
  });
});
