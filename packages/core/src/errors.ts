/**
 * Base error for everything raised by the monitor and its collaborators.
 */
export class SlotWatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SlotWatchError";
  }
}

/**
 * Thrown at construction or config-load time. The only error class that is
 * allowed to reach the host process.
 */
export class InvalidConfigurationError extends SlotWatchError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

/**
 * A refresh, read or login operation against the target failed.
 */
export class ProbeError extends SlotWatchError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(
      `Probe operation "${operation}" failed${cause instanceof Error ? `: ${cause.message}` : ""}`,
      cause instanceof Error ? { cause } : undefined,
    );
    this.name = "ProbeError";
    this.operation = operation;
  }
}

/**
 * A notification could not be delivered to one recipient.
 */
export class DeliveryError extends SlotWatchError {
  readonly recipientId: number;

  constructor(recipientId: number, cause?: unknown) {
    super(
      `Failed to deliver message to ${recipientId}${cause instanceof Error ? `: ${cause.message}` : ""}`,
      cause instanceof Error ? { cause } : undefined,
    );
    this.name = "DeliveryError";
    this.recipientId = recipientId;
  }
}

/**
 * A notification could not even be handed to the transport.
 */
export class SchedulingError extends SlotWatchError {
  readonly recipientId: number;

  constructor(recipientId: number, cause?: unknown) {
    super(
      `Failed to schedule message to ${recipientId}${cause instanceof Error ? `: ${cause.message}` : ""}`,
      cause instanceof Error ? { cause } : undefined,
    );
    this.name = "SchedulingError";
    this.recipientId = recipientId;
  }
}

/**
 * Status derivation itself failed. Classifiers convert this into a safe
 * status instead of letting it escape.
 */
export class ClassificationError extends SlotWatchError {
  constructor(message: string, cause?: unknown) {
    super(message, cause instanceof Error ? { cause } : undefined);
    this.name = "ClassificationError";
  }
}
