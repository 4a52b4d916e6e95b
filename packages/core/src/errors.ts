/**
 * Error types
 *
 * Traversal itself never throws: early exit is a `Stop` and missing values
 * are `None`. These errors cover misuse and bad configuration.
 */

export type SluiceErrorCode = "PRODUCER_CONSUMED" | "NO_VALUE" | "INVALID_CONFIG";

/**
 * Base class for all errors thrown by sluice.
 */
export class SluiceError extends Error {
  constructor(
    message: string,
    public readonly code: SluiceErrorCode,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SluiceError";
  }
}

/**
 * Thrown when a producer that was already traversed, or already wrapped by
 * an adapter, is used again.
 */
export class ProducerConsumedError extends SluiceError {
  constructor(public readonly producerName: string) {
    super(
      `${producerName} has already been consumed; producers are single-use, build a new one to traverse again`,
      "PRODUCER_CONSUMED",
    );
    this.name = "ProducerConsumedError";
  }
}

/**
 * Thrown by `unwrap` on `None`.
 */
export class NoValueError extends SluiceError {
  constructor(message = "Called unwrap on None") {
    super(message, "NO_VALUE");
    this.name = "NoValueError";
  }
}

/**
 * Thrown when a config file cannot be loaded or holds an invalid value.
 */
export class ConfigError extends SluiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_CONFIG", options);
    this.name = "ConfigError";
  }
}
