/**
 * @description: Error types raised by the interaction toolkit before any network call is made.
 * @scope: utility
 * @module: InteractionErrors
 * @risk: low - Callers branch on these classes to tell misuse apart from transport failures.
 */

/**
 * Base class for errors originating inside the toolkit. Transport failures are
 * never wrapped in it; they reach the caller as the REST client raised them.
 */
export class InteractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InteractionError';
  }
}

/**
 * Raised when mutually exclusive message fields are supplied together.
 */
export class InvalidArgumentError extends InteractionError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Raised when an inbound interaction payload, or a message returned by the
 * platform, lacks a field the toolkit needs.
 */
export class InteractionPayloadError extends InteractionError {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'InteractionPayloadError';
  }
}
