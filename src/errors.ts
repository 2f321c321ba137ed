/**
 * Error kinds raised while relaying a message.
 *
 * Every per-message error is caught at the relay-loop boundary; the code
 * field lets the loop count and log them without instanceof chains.
 */

export type RelayErrorCode =
  | 'PROCESSING_ERROR'
  | 'VALIDATION_ERROR'
  | 'DELIVERY_ERROR'
  | 'COORDINATION_ERROR'
  | 'CONFIG_ERROR';

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A pipeline stage failed. Terminal for the message under the pipeline strategy.
 */
export class ProcessingError extends RelayError {
  readonly stage: string;

  constructor(
    stage: string,
    message: string,
    options?: { cause?: unknown },
    code: RelayErrorCode = 'PROCESSING_ERROR'
  ) {
    super(code, message, options);
    this.stage = stage;
  }
}

/**
 * Payload is not JSON or lacks a required field
 */
export class ValidationError extends ProcessingError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = [], options?: { cause?: unknown }) {
    super('validation', message, options, 'VALIDATION_ERROR');
    this.missing = missing;
  }
}

/**
 * Downstream publish failed or was refused
 */
export class DeliveryError extends RelayError {
  readonly topic: string;

  constructor(topic: string, message: string, options?: { cause?: unknown }) {
    super('DELIVERY_ERROR', message, options);
    this.topic = topic;
  }
}

/**
 * Leader (or a peer) could not be reached
 */
export class CoordinationError extends RelayError {
  readonly peerId: string;

  constructor(peerId: string, message: string, options?: { cause?: unknown }) {
    super('COORDINATION_ERROR', message, options);
    this.peerId = peerId;
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Message text of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
