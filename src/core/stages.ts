/**
 * Pipeline stages
 *
 * A stage takes the payload text, returns the (possibly rewritten) text,
 * and throws ProcessingError when it cannot. isHealthy() is polled by the
 * pipeline's health sweep, independently of message flow.
 */

import { ProcessingError, ValidationError } from '../errors';
import { NoFaults, type FaultInjector } from './fault-injector';
import type { ProcessedPayload } from '../types';

export type StageKind = 'validation' | 'transformation';

export interface PipelineStage {
  readonly kind: StageKind;
  process(input: string): string;
  isHealthy(): boolean;
}

const REQUIRED_FIELDS = ['device_id', 'temperature'] as const;

function parseJsonObject(input: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(input);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Rejects anything that is not a JSON object with device_id and temperature.
 * Field values are not checked. Passes valid input through untouched.
 * Always healthy.
 */
export class ValidationStage implements PipelineStage {
  readonly kind = 'validation' as const;

  process(input: string): string {
    const body = parseJsonObject(input);
    if (!body) {
      throw new ValidationError('Invalid message format: payload is not a JSON object');
    }

    const missing = REQUIRED_FIELDS.filter((field) => !(field in body));
    if (missing.length > 0) {
      throw new ValidationError(`Invalid message format: missing ${missing.join(', ')}`, [...missing]);
    }

    return input;
  }

  isHealthy(): boolean {
    return true;
  }
}

export interface TransformationOptions {
  /** Consulted with 'transformation.process' on every message */
  processFaults?: FaultInjector;
  /** Consulted with 'transformation.health' on every health query */
  healthFaults?: FaultInjector;
  /** Clock source, milliseconds */
  now?: () => number;
}

/**
 * Marks the payload processed and stamps it with the relay's clock.
 *
 * Once a health query reports a fault the stage stays unhealthy until the
 * supervisor replaces it; a recreated instance starts healthy.
 */
export class TransformationStage implements PipelineStage {
  readonly kind = 'transformation' as const;
  private healthy = true;
  private readonly processFaults: FaultInjector;
  private readonly healthFaults: FaultInjector;
  private readonly now: () => number;

  constructor(options: TransformationOptions = {}) {
    this.processFaults = options.processFaults ?? new NoFaults();
    this.healthFaults = options.healthFaults ?? new NoFaults();
    this.now = options.now ?? Date.now;
  }

  process(input: string): string {
    if (this.processFaults.shouldFail('transformation.process')) {
      throw new ProcessingError(this.kind, 'Simulated transformation failure');
    }

    const body = parseJsonObject(input);
    if (!body) {
      throw new ProcessingError(this.kind, 'Cannot transform: payload is not a JSON object');
    }

    const output: ProcessedPayload = {
      ...body,
      processed: true,
      server_timestamp: Math.floor(this.now() / 1000),
    };
    return JSON.stringify(output);
  }

  isHealthy(): boolean {
    if (this.healthy && this.healthFaults.shouldFail('transformation.health')) {
      this.healthy = false;
    }
    return this.healthy;
  }
}
