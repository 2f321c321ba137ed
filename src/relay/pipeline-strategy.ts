/**
 * Pipeline strategy - fail fast and drop
 *
 * Every payload runs through the processing pipeline before it is
 * published. A stage failure or a failed publish drops the message; nothing
 * is buffered or retried. Maintenance is the per-cycle health sweep.
 */

import { ProcessingError, errorMessage } from '../errors';
import type { ProcessingPipeline } from '../core/pipeline';
import type { EgressPublisher } from './egress';
import type { RelayOutcome, RelayStrategy } from '../types';

export class PipelineStrategy implements RelayStrategy {
  readonly name = 'pipeline' as const;

  constructor(
    private readonly pipeline: ProcessingPipeline,
    private readonly egress: EgressPublisher
  ) {}

  async handle(payload: string): Promise<RelayOutcome> {
    let processed: string;
    try {
      processed = this.pipeline.run(payload);
    } catch (error) {
      if (error instanceof ProcessingError) {
        console.error(`[PIPELINE] ${error.name} in ${error.stage} stage, message dropped: ${error.message}`);
        return { status: 'dropped', reason: error.message };
      }
      throw error;
    }

    try {
      await this.egress.publish(processed);
      return { status: 'forwarded' };
    } catch (error) {
      console.error('[PIPELINE] Delivery failed, message dropped:', errorMessage(error));
      return { status: 'dropped', reason: errorMessage(error) };
    }
  }

  async maintain(): Promise<void> {
    this.pipeline.healthSweep();
  }

  snapshot(): Record<string, unknown> {
    return { pipeline: this.pipeline.snapshot() };
  }
}
