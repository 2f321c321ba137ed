/**
 * Breaker strategy - fail and buffer
 *
 * Each inbound payload goes straight downstream while the admission
 * controller allows it. A refused or failed delivery parks the original
 * payload in the retry buffer. The buffer is drained on its own cadence,
 * straight to the downstream: redeliveries neither consult the gate nor
 * change its counters, so buffered payloads move again as soon as the
 * receiver recovers, even while the circuit is still OPEN.
 *
 * New payloads are not held back behind buffered ones: while the circuit
 * is CLOSED a fresh payload can reach the downstream before older buffered
 * payloads do. Only the buffer itself is strictly FIFO.
 */

import { AdmissionController } from '../core/admission-controller';
import { RetryBuffer } from '../core/retry-buffer';
import { errorMessage } from '../errors';
import type { EgressPublisher } from './egress';
import type { RelayOutcome, RelayStrategy } from '../types';

export class BreakerStrategy implements RelayStrategy {
  readonly name = 'breaker' as const;

  constructor(
    private readonly breaker: AdmissionController,
    private readonly buffer: RetryBuffer,
    private readonly egress: EgressPublisher
  ) {}

  async handle(payload: string): Promise<RelayOutcome> {
    if (!this.breaker.allowRequest()) {
      this.buffer.enqueue(payload);
      console.log('[RELAY] Circuit open - message queued');
      return { status: 'buffered', reason: 'circuit open' };
    }

    try {
      await this.egress.publish(payload);
      this.breaker.recordSuccess();
      return { status: 'forwarded' };
    } catch (error) {
      this.breaker.recordFailure();
      this.buffer.enqueue(payload);
      console.error('[RELAY] Delivery failed, message queued:', errorMessage(error));
      return { status: 'buffered', reason: errorMessage(error) };
    }
  }

  async maintain(now: number): Promise<void> {
    await this.buffer.drainTick(now, (payload) => this.retry(payload));
  }

  /**
   * One redelivery attempt. Never throws.
   */
  private async retry(payload: string): Promise<boolean> {
    try {
      await this.egress.publish(payload);
      return true;
    } catch (error) {
      console.error('[RETRY] Redelivery failed:', errorMessage(error));
      return false;
    }
  }

  snapshot(): Record<string, unknown> {
    return {
      breaker: this.breaker.getState(),
      retryBuffer: this.buffer.snapshot(),
    };
  }
}
