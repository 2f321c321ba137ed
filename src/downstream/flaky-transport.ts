/**
 * Simulates a flaky downstream receiver
 *
 * Wraps a real transport and fails egress publishes on demand, the way an
 * overloaded receiver behind the broker would:
 * - Sometimes fails (refusals, timeouts, dropped connections)
 * - Optionally adds latency to every publish
 *
 * Ingress is passed through untouched.
 */

import { DeliveryError } from '../errors';
import { SwitchableFaults, type FaultInjector } from '../core/fault-injector';
import type { RelayConfig } from '../config';
import type { InboundMessage, MessageTransport, QoS } from '../types';

const SIMULATED_ERRORS = [
  'ECONNREFUSED: Connection refused',
  'ETIMEDOUT: Publish acknowledgement timeout',
  'Receiver unavailable',
  'Receiver overloaded',
];

export interface FlakyTransportOptions {
  faults: FaultInjector;
  latencyMs?: number;
  /** Picks the error text; defaults to Math.random */
  random?: () => number;
}

export class FlakyTransport implements MessageTransport {
  private readonly latencyMs: number;
  private readonly random: () => number;

  constructor(
    private readonly inner: MessageTransport,
    private readonly options: FlakyTransportOptions
  ) {
    this.latencyMs = options.latencyMs ?? 0;
    this.random = options.random ?? Math.random;
  }

  connect(): Promise<void> {
    return this.inner.connect();
  }

  subscribe(topic: string): Promise<void> {
    return this.inner.subscribe(topic);
  }

  tryReceive(): InboundMessage | null {
    return this.inner.tryReceive();
  }

  async publish(topic: string, payload: string, qos: QoS): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }

    if (this.options.faults.shouldFail('downstream.publish')) {
      const reason = SIMULATED_ERRORS[Math.floor(this.random() * SIMULATED_ERRORS.length)] ?? SIMULATED_ERRORS[0];
      console.log(`[DOWNSTREAM] Simulated receiver failure: ${reason}`);
      throw new DeliveryError(topic, reason);
    }

    return this.inner.publish(topic, payload, qos);
  }

  disconnect(): Promise<void> {
    return this.inner.disconnect();
  }

  isConnected(): boolean {
    return this.inner.isConnected();
  }
}

/**
 * Wrap the transport when the configuration asks for a degraded downstream;
 * otherwise return it unchanged.
 */
export function withDownstreamFaults(
  transport: MessageTransport,
  config: Pick<
    RelayConfig,
    'downstreamFaultMode' | 'downstreamFailureRate' | 'downstreamFaultEvery' | 'downstreamLatencyMs'
  >
): MessageTransport {
  if (config.downstreamFaultMode === 'none' && config.downstreamLatencyMs === 0) {
    return transport;
  }

  return new FlakyTransport(transport, {
    faults: new SwitchableFaults({
      mode: config.downstreamFaultMode,
      failureRate: config.downstreamFailureRate,
      every: config.downstreamFaultEvery,
    }),
    latencyMs: config.downstreamLatencyMs,
  });
}

/**
 * Helper to simulate async delay
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
