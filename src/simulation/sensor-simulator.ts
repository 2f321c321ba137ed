/**
 * Publishes synthetic sensor readings onto the ingress topic of an
 * in-process broker, for RELAY_SIMULATE=true runs.
 */

import type { InMemoryBroker } from '../transport/in-memory-transport';
import type { SensorPayload } from '../types';

const STATUSES = ['normal', 'warning', 'error'] as const;

export function generateSensorReading(random: () => number = Math.random, now: Date = new Date()): SensorPayload {
  return {
    device_id: `device_${Math.floor(random() * 100) + 1}`,
    timestamp: now.toISOString(),
    temperature: Math.round((20 + random() * 10) * 100) / 100,
    humidity: Math.round((40 + random() * 40) * 100) / 100,
    status: STATUSES[Math.floor(random() * STATUSES.length)],
  };
}

export class SensorSimulator {
  private timer?: NodeJS.Timeout;
  private published = 0;

  constructor(
    private readonly broker: InMemoryBroker,
    private readonly topic: string,
    private readonly intervalMs: number = 1_000
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.broker.inject(this.topic, JSON.stringify(generateSensorReading()));
      this.published++;
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  getPublishedCount(): number {
    return this.published;
  }
}
