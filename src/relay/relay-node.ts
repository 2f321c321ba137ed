/**
 * RelayNode - the per-node polling loop
 *
 * Each cycle:
 * 1. take at most one message off the ingress inbox (never blocks)
 * 2. hand it to the strategy
 * 3. run the strategy's maintenance (retry drain, health sweep, leader check)
 * 4. sleep pollIntervalMs
 *
 * Steps 2 and 3 each run under the node lock, as do transport callbacks, so
 * node state is only ever mutated by one holder at a time. Any error from a
 * message or a maintenance step is logged and counted; the loop keeps going
 * until stop().
 */

import { NodeLock } from '../core/node-lock';
import { errorMessage } from '../errors';
import type { MessageTransport, RelayOutcome, RelayStats, RelayStrategy } from '../types';

export interface RelayNodeOptions {
  nodeId: string;
  pollIntervalMs: number;
  /** Clock source, milliseconds */
  now?: () => number;
}

export class RelayNode {
  readonly nodeId: string;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private readonly lock: NodeLock;
  private running = false;
  private loop?: Promise<void>;
  private wake?: () => void;
  private transportConnected: boolean;
  private readonly stats: RelayStats = {
    cycles: 0,
    received: 0,
    forwarded: 0,
    buffered: 0,
    dropped: 0,
    routed: 0,
    failed: 0,
  };

  constructor(
    private readonly transport: MessageTransport,
    private readonly strategy: RelayStrategy,
    options: RelayNodeOptions,
    lock: NodeLock = new NodeLock()
  ) {
    this.nodeId = options.nodeId;
    this.pollIntervalMs = options.pollIntervalMs;
    this.now = options.now ?? Date.now;
    this.lock = lock;
    this.transportConnected = transport.isConnected();
  }

  /**
   * Run cycles until stop() is called. Resolves when the loop has exited.
   */
  start(): Promise<void> {
    if (this.loop) {
      return this.loop;
    }
    this.running = true;
    console.log(`[RELAY] ${this.nodeId} polling with ${this.strategy.name} strategy every ${this.pollIntervalMs}ms`);

    this.loop = (async () => {
      while (this.running) {
        await this.runCycle();
        if (this.running) {
          await this.sleep(this.pollIntervalMs);
        }
      }
      console.log(`[RELAY] ${this.nodeId} polling stopped`);
    })();
    return this.loop;
  }

  /**
   * Stop after the current cycle. Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.();
    await this.loop;
    this.loop = undefined;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * One receive/handle/maintain step. Never throws.
   *
   * @returns what happened to the received message; null when none was waiting
   * or its handling threw
   */
  async runCycle(now: number = this.now()): Promise<RelayOutcome | null> {
    this.stats.cycles++;

    let outcome: RelayOutcome | null = null;
    const message = this.transport.tryReceive();
    if (message) {
      this.stats.received++;
      outcome = await this.lock.runExclusive(() => this.relay(message.payload));
    }

    await this.lock.runExclusive(() => this.maintain(now));
    return outcome;
  }

  /**
   * Transport connection callback; records the state under the node lock
   */
  onTransportStateChange(connected: boolean): Promise<void> {
    return this.lock.runExclusive(() => {
      if (this.transportConnected !== connected) {
        console.log(`[RELAY] ${this.nodeId} transport ${connected ? 'connected' : 'disconnected'}`);
      }
      this.transportConnected = connected;
    });
  }

  getStats(): RelayStats {
    return { ...this.stats };
  }

  snapshot(): Record<string, unknown> {
    return {
      nodeId: this.nodeId,
      strategy: this.strategy.name,
      running: this.running,
      transportConnected: this.transportConnected,
      stats: this.getStats(),
      state: this.strategy.snapshot(),
    };
  }

  private async relay(payload: string): Promise<RelayOutcome | null> {
    try {
      const outcome = await this.strategy.handle(payload);
      this.count(outcome);
      return outcome;
    } catch (error) {
      this.stats.failed++;
      console.error(`[RELAY] Unexpected error handling message: ${errorMessage(error)}`);
      return null;
    }
  }

  private async maintain(now: number): Promise<void> {
    try {
      await this.strategy.maintain(now);
    } catch (error) {
      this.stats.failed++;
      console.error(`[RELAY] Maintenance failed: ${errorMessage(error)}`);
    }
  }

  private count(outcome: RelayOutcome): void {
    switch (outcome.status) {
      case 'forwarded':
        this.stats.forwarded++;
        break;
      case 'buffered':
        this.stats.buffered++;
        break;
      case 'dropped':
        this.stats.dropped++;
        break;
      case 'routed':
        this.stats.routed++;
        break;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }
}
