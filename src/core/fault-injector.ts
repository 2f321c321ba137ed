/**
 * Fault injection for exercising the relay's failure paths
 *
 * Components that can fail synthetically (transformation stage, flaky
 * downstream) take a FaultInjector instead of keeping their own counters.
 * Each injector instance owns its state, so two stages never share a
 * cadence and a test can script exactly which call fails.
 *
 * Sites are free-form strings such as 'transformation.process' or
 * 'downstream.publish'; an injector may ignore them.
 */

export interface FaultInjector {
  shouldFail(site: string): boolean;
}

/**
 * Never fails
 */
export class NoFaults implements FaultInjector {
  shouldFail(): boolean {
    return false;
  }
}

/**
 * Fails every Nth call (N, 2N, 3N, ...) counted per instance
 */
export class PeriodicFaults implements FaultInjector {
  private calls = 0;

  constructor(private readonly every: number) {
    if (every <= 0 || !Number.isInteger(every)) {
      throw new Error('PeriodicFaults interval must be a positive integer');
    }
  }

  shouldFail(): boolean {
    this.calls++;
    return this.calls % this.every === 0;
  }
}

/**
 * Fails with a fixed probability
 */
export class RandomFaults implements FaultInjector {
  constructor(
    private readonly rate: number,
    private readonly random: () => number = Math.random
  ) {
    if (rate < 0 || rate > 1) {
      throw new Error('RandomFaults rate must be between 0 and 1');
    }
  }

  shouldFail(): boolean {
    return this.random() < this.rate;
  }
}

/**
 * Fails exactly on the listed call numbers (1-based), then never again.
 * Handy in tests: new ScriptedFaults([3]) fails only the third call.
 */
export class ScriptedFaults implements FaultInjector {
  private calls = 0;
  private readonly failing: Set<number>;

  constructor(failOnCalls: number[]) {
    this.failing = new Set(failOnCalls);
  }

  shouldFail(): boolean {
    this.calls++;
    return this.failing.has(this.calls);
  }
}

export type FaultMode = 'none' | 'intermittent' | 'complete' | 'periodic';

export interface SwitchableFaultOptions {
  mode?: FaultMode;
  failureRate?: number;
  every?: number;
  random?: () => number;
}

/**
 * Downstream failure modes that can be changed while the relay runs:
 * - none:         every call succeeds
 * - intermittent: each call fails with probability failureRate
 * - complete:     every call fails
 * - periodic:     every Nth call fails
 */
export class SwitchableFaults implements FaultInjector {
  private mode: FaultMode;
  private readonly intermittent: RandomFaults;
  private periodic: PeriodicFaults;
  private readonly every: number;

  constructor(options: SwitchableFaultOptions = {}) {
    this.mode = options.mode ?? 'none';
    this.every = options.every ?? 5;
    this.intermittent = new RandomFaults(options.failureRate ?? 0.3, options.random);
    this.periodic = new PeriodicFaults(this.every);
  }

  setMode(mode: FaultMode): void {
    if (mode === 'periodic' && this.mode !== 'periodic') {
      this.periodic = new PeriodicFaults(this.every);
    }
    console.log(`[FAULTS] Mode changed: ${this.mode} -> ${mode}`);
    this.mode = mode;
  }

  getMode(): FaultMode {
    return this.mode;
  }

  shouldFail(site: string): boolean {
    switch (this.mode) {
      case 'none':
        return false;
      case 'complete':
        return true;
      case 'intermittent':
        return this.intermittent.shouldFail();
      case 'periodic':
        return this.periodic.shouldFail();
      default: {
        const unknown: never = this.mode;
        throw new Error(`Unknown fault mode ${String(unknown)} at ${site}`);
      }
    }
  }
}
