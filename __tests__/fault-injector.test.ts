import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NoFaults, PeriodicFaults, RandomFaults, ScriptedFaults, SwitchableFaults } from '../src/core/fault-injector';
import { loadConfig } from '../src/config';
import { FlakyTransport, withDownstreamFaults } from '../src/downstream/flaky-transport';
import { DeliveryError } from '../src/errors';
import { InMemoryBroker, InMemoryTransport } from '../src/transport/in-memory-transport';

const run = (injector: { shouldFail(site: string): boolean }, calls: number) =>
  Array.from({ length: calls }, () => injector.shouldFail('test'));

describe('fault injectors', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fail every Nth call', () => {
    expect(run(new PeriodicFaults(3), 7)).toEqual([false, false, true, false, false, true, false]);
  });

  it('should fail only the scripted calls', () => {
    expect(run(new ScriptedFaults([2, 4]), 5)).toEqual([false, true, false, true, false]);
  });

  it('should fail below the configured rate', () => {
    const rolls = [0.1, 0.5, 0.29];
    const faults = new RandomFaults(0.3, () => rolls.shift() ?? 1);

    expect(run(faults, 4)).toEqual([true, false, true, false]);
  });

  it('should never fail with NoFaults', () => {
    expect(run(new NoFaults(), 3)).toEqual([false, false, false]);
  });

  it('should reject invalid settings', () => {
    expect(() => new PeriodicFaults(0)).toThrow('PeriodicFaults interval must be a positive integer');
    expect(() => new RandomFaults(1.5)).toThrow('RandomFaults rate must be between 0 and 1');
  });

  it('should switch modes at runtime', () => {
    const faults = new SwitchableFaults({ every: 2 });
    expect(run(faults, 2)).toEqual([false, false]);

    faults.setMode('complete');
    expect(run(faults, 2)).toEqual([true, true]);

    faults.setMode('periodic');
    expect(run(faults, 4)).toEqual([false, true, false, true]);
    expect(faults.getMode()).toBe('periodic');
  });

  it('should restart the periodic count when periodic mode is re-entered', () => {
    const faults = new SwitchableFaults({ mode: 'periodic', every: 2 });
    faults.shouldFail('test');

    faults.setMode('none');
    faults.setMode('periodic');

    expect(run(faults, 2)).toEqual([false, true]);
  });
});

describe('FlakyTransport', () => {
  let broker: InMemoryBroker;
  let inner: InMemoryTransport;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    broker = new InMemoryBroker();
    inner = new InMemoryTransport(broker);
    await inner.connect();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should reject the faulted publish and pass the rest through', async () => {
    const flaky = new FlakyTransport(inner, { faults: new ScriptedFaults([2]), random: () => 0.99 });

    await flaky.publish('iot/data', 'one', 1);
    const failed = flaky.publish('iot/data', 'two', 1);
    await expect(failed).rejects.toBeInstanceOf(DeliveryError);
    await expect(failed).rejects.toThrow('Receiver overloaded');
    await flaky.publish('iot/data', 'three', 1);

    expect(broker.published('iot/data')).toEqual(['one', 'three']);
  });

  it('should leave ingress untouched', async () => {
    const flaky = new FlakyTransport(inner, { faults: new SwitchableFaults({ mode: 'complete' }) });
    await flaky.subscribe('iot/input');

    broker.inject('iot/input', 'reading');

    expect(flaky.tryReceive()).toMatchObject({ topic: 'iot/input', payload: 'reading' });
    expect(flaky.isConnected()).toBe(true);
  });

  it('should hold every publish for the configured latency', async () => {
    vi.useFakeTimers();
    try {
      const flaky = new FlakyTransport(inner, { faults: new ScriptedFaults([]), latencyMs: 200 });

      const publish = flaky.publish('iot/data', 'slow', 1);
      await vi.advanceTimersByTimeAsync(199);
      expect(broker.published('iot/data')).toEqual([]);

      await vi.advanceTimersByTimeAsync(1);
      await publish;
      expect(broker.published('iot/data')).toEqual(['slow']);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should wrap the transport only when the configuration degrades the downstream', () => {
    expect(withDownstreamFaults(inner, loadConfig({}))).toBe(inner);
    expect(withDownstreamFaults(inner, loadConfig({ RELAY_DOWNSTREAM_LATENCY_MS: '50' }))).toBeInstanceOf(FlakyTransport);
    expect(withDownstreamFaults(inner, loadConfig({ RELAY_DOWNSTREAM_FAULT_MODE: 'complete' }))).toBeInstanceOf(
      FlakyTransport
    );
  });

  it('should fail every publish in complete mode from configuration', async () => {
    const flaky = withDownstreamFaults(inner, loadConfig({ RELAY_DOWNSTREAM_FAULT_MODE: 'complete' }));

    await expect(flaky.publish('iot/data', 'lost', 1)).rejects.toBeInstanceOf(DeliveryError);
    expect(broker.published('iot/data')).toEqual([]);
  });
});
