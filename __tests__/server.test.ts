import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { loadConfig } from '../src/config';
import { buildStrategy } from '../src/relay/build-strategy';
import { RelayNode } from '../src/relay/relay-node';
import { createStatusApp, startStatusServer } from '../src/server';
import { InMemoryTransport } from '../src/transport/in-memory-transport';

describe('status server', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const transport = new InMemoryTransport();
    await transport.connect();
    const config = loadConfig({ RELAY_STRATEGY: 'pipeline', RELAY_NODE_ID: 'node2' });
    const node = new RelayNode(transport, buildStrategy(config, transport), { nodeId: 'node2', pollIntervalMs: 100 });

    server = await startStatusServer(createStatusApp(node), 0);
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('status server is not bound to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    vi.restoreAllMocks();
  });

  it('should report a node that has not started polling as stopped', async () => {
    const response = await fetch(`${baseUrl}/health`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'stopped', nodeId: 'node2' });
  });

  it('should expose the strategy state and counters', async () => {
    const response = await fetch(`${baseUrl}/status`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({
      nodeId: 'node2',
      strategy: 'pipeline',
      running: false,
      transportConnected: true,
      stats: { cycles: 0, received: 0 },
      state: { pipeline: { stages: ['validation', 'transformation'], restartPolicy: 'recreate' } },
    });
  });
});
