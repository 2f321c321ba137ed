/**
 * Fault-Tolerant Relay - process entry point
 *
 * Reads the environment, connects to the broker (or the in-process one when
 * RELAY_SIMULATE=true), starts the polling loop and the status server, and
 * shuts everything down on SIGTERM/SIGINT.
 */

import type { Server } from 'http';
import { loadConfig, type RelayConfig } from './config';
import { retryWithBackoff } from './core/retry-manager';
import { withDownstreamFaults } from './downstream/flaky-transport';
import { errorMessage } from './errors';
import { buildStrategy } from './relay/build-strategy';
import { RelayNode } from './relay/relay-node';
import { createStatusApp, startStatusServer } from './server';
import { SensorSimulator } from './simulation/sensor-simulator';
import { InMemoryBroker, InMemoryTransport } from './transport/in-memory-transport';
import { MqttTransport } from './transport/mqtt-transport';
import type { MessageTransport } from './types';

interface Runtime {
  transport: MessageTransport;
  simulator?: SensorSimulator;
}

function createTransport(config: RelayConfig, onConnectionChange: (connected: boolean) => void): Runtime {
  let transport: MessageTransport;
  let simulator: SensorSimulator | undefined;

  if (config.simulate) {
    const broker = new InMemoryBroker();
    transport = new InMemoryTransport(broker, config.inboxCapacity);
    simulator = new SensorSimulator(broker, config.ingressTopic);
  } else {
    transport = new MqttTransport({
      brokerUrl: config.brokerUrl,
      clientId: config.clientId,
      inboxCapacity: config.inboxCapacity,
      onConnectionChange,
    });
  }

  return { transport: withDownstreamFaults(transport, config), simulator };
}

async function main(): Promise<void> {
  const config = loadConfig();

  // Transport callbacks may fire before the node exists; they are applied once it does
  let node: RelayNode | undefined;
  const { transport, simulator } = createTransport(config, (connected) => {
    node?.onTransportStateChange(connected).catch((error: unknown) => {
      console.error('[RELAY] Failed to record transport state:', errorMessage(error));
    });
  });

  const connected = await retryWithBackoff(
    async () => {
      if (!transport.isConnected()) {
        await transport.connect();
      }
      await transport.subscribe(config.ingressTopic);
    },
    {
      maxRetries: config.connectRetries,
      initialDelayMs: 500,
      maxDelayMs: 10_000,
      timeoutMs: 25_000,
      label: `connect ${config.simulate ? 'in-memory broker' : config.brokerUrl}`,
    }
  );
  if (!connected.success) {
    throw new Error(`Could not reach broker: ${connected.error}`);
  }

  node = new RelayNode(transport, buildStrategy(config, transport), {
    nodeId: config.nodeId,
    pollIntervalMs: config.pollIntervalMs,
  });

  const server: Server = await startStatusServer(createStatusApp(node), config.statusPort);

  console.log(`
Fault-Tolerant Relay Started
------------------------------------
  Node:       ${config.nodeId}
  Strategy:   ${config.strategy}
  Broker:     ${config.simulate ? 'in-memory (simulation)' : config.brokerUrl}
  Ingress:    ${config.ingressTopic}
  Egress:     ${config.egressTopic} (QoS 1)
  Downstream: fault mode ${config.downstreamFaultMode}, +${config.downstreamLatencyMs}ms latency
  Status:     http://localhost:${config.statusPort}/status
------------------------------------
  `);

  simulator?.start();
  const loop = node.start();

  const shutdown = async (signal: string) => {
    console.log(`[SERVER] ${signal} received, shutting down gracefully`);
    simulator?.stop();
    await node?.stop();
    await transport.disconnect();
    server.close(() => {
      console.log('[SERVER] Server closed');
      process.exit(0);
    });
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('[SERVER] Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
    });
  }

  await loop;
}

main().catch((error: unknown) => {
  console.error('[SERVER] Fatal:', errorMessage(error));
  process.exit(1);
});
