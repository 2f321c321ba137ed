import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('should fall back to the deployed defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      brokerUrl: 'mqtt://localhost:1883',
      clientId: 'relay-breaker-node1',
      ingressTopic: 'iot/input',
      egressTopic: 'iot/data',
      strategy: 'breaker',
      peers: ['node1', 'node2', 'node3'],
      failureThreshold: 3,
      successThreshold: 2,
      resetTimeoutMs: 10_000,
      retryIntervalMs: 5_000,
      retryCapacity: 0,
      retryOverflow: 'drop-oldest',
      healthFaultEvery: 5,
      stageRestartPolicy: 'recreate',
      leaderCheckEveryCycles: 10,
      downstreamFaultMode: 'none',
      simulate: false,
    });
  });

  it('should read overrides and coerce numbers', () => {
    const config = loadConfig({
      RELAY_STRATEGY: 'cluster',
      RELAY_NODE_ID: 'node2',
      RELAY_PEERS: 'node1, node2 ,node3',
      RELAY_FAILURE_THRESHOLD: '5',
      RELAY_SIMULATE: '1',
    });

    expect(config.strategy).toBe('cluster');
    expect(config.clientId).toBe('relay-cluster-node2');
    expect(config.peers).toEqual(['node1', 'node2', 'node3']);
    expect(config.failureThreshold).toBe(5);
    expect(config.simulate).toBe(true);
  });

  it('should ignore variables outside the RELAY_ prefix', () => {
    expect(loadConfig({ PATH: '/usr/bin', RELAY_CLIENT_ID: 'custom' }).clientId).toBe('custom');
  });

  it('should treat an empty value as unset', () => {
    expect(loadConfig({ RELAY_RESET_TIMEOUT_MS: '' }).resetTimeoutMs).toBe(10_000);
  });

  it('should name the offending key when a value is invalid', () => {
    const error = configError({ RELAY_FAILURE_THRESHOLD: 'three' });

    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.startsWith('RELAY_FAILURE_THRESHOLD: ')).toBe(true);
  });

  it('should reject an unknown strategy', () => {
    expect(configError({ RELAY_STRATEGY: 'gossip' }).issues[0]?.startsWith('RELAY_STRATEGY: ')).toBe(true);
  });

  it('should refuse to relay a topic onto itself', () => {
    const error = configError({ RELAY_INGRESS_TOPIC: 'iot/data' });

    expect(error.issues).toEqual(['RELAY_EGRESS_TOPIC: must differ from the ingress topic (iot/data)']);
  });

  it('should require a cluster node to be one of the peers', () => {
    const error = configError({ RELAY_STRATEGY: 'cluster', RELAY_NODE_ID: 'node9' });

    expect(error.message).toBe('Invalid configuration: RELAY_NODE_ID: node9 is not listed in RELAY_PEERS');
  });
});
