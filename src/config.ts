/**
 * Configuration for the Fault-Tolerant Relay service
 *
 * Every value comes from an environment variable and falls back to the
 * defaults below. Defaults match the deployed relay variants: 3 failures
 * open the breaker, 2 successes reset it, 10s cool-down, 5s retry cadence.
 */

import { z } from 'zod';
import { ConfigError } from './errors';
import type { OverflowPolicy } from './core/bounded-queue';
import type { FaultMode } from './core/fault-injector';
import type { StrategyName } from './types';

export type RestartPolicy = 'recreate' | 'reuse';

export interface RelayConfig {
  // Transport
  brokerUrl: string;
  clientId: string;
  ingressTopic: string;
  egressTopic: string;
  inboxCapacity: number;
  connectRetries: number;

  // Node
  strategy: StrategyName;
  nodeId: string;
  seedId: string;
  peers: string[];
  pollIntervalMs: number;

  // Admission control
  failureThreshold: number;
  successThreshold: number;
  resetTimeoutMs: number;

  // Retry buffer
  retryIntervalMs: number;
  retryCapacity: number; // 0 = unbounded
  retryOverflow: OverflowPolicy;

  // Pipeline
  healthFaultEvery: number; // 0 disables the synthetic health fault
  stageRestartPolicy: RestartPolicy;

  // Cluster
  leaderCheckEveryCycles: number;

  // Downstream fault simulation
  downstreamFaultMode: FaultMode;
  downstreamFailureRate: number;
  downstreamFaultEvery: number;
  downstreamLatencyMs: number; // added to every egress publish when > 0

  // Status server
  statusPort: number;

  // Run against the in-process broker instead of MQTT
  simulate: boolean;
}

const csv = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
  .pipe(z.array(z.string()).min(1, 'must list at least one id'));

const flag = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  RELAY_BROKER_URL: z.string().url().default('mqtt://localhost:1883'),
  RELAY_CLIENT_ID: z.string().min(1).optional(),
  RELAY_INGRESS_TOPIC: z.string().min(1).default('iot/input'),
  RELAY_EGRESS_TOPIC: z.string().min(1).default('iot/data'),
  RELAY_INBOX_CAPACITY: z.coerce.number().int().positive().default(1000),
  RELAY_CONNECT_RETRIES: z.coerce.number().int().min(0).default(3),

  RELAY_STRATEGY: z.enum(['breaker', 'pipeline', 'cluster']).default('breaker'),
  RELAY_NODE_ID: z.string().min(1).default('node1'),
  RELAY_SEED_ID: z.string().min(1).default('node1'),
  RELAY_PEERS: csv.default('node1,node2,node3'),
  RELAY_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(100),

  RELAY_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),
  RELAY_SUCCESS_THRESHOLD: z.coerce.number().int().positive().default(2),
  RELAY_RESET_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  RELAY_RETRY_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  RELAY_RETRY_CAPACITY: z.coerce.number().int().min(0).default(0),
  RELAY_RETRY_OVERFLOW: z.enum(['drop-oldest', 'drop-newest']).default('drop-oldest'),

  RELAY_HEALTH_FAULT_EVERY: z.coerce.number().int().min(0).default(5),
  RELAY_STAGE_RESTART_POLICY: z.enum(['recreate', 'reuse']).default('recreate'),

  RELAY_LEADER_CHECK_CYCLES: z.coerce.number().int().positive().default(10),

  RELAY_DOWNSTREAM_FAULT_MODE: z.enum(['none', 'intermittent', 'complete', 'periodic']).default('none'),
  RELAY_DOWNSTREAM_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.3),
  RELAY_DOWNSTREAM_FAULT_EVERY: z.coerce.number().int().positive().default(5),
  RELAY_DOWNSTREAM_LATENCY_MS: z.coerce.number().int().min(0).default(0),

  RELAY_STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  RELAY_SIMULATE: flag.default('false'),
});

/**
 * Build the relay configuration from an environment map
 *
 * @param env - Usually process.env; tests pass a plain object
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  // Empty strings count as unset so `RELAY_X=` falls back to the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('RELAY_') && value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;

  if (e.RELAY_INGRESS_TOPIC === e.RELAY_EGRESS_TOPIC) {
    throw new ConfigError([`RELAY_EGRESS_TOPIC: must differ from the ingress topic (${e.RELAY_INGRESS_TOPIC})`]);
  }

  if (e.RELAY_STRATEGY === 'cluster' && !e.RELAY_PEERS.includes(e.RELAY_NODE_ID)) {
    throw new ConfigError([`RELAY_NODE_ID: ${e.RELAY_NODE_ID} is not listed in RELAY_PEERS`]);
  }

  return {
    brokerUrl: e.RELAY_BROKER_URL,
    clientId: e.RELAY_CLIENT_ID ?? `relay-${e.RELAY_STRATEGY}-${e.RELAY_NODE_ID}`,
    ingressTopic: e.RELAY_INGRESS_TOPIC,
    egressTopic: e.RELAY_EGRESS_TOPIC,
    inboxCapacity: e.RELAY_INBOX_CAPACITY,
    connectRetries: e.RELAY_CONNECT_RETRIES,

    strategy: e.RELAY_STRATEGY,
    nodeId: e.RELAY_NODE_ID,
    seedId: e.RELAY_SEED_ID,
    peers: e.RELAY_PEERS,
    pollIntervalMs: e.RELAY_POLL_INTERVAL_MS,

    failureThreshold: e.RELAY_FAILURE_THRESHOLD,
    successThreshold: e.RELAY_SUCCESS_THRESHOLD,
    resetTimeoutMs: e.RELAY_RESET_TIMEOUT_MS,

    retryIntervalMs: e.RELAY_RETRY_INTERVAL_MS,
    retryCapacity: e.RELAY_RETRY_CAPACITY,
    retryOverflow: e.RELAY_RETRY_OVERFLOW,

    healthFaultEvery: e.RELAY_HEALTH_FAULT_EVERY,
    stageRestartPolicy: e.RELAY_STAGE_RESTART_POLICY,

    leaderCheckEveryCycles: e.RELAY_LEADER_CHECK_CYCLES,

    downstreamFaultMode: e.RELAY_DOWNSTREAM_FAULT_MODE,
    downstreamFailureRate: e.RELAY_DOWNSTREAM_FAILURE_RATE,
    downstreamFaultEvery: e.RELAY_DOWNSTREAM_FAULT_EVERY,
    downstreamLatencyMs: e.RELAY_DOWNSTREAM_LATENCY_MS,

    statusPort: e.RELAY_STATUS_PORT,
    simulate: e.RELAY_SIMULATE,
  };
}
