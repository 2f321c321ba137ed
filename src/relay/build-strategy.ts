/**
 * Wires the configured strategy and everything it owns
 */

import { AdmissionController } from '../core/admission-controller';
import { ClusterCoordinator } from '../core/cluster-coordinator';
import { NoFaults, PeriodicFaults } from '../core/fault-injector';
import { ProcessingPipeline } from '../core/pipeline';
import { TransformationStage, ValidationStage } from '../core/stages';
import { Supervisor } from '../core/supervisor';
import { RetryBuffer } from '../core/retry-buffer';
import { BreakerStrategy } from './breaker-strategy';
import { ClusterStrategy } from './cluster-strategy';
import { EgressPublisher } from './egress';
import { LoggingPeerLink, type PeerLink } from './peer-link';
import { PipelineStrategy } from './pipeline-strategy';
import type { RelayConfig } from '../config';
import type { MessageTransport, RelayStrategy } from '../types';

export interface StrategyDeps {
  now?: () => number;
  peerLink?: PeerLink;
}

/**
 * Validation then transformation, with the configured synthetic health fault.
 * Every recreated transformation stage gets its own fault counter.
 */
export function buildPipeline(config: RelayConfig, now: () => number = Date.now): ProcessingPipeline {
  const transformation = () =>
    new TransformationStage({
      healthFaults: config.healthFaultEvery > 0 ? new PeriodicFaults(config.healthFaultEvery) : new NoFaults(),
      now,
    });

  const supervisor = new Supervisor(
    {
      validation: () => new ValidationStage(),
      transformation,
    },
    config.stageRestartPolicy
  );

  return new ProcessingPipeline([new ValidationStage(), transformation()], supervisor);
}

export function buildStrategy(
  config: RelayConfig,
  transport: MessageTransport,
  deps: StrategyDeps = {}
): RelayStrategy {
  const now = deps.now ?? Date.now;
  const egress = new EgressPublisher(transport, config.egressTopic);

  switch (config.strategy) {
    case 'breaker':
      return new BreakerStrategy(
        new AdmissionController({
          failureThreshold: config.failureThreshold,
          successThreshold: config.successThreshold,
          resetTimeoutMs: config.resetTimeoutMs,
          now,
        }),
        new RetryBuffer(
          {
            retryIntervalMs: config.retryIntervalMs,
            capacity: config.retryCapacity,
            overflowPolicy: config.retryOverflow,
          },
          now()
        ),
        egress
      );

    case 'pipeline':
      return new PipelineStrategy(buildPipeline(config, now), egress);

    case 'cluster':
      return new ClusterStrategy(
        new ClusterCoordinator({
          nodeId: config.nodeId,
          seedId: config.seedId,
          peers: config.peers,
          leaderCheckEveryCycles: config.leaderCheckEveryCycles,
        }),
        deps.peerLink ?? new LoggingPeerLink(config.nodeId),
        egress,
        buildPipeline(config, now)
      );
  }
}
