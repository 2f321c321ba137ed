/**
 * Cluster strategy - route through the leader
 *
 * LEADER: process the payload (through the pipeline when one is configured,
 * as-is otherwise), announce a replication event to every other peer, then
 * publish downstream.
 * FOLLOWER: hand the payload to the leader it believes in.
 *
 * A peer that cannot be reached is reported as a CoordinationError. During
 * replication that is logged and the leader carries on; while forwarding to
 * the leader it drops the message. Maintenance runs the leader-failure
 * heuristic and, with a pipeline, its health sweep.
 */

import { CoordinationError, ProcessingError, errorMessage } from '../errors';
import type { ClusterCoordinator } from '../core/cluster-coordinator';
import type { ProcessingPipeline } from '../core/pipeline';
import type { EgressPublisher } from './egress';
import type { PeerLink } from './peer-link';
import type { RelayOutcome, RelayStrategy } from '../types';

export class ClusterStrategy implements RelayStrategy {
  readonly name = 'cluster' as const;

  constructor(
    private readonly coordinator: ClusterCoordinator,
    private readonly peerLink: PeerLink,
    private readonly egress: EgressPublisher,
    private readonly pipeline?: ProcessingPipeline
  ) {}

  async handle(payload: string): Promise<RelayOutcome> {
    if (!this.coordinator.isLeader()) {
      return this.forwardToLeader(payload);
    }

    console.log(`[CLUSTER] Leader processing: ${payload}`);

    let processed = payload;
    if (this.pipeline) {
      try {
        processed = this.pipeline.run(payload);
      } catch (error) {
        if (error instanceof ProcessingError) {
          console.error(`[CLUSTER] ${error.name} in ${error.stage} stage, message dropped: ${error.message}`);
          return { status: 'dropped', reason: error.message };
        }
        throw error;
      }
    }

    for (const peer of this.coordinator.otherPeers()) {
      try {
        await this.peerLink.replicate(peer, processed);
      } catch (error) {
        const failure = new CoordinationError(peer, `Replication to ${peer} failed: ${errorMessage(error)}`, {
          cause: error,
        });
        console.error(`[CLUSTER] ${failure.message}`);
      }
    }

    try {
      await this.egress.publish(processed);
      return { status: 'forwarded' };
    } catch (error) {
      console.error('[CLUSTER] Delivery failed, message dropped:', errorMessage(error));
      return { status: 'dropped', reason: errorMessage(error) };
    }
  }

  async maintain(): Promise<void> {
    this.coordinator.tick();
    this.pipeline?.healthSweep();
  }

  snapshot(): Record<string, unknown> {
    return {
      cluster: this.coordinator.snapshot(),
      pipeline: this.pipeline?.snapshot() ?? null,
    };
  }

  private async forwardToLeader(payload: string): Promise<RelayOutcome> {
    const leader = this.coordinator.getLeaderHint();
    try {
      await this.peerLink.forwardToLeader(leader, payload);
      return { status: 'routed', to: leader };
    } catch (error) {
      const failure = new CoordinationError(leader, `Leader ${leader} unreachable: ${errorMessage(error)}`, {
        cause: error,
      });
      console.error(`[CLUSTER] ${failure.message}, message dropped`);
      return { status: 'dropped', reason: failure.message };
    }
  }
}
