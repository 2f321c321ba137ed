/**
 * How a node talks to its peers.
 *
 * The cluster relay only announces intent: a leader tells each peer about a
 * replication event and a follower hands its payload to the leader. No
 * acknowledgement is awaited beyond the returned promise.
 */
export interface PeerLink {
  replicate(peerId: string, payload: string): Promise<void>;
  forwardToLeader(leaderId: string, payload: string): Promise<void>;
}

/**
 * Logs what would be sent and sends nothing
 */
export class LoggingPeerLink implements PeerLink {
  constructor(private readonly nodeId: string) {}

  async replicate(peerId: string, payload: string): Promise<void> {
    console.log(`[CLUSTER] ${this.nodeId}: replicating to ${peerId} (${Buffer.byteLength(payload, 'utf8')} bytes)`);
  }

  async forwardToLeader(leaderId: string, payload: string): Promise<void> {
    console.log(`[CLUSTER] ${this.nodeId}: forwarding to leader ${leaderId}: ${payload}`);
  }
}
