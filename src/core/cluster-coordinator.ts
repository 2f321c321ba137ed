/**
 * ClusterCoordinator - Leader/Follower role for one relay node
 *
 * Each node owns its coordinator; nothing is shared between nodes and no
 * message is exchanged to agree on roles. This is a best-effort liveness
 * hint, NOT consensus:
 *
 * - The node whose id equals the seed id starts as LEADER, all others FOLLOWER.
 * - A FOLLOWER assumes the leader has failed every `leaderCheckEveryCycles`
 *   polling cycles and runs an election.
 * - The election walks the static peer list, skipping the seed, and this
 *   node becomes LEADER when it reaches its own id. Every non-seed follower
 *   that runs it therefore promotes itself, and the seed never steps down:
 *   several nodes can be LEADER at once (split-brain). There are no terms,
 *   votes or quorum checks.
 */

export type NodeRole = 'LEADER' | 'FOLLOWER';

export interface ClusterOptions {
  nodeId: string;
  seedId: string;
  peers: string[];
  leaderCheckEveryCycles: number;
}

export interface ClusterSnapshot {
  nodeId: string;
  role: NodeRole;
  leaderHint: string;
  peers: string[];
  cyclesSinceCheck: number;
  elections: number;
}

export class ClusterCoordinator {
  readonly nodeId: string;
  private role: NodeRole;
  private leaderHint: string;
  private readonly seedId: string;
  private readonly peers: readonly string[];
  private readonly leaderCheckEveryCycles: number;
  private cyclesSinceCheck = 0;
  private elections = 0;

  constructor(options: ClusterOptions) {
    if (new Set(options.peers).size !== options.peers.length) {
      throw new Error('Cluster peer ids must be unique');
    }
    if (options.leaderCheckEveryCycles <= 0) {
      throw new Error('leaderCheckEveryCycles must be positive');
    }
    this.nodeId = options.nodeId;
    this.seedId = options.seedId;
    this.peers = [...options.peers];
    this.leaderCheckEveryCycles = options.leaderCheckEveryCycles;
    this.role = options.nodeId === options.seedId ? 'LEADER' : 'FOLLOWER';
    this.leaderHint = options.seedId;

    console.log(`[CLUSTER] ${this.nodeId} starting as ${this.role}`);
  }

  getRole(): NodeRole {
    return this.role;
  }

  isLeader(): boolean {
    return this.role === 'LEADER';
  }

  /**
   * Where this node believes the leader is. Only ever the seed or itself.
   */
  getLeaderHint(): string {
    return this.leaderHint;
  }

  /**
   * Every peer except this node, in configured order
   */
  otherPeers(): string[] {
    return this.peers.filter((peer) => peer !== this.nodeId);
  }

  /**
   * Leader-failure heuristic, called once per polling cycle
   *
   * @returns true when this call ran an election
   */
  tick(): boolean {
    if (this.role === 'LEADER') {
      return false;
    }

    this.cyclesSinceCheck++;
    if (this.cyclesSinceCheck < this.leaderCheckEveryCycles) {
      return false;
    }

    this.cyclesSinceCheck = 0;
    console.warn(`[CLUSTER] ${this.nodeId}: leader ${this.leaderHint} presumed failed, starting election`);
    this.startElection();
    return true;
  }

  /**
   * Fixed-order election; see the module comment for its limits
   */
  startElection(): NodeRole {
    this.elections++;

    for (const peer of this.peers) {
      if (peer === this.seedId) {
        continue;
      }
      if (peer === this.nodeId) {
        this.role = 'LEADER';
        this.leaderHint = this.nodeId;
        console.log(`[CLUSTER] ${this.nodeId} elected as new LEADER`);
        return this.role;
      }
    }

    console.log(`[CLUSTER] ${this.nodeId} remains ${this.role}`);
    return this.role;
  }

  snapshot(): ClusterSnapshot {
    return {
      nodeId: this.nodeId,
      role: this.role,
      leaderHint: this.leaderHint,
      peers: [...this.peers],
      cyclesSinceCheck: this.cyclesSinceCheck,
      elections: this.elections,
    };
  }
}
