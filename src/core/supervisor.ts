/**
 * Supervisor - Replaces unhealthy pipeline stages
 *
 * Restart policies:
 * - 'recreate': build a fresh instance from the factory registered for the
 *   stage's kind; the replacement starts with clean state
 * - 'reuse':    hand back the same instance untouched (a no-op restart)
 *
 * A 'recreate' supervisor asked to restart a kind it has no factory for
 * falls back to 'reuse' for that stage and says so in the log.
 */

import type { PipelineStage, StageKind } from './stages';
import type { RestartPolicy } from '../config';

export type StageFactories = Partial<Record<StageKind, () => PipelineStage>>;

export class Supervisor {
  private readonly restarts = new Map<StageKind, number>();

  constructor(
    private readonly factories: StageFactories,
    private readonly policy: RestartPolicy = 'recreate'
  ) {}

  restartStage(stage: PipelineStage): PipelineStage {
    this.restarts.set(stage.kind, (this.restarts.get(stage.kind) ?? 0) + 1);

    if (this.policy === 'reuse') {
      console.log(`[SUPERVISOR] Restarting ${stage.kind} stage (reusing instance)`);
      return stage;
    }

    const factory = this.factories[stage.kind];
    if (!factory) {
      console.warn(`[SUPERVISOR] No factory for ${stage.kind} stage, keeping existing instance`);
      return stage;
    }

    console.log(`[SUPERVISOR] Restarting ${stage.kind} stage (fresh instance)`);
    return factory();
  }

  getPolicy(): RestartPolicy {
    return this.policy;
  }

  getRestartCounts(): Record<string, number> {
    return Object.fromEntries(this.restarts);
  }
}
