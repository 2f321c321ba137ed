/**
 * ProcessingPipeline - Ordered stage traversal with fail-fast semantics
 *
 * The output of stage i is the input of stage i+1. The first stage that
 * throws aborts the traversal; the caller drops the message (it is not
 * buffered or retried) and logs the error.
 *
 * healthSweep() runs once per polling cycle and swaps every unhealthy stage
 * for the supervisor's replacement, in place, so the next message already
 * sees the new instance.
 */

import { ProcessingError, errorMessage } from '../errors';
import type { PipelineStage } from './stages';
import type { Supervisor } from './supervisor';

export class ProcessingPipeline {
  private readonly stages: PipelineStage[];

  constructor(stages: PipelineStage[], private readonly supervisor: Supervisor) {
    if (stages.length === 0) {
      throw new Error('Pipeline needs at least one stage');
    }
    this.stages = [...stages];
  }

  /**
   * Feed input through every stage in order
   *
   * @throws ProcessingError (or ValidationError) from the failing stage
   */
  run(input: string): string {
    let current = input;
    for (const stage of this.stages) {
      try {
        current = stage.process(current);
      } catch (error) {
        if (error instanceof ProcessingError) {
          throw error;
        }
        throw new ProcessingError(stage.kind, errorMessage(error), { cause: error });
      }
    }
    return current;
  }

  /**
   * Replace every stage that reports unhealthy
   *
   * @returns number of stages replaced
   */
  healthSweep(): number {
    let replaced = 0;
    for (let i = 0; i < this.stages.length; i++) {
      const stage = this.stages[i];
      if (!stage.isHealthy()) {
        console.warn(`[PIPELINE] ${stage.kind} stage unhealthy, restarting...`);
        this.stages[i] = this.supervisor.restartStage(stage);
        replaced++;
      }
    }
    return replaced;
  }

  /**
   * Current stage instances, in traversal order
   */
  getStages(): readonly PipelineStage[] {
    return this.stages;
  }

  snapshot(): Record<string, unknown> {
    return {
      stages: this.stages.map((stage) => stage.kind),
      restartPolicy: this.supervisor.getPolicy(),
      restarts: this.supervisor.getRestartCounts(),
    };
  }
}
