/**
 * Cross-Pipeline Trigger — starts the downstream pipeline when the designated
 * upstream pipeline completes successfully, bound to the same ref and commit.
 * Subscribes to the event bus; the upstream executor never knows about it.
 */
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ChangeRequestHost } from '../collaborators/types.js';
import type { PipelineEventBus } from './events.js';
import type { PipelineDefinition, PipelineRun, TriggerContext } from './types.js';

export interface CrossPipelineTriggerOptions {
  upstreamPipelineId: string;
  downstream: PipelineDefinition;
  changeRequests: ChangeRequestHost;
  start: (pipeline: PipelineDefinition, trigger: TriggerContext) => Promise<PipelineRun>;
}

export class CrossPipelineTrigger {
  constructor(private readonly opts: CrossPipelineTriggerOptions) {}

  attach(bus: PipelineEventBus): () => void {
    return bus.subscribe('run.completed', async ({ run }) => {
      await this.onCompletion(run);
    });
  }

  async onCompletion(run: PipelineRun): Promise<PipelineRun | null> {
    if (run.pipeline_id !== this.opts.upstreamPipelineId) return null;
    if (run.pipeline_id === this.opts.downstream.id) return null;
    if (run.status !== 'success') {
      logger.info('Upstream run did not succeed; downstream not started', {
        run_id: run.run_id,
        status: run.status,
      });
      return null;
    }

    const changeRequest = await this.resolveChangeRequest(run);
    const trigger: TriggerContext = {
      repository: run.trigger.repository,
      ref_name: run.trigger.ref_name,
      commit_id: run.trigger.commit_id,
      event: 'pipeline',
      ...(changeRequest !== null ? { change_request: changeRequest } : {}),
      upstream: { run_id: run.run_id, pipeline_id: run.pipeline_id },
    };

    logger.info('Starting downstream pipeline', {
      upstream_run_id: run.run_id,
      pipeline: this.opts.downstream.id,
      change_request: changeRequest,
    });
    return this.opts.start(this.opts.downstream, trigger);
  }

  /** The completion event may not carry the pull request; look it up by head commit. */
  private async resolveChangeRequest(run: PipelineRun): Promise<number | null> {
    if (run.trigger.change_request !== undefined) return run.trigger.change_request;
    try {
      const found = await this.opts.changeRequests.findOpenByHeadCommit(run.trigger.repository, run.trigger.commit_id);
      return found?.number ?? null;
    } catch (err) {
      logger.warn('Change request lookup failed', { run_id: run.run_id, error: errorMessage(err) });
      return null;
    }
  }
}
