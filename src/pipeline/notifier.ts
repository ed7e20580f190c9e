import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ChangeRequestHost } from '../collaborators/types.js';
import type { PipelineEventBus } from './events.js';
import { renderRun } from './reporter.js';
import type { PipelineRun } from './types.js';

export type NotifyOutcome = 'posted' | 'no-change-request' | 'gone' | 'error';

/**
 * Posts one status comment per completed run, pass or fail, to the run's
 * change request. Delivery problems are logged and never reach the pipeline.
 */
export class StatusNotifier {
  constructor(private readonly changeRequests: ChangeRequestHost) {}

  attach(bus: PipelineEventBus): () => void {
    return bus.subscribe('run.completed', async ({ run }) => {
      await this.notify(run);
    });
  }

  async notify(run: PipelineRun): Promise<NotifyOutcome> {
    const log = logger.child({ run_id: run.run_id });
    const repo = run.trigger.repository;
    try {
      let number = run.trigger.change_request;
      if (number === undefined) {
        const found = await this.changeRequests.findOpenByHeadCommit(repo, run.trigger.commit_id);
        number = found?.number;
      }
      if (number === undefined) {
        log.info('No open change request for commit; status not posted', { commit: run.trigger.commit_id });
        return 'no-change-request';
      }

      const posted = await this.changeRequests.postComment(repo, number, renderRun(run));
      if (!posted) return 'gone';
      log.info('Status posted', { change_request: number, status: run.status });
      return 'posted';
    } catch (err) {
      log.warn('Status delivery failed', { error: errorMessage(err) });
      return 'error';
    }
  }
}
