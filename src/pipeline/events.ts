import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { PipelineRun, StageResult } from './types.js';

export interface PipelineEventMap {
  'run.started': { run: PipelineRun };
  'stage.finished': { run_id: string; result: StageResult };
  /** Published once per run, after its status is final. */
  'run.completed': {
    run: PipelineRun;
    ref_name: string;
    commit_id: string;
    status: PipelineRun['status'];
  };
}

export type PipelineEventName = keyof PipelineEventMap;
export type PipelineEventHandler<E extends PipelineEventName> = (
  payload: PipelineEventMap[E],
) => void | Promise<void>;

type HandlerRegistry = { [E in PipelineEventName]: Set<PipelineEventHandler<E>> };

/**
 * In-process publish/subscribe between the executor and its subscribers
 * (trigger, notifier, run store). Publishing never waits for or throws from
 * handlers; `drain()` waits until every delivery, including ones started by
 * handlers, has settled.
 */
export class PipelineEventBus {
  private readonly handlers: HandlerRegistry = {
    'run.started': new Set(),
    'stage.finished': new Set(),
    'run.completed': new Set(),
  };
  private readonly inFlight = new Set<Promise<void>>();

  subscribe<E extends PipelineEventName>(event: E, handler: PipelineEventHandler<E>): () => void {
    const set: Set<PipelineEventHandler<E>> = this.handlers[event];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  publish<E extends PipelineEventName>(event: E, payload: PipelineEventMap[E]): void {
    const set: Set<PipelineEventHandler<E>> = this.handlers[event];
    for (const handler of set) {
      const delivery = Promise.resolve()
        .then(() => handler(payload))
        .catch((err: unknown) => {
          logger.error('Event handler failed', { event, error: errorMessage(err) });
        });
      this.inFlight.add(delivery);
      void delivery.finally(() => this.inFlight.delete(delivery));
    }
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
