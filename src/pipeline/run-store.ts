import type { PipelineEventBus } from './events.js';
import type { PipelineRun } from './types.js';

const DEFAULT_CAPACITY = 200;

/**
 * Runs seen by this process, newest last. Nothing survives a restart;
 * the oldest run is dropped once capacity is reached.
 */
export class RunStore {
  private readonly runs = new Map<string, PipelineRun>();

  constructor(private readonly capacity: number = DEFAULT_CAPACITY) {}

  attach(bus: PipelineEventBus): () => void {
    const offStarted = bus.subscribe('run.started', ({ run }) => this.put(run));
    const offCompleted = bus.subscribe('run.completed', ({ run }) => this.put(run));
    return () => {
      offStarted();
      offCompleted();
    };
  }

  put(run: PipelineRun): void {
    this.runs.delete(run.run_id);
    this.runs.set(run.run_id, run);
    while (this.runs.size > this.capacity) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
    }
  }

  get(runId: string): PipelineRun | undefined {
    return this.runs.get(runId);
  }

  /** Newest first. */
  list(limit = 50, offset = 0): PipelineRun[] {
    return [...this.runs.values()].reverse().slice(offset, offset + limit);
  }

  /** Runs started by the given upstream run, e.g. the deployment run after CI. */
  downstreamOf(runId: string): PipelineRun[] {
    return [...this.runs.values()].filter((run) => run.trigger.upstream?.run_id === runId);
  }
}
