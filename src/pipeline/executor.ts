/**
 * Pipeline Graph Executor — runs a stage DAG for one commit.
 *
 * Stages whose direct upstreams have all finished are gated, then started in
 * declaration order while the worker pool has room. After a blocking failure,
 * in-flight stages finish but nothing new starts. With a source checkout the
 * run works in its own copy of the commit, removed once the last stage ends.
 * Always resolves with a complete, frozen PipelineRun.
 */
import { generateId } from '../shared/ids.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SourceCheckout } from '../collaborators/types.js';
import type { PipelineEventBus } from './events.js';
import { evaluateGate } from './gate.js';
import { buildStageGraph } from './graph.js';
import type {
  ArtifactTags,
  PipelineDefinition,
  PipelineRun,
  StageContext,
  StageDefinition,
  StageResult,
  TriggerContext,
} from './types.js';

export interface StageExecutor {
  run(stage: StageDefinition, ctx: StageContext): Promise<StageResult>;
}

export interface ExecutorOptions {
  runner: StageExecutor;
  /** Maximum stages in flight at once. */
  concurrency?: number;
  events?: PipelineEventBus;
  runId?: string;
  /** Link to the run's status page, used by reports. */
  runUrl?: (runId: string) => string;
  /** Checks out the trigger's commit for this run alone; stages then work inside it. */
  source?: SourceCheckout;
  now?: () => Date;
}

const DEFAULT_CONCURRENCY = 4;

function publishedTags(results: Iterable<StageResult>): ArtifactTags | null {
  for (const result of results) {
    if (result.status === 'success' && result.payload?.kind === 'publish') {
      return result.payload.tags;
    }
  }
  return null;
}

export function finalizeRun(run: PipelineRun): PipelineRun {
  Object.freeze(run.stages);
  Object.freeze(run.trigger);
  return Object.freeze(run);
}

export async function executePipeline(
  pipeline: PipelineDefinition,
  trigger: TriggerContext,
  opts: ExecutorOptions,
): Promise<PipelineRun> {
  // Throws PipelineDefinitionError before anything runs
  const graph = buildStageGraph(pipeline.stages);
  const now = opts.now ?? (() => new Date());
  const concurrency = Math.max(1, opts.concurrency ?? DEFAULT_CONCURRENCY);
  const runId = opts.runId ?? generateId();
  const log = logger.child({ run_id: runId, pipeline: pipeline.id });

  const run: PipelineRun = {
    run_id: runId,
    pipeline_id: pipeline.id,
    pipeline_name: pipeline.name,
    trigger: { ...trigger },
    status: 'pending',
    stages: [],
    tags: null,
    url: opts.runUrl ? opts.runUrl(runId) : null,
    started_at: now().toISOString(),
    ended_at: null,
  };
  opts.events?.publish('run.started', { run });
  log.info('Run started', { ref: trigger.ref_name, commit: trigger.commit_id, stages: graph.order.length });

  let workdir: string | undefined;
  let checkoutError: string | null = null;
  if (opts.source) {
    try {
      workdir = await opts.source.prepare(run.trigger.commit_id, runId);
      log.info('Source checked out', { workdir });
    } catch (err) {
      checkoutError = `source checkout failed: ${errorMessage(err)}`;
      log.error('Source checkout failed', { error: checkoutError });
    }
  }

  const results = new Map<string, StageResult>();
  const inFlight = new Map<string, Promise<void>>();
  let pending = [...graph.order];
  let halted = false;

  const record = (result: StageResult) => {
    results.set(result.stage, result);
    run.stages.push(result);
    if (result.policy === 'blocking' && result.status === 'failure') {
      if (!halted) log.warn('Blocking stage failed; no new stages will start', { stage: result.stage });
      halted = true;
    }
    opts.events?.publish('stage.finished', { run_id: runId, result });
  };

  const skip = (stage: StageDefinition, reason: string) => {
    const at = now().toISOString();
    record({
      stage: stage.name,
      kind: stage.kind,
      policy: stage.policy,
      status: 'skipped',
      reason,
      started_at: null,
      finished_at: at,
    });
  };

  const start = (stage: StageDefinition) => {
    const ctx: StageContext = {
      run_id: runId,
      trigger: run.trigger,
      published: publishedTags(results.values()),
      ...(workdir !== undefined ? { workdir } : {}),
    };
    const task = Promise.resolve()
      .then(() => opts.runner.run(stage, ctx))
      .catch((err: unknown): StageResult => ({
        stage: stage.name,
        kind: stage.kind,
        policy: stage.policy,
        status: 'failure',
        failure: 'infrastructure',
        error: errorMessage(err),
        started_at: null,
        finished_at: now().toISOString(),
      }))
      .then((result) => {
        inFlight.delete(stage.name);
        record(result);
      });
    inFlight.set(stage.name, task);
  };

  if (checkoutError !== null) {
    const at = now().toISOString();
    for (const stage of pipeline.stages) {
      record({
        stage: stage.name,
        kind: stage.kind,
        policy: stage.policy,
        status: 'failure',
        failure: 'infrastructure',
        error: checkoutError,
        started_at: null,
        finished_at: at,
      });
    }
    pending = [];
  }

  for (;;) {
    const waiting: string[] = [];
    for (const name of pending) {
      const node = graph.nodes.get(name);
      if (!node) continue;
      const { stage } = node;
      const upstream = stage.needs.map((dep) => results.get(dep));
      const settled = upstream.filter((r): r is StageResult => r !== undefined);
      if (settled.length < upstream.length) {
        waiting.push(name);
        continue;
      }

      const decision = evaluateGate(stage, settled, { halted });
      if (decision.action === 'fail-pipeline') {
        halted = true;
        skip(stage, decision.reason);
      } else if (decision.action === 'skip') {
        skip(stage, decision.reason);
      } else if (inFlight.size < concurrency) {
        start(stage);
      } else {
        waiting.push(name);
      }
    }
    pending = waiting;

    if (inFlight.size === 0) break;
    await Promise.race(inFlight.values());
  }

  // Unreachable for a valid DAG; recorded so the run stays complete
  for (const name of pending) {
    const node = graph.nodes.get(name);
    if (node) skip(node.stage, 'upstream never completed');
  }

  if (opts.source && workdir !== undefined) {
    try {
      await opts.source.release(workdir);
    } catch (err) {
      log.warn('Could not remove checkout', { workdir, error: errorMessage(err) });
    }
  }

  const ordered = pipeline.stages
    .map((stage) => results.get(stage.name))
    .filter((r): r is StageResult => r !== undefined);
  const blockingOk = ordered.filter((r) => r.policy === 'blocking').every((r) => r.status === 'success');

  run.stages = ordered;
  run.tags = publishedTags(ordered);
  run.status = blockingOk ? 'success' : 'failed';
  run.ended_at = now().toISOString();
  const final = finalizeRun(run);

  log.info('Run completed', { status: final.status });
  opts.events?.publish('run.completed', {
    run: final,
    ref_name: final.trigger.ref_name,
    commit_id: final.trigger.commit_id,
    status: final.status,
  });
  return final;
}
