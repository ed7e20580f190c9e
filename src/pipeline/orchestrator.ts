import { CachedChangeRequests } from '../collaborators/cached-change-requests.js';
import type { Collaborators } from '../collaborators/types.js';
import { imageCoordinates } from '../workspace/config.js';
import type { ShiplineConfig } from '../workspace/types.js';
import { buildCdPipeline, buildCiPipeline } from './definitions.js';
import { PipelineEventBus } from './events.js';
import { executePipeline } from './executor.js';
import { buildStageGraph } from './graph.js';
import { StatusNotifier } from './notifier.js';
import { RunStore } from './run-store.js';
import { StageRunner } from './stage-runner.js';
import { CrossPipelineTrigger } from './trigger.js';
import type { DeploymentCheck, PipelineDefinition, PipelineRun, TriggerContext } from './types.js';
import { DeploymentVerifier } from './verifier.js';

/** Pipelines that only pull published images need no checkout. */
function needsSource(pipeline: PipelineDefinition): boolean {
  return pipeline.stages.some((stage) => stage.kind !== 'deploy-verify' && stage.kind !== 'security-scan');
}

export interface ReleaseOrchestratorOptions {
  config: ShiplineConfig;
  collaborators: Collaborators;
  /** Working directory for stage commands when no source checkout is configured. */
  cwd?: string;
  runStore?: RunStore;
  now?: () => Date;
}

/**
 * Wires the CI and CD pipelines together through the event bus:
 * the run store records every run, the notifier reports every completion,
 * and the trigger starts CD after a successful CI run.
 */
export class ReleaseOrchestrator {
  readonly events = new PipelineEventBus();
  readonly runs: RunStore;
  readonly ci: PipelineDefinition;
  readonly cd: PipelineDefinition | null;
  private readonly runner: StageRunner;
  private readonly verifier: DeploymentVerifier;

  constructor(private readonly opts: ReleaseOrchestratorOptions) {
    const { config, collaborators } = opts;
    const image = imageCoordinates(config);

    this.ci = buildCiPipeline(config);
    this.cd = config.cd.enabled ? buildCdPipeline(config) : null;
    // Fail fast on a malformed graph, before any event arrives
    buildStageGraph(this.ci.stages);
    if (this.cd) buildStageGraph(this.cd.stages);

    this.verifier = new DeploymentVerifier(collaborators.registry, collaborators.sandbox, {
      image,
      timeoutMs: config.cd.timeout_ms ?? config.execution.default_timeout_ms,
      now: opts.now,
    });
    this.runner = new StageRunner(
      {
        commands: collaborators.commands,
        registry: collaborators.registry,
        scanner: collaborators.scanner,
        verifier: this.verifier,
      },
      { image, defaultTimeoutMs: config.execution.default_timeout_ms, cwd: opts.cwd, now: opts.now },
    );

    this.runs = opts.runStore ?? new RunStore();
    this.runs.attach(this.events);
    const changeRequests = new CachedChangeRequests(collaborators.changeRequests);
    new StatusNotifier(changeRequests).attach(this.events);
    if (this.cd) {
      new CrossPipelineTrigger({
        upstreamPipelineId: this.ci.id,
        downstream: this.cd,
        changeRequests,
        start: (pipeline, trigger) => this.runPipeline(pipeline, trigger),
      }).attach(this.events);
    }
  }

  startCi(trigger: TriggerContext): Promise<PipelineRun> {
    return this.runPipeline(this.ci, trigger);
  }

  runPipeline(pipeline: PipelineDefinition, trigger: TriggerContext, runId?: string): Promise<PipelineRun> {
    const publicUrl = this.opts.config.server.public_url?.replace(/\/+$/, '');
    return executePipeline(pipeline, trigger, {
      runner: this.runner,
      runId,
      concurrency: this.opts.config.execution.concurrency,
      events: this.events,
      runUrl: publicUrl ? (id) => `${publicUrl}/v1/runs/${id}` : undefined,
      source: needsSource(pipeline) ? this.opts.collaborators.source : undefined,
      now: this.opts.now,
    });
  }

  verify(refName: string, commitId: string): Promise<DeploymentCheck> {
    return this.verifier.verify(refName, commitId);
  }

  /** Resolves once every completion handler (reports, downstream runs) has settled. */
  idle(): Promise<void> {
    return this.events.drain();
  }
}
