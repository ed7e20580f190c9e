import { join } from 'node:path';
import { ArtifactNotFoundError, CollaboratorError, errorMessage } from '../shared/errors.js';
import type { FailureKind } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { CommandRunner, Registry, Scanner } from '../collaborators/types.js';
import { severitiesAtOrAbove } from '../collaborators/trivy.js';
import { meetsThreshold } from './gate.js';
import { imageReference, resolveArtifactTags } from './tags.js';
import type { DeploymentVerifier } from './verifier.js';
import {
  SEVERITY_ORDER,
  type BuildStage,
  type CoverageStage,
  type Finding,
  type ImageCoordinates,
  type ScanStage,
  type Severity,
  type StageContext,
  type StageDefinition,
  type StagePayload,
  type StageResult,
  type TestCounts,
  type TestStage,
} from './types.js';

export interface StageRunnerDeps {
  commands: CommandRunner;
  registry: Registry;
  scanner: Scanner;
  verifier: DeploymentVerifier;
}

export interface StageRunnerOptions {
  image: ImageCoordinates;
  defaultTimeoutMs: number;
  cwd?: string;
  now?: () => Date;
}

type Outcome = Pick<StageResult, 'status' | 'failure' | 'error' | 'payload'>;

const OUTPUT_TAIL_LINES = 30;

/**
 * Resolve {{name}} placeholders in a command argument.
 * Unknown names are left as-is.
 */
export function resolveTemplate(value: string, vars: Record<string, string>): string {
  return value.replace(/\{\{([^}]+)\}\}/g, (match, expr: string) => {
    const key = expr.trim();
    return key in vars ? (vars[key] ?? match) : match;
  });
}

/** Pull `N passed`, `N failed`, `N skipped`, `N error(s)` out of a test summary. */
export function parseTestCounts(output: string): TestCounts | null {
  const counts: TestCounts = { passed: 0, failed: 0, skipped: 0, errors: 0 };
  let found = false;
  for (const match of output.matchAll(/(\d+)\s+(passed|failed|skipped|errors?)\b/gi)) {
    const n = Number(match[1]);
    const label = (match[2] ?? '').toLowerCase();
    found = true;
    if (label === 'passed') counts.passed = n;
    else if (label === 'failed') counts.failed = n;
    else if (label === 'skipped') counts.skipped = n;
    else counts.errors = n;
  }
  return found ? counts : null;
}

/**
 * One percentage out of a coverage tool's output: a bare number, the `TOTAL`
 * row of a coverage table, or the last `NN%` printed.
 */
export function parseCoveragePercent(output: string): number | null {
  const trimmed = output.trim();
  if (/^\d+(\.\d+)?%?$/.test(trimmed)) return Number.parseFloat(trimmed);

  const total = /^TOTAL\b.*?(\d+(?:\.\d+)?)%\s*$/m.exec(output);
  if (total?.[1]) return Number.parseFloat(total[1]);

  const all = [...output.matchAll(/(\d+(?:\.\d+)?)%/g)];
  const last = all[all.length - 1]?.[1];
  return last === undefined ? null : Number.parseFloat(last);
}

function tail(text: string): string {
  return text.trim().split('\n').slice(-OUTPUT_TAIL_LINES).join('\n');
}

function failed(failure: FailureKind, error: string, payload?: StagePayload): Outcome {
  return { status: 'failure', failure, error, payload };
}

function countBySeverity(findings: Finding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { UNKNOWN: 0, LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
  for (const f of findings) counts[f.severity] += 1;
  return counts;
}

/**
 * Executes one stage against its collaborator and turns the outcome into a StageResult.
 * Never throws: anything a collaborator throws becomes an infrastructure failure.
 */
export class StageRunner {
  private readonly now: () => Date;

  constructor(
    private readonly deps: StageRunnerDeps,
    private readonly opts: StageRunnerOptions,
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async run(stage: StageDefinition, ctx: StageContext): Promise<StageResult> {
    const startedAt = this.now().toISOString();
    const log = logger.child({ run_id: ctx.run_id, stage: stage.name });
    log.info('Stage started', { kind: stage.kind });

    let outcome: Outcome;
    try {
      outcome = await this.dispatch(stage, ctx);
    } catch (err) {
      const message =
        err instanceof CollaboratorError || err instanceof ArtifactNotFoundError
          ? err.message
          : `collaborator could not be invoked: ${errorMessage(err)}`;
      outcome = failed('infrastructure', message);
    }

    const result: StageResult = {
      stage: stage.name,
      kind: stage.kind,
      policy: stage.policy,
      ...outcome,
      started_at: startedAt,
      finished_at: this.now().toISOString(),
    };
    if (result.status === 'success') {
      log.info('Stage succeeded');
    } else {
      log.warn('Stage failed', { failure: result.failure, error: result.error });
    }
    return result;
  }

  private dispatch(stage: StageDefinition, ctx: StageContext): Promise<Outcome> {
    switch (stage.kind) {
      case 'test':
        return this.runTests(stage, ctx);
      case 'coverage-check':
        return this.checkCoverage(stage, ctx);
      case 'build-and-publish':
        return this.buildAndPublish(stage, ctx);
      case 'security-scan':
        return this.scan(stage, ctx);
      case 'deploy-verify':
        return this.verifyDeployment(ctx);
    }
  }

  private timeout(stage: StageDefinition): number {
    return stage.timeout_ms ?? this.opts.defaultTimeoutMs;
  }

  private templateVars(ctx: StageContext, variant?: string): Record<string, string> {
    const tags = ctx.published ?? resolveArtifactTags(this.opts.image, ctx.trigger.ref_name, ctx.trigger.commit_id);
    const vars: Record<string, string> = {
      ref_name: ctx.trigger.ref_name,
      commit_id: ctx.trigger.commit_id,
      image: imageReference(tags.immutable),
    };
    if (variant !== undefined) vars['variant'] = variant;
    return vars;
  }

  private async runTests(stage: TestStage, ctx: StageContext): Promise<Outcome> {
    const vars = this.templateVars(ctx, stage.variant);
    const argv = stage.command.map((arg) => resolveTemplate(arg, vars));
    const result = await this.deps.commands.run(argv, {
      cwd: ctx.workdir ?? this.opts.cwd,
      env: stage.env,
      timeoutMs: this.timeout(stage),
    });

    const output = `${result.stdout}\n${result.stderr}`;
    const payload: StagePayload = {
      kind: 'test',
      exit_code: result.exit_code,
      counts: parseTestCounts(output),
      output_tail: tail(output),
    };
    if (result.exit_code === 0) return { status: 'success', payload };
    return failed('assertion', `command exited with code ${result.exit_code}`, payload);
  }

  private async checkCoverage(stage: CoverageStage, ctx: StageContext): Promise<Outcome> {
    const vars = this.templateVars(ctx);
    const argv = stage.command.map((arg) => resolveTemplate(arg, vars));
    const result = await this.deps.commands.run(argv, {
      cwd: ctx.workdir ?? this.opts.cwd,
      timeoutMs: this.timeout(stage),
    });

    const percent = parseCoveragePercent(result.stdout);
    const payload: StagePayload = {
      kind: 'coverage',
      percent,
      threshold: stage.threshold,
      exit_code: result.exit_code,
    };
    if (percent === null) {
      return failed('infrastructure', 'coverage output contained no percentage', payload);
    }
    if (!meetsThreshold(percent, stage.threshold)) {
      return failed('assertion', `coverage ${percent}% is below the ${stage.threshold}% threshold`, payload);
    }
    return { status: 'success', payload };
  }

  private async buildAndPublish(stage: BuildStage, ctx: StageContext): Promise<Outcome> {
    const tags = resolveArtifactTags(this.opts.image, ctx.trigger.ref_name, ctx.trigger.commit_id);
    const images = [...new Set([imageReference(tags.mutable), imageReference(tags.immutable)])];

    const context = ctx.workdir !== undefined ? join(ctx.workdir, stage.context) : stage.context;
    const result = await this.deps.registry.publish({
      context,
      dockerfile: ctx.workdir !== undefined && stage.dockerfile ? join(context, stage.dockerfile) : stage.dockerfile,
      images,
      timeoutMs: this.timeout(stage),
    });

    const published = result.tags.map((t) => ({
      reference: t.image,
      ok: t.ok,
      digest: t.digest,
      ...(t.error ? { error: t.error } : {}),
    }));
    const digests = new Set(published.map((t) => t.digest));
    const [digest] = [...digests];
    const payload: StagePayload = {
      kind: 'publish',
      tags,
      digest: digests.size === 1 ? (digest ?? null) : null,
      published,
    };

    if (!result.built) {
      return failed('assertion', `image build failed: ${result.build_error ?? 'unknown error'}`, payload);
    }
    const missing = images.filter((image) => !published.some((t) => t.reference === image && t.ok));
    if (missing.length > 0) {
      return failed('infrastructure', `publish failed for ${missing.join(', ')}`, payload);
    }
    if (digests.size !== 1) {
      return failed('assertion', 'published tags resolve to different content digests', payload);
    }
    return { status: 'success', payload };
  }

  private async scan(stage: ScanStage, ctx: StageContext): Promise<Outcome> {
    if (!ctx.published) {
      return failed('infrastructure', 'no artifact was published earlier in this run');
    }
    // The commit tag cannot be moved by a concurrent push for the same ref
    const image = imageReference(ctx.published.immutable);
    const timeoutMs = this.timeout(stage);

    let advisory: Finding[] = [];
    let advisoryError: string | undefined;
    try {
      const report = await this.deps.scanner.scan(image, {
        mode: 'advisory',
        severities: [],
        ignoreUnfixed: stage.ignore_unfixed,
        timeoutMs,
      });
      advisory = report.findings;
    } catch (err) {
      advisoryError = errorMessage(err);
      logger.warn('Advisory scan failed', { run_id: ctx.run_id, image, error: advisoryError });
    }

    const blockingReport = await this.deps.scanner.scan(image, {
      mode: 'blocking',
      severities: severitiesAtOrAbove(stage.fail_on),
      ignoreUnfixed: stage.ignore_unfixed,
      timeoutMs,
    });
    const blocking = blockingReport.findings.filter(
      (f) => SEVERITY_ORDER[f.severity] >= SEVERITY_ORDER[stage.fail_on],
    );

    const payload: StagePayload = {
      kind: 'scan',
      image,
      fail_on: stage.fail_on,
      advisory,
      ...(advisoryError ? { advisory_error: advisoryError } : {}),
      blocking,
      counts: countBySeverity(advisory.length > 0 ? advisory : blockingReport.findings),
    };
    if (blocking.length > 0) {
      return failed(
        'assertion',
        `${blocking.length} finding(s) at or above ${stage.fail_on}`,
        payload,
      );
    }
    return { status: 'success', payload };
  }

  private async verifyDeployment(ctx: StageContext): Promise<Outcome> {
    const check = await this.deps.verifier.verify(ctx.trigger.ref_name, ctx.trigger.commit_id);
    if (check.pass) return { status: 'success', payload: check };
    return failed(check.failure ?? 'assertion', check.error ?? 'deployment check failed', check);
  }
}
