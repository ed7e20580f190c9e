/**
 * Reporter — renders a finished run or deployment check as a markdown comment.
 * Pure; whether and where to post is the notifier's business.
 */
import { imageReference } from './tags.js';
import type { DeploymentCheck, PipelineRun, StageResult, StageStatus } from './types.js';

const STATUS_LABEL: Record<StageStatus, string> = {
  success: '✓ passed',
  failure: '✗ failed',
  skipped: '– skipped',
};

function cell(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|').trim();
}

function shortSha(commitId: string): string {
  return /^[0-9a-f]{40}$/i.test(commitId) ? commitId.slice(0, 7) : commitId;
}

function statusLabel(result: StageResult): string {
  if (result.status === 'failure' && result.failure === 'infrastructure') return '✗ failed (infrastructure)';
  return STATUS_LABEL[result.status];
}

export function describeStage(result: StageResult): string {
  if (result.status === 'skipped') return result.reason ?? 'skipped';
  const payload = result.payload;
  switch (payload?.kind) {
    case 'test': {
      if (!payload.counts) return `exit code ${payload.exit_code}`;
      const { passed, failed, skipped, errors } = payload.counts;
      const parts = [`${passed} passed`, `${failed} failed`];
      if (skipped > 0) parts.push(`${skipped} skipped`);
      if (errors > 0) parts.push(`${errors} errors`);
      return parts.join(', ');
    }
    case 'coverage':
      return payload.percent === null
        ? 'no coverage percentage reported'
        : `${payload.percent}% (threshold ${payload.threshold}%)`;
    case 'publish':
      if (result.status === 'success') return `published ${payload.published.length} tag(s), ${payload.digest ?? 'digest unknown'}`;
      return result.error ?? 'publish failed';
    case 'scan':
      return `${payload.blocking.length} blocking (≥ ${payload.fail_on}), ${payload.advisory.length} advisory finding(s)`;
    case 'deployment':
      if (payload.pass) return `output "${payload.stdout.trim()}" from \`${payload.tag ?? ''}\``;
      return payload.tag ? `${payload.error ?? 'check failed'} from \`${payload.tag}\`` : (payload.error ?? 'check failed');
    default:
      return result.error ?? '';
  }
}

function pullLines(check: DeploymentCheck): string[] {
  return check.attempts.map(
    (attempt) => `- Pull \`${attempt.image}\`: ${attempt.ok ? 'ok' : `failed (${cell(attempt.error ?? 'unknown')})`}`,
  );
}

function stageTable(stages: StageResult[]): string[] {
  const lines = ['| Stage | Kind | Policy | Status | Detail |', '|---|---|---|---|---|'];
  for (const s of stages) {
    lines.push(`| ${cell(s.stage)} | ${s.kind} | ${s.policy} | ${statusLabel(s)} | ${cell(describeStage(s))} |`);
  }
  return lines;
}

export function renderRun(run: PipelineRun): string {
  const passed = run.status === 'success';
  const lines: string[] = [];
  lines.push(`### ${passed ? '✅' : '❌'} ${run.pipeline_name} ${passed ? 'passed' : 'failed'}`);
  lines.push('');
  const runRef = run.url ? `[\`${run.run_id}\`](${run.url})` : `\`${run.run_id}\``;
  lines.push(`Ref \`${run.trigger.ref_name}\` · commit \`${shortSha(run.trigger.commit_id)}\` · run ${runRef}`);
  lines.push('');
  lines.push(...stageTable(run.stages));

  if (run.tags) {
    lines.push('');
    lines.push('**Image tags**');
    lines.push(`- \`${imageReference(run.tags.mutable)}\``);
    if (run.tags.immutable.tag !== run.tags.mutable.tag) {
      lines.push(`- \`${imageReference(run.tags.immutable)}\``);
    }
  }

  for (const s of run.stages) {
    if (s.payload?.kind !== 'deployment' || s.payload.attempts.length === 0) continue;
    lines.push('');
    lines.push(`**Image tags** (\`${s.stage}\`)`);
    lines.push(...pullLines(s.payload));
  }

  const infra = run.stages.filter((s) => s.status === 'failure' && s.failure === 'infrastructure');
  if (infra.length > 0) {
    lines.push('');
    lines.push('**Operational issues**: a dependency could not be reached; re-trigger once it is back.');
    for (const s of infra) lines.push(`- \`${s.stage}\`: ${cell(s.error ?? 'unknown error')}`);
  }

  const advisory = run.stages.filter((s) => s.policy === 'advisory' && s.status === 'failure');
  if (advisory.length > 0) {
    lines.push('');
    lines.push('**Advisory failures** (not blocking)');
    for (const s of advisory) lines.push(`- \`${s.stage}\`: ${cell(s.error ?? describeStage(s))}`);
  }

  for (const s of run.stages) {
    if (s.payload?.kind === 'scan' && s.payload.advisory.length > 0) {
      const c = s.payload.counts;
      lines.push('');
      lines.push(
        `**Vulnerability report** (\`${s.stage}\`): ${c.CRITICAL} critical, ${c.HIGH} high, ${c.MEDIUM} medium, ${c.LOW} low, ${c.UNKNOWN} unknown`,
      );
    }
  }

  return lines.join('\n');
}

export function renderDeploymentCheck(check: DeploymentCheck): string {
  const lines: string[] = [];
  lines.push(`### ${check.pass ? '✅ Deployment check passed' : '❌ Deployment check failed'}`);
  lines.push('');
  lines.push(`- Image: ${check.image ? `\`${check.image}\`` : 'none pulled'}`);
  lines.push(`- Exit code: ${check.exit_code ?? 'n/a'}`);
  lines.push(`- Output: \`${cell(check.stdout.trim())}\``);
  if (check.failure) lines.push(`- Failure: ${check.failure}${check.error ? `: ${cell(check.error)}` : ''}`);
  lines.push(...pullLines(check));
  return lines.join('\n');
}

export function render(subject: PipelineRun | DeploymentCheck): string {
  return 'run_id' in subject ? renderRun(subject) : renderDeploymentCheck(subject);
}
