import type { FailureKind } from '../shared/errors.js';

export type { FailureKind };

export type StageKind =
  | 'test'
  | 'coverage-check'
  | 'build-and-publish'
  | 'security-scan'
  | 'deploy-verify';

export type GatePolicy = 'blocking' | 'advisory';
export type StageStatus = 'success' | 'failure' | 'skipped';
export type RunStatus = 'pending' | 'success' | 'failed';

export type Severity = 'UNKNOWN' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export const SEVERITY_ORDER: Record<Severity, number> = {
  UNKNOWN: 0,
  LOW: 1,
  MEDIUM: 2,
  HIGH: 3,
  CRITICAL: 4,
};

// ─── Artifacts ───────────────────────────────────────────

/** Where images for this project live, without a tag. */
export interface ImageCoordinates {
  registry: string;
  namespace: string;
  repository: string;
}

export interface ArtifactTag extends ImageCoordinates {
  tag: string;
}

export interface ArtifactTags {
  /** Reassigned on every publish for the same ref. */
  mutable: ArtifactTag;
  /** Bound to one commit identifier forever. */
  immutable: ArtifactTag;
}

// ─── Stage definitions ───────────────────────────────────

interface StageBase {
  name: string;
  needs: string[];
  policy: GatePolicy;
  timeout_ms?: number;
}

export interface TestStage extends StageBase {
  kind: 'test';
  command: string[];
  /** Runtime variant, substituted for `{{variant}}` in the command. */
  variant?: string;
  env?: Record<string, string>;
}

export interface CoverageStage extends StageBase {
  kind: 'coverage-check';
  command: string[];
  threshold: number;
}

export interface BuildStage extends StageBase {
  kind: 'build-and-publish';
  context: string;
  dockerfile?: string;
}

export interface ScanStage extends StageBase {
  kind: 'security-scan';
  fail_on: Severity;
  ignore_unfixed: boolean;
}

export interface DeployVerifyStage extends StageBase {
  kind: 'deploy-verify';
}

export type StageDefinition = TestStage | CoverageStage | BuildStage | ScanStage | DeployVerifyStage;

export interface PipelineDefinition {
  id: string;
  name: string;
  stages: StageDefinition[];
}

// ─── Results ─────────────────────────────────────────────

export interface TestCounts {
  passed: number;
  failed: number;
  skipped: number;
  errors: number;
}

export interface TestPayload {
  kind: 'test';
  exit_code: number;
  counts: TestCounts | null;
  output_tail: string;
}

export interface CoveragePayload {
  kind: 'coverage';
  percent: number | null;
  threshold: number;
  exit_code: number;
}

export interface PublishedTag {
  reference: string;
  ok: boolean;
  digest: string | null;
  error?: string;
}

export interface PublishPayload {
  kind: 'publish';
  tags: ArtifactTags;
  digest: string | null;
  published: PublishedTag[];
}

export interface Finding {
  id: string;
  package: string;
  installed_version: string;
  fixed_version: string | null;
  severity: Severity;
  title: string;
}

export interface ScanPayload {
  kind: 'scan';
  image: string;
  fail_on: Severity;
  advisory: Finding[];
  advisory_error?: string;
  blocking: Finding[];
  counts: Record<Severity, number>;
}

export interface PullAttempt {
  image: string;
  ok: boolean;
  error?: string;
}

export interface DeploymentCheck {
  kind: 'deployment';
  /** Tag string actually pulled and executed, null when no pull succeeded. */
  tag: string | null;
  image: string | null;
  stdout: string;
  exit_code: number | null;
  pass: boolean;
  failure?: FailureKind;
  attempts: PullAttempt[];
  error?: string;
  checked_at: string;
}

export type StagePayload = TestPayload | CoveragePayload | PublishPayload | ScanPayload | DeploymentCheck;

export interface StageResult {
  stage: string;
  kind: StageKind;
  policy: GatePolicy;
  status: StageStatus;
  failure?: FailureKind;
  error?: string;
  /** Why a stage was skipped. */
  reason?: string;
  payload?: StagePayload;
  started_at: string | null;
  finished_at: string;
}

// ─── Runs ────────────────────────────────────────────────

export interface RepositoryRef {
  owner: string;
  name: string;
}

export type TriggerEvent = 'push' | 'pull_request' | 'pipeline' | 'manual';

export interface TriggerContext {
  repository: RepositoryRef;
  ref_name: string;
  commit_id: string;
  event: TriggerEvent;
  /** Pull request number when the event already names it. */
  change_request?: number;
  upstream?: { run_id: string; pipeline_id: string };
}

export interface PipelineRun {
  run_id: string;
  pipeline_id: string;
  pipeline_name: string;
  trigger: TriggerContext;
  status: RunStatus;
  stages: StageResult[];
  tags: ArtifactTags | null;
  url: string | null;
  started_at: string;
  ended_at: string | null;
}

/** Read-only view a stage gets of its run. */
export interface StageContext {
  run_id: string;
  trigger: TriggerContext;
  /** Tags published by completed build stages in this run, if any. */
  published: ArtifactTags | null;
  /** Checkout of the trigger's commit, private to this run. */
  workdir?: string;
}
