/**
 * Narrow interfaces to everything outside the orchestration core.
 * Implementations live beside this file (docker, trivy, shell) and under
 * connector/github; tests substitute in-process fakes.
 */
import type { Finding, RepositoryRef, Severity } from '../pipeline/types.js';

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs: number;
}

export interface CommandResult {
  exit_code: number;
  stdout: string;
  stderr: string;
  duration_ms: number;
}

/** Test, lint and coverage tools, invoked as opaque commands. */
export interface CommandRunner {
  run(argv: string[], options: CommandOptions): Promise<CommandResult>;
}

export interface PublishRequest {
  context: string;
  dockerfile?: string;
  /** Full image references; all must end up on the same built content. */
  images: string[];
  timeoutMs: number;
}

export interface PublishResult {
  /** False when the build itself failed; nothing was pushed. */
  built: boolean;
  build_error?: string;
  tags: { image: string; ok: boolean; digest: string | null; error?: string }[];
}

export interface Registry {
  publish(request: PublishRequest): Promise<PublishResult>;
  /** Throws ArtifactNotFoundError when the tag is absent, CollaboratorError otherwise. */
  pull(image: string, options: { timeoutMs: number }): Promise<void>;
}

export type ScanMode = 'advisory' | 'blocking';

export interface ScanOptions {
  mode: ScanMode;
  /** Only report findings with these severities; empty means all. */
  severities: Severity[];
  ignoreUnfixed: boolean;
  timeoutMs: number;
}

export interface ScanReport {
  image: string;
  findings: Finding[];
}

export interface Scanner {
  scan(image: string, options: ScanOptions): Promise<ScanReport>;
}

export interface SandboxResult {
  stdout: string;
  stderr: string;
  exit_code: number;
}

/** Runs an image with arguments; throws CollaboratorError when it cannot start or times out. */
export interface ExecutionSandbox {
  run(image: string, args: string[], options: { timeoutMs: number }): Promise<SandboxResult>;
}

export interface ChangeRequest {
  number: number;
  url: string;
  head_sha: string;
}

export interface ChangeRequestHost {
  findOpenByHeadCommit(repo: RepositoryRef, commitId: string): Promise<ChangeRequest | null>;
  /** Resolves false when the change request no longer exists. */
  postComment(repo: RepositoryRef, number: number, body: string): Promise<boolean>;
}

/** Materializes one commit in a directory no other run shares. */
export interface SourceCheckout {
  prepare(commitId: string, runId: string): Promise<string>;
  release(workdir: string): Promise<void>;
}

export interface Collaborators {
  commands: CommandRunner;
  registry: Registry;
  scanner: Scanner;
  sandbox: ExecutionSandbox;
  changeRequests: ChangeRequestHost;
  /** Without one, runs work in the orchestrator's directory. */
  source?: SourceCheckout;
}
