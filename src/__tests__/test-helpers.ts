import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { mkdtempSync, rmSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { jest } from '@jest/globals';
import type { ChildProcessWithoutNullStreams } from 'node:child_process';
import type {
  ChangeRequest,
  ChangeRequestHost,
  CommandOptions,
  CommandResult,
  CommandRunner,
  ExecutionSandbox,
  PublishRequest,
  PublishResult,
  Registry,
  SandboxResult,
  ScanOptions,
  ScanReport,
  Scanner,
  SourceCheckout,
} from '../collaborators/types.js';
import { ArtifactNotFoundError } from '../shared/errors.js';
import type { Finding, PipelineRun, RepositoryRef, TriggerContext } from '../pipeline/types.js';
import { parseShiplineConfig, writeShiplineConfig } from '../workspace/config.js';
import { defaultConfig } from '../workspace/init.js';
import type { ShiplineConfig, ShiplineConfigInput } from '../workspace/types.js';

export const COMMIT = 'abc123';
export const REPO: RepositoryRef = { owner: 'acme', name: 'adder' };

/** Clock that advances one second per reading, starting at 2024-01-01T00:00:00Z. */
export function tickingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

export function makeTrigger(overrides: Partial<TriggerContext> = {}): TriggerContext {
  return {
    repository: REPO,
    ref_name: 'main',
    commit_id: COMMIT,
    event: 'push',
    ...overrides,
  };
}

export function makeConfig(patch: (input: ShiplineConfigInput) => void = () => undefined): ShiplineConfig {
  const input = defaultConfig('acme', 'adder');
  patch(input);
  return parseShiplineConfig(input);
}

export function makeFinding(id: string, severity: Finding['severity']): Finding {
  return {
    id,
    package: 'libexample',
    installed_version: '1.0.0',
    fixed_version: '1.0.1',
    severity,
    title: `${id} in libexample`,
  };
}

// ─── Collaborator fakes ──────────────────────────────────

type CommandHandler = (argv: string[]) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

export class FakeCommands implements CommandRunner {
  readonly calls: { argv: string[]; options: CommandOptions }[] = [];

  constructor(private readonly handler: CommandHandler = () => ({})) {}

  async run(argv: string[], options: CommandOptions): Promise<CommandResult> {
    this.calls.push({ argv, options });
    const result = await this.handler(argv);
    return { exit_code: 0, stdout: '', stderr: '', duration_ms: 1, ...result };
  }
}

export class FakeRegistry implements Registry {
  readonly published: PublishRequest[] = [];
  readonly pulls: string[] = [];
  /** Images a pull succeeds for. */
  readonly available = new Set<string>();
  pullError: Error | null = null;
  publishResult: ((req: PublishRequest) => PublishResult) | null = null;

  async publish(req: PublishRequest): Promise<PublishResult> {
    this.published.push(req);
    if (this.publishResult) return this.publishResult(req);
    for (const image of req.images) this.available.add(image);
    return {
      built: true,
      tags: req.images.map((image) => ({ image, ok: true, digest: `sha256:${'a'.repeat(64)}` })),
    };
  }

  async pull(image: string): Promise<void> {
    this.pulls.push(image);
    if (this.pullError) throw this.pullError;
    if (!this.available.has(image)) throw new ArtifactNotFoundError(image);
  }
}

export class FakeScanner implements Scanner {
  readonly scans: { image: string; options: ScanOptions }[] = [];

  constructor(
    private readonly findings: Finding[] = [],
    private readonly failMode: ScanOptions['mode'] | null = null,
  ) {}

  async scan(image: string, options: ScanOptions): Promise<ScanReport> {
    this.scans.push({ image, options });
    if (this.failMode === options.mode) throw new Error(`${options.mode} scan unavailable`);
    const findings =
      options.severities.length === 0
        ? this.findings
        : this.findings.filter((f) => options.severities.includes(f.severity));
    return { image, findings };
  }
}

export class FakeSandbox implements ExecutionSandbox {
  readonly runs: { image: string; args: string[] }[] = [];

  constructor(private readonly respond: (image: string, args: string[]) => SandboxResult | Promise<SandboxResult>) {}

  run(image: string, args: string[]): Promise<SandboxResult> {
    this.runs.push({ image, args });
    return Promise.resolve().then(() => this.respond(image, args));
  }
}

/** Sandbox that behaves like the sample app: prints the sum of its arguments. */
export function addingSandbox(): FakeSandbox {
  return new FakeSandbox((_image, args) => ({
    stdout: `${args.reduce((sum, a) => sum + Number(a), 0)}\n`,
    stderr: '',
    exit_code: 0,
  }));
}

export class FakeChangeRequests implements ChangeRequestHost {
  readonly open = new Map<string, ChangeRequest>();
  readonly comments: { number: number; body: string }[] = [];
  readonly lookups: string[] = [];
  lookupError: Error | null = null;
  postResult = true;

  async findOpenByHeadCommit(_repo: RepositoryRef, commitId: string): Promise<ChangeRequest | null> {
    this.lookups.push(commitId);
    if (this.lookupError) throw this.lookupError;
    return this.open.get(commitId) ?? null;
  }

  async postComment(_repo: RepositoryRef, number: number, body: string): Promise<boolean> {
    this.comments.push({ number, body });
    return this.postResult;
  }
}

/** Hands each run `/work/<run id>` without touching the filesystem. */
export class FakeSource implements SourceCheckout {
  readonly prepared: { commitId: string; runId: string; workdir: string }[] = [];
  readonly released: string[] = [];
  prepareError: Error | null = null;

  async prepare(commitId: string, runId: string): Promise<string> {
    if (this.prepareError) throw this.prepareError;
    const workdir = `/work/${runId}`;
    this.prepared.push({ commitId, runId, workdir });
    return workdir;
  }

  async release(workdir: string): Promise<void> {
    this.released.push(workdir);
  }
}

// ─── Processes and workspaces ────────────────────────────

export type MockChild = ChildProcessWithoutNullStreams & {
  stdout: PassThrough;
  stderr: PassThrough;
  stdin: PassThrough;
  kill: jest.Mock;
};

export function createMockChild(): MockChild {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const stdin = new PassThrough();

  const child = new EventEmitter() as MockChild;
  Object.assign(child, {
    stdout,
    stderr,
    stdin,
    killed: false,
    pid: 123,
    connected: true,
    exitCode: null,
    signalCode: null,
    spawnfile: 'docker',
    spawnargs: [],
    kill: jest.fn(() => true),
    ref: () => child,
    unref: () => child,
    send: () => false,
  });

  return child;
}

/** Emit output on a later tick, then close with `code` once the output has flowed. */
export function finishChild(child: MockChild, code: number, stdout = '', stderr = ''): void {
  setImmediate(() => {
    if (stdout) child.stdout.write(stdout);
    if (stderr) child.stderr.write(stderr);
    child.stdout.end();
    child.stderr.end();
    setImmediate(() => child.emit('close', code));
  });
}

export interface TempWorkspace {
  workspaceDir: string;
  shiplineDir: string;
  configPath: string;
  cleanup: () => void;
}

export function createTempWorkspace(config?: ShiplineConfigInput): TempWorkspace {
  const root = mkdtempSync(join(tmpdir(), 'shipline-ws-'));
  const shiplineDir = join(root, '.shipline');
  const configPath = join(shiplineDir, 'config.yaml');
  if (config) {
    mkdirSync(shiplineDir, { recursive: true });
    writeShiplineConfig(configPath, config);
  }
  return {
    workspaceDir: root,
    shiplineDir,
    configPath,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function makeRun(overrides: Partial<PipelineRun> = {}): PipelineRun {
  return {
    run_id: 'run-1',
    pipeline_id: 'ci',
    pipeline_name: 'CI',
    trigger: makeTrigger(),
    status: 'success',
    stages: [],
    tags: null,
    url: null,
    started_at: '2024-01-01T00:00:00.000Z',
    ended_at: '2024-01-01T00:01:00.000Z',
    ...overrides,
  };
}
