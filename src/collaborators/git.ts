import { join } from 'node:path';
import { CollaboratorError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { CommandResult, CommandRunner, SourceCheckout } from './types.js';

export interface GitWorktreesOptions {
  commands: CommandRunner;
  /** Clone the worktrees are attached to. */
  repoDir: string;
  /** Parent directory of the per-run checkouts. */
  root: string;
  remote?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 300_000;

function detail(result: CommandResult): string {
  return (result.stderr || result.stdout).trim().split('\n').slice(-5).join('\n');
}

/**
 * One detached `git worktree` per run, so concurrent runs for different
 * commits never share a working tree. Commits missing locally are fetched
 * from the remote first.
 */
export class GitWorktrees implements SourceCheckout {
  private readonly remote: string;
  private readonly timeoutMs: number;

  constructor(private readonly opts: GitWorktreesOptions) {
    this.remote = opts.remote ?? 'origin';
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async prepare(commitId: string, runId: string): Promise<string> {
    const known = await this.git(['cat-file', '-e', `${commitId}^{commit}`]);
    if (known.exit_code !== 0) {
      await this.check(['fetch', '--quiet', this.remote, commitId]);
    }
    const workdir = join(this.opts.root, runId);
    await this.check(['worktree', 'add', '--detach', workdir, commitId]);
    logger.debug('Worktree added', { commit: commitId, workdir });
    return workdir;
  }

  async release(workdir: string): Promise<void> {
    await this.check(['worktree', 'remove', '--force', workdir]);
  }

  private git(args: string[]): Promise<CommandResult> {
    return this.opts.commands.run(['git', ...args], { cwd: this.opts.repoDir, timeoutMs: this.timeoutMs });
  }

  private async check(args: string[]): Promise<void> {
    const result = await this.git(args);
    if (result.exit_code !== 0) {
      throw new CollaboratorError('git', `${args[0] ?? 'git'} exited with code ${result.exit_code}: ${detail(result)}`);
    }
  }
}
