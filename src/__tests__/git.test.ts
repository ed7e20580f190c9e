import { describe, it, expect } from '@jest/globals';
import { GitWorktrees } from '../collaborators/git.js';
import { CollaboratorError } from '../shared/errors.js';
import { FakeCommands } from './test-helpers.js';

function worktrees(commands: FakeCommands) {
  return new GitWorktrees({ commands, repoDir: '/repo', root: '/repo/.shipline/worktrees', timeoutMs: 1000 });
}

describe('GitWorktrees', () => {
  it('adds a detached worktree per run for a commit that is already local', async () => {
    const commands = new FakeCommands();
    const git = worktrees(commands);

    const first = await git.prepare('abc123', 'run-1');
    const second = await git.prepare('def456', 'run-2');

    expect(first).toBe('/repo/.shipline/worktrees/run-1');
    expect(second).toBe('/repo/.shipline/worktrees/run-2');
    expect(commands.calls.map((c) => c.argv)).toEqual([
      ['git', 'cat-file', '-e', 'abc123^{commit}'],
      ['git', 'worktree', 'add', '--detach', '/repo/.shipline/worktrees/run-1', 'abc123'],
      ['git', 'cat-file', '-e', 'def456^{commit}'],
      ['git', 'worktree', 'add', '--detach', '/repo/.shipline/worktrees/run-2', 'def456'],
    ]);
    expect(commands.calls.every((c) => c.options.cwd === '/repo' && c.options.timeoutMs === 1000)).toBe(true);
  });

  it('fetches a commit it does not have yet', async () => {
    const commands = new FakeCommands((argv) => (argv[1] === 'cat-file' ? { exit_code: 1 } : {}));
    await worktrees(commands).prepare('abc123', 'run-1');

    expect(commands.calls[1]?.argv).toEqual(['git', 'fetch', '--quiet', 'origin', 'abc123']);
    expect(commands.calls[2]?.argv[1]).toBe('worktree');
  });

  it('raises a collaborator error when git fails', async () => {
    const commands = new FakeCommands((argv) =>
      argv[1] === 'cat-file' ? { exit_code: 1 } : { exit_code: 128, stderr: 'fatal: remote error: not our ref\n' },
    );
    const pending = worktrees(commands).prepare('abc123', 'run-1');

    await expect(pending).rejects.toBeInstanceOf(CollaboratorError);
    await expect(pending).rejects.toThrow('git: fetch exited with code 128: fatal: remote error: not our ref');
  });

  it('removes the worktree on release', async () => {
    const commands = new FakeCommands();
    await worktrees(commands).release('/repo/.shipline/worktrees/run-1');
    expect(commands.calls[0]?.argv).toEqual(['git', 'worktree', 'remove', '--force', '/repo/.shipline/worktrees/run-1']);
  });
});
