import { describe, it, expect } from '@jest/globals';
import { ReleaseOrchestrator } from '../pipeline/orchestrator.js';
import type { Collaborators } from '../collaborators/types.js';
import {
  addingSandbox,
  FakeChangeRequests,
  FakeCommands,
  FakeRegistry,
  FakeSandbox,
  FakeScanner,
  FakeSource,
  makeConfig,
  makeFinding,
  makeTrigger,
} from './test-helpers.js';

/** Tests print a pytest summary; the coverage command (run through sh) prints a total. */
function fakeCollaborators(coverage = '92\n', scanner = new FakeScanner()) {
  const changeRequests = new FakeChangeRequests();
  const registry = new FakeRegistry();
  const commands = new FakeCommands((argv) => (argv[0] === 'sh' ? { stdout: coverage } : { stdout: '3 passed in 0.10s' }));
  const collaborators: Collaborators = {
    commands,
    registry,
    scanner,
    sandbox: addingSandbox(),
    changeRequests,
  };
  return { collaborators, changeRequests, registry, commands };
}

describe('ReleaseOrchestrator', () => {
  it('runs CI, then CD against the image CI published, and reports both', async () => {
    const { collaborators, changeRequests, registry } = fakeCollaborators();
    const orchestrator = new ReleaseOrchestrator({
      config: makeConfig((input) => {
        input.server = { public_url: 'https://ci.example.test/' };
      }),
      collaborators,
    });

    const ci = await orchestrator.startCi(makeTrigger({ ref_name: '2/merge', event: 'pull_request', change_request: 2 }));
    await orchestrator.idle();

    expect(ci.status).toBe('success');
    expect(ci.url).toBe(`https://ci.example.test/v1/runs/${ci.run_id}`);
    expect(ci.stages.map((s) => s.stage)).toEqual([
      'test-3.10',
      'test-3.11',
      'test-3.12',
      'lint',
      'coverage',
      'publish',
      'scan',
    ]);

    const [cd] = orchestrator.runs.downstreamOf(ci.run_id);
    expect(cd?.pipeline_id).toBe('cd');
    expect(cd?.status).toBe('success');
    expect(cd?.trigger).toMatchObject({ ref_name: '2/merge', commit_id: 'abc123', event: 'pipeline', change_request: 2 });
    expect(registry.pulls).toEqual(['ghcr.io/acme/adder:2-merge']);

    expect(changeRequests.comments.map((c) => [c.number, c.body.split('\n')[0]])).toEqual([
      [2, '### ✅ CI passed'],
      [2, '### ✅ CD passed'],
    ]);
  });

  it('stops at a coverage shortfall: nothing is published and CD does not start', async () => {
    const { collaborators, changeRequests, registry } = fakeCollaborators('79.99\n');
    const orchestrator = new ReleaseOrchestrator({ config: makeConfig(), collaborators });

    const ci = await orchestrator.startCi(makeTrigger({ change_request: 4 }));
    await orchestrator.idle();

    expect(ci.status).toBe('failed');
    expect(ci.stages.find((s) => s.stage === 'coverage')?.error).toBe('coverage 79.99% is below the 80% threshold');
    expect(ci.stages.find((s) => s.stage === 'publish')).toMatchObject({ status: 'skipped', reason: 'blocked by coverage' });
    expect(registry.published).toEqual([]);
    expect(orchestrator.runs.downstreamOf(ci.run_id)).toEqual([]);
    expect(changeRequests.comments).toHaveLength(1);
  });

  it('lets an advisory scan report findings without blocking CD', async () => {
    const { collaborators } = fakeCollaborators('92\n', new FakeScanner([makeFinding('CVE-2024-9999', 'CRITICAL')]));
    const orchestrator = new ReleaseOrchestrator({
      config: makeConfig((input) => {
        input.ci.scan = { policy: 'advisory' };
      }),
      collaborators,
    });

    const ci = await orchestrator.startCi(makeTrigger());
    await orchestrator.idle();

    expect(ci.stages.find((s) => s.stage === 'scan')?.status).toBe('failure');
    expect(ci.status).toBe('success');
    expect(orchestrator.runs.downstreamOf(ci.run_id)).toHaveLength(1);
  });

  it('does not start CD when it is disabled', async () => {
    const { collaborators } = fakeCollaborators();
    const orchestrator = new ReleaseOrchestrator({
      config: makeConfig((input) => {
        input.cd = { enabled: false };
      }),
      collaborators,
    });

    const ci = await orchestrator.startCi(makeTrigger());
    await orchestrator.idle();

    expect(orchestrator.cd).toBeNull();
    expect(ci.status).toBe('success');
    expect(orchestrator.runs.list()).toHaveLength(1);
  });

  it('verifies a deployment on demand', async () => {
    const { collaborators, registry } = fakeCollaborators();
    registry.available.add('ghcr.io/acme/adder:main');
    const orchestrator = new ReleaseOrchestrator({ config: makeConfig(), collaborators });

    const check = await orchestrator.verify('main', 'abc123');

    expect(check.pass).toBe(true);
    expect(check.image).toBe('ghcr.io/acme/adder:main');
  });

  it('builds each CI run from its own checkout of the commit', async () => {
    const { collaborators, commands, registry } = fakeCollaborators();
    const source = new FakeSource();
    const orchestrator = new ReleaseOrchestrator({ config: makeConfig(), collaborators: { ...collaborators, source } });

    const [first, second] = await Promise.all([
      orchestrator.startCi(makeTrigger({ ref_name: 'feature-a', commit_id: 'c1' })),
      orchestrator.startCi(makeTrigger({ ref_name: 'feature-b', commit_id: 'c2' })),
    ]);
    await orchestrator.idle();

    const workdirs = [`/work/${first.run_id}`, `/work/${second.run_id}`].sort();
    expect(first.run_id).not.toBe(second.run_id);
    expect(source.prepared.map((p) => p.workdir).sort()).toEqual(workdirs);
    expect(new Set(commands.calls.map((c) => c.options.cwd))).toEqual(new Set(workdirs));
    expect(registry.published.map((p) => p.context).sort()).toEqual(workdirs);
    expect([...source.released].sort()).toEqual(workdirs);
    // CD only pulls the image, so it gets no checkout
    expect(orchestrator.runs.downstreamOf(first.run_id)).toHaveLength(1);
    expect(source.prepared).toHaveLength(2);
  });

  it('names the image tag it pulled when the deployment check fails', async () => {
    const { collaborators, changeRequests } = fakeCollaborators();
    const sandbox = new FakeSandbox(() => ({ stdout: '6\n', stderr: '', exit_code: 0 }));
    const orchestrator = new ReleaseOrchestrator({ config: makeConfig(), collaborators: { ...collaborators, sandbox } });

    await orchestrator.startCi(makeTrigger({ ref_name: '2/merge', event: 'pull_request', change_request: 2 }));
    await orchestrator.idle();

    const cdComment = changeRequests.comments[1]?.body ?? '';
    expect(cdComment.split('\n')[0]).toBe('### ❌ CD failed');
    expect(cdComment).toContain('- Pull `ghcr.io/acme/adder:2-merge`: ok');
  });

  it('looks up the change request for a commit once across CI, trigger and CD', async () => {
    const { collaborators, changeRequests } = fakeCollaborators();
    const orchestrator = new ReleaseOrchestrator({ config: makeConfig(), collaborators });

    const ci = await orchestrator.startCi(makeTrigger());
    await orchestrator.idle();

    expect(orchestrator.runs.downstreamOf(ci.run_id)).toHaveLength(1);
    expect(changeRequests.lookups).toEqual(['abc123']);
  });
});
