import { describe, it, expect } from '@jest/globals';
import { DeploymentVerifier } from '../pipeline/verifier.js';
import { CollaboratorError } from '../shared/errors.js';
import { addingSandbox, FakeRegistry, FakeSandbox, tickingClock } from './test-helpers.js';

const IMAGE = { registry: 'ghcr.io', namespace: 'acme', repository: 'adder' };
const MAIN = 'ghcr.io/acme/adder:main';
const COMMIT_TAG = 'ghcr.io/acme/adder:abc123';

function verifier(registry: FakeRegistry, sandbox: FakeSandbox) {
  return new DeploymentVerifier(registry, sandbox, { image: IMAGE, timeoutMs: 1000, now: tickingClock() });
}

describe('DeploymentVerifier', () => {
  it('passes when the image prints 5 for inputs 2 and 3', async () => {
    const registry = new FakeRegistry();
    registry.available.add(MAIN);
    const sandbox = addingSandbox();

    const check = await verifier(registry, sandbox).verify('main', 'abc123');

    expect(sandbox.runs).toEqual([{ image: MAIN, args: ['2', '3'] }]);
    expect(check).toEqual({
      kind: 'deployment',
      tag: 'main',
      image: MAIN,
      stdout: '5\n',
      exit_code: 0,
      pass: true,
      attempts: [{ image: MAIN, ok: true }],
      checked_at: '2024-01-01T00:00:00.000Z',
    });
    expect(Object.isFrozen(check)).toBe(true);
  });

  it('fails with an assertion on the wrong answer', async () => {
    const registry = new FakeRegistry();
    registry.available.add(MAIN);
    const sandbox = new FakeSandbox(() => ({ stdout: '6', stderr: '', exit_code: 0 }));

    const check = await verifier(registry, sandbox).verify('main', 'abc123');

    expect(check.pass).toBe(false);
    expect(check.failure).toBe('assertion');
    expect(check.error).toBe('expected exit 0 and output "5", got exit 0 and output "6"');
  });

  it('fails with an assertion on a nonzero exit even when the output matches', async () => {
    const registry = new FakeRegistry();
    registry.available.add(MAIN);
    const sandbox = new FakeSandbox(() => ({ stdout: '5', stderr: 'boom', exit_code: 2 }));

    const check = await verifier(registry, sandbox).verify('main', 'abc123');

    expect(check.failure).toBe('assertion');
    expect(check.exit_code).toBe(2);
  });

  it('falls back to the commit tag when the ref tag is missing', async () => {
    const registry = new FakeRegistry();
    registry.available.add(COMMIT_TAG);
    const sandbox = addingSandbox();

    const check = await verifier(registry, sandbox).verify('main', 'abc123');

    expect(registry.pulls).toEqual([MAIN, COMMIT_TAG]);
    expect(check.pass).toBe(true);
    expect(check.tag).toBe('abc123');
    expect(check.attempts).toEqual([
      { image: MAIN, ok: false, error: 'not found' },
      { image: COMMIT_TAG, ok: true },
    ]);
  });

  it('reports an infrastructure failure when no tag can be pulled', async () => {
    const registry = new FakeRegistry();
    const sandbox = addingSandbox();

    const check = await verifier(registry, sandbox).verify('2/merge', 'abc123');

    expect(registry.pulls).toEqual(['ghcr.io/acme/adder:2-merge', COMMIT_TAG]);
    expect(sandbox.runs).toEqual([]);
    expect(check.pass).toBe(false);
    expect(check.failure).toBe('infrastructure');
    expect(check.error).toBe('no candidate tag could be pulled');
    expect(check.tag).toBeNull();
  });

  it('records registry errors in the attempts', async () => {
    const registry = new FakeRegistry();
    registry.pullError = new CollaboratorError('docker pull', 'unauthorized');

    const check = await verifier(registry, addingSandbox()).verify('main', 'abc123');

    expect(check.attempts.map((a) => a.error)).toEqual(['docker pull: unauthorized', 'docker pull: unauthorized']);
    expect(check.failure).toBe('infrastructure');
  });

  it('tries a single tag when the ref and commit tags coincide', async () => {
    const registry = new FakeRegistry();
    await verifier(registry, addingSandbox()).verify('abc123', 'abc123');
    expect(registry.pulls).toEqual([COMMIT_TAG]);
  });

  it('reports a sandbox that cannot run as infrastructure', async () => {
    const registry = new FakeRegistry();
    registry.available.add(MAIN);
    const sandbox = new FakeSandbox(() => {
      throw new CollaboratorError('docker run', 'timed out after 1000ms');
    });

    const check = await verifier(registry, sandbox).verify('main', 'abc123');

    expect(check.failure).toBe('infrastructure');
    expect(check.error).toBe('docker run: timed out after 1000ms');
    expect(check.image).toBe(MAIN);
  });
});
