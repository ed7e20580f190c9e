import { describe, it, expect } from '@jest/globals';
import { buildCdPipeline, buildCiPipeline } from '../pipeline/definitions.js';
import { buildStageGraph } from '../pipeline/graph.js';
import { makeConfig } from './test-helpers.js';

describe('buildCiPipeline', () => {
  it('fans tests out per variant, then coverage, publish and scan', () => {
    const ci = buildCiPipeline(makeConfig());

    expect(ci.id).toBe('ci');
    expect(ci.stages.map((s) => [s.name, s.kind, s.needs, s.policy])).toEqual([
      ['test-3.10', 'test', [], 'blocking'],
      ['test-3.11', 'test', [], 'blocking'],
      ['test-3.12', 'test', [], 'blocking'],
      ['lint', 'test', [], 'blocking'],
      ['coverage', 'coverage-check', ['test-3.10', 'test-3.11', 'test-3.12'], 'blocking'],
      ['publish', 'build-and-publish', ['coverage', 'lint'], 'blocking'],
      ['scan', 'security-scan', ['publish'], 'blocking'],
    ]);
    expect(buildStageGraph(ci.stages).order).toEqual([
      'test-3.10',
      'test-3.11',
      'test-3.12',
      'lint',
      'coverage',
      'publish',
      'scan',
    ]);
  });

  it('uses a single test stage without variants and drops lint when unset', () => {
    const ci = buildCiPipeline(
      makeConfig((input) => {
        input.ci.test.variants = [];
        delete input.ci.lint;
      }),
    );
    expect(ci.stages.map((s) => s.name)).toEqual(['test', 'coverage', 'publish', 'scan']);
    expect(ci.stages.find((s) => s.name === 'publish')?.needs).toEqual(['coverage']);
  });

  it('carries configured policies, thresholds and timeouts', () => {
    const ci = buildCiPipeline(
      makeConfig((input) => {
        input.ci.scan = { fail_on: 'CRITICAL', policy: 'advisory', timeout_ms: 120_000 };
        input.ci.coverage.threshold = 90;
      }),
    );
    expect(ci.stages.find((s) => s.name === 'scan')).toEqual({
      name: 'scan',
      kind: 'security-scan',
      needs: ['publish'],
      policy: 'advisory',
      fail_on: 'CRITICAL',
      ignore_unfixed: true,
      timeout_ms: 120_000,
    });
    expect(ci.stages.find((s) => s.name === 'coverage')).toMatchObject({ threshold: 90 });
  });
});

describe('buildCdPipeline', () => {
  it('is a single blocking deploy-verify stage', () => {
    expect(buildCdPipeline(makeConfig())).toEqual({
      id: 'cd',
      name: 'CD',
      stages: [{ name: 'deploy-verify', kind: 'deploy-verify', needs: [], policy: 'blocking' }],
    });
  });
});
