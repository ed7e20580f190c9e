import type { ShiplineConfig } from '../workspace/types.js';
import type { PipelineDefinition, StageDefinition, TestStage } from './types.js';

export const CI_PIPELINE_ID = 'ci';
export const CD_PIPELINE_ID = 'cd';

function testStageName(variant: string): string {
  return `test-${variant}`;
}

/**
 * CI graph: test variants and lint run side by side, coverage waits for
 * every test variant, then build-and-publish, then the security scan.
 */
export function buildCiPipeline(config: ShiplineConfig): PipelineDefinition {
  const { ci } = config;
  const stages: StageDefinition[] = [];

  const variants: (string | undefined)[] = ci.test.variants.length > 0 ? ci.test.variants : [undefined];
  const testStages = variants.map((variant): TestStage => ({
    name: variant === undefined ? 'test' : testStageName(variant),
    kind: 'test',
    needs: [],
    policy: 'blocking',
    command: ci.test.command,
    ...(variant !== undefined ? { variant } : {}),
    ...(ci.test.timeout_ms !== undefined ? { timeout_ms: ci.test.timeout_ms } : {}),
  }));
  stages.push(...testStages);

  if (ci.lint) {
    stages.push({
      name: 'lint',
      kind: 'test',
      needs: [],
      policy: ci.lint.policy,
      command: ci.lint.command,
      ...(ci.lint.timeout_ms !== undefined ? { timeout_ms: ci.lint.timeout_ms } : {}),
    });
  }

  stages.push({
    name: 'coverage',
    kind: 'coverage-check',
    needs: testStages.map((s) => s.name),
    policy: 'blocking',
    command: ci.coverage.command,
    threshold: ci.coverage.threshold,
    ...(ci.coverage.timeout_ms !== undefined ? { timeout_ms: ci.coverage.timeout_ms } : {}),
  });

  stages.push({
    name: 'publish',
    kind: 'build-and-publish',
    needs: ci.lint ? ['coverage', 'lint'] : ['coverage'],
    policy: 'blocking',
    context: ci.build.context,
    dockerfile: ci.build.dockerfile,
    ...(ci.build.timeout_ms !== undefined ? { timeout_ms: ci.build.timeout_ms } : {}),
  });

  stages.push({
    name: 'scan',
    kind: 'security-scan',
    needs: ['publish'],
    policy: ci.scan.policy,
    fail_on: ci.scan.fail_on,
    ignore_unfixed: ci.scan.ignore_unfixed,
    ...(ci.scan.timeout_ms !== undefined ? { timeout_ms: ci.scan.timeout_ms } : {}),
  });

  return { id: CI_PIPELINE_ID, name: 'CI', stages };
}

export function buildCdPipeline(config: ShiplineConfig): PipelineDefinition {
  return {
    id: CD_PIPELINE_ID,
    name: 'CD',
    stages: [
      {
        name: 'deploy-verify',
        kind: 'deploy-verify',
        needs: [],
        policy: 'blocking',
        ...(config.cd.timeout_ms !== undefined ? { timeout_ms: config.cd.timeout_ms } : {}),
      },
    ],
  };
}
