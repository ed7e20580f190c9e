import { mkdirSync, existsSync } from 'node:fs';
import { getShiplinePaths } from './paths.js';
import { writeShiplineConfig } from './config.js';
import type { ShiplineConfigInput } from './types.js';

export interface InitOptions {
  owner: string;
  repository: string;
  cwd?: string;
  force?: boolean;
}

export function defaultConfig(owner: string, repository: string): ShiplineConfigInput {
  return {
    project: { owner, repository },
    image: { registry: 'ghcr.io' },
    ci: {
      test: {
        command: ['uv', 'run', '--python', '{{variant}}', 'pytest', '-q'],
        variants: ['3.10', '3.11', '3.12'],
      },
      lint: { command: ['uv', 'run', 'ruff', 'check', '.'], policy: 'blocking' },
      coverage: {
        command: ['sh', '-c', 'uv run coverage run -m pytest -q >/dev/null && uv run coverage report --format=total'],
        threshold: 80,
      },
      build: { context: '.', dockerfile: 'Dockerfile' },
      scan: { fail_on: 'HIGH', ignore_unfixed: true, policy: 'blocking' },
    },
    cd: { enabled: true },
    execution: { concurrency: 4, default_timeout_ms: 600_000 },
  };
}

export function initWorkspace(opts: InitOptions): ShiplineConfigInput {
  const paths = getShiplinePaths(opts.cwd);

  if (existsSync(paths.config) && !opts.force) {
    throw new Error(`Workspace already exists at ${paths.root}. Use --force to reinitialize.`);
  }

  mkdirSync(paths.root, { recursive: true });
  const config = defaultConfig(opts.owner, opts.repository);
  writeShiplineConfig(paths.config, config);
  return config;
}
