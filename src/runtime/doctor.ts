import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { spawnSync } from 'node:child_process';
import { getShiplinePaths } from '../workspace/paths.js';
import { readShiplineConfig, resolveGitHubToken, resolveWebhookSecret } from '../workspace/config.js';
import type { ShiplineConfig } from '../workspace/types.js';
import { errorMessage } from '../shared/errors.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  summary: string;
}

/** Runs a tool and returns its trimmed stdout, or null when it is missing or exits nonzero. */
export type ToolProbe = (bin: string, args: string[]) => string | null;

export interface DoctorOptions {
  env?: NodeJS.ProcessEnv;
  probe?: ToolProbe;
  nodeVersion?: string;
}

type CheckOutcome = Omit<DoctorCheck, 'name'>;

async function check(name: string, fn: () => Promise<CheckOutcome> | CheckOutcome): Promise<DoctorCheck> {
  try {
    const result = await Promise.resolve(fn());
    return { name, ...result };
  } catch (err) {
    return {
      name,
      status: 'fail',
      message: `Check threw: ${errorMessage(err)}`,
    };
  }
}

export const spawnProbe: ToolProbe = (bin, args) => {
  const result = spawnSync(bin, args, {
    stdio: ['ignore', 'pipe', 'ignore'],
    encoding: 'utf8',
    timeout: 10_000,
  });
  if (result.error || result.status !== 0) return null;
  return result.stdout.trim();
};

function loadConfig(configPath: string): { config: ShiplineConfig | null; outcome: CheckOutcome } {
  if (!existsSync(configPath)) {
    return {
      config: null,
      outcome: { status: 'fail', message: 'config.yaml missing', fix: 'Run: shipline init --owner <o> --repo <r>' },
    };
  }
  try {
    const config = readShiplineConfig(configPath);
    return {
      config,
      outcome: { status: 'pass', message: `config.yaml parsed for ${config.project.owner}/${config.project.repository}` },
    };
  } catch (err) {
    return { config: null, outcome: { status: 'fail', message: errorMessage(err), fix: `Edit ${configPath}` } };
  }
}

export async function runDoctorChecks(cwd: string = process.cwd(), opts: DoctorOptions = {}): Promise<DoctorReport> {
  const env = opts.env ?? process.env;
  const probe = opts.probe ?? spawnProbe;
  const paths = getShiplinePaths(cwd);
  const checks: DoctorCheck[] = [];

  // ── Environment ──────────────────────────────────────────────────────────
  checks.push(
    await check('Node.js >= 20', () => {
      const v = (opts.nodeVersion ?? process.version).replace(/^v/, '');
      const major = Number.parseInt(v.split('.')[0] ?? '0', 10);
      if (major >= 20) return { status: 'pass', message: `Node.js ${v}` };
      return {
        status: 'fail',
        message: `Node.js ${v} is below required v20`,
        fix: 'Upgrade Node.js to v20 or later: https://nodejs.org',
      };
    }),
  );

  // ── Workspace ─────────────────────────────────────────────────────────────
  const { config: loaded, outcome } = loadConfig(paths.config);
  checks.push(await check('Workspace config valid (.shipline/config.yaml)', () => outcome));

  checks.push(
    await check('Dockerfile present', () => {
      const context = loaded?.ci.build.context ?? '.';
      const dockerfile = join(cwd, context, loaded?.ci.build.dockerfile ?? 'Dockerfile');
      if (existsSync(dockerfile)) return { status: 'pass', message: `${dockerfile} found` };
      return { status: 'fail', message: `${dockerfile} not found`, fix: 'Add a Dockerfile or set ci.build.dockerfile' };
    }),
  );

  // ── Tooling ──────────────────────────────────────────────────────────────
  checks.push(
    await check('docker available', () => {
      const version = probe('docker', ['--version']);
      if (version === null) {
        return { status: 'fail', message: 'docker not found', fix: 'Install Docker: https://docs.docker.com/get-docker/' };
      }
      return { status: 'pass', message: version };
    }),
  );

  checks.push(
    await check('docker daemon reachable', () => {
      const server = probe('docker', ['info', '--format', '{{.ServerVersion}}']);
      if (server === null) {
        return { status: 'fail', message: 'docker daemon did not answer', fix: 'Start the Docker daemon' };
      }
      return { status: 'pass', message: `daemon ${server}` };
    }),
  );

  checks.push(
    await check('git available', () => {
      const version = probe('git', ['--version']);
      if (version === null) {
        return {
          status: 'fail',
          message: 'git not found – CI runs cannot check out the commit',
          fix: 'Install git: https://git-scm.com/downloads',
        };
      }
      return { status: 'pass', message: version };
    }),
  );

  checks.push(
    await check('trivy available', () => {
      const version = probe('trivy', ['--version']);
      if (version === null) {
        return {
          status: 'fail',
          message: 'trivy not found – the security scan stage cannot run',
          fix: 'Install trivy: https://aquasecurity.github.io/trivy/',
        };
      }
      return { status: 'pass', message: version.split(/\r?\n/)[0] ?? version };
    }),
  );

  // ── Credentials ──────────────────────────────────────────────────────────
  checks.push(
    await check('GitHub token configured', () => {
      const tokenEnv = loaded?.github.token_env ?? 'GITHUB_TOKEN';
      if (loaded ? resolveGitHubToken(loaded, env) : env[tokenEnv]) {
        return { status: 'pass', message: `${tokenEnv} is set` };
      }
      return {
        status: 'warn',
        message: `${tokenEnv} not set – pull request comments will not be posted`,
        fix: `export ${tokenEnv}=<token>`,
      };
    }),
  );

  checks.push(
    await check('Webhook secret configured', () => {
      if (!loaded) return { status: 'warn', message: 'Workspace config not loaded – skipping' };
      const host = env['SHIPLINE_API_HOST'] ?? loaded.server.host;
      const isLoopback = host === '127.0.0.1' || host === 'localhost' || host === '::1';
      if (resolveWebhookSecret(loaded, env)) {
        return { status: 'pass', message: `${loaded.server.webhook_secret_env} is set` };
      }
      return {
        status: isLoopback ? 'warn' : 'fail',
        message: `${loaded.server.webhook_secret_env} not set – webhook deliveries are not authenticated (bind ${host})`,
        fix: `export ${loaded.server.webhook_secret_env}=<secret>`,
      };
    }),
  );

  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');
  const overall: CheckStatus = hasFailure ? 'fail' : hasWarning ? 'warn' : 'pass';

  const passCount = checks.filter((c) => c.status === 'pass').length;
  const summary =
    `${passCount}/${checks.length} checks passed` +
    (hasFailure ? ' – FAILURES detected' : '') +
    (hasWarning && !hasFailure ? ' – warnings present' : '');

  return { overall, checks, summary };
}
