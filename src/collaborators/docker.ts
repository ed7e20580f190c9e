import { spawn } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { ArtifactNotFoundError, CollaboratorError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { execProcess } from './process.js';
import type {
  ExecutionSandbox,
  PublishRequest,
  PublishResult,
  Registry,
  SandboxResult,
} from './types.js';

export interface DockerCliOptions {
  dockerBin?: string;
  /** Resource limits for the verification sandbox. */
  cpus?: string;
  memory?: string;
  spawn?: typeof spawn;
}

const DIGEST_PATTERN = /digest:\s*(sha256:[a-f0-9]{64})/i;
const NOT_FOUND_PATTERN = /manifest unknown|not found|does not exist|no such image/i;

function tail(text: string, lines = 20): string {
  return text.trim().split('\n').slice(-lines).join('\n');
}

/**
 * Registry and execution sandbox backed by the docker CLI.
 * Authentication to the registry is expected to be in place (`docker login`).
 */
export class DockerCli implements Registry, ExecutionSandbox {
  private readonly bin: string;
  private readonly spawnImpl: typeof spawn;

  constructor(private readonly opts: DockerCliOptions = {}) {
    this.bin = opts.dockerBin ?? 'docker';
    this.spawnImpl = opts.spawn ?? spawn;
  }

  async publish(req: PublishRequest): Promise<PublishResult> {
    const buildArgs = ['build'];
    if (req.dockerfile) buildArgs.push('--file', req.dockerfile);
    for (const image of req.images) buildArgs.push('--tag', image);
    buildArgs.push(req.context);

    logger.info('Building image', { images: req.images, context: req.context });
    const build = await this.docker(buildArgs, req.timeoutMs);
    if (build.exit_code !== 0) {
      return {
        built: false,
        build_error: tail(build.stderr || build.stdout) || `docker build exited with code ${build.exit_code}`,
        tags: [],
      };
    }

    // One build, several pushes: every tag names the same local image ID
    const tags: PublishResult['tags'] = [];
    for (const image of req.images) {
      try {
        const push = await this.docker(['push', image], req.timeoutMs);
        if (push.exit_code !== 0) {
          tags.push({ image, ok: false, digest: null, error: tail(push.stderr || push.stdout) });
          continue;
        }
        const digest = DIGEST_PATTERN.exec(push.stdout)?.[1] ?? null;
        tags.push({ image, ok: true, digest });
      } catch (err) {
        tags.push({ image, ok: false, digest: null, error: errorMessage(err) });
      }
    }
    return { built: true, tags };
  }

  async pull(image: string, options: { timeoutMs: number }): Promise<void> {
    const result = await this.docker(['pull', image], options.timeoutMs);
    if (result.exit_code === 0) return;
    const detail = tail(result.stderr || result.stdout);
    if (NOT_FOUND_PATTERN.test(detail)) throw new ArtifactNotFoundError(image);
    throw new CollaboratorError('docker pull', detail || `exited with code ${result.exit_code}`);
  }

  async run(image: string, args: string[], options: { timeoutMs: number }): Promise<SandboxResult> {
    const name = `shipline_verify_${randomUUID().slice(0, 8)}`;
    const dockerArgs = [
      'run',
      '--rm',
      '--name',
      name,
      '--network',
      'none',
      '--pids-limit',
      '64',
      '--cpus',
      this.opts.cpus ?? '1',
      '--memory',
      this.opts.memory ?? '256m',
      '--security-opt',
      'no-new-privileges:true',
      '--cap-drop',
      'ALL',
      '--read-only',
      image,
      ...args,
    ];

    logger.debug('Starting verification container', { image, container: name });
    try {
      const result = await this.docker(dockerArgs, options.timeoutMs);
      return { stdout: result.stdout, stderr: result.stderr, exit_code: result.exit_code };
    } catch (err) {
      await this.forceRemove(name);
      throw err;
    }
  }

  private async forceRemove(name: string): Promise<void> {
    try {
      await this.docker(['rm', '--force', name], 30_000);
    } catch (err) {
      logger.warn('Failed to remove verification container', { container: name, error: errorMessage(err) });
    }
  }

  private docker(args: string[], timeoutMs: number) {
    return execProcess([this.bin, ...args], {
      timeoutMs,
      spawn: this.spawnImpl,
      collaborator: `docker ${args[0] ?? ''}`.trim(),
    });
  }
}
