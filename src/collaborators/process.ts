import { spawn, type SpawnOptionsWithoutStdio, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { CollaboratorError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { CommandOptions, CommandResult, CommandRunner } from './types.js';

export interface ProcessOptions extends CommandOptions {
  spawn?: typeof spawn;
  /** Name used in errors and logs. */
  collaborator?: string;
}

/**
 * Spawn a process, collect its output and resolve with the exit code.
 * Rejects with CollaboratorError when the process cannot start or exceeds its timeout.
 */
export function execProcess(argv: string[], opts: ProcessOptions): Promise<CommandResult> {
  const [bin, ...args] = argv;
  const collaborator = opts.collaborator ?? bin ?? 'process';
  if (!bin) {
    return Promise.reject(new CollaboratorError(collaborator, 'empty command'));
  }

  const spawnImpl = opts.spawn ?? spawn;
  const started = Date.now();

  return new Promise((resolve, reject) => {
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawnImpl(bin, args, {
        cwd: opts.cwd,
        env: opts.env ? { ...process.env, ...opts.env } : process.env,
        stdio: 'pipe',
      } as SpawnOptionsWithoutStdio) as ChildProcessWithoutNullStreams;
    } catch (err) {
      reject(new CollaboratorError(collaborator, errorMessage(err)));
      return;
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      logger.warn('Collaborator timed out', { collaborator, timeout_ms: opts.timeoutMs });
      child.kill('SIGKILL');
      reject(new CollaboratorError(collaborator, `timed out after ${opts.timeoutMs}ms`));
    }, opts.timeoutMs);

    child.stdout.on('data', (chunk) => stdoutChunks.push(Buffer.from(chunk)));
    child.stderr.on('data', (chunk) => stderrChunks.push(Buffer.from(chunk)));

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new CollaboratorError(collaborator, err.message));
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exit_code: code ?? 1,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        duration_ms: Date.now() - started,
      });
    });

    child.stdin.end();
  });
}

export class ShellCommandRunner implements CommandRunner {
  constructor(private readonly spawnImpl: typeof spawn = spawn) {}

  run(argv: string[], options: CommandOptions): Promise<CommandResult> {
    logger.debug('Running command', { argv: argv.join(' '), cwd: options.cwd });
    return execProcess(argv, { ...options, spawn: this.spawnImpl });
  }
}
