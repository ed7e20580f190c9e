/**
 * Deployment Verifier — pull the published image by tag and prove it adds.
 *
 * Pull order: mutable tag, then the immutable commit tag. The mutable tag may
 * already point at a newer push for the same ref; that staleness is accepted.
 * Never pushes, retags or deletes anything.
 */
import { ArtifactNotFoundError, CollaboratorError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ExecutionSandbox, Registry } from '../collaborators/types.js';
import { imageReference, resolveArtifactTags } from './tags.js';
import type { ArtifactTag, DeploymentCheck, ImageCoordinates, PullAttempt } from './types.js';

export const VERIFY_INPUTS: readonly string[] = ['2', '3'];
export const EXPECTED_OUTPUT = '5';

export interface DeploymentVerifierOptions {
  image: ImageCoordinates;
  timeoutMs: number;
  now?: () => Date;
}

export class DeploymentVerifier {
  private readonly now: () => Date;

  constructor(
    private readonly registry: Registry,
    private readonly sandbox: ExecutionSandbox,
    private readonly opts: DeploymentVerifierOptions,
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async verify(refName: string, commitId: string): Promise<DeploymentCheck> {
    const tags = resolveArtifactTags(this.opts.image, refName, commitId);
    const candidates: ArtifactTag[] =
      tags.mutable.tag === tags.immutable.tag ? [tags.mutable] : [tags.mutable, tags.immutable];

    const attempts: PullAttempt[] = [];
    let pulled: ArtifactTag | null = null;
    for (const candidate of candidates) {
      const image = imageReference(candidate);
      try {
        await this.registry.pull(image, { timeoutMs: this.opts.timeoutMs });
        attempts.push({ image, ok: true });
        pulled = candidate;
        break;
      } catch (err) {
        const reason = err instanceof ArtifactNotFoundError ? 'not found' : errorMessage(err);
        logger.warn('Pull failed', { image, error: reason });
        attempts.push({ image, ok: false, error: reason });
      }
    }

    if (!pulled) {
      return this.finish({
        tag: null,
        image: null,
        stdout: '',
        exit_code: null,
        pass: false,
        failure: 'infrastructure',
        attempts,
        error: 'no candidate tag could be pulled',
      });
    }

    const image = imageReference(pulled);
    try {
      const result = await this.sandbox.run(image, [...VERIFY_INPUTS], { timeoutMs: this.opts.timeoutMs });
      const pass = result.exit_code === 0 && result.stdout.trim() === EXPECTED_OUTPUT;
      return this.finish({
        tag: pulled.tag,
        image,
        stdout: result.stdout,
        exit_code: result.exit_code,
        pass,
        ...(pass
          ? {}
          : {
              failure: 'assertion' as const,
              error: `expected exit 0 and output "${EXPECTED_OUTPUT}", got exit ${result.exit_code} and output ${JSON.stringify(result.stdout.trim())}`,
            }),
        attempts,
      });
    } catch (err) {
      const message = err instanceof CollaboratorError ? err.message : `sandbox failed: ${errorMessage(err)}`;
      return this.finish({
        tag: pulled.tag,
        image,
        stdout: '',
        exit_code: null,
        pass: false,
        failure: 'infrastructure',
        attempts,
        error: message,
      });
    }
  }

  private finish(check: Omit<DeploymentCheck, 'kind' | 'checked_at'>): DeploymentCheck {
    const result: DeploymentCheck = { kind: 'deployment', ...check, checked_at: this.now().toISOString() };
    Object.freeze(result.attempts);
    return Object.freeze(result);
  }
}
