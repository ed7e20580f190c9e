/**
 * Map GitHub webhook deliveries onto pipeline triggers.
 * Ref names follow the short form GitHub Actions exposes: `main` for a branch
 * push, `<number>/merge` for a pull request.
 */
import { PullRequestEventSchema, PushEventSchema } from '../shared/schemas.js';
import type { RepositoryRef, TriggerContext } from '../pipeline/types.js';

export type GitHubEventOutcome =
  | { kind: 'trigger'; trigger: TriggerContext }
  | { kind: 'ping' }
  | { kind: 'ignored'; reason: string }
  | { kind: 'invalid'; reason: string };

const PR_ACTIONS = new Set(['opened', 'synchronize', 'reopened']);
const ZERO_SHA = /^0+$/;

function repositoryRef(repo: { full_name: string; name: string }): RepositoryRef {
  const [owner = ''] = repo.full_name.split('/');
  return { owner, name: repo.name };
}

function shortRefName(ref: string): string | null {
  for (const prefix of ['refs/heads/', 'refs/tags/']) {
    if (ref.startsWith(prefix)) return ref.slice(prefix.length);
  }
  return null;
}

export function parseGitHubEvent(event: string | undefined, payload: unknown): GitHubEventOutcome {
  switch (event) {
    case 'ping':
      return { kind: 'ping' };

    case 'push': {
      const parsed = PushEventSchema.safeParse(payload);
      if (!parsed.success) return { kind: 'invalid', reason: 'malformed push payload' };
      const push = parsed.data;
      if (push.deleted || ZERO_SHA.test(push.after)) return { kind: 'ignored', reason: 'ref deleted' };
      const refName = shortRefName(push.ref);
      if (refName === null) return { kind: 'ignored', reason: `unsupported ref ${push.ref}` };
      return {
        kind: 'trigger',
        trigger: {
          repository: repositoryRef(push.repository),
          ref_name: refName,
          commit_id: push.after,
          event: 'push',
        },
      };
    }

    case 'pull_request': {
      const parsed = PullRequestEventSchema.safeParse(payload);
      if (!parsed.success) return { kind: 'invalid', reason: 'malformed pull_request payload' };
      const pr = parsed.data;
      if (!PR_ACTIONS.has(pr.action)) return { kind: 'ignored', reason: `pull_request action ${pr.action}` };
      return {
        kind: 'trigger',
        trigger: {
          repository: repositoryRef(pr.repository),
          ref_name: `${pr.number}/merge`,
          commit_id: pr.pull_request.head.sha,
          event: 'pull_request',
          change_request: pr.number,
        },
      };
    }

    default:
      return { kind: 'ignored', reason: `event ${event ?? '<none>'} not handled` };
  }
}
