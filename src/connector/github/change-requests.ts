/**
 * GitHub pull requests as the change-request host.
 * Lookup by head commit and comment delivery over the REST API.
 */
import { logger } from '../../shared/logger.js';
import type { ChangeRequest, ChangeRequestHost } from '../../collaborators/types.js';
import type { RepositoryRef } from '../../pipeline/types.js';

const GITHUB_API = 'https://api.github.com';

export type FetchLike = (url: string | URL, init?: RequestInit) => Promise<Response>;

export interface GitHubClientOptions {
  token: string | null;
  apiUrl?: string;
  fetch?: FetchLike;
}

interface PullSummary {
  number: number;
  html_url: string;
  state: string;
  head: { sha: string };
}

export class GitHubChangeRequests implements ChangeRequestHost {
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: GitHubClientOptions) {
    this.apiUrl = (opts.apiUrl ?? GITHUB_API).replace(/\/+$/, '');
    this.fetchImpl = opts.fetch ?? fetch;
  }

  /**
   * Open pull request whose head is exactly `commitId`, or null.
   * A commit GitHub does not know about is "no match", not an error.
   */
  async findOpenByHeadCommit(repo: RepositoryRef, commitId: string): Promise<ChangeRequest | null> {
    const resp = await this.fetchImpl(
      `${this.apiUrl}/repos/${repo.owner}/${repo.name}/commits/${encodeURIComponent(commitId)}/pulls`,
      { headers: this.headers() },
    );

    if (resp.status === 404 || resp.status === 422) {
      logger.debug('Commit unknown to GitHub', { repo: `${repo.owner}/${repo.name}`, commit: commitId });
      return null;
    }
    if (!resp.ok) {
      const err = await resp.text();
      throw new Error(`GitHub pull lookup failed ${resp.status}: ${err}`);
    }

    const pulls = (await resp.json()) as PullSummary[];
    const match = pulls.find((pr) => pr.state === 'open' && pr.head.sha === commitId);
    if (!match) return null;
    return { number: match.number, url: match.html_url, head_sha: match.head.sha };
  }

  async postComment(repo: RepositoryRef, number: number, body: string): Promise<boolean> {
    const resp = await this.fetchImpl(
      `${this.apiUrl}/repos/${repo.owner}/${repo.name}/issues/${number}/comments`,
      {
        method: 'POST',
        headers: { ...this.headers(), 'Content-Type': 'application/json' },
        body: JSON.stringify({ body }),
      },
    );

    if (resp.status === 404 || resp.status === 410) {
      logger.warn('Change request no longer exists', { repo: `${repo.owner}/${repo.name}`, number });
      return false;
    }
    if (!resp.ok) {
      const err = await resp.text();
      throw new Error(`GitHub comment failed ${resp.status}: ${err}`);
    }
    return true;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.opts.token) headers['Authorization'] = `Bearer ${this.opts.token}`;
    return headers;
  }
}
