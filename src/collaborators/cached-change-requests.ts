import type { RepositoryRef } from '../pipeline/types.js';
import type { ChangeRequest, ChangeRequestHost } from './types.js';

const DEFAULT_CAPACITY = 100;

/**
 * Remembers head-commit lookups, including misses, so the notifier and the
 * trigger share one answer per commit. Failed lookups are not remembered.
 */
export class CachedChangeRequests implements ChangeRequestHost {
  private readonly lookups = new Map<string, Promise<ChangeRequest | null>>();

  constructor(
    private readonly inner: ChangeRequestHost,
    private readonly capacity: number = DEFAULT_CAPACITY,
  ) {}

  findOpenByHeadCommit(repo: RepositoryRef, commitId: string): Promise<ChangeRequest | null> {
    const key = `${repo.owner}/${repo.name}@${commitId}`;
    const cached = this.lookups.get(key);
    if (cached) return cached;

    const lookup = this.inner.findOpenByHeadCommit(repo, commitId);
    this.lookups.set(key, lookup);
    while (this.lookups.size > this.capacity) {
      const oldest = this.lookups.keys().next();
      if (oldest.done) break;
      this.lookups.delete(oldest.value);
    }
    void lookup.catch(() => {
      if (this.lookups.get(key) === lookup) this.lookups.delete(key);
    });
    return lookup;
  }

  postComment(repo: RepositoryRef, number: number, body: string): Promise<boolean> {
    return this.inner.postComment(repo, number, body);
  }
}
