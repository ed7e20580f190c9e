/**
 * Tag Deriver — pure functions from (ref, commit) to registry tags.
 * Publish and pull both go through here so the two never disagree on spelling.
 */
import type { ArtifactTag, ArtifactTags, ImageCoordinates } from './types.js';

export const MAX_TAG_LENGTH = 128;
export const FALLBACK_TAG = 'unknown-ref';

/**
 * Registry-safe spelling of a ref name. Total and idempotent:
 * `sanitizeRef(sanitizeRef(x)) === sanitizeRef(x)`. May return ''.
 */
export function sanitizeRef(ref: string, maxLength: number = MAX_TAG_LENGTH): string {
  const cleaned = ref
    .toLowerCase()
    .replace(/[^a-z0-9._-]/g, '-')
    .replace(/-{2,}/g, '-')
    // registries reject tags starting with '.' or '-'
    .replace(/^[.-]+/, '')
    .replace(/-+$/, '');
  return cleaned.slice(0, Math.max(0, maxLength)).replace(/-+$/, '');
}

export function deriveTags(refName: string, commitId: string): { mutable: string; immutable: string } {
  const mutable = sanitizeRef(refName);
  return {
    mutable: mutable === '' ? FALLBACK_TAG : mutable,
    immutable: commitId,
  };
}

function normalizeCoordinates(image: ImageCoordinates): ImageCoordinates {
  return {
    registry: image.registry.toLowerCase(),
    namespace: image.namespace.toLowerCase(),
    repository: image.repository.toLowerCase(),
  };
}

export function resolveArtifactTags(
  image: ImageCoordinates,
  refName: string,
  commitId: string,
): ArtifactTags {
  const coords = normalizeCoordinates(image);
  const { mutable, immutable } = deriveTags(refName, commitId);
  return {
    mutable: { ...coords, tag: mutable },
    immutable: { ...coords, tag: immutable },
  };
}

/** `registry/namespace/repository:tag`, skipping empty path segments. */
export function imageReference(tag: ArtifactTag): string {
  const path = [tag.registry, tag.namespace, tag.repository].filter((part) => part.length > 0).join('/');
  return `${path}:${tag.tag}`;
}
