import type { ImageReference } from '../types.js';

export const DEFAULT_REGISTRY = 'docker.io';
export const DEFAULT_TAG = 'latest';

const DIGEST_MARKER = '@sha256:';

/**
 * Parse a container image name into registry, repository, tag and digest.
 *
 * Never throws: unrecognised shapes fall back to Docker Hub defaults and
 * malformed hosts or paths pass through unchanged.
 *
 * @example
 *   nginx                          -> docker.io/library/nginx:latest
 *   myuser/app:1.2                 -> docker.io/myuser/app:1.2
 *   localhost:5000/app             -> localhost:5000/app:latest
 *   us-docker.pkg.dev/p/repo/app   -> us-docker.pkg.dev/p/repo/app:latest
 *   nginx:1.25@sha256:abc          -> docker.io/library/nginx@sha256:abc
 */
export function parseImageReference(raw: string): ImageReference {
  let name = raw;
  let digest: string | undefined;

  const digestAt = name.indexOf(DIGEST_MARKER);
  if (digestAt !== -1) {
    digest = `sha256:${name.slice(digestAt + DIGEST_MARKER.length)}`;
    name = name.slice(0, digestAt);
  }

  // Right-most colon, so a registry port is not mistaken for a tag. A colon
  // followed by a path segment is a host:port, not a tag.
  let tag = DEFAULT_TAG;
  const colonAt = name.lastIndexOf(':');
  if (colonAt !== -1 && !name.includes('/', colonAt)) {
    tag = name.slice(colonAt + 1);
    name = name.slice(0, colonAt);
  }

  const parts = name.split('/');
  let registry: string;
  let repository: string;

  if (parts.length === 1) {
    registry = DEFAULT_REGISTRY;
    repository = `library/${parts[0]}`;
  } else if (parts.length === 2) {
    const [first, second] = parts;
    if (first.includes('.') || first.includes(':')) {
      registry = first;
      repository = second;
    } else {
      registry = DEFAULT_REGISTRY;
      repository = `${first}/${second}`;
    }
  } else {
    registry = parts[0];
    repository = parts.slice(1).join('/');
  }

  const fullName = digest
    ? `${registry}/${repository}@${digest}`
    : `${registry}/${repository}:${tag}`;

  return Object.freeze({
    registry,
    repository,
    tag,
    digest,
    fullName,
    original: raw,
  });
}
