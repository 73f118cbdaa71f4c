import { describe, it, expect } from 'vitest';
import { parseImageReference } from '../../src/core/image.js';

describe('core/image', () => {
  describe('parseImageReference', () => {
    it('expands a bare name to Docker Hub library with latest tag', () => {
      const ref = parseImageReference('nginx');

      expect(ref.registry).toBe('docker.io');
      expect(ref.repository).toBe('library/nginx');
      expect(ref.tag).toBe('latest');
      expect(ref.digest).toBeUndefined();
      expect(ref.fullName).toBe('docker.io/library/nginx:latest');
      expect(ref.original).toBe('nginx');
    });

    it('keeps a user namespace on Docker Hub', () => {
      const ref = parseImageReference('myuser/app:1.2');

      expect(ref.registry).toBe('docker.io');
      expect(ref.repository).toBe('myuser/app');
      expect(ref.tag).toBe('1.2');
      expect(ref.fullName).toBe('docker.io/myuser/app:1.2');
    });

    it('treats a dotted first segment as the registry', () => {
      const ref = parseImageReference('gcr.io/app:v1');

      expect(ref.registry).toBe('gcr.io');
      expect(ref.repository).toBe('app');
      expect(ref.fullName).toBe('gcr.io/app:v1');
    });

    it('keeps a nested repository path after the registry', () => {
      const ref = parseImageReference('us-docker.pkg.dev/proj/repo/app:2.0');

      expect(ref.registry).toBe('us-docker.pkg.dev');
      expect(ref.repository).toBe('proj/repo/app');
      expect(ref.tag).toBe('2.0');
    });

    it('does not read a registry port as a tag', () => {
      const ref = parseImageReference('localhost:5000/app');

      expect(ref.registry).toBe('localhost:5000');
      expect(ref.repository).toBe('app');
      expect(ref.tag).toBe('latest');
      expect(ref.fullName).toBe('localhost:5000/app:latest');
    });

    it('reads a tag after a registry port', () => {
      const ref = parseImageReference('localhost:5000/app:dev');

      expect(ref.registry).toBe('localhost:5000');
      expect(ref.repository).toBe('app');
      expect(ref.tag).toBe('dev');
    });

    it('uses the digest form of the full name when a digest is present', () => {
      const ref = parseImageReference('nginx:1.25@sha256:abc123');

      expect(ref.digest).toBe('sha256:abc123');
      expect(ref.tag).toBe('1.25');
      expect(ref.fullName).toBe('docker.io/library/nginx@sha256:abc123');
    });

    it('accepts a digest without a tag', () => {
      const ref = parseImageReference('gcr.io/proj/app@sha256:def');

      expect(ref.tag).toBe('latest');
      expect(ref.repository).toBe('proj/app');
      expect(ref.fullName).toBe('gcr.io/proj/app@sha256:def');
    });

    it('returns a frozen value', () => {
      expect(Object.isFrozen(parseImageReference('nginx'))).toBe(true);
    });
  });
});
