import { describe, it, expect, beforeEach } from 'vitest';
import {
  ResultStore,
  errorBlobPath,
  sanitizeName,
  scanBlobPath,
  toScanRecord,
} from '../../src/core/store.js';
import { StorageError } from '../../src/errors.js';
import { emptySeverityCounts, type ScanResultRecord } from '../../src/types.js';
import {
  FIXED_NOW,
  MemoryBlobStore,
  MemoryMetadataStore,
  fakeTime,
  silentLogger,
  type FakeTime,
} from '../helpers/fakes.js';

function record(overrides: Partial<ScanResultRecord> = {}): ScanResultRecord {
  return {
    scanId: 'scan-1',
    status: 'COMPLETED',
    image: 'docker.io/library/nginx:latest',
    vulnerabilities: {
      counts: { ...emptySeverityCounts(), CRITICAL: 1, LOW: 2 },
      total: 3,
      details: [],
    },
    compliance: { passed: 4, failed: 1, total: 5, checks: [] },
    metadata: {
      registry: 'docker.io',
      repository: 'library/nginx',
      tag: 'latest',
      scanTimestamp: '2024-01-15T10:30:00.000Z',
      scanner: 'qscanner-cloudrun',
      jobName: 'qscanner-library-nginx-latest-20240115103000',
    },
    timestamp: '2024-01-15T10:30:00.000Z',
    containerType: 'cloudrun',
    originalImage: 'nginx',
    projectId: 'p1',
    serviceName: 'web',
    location: 'us-central1',
    eventId: 'e1',
    ...overrides,
  };
}

describe('core/store', () => {
  describe('sanitizeName', () => {
    it('replaces path, tag and digest separators', () => {
      expect(sanitizeName('docker.io/library/nginx:latest')).toBe('docker.io_library_nginx_latest');
      expect(sanitizeName('gcr.io/p/app@sha256:abc')).toBe('gcr.io_p_app_sha256_abc');
    });

    it('replaces any other unsafe character', () => {
      expect(sanitizeName('a b+c')).toBe('a_b_c');
    });
  });

  describe('paths', () => {
    it('places scan results under the sanitized image name', () => {
      expect(scanBlobPath(record())).toBe('docker.io_library_nginx_latest/scan-1.json');
    });

    it('places error records under errors/', () => {
      expect(errorBlobPath({ image: 'gcr.io/app:v1', timestamp: '2024-01-15T10:30:00.000Z' })).toBe(
        'errors/gcr.io_app_v1/2024-01-15T10:30:00.000Z.json'
      );
    });
  });

  describe('toScanRecord', () => {
    it('projects the counts and identity fields', () => {
      expect(toScanRecord(record(), 'x/scan-1.json')).toEqual({
        image: 'docker.io/library/nginx:latest',
        scan_id: 'scan-1',
        timestamp_str: '2024-01-15T10:30:00.000Z',
        status: 'COMPLETED',
        container_type: 'cloudrun',
        project_id: 'p1',
        service_name: 'web',
        location: 'us-central1',
        vuln_critical: 1,
        vuln_high: 0,
        vuln_medium: 0,
        vuln_low: 2,
        vuln_informational: 0,
        vuln_total: 3,
        compliance_passed: 4,
        compliance_failed: 1,
        blob_path: 'x/scan-1.json',
        sanitized_image_name: 'docker.io_library_nginx_latest',
      });
    });
  });

  describe('ResultStore', () => {
    let blobs: MemoryBlobStore;
    let metadata: MemoryMetadataStore;
    let time: FakeTime;
    let store: ResultStore;

    beforeEach(() => {
      blobs = new MemoryBlobStore();
      metadata = new MemoryMetadataStore();
      time = fakeTime();
      store = new ResultStore({ blobs, metadata, cacheWindowHours: 24, clock: time.clock, logger: silentLogger });
    });

    it('writes the full payload and the compact record', async () => {
      const saved = await store.saveScanResult(record());

      const blob = blobs.blobs.get('docker.io_library_nginx_latest/scan-1.json');
      expect(blob?.options).toEqual({
        contentType: 'application/json',
        metadata: {
          image: 'docker.io/library/nginx:latest',
          scan_id: 'scan-1',
          timestamp: '2024-01-15T10:30:00.000Z',
        },
      });
      expect(JSON.parse(blob?.content ?? '{}')).toEqual(record());
      expect(metadata.records.get('scan-1')).toEqual(saved);
      expect(saved.blob_path).toBe('docker.io_library_nginx_latest/scan-1.json');
    });

    it('wraps a write failure in StorageError', async () => {
      blobs.failUpload = new Error('bucket gone');

      const save = store.saveScanResult(record());

      await expect(save).rejects.toBeInstanceOf(StorageError);
      await expect(save).rejects.toThrow('Failed to save scan result scan-1: bucket gone');
    });

    it('saves error records without throwing', async () => {
      await store.saveError({ timestamp: '2024-01-15T10:30:00.000Z', image: 'gcr.io/app:v1', error: 'timeout' });

      expect(blobs.paths()).toEqual(['errors/gcr.io_app_v1/2024-01-15T10:30:00.000Z.json']);
    });

    it('swallows an error record write failure', async () => {
      blobs.failUpload = new Error('bucket gone');

      await expect(
        store.saveError({ timestamp: '2024-01-15T10:30:00.000Z', image: 'gcr.io/app:v1', error: 'timeout' })
      ).resolves.toBeUndefined();
    });

    it('finds a scan saved inside the window', async () => {
      await store.saveScanResult(record({ timestamp: new Date(FIXED_NOW - 60 * 60 * 1000).toISOString() }));

      expect(await store.isRecentlyScanned('docker.io/library/nginx:latest')).toBe(true);
      expect(metadata.queries[0]).toEqual({
        sanitizedName: 'docker.io_library_nginx_latest',
        since: '2024-01-14T10:30:00.000Z',
        limit: 1,
      });
    });

    it('ignores a scan older than the window', async () => {
      await store.saveScanResult(record({ timestamp: '2024-01-14T10:29:59.000Z' }));

      expect(await store.isRecentlyScanned('docker.io/library/nginx:latest')).toBe(false);
    });

    it('honours an explicit window', async () => {
      await store.saveScanResult(record({ timestamp: '2024-01-15T08:00:00.000Z' }));

      expect(await store.isRecentlyScanned('docker.io/library/nginx:latest', 1)).toBe(false);
      expect(await store.isRecentlyScanned('docker.io/library/nginx:latest', 3)).toBe(true);
    });

    it('fails open when the query errors', async () => {
      metadata.failQuery = new Error('index missing');

      expect(await store.isRecentlyScanned('docker.io/library/nginx:latest')).toBe(false);
    });

    it('creates a missing bucket without throwing', async () => {
      blobs.bucketExists = false;

      await store.ensureStorage();

      expect(blobs.bucketExists).toBe(true);
    });
  });
});
